import {
  type PathUsageSummary,
  SUMMARY_FIELDS,
  type SmapsEntry,
  type SmapsSummary,
  type Usage,
  type UsageTotals,
} from '../model';

export const ANONYMOUS_PATH_LABEL = '[anon]';

interface PathAccumulator {
  mappingCount: number;
  totals: UsageTotals;
}

export const createEmptyTotals = (): UsageTotals => ({
  size: 0,
  rss: 0,
  pss: 0,
  sharedClean: 0,
  sharedDirty: 0,
  privateClean: 0,
  privateDirty: 0,
  anonymous: 0,
  swap: 0,
  swapPss: 0,
  locked: 0,
});

const accumulateUsage = (totals: UsageTotals, usage: Usage): void => {
  SUMMARY_FIELDS.forEach((field) => {
    totals[field] += usage[field];
  });
};

const ensurePathAccumulator = (map: Map<string, PathAccumulator>, key: string): PathAccumulator => {
  const existing = map.get(key);
  if (existing) {
    return existing;
  }
  const created: PathAccumulator = { mappingCount: 0, totals: createEmptyTotals() };
  map.set(key, created);
  return created;
};

/**
 * Sums the detail blocks of a snapshot, overall and per backing path. Paths
 * are ordered by resident size, largest first.
 */
export const summarizeUsage = (entries: readonly SmapsEntry[]): SmapsSummary => {
  const totals = createEmptyTotals();
  const byPathMap = new Map<string, PathAccumulator>();

  entries.forEach(({ mapping, usage }) => {
    accumulateUsage(totals, usage);

    const accumulator = ensurePathAccumulator(byPathMap, mapping.path ?? ANONYMOUS_PATH_LABEL);
    accumulator.mappingCount += 1;
    accumulateUsage(accumulator.totals, usage);
  });

  const byPath: PathUsageSummary[] = Array.from(byPathMap.entries())
    .map(([path, accumulator]) => ({
      path,
      mappingCount: accumulator.mappingCount,
      totals: accumulator.totals,
    }))
    .sort((a, b) => b.totals.rss - a.totals.rss || a.path.localeCompare(b.path));

  return {
    mappingCount: entries.length,
    totals,
    byPath,
  };
};
