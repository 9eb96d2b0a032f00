import {
  type Mapping,
  type SmapsEntry,
  type SmapsSummary,
  type UsageTotals,
  formatAddress,
  formatPermissions,
  vmFlagMnemonics,
} from '@smaps-inspector/analyzer';

export const formatBytes = (bytes: number): string =>
  bytes % 1024 === 0 ? `${bytes / 1024} kB` : `${bytes} B`;

export interface PrintContext {
  source: string;
  entries: SmapsEntry[];
  summary: SmapsSummary;
  top: number;
  skipped: number;
}

export const formatMappingLine = (mapping: Mapping): string => {
  const range = `${formatAddress(mapping.start)}-${formatAddress(mapping.end)}`;
  const base = `${range} ${formatPermissions(mapping.permissions)}`;
  return mapping.path ? `${base} ${mapping.path}` : base;
};

const jsonReplacer = (_key: string, value: unknown): unknown =>
  typeof value === 'bigint' ? `0x${value.toString(16)}` : value;

// Inodes stay decimal, as the kernel prints them.
const serializeMapping = (mapping: Mapping) => ({
  ...mapping,
  permissions: formatPermissions(mapping.permissions),
  inode: mapping.inode.toString(),
});

/** JSON with addresses written as `0x`-prefixed hex and VM flags as mnemonics. */
export const toJson = (entries: readonly SmapsEntry[]): string =>
  JSON.stringify(
    entries.map(({ mapping, usage }) => ({
      mapping: serializeMapping(mapping),
      usage: { ...usage, vmFlags: vmFlagMnemonics(usage.vmFlags) },
    })),
    jsonReplacer,
    2,
  );

export const mappingsToJson = (mappings: readonly Mapping[]): string =>
  JSON.stringify(
    mappings.map(serializeMapping),
    jsonReplacer,
    2,
  );

const printTotals = (totals: UsageTotals): void => {
  console.log(`  Size:          ${formatBytes(totals.size)}`);
  console.log(`  Rss:           ${formatBytes(totals.rss)}`);
  console.log(`  Pss:           ${formatBytes(totals.pss)}`);
  console.log(`  Shared:        ${formatBytes(totals.sharedClean + totals.sharedDirty)} (dirty ${formatBytes(totals.sharedDirty)})`);
  console.log(`  Private:       ${formatBytes(totals.privateClean + totals.privateDirty)} (dirty ${formatBytes(totals.privateDirty)})`);
  console.log(`  Anonymous:     ${formatBytes(totals.anonymous)}`);
  console.log(`  Swap:          ${formatBytes(totals.swap)} (pss ${formatBytes(totals.swapPss)})`);
  if (totals.locked > 0) {
    console.log(`  Locked:        ${formatBytes(totals.locked)}`);
  }
};

export const printHeader = (context: PrintContext): void => {
  console.log(`Source:   ${context.source}`);
  console.log(`Mappings: ${context.summary.mappingCount}`);
  if (context.skipped > 0) {
    console.log(`Skipped:  ${context.skipped}`);
  }
};

export const printSummaryTotals = (context: PrintContext): void => {
  console.log('\nTotals:');
  printTotals(context.summary.totals);
};

export const printTopMappings = (context: PrintContext): void => {
  const top = [...context.entries]
    .filter((entry) => entry.usage.rss > 0)
    .sort((a, b) => b.usage.rss - a.usage.rss)
    .slice(0, context.top);
  if (top.length === 0) {
    return;
  }

  console.log('\nTop mappings by RSS:');
  top.forEach(({ mapping, usage }) => {
    console.log(`  ${formatBytes(usage.rss).padStart(10)}  ${formatMappingLine(mapping)}`);
  });
};

export const printPathBreakdown = (context: PrintContext): void => {
  const { byPath } = context.summary;
  if (byPath.length === 0) {
    return;
  }

  console.log('\nBy path:');
  byPath.slice(0, context.top).forEach((entry) => {
    console.log(
      `  ${formatBytes(entry.totals.rss).padStart(10)}  ${entry.path} (${entry.mappingCount} mapping${
        entry.mappingCount === 1 ? '' : 's'
      })`,
    );
  });
};

export const printAnalysis = (context: PrintContext): void => {
  printHeader(context);
  printSummaryTotals(context);
  printTopMappings(context);
  printPathBreakdown(context);
};

export const printMappings = (mappings: readonly Mapping[]): void => {
  mappings.forEach((mapping) => {
    console.log(formatMappingLine(mapping));
  });
};
