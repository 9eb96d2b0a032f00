import {
  type ExpectHeader,
  type LineSource,
  type MappingPredicate,
  type SmapsEntry,
  createParser,
  readFilter,
} from '@smaps-inspector/analyzer';

export interface CollectResult {
  entries: SmapsEntry[];
  /** Entries dropped because their header or detail block failed to decode. */
  skipped: number;
}

/**
 * In lenient mode the incremental parser is driven by hand: a malformed header
 * or detail block is reported and stepped over instead of ending the run.
 */
export const collectEntries = (source: LineSource, filter: MappingPredicate, lenient: boolean): CollectResult => {
  if (!lenient) {
    return { entries: readFilter(source, filter), skipped: 0 };
  }

  const entries: SmapsEntry[] = [];
  let skipped = 0;
  let state: ExpectHeader = createParser(source);

  for (;;) {
    const header = state.advance();
    if (header.status === 'end') {
      return { entries, skipped };
    }

    if (header.status === 'malformed') {
      console.warn(`Skipping entry: ${header.error.message}`);
      skipped += 1;
      state = header.state.skip();
      continue;
    }

    if (!filter(header.mapping)) {
      state = header.state.skip();
      continue;
    }

    const usage = header.state.advance();
    if (usage.status === 'invalid') {
      console.warn(`Skipping entry: ${usage.error.message}`);
      skipped += 1;
    } else {
      entries.push({ mapping: header.mapping, usage: usage.usage });
    }
    state = usage.state;
  }
};
