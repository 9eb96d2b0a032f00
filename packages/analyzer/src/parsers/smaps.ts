import path from 'path';
import { type FileLineSource, type LineSource, openLineSource } from '../io/line-source';
import { type Mapping, type MappingPredicate, type SmapsEntry } from '../model';
import { type ExpectHeader, createParser } from './state-machine';

export type ProcessId = number | 'self';

export interface ProcfsOptions {
  /** Mount point of procfs. Defaults to `SMAPS_PROCFS_ROOT` or `/proc`. */
  procfsRoot?: string;
}

export interface ReadSmapsOptions extends ProcfsOptions {
  /** Only mappings accepted here have their detail block decoded and returned. */
  filter?: MappingPredicate;
}

const DEFAULT_PROCFS_ROOT = '/proc';

const acceptAll: MappingPredicate = () => true;

/**
 * Lazily walks header/usage pairs in source order. Malformed input throws on
 * the step that meets it; blocks of rejected mappings are skipped undecoded.
 */
export function* iterateSmaps(source: LineSource, filter: MappingPredicate = acceptAll): Generator<SmapsEntry> {
  let state: ExpectHeader = createParser(source);

  for (;;) {
    const header = state.advance();
    if (header.status === 'end') {
      return;
    }
    if (header.status === 'malformed') {
      throw header.error;
    }

    if (!filter(header.mapping)) {
      state = header.state.skip();
      continue;
    }

    const usage = header.state.advance();
    if (usage.status === 'invalid') {
      throw usage.error;
    }

    yield { mapping: header.mapping, usage: usage.usage };
    state = usage.state;
  }
}

export const readFilter = (source: LineSource, filter: MappingPredicate): SmapsEntry[] =>
  Array.from(iterateSmaps(source, filter));

export const readAll = (source: LineSource): SmapsEntry[] => readFilter(source, acceptAll);

/** Header-only walk, as for `/proc/[pid]/maps`. Any detail lines present are skipped. */
export const readMaps = (source: LineSource, filter: MappingPredicate = acceptAll): Mapping[] => {
  const mappings: Mapping[] = [];
  let state: ExpectHeader = createParser(source);

  for (;;) {
    const header = state.advance();
    if (header.status === 'end') {
      return mappings;
    }
    if (header.status === 'malformed') {
      throw header.error;
    }
    if (filter(header.mapping)) {
      mappings.push(header.mapping);
    }
    state = header.state.skip();
  }
};

export const getProcfsRoot = (options: ProcfsOptions = {}): string =>
  options.procfsRoot ?? (process.env.SMAPS_PROCFS_ROOT || DEFAULT_PROCFS_ROOT);

export const getProcessFilePath = (
  pid: ProcessId,
  file: 'maps' | 'smaps' | 'smaps_rollup',
  options: ProcfsOptions = {},
): string => path.join(getProcfsRoot(options), String(pid), file);

const closeAfterFailure = (source: FileLineSource): void => {
  try {
    source.close();
  } catch (closeError) {
    const reason = closeError instanceof Error ? closeError.message : String(closeError);
    console.warn(`Close failed after an earlier error: ${reason}`);
  }
};

/**
 * Opens `filePath`, hands the source to `read` and closes it afterwards. When
 * `read` throws, that error propagates even if closing fails as well.
 */
export const withFileSource = <T>(filePath: string, read: (source: FileLineSource) => T): T => {
  const source = openLineSource(filePath);
  let result: T;
  try {
    result = read(source);
  } catch (error) {
    closeAfterFailure(source);
    throw error;
  }
  source.close();
  return result;
};

export const readSmapsFile = (filePath: string, options: ReadSmapsOptions = {}): SmapsEntry[] =>
  withFileSource(filePath, (source) => readFilter(source, options.filter ?? acceptAll));

export const readSmapsForPid = (pid: ProcessId, options: ReadSmapsOptions = {}): SmapsEntry[] =>
  readSmapsFile(getProcessFilePath(pid, 'smaps', options), options);

export const readMapsFile = (filePath: string, filter?: MappingPredicate): Mapping[] =>
  withFileSource(filePath, (source) => readMaps(source, filter));

export const readMapsForPid = (pid: ProcessId, options: ReadSmapsOptions = {}): Mapping[] =>
  readMapsFile(getProcessFilePath(pid, 'maps', options), options.filter);

/**
 * `smaps_rollup` holds a single pseudo-mapping spanning the whole address
 * space, followed by the summed detail block.
 */
export const readSmapsRollupFile = (filePath: string): SmapsEntry | undefined =>
  withFileSource(filePath, (source) => readAll(source)[0]);

export const readSmapsRollup = (pid: ProcessId, options: ProcfsOptions = {}): SmapsEntry | undefined =>
  readSmapsRollupFile(getProcessFilePath(pid, 'smaps_rollup', options));
