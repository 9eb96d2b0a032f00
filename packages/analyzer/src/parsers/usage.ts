import { SmapsFormatError, SmapsParseError } from '../errors';
import { type LineCursor } from '../io/line-cursor';
import { type Usage, type UsageByteField, createEmptyUsage } from '../model';
import { parseSizedValue, parseVmFlags } from './primitives';

const VM_FLAGS_TAG = 'VmFlags';
const VM_FLAGS_PREFIX = `${VM_FLAGS_TAG}:`;

const BYTE_FIELDS = new Map<string, UsageByteField>([
  ['Size', 'size'],
  ['KernelPageSize', 'kernelPageSize'],
  ['MMUPageSize', 'mmuPageSize'],
  ['Rss', 'rss'],
  ['Pss', 'pss'],
  ['Pss_Dirty', 'pssDirty'],
  ['Pss_Anon', 'pssAnon'],
  ['Pss_File', 'pssFile'],
  ['Pss_Shmem', 'pssShmem'],
  ['Shared_Clean', 'sharedClean'],
  ['Shared_Dirty', 'sharedDirty'],
  ['Private_Clean', 'privateClean'],
  ['Private_Dirty', 'privateDirty'],
  ['Referenced', 'referenced'],
  ['Anonymous', 'anonymous'],
  ['KSM', 'ksm'],
  ['LazyFree', 'lazyFree'],
  ['AnonHugePages', 'anonHugePages'],
  ['ShmemHugePages', 'shmemHugePages'],
  ['ShmemPmdMapped', 'shmemPmdMapped'],
  ['FilePmdMapped', 'filePmdMapped'],
  ['Shared_Hugetlb', 'sharedHugetlb'],
  ['Private_Hugetlb', 'privateHugetlb'],
  ['Swap', 'swap'],
  ['SwapPss', 'swapPss'],
  ['Locked', 'locked'],
]);

export type UsageBlockResult =
  | { valid: true; usage: Usage }
  | { valid: false; error: SmapsParseError };

/**
 * Header lines are told apart from detail lines only by the `-` in their
 * address range. A detail line that ever carried a dash would end the block.
 */
export const isHeaderLine = (line: string): boolean => line.includes('-');

const applyValue = (usage: Usage, key: string, value: number): void => {
  const field = BYTE_FIELDS.get(key);
  if (field !== undefined) {
    usage[field] = value;
    return;
  }

  switch (key) {
    case 'THPeligible':
      usage.thpEligible = value !== 0;
      return;
    case 'ProtectionKey':
      usage.protectionKey = value;
      return;
    default:
      throw new SmapsFormatError('unrecognized-key', key);
  }
};

/** Consumes the rest of a detail block without looking at its contents. */
export const skipUsageBlock = (cursor: LineCursor): number => {
  let skipped = 0;
  for (let line = cursor.peek(); line !== undefined && !isHeaderLine(line); line = cursor.peek()) {
    cursor.next();
    skipped += 1;
  }
  return skipped;
};

/**
 * Decodes the detail lines that follow a header, stopping before the next
 * header or at the end of input. A line that breaks the `KEY: NUMBER [UNIT]`
 * grammar invalidates the block; the remainder is skipped so the cursor is left
 * on the next header. Unknown keys, units and VM flags throw
 * {@link SmapsFormatError}.
 */
export const parseUsageBlock = (cursor: LineCursor): UsageBlockResult => {
  const usage = createEmptyUsage();

  for (let line = cursor.peek(); line !== undefined && !isHeaderLine(line); line = cursor.peek()) {
    cursor.next();

    if (line.trim().length === 0) {
      continue;
    }

    if (line.startsWith(VM_FLAGS_TAG)) {
      const flagsText = line.startsWith(VM_FLAGS_PREFIX) ? line.slice(VM_FLAGS_PREFIX.length) : line;
      usage.vmFlags = parseVmFlags(flagsText);
      continue;
    }

    const parsed = parseSizedValue(line);
    if (!parsed) {
      const error = new SmapsParseError('malformed-usage', line, cursor.lineNumber);
      skipUsageBlock(cursor);
      return { valid: false, error };
    }

    applyValue(usage, parsed.key, parsed.value);
  }

  return { valid: true, usage };
};
