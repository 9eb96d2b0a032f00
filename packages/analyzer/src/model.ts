export const Permission = {
  X: 1 << 0,
  W: 1 << 1,
  R: 1 << 2,
  S: 1 << 3,
  P: 1 << 4,
} as const;

export type PermissionName = keyof typeof Permission;

/**
 * Bit-set of {@link Permission} values. `S` (shared) and `P` (private) are a
 * category pair: a decoded mapping always carries exactly one of them.
 */
export type Permissions = number;

export const VM_FLAG_MNEMONICS = [
  'rd', 'wr', 'ex', 'sh', 'mr', 'mw', 'me', 'ms',
  'gd', 'pf', 'dw', 'lo', 'io', 'sr', 'rr', 'dc',
  'de', 'ac', 'nr', 'ht', 'sf', 'nl', 'ar', 'wf',
  'dd', 'sd', 'mm', 'hg', 'nh', 'mg', 'um', 'uw',
] as const;

export type VmFlagMnemonic = (typeof VM_FLAG_MNEMONICS)[number];

/** Per-region behavioural flags as reported on the `VmFlags:` line. */
export const VM_FLAG_DESCRIPTIONS: Readonly<Record<VmFlagMnemonic, string>> = {
  rd: 'readable',
  wr: 'writable',
  ex: 'executable',
  sh: 'shared',
  mr: 'may read',
  mw: 'may write',
  me: 'may execute',
  ms: 'may share',
  gd: 'stack segment grows down',
  pf: 'pure PFN range',
  dw: 'disabled write to the mapped file',
  lo: 'pages are locked in memory',
  io: 'memory mapped I/O area',
  sr: 'sequential read advise provided',
  rr: 'random read advise provided',
  dc: 'do not copy area on fork',
  de: 'do not expand area on remapping',
  ac: 'area is accountable',
  nr: 'swap space is not reserved for the area',
  ht: 'area uses huge tlb pages',
  sf: 'perform synchronous page faults',
  nl: 'non-linear mapping',
  ar: 'architecture specific flag',
  wf: 'wipe on fork',
  dd: 'do not include area into core dump',
  sd: 'soft-dirty flag',
  mm: 'mixed map area',
  hg: 'huge page advise flag',
  nh: 'no-huge page advise flag',
  mg: 'mergeable advise flag',
  um: 'userfaultfd missing pages tracking',
  uw: 'userfaultfd wprotect pages tracking',
};

/** Unsigned 32-bit value of each flag; `uw` is 2^31, so combine with {@link unionVmFlags}. */
export const VmFlag: Readonly<Record<VmFlagMnemonic, number>> = {
  rd: 2 ** 0,
  wr: 2 ** 1,
  ex: 2 ** 2,
  sh: 2 ** 3,
  mr: 2 ** 4,
  mw: 2 ** 5,
  me: 2 ** 6,
  ms: 2 ** 7,
  gd: 2 ** 8,
  pf: 2 ** 9,
  dw: 2 ** 10,
  lo: 2 ** 11,
  io: 2 ** 12,
  sr: 2 ** 13,
  rr: 2 ** 14,
  dc: 2 ** 15,
  de: 2 ** 16,
  ac: 2 ** 17,
  nr: 2 ** 18,
  ht: 2 ** 19,
  sf: 2 ** 20,
  nl: 2 ** 21,
  ar: 2 ** 22,
  wf: 2 ** 23,
  dd: 2 ** 24,
  sd: 2 ** 25,
  mm: 2 ** 26,
  hg: 2 ** 27,
  nh: 2 ** 28,
  mg: 2 ** 29,
  um: 2 ** 30,
  uw: 2 ** 31,
};

/** Unsigned 32-bit bit-set of {@link VmFlag} values. */
export type VmFlags = number;

export const EMPTY_VM_FLAGS: VmFlags = 0;

export interface Device {
  readonly major: number;
  readonly minor: number;
}

export interface Mapping {
  readonly start: bigint;
  readonly end: bigint;
  readonly permissions: Permissions;
  readonly offset: bigint;
  readonly device: Device;
  readonly inode: bigint;
  readonly path?: string;
}

export interface Usage {
  size: number;
  kernelPageSize: number;
  mmuPageSize: number;
  rss: number;
  pss: number;
  pssDirty: number;
  pssAnon: number;
  pssFile: number;
  pssShmem: number;
  sharedClean: number;
  sharedDirty: number;
  privateClean: number;
  privateDirty: number;
  referenced: number;
  anonymous: number;
  ksm: number;
  lazyFree: number;
  anonHugePages: number;
  shmemHugePages: number;
  shmemPmdMapped: number;
  filePmdMapped: number;
  sharedHugetlb: number;
  privateHugetlb: number;
  swap: number;
  swapPss: number;
  locked: number;
  thpEligible: boolean;
  protectionKey?: number;
  vmFlags: VmFlags;
}

export type UsageByteField = Exclude<keyof Usage, 'thpEligible' | 'protectionKey' | 'vmFlags'>;

export const createEmptyUsage = (): Usage => ({
  size: 0,
  kernelPageSize: 0,
  mmuPageSize: 0,
  rss: 0,
  pss: 0,
  pssDirty: 0,
  pssAnon: 0,
  pssFile: 0,
  pssShmem: 0,
  sharedClean: 0,
  sharedDirty: 0,
  privateClean: 0,
  privateDirty: 0,
  referenced: 0,
  anonymous: 0,
  ksm: 0,
  lazyFree: 0,
  anonHugePages: 0,
  shmemHugePages: 0,
  shmemPmdMapped: 0,
  filePmdMapped: 0,
  sharedHugetlb: 0,
  privateHugetlb: 0,
  swap: 0,
  swapPss: 0,
  locked: 0,
  thpEligible: false,
  vmFlags: EMPTY_VM_FLAGS,
});

export interface SmapsEntry {
  mapping: Mapping;
  usage: Usage;
}

export type MappingPredicate = (mapping: Mapping) => boolean;

export const hasPermission = (permissions: Permissions, name: PermissionName): boolean =>
  (permissions & Permission[name]) !== 0;

export const formatPermissions = (permissions: Permissions): string =>
  [
    hasPermission(permissions, 'R') ? 'r' : '-',
    hasPermission(permissions, 'W') ? 'w' : '-',
    hasPermission(permissions, 'X') ? 'x' : '-',
    hasPermission(permissions, 'S') ? 's' : 'p',
  ].join('');

export const unionVmFlags = (...flags: VmFlags[]): VmFlags =>
  flags.reduce((acc, flag) => (acc | flag) >>> 0, EMPTY_VM_FLAGS);

export const hasVmFlag = (flags: VmFlags, mnemonic: VmFlagMnemonic): boolean =>
  ((flags & VmFlag[mnemonic]) >>> 0) !== 0;

export const vmFlagMnemonics = (flags: VmFlags): VmFlagMnemonic[] =>
  VM_FLAG_MNEMONICS.filter((mnemonic) => hasVmFlag(flags, mnemonic));

export const formatAddress = (address: bigint, width = 12): string =>
  address.toString(16).padStart(width, '0');

export const mappingSizeBytes = (mapping: Mapping): bigint => mapping.end - mapping.start;

export const isAnonymousMapping = (mapping: Mapping): boolean =>
  mapping.inode === 0n && (mapping.path === undefined || mapping.path.startsWith('['));

export type FilterMode = 'include' | 'exclude';

/**
 * Path criteria (`equals`, `prefix`, `suffix`, `regex`) match when any of them
 * does; every other criterion present must hold as well.
 */
export interface FilterRuleMatch {
  equals?: string;
  prefix?: string;
  suffix?: string;
  regex?: string;
  anonymous?: boolean;
  /** Permission quad such as `r-xp`; `?` matches any character. */
  permissions?: string;
  minSizeBytes?: number;
}

export interface FilterRule {
  match: FilterRuleMatch;
  notes?: string;
}

export interface FilterProfile {
  id: string;
  displayName?: string;
  notes?: string;
  /** `include` keeps mappings that match a rule, `exclude` drops them. Defaults to `include`. */
  mode?: FilterMode;
  rules: FilterRule[];
}

export const SUMMARY_FIELDS = [
  'size',
  'rss',
  'pss',
  'sharedClean',
  'sharedDirty',
  'privateClean',
  'privateDirty',
  'anonymous',
  'swap',
  'swapPss',
  'locked',
] as const satisfies readonly UsageByteField[];

export type SummaryField = (typeof SUMMARY_FIELDS)[number];

export type UsageTotals = Record<SummaryField, number>;

export interface PathUsageSummary {
  /** Backing path, or `[anon]` for mappings without one. */
  path: string;
  mappingCount: number;
  totals: UsageTotals;
}

export interface SmapsSummary {
  mappingCount: number;
  totals: UsageTotals;
  byPath: PathUsageSummary[];
}
