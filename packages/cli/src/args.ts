import path from 'path';
import { type ProcessId } from '@smaps-inspector/analyzer';

export type InputKind = 'smaps' | 'maps' | 'rollup';

export interface CliOptions {
  pid?: ProcessId;
  filePath?: string;
  inputKind: InputKind;
  filterId?: string;
  filterFile?: string;
  top: number;
  lenient: boolean;
  outputFormat: 'text' | 'json';
  listFilters: boolean;
  help: boolean;
}

export const defaultOptions: CliOptions = {
  inputKind: 'smaps',
  top: 10,
  lenient: false,
  outputFormat: 'text',
  listFilters: false,
  help: false,
};

export const formatUsage = (argv1?: string): string => {
  const scriptName = path.basename(argv1 ?? 'smaps-inspector');
  return `Usage: ${scriptName} (--pid <pid> | --file <path>) [options]

Options:
  --pid <pid|self>         Process to inspect through procfs
  --file <path>            Read a saved smaps/maps file instead
  --maps                   Input is in maps format (headers only)
  --rollup                 Read smaps_rollup instead of smaps (with --pid)
  --filter <id>            Filter profile from config/filters (e.g. heap-stack)
  --filter-file <path>     Filter profile from an explicit JSON file
  --list-filters           List the built-in filter profiles and exit
  --top <n>                Number of mappings listed by RSS (default: 10)
  --lenient                Warn about malformed entries instead of aborting
  --json                   Output parsed entries as JSON
  --help                   Show this help message
`;
};

const parsePid = (value: string): ProcessId => {
  if (value === 'self') {
    return value;
  }
  const pid = Number.parseInt(value, 10);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(pid)) {
    throw new Error(`Invalid process id: ${value}`);
  }
  return pid;
};

const parseCount = (flag: string, value: string): number => {
  const count = Number.parseInt(value, 10);
  if (!/^\d+$/.test(value) || Number.isNaN(count)) {
    throw new Error(`Flag ${flag} expects a non-negative integer, got ${value}.`);
  }
  return count;
};

export const parseArgs = (argv: string[]): CliOptions => {
  const options: CliOptions = { ...defaultOptions };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];

    const expectValue = (flag: string): string => {
      const value = argv[i + 1];
      if (!value || value.startsWith('--')) {
        throw new Error(`Flag ${flag} requires a value.`);
      }
      i += 1;
      return value;
    };

    switch (arg) {
      case '--help':
      case '-h':
        options.help = true;
        break;
      case '--json':
        options.outputFormat = 'json';
        break;
      case '--maps':
        options.inputKind = 'maps';
        break;
      case '--rollup':
        options.inputKind = 'rollup';
        break;
      case '--list-filters':
        options.listFilters = true;
        break;
      case '--lenient':
        options.lenient = true;
        break;
      case '--pid':
        options.pid = parsePid(expectValue(arg));
        break;
      case '--file':
        options.filePath = expectValue(arg);
        break;
      case '--filter':
        options.filterId = expectValue(arg);
        break;
      case '--filter-file':
        options.filterFile = expectValue(arg);
        break;
      case '--top':
        options.top = parseCount(arg, expectValue(arg));
        break;
      default:
        console.warn(`Unknown argument ignored: ${arg}`);
    }
  }

  return options;
};
