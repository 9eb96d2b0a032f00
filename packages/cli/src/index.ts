#!/usr/bin/env node

import {
  type FileLineSource,
  type MappingPredicate,
  createMappingPredicate,
  getProcessFilePath,
  listFilterProfiles,
  loadFilterProfile,
  loadFilterProfileFromFile,
  readMaps,
  summarizeUsage,
  withFileSource,
} from '@smaps-inspector/analyzer';
import { type CliOptions, type InputKind, formatUsage, parseArgs } from './args';
import { collectEntries } from './collect';
import { mappingsToJson, printAnalysis, printMappings, toJson } from './formatters';

const acceptAll: MappingPredicate = () => true;

const resolveInputPath = (options: CliOptions): string => {
  if (options.filePath) {
    return options.filePath;
  }
  if (options.pid === undefined) {
    throw new Error('Missing required --pid <pid> or --file <path>.');
  }

  const files: Record<InputKind, 'smaps' | 'maps' | 'smaps_rollup'> = {
    smaps: 'smaps',
    maps: 'maps',
    rollup: 'smaps_rollup',
  };
  return getProcessFilePath(options.pid, files[options.inputKind]);
};

const resolveFilter = async (options: CliOptions): Promise<MappingPredicate> => {
  if (options.filterFile) {
    return createMappingPredicate(await loadFilterProfileFromFile(options.filterFile));
  }
  if (options.filterId) {
    return createMappingPredicate(await loadFilterProfile(options.filterId));
  }
  return acceptAll;
};

const run = (source: FileLineSource, inputPath: string, options: CliOptions, filter: MappingPredicate): void => {
  if (options.inputKind === 'maps') {
    const mappings = readMaps(source, filter);
    if (options.outputFormat === 'json') {
      console.log(mappingsToJson(mappings));
    } else {
      printMappings(mappings);
    }
    return;
  }

  const { entries, skipped } = collectEntries(source, filter, options.lenient);
  if (options.outputFormat === 'json') {
    console.log(toJson(entries));
    return;
  }

  printAnalysis({
    source: inputPath,
    entries,
    summary: summarizeUsage(entries),
    top: options.top,
    skipped,
  });
};

const main = async (): Promise<void> => {
  try {
    const options = parseArgs(process.argv.slice(2));
    if (options.help) {
      console.log(formatUsage(process.argv[1]));
      return;
    }
    if (options.listFilters) {
      (await listFilterProfiles()).forEach((profileId) => console.log(profileId));
      return;
    }

    const inputPath = resolveInputPath(options);
    const filter = await resolveFilter(options);

    withFileSource(inputPath, (source) => run(source, inputPath, options, filter));
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  }
};

void main();
