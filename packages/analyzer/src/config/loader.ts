import { readFile, readdir } from 'fs/promises';
import path from 'path';
import Ajv, { type ErrorObject, type Schema, type ValidateFunction } from 'ajv';
import { type FilterProfile } from '../model';

export interface LoadFilterProfileOptions {
  /**
   * Directory containing the `filters/` and `schema/` folders. Defaults to the repo-level `config/` folder.
   */
  baseDir?: string;
  /**
   * Explicit path to the JSON schema file. Defaults to `<baseDir>/schema/filter-profile.schema.json`.
   */
  schemaPath?: string;
}

const DEFAULT_CONFIG_DIR = path.resolve(__dirname, '../../../../config');

const validatorCache = new Map<string, ValidateFunction<FilterProfile>>();

const getDefaultSchemaPath = (configDir: string): string =>
  path.join(configDir, 'schema', 'filter-profile.schema.json');

const formatValidationErrors = (errors: ErrorObject[] | null | undefined): string =>
  (errors ?? [])
    .map((err) => {
      const location = err.instancePath.length > 0 ? err.instancePath : '(root)';
      return `${location} ${err.message ?? ''}`.trim();
    })
    .join('\n');

const getValidator = async (schemaPath: string): Promise<ValidateFunction<FilterProfile>> => {
  const cached = validatorCache.get(schemaPath);
  if (cached) {
    return cached;
  }

  const schemaRaw = await readFile(schemaPath, 'utf8');
  const schemaJson: Schema = JSON.parse(schemaRaw);
  const ajv = new Ajv({ allErrors: true, strict: false });
  const validator = ajv.compile<FilterProfile>(schemaJson);
  validatorCache.set(schemaPath, validator);
  return validator;
};

const parseJsonFile = async (filePath: string): Promise<unknown> => {
  const raw = await readFile(filePath, 'utf8');
  try {
    return JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse JSON in ${filePath}: ${reason}`);
  }
};

export const getDefaultConfigDir = (): string => DEFAULT_CONFIG_DIR;

export const getFilterProfilePath = (
  profileId: string,
  options: LoadFilterProfileOptions = {},
): string => {
  const configDir = options.baseDir ?? DEFAULT_CONFIG_DIR;
  return path.join(configDir, 'filters', `${profileId}.json`);
};

export const loadFilterProfileFromFile = async (
  filePath: string,
  options: LoadFilterProfileOptions = {},
): Promise<FilterProfile> => {
  const configDir = options.baseDir ?? DEFAULT_CONFIG_DIR;
  const schemaPath = options.schemaPath ?? getDefaultSchemaPath(configDir);

  const validator = await getValidator(schemaPath);
  const data = await parseJsonFile(filePath);

  if (!validator(data)) {
    const details = formatValidationErrors(validator.errors);
    throw new Error(`Filter profile at ${filePath} failed validation:\n${details}`.trim());
  }

  return data;
};

const PROFILE_EXTENSION = '.json';

/** Ids of the profiles under `<baseDir>/filters`, sorted. */
export const listFilterProfiles = async (options: LoadFilterProfileOptions = {}): Promise<string[]> => {
  const filtersDir = path.join(options.baseDir ?? DEFAULT_CONFIG_DIR, 'filters');
  const files = await readdir(filtersDir);
  return files
    .filter((file) => file.endsWith(PROFILE_EXTENSION))
    .map((file) => file.slice(0, -PROFILE_EXTENSION.length))
    .sort();
};

export const loadFilterProfile = async (
  profileId: string,
  options: LoadFilterProfileOptions = {},
): Promise<FilterProfile> => {
  const available = await listFilterProfiles(options);
  if (!available.includes(profileId)) {
    throw new Error(`Unknown filter profile "${profileId}". Available profiles: ${available.join(', ') || '(none)'}`);
  }

  const profile = await loadFilterProfileFromFile(getFilterProfilePath(profileId, options), options);
  if (profile.id !== profileId) {
    throw new Error(`Filter profile ${getFilterProfilePath(profileId, options)} declares id "${profile.id}"`);
  }
  return profile;
};
