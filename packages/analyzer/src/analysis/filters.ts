import {
  type FilterProfile,
  type FilterRule,
  type FilterRuleMatch,
  type Mapping,
  type MappingPredicate,
  formatPermissions,
  isAnonymousMapping,
  mappingSizeBytes,
} from '../model';

const regexCache = new Map<string, RegExp>();

const getRegex = (source: string): RegExp => {
  const cached = regexCache.get(source);
  if (cached) {
    return cached;
  }
  const expression = new RegExp(source);
  regexCache.set(source, expression);
  return expression;
};

const hasPathCriteria = (match: FilterRuleMatch): boolean =>
  match.equals !== undefined || match.prefix !== undefined || match.suffix !== undefined || match.regex !== undefined;

const matchesPath = (mappingPath: string | undefined, match: FilterRuleMatch): boolean => {
  if (mappingPath === undefined) {
    return false;
  }

  if (match.equals !== undefined && mappingPath === match.equals) {
    return true;
  }

  if (match.prefix !== undefined && mappingPath.startsWith(match.prefix)) {
    return true;
  }

  if (match.suffix !== undefined && mappingPath.endsWith(match.suffix)) {
    return true;
  }

  return match.regex !== undefined && getRegex(match.regex).test(mappingPath);
};

const matchesPermissions = (mapping: Mapping, pattern: string): boolean => {
  const actual = formatPermissions(mapping.permissions);
  return pattern.length === actual.length && [...pattern].every((char, index) => char === '?' || char === actual[index]);
};

export const matchesRule = (mapping: Mapping, rule: FilterRule): boolean => {
  const { match } = rule;

  if (hasPathCriteria(match) && !matchesPath(mapping.path, match)) {
    return false;
  }

  if (match.anonymous !== undefined && isAnonymousMapping(mapping) !== match.anonymous) {
    return false;
  }

  if (match.permissions !== undefined && !matchesPermissions(mapping, match.permissions)) {
    return false;
  }

  return match.minSizeBytes === undefined || mappingSizeBytes(mapping) >= BigInt(match.minSizeBytes);
};

export const createMappingPredicate = (profile: FilterProfile): MappingPredicate => {
  const include = (profile.mode ?? 'include') === 'include';
  return (mapping) => profile.rules.some((rule) => matchesRule(mapping, rule)) === include;
};
