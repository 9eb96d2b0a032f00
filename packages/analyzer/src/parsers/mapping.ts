import { type Mapping } from '../model';
import { parseDecimal, parseDevice, parseHex, parsePermissions } from './primitives';

// START-END PERMS OFFSET MAJ:MIN INODE [PATH...]
const MAPPING_LINE_REGEX = /^\s*(\S+)\s+(\S+)\s+(\S+)\s+(\S+)\s+(\S+)(?:\s+(.*?))?\s*$/;

const parseRange = (token: string): { start: bigint; end: bigint } | null => {
  const separator = token.indexOf('-');
  if (separator < 0) {
    return null;
  }

  const start = parseHex(token.slice(0, separator));
  const end = parseHex(token.slice(separator + 1));
  if (start === null || end === null) {
    return null;
  }
  return { start, end };
};

/**
 * Decodes one mapping header. Everything after the inode is kept verbatim as
 * the path, so names containing spaces (or a ` (deleted)` suffix) survive.
 */
export const parseMappingLine = (line: string): Mapping | null => {
  const match = MAPPING_LINE_REGEX.exec(line);
  if (!match) {
    return null;
  }

  const [, rangeToken, permissionsToken, offsetToken, deviceToken, inodeToken, rest] = match;

  const range = parseRange(rangeToken);
  const permissions = parsePermissions(permissionsToken);
  const offset = parseHex(offsetToken);
  const device = parseDevice(deviceToken);
  const inode = parseDecimal(inodeToken);
  if (range === null || permissions === null || offset === null || device === null || inode === null) {
    return null;
  }

  const mapping: Mapping = {
    start: range.start,
    end: range.end,
    permissions,
    offset,
    device,
    inode,
    ...(rest ? { path: rest } : {}),
  };
  return mapping;
};
