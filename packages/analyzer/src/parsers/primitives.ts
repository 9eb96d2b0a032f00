import { SmapsFormatError } from '../errors';
import {
  type Device,
  EMPTY_VM_FLAGS,
  Permission,
  type Permissions,
  VmFlag,
  type VmFlagMnemonic,
  type VmFlags,
  unionVmFlags,
} from '../model';

const HEX_TOKEN = /^[0-9a-fA-F]+$/;
const DECIMAL_TOKEN = /^\d+$/;
const WHITESPACE = /\s+/;

const MAX_U32 = 0xffffffffn;
const MAX_U64 = 0xffffffffffffffffn;

const UNIT_SHIFTS: Readonly<Record<string, bigint>> = {
  kB: 10n,
  mB: 20n,
  gB: 30n,
  tB: 40n,
};

export interface SizedValue {
  key: string;
  value: number;
}

export const tokenize = (line: string): string[] => {
  const trimmed = line.trim();
  return trimmed.length === 0 ? [] : trimmed.split(WHITESPACE);
};

const withinU64 = (value: bigint): bigint | null => (value <= MAX_U64 ? value : null);

/** Unprefixed hex, bounded to 64 bits. */
export const parseHex = (token: string): bigint | null =>
  HEX_TOKEN.test(token) ? withinU64(BigInt(`0x${token}`)) : null;

export const parseDecimal = (token: string): bigint | null =>
  DECIMAL_TOKEN.test(token) ? withinU64(BigInt(token)) : null;

const parseHexU32 = (token: string): number | null => {
  const value = parseHex(token);
  return value !== null && value <= MAX_U32 ? Number(value) : null;
};

const permissionBit = (char: string | undefined, off: string, on: string, bit: number): number | null => {
  if (char === off) {
    return 0;
  }
  return char === on ? bit : null;
};

export const parsePermissions = (token: string): Permissions | null => {
  if (token.length !== 4) {
    return null;
  }

  const read = permissionBit(token[0], '-', 'r', Permission.R);
  const write = permissionBit(token[1], '-', 'w', Permission.W);
  const execute = permissionBit(token[2], '-', 'x', Permission.X);
  const sharing = token[3] === 's' ? Permission.S : token[3] === 'p' ? Permission.P : null;
  if (read === null || write === null || execute === null || sharing === null) {
    return null;
  }

  return read | write | execute | sharing;
};

export const parseDevice = (token: string): Device | null => {
  const separator = token.indexOf(':');
  if (separator < 0) {
    return null;
  }

  const major = parseHexU32(token.slice(0, separator));
  const minor = parseHexU32(token.slice(separator + 1));
  if (major === null || minor === null) {
    return null;
  }
  return { major, minor };
};

/**
 * Decodes `KEY: NUMBER [UNIT]`. Returns null for any other token shape or a
 * value that does not fit a safe integer once scaled; throws on an unknown unit.
 */
export const parseSizedValue = (line: string): SizedValue | null => {
  const tokens = tokenize(line);
  if (tokens.length < 2) {
    return null;
  }

  const [rawKey, rawValue, unit] = tokens;
  let shift = 0n;
  if (unit !== undefined) {
    const unitShift = UNIT_SHIFTS[unit];
    if (unitShift === undefined) {
      throw new SmapsFormatError('unrecognized-unit', unit);
    }
    shift = unitShift;
  }

  if (tokens.length > 3 || !DECIMAL_TOKEN.test(rawValue)) {
    return null;
  }

  const scaled = BigInt(rawValue) << shift;
  if (scaled > BigInt(Number.MAX_SAFE_INTEGER)) {
    return null;
  }

  const key = rawKey.endsWith(':') ? rawKey.slice(0, -1) : rawKey;
  return { key, value: Number(scaled) };
};

const isVmFlagMnemonic = (token: string): token is VmFlagMnemonic =>
  Object.hasOwn(VmFlag, token);

export const parseVmFlags = (text: string): VmFlags =>
  tokenize(text).reduce<VmFlags>((flags, token) => {
    if (!isVmFlagMnemonic(token)) {
      throw new SmapsFormatError('unrecognized-flag', token);
    }
    return unionVmFlags(flags, VmFlag[token]);
  }, EMPTY_VM_FLAGS);
