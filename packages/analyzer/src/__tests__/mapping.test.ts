import { describe, expect, it } from 'vitest';
import { Permission, formatPermissions } from '../model';
import { parseMappingLine } from '../parsers/mapping';

describe('parseMappingLine', () => {
  it('decodes every field of a file-backed mapping', () => {
    const mapping = parseMappingLine('00400000-00452000 r-xp 00000000 08:02 173521 /usr/bin/cat');
    expect(mapping).toEqual({
      start: 0x00400000n,
      end: 0x00452000n,
      permissions: Permission.R | Permission.X | Permission.P,
      offset: 0n,
      device: { major: 8, minor: 2 },
      inode: 173521n,
      path: '/usr/bin/cat',
    });
  });

  it('leaves the path out for unnamed anonymous memory', () => {
    const mapping = parseMappingLine('7f1c2a000000-7f1c2a021000 rw-p 00000000 00:00 0 ');
    expect(mapping).not.toBeNull();
    expect(mapping?.path).toBeUndefined();
    expect(mapping && 'path' in mapping).toBe(false);
  });

  it('keeps pseudo-paths and the column padding in front of them out of the path', () => {
    const mapping = parseMappingLine('01e3c000-01e5d000 rw-p 00000000 00:00 0                                  [heap]');
    expect(mapping?.path).toBe('[heap]');
  });

  it('keeps the rest of the line verbatim as the path', () => {
    const mapping = parseMappingLine('7f0000000000-7f0000001000 rw-s 00000000 00:05 1234   /dev/shm/my file (deleted)');
    expect(mapping?.path).toBe('/dev/shm/my file (deleted)');
    expect(mapping?.permissions).toBe(Permission.R | Permission.W | Permission.S);
  });

  it('decodes a non-zero offset and 64-bit addresses', () => {
    const mapping = parseMappingLine('ffffffffff600000-ffffffffff601000 --xp 0001a000 fd:01 0 [vsyscall]');
    expect(mapping?.start).toBe(0xffffffffff600000n);
    expect(mapping?.end).toBe(0xffffffffff601000n);
    expect(mapping?.offset).toBe(0x1a000n);
    expect(mapping?.device).toEqual({ major: 0xfd, minor: 1 });
  });

  it('reproduces the permission quad as written', () => {
    const mapping = parseMappingLine('00400000-00452000 rw-s 00000000 08:02 1 /x');
    expect(mapping && formatPermissions(mapping.permissions)).toBe('rw-s');
  });

  it('keeps inode numbers beyond the safe integer range', () => {
    const mapping = parseMappingLine(
      '7f1c2a000000-7f1c2a021000 r--p 00000000 00:2f 9223372036854775809 /usr/lib/libc.so.6',
    );
    expect(mapping?.inode).toBe(9223372036854775809n);
    expect(mapping?.path).toBe('/usr/lib/libc.so.6');
  });

  it('fails when a field is wider than 64 bits', () => {
    expect(parseMappingLine('00400000-00452000 r-xp 00000000 08:02 18446744073709551616 /x')).toBeNull();
    expect(parseMappingLine('1ffffffffffffffff-00452000 r-xp 00000000 08:02 1 /x')).toBeNull();
    expect(parseMappingLine('00400000-00452000 r-xp 10000000000000000 08:02 1 /x')).toBeNull();
  });

  it('fails on a bad permission quad', () => {
    expect(parseMappingLine('00400000-00452000 rwxX 00000000 08:02 173521 /usr/bin/cat')).toBeNull();
  });

  it('fails when a mandatory field is missing', () => {
    expect(parseMappingLine('00400000-00452000 r-xp 00000000 08:02')).toBeNull();
    expect(parseMappingLine('')).toBeNull();
  });

  it('fails when any field does not decode', () => {
    expect(parseMappingLine('00400000 r-xp 00000000 08:02 1')).toBeNull();
    expect(parseMappingLine('0040000g-00452000 r-xp 00000000 08:02 1')).toBeNull();
    expect(parseMappingLine('00400000-00452000 r-xp 0x000000 08:02 1')).toBeNull();
    expect(parseMappingLine('00400000-00452000 r-xp 00000000 0802 1')).toBeNull();
    expect(parseMappingLine('00400000-00452000 r-xp 00000000 08:02 12a')).toBeNull();
  });

  it('does not check that start precedes end', () => {
    const mapping = parseMappingLine('00452000-00400000 r-xp 00000000 08:02 1');
    expect(mapping?.start).toBe(0x452000n);
    expect(mapping?.end).toBe(0x400000n);
  });
});
