import { copyFileSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SmapsFormatError, SmapsIoError, SmapsParseError } from '../errors';
import { FileLineSource, createLineSource } from '../io/line-source';
import { Permission, VmFlag, createEmptyUsage, unionVmFlags } from '../model';
import {
  getProcessFilePath,
  getProcfsRoot,
  iterateSmaps,
  readAll,
  readFilter,
  readMaps,
  readMapsFile,
  readMapsForPid,
  readSmapsFile,
  readSmapsForPid,
  readSmapsRollup,
  withFileSource,
} from '../parsers/smaps';
import { fixturePath, readFixture } from './helpers';

const CAT_HEADER = '00400000-00452000 r-xp 00000000 08:02 173521 /usr/bin/cat';
const HEAP_HEADER = '01e3c000-01e5d000 rw-p 00000000 00:00 0 [heap]';

describe('readAll', () => {
  it('decodes the sample snapshot in source order', () => {
    const entries = readAll(createLineSource(readFixture('sample.smaps')));
    expect(entries).toHaveLength(5);

    const [cat, heap, anon, stack, vsyscall] = entries;
    expect(cat.mapping).toEqual({
      start: 0x400000n,
      end: 0x452000n,
      permissions: Permission.R | Permission.X | Permission.P,
      offset: 0n,
      device: { major: 8, minor: 2 },
      inode: 173521n,
      path: '/usr/bin/cat',
    });
    expect(cat.usage).toEqual({
      ...createEmptyUsage(),
      size: 335872,
      kernelPageSize: 4096,
      mmuPageSize: 4096,
      rss: 122880,
      pss: 61440,
      sharedClean: 122880,
      referenced: 122880,
      protectionKey: 0,
      vmFlags: unionVmFlags(VmFlag.rd, VmFlag.ex, VmFlag.mr, VmFlag.mw, VmFlag.me, VmFlag.dw, VmFlag.sd),
    });

    expect(heap.usage.thpEligible).toBe(true);
    expect(heap.usage.swap).toBe(8192);
    expect(anon.mapping.path).toBeUndefined();
    expect(anon.usage.anonymous).toBe(4096);
    expect(stack.usage.vmFlags & VmFlag.gd).toBe(VmFlag.gd);
    expect(vsyscall.mapping.start).toBe(0xffffffffff600000n);
    expect(vsyscall.usage.vmFlags).toBe(VmFlag.ex);
  });

  it('returns an empty list for empty input', () => {
    expect(readAll(createLineSource(''))).toEqual([]);
  });

  it('gives back-to-back headers the default usage', () => {
    const entries = readAll(createLineSource([CAT_HEADER, HEAP_HEADER, 'Rss: 4 kB']));
    expect(entries[0].usage).toEqual(createEmptyUsage());
    expect(entries[1].usage.rss).toBe(4096);
  });

  it('reads maps-format input as mappings with empty usage', () => {
    const entries = readAll(createLineSource(readFixture('sample.maps')));
    expect(entries).toHaveLength(5);
    expect(entries.every(({ usage }) => usage.size === 0)).toBe(true);
  });

  it('aborts on a malformed header', () => {
    const run = () => readAll(createLineSource([CAT_HEADER, 'Rss: 4 kB', '00400000-00452000 rwxX 0 08:02 1']));
    expect(run).toThrow(SmapsParseError);
    expect(run).toThrow('Malformed mapping header at line 3');
  });

  it('aborts on an invalid usage line', () => {
    const run = () => readAll(createLineSource([CAT_HEADER, 'Rss: lots', HEAP_HEADER]));
    expect(run).toThrow('Malformed usage line at line 2: "Rss: lots"');
  });

  it('aborts on an unrecognized key in a selected block', () => {
    expect(() => readAll(createLineSource([CAT_HEADER, 'Bogus: 1 kB']))).toThrow(SmapsFormatError);
  });
});

describe('readFilter', () => {
  it('decodes only the blocks of accepted mappings', () => {
    const entries = readFilter(createLineSource(readFixture('sample.smaps')), (mapping) => mapping.path === '[heap]');
    expect(entries).toHaveLength(1);
    expect(entries[0].usage.privateDirty).toBe(16384);
  });

  it('never fails on the block of a rejected mapping', () => {
    const lines = [CAT_HEADER, 'Bogus: 1 kB', 'Rss: lots', 'VmFlags: zz', HEAP_HEADER, 'Rss: 8 kB'];
    const entries = readFilter(createLineSource(lines), (mapping) => mapping.path !== '/usr/bin/cat');
    expect(entries).toHaveLength(1);
    expect(entries[0].usage.rss).toBe(8192);
  });

  it('still fails on a malformed header of a block it would skip', () => {
    const lines = ['garbage-header', 'Rss: 4 kB'];
    expect(() => readFilter(createLineSource(lines), () => false)).toThrow(SmapsParseError);
  });
});

describe('iterateSmaps', () => {
  it('stops pulling lines when the caller stops iterating', () => {
    const source = createLineSource([CAT_HEADER, 'Rss: 4 kB', HEAP_HEADER, 'Rss: 8 kB']);
    for (const entry of iterateSmaps(source)) {
      expect(entry.usage.rss).toBe(4096);
      break;
    }
    expect(source.peek()).toBe(HEAP_HEADER);
  });
});

describe('readMaps', () => {
  it('returns headers only', () => {
    const mappings = readMaps(createLineSource(readFixture('sample.maps')));
    expect(mappings.map((mapping) => mapping.path)).toEqual(['/usr/bin/cat', '[heap]', undefined, '[stack]', '[vsyscall]']);
  });

  it('applies the predicate and steps over detail lines', () => {
    const mappings = readMaps(createLineSource(readFixture('sample.smaps')), (mapping) => mapping.inode !== 0n);
    expect(mappings).toHaveLength(1);
    expect(mappings[0].inode).toBe(173521n);
  });
});

describe('procfs paths', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('defaults to /proc', () => {
    vi.stubEnv('SMAPS_PROCFS_ROOT', '');
    expect(getProcfsRoot()).toBe('/proc');
    expect(getProcessFilePath('self', 'smaps')).toBe('/proc/self/smaps');
  });

  it('honours SMAPS_PROCFS_ROOT', () => {
    vi.stubEnv('SMAPS_PROCFS_ROOT', '/host/proc');
    expect(getProcfsRoot()).toBe('/host/proc');
    expect(getProcessFilePath(42, 'smaps_rollup')).toBe('/host/proc/42/smaps_rollup');
  });

  it('prefers an explicit root over the environment', () => {
    vi.stubEnv('SMAPS_PROCFS_ROOT', '/host/proc');
    expect(getProcfsRoot({ procfsRoot: '/mnt/proc' })).toBe('/mnt/proc');
  });
});

describe('file readers', () => {
  let procfsRoot: string;

  beforeEach(() => {
    procfsRoot = mkdtempSync(path.join(os.tmpdir(), 'smaps-procfs-'));
    mkdirSync(path.join(procfsRoot, '42'));
    copyFileSync(fixturePath('sample.smaps'), path.join(procfsRoot, '42', 'smaps'));
    copyFileSync(fixturePath('sample.maps'), path.join(procfsRoot, '42', 'maps'));
    copyFileSync(fixturePath('sample.smaps_rollup'), path.join(procfsRoot, '42', 'smaps_rollup'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(procfsRoot, { recursive: true, force: true });
  });

  it('reads a smaps file with the same result as in-memory text', () => {
    const fromFile = readSmapsFile(fixturePath('sample.smaps'));
    expect(fromFile).toEqual(readAll(createLineSource(readFixture('sample.smaps'))));
  });

  it('reads smaps for a pid under a custom procfs root', () => {
    const entries = readSmapsForPid(42, { procfsRoot, filter: (mapping) => mapping.path === '[stack]' });
    expect(entries).toHaveLength(1);
    expect(entries[0].usage.rss).toBe(12288);
  });

  it('reads maps for a pid', () => {
    expect(readMapsForPid(42, { procfsRoot })).toEqual(readMapsFile(fixturePath('sample.maps')));
  });

  it('reads the rollup entry', () => {
    const rollup = readSmapsRollup(42, { procfsRoot });
    expect(rollup?.mapping.path).toBe('[rollup]');
    expect(rollup?.usage.rss).toBe(152 * 1024);
    expect(rollup?.usage.pssAnon).toBe(32 * 1024);
    expect(rollup?.usage.pssFile).toBe(60 * 1024);
  });

  it('reports a missing process as an I/O error', () => {
    let caught: unknown;
    try {
      readSmapsForPid(7, { procfsRoot });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(SmapsIoError);
    expect(caught).toMatchObject({ kind: 'io', code: 'ENOENT', path: path.join(procfsRoot, '7', 'smaps') });
  });

  it('keeps the parse error when closing the file also fails', () => {
    const filePath = path.join(procfsRoot, 'broken.smaps');
    writeFileSync(filePath, 'garbage-header\nRss: 4 kB\n');
    vi.spyOn(FileLineSource.prototype, 'close').mockImplementation(() => {
      throw new SmapsIoError('Failed to close broken.smaps: EIO');
    });
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    expect(() => readSmapsFile(filePath)).toThrow(SmapsParseError);
    expect(warn).toHaveBeenCalledWith('Close failed after an earlier error: Failed to close broken.smaps: EIO');
  });

  it('reports a close failure after a successful read', () => {
    vi.spyOn(FileLineSource.prototype, 'close').mockImplementation(() => {
      throw new SmapsIoError('Failed to close sample.maps: EIO');
    });

    expect(() => withFileSource(fixturePath('sample.maps'), (source) => readMaps(source))).toThrow(
      'Failed to close sample.maps: EIO',
    );
  });
});
