import { mkdtempSync, readdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { NameCache, tempPathFor } from '../src/name-cache.js';
import { MemoryStore, NOW } from './helpers.js';

vi.mock('fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs')>();
  return { ...actual, renameSync: vi.fn(actual.renameSync) };
});

const clock = () => NOW;

describe('NameCache on disk', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'name-cache-'));
    file = path.join(dir, 'names.json');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('starts empty when the file does not exist', () => {
    const cache = NameCache.load(file, { clock });
    expect(cache.size()).toEqual({ zones: 0, devices: 0 });
  });

  it('starts empty when the file is not JSON', () => {
    writeFileSync(file, '{ not json');
    const cache = NameCache.load(file, { clock });
    expect(cache.size()).toEqual({ zones: 0, devices: 0 });
  });

  it('survives a restart', () => {
    const first = NameCache.load(file, { clock });
    first.updateZone('0A', 'Office');
    first.updateDevice('04:123456', 'Office TRV');

    const second = NameCache.load(file, { clock });
    expect(second.zoneName('0A')).toBe('Office');
    expect(second.deviceName('04:123456')).toBe('Office TRV');
    expect(second.entry('zones', '0A')).toEqual({ name: 'Office', firstSeen: NOW, lastSeen: NOW });
  });

  it('writes the stored document layout', () => {
    const cache = NameCache.load(file, { clock });
    cache.updateDevice('01:000001', 'Controller');
    const doc: unknown = JSON.parse(readFileSync(file, 'utf8'));
    expect(doc).toEqual({
      zones: {},
      devices: { '01:000001': { name: 'Controller', last_seen: NOW, first_seen: NOW } },
      last_updated: new Date(NOW * 1000).toISOString(),
    });
  });

  it('leaves no temp file behind', () => {
    const cache = NameCache.load(file, { clock });
    cache.updateZone('01', 'Lounge');
    expect(readdirSync(dir)).toEqual(['names.json']);
  });

  it('keeps the previous file when replacing it fails', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const cache = NameCache.load(file, { clock });
    cache.updateZone('01', 'Lounge');
    const before = readFileSync(file, 'utf8');

    const failRename = () => {
      throw new Error('EXDEV: cross-device link not permitted');
    };
    vi.mocked(renameSync).mockImplementationOnce(failRename).mockImplementationOnce(failRename);

    expect(cache.updateZone('02', 'Kitchen')).toBe('added');
    expect(cache.save()).toBe(false);
    expect(readFileSync(file, 'utf8')).toBe(before);
    expect(readdirSync(dir)).toEqual(['names.json']);
    expect(cache.zoneName('02')).toBe('Kitchen');
    expect(error).toHaveBeenCalledWith(
      `[exporter-service] Failed to save name cache to ${file}: EXDEV: cross-device link not permitted`,
    );
  });

  it('skips stored entries without a usable name', () => {
    writeFileSync(file, JSON.stringify({
      zones: { '01': { name: 'Lounge', last_seen: 5, first_seen: 1 }, '02': { name: 'unknown' }, '03': {} },
      devices: { '04:000001': { name: '' } },
    }));
    const cache = NameCache.load(file, { clock });
    expect(cache.size()).toEqual({ zones: 1, devices: 0 });
    expect(cache.entry('zones', '01')).toEqual({ name: 'Lounge', firstSeen: 1, lastSeen: 5 });
  });
});

describe('tempPathFor', () => {
  it('swaps the extension in the same directory', () => {
    expect(tempPathFor('/var/lib/x/names.json')).toBe('/var/lib/x/names.tmp');
  });
});

describe('NameCache updates', () => {
  function freshCache() {
    const store = new MemoryStore();
    let now = NOW;
    const cache = NameCache.load(store.location, { store, clock: () => now });
    return { store, cache, advance: (seconds: number) => { now += seconds; } };
  }

  it('writes once for a new name and not again for the same name', () => {
    const { store, cache, advance } = freshCache();
    expect(cache.updateDevice('04:123456', 'Office TRV')).toBe('added');
    advance(30);
    expect(cache.updateDevice('04:123456', 'Office TRV')).toBe('touched');
    expect(store.writes).toHaveLength(1);
    expect(cache.entry('devices', '04:123456')).toEqual({ name: 'Office TRV', firstSeen: NOW, lastSeen: NOW + 30 });
  });

  it('writes again when the name changes', () => {
    const { store, cache } = freshCache();
    cache.updateZone('0A', 'Office');
    expect(cache.updateZone('0A', 'Study')).toBe('renamed');
    expect(store.writes).toHaveLength(2);
    expect(cache.zoneName('0A')).toBe('Study');
  });

  it('never stores unresolved names or empty ids', () => {
    const { store, cache } = freshCache();
    expect(cache.updateDevice('04:123456', 'unknown')).toBe('ignored');
    expect(cache.updateDevice('04:123456', '')).toBe('ignored');
    expect(cache.updateZone('', 'Office')).toBe('ignored');
    expect(cache.size()).toEqual({ zones: 0, devices: 0 });
    expect(store.writes).toHaveLength(0);
  });

  it('writes once after a batch of new names', () => {
    const { store, cache } = freshCache();
    cache.batch(() => {
      cache.updateDevice('04:123456', 'Office TRV');
      cache.updateDevice('04:654321', 'Lounge TRV');
      cache.updateZone('0A', 'Office');
      expect(store.writes).toHaveLength(0);
    });
    expect(store.writes).toHaveLength(1);
    expect(JSON.parse(store.writes[0])).toMatchObject({
      devices: { '04:123456': { name: 'Office TRV' }, '04:654321': { name: 'Lounge TRV' } },
      zones: { '0A': { name: 'Office' } },
    });
  });

  it('skips the write when a batch changes nothing', () => {
    const { store, cache } = freshCache();
    cache.updateZone('0A', 'Office');
    cache.batch(() => {
      cache.updateZone('0A', 'Office');
      cache.updateDevice('04:123456', 'unknown');
    });
    expect(store.writes).toHaveLength(1);
  });

  it('keeps the in-memory entry when a save fails', () => {
    const { store, cache } = freshCache();
    store.failWrites = true;
    expect(cache.updateZone('01', 'Lounge')).toBe('added');
    expect(cache.zoneName('01')).toBe('Lounge');
    expect(cache.save()).toBe(false);
  });
});
