import { readFileSync, renameSync, rmSync, writeFileSync } from 'fs';
import path from 'path';
import { log, errorMessage } from './log.js';
import { isResolved } from './names.js';
import { isPayloadMap, toPayloadValue, type PayloadValue } from './payload.js';

export interface NameCacheEntry {
  name: string;
  /** unix seconds */
  firstSeen: number;
  /** unix seconds */
  lastSeen: number;
}

export type NameSection = 'zones' | 'devices';

/** What an update did; only `added` and `renamed` touch the disk. */
export type UpdateOutcome = 'ignored' | 'added' | 'renamed' | 'touched';

/** Where the cache document lives. `write` must replace the document atomically. */
export interface CacheStore {
  readonly location: string;
  /** The stored document, or null when there is none yet. */
  read(): string | null;
  write(contents: string): void;
}

/** Sibling temp file: `names.json` -> `names.tmp`. */
export function tempPathFor(file: string): string {
  const parsed = path.parse(file);
  return path.join(parsed.dir, `${parsed.name}.tmp`);
}

export class FileCacheStore implements CacheStore {
  constructor(readonly location: string) {}

  read(): string | null {
    try {
      return readFileSync(this.location, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
      throw error;
    }
  }

  write(contents: string): void {
    const tmp = tempPathFor(this.location);
    try {
      writeFileSync(tmp, contents, 'utf8');
      renameSync(tmp, this.location);
    } catch (error) {
      rmSync(tmp, { force: true });
      throw error;
    }
  }
}

export function unixNow(): number {
  return Date.now() / 1000;
}

interface StoredEntry {
  name: string;
  last_seen: number;
  first_seen: number;
}

interface StoredDocument {
  zones: Record<string, StoredEntry>;
  devices: Record<string, StoredEntry>;
  last_updated: string;
}

function readSection(value: PayloadValue | undefined, fallbackTime: number): Map<string, NameCacheEntry> {
  const entries = new Map<string, NameCacheEntry>();
  if (!isPayloadMap(value)) return entries;
  for (const [id, raw] of Object.entries(value)) {
    if (!isPayloadMap(raw) || typeof raw.name !== 'string' || !isResolved(raw.name)) continue;
    const lastSeen = typeof raw.last_seen === 'number' ? raw.last_seen : fallbackTime;
    const firstSeen = typeof raw.first_seen === 'number' ? raw.first_seen : lastSeen;
    entries.set(id, { name: raw.name, firstSeen, lastSeen });
  }
  return entries;
}

function writeSection(entries: Map<string, NameCacheEntry>): Record<string, StoredEntry> {
  const out: Record<string, StoredEntry> = {};
  for (const [id, entry] of entries) {
    out[id] = { name: entry.name, last_seen: entry.lastSeen, first_seen: entry.firstSeen };
  }
  return out;
}

export interface NameCacheOptions {
  store?: CacheStore;
  clock?: () => number;
}

/**
 * Durable id -> name mapping for zones and devices.
 * Unresolved ids are never stored; steady-state sightings update memory only.
 */
export class NameCache {
  private readonly sections: Record<NameSection, Map<string, NameCacheEntry>> = {
    zones: new Map(),
    devices: new Map(),
  };

  // set while a batch is applied; `dirty` records whether it owes a write
  private deferring = false;
  private dirty = false;

  private constructor(
    private readonly store: CacheStore,
    private readonly clock: () => number,
  ) {}

  static empty(file: string, options: NameCacheOptions = {}): NameCache {
    return new NameCache(options.store ?? new FileCacheStore(file), options.clock ?? unixNow);
  }

  /** Missing or unreadable documents give an empty cache; startup carries on either way. */
  static load(file: string, options: NameCacheOptions = {}): NameCache {
    const cache = NameCache.empty(file, options);
    const location = cache.store.location;
    let text: string | null;
    try {
      text = cache.store.read();
    } catch (error) {
      log.error(`Failed to read name cache ${location}: ${errorMessage(error)}; starting with empty cache`);
      return cache;
    }
    if (text === null) {
      log.info(`No name cache found at ${location}, starting with empty cache`);
      return cache;
    }
    let doc: PayloadValue | undefined;
    try {
      doc = toPayloadValue(JSON.parse(text));
    } catch (error) {
      log.error(`Failed to parse name cache ${location}: ${errorMessage(error)}; starting with empty cache`);
      return cache;
    }
    if (!isPayloadMap(doc)) {
      log.error(`Name cache ${location} is not a JSON object; starting with empty cache`);
      return cache;
    }
    const now = cache.clock();
    cache.sections.zones = readSection(doc.zones, now);
    cache.sections.devices = readSection(doc.devices, now);
    const { zones, devices } = cache.size();
    log.info(`Loaded name cache from ${location}: ${zones} zones, ${devices} devices`);
    if (zones > 0) log.info(`Cached zones: ${[...cache.sections.zones.keys()].join(', ')}`);
    if (devices > 0) log.info(`Cached devices: ${[...cache.sections.devices.keys()].join(', ')}`);
    return cache;
  }

  get location(): string {
    return this.store.location;
  }

  size(): { zones: number; devices: number } {
    return { zones: this.sections.zones.size, devices: this.sections.devices.size };
  }

  entry(section: NameSection, id: string): NameCacheEntry | undefined {
    const entry = this.sections[section].get(id);
    return entry ? { ...entry } : undefined;
  }

  deviceName(id: string): string | undefined {
    return this.sections.devices.get(id)?.name;
  }

  zoneName(idx: string): string | undefined {
    return this.sections.zones.get(idx)?.name;
  }

  updateDevice(id: string, name: string): UpdateOutcome {
    return this.update('devices', id, name);
  }

  updateZone(idx: string, name: string): UpdateOutcome {
    return this.update('zones', idx, name);
  }

  private update(section: NameSection, id: string, name: string): UpdateOutcome {
    if (!id || !isResolved(name)) return 'ignored';
    const label = section === 'zones' ? 'zone' : 'device';
    const now = this.clock();
    const entries = this.sections[section];
    const current = entries.get(id);

    if (!current) {
      entries.set(id, { name, firstSeen: now, lastSeen: now });
      log.info(`Discovered new ${label}: ${id} = '${name}'`);
      this.persist();
      return 'added';
    }
    if (current.name !== name) {
      log.warn(`${label} ${id} name changed from '${current.name}' to '${name}' (updating cache)`);
      current.name = name;
      current.lastSeen = now;
      this.persist();
      return 'renamed';
    }
    current.lastSeen = now;
    return 'touched';
  }

  /** Runs several updates with at most one write, made after the last of them. */
  batch(apply: () => void): void {
    const outer = !this.deferring;
    this.deferring = true;
    try {
      apply();
    } finally {
      if (outer) {
        this.deferring = false;
        if (this.dirty) {
          this.dirty = false;
          this.save();
        }
      }
    }
  }

  private persist(): void {
    if (this.deferring) this.dirty = true;
    else this.save();
  }

  toDocument(): StoredDocument {
    return {
      zones: writeSection(this.sections.zones),
      devices: writeSection(this.sections.devices),
      last_updated: new Date(this.clock() * 1000).toISOString(),
    };
  }

  /** Writes the whole cache. Failures are logged; the in-memory cache stays authoritative. */
  save(): boolean {
    try {
      this.store.write(JSON.stringify(this.toDocument(), null, 2));
      const { zones, devices } = this.size();
      log.debug(`Saved name cache to ${this.location}: ${zones} zones, ${devices} devices`);
      return true;
    } catch (error) {
      log.error(`Failed to save name cache to ${this.location}: ${errorMessage(error)}`);
      return false;
    }
  }
}
