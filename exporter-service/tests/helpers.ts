import { EventDispatcher } from '../src/dispatcher.js';
import type { EventHandler, RamsesEvent } from '../src/events.js';
import { MetricRegistry, type MetricSample } from '../src/metrics.js';
import { NameCache, type CacheStore } from '../src/name-cache.js';
import { NameResolver } from '../src/name-resolver.js';
import type { EventSource, TopologyListener } from '../src/source.js';
import { SnapshotTopology, type TopologySnapshot } from '../src/topology.js';
import { ZoneMembershipIndex } from '../src/zone-membership.js';

export const NOW = 1_700_000_000;

/** In-memory cache document; counts writes. */
export class MemoryStore implements CacheStore {
  readonly location = 'memory://names.json';
  writes: string[] = [];
  failWrites = false;

  constructor(private contents: string | null = null) {}

  read(): string | null {
    return this.contents;
  }

  write(contents: string): void {
    if (this.failWrites) throw new Error('disk full');
    this.writes.push(contents);
    this.contents = contents;
  }
}

export function buildHarness(options: { cacheDocument?: object; topology?: TopologySnapshot } = {}) {
  const store = new MemoryStore(options.cacheDocument ? JSON.stringify(options.cacheDocument) : null);
  const clock = () => NOW;
  const cache = NameCache.load(store.location, { store, clock });
  const topology = new SnapshotTopology();
  if (options.topology) topology.update(options.topology);
  const membership = new ZoneMembershipIndex();
  const metrics = new MetricRegistry();
  const names = new NameResolver(cache, topology, membership);
  const dispatcher = new EventDispatcher({ metrics, names, membership, cache, topology }, { clock });
  return { store, cache, topology, membership, metrics, names, dispatcher };
}

export function event(kind: string, fields: Omit<RamsesEvent, 'kind'> = {}): RamsesEvent {
  return { kind, verb: 'I', ...fields };
}

/** The value of the single sample whose labels include `labels`, if any. */
export function valueOf(samples: MetricSample[], labels: Record<string, string> = {}): number | undefined {
  return samples.find((s) => Object.entries(labels).every(([k, v]) => s.labels[k] === v))?.value;
}

/** Event source driven by the test. */
export class FakeEventSource implements EventSource {
  readonly topology = new SnapshotTopology();
  started = false;
  stopped = false;
  failStart: Error | null = null;
  private onEvent: EventHandler | null = null;
  private onTopology: TopologyListener | undefined;

  async start(onEvent: EventHandler, onTopology?: TopologyListener): Promise<void> {
    if (this.failStart) throw this.failStart;
    this.onEvent = onEvent;
    this.onTopology = onTopology;
    this.started = true;
  }

  async stop(): Promise<void> {
    this.stopped = true;
  }

  emit(event: RamsesEvent): void {
    this.onEvent?.(event);
  }

  publishTopology(snapshot: TopologySnapshot): void {
    this.topology.update(snapshot);
    this.onTopology?.(snapshot);
  }
}
