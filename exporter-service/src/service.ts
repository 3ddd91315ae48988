import type { Server } from 'http';
import { EventDispatcher } from './dispatcher.js';
import { close, createMetricsApp, listen } from './http.js';
import { log } from './log.js';
import { MetricRegistry } from './metrics.js';
import { NameCache, type NameCacheOptions } from './name-cache.js';
import { NameResolver } from './name-resolver.js';
import type { EventSource } from './source.js';
import type { TopologySnapshot } from './topology.js';
import { ZoneMembershipIndex } from './zone-membership.js';

export interface ExporterOptions {
  source: EventSource;
  cacheFile: string;
  port: number;
  host: string;
  accessLog?: boolean;
  cache?: NameCacheOptions;
  /** unix seconds */
  clock?: () => number;
}

export interface RunningExporter {
  metrics: MetricRegistry;
  cache: NameCache;
  membership: ZoneMembershipIndex;
  names: NameResolver;
  dispatcher: EventDispatcher;
  server: Server;
}

/**
 * Owns the process-wide lifecycle: cache and registry come up before the
 * event source starts and go away after it stops.
 */
export class ExporterService {
  private running: RunningExporter | null = null;

  constructor(private readonly options: ExporterOptions) {}

  get state(): RunningExporter | null {
    return this.running;
  }

  async start(): Promise<RunningExporter> {
    if (this.running) return this.running;
    const { source, cacheFile, port, host } = this.options;

    const cache = NameCache.load(cacheFile, { clock: this.options.clock, ...this.options.cache });
    const metrics = new MetricRegistry();
    const membership = new ZoneMembershipIndex();
    const names = new NameResolver(cache, source.topology, membership);
    const dispatcher = new EventDispatcher(
      { metrics, names, membership, cache, topology: source.topology },
      { clock: this.options.clock },
    );

    const app = createMetricsApp(metrics, {
      eventsProcessed: () => dispatcher.processed,
      cacheEntries: () => cache.size(),
      messageTypeSummary: () => dispatcher.messageTypeSummary(),
      communicationSummary: () => dispatcher.communicationSummary(),
    }, { accessLog: this.options.accessLog });
    const server = await listen(app, port, host);
    const address = server.address();
    const boundPort = typeof address === 'object' && address ? address.port : port;
    log.info(`metrics available at http://${host}:${boundPort}/metrics`);

    try {
      await source.start(dispatcher.handle, (snapshot) => learnNames(cache, snapshot));
    } catch (error) {
      await close(server);
      throw error;
    }

    this.running = { metrics, cache, membership, names, dispatcher, server };
    log.info('RAMSES exporter is running');
    return this.running;
  }

  /** Stops intake first; in-memory state is dropped without a final cache write. */
  async stop(): Promise<void> {
    const running = this.running;
    if (!running) return;
    this.running = null;
    await this.options.source.stop();
    await close(running.server);
    log.info('RAMSES exporter stopped');
  }
}

/** Aliases and zone names announced by the topology are name events for the cache. */
export function learnNames(cache: NameCache, snapshot: TopologySnapshot): void {
  cache.batch(() => {
    for (const [id, info] of Object.entries(snapshot.devices)) {
      if (info.alias) cache.updateDevice(id, info.alias);
    }
    for (const zone of snapshot.zones) {
      if (zone.name) cache.updateZone(zone.idx, zone.name);
    }
  });
}
