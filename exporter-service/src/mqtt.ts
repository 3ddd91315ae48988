import { connect, type IClientOptions, type MqttClient } from 'mqtt';
import { existsSync, readFileSync } from 'fs';
import { parseEvent, type EventHandler } from './events.js';
import { log, errorMessage } from './log.js';
import { isPayloadMap, toPayloadValue } from './payload.js';
import type { EventSource, TopologyListener } from './source.js';
import { SnapshotTopology, type DeviceInfo, type TopologySnapshot, type ZoneInfo } from './topology.js';

export interface MqttSourceOptions {
  url: string;
  username?: string;
  password?: string;
  tlsCa?: string;
  tlsCert?: string;
  tlsKey?: string;
  rejectUnauthorized: boolean;
  eventsTopic: string;
  topologyTopic: string;
  connectTimeoutMs: number;
}

/** MQTT topic filter match with `+` and `#` wildcards. */
export function topicMatches(filter: string, topic: string): boolean {
  const f = filter.split('/');
  const t = topic.split('/');
  for (let i = 0; i < f.length; i++) {
    if (f[i] === '#') return true;
    if (i >= t.length) return false;
    if (f[i] !== '+' && f[i] !== t[i]) return false;
  }
  return f.length === t.length;
}

/**
 * Topology document published (retained) by the decoder:
 * `{ version?, devices: { <id>: { alias?, class? } }, zones: [{ idx, name? }] }`.
 */
export function parseTopology(doc: unknown): TopologySnapshot | null {
  const value = toPayloadValue(doc);
  if (!isPayloadMap(value)) return null;
  const devices: Record<string, DeviceInfo> = {};
  if (isPayloadMap(value.devices)) {
    for (const [id, info] of Object.entries(value.devices)) {
      const entry: DeviceInfo = {};
      if (isPayloadMap(info)) {
        if (typeof info.alias === 'string' && info.alias) entry.alias = info.alias;
        if (typeof info.class === 'string' && info.class) entry.class = info.class;
      }
      devices[id] = entry;
    }
  }
  const zones: ZoneInfo[] = [];
  if (Array.isArray(value.zones)) {
    for (const zone of value.zones) {
      if (!isPayloadMap(zone) || typeof zone.idx !== 'string') continue;
      zones.push(typeof zone.name === 'string' && zone.name ? { idx: zone.idx, name: zone.name } : { idx: zone.idx });
    }
  }
  return {
    version: typeof value.version === 'string' ? value.version : undefined,
    devices,
    zones,
  };
}

function readTls(label: string, file: string | undefined, usingTls: boolean): Buffer | undefined {
  if (!usingTls || !file) return undefined;
  if (!existsSync(file)) {
    log.warn(`WARNING: ${label} path set but file not found: ${file}`);
    return undefined;
  }
  return readFileSync(file);
}

/** Decoded events and topology from an MQTT broker fed by the RAMSES RF decoder. */
export class MqttEventSource implements EventSource {
  readonly topology = new SnapshotTopology();
  private client: MqttClient | null = null;

  constructor(private readonly options: MqttSourceOptions) {}

  async start(onEvent: EventHandler, onTopology?: TopologyListener): Promise<void> {
    const { url, eventsTopic, topologyTopic } = this.options;
    const usingTls = url.startsWith('mqtts://');
    const clientOptions: IClientOptions = {
      username: this.options.username,
      password: this.options.password,
      reconnectPeriod: 2000,
      ca: readTls('MQTT_TLS_CA', this.options.tlsCa, usingTls),
      cert: readTls('MQTT_TLS_CERT', this.options.tlsCert, usingTls),
      key: readTls('MQTT_TLS_KEY', this.options.tlsKey, usingTls),
      rejectUnauthorized: this.options.rejectUnauthorized,
    };

    log.info(`MQTT config: url=${url} events=${eventsTopic} topology=${topologyTopic} rejectUnauthorized=${this.options.rejectUnauthorized}`);

    const client = connect(url, clientOptions);
    this.client = client;
    client.on('connect', () => {
      log.info('connected to MQTT');
      client.subscribe([eventsTopic, topologyTopic], { qos: 1 }, (err) => {
        if (err) log.error('subscribe error', err);
        else log.info(`subscribed to ${eventsTopic}, ${topologyTopic}`);
      });
    });
    client.on('error', (err) => log.error('mqtt error', err));
    client.on('reconnect', () => log.info('mqtt reconnecting...'));
    client.on('close', () => log.warn('mqtt connection closed'));
    client.on('message', (topic, payload) => {
      if (topicMatches(eventsTopic, topic)) this.handleEvent(topic, payload, onEvent);
      else if (topicMatches(topologyTopic, topic)) this.handleTopology(topic, payload, onTopology);
    });

    try {
      await this.waitForConnect(client);
    } catch (error) {
      client.end(true);
      this.client = null;
      throw error;
    }
  }

  async stop(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (client) await client.endAsync();
  }

  private handleEvent(topic: string, payload: Buffer, onEvent: EventHandler): void {
    let doc: unknown;
    try {
      doc = JSON.parse(payload.toString('utf8'));
    } catch (error) {
      log.warn(`dropping unparsable message on ${topic}: ${errorMessage(error)}`);
      return;
    }
    const event = parseEvent(doc);
    if (!event) {
      log.warn(`dropping non-object message on ${topic}`);
      return;
    }
    onEvent(event);
  }

  private handleTopology(topic: string, payload: Buffer, onTopology: TopologyListener | undefined): void {
    let snapshot: TopologySnapshot | null;
    try {
      snapshot = parseTopology(JSON.parse(payload.toString('utf8')));
    } catch (error) {
      log.warn(`ignoring unparsable topology on ${topic}: ${errorMessage(error)}`);
      return;
    }
    if (!snapshot) return;
    this.topology.update(snapshot);
    log.info(`topology updated: ${Object.keys(snapshot.devices).length} devices, ${snapshot.zones.length} zones`);
    onTopology?.(snapshot);
  }

  private waitForConnect(client: MqttClient): Promise<void> {
    const { url, connectTimeoutMs } = this.options;
    return new Promise((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        client.off('connect', onConnect);
        client.off('error', onError);
      };
      const onConnect = () => {
        cleanup();
        resolve();
      };
      const onError = (err: Error) => {
        cleanup();
        reject(err);
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(new Error(`MQTT broker ${url} not reachable within ${connectTimeoutMs}ms`));
      }, connectTimeoutMs);
      client.once('connect', onConnect);
      client.once('error', onError);
    });
  }
}
