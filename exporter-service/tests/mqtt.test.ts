import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { RamsesEvent } from '../src/events.js';
import { MqttEventSource, parseTopology, topicMatches, type MqttSourceOptions } from '../src/mqtt.js';
import type { TopologySnapshot } from '../src/topology.js';

interface FakeClient {
  url: string;
  subscribed: string[];
  ended: boolean;
  emit(event: string, ...args: unknown[]): boolean;
}

const broker = vi.hoisted(() => {
  const clients: FakeClient[] = [];
  return { clients, autoConnect: true };
});

vi.mock('mqtt', async () => {
  const { EventEmitter } = await import('events');
  class Client extends EventEmitter {
    subscribed: string[] = [];
    ended = false;

    constructor(readonly url: string) {
      super();
    }

    subscribe(topics: string[], _options: unknown, callback: (err: Error | null) => void) {
      this.subscribed = topics;
      callback(null);
      return this;
    }

    end() {
      this.ended = true;
      return this;
    }

    async endAsync() {
      this.ended = true;
    }
  }
  return {
    connect: (url: string) => {
      const client = new Client(url);
      broker.clients.push(client);
      if (broker.autoConnect) queueMicrotask(() => client.emit('connect'));
      return client;
    },
  };
});

const options: MqttSourceOptions = {
  url: 'mqtt://broker.test:1883',
  username: 'exporter',
  password: 'test-secret',
  rejectUnauthorized: true,
  eventsTopic: 'ramses/+/messages',
  topologyTopic: 'ramses/+/topology',
  connectTimeoutMs: 50,
};

describe('topicMatches', () => {
  it('handles single and multi level wildcards', () => {
    expect(topicMatches('ramses/+/messages', 'ramses/gw1/messages')).toBe(true);
    expect(topicMatches('ramses/+/messages', 'ramses/gw1/topology')).toBe(false);
    expect(topicMatches('ramses/+/messages', 'ramses/gw1/messages/extra')).toBe(false);
    expect(topicMatches('ramses/#', 'ramses/gw1/messages')).toBe(true);
    expect(topicMatches('ramses/gw1', 'ramses')).toBe(false);
  });
});

describe('parseTopology', () => {
  it('keeps aliases, classes and zones', () => {
    expect(parseTopology({
      version: '0.31.2',
      devices: { '04:123456': { alias: 'Office TRV', class: 'TRV' }, '01:000001': { alias: '' }, '13:000001': null },
      zones: [{ idx: '0A', name: 'Office' }, { idx: '0B', name: '' }, { name: 'no index' }],
    })).toEqual({
      version: '0.31.2',
      devices: { '04:123456': { alias: 'Office TRV', class: 'TRV' }, '01:000001': {}, '13:000001': {} },
      zones: [{ idx: '0A', name: 'Office' }, { idx: '0B' }],
    });
  });

  it('rejects non-objects', () => {
    expect(parseTopology(['04:123456'])).toBeNull();
  });
});

describe('MqttEventSource', () => {
  beforeEach(() => {
    broker.clients.length = 0;
    broker.autoConnect = true;
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('subscribes and routes events and topology by topic', async () => {
    const source = new MqttEventSource(options);
    const events: RamsesEvent[] = [];
    const snapshots: TopologySnapshot[] = [];
    await source.start((e) => events.push(e), (s) => snapshots.push(s));

    const [client] = broker.clients;
    expect(client.subscribed).toEqual(['ramses/+/messages', 'ramses/+/topology']);

    client.emit('message', 'ramses/gw1/messages', Buffer.from(JSON.stringify({
      code: '30C9', verb: 'I', src: '04:123456', dst: '01:000001', payload: { temperature: 20 },
    })));
    client.emit('message', 'ramses/gw1/topology', Buffer.from(JSON.stringify({
      devices: { '04:123456': { alias: 'Office TRV' } }, zones: [],
    })));
    client.emit('message', 'other/topic', Buffer.from('{}'));

    expect(events).toEqual([{
      kind: '30C9',
      codeName: undefined,
      verb: 'I',
      sourceId: '04:123456',
      destinationId: '01:000001',
      payload: { temperature: 20 },
    }]);
    expect(snapshots).toHaveLength(1);
    expect(source.topology.deviceAlias('04:123456')).toBe('Office TRV');
    expect(source.topology.deviceCount()).toBe(1);

    await source.stop();
    expect(client.ended).toBe(true);
  });

  it('drops messages that are not JSON', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const source = new MqttEventSource(options);
    const events: RamsesEvent[] = [];
    await source.start((e) => events.push(e));

    broker.clients[0].emit('message', 'ramses/gw1/messages', Buffer.from('not json'));
    expect(events).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
    await source.stop();
  });

  it('fails to start when the broker never answers', async () => {
    broker.autoConnect = false;
    const source = new MqttEventSource(options);
    await expect(source.start(() => undefined)).rejects.toThrow(
      'MQTT broker mqtt://broker.test:1883 not reachable within 50ms',
    );
    expect(broker.clients[0].ended).toBe(true);
  });

  it('fails to start on a connection error', async () => {
    broker.autoConnect = false;
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const source = new MqttEventSource(options);
    const starting = source.start(() => undefined);
    broker.clients[0].emit('error', new Error('connection refused'));
    await expect(starting).rejects.toThrow('connection refused');
  });
});
