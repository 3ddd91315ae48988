import type { EventHandler } from './events.js';
import type { TopologySnapshot, TopologySource } from './topology.js';

export type TopologyListener = (snapshot: TopologySnapshot) => void;

/**
 * Whatever delivers decoded events, one at a time and in receipt order,
 * and answers live topology lookups between them.
 */
export interface EventSource {
  readonly topology: TopologySource;
  start(onEvent: EventHandler, onTopology?: TopologyListener): Promise<void>;
  stop(): Promise<void>;
}
