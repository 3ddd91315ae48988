import { codeNameOf, type RamsesEvent } from './events.js';
import { isBoilerClass } from './device-class.js';
import { log, errorMessage } from './log.js';
import type { MetricRegistry } from './metrics.js';
import { unixNow, type NameCache } from './name-cache.js';
import type { NameResolver } from './name-resolver.js';
import { UNKNOWN, isResolved, orUnknown } from './names.js';
import { isPayloadMap, payloadSize, type FieldResult, type PayloadMap } from './payload.js';
import { DEFAULT_RULES, ruleApplies, type EventFields, type ExtractionRule, type RuleContext } from './rules/index.js';
import type { TopologySource } from './topology.js';
import type { ZoneMembershipIndex } from './zone-membership.js';

const RATE_WINDOW_SECONDS = 60;

export interface DispatcherDeps {
  metrics: MetricRegistry;
  names: NameResolver;
  membership: ZoneMembershipIndex;
  cache: NameCache;
  topology: TopologySource;
}

export interface DispatcherOptions {
  rules?: readonly ExtractionRule[];
  /** unix seconds */
  clock?: () => number;
}

function errorType(error: unknown): string {
  return error instanceof Error ? error.name : 'UnknownError';
}

/**
 * Turns each decoded event into metric updates. Runs synchronously inside the
 * message source callback; a failing event is counted and logged, never rethrown.
 */
export class EventDispatcher {
  private readonly rules: readonly ExtractionRule[];
  private readonly clock: () => number;
  private readonly seenDevices = new Set<string>();
  private readonly recent: number[] = [];
  private readonly messageTypes = new Map<string, number>();
  private readonly communications = new Map<string, number>();
  private processedCount = 0;

  constructor(private readonly deps: DispatcherDeps, options: DispatcherOptions = {}) {
    this.rules = options.rules ?? DEFAULT_RULES;
    this.clock = options.clock ?? unixNow;
  }

  get processed(): number {
    return this.processedCount;
  }

  /** Message counts keyed `<code>_<verb>`. */
  messageTypeSummary(): Record<string, number> {
    return Object.fromEntries(this.messageTypes);
  }

  /** Message counts keyed `<source>_<destination>`. */
  communicationSummary(): Record<string, number> {
    return Object.fromEntries(this.communications);
  }

  readonly handle = (event: RamsesEvent): void => {
    const started = performance.now();
    try {
      this.process(event);
    } catch (error) {
      this.deps.metrics.messageErrors.inc({ error_type: errorType(error) });
      log.error(`Error processing message ${event.kind}: ${errorMessage(error)}`);
    } finally {
      this.processedCount += 1;
      this.deps.metrics.processingDuration.observe((performance.now() - started) / 1000);
    }
  };

  private process(event: RamsesEvent): void {
    const { metrics, names } = this.deps;
    const payload = isPayloadMap(event.payload) ? event.payload : null;
    const fields = this.extract(event);
    const { kind, codeName, verb, sourceId, destinationId, now } = fields;

    log.debug(
      `Message: ${codeName !== kind ? `${kind} (${codeName})` : kind} ${verb} | ` +
      `From: ${this.describe(sourceId)} | To: ${this.describe(destinationId)}` +
      (event.payload !== undefined ? ` | Payload: ${JSON.stringify(event.payload)}` : ''),
    );

    metrics.messagesTotal.inc({
      message_type: kind,
      verb,
      code: kind,
      source_device: sourceId,
      destination_device: destinationId,
      zone_name: fields.sourceZoneName,
    });
    metrics.messageTypesTotal.inc({ code: kind, code_name: codeName, verb });
    metrics.deviceCommunicationsTotal.inc({ source_device: sourceId, destination_device: destinationId, verb });
    bump(this.messageTypes, `${kind}_${verb}`);
    bump(this.communications, `${sourceId}_${destinationId}`);
    metrics.lastMessageTimestamp.set(now);
    metrics.messageRate.set(this.rate(now));

    if (isResolved(sourceId)) {
      metrics.deviceLastSeen.set(
        { device_id: sourceId, device_name: fields.sourceName, zone_name: fields.sourceZoneName },
        now,
      );
      this.seenDevices.add(sourceId);
    }

    if (isBoilerClass(sourceId)) {
      const labels = { boiler_id: sourceId, boiler_name: fields.sourceName };
      metrics.boilerMessagesReceived.inc({ ...labels, message_code: kind, message_type: codeName });
      metrics.boilerLastSeen.set(labels, now);
    }
    if (isBoilerClass(destinationId)) {
      const labels = { boiler_id: destinationId, boiler_name: names.deviceName(destinationId) };
      metrics.boilerMessagesSent.inc({ ...labels, message_code: kind, message_type: codeName });
      metrics.boilerLastContacted.set(labels, now);
    }

    if (payload) this.applyRules(fields, payload);

    if (event.payload !== undefined && event.payload !== null) {
      metrics.payloadSize.observe(payloadSize(event.payload));
    }

    this.updateIdentity(sourceId);
    this.updateIdentity(destinationId);
    this.updateSystem(kind, verb);
  }

  private extract(event: RamsesEvent): EventFields {
    const { names } = this.deps;
    const kind = orUnknown(event.kind);
    const sourceId = orUnknown(event.sourceId);
    const sourceZoneIdx = names.zoneOfDevice(sourceId);
    return {
      kind,
      codeName: codeNameOf(kind, event.codeName),
      verb: event.verb ?? UNKNOWN,
      sourceId,
      destinationId: orUnknown(event.destinationId),
      sourceName: names.deviceName(sourceId),
      sourceZoneIdx,
      sourceZoneName: isResolved(sourceZoneIdx) ? names.zoneName(sourceZoneIdx) : UNKNOWN,
      now: this.clock(),
    };
  }

  private applyRules(event: EventFields, payload: PayloadMap): void {
    const ctx: RuleContext = {
      event,
      payload,
      metrics: this.deps.metrics,
      names: this.deps.names,
      membership: this.deps.membership,
      cache: this.deps.cache,
      invalid: (field: string, result: FieldResult<unknown>) => {
        const detail = result.ok ? '' : `${result.reason}${result.raw !== undefined ? ` ${JSON.stringify(result.raw)}` : ''}`;
        log.warn(`Could not parse ${field} from ${event.kind} payload: ${detail}`);
      },
    };
    for (const rule of this.rules) {
      if (!ruleApplies(rule, event, payload)) continue;
      try {
        rule.apply(ctx);
      } catch (error) {
        log.warn(`Rule ${rule.name} failed on ${event.kind} payload: ${errorMessage(error)}`);
      }
    }
  }

  // identity series only exist for names that resolved
  private updateIdentity(deviceId: string): void {
    const name = this.deps.names.deviceName(deviceId);
    if (!isResolved(name)) return;
    const { metrics } = this.deps;
    metrics.setExclusiveLabel(metrics.deviceInfo, { device_id: deviceId }, 'device_name', [], name);
  }

  private updateSystem(kind: string, verb: string): void {
    const { metrics, topology } = this.deps;
    const deviceCount = topology.deviceCount() ?? this.seenDevices.size;
    metrics.activeDevices.set(deviceCount);
    metrics.setInfo(metrics.systemInfo, {
      gateway_version: topology.version() ?? UNKNOWN,
      total_devices: String(deviceCount),
      last_message_code: kind,
      last_message_verb: verb,
    });
  }

  private rate(now: number): number {
    this.recent.push(now);
    const cutoff = now - RATE_WINDOW_SECONDS;
    let expired = 0;
    while (expired < this.recent.length && this.recent[expired] <= cutoff) expired += 1;
    if (expired > 0) this.recent.splice(0, expired);
    return this.recent.length / RATE_WINDOW_SECONDS;
  }

  private describe(deviceId: string): string {
    const name = this.deps.names.deviceName(deviceId);
    const deviceClass = isResolved(deviceId) ? this.deps.topology.deviceClass(deviceId) : undefined;
    return [deviceId, isResolved(name) ? `'${name}'` : '', deviceClass ? `(${deviceClass})` : '']
      .filter(Boolean)
      .join(' ');
  }
}

function bump(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}
