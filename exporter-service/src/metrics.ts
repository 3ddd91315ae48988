import { Counter, Gauge, Histogram, Registry, type LabelValues, type MetricValue } from 'prom-client';

const DEVICE_LABELS = ['device_id', 'device_name', 'zone_name'] as const;
const ZONE_DEVICE_LABELS = ['device_id', 'device_name', 'zone_idx', 'zone_name'] as const;
const BOILER_LABELS = ['boiler_id', 'boiler_name'] as const;
const BOILER_MESSAGE_LABELS = ['boiler_id', 'boiler_name', 'message_code', 'message_type'] as const;
const DHW_LABELS = ['dhw_idx', 'controller_id', 'controller_name'] as const;
const FAULT_LABELS = ['device_id', 'device_type', 'zone_idx'] as const;

export const ZONE_MODES = [
  'follow_schedule',
  'temporary_override',
  'permanent_override',
  'advanced_override',
  'countdown',
  'off',
] as const;

export const DHW_MODES = [
  'follow_schedule',
  'advanced_override',
  'permanent_override',
  'countdown',
  'temporary_override',
] as const;

export const PROCESSING_BUCKETS = [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1.0];
export const PAYLOAD_SIZE_BUCKETS = [10, 50, 100, 200, 500, 1000, 2000];

export type MetricSample = { labels: LabelValues<string>; value: number };

/**
 * Every series this exporter publishes, registered once on a private registry.
 * Label schemas are part of the dashboard contract and are checked at compile time.
 */
export class MetricRegistry {
  readonly registry = new Registry();

  readonly messagesTotal = this.counter('ramses_messages_total', 'Total number of RAMSES messages received',
    ['message_type', 'verb', 'code', 'source_device', 'destination_device', 'zone_name'] as const);
  readonly messageTypesTotal = this.counter('ramses_message_types_total', 'Total number of messages by type',
    ['code', 'code_name', 'verb'] as const);
  readonly deviceCommunicationsTotal = this.counter('ramses_device_communications_total',
    'Total number of communications between devices', ['source_device', 'destination_device', 'verb'] as const);

  readonly activeDevices = this.gauge('ramses_active_devices', 'Number of active devices in the system', []);
  readonly lastMessageTimestamp = this.gauge('ramses_last_message_timestamp', 'Timestamp of the last message received', []);
  readonly messageRate = this.gauge('ramses_message_rate', 'Messages per second over the last minute', []);
  readonly processingDuration = this.histogram('ramses_message_processing_duration_seconds',
    'Time spent processing messages', PROCESSING_BUCKETS);
  readonly systemInfo = this.gauge('ramses_system_info', 'Information about the RAMSES RF system',
    ['gateway_version', 'total_devices', 'last_message_code', 'last_message_verb'] as const);
  readonly messageErrors = this.counter('ramses_message_errors_total', 'Total number of message processing errors',
    ['error_type'] as const);

  readonly commsFaultTotal = this.counter('ramses_comms_fault_total', 'Total number of communications faults detected',
    [...FAULT_LABELS, 'event_type'] as const);
  readonly commsFaultState = this.gauge('ramses_comms_fault_state',
    'Current communications fault state (0=ok, 1=fault)', FAULT_LABELS);
  readonly commsFaultLastTimestamp = this.gauge('ramses_comms_fault_last_timestamp',
    'Unix timestamp of the last communications fault event', [...FAULT_LABELS, 'event_type'] as const);

  readonly payloadSize = this.histogram('ramses_message_payload_size_bytes', 'Size of message payloads', PAYLOAD_SIZE_BUCKETS);

  readonly deviceTemperature = this.gauge('ramses_device_temperature_celsius',
    'Temperature reading per device in Celsius', DEVICE_LABELS);
  readonly deviceLastSeen = this.gauge('ramses_device_last_seen_timestamp',
    'Unix timestamp of the last message received from each device', DEVICE_LABELS);
  readonly deviceSetpoint = this.gauge('ramses_device_setpoint_celsius',
    'Target temperature setpoint per device or zone in Celsius', ZONE_DEVICE_LABELS);
  readonly zoneWindowOpen = this.gauge('ramses_zone_window_open',
    'Window open state per zone (0 = closed, 1 = open)', ZONE_DEVICE_LABELS);
  readonly zoneMode = this.gauge('ramses_zone_mode_info', 'Zone mode information (1 for the current mode, 0 otherwise)',
    [...ZONE_DEVICE_LABELS, 'mode'] as const);
  readonly heatDemand = this.gauge('ramses_heat_demand',
    'Heat demand per zone or system (0.0 to 1.0 representing 0-100%)', ZONE_DEVICE_LABELS);
  readonly syncRemaining = this.gauge('ramses_system_sync_remaining_seconds',
    'Seconds remaining until next system sync cycle', DEVICE_LABELS);
  readonly syncTimestamp = this.gauge('ramses_system_sync_last_timestamp',
    'Unix timestamp of the last system sync message received', DEVICE_LABELS);

  readonly boilerMessagesSent = this.counter('ramses_boiler_messages_sent_total',
    'Total number of messages sent to boilers', BOILER_MESSAGE_LABELS);
  readonly boilerMessagesReceived = this.counter('ramses_boiler_messages_received_total',
    'Total number of messages received from boilers', BOILER_MESSAGE_LABELS);
  readonly boilerLastSeen = this.gauge('ramses_boiler_last_seen_timestamp',
    'Unix timestamp of the last message from this boiler', BOILER_LABELS);
  readonly boilerLastContacted = this.gauge('ramses_boiler_last_contacted_timestamp',
    'Unix timestamp of the last message sent to this boiler', BOILER_LABELS);
  readonly boilerSetpoint = this.gauge('ramses_boiler_setpoint_celsius',
    'Current boiler setpoint temperature in Celsius', BOILER_LABELS);
  readonly boilerModulation = this.gauge('ramses_boiler_modulation_level',
    'Current boiler modulation level (0.0 to 1.0 representing 0-100%)', BOILER_LABELS);
  readonly boilerFlameActive = this.gauge('ramses_boiler_flame_active', 'Boiler flame status (0 = off, 1 = on)', BOILER_LABELS);
  readonly boilerChActive = this.gauge('ramses_boiler_ch_active',
    'Central heating active status (0 = off, 1 = on)', BOILER_LABELS);
  readonly boilerDhwActive = this.gauge('ramses_boiler_dhw_active',
    'Domestic hot water active status (0 = off, 1 = on)', BOILER_LABELS);

  readonly dhwTemperature = this.gauge('ramses_dhw_temperature_celsius', 'DHW temperature reading in Celsius', DHW_LABELS);
  readonly dhwSetpoint = this.gauge('ramses_dhw_setpoint_celsius', 'DHW setpoint temperature in Celsius', DHW_LABELS);
  readonly dhwActive = this.gauge('ramses_dhw_active', 'DHW demand/active state (0 = off, 1 = on)', DHW_LABELS);
  readonly dhwMode = this.gauge('ramses_dhw_mode_info', 'DHW mode information (1 for the current mode, 0 otherwise)',
    [...DHW_LABELS, 'mode'] as const);

  readonly zoneInfo = this.gauge('ramses_zone_info', 'Zone index to zone name mapping (always 1)', ['zone_idx', 'zone_name'] as const);
  readonly deviceInfo = this.gauge('ramses_device_info', 'Device id to device name mapping (always 1)',
    ['device_id', 'device_name'] as const);

  // values ever set per (gauge, label group), so exclusive updates can clear them
  private readonly exclusiveSeen = new WeakMap<object, Map<string, Set<string>>>();

  private counter<T extends string>(name: string, help: string, labelNames: readonly T[]): Counter<T> {
    return new Counter({ name, help, labelNames, registers: [this.registry] });
  }

  private gauge<T extends string>(name: string, help: string, labelNames: readonly T[]): Gauge<T> {
    return new Gauge({ name, help, labelNames, registers: [this.registry] });
  }

  private histogram(name: string, help: string, buckets: number[]): Histogram {
    return new Histogram({ name, help, buckets, registers: [this.registry] });
  }

  /**
   * Sets `key=current` to 1 and every other value of `key` within the same label
   * group to 0: the declared `values` plus anything set before for that group.
   * Stands in for deleting the previous series.
   */
  setExclusiveLabel<T extends string>(
    gauge: Gauge<T>,
    group: NoInfer<LabelValues<T>>,
    key: NoInfer<T>,
    values: readonly string[],
    current: string,
  ): void {
    let groups = this.exclusiveSeen.get(gauge);
    if (!groups) {
      groups = new Map();
      this.exclusiveSeen.set(gauge, groups);
    }
    const groupKey = JSON.stringify(
      Object.entries(group).sort(([a], [b]) => a.localeCompare(b)),
    );
    let seen = groups.get(groupKey);
    if (!seen) {
      seen = new Set();
      groups.set(groupKey, seen);
    }
    for (const value of new Set([...values, ...seen])) {
      if (value !== current) gauge.set({ ...group, [key]: value }, 0);
    }
    gauge.set({ ...group, [key]: current }, 1);
    seen.add(current);
  }

  /** Info-style gauge holding a single series. */
  setInfo<T extends string>(gauge: Gauge<T>, labels: NoInfer<LabelValues<T>>): void {
    gauge.reset();
    gauge.set(labels, 1);
  }

  async samples(name: string): Promise<MetricSample[]> {
    const metric = this.registry.getSingleMetric(name);
    if (!metric) return [];
    const data = await metric.get();
    const values: MetricValue<string>[] = data.values;
    return values.map((v) => ({ labels: { ...v.labels }, value: v.value }));
  }

  metrics(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }
}
