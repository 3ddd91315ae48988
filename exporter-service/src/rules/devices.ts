import { log } from '../log.js';
import { isResolved, orUnknown } from '../names.js';
import { listField, numberField, stringField, type PayloadValue } from '../payload.js';
import type { ExtractionRule } from './types.js';

export const temperatureRule: ExtractionRule = {
  name: 'temperature',
  trigger: 'temperature',
  apply(ctx) {
    // no reading available
    if (ctx.payload.temperature === null) return;
    const temperature = numberField(ctx.payload, 'temperature');
    if (!temperature.ok) return ctx.invalid('temperature', temperature);
    // the device's own zone wins over any zone the payload mentions
    const zoneIdx = stringField(ctx.payload, 'zone_idx');
    const zoneName = isResolved(ctx.event.sourceZoneIdx) || !zoneIdx.ok
      ? ctx.event.sourceZoneName
      : ctx.names.zoneName(zoneIdx.value);
    ctx.metrics.deviceTemperature.set(
      { device_id: ctx.event.sourceId, device_name: ctx.event.sourceName, zone_name: zoneName },
      temperature.value,
    );
    log.debug(`Updated temperature for device ${ctx.event.sourceId} (${ctx.event.sourceName}) in zone ${zoneName}: ${temperature.value}°C`);
  },
};

// system_sync (1F09): a device-level announcement, no zone index
export const systemSyncRule: ExtractionRule = {
  name: 'system_sync',
  trigger: 'remaining_seconds',
  apply(ctx) {
    const remaining = numberField(ctx.payload, 'remaining_seconds');
    if (!remaining.ok) return ctx.invalid('remaining_seconds', remaining);
    const labels = {
      device_id: ctx.event.sourceId,
      device_name: ctx.event.sourceName,
      zone_name: ctx.event.sourceZoneName,
    };
    ctx.metrics.syncRemaining.set(labels, remaining.value);
    ctx.metrics.syncTimestamp.set(labels, ctx.event.now);
  },
};

const COMMS_FAULT = 'comms_fault';

function entryText(value: PayloadValue | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * system_fault (0418) log entry: [timestamp, event_type, fault_type, device_type, zone_idx, device_id].
 * Only comms faults are tracked, keyed by the device the entry names.
 */
export const faultLogRule: ExtractionRule = {
  name: 'system_fault',
  trigger: 'log_entry',
  apply(ctx) {
    // an empty fault log slot
    if (ctx.payload.log_entry === null) return;
    const entry = listField(ctx.payload, 'log_entry');
    if (!entry.ok) return ctx.invalid('log_entry', entry);
    const [, eventType, faultType, deviceType, zoneIdx, deviceId] = entry.value.map(entryText);
    if (entry.value.length < 6 || !eventType || !faultType || !deviceType || !zoneIdx) {
      return ctx.invalid('log_entry', { ok: false, reason: 'mismatch', raw: entry.value });
    }
    if (faultType !== COMMS_FAULT) return;

    const device = orUnknown(deviceId);
    const labels = { device_id: device, device_type: deviceType, zone_idx: zoneIdx };
    ctx.metrics.commsFaultTotal.inc({ ...labels, event_type: eventType });
    ctx.metrics.commsFaultState.set(labels, eventType === 'restore' ? 0 : 1);
    ctx.metrics.commsFaultLastTimestamp.set({ ...labels, event_type: eventType }, ctx.event.now);

    const status = eventType === 'restore' ? 'RESTORED' : 'FAULT';
    log.info(`Communications fault ${status}: device ${device} (${deviceType}) zone ${zoneIdx}`);
  },
};
