import { ZONE_MODES } from '../metrics.js';
import { SYSTEM_ZONE, isResolved } from '../names.js';
import { booleanField, firstString, listField, numberField, stringField } from '../payload.js';
import { log } from '../log.js';
import type { ExtractionRule, RuleContext } from './types.js';
import { DHW_KINDS } from './dhw.js';

function zoneLabels(ctx: RuleContext, zoneIdx: string) {
  return {
    device_id: ctx.event.sourceId,
    device_name: ctx.event.sourceName,
    zone_idx: zoneIdx,
    zone_name: ctx.names.zoneName(zoneIdx),
  };
}

// zone_name (0004): learn names from the traffic itself
export const zoneNameRule: ExtractionRule = {
  name: 'zone_name',
  trigger: 'name',
  kinds: ['0004', 'zone_name'],
  apply(ctx) {
    const zoneIdx = stringField(ctx.payload, 'zone_idx');
    const name = stringField(ctx.payload, 'name');
    if (!zoneIdx.ok || !name.ok) return;
    ctx.cache.updateZone(zoneIdx.value, name.value);
    log.debug(`Captured zone name from message: ${zoneIdx.value} -> ${name.value}`);
  },
};

// zone_devices (000C): full roster for one (zone, role)
export const zoneDevicesRule: ExtractionRule = {
  name: 'zone_devices',
  trigger: 'device_role',
  kinds: ['000C', 'zone_devices'],
  apply(ctx) {
    const zoneIdx = stringField(ctx.payload, 'zone_idx');
    const role = stringField(ctx.payload, 'device_role');
    if (!zoneIdx.ok || !role.ok) return;
    const devices = listField(ctx.payload, 'devices');
    if (!devices.ok && devices.reason === 'mismatch') return ctx.invalid('devices', devices);
    const ids = devices.ok ? devices.value.filter((id): id is string => typeof id === 'string') : [];
    ctx.membership.setRole(zoneIdx.value, role.value, ids);
    log.debug(`Captured zone devices: zone ${zoneIdx.value}, role ${role.value}, devices [${ids.join(', ')}]`);
  },
};

export const setpointRule: ExtractionRule = {
  name: 'setpoint',
  trigger: 'setpoint',
  apply(ctx) {
    const setpoint = numberField(ctx.payload, 'setpoint');
    if (!setpoint.ok) return ctx.invalid('setpoint', setpoint);
    const zoneIdx = firstString(ctx.payload, ['zone_idx'], SYSTEM_ZONE);
    ctx.metrics.deviceSetpoint.set(zoneLabels(ctx, zoneIdx), setpoint.value);
  },
};

export const windowOpenRule: ExtractionRule = {
  name: 'window_state',
  trigger: 'window_open',
  apply(ctx) {
    const open = booleanField(ctx.payload, 'window_open');
    if (!open.ok) return ctx.invalid('window_open', open);
    const zoneIdx = firstString(ctx.payload, ['zone_idx'], SYSTEM_ZONE);
    ctx.metrics.zoneWindowOpen.set(zoneLabels(ctx, zoneIdx), open.value ? 1 : 0);
  },
};

export const zoneModeRule: ExtractionRule = {
  name: 'zone_mode',
  trigger: 'mode',
  exceptKinds: DHW_KINDS,
  apply(ctx) {
    const mode = stringField(ctx.payload, 'mode');
    if (!mode.ok) return ctx.invalid('mode', mode);
    const zoneIdx = firstString(ctx.payload, ['zone_idx'], SYSTEM_ZONE);
    ctx.metrics.setExclusiveLabel(ctx.metrics.zoneMode, zoneLabels(ctx, zoneIdx), 'mode', ZONE_MODES, mode.value);
  },
};

// zone-specific (zone_idx) or system-wide (domain_id, e.g. FC for the boiler)
export const heatDemandRule: ExtractionRule = {
  name: 'heat_demand',
  trigger: 'heat_demand',
  apply(ctx) {
    const demand = numberField(ctx.payload, 'heat_demand');
    if (!demand.ok) return ctx.invalid('heat_demand', demand);
    const zoneIdx = firstString(ctx.payload, ['zone_idx', 'domain_id'], SYSTEM_ZONE);
    ctx.metrics.heatDemand.set(zoneLabels(ctx, zoneIdx), demand.value);
  },
};

// Identity series for any zone a payload mentions, once its name is known
export const zoneIdentityRule: ExtractionRule = {
  name: 'zone_info',
  trigger: 'zone_idx',
  apply(ctx) {
    const zoneIdx = stringField(ctx.payload, 'zone_idx');
    if (!zoneIdx.ok || zoneIdx.value === SYSTEM_ZONE) return;
    const name = ctx.names.zoneName(zoneIdx.value);
    if (!isResolved(name)) return;
    ctx.metrics.setExclusiveLabel(ctx.metrics.zoneInfo, { zone_idx: zoneIdx.value }, 'zone_name', [], name);
  },
};
