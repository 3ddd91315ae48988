import { DHW_MODES } from '../metrics.js';
import { SYSTEM_ZONE } from '../names.js';
import { isControllerClass } from '../device-class.js';
import { booleanField, firstString, hasField, numberField, stringField } from '../payload.js';
import type { ExtractionRule, RuleContext } from './types.js';

const DHW_TEMP = ['1260', 'dhw_temp'] as const;
const DHW_PARAMS = ['10A0', 'dhw_params'] as const;
const DHW_MODE = ['1F41', 'dhw_mode'] as const;

export const DHW_KINDS: readonly string[] = [...DHW_TEMP, ...DHW_PARAMS, ...DHW_MODE];

// DHW readings are keyed by the controller, whichever end of the exchange it is
function dhwLabels(ctx: RuleContext) {
  const { sourceId, destinationId } = ctx.event;
  const controllerId = isControllerClass(sourceId) ? sourceId : destinationId;
  return {
    dhw_idx: firstString(ctx.payload, ['dhw_idx'], SYSTEM_ZONE),
    controller_id: controllerId,
    controller_name: ctx.names.deviceName(controllerId),
  };
}

export const dhwTemperatureRule: ExtractionRule = {
  name: 'dhw_temp',
  trigger: 'temperature',
  kinds: DHW_TEMP,
  apply(ctx) {
    // sensor absent or faulted
    if (ctx.payload.temperature === null) return;
    const temperature = numberField(ctx.payload, 'temperature');
    if (!temperature.ok) return ctx.invalid('temperature', temperature);
    ctx.metrics.dhwTemperature.set(dhwLabels(ctx), temperature.value);
  },
};

export const dhwSetpointRule: ExtractionRule = {
  name: 'dhw_params',
  trigger: 'setpoint',
  kinds: DHW_PARAMS,
  apply(ctx) {
    if (ctx.payload.setpoint === null) return;
    const setpoint = numberField(ctx.payload, 'setpoint');
    if (!setpoint.ok) return ctx.invalid('setpoint', setpoint);
    ctx.metrics.dhwSetpoint.set(dhwLabels(ctx), setpoint.value);
  },
};

export const dhwModeRule: ExtractionRule = {
  name: 'dhw_mode',
  kinds: DHW_MODE,
  apply(ctx) {
    const labels = dhwLabels(ctx);
    if (hasField(ctx.payload, 'active') && ctx.payload.active !== null) {
      const active = booleanField(ctx.payload, 'active');
      if (active.ok) ctx.metrics.dhwActive.set(labels, active.value ? 1 : 0);
      else ctx.invalid('active', active);
    }
    if (hasField(ctx.payload, 'mode')) {
      const mode = stringField(ctx.payload, 'mode');
      if (mode.ok) ctx.metrics.setExclusiveLabel(ctx.metrics.dhwMode, labels, 'mode', DHW_MODES, mode.value);
      else ctx.invalid('mode', mode);
    }
  },
};
