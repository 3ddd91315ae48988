import { log } from '../log.js';
import { booleanField, hasField, numberField } from '../payload.js';
import type { ExtractionRule, RuleContext } from './types.js';

function boilerLabels(ctx: RuleContext) {
  return { boiler_id: ctx.event.sourceId, boiler_name: ctx.event.sourceName };
}

export const boilerSetpointRule: ExtractionRule = {
  name: 'boiler_setpoint',
  trigger: 'setpoint',
  kinds: ['22D9', 'boiler_setpoint'],
  apply(ctx) {
    const setpoint = numberField(ctx.payload, 'setpoint');
    if (!setpoint.ok) return ctx.invalid('setpoint', setpoint);
    ctx.metrics.boilerSetpoint.set(boilerLabels(ctx), setpoint.value);
    log.debug(`Updated boiler setpoint for ${ctx.event.sourceId} (${ctx.event.sourceName}): ${setpoint.value}°C`);
  },
};

const STATUS_FLAGS = [
  ['flame_on', 'boilerFlameActive'],
  ['ch_active', 'boilerChActive'],
  ['dhw_active', 'boilerDhwActive'],
] as const;

// actuator_state (3EF0) carries all of these; actuator_cycle (3EF1) only modulation
export const boilerStatusRule: ExtractionRule = {
  name: 'boiler_status',
  kinds: ['3EF0', '3EF1', 'actuator_state', 'actuator_cycle'],
  apply(ctx) {
    const labels = boilerLabels(ctx);
    if (hasField(ctx.payload, 'modulation_level') && ctx.payload.modulation_level !== null) {
      const level = numberField(ctx.payload, 'modulation_level');
      if (level.ok) ctx.metrics.boilerModulation.set(labels, level.value);
      else ctx.invalid('modulation_level', level);
    }
    for (const [field, gauge] of STATUS_FLAGS) {
      if (!hasField(ctx.payload, field)) continue;
      const flag = booleanField(ctx.payload, field);
      if (flag.ok) ctx.metrics[gauge].set(labels, flag.value ? 1 : 0);
      else ctx.invalid(field, flag);
    }
  },
};
