import type { ExtractionRule, EventFields } from './types.js';
import { boilerSetpointRule, boilerStatusRule } from './boiler.js';
import { faultLogRule, systemSyncRule, temperatureRule } from './devices.js';
import { dhwModeRule, dhwSetpointRule, dhwTemperatureRule } from './dhw.js';
import {
  heatDemandRule,
  setpointRule,
  windowOpenRule,
  zoneDevicesRule,
  zoneIdentityRule,
  zoneModeRule,
  zoneNameRule,
} from './zones.js';
import { hasField, type PayloadMap } from '../payload.js';

export type { ExtractionRule, EventFields, RuleContext } from './types.js';

/** Evaluated in this order against every structured payload. */
export const DEFAULT_RULES: readonly ExtractionRule[] = [
  zoneNameRule,
  zoneDevicesRule,
  temperatureRule,
  setpointRule,
  windowOpenRule,
  zoneModeRule,
  heatDemandRule,
  systemSyncRule,
  faultLogRule,
  boilerSetpointRule,
  boilerStatusRule,
  dhwTemperatureRule,
  dhwSetpointRule,
  dhwModeRule,
  zoneIdentityRule,
];

function kindMatches(kinds: readonly string[], event: EventFields): boolean {
  return kinds.includes(event.kind) || kinds.includes(event.kind.toUpperCase()) || kinds.includes(event.codeName);
}

export function ruleApplies(rule: ExtractionRule, event: EventFields, payload: PayloadMap): boolean {
  if (rule.trigger !== undefined && !hasField(payload, rule.trigger)) return false;
  if (rule.kinds && !kindMatches(rule.kinds, event)) return false;
  if (rule.exceptKinds && kindMatches(rule.exceptKinds, event)) return false;
  return true;
}
