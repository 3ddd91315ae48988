import type { MetricRegistry } from '../metrics.js';
import type { NameCache } from '../name-cache.js';
import type { NameResolver } from '../name-resolver.js';
import type { ZoneMembershipIndex } from '../zone-membership.js';
import type { FieldResult, PayloadMap } from '../payload.js';

/** Fields common to every event, resolved once before any rule runs. */
export interface EventFields {
  kind: string;
  codeName: string;
  verb: string;
  sourceId: string;
  destinationId: string;
  sourceName: string;
  sourceZoneIdx: string;
  sourceZoneName: string;
  /** unix seconds */
  now: number;
}

export interface RuleContext {
  event: EventFields;
  payload: PayloadMap;
  metrics: MetricRegistry;
  names: NameResolver;
  membership: ZoneMembershipIndex;
  cache: NameCache;
  /** Reports a field that is present but unusable; the rule should then stop. */
  invalid(field: string, result: FieldResult<unknown>): void;
}

/**
 * One independently-triggered extraction step. It runs when the payload holds
 * `trigger` (if set) and the event kind matches `kinds` (if set), unless the
 * kind is listed in `exceptKinds`. Codes and code names both match.
 */
export interface ExtractionRule {
  readonly name: string;
  readonly trigger?: string;
  readonly kinds?: readonly string[];
  readonly exceptKinds?: readonly string[];
  apply(ctx: RuleContext): void;
}
