import type { NameCache } from './name-cache.js';
import type { ZoneMembershipIndex } from './zone-membership.js';
import type { TopologySource } from './topology.js';
import { UNKNOWN, isResolved } from './names.js';

type Lookup = (key: string) => string | undefined;

/** Tries each lookup in order; the sentinel when none answers with a real name. */
function chain(...lookups: Lookup[]): (key: string | null | undefined) => string {
  return (key) => {
    if (!isResolved(key)) return UNKNOWN;
    for (const lookup of lookups) {
      const name = lookup(key);
      if (isResolved(name)) return name;
    }
    return UNKNOWN;
  };
}

/**
 * Read path for names: cache, then live topology, then the sentinel.
 * Never writes back into the cache.
 */
export class NameResolver {
  readonly deviceName: (deviceId: string | null | undefined) => string;
  readonly zoneName: (zoneIdx: string | null | undefined) => string;

  constructor(
    private readonly cache: NameCache,
    private readonly topology: TopologySource,
    private readonly membership: ZoneMembershipIndex,
  ) {
    this.deviceName = chain(
      (id) => this.cache.deviceName(id),
      (id) => this.topology.deviceAlias(id),
    );
    this.zoneName = chain(
      (idx) => this.cache.zoneName(idx),
      (idx) => this.topology.zones().find((zone) => zone.idx === idx)?.name,
    );
  }

  zoneOfDevice(deviceId: string | null | undefined): string {
    if (!isResolved(deviceId)) return UNKNOWN;
    return this.membership.findZoneOf(deviceId) ?? UNKNOWN;
  }
}
