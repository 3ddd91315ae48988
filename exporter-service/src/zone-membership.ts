/**
 * Zone index -> role -> device ids, as reported by zone_devices (000C) rosters.
 * Each (zone, role) roster replaces the previous one wholesale. An empty roster
 * means "this role has no members", which is different from a role never reported.
 */
export class ZoneMembershipIndex {
  private readonly zones = new Map<string, Map<string, string[]>>();

  setRole(zoneIdx: string, role: string, deviceIds: readonly string[]): void {
    let roles = this.zones.get(zoneIdx);
    if (!roles) {
      roles = new Map();
      this.zones.set(zoneIdx, roles);
    }
    roles.set(role, [...deviceIds]);
  }

  /** First zone (in insertion order) whose rosters list the device. */
  findZoneOf(deviceId: string): string | undefined {
    for (const [zoneIdx, roles] of this.zones) {
      for (const devices of roles.values()) {
        if (devices.includes(deviceId)) return zoneIdx;
      }
    }
    return undefined;
  }

  roles(zoneIdx: string): ReadonlyMap<string, readonly string[]> | undefined {
    return this.zones.get(zoneIdx);
  }

  get zoneCount(): number {
    return this.zones.size;
  }
}
