// Live view of the heating system published by the decoder.
// Lookups are synchronous and best-effort; they only back up the name cache.

export interface ZoneInfo {
  idx: string;
  name?: string;
}

export interface DeviceInfo {
  alias?: string;
  class?: string;
}

export interface TopologySource {
  deviceAlias(deviceId: string): string | undefined;
  /** Hardware class as the decoder names it (e.g. `TRV`). */
  deviceClass(deviceId: string): string | undefined;
  zones(): readonly ZoneInfo[];
  /** Number of devices the decoder knows of, when it says. */
  deviceCount(): number | undefined;
  version(): string | undefined;
}

export interface TopologySnapshot {
  version?: string;
  devices: Record<string, DeviceInfo>;
  zones: ZoneInfo[];
}

export const EMPTY_TOPOLOGY: TopologySource = {
  deviceAlias: () => undefined,
  deviceClass: () => undefined,
  zones: () => [],
  deviceCount: () => undefined,
  version: () => undefined,
};

/** Topology backed by the latest snapshot received. */
export class SnapshotTopology implements TopologySource {
  private snapshot: TopologySnapshot | null = null;

  update(snapshot: TopologySnapshot): void {
    this.snapshot = snapshot;
  }

  deviceAlias(deviceId: string): string | undefined {
    return this.snapshot?.devices[deviceId]?.alias || undefined;
  }

  deviceClass(deviceId: string): string | undefined {
    return this.snapshot?.devices[deviceId]?.class || undefined;
  }

  zones(): readonly ZoneInfo[] {
    return this.snapshot?.zones ?? [];
  }

  deviceCount(): number | undefined {
    return this.snapshot ? Object.keys(this.snapshot.devices).length : undefined;
  }

  version(): string | undefined {
    return this.snapshot?.version;
  }
}
