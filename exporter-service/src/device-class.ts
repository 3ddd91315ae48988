// Device ids look like TT:NNNNNN; the two-digit type prefix names the hardware class.

// 13: BDR91 relay, 10: OpenTherm bridge
export const BOILER_CLASS_PREFIXES = ['13:', '10:'] as const;
export const CONTROLLER_CLASS_PREFIX = '01:';

export function isBoilerClass(deviceId: string): boolean {
  return BOILER_CLASS_PREFIXES.some((prefix) => deviceId.startsWith(prefix));
}

export function isControllerClass(deviceId: string): boolean {
  return deviceId.startsWith(CONTROLLER_CLASS_PREFIX);
}
