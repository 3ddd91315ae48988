// The one place that knows the spelling of the unresolved-identity sentinel.
export const UNKNOWN = 'unknown';

// Reserved zone index for system-wide (non-zone) readings
export const SYSTEM_ZONE = '00';

export function isResolved(value: string | null | undefined): value is string {
  return typeof value === 'string' && value !== '' && value !== UNKNOWN;
}

export function orUnknown(value: string | null | undefined): string {
  return isResolved(value) ? value : UNKNOWN;
}
