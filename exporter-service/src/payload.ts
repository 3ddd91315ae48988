// Loosely-typed, decoder-dependent message payloads and safe accessors over them.
// Accessors never throw: a rule sees "absent" or "mismatch" and decides what to do.

export type PayloadValue = string | number | boolean | null | PayloadValue[] | PayloadMap;

export interface PayloadMap {
  [field: string]: PayloadValue;
}

export type FieldResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: 'absent' | 'mismatch'; raw?: PayloadValue };

const absent = { ok: false, reason: 'absent' } as const;

function mismatch(raw: PayloadValue): FieldResult<never> {
  return { ok: false, reason: 'mismatch', raw };
}

export function isPayloadMap(value: unknown): value is PayloadMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Converts arbitrary parsed JSON into a payload value, dropping anything JSON cannot carry. */
export function toPayloadValue(value: unknown): PayloadValue | undefined {
  if (value === null) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (Array.isArray(value)) {
    const items: PayloadValue[] = [];
    for (const item of value) {
      const converted = toPayloadValue(item);
      if (converted !== undefined) items.push(converted);
    }
    return items;
  }
  if (typeof value === 'object') {
    const map: PayloadMap = {};
    for (const [key, item] of Object.entries(value)) {
      const converted = toPayloadValue(item);
      if (converted !== undefined) map[key] = converted;
    }
    return map;
  }
  return undefined;
}

export function hasField(payload: PayloadMap, field: string): boolean {
  return Object.prototype.hasOwnProperty.call(payload, field);
}

/** Numbers, and strings that parse as finite numbers ("21.3"). */
export function numberField(payload: PayloadMap, field: string): FieldResult<number> {
  if (!hasField(payload, field)) return absent;
  const raw = payload[field];
  if (typeof raw === 'number' && Number.isFinite(raw)) return { ok: true, value: raw };
  if (typeof raw === 'string' && raw.trim() !== '') {
    const parsed = Number(raw);
    if (Number.isFinite(parsed)) return { ok: true, value: parsed };
  }
  return mismatch(raw);
}

/** Booleans, and the numbers 0 / 1. */
export function booleanField(payload: PayloadMap, field: string): FieldResult<boolean> {
  if (!hasField(payload, field)) return absent;
  const raw = payload[field];
  if (typeof raw === 'boolean') return { ok: true, value: raw };
  if (raw === 0 || raw === 1) return { ok: true, value: raw === 1 };
  return mismatch(raw);
}

/** Non-empty strings. */
export function stringField(payload: PayloadMap, field: string): FieldResult<string> {
  if (!hasField(payload, field)) return absent;
  const raw = payload[field];
  if (typeof raw === 'string' && raw !== '') return { ok: true, value: raw };
  return mismatch(raw);
}

export function listField(payload: PayloadMap, field: string): FieldResult<PayloadValue[]> {
  if (!hasField(payload, field)) return absent;
  const raw = payload[field];
  if (Array.isArray(raw)) return { ok: true, value: raw };
  return mismatch(raw);
}

/** First field of `fields` that holds a non-empty string, else `fallback`. */
export function firstString(payload: PayloadMap, fields: readonly string[], fallback: string): string {
  for (const field of fields) {
    const result = stringField(payload, field);
    if (result.ok) return result.value;
  }
  return fallback;
}

/** Serialized size of a payload in bytes, as seen on the wire. */
export function payloadSize(payload: PayloadValue): number {
  return Buffer.byteLength(JSON.stringify(payload), 'utf8');
}
