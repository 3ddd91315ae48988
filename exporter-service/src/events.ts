import { readFileSync } from 'fs';
import { isPayloadMap, toPayloadValue, type PayloadValue } from './payload.js';
import { UNKNOWN, isResolved } from './names.js';

export const VERBS = ['I', 'RQ', 'RP', 'W'] as const;
export type Verb = (typeof VERBS)[number];

/** One decoded RAMSES RF message as delivered by the message source. */
export interface RamsesEvent {
  kind: string;
  codeName?: string;
  verb?: Verb;
  sourceId?: string;
  destinationId?: string;
  payload?: PayloadValue;
}

export type EventHandler = (event: RamsesEvent) => void;

// code -> code name, e.g. 30C9 -> temperature
const CODE_NAMES_PATH = new URL('./data/code-names.json', import.meta.url);

function loadCodeNames(): Readonly<Record<string, string>> {
  const doc = toPayloadValue(JSON.parse(readFileSync(CODE_NAMES_PATH, 'utf8')));
  const names: Record<string, string> = {};
  if (!isPayloadMap(doc)) return names;
  for (const [code, name] of Object.entries(doc)) {
    if (typeof name === 'string') names[code.toUpperCase()] = name;
  }
  return names;
}

const CODE_NAMES = loadCodeNames();

/** Human-readable name for a protocol code; the code itself when it has none. */
export function codeNameOf(code: string, provided?: string): string {
  if (isResolved(provided)) return provided;
  if (!isResolved(code)) return UNKNOWN;
  return CODE_NAMES[code.toUpperCase()] ?? code;
}

export function parseVerb(value: unknown): Verb | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return VERBS.find((verb) => verb === trimmed);
}

function parseAddress(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim() || undefined;
  if (isPayloadMap(value) && typeof value.id === 'string') return value.id.trim() || undefined;
  return undefined;
}

/**
 * Builds an event from a decoder JSON document.
 * Accepts `{ code, verb, src, dst, payload, code_name }`, where src/dst are an id or `{ id }`.
 * Returns null when the document is not an object.
 */
export function parseEvent(doc: unknown): RamsesEvent | null {
  const value = toPayloadValue(doc);
  if (!isPayloadMap(value)) return null;
  const code = value.code ?? value.kind;
  return {
    kind: typeof code === 'string' && code.trim() ? code.trim() : UNKNOWN,
    codeName: typeof value.code_name === 'string' ? value.code_name : undefined,
    verb: parseVerb(value.verb),
    sourceId: parseAddress(value.src),
    destinationId: parseAddress(value.dst),
    payload: value.payload ?? undefined,
  };
}
