import type { RawRecord } from './event.js';

/** Pulls one candidate value out of a raw record or its merged metadata. */
export type Extractor = (raw: RawRecord, metadata: Record<string, unknown>) => unknown;

export function asRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? { ...value } : {};
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isPresent(value: unknown): boolean {
  if (value === undefined || value === null || value === false) return false;
  if (typeof value === 'string') return value.trim() !== '';
  if (typeof value === 'number') return Number.isFinite(value);
  if (Array.isArray(value)) return value.length > 0;
  if (isRecord(value)) return Object.keys(value).length > 0;
  return true;
}

export function asText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (value && typeof value === 'object') return JSON.stringify(value);
  return '';
}

export const field =
  (name: string): Extractor =>
  (raw) =>
    raw[name];

export const metaField =
  (name: string): Extractor =>
  (_raw, metadata) =>
    metadata[name];

/**
 * Evaluates extractors in order and returns the first present value.
 */
export function firstPresent(
  extractors: readonly Extractor[],
  raw: RawRecord,
  metadata: Record<string, unknown>,
): unknown {
  for (const extract of extractors) {
    const value = extract(raw, metadata);
    if (isPresent(value)) return value;
  }
  return undefined;
}
