import { parse } from 'node:path';
import type { Event, RawRecord, RecordOrigin } from './event.js';
import {
  asRecord,
  asText,
  field,
  firstPresent,
  isPresent,
  isRecord,
  metaField,
  type Extractor,
} from './resolve.js';
import { parseTimestamp } from './timestamp.js';

const STEP_CHAIN: readonly Extractor[] = [
  field('step'),
  field('step_id'),
  metaField('step'),
  field('run_id'),
  field('id'),
];

const ROLE_CHAIN: readonly Extractor[] = [
  field('role'),
  (raw) => {
    const author = raw.author;
    return isRecord(author) ? author.role : undefined;
  },
  field('type'),
];

const CONTENT_CHAIN: readonly Extractor[] = [
  field('content'),
  field('message'),
  field('text'),
  field('summary'),
];

const TIMESTAMP_CHAIN: readonly Extractor[] = [
  field('ts'),
  field('timestamp'),
  metaField('ts'),
  metaField('timestamp'),
];

function extractMetadata(raw: RawRecord): Record<string, unknown> {
  const extras = asRecord(raw.extras);
  const metadata: Record<string, unknown> = {
    ...asRecord(extras.metadata),
    ...asRecord(raw.metadata),
  };
  if (isPresent(extras.command) && !Object.hasOwn(metadata, 'command')) {
    metadata.command = extras.command;
  }
  return metadata;
}

export function normaliseStatus(value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'boolean') return value ? 'success' : 'failed';
  const text = asText(value).trim();
  return text || undefined;
}

function coerceExitCode(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return Math.trunc(value);
  if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) return Number.parseInt(value, 10);
  return undefined;
}

function pickDefined(...values: unknown[]): unknown {
  return values.find((value) => value !== undefined && value !== null && value !== '');
}

/**
 * Status when no explicit one is recorded: success flag, then exit code,
 * then an error field, then an outcome.
 */
export function deriveStatus(raw: RawRecord, metadata: Record<string, unknown>): string | undefined {
  const flagged = normaliseStatus(raw.success) ?? normaliseStatus(metadata.success);
  if (flagged) return flagged;

  const exitCode = coerceExitCode(pickDefined(metadata.exit_code, raw.exit_code));
  if (exitCode !== undefined) return exitCode === 0 ? 'success' : 'failed';

  if (isPresent(raw.error) || isPresent(metadata.error)) return 'error';

  return normaliseStatus(pickDefined(raw.outcome, metadata.outcome));
}

function sourceStem(origin: RecordOrigin | undefined): string | undefined {
  if (!origin?.source) return undefined;
  const stem = parse(origin.source).name;
  return stem || undefined;
}

/**
 * Maps one raw record onto the canonical event shape. Total: missing or
 * malformed fields fall back to defaults instead of throwing.
 */
export function normalizeEvent(raw: RawRecord, fallbackStep: string, origin?: RecordOrigin): Event {
  const metadata = extractMetadata(raw);

  const stepCandidate = firstPresent(STEP_CHAIN, raw, metadata);
  const resolvedStep = stepCandidate !== undefined ? asText(stepCandidate) : sourceStem(origin);
  const step = resolvedStep ?? fallbackStep;

  const role = asText(firstPresent(ROLE_CHAIN, raw, metadata)) || 'unknown';
  const content = asText(firstPresent(CONTENT_CHAIN, raw, metadata));
  const timestamp = parseTimestamp(firstPresent(TIMESTAMP_CHAIN, raw, metadata));

  const status =
    normaliseStatus(raw.status) ?? normaliseStatus(metadata.status) ?? deriveStatus(raw, metadata);

  if (Array.isArray(raw.tags) && !Object.hasOwn(metadata, 'tags')) {
    metadata.tags = raw.tags;
  }
  if (origin) {
    if (!Object.hasOwn(metadata, 'source')) metadata.source = origin.source;
    if (!Object.hasOwn(metadata, 'source_index')) metadata.source_index = origin.index;
  }
  if (resolvedStep === undefined && !Object.hasOwn(metadata, 'fallback_step')) {
    metadata.fallback_step = fallbackStep;
  }

  const event: Event = { step, role, content, timestamp, metadata };
  if (status) event.status = status;
  return event;
}
