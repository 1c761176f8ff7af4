import { readdir, readFile, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { RawRecord, SourcedRecord } from '../domain/event/event.js';
import { isRecord } from '../domain/event/resolve.js';
import { GroupingError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('event-source-loader');

export type EventSourceLayout = 'jsonl' | 'directory' | 'bundle';

export interface EventSources {
  layout: EventSourceLayout;
  files: string[];
}

/** The shapes a JSON event document may take, tried in this order. */
type EventDocument =
  | { shape: 'array'; items: unknown[] }
  | { shape: 'events'; items: unknown[] }
  | { shape: 'object'; record: RawRecord };

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

async function listJsonFiles(dir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch {
    return [];
  }
  return entries
    .filter((name) => name.endsWith('.json'))
    .sort()
    .map((name) => join(dir, name));
}

/**
 * Locates the event files under a raw session root. `events.jsonl` wins over
 * an `events/` directory, which wins over a bundled `session.json`.
 */
export async function findEventSources(rawRoot: string): Promise<EventSources> {
  const jsonl = join(rawRoot, 'events.jsonl');
  if (await isFile(jsonl)) return { layout: 'jsonl', files: [jsonl] };

  const directoryFiles = await listJsonFiles(join(rawRoot, 'events'));
  if (directoryFiles.length > 0) return { layout: 'directory', files: directoryFiles };

  const bundled = join(rawRoot, 'session.json');
  if (await isFile(bundled)) return { layout: 'bundle', files: [bundled] };

  throw new GroupingError(`no event files found under ${rawRoot}`);
}

function parseJson(text: string, location: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new GroupingError(`invalid JSON in ${location}: ${detail}`);
  }
}

function classifyDocument(data: unknown): EventDocument | undefined {
  if (Array.isArray(data)) return { shape: 'array', items: data };
  if (isRecord(data)) {
    const events = data.events;
    if (Array.isArray(events)) return { shape: 'events', items: events };
    return { shape: 'object', record: data };
  }
  return undefined;
}

export async function loadJsonLines(path: string): Promise<SourcedRecord[]> {
  const source = basename(path);
  const lines = (await readFile(path, 'utf-8')).split(/\r?\n/);
  const records: SourcedRecord[] = [];

  lines.forEach((line, i) => {
    const trimmed = line.trim();
    if (!trimmed) return;
    const index = i + 1;
    const parsed = parseJson(trimmed, `${source}:${index}`);
    if (!isRecord(parsed)) {
      log.warn(`loadJsonLines: skipping non-object record at ${source}:${index}`);
      return;
    }
    records.push({ record: parsed, origin: { source, index } });
  });

  return records;
}

export async function loadJsonDocument(path: string): Promise<SourcedRecord[]> {
  const source = basename(path);
  const document = classifyDocument(parseJson(await readFile(path, 'utf-8'), source));
  if (!document) {
    throw new GroupingError(`${path} is not a recognised events container`);
  }

  if (document.shape === 'object') {
    return [{ record: document.record, origin: { source, index: 1 } }];
  }

  const records: SourcedRecord[] = [];
  document.items.forEach((item, i) => {
    if (!isRecord(item)) {
      log.warn(`loadJsonDocument: skipping non-object entry ${i + 1} in ${source}`);
      return;
    }
    records.push({ record: item, origin: { source, index: i + 1 } });
  });
  return records;
}

/** Reads every raw record of a session, in discovery and file order. */
export async function loadRawRecords(rawRoot: string): Promise<SourcedRecord[]> {
  const sources = await findEventSources(rawRoot);
  log.debug(`loadRawRecords: ${sources.layout} layout with ${sources.files.length} file(s) under ${rawRoot}`);

  const records: SourcedRecord[] = [];
  for (const file of sources.files) {
    const loaded = sources.layout === 'jsonl' ? await loadJsonLines(file) : await loadJsonDocument(file);
    records.push(...loaded);
  }
  return records;
}
