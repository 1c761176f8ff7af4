import { loadRawRecords } from '../adapters/event-source-loader.js';
import type { Event } from '../domain/event/event.js';
import { normalizeEvent } from '../domain/event/normalize.js';
import { EventGroup } from '../domain/group/event-group.js';
import { GroupingError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('grouper');

function byTimestamp(a: Event, b: Event): number {
  return a.timestamp.getTime() - b.timestamp.getTime();
}

/**
 * Buckets events by step. Groups come back ordered by their earliest
 * event, and events inside a group by timestamp.
 */
export function groupEvents(events: readonly Event[]): EventGroup[] {
  const buckets = new Map<string, Event[]>();
  for (const event of events) {
    const bucket = buckets.get(event.step);
    if (bucket) bucket.push(event);
    else buckets.set(event.step, [event]);
  }

  return [...buckets.entries()]
    .map(([step, bucket]) => new EventGroup(step, [...bucket].sort(byTimestamp)))
    .sort((a, b) => a.startedAt.getTime() - b.startedAt.getTime());
}

/** Load session events grouped by step for downstream distillation. */
export async function loadEventGroups(rawRoot: string): Promise<EventGroup[]> {
  const records = await loadRawRecords(rawRoot);
  if (records.length === 0) {
    throw new GroupingError(`no events parsed from ${rawRoot}`);
  }

  const events = records.map(({ record, origin }, i) =>
    normalizeEvent(record, String(i + 1).padStart(3, '0'), origin),
  );
  const groups = groupEvents(events);
  log.debug(`loadEventGroups: ${events.length} event(s) in ${groups.length} group(s)`);
  return groups;
}
