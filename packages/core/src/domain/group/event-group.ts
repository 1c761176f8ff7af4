import type { Event } from '../event/event.js';

const TITLE_MAX_LENGTH = 80;

/** All events sharing one step id, ordered by timestamp. */
export class EventGroup {
  constructor(
    public readonly step: string,
    public readonly events: readonly Event[],
  ) {
    if (events.length === 0) {
      throw new RangeError(`event group ${step} must contain at least one event`);
    }
  }

  get startedAt(): Date {
    return new Date(Math.min(...this.events.map((event) => event.timestamp.getTime())));
  }

  get completedAt(): Date {
    return new Date(Math.max(...this.events.map((event) => event.timestamp.getTime())));
  }

  /** Most recent non-empty status. */
  get status(): string | null {
    for (let i = this.events.length - 1; i >= 0; i--) {
      const status = this.events[i].status;
      if (status) return status;
    }
    return null;
  }

  get tags(): string[] {
    const collected = new Set<string>();
    for (const event of this.events) {
      const tags = event.metadata.tags;
      if (typeof tags === 'string') {
        for (const tag of tags.split(',')) {
          const trimmed = tag.trim();
          if (trimmed) collected.add(trimmed);
        }
      } else if (Array.isArray(tags)) {
        for (const tag of tags) collected.add(String(tag));
      }
    }
    return [...collected].sort();
  }

  get cwd(): string | null {
    for (let i = this.events.length - 1; i >= 0; i--) {
      const cwd = this.events[i].metadata.cwd;
      if (cwd !== undefined && cwd !== null && cwd !== '') return String(cwd);
    }
    return null;
  }

  get title(): string {
    for (const event of this.events) {
      const content = event.content.trim();
      if (content) return Array.from(content.split(/\r?\n/)[0]).slice(0, TITLE_MAX_LENGTH).join('');
    }
    return `Step ${this.step}`;
  }
}
