import { describe, it, expect } from 'vitest';
import type { Event } from '../event/event.js';
import { EventGroup } from './event-group.js';

function event(overrides: Partial<Event>): Event {
  return { step: '1', role: 'user', content: '', timestamp: new Date(0), metadata: {}, ...overrides };
}

describe('EventGroup', () => {
  it('should reject an empty group', () => {
    expect(() => new EventGroup('1', [])).toThrow(RangeError);
  });

  it('should derive the time span', () => {
    const group = new EventGroup('1', [
      event({ timestamp: new Date(2_000) }),
      event({ timestamp: new Date(1_000) }),
      event({ timestamp: new Date(3_000) }),
    ]);
    expect(group.startedAt.getTime()).toBe(1_000);
    expect(group.completedAt.getTime()).toBe(3_000);
  });

  it('should take the last non-empty status and cwd', () => {
    const group = new EventGroup('1', [
      event({ status: 'running', metadata: { cwd: '/repo' } }),
      event({ status: 'success', metadata: { cwd: '/repo/pkg' } }),
      event({ metadata: { cwd: '' } }),
    ]);
    expect(group.status).toBe('success');
    expect(group.cwd).toBe('/repo/pkg');
  });

  it('should return null status and cwd when none are recorded', () => {
    const group = new EventGroup('1', [event({})]);
    expect(group.status).toBeNull();
    expect(group.cwd).toBeNull();
  });

  it('should union tags from strings and arrays', () => {
    const group = new EventGroup('1', [
      event({ metadata: { tags: 'b, a,' } }),
      event({ metadata: { tags: ['c', 'a'] } }),
    ]);
    expect(group.tags).toEqual(['a', 'b', 'c']);
  });

  it('should title the group by its first line of content', () => {
    const long = 'x'.repeat(100);
    expect(new EventGroup('1', [event({ content: '  ' }), event({ content: `${long}\nmore` })]).title).toBe(
      'x'.repeat(80),
    );
    expect(new EventGroup('7', [event({})]).title).toBe('Step 7');
  });

  it('should cut the title on a character boundary', () => {
    const group = new EventGroup('1', [event({ content: `${'a'.repeat(79)}😀😀` })]);
    expect(group.title).toBe(`${'a'.repeat(79)}😀`);
  });
});
