import { createHash } from 'node:crypto';
import type { Event } from '../event/event.js';
import { isRecord } from '../event/resolve.js';
import type { EventGroup } from '../group/event-group.js';

export const EMPTY_BODY = '(no textual content captured)';
const SUMMARY_MAX_LENGTH = 200;

export function sha256(text: string): string {
  return createHash('sha256').update(text, 'utf-8').digest('hex');
}

export function shortHash(digest: string): string {
  return digest.slice(0, 8);
}

/** `role: content` per event with text, roles lowercased. */
export function renderGroupBody(events: readonly Event[]): string {
  const chunks: string[] = [];
  for (const event of events) {
    const content = event.content.trim();
    if (!content) continue;
    chunks.push(`${event.role.toLowerCase()}: ${content}`);
  }
  return chunks.join('\n');
}

/** Text the dedup hash is taken over: every line trimmed. */
export function normaliseForHash(body: string): string {
  return body
    .split(/\r?\n/)
    .map((line) => line.trim())
    .join('\n');
}

export function renderFrontMatter(fields: Record<string, unknown>): string {
  return `---\n${JSON.stringify(fields, null, 2)}\n---\n\n`;
}

export interface ArtifactDocument {
  frontMatter: Record<string, unknown>;
  body: string;
}

const FRONT_MATTER = /^---\n([\s\S]*?)\n---\n\n?/;

/** Inverse of `renderFrontMatter`; text without a JSON header comes back as the body. */
export function splitFrontMatter(text: string): ArtifactDocument {
  const match = FRONT_MATTER.exec(text);
  if (!match) return { frontMatter: {}, body: text };
  let parsed: unknown;
  try {
    parsed = JSON.parse(match[1]);
  } catch {
    return { frontMatter: {}, body: text };
  }
  if (!isRecord(parsed)) return { frontMatter: {}, body: text };
  return { frontMatter: parsed, body: text.slice(match[0].length) };
}

export function artifactFilename(group: EventGroup, hash8: string): string {
  const statusSlug = (group.status ?? 'pending').toLowerCase().replaceAll(' ', '-');
  const stepSlug = group.step.replaceAll('/', '-');
  return `artifact-${stepSlug}-${hash8}-${statusSlug}.md`;
}

export function transcriptFilename(hash8: string): string {
  return `transcript-${hash8}.md`;
}

/** Counts code points, so astral characters are never split. */
function truncateLine(text: string, maxLen: number): string {
  const chars = Array.from(text);
  if (chars.length > maxLen) return chars.slice(0, maxLen - 3).join('') + '...';
  return text;
}

const CODE_FENCE = /^\s*```/;
const LEADING_MARKERS = /^(?:#{1,6}\s+|[-*+]\s+|\d+[.)]\s+|>\s*)+/;

/**
 * One-line summary of a step: the first non-blank line outside a code fence
 * marker, whitespace collapsed and markdown list or heading markers removed.
 */
export function summariseContent(content: string): string | undefined {
  for (const line of content.split(/\r?\n/)) {
    if (!line.trim() || CODE_FENCE.test(line)) continue;
    const collapsed = line.replace(/\s+/g, ' ').trim();
    const stripped = collapsed.replace(LEADING_MARKERS, '').trim();
    if (!stripped) continue;
    return truncateLine(stripped, SUMMARY_MAX_LENGTH);
  }
  return undefined;
}

/** Steps `0` and `1` carry the bootstrap prompt and instructions. */
export function isBootstrapStep(step: string): boolean {
  const trimmed = step.trim();
  if (!/^\d+$/.test(trimmed)) return false;
  const value = Number.parseInt(trimmed, 10);
  return value === 0 || value === 1;
}

export function renderTranscript(sessionId: string, groups: readonly EventGroup[]): string {
  const lines = [`# Session ${sessionId} transcript`, ''];
  if (groups.length === 0) {
    lines.push('(no steps recorded)');
    return lines.join('\n') + '\n';
  }
  for (const group of groups) {
    const joined = group.events.map((event) => event.content).join('\n');
    lines.push(`## Step ${group.step}`, '', summariseContent(joined) ?? EMPTY_BODY, '');
  }
  return lines.join('\n') + '\n';
}
