import type { ArtifactRecord } from '../artifact/artifact-record.js';
import type { ChatVariant } from '../../ports/knowledge-gateway.js';

export const MAX_PREFILL_ARTIFACTS = 20;

const INSTRUCTIONS: Record<ChatVariant, readonly string[]> = {
  '3A': [
    'Write a short status update for this session.',
    'Please:',
    '1. Summarise where the work stands in 2-3 sentences, naming wins and blockers.',
    '2. Point out failed or risky steps that need a closer look.',
    '3. Suggest the next 2-3 actions, citing step numbers or filenames from the list above.',
    'Structure the answer as short bullet sections: Status / Issues / Next.',
  ],
  '3B': [
    'Prefill only (variant 3B), no completion is requested.',
    'Note two observations worth a manual follow-up as bullets.',
  ],
};

export function buildPrefill(artifacts: readonly ArtifactRecord[], variant: ChatVariant): string {
  const lines = ['Artifacts ingested (latest steps first):'];

  const latestFirst = [...artifacts].reverse();
  for (const entry of latestFirst.slice(0, MAX_PREFILL_ARTIFACTS)) {
    lines.push(`- Step ${entry.step}: ${entry.status || 'unknown'} – ${entry.filename || 'n/a'}`);
  }
  const remaining = artifacts.length - MAX_PREFILL_ARTIFACTS;
  if (remaining > 0) {
    lines.push(`- … ${remaining} additional artifacts not shown (see knowledge collection)`);
  }

  lines.push('', ...INSTRUCTIONS[variant]);
  return lines.join('\n');
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `YYYY-MM-DD HH:MM UTC` */
export function formatChatTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())} UTC`
  );
}

export interface ChatTitleInput {
  project: string;
  branch: string | null;
  sessionId: string;
  status: string;
  now?: Date;
}

export function buildChatTitle({ project, branch, sessionId, status, now = new Date() }: ChatTitleInput): string {
  const scope = branch ? `${project}/${branch}` : project;
  return `sd/${scope}/${formatChatTimestamp(now)} – ${sessionId} – ${status}`;
}
