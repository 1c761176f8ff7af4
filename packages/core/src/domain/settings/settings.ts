import type { DistillStrategy } from '../artifact/artifact-record.js';

export interface Settings {
  baseUrl: string | null;
  apiToken: string | null;
  sessionsDir: string;
  project: string;
  branch: string | null;
  model: string;
  dryRun: boolean;
  debug: boolean;
  captureChatExport: boolean;
  distillMode: DistillStrategy;
  version: string;
}

export const DEFAULT_PROJECT = 'default';
export const DEFAULT_MODEL = 'openai/gpt-4o-mini';
export const DEFAULT_SESSIONS_DIR = '~/.openhands/sessions';

export function authHeaders(settings: Pick<Settings, 'apiToken'>): Record<string, string> {
  return settings.apiToken ? { Authorization: `Bearer ${settings.apiToken}` } : {};
}
