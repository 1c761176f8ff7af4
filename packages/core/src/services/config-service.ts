import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { config as loadEnv } from 'dotenv';
import { isDistillStrategy } from '../domain/artifact/artifact-record.js';
import {
  DEFAULT_MODEL,
  DEFAULT_PROJECT,
  DEFAULT_SESSIONS_DIR,
  type Settings,
} from '../domain/settings/settings.js';
import { ConfigError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { VERSION } from '../shared/version.js';

const log = createLogger('config-service');

const PLACEHOLDER_TOKENS = new Set(['', 'your-token-here', 'changeme']);
const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

export type Env = Record<string, string | undefined>;

function flag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return TRUTHY.has(value.trim().toLowerCase());
}

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

export interface LoadSettingsOptions {
  /** Read `.env` from the working directory first. */
  dotenv?: boolean;
}

/**
 * Resolves settings from the environment. Dry-run is forced whenever the
 * knowledge-base URL or token is missing.
 */
export function loadSettings(env: Env = process.env, options: LoadSettingsOptions = {}): Settings {
  if (options.dotenv ?? env === process.env) {
    loadEnv();
  }

  let baseUrl = nonEmpty(env.OPENWEBUI_BASE_URL);
  if (baseUrl) {
    baseUrl = baseUrl.replace(/\/+$/, '');
    if (baseUrl.includes('example')) baseUrl = null;
  }

  let apiToken = env.OPENWEBUI_API_TOKEN?.trim() ?? null;
  if (apiToken !== null && PLACEHOLDER_TOKENS.has(apiToken)) apiToken = null;

  const sessionsDir = resolve(expandHome(nonEmpty(env.SESSIONDISTILL_SESSIONS_DIR) ?? DEFAULT_SESSIONS_DIR));

  const distillMode = nonEmpty(env.SESSIONDISTILL_DISTILL_MODE) ?? 'per-step';
  if (!isDistillStrategy(distillMode)) {
    throw new ConfigError(`SESSIONDISTILL_DISTILL_MODE must be per-step or transcript, got "${distillMode}"`);
  }

  const debug = flag(env.SESSIONDISTILL_DEBUG, false);
  let dryRun = flag(env.SESSIONDISTILL_DRY_RUN, false);
  if (!dryRun && !(baseUrl && apiToken)) {
    log.debug('loadSettings: knowledge base not configured, forcing dry-run');
    dryRun = true;
  }

  const captureSetting = nonEmpty(env.SESSIONDISTILL_CAPTURE_CHAT_EXPORT)?.toLowerCase() ?? 'auto';
  let captureChatExport = captureSetting === 'auto' ? debug : TRUTHY.has(captureSetting);
  if (dryRun) captureChatExport = false;

  return {
    baseUrl,
    apiToken,
    sessionsDir,
    project: nonEmpty(env.SESSIONDISTILL_PROJECT) ?? DEFAULT_PROJECT,
    branch: nonEmpty(env.SESSIONDISTILL_BRANCH),
    model: nonEmpty(env.SESSIONDISTILL_MODEL) ?? DEFAULT_MODEL,
    dryRun,
    debug,
    captureChatExport,
    distillMode,
    version: VERSION,
  };
}
