import { homedir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { DEFAULT_MODEL, authHeaders } from '../domain/settings/settings.js';
import { ConfigError } from '../shared/errors.js';
import { expandHome, loadSettings } from './config-service.js';

const CONFIGURED = { OPENWEBUI_BASE_URL: 'http://localhost:3000/', OPENWEBUI_API_TOKEN: 'test-token' };

describe('loadSettings', () => {
  it('should apply defaults and force dry-run when unconfigured', () => {
    const settings = loadSettings({});
    expect(settings).toMatchObject({
      baseUrl: null,
      apiToken: null,
      project: 'default',
      branch: null,
      model: DEFAULT_MODEL,
      dryRun: true,
      debug: false,
      captureChatExport: false,
      distillMode: 'per-step',
    });
    expect(settings.sessionsDir).toBe(join(homedir(), '.openhands/sessions'));
  });

  it('should strip the trailing slash and leave dry-run off when configured', () => {
    const settings = loadSettings(CONFIGURED);
    expect(settings.baseUrl).toBe('http://localhost:3000');
    expect(settings.apiToken).toBe('test-token');
    expect(settings.dryRun).toBe(false);
  });

  it('should treat placeholder values as unset', () => {
    expect(loadSettings({ ...CONFIGURED, OPENWEBUI_BASE_URL: 'https://webui.example.com' })).toMatchObject({
      baseUrl: null,
      dryRun: true,
    });
    expect(loadSettings({ ...CONFIGURED, OPENWEBUI_API_TOKEN: 'changeme' })).toMatchObject({
      apiToken: null,
      dryRun: true,
    });
  });

  it('should honour an explicit dry-run flag', () => {
    expect(loadSettings({ ...CONFIGURED, SESSIONDISTILL_DRY_RUN: 'yes' }).dryRun).toBe(true);
    expect(loadSettings({ ...CONFIGURED, SESSIONDISTILL_DRY_RUN: 'no' }).dryRun).toBe(false);
  });

  it('should capture chat exports in debug mode unless dry-run', () => {
    expect(loadSettings({ ...CONFIGURED, SESSIONDISTILL_DEBUG: '1' }).captureChatExport).toBe(true);
    expect(loadSettings({ ...CONFIGURED, SESSIONDISTILL_CAPTURE_CHAT_EXPORT: 'true' }).captureChatExport).toBe(true);
    expect(
      loadSettings({ ...CONFIGURED, SESSIONDISTILL_DEBUG: '1', SESSIONDISTILL_CAPTURE_CHAT_EXPORT: 'off' })
        .captureChatExport,
    ).toBe(false);
    expect(
      loadSettings({ SESSIONDISTILL_DEBUG: '1', SESSIONDISTILL_CAPTURE_CHAT_EXPORT: 'true' }).captureChatExport,
    ).toBe(false);
  });

  it('should read project, branch, model and mode', () => {
    const settings = loadSettings({
      SESSIONDISTILL_PROJECT: 'demo',
      SESSIONDISTILL_BRANCH: 'main',
      SESSIONDISTILL_MODEL: 'local/llama',
      SESSIONDISTILL_DISTILL_MODE: 'transcript',
      SESSIONDISTILL_SESSIONS_DIR: '/data/sessions',
    });
    expect(settings).toMatchObject({
      project: 'demo',
      branch: 'main',
      model: 'local/llama',
      distillMode: 'transcript',
      sessionsDir: '/data/sessions',
    });
  });

  it('should reject an unknown distill mode', () => {
    expect(() => loadSettings({ SESSIONDISTILL_DISTILL_MODE: 'summary' })).toThrow(ConfigError);
  });
});

describe('expandHome', () => {
  it('should expand a leading tilde only', () => {
    expect(expandHome('~/sessions')).toBe(join(homedir(), 'sessions'));
    expect(expandHome('~')).toBe(homedir());
    expect(expandHome('/tmp/~x')).toBe('/tmp/~x');
  });
});

describe('authHeaders', () => {
  it('should send a bearer token when one is set', () => {
    expect(authHeaders({ apiToken: 'test-token' })).toEqual({ Authorization: 'Bearer test-token' });
    expect(authHeaders({ apiToken: null })).toEqual({});
  });
});
