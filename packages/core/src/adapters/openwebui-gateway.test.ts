import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { Settings } from '../domain/settings/settings.js';
import { loadSettings } from '../services/config-service.js';
import { UploadError } from '../shared/errors.js';
import { OpenWebUIGateway, extractAssistantText, extractFirstId } from './openwebui-gateway.js';

interface RecordedCall {
  url: string;
  init: RequestInit | undefined;
}

function queueFetch(...responses: Array<() => Response>) {
  const calls: RecordedCall[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), init });
    const next = responses.shift();
    if (!next) throw new Error(`unexpected request to ${String(input)}`);
    return next();
  };
  return { fetchImpl, calls };
}

const json = (body: unknown, status = 200) => () =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
const text = (body: string, status: number) => () => new Response(body, { status });

function bodyOf(call: RecordedCall): unknown {
  return JSON.parse(String(call.init?.body));
}

const BASE = 'http://kb.test';
const settings: Settings = { ...loadSettings({}), baseUrl: BASE, apiToken: 'test-token', dryRun: false };

function gatewayWith(fetchImpl: typeof fetch, sleeps: number[] = []): OpenWebUIGateway {
  return new OpenWebUIGateway(settings, {
    fetch: fetchImpl,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });
}

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'sd-gateway-'));
});

afterEach(async () => {
  vi.unstubAllGlobals();
  await rm(dir, { recursive: true, force: true });
});

describe('OpenWebUIGateway', () => {
  it('should require a base URL', () => {
    expect(() => new OpenWebUIGateway({ ...settings, baseUrl: null })).toThrow(UploadError);
  });

  describe('uploadMarkdown', () => {
    it('should fall through to the next endpoint on 404', async () => {
      const path = join(dir, 'a.md');
      await writeFile(path, 'hello');
      const { fetchImpl, calls } = queueFetch(text('not found', 404), json({ id: 'f1' }));

      expect(await gatewayWith(fetchImpl).uploadMarkdown(path)).toBe('f1');

      expect(calls.map((call) => call.url)).toEqual([
        `${BASE}/api/v1/files/?process=true&process_in_background=false`,
        `${BASE}/api/v1/files?process=true&process_in_background=false`,
      ]);
      expect(calls[1].init?.method).toBe('POST');
      expect(calls[1].init?.headers).toMatchObject({ Authorization: 'Bearer test-token' });
      const body = calls[1].init?.body;
      expect(body).toBeInstanceOf(FormData);
      if (body instanceof FormData) {
        const file = body.get('file');
        expect(file).toBeInstanceOf(Blob);
        if (file instanceof Blob) expect(await file.text()).toBe('hello');
      }
    });

    it('should read the id from a nested data object', async () => {
      const path = join(dir, 'a.md');
      await writeFile(path, 'hello');
      const { fetchImpl } = queueFetch(json({ data: { file_id: 'f2' } }));

      expect(await gatewayWith(fetchImpl).uploadMarkdown(path)).toBe('f2');
    });

    it('should stop on other failures', async () => {
      const path = join(dir, 'a.md');
      await writeFile(path, 'hello');
      const { fetchImpl, calls } = queueFetch(text('boom', 500));

      await expect(gatewayWith(fetchImpl).uploadMarkdown(path)).rejects.toThrow(
        'POST /api/v1/files/ failed with status 500: boom',
      );
      expect(calls).toHaveLength(1);
    });

    it('should fail when the response has no id', async () => {
      const path = join(dir, 'a.md');
      await writeFile(path, 'hello');
      const { fetchImpl } = queueFetch(json({ ok: true }));

      await expect(gatewayWith(fetchImpl).uploadMarkdown(path)).rejects.toThrow('upload response missing file id');
    });
  });

  describe('pollFile', () => {
    it('should fall back to the file endpoint when the status endpoint is missing', async () => {
      const { fetchImpl, calls } = queueFetch(text('', 404), json({ data: { status: 'processed' } }));

      expect(await gatewayWith(fetchImpl).pollFile('f1')).toBe('processed');
      expect(calls.map((call) => call.url)).toEqual([`${BASE}/api/v1/files/f1/process/status`, `${BASE}/api/v1/files/f1`]);
    });

    it('should sleep between attempts until a terminal state', async () => {
      const sleeps: number[] = [];
      const { fetchImpl } = queueFetch(json({ status: 'pending' }), json({ status: 'ready' }));

      expect(await gatewayWith(fetchImpl, sleeps).pollFile('f1', { delayMs: 10 })).toBe('ready');
      expect(sleeps).toEqual([10]);
    });

    it('should accept a processed flag', async () => {
      const { fetchImpl } = queueFetch(json({ processed: true }));
      expect(await gatewayWith(fetchImpl).pollFile('f1')).toBe('processed');
    });

    it('should return the error state', async () => {
      const { fetchImpl } = queueFetch(json({ status: 'error' }));
      expect(await gatewayWith(fetchImpl).pollFile('f1')).toBe('error');
    });

    it('should give up after the retry budget', async () => {
      const sleeps: number[] = [];
      const { fetchImpl } = queueFetch(json({ status: 'pending' }), json({ status: 'pending' }));

      await expect(gatewayWith(fetchImpl, sleeps).pollFile('f1', { retries: 2, delayMs: 5 })).rejects.toThrow(
        'file f1 did not finish processing (last status=pending)',
      );
      expect(sleeps).toEqual([5]);
    });

    it('should surface unexpected status codes', async () => {
      const { fetchImpl } = queueFetch(text('boom', 500));
      await expect(gatewayWith(fetchImpl).pollFile('f1')).rejects.toThrow('file status check failed (500)');
    });
  });

  describe('collections', () => {
    it('should create a collection through the fallback endpoint', async () => {
      const { fetchImpl, calls } = queueFetch(text('', 405), json({ data: { knowledge: { id: 'k1' } } }));

      expect(await gatewayWith(fetchImpl).createCollection('sd:demo', 'Artifacts')).toBe('k1');
      expect(calls.map((call) => call.url)).toEqual([`${BASE}/api/v1/knowledge/create`, `${BASE}/api/v1/knowledge`]);
      expect(bodyOf(calls[1])).toEqual({ name: 'sd:demo', description: 'Artifacts' });
      expect(calls[1].init?.headers).toMatchObject({ 'Content-Type': 'application/json' });
    });

    it('should attach a file', async () => {
      const { fetchImpl, calls } = queueFetch(json({}));

      await gatewayWith(fetchImpl).attachFile('k1', 'f1');
      expect(calls[0].url).toBe(`${BASE}/api/v1/knowledge/k1/file/add`);
      expect(bodyOf(calls[0])).toEqual({ file_id: 'f1' });
    });

    it('should resolve a collection name or return null', async () => {
      const { fetchImpl } = queueFetch(json({ id: 'k1', name: 'sd:demo' }), text('', 404));
      const gateway = gatewayWith(fetchImpl);

      expect(await gateway.resolveCollectionName('k1')).toBe('sd:demo');
      expect(await gateway.resolveCollectionName('k2')).toBeNull();
    });

    it('should use the global fetch by default', async () => {
      const { fetchImpl, calls } = queueFetch(json({}));
      vi.stubGlobal('fetch', fetchImpl);

      await new OpenWebUIGateway(settings).attachFile('k1', 'f1');
      expect(calls).toHaveLength(1);
    });
  });

  describe('createChat', () => {
    const input = {
      collectionId: 'k1',
      collectionName: 'sd:demo',
      title: 'title',
      prefill: 'prefill',
      sessionId: 's1',
    };

    it('should create a 3B chat and link the knowledge collection', async () => {
      const { fetchImpl, calls } = queueFetch(
        json({ id: 'c1' }),
        json({ chat: { messages: [{ id: 'u1', role: 'user', files: [] }], files: [{ id: 'k1', type: 'collection' }] } }),
        json({}),
      );

      expect(await gatewayWith(fetchImpl).createChat({ ...input, variant: '3B' })).toBe('c1');

      expect(calls.map((call) => call.url)).toEqual([
        `${BASE}/api/v1/chats/new`,
        `${BASE}/api/v1/chats/c1`,
        `${BASE}/api/v1/chats/c1`,
      ]);
      expect(bodyOf(calls[0])).toMatchObject({
        chat: {
          title: 'title',
          knowledge_ids: ['k1'],
          files: [{ id: 'k1', type: 'collection', name: 'sd:demo' }],
          metadata: { collection_id: 'k1', variant: '3B' },
        },
      });
      expect(bodyOf(calls[2])).toEqual({
        chat: {
          knowledge_ids: ['k1'],
          files: [{ id: 'k1', type: 'collection' }],
          messages: [
            {
              id: 'u1',
              role: 'user',
              files: [{ id: 'k1', type: 'collection' }],
              metadata: { collection_id: 'k1' },
            },
          ],
        },
      });
    });

    it('should keep the chat when linking fails', async () => {
      const { fetchImpl, calls } = queueFetch(json({ chat_id: 'c1' }), text('boom', 500));

      expect(await gatewayWith(fetchImpl).createChat({ ...input, variant: '3B' })).toBe('c1');
      expect(calls).toHaveLength(2);
    });

    it('should store the completion text for 3A', async () => {
      const userChat = { chat: { messages: [{ id: 'u1', role: 'user', content: 'prefill' }] } };
      const { fetchImpl, calls } = queueFetch(
        json({ id: 'c1' }),
        json(userChat),
        json({}),
        json(userChat),
        json({}),
        json({ choices: [{ message: { content: 'All good' } }] }),
        json(userChat),
        json({}),
        json({}),
      );

      expect(await gatewayWith(fetchImpl).createChat({ ...input, variant: '3A' })).toBe('c1');

      expect(calls).toHaveLength(9);
      expect(calls[5].url).toBe(`${BASE}/api/chat/completions`);
      expect(bodyOf(calls[5])).toMatchObject({
        chat_id: 'c1',
        model: settings.model,
        stream: false,
        messages: [{ role: 'user', content: 'prefill' }],
        session_id: 's1',
      });
      expect(bodyOf(calls[7])).toMatchObject({
        chat: { messages: [{ id: 'u1' }, { role: 'assistant', content: 'All good\n', done: true }] },
      });
      expect(calls[8].url).toBe(`${BASE}/api/chat/completed`);
    });

    it('should wait for a queued completion task', async () => {
      const sleeps: number[] = [];
      const userChat = { chat: { messages: [{ id: 'u1', role: 'user', content: 'prefill' }] } };
      const answered = {
        chat: { messages: [...userChat.chat.messages, { id: 'server', role: 'assistant', content: 'Server reply' }] },
      };
      const { fetchImpl, calls } = queueFetch(
        json({ id: 'c1' }),
        json(userChat),
        json({}),
        json(userChat),
        json({}),
        json({ task_id: 't1' }),
        json({ task_ids: ['t1'] }),
        json({ task_ids: [] }),
        json(answered),
        json({}),
        json({}),
      );

      expect(await gatewayWith(fetchImpl, sleeps).createChat({ ...input, variant: '3A' })).toBe('c1');

      expect(calls[6].url).toBe(`${BASE}/api/tasks/chat/c1`);
      expect(sleeps).toEqual([2_000]);
      expect(bodyOf(calls[9])).toMatchObject({
        chat: { messages: [{ id: 'u1' }, { id: 'server' }, { role: 'assistant', content: 'Server reply\n' }] },
      });
      expect(calls).toHaveLength(11);
    });

    it('should not throw when the completion fails', async () => {
      const userChat = { chat: { messages: [{ id: 'u1', role: 'user', content: 'prefill' }] } };
      const { fetchImpl, calls } = queueFetch(
        json({ id: 'c1' }),
        json(userChat),
        json({}),
        json(userChat),
        json({}),
        text('model unavailable', 500),
      );

      expect(await gatewayWith(fetchImpl).createChat({ ...input, variant: '3A' })).toBe('c1');
      expect(calls).toHaveLength(6);
    });
  });

  it('should write the chat export as a one-element list', async () => {
    const { fetchImpl, calls } = queueFetch(json({ id: 'c1', title: 'title' }));
    const destination = join(dir, 'chat-export-c1.json');

    expect(await gatewayWith(fetchImpl).downloadChatExport('c1', destination)).toBe(destination);
    expect(calls[0].url).toBe(`${BASE}/api/v1/chats/c1`);
    expect(JSON.parse(await readFile(destination, 'utf-8'))).toEqual([{ id: 'c1', title: 'title' }]);
  });
});

describe('extractFirstId', () => {
  it('should search nested structures depth first', () => {
    expect(extractFirstId({ data: [{ meta: {} }, { knowledge_id: 'k9' }] })).toBe('k9');
    expect(extractFirstId({ id: 7 })).toBe('7');
    expect(extractFirstId({ list: [] })).toBeNull();
  });
});

describe('extractAssistantText', () => {
  it('should join choice contents', () => {
    expect(extractAssistantText({ choices: [{ message: { content: 'a' } }, { delta: { content: 'b' } }] })).toBe('ab');
    expect(extractAssistantText({ message: { content: ' hi ' } })).toBe('hi');
    expect(extractAssistantText({})).toBe('');
  });
});
