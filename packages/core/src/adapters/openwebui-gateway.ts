import { randomUUID } from 'node:crypto';
import { readFile, writeFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { isRecord } from '../domain/event/resolve.js';
import { authHeaders, type Settings } from '../domain/settings/settings.js';
import {
  PROCESSED_STATES,
  type CreateChatInput,
  type KnowledgeGateway,
  type PollOptions,
} from '../ports/knowledge-gateway.js';
import { UploadError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('openwebui-gateway');

const DEFAULT_TIMEOUT_MS = 60_000;
const COMPLETION_TIMEOUT_MS = 180_000;
const TASK_POLL_INTERVAL_MS = 2_000;
const FALLBACK_STATUSES = new Set([404, 405]);

type JsonRecord = Record<string, unknown>;

interface RequestOptions {
  method?: 'GET' | 'POST';
  json?: unknown;
  form?: () => FormData;
  query?: Record<string, string>;
  timeoutMs?: number;
}

export interface OpenWebUIGatewayOptions {
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  /** Deadline for a triggered chat completion to leave the task queue. */
  completionTimeoutMs?: number;
}

function str(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function ensureRecord(parent: JsonRecord, key: string): JsonRecord {
  const existing = parent[key];
  if (isRecord(existing)) return existing;
  const created: JsonRecord = {};
  parent[key] = created;
  return created;
}

function ensureArray(parent: JsonRecord, key: string): unknown[] {
  const existing = parent[key];
  if (Array.isArray(existing)) return existing;
  const created: unknown[] = [];
  parent[key] = created;
  return created;
}

function hexId(): string {
  return randomUUID().replaceAll('-', '');
}

/** Depth-first search for the first id-looking field of a response. */
export function extractFirstId(payload: unknown): string | null {
  if (typeof payload === 'string' || typeof payload === 'number') {
    return String(payload) || null;
  }
  if (Array.isArray(payload)) {
    for (const item of payload) {
      const found = extractFirstId(item);
      if (found) return found;
    }
    return null;
  }
  if (isRecord(payload)) {
    for (const key of ['id', '_id', 'knowledge_id', 'collection_id', 'file_id']) {
      const value = payload[key];
      if (typeof value === 'string' && value) return value;
      if (typeof value === 'number') return String(value);
    }
    for (const value of Object.values(payload)) {
      const found = extractFirstId(value);
      if (found) return found;
    }
  }
  return null;
}

/** Merges `entry` into a list of `{ id }` objects, keeping the first of each id. */
function mergeEntries(items: unknown, entry: JsonRecord): JsonRecord[] {
  const merged: JsonRecord[] = [];
  const seen = new Set<string>();
  const candidates = [...(Array.isArray(items) ? items : []), entry];
  for (const candidate of candidates) {
    if (!isRecord(candidate)) continue;
    const id = candidate.id;
    if (id === undefined || id === null || id === '' || seen.has(String(id))) continue;
    seen.add(String(id));
    merged.push(candidate);
  }
  return merged;
}

/**
 * Client for an Open WebUI compatible knowledge-base API. Endpoints that moved
 * between server releases are tried in order, falling through on 404/405.
 */
export class OpenWebUIGateway implements KnowledgeGateway {
  readonly dryRun = false;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly completionTimeoutMs: number;

  constructor(
    private readonly settings: Settings,
    options: OpenWebUIGatewayOptions = {},
  ) {
    if (!settings.baseUrl) {
      throw new UploadError('OPENWEBUI_BASE_URL is required when not in dry-run mode');
    }
    this.baseUrl = settings.baseUrl;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? ((ms) => sleep(ms).then(() => undefined));
    this.completionTimeoutMs = options.completionTimeoutMs ?? COMPLETION_TIMEOUT_MS;
  }

  private async request(path: string, options: RequestOptions = {}): Promise<unknown> {
    const method = options.method ?? 'GET';
    const query = options.query ? `?${new URLSearchParams(options.query).toString()}` : '';
    const headers: Record<string, string> = { Accept: 'application/json', ...authHeaders(this.settings) };
    let body: string | FormData | undefined;
    if (options.form) {
      body = options.form();
    } else if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.json);
    }

    log.debug(`request: ${method} ${path}`);
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}${query}`, {
        method,
        headers,
        body,
        signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
      });
    } catch (err) {
      throw new UploadError(`${method} ${path} failed: ${err instanceof Error ? err.message : String(err)}`);
    }

    const text = await response.text().catch(() => '');
    if (!response.ok) {
      throw new UploadError(`${method} ${path} failed with status ${response.status}: ${text}`, response.status);
    }
    if (!text) return {};
    try {
      return JSON.parse(text);
    } catch {
      throw new UploadError(`${method} ${path} returned a non-JSON body`);
    }
  }

  private async requestWithFallback(endpoints: readonly string[], options: RequestOptions, label: string): Promise<unknown> {
    for (const [i, endpoint] of endpoints.entries()) {
      try {
        return await this.request(endpoint, options);
      } catch (err) {
        const isLast = i === endpoints.length - 1;
        if (err instanceof UploadError && err.status !== undefined && FALLBACK_STATUSES.has(err.status) && !isLast) {
          log.debug(`${label}: ${endpoint} answered ${err.status}, trying next endpoint`);
          continue;
        }
        throw err;
      }
    }
    throw new UploadError(`${label} failed; no compatible endpoint found`);
  }

  async uploadMarkdown(filePath: string): Promise<string> {
    const content = await readFile(filePath, 'utf-8');
    const filename = basename(filePath);
    const payload = await this.requestWithFallback(
      ['/api/v1/files/', '/api/v1/files', '/api/v1/files/upload'],
      {
        method: 'POST',
        query: { process: 'true', process_in_background: 'false' },
        form: () => {
          const form = new FormData();
          form.append('file', new Blob([content], { type: 'text/markdown' }), filename);
          return form;
        },
      },
      'upload',
    );

    const record = isRecord(payload) ? payload : {};
    const data = isRecord(record.data) ? record.data : {};
    const fileId = extractFirstId(record.id ?? record.file_id ?? data.id ?? data.file_id);
    if (!fileId) throw new UploadError('upload response missing file id');
    return fileId;
  }

  async pollFile(fileId: string, options: PollOptions = {}): Promise<string> {
    const retries = options.retries ?? 40;
    const delayMs = options.delayMs ?? 2_500;
    let lastStatus = 'unknown';

    for (let attempt = 1; attempt <= retries; attempt++) {
      let payload: unknown;
      try {
        payload = await this.request(`/api/v1/files/${fileId}/process/status`);
      } catch (err) {
        if (!(err instanceof UploadError) || err.status === undefined || !FALLBACK_STATUSES.has(err.status)) {
          const status = err instanceof UploadError && err.status !== undefined ? err.status : 'network';
          throw new UploadError(`file status check failed (${status})`, err instanceof UploadError ? err.status : undefined);
        }
        payload = await this.request(`/api/v1/files/${fileId}`);
      }

      const record = isRecord(payload) ? payload : {};
      const data = isRecord(record.data) ? record.data : {};
      const status = str(record.status) || str(record.processing_status) || str(data.status);
      const processed = record.processed === true || data.processed === true || data.status === 'processed';

      if (PROCESSED_STATES.has(status) || processed) return status || 'processed';
      if (status === 'error') return 'error';

      lastStatus = status || 'unknown';
      if (attempt < retries) await this.sleep(delayMs);
    }

    throw new UploadError(`file ${fileId} did not finish processing (last status=${lastStatus})`);
  }

  async createCollection(name: string, description: string): Promise<string> {
    const payload = await this.requestWithFallback(
      ['/api/v1/knowledge/create', '/api/v1/knowledge'],
      { method: 'POST', json: { name, description } },
      'knowledge creation',
    );
    const collectionId = extractFirstId(payload);
    if (!collectionId) throw new UploadError('knowledge creation response missing id');
    return collectionId;
  }

  async attachFile(collectionId: string, fileId: string): Promise<void> {
    await this.request(`/api/v1/knowledge/${collectionId}/file/add`, {
      method: 'POST',
      json: { file_id: fileId },
    });
  }

  async resolveCollectionName(collectionId: string): Promise<string | null> {
    try {
      const payload = await this.request(`/api/v1/knowledge/${collectionId}`);
      const record = isRecord(payload) ? payload : {};
      return str(record.name) || null;
    } catch (err) {
      log.warn(`resolveCollectionName: ${collectionId}:`, err instanceof Error ? err.message : String(err));
      return null;
    }
  }

  async createChat(input: CreateChatInput): Promise<string> {
    const model = this.settings.model;
    const userMsgId = hexId();
    const timestamp = Math.floor(Date.now() / 1000);
    const collectionFile: JsonRecord = { id: input.collectionId, type: 'collection' };
    if (input.collectionName) collectionFile.name = input.collectionName;

    const userMessage: JsonRecord = {
      id: userMsgId,
      role: 'user',
      content: input.prefill,
      timestamp,
      models: [model],
      parentId: null,
      childrenIds: [],
      files: [collectionFile],
    };

    const payload = await this.requestWithFallback(
      ['/api/v1/chats/new', '/api/v1/chats'],
      {
        method: 'POST',
        json: {
          chat: {
            title: input.title,
            metadata: { collection_id: input.collectionId, variant: input.variant },
            models: [model],
            messages: [{ ...userMessage, metadata: { collection_id: input.collectionId } }],
            knowledge_ids: [input.collectionId],
            files: [collectionFile],
            history: {
              current_id: userMsgId,
              currentId: userMsgId,
              messages: { [userMsgId]: userMessage },
            },
            currentId: userMsgId,
          },
        },
      },
      'chat creation',
    );

    const record = isRecord(payload) ? payload : {};
    const chat = isRecord(record.chat) ? record.chat : {};
    const chatId = extractFirstId(record.chat_id ?? record.id ?? chat.id) ?? extractFirstId(payload);
    if (!chatId) throw new UploadError('chat creation response missing id');

    try {
      await this.linkKnowledgeToChat(chatId, input.collectionId);
    } catch (err) {
      log.warn(`createChat: linking knowledge to ${chatId} failed:`, err instanceof Error ? err.message : String(err));
    }

    if (input.variant === '3A') {
      try {
        await this.completeChat(chatId, userMsgId, input.sessionId, input.prefill);
      } catch (err) {
        log.warn(`createChat: completion for ${chatId} failed:`, err instanceof Error ? err.message : String(err));
      }
    }

    return chatId;
  }

  async downloadChatExport(chatId: string, destination: string): Promise<string> {
    const payload = await this.request(`/api/v1/chats/${chatId}`);
    await writeFile(destination, JSON.stringify([payload], null, 2), 'utf-8');
    return destination;
  }

  private async fetchChat(chatId: string): Promise<JsonRecord> {
    const payload = await this.request(`/api/v1/chats/${chatId}`);
    if (isRecord(payload) && isRecord(payload.chat)) return payload.chat;
    if (isRecord(payload)) return payload;
    throw new UploadError('unexpected chat payload structure');
  }

  private async saveChat(chatId: string, chat: JsonRecord): Promise<void> {
    await this.request(`/api/v1/chats/${chatId}`, { method: 'POST', json: { chat } });
  }

  async linkKnowledgeToChat(chatId: string, knowledgeId: string): Promise<void> {
    const chat = await this.fetchChat(chatId);
    const entry: JsonRecord = { id: knowledgeId, type: 'collection' };

    const knowledgeIds = Array.isArray(chat.knowledge_ids)
      ? chat.knowledge_ids.filter((value) => value !== null && value !== undefined && value !== '').map(String)
      : [];
    if (!knowledgeIds.includes(knowledgeId)) knowledgeIds.push(knowledgeId);
    chat.knowledge_ids = knowledgeIds;
    chat.files = mergeEntries(chat.files, entry);

    const messages = Array.isArray(chat.messages) ? chat.messages : [];
    const firstUser = messages.find((message): message is JsonRecord => isRecord(message) && message.role === 'user');
    if (firstUser) {
      firstUser.files = mergeEntries(firstUser.files, entry);
      const metadata = ensureRecord(firstUser, 'metadata');
      if (!Object.hasOwn(metadata, 'collection_id')) metadata.collection_id = knowledgeId;
    }

    await this.saveChat(chatId, chat);
  }

  /** Asks the server to answer the prefill, then stores the reply on the chat. */
  private async completeChat(chatId: string, userMsgId: string, sessionId: string, userMessage: string): Promise<void> {
    const model = this.settings.model;
    const chat = await this.fetchChat(chatId);
    const assistantMsgId = hexId();
    const timestamp = Math.floor(Date.now() / 1000);

    const placeholder: JsonRecord = {
      id: assistantMsgId,
      role: 'assistant',
      content: '',
      parentId: userMsgId,
      model,
      modelName: model,
      modelIdx: 0,
      timestamp,
      done: false,
      statusHistory: [],
      childrenIds: [],
    };

    const messages = ensureArray(chat, 'messages');
    messages.push({ ...placeholder });
    const parent = messages.find((message): message is JsonRecord => isRecord(message) && message.id === userMsgId);
    if (parent) ensureArray(parent, 'childrenIds').push(assistantMsgId);

    const history = ensureRecord(chat, 'history');
    const historyMessages = ensureRecord(history, 'messages');
    historyMessages[assistantMsgId] = { ...placeholder };
    const historyParent = historyMessages[userMsgId];
    if (isRecord(historyParent)) ensureArray(historyParent, 'childrenIds').push(assistantMsgId);
    history.current_id = assistantMsgId;
    history.currentId = assistantMsgId;
    chat.currentId = assistantMsgId;
    await this.saveChat(chatId, chat);

    const conversation: Array<{ role: string; content: string }> = [];
    for (const message of messages) {
      if (!isRecord(message)) continue;
      const role = str(message.role);
      const content = message.content;
      if (role !== 'user' && role !== 'assistant') continue;
      if (typeof content !== 'string' || (role === 'assistant' && !content)) continue;
      conversation.push({ role, content });
    }
    if (conversation.length === 0) conversation.push({ role: 'user', content: userMessage });

    const completion = await this.request('/api/chat/completions', {
      method: 'POST',
      timeoutMs: COMPLETION_TIMEOUT_MS,
      json: {
        chat_id: chatId,
        id: assistantMsgId,
        messages: conversation,
        model,
        stream: false,
        background_tasks: { title_generation: false, tags_generation: false, follow_up_generation: false },
        features: { code_interpreter: false, web_search: false, image_generation: false, memory: false },
        variables: {
          '{{USER_NAME}}': '',
          '{{USER_LANGUAGE}}': 'en-US',
          '{{CURRENT_DATETIME}}': new Date().toISOString(),
          '{{CURRENT_TIMEZONE}}': 'UTC',
        },
        session_id: sessionId,
      },
    });

    const completionRecord = isRecord(completion) ? completion : {};
    const taskId = extractFirstId(completionRecord.task_id ?? completionRecord.id);
    if (taskId) await this.waitForCompletion(chatId, taskId);

    const refreshed = await this.fetchChat(chatId);
    const assistantText =
      extractAssistantText(completionRecord) ||
      extractAssistantFromChat(refreshed, assistantMsgId) ||
      extractAssistantFromHistory(refreshed, assistantMsgId);

    if (assistantText) {
      const text = assistantText.endsWith('\n') ? assistantText : `${assistantText}\n`;
      await this.storeAssistantMessage(chatId, refreshed, assistantMsgId, text);
    }

    await this.request('/api/chat/completed', {
      method: 'POST',
      json: { chat_id: chatId, id: assistantMsgId, session_id: sessionId, model },
    });
  }

  private async storeAssistantMessage(chatId: string, chat: JsonRecord, assistantMsgId: string, text: string): Promise<void> {
    const messages = ensureArray(chat, 'messages');
    const existing = messages.find((message): message is JsonRecord => isRecord(message) && message.id === assistantMsgId);
    if (existing) {
      existing.content = text;
      existing.done = true;
    } else {
      messages.push({
        id: assistantMsgId,
        role: 'assistant',
        content: text,
        done: true,
        statusHistory: [],
        timestamp: Math.floor(Date.now() / 1000),
        parentId: null,
      });
    }

    const history = ensureRecord(chat, 'history');
    const historyMessages = ensureRecord(history, 'messages');
    const entry = ensureRecord(historyMessages, assistantMsgId);
    Object.assign(entry, {
      id: assistantMsgId,
      role: 'assistant',
      content: text,
      done: true,
      model: this.settings.model,
      modelName: this.settings.model,
    });
    if (!Array.isArray(entry.statusHistory)) entry.statusHistory = [];
    history.current_id = assistantMsgId;
    history.currentId = assistantMsgId;
    chat.currentId = assistantMsgId;

    await this.saveChat(chatId, chat);
  }

  private async waitForCompletion(chatId: string, taskId: string): Promise<void> {
    const deadline = Date.now() + this.completionTimeoutMs;
    while (Date.now() < deadline) {
      const payload = await this.request(`/api/tasks/chat/${chatId}`);
      const ids = isRecord(payload) && Array.isArray(payload.task_ids) ? payload.task_ids.map(String) : [];
      if (!ids.includes(taskId)) return;
      await this.sleep(TASK_POLL_INTERVAL_MS);
    }
    throw new UploadError('completion task did not finish in time');
  }
}

export function extractAssistantText(payload: JsonRecord): string {
  const choices = payload.choices;
  if (Array.isArray(choices)) {
    const parts: string[] = [];
    for (const choice of choices) {
      if (!isRecord(choice)) continue;
      if (isRecord(choice.message)) parts.push(str(choice.message.content));
      if (isRecord(choice.delta)) parts.push(str(choice.delta.content));
      parts.push(str(choice.content));
    }
    const joined = parts.join('').trim();
    if (joined) return joined;
  }
  if (isRecord(payload.message)) {
    const content = str(payload.message.content).trim();
    if (content) return content;
  }
  if (isRecord(payload.data)) {
    const content = str(payload.data.content).trim();
    if (content) return content;
  }
  return '';
}

function extractAssistantFromChat(chat: JsonRecord, assistantMsgId: string): string {
  const messages = Array.isArray(chat.messages) ? chat.messages.filter(isRecord) : [];
  const exact = messages.find((message) => message.id === assistantMsgId);
  const exactText = exact ? str(exact.content).trim() : '';
  if (exactText) return exactText;
  for (const message of [...messages].reverse()) {
    if (message.role !== 'assistant') continue;
    const content = str(message.content).trim();
    if (content) return content;
  }
  return '';
}

function extractAssistantFromHistory(chat: JsonRecord, assistantMsgId: string): string {
  const history = isRecord(chat.history) ? chat.history : {};
  const messages = isRecord(history.messages) ? history.messages : {};
  const entry = messages[assistantMsgId];
  return isRecord(entry) ? str(entry.content).trim() : '';
}
