import { basename, join, resolve } from 'node:path';
import { createGateway } from '../adapters/create-gateway.js';
import { IngestLog } from '../adapters/ingest-log.js';
import { JsonManifestRepository } from '../adapters/json-manifest-repository.js';
import { buildChatTitle, buildPrefill } from '../domain/chat/prefill.js';
import type { Settings } from '../domain/settings/settings.js';
import { isChatVariant, type ChatVariant, type KnowledgeGateway } from '../ports/knowledge-gateway.js';
import { UploadError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('chat-service');

export interface ChatInput {
  sessionId: string;
  artifactsDir: string;
  collectionId: string;
  collectionName?: string | null;
  variant?: string;
  status?: string;
  settings: Settings;
  gateway?: KnowledgeGateway;
  now?: Date;
}

export interface ChatResult {
  chatId: string;
  title: string;
  variant: ChatVariant;
  dryRun: boolean;
  exportPath: string | null;
}

/**
 * Opens a chat seeded with the artifact list and bound to the knowledge
 * collection. Variant 3A also asks the server for a first answer.
 */
export async function createChat(input: ChatInput): Promise<ChatResult> {
  const variant = input.variant ?? '3A';
  if (!isChatVariant(variant)) {
    throw new UploadError('chat variant must be 3A or 3B');
  }

  const artifactsDir = resolve(input.artifactsDir);
  const manifest = await new JsonManifestRepository(artifactsDir).load();
  const ingestLog = new IngestLog(artifactsDir);
  const { settings } = input;

  const title = buildChatTitle({
    project: settings.project,
    branch: settings.branch,
    sessionId: input.sessionId,
    status: input.status ?? 'ready',
    now: input.now,
  });
  const prefill = buildPrefill(manifest.artifacts, variant);

  const gateway = input.gateway ?? createGateway(settings);
  const collectionName = input.collectionName || (await gateway.resolveCollectionName(input.collectionId));

  const chatId = await gateway.createChat({
    collectionId: input.collectionId,
    collectionName,
    title,
    variant,
    prefill,
    sessionId: input.sessionId,
  });
  log.info(`createChat: ${chatId} for ${input.sessionId} (variant=${variant}, dryRun=${gateway.dryRun})`);
  await ingestLog.append(`chat created id=${chatId} variant=${variant}`);
  if (variant === '3A' && !gateway.dryRun) {
    await ingestLog.append(`chat completion triggered id=${chatId}`);
  }

  let exportPath: string | null = null;
  if (settings.captureChatExport && !gateway.dryRun) {
    try {
      exportPath = await gateway.downloadChatExport(chatId, join(artifactsDir, `chat-export-${chatId}.json`));
      await ingestLog.append(`chat export saved id=${chatId} path=${basename(exportPath)}`);
    } catch (err) {
      if (!(err instanceof UploadError)) throw err;
      log.warn(`createChat: export of ${chatId} failed:`, err.message);
      await ingestLog.append(`chat export failed id=${chatId} detail=${err.message}`);
    }
  }

  return { chatId, title, variant, dryRun: gateway.dryRun, exportPath };
}
