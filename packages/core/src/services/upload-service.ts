import { randomBytes } from 'node:crypto';
import { access } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { createGateway } from '../adapters/create-gateway.js';
import { IngestLog } from '../adapters/ingest-log.js';
import { JsonManifestRepository } from '../adapters/json-manifest-repository.js';
import type { Settings } from '../domain/settings/settings.js';
import {
  PROCESSED_STATES,
  isChatVariant,
  type ChatVariant,
  type KnowledgeGateway,
  type PollOptions,
} from '../ports/knowledge-gateway.js';
import { UploadError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('upload-service');

export interface UploadInput {
  sessionId: string;
  artifactsDir: string;
  settings: Settings;
  variant?: string;
  gateway?: KnowledgeGateway;
  poll?: PollOptions;
  now?: Date;
}

export interface UploadResult {
  sessionId: string;
  collectionId: string;
  collectionName: string;
  fileIds: string[];
  variant: ChatVariant;
  dryRun: boolean;
}

/** `sd:<project>:<session>:<YYYYMMDD>-<6 hex>` */
export function buildCollectionName(project: string, sessionId: string, now: Date = new Date()): string {
  const day = now.toISOString().slice(0, 10).replaceAll('-', '');
  const suffix = randomBytes(3).toString('hex');
  return `sd:${project}:${sessionId}:${day}-${suffix}`;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export async function uploadArtifacts(input: UploadInput): Promise<UploadResult> {
  const variant = input.variant ?? '3A';
  if (!isChatVariant(variant)) {
    throw new UploadError(`unsupported variant '${variant}'; expected 3A or 3B`);
  }

  const artifactsDir = resolve(input.artifactsDir);
  const manifest = await new JsonManifestRepository(artifactsDir).load();
  if (manifest.artifacts.length === 0) {
    throw new UploadError(`no artifacts listed in the manifest for session ${input.sessionId}`);
  }

  const gateway = input.gateway ?? createGateway(input.settings);
  const ingestLog = new IngestLog(artifactsDir);
  log.info(`uploadArtifacts: ${manifest.artifacts.length} artifact(s) for ${input.sessionId} (dryRun=${gateway.dryRun})`);

  const fileIds: string[] = [];
  for (const entry of manifest.artifacts) {
    const artifactPath = join(artifactsDir, entry.filename);
    if (!(await fileExists(artifactPath))) {
      throw new UploadError(`artifact ${entry.filename} listed in manifest is missing on disk`);
    }

    const fileId = await gateway.uploadMarkdown(artifactPath);
    await ingestLog.append(`upload requested file=${entry.filename} id=${fileId}`);

    const state = await gateway.pollFile(fileId, input.poll);
    if (!PROCESSED_STATES.has(state)) {
      throw new UploadError(`file ${entry.filename} finished processing with status '${state}'`);
    }
    await ingestLog.append(`upload processed file=${entry.filename} id=${fileId}`);
    fileIds.push(fileId);
  }

  const collectionName = buildCollectionName(input.settings.project, input.sessionId, input.now);
  const collectionId = await gateway.createCollection(
    collectionName,
    `Artifacts for session ${input.sessionId} (${input.settings.project})`,
  );
  await ingestLog.append(`collection ready id=${collectionId} name=${collectionName}`);

  for (const fileId of fileIds) {
    await gateway.attachFile(collectionId, fileId);
    await ingestLog.append(`collection attach id=${collectionId} file=${fileId}`);
  }

  return {
    sessionId: input.sessionId,
    collectionId,
    collectionName,
    fileIds,
    variant,
    dryRun: gateway.dryRun,
  };
}
