import { mkdir, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { IngestLog } from '../adapters/ingest-log.js';
import { JsonManifestRepository } from '../adapters/json-manifest-repository.js';
import type {
  ArtifactRecord,
  DistillStrategy,
  DistillationResult,
  Manifest,
} from '../domain/artifact/artifact-record.js';
import {
  EMPTY_BODY,
  artifactFilename,
  isBootstrapStep,
  normaliseForHash,
  renderFrontMatter,
  renderGroupBody,
  renderTranscript,
  sha256,
  shortHash,
  transcriptFilename,
} from '../domain/artifact/render.js';
import type { EventGroup } from '../domain/group/event-group.js';
import type { Settings } from '../domain/settings/settings.js';
import { DistillationError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { loadEventGroups } from './grouper.js';

const log = createLogger('distill-service');

export interface DistillInput {
  sessionId: string;
  rawRoot: string;
  artifactsRoot: string;
  settings: Settings;
  /** Defaults to `settings.distillMode`. */
  strategy?: DistillStrategy;
}

interface RenderContext {
  sessionId: string;
  settings: Settings;
  artifactsDir: string;
  ingestLog: IngestLog;
}

interface RenderOutcome {
  artifacts: ArtifactRecord[];
  deduplicated: number;
}

async function renderPerStep(ctx: RenderContext, groups: readonly EventGroup[]): Promise<RenderOutcome> {
  const artifacts: ArtifactRecord[] = [];
  const seen = new Set<string>();
  let deduplicated = 0;

  for (const group of groups) {
    const body = renderGroupBody(group.events);
    const digest = sha256(normaliseForHash(body));
    const hash8 = shortHash(digest);

    if (seen.has(digest)) {
      deduplicated++;
      await ctx.ingestLog.append(`skip step=${group.step} reason=duplicate hash=${hash8}`);
      continue;
    }
    seen.add(digest);

    const frontMatter: Record<string, unknown> = {
      project: ctx.settings.project,
      session: ctx.sessionId,
      step: group.step,
      generated: new Date().toISOString(),
      opened: group.startedAt.toISOString(),
      closed: group.completedAt.toISOString(),
      status: group.status,
      hash: digest,
    };
    if (ctx.settings.branch) frontMatter.branch = ctx.settings.branch;
    if (group.cwd) frontMatter.cwd = group.cwd;
    const tags = group.tags;
    if (tags.length > 0) frontMatter.tags = tags;

    const filename = artifactFilename(group, hash8);
    await writeFile(
      join(ctx.artifactsDir, filename),
      renderFrontMatter(frontMatter) + (body || EMPTY_BODY) + '\n',
      'utf-8',
    );
    artifacts.push({ filename, step: group.step, status: group.status, hash: digest });
    await ctx.ingestLog.append(`write artifact=${filename} hash=${hash8}`);
  }

  if (artifacts.length === 0) {
    throw new DistillationError('all groups were deduplicated; no artifacts emitted');
  }
  return { artifacts, deduplicated };
}

async function renderTranscriptArtifact(
  ctx: RenderContext,
  groups: readonly EventGroup[],
): Promise<RenderOutcome> {
  const retained = groups.filter((group) => !isBootstrapStep(group.step));
  const document = renderTranscript(ctx.sessionId, retained);
  const digest = sha256(document);
  const hash8 = shortHash(digest);

  const timestamps = retained.flatMap((group) => group.events.map((event) => event.timestamp.getTime()));
  const eventCount = retained.reduce((sum, group) => sum + group.events.length, 0);
  let status: string | null = null;
  for (const group of retained) status = group.status ?? status;

  const frontMatter: Record<string, unknown> = {
    project: ctx.settings.project,
    session: ctx.sessionId,
    generated: new Date().toISOString(),
    events: eventCount,
    first_event: timestamps.length > 0 ? new Date(Math.min(...timestamps)).toISOString() : null,
    last_event: timestamps.length > 0 ? new Date(Math.max(...timestamps)).toISOString() : null,
    hash: digest,
  };
  if (ctx.settings.branch) frontMatter.branch = ctx.settings.branch;

  const filename = transcriptFilename(hash8);
  await writeFile(join(ctx.artifactsDir, filename), renderFrontMatter(frontMatter) + document, 'utf-8');
  await ctx.ingestLog.append(`write artifact=${filename} hash=${hash8}`);
  log.debug(`renderTranscript: kept ${retained.length} of ${groups.length} step(s)`);

  return { artifacts: [{ filename, step: 'transcript', status, hash: digest }], deduplicated: 0 };
}

/**
 * Turns a raw session into Markdown artifacts, a `run.json` manifest and
 * ingest-log lines. Only one rendering strategy runs per call.
 */
export async function distillSession(input: DistillInput): Promise<DistillationResult> {
  const artifactsDir = resolve(input.artifactsRoot);
  const strategy = input.strategy ?? input.settings.distillMode;
  await mkdir(artifactsDir, { recursive: true });

  const groups = await loadEventGroups(resolve(input.rawRoot));
  if (groups.length === 0) {
    throw new DistillationError('no groups available for distillation');
  }

  const ingestLog = new IngestLog(artifactsDir);
  const ctx: RenderContext = { sessionId: input.sessionId, settings: input.settings, artifactsDir, ingestLog };
  log.info(`distillSession: ${input.sessionId} (${groups.length} step(s), strategy=${strategy})`);

  const { artifacts, deduplicated } =
    strategy === 'transcript' ? await renderTranscriptArtifact(ctx, groups) : await renderPerStep(ctx, groups);

  const manifest: Manifest = {
    session: input.sessionId,
    project: input.settings.project,
    branch: input.settings.branch,
    generated_at: new Date().toISOString(),
    version: input.settings.version,
    artifact_count: artifacts.length,
    artifacts,
  };
  const repository = new JsonManifestRepository(artifactsDir);
  const manifestPath = await repository.save(manifest);
  await ingestLog.append(`manifest updated count=${artifacts.length}`);

  return {
    sessionId: input.sessionId,
    strategy,
    artifacts,
    artifactsDir,
    manifestPath,
    ingestLog: ingestLog.path,
    deduplicated,
  };
}
