// Domain types
export type { RawRecord, RecordOrigin, SourcedRecord, Event } from './domain/event/event.js';
export { parseTimestamp, epochOrigin } from './domain/event/timestamp.js';
export { normalizeEvent, normaliseStatus, deriveStatus } from './domain/event/normalize.js';
export { EventGroup } from './domain/group/event-group.js';

export type { ArtifactRecord, Manifest, DistillStrategy, DistillationResult } from './domain/artifact/artifact-record.js';
export { manifestSchema, artifactRecordSchema, DISTILL_STRATEGIES, isDistillStrategy } from './domain/artifact/artifact-record.js';
export { splitFrontMatter } from './domain/artifact/render.js';

export { buildPrefill, buildChatTitle } from './domain/chat/prefill.js';

export type { Settings } from './domain/settings/settings.js';
export { authHeaders, DEFAULT_MODEL, DEFAULT_PROJECT, DEFAULT_SESSIONS_DIR } from './domain/settings/settings.js';

// Port interfaces
export type { ManifestRepository } from './ports/manifest-repository.js';
export type { KnowledgeGateway, ChatVariant, CreateChatInput, PollOptions } from './ports/knowledge-gateway.js';
export { CHAT_VARIANTS, isChatVariant } from './ports/knowledge-gateway.js';

// Adapters
export { findEventSources, loadRawRecords } from './adapters/event-source-loader.js';
export { JsonManifestRepository, MANIFEST_FILENAME } from './adapters/json-manifest-repository.js';
export { IngestLog, INGEST_LOG_FILENAME } from './adapters/ingest-log.js';
export { DryRunGateway } from './adapters/dry-run-gateway.js';
export { OpenWebUIGateway } from './adapters/openwebui-gateway.js';
export type { OpenWebUIGatewayOptions } from './adapters/openwebui-gateway.js';
export { createGateway } from './adapters/create-gateway.js';

// Application services
export { groupEvents, loadEventGroups } from './services/grouper.js';
export { distillSession } from './services/distill-service.js';
export type { DistillInput } from './services/distill-service.js';
export { extractSession } from './services/extract-service.js';
export type { ExtractInput, ExtractionResult } from './services/extract-service.js';
export { packageArtifacts } from './services/package-service.js';
export type { PackageResult } from './services/package-service.js';
export { uploadArtifacts, buildCollectionName } from './services/upload-service.js';
export type { UploadInput, UploadResult } from './services/upload-service.js';
export { createChat } from './services/chat-service.js';
export type { ChatInput, ChatResult } from './services/chat-service.js';
export { loadSettings, expandHome } from './services/config-service.js';
export type { Env } from './services/config-service.js';

// Shared
export { createLogger, setLogLevel, getLogLevel } from './shared/logger.js';
export type { Logger, LogLevel } from './shared/logger.js';
export {
  SessionDistillError,
  GroupingError,
  DistillationError,
  ExtractionError,
  PackageError,
  UploadError,
  ConfigError,
} from './shared/errors.js';
export { VERSION } from './shared/version.js';
