import { randomBytes } from 'node:crypto';
import type { CreateChatInput, KnowledgeGateway } from '../ports/knowledge-gateway.js';
import { UploadError } from '../shared/errors.js';

function hex(length: number): string {
  return randomBytes(Math.ceil(length / 2)).toString('hex').slice(0, length);
}

/** Stands in for the remote API when it is not configured; mints placeholder ids. */
export class DryRunGateway implements KnowledgeGateway {
  readonly dryRun = true;

  async uploadMarkdown(_filePath: string): Promise<string> {
    return `dry-file-${hex(8)}`;
  }

  async pollFile(_fileId: string): Promise<string> {
    return 'processed';
  }

  async createCollection(_name: string, _description: string): Promise<string> {
    return `dry-collection-${hex(6)}`;
  }

  async attachFile(_collectionId: string, _fileId: string): Promise<void> {}

  async resolveCollectionName(_collectionId: string): Promise<string | null> {
    return null;
  }

  async createChat(_input: CreateChatInput): Promise<string> {
    return `dry-chat-${hex(6)}`;
  }

  async downloadChatExport(chatId: string, _destination: string): Promise<string> {
    throw new UploadError(`chat export for ${chatId} is unavailable in dry-run mode`);
  }
}
