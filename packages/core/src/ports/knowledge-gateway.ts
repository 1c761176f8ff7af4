export type ChatVariant = '3A' | '3B';

export const CHAT_VARIANTS: readonly ChatVariant[] = ['3A', '3B'];

export function isChatVariant(value: string): value is ChatVariant {
  return CHAT_VARIANTS.some((variant) => variant === value);
}

export interface PollOptions {
  retries?: number;
  delayMs?: number;
}

export interface CreateChatInput {
  collectionId: string;
  collectionName?: string | null;
  title: string;
  variant: ChatVariant;
  prefill: string;
  sessionId: string;
}

/** The remote knowledge-base and chat API the artifacts are published to. */
export interface KnowledgeGateway {
  readonly dryRun: boolean;
  uploadMarkdown(filePath: string): Promise<string>;
  /** Resolves with the terminal processing state of an uploaded file. */
  pollFile(fileId: string, options?: PollOptions): Promise<string>;
  createCollection(name: string, description: string): Promise<string>;
  attachFile(collectionId: string, fileId: string): Promise<void>;
  resolveCollectionName(collectionId: string): Promise<string | null>;
  createChat(input: CreateChatInput): Promise<string>;
  downloadChatExport(chatId: string, destination: string): Promise<string>;
}

export const PROCESSED_STATES: ReadonlySet<string> = new Set(['processed', 'ready', 'completed', 'success']);
