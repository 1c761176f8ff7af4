import { appendFile } from 'node:fs/promises';
import { join } from 'node:path';

export const INGEST_LOG_FILENAME = 'ingest.log';

export function formatIngestLine(message: string, now: Date = new Date()): string {
  return `[${now.toISOString()}] ${message}\n`;
}

/** Append-only audit trail shared by distill, upload and chat runs. */
export class IngestLog {
  readonly path: string;

  constructor(artifactsDir: string) {
    this.path = join(artifactsDir, INGEST_LOG_FILENAME);
  }

  async append(message: string): Promise<void> {
    await appendFile(this.path, formatIngestLine(message), 'utf-8');
  }
}
