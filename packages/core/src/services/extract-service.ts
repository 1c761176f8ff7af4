import { access, cp, mkdir, rm } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { ExtractionError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { expandHome } from './config-service.js';

const log = createLogger('extract-service');

export interface ExtractInput {
  sessionId: string;
  sourceRoot: string;
  destination: string;
  overwrite?: boolean;
}

export interface ExtractionResult {
  sessionId: string;
  source: string;
  destination: string;
  copied: boolean;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/** Copies a stored session into a working directory. Re-runs reuse the copy unless `overwrite` is set. */
export async function extractSession(input: ExtractInput): Promise<ExtractionResult> {
  const source = resolve(expandHome(join(input.sourceRoot, input.sessionId)));
  const destination = resolve(expandHome(input.destination));

  if (!(await exists(source))) {
    throw new ExtractionError(`session '${input.sessionId}' not found under ${input.sourceRoot}`);
  }
  await mkdir(dirname(destination), { recursive: true });

  if (await exists(destination)) {
    if (!input.overwrite) {
      log.info(`extractSession: reusing ${destination}`);
      return { sessionId: input.sessionId, source, destination, copied: false };
    }
    await rm(destination, { recursive: true, force: true });
  }

  await cp(source, destination, { recursive: true, errorOnExist: true, force: false });
  log.info(`extractSession: copied ${source} -> ${destination}`);
  return { sessionId: input.sessionId, source, destination, copied: true };
}
