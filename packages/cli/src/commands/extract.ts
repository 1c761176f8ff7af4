import type { Command } from 'commander';
import { extractSession } from '@sessiondistill/core';
import { runAction } from './context.js';

interface ExtractOptions {
  session: string;
  dst: string;
  src?: string;
  overwrite: boolean;
}

export function registerExtractCommand(program: Command): void {
  program
    .command('extract')
    .description('Copy a stored session into a working directory')
    .requiredOption('--session <id>', 'Session id')
    .requiredOption('--dst <dir>', 'Destination directory')
    .option('--src <dir>', 'Sessions root (defaults to SESSIONDISTILL_SESSIONS_DIR)')
    .option('--overwrite', 'Replace an existing destination', false)
    .action(async (opts: ExtractOptions, command: Command) => {
      await runAction(command, async ({ settings, formatter }) => {
        const result = await extractSession({
          sessionId: opts.session,
          sourceRoot: opts.src ?? settings.sessionsDir,
          destination: opts.dst,
          overwrite: opts.overwrite,
        });
        formatter.renderResult('extract', result);
      });
    });
}
