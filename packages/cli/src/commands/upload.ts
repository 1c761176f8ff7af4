import { Option, type Command } from 'commander';
import { CHAT_VARIANTS, uploadArtifacts } from '@sessiondistill/core';
import { runAction } from './context.js';

interface UploadOptions {
  session: string;
  artifacts: string;
  variant: string;
}

export function registerUploadCommand(program: Command): void {
  program
    .command('upload')
    .description('Upload artifacts and gather them into a knowledge collection')
    .requiredOption('--session <id>', 'Session id')
    .requiredOption('--artifacts <dir>', 'Artifacts directory holding run.json')
    .addOption(new Option('--variant <variant>', 'Chat variant recorded with the upload').choices(CHAT_VARIANTS).default('3A'))
    .action(async (opts: UploadOptions, command: Command) => {
      await runAction(command, async ({ settings, formatter }) => {
        const result = await uploadArtifacts({
          sessionId: opts.session,
          artifactsDir: opts.artifacts,
          settings,
          variant: opts.variant,
        });
        formatter.renderResult('upload', result);
      });
    });
}
