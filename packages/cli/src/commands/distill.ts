import { Option, type Command } from 'commander';
import { DISTILL_STRATEGIES, distillSession, isDistillStrategy } from '@sessiondistill/core';
import { runAction } from './context.js';

interface DistillOptions {
  session: string;
  raw: string;
  dst: string;
  mode?: string;
}

export function registerDistillCommand(program: Command): void {
  program
    .command('distill')
    .description('Render Markdown artifacts and run.json from raw session events')
    .requiredOption('--session <id>', 'Session id')
    .requiredOption('--raw <dir>', 'Directory holding the raw events')
    .requiredOption('--dst <dir>', 'Artifacts directory')
    .addOption(
      new Option('--mode <strategy>', 'Rendering strategy (defaults to SESSIONDISTILL_DISTILL_MODE)').choices(
        DISTILL_STRATEGIES,
      ),
    )
    .action(async (opts: DistillOptions, command: Command) => {
      await runAction(command, async ({ settings, formatter }) => {
        const result = await distillSession({
          sessionId: opts.session,
          rawRoot: opts.raw,
          artifactsRoot: opts.dst,
          settings,
          strategy: opts.mode && isDistillStrategy(opts.mode) ? opts.mode : undefined,
        });
        formatter.renderResult('distill', result);
      });
    });
}
