import { Option, type Command } from 'commander';
import { CHAT_VARIANTS, createChat } from '@sessiondistill/core';
import { runAction } from './context.js';

interface ChatOptions {
  session: string;
  artifacts: string;
  collection: string;
  collectionName?: string;
  variant: string;
  status: string;
}

export function registerChatCommand(program: Command): void {
  program
    .command('chat')
    .description('Open a chat bound to an uploaded knowledge collection')
    .requiredOption('--session <id>', 'Session id')
    .requiredOption('--artifacts <dir>', 'Artifacts directory holding run.json')
    .requiredOption('--collection <id>', 'Knowledge collection id')
    .option('--collection-name <name>', 'Collection name (looked up when omitted)')
    .addOption(new Option('--variant <variant>', '3A asks for a completion, 3B only prefills').choices(CHAT_VARIANTS).default('3A'))
    .option('--status <status>', 'Status shown in the chat title', 'ready')
    .action(async (opts: ChatOptions, command: Command) => {
      await runAction(command, async ({ settings, formatter }) => {
        const result = await createChat({
          sessionId: opts.session,
          artifactsDir: opts.artifacts,
          collectionId: opts.collection,
          collectionName: opts.collectionName,
          variant: opts.variant,
          status: opts.status,
          settings,
        });
        formatter.renderResult('chat', result);
      });
    });
}
