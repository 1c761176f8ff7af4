import { Command, Option } from 'commander';
import { registerChatCommand } from './commands/chat.js';
import { registerConfigCommand } from './commands/config.js';
import { registerDistillCommand } from './commands/distill.js';
import { registerExtractCommand } from './commands/extract.js';
import { registerPackageCommand } from './commands/package.js';
import { registerShowCommand } from './commands/show.js';
import { registerUploadCommand } from './commands/upload.js';
import { OUTPUT_FORMATS } from './formatters/index.js';

export function createProgram(version: string): Command {
  const program = new Command();

  program
    .name('sessiondistill')
    .description('Distil agent session logs into Markdown knowledge artifacts')
    .version(version)
    .option('--verbose', 'Enable debug logging')
    .option('--quiet', 'Only log errors')
    .addOption(new Option('--format <type>', 'Output format').choices(OUTPUT_FORMATS).default('json'));

  registerExtractCommand(program);
  registerDistillCommand(program);
  registerPackageCommand(program);
  registerUploadCommand(program);
  registerChatCommand(program);
  registerShowCommand(program);
  registerConfigCommand(program);
  return program;
}
