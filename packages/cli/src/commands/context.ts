import type { Command } from 'commander';
import { SessionDistillError, createLogger, loadSettings, setLogLevel, type Settings } from '@sessiondistill/core';
import { createFormatter, isOutputFormat, type OutputFormatter } from '../formatters/index.js';

const log = createLogger('cli');

export interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
  format?: string;
}

export interface CommandContext {
  settings: Settings;
  formatter: OutputFormatter;
}

/**
 * Applies the global flags, loads settings and runs `body`. Any failure is
 * printed through the selected formatter and the process exits with 1.
 */
export async function runAction(command: Command, body: (ctx: CommandContext) => Promise<void>): Promise<void> {
  const globals = command.optsWithGlobals<GlobalOptions>();
  if (globals.verbose) setLogLevel('debug');
  if (globals.quiet) setLogLevel('error');
  const formatter = createFormatter(globals.format && isOutputFormat(globals.format) ? globals.format : 'json');

  try {
    await body({ settings: loadSettings(), formatter });
  } catch (err) {
    if (!(err instanceof SessionDistillError)) {
      log.debug(`${command.name()} failed:`, err instanceof Error ? (err.stack ?? err.message) : String(err));
    }
    formatter.renderError(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}
