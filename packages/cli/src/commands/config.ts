import type { Command } from 'commander';
import type { Settings } from '@sessiondistill/core';
import { runAction } from './context.js';

export function maskToken(token: string | null): string {
  return token ? '***' + token.slice(-4) : '(not set)';
}

export function describeSettings(settings: Settings): Record<string, unknown> {
  return {
    baseUrl: settings.baseUrl ?? '(not set)',
    apiToken: maskToken(settings.apiToken),
    sessionsDir: settings.sessionsDir,
    project: settings.project,
    branch: settings.branch,
    model: settings.model,
    dryRun: settings.dryRun,
    debug: settings.debug,
    captureChatExport: settings.captureChatExport,
    distillMode: settings.distillMode,
    version: settings.version,
  };
}

export function registerConfigCommand(program: Command): void {
  program
    .command('config')
    .description('Show the resolved configuration')
    .action(async (_opts: object, command: Command) => {
      await runAction(command, async ({ settings, formatter }) => {
        formatter.renderResult('config', describeSettings(settings));
      });
    });
}
