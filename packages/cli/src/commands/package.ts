import type { Command } from 'commander';
import { packageArtifacts } from '@sessiondistill/core';
import { runAction } from './context.js';

interface PackageOptions {
  artifacts: string;
  output?: string;
}

export function registerPackageCommand(program: Command): void {
  program
    .command('package')
    .description('Bundle an artifacts directory into a gzipped tarball')
    .requiredOption('--artifacts <dir>', 'Artifacts directory')
    .option('--output <file>', 'Tarball path (defaults to <artifacts>/artifacts.tar.gz)')
    .action(async (opts: PackageOptions, command: Command) => {
      await runAction(command, async ({ formatter }) => {
        formatter.renderResult('package', await packageArtifacts(opts.artifacts, opts.output));
      });
    });
}
