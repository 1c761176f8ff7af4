import { readFile } from 'node:fs/promises';
import type { Command } from 'commander';
import { marked } from 'marked';
import { markedTerminal } from 'marked-terminal';
import { splitFrontMatter } from '@sessiondistill/core';
import { formatValue } from '../formatters/plain.js';
import { runAction } from './context.js';

marked.use(markedTerminal());

/** `key: value` per front-matter field, in file order. */
export function summariseFrontMatter(frontMatter: Record<string, unknown>): string[] {
  return Object.entries(frontMatter).map(([key, value]) => `${key}: ${formatValue(value)}`);
}

export async function renderArtifact(text: string): Promise<string> {
  const { frontMatter, body } = splitFrontMatter(text);
  const header = summariseFrontMatter(frontMatter);
  const rendered = (await marked.parse(body)).trimEnd();
  return header.length > 0 ? `${header.join('\n')}\n\n${rendered}` : rendered;
}

export function registerShowCommand(program: Command): void {
  program
    .command('show')
    .description('Render an artifact in the terminal')
    .argument('<artifact>', 'Path to an artifact Markdown file')
    .action(async (artifact: string, _opts: object, command: Command) => {
      await runAction(command, async () => {
        console.log(await renderArtifact(await readFile(artifact, 'utf-8')));
      });
    });
}
