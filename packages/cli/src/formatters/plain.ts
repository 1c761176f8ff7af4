import type { OutputFormatter } from './formatter.js';

export function formatValue(value: unknown): string {
  if (value === null || value === undefined) return '-';
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.length === 0 ? '-' : value.map(formatValue).join(', ');
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

export class PlainFormatter implements OutputFormatter {
  renderResult(command: string, result: object): void {
    const entries = Object.entries(result);
    const width = Math.max(0, ...entries.map(([key]) => key.length));
    console.log(`${command}:`);
    for (const [key, value] of entries) {
      console.log(`  ${`${key}:`.padEnd(width + 2)}${formatValue(value)}`);
    }
  }

  renderError(error: string): void {
    console.error(`Error: ${error}`);
  }
}
