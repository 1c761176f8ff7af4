import { OUTPUT_FORMATS, type OutputFormat, type OutputFormatter } from './formatter.js';
import { JsonFormatter } from './json.js';
import { PlainFormatter } from './plain.js';

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export function createFormatter(format: OutputFormat): OutputFormatter {
  return format === 'plain' ? new PlainFormatter() : new JsonFormatter();
}

export { OUTPUT_FORMATS };
export type { OutputFormat, OutputFormatter };
