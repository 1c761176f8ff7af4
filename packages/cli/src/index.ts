export { createProgram } from './program.js';
export { createFormatter, isOutputFormat, OUTPUT_FORMATS } from './formatters/index.js';
export type { OutputFormat, OutputFormatter } from './formatters/index.js';
