export type OutputFormat = 'json' | 'plain';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'plain'];

export interface OutputFormatter {
  renderResult(command: string, result: object): void;
  renderError(error: string): void;
}
