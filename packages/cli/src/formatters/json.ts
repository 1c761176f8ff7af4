import type { OutputFormatter } from './formatter.js';

export class JsonFormatter implements OutputFormatter {
  renderResult(_command: string, result: object): void {
    console.log(JSON.stringify(result, null, 2));
  }

  renderError(error: string): void {
    console.error(JSON.stringify({ error }));
  }
}
