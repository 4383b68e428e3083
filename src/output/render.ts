import type { OutputConfig } from '../config/schema.js';
import type { AggregateResponse } from '../pipeline/types.js';
import { JsonGenerator } from './json.js';
import { MarkdownGenerator } from './markdown.js';

export function renderResponse(response: AggregateResponse, output: OutputConfig): string {
  if (output.format === 'markdown') {
    return new MarkdownGenerator(output).generate(response);
  }
  return new JsonGenerator().generate(response, { verbose: output.verbose });
}
