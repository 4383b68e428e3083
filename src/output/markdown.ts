import type { SearchResult } from '../providers/types.js';
import type { AggregateResponse, ProviderAttempt, QueryOutcome } from '../pipeline/types.js';
import type { OutputConfig } from '../config/schema.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('markdown');

const MAX_DESCRIPTION = 300;

export class MarkdownGenerator {
  constructor(private config: Pick<OutputConfig, 'verbose'>) {}

  generate(response: AggregateResponse): string {
    const { total, successful, failed } = response.summary;
    const header = [
      '# Search results',
      '',
      '> **Summary**',
      `> - **Queries**: ${total}`,
      `> - **Successful**: ${successful}`,
      `> - **Failed**: ${failed}`,
    ].join('\n');

    const sections = response.searches.map((outcome) => this.formatOutcome(outcome));

    logger.debug({ searches: response.searches.length }, 'Markdown generated');
    return `${[header, ...sections].join('\n\n---\n\n')}\n`;
  }

  private formatOutcome(outcome: QueryOutcome): string {
    const lines = [`## ${this.escapeMarkdown(outcome.query)}`, ''];

    if (outcome.error !== undefined) {
      lines.push(`**Error**: ${outcome.error}`);
    } else {
      lines.push(`*Provider: ${outcome.provider ?? 'unknown'}*`);
    }

    if (this.config.verbose && outcome.attempts.length > 0) {
      lines.push('', `*Attempts: ${outcome.attempts.map((a) => this.formatAttempt(a)).join(', ')}*`);
    }

    if (outcome.error === undefined) {
      if (outcome.results.length === 0) {
        lines.push('', '_No results._');
      }
      outcome.results.forEach((result, index) => {
        lines.push('', this.formatResult(result, index + 1));
      });
    }

    return lines.join('\n');
  }

  private formatResult(result: SearchResult, position: number): string {
    const title = this.escapeMarkdown(result.title || result.url);
    const lines = [result.url ? `### ${position}. [${title}](${result.url})` : `### ${position}. ${title}`];

    if (result.description) {
      lines.push('', this.truncate(result.description, MAX_DESCRIPTION));
    }

    const warning = result.metadata['security_warning'];
    if (typeof warning === 'string' && warning !== '') {
      lines.push('', `> **Warning**: ${warning}`);
    }

    return lines.join('\n');
  }

  private formatAttempt(attempt: ProviderAttempt): string {
    const status = attempt.ok ? 'ok' : `failed: ${attempt.error ?? 'unknown error'}`;
    return `${attempt.provider} (${status}, ${attempt.durationMs}ms)`;
  }

  private truncate(text: string, maxLength: number): string {
    if (text.length <= maxLength) {
      return text;
    }

    // Try to truncate at word boundary
    const truncated = text.slice(0, maxLength);
    const lastSpace = truncated.lastIndexOf(' ');

    if (lastSpace > maxLength * 0.8) {
      return truncated.slice(0, lastSpace) + '...';
    }

    return truncated + '...';
  }

  private escapeMarkdown(text: string): string {
    return text
      .replace(/\[/g, '\\[')
      .replace(/\]/g, '\\]')
      .replace(/\|/g, '\\|');
  }
}
