/**
 * Output formatting utilities for CLI
 */

import chalk from 'chalk';

/**
 * Output format types
 */
export enum OutputFormat {
  HUMAN = 'human',
  JSON = 'json'
}

type Details = Record<string, unknown>;

const symbols = {
  success: '✓',
  error: '✗',
  warning: '⚠',
  info: 'ℹ',
  bullet: '•'
};

/**
 * Output formatter class
 */
export class OutputFormatter {
  private format: OutputFormat;

  constructor(format: OutputFormat = OutputFormat.HUMAN) {
    this.format = format;
  }

  success(message: string, data?: Details): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'success', message, ...data });
    } else {
      console.log(`${chalk.green(symbols.success)} ${message}`);
      if (data) {
        this.details(data);
      }
    }
  }

  error(message: string, error?: unknown): void {
    const cause = error instanceof Error ? error : undefined;
    if (this.format === OutputFormat.JSON) {
      this.json({
        status: 'error',
        message,
        error: cause
          ? { name: cause.name, message: cause.message, code: readCode(cause) }
          : error === undefined ? undefined : String(error)
      });
    } else {
      console.error(`${chalk.red(symbols.error)} ${chalk.red(message)}`);
      const detail = cause ? cause.message : error === undefined ? undefined : String(error);
      if (detail) {
        console.error(`  ${chalk.dim(detail)}`);
      }
    }
  }

  warning(message: string, details?: Details): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'warning', message, ...details });
    } else {
      console.warn(`${chalk.yellow(symbols.warning)} ${chalk.yellow(message)}`);
      if (details) {
        this.details(details);
      }
    }
  }

  info(message: string, details?: Details): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'info', message, ...details });
    } else {
      console.log(`${chalk.blue(symbols.info)} ${message}`);
      if (details) {
        this.details(details);
      }
    }
  }

  /**
   * Outputs a table
   */
  table(headers: string[], rows: Array<Array<string | number | null>>): void {
    if (this.format === OutputFormat.JSON) {
      const data = rows.map(row =>
        Object.fromEntries(headers.map((header, i) => [header, row[i] ?? null]))
      );
      this.json({ type: 'table', headers, data });
      return;
    }

    const widths = headers.map((h, i) => {
      const values = [h, ...rows.map(r => String(r[i] ?? ''))];
      return Math.max(...values.map(v => v.length));
    });

    console.log(chalk.bold(headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join(' │ ')));
    console.log(chalk.dim(widths.map(w => '─'.repeat(w)).join('─┼─')));
    for (const row of rows) {
      console.log(row.map((cell, i) => String(cell ?? '').padEnd(widths[i] ?? 0)).join(' │ '));
    }
  }

  list(items: string[], ordered: boolean = false): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ type: 'list', items, ordered });
    } else {
      items.forEach((item, i) => {
        const prefix = ordered ? `${i + 1}.` : symbols.bullet;
        console.log(`  ${chalk.dim(prefix)} ${item}`);
      });
    }
  }

  /**
   * Outputs retrieval results, best first
   */
  retrievalResults(
    collection: string,
    results: Array<{ id: string; text: string; score: number; attributes: Details }>
  ): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ type: 'retrieval_results', collection, results });
      return;
    }

    if (results.length === 0) {
      console.log(chalk.dim(`  No results in ${collection}`));
      return;
    }

    for (const result of results) {
      console.log(`${chalk.cyan(result.id)} ${chalk.dim(`(${result.score.toFixed(3)})`)}`);
      console.log(`  ${result.text}`);
      const query = result.attributes['query'];
      if (typeof query === 'string') {
        console.log(`  ${chalk.yellow(query)}`);
      }
      console.log();
    }
  }

  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  private details(data: Details): void {
    for (const [key, value] of Object.entries(data)) {
      if (value === undefined) continue;
      const formattedKey = key
        .replace(/_/g, ' ')
        .replace(/([a-z])([A-Z])/g, '$1 $2')
        .replace(/\b\w/g, l => l.toUpperCase());
      console.log(`  ${chalk.dim(formattedKey + ':')} ${String(value)}`);
    }
  }

  setFormat(format: OutputFormat): void {
    this.format = format;
  }

  getFormat(): OutputFormat {
    return this.format;
  }
}

function readCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

/**
 * Default output formatter instance
 */
export const output = new OutputFormatter();
