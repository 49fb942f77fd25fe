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

/**
 * Symbols for terminal output
 */
const symbols = {
  success: '✓',
  error: '✗',
  warning: '⚠',
  info: 'ℹ',
};

/**
 * Output formatter class
 */
export class OutputFormatter {
  private format: OutputFormat;

  constructor(format: OutputFormat = OutputFormat.HUMAN) {
    this.format = format;
  }

  /**
   * Whether command output is machine-readable JSON
   */
  isJson(): boolean {
    return this.format === OutputFormat.JSON;
  }

  /**
   * Outputs success message
   */
  success(message: string, data?: Record<string, unknown>): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'success', message, ...data });
    } else {
      console.log(`${chalk.green(symbols.success)} ${message}`);
      if (data) {
        this.details(data);
      }
    }
  }

  /**
   * Outputs error message
   */
  error(message: string, error?: unknown): void {
    if (this.format === OutputFormat.JSON) {
      this.json({
        status: 'error',
        message,
        error: error instanceof Error ? {
          name: error.name,
          message: error.message,
          code: 'code' in error ? error.code : undefined,
        } : undefined
      });
    } else {
      console.error(`${chalk.red(symbols.error)} ${chalk.red(message)}`);
      if (error instanceof Error && error.message !== message) {
        console.error(`  ${chalk.dim(error.message)}`);
      }
    }
  }

  /**
   * Outputs warning message
   */
  warning(message: string, details?: Record<string, unknown>): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'warning', message, ...details });
    } else {
      console.warn(`${chalk.yellow(symbols.warning)} ${chalk.yellow(message)}`);
      if (details) {
        this.details(details);
      }
    }
  }

  /**
   * Outputs info message
   */
  info(message: string, details?: Record<string, unknown>): void {
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
   * Outputs preformatted report lines; JSON mode prints nothing
   */
  lines(lines: string[]): void {
    if (this.format === OutputFormat.HUMAN) {
      console.log(lines.join('\n'));
    }
  }

  /**
   * Outputs raw JSON
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  /**
   * Outputs details (key-value pairs)
   */
  private details(data: Record<string, unknown>): void {
    for (const [key, value] of Object.entries(data)) {
      const formattedKey = key
        .replace(/([a-z])([A-Z])/g, '$1 $2')
        .replace(/_/g, ' ')
        .replace(/\b\w/g, l => l.toUpperCase());
      console.log(`  ${chalk.dim(formattedKey + ':')} ${String(value)}`);
    }
  }

  /**
   * Sets output format
   */
  setFormat(format: OutputFormat): void {
    this.format = format;
  }

  /**
   * Gets output format
   */
  getFormat(): OutputFormat {
    return this.format;
  }
}

/**
 * Default output formatter instance
 */
export const output = new OutputFormatter();
