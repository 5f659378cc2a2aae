/**
 * Output formatting utilities for CLI
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';
import type { SearchItem } from '../../models/requests.js';

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
  bullet: '•'
};

type Details = Record<string, unknown>;

/**
 * Output formatter class
 */
export class OutputFormatter {
  private format: OutputFormat;
  private paint: ChalkInstance;

  constructor(format: OutputFormat = OutputFormat.HUMAN, useColor: boolean = true) {
    this.format = format;
    this.paint = useColor && process.stdout.isTTY ? chalk : new Chalk({ level: 0 });
  }

  /**
   * Outputs success message
   */
  success(message: string, data?: Details): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'success', message, ...data });
    } else {
      console.log(`${this.paint.green(symbols.success)} ${message}`);
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
        error: error instanceof Error ? { name: error.name, message: error.message } : error === undefined ? undefined : String(error)
      });
    } else {
      console.error(`${this.paint.red(symbols.error)} ${this.paint.red(message)}`);
      if (error instanceof Error) {
        console.error(`  ${this.paint.dim(error.message)}`);
      } else if (error !== undefined) {
        console.error(`  ${this.paint.dim(String(error))}`);
      }
    }
  }

  /**
   * Outputs warning message
   */
  warning(message: string, details?: Details): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'warning', message, ...details });
    } else {
      console.warn(`${this.paint.yellow(symbols.warning)} ${this.paint.yellow(message)}`);
      if (details) {
        this.details(details);
      }
    }
  }

  /**
   * Outputs info message
   */
  info(message: string, details?: Details): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'info', message, ...details });
    } else {
      console.log(`${this.paint.blue(symbols.info)} ${message}`);
      if (details) {
        this.details(details);
      }
    }
  }

  /**
   * Outputs a list
   */
  list(items: string[], ordered: boolean = false): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ type: 'list', items, ordered });
    } else {
      items.forEach((item, i) => {
        const prefix = ordered ? `${i + 1}.` : symbols.bullet;
        console.log(`  ${this.paint.dim(prefix)} ${item}`);
      });
    }
  }

  /**
   * Outputs one line per ingredient: the prompt, or the error in red
   */
  searchItems(items: SearchItem[]): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ type: 'search_items', items });
      return;
    }

    for (const item of items) {
      console.log(this.paint.cyan.bold(item.ingredient));
      if ('prompt' in item) {
        console.log(`  ${item.prompt}`);
      } else {
        console.log(`  ${this.paint.red(`${symbols.error} ${item.error}`)}`);
      }
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
  private details(data: Details): void {
    for (const [key, value] of Object.entries(data)) {
      const formattedKey = key.replace(/_/g, ' ').replace(/\b\w/g, l => l.toUpperCase());
      const formattedValue = typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
      console.log(`  ${this.paint.dim(formattedKey + ':')} ${formattedValue}`);
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
