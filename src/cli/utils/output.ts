/**
 * Output formatting utilities for CLI
 */

/**
 * Output format types
 */
export enum OutputFormat {
  HUMAN = 'human',
  JSON = 'json'
}

/**
 * Output colors for terminal
 */
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m'
};

type ColorName = keyof typeof colors;

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

export type Details = Record<string, unknown>;

export type Cell = string | number | boolean | null | undefined;

/**
 * Output formatter class
 */
export class OutputFormatter {
  private format: OutputFormat;
  private useColor: boolean;

  constructor(format: OutputFormat = OutputFormat.HUMAN, useColor: boolean = true) {
    this.format = format;
    this.useColor = useColor && process.stdout.isTTY === true;
  }

  /**
   * Outputs success message
   */
  success(message: string, data?: Details): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'success', message, ...data });
    } else {
      const symbol = this.colorize(symbols.success, 'green');
      console.log(`${symbol} ${message}`);
      if (data) {
        this.details(data);
      }
    }
  }

  /**
   * Outputs error message
   */
  error(message: string, error?: unknown): void {
    const cause = error instanceof Error ? error : undefined;
    if (this.format === OutputFormat.JSON) {
      this.json({
        status: 'error',
        message,
        error: cause ? { name: cause.name, message: cause.message } : undefined
      });
    } else {
      const symbol = this.colorize(symbols.error, 'red');
      console.error(`${symbol} ${this.colorize(message, 'red')}`);
      if (cause) {
        console.error(`  ${this.colorize(cause.message, 'dim')}`);
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
      const symbol = this.colorize(symbols.warning, 'yellow');
      console.warn(`${symbol} ${this.colorize(message, 'yellow')}`);
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
      const symbol = this.colorize(symbols.info, 'blue');
      console.log(`${symbol} ${message}`);
      if (details) {
        this.details(details);
      }
    }
  }

  /**
   * Outputs a table
   */
  table(headers: string[], rows: Cell[][]): void {
    if (this.format === OutputFormat.JSON) {
      const data = rows.map((row) => {
        const obj: Record<string, Cell> = {};
        headers.forEach((header, i) => {
          obj[header] = row[i];
        });
        return obj;
      });
      this.json({ type: 'table', headers, data });
    } else {
      // Calculate column widths
      const widths = headers.map((h, i) => {
        const values = [h, ...rows.map((r) => String(r[i] ?? ''))];
        return Math.max(...values.map((v) => v.length));
      });

      const headerRow = headers.map((h, i) => h.padEnd(widths[i])).join(' │ ');
      console.log(this.colorize(headerRow, 'bright'));

      const separator = widths.map((w) => '─'.repeat(w)).join('─┼─');
      console.log(this.colorize(separator, 'dim'));

      for (const row of rows) {
        const rowStr = row.map((cell, i) => String(cell ?? '').padEnd(widths[i])).join(' │ ');
        console.log(rowStr);
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
        console.log(`  ${this.colorize(prefix, 'dim')} ${item}`);
      });
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
      if (value === undefined) continue;
      const formattedKey = key
        .replace(/([a-z])([A-Z])/g, '$1 $2')
        .replace(/_/g, ' ')
        .replace(/\b\w/g, (l) => l.toUpperCase());
      const shown = typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
      console.log(`  ${this.colorize(formattedKey + ':', 'dim')} ${shown}`);
    }
  }

  /**
   * Colorizes text
   */
  private colorize(text: string, ...colorNames: ColorName[]): string {
    if (!this.useColor) return text;

    let result = text;
    for (const colorName of colorNames) {
      result = colors[colorName] + result;
    }
    return result + colors.reset;
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

  isJson(): boolean {
    return this.format === OutputFormat.JSON;
  }
}

/**
 * Default output formatter instance
 */
export const output = new OutputFormatter();
