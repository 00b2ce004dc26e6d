import chalk from 'chalk';

export interface LoggerOptions {
  // Suppress info and success lines; warnings and errors still print
  quiet?: boolean;
}

export class Logger {
  constructor(private context: string, private options: LoggerOptions = {}) {}

  child(context: string): Logger {
    return new Logger(`${this.context}:${context}`, this.options);
  }

  info(message: string, ...args: unknown[]) {
    if (this.options.quiet) return;
    console.log(chalk.blue(`[${this.context}]`), message, ...args);
  }

  success(message: string, ...args: unknown[]) {
    if (this.options.quiet) return;
    console.log(chalk.green(`✓ [${this.context}]`), message, ...args);
  }

  warn(message: string, ...args: unknown[]) {
    console.warn(chalk.yellow(`⚠ [${this.context}]`), message, ...args);
  }

  error(message: string, error?: unknown) {
    console.error(chalk.red(`✗ [${this.context}]`), message);
    if (error) {
      console.error(chalk.red('Error details:'), error);
    }
  }

  debug(message: string, ...args: unknown[]) {
    if (process.env.DEBUG) {
      console.log(chalk.gray(`[${this.context}]`), message, ...args);
    }
  }

  /** Print rows as left-aligned columns, first row as the header. */
  table(rows: string[][]) {
    if (this.options.quiet || rows.length === 0) return;
    const widths = rows[0].map((_, col) =>
      Math.max(...rows.map(row => (row[col] ?? '').length))
    );
    rows.forEach((row, index) => {
      const text = row.map((cell, col) => cell.padEnd(widths[col])).join('  ').trimEnd();
      console.log(index === 0 ? chalk.bold(text) : text);
    });
  }
}
