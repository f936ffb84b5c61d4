/**
 * Reporter that prints the operator narrative to the terminal.
 */

import type { Reporter } from '../reporting/types.js';
import { colorize, wrapInBox, type DisplayOptions } from './utils/displayUtils.js';

export interface ConsoleReporterOptions extends DisplayOptions {
  /** Sink for finished lines; stdout by default. */
  write?: (text: string) => void;
}

export class ConsoleReporter implements Reporter {
  private readonly display: DisplayOptions;
  private readonly write: (text: string) => void;

  constructor(options: ConsoleReporterOptions) {
    this.display = { colors: options.colors, unicode: options.unicode };
    this.write =
      options.write ??
      ((text: string) => {
        process.stdout.write(text);
      });
  }

  header(text: string): void {
    this.line('');
    this.line(wrapInBox(colorize(text, 'bold', this.display), this.display));
  }

  step(current: number, total: number, text: string): void {
    this.line(`${colorize(`[${String(current)}/${String(total)}]`, 'cyan', this.display)} ${text}`);
  }

  info(text: string): void {
    this.line(`  ${text}`);
  }

  success(text: string): void {
    this.line(`  ${colorize(this.display.unicode ? '✓' : 'OK', 'green', this.display)} ${text}`);
  }

  warn(text: string): void {
    this.line(`  ${colorize(this.display.unicode ? '⚠' : 'WARN', 'yellow', this.display)} ${text}`);
  }

  error(text: string): void {
    this.line(`  ${colorize(this.display.unicode ? '✗' : 'ERROR', 'red', this.display)} ${text}`);
  }

  progress(text: string): void {
    this.line(`  ${colorize(text, 'dim', this.display)}`);
  }

  private line(text: string): void {
    this.write(text + '\n');
  }
}
