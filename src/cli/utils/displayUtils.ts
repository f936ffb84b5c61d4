/**
 * Shared display utilities for terminal output.
 *
 * ANSI colors and box-drawing borders for the console reporter and error
 * output, each of which can be turned off.
 */

export interface DisplayOptions {
  colors: boolean;
  unicode: boolean;
}

export interface BorderChars {
  topLeft: string;
  topRight: string;
  bottomLeft: string;
  bottomRight: string;
  horizontal: string;
  vertical: string;
}

export type Color = 'red' | 'green' | 'yellow' | 'blue' | 'cyan' | 'bold' | 'dim';

const ANSI_CODES: Readonly<Record<Color, string>> = {
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
};

const RESET = '\x1b[0m';

const ANSI_ESCAPE_PATTERN = new RegExp(String.fromCharCode(27) + '\\[[0-9;]*m', 'g');

/**
 * Wraps text in an ANSI color when colors are enabled.
 */
export function colorize(text: string, color: Color, options: DisplayOptions): string {
  return options.colors ? `${ANSI_CODES[color]}${text}${RESET}` : text;
}

export function getBorderChars(options: DisplayOptions): BorderChars {
  if (options.unicode) {
    return {
      topLeft: '┌',
      topRight: '┐',
      bottomLeft: '└',
      bottomRight: '┘',
      horizontal: '─',
      vertical: '│',
    };
  }
  return {
    topLeft: '+',
    topRight: '+',
    bottomLeft: '+',
    bottomRight: '+',
    horizontal: '-',
    vertical: '|',
  };
}

/** Removes color codes, leaving the text as it appears on screen. */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_ESCAPE_PATTERN, '');
}

/**
 * Frames lines in a border sized to the widest visible line. Returns the
 * framed rows without a trailing newline.
 */
export function wrapInBox(text: string, options: DisplayOptions): string {
  const border = getBorderChars(options);
  const rows = text.split('\n');
  const width = rows.reduce((widest, row) => Math.max(widest, stripAnsi(row).length), 0);
  const rule = border.horizontal.repeat(width + 2);

  const framed = rows.map(
    (row) => `${border.vertical} ${row}${' '.repeat(width - stripAnsi(row).length)} ${border.vertical}`
  );
  const top = `${border.topLeft}${rule}${border.topRight}`;
  const bottom = `${border.bottomLeft}${rule}${border.bottomRight}`;
  return [top, ...framed, bottom].join('\n');
}
