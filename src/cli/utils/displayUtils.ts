/**
 * Shared display utilities for CLI commands.
 *
 * Formats counts, durations and rates, and draws the box borders used
 * for run summaries.
 */

import type { DisplayOptions } from '../types.js';

export interface BorderChars {
  topLeft: string;
  topRight: string;
  bottomLeft: string;
  bottomRight: string;
  horizontal: string;
  vertical: string;
}

const ANSI_ESCAPE_PATTERN = new RegExp(String.fromCharCode(27) + '\\[[0-9;]*m', 'g');

/**
 * Formats an integer with comma thousands separators.
 *
 * @param value - A non-negative integer.
 */
export function formatCount(value: number | bigint): string {
  return String(value).replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${String(Math.round(ms))}ms`;
  }
  const totalSeconds = Math.floor(ms / 1000);
  if (totalSeconds < 60) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes < 60) {
    return `${String(minutes)}m ${String(seconds)}s`;
  }
  const hours = Math.floor(minutes / 60);
  return `${String(hours)}h ${String(minutes % 60)}m`;
}

/**
 * Formats attempts per second. An undefined rate means the run was too short to measure.
 */
export function formatRate(ratePerSecond: number | undefined): string {
  if (ratePerSecond === undefined) {
    return 'n/a';
  }
  return `${ratePerSecond.toFixed(1)}/s`;
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

/**
 * Strips ANSI escape sequences from a string to get visible length.
 *
 * @param str - The string potentially containing ANSI codes.
 * @returns The string with ANSI codes removed.
 */
export function stripAnsi(str: string): string {
  return str.replace(ANSI_ESCAPE_PATTERN, '');
}

export function wrapInBox(text: string, options: DisplayOptions): string {
  const border = getBorderChars(options);
  const lines = text.split('\n');
  const maxLength = Math.max(...lines.map((line) => stripAnsi(line).length));
  const horizontalBorder = border.horizontal.repeat(maxLength + 2);

  let result = border.topLeft + horizontalBorder + border.topRight + '\n';
  for (const line of lines) {
    const visibleLength = stripAnsi(line).length;
    const padding = ' '.repeat(maxLength - visibleLength);
    result += border.vertical + ' ' + line + padding + ' ' + border.vertical + '\n';
  }
  result += border.bottomLeft + horizontalBorder + border.bottomRight;

  return result;
}
