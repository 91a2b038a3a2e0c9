/**
 * CLI Output Utilities
 *
 * Structured output for JSON and human-readable formats.
 * @module @vnode/cli/output
 */

import chalk from 'chalk';

/**
 * Output format type
 */
export type OutputFormat = 'json' | 'table' | 'plain';

/**
 * Supported output formats
 */
export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'table', 'plain'];

/**
 * Check if a string names an output format
 */
export function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === 'string' && OUTPUT_FORMATS.some(format => format === value);
}

/**
 * Global output format setting (can be overridden per command)
 */
let globalOutputFormat: OutputFormat = 'table';

/**
 * Sets the global output format
 */
export function setOutputFormat(format: OutputFormat): void {
  globalOutputFormat = format;
}

/**
 * Gets the current output format
 */
export function getOutputFormat(): OutputFormat {
  return globalOutputFormat;
}

/**
 * Outputs data in the specified format
 */
export function output(data: unknown, format?: OutputFormat): void {
  const fmt = format ?? globalOutputFormat;

  if (fmt !== 'json' && typeof data === 'string') {
    console.log(data);
    return;
  }

  console.log(JSON.stringify(data, null, 2));
}

/**
 * Outputs a success message
 */
export function success(message: string): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify({ success: true, message }));
  } else {
    console.log(chalk.green('✓') + ' ' + message);
  }
}

/**
 * Outputs an error message
 */
export function error(message: string, details?: unknown): void {
  if (globalOutputFormat === 'json') {
    console.error(JSON.stringify({ success: false, error: message, details }));
  } else {
    console.error(chalk.red('✗') + ' ' + message);
    if (details) {
      console.error(chalk.gray(JSON.stringify(details, null, 2)));
    }
  }
}

/**
 * Outputs a warning message
 */
export function warn(message: string): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify({ warning: message }));
  } else {
    console.log(chalk.yellow('⚠') + ' ' + message);
  }
}

/**
 * Outputs an info message
 */
export function info(message: string): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify({ info: message }));
  } else {
    console.log(chalk.blue('ℹ') + ' ' + message);
  }
}

/**
 * Table column definition
 */
export interface TableColumn<T> {
  key: keyof T & string;
  header: string;
  width?: number;
}

/**
 * Formats a table from an array of objects
 */
export function table<T extends Record<string, unknown>>(
  data: T[],
  columns?: TableColumn<T>[],
): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify(data, null, 2));
    return;
  }

  const [first] = data;
  if (!first) {
    console.log(chalk.gray('No data to display'));
    return;
  }

  // Auto-detect columns if not provided
  const cols: Array<{ key: string; header: string; width?: number }> = columns ?? Object.keys(first).map((key) => ({
    key,
    header: key.toUpperCase(),
  }));

  const widths = cols.map((col) => {
    const maxDataWidth = Math.max(
      ...data.map((row) => String(row[col.key] ?? '').length),
    );
    return col.width ?? Math.max(col.header.length, maxDataWidth, 4);
  });

  const header = cols
    .map((col, i) => col.header.padEnd(widths[i] ?? 0))
    .join('  ');
  console.log(chalk.bold(header));

  // Separator
  console.log(widths.map((w) => '─'.repeat(w)).join('──'));

  for (const row of data) {
    const line = cols
      .map((col, i) => String(row[col.key] ?? '').padEnd(widths[i] ?? 0))
      .join('  ');
    console.log(line);
  }
}

/**
 * Formats key-value pairs for display
 */
export function keyValue(data: Record<string, unknown>): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify(data, null, 2));
    return;
  }

  const maxKeyLength = Math.max(...Object.keys(data).map((k) => k.length));

  for (const [key, value] of Object.entries(data)) {
    const formattedKey = chalk.bold(key.padEnd(maxKeyLength));
    console.log(`${formattedKey}  ${formatValue(value)}`);
  }
}

/**
 * Formats a single value for display
 */
function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return chalk.gray('(none)');
  }
  if (typeof value === 'boolean') {
    return value ? chalk.green('true') : chalk.red('false');
  }
  if (typeof value === 'number') {
    return chalk.cyan(String(value));
  }
  if (value instanceof Date) {
    return chalk.yellow(value.toISOString());
  }
  if (typeof value === 'object') {
    return chalk.gray(JSON.stringify(value));
  }
  return String(value);
}

/**
 * Formats a pod phase or condition status as a colored badge
 */
export function statusBadge(status: string): string {
  const statusLower = status.toLowerCase();

  if (['running', 'ready', 'true'].includes(statusLower)) {
    return chalk.green('●') + ' ' + chalk.green(status);
  }
  if (['pending', 'unknown'].includes(statusLower)) {
    return chalk.yellow('◐') + ' ' + chalk.yellow(status);
  }
  if (['failed', 'error'].includes(statusLower)) {
    return chalk.red('●') + ' ' + chalk.red(status);
  }
  if (['terminated', 'false'].includes(statusLower)) {
    return chalk.gray('○') + ' ' + chalk.gray(status);
  }

  return chalk.blue('●') + ' ' + status;
}
