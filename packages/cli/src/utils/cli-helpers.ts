import chalk from 'chalk';
import type { ProgressReporter } from '@tfmap/core';

export const Logger = {
  fail(message: string): void {
    console.error(chalk.red(`❌ ${message}`));
  },
  warn(message: string): void {
    console.warn(chalk.yellow(`⚠️  ${message}`));
  },
  info(message: string): void {
    console.log(chalk.blue(`ℹ️  ${message}`));
  },
  success(message: string): void {
    console.log(chalk.green(`✓ ${message}`));
  },
} as const;

/** Line-per-event reporter for commands that do not render an Ink app. */
export class ConsoleProgress implements ProgressReporter {
  section(title: string): void {
    console.log(chalk.bold.cyan(`\n── ${title} ──`));
  }
  start(message: string): void {
    console.log(chalk.cyan(`🔄 ${message}...`));
  }
  succeed(message: string): void {
    Logger.success(message);
  }
  fail(message: string): void {
    Logger.fail(message);
  }
  warn(message: string): void {
    Logger.warn(message);
  }
  info(message: string): void {
    Logger.info(message);
  }
}

export interface TableColumn<T> {
  header: string;
  value: (row: T) => string;
}

const MAX_COLUMN_WIDTH = 60;

function pad(text: string, width: number): string {
  if (text.length > width) return text.substring(0, width - 3) + '...';
  return text.padEnd(width);
}

/** Plain-text table, one line per row, columns separated by ` | `. */
export function formatTable<T>(rows: T[], columns: TableColumn<T>[]): string {
  if (rows.length === 0) {
    return chalk.gray('No data to display');
  }
  const cells = rows.map((row) => columns.map((col) => col.value(row)));
  const widths = columns.map((col, i) =>
    Math.min(
      Math.max(col.header.length, ...cells.map((line) => (line[i] ?? '').length)),
      MAX_COLUMN_WIDTH
    )
  );
  const header = columns.map((col, i) => pad(col.header, widths[i] ?? 0)).join(' | ');
  const separator = widths.map((width) => '-'.repeat(width)).join('-+-');
  const body = cells.map((line) => line.map((cell, i) => pad(cell, widths[i] ?? 0)).join(' | '));
  return [chalk.bold(header), separator, ...body].join('\n');
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}
