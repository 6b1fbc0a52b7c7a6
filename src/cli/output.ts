import chalk from 'chalk';

import { stripAnsi } from '../utils/text';

export const DEFAULT_LABEL_WIDTH = 14;

const isTty = (): boolean => Boolean(process.stdout.isTTY);

export const colors = {
  warning: (text: string): string => (isTty() ? chalk.yellow(text) : text),
  error: (text: string): string => (isTty() ? chalk.red(text) : text),
};

export function padAnsi(value: string, width: number): string {
  const visibleLength = stripAnsi(value).length;
  if (visibleLength >= width) return value;
  return `${value}${' '.repeat(width - visibleLength)}`;
}

export function formatKeyValues(
  entries: Array<[string, string]>,
  options?: { labelWidth?: number; indent?: number },
): string[] {
  const labelWidth = options?.labelWidth ?? DEFAULT_LABEL_WIDTH;
  const pad = ' '.repeat(options?.indent ?? 0);
  return entries.map(([label, value]) => `${pad}${padAnsi(label, labelWidth)} ${value}`);
}

export function renderNextSteps(steps: string[], options?: { indent?: number }): string {
  if (steps.length === 0) return '';
  const pad = ' '.repeat(options?.indent ?? 0);
  return ['', `${pad}Next steps:`, ...steps.map((step) => `${pad}  ${step}`)].join('\n');
}

/** Colors advisory lines the report engine hands back. */
export function formatReportLine(line: string): string {
  return line.startsWith('WARNING:') ? colors.warning(line) : line;
}
