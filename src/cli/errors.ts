import { type BatchstatError, normalizeError } from '../core/errors';
import { colors, formatKeyValues, renderNextSteps } from './output';

export type CliErrorRenderOptions = {
  debug?: boolean;
};

export function renderCliError(
  error: unknown,
  options?: CliErrorRenderOptions,
): { error: BatchstatError; message: string } {
  const normalized = normalizeError(error);
  const lines: string[] = [];

  lines.push(colors.error(`Error: ${normalized.userMessage}`));
  lines.push(...formatKeyValues([['Code', normalized.code]], { labelWidth: 10 }));

  const details = formatDetails(normalized.details);
  if (details.length > 0) {
    lines.push('Details:');
    for (const detail of details) {
      lines.push(`  - ${detail}`);
    }
  }

  const didYouMean = buildDidYouMean(normalized);
  if (didYouMean.length > 0) {
    lines.push('Did you mean?');
    for (const suggestion of didYouMean) {
      lines.push(`  ${suggestion}`);
    }
  }

  const nextSteps = normalized.nextSteps ? [...normalized.nextSteps] : [];
  for (const step of buildDefaultRecoverySteps(normalized)) {
    if (!nextSteps.includes(step)) {
      nextSteps.push(step);
    }
  }
  const nextStepsBlock = renderNextSteps(nextSteps);
  if (nextStepsBlock) {
    lines.push(nextStepsBlock);
  }

  if (options?.debug) {
    lines.push('');
    lines.push('Debug:');
    lines.push(normalized.stack ?? 'No stack available.');
    if (normalized.cause) {
      lines.push('');
      lines.push(`Cause: ${formatCause(normalized.cause)}`);
    }
  }

  return { error: normalized, message: lines.join('\n') };
}

function buildDefaultRecoverySteps(error: BatchstatError): string[] {
  const steps: string[] = [];
  switch (error.kind) {
    case 'validation':
      steps.push('Run `batchstat report --help` to review command usage.');
      break;
    case 'internal':
      steps.push('Re-run with `--debug` for more context.');
      break;
    default:
      break;
  }
  return steps;
}

function buildDidYouMean(error: BatchstatError): string[] {
  if (error.code !== 'report.unknown_column' || !error.details) return [];
  const unknown = stringList(error.details['unknown']);
  const columns = stringList(error.details['columns']);
  const suggestions = new Set<string>();
  for (const name of unknown) {
    for (const column of suggestColumns(name, columns)) {
      suggestions.add(`--sort ${column}`);
    }
  }
  return [...suggestions];
}

export function suggestColumns(input: string, columns: string[]): string[] {
  const normalized = input.toLowerCase();
  const exact = columns.filter((column) => column.toLowerCase() === normalized);
  if (exact.length > 0) {
    return exact;
  }

  return columns
    .map((column) => ({ column, score: levenshtein(normalized, column.toLowerCase()) }))
    .filter((entry) => entry.score <= 2)
    .sort((a, b) => a.score - b.score)
    .slice(0, 3)
    .map((entry) => entry.column);
}

function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i += 1) {
    const current = [i];
    for (let j = 1; j <= b.length; j += 1) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      const above = previous[j] ?? 0;
      const left = current[j - 1] ?? 0;
      const diag = previous[j - 1] ?? 0;
      current.push(Math.min(above + 1, left + 1, diag + cost));
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value)
    ? value.filter((item): item is string => typeof item === 'string')
    : [];
}

function formatDetails(details: Record<string, unknown> | undefined): string[] {
  if (!details) return [];
  const lines: string[] = [];
  const path = details['path'];
  if (typeof path === 'string') {
    lines.push(`Path: ${path}`);
  }
  const segment = details['segment'];
  if (typeof segment === 'string') {
    lines.push(`Segment: ${segment}`);
  }
  lines.push(...stringList(details['issues']));
  return lines;
}

function formatCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.stack ?? cause.message;
  }
  return typeof cause === 'string' ? cause : JSON.stringify(cause);
}
