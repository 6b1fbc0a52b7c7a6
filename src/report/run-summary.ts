import { BatchstatError } from '../core/errors';

export type ExpectedCounts = Map<string, number>;

const SEGMENT_SEPARATOR = ';';
const COUNT_SEPARATOR = ':';

/**
 * Parses `label1:count1;label2:count2` into expected job counts per label.
 * Iteration order of the result is the pipeline order.
 */
export function parseRunSummary(runSummary: string): ExpectedCounts {
  const expected: ExpectedCounts = new Map();
  for (const segment of runSummary.split(SEGMENT_SEPARATOR)) {
    const parts = segment.split(COUNT_SEPARATOR);
    const [label, rawCount] = parts;
    if (parts.length !== 2 || label === undefined || rawCount === undefined) {
      throw invalidRunSummary(runSummary, segment, 'expected exactly one ":"');
    }
    const count = parseCount(rawCount);
    if (count === null) {
      throw invalidRunSummary(runSummary, segment, `"${rawCount}" is not a job count`);
    }
    expected.set(label, count);
  }
  return expected;
}

/** Labels of a run summary, in pipeline order. */
export function parseRunSummaryLabels(runSummary: string): string[] {
  return [...parseRunSummary(runSummary).keys()];
}

export function formatRunSummary(expected: ReadonlyMap<string, number>): string {
  return [...expected]
    .map(([label, count]) => `${label}${COUNT_SEPARATOR}${count}`)
    .join(SEGMENT_SEPARATOR);
}

export function sumExpected(expected: ReadonlyMap<string, number>): number {
  let total = 0;
  for (const count of expected.values()) {
    total += count;
  }
  return total;
}

function parseCount(value: string): number | null {
  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return null;
  return Number.parseInt(trimmed, 10);
}

function invalidRunSummary(runSummary: string, segment: string, reason: string): BatchstatError {
  return new BatchstatError({
    code: 'run_summary.invalid',
    message: `Malformed run summary segment "${segment}": ${reason}.`,
    userMessage: `Run summary is malformed: "${segment}" (${reason}).`,
    kind: 'validation',
    details: { runSummary, segment },
    nextSteps: ['Check the run summary reported by the WMS (label:count;label:count).'],
  });
}
