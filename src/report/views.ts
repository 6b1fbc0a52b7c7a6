import { JOB_STATES } from '../wms/states';
import { runDisplayId, type RunRecord } from '../wms/types';
import { percentSucceeded, runAttentionFlag } from './classify';
import { classifyExitCodes } from './exit-codes';
import { buildTotalRow, type LabelCounts, reconcileJobSummary, resolveJobSummary } from './reconcile';
import { type ExpectedCounts, parseRunSummary, parseRunSummaryLabels } from './run-summary';
import {
  type Alignment,
  type Cell,
  type ColumnSpec,
  ReportTable,
  type Row,
} from './table';

export type ReportKind = 'summary' | 'detailed' | 'exit-codes';

export const SUMMARY_COLUMNS: readonly ColumnSpec[] = [
  { name: 'X', type: 'string' },
  { name: 'STATE', type: 'string' },
  { name: '%S', type: 'string' },
  { name: 'ID', type: 'string' },
  { name: 'OPERATOR', type: 'string' },
  { name: 'PROJECT', type: 'string' },
  { name: 'CAMPAIGN', type: 'string' },
  { name: 'PAYLOAD', type: 'string' },
  { name: 'RUN', type: 'string' },
];

export const DETAILED_COLUMNS: readonly ColumnSpec[] = [
  { name: ' ', type: 'string' },
  ...JOB_STATES.map((state): ColumnSpec => ({ name: state, type: 'int' })),
  { name: 'EXPECTED', type: 'int' },
];

export const EXIT_CODE_COLUMNS: readonly ColumnSpec[] = [
  { name: 'label', type: 'string' },
  { name: 'pipe_error_count', type: 'int' },
  { name: 'infra_error_count', type: 'int' },
  { name: 'infra_error_codes', type: 'string' },
];

export type ViewRows = {
  rows: Row[];
  message?: string;
};

export type ReportJson = {
  kind: ReportKind;
  columns: string[];
  rows: Cell[][];
  message: string | null;
};

/** A report that collects rows one run at a time. */
export type RunReportView = {
  readonly kind: ReportKind;
  /** Warning left by the most recent `add`, if it found a data problem. */
  readonly message: string | undefined;
  readonly length: number;
  readonly table: ReportTable;
  add: (run: RunRecord, useGlobalId?: boolean) => void;
  sort: (columns: string | readonly string[], ascending?: boolean) => void;
  clear: () => void;
  render: () => string;
  equals: (other: RunReportView) => boolean;
  toJSON: () => ReportJson;
};

export function missingJobSummaryMessage(run: RunRecord, useGlobalId: boolean): string {
  return `WARNING: Job summary for run '${runDisplayId(run, useGlobalId)}' not available, report maybe incomplete.`;
}

export function buildSummaryRow(run: RunRecord, useGlobalId = false): Row {
  return [
    runAttentionFlag(run),
    run.state,
    percentSucceeded(run),
    runDisplayId(run, useGlobalId),
    run.operator,
    run.project,
    run.campaign,
    run.payload,
    run.run,
  ];
}

export function buildDetailedRows(run: RunRecord, useGlobalId = false): ViewRows {
  const expected: ExpectedCounts = run.runSummary
    ? parseRunSummary(run.runSummary)
    : new Map();
  const rows: Row[] = [toDetailedRow(buildTotalRow(run, expected))];

  const observed = resolveJobSummary(run);
  if (!observed) {
    return { rows, message: missingJobSummaryMessage(run, useGlobalId) };
  }

  const reconciled = reconcileJobSummary(expected, observed);
  rows.push(...reconciled.rows.map(toDetailedRow));
  return reconciled.message === undefined ? { rows } : { rows, message: reconciled.message };
}

export function buildExitCodeRows(run: RunRecord, useGlobalId = false): ViewRows {
  if (!run.runSummary) {
    return { rows: [], message: missingJobSummaryMessage(run, useGlobalId) };
  }
  const exitCodes = new Map(Object.entries(run.exitCodeSummary ?? {}));
  const rows = parseRunSummaryLabels(run.runSummary).map((label): Row => {
    const result = classifyExitCodes(exitCodes.get(label));
    return [label, result.pipeErrorCount, result.infraErrorCount, result.infraErrorCodes];
  });
  return { rows };
}

function toDetailedRow(entry: LabelCounts): Row {
  return [entry.label, ...JOB_STATES.map((state) => entry.counts[state]), entry.expected];
}

class RowView implements RunReportView {
  readonly table: ReportTable;
  private msg: string | undefined;

  constructor(
    readonly kind: ReportKind,
    columns: readonly ColumnSpec[],
    private readonly buildRows: (run: RunRecord, useGlobalId: boolean) => ViewRows,
    private readonly align?: readonly Alignment[],
  ) {
    this.table = new ReportTable(columns);
  }

  get message(): string | undefined {
    return this.msg;
  }

  get length(): number {
    return this.table.length;
  }

  add(run: RunRecord, useGlobalId = false): void {
    this.msg = undefined;
    const result = this.buildRows(run, useGlobalId);
    for (const row of result.rows) {
      this.table.addRow(row);
    }
    this.msg = result.message;
  }

  sort(columns: string | readonly string[], ascending = true): void {
    this.table.sort(columns, ascending);
  }

  clear(): void {
    this.msg = undefined;
    this.table.clear();
  }

  render(): string {
    return this.lines().join('\n');
  }

  equals(other: RunReportView): boolean {
    return this.kind === other.kind && this.table.equals(other.table);
  }

  toJSON(): ReportJson {
    return { kind: this.kind, ...this.table.toJSON(), message: this.msg ?? null };
  }

  protected lines(): string[] {
    return this.table.format(this.align ? { align: this.align } : undefined);
  }
}

function firstColumnLeft(count: number): Alignment[] {
  return ['left', ...Array.from({ length: count - 1 }, (): Alignment => 'right')];
}

/** One row per run: attention flag, state, success percentage and metadata. */
export class SummaryRunReport extends RowView {
  constructor() {
    super('summary', SUMMARY_COLUMNS, (run, useGlobalId) => ({
      rows: [buildSummaryRow(run, useGlobalId)],
    }));
  }
}

/** Job counts per pipeline label and state, led by a TOTAL row. */
export class DetailedRunReport extends RowView {
  constructor() {
    super(
      'detailed',
      DETAILED_COLUMNS,
      buildDetailedRows,
      firstColumnLeft(DETAILED_COLUMNS.length),
    );
  }

  protected override lines(): string[] {
    const lines = super.lines();
    const separator = lines[1];
    if (separator !== undefined) {
      lines.splice(3, 0, separator);
    }
    return lines;
  }
}

/** Payload and infrastructure failure counts per pipeline label. */
export class ExitCodesReport extends RowView {
  constructor() {
    super(
      'exit-codes',
      EXIT_CODE_COLUMNS,
      buildExitCodeRows,
      firstColumnLeft(EXIT_CODE_COLUMNS.length),
    );
  }
}
