// Text rendering of course-table data for terminals
// Pure functions; colours come only from the theme passed in

import { ParallelTable } from '../course/course-table';
import { EvaluationRecord } from '../evaluation/evaluation-record';
import { SubmissionInfo } from '../../types/index';

export type DisplayRole = 'accepted' | 'rejected' | 'missing' | 'heading';

export interface DisplayTheme {
  paint(role: DisplayRole, text: string): string;
}

export const plainTheme: DisplayTheme = {
  paint: (_role, text) => text
};

const ANSI_CODES: Record<DisplayRole, string> = {
  accepted: '\u001b[32m',
  rejected: '\u001b[31m',
  missing: '\u001b[90m',
  heading: '\u001b[1m'
};

const ANSI_RESET = '\u001b[0m';

export const ansiTheme: DisplayTheme = {
  paint: (role, text) => `${ANSI_CODES[role]}${text}${ANSI_RESET}`
};

function formatNumber(value: number | null): string {
  return value === null ? '-' : String(value);
}

/**
 * One cell, e.g. `AE 3.5 + M 6 + P -1`
 */
export function formatSubmissionInfo(info: SubmissionInfo, theme: DisplayTheme = plainTheme): string {
  if (!info.submitted) {
    return theme.paint('missing', 'not submitted');
  }

  const text = `AE ${formatNumber(info.aeScore)} + M ${formatNumber(info.manualScore)} + P ${formatNumber(info.penalty)}`;
  return theme.paint(info.manualScore === null ? 'rejected' : 'accepted', text);
}

export interface TableRow {
  username: string;
  cells: SubmissionInfo[];
}

/**
 * Tab-separated table, header row first
 */
export function formatTable(assignments: string[], rows: TableRow[], theme: DisplayTheme = plainTheme): string[] {
  const header = theme.paint('heading', ['student', ...assignments].join('\t'));
  return [
    header,
    ...rows.map((row) => [row.username, ...row.cells.map((cell) => formatSubmissionInfo(cell, theme))].join('\t'))
  ];
}

export function formatParallelTable(parallel: ParallelTable, theme: DisplayTheme = plainTheme): string[] {
  const rows = parallel.getStudents().map((student) => ({
    username: student.username,
    cells: parallel.getSubmissions(student)
  }));
  return [theme.paint('heading', parallel.name), ...formatTable(parallel.getAssignmentNames(), rows, theme)];
}

export function formatEvaluationSummary(record: EvaluationRecord, theme: DisplayTheme = plainTheme): string {
  const verdict = theme.paint(record.accepted ? 'accepted' : 'rejected', record.status);
  return `upload ${record.identity.uploadId}: score ${formatNumber(record.score)} (${verdict})`;
}
