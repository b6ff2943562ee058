// HTML fixtures shaped like the portal's submission and course pages

import { BASE_URL } from './helpers';

export const PAGE_URL = `${BASE_URL}teacher/upload/7001/9001`;
export const DOWNLOAD_URL = `${BASE_URL}teacher/upload/7001/download`;

export const DEFAULT_HIDDEN: Record<string, string | null> = {
  assignment_id: '301',
  course_id: '42',
  upload_id: '7001',
  team_id: '88',
  ae_score: '3.5'
};

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export interface SubmissionPageOptions {
  // null omits the input, '' renders it without a value
  hidden?: Record<string, string | null>;
  manualScore?: string;
  penalty?: string;
  renderedEvaluation?: string;
  renderedNote?: string;
  evaluationTextarea?: string;
  noteTextarea?: string;
  outputLink?: boolean;
  studentLink?: boolean;
}

export function submissionPage(options: SubmissionPageOptions = {}): string {
  const hidden = { ...DEFAULT_HIDDEN, ...options.hidden };
  const hiddenInputs = Object.entries(hidden)
    .filter((entry): entry is [string, string] => entry[1] !== null)
    .map(([name, value]) => `<input type="hidden" name="${name}" value="${value}">`)
    .join('\n      ');

  return `<!DOCTYPE html>
<html>
  <body>
    <nav><a href="/brute/teacher/course/42">Course</a></nav>
    ${options.studentLink === false ? '' : '<a href="/brute/teacher/student/1234">Jane Roe</a>'}
    ${options.outputLink === false ? '' : '<a href="/brute/data/7001/ae-output.txt">Evaluator output</a>'}
    <section class="evaluation">${options.renderedEvaluation ?? ''}</section>
    <section class="note">${options.renderedNote ?? ''}</section>
    <form method="post" action="/brute/teacher/upload">
      ${hiddenInputs}
      <input type="text" name="manual_score" value="${options.manualScore ?? ''}">
      <input type="text" name="penalty" value="${options.penalty ?? ''}">
      <textarea name="evaluation">${escapeHtml(options.evaluationTextarea ?? '')}</textarea>
      <textarea name="note">${escapeHtml(options.noteTextarea ?? '')}</textarea>
      <button type="submit">Save</button>
    </form>
  </body>
</html>`;
}

export interface CellFixture {
  upload?: string;
  ae?: string;
  manual?: string;
  penalty?: string;
  missing?: boolean;
}

export interface StudentFixture {
  username: string;
  name: string;
  id: string;
  cells: CellFixture[];
}

export interface ParallelFixture {
  tabId: string;
  name: string;
  assignments: string[];
  students: StudentFixture[];
}

export function cellMarkup(cell: CellFixture): string {
  if (cell.missing) {
    return '<a class="cell"><span class="not-submitted">not submitted</span></a>';
  }
  const spans = [
    cell.ae === undefined ? '' : `<span class="ae">AE: ${cell.ae}</span>`,
    cell.manual === undefined ? '' : `<span class="manual">M: ${cell.manual}</span>`,
    cell.penalty === undefined ? '' : `<span class="penalty">P: ${cell.penalty}</span>`
  ].join('');
  return `<a class="cell" href="/brute/teacher/upload/${cell.upload ?? '0'}/1">${spans || 'submitted'}</a>`;
}

function parallelMarkup(parallel: ParallelFixture): string {
  const headers = parallel.assignments
    .map((title, i) => `<th><a data-parallel="${parallel.tabId}" data-title="${title}" href="/brute/teacher/assignment/${i + 1}">${title.slice(0, 3)}</a></th>`)
    .join('');
  const rows = parallel.students
    .map((student) => {
      const cells = student.cells.map((cell) => `<td>${cellMarkup(cell)}</td>`).join('');
      return `<tr>${cells}<td><a href="/brute/teacher/student/${student.id}" title="${student.name}">${student.username}</a></td></tr>`;
    })
    .join('\n');

  return `<div class="tab-pane" id="${parallel.tabId}">
  <a href="#" data-toggle="modal" data-target="#quick-evaluation" data-id="${parallel.tabId}">Quick evaluation</a>
  <table>
    <thead><tr>${headers}<th>Student</th></tr></thead>
    <tbody>
${rows}
    </tbody>
  </table>
</div>`;
}

export function coursePage(parallels: ParallelFixture[]): string {
  const tabs = parallels
    .map((parallel) => `<li><a data-toggle="tab" href="#${parallel.tabId}">${parallel.name}</a></li>`)
    .join('');

  return `<!DOCTYPE html>
<html>
  <body>
    <a href="/brute/">Home</a>
    <ul class="nav nav-tabs">${tabs}</ul>
    <a href="/brute/teacher/course/42/export">Export</a>
    ${parallels.map(parallelMarkup).join('\n')}
  </body>
</html>`;
}

export const COURSE_FIXTURE: ParallelFixture[] = [
  {
    tabId: 'parallel-101',
    name: '101 Monday',
    assignments: ['Homework 1', 'Homework 2', 'Semestral work'],
    students: [
      {
        username: 'roejane',
        name: 'Jane Roe',
        id: '1234',
        cells: [
          { upload: '7001', ae: '3.5', manual: '6', penalty: '-1' },
          { upload: '7002', ae: '2' },
          { missing: true }
        ]
      },
      {
        username: 'doejohn',
        name: 'John Doe',
        id: '1235',
        cells: [
          { missing: true },
          { upload: '7010', manual: '4,5' },
          { upload: '7011' }
        ]
      }
    ]
  },
  {
    tabId: 'parallel-102',
    name: '102 Tuesday',
    assignments: ['Homework 1', 'Homework 2'],
    students: [
      {
        username: 'smithann',
        name: 'Ann Smith',
        id: '2001',
        cells: [
          { upload: '8001', ae: '0', manual: '0', penalty: '-0.5' },
          { missing: true }
        ]
      }
    ]
  }
];
