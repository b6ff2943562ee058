import { rest } from 'msw';
import { setupServer } from 'msw/node';
import { NotFoundError } from '../src/modules/errors/index';
import { CourseTable } from '../src/modules/course/course-table';
import { discoverAssignments, discoverParallels, discoverStudents, indexAnchors } from '../src/modules/course/layout';
import { decodeSubmissionCell } from '../src/modules/course/submission-cell';
import { parseDocument, studentProfilePattern } from '../src/utils/dom';
import { AnchorRecord } from '../src/types/index';
import { COURSE_FIXTURE, coursePage } from './fixtures';
import { BASE_URL, createTestClient } from './helpers';

const COURSE_URL = `${BASE_URL}teacher/course/42`;

let requestCount = 0;

const server = setupServer(
  rest.get(COURSE_URL, (_req, res, ctx) => {
    requestCount++;
    return res(ctx.status(200), ctx.set('Content-Type', 'text/html'), ctx.body(coursePage(COURSE_FIXTURE)));
  })
);

function upload(id: string): string {
  return `${BASE_URL}teacher/upload/${id}/1`;
}

function createTable(): CourseTable {
  return new CourseTable('42', COURSE_URL, coursePage(COURSE_FIXTURE), '/brute/');
}

describe('CourseTable', () => {
  test('discovers the parallels in tab order', () => {
    const parallels = createTable().getParallels();

    expect(parallels.map((p) => [p.tabId, p.name])).toEqual([
      ['parallel-101', '101 Monday'],
      ['parallel-102', '102 Tuesday']
    ]);
  });

  test('lists assignment names per parallel', () => {
    const table = createTable();

    expect(table.getParallel('parallel-101').getAssignmentNames()).toEqual(['Homework 1', 'Homework 2', 'Semestral work']);
    expect(table.getParallel('parallel-102').getAssignmentNames()).toEqual(['Homework 1', 'Homework 2']);
  });

  test('returns exactly the students of each parallel', () => {
    const table = createTable();

    expect(table.getParallel('parallel-101').getStudents().map((s) => [s.username, s.name, s.id])).toEqual([
      ['roejane', 'Jane Roe', '1234'],
      ['doejohn', 'John Doe', '1235']
    ]);
    expect(table.getParallel('parallel-102').getStudents().map((s) => s.username)).toEqual(['smithann']);
    expect(table.getParallel('parallel-102').getStudents()[0].profileUrl).toBe(`${BASE_URL}teacher/student/2001`);
  });

  test('decodes every cell of the first parallel', () => {
    const parallel = createTable().getParallel('parallel-101');
    const jane = parallel.getStudent('roejane');
    const john = parallel.getStudent('doejohn');

    expect(parallel.getSubmissionInfo(jane, 'Homework 1')).toEqual({
      submitted: true, aeScore: 3.5, manualScore: 6, penalty: -1, url: upload('7001')
    });
    expect(parallel.getSubmissionInfo(jane, 'Homework 2')).toEqual({
      submitted: true, aeScore: 2, manualScore: null, penalty: null, url: upload('7002')
    });
    expect(parallel.getSubmissionInfo(jane, 'Semestral work')).toEqual({
      submitted: false, aeScore: null, manualScore: null, penalty: null, url: null
    });
    expect(parallel.getSubmissionInfo(john, 'Homework 1')).toEqual({
      submitted: false, aeScore: null, manualScore: null, penalty: null, url: null
    });
    expect(parallel.getSubmissionInfo(john, 'Homework 2')).toEqual({
      submitted: true, aeScore: null, manualScore: 4.5, penalty: null, url: upload('7010')
    });
    expect(parallel.getSubmissionInfo(john, 'Semestral work')).toEqual({
      submitted: true, aeScore: null, manualScore: null, penalty: null, url: upload('7011')
    });
  });

  test('returns a whole row in column order', () => {
    const parallel = createTable().getParallel('parallel-102');

    expect(parallel.getSubmissions(parallel.getStudent('smithann'))).toEqual([
      { submitted: true, aeScore: 0, manualScore: 0, penalty: -0.5, url: upload('8001') },
      { submitted: false, aeScore: null, manualScore: null, penalty: null, url: null }
    ]);
  });

  test('finds a student in any parallel', () => {
    const { parallel, student } = createTable().findStudent('smithann');

    expect(parallel.tabId).toBe('parallel-102');
    expect(student.id).toBe('2001');
  });

  test('reports unknown parallels, students and assignments', () => {
    const table = createTable();
    const parallel = table.getParallel('parallel-101');

    expect(() => table.getParallel('parallel-999')).toThrow(new NotFoundError('parallel', 'parallel-999'));
    expect(() => parallel.getStudent('smithann')).toThrow(NotFoundError);
    expect(() => table.findStudent('nobody')).toThrow('No student named "nobody"');

    let error: unknown = null;
    try {
      parallel.getSubmissionInfo(parallel.getStudent('roejane'), 'Homework 9');
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toMatchObject({ kind: 'assignment', key: 'Homework 9' });
  });

  test('computes each collection once per table', () => {
    const table = createTable();

    expect(table.getParallels()[0]).toBe(table.getParallels()[0]);
    const parallel = table.getParallel('parallel-101');
    expect(parallel.getStudents()[1]).toBe(parallel.getStudents()[1]);
  });

  describe('fetch', () => {
    beforeAll(() => {
      server.listen({ onUnhandledRequest: 'error' });
    });

    afterAll(() => {
      server.close();
    });

    test('issues a single request for the whole table', async () => {
      requestCount = 0;
      const { client, config } = createTestClient();

      const table = await CourseTable.fetch(client, config, '42');
      table.getParallels().forEach((parallel) => parallel.getStudents());

      expect(table.url).toBe(COURSE_URL);
      expect(table.findStudent('doejohn').student.name).toBe('John Doe');
      expect(requestCount).toBe(1);
    });
  });
});

describe('course page layout', () => {
  const html = `
    <a href="/brute/">Home</a>
    <a data-toggle="tab" href="#t1">First</a>
    <a data-toggle="tab" href="#t2">Second</a>
    <a href="/brute/help">Help</a>
    <a data-toggle="tab" href="#t3">Not a parallel</a>
    <a data-parallel="t1" data-title="A1">A</a>
    <a data-parallel="t1" data-title="A2">B</a>
    <a class="cell">c1</a>
    <a class="cell">c2</a>
    <a href="/brute/teacher/student/9" title="Student Nine">nine</a>
    <a data-toggle="modal" data-target="#quick-evaluation" data-id="t2">Quick</a>
    <a href="/brute/teacher/student/10">ten</a>`;
  let anchors: AnchorRecord[];

  beforeEach(() => {
    anchors = indexAnchors(parseDocument(html, `${BASE_URL}teacher/course/1`));
  });

  test('indexes every anchor with its data attributes', () => {
    expect(anchors).toHaveLength(12);
    expect(anchors[5].data).toEqual({ parallel: 't1', title: 'A1' });
    expect(anchors[10].data).toEqual({ toggle: 'modal', target: '#quick-evaluation', id: 't2' });
    expect(anchors[7].href).toBeNull();
  });

  test('parallels stop at the first anchor after the run of tabs', () => {
    expect(discoverParallels(anchors)).toEqual([
      { tabId: 't1', name: 'First', anchorIndex: 1 },
      { tabId: 't2', name: 'Second', anchorIndex: 2 }
    ]);
  });

  test('assignment headers record the index of the last header', () => {
    expect(discoverAssignments(anchors, 't1')).toEqual({ names: ['A1', 'A2'], lastIndex: 6 });
    expect(discoverAssignments(anchors, 't9')).toEqual({ names: [], lastIndex: -1 });
  });

  test('a student row starts assignment-count anchors before the profile link', () => {
    expect(discoverStudents(anchors, 6, 2, studentProfilePattern('/brute/'))).toEqual([
      {
        username: 'nine',
        name: 'Student Nine',
        id: '9',
        profileUrl: `${BASE_URL}teacher/student/9`,
        firstCellIndex: 7
      }
    ]);
  });
});

describe('decodeSubmissionCell', () => {
  function cell(markup: string, href: string | null = null): AnchorRecord {
    return { index: 0, href, text: '', titleAttr: null, data: {}, markup };
  }

  test('a placeholder without scores means not submitted', () => {
    expect(decodeSubmissionCell(cell('<a><span class="not-submitted">not submitted</span></a>'))).toEqual({
      submitted: false, aeScore: null, manualScore: null, penalty: null, url: null
    });
  });

  test('scores win over the placeholder', () => {
    const info = decodeSubmissionCell(cell(
      '<a href="/x"><span class="ae">AE: 1.25</span><span class="not-submitted">not submitted</span></a>',
      'https://brute.test/x'
    ));

    expect(info).toEqual({ submitted: true, aeScore: 1.25, manualScore: null, penalty: null, url: 'https://brute.test/x' });
  });

  test('reads each sub-pattern independently', () => {
    const info = decodeSubmissionCell(cell('<a><span class="penalty">P: -2</span> <span class="manual">M: 7.5</span></a>'));

    expect(info).toMatchObject({ submitted: true, aeScore: null, manualScore: 7.5, penalty: -2 });
  });
});
