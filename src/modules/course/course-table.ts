// Course overview: parallels, students and their submissions

import { APIClient } from '../api/api-client';
import { ConfigManager } from '../config/index';
import { FormatError, NotFoundError } from '../errors/index';
import { parseDocument, studentProfilePattern } from '../../utils/dom';
import { AnchorRecord, ParallelHeader, StudentRecord, SubmissionInfo } from '../../types/index';
import {
  AssignmentColumns,
  discoverAssignments,
  discoverParallels,
  discoverStudents,
  indexAnchors
} from './layout';
import { decodeSubmissionCell } from './submission-cell';

export function coursePath(courseId: string): string {
  return `teacher/course/${encodeURIComponent(courseId)}`;
}

/**
 * One tab of the course page. Everything is derived from the CourseTable's
 * snapshot on first use and kept for the lifetime of the object.
 */
export class ParallelTable {
  readonly tabId: string;
  readonly name: string;

  private anchors: AnchorRecord[];
  private profilePattern: RegExp;
  private columns: AssignmentColumns | null = null;
  private students: StudentRecord[] | null = null;

  constructor(header: ParallelHeader, anchors: AnchorRecord[], profilePattern: RegExp) {
    this.tabId = header.tabId;
    this.name = header.name;
    this.anchors = anchors;
    this.profilePattern = profilePattern;
  }

  private getColumns(): AssignmentColumns {
    if (!this.columns) {
      this.columns = discoverAssignments(this.anchors, this.tabId);
    }
    return this.columns;
  }

  getAssignmentNames(): string[] {
    return [...this.getColumns().names];
  }

  getStudents(): StudentRecord[] {
    if (!this.students) {
      const columns = this.getColumns();
      this.students = columns.lastIndex === -1
        ? []
        : discoverStudents(this.anchors, columns.lastIndex, columns.names.length, this.profilePattern);
    }
    return [...this.students];
  }

  getStudent(username: string): StudentRecord {
    const student = this.getStudents().find((candidate) => candidate.username === username);
    if (!student) {
      throw new NotFoundError('student', username);
    }
    return student;
  }

  hasStudent(username: string): boolean {
    return this.getStudents().some((candidate) => candidate.username === username);
  }

  getSubmissionInfo(student: StudentRecord, assignmentName: string): SubmissionInfo {
    const column = this.getColumns().names.indexOf(assignmentName);
    if (column === -1) {
      throw new NotFoundError('assignment', assignmentName);
    }
    return this.cellAt(student, column);
  }

  /**
   * One entry per assignment, in column order
   */
  getSubmissions(student: StudentRecord): SubmissionInfo[] {
    return this.getColumns().names.map((_name, column) => this.cellAt(student, column));
  }

  private cellAt(student: StudentRecord, column: number): SubmissionInfo {
    const anchor = this.anchors[student.firstCellIndex + column];
    if (!anchor || student.firstCellIndex < 0) {
      throw new FormatError(`Row of ${student.username} has no cell for column ${column}`);
    }
    return decodeSubmissionCell(anchor);
  }
}

export class CourseTable {
  readonly courseId: string;
  readonly url: string;

  private anchors: AnchorRecord[];
  private profilePattern: RegExp;
  private parallels: ParallelTable[] | null = null;

  constructor(courseId: string, url: string, html: string, basePath: string) {
    this.courseId = courseId;
    this.url = url;
    this.anchors = indexAnchors(parseDocument(html, url));
    this.profilePattern = studentProfilePattern(basePath);
  }

  /**
   * Fetch the course overview once and wrap it
   */
  static async fetch(client: APIClient, config: ConfigManager, courseId: string): Promise<CourseTable> {
    const url = config.resolveUrl(coursePath(courseId));
    const html = await client.getText(url);
    return new CourseTable(courseId, url, html, config.getBasePath());
  }

  getParallels(): ParallelTable[] {
    if (!this.parallels) {
      this.parallels = discoverParallels(this.anchors).map(
        (header) => new ParallelTable(header, this.anchors, this.profilePattern)
      );
    }
    return [...this.parallels];
  }

  getParallel(tabId: string): ParallelTable {
    const parallel = this.getParallels().find((candidate) => candidate.tabId === tabId);
    if (!parallel) {
      throw new NotFoundError('parallel', tabId);
    }
    return parallel;
  }

  /**
   * Search every parallel for a student
   */
  findStudent(username: string): { parallel: ParallelTable; student: StudentRecord } {
    for (const parallel of this.getParallels()) {
      if (parallel.hasStudent(username)) {
        return { parallel, student: parallel.getStudent(username) };
      }
    }
    throw new NotFoundError('student', username);
  }
}
