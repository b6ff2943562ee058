// Positional layout of the course overview page.
//
// Pass 1 flattens every <a> into an indexed AnchorRecord. Pass 2 walks that
// list; each discovery below is one phase of the walk:
//   UNSEEN -> IN_PARALLELS            (tab selectors)
//   IN_ASSIGNMENTS(tabId)             (column headers of one tab)
//   IN_STUDENTS                       (rows, until the next tab header)
// Rows are M submission-cell anchors followed by the student's profile anchor.

import { AnchorAttributes, AnchorRecord, ParallelHeader, StudentRecord } from '../../types/index';

export const TAB_TOGGLE = 'tab';
export const MODAL_TOGGLE = 'modal';
export const QUICK_EVALUATION_TARGET = '#quick-evaluation';

export function readAnchorAttributes(anchor: HTMLAnchorElement): AnchorAttributes {
  const data: AnchorAttributes = {};
  const { parallel, title, toggle, id, target } = anchor.dataset;
  if (parallel !== undefined) data.parallel = parallel;
  if (title !== undefined) data.title = title;
  if (toggle !== undefined) data.toggle = toggle;
  if (id !== undefined) data.id = id;
  if (target !== undefined) data.target = target;
  return data;
}

/**
 * Pass 1: every anchor of the page with the attributes the layout relies on
 */
export function indexAnchors(doc: Document): AnchorRecord[] {
  return Array.from(doc.querySelectorAll<HTMLAnchorElement>('a')).map((anchor, index) => ({
    index,
    href: anchor.hasAttribute('href') ? anchor.href : null,
    text: anchor.textContent?.trim() ?? '',
    titleAttr: anchor.getAttribute('title'),
    data: readAnchorAttributes(anchor),
    markup: anchor.outerHTML
  }));
}

export function isTabSelector(anchor: AnchorRecord): boolean {
  return anchor.data.toggle === TAB_TOGGLE;
}

export function isQuickEvaluationTrigger(anchor: AnchorRecord): boolean {
  return anchor.data.toggle === MODAL_TOGGLE && anchor.data.target === QUICK_EVALUATION_TARGET;
}

function pathnameOf(anchor: AnchorRecord): string | null {
  if (!anchor.href) {
    return null;
  }
  try {
    return new URL(anchor.href).pathname;
  } catch {
    return null;
  }
}

function tabIdOf(anchor: AnchorRecord): string {
  const raw = anchor.href ?? '';
  const hash = raw.indexOf('#');
  return hash === -1 ? raw : raw.slice(hash + 1);
}

/**
 * Parallels are the contiguous run of tab selectors
 */
export function discoverParallels(anchors: AnchorRecord[]): ParallelHeader[] {
  const parallels: ParallelHeader[] = [];
  let phase: 'unseen' | 'in-parallels' = 'unseen';

  for (const anchor of anchors) {
    if (isTabSelector(anchor)) {
      phase = 'in-parallels';
      parallels.push({ tabId: tabIdOf(anchor), name: anchor.text, anchorIndex: anchor.index });
    } else if (phase === 'in-parallels') {
      break;
    }
  }

  return parallels;
}

export interface AssignmentColumns {
  names: string[];
  lastIndex: number;
}

/**
 * Column headers of one tab: the contiguous run of anchors whose
 * data-parallel equals the tab id. lastIndex is -1 when there are none.
 */
export function discoverAssignments(anchors: AnchorRecord[], tabId: string): AssignmentColumns {
  const names: string[] = [];
  let lastIndex = -1;
  let phase: 'unseen' | 'in-assignments' = 'unseen';

  for (const anchor of anchors) {
    if (anchor.data.parallel === tabId) {
      phase = 'in-assignments';
      names.push(anchor.data.title ?? anchor.text);
      lastIndex = anchor.index;
    } else if (phase === 'in-assignments') {
      break;
    }
  }

  return { names, lastIndex };
}

/**
 * Student rows following the last column header, up to the next quick-evaluation trigger.
 * profilePattern is matched against the link's pathname; group 1 is the student id.
 */
export function discoverStudents(
  anchors: AnchorRecord[],
  afterIndex: number,
  assignmentCount: number,
  profilePattern: RegExp
): StudentRecord[] {
  const students: StudentRecord[] = [];

  for (let index = afterIndex + 1; index < anchors.length; index++) {
    const anchor = anchors[index];
    if (isQuickEvaluationTrigger(anchor)) {
      break;
    }

    const match = pathnameOf(anchor)?.match(profilePattern);
    if (!match || !anchor.href) {
      continue;
    }

    students.push({
      username: anchor.text,
      name: anchor.titleAttr ?? anchor.text,
      id: match[1],
      profileUrl: anchor.href,
      firstCellIndex: index - assignmentCount
    });
  }

  return students;
}
