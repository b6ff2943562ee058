// Central type definitions for the BRUTE client

// Authentication types
export interface Credential {
  name: string;
  value: string;
}

export interface SessionHandle {
  host: string;
  cookieHeader: string;
}

// Evaluation types
export type EvaluationStatus = 'accepted' | 'rejected';

export type ScoreState = 'rejected-no-manual-score' | 'rejected-negative-score' | 'accepted';

// Wire form of the status select: "0" accepted, "1" rejected
export type WireStatus = '0' | '1';

export interface EvaluationIdentity {
  assignmentId: string;
  courseId: string;
  uploadId: string;
  teamId: string;
  studentId: string;
}

export interface EvaluationChanges {
  manualScore?: number | null;
  penalty?: number | null;
  evaluation?: string;
  note?: string;
}

// Course table types
export interface AnchorAttributes {
  parallel?: string;
  title?: string;
  toggle?: string;
  id?: string;
  target?: string;
}

export interface AnchorRecord {
  index: number;
  href: string | null;
  text: string;
  titleAttr: string | null;
  data: AnchorAttributes;
  markup: string;
}

export interface ParallelHeader {
  tabId: string;
  name: string;
  anchorIndex: number;
}

export interface StudentRecord {
  username: string;
  name: string;
  id: string;
  profileUrl: string;
  firstCellIndex: number;
}

export interface SubmissionInfo {
  submitted: boolean;
  aeScore: number | null;
  manualScore: number | null;
  penalty: number | null;
  url: string | null;
}
