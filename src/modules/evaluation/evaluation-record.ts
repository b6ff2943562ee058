// Editable state of one evaluation form with the scoring rules

import { ValidationError } from '../errors/index';
import {
  EvaluationIdentity,
  EvaluationStatus,
  ScoreState,
  WireStatus
} from '../../types/index';

const SCORE_DECIMALS = 4;

// Text that would close the host page's text-area early
const TEXTAREA_CLOSE = /<\/textarea/i;

export interface EvaluationRecordInit {
  identity: EvaluationIdentity;
  pageUrl: string;
  downloadUrl: string;
  outputUrl: string;
  aeScore: number;
  manualScore: number | null;
  penalty: number;
  evaluation: { text: string; isRaw: boolean };
  note: { text: string; isRaw: boolean };
}

/**
 * Round to four decimals; halves round towards +Infinity (Math.round on the
 * scaled binary value), so 1.00005 becomes 1.0001.
 */
export function roundScore(value: number): number {
  const factor = 10 ** SCORE_DECIMALS;
  return Math.round(value * factor) / factor;
}

/**
 * Parse a score field; an empty string counts as zero
 */
export function parseScore(value: string): number {
  const trimmed = value.trim();
  if (trimmed === '') {
    return 0;
  }
  const parsed = Number(trimmed.replace(',', '.'));
  if (!Number.isFinite(parsed)) {
    throw new ValidationError(`"${value}" is not a number`);
  }
  return parsed;
}

export class EvaluationRecord {
  readonly identity: EvaluationIdentity;
  readonly pageUrl: string;
  readonly downloadUrl: string;
  readonly outputUrl: string;
  readonly aeScore: number;

  private _manualScore: number | null;
  private _penalty: number;
  private _score: number | null = null;
  private _state: ScoreState = 'rejected-no-manual-score';
  private _evaluation: string;
  private _evaluationRaw: boolean;
  private _note: string;
  private _noteRaw: boolean;

  constructor(init: EvaluationRecordInit) {
    this.identity = { ...init.identity };
    this.pageUrl = init.pageUrl;
    this.downloadUrl = init.downloadUrl;
    this.outputUrl = init.outputUrl;
    this.aeScore = init.aeScore;
    this._manualScore = init.manualScore;
    this._penalty = init.penalty;
    this._evaluation = init.evaluation.text;
    this._evaluationRaw = init.evaluation.isRaw;
    this._note = init.note.text;
    this._noteRaw = init.note.isRaw;

    if (this._manualScore === null) {
      this.clearManualScore();
    } else {
      this.recompute();
    }
  }

  get manualScore(): number | null {
    return this._manualScore;
  }

  get penalty(): number {
    return this._penalty;
  }

  get score(): number | null {
    return this._score;
  }

  get state(): ScoreState {
    return this._state;
  }

  get accepted(): boolean {
    return this._state === 'accepted';
  }

  get status(): EvaluationStatus {
    return this.accepted ? 'accepted' : 'rejected';
  }

  get wireStatus(): WireStatus {
    return this.accepted ? '0' : '1';
  }

  get evaluation(): string {
    return this._evaluation;
  }

  get evaluationRaw(): boolean {
    return this._evaluationRaw;
  }

  get note(): string {
    return this._note;
  }

  get noteRaw(): boolean {
    return this._noteRaw;
  }

  /**
   * Update manual score and/or penalty; returns whether the submission is accepted.
   * Omitting the manual score clears it and rejects the submission.
   */
  setScore(manualScore?: number | null, penalty?: number | null): boolean {
    assertFinite('Manual score', manualScore);
    assertFinite('Penalty', penalty);

    if (penalty !== undefined && penalty !== null) {
      this._penalty = penalty;
    }

    if (manualScore === undefined || manualScore === null) {
      this.clearManualScore();
      return false;
    }

    this._manualScore = manualScore;
    this.recompute();
    return this.accepted;
  }

  setEvaluationText(text: string): void {
    this._evaluation = text;
    this._evaluationRaw = false;
  }

  setNote(text: string): void {
    if (TEXTAREA_CLOSE.test(text)) {
      throw new ValidationError('Note must not contain a closing </textarea> tag');
    }
    this._note = text;
    this._noteRaw = false;
  }

  private clearManualScore(): void {
    this._manualScore = null;
    this._score = null;
    this._state = 'rejected-no-manual-score';
  }

  private recompute(): void {
    const manual = this._manualScore ?? 0;
    this._score = roundScore(manual + this._penalty + this.aeScore);
    this._state = this._score < 0 ? 'rejected-negative-score' : 'accepted';
  }
}

function assertFinite(label: string, value: number | null | undefined): void {
  if (value !== undefined && value !== null && !Number.isFinite(value)) {
    throw new ValidationError(`${label} must be a finite number, got ${value}`);
  }
}
