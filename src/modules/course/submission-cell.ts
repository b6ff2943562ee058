// Decoding of one student x assignment cell of the course table

import { AnchorRecord, SubmissionInfo } from '../../types/index';

const NUMBER = '(-?\\d+(?:[.,]\\d+)?)';

const PENALTY_PATTERN = new RegExp(`<span class="penalty">P:\\s*${NUMBER}\\s*</span>`);
const AE_PATTERN = new RegExp(`<span class="ae">AE:\\s*${NUMBER}\\s*</span>`);
const MANUAL_PATTERN = new RegExp(`<span class="manual">M:\\s*${NUMBER}\\s*</span>`);

export const NOT_SUBMITTED_PLACEHOLDER = '<span class="not-submitted">not submitted</span>';

function matchNumber(markup: string, pattern: RegExp): number | null {
  const match = markup.match(pattern);
  return match ? Number(match[1].replace(',', '.')) : null;
}

export function decodeSubmissionCell(anchor: AnchorRecord): SubmissionInfo {
  const penalty = matchNumber(anchor.markup, PENALTY_PATTERN);
  const aeScore = matchNumber(anchor.markup, AE_PATTERN);
  const manualScore = matchNumber(anchor.markup, MANUAL_PATTERN);

  const nothingScored = penalty === null && aeScore === null && manualScore === null;
  const submitted = !(nothingScored && anchor.markup.includes(NOT_SUBMITTED_PLACEHOLDER));

  return {
    submitted,
    aeScore,
    manualScore,
    penalty,
    url: submitted ? anchor.href : null
  };
}
