// Evaluation Module Exports

export { EvaluationRecord, EvaluationRecordInit, parseScore, roundScore } from './evaluation-record';
export { EvaluationScraper, parseSubmissionUrl, REQUIRED_HIDDEN_FIELDS, SubmissionUrl } from './evaluation-scraper';
export { EvaluationSubmitter, UPLOAD_ENDPOINT } from './evaluation-submitter';
export {
  decodeRichText,
  encodeRichText,
  EVALUATION_FIELD,
  NOTE_FIELD,
  RichTextField,
  RichTextTag
} from './rich-text';
