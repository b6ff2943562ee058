// Replays an EvaluationRecord as the portal's evaluation form POST

import { APIClient, isRedirect } from '../api/api-client';
import { ConfigManager } from '../config/index';
import { HttpError } from '../errors/index';
import { EvaluationRecord } from './evaluation-record';
import { encodeRichText, EVALUATION_FIELD, NOTE_FIELD, RichTextField, supportsRoundTrip } from './rich-text';

export const UPLOAD_ENDPOINT = 'teacher/upload';

const COURSE_PATH = /\/teacher\/course\//;

function formatNumber(value: number | null): string {
  return value === null ? '' : String(value);
}

export class EvaluationSubmitter {
  private client: APIClient;
  private config: ConfigManager;

  constructor(client: APIClient, config: ConfigManager) {
    this.client = client;
    this.config = config;
  }

  /**
   * Serialize the record into the form fields the upload page posts
   */
  buildForm(record: EvaluationRecord): URLSearchParams {
    const { identity } = record;

    return new URLSearchParams([
      ['assignment_id', identity.assignmentId],
      ['course_id', identity.courseId],
      ['upload_id', identity.uploadId],
      ['team_id', identity.teamId],
      ['student_id', identity.studentId],
      ['manual_score', formatNumber(record.manualScore)],
      ['penalty', formatNumber(record.penalty)],
      ['score', formatNumber(record.score)],
      ['status', record.wireStatus],
      ['evaluation', this.renderField(EVALUATION_FIELD, record.evaluation, record.evaluationRaw)],
      ['note', this.renderField(NOTE_FIELD, record.note, record.noteRaw)]
    ]);
  }

  private renderField(field: RichTextField, text: string, isRaw: boolean): string {
    const variant = this.config.getEvaluationConfig().richTextVariant;
    if (isRaw || !supportsRoundTrip(field, variant)) {
      return text;
    }
    return encodeRichText(text, field.tag);
  }

  /**
   * Submit the record. The portal answers a stored evaluation with a redirect
   * to the course page; any other answer is reported, not retried.
   */
  async submit(record: EvaluationRecord): Promise<string> {
    const url = this.config.resolveUrl(UPLOAD_ENDPOINT);
    const response = await this.client.post(url, this.buildForm(record));
    const location = response.headers.get('location');

    if (isRedirect(response.status) && location && COURSE_PATH.test(new URL(location, url).pathname)) {
      console.log(`EvaluationSubmitter: Stored evaluation of upload ${record.identity.uploadId}`);
      return location;
    }

    throw new HttpError(`Unexpected answer to evaluation of upload ${record.identity.uploadId}`, response.status, url, location);
  }
}
