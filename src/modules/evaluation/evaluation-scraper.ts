// Parses a submission review page into an EvaluationRecord

import { APIClient } from '../api/api-client';
import { ConfigManager } from '../config/index';
import { FormatError } from '../errors/index';
import { getControlValue, parseDocument, studentProfilePattern } from '../../utils/dom';
import { EvaluationRecord, parseScore } from './evaluation-record';
import { decodeRichText, DecodedText, EVALUATION_FIELD, NOTE_FIELD, supportsRoundTrip } from './rich-text';

// Hidden inputs the server needs to accept the POST as an edit of the same upload
export const REQUIRED_HIDDEN_FIELDS = ['assignment_id', 'course_id', 'upload_id', 'team_id', 'ae_score'] as const;

export type RequiredHiddenField = typeof REQUIRED_HIDDEN_FIELDS[number];

const SUBMISSION_URL = /^(.*\/teacher\/upload\/)([^/?#]+)\/([^/?#]+)\/?$/;

const ARCHIVE_SEGMENT = 'download';

export interface SubmissionUrl {
  uploadId: string;
  downloadUrl: string;
}

/**
 * Split a review page URL and derive the archive URL from it
 */
export function parseSubmissionUrl(url: string): SubmissionUrl {
  const match = url.match(SUBMISSION_URL);
  if (!match) {
    throw new FormatError(`Not a submission page URL: ${url}`);
  }

  const [, prefix, uploadId] = match;
  return {
    uploadId,
    downloadUrl: `${prefix}${uploadId}/${ARCHIVE_SEGMENT}`
  };
}

export class EvaluationScraper {
  private client: APIClient;
  private config: ConfigManager;

  constructor(client: APIClient, config: ConfigManager) {
    this.client = client;
    this.config = config;
  }

  /**
   * Fetch the review page and rebuild its form state
   */
  async scrape(url: string): Promise<EvaluationRecord> {
    const absoluteUrl = this.config.resolveUrl(url);
    const submission = parseSubmissionUrl(absoluteUrl);
    const html = await this.client.getText(absoluteUrl);
    return this.parse(html, absoluteUrl, submission);
  }

  /**
   * Build a record from an already fetched page
   */
  parse(html: string, pageUrl: string, submission: SubmissionUrl = parseSubmissionUrl(pageUrl)): EvaluationRecord {
    const doc = parseDocument(html, pageUrl);

    const variant = this.config.getEvaluationConfig().richTextVariant;
    const evaluation = this.decodeField(doc, EVALUATION_FIELD.control, () => decodeRichText(html, EVALUATION_FIELD, doc));
    const note = this.decodeField(doc, NOTE_FIELD.control, () =>
      supportsRoundTrip(NOTE_FIELD, variant)
        ? decodeRichText(html, NOTE_FIELD, doc)
        : { isRaw: true, text: getControlValue(doc, NOTE_FIELD.control) ?? '' }
    );

    const { outputUrl, studentId } = this.findLinks(doc);
    const hidden = this.readHiddenFields(doc);

    const manualInput = getControlValue(doc, 'manual_score') ?? '';
    const penaltyInput = getControlValue(doc, 'penalty') ?? '';

    return new EvaluationRecord({
      identity: {
        assignmentId: hidden.assignment_id,
        courseId: hidden.course_id,
        uploadId: hidden.upload_id,
        teamId: hidden.team_id,
        studentId
      },
      pageUrl,
      downloadUrl: submission.downloadUrl,
      outputUrl,
      aeScore: parseScore(hidden.ae_score),
      manualScore: manualInput.trim() === '' ? null : parseScore(manualInput),
      penalty: parseScore(penaltyInput),
      evaluation,
      note
    });
  }

  private decodeField(doc: Document, control: string, decode: () => DecodedText): DecodedText {
    if (!doc.querySelector(`textarea[name="${control}"]`)) {
      throw new FormatError(`Page has no "${control}" text area`, control);
    }
    return decode();
  }

  /**
   * Locate the grading-output link and the student profile link
   */
  private findLinks(doc: Document): { outputUrl: string; studentId: string } {
    const basePath = this.config.getBasePath();
    const outputPrefix = `${basePath}data/`;
    const studentPattern = studentProfilePattern(basePath);

    let outputUrl: string | null = null;
    let studentId: string | null = null;

    for (const anchor of Array.from(doc.querySelectorAll<HTMLAnchorElement>('a[href]'))) {
      const pathname = safePathname(anchor.href);
      if (pathname === null) {
        continue;
      }
      if (outputUrl === null && pathname.startsWith(outputPrefix)) {
        outputUrl = anchor.href;
      }
      const studentMatch: RegExpMatchArray | null = studentId === null ? pathname.match(studentPattern) : null;
      if (studentMatch) {
        studentId = studentMatch[1];
      }
    }

    if (outputUrl === null) {
      throw new FormatError('Page has no grading output link', 'output');
    }
    if (studentId === null) {
      throw new FormatError('Page has no student link', 'student');
    }

    return { outputUrl, studentId };
  }

  private readHiddenFields(doc: Document): Record<RequiredHiddenField, string> {
    const read = (name: RequiredHiddenField): string => {
      const value = doc.querySelector<HTMLInputElement>(`input[name="${name}"]`)?.getAttribute('value');
      if (!value) {
        throw new FormatError(`Required form field "${name}" is missing or has no value`, name);
      }
      return value;
    };

    return {
      assignment_id: read('assignment_id'),
      course_id: read('course_id'),
      upload_id: read('upload_id'),
      team_id: read('team_id'),
      ae_score: read('ae_score')
    };
  }
}

function safePathname(href: string): string | null {
  try {
    return new URL(href).pathname;
  } catch {
    return null;
  }
}
