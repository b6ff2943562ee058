// Round-trip encoding of Markdown source inside rendered HTML

import MarkdownIt from 'markdown-it';
import { RichTextVariant } from '../config/index';
import { getTextAreaContent, parseDocument } from '../../utils/dom';

export type RichTextTag = 'EVALUATION' | 'NOTE';

export interface RichTextField {
  tag: RichTextTag;
  control: string;
}

export const EVALUATION_FIELD: RichTextField = { tag: 'EVALUATION', control: 'evaluation' };
export const NOTE_FIELD: RichTextField = { tag: 'NOTE', control: 'note' };

export interface DecodedText {
  isRaw: boolean;
  text: string;
}

const MARKER_SUFFIX = 'c5e1b7f0';

const markdown = new MarkdownIt();

// Markers contain '<' so the HTML-escaped copy in the text-area never matches;
// only the verbatim comment in the rendered block does.
export function startMarker(tag: RichTextTag): string {
  return `<${tag}_SOURCE_BEGIN_${MARKER_SUFFIX}>`;
}

export function endMarker(tag: RichTextTag): string {
  return `<${tag}_SOURCE_END_${MARKER_SUFFIX}>`;
}

export function renderMarkdown(source: string): string {
  return markdown.render(source);
}

/**
 * Wrap the source in a marker comment followed by its rendering
 */
export function encodeRichText(source: string, tag: RichTextTag): string {
  return `<!--${startMarker(tag)}${source}${endMarker(tag)}-->\n<div class="markdown">${renderMarkdown(source)}</div>`;
}

/**
 * Recover the source between the markers, or fall back to the raw text-area content.
 * Pass `doc` when the page is already parsed.
 */
export function decodeRichText(pageHtml: string, field: RichTextField, doc?: Document): DecodedText {
  const start = startMarker(field.tag);
  const end = endMarker(field.tag);

  const startIndex = pageHtml.indexOf(start);
  if (startIndex !== -1) {
    const sourceStart = startIndex + start.length;
    const endIndex = pageHtml.indexOf(end, sourceStart);
    if (endIndex !== -1) {
      return { isRaw: false, text: pageHtml.slice(sourceStart, endIndex) };
    }
  }

  return { isRaw: true, text: getTextAreaContent(doc ?? parseDocument(pageHtml), field.control) ?? '' };
}

/**
 * Whether the server-side variant keeps the marker comment for this field
 */
export function supportsRoundTrip(field: RichTextField, variant: RichTextVariant): boolean {
  return variant === 'full' || field.tag === 'EVALUATION';
}
