// DOM utility functions

import { JSDOM } from 'jsdom';

/**
 * Parse a fetched page; relative links resolve against `url` when given
 */
export function parseDocument(html: string, url?: string): Document {
  return new JSDOM(html, url ? { url } : undefined).window.document;
}

/**
 * Value of a named form control, or null when absent
 */
export function getControlValue(doc: Document, name: string): string | null {
  const input = doc.querySelector<HTMLInputElement>(`input[name="${name}"]`);
  if (input) {
    return input.getAttribute('value');
  }

  const textarea = doc.querySelector<HTMLTextAreaElement>(`textarea[name="${name}"]`);
  if (textarea) {
    return textarea.value;
  }

  const select = doc.querySelector<HTMLSelectElement>(`select[name="${name}"]`);
  return select ? select.value : null;
}

/**
 * Literal content of a named text-area control
 */
export function getTextAreaContent(doc: Document, name: string): string | null {
  const textarea = doc.querySelector<HTMLTextAreaElement>(`textarea[name="${name}"]`);
  return textarea ? textarea.value : null;
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Pathname pattern of a student profile link; group 1 is the student id
 */
export function studentProfilePattern(basePath: string): RegExp {
  return new RegExp(`^${escapeRegExp(basePath)}teacher/student/([^/?#]+)/?$`);
}
