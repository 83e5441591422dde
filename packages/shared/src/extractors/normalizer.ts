/**
 * Text Normalizer
 *
 * Cleans raw OCR output before pattern matching. Only removes noise: line
 * endings are unified, non-printable characters dropped, runs of whitespace
 * collapsed, and wrapped lines joined back to the line they continue.
 */

import type { PageText } from '../types';
import type { DocumentText } from './types';

// Control characters except \t and \n, zero-width characters, BOM, replacement char
const NON_PRINTABLE = /[\u0000-\u0008\u000E-\u001F\u007F-\u009F\u200B-\u200D\u2060\uFEFF\uFFFD]/g;
const UNICODE_SPACES = /[\u00A0\u1680\u2000-\u200A\u202F\u205F\u3000]/g;

/**
 * A line that opens a new field: "Customer Name:", "IMEI/ESN/MEID:", "Order #:".
 * Any case, since OCR does not keep the capitals of a label ("phone:").
 */
export const LABEL_LINE = /^[A-Za-z][A-Za-z0-9 /&().'#-]{0,48}?\s*:/;

/**
 * An all-caps heading such as "YOUR DEVICE DETAILS:".
 */
export const SECTION_HEADER = /^[A-Z][A-Z &/'()-]{3,}:?$/;

// A line ending like this is wrapped and continues on the next line
const CONTINUES = /[,&/-]$|:$/;

export function isLabelLine(line: string): boolean {
  return LABEL_LINE.test(line);
}

export function isSectionHeader(line: string): boolean {
  return SECTION_HEADER.test(line);
}

function startsLogicalLine(line: string): boolean {
  return isLabelLine(line) || isSectionHeader(line);
}

function shouldJoin(previous: string, line: string): boolean {
  if (startsLogicalLine(line) || isSectionHeader(previous)) return false;
  return CONTINUES.test(previous) || /^[a-z]/.test(line);
}

/**
 * Normalize raw recognized text. Deterministic; empty or non-text input
 * yields an empty string.
 */
export function normalizeText(raw: string): string {
  if (!raw) return '';

  const cleaned = raw
    .replace(/\r\n?/g, '\n')
    .replace(/[\f\v]/g, '\n')
    .replace(NON_PRINTABLE, '')
    .replace(UNICODE_SPACES, ' ')
    .replace(/\t/g, ' ');

  const lines: string[] = [];
  for (const rawLine of cleaned.split('\n')) {
    const line = rawLine.replace(/ {2,}/g, ' ').trim();
    if (!line) continue;

    const previous = lines.length > 0 ? lines[lines.length - 1] : undefined;
    if (previous !== undefined && shouldJoin(previous, line)) {
      lines[lines.length - 1] = `${previous} ${line}`;
    } else {
      lines.push(line);
    }
  }

  return lines.join('\n');
}

/**
 * Normalize each page and join them, keeping page boundaries for diagnostics.
 * Pages that normalize to nothing are left out of the text but not renumbered.
 */
export function buildDocumentText(pages: readonly PageText[]): DocumentText {
  const ordered = [...pages].sort((a, b) => a.pageNumber - b.pageNumber);
  const boundaries: DocumentText['pages'] = [];
  let text = '';

  for (const page of ordered) {
    const normalized = normalizeText(page.text);
    if (!normalized) continue;

    if (text) text += '\n';
    const start = text.length;
    text += normalized;
    boundaries.push({ pageNumber: page.pageNumber, start, end: text.length });
  }

  return { text, pages: boundaries };
}

/**
 * Page number containing a text offset, or null when the offset is outside
 * every page (or pages were not tracked).
 */
export function pageAt(doc: DocumentText, index: number): number | null {
  const page = doc.pages.find((p) => index >= p.start && index < p.end);
  return page ? page.pageNumber : null;
}
