import type { DocumentContent } from '../types/judgment.js';
import type { PooledDocument } from '../types/pool.js';

export const DEFAULT_TITLE_FIELDS: readonly string[] = ['title', 'TITLE'];
export const DEFAULT_CONTENT_FIELDS: readonly string[] = ['merged_comment', 'content', 'CONTENT'];

export interface ContentFieldOptions {
  readonly titleFields?: readonly string[];
  readonly contentFields?: readonly string[];
}

function firstText(fields: Readonly<Record<string, unknown>>, candidates: readonly string[]): string {
  for (const name of candidates) {
    const value = fields[name];
    if (typeof value === 'string' && value.trim().length > 0) {
      return value;
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
  }
  return '';
}

/**
 * Pick the title and body a judge sees for a pooled document: the first
 * non-empty field from each candidate list.
 */
export function extractDocumentContent(
  doc: PooledDocument,
  options: ContentFieldOptions = {},
): DocumentContent {
  return {
    docId: doc.docId,
    title: firstText(doc.fields, options.titleFields ?? DEFAULT_TITLE_FIELDS),
    content: firstText(doc.fields, options.contentFields ?? DEFAULT_CONTENT_FIELDS),
  };
}
