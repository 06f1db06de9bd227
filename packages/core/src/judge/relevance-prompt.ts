import type { DocumentContent } from '../types/judgment.js';

export const SYSTEM_PROMPT =
  'You are a search quality expert. Always respond in valid JSON format.';

export const EMPTY_TITLE = '(no title)';
export const EMPTY_CONTENT = '(no content)';

/**
 * Build the graded-relevance rubric prompt for one (query, document) pair.
 * Content longer than `maxContentChars` is cut.
 */
export function buildRelevancePrompt(
  query: string,
  document: DocumentContent,
  maxContentChars: number,
): string {
  const title = document.title.trim().length > 0 ? document.title : EMPTY_TITLE;
  const content =
    document.content.trim().length > 0 ? document.content.slice(0, maxContentChars) : EMPTY_CONTENT;

  return `You are evaluating search quality. Judge how relevant the document is to the search query.

**Grading scale:**
- 2 (highly relevant): the document directly and completely answers the query
- 1 (partially relevant): the document is related to the query but is not a complete answer
- 0 (not relevant): the document has nothing to do with the query

**Query:**
${query}

**Document title:**
${title}

**Document content:**
${content}

**Instructions:**
1. Judge the relevance carefully
2. Respond with JSON only
3. Give a one-sentence reason

**Response format (JSON only):**
{
  "relevance": 0 or 1 or 2,
  "reason": "one-sentence reason"
}`;
}
