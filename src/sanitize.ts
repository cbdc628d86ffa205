/**
 * Filesystem-safe names for topics, courses and note slugs
 */

// Letters, digits and underscore, plus whitespace and hyphen. Combining marks
// are dropped, so a decomposed "e\u0301" keeps only the "e".
const DISALLOWED = /[^\p{L}\p{N}_\s-]/gu;

/**
 * Sanitize a topic or course directory name.
 * Whitespace runs become underscores; falls back to "unknown".
 */
export function safeSegment(value: string): string {
  const cleaned = value
    .trim()
    .replace(DISALLOWED, '')
    .replace(/\s+/g, '_');

  return cleaned || 'unknown';
}

/**
 * Turn a note title into a slug used as its output filename.
 * Falls back to "note".
 */
export function slugify(value: string): string {
  const slug = value
    .trim()
    .toLowerCase()
    .replace(DISALLOWED, '')
    .replace(/[\s_]+/g, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^-+|-+$/g, '');

  return slug || 'note';
}
