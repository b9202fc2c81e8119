/**
 * Newscast — Text Sanitizer
 *
 * Turns feed HTML fragments into plain single-line text.
 */

import { decodeHTML } from 'entities';

const TAG_PATTERN = /<[^>]+?>/g;
const WHITESPACE_PATTERN = /\s+/g;
const ELLIPSIS = '...';

// Feeds double-escape often enough ("&amp;quot;") that one pass is not enough.
const MAX_DECODE_PASSES = 3;

export const DEFAULT_TRUNCATE_LENGTH = 500;

function stripTags(text: string): string {
  return text.replace(TAG_PATTERN, '');
}

/**
 * Remove markup, decode entities, collapse whitespace and trim.
 * Only complete `<...>` sequences count as markup; a stray `<` is text.
 * Absent or empty input yields an empty string.
 */
export function cleanMarkup(text?: string | null): string {
  if (!text) return '';

  let clean = stripTags(text);
  for (let pass = 0; pass < MAX_DECODE_PASSES; pass++) {
    const decoded = decodeHTML(clean);
    if (decoded === clean) break;
    // Decoding can surface escaped tags such as "&lt;br&gt;"
    clean = stripTags(decoded);
  }

  return clean.replace(WHITESPACE_PATTERN, ' ').trim();
}

/**
 * Cut text to at most `maxLength` characters, backing off to the last
 * space so no word is split, and mark the cut with an ellipsis.
 * Text without any space before the limit is cut hard.
 */
export function truncate(text: string, maxLength: number = DEFAULT_TRUNCATE_LENGTH): string {
  if (text.length <= maxLength) return text;

  const cut = text.slice(0, maxLength);
  const boundary = cut.lastIndexOf(' ');

  return (boundary === -1 ? cut : cut.slice(0, boundary)) + ELLIPSIS;
}
