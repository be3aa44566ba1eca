/**
 * Catalog-style form of an application name: lowercased, with spaces and
 * underscores turned into hyphens. Idempotent.
 */
export const normalizeAppName = (name: string): string =>
  name.toLowerCase().replace(/[ _]/g, '-');

// Whitespace stripped from app lines. Unlike String#trim this includes the
// information separators U+001C-U+001F and NEL, and leaves a BOM in place.
const EDGE_WHITESPACE =
  /^[\t\n\v\f\r\x1c-\x20\x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+|[\t\n\v\f\r\x1c-\x20\x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+$/g;

const stripAppName = (line: string): string => line.replace(EDGE_WHITESPACE, '');

// One app per line; blank lines dropped, duplicates and order kept.
export const parseAppList = (text: string): string[] =>
  text
    .split(/\r\n|\r|\n/)
    .map(stripAppName)
    .filter((line) => line.length > 0);
