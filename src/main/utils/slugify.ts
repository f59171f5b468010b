/**
 * Default project name normalizer
 */

const COMBINING_MARKS_REGEX = /[\u0300-\u036f]/g
const SEPARATOR_RUN_REGEX = /[^a-z0-9_]+/g
const EDGE_SEPARATORS_REGEX = /^-+|-+$/g

/**
 * Turn arbitrary text into a lowercase ASCII slug usable as a path segment.
 * Accents are transliterated by decomposition ("Tëst" -> "test"); anything else
 * outside [a-z0-9_] collapses into a single "-".
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .normalize('NFKD')
    .replace(COMBINING_MARKS_REGEX, '')
    .replace(SEPARATOR_RUN_REGEX, '-')
    .replace(EDGE_SEPARATORS_REGEX, '')
}
