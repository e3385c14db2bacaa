const ALPHANUMERIC = /^[\p{L}\p{N}]+$/u;
const NON_ALPHANUMERIC = /[^\p{L}\p{N}]+/gu;

export function isAlphanumeric(term: string): boolean {
  return ALPHANUMERIC.test(term);
}

export function stripNonAlphanumeric(piece: string): string {
  return piece.replace(NON_ALPHANUMERIC, "");
}

/** Non-overlapping occurrences, scanning left to right. An empty needle counts 0. */
export function countOccurrences(haystack: string, needle: string): number {
  if (!needle.length) return 0;
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count++;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}
