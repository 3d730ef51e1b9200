// Whole-string page number shapes; always noise when found in a band
export const PAGE_NUMBER_PATTERNS: readonly RegExp[] = [
  /^\d+$/, // "12"
  /^Page\s+\d+$/i, // "Page 12"
  /^\d+\s*\/\s*\d+$/, // "12 / 40"
  /^-\s*\d+\s*-$/, // "- 12 -"
  /^\d+\s+페이지$/, // "12 페이지"
  /^p\.\s*\d+$/i, // "p. 12"
];

export function isPageNumber(text: string): boolean {
  const trimmed = text.trim();
  return PAGE_NUMBER_PATTERNS.some((pattern) => pattern.test(trimmed));
}
