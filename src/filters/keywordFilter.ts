/**
 * Keywords from `required` that are absent from the title (case-insensitive).
 * Keywords are expected lowercase already.
 */
export function missingKeywords(title: string, required: readonly string[]): string[] {
  const lowered = title.toLowerCase();
  return required.filter(kw => !lowered.includes(kw));
}

export function matchesAllKeywords(title: string, required: readonly string[]): boolean {
  return missingKeywords(title, required).length === 0;
}
