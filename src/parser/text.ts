/** Turns zero-width and non-breaking spaces into plain spaces, collapses whitespace and trims. */
export function cleanText(text: string | null | undefined): string {
  if (!text) return '';
  return text
    .replace(/[\u200b\u00a0]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}
