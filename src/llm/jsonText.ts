/** Removes a leading ```json / ``` fence and a trailing ``` fence, then trims. */
export function cleanJsonResponseText(text: string): string {
  let cleaned = text.trim();
  if (cleaned.startsWith('```json')) {
    cleaned = cleaned.slice('```json'.length);
  } else if (cleaned.startsWith('```')) {
    cleaned = cleaned.slice(3);
  }
  if (cleaned.endsWith('```')) {
    cleaned = cleaned.slice(0, -3);
  }
  return cleaned.trim();
}

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}
