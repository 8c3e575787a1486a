export const TRUNCATION_MARKER = "... (truncated)";

/** Caps a prompt block at `maxChars`, marking the cut. Non-strings are JSON-encoded first. */
export function truncate(value: unknown, maxChars: number): string {
  const text = typeof value === "string" ? value : JSON.stringify(value) ?? String(value);
  if (text.length <= maxChars) return text;
  return text.slice(0, maxChars) + TRUNCATION_MARKER;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
