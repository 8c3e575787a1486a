/**
 * Pulls the outermost `{...}` out of free text (first "{" to last "}") and
 * parses it. Models wrap JSON in prose or code fences often enough that a
 * bare JSON.parse on the whole response is not an option.
 */
export function extractJsonObject(text: string): unknown | null {
  const match = /\{[\s\S]*\}/.exec(text);
  if (!match) return null;
  try {
    const parsed: unknown = JSON.parse(match[0]);
    return parsed;
  } catch {
    return null;
  }
}
