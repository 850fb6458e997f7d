/**
 * Helpers shared by the prompt builders and response parsers.
 */

/**
 * Pulls a JSON value out of a model response.
 *
 * Handles JSON wrapped in a markdown code block and JSON surrounded by
 * prose (first `{` to last `}`). Returns undefined when nothing parses.
 */
export function extractJson(response: string): unknown {
  if (!response) {
    return undefined;
  }

  // First, try to find JSON in a code block
  const codeBlockMatch = response.match(/```(?:json)?\s*([\s\S]*?)```/);
  const jsonString = codeBlockMatch ? codeBlockMatch[1].trim() : response.trim();

  // If still not valid JSON, try to find the first { to last }
  let finalJsonString = jsonString;
  if (!jsonString.startsWith('{')) {
    const startIdx = jsonString.indexOf('{');
    const endIdx = jsonString.lastIndexOf('}');
    if (startIdx !== -1 && endIdx !== -1 && endIdx > startIdx) {
      finalJsonString = jsonString.substring(startIdx, endIdx + 1);
    }
  }

  try {
    const parsed: unknown = JSON.parse(finalJsonString);
    return parsed;
  } catch {
    return undefined;
  }
}

/**
 * Prepares learner- or model-authored text for inclusion in a prompt.
 *
 * Trims it, escapes closing tags of the prompt's own delimiters and breaks
 * up code fences so the text cannot end a section early.
 *
 * @param tags - Delimiter tag names used by the calling prompt
 */
export function sanitizeInput(input: string, tags: readonly string[] = []): string {
  let result = input.trim();
  for (const tag of tags) {
    result = result.replace(new RegExp(`</${tag}>`, 'gi'), `&lt;/${tag}&gt;`);
  }
  return result.replace(/```json/gi, '` ` `json').replace(/```/g, '` ` `');
}

/**
 * Normalizes a 0-1 score. Whole percentages (2-100) are scaled down;
 * anything else outside the range is clamped, so 1.5 reads as 1.
 * Non-numbers give null.
 */
export function normalizeScore(value: unknown): number | null {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    return null;
  }
  if (Number.isInteger(value) && value >= 2 && value <= 100) {
    return value / 100;
  }
  return Math.min(1, Math.max(0, value));
}
