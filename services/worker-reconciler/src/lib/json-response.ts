/**
 * JSON payloads from model responses that may wrap the object in a
 * markdown fence or surrounding prose.
 */

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/;
const OBJECT_SPAN = /\{[\s\S]*\}/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse the first JSON candidate that succeeds: a fenced block, the widest
 * `{...}` span, then the whole text.
 *
 * @throws SyntaxError when no candidate parses
 */
export function parseJsonContent(text: string): unknown {
  const candidates = [text.match(FENCED_BLOCK)?.[1], text.match(OBJECT_SPAN)?.[0]];

  for (const candidate of candidates) {
    if (candidate === undefined) {
      continue;
    }
    try {
      return JSON.parse(candidate.trim());
    } catch {
      // next candidate
    }
  }

  try {
    return JSON.parse(text.trim());
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SyntaxError(`Could not extract JSON from response: ${reason}`);
  }
}
