/**
 * JSON object extraction from model replies.
 */

const PREVIEW_CHARS = 400;

function preview(text: string): string {
  const s = text.trim();
  return s.length <= PREVIEW_CHARS ? s : `${s.slice(0, PREVIEW_CHARS)}...`;
}

const FENCED_OBJECT = /```(?:json)?\s*(\{[\s\S]*?\})\s*```/i;

/**
 * Parses the reply as JSON; failing that, the first fenced ```json block;
 * failing that, the span from the first "{" to the last "}".
 */
export function parseJsonObject(text: string): unknown {
  const trimmed = text.trim();
  const fenced = trimmed.match(FENCED_OBJECT)?.[1];
  const start = trimmed.indexOf("{");
  const end = trimmed.lastIndexOf("}");
  const candidates = [trimmed, fenced, start >= 0 && end > start ? trimmed.slice(start, end + 1) : undefined];

  let lastError: unknown;
  for (const candidate of candidates) {
    if (candidate === undefined) continue;
    try {
      return JSON.parse(candidate);
    } catch (err) {
      lastError = err;
    }
  }
  if (start < 0) throw new Error(`No JSON object found. Output: ${preview(text)}`);
  const reason = lastError instanceof Error ? lastError.message : String(lastError);
  throw new Error(`JSON parse failed: ${reason}. Output: ${preview(text)}`);
}
