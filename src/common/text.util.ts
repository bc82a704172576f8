/** Rough token estimate used where no provider count exists (~4 chars per token). */
export function estimateTokens(text: string): number {
  return Math.floor(text.length / 4);
}

export function preview(text: string, max = 60): string {
  return `${text.slice(0, max)}${text.length > max ? '…' : ''}`;
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Strips LLM formatting artifacts and extracts the JSON object.
 *
 * Handles:
 * - <think>…</think> blocks (reasoning traces)
 * - ```json … ``` and bare ``` … ``` fenced blocks
 * - Leading/trailing prose around the JSON
 *
 * Throws SyntaxError if no JSON object can be extracted.
 */
export function extractJsonObject(response: string): Record<string, unknown> {
  let cleaned = response.replace(/<think>[\s\S]*?<\/think>/gi, '');

  const fencedMatch = /```(?:json)?\s*([\s\S]*?)```/i.exec(cleaned);
  if (fencedMatch) {
    cleaned = fencedMatch[1];
  }

  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  if (start !== -1 && end !== -1 && end > start) {
    cleaned = cleaned.slice(start, end + 1);
  }

  const parsed: unknown = JSON.parse(cleaned.trim());
  if (!isRecord(parsed)) {
    throw new SyntaxError(
      `Expected a JSON object, got: ${cleaned.slice(0, 200)}`,
    );
  }
  return parsed;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
