export type JsonObject = Record<string, unknown>;

export type JsonExtraction<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

interface Delimiters {
  open: "{" | "[";
  close: "}" | "]";
}

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/gi;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isJsonArray(value: unknown): value is unknown[] {
  return Array.isArray(value);
}

function tryParse(candidate: string): { parsed: boolean; value: unknown } {
  try {
    const value: unknown = JSON.parse(candidate);
    return { parsed: true, value };
  } catch {
    return { parsed: false, value: undefined };
  }
}

/**
 * Returns the first balanced value starting at the first opening delimiter.
 * Delimiters inside JSON strings are ignored.
 */
function firstBalanced(text: string, { open, close }: Delimiters): string | null {
  const start = text.indexOf(open);
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];

    if (inString) {
      if (escaped) escaped = false;
      else if (char === "\\") escaped = true;
      else if (char === '"') inString = false;
      continue;
    }

    if (char === '"') inString = true;
    else if (char === open) depth++;
    else if (char === close) {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }

  return null;
}

function outerSubstring(text: string, { open, close }: Delimiters): string | null {
  const start = text.indexOf(open);
  const end = text.lastIndexOf(close);
  return start !== -1 && end > start ? text.slice(start, end + 1) : null;
}

function candidates(text: string, delimiters: Delimiters): string[] {
  const found: string[] = [];

  for (const match of text.matchAll(FENCED_BLOCK)) {
    const body = match[1].trim();
    found.push(body);
    const balanced = firstBalanced(body, delimiters);
    if (balanced) found.push(balanced);
  }

  const balanced = firstBalanced(text, delimiters);
  if (balanced) found.push(balanced);

  const outer = outerSubstring(text, delimiters);
  if (outer) found.push(outer);

  found.push(text.trim());
  return found;
}

function extract<T>(
  text: string,
  delimiters: Delimiters,
  guard: (value: unknown) => value is T,
  label: string,
): JsonExtraction<T> {
  if (!text.trim()) {
    return { ok: false, reason: "empty response" };
  }

  for (const candidate of candidates(text, delimiters)) {
    const { parsed, value } = tryParse(candidate);
    if (parsed && guard(value)) {
      return { ok: true, value };
    }
  }

  return { ok: false, reason: `no parseable JSON ${label} found in response` };
}

/**
 * Recovers the first JSON object embedded in free-form model output.
 */
export function extractJsonObject(text: string): JsonExtraction<JsonObject> {
  return extract(text, { open: "{", close: "}" }, isJsonObject, "object");
}

/**
 * Recovers the first JSON array embedded in free-form model output.
 */
export function extractJsonArray(text: string): JsonExtraction<unknown[]> {
  return extract(text, { open: "[", close: "]" }, isJsonArray, "array");
}
