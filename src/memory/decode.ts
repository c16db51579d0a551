/**
 * Tolerant JSON-array decoding for free-text model output.
 *
 * Models asked for "a JSON array" routinely wrap it in prose or code fences.
 * Decoding order:
 * 1. The whole (trimmed) text, if it parses to an array.
 * 2. The substring from the first `[` to the last `]`, if that parses to an array.
 * 3. Otherwise null. Callers treat null as "no result".
 */
export function decodeJsonArray(text: string): unknown[] | null {
  const direct = tryParse(text.trim());
  if (Array.isArray(direct)) {
    return direct;
  }

  const start = text.indexOf('[');
  const end = text.lastIndexOf(']');
  if (start === -1 || end <= start) {
    return null;
  }

  const embedded = tryParse(text.slice(start, end + 1));
  return Array.isArray(embedded) ? embedded : null;
}

function tryParse(text: string): unknown {
  if (!text) return undefined;
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
}
