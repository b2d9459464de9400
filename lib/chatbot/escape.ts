// lib/chatbot/escape.ts
// Escaping for the five characters that break a quoted one-line string:
// backslash, double quote, newline, carriage return, tab.
// Plus a lenient "field":"value" extractor for upstream bodies that are not valid JSON.

const ESCAPES: Record<string, string> = {
  "\\": "\\\\",
  '"': '\\"',
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
};

const UNESCAPES: Record<string, string> = {
  "\\": "\\",
  '"': '"',
  n: "\n",
  r: "\r",
  t: "\t",
};

export function escapeText(s: string): string {
  let out = "";
  for (const ch of s) out += ESCAPES[ch] ?? ch;
  return out;
}

// Single left-to-right pass so "\\n" decodes to backslash + "n", not a newline.
// Unknown escapes and a trailing lone backslash are kept verbatim.
export function unescapeText(s: string): string {
  let out = "";
  for (let i = 0; i < s.length; i++) {
    const ch = s[i];
    if (ch !== "\\" || i === s.length - 1) {
      out += ch;
      continue;
    }
    const next = s[i + 1];
    const mapped = UNESCAPES[next];
    out += mapped ?? ch + next;
    i++;
  }
  return out;
}

function skipSpaces(text: string, i: number): number {
  while (i < text.length && /\s/.test(text[i])) i++;
  return i;
}

/**
 * Finds `"field": "value"` at or after `from` and returns the unescaped value.
 * Escaped quotes inside the value do not end it. Returns undefined when the
 * field is missing, not a string, or the value is never closed.
 */
export function extractStringField(text: string, field: string, from = 0): string | undefined {
  const key = `"${field}"`;
  let at = text.indexOf(key, Math.max(0, from));
  while (at !== -1) {
    let i = skipSpaces(text, at + key.length);
    if (text[i] === ":") {
      i = skipSpaces(text, i + 1);
      if (text[i] === '"') {
        const start = i + 1;
        for (let j = start; j < text.length; j++) {
          if (text[j] === "\\") {
            j++;
            continue;
          }
          if (text[j] === '"') return unescapeText(text.slice(start, j));
        }
        return undefined;
      }
    }
    at = text.indexOf(key, at + key.length);
  }
  return undefined;
}

/**
 * Depth-first search of a decoded JSON value for the first `key` whose value
 * `pick` accepts, at any nesting level (arrays included).
 */
export function findKeyed<T>(value: unknown, key: string, pick: (v: unknown) => T | undefined): T | undefined {
  if (Array.isArray(value)) {
    for (const item of value) {
      const hit = findKeyed(item, key, pick);
      if (hit !== undefined) return hit;
    }
    return undefined;
  }
  if (typeof value !== "object" || value === null) return undefined;
  for (const [k, v] of Object.entries(value)) {
    if (k === key) {
      const hit = pick(v);
      if (hit !== undefined) return hit;
    }
    const nested = findKeyed(v, key, pick);
    if (nested !== undefined) return nested;
  }
  return undefined;
}

// One-line preview for logs.
export function previewText(s: string, max = 500): string {
  const flat = escapeText(s);
  return flat.length > max ? `${flat.slice(0, max)}…` : flat;
}
