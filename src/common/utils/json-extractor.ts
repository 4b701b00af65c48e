/**
 * JSON extraction from model output
 *
 * Models wrap JSON in code fences, prepend prose, leave trailing commas or
 * raw newlines inside strings. extractJsonObject tries progressively looser
 * strategies and returns undefined when none yields an object; callers
 * decide what a failed parse means for them.
 *
 * The field extractors recover scalar values from text that never became
 * valid JSON.
 */

/**
 * Find matching closing brace, honouring strings and escapes
 */
function findMatchingBrace(str: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = start; i < str.length; i++) {
    const c = str[i];

    if (escape) {
      escape = false;
      continue;
    }

    if (c === '\\') {
      escape = true;
      continue;
    }

    if (c === '"') {
      inString = !inString;
      continue;
    }

    if (!inString) {
      if (c === '{') depth++;
      if (c === '}') {
        depth--;
        if (depth === 0) return i;
      }
    }
  }

  return str.lastIndexOf('}');
}

/**
 * Escape raw newlines inside string values
 */
function fixNewlinesInStrings(json: string): string {
  let result = '';
  let inString = false;
  let escape = false;

  for (const c of json) {
    if (escape) {
      result += c;
      escape = false;
      continue;
    }

    if (c === '\\') {
      result += c;
      escape = true;
      continue;
    }

    if (c === '"') {
      inString = !inString;
      result += c;
      continue;
    }

    if (inString && c === '\n') {
      result += '\\n';
      continue;
    }

    result += c;
  }

  return result;
}

/**
 * Plain object check usable as a type guard
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function tryParseObject(text: string): Record<string, unknown> | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    if (isRecord(parsed)) {
      return parsed;
    }
  } catch {
    // next strategy
  }
  return undefined;
}

/**
 * Parse a JSON object out of model output
 *
 * Strategy 1: Direct JSON.parse
 * Strategy 2: Strip code fences and cut at the object boundaries
 * Strategy 3: Escape raw newlines inside strings
 * Strategy 4: Drop trailing commas and control characters
 */
export function extractJsonObject(text: string): Record<string, unknown> | undefined {
  const trimmed = text.trim();
  if (!trimmed) return undefined;

  const direct = tryParseObject(trimmed);
  if (direct) return direct;

  let cleaned = trimmed
    .replace(/```json\s*/gi, '')
    .replace(/```\s*/g, '')
    .trim();

  const start = cleaned.indexOf('{');
  if (start === -1) return undefined;
  const end = findMatchingBrace(cleaned, start);
  if (end <= start) return undefined;

  cleaned = cleaned.substring(start, end + 1);
  const bounded = tryParseObject(cleaned);
  if (bounded) return bounded;

  cleaned = fixNewlinesInStrings(cleaned);
  const newlinesFixed = tryParseObject(cleaned);
  if (newlinesFixed) return newlinesFixed;

  cleaned = cleaned
    .replace(/,\s*}/g, '}')
    .replace(/,\s*]/g, ']')
    .replace(/[\x00-\x1F]/g, ' ');
  return tryParseObject(cleaned);
}

const STRING_BODY = '((?:[^"\\\\]|\\\\.)*)';

function unescapeFragment(value: string): string {
  return value.replace(/\\"/g, '"').replace(/\\n/g, ' ').trim();
}

function escapeFieldName(field: string): string {
  return field.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Recover a "field": "value" string from malformed JSON text
 */
export function extractStringField(text: string, field: string): string | undefined {
  const pattern = new RegExp(`"${escapeFieldName(field)}"\\s*:\\s*"${STRING_BODY}"`);
  const match = text.match(pattern);
  if (!match) return undefined;
  const value = unescapeFragment(match[1]);
  return value || undefined;
}

/**
 * Recover a "field": ["a", "b"] string list from malformed JSON text
 */
export function extractStringArrayField(text: string, field: string): string[] {
  const pattern = new RegExp(`"${escapeFieldName(field)}"\\s*:\\s*\\[([\\s\\S]*?)\\]`);
  const match = text.match(pattern);
  if (!match) return [];
  const items: string[] = [];
  for (const item of match[1].matchAll(new RegExp(`"${STRING_BODY}"`, 'g'))) {
    const value = unescapeFragment(item[1]);
    if (value) items.push(value);
  }
  return items;
}
