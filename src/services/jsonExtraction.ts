import { MalformedResponseError } from '../domain/services/exceptions';
import type { StructuredRecord } from '../domain/interfaces/modelGateway';

const LEADING_FENCE = /```json\s*/g;
const TRAILING_FENCE = /```\s*$/;
const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f-\u009f]/g;

function stripControlCharacters(text: string): string {
  return text.replace(CONTROL_CHARACTERS, '');
}

function isStructuredRecord(value: unknown): value is StructuredRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Recovers a JSON object from free-form model output.
 *
 * Markdown fences and control characters are removed before a strict parse.
 * When that fails, the outermost `{...}` span is parsed instead.
 */
export function extractStructured(responseText: string): StructuredRecord {
  const cleaned = stripControlCharacters(
    responseText.replace(LEADING_FENCE, '').replace(TRAILING_FENCE, '').trim()
  );

  let parsed = tryParse(cleaned);

  if (!parsed.ok) {
    const start = cleaned.indexOf('{');
    const end = cleaned.lastIndexOf('}');
    if (start !== -1 && end > start) {
      parsed = tryParse(stripControlCharacters(cleaned.slice(start, end + 1)));
    }
  }

  if (!parsed.ok) {
    throw new MalformedResponseError('Could not extract JSON from model response', responseText);
  }
  if (!isStructuredRecord(parsed.value)) {
    throw new MalformedResponseError('Model response is valid JSON but not an object', responseText);
  }
  return parsed.value;
}
