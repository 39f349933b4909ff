import { JsonObject } from '../types';

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseObject(candidate: string): JsonObject | null {
  try {
    const parsed: unknown = JSON.parse(candidate);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Fixes the formatting slips model output tends to contain: trailing
 * commas before `}` or `]`, and a string value broken across lines.
 */
export function repairJsonCandidate(candidate: string): string {
  return candidate
    .replace(/,\s*}/g, '}')
    .replace(/,\s*]/g, ']')
    .replace(/"\s*\n\s*"/g, '" "');
}

/**
 * Pulls the JSON object out of free text. The candidate runs from the first
 * `{` to the last `}`, so two separate objects in one response end up in a
 * single span and fail to parse.
 */
export function extractJsonObject(text: string): JsonObject | null {
  if (!text || !text.includes('{')) return null;

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (end < start) return null;

  const candidate = text.slice(start, end + 1);

  const direct = tryParseObject(candidate);
  if (direct) return direct;

  const repaired = tryParseObject(repairJsonCandidate(candidate));
  if (!repaired) {
    console.warn('⚠️ JSON parsing failed after repair.');
  }
  return repaired;
}
