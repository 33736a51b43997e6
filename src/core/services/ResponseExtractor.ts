import { ExtractionError } from '../errors';
import { CandidateObject, isCandidateObject } from './CandidateReader';

export interface ResponseExtractor {
  // prefers the first object `accepts` approves, else the first object found
  extract(rawText: string, accepts?: (candidate: CandidateObject) => boolean): CandidateObject;
}

// Chat-control tokens, code fences and role-name leftovers models wrap around JSON
const NON_CONTENT_PATTERNS: ReadonlyArray<[RegExp, string]> = [
  [/<\|[^|]*\|>/g, ''],
  [/```[a-zA-Z]*[ \t]*/g, ''],
  [/\bassistant\s*(?=\{)/gi, ''],
];

export function stripNonContent(text: string): string {
  let cleaned = text;
  for (const [pattern, replacement] of NON_CONTENT_PATTERNS) {
    cleaned = cleaned.replace(pattern, replacement);
  }
  return cleaned.trim();
}

/**
 * Yields every top-level balanced `{...}` span in order of appearance.
 * Braces inside string literals do not count; quotes outside any object
 * (leading prose) are ignored.
 */
export function* balancedObjectSpans(text: string): Generator<string> {
  let depth = 0;
  let start = -1;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"' && depth > 0) {
      inString = true;
    } else if (ch === '{') {
      if (depth === 0) start = i;
      depth++;
    } else if (ch === '}' && depth > 0) {
      depth--;
      if (depth === 0) {
        yield text.slice(start, i + 1);
        start = -1;
      }
    }
  }
}

function tryParseObject(text: string): CandidateObject | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    return isCandidateObject(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

export class JsonResponseExtractor implements ResponseExtractor {
  extract(rawText: string, accepts: (candidate: CandidateObject) => boolean = () => true): CandidateObject {
    const direct = tryParseObject(rawText.trim());
    if (direct) return direct;

    const cleaned = stripNonContent(rawText);
    let first: CandidateObject | undefined;
    for (const span of balancedObjectSpans(cleaned)) {
      const parsed = tryParseObject(span);
      if (!parsed) continue;
      if (accepts(parsed)) return parsed;
      first ??= parsed;
    }
    if (first) return first;

    throw new ExtractionError(
      cleaned ? 'No valid JSON object found in model response' : 'Model response was empty'
    );
  }
}
