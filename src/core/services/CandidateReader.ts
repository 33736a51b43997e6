// Typed access to parsed-but-unvalidated model output.

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type CandidateObject = { [key: string]: JsonValue };

export function isCandidateObject(value: unknown): value is CandidateObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

type Keys = string | readonly string[];

// First key (in order) whose value is present and not null
function pick(obj: CandidateObject, keys: Keys): JsonValue | undefined {
  const list = typeof keys === 'string' ? [keys] : keys;
  for (const key of list) {
    const value = obj[key];
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}

function asText(value: JsonValue): string | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed ? trimmed : undefined;
  }
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

export function readString(obj: CandidateObject, keys: Keys): string | undefined {
  const list = typeof keys === 'string' ? [keys] : keys;
  for (const key of list) {
    const value = obj[key];
    if (value === undefined || value === null) continue;
    const text = asText(value);
    if (text !== undefined) return text;
  }
  return undefined;
}

// Non-empty trimmed strings only; undefined when the field is absent or not an array
export function readStringArray(obj: CandidateObject, keys: Keys): string[] | undefined {
  const value = pick(obj, keys);
  if (!Array.isArray(value)) return undefined;
  const out: string[] = [];
  for (const item of value) {
    const text = asText(item);
    if (text !== undefined) out.push(text);
  }
  return out;
}

export function readNumber(obj: CandidateObject, keys: Keys): number | undefined {
  const value = pick(obj, keys);
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function readBoolean(obj: CandidateObject, keys: Keys): boolean | undefined {
  const value = pick(obj, keys);
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return undefined;
}

export function readObject(obj: CandidateObject, keys: Keys): CandidateObject | undefined {
  const value = pick(obj, keys);
  return isCandidateObject(value) ? value : undefined;
}

export function readObjectArray(obj: CandidateObject, keys: Keys): CandidateObject[] | undefined {
  const value = pick(obj, keys);
  if (!Array.isArray(value)) return undefined;
  return value.filter(isCandidateObject);
}
