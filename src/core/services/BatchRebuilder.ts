import { CandidateObject, JsonValue } from './CandidateReader';

export interface RebuildPlan {
  // key the recovered records are collected under
  collection: string;
  stringFields: readonly string[];
  numberFields: readonly string[];
  booleanFields: readonly string[];
  arrayFields: readonly string[];
  objectFields: readonly string[];
  // a record missing any of these is not recovered
  required: readonly string[];
}

export interface RecordRebuilder {
  rebuild(text: string, expectedCount: number): CandidateObject;
}

export const FLASHCARD_REBUILD_PLAN: RebuildPlan = {
  collection: 'cards',
  stringFields: [
    'wordId',
    'type',
    'subType',
    'question',
    'answer',
    'explanation',
    'difficulty',
    'questionLanguage',
    'answerLanguage',
    'context',
    'originalContext',
    'contextExplanation',
    'contextTranslation',
    'audioUrl',
    'phonetic',
  ],
  numberFields: ['timeLimit', 'points', 'showTime', 'responseTime'],
  booleanFields: ['speedBonus'],
  arrayFields: ['options', 'hints'],
  objectFields: ['audioMetadata'],
  required: ['question', 'answer'],
};

export const QUIZ_REBUILD_PLAN: RebuildPlan = {
  collection: 'questions',
  stringFields: ['type', 'question', 'answer', 'difficulty', 'explanation'],
  numberFields: [],
  booleanFields: [],
  arrayFields: ['options'],
  objectFields: [],
  required: ['question', 'answer'],
};

// string ids, or numeric ones such as "id": 1
const ID_TOKEN = /"id"\s*:\s*(?:"((?:[^"\\\n]|\\.)*)"|(-?\d+))/g;
const STRING_BODY = '((?:[^"\\\\\\n]|\\\\.)*)';

function escapeForPattern(name: string): string {
  return name.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function unescapeJsonString(body: string): string {
  try {
    const value: unknown = JSON.parse(`"${body}"`);
    return typeof value === 'string' ? value : body;
  } catch {
    return body;
  }
}

function findString(segment: string, field: string): string | undefined {
  const match = new RegExp(`"${escapeForPattern(field)}"\\s*:\\s*"${STRING_BODY}"`).exec(segment);
  return match ? unescapeJsonString(match[1]) : undefined;
}

function findNumber(segment: string, field: string): number | undefined {
  const match = new RegExp(`"${escapeForPattern(field)}"\\s*:\\s*(-?\\d+(?:\\.\\d+)?)`).exec(segment);
  return match ? Number(match[1]) : undefined;
}

function findBoolean(segment: string, field: string): boolean | undefined {
  const match = new RegExp(`"${escapeForPattern(field)}"\\s*:\\s*(true|false)`).exec(segment);
  return match ? match[1] === 'true' : undefined;
}

function findStringArray(segment: string, field: string): string[] | undefined {
  const match = new RegExp(`"${escapeForPattern(field)}"\\s*:\\s*\\[([^\\]]*)\\]`).exec(segment);
  if (!match) return undefined;
  const items: string[] = [];
  for (const item of match[1].matchAll(new RegExp(`"${STRING_BODY}"`, 'g'))) {
    items.push(unescapeJsonString(item[1]));
  }
  return items;
}

function findFlatObject(segment: string, field: string): CandidateObject | undefined {
  const match = new RegExp(`"${escapeForPattern(field)}"\\s*:\\s*(\\{[^{}]*\\})`).exec(segment);
  if (!match) return undefined;
  try {
    const value: unknown = JSON.parse(match[1]);
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return undefined;
    const out: CandidateObject = {};
    for (const [key, entry] of Object.entries(value)) {
      if (typeof entry === 'string' || typeof entry === 'number' || typeof entry === 'boolean') out[key] = entry;
    }
    return out;
  } catch {
    return undefined;
  }
}

/**
 * Recovers batch records from text that no longer parses as JSON. Each `"id"`
 * token starts a record; its fields are searched for between that record's
 * opening brace and the next one, whatever the nesting looks like.
 */
export class BatchRebuilder implements RecordRebuilder {
  constructor(private plan: RebuildPlan) {}

  rebuild(text: string, expectedCount: number): CandidateObject {
    const records: JsonValue[] = [];
    for (const segment of this.segments(text)) {
      if (records.length >= expectedCount) break;
      const record = this.readRecord(segment.id, segment.body);
      if (record) records.push(record);
    }
    return { [this.plan.collection]: records };
  }

  private segments(text: string): Array<{ id: string | number; body: string }> {
    const found: Array<{ id: string | number; start: number }> = [];
    for (const match of text.matchAll(ID_TOKEN)) {
      const at = match.index ?? 0;
      const brace = text.lastIndexOf('{', at);
      const previous = found[found.length - 1];
      // a brace that belongs to the previous record does not start this one
      const start = brace === -1 || (previous !== undefined && brace <= previous.start) ? at : brace;
      const id = match[1] !== undefined ? unescapeJsonString(match[1]) : Number(match[2]);
      found.push({ id, start });
    }
    return found.map((entry, index) => ({
      id: entry.id,
      body: text.slice(entry.start, found[index + 1]?.start ?? text.length),
    }));
  }

  private readRecord(id: string | number, segment: string): CandidateObject | undefined {
    const record: CandidateObject = { id };
    for (const field of this.plan.stringFields) {
      const value = findString(segment, field);
      if (value !== undefined) record[field] = value;
    }
    for (const field of this.plan.numberFields) {
      const value = findNumber(segment, field);
      if (value !== undefined) record[field] = value;
    }
    for (const field of this.plan.booleanFields) {
      const value = findBoolean(segment, field);
      if (value !== undefined) record[field] = value;
    }
    for (const field of this.plan.arrayFields) {
      const value = findStringArray(segment, field);
      if (value !== undefined) record[field] = value;
    }
    for (const field of this.plan.objectFields) {
      const value = findFlatObject(segment, field);
      if (value !== undefined) record[field] = value;
    }
    return this.plan.required.every((field) => record[field] !== undefined) ? record : undefined;
  }
}
