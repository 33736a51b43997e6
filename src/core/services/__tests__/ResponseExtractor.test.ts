import { ExtractionError } from '../../errors';
import { CandidateObject } from '../CandidateReader';
import { JsonResponseExtractor, balancedObjectSpans, stripNonContent } from '../ResponseExtractor';

describe('JsonResponseExtractor', () => {
  let extractor: JsonResponseExtractor;

  beforeEach(() => {
    extractor = new JsonResponseExtractor();
  });

  it('should return well-formed JSON unchanged', () => {
    const original = {
      word: 'hello',
      usage_examples: ['Hello there', 'Hello, how are you?'],
      nested: { level: 'A2', count: 3, flag: false, empty: null },
    };

    expect(extractor.extract(JSON.stringify(original))).toEqual(original);
  });

  it('should unwrap markdown code fences', () => {
    expect(extractor.extract('```json\n{"a": 1}\n```')).toEqual({ a: 1 });
  });

  it('should find the object inside surrounding prose', () => {
    expect(extractor.extract('Here you go: {"a": "b}"} hope it helps')).toEqual({ a: 'b}' });
  });

  it('should strip chat-control tokens and a leading role name', () => {
    expect(extractor.extract('<|assistant|>{"a": 1}<|end|>')).toEqual({ a: 1 });
    expect(extractor.extract('assistant {"a": 2}')).toEqual({ a: 2 });
  });

  it('should skip spans that do not parse', () => {
    expect(extractor.extract('{not json} then {"ok": true}')).toEqual({ ok: true });
  });

  it('should prefer the first object the caller accepts', () => {
    const raw = 'For example {"sample": true}. Here are yours: {"cards": [{"id": "card_1"}]}';
    const hasCards = (candidate: CandidateObject): boolean => Array.isArray(candidate.cards);

    expect(extractor.extract(raw, hasCards)).toEqual({ cards: [{ id: 'card_1' }] });
    expect(extractor.extract(raw)).toEqual({ sample: true });
    expect(extractor.extract('Only {"sample": true}', hasCards)).toEqual({ sample: true });
  });

  it('should reject arrays and responses without objects', () => {
    expect(() => extractor.extract('[1, 2]')).toThrow(ExtractionError);
    expect(() => extractor.extract('[1, 2]')).toThrow('No valid JSON object found in model response');
  });

  it('should report an empty response', () => {
    expect(() => extractor.extract('  \n ')).toThrow('Model response was empty');
  });
});

describe('stripNonContent', () => {
  it('should remove fences, tokens and whitespace around the payload', () => {
    expect(stripNonContent('<|im_start|>```json\n{"a": 1}\n```<|im_end|>')).toBe('{"a": 1}');
  });
});

describe('balancedObjectSpans', () => {
  it('should yield each top-level object in order', () => {
    expect([...balancedObjectSpans('x {"a": {"b": 1}} y {"c": "}"} {open')]).toEqual([
      '{"a": {"b": 1}}',
      '{"c": "}"}',
    ]);
  });
});
