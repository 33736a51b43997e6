import {
  REPAIR_RULES,
  dropOrphanedStrings,
  insertMissingCommas,
  removeTrailingCommas,
  repairJson,
} from '../JsonRepair';

describe('JsonRepair', () => {
  describe('removeTrailingCommas', () => {
    it('should drop commas before closing braces and brackets', () => {
      expect(removeTrailingCommas('{"a": 1,}')).toBe('{"a": 1}');
      expect(removeTrailingCommas('[1, 2, ]')).toBe('[1, 2 ]');
      expect(removeTrailingCommas('{"a": 1,,}')).toBe('{"a": 1}');
    });

    it('should leave commas inside strings alone', () => {
      expect(removeTrailingCommas('{"a": "x,}"}')).toBe('{"a": "x,}"}');
      expect(removeTrailingCommas('{"a": "say \\"hi\\",]"}')).toBe('{"a": "say \\"hi\\",]"}');
    });
  });

  describe('insertMissingCommas', () => {
    it('should separate adjacent objects and arrays', () => {
      expect(insertMissingCommas('[{"a": 1}{"b": 2}]')).toBe('[{"a": 1},{"b": 2}]');
      expect(insertMissingCommas('[[1][2]]')).toBe('[[1],[2]]');
    });

    it('should add a comma between a closer and a following key', () => {
      expect(insertMissingCommas('{"a": [1]\n"b": 2}')).toBe('{"a": [1],\n"b": 2}');
    });

    it('should add a comma after a value line followed by a key line', () => {
      expect(insertMissingCommas('{\n  "a": "x"\n  "b": 2\n}')).toBe('{\n  "a": "x",\n  "b": 2\n}');
      expect(insertMissingCommas('{\n  "a": 10\n  "b": true\n  "c": null\n}')).toBe(
        '{\n  "a": 10,\n  "b": true,\n  "c": null\n}'
      );
    });

    it('should not touch a key whose value is on the next line', () => {
      expect(insertMissingCommas('{\n"a":\n"value"\n}')).toBe('{\n"a":\n"value"\n}');
    });
  });

  describe('dropOrphanedStrings', () => {
    it('should drop a bare string where a key was expected', () => {
      expect(dropOrphanedStrings('{\n  "a": 1,\n  "stray text"\n  "b": 2\n}')).toBe('{\n  "a": 1,\n  "b": 2\n}');
    });

    it('should keep strings inside arrays', () => {
      const text = '{"list": [\n"a",\n"b"\n]}';
      expect(dropOrphanedStrings(text)).toBe(text);
    });

    it('should drop a bare string that follows a nested object', () => {
      expect(dropOrphanedStrings('{\n  "card": {"id": "card_1"}\n  "stray note"\n}')).toBe(
        '{\n  "card": {"id": "card_1"}\n}'
      );
    });

    it('should keep a key whose colon is on the next line', () => {
      const text = '{"a": true,\n"v"\n: 1}';
      expect(dropOrphanedStrings(text)).toBe(text);
    });

    it('should keep a value that follows its key on the next line', () => {
      const text = '{\n"a":\n"value"\n}';
      expect(dropOrphanedStrings(text)).toBe(text);
    });
  });

  describe('repairJson', () => {
    it('should apply the rules in order', () => {
      expect(REPAIR_RULES.map((rule) => rule.name)).toEqual([
        'drop-orphaned-strings',
        'insert-missing-commas',
        'remove-trailing-commas',
      ]);
    });

    it('should turn a near-miss response into parseable JSON', () => {
      const text = [
        '{',
        '  "word": "hello",',
        '  "note"',
        '  "synonyms": ["hi", "hey",],',
        '  "examples": [{"t": 1}{"t": 2}]',
        '}',
      ].join('\n');

      expect(JSON.parse(repairJson(text))).toEqual({
        word: 'hello',
        synonyms: ['hi', 'hey'],
        examples: [{ t: 1 }, { t: 2 }],
      });
    });

    it('should return text without known problems unchanged', () => {
      expect(repairJson('no json here')).toBe('no json here');
      expect(repairJson('{"a": [1, 2]}')).toBe('{"a": [1, 2]}');
    });

    it('should repair a stray line after a nested object in a single call', () => {
      const once = repairJson('{\n  "card": {"id": "card_1"}\n  "stray note"\n}');

      expect(once).toBe('{\n  "card": {"id": "card_1"}\n}');
      expect(repairJson(once)).toBe(once);
      expect(JSON.parse(once)).toEqual({ card: { id: 'card_1' } });
    });

    it('should be stable after one pass', () => {
      const samples = [
        '{"a": 1,,}',
        '{\n  "a": "x"\n  "orphan"\n  "b": [1,]\n}{"c": 3}',
        '{"a": "unterminated',
        '[{"id": "card_1"}{"id": "card_2"},]',
        '{"a": "say \\"hi\\",}"}',
        '{"a": true\n"v"\n: 1',
        '{\n"a": {"b": [1]}\n"c"\n"d": 2\n}',
        '',
      ];
      for (const sample of samples) {
        const once = repairJson(sample);
        expect(repairJson(once)).toBe(once);
      }
    });
  });
});
