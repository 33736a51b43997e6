import { generateDistractors, shuffle } from '../Distractors';

describe('generateDistractors', () => {
  it('should use the confusable table for known words', () => {
    expect(generateDistractors('bonjour')).toEqual(['bonsoir', 'au revoir', 'salut']);
  });

  it('should look words up case-insensitively', () => {
    expect(generateDistractors(' Bonjour ')).toEqual(['bonsoir', 'au revoir', 'salut']);
  });

  it('should fill with numbered labels for unknown words', () => {
    expect(generateDistractors('chien')).toEqual(['option1', 'option2', 'option3']);
  });

  it('should skip excluded entries and labels already taken', () => {
    expect(generateDistractors('oui', 'confusable', 3, ['non'])).toEqual(['peut-être', 'bien sûr', 'option1']);
    expect(generateDistractors('option1')).toEqual(['option2', 'option3', 'option4']);
  });

  it('should use the phonetic table when asked', () => {
    expect(generateDistractors('hello', 'phonetic')).toEqual(['halo', 'hollow', 'hero']);
    expect(generateDistractors('hello')).toEqual(['goodbye', 'thanks', 'sorry']);
  });

  it('should honour the requested count', () => {
    expect(generateDistractors('bonjour', 'confusable', 1)).toEqual(['bonsoir']);
    expect(generateDistractors('bonjour', 'confusable', 0)).toEqual([]);
  });
});

describe('shuffle', () => {
  it('should permute a copy with the given random source', () => {
    const items = ['a', 'b', 'c', 'd'];

    expect(shuffle(items, () => 0)).toEqual(['b', 'c', 'd', 'a']);
    expect(items).toEqual(['a', 'b', 'c', 'd']);
  });

  it('should keep the order when every draw picks the last slot', () => {
    expect(shuffle([1, 2, 3], () => 0.999)).toEqual([1, 2, 3]);
  });
});
