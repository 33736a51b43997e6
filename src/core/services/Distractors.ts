import { OPTION_COUNT } from '../entities/Flashcard';

export type DistractorPool = 'confusable' | 'phonetic';

// Same-language words learners commonly mix up with the key
const CONFUSABLE: Readonly<Record<string, readonly string[]>> = {
  bonjour: ['bonsoir', 'au revoir', 'salut'],
  'au revoir': ['bonjour', 'à bientôt', 'merci'],
  merci: ['pardon', "s'il vous plaît", 'de rien'],
  oui: ['non', 'peut-être', 'bien sûr'],
  non: ['oui', 'jamais', 'pas du tout'],
  hello: ['goodbye', 'thanks', 'sorry'],
  goodbye: ['hello', 'welcome', 'please'],
  'thank you': ['excuse me', "you're welcome", 'sorry'],
  yes: ['no', 'maybe', 'sure'],
  no: ['yes', 'never', 'not at all'],
};

const PHONETIC: Readonly<Record<string, readonly string[]>> = {
  hello: ['halo', 'hollow', 'hero'],
  goodbye: ['good buy', 'good by', 'good bye'],
  thank: ['think', 'thick', 'thunk'],
};

const POOLS: Record<DistractorPool, Readonly<Record<string, readonly string[]>>> = {
  confusable: CONFUSABLE,
  phonetic: PHONETIC,
};

function key(value: string): string {
  return value.trim().toLowerCase();
}

/**
 * Wrong options for `answer`: the static table entry when there is one, then
 * `option1`, `option2`, ... labels. Never returns the answer, anything in
 * `exclude`, or the same entry twice (compared case-insensitively).
 * Deterministic for a given answer.
 */
export function generateDistractors(
  answer: string,
  pool: DistractorPool = 'confusable',
  count: number = OPTION_COUNT - 1,
  exclude: readonly string[] = []
): string[] {
  const taken = new Set([key(answer), ...exclude.map(key)]);
  const out: string[] = [];

  for (const candidate of POOLS[pool][key(answer)] ?? []) {
    if (out.length >= count) break;
    if (taken.has(key(candidate))) continue;
    taken.add(key(candidate));
    out.push(candidate);
  }

  for (let i = 1; out.length < count; i++) {
    const label = `option${i}`;
    if (taken.has(label)) continue;
    taken.add(label);
    out.push(label);
  }
  return out;
}

// Fisher-Yates on a copy
export function shuffle<T>(items: readonly T[], random: () => number = Math.random): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}
