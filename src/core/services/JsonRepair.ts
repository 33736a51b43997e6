// Syntax fix-ups for near-miss JSON. Every rule is pure and only ever looks
// at text outside string literals.

export interface RepairRule {
  name: string;
  apply(text: string): string;
}

const STRING_LITERAL = /"(?:[^"\\\n]|\\.)*"/g;
const PLACEHOLDER = /"__STR(\d+)__"/g;
const PLACEHOLDER_LINE = /^\s*"__STR\d+__"\s*,?\s*$/;

/**
 * Runs `transform` on `text` with every string literal swapped for an indexed
 * placeholder, then puts the literals back. Placeholders keep their quotes so
 * rules can still tell where a string sits.
 */
export function withMaskedStrings(text: string, transform: (masked: string) => string): string {
  const literals: string[] = [];
  const masked = text.replace(STRING_LITERAL, (literal) => {
    literals.push(literal);
    return `"__STR${literals.length - 1}__"`;
  });
  return transform(masked).replace(PLACEHOLDER, (placeholder, index: string) => literals[Number(index)] ?? placeholder);
}

function lastSignificantChar(line: string): string | undefined {
  const trimmed = line.trimEnd();
  return trimmed ? trimmed[trimmed.length - 1] : undefined;
}

const CLOSERS = new Set(['}', ']']);

// A bare string on its own line inside an object, where a key was expected.
// A line whose colon sits on the next line is still a key.
export function dropOrphanedStrings(text: string): string {
  return withMaskedStrings(text, (masked) => {
    const lines = masked.split('\n');
    const stack: string[] = [];
    let previous: string | undefined;
    const kept: string[] = [];

    lines.forEach((line, index) => {
      const inObject = stack[stack.length - 1] === '{';
      const afterMember = previous === ',' || previous === '{' || (previous !== undefined && CLOSERS.has(previous));
      const next = lines.slice(index + 1).find((candidate) => candidate.trim() !== '');
      const keyContinues = next !== undefined && next.trimStart().startsWith(':');
      if (inObject && afterMember && !keyContinues && PLACEHOLDER_LINE.test(line)) return;

      for (const ch of line) {
        if (ch === '{' || ch === '[') stack.push(ch);
        else if (CLOSERS.has(ch) && stack.length > 0) stack.pop();
      }
      previous = lastSignificantChar(line) ?? previous;
      kept.push(line);
    });
    return kept.join('\n');
  });
}

// `}{`, `][`, `}"key"`, and a value line directly followed by a key line
export function insertMissingCommas(text: string): string {
  return withMaskedStrings(text, (masked) =>
    masked
      .replace(/([}\]])(\s*)(?=[{["])/g, '$1,$2')
      .replace(
        /("__STR\d+__"|\btrue\b|\bfalse\b|\bnull\b|-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?)([ \t]*\r?\n\s*)(?="__STR\d+__"\s*:)/g,
        '$1,$2'
      )
  );
}

export function removeTrailingCommas(text: string): string {
  return withMaskedStrings(text, (masked) => masked.replace(/,(?:\s*,)*(\s*)(?=[}\]])/g, '$1'));
}

export const REPAIR_RULES: readonly RepairRule[] = [
  { name: 'drop-orphaned-strings', apply: dropOrphanedStrings },
  { name: 'insert-missing-commas', apply: insertMissingCommas },
  { name: 'remove-trailing-commas', apply: removeTrailingCommas },
];

const MAX_REPAIR_PASSES = 8;

// Best effort; returns the input unchanged when no rule applies. Passes repeat
// until the text stops changing, so repairing a repaired text is a no-op.
export function repairJson(text: string, rules: readonly RepairRule[] = REPAIR_RULES): string {
  let current = text;
  for (let pass = 0; pass < MAX_REPAIR_PASSES; pass++) {
    const next = rules.reduce((value, rule) => rule.apply(value), current);
    if (next === current) break;
    current = next;
  }
  return current;
}
