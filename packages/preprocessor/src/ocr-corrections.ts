interface Correction {
  pattern: RegExp;
  replace: (match: string) => string;
}

const DIGIT_LOOKALIKES: Readonly<Record<string, string>> = {
  O: "0",
  o: "0",
  l: "1",
  I: "1",
  "|": "1",
  S: "5",
  B: "8",
};

/**
 * A token of digits and digit look-alikes (with number punctuation) that
 * contains at least one real digit, e.g. `2O24`, `1O:3O`, `l5`.
 */
const NUMERIC_TOKEN = /(?<![\p{L}\p{N}])[\dOolIS|B][\dOolIS|B.,:/-]*(?![\p{L}\p{N}])/gu;

const CORRECTIONS: readonly Correction[] = [
  {
    pattern: NUMERIC_TOKEN,
    replace: (token) => (/\d/.test(token) ? token.replace(/[OolIS|B]/g, (c) => DIGIT_LOOKALIKES[c] ?? c) : token),
  },
  // digits between lowercase letters: c0ntr0l, fai1ure
  { pattern: /(?<=\p{Ll})0(?=\p{Ll})/gu, replace: () => "o" },
  { pattern: /(?<=\p{Ll})1(?=\p{Ll})/gu, replace: () => "l" },
  { pattern: /\ufb01/g, replace: () => "fi" },
  { pattern: /\ufb02/g, replace: () => "fl" },
  { pattern: /\ufb00/g, replace: () => "ff" },
  // a lone bar between words is the pronoun I
  { pattern: /(?<=^|\s)\|(?=\s|$)/gm, replace: () => "I" },
];

/**
 * Applies the fixed table of known OCR confusions. Returns the corrected
 * text and the number of substitutions that changed something.
 */
export function applyOcrCorrections(text: string): { text: string; corrections: number } {
  let corrections = 0;
  let out = text;
  for (const { pattern, replace } of CORRECTIONS) {
    out = out.replace(pattern, (match) => {
      const fixed = replace(match);
      if (fixed !== match) corrections += 1;
      return fixed;
    });
  }
  return { text: out, corrections };
}
