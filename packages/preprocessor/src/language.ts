import type { Language } from "@docpipe/types";

const MALAYALAM_START = 0x0d00;
const MALAYALAM_END = 0x0d7f;
const LETTER = /\p{L}/u;

/** Share of Malayalam-block characters at or above which text is Malayalam. */
export const MALAYALAM_RATIO = 0.9;

export interface LanguageProfile {
  language: Language;
  malayalamChars: number;
  otherLetters: number;
}

/**
 * Script-based detection over the Malayalam Unicode block (vowel signs
 * included) against letters of every other script. Any Malayalam makes the
 * text at least mixed; text without letters is unknown.
 */
export function detectLanguage(text: string): LanguageProfile {
  let malayalamChars = 0;
  let otherLetters = 0;

  for (const ch of text) {
    const code = ch.codePointAt(0) ?? 0;
    if (code >= MALAYALAM_START && code <= MALAYALAM_END) {
      malayalamChars += 1;
    } else if (LETTER.test(ch)) {
      otherLetters += 1;
    }
  }

  const total = malayalamChars + otherLetters;
  let language: Language;
  if (total === 0) language = "unknown";
  else if (malayalamChars === 0) language = "english";
  else if (malayalamChars / total >= MALAYALAM_RATIO) language = "malayalam";
  else language = "mixed";

  return { language, malayalamChars, otherLetters };
}

export function needsTranslation(language: Language): boolean {
  return language === "malayalam" || language === "mixed";
}
