const ALPHABETIC_PATTERN = /\p{L}/u;

/**
 * True when the text has at least one letter in any script. Digits,
 * punctuation, symbols and whitespace alone never qualify.
 */
export function containsAlphabetic(text: string): boolean {
  return ALPHABETIC_PATTERN.test(text);
}

export function isIgnoredText(text: string, ignoreTexts: ReadonlySet<string>): boolean {
  return ignoreTexts.has(text.trim());
}

/**
 * Literal text worth translating: has a letter and is not on the ignore list.
 */
export function isTranslatableText(text: string, ignoreTexts: ReadonlySet<string>): boolean {
  return containsAlphabetic(text) && !isIgnoredText(text, ignoreTexts);
}
