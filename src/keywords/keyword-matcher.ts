export interface CompiledKeyword {
  term: string;
  phrasePattern: RegExp;
  stemPattern: RegExp | null;
}

const MIN_STEM_LENGTH = 4;

// Letters and digits from any script count as word characters, so accented
// words such as "résumé" are never split into ASCII fragments.
const WORD_CHAR = "[\\p{L}\\p{N}_]";
const WORD_BOUNDARY = `(?:(?<=${WORD_CHAR})(?!${WORD_CHAR})|(?<!${WORD_CHAR})(?=${WORD_CHAR}))`;

// Applied in this order; each pass strips any trailing run of its characters.
const STEM_TRIM_PASSES = ["esiond", "at", "ing"] as const;

export function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Approximates the shared root of a word's verb and noun forms, so that
 * "collaboration" trims to "collabor" and also covers "collaborated".
 */
export function deriveStem(term: string): string {
  let stem = term;
  for (const trimSet of STEM_TRIM_PASSES) {
    stem = trimTrailing(stem, trimSet);
  }
  return stem;
}

export function compileKeyword(term: string): CompiledKeyword {
  const stem = deriveStem(term);
  return {
    term,
    phrasePattern: new RegExp(`${WORD_BOUNDARY}${escapeRegex(term)}${WORD_BOUNDARY}`, "u"),
    stemPattern:
      stem.length >= MIN_STEM_LENGTH
        ? new RegExp(`${WORD_BOUNDARY}${escapeRegex(stem)}${WORD_CHAR}*${WORD_BOUNDARY}`, "u")
        : null,
  };
}

export function matchesWholePhrase(keyword: CompiledKeyword, lowerText: string): boolean {
  return keyword.phrasePattern.test(lowerText);
}

/** Expects `lowerText` to be lowercased already. */
export function keywordInText(keyword: CompiledKeyword, lowerText: string): boolean {
  if (matchesWholePhrase(keyword, lowerText)) {
    return true;
  }
  return keyword.stemPattern !== null && keyword.stemPattern.test(lowerText);
}

function trimTrailing(value: string, characters: string): string {
  let end = value.length;
  while (end > 0 && characters.includes(value.charAt(end - 1))) {
    end -= 1;
  }
  return value.slice(0, end);
}
