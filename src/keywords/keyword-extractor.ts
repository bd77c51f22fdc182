import { ExtractedKeywords, KeywordCategory, KeywordTaxonomy } from "../shared/types/keyword.types";
import { mapCategories } from "../shared/utils/keyword-categories";
import { CompiledKeyword, compileKeyword, keywordInText } from "./keyword-matcher";
import { KEYWORD_TAXONOMY } from "./taxonomy/keyword-taxonomy";

export type KeywordExtractor = (text: string) => ExtractedKeywords;

export type CompiledTaxonomy = Readonly<Record<KeywordCategory, readonly CompiledKeyword[]>>;

export function compileTaxonomy(taxonomy: KeywordTaxonomy): CompiledTaxonomy {
  return Object.freeze(
    mapCategories((category) => Object.freeze(Array.from(taxonomy[category], (term) => compileKeyword(term)))),
  );
}

export function createKeywordExtractor(taxonomy: KeywordTaxonomy): KeywordExtractor {
  return extractorFor(compileTaxonomy(taxonomy));
}

export const DEFAULT_COMPILED_TAXONOMY = compileTaxonomy(KEYWORD_TAXONOMY);

const defaultExtractor = extractorFor(DEFAULT_COMPILED_TAXONOMY);

export function extractKeywordsFromText(text: string): ExtractedKeywords {
  return defaultExtractor(text);
}

function extractorFor(compiled: CompiledTaxonomy): KeywordExtractor {
  return (text: string): ExtractedKeywords => {
    const lowerText = text.toLowerCase();
    return mapCategories((category) => {
      const found = new Set<string>();
      for (const keyword of compiled[category]) {
        if (keywordInText(keyword, lowerText)) {
          found.add(keyword.term);
        }
      }
      return found;
    });
  };
}

/** Number of distinct action verbs in `text`, using the default taxonomy. */
export function countActionVerbs(text: string): number {
  const lowerText = text.toLowerCase();
  return DEFAULT_COMPILED_TAXONOMY.action_verbs.filter((verb) => keywordInText(verb, lowerText)).length;
}

export function createEmptyKeywords(): ExtractedKeywords {
  return mapCategories(() => new Set<string>());
}
