import taxonomyData from "./keyword-taxonomy.json";
import {
  KEYWORD_CATEGORIES,
  KeywordCategory,
  KeywordTaxonomy,
} from "../../shared/types/keyword.types";
import { mapCategories } from "../../shared/utils/keyword-categories";

export const KEYWORD_TAXONOMY: KeywordTaxonomy = parseKeywordTaxonomy(taxonomyData);

/**
 * Builds an immutable taxonomy from raw category lists. Terms are stored
 * lowercase and trimmed; blank entries and non-string values are rejected.
 */
export function parseKeywordTaxonomy(raw: unknown): KeywordTaxonomy {
  if (!isRecord(raw)) {
    throw new Error("Keyword taxonomy is invalid: expected an object of category lists.");
  }

  return Object.freeze(mapCategories((category) => toTermSet(category, raw[category])));
}

export function taxonomySize(taxonomy: KeywordTaxonomy): number {
  return KEYWORD_CATEGORIES.reduce((sum, category) => sum + taxonomy[category].size, 0);
}

function toTermSet(category: KeywordCategory, value: unknown): ReadonlySet<string> {
  if (!Array.isArray(value)) {
    throw new Error(`Keyword taxonomy is invalid: category "${category}" must be a list of terms.`);
  }
  const terms = new Set<string>();
  for (const item of value) {
    if (typeof item !== "string" || !item.trim()) {
      throw new Error(`Keyword taxonomy is invalid: category "${category}" contains a blank or non-string term.`);
    }
    terms.add(item.trim().toLowerCase());
  }
  return terms;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
