export const KEYWORD_CATEGORIES = [
  "technical_skills",
  "soft_skills",
  "certifications",
  "education",
  "action_verbs",
] as const;

export type KeywordCategory = (typeof KEYWORD_CATEGORIES)[number];

export type KeywordTaxonomy = Readonly<Record<KeywordCategory, ReadonlySet<string>>>;

export type ExtractedKeywords = Readonly<Record<KeywordCategory, ReadonlySet<string>>>;

export type KeywordLists = Record<KeywordCategory, string[]>;

export interface CategoryScore {
  score: number;
  matched: number;
  total: number;
  weight: number;
}

export interface MatchResult {
  overallScore: number;
  simpleMatchRatio: number;
  totalJobKeywords: number;
  totalMatched: number;
  totalMissing: number;
  categoryScores: Record<KeywordCategory, CategoryScore>;
  matchedKeywords: KeywordLists;
  missingKeywords: KeywordLists;
  extraKeywords: KeywordLists;
}
