import {
  CategoryScore,
  ExtractedKeywords,
  KEYWORD_CATEGORIES,
  KeywordCategory,
  MatchResult,
} from "../../shared/types/keyword.types";
import { mapCategories } from "../../shared/utils/keyword-categories";

export const CATEGORY_WEIGHTS: Readonly<Record<KeywordCategory, number>> = Object.freeze({
  technical_skills: 0.4,
  soft_skills: 0.15,
  certifications: 0.2,
  education: 0.1,
  action_verbs: 0.15,
});

const CURVE_MIN_TOTAL = 8;
const CURVE_EXPONENT = 0.7;
const ACTION_VERB_TARGET = 8;

type ScoringStrategy = "action_verb_scale" | "curved_ratio" | "linear_ratio";

interface CategoryEvaluation {
  score: CategoryScore;
  matched: string[];
  missing: string[];
  extra: string[];
  contributes: boolean;
}

/**
 * Weighted keyword match between a résumé and a job description.
 *
 * Categories the job description leaves empty score 100 but stay out of the
 * weighted mean. Action verbs are scored on the résumé alone and join the
 * mean only when the résumé has at least one. A job description without any
 * compared keywords scores 0 overall.
 */
export function calculateMatch(
  resumeKeywords: ExtractedKeywords,
  jobKeywords: ExtractedKeywords,
): MatchResult {
  const evaluations = mapCategories((category) =>
    evaluateCategory(category, resumeKeywords[category], jobKeywords[category]),
  );

  let totalJobKeywords = 0;
  let totalMatched = 0;
  let weightedScore = 0;
  let contributingWeight = 0;

  for (const category of KEYWORD_CATEGORIES) {
    const { score, contributes } = evaluations[category];
    if (category !== "action_verbs") {
      totalJobKeywords += score.total;
      totalMatched += score.matched;
    }
    if (contributes) {
      weightedScore += score.score * score.weight;
      contributingWeight += score.weight;
    }
  }

  const overallScore =
    totalJobKeywords > 0 && contributingWeight > 0 ? round1(weightedScore / contributingWeight) : 0;

  return {
    overallScore,
    simpleMatchRatio: totalJobKeywords > 0 ? round1((totalMatched / totalJobKeywords) * 100) : 0,
    totalJobKeywords,
    totalMatched,
    totalMissing: totalJobKeywords - totalMatched,
    categoryScores: mapCategories((category) => evaluations[category].score),
    matchedKeywords: mapCategories((category) => evaluations[category].matched),
    missingKeywords: mapCategories((category) => evaluations[category].missing),
    extraKeywords: mapCategories((category) => evaluations[category].extra),
  };
}

export function scoreActionVerbCount(count: number): number {
  if (count >= 8) {
    return 100;
  }
  if (count >= 5) {
    return 80;
  }
  if (count >= 3) {
    return 60;
  }
  if (count >= 1) {
    return 40;
  }
  return 10;
}

export function curvedRatioScore(matched: number, total: number): number {
  return Math.min(100, Math.pow(matched / total, CURVE_EXPONENT) * 100);
}

function evaluateCategory(
  category: KeywordCategory,
  resumeSet: ReadonlySet<string>,
  jobSet: ReadonlySet<string>,
): CategoryEvaluation {
  const weight = CATEGORY_WEIGHTS[category];
  const strategy = strategyFor(category, jobSet.size);

  if (strategy === "action_verb_scale") {
    const verbCount = resumeSet.size;
    return {
      score: {
        score: scoreActionVerbCount(verbCount),
        matched: verbCount,
        total: Math.max(verbCount, ACTION_VERB_TARGET),
        weight,
      },
      matched: sortedTerms(resumeSet),
      missing: [],
      extra: [],
      contributes: verbCount > 0,
    };
  }

  const matched = sortedTerms(jobSet, (term) => resumeSet.has(term));
  const missing = sortedTerms(jobSet, (term) => !resumeSet.has(term));
  const extra = sortedTerms(resumeSet, (term) => !jobSet.has(term));
  const total = jobSet.size;

  let score = 100;
  if (total > 0) {
    score =
      strategy === "curved_ratio"
        ? curvedRatioScore(matched.length, total)
        : (matched.length / total) * 100;
  }

  return {
    score: {
      score: round1(score),
      matched: matched.length,
      total,
      weight,
    },
    matched,
    missing,
    extra,
    contributes: total > 0,
  };
}

function strategyFor(category: KeywordCategory, jobTotal: number): ScoringStrategy {
  switch (category) {
    case "action_verbs":
      return "action_verb_scale";
    case "technical_skills":
      return jobTotal > CURVE_MIN_TOTAL ? "curved_ratio" : "linear_ratio";
    case "soft_skills":
    case "certifications":
    case "education":
      return "linear_ratio";
    default:
      return assertNever(category);
  }
}

function sortedTerms(terms: ReadonlySet<string>, keep?: (term: string) => boolean): string[] {
  const values = Array.from(terms);
  return (keep ? values.filter(keep) : values).sort();
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled keyword category: ${String(value)}`);
}
