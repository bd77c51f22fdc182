import { MatchResult } from "../shared/types/keyword.types";
import { KeywordSuggestion, Suggestions } from "../shared/types/scan.types";

const MAX_KEYWORD_SUGGESTIONS = 5;
const MAX_SOFT_SKILL_WINS = 3;
const MAX_CERTIFICATION_WINS = 3;

/**
 * Offline suggestions derived from the keyword breakdown alone. Used when no
 * language model is wired in, so every sentence here is templated.
 */
export function buildRuleBasedSuggestions(match: MatchResult): Suggestions {
  const missingTechnical = match.missingKeywords.technical_skills;
  const missingSoft = match.missingKeywords.soft_skills;
  const missingCertifications = match.missingKeywords.certifications;

  const keywordSuggestions: KeywordSuggestion[] = missingTechnical
    .slice(0, MAX_KEYWORD_SUGGESTIONS)
    .map((keyword) => ({
      keyword,
      whereToAdd: "Skills section or relevant experience bullets",
      howToAdd: `Add '${keyword}' to your skills section. If you have experience with it, add a bullet point describing a project or task where you used ${keyword}.`,
    }));

  const quickWins: string[] = [];
  if (missingTechnical.length > 0) {
    quickWins.push(
      `Add these missing technical skills to your Skills section: ${missingTechnical.slice(0, MAX_KEYWORD_SUGGESTIONS).join(", ")}`,
    );
  }
  if (missingSoft.length > 0) {
    quickWins.push(
      `Incorporate these soft skills into your experience bullets: ${missingSoft.slice(0, MAX_SOFT_SKILL_WINS).join(", ")}`,
    );
  }
  if (missingCertifications.length > 0) {
    quickWins.push(
      `If you hold any of these certifications, add them prominently: ${missingCertifications.slice(0, MAX_CERTIFICATION_WINS).join(", ")}`,
    );
  }
  quickWins.push("Ensure your resume summary/objective mirrors the language of the job description.");
  quickWins.push("Start each experience bullet point with a strong action verb (Led, Built, Improved, Designed).");

  return {
    summary: summarizeScore(match.overallScore),
    keywordSuggestions,
    quickWins,
    aiPowered: false,
  };
}

export function summarizeScore(score: number): string {
  if (score >= 80) {
    return `Your resume is a strong match at ${score}%. With a few targeted additions, you can push it even higher.`;
  }
  if (score >= 60) {
    return `Your resume is a decent match at ${score}%, but there are notable gaps. Focus on adding missing technical keywords and you'll see a significant improvement.`;
  }
  if (score >= 40) {
    return `Your resume matches at ${score}%. There's meaningful work needed to align it with this role. Focus on the missing technical skills and consider rewriting your summary section.`;
  }
  return `Your resume currently matches at ${score}%. This suggests either a significant skills gap or your resume isn't using the right terminology. Focus on keyword alignment first.`;
}
