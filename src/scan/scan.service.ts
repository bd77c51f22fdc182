import { randomUUID } from "node:crypto";
import { Logger, logContext } from "../config/logger";
import { analyzeAtsFormatting } from "../formatting/ats-formatting.checker";
import { extractKeywordsFromText } from "../keywords/keyword-extractor";
import { calculateMatch } from "../matching/scoring/keyword-match-score";
import { ScanErrorCode, ScanInput, ScanOutcome } from "../shared/types/scan.types";
import { buildRuleBasedSuggestions } from "../suggestions/rule-based-suggestions";
import { cleanResumeText, countWords } from "./resume-text.normalizer";

export interface ScanServiceOptions {
  minJobDescriptionWords: number;
  minResumeWords: number;
}

const ERROR_MESSAGES: Record<ScanErrorCode, string> = {
  job_description_missing: "Please provide a job description.",
  job_description_too_short: "The job description seems too short. Please paste the full job description.",
  resume_missing: "No resume text provided. Please paste your resume content.",
  resume_too_short: "The pasted text seems too short to be a resume. Please paste your full resume content.",
};

export class ScanService {
  constructor(
    private readonly logger: Logger,
    private readonly options: ScanServiceOptions,
  ) {}

  scan(input: ScanInput): ScanOutcome {
    const startedAt = Date.now();
    const scanId = randomUUID();

    const jobDescription = input.jobDescription.trim();
    const rawResume = input.resumeText.trim();
    const errorCode = this.validate(jobDescription, rawResume);
    if (errorCode) {
      logContext(this.logger, "warn", "Scan input rejected", {
        scan_id: scanId,
        action: "scan",
        ok: false,
        error_code: errorCode,
      });
      return { ok: false, error_code: errorCode, message: ERROR_MESSAGES[errorCode] };
    }

    const resumeText = cleanResumeText(rawResume);
    const resumeKeywords = extractKeywordsFromText(resumeText);
    const jobKeywords = extractKeywordsFromText(jobDescription);
    const match = calculateMatch(resumeKeywords, jobKeywords);
    const atsFormatting = analyzeAtsFormatting(resumeText);
    const suggestions = buildRuleBasedSuggestions(match);

    logContext(
      this.logger,
      "info",
      "Scan completed",
      {
        scan_id: scanId,
        action: "scan",
        ok: true,
        latency_ms: Date.now() - startedAt,
      },
      {
        match_score: match.overallScore,
        total_job_keywords: match.totalJobKeywords,
        formatting_issues: atsFormatting.issues.length,
      },
    );

    return {
      ok: true,
      report: {
        matchScore: match.overallScore,
        simpleMatchRatio: match.simpleMatchRatio,
        totalJobKeywords: match.totalJobKeywords,
        totalMatched: match.totalMatched,
        totalMissing: match.totalMissing,
        categoryScores: match.categoryScores,
        matchedKeywords: match.matchedKeywords,
        missingKeywords: match.missingKeywords,
        atsFormatting,
        suggestions,
        resumeWordCount: countWords(resumeText),
      },
    };
  }

  private validate(jobDescription: string, rawResume: string): ScanErrorCode | null {
    if (!jobDescription) {
      return "job_description_missing";
    }
    if (countWords(jobDescription) < this.options.minJobDescriptionWords) {
      return "job_description_too_short";
    }
    if (!rawResume) {
      return "resume_missing";
    }
    if (countWords(cleanResumeText(rawResume)) < this.options.minResumeWords) {
      return "resume_too_short";
    }
    return null;
  }
}
