import { CategoryScore, KeywordCategory, KeywordLists } from "./keyword.types";

export type FormattingIssueType = "critical" | "warning" | "info";

export interface FormattingIssue {
  type: FormattingIssueType;
  message: string;
  detail: string;
}

export interface ContactInfoPresence {
  email: boolean;
  phone: boolean;
  linkedin: boolean;
}

export interface FormattingReport {
  issues: FormattingIssue[];
  tips: string[];
  sectionsFound: string[];
  wordCount: number;
  hasContactInfo: ContactInfoPresence;
}

export interface KeywordSuggestion {
  keyword: string;
  whereToAdd: string;
  howToAdd: string;
}

export interface Suggestions {
  summary: string;
  keywordSuggestions: KeywordSuggestion[];
  quickWins: string[];
  aiPowered: false;
}

export interface ScanInput {
  jobDescription: string;
  resumeText: string;
}

export interface ScanReport {
  matchScore: number;
  simpleMatchRatio: number;
  totalJobKeywords: number;
  totalMatched: number;
  totalMissing: number;
  categoryScores: Record<KeywordCategory, CategoryScore>;
  matchedKeywords: KeywordLists;
  missingKeywords: KeywordLists;
  atsFormatting: FormattingReport;
  suggestions: Suggestions;
  resumeWordCount: number;
}

export type ScanErrorCode =
  | "job_description_missing"
  | "job_description_too_short"
  | "resume_missing"
  | "resume_too_short";

export type ScanOutcome =
  | {
      ok: true;
      report: ScanReport;
    }
  | {
      ok: false;
      error_code: ScanErrorCode;
      message: string;
    };
