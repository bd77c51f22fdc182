export { loadEnv } from "./config/env";
export type { EnvConfig } from "./config/env";
export { createLogger, logContext, noopLogger } from "./config/logger";
export type { Logger, LoggerContext, LogLevel } from "./config/logger";
export { analyzeAtsFormatting } from "./formatting/ats-formatting.checker";
export {
  countActionVerbs,
  createEmptyKeywords,
  createKeywordExtractor,
  extractKeywordsFromText,
} from "./keywords/keyword-extractor";
export { KEYWORD_TAXONOMY, parseKeywordTaxonomy, taxonomySize } from "./keywords/taxonomy/keyword-taxonomy";
export { CATEGORY_WEIGHTS, calculateMatch } from "./matching/scoring/keyword-match-score";
export { cleanResumeText, countWords } from "./scan/resume-text.normalizer";
export { ScanService } from "./scan/scan.service";
export type { ScanServiceOptions } from "./scan/scan.service";
export { buildRuleBasedSuggestions } from "./suggestions/rule-based-suggestions";
export * from "./shared/types/keyword.types";
export * from "./shared/types/scan.types";
