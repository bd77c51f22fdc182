import dotenv from "dotenv";
import { LogLevel } from "./logger";

dotenv.config();

export interface EnvConfig {
  nodeEnv: string;
  logLevel: LogLevel;
  minJobDescriptionWords: number;
  minResumeWords: number;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const logLevelRaw = (source.LOG_LEVEL ?? "info").trim().toLowerCase();
  const minJobDescriptionWordsRaw = source.MIN_JOB_DESCRIPTION_WORDS ?? "10";
  const minResumeWordsRaw = source.MIN_RESUME_WORDS ?? "20";
  const minJobDescriptionWords = Number(minJobDescriptionWordsRaw);
  const minResumeWords = Number(minResumeWordsRaw);

  if (!Number.isInteger(minJobDescriptionWords) || minJobDescriptionWords <= 0) {
    throw new Error(`Invalid MIN_JOB_DESCRIPTION_WORDS value: ${minJobDescriptionWordsRaw}`);
  }
  if (!Number.isInteger(minResumeWords) || minResumeWords <= 0) {
    throw new Error(`Invalid MIN_RESUME_WORDS value: ${minResumeWordsRaw}`);
  }

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    logLevel: parseLogLevel(logLevelRaw),
    minJobDescriptionWords,
    minResumeWords,
  };
}

function parseLogLevel(value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid LOG_LEVEL value: ${value}`);
}
