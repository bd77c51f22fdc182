import assert from "node:assert/strict";
import test from "node:test";
import { loadEnv } from "../../config/env";
import { createLogger, logContext, redactMeta } from "../../config/logger";

test("loadEnv falls back to defaults", () => {
  assert.deepEqual(loadEnv({}), {
    nodeEnv: "development",
    logLevel: "info",
    minJobDescriptionWords: 10,
    minResumeWords: 20,
  });
});

test("loadEnv reads overrides", () => {
  const env = loadEnv({
    NODE_ENV: "production",
    LOG_LEVEL: " WARN ",
    MIN_JOB_DESCRIPTION_WORDS: "25",
    MIN_RESUME_WORDS: "50",
  });
  assert.deepEqual(env, {
    nodeEnv: "production",
    logLevel: "warn",
    minJobDescriptionWords: 25,
    minResumeWords: 50,
  });
});

test("loadEnv rejects invalid values", () => {
  assert.throws(() => loadEnv({ LOG_LEVEL: "verbose" }), /Invalid LOG_LEVEL value: verbose/);
  assert.throws(() => loadEnv({ MIN_RESUME_WORDS: "0" }), /Invalid MIN_RESUME_WORDS value: 0/);
  assert.throws(
    () => loadEnv({ MIN_JOB_DESCRIPTION_WORDS: "ten" }),
    /Invalid MIN_JOB_DESCRIPTION_WORDS value: ten/,
  );
});

test("logger drops entries below its minimum level", () => {
  const lines: string[] = [];
  const logger = createLogger({ minLevel: "warn", write: (line) => lines.push(line) });

  logger.debug("debug entry");
  logger.info("info entry");
  logger.warn("warn entry");
  logger.error("error entry", { code: "E1" });

  assert.equal(lines.length, 2);
  assert.match(lines[0] ?? "", /"level":"warn","message":"warn entry"}\n$/);
  assert.match(lines[1] ?? "", /"level":"error","message":"error entry","meta":\{"code":"E1"\}\}\n$/);
});

test("logContext merges context and fields into the metadata", () => {
  const lines: string[] = [];
  const logger = createLogger({ minLevel: "debug", write: (line) => lines.push(line) });

  logContext(logger, "info", "Scan completed", { scan_id: "scan-1", ok: true }, { match_score: 72.5 });

  assert.match(lines[0] ?? "", /"meta":\{"scan_id":"scan-1","ok":true,"match_score":72\.5\}/);
});

test("redactMeta hides secrets and truncates long strings", () => {
  const redacted = redactMeta({
    apiKey: "test-secret",
    Authorization: "Bearer test-token",
    resume: "x".repeat(600),
    words: 42,
  });

  assert.deepEqual(redacted, {
    apiKey: "[REDACTED]",
    Authorization: "[REDACTED]",
    resume: `${"x".repeat(500)}...`,
    words: 42,
  });
});
