import fs from "node:fs";
import path from "node:path";
import { loadEnv } from "../src/config/env";
import { createLogger } from "../src/config/logger";
import { KEYWORD_TAXONOMY, taxonomySize } from "../src/keywords/taxonomy/keyword-taxonomy";
import { ScanService } from "../src/scan/scan.service";

const SAMPLES_DIR = path.resolve(__dirname, "samples");

function run(): void {
  const env = loadEnv();
  const logger = createLogger({ minLevel: env.logLevel });
  const resumePath = process.argv[2] ?? path.join(SAMPLES_DIR, "resume.txt");
  const jobDescriptionPath = process.argv[3] ?? path.join(SAMPLES_DIR, "job-description.txt");

  logger.info("Keyword taxonomy loaded", { terms: taxonomySize(KEYWORD_TAXONOMY) });

  const service = new ScanService(logger, {
    minJobDescriptionWords: env.minJobDescriptionWords,
    minResumeWords: env.minResumeWords,
  });
  const outcome = service.scan({
    resumeText: fs.readFileSync(resumePath, "utf8"),
    jobDescription: fs.readFileSync(jobDescriptionPath, "utf8"),
  });

  if (!outcome.ok) {
    console.error(`scan rejected (${outcome.error_code}): ${outcome.message}`);
    process.exitCode = 1;
    return;
  }

  process.stdout.write(`${JSON.stringify(outcome.report, null, 2)}\n`);
}

try {
  run();
} catch (error) {
  console.error("scan-sample failed:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
}
