import { countActionVerbs } from "../keywords/keyword-extractor";
import { FormattingIssue, FormattingReport } from "../shared/types/scan.types";
import { countWords } from "../scan/resume-text.normalizer";

export const REQUIRED_SECTIONS = ["experience", "education", "skills"] as const;
export const COMMON_SECTIONS = [
  ...REQUIRED_SECTIONS,
  "summary",
  "objective",
  "projects",
  "certifications",
] as const;

const SHORT_RESUME_WORDS = 150;
const LONG_RESUME_WORDS = 1200;
const MIN_ACTION_VERBS = 3;

const NON_ASCII_PATTERN = /[^\x00-\x7F]/;
const EMAIL_PATTERN = /[\p{L}\p{N}_.-]+@[\p{L}\p{N}_.-]+\.[\p{L}\p{N}_]+/u;
const PHONE_PATTERN = /\+?[\p{Nd}\s\-()]{10,}/u;
const LINKEDIN_PATTERN = /linkedin/i;

const GENERAL_TIPS = [
  "Use a clean, single-column layout for best ATS compatibility.",
  "Avoid headers and footers, since some ATS systems can't read them.",
  "Save as PDF unless the application specifically requests DOCX.",
];

export function analyzeAtsFormatting(resumeText: string): FormattingReport {
  const issues: FormattingIssue[] = [];
  const tips: string[] = [];
  const lowerText = resumeText.toLowerCase();

  if (NON_ASCII_PATTERN.test(resumeText)) {
    issues.push({
      type: "warning",
      message: "Special characters or symbols detected",
      detail:
        "Some ATS systems struggle with emojis, icons, or non-standard characters. Consider replacing them with plain text.",
    });
  }

  const sectionsFound = COMMON_SECTIONS.filter((section) => lowerText.includes(section));
  const missingSections = REQUIRED_SECTIONS.filter((section) => !lowerText.includes(section));
  if (missingSections.length > 0) {
    issues.push({
      type: "warning",
      message: `Missing standard section headers: ${missingSections.map(toTitleCase).join(", ")}`,
      detail:
        "ATS systems look for standard section headers to categorize your information. Make sure you have clearly labeled sections.",
    });
  }

  const wordCount = countWords(resumeText);
  if (wordCount < SHORT_RESUME_WORDS) {
    issues.push({
      type: "warning",
      message: "Resume seems very short",
      detail: `Your resume is about ${wordCount} words. Most effective resumes are 400-800 words. Consider adding more detail about your accomplishments.`,
    });
  } else if (wordCount > LONG_RESUME_WORDS) {
    issues.push({
      type: "info",
      message: "Resume is quite long",
      detail: `Your resume is about ${wordCount} words. For most roles, 1-2 pages (400-800 words) is ideal. Consider trimming less relevant details.`,
    });
  }

  const hasContactInfo = {
    email: EMAIL_PATTERN.test(resumeText),
    phone: PHONE_PATTERN.test(resumeText),
    linkedin: LINKEDIN_PATTERN.test(resumeText),
  };

  if (!hasContactInfo.email) {
    issues.push({
      type: "critical",
      message: "No email address detected",
      detail: "Make sure your email address is clearly visible at the top of your resume.",
    });
  }
  if (!hasContactInfo.phone) {
    tips.push("Consider adding a phone number to your contact information.");
  }
  if (!hasContactInfo.linkedin) {
    tips.push("Adding your LinkedIn profile URL can strengthen your application.");
  }

  if (countActionVerbs(resumeText) < MIN_ACTION_VERBS) {
    issues.push({
      type: "warning",
      message: "Few action verbs detected",
      detail:
        "Strong resumes use action verbs (led, built, improved, managed) to describe accomplishments. Consider rewriting bullet points to start with impactful verbs.",
    });
  }

  tips.push(...GENERAL_TIPS);

  return {
    issues,
    tips,
    sectionsFound,
    wordCount,
    hasContactInfo,
  };
}

function toTitleCase(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
