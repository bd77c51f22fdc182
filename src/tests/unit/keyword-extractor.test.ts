import assert from "node:assert/strict";
import test from "node:test";
import {
  countActionVerbs,
  createKeywordExtractor,
  extractKeywordsFromText,
} from "../../keywords/keyword-extractor";
import { KEYWORD_TAXONOMY, parseKeywordTaxonomy } from "../../keywords/taxonomy/keyword-taxonomy";
import { KEYWORD_CATEGORIES } from "../../shared/types/keyword.types";

const SAMPLE_TEXT = `
  Led a team of five engineers and collaborated with product on a Kubernetes
  migration. Deployed services on Microsoft Azure with Terraform and GitHub Actions.
  Strong communication and stakeholder management. AWS Certified Solutions Architect.
  Bachelor of Science in Computer Science.
`;

test("empty text yields empty sets in every category", () => {
  const found = extractKeywordsFromText("");
  for (const category of KEYWORD_CATEGORIES) {
    assert.equal(found[category].size, 0, category);
  }
});

test("every extracted term belongs to its category's taxonomy", () => {
  const found = extractKeywordsFromText(SAMPLE_TEXT);
  for (const category of KEYWORD_CATEGORIES) {
    for (const term of found[category]) {
      assert.equal(KEYWORD_TAXONOMY[category].has(term), true, `${category}: ${term}`);
    }
  }
});

test("extracts terms from each category, case-insensitively", () => {
  const found = extractKeywordsFromText(SAMPLE_TEXT);
  assert.equal(found.technical_skills.has("azure"), true);
  assert.equal(found.technical_skills.has("kubernetes"), true);
  assert.equal(found.technical_skills.has("github actions"), true);
  assert.equal(found.soft_skills.has("communication"), true);
  assert.equal(found.soft_skills.has("stakeholder management"), true);
  assert.equal(found.certifications.has("aws certified"), true);
  assert.equal(found.certifications.has("solutions architect"), true);
  assert.equal(found.education.has("bachelor"), true);
  assert.equal(found.education.has("computer science"), true);
  assert.equal(found.action_verbs.has("led"), true);
  assert.equal(found.action_verbs.has("deployed"), true);
});

test("a verb form in the text records the noun term through the stem", () => {
  const found = extractKeywordsFromText("I collaborated with two teams.");
  assert.equal(found.soft_skills.has("collaboration"), true);
  assert.equal(found.action_verbs.has("collaborated"), true);
});

test("custom taxonomies are lowercased and extracted on their own", () => {
  const taxonomy = parseKeywordTaxonomy({
    technical_skills: ["Machine Learning", " aws "],
    soft_skills: [],
    certifications: [],
    education: [],
    action_verbs: [],
  });
  const extract = createKeywordExtractor(taxonomy);

  assert.deepEqual(Array.from(extract("We use MACHINE LEARNING on AWS.").technical_skills).sort(), [
    "aws",
    "machine learning",
  ]);
  assert.equal(extract("Strong cloud skills").technical_skills.size, 0);
});

test("malformed taxonomy data is rejected", () => {
  assert.throws(() => parseKeywordTaxonomy({ technical_skills: [] }), /Keyword taxonomy is invalid: category "soft_skills"/);
  assert.throws(() => parseKeywordTaxonomy(["aws"]), /Keyword taxonomy is invalid/);
  assert.throws(
    () =>
      parseKeywordTaxonomy({
        technical_skills: ["aws", "  "],
        soft_skills: [],
        certifications: [],
        education: [],
        action_verbs: [],
      }),
    /blank or non-string term/,
  );
});

test("countActionVerbs counts distinct taxonomy verbs", () => {
  assert.equal(countActionVerbs("Led the team, built tools and improved latency."), 3);
  assert.equal(countActionVerbs(""), 0);
});

test("an accented word does not yield a one-letter skill", () => {
  const found = extractKeywordsFromText("Please send your résumé and cover letter.");
  assert.equal(found.technical_skills.has("r"), false);
});
