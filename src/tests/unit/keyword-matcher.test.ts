import assert from "node:assert/strict";
import test from "node:test";
import {
  compileKeyword,
  deriveStem,
  escapeRegex,
  keywordInText,
  matchesWholePhrase,
} from "../../keywords/keyword-matcher";

test("deriveStem trims the character sets in order", () => {
  assert.equal(deriveStem("collaboration"), "collabor");
  assert.equal(deriveStem("testing"), "test");
  assert.equal(deriveStem("azure"), "azur");
  assert.equal(deriveStem("java"), "jav");
  assert.equal(deriveStem("maintained"), "ma");
});

test("stems shorter than four characters disable the fallback", () => {
  assert.equal(compileKeyword("go").stemPattern, null);
  assert.equal(compileKeyword("java").stemPattern, null);
  assert.notEqual(compileKeyword("collaboration").stemPattern, null);
});

test("whole-phrase matching respects word boundaries", () => {
  const azure = compileKeyword("azure");
  assert.equal(matchesWholePhrase(azure, "deployed on microsoft azure"), true);
  assert.equal(matchesWholePhrase(azure, "azur"), false);
  assert.equal(matchesWholePhrase(compileKeyword("cloud computing"), "a cloud computing platform"), true);
});

test("short terms do not match inside longer words", () => {
  assert.equal(keywordInText(compileKeyword("java"), "senior javascript developer"), false);
  assert.equal(keywordInText(compileKeyword("go"), "google cloud"), false);
});

test("stem fallback matches verb forms of a noun term", () => {
  const collaboration = compileKeyword("collaboration");
  assert.equal(matchesWholePhrase(collaboration, "collaborated with design"), false);
  assert.equal(keywordInText(collaboration, "collaborated with design"), true);
  assert.equal(keywordInText(collaboration, "collaborating daily"), true);
});

test("regex metacharacters in terms are matched literally", () => {
  assert.equal(escapeRegex("node.js"), "node\\.js");
  assert.equal(keywordInText(compileKeyword("node.js"), "built apis in node.js daily"), true);
  assert.equal(keywordInText(compileKeyword("node.js"), "built apis in nodexjs daily"), false);
  assert.equal(keywordInText(compileKeyword("ci/cd"), "owned ci/cd pipelines"), true);
});

test("accented letters count as word characters", () => {
  const r = compileKeyword("r");
  assert.equal(keywordInText(r, "please send your résumé"), false);
  assert.equal(keywordInText(r, "statistics in r and python"), true);
  assert.equal(keywordInText(compileKeyword("collaboration"), "précollaborated"), false);
  assert.equal(keywordInText(compileKeyword("collaboration"), "collaboré sur le projet"), true);
});
