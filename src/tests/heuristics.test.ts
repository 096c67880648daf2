import test from "node:test";
import assert from "node:assert/strict";
import { evaluateHeuristics, isSuspicious } from "../risk/heuristics";

test("plain short URL is not suspicious", () => {
  assert.equal(isSuspicious("http://example.com/docs"), false);
  assert.deepEqual(evaluateHeuristics("http://example.com/docs").riskFactors, []);
});

test("lure keywords are matched case-insensitively", () => {
  assert.equal(isSuspicious("http://example.com/LOGIN"), true);
  assert.deepEqual(evaluateHeuristics("http://mybank.example.com").riskFactors, ["Contains lure keyword(s): bank"]);
});

test("length rule fires only above 75 characters", () => {
  const atLimit = `http://example.com/${"a".repeat(56)}`;
  const overLimit = `http://example.com/${"a".repeat(57)}`;
  assert.equal(atLimit.length, 75);
  assert.equal(isSuspicious(atLimit), false);
  assert.deepEqual(evaluateHeuristics(overLimit).riskFactors, ["URL longer than 75 characters"]);
});

test("'@' in the URL is suspicious", () => {
  assert.deepEqual(evaluateHeuristics("http://example.com/@x").riskFactors, ["Contains '@', which can hide the real destination"]);
});

test("a second '//' is suspicious", () => {
  assert.deepEqual(evaluateHeuristics("http://example.com//redirect").riskFactors, ["Contains an extra '//' after the scheme"]);
  assert.equal(isSuspicious("http://example.com/a/b"), false);
});

test("every matching rule is reported", () => {
  const result = evaluateHeuristics("http://example.com//phish@x");
  assert.equal(result.suspicious, true);
  assert.deepEqual(result.riskFactors, [
    "Contains lure keyword(s): phish",
    "Contains '@', which can hide the real destination",
    "Contains an extra '//' after the scheme"
  ]);
});
