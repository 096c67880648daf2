import test from "node:test";
import assert from "node:assert/strict";
import { positiveNumber } from "../config/env";

test("numeric settings parse positive values", () => {
  assert.equal(positiveNumber("2500", 6_000), 2500);
  assert.equal(positiveNumber(" 30 ", 10), 30);
});

test("numeric settings fall back when unset or unusable", () => {
  assert.equal(positiveNumber(undefined, 6_000), 6_000);
  assert.equal(positiveNumber("", 6_000), 6_000);
  assert.equal(positiveNumber("six seconds", 6_000), 6_000);
  assert.equal(positiveNumber("0", 6_000), 6_000);
  assert.equal(positiveNumber("-5", 6_000), 6_000);
});
