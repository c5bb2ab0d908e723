import { describe, it } from "node:test";
import assert from "node:assert";
import { firstOrderingViolation } from "./ordering.js";

describe("firstOrderingViolation", () => {
  it("should return -1 for empty and single element sequences", () => {
    assert.strictEqual(firstOrderingViolation([]), -1);
    assert.strictEqual(firstOrderingViolation([5]), -1);
  });

  it("should return -1 for ordered sequences with gaps", () => {
    assert.strictEqual(firstOrderingViolation([1, 3, 10]), -1);
    assert.strictEqual(firstOrderingViolation([-5, -3, 0, 2]), -1);
  });

  it("should point at the first offending index", () => {
    assert.strictEqual(firstOrderingViolation([1, 4, 2, 1]), 2);
    assert.strictEqual(firstOrderingViolation([7, 7]), 1);
  });
});
