import test from "node:test";
import assert from "node:assert/strict";
import { Decimal, FinMath, sumDecimals } from "../lib/math";

test("sumDecimals adds exactly and sums an empty list to zero", () => {
  assert.ok(sumDecimals([new Decimal("0.1"), new Decimal("0.2"), new Decimal("0.3")]).eq("0.6"));
  assert.ok(sumDecimals([]).isZero());
});

test("FinMath.isBalanced honors the tolerance", () => {
  assert.equal(FinMath.isBalanced(100, 60, 40), true);
  assert.equal(FinMath.isBalanced(100.005, 60, 40), true);
  assert.equal(FinMath.isBalanced(100.02, 60, 40), false);
  assert.equal(FinMath.isBalanced(100.02, 60, 40, 0.05), true);
  assert.ok(FinMath.residual(100, 60, 39).eq(1));
});

test("FinMath.clamp bounds a value", () => {
  assert.equal(FinMath.clamp(0.5, -0.1, 0.15), 0.15);
  assert.equal(FinMath.clamp(-0.3, -0.1, 0.15), -0.1);
  assert.equal(FinMath.clamp(0.05, -0.1, 0.15), 0.05);
});
