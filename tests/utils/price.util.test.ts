import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  decimalsOf,
  floorToStep,
  ratioFromPercentOrRatio,
  relativeDiff,
  roundToStep,
} from "../../src/utils/price.util";

describe("decimalsOf", () => {
  it("counts decimals of plain and exponent steps", () => {
    assert.equal(decimalsOf(1), 0);
    assert.equal(decimalsOf(0.001), 3);
    assert.equal(decimalsOf(0.25), 2);
    assert.equal(decimalsOf(1e-7), 7);
    assert.equal(decimalsOf(0), 0);
  });
});

describe("floorToStep", () => {
  it("rounds toward zero on the step grid", () => {
    assert.equal(floorToStep(5.0049, 0.001), 5.004);
    assert.equal(floorToStep(0.3, 0.1), 0.3);
    assert.equal(floorToStep(1.0, 0.001), 1);
  });

  it("returns 0 for non-positive values and the value for no step", () => {
    assert.equal(floorToStep(-1, 0.1), 0);
    assert.equal(floorToStep(2.345, 0), 2.345);
  });
});

describe("roundToStep", () => {
  it("rounds to the nearest step", () => {
    assert.equal(roundToStep(100.05, 0.01), 100.05);
    assert.equal(roundToStep(100.049, 0.1), 100);
    assert.equal(roundToStep(99.96, 0.1), 100);
  });
});

describe("ratioFromPercentOrRatio", () => {
  it("reads values above 0.05 as percents", () => {
    assert.equal(ratioFromPercentOrRatio(1), 0.01);
    assert.equal(ratioFromPercentOrRatio(0.5), 0.005);
  });

  it("keeps small values as ratios and clamps non-positive to 0", () => {
    assert.equal(ratioFromPercentOrRatio(0.01), 0.01);
    assert.equal(ratioFromPercentOrRatio(0), 0);
    assert.equal(ratioFromPercentOrRatio(-2), 0);
  });
});

describe("relativeDiff", () => {
  it("is relative to the second argument", () => {
    assert.equal(relativeDiff(0.6, 1), 0.4);
    assert.equal(relativeDiff(1, 1), 0);
  });
});
