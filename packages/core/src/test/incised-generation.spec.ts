import { describe, it } from "node:test";
import assert from "node:assert";
import { makeIncisedRhythm } from "../phase/incised-generation.js";
import { InvalidArgumentError } from "../errors.js";
import { contentCounts, contentStrings, noticeCodes } from "./test-utils.js";

describe("makeIncisedRhythm", () => {
  it("should cut prefix and suffix into every division", () => {
    const result = makeIncisedRhythm({
      divisions: [[5, 16], [3, 8]],
      incise: { prefixTalea: [-1], prefixCounts: [1], suffixTalea: [-1], suffixCounts: [1] }
    });
    assert.deepStrictEqual(contentCounts(result.tuplets, 16), [
      [-1, 3, -1],
      [-1, 4, -1]
    ]);
    assert.deepStrictEqual(noticeCodes(result), []);
  });

  it("should split the body by ratio", () => {
    const result = makeIncisedRhythm({
      divisions: [[1, 2]],
      incise: { prefixTalea: [1], prefixCounts: [1], bodyRatio: [1, 1] }
    });
    assert.deepStrictEqual(contentCounts(result.tuplets, 16), [[1, 4, 3]]);
  });

  it("should fill the body with one rest", () => {
    const result = makeIncisedRhythm({
      divisions: [[1, 4]],
      incise: { prefixTalea: [1], prefixCounts: [1], fillWithRests: true }
    });
    assert.deepStrictEqual(contentCounts(result.tuplets, 16), [[1, -3]]);
  });

  it("should truncate a prefix longer than the division and drop the suffix", () => {
    const result = makeIncisedRhythm({
      divisions: [[1, 4]],
      incise: { prefixTalea: [3, 3], prefixCounts: [2], suffixTalea: [2], suffixCounts: [1] }
    });
    assert.deepStrictEqual(contentCounts(result.tuplets, 16), [[3, 1]]);
    assert.deepStrictEqual(noticeCodes(result), ["PREFIX_TRUNCATED", "SUFFIX_TRUNCATED"]);
  });

  it("should keep the front of a suffix that only partly fits", () => {
    const result = makeIncisedRhythm({
      divisions: [[1, 4]],
      incise: { prefixTalea: [2], prefixCounts: [1], suffixTalea: [-3], suffixCounts: [1] }
    });
    assert.deepStrictEqual(contentCounts(result.tuplets, 16), [[2, -2]]);
    assert.deepStrictEqual(noticeCodes(result), ["SUFFIX_TRUNCATED"]);
  });

  it("should advance prefix items across divisions", () => {
    const result = makeIncisedRhythm({
      divisions: [[1, 2], [1, 2], [1, 2]],
      incise: { prefixTalea: [1, 2, 3], prefixCounts: [1, 2] }
    });
    assert.deepStrictEqual(contentCounts(result.tuplets, 16), [
      [1, 7],
      [2, 3, 3],
      [1, 7]
    ]);
  });

  it("should only incise the outer edges when asked", () => {
    const incise = {
      prefixTalea: [1],
      prefixCounts: [1],
      suffixTalea: [-2],
      suffixCounts: [1],
      bodyRatio: [1, 1],
      outerDivisionsOnly: true
    };
    const result = makeIncisedRhythm({ divisions: [[1, 4], [1, 4], [1, 4]], incise });
    assert.deepStrictEqual(contentCounts(result.tuplets, 16), [[1, 3], [4], [2, -2]]);

    const single = makeIncisedRhythm({ divisions: [[1, 2]], incise });
    assert.deepStrictEqual(contentCounts(single.tuplets, 16), [[1, 5, -2]]);
  });

  it("should prolate numerators with extra counts", () => {
    const result = makeIncisedRhythm({
      divisions: [[1, 4]],
      incise: { prefixTalea: [1], prefixCounts: [1] },
      extraCounts: [1]
    });
    assert.deepStrictEqual(contentCounts(result.tuplets, 16), [[1, 4]]);
    assert.strictEqual(result.diagnostics.divisions[0].target.toString(), "5/16");
  });

  it("should scale incisions to a finer division grid", () => {
    const result = makeIncisedRhythm({
      divisions: [[3, 16]],
      incise: { prefixTalea: [1], prefixCounts: [1], taleaDenominator: 8 }
    });
    assert.strictEqual(result.meta.denominator, 16);
    assert.deepStrictEqual(contentStrings(result.tuplets), [["1/8", "1/16"]]);
  });

  it("should hand the previous state back unchanged", () => {
    const result = makeIncisedRhythm({
      divisions: [[1, 4]],
      incise: "INCISE_RESTED_HEAD",
      previousState: { divisionsConsumed: 3, logicalTiesProduced: 5 }
    });
    assert.deepStrictEqual(contentCounts(result.tuplets, 16), [[-1, 3]]);
    assert.deepStrictEqual(result.state, {
      divisionsConsumed: 3,
      logicalTiesProduced: 5,
      taleaWeightConsumed: 0,
      incompleteLastNote: false
    });
  });

  it("should reject counts that read from an empty talea", () => {
    assert.throws(
      () => makeIncisedRhythm({ divisions: [[1, 4]], incise: { prefixCounts: [1] } }),
      InvalidArgumentError
    );
  });
});
