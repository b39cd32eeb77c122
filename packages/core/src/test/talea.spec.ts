import { describe, it } from "node:test";
import assert from "node:assert";
import { Talea } from "../pattern/talea.js";
import { InvalidArgumentError } from "../errors.js";

const rising = new Talea({ counts: [1, 2, 3, 4], denominator: 16 });

describe("Talea", () => {
  it("should weigh one pass of counts as the period", () => {
    assert.strictEqual(rising.period, 10);
    const withPreamble = new Talea({ counts: [1, 2, 3, 4], preamble: [1, 1] });
    assert.strictEqual(withPreamble.period, 10);
    assert.strictEqual(withPreamble.preambleWeight, 2);
    assert.strictEqual(withPreamble.denominator, 16);
  });

  it("should find count boundaries across periods", () => {
    const positions = [1, 2, 3, 6, 10, 11, 12, 13];
    assert.deepStrictEqual(
      positions.map((position) => rising.contains(position)),
      [true, false, true, true, true, true, false, true]
    );
  });

  it("should find the same boundaries whatever the denominator and signs", () => {
    const eighths = new Talea({ counts: [1, 2, 3, 4], denominator: 8 });
    const rests = new Talea({ counts: [-1, 2, -3, 4], denominator: 16 });
    for (let position = 1; position <= 25; position++) {
      assert.strictEqual(eighths.contains(position), rising.contains(position), `position ${position}`);
      assert.strictEqual(rests.contains(position), rising.contains(position), `position ${position}`);
    }
  });

  it("should check positions inside the preamble against the preamble", () => {
    const talea = new Talea({ counts: [1, 2, 3, 4], preamble: [1, 1] });
    assert.deepStrictEqual(
      [1, 2, 3, 4, 5].map((position) => talea.contains(position)),
      [true, true, true, false, true]
    );
  });

  it("should reject non-positive positions", () => {
    assert.throws(() => rising.contains(0), InvalidArgumentError);
  });

  it("should read items cyclically", () => {
    assert.deepStrictEqual(rising.itemAt(0), { count: 1, denominator: 16 });
    assert.deepStrictEqual(rising.itemAt(5), { count: 2, denominator: 16 });
    assert.deepStrictEqual(rising.itemAt(-1), { count: 4, denominator: 16 });
    assert.deepStrictEqual(
      rising.slice(2, 6).map((item) => item.count),
      [3, 4, 1, 2]
    );
  });

  it("should return to the plain counts after a whole period", () => {
    const advanced = rising.advance(10);
    assert.deepStrictEqual(advanced.preamble, []);
    assert.deepStrictEqual(advanced.toSpec(), { counts: [1, 2, 3, 4], denominator: 16 });
  });

  it("should keep the remainder of a cut count as preamble", () => {
    assert.deepStrictEqual(rising.advance(4).preamble, [2, 4]);
    assert.deepStrictEqual(rising.advance(12).preamble, [1, 3, 4]);
    assert.deepStrictEqual(rising.advance(4).counts, [1, 2, 3, 4]);
  });

  it("should trim an existing preamble before wrapping into the counts", () => {
    const talea = new Talea({ counts: [1, 2], preamble: [3, 3] });
    assert.deepStrictEqual(talea.advance(2).preamble, [1, 3]);
    assert.deepStrictEqual(talea.advance(6).preamble, []);
    assert.deepStrictEqual(talea.advance(7).preamble, [2]);
  });

  it("should refuse negative advances and advancing a sentinel talea", () => {
    assert.throws(() => rising.advance(-1), InvalidArgumentError);
    const sentinel = new Talea({ counts: [1, "+"] });
    assert.throws(() => sentinel.advance(1), InvalidArgumentError);
    assert.strictEqual(sentinel.advance(0), sentinel);
  });

  it("should validate its spec", () => {
    assert.throws(() => new Talea({ counts: [1], denominator: 12 }), InvalidArgumentError);
    assert.throws(() => new Talea({ counts: [] }), InvalidArgumentError);
    assert.throws(() => new Talea({ counts: [1, 0] }), InvalidArgumentError);
    assert.throws(() => new Talea({ counts: ["+", "-"] }), InvalidArgumentError);
    assert.throws(() => new Talea({ counts: [1, "+"], preamble: [1] }), InvalidArgumentError);
  });

  it("should refine onto a finer denominator without changing durations", () => {
    const talea = new Talea({ counts: [1, -2, "+"], denominator: 16, endCounts: [2] });
    const refined = talea.refine(32);
    assert.deepStrictEqual(refined.toSpec(), { counts: [2, -4, "+"], denominator: 32, endCounts: [4] });
    const advanced = rising.advance(3).refine(64);
    assert.deepStrictEqual(advanced.preamble, [12, 16]);
    assert.strictEqual(rising.refine(16), rising);
    assert.throws(() => rising.refine(8), InvalidArgumentError);
    assert.throws(() => rising.refine(48), InvalidArgumentError);
  });

  it("should iterate preamble and counts as durations, skipping the sentinel", () => {
    const talea = new Talea({ counts: [1, "+", -2], denominator: 8, preamble: [] });
    assert.deepStrictEqual(
      [...talea].map((duration) => duration.toString()),
      ["1/8", "-1/4"]
    );
    const withPreamble = new Talea({ counts: [2], preamble: [1] });
    assert.deepStrictEqual(
      [...withPreamble].map((duration) => duration.toString()),
      ["1/16", "1/8"]
    );
  });
});
