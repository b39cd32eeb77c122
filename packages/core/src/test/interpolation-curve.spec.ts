import { describe, it } from "node:test";
import assert from "node:assert";
import {
  interpolateDivide,
  interpolateDivideMultiple,
  quantizeCurve,
  tryQuantizeCurve
} from "../phase/interpolation-curve.js";
import { makeAccelerandoRhythm } from "../phase/accelerando-generation.js";
import { Interpolation } from "../pattern/interpolation.js";
import { Duration } from "../duration.js";
import { DurationMismatchError, InvalidArgumentError } from "../errors.js";

function assertClose(actual: number, expected: number, tolerance: number): void {
  assert.ok(Math.abs(actual - expected) < tolerance, `expected ${expected}, got ${actual}`);
}

describe("interpolateDivide", () => {
  it("should divide evenly when start and stop agree", () => {
    const curve = interpolateDivide(10, 1, 1, 1);
    assert.deepStrictEqual(curve, { status: "ok", durations: Array.from({ length: 10 }, () => 1) });
  });

  it("should follow a cosine curve and sum to the total", () => {
    const curve = interpolateDivide(10, 5, 1);
    assert.strictEqual(curve.status, "ok");
    if (curve.status === "ok") {
      const expected = [4.798, 2.879, 1.326, 0.995];
      assert.strictEqual(curve.durations.length, expected.length);
      curve.durations.forEach((value, index) => assertClose(value, expected[index], 1e-3));
      assertClose(
        curve.durations.reduce((sum, value) => sum + value, 0),
        10,
        1e-9
      );
    }
  });

  it("should report totals that cannot hold one start and one stop", () => {
    assert.deepStrictEqual(interpolateDivide(2, 1, 2), { status: "too-small" });
    assert.strictEqual(interpolateDivide(3, 1, 2).status, "ok");
  });

  it("should accept durations", () => {
    const curve = interpolateDivide(new Duration(1, 2), new Duration(1, 8), new Duration(1, 16));
    assert.strictEqual(curve.status, "ok");
  });

  it("should reject non-positive inputs", () => {
    assert.throws(() => interpolateDivide(0, 1, 1), InvalidArgumentError);
    assert.throws(() => interpolateDivide(4, -1, 1), InvalidArgumentError);
    assert.throws(() => interpolateDivide(4, 1, 1, 0), InvalidArgumentError);
  });
});

describe("interpolateDivideMultiple", () => {
  it("should chain segments between consecutive reference durations", () => {
    const curve = interpolateDivideMultiple([100, 50], [20, 10, 20]);
    assert.strictEqual(curve.status, "ok");
    if (curve.status === "ok") {
      assert.strictEqual(curve.durations.length, 11);
      assertClose(curve.durations[0], 19.448, 1e-3);
      assertClose(curve.durations[7], 9.513, 1e-3);
      assertClose(
        curve.durations.slice(0, 7).reduce((sum, value) => sum + value, 0),
        100,
        1e-9
      );
      assertClose(
        curve.durations.reduce((sum, value) => sum + value, 0),
        150,
        1e-9
      );
    }
  });

  it("should report a segment that is too small", () => {
    assert.deepStrictEqual(interpolateDivideMultiple([100, 5], [20, 10, 20]), { status: "too-small" });
  });

  it("should need one more reference than totals", () => {
    assert.throws(() => interpolateDivideMultiple([100, 50], [20, 10]), InvalidArgumentError);
  });
});

describe("quantizeCurve", () => {
  it("should round to the grid and give the error to the last element", () => {
    assert.deepStrictEqual(quantizeCurve([0.3, 0.7], new Duration(1)), [
      new Duration(307, 1024),
      new Duration(717, 1024)
    ]);
  });

  it("should fail when nothing is left for the last element", () => {
    assert.throws(() => quantizeCurve([0.6, 0.1], new Duration(1, 2)), DurationMismatchError);
    assert.strictEqual(tryQuantizeCurve([0.6, 0.1], new Duration(1, 2)), undefined);
  });

  it("should fail when units near the grid size all round up", () => {
    const curve = Array.from({ length: 640 }, () => 1 / 640);
    assert.throws(() => quantizeCurve(curve, new Duration(1)), DurationMismatchError);
    assert.strictEqual(tryQuantizeCurve(curve, new Duration(1)), undefined);
  });
});

describe("makeAccelerandoRhythm", () => {
  it("should fill each division exactly", () => {
    const result = makeAccelerandoRhythm({ divisions: [[1, 2], [3, 8]] });
    for (const tuplet of result.tuplets) {
      assert.ok(Duration.sum(tuplet.contents).equals(tuplet.duration));
      assert.ok(tuplet.contents.every((content) => content.sign() > 0));
    }
    const [first] = result.tuplets;
    assert.strictEqual(first.contents.length, 6);
    assert.ok(first.contents[0].greaterThan(first.contents[first.contents.length - 1]));
    assert.strictEqual(first.writtenDuration?.toString(), "1/16");
  });

  it("should write a short division as one note", () => {
    const result = makeAccelerandoRhythm({ divisions: [[1, 2], [1, 8]] });
    assert.deepStrictEqual(
      result.tuplets[1].contents.map((content) => content.toString()),
      ["1/8"]
    );
    const notice = result.diagnostics.notices[0];
    assert.strictEqual(notice.code, "INTERPOLATION_TOO_SMALL");
    assert.strictEqual(notice.divisionIndex, 1);
    assert.deepStrictEqual(result.state, {
      divisionsConsumed: 2,
      logicalTiesProduced: result.tuplets[0].contents.length + 1,
      taleaWeightConsumed: 0,
      incompleteLastNote: false
    });
  });

  it("should write one note when the curve does not fit the grid", () => {
    const unit: [number, number] = [205, 131072];
    const result = makeAccelerandoRhythm({
      divisions: [[1, 1]],
      interpolations: [{ startDuration: unit, stopDuration: unit }]
    });
    assert.deepStrictEqual(
      result.tuplets[0].contents.map((content) => content.toString()),
      ["1"]
    );
    assert.strictEqual(result.tuplets[0].writtenDuration?.toString(), "1");
    const [notice] = result.diagnostics.notices;
    assert.strictEqual(notice.code, "INTERPOLATION_TOO_SMALL");
    assert.strictEqual(notice.divisionIndex, 0);
  });

  it("should rotate interpolations by the divisions already consumed", () => {
    const accelerando = new Interpolation({ startDuration: [1, 8], stopDuration: [1, 16] });
    const result = makeAccelerandoRhythm({
      divisions: [[1, 2]],
      interpolations: [accelerando, accelerando.reverse()],
      previousState: { divisionsConsumed: 1 }
    });
    const contents = result.tuplets[0].contents;
    assert.ok(contents[0].lessThan(contents[contents.length - 1]));
  });

  it("should accept an exponential curve and preset ids", () => {
    const result = makeAccelerandoRhythm({
      divisions: [[1, 1]],
      interpolations: ["RIT_SIXTEENTH_TO_QUARTER"],
      exponent: 2
    });
    const [tuplet] = result.tuplets;
    assert.ok(Duration.sum(tuplet.contents).equals(new Duration(1)));
    assert.ok(tuplet.contents[0].lessThan(tuplet.contents[tuplet.contents.length - 1]));
  });
});
