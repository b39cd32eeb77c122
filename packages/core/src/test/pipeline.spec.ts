import { describe, it } from "node:test";
import assert from "node:assert";
import { runRhythmMaker, runRhythmSequence } from "../pipeline.js";
import { makeTaleaRhythm } from "../phase/talea-generation.js";
import type { RhythmMakerOptions } from "../types.js";
import { contentCounts, contentStrings } from "./test-utils.js";

describe("runRhythmMaker", () => {
  it("should dispatch on kind", () => {
    const talea = runRhythmMaker({ kind: "talea", divisions: [[3, 8]], talea: { counts: [1, 2] } });
    assert.strictEqual(talea.meta.kind, "talea");
    assert.deepStrictEqual(contentCounts(talea.tuplets, 16), [[1, 2, 1, 2]]);

    const incised = runRhythmMaker({ kind: "incised", divisions: [[1, 4]], incise: "INCISE_RESTED_HEAD" });
    assert.strictEqual(incised.meta.kind, "incised");

    const accelerando = runRhythmMaker({ kind: "accelerando", divisions: [[1, 2]] });
    assert.strictEqual(accelerando.meta.kind, "accelerando");
    assert.strictEqual(accelerando.meta.denominator, 1024);

    const even = runRhythmMaker({ kind: "evenDivision", divisions: [[1, 4]] });
    assert.deepStrictEqual(contentStrings(even.tuplets), [["1/8", "1/8"]]);

    const ratio = runRhythmMaker({ kind: "ratio", divisions: [[1, 4]], ratios: [[2, 1, 1]] });
    assert.deepStrictEqual(contentStrings(ratio.tuplets), [["1/8", "1/16", "1/16"]]);
  });

  it("should replay a result from its metadata", () => {
    const result = runRhythmMaker({
      kind: "evenDivision",
      divisions: [[3, 8], [1, 2]],
      denominators: [8, 16],
      extraCounts: [1],
      spelling: { forbiddenNoteDuration: [1, 2] }
    });
    const replayed = runRhythmMaker(result.meta.replayOptions);
    assert.deepStrictEqual(replayed.tuplets, result.tuplets);
    assert.strictEqual(result.meta.spelling.forbiddenNoteDuration?.toString(), "1/2");
  });
});

describe("runRhythmSequence", () => {
  it("should thread state from pass to pass", () => {
    const passes: RhythmMakerOptions[] = [
      { kind: "talea", divisions: [[3, 8], [4, 8]], talea: { counts: [1, 2, 3, 4] } },
      { kind: "talea", divisions: [[3, 8], [4, 8]], talea: { counts: [1, 2, 3, 4] } }
    ];
    const results = runRhythmSequence(passes);
    const whole = makeTaleaRhythm({ divisions: [[3, 8], [4, 8], [3, 8], [4, 8]], talea: { counts: [1, 2, 3, 4] } });
    assert.deepStrictEqual(
      results.flatMap((result) => contentCounts(result.tuplets, 16)),
      contentCounts(whole.tuplets, 16)
    );
    assert.deepStrictEqual(results[1].state, whole.state);
  });
});
