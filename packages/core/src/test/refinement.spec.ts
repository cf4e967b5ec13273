import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { refineSatbScore, refineScore } from "../pipeline.js";
import { refineMelody, targetMusicUnits } from "../phase/refinement.js";
import { harmonizeMelody } from "../phase/harmonization.js";
import { flattenVoice } from "../phase/normalization.js";
import { parsePitch } from "../musicUtils.js";
import { createRng } from "../rng.js";
import { StructuralError } from "../errors.js";
import { melodyFixture, pitchesOf } from "./test-utils.js";

describe("Refinement targets", () => {
  it("defaults to every music unit", () => {
    assert.deepEqual([...targetMusicUnits(melodyFixture())], ["verse"]);
    assert.deepEqual([...targetMusicUnits(melodyFixture(), ["verse"])], ["verse"]);
  });

  it("rejects unknown music units", () => {
    assert.throws(() => targetMusicUnits(melodyFixture(), ["chorus"]), {
      name: "StructuralError",
      message: "Unknown music unit id: chorus"
    });
  });
});

describe("Melody refinement", () => {
  it("raises syllable heads and keeps strong beats on the chord", () => {
    const result = refineScore(melodyFixture(), { instruction: "higher" });
    assert.equal(result.attempts, 1);
    assert.deepEqual(pitchesOf(flattenVoice(result.score, "soprano")), ["G4", "G4", "G4", "REST"]);
    assert.equal(result.score.meta.rationale, "Refined melody for verse: higher");
    assert.deepEqual(result.score.chordProgression, melodyFixture().chordProgression);
  });

  it("lowers syllable heads", () => {
    const refined = refineMelody(melodyFixture(), { instruction: "Sing it lower" }, createRng("lower"));
    assert.deepEqual(pitchesOf(refined.measures[0].voices.soprano), ["E4", "E4", "E4"]);
  });

  it("regenerates deterministically and resolves to the tonic", () => {
    const first = refineScore(melodyFixture(), { regenerate: true });
    const second = refineScore(melodyFixture(), { regenerate: true });
    assert.deepEqual(second, first);
    assert.equal(first.score.meta.rationale, "Regenerated chords and melody for verse.");
    assert.deepEqual(
      first.score.chordProgression.map((c) => [c.measureNumber, c.degree, c.sectionId]),
      [
        [1, 1, "sec-1"],
        [2, 1, "padding"]
      ]
    );
    const sung = flattenVoice(first.score, "soprano").filter((note) => !note.isRest);
    assert.deepEqual(
      sung.map((note) => [note.beats, note.lyric]),
      [
        [1, "Glor"],
        [1, "y"],
        [2, "rise"]
      ]
    );
    const last = parsePitch(sung[2].pitch);
    assert.ok(last !== null);
    assert.equal(last % 12, 0);
  });

  it("refuses SATB scores", () => {
    assert.throws(() => refineScore(harmonizeMelody(melodyFixture()), { instruction: "higher" }), StructuralError);
  });

  it("refines an SATB score through its melody", () => {
    const { score } = refineSatbScore(harmonizeMelody(melodyFixture()), { instruction: "higher" });
    assert.equal(score.meta.stage, "satb");
    assert.deepEqual(pitchesOf(flattenVoice(score, "soprano")), ["G4", "G4", "G4", "REST"]);
    assert.deepEqual(pitchesOf(flattenVoice(score, "bass")), ["C3", "C3", "C3", "REST"]);
  });
});
