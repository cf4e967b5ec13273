import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { hasFatal, partitionDiagnostics, validateScore } from "../phase/validation.js";
import { harmonizeMelody } from "../phase/harmonization.js";
import type { CanonicalScore, Diagnostic } from "../types.js";
import { chord, melodyFixture, rest } from "./test-utils.js";

function codes(diagnostics: readonly Diagnostic[]): string[] {
  return diagnostics.map((entry) => entry.code);
}

function diagnosticsAfter(change: (score: CanonicalScore) => void): Diagnostic[] {
  const score = melodyFixture();
  change(score);
  return validateScore(score);
}

describe("Melody validation", () => {
  it("accepts the reference melody", () => {
    assert.deepEqual(validateScore(melodyFixture()), []);
  });

  it("flags short measures and the phrase end they displace", () => {
    const score = melodyFixture();
    score.measures[0].voices.soprano[2].beats = 1;
    const diagnostics = validateScore(score);
    assert.deepEqual(codes(diagnostics), ["measure-duration", "phrase-end-off-barline"]);
    assert.deepEqual(diagnostics[0], {
      code: "measure-duration",
      severity: "fatal",
      message: "Measure 1 voice soprano has 3 beats; expected 4.",
      measureNumber: 1,
      voice: "soprano"
    });
    assert.equal(diagnostics[1].severity, "warning");
  });

  it("checks chord coverage", () => {
    const missing = melodyFixture();
    missing.chordProgression = [chord(1, 1)];
    assert.deepEqual(validateScore(missing), [
      { code: "missing-chord", severity: "fatal", message: "Missing chord symbol for measure 2.", measureNumber: 2 }
    ]);

    const extra = melodyFixture();
    extra.chordProgression.push(chord(3, 1), chord(1, 1));
    assert.deepEqual(codes(validateScore(extra)), ["extra-chord", "extra-chord"]);

    const empty = melodyFixture();
    empty.chordProgression = [];
    assert.deepEqual(codes(validateScore(empty)), ["missing-chord-progression"]);
  });

  it("rejects chords outside the key", () => {
    const score = melodyFixture();
    score.chordProgression[0] = { ...score.chordProgression[0], symbol: "Cm", pitchClasses: [0, 3, 7] };
    const { fatal, warnings } = partitionDiagnostics(validateScore(score));
    assert.deepEqual(codes(fatal), ["non-diatonic-chord"]);
    assert.deepEqual(codes(warnings), ["strong-beat-conflict"]);
  });

  it("checks the lyric mapping", () => {
    const cases: [string, (score: CanonicalScore) => void, string[]][] = [
      ["continuation", (score) => (score.measures[0].voices.soprano[1].lyricMode = "melisma_continue"), ["continuation-lyric"]],
      ["orphan", (score) => delete score.measures[0].voices.soprano[1].lyricSyllableId, ["orphan-note", "unmapped-syllable"]],
      ["unknown section", (score) => (score.measures[0].voices.soprano[1].sectionId = "sec-9"), ["unknown-section", "unmapped-syllable"]],
      [
        "unknown syllable",
        (score) => (score.measures[0].voices.soprano[1].lyricSyllableId = "sec-1-syl-9"),
        ["unknown-syllable", "unmapped-syllable"]
      ],
      [
        "duplicate",
        (score) => {
          const note = score.measures[0].voices.soprano[2];
          note.lyricSyllableId = "sec-1-syl-0";
          note.lyric = "Glor";
        },
        ["duplicate-syllable", "unmapped-syllable"]
      ]
    ];
    for (const [name, change, expected] of cases) {
      assert.deepEqual(codes(diagnosticsAfter(change)), expected, name);
    }
  });

  it("treats malformed pitches as fatal", () => {
    const score = melodyFixture();
    score.measures[0].voices.soprano[0].pitch = "H4";
    const diagnostics = validateScore(score);
    assert.deepEqual(codes(diagnostics), ["invalid-pitch"]);
    assert.equal(hasFatal(diagnostics), true);
  });

  it("warns about strong-beat conflicts, leaps and range", () => {
    const conflict = melodyFixture();
    conflict.measures[0].voices.soprano[0].pitch = "D4";
    assert.deepEqual(codes(validateScore(conflict)), ["strong-beat-conflict"]);

    const leap = melodyFixture();
    leap.measures[0].voices.soprano[0].pitch = "E5";
    const leapDiagnostics = validateScore(leap);
    assert.deepEqual(codes(leapDiagnostics), ["melodic-leap"]);
    assert.equal(leapDiagnostics[0].noteIndex, 1);

    const low = melodyFixture();
    low.measures[0].voices.soprano[0].pitch = "G3";
    const lowDiagnostics = validateScore(low);
    assert.deepEqual(codes(lowDiagnostics), ["out-of-range", "extreme-tessitura", "melodic-leap"]);
    assert.equal(hasFatal(lowDiagnostics), false);
  });
});

describe("SATB validation", () => {
  it("accepts the harmonized reference melody", () => {
    assert.deepEqual(validateScore(harmonizeMelody(melodyFixture())), []);
  });

  it("requires note-for-note alignment", () => {
    const score = harmonizeMelody(melodyFixture());
    score.measures[0].voices.alto = [rest(4)];
    assert.deepEqual(codes(partitionDiagnostics(validateScore(score)).fatal), ["satb-alignment"]);
  });

  it("detects crossing voices", () => {
    const score = harmonizeMelody(melodyFixture());
    score.measures[0].voices.alto[0].pitch = "A4";
    const crossing = validateScore(score).filter((entry) => entry.code === "voice-crossing");
    assert.deepEqual(crossing, [
      { code: "voice-crossing", severity: "warning", message: "Voice crossing at note 0: S/A/T/B not ordered.", noteIndex: 0 }
    ]);
  });

  it("detects parallel octaves", () => {
    const score = harmonizeMelody(melodyFixture());
    score.measures[0].voices.tenor[1].pitch = "F3";
    const parallels = validateScore(score).filter((entry) => entry.code === "parallel-motion");
    assert.deepEqual(
      parallels.map((entry) => entry.message),
      ["Parallel octave between soprano and tenor at note 1."]
    );
  });
});
