import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  beatsPerMeasure,
  beatsToNextBarline,
  chordSymbol,
  isDiatonicTriad,
  isOnBarline,
  isStrongBeat,
  keyToFifths,
  midiToPitch,
  parseKey,
  parsePitch,
  parseTimeSignature,
  pitchToMidi,
  stepDiatonic,
  triad
} from "../musicUtils.js";

describe("Scale model", () => {
  it("builds major and minor scales from key strings", () => {
    assert.deepEqual(parseKey("G").semitones, [7, 9, 11, 0, 2, 4, 6]);
    const fSharpMinor = parseKey("F#m");
    assert.equal(fSharpMinor.tonic, "F#");
    assert.equal(fSharpMinor.isMinor, true);
    assert.deepEqual(fSharpMinor.semitones, [6, 8, 9, 11, 1, 2, 4]);
    assert.equal(parseKey("Bb").tonicPitchClass, 10);
  });

  it("falls back to C for unknown tonics", () => {
    const scale = parseKey("H");
    assert.equal(scale.tonic, "C");
    assert.deepEqual(scale.semitones, [0, 2, 4, 5, 7, 9, 11]);
  });

  it("lets a recognised mode override the key's own minor marker", () => {
    assert.equal(parseKey("D", "dorian").isMinor, true);
    assert.equal(parseKey("Am", "major").isMinor, false);
    assert.equal(parseKey("Am", "mysterious").isMinor, true);
  });

  it("stacks thirds within the scale", () => {
    const c = parseKey("C");
    assert.deepEqual(triad(c, 5), [7, 11, 2]);
    assert.deepEqual(triad(c, 8), [0, 4, 7]);
    assert.equal(chordSymbol(c, 5), "G");
    assert.equal(chordSymbol(c, 2), "Dm");
    assert.equal(chordSymbol(c, 7), "Bdim");
    assert.equal(chordSymbol(parseKey("Am"), 3), "C");
  });

  it("recognises diatonic triads in order only", () => {
    const c = parseKey("C");
    assert.equal(isDiatonicTriad(c, [2, 5, 9]), true);
    assert.equal(isDiatonicTriad(c, [2, 6, 9]), false);
    assert.equal(isDiatonicTriad(c, [5, 9, 2]), false);
    assert.equal(isDiatonicTriad(c, [0, 4]), false);
  });
});

describe("Pitch helpers", () => {
  it("converts between MIDI numbers and scientific pitch", () => {
    assert.equal(midiToPitch(60), "C4");
    assert.equal(midiToPitch(61), "C#4");
    assert.equal(midiToPitch(47), "B2");
    assert.equal(parsePitch("Bb3"), 58);
    assert.equal(parsePitch("C-1"), 0);
    assert.equal(parsePitch("REST"), null);
    assert.throws(() => pitchToMidi("X4"), /Invalid pitch: X4/);
  });

  it("steps along the scale", () => {
    const c = parseKey("C");
    assert.equal(stepDiatonic(60, 2, c), 64);
    assert.equal(stepDiatonic(61, -1, c), 59);
    assert.equal(stepDiatonic(64, 0, c), 64);
  });

  it("derives key signatures", () => {
    assert.equal(keyToFifths(parseKey("D")), 2);
    assert.equal(keyToFifths(parseKey("Eb")), -3);
    assert.equal(keyToFifths(parseKey("Am")), 0);
    assert.equal(keyToFifths(parseKey("Em")), 1);
    assert.equal(keyToFifths(parseKey("F#")), 6);
    assert.equal(keyToFifths(parseKey("Gb")), -6);
  });
});

describe("Meter helpers", () => {
  it("measures capacity in quarter beats", () => {
    assert.equal(beatsPerMeasure("4/4"), 4);
    assert.equal(beatsPerMeasure("3/4"), 3);
    assert.equal(beatsPerMeasure("6/8"), 3);
    assert.equal(beatsPerMeasure("2/2"), 4);
    assert.throws(() => parseTimeSignature("4"), /Invalid time signature/);
  });

  it("places strong beats per meter", () => {
    assert.equal(isStrongBeat(0, "4/4"), true);
    assert.equal(isStrongBeat(2, "4/4"), true);
    assert.equal(isStrongBeat(1, "4/4"), false);
    assert.equal(isStrongBeat(1.5, "6/8"), true);
    assert.equal(isStrongBeat(1, "6/8"), false);
    assert.equal(isStrongBeat(1, "3/4"), true);
    assert.equal(isStrongBeat(1.5, "3/4"), false);
  });

  it("finds barlines", () => {
    assert.equal(isOnBarline(8, 4), true);
    assert.equal(isOnBarline(7.5, 4), false);
    assert.equal(beatsToNextBarline(5, 4), 3);
    assert.equal(beatsToNextBarline(4, 4), 0);
  });
});
