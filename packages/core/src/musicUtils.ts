import type { PitchRange, Scale } from "./types.js";
import { BEAT_EPSILON } from "./constants/voice-config.js";

/**
 * Lookup table for fast conversion from note names to semitone offsets.
 * Both sharp and flat spellings are accepted because keys are written
 * either way (F# major, Bb major).
 */
const NOTE_TO_SEMITONE: Record<string, number> = {
  C: 0,
  "C#": 1,
  Db: 1,
  D: 2,
  "D#": 3,
  Eb: 3,
  E: 4,
  F: 5,
  "F#": 6,
  Gb: 6,
  G: 7,
  "G#": 8,
  Ab: 8,
  A: 9,
  "A#": 10,
  Bb: 10,
  B: 11
};

/** Rendered pitches always use sharps */
const SEMITONE_TO_NOTE = ["C", "C#", "D", "D#", "E", "F", "F#", "G", "G#", "A", "A#", "B"] as const;

const MAJOR_PATTERN = [0, 2, 4, 5, 7, 9, 11] as const;
const MINOR_PATTERN = [0, 2, 3, 5, 7, 8, 10] as const;

/**
 * Triad quality suffix per scale degree (index 0 = degree 1)
 */
const MAJOR_TRIAD_QUALITIES = ["", "m", "m", "", "", "m", "dim"] as const;
const MINOR_TRIAD_QUALITIES = ["m", "dim", "", "m", "m", "", ""] as const;

const MINOR_FAMILY_MODES = new Set(["dorian", "phrygian", "aeolian", "locrian", "minor"]);
const MAJOR_FAMILY_MODES = new Set(["ionian", "lydian", "mixolydian", "major"]);

const PITCH_PATTERN = /^([A-G])(#|b)?(-?\d+)$/;

export const REST_PITCH = "REST";

/**
 * Builds the diatonic scale for a key string such as `G`, `Bb` or `F#m`.
 *
 * A recognised mode name overrides the key's own minor marker; anything else
 * leaves the `m` suffix as the only source of minor-ness. Unknown tonics fall
 * back to C.
 */
export function parseKey(key: string, mode?: string): Scale {
  const cleaned = key.trim();
  const keyMarksMinor = cleaned.length > 1 && cleaned.toLowerCase().endsWith("m");
  const rawTonic = (keyMarksMinor ? cleaned.slice(0, -1) : cleaned).trim();
  const capitalized = rawTonic.charAt(0).toUpperCase() + rawTonic.slice(1).toLowerCase();
  const tonic = capitalized in NOTE_TO_SEMITONE ? capitalized : "C";

  const normalizedMode = (mode ?? "").trim().toLowerCase();
  let isMinor = keyMarksMinor;
  if (MINOR_FAMILY_MODES.has(normalizedMode)) {
    isMinor = true;
  } else if (MAJOR_FAMILY_MODES.has(normalizedMode)) {
    isMinor = false;
  }

  const tonicPitchClass = NOTE_TO_SEMITONE[tonic];
  const pattern = isMinor ? MINOR_PATTERN : MAJOR_PATTERN;
  return {
    tonic,
    tonicPitchClass,
    isMinor,
    semitones: pattern.map((offset) => (tonicPitchClass + offset) % 12)
  };
}

function degreeIndex(degree: number): number {
  return (((degree - 1) % 7) + 7) % 7;
}

/**
 * Pitch classes of the triad on a scale degree, root first
 */
export function triad(scale: Scale, degree: number): number[] {
  const idx = degreeIndex(degree);
  const semis = scale.semitones;
  return [semis[idx], semis[(idx + 2) % 7], semis[(idx + 4) % 7]];
}

export function chordSymbol(scale: Scale, degree: number): string {
  const idx = degreeIndex(degree);
  const root = SEMITONE_TO_NOTE[scale.semitones[idx]];
  const quality = (scale.isMinor ? MINOR_TRIAD_QUALITIES : MAJOR_TRIAD_QUALITIES)[idx];
  return `${root}${quality}`;
}

/**
 * Whether the pitch classes, in order, form the triad on some degree of the scale
 */
export function isDiatonicTriad(scale: Scale, pitchClasses: readonly number[]): boolean {
  if (pitchClasses.length !== 3) {
    return false;
  }
  for (let degree = 1; degree <= 7; degree++) {
    const expected = triad(scale, degree);
    if (expected.every((pc, i) => pc === pitchClasses[i])) {
      return true;
    }
  }
  return false;
}

export function midiToPitch(midi: number): string {
  const octave = Math.floor(midi / 12) - 1;
  return `${SEMITONE_TO_NOTE[((midi % 12) + 12) % 12]}${octave}`;
}

/**
 * Parses scientific pitch notation; returns null for rests and malformed input
 */
export function parsePitch(pitch: string): number | null {
  const match = PITCH_PATTERN.exec(pitch);
  if (!match) {
    return null;
  }
  const [, letter, accidental = "", octave] = match;
  const semitone = NOTE_TO_SEMITONE[`${letter}${accidental}`];
  if (semitone === undefined) {
    return null;
  }
  return semitone + (Number(octave) + 1) * 12;
}

export function pitchToMidi(pitch: string): number {
  const midi = parsePitch(pitch);
  if (midi === null) {
    throw new Error(`Invalid pitch: ${pitch}`);
  }
  return midi;
}

export function pitchClass(midi: number): number {
  return ((midi % 12) + 12) % 12;
}

/**
 * Moves a pitch by octaves into [low, high], clamping when the range is narrower than an octave
 */
export function nearestInRange(candidate: number, low: number, high: number): number {
  let value = candidate;
  while (value < low) {
    value += 12;
  }
  while (value > high) {
    value -= 12;
  }
  return Math.max(low, Math.min(value, high));
}

/**
 * All MIDI numbers in a range whose pitch class is in the set
 */
export function pitchesInRange(pitchClasses: ReadonlySet<number>, range: PitchRange): number[] {
  const out: number[] = [];
  for (let midi = range.low; midi <= range.high; midi++) {
    if (pitchClasses.has(pitchClass(midi))) {
      out.push(midi);
    }
  }
  return out;
}

/**
 * Moves a pitch by a number of scale steps. Off-scale pitches are first
 * lowered onto the scale.
 */
export function stepDiatonic(midi: number, steps: number, scale: Scale): number {
  const members = new Set(scale.semitones);
  let current = midi;
  while (!members.has(pitchClass(current))) {
    current -= 1;
  }
  const direction = Math.sign(steps);
  for (let moved = 0; moved < Math.abs(steps); moved++) {
    current += direction;
    while (!members.has(pitchClass(current))) {
      current += direction;
    }
  }
  return current;
}

export function parseTimeSignature(timeSignature: string): { top: number; bottom: number } {
  const [top, bottom] = timeSignature.split("/").map((part) => Number(part));
  if (!Number.isInteger(top) || !Number.isInteger(bottom) || top <= 0 || bottom <= 0) {
    throw new Error(`Invalid time signature: ${timeSignature}`);
  }
  return { top, bottom };
}

/**
 * Measure capacity in quarter-note beats (6/8 holds 3)
 */
export function beatsPerMeasure(timeSignature: string): number {
  const { top, bottom } = parseTimeSignature(timeSignature);
  return top * (4 / bottom);
}

/**
 * Strong beats: 1 and 3 in 4/4, the two dotted-quarter pulses in 6/8,
 * every quarter otherwise. `position` is measured in quarter beats from the barline.
 */
export function isStrongBeat(position: number, timeSignature: string): boolean {
  const { top, bottom } = parseTimeSignature(timeSignature);
  if (top === 6 && bottom === 8) {
    return Math.abs(position) < BEAT_EPSILON || Math.abs(position - 1.5) < BEAT_EPSILON;
  }
  if (top === 4) {
    const remainder = position % 2;
    return remainder < BEAT_EPSILON || 2 - remainder < BEAT_EPSILON;
  }
  const fraction = position % 1;
  return fraction < BEAT_EPSILON || 1 - fraction < BEAT_EPSILON;
}

/**
 * Whether a beat position falls on a barline
 */
export function isOnBarline(position: number, capacity: number): boolean {
  const remainder = position % capacity;
  return remainder < BEAT_EPSILON || capacity - remainder < BEAT_EPSILON;
}

/**
 * Distance from a position to the next barline at or after it
 */
export function beatsToNextBarline(position: number, capacity: number): number {
  if (isOnBarline(position, capacity)) {
    return 0;
  }
  return capacity - (position % capacity);
}

/**
 * Key signature as a count of sharps (positive) or flats (negative)
 */
export function keyToFifths(scale: Scale): number {
  const majorTonic = scale.isMinor ? (scale.tonicPitchClass + 3) % 12 : scale.tonicPitchClass;
  let fifths = (majorTonic * 7) % 12;
  if (fifths > 6) {
    fifths -= 12;
  }
  if (scale.tonic.includes("#") && fifths < 0) {
    fifths += 12;
  }
  if (scale.tonic.includes("b") && fifths > 0) {
    fifths -= 12;
  }
  return fifths;
}
