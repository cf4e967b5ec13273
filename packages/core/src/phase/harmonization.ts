/**
 * SATB harmonization
 *
 * Derives alto, tenor and bass note for note from a validated melody-stage
 * score. Each lower voice takes the chord tone nearest a preferred interval
 * below the soprano, then three corrective passes run: spacing compression,
 * parallel breaking against the soprano and the tenor floor. A final guard
 * keeps every quadruple ordered and within spacing limits.
 */

import type { CanonicalScore, ScoreNote, Scale, VoiceName, VoiceNotes } from "../types.js";
import { MAX_MELODIC_LEAP, VOICE_RANGES, VOICE_SPACING, VOICE_TESSITURA, BEAT_EPSILON } from "../constants/voice-config.js";
import { beatsPerMeasure, midiToPitch, nearestInRange, parseKey, pitchClass, pitchToMidi } from "../musicUtils.js";
import { StructuralError } from "../errors.js";
import { flattenVoice, packMeasures } from "./normalization.js";
import { constrainMelodicCandidate, nearestPitchClass } from "./melody-generation.js";
import { hasFatal, validateScore } from "./validation.js";

type LowerVoice = Exclude<VoiceName, "soprano">;

const INITIAL_PITCHES: Record<LowerVoice, number> = { alto: 62, tenor: 55, bass: 48 };
const INITIAL_SOPRANO = 64;

/** Preferred distance below the soprano */
const ALTO_INTERVAL = 3;
const TENOR_INTERVAL = 7;

/** Offsets tried, in order, to break parallel fifths and octaves */
const PARALLEL_OFFSETS = [-2, -1, 1, 2, -3, 3] as const;

const SATB_RATIONALE = "SATB voiced note for note from the section chord progression.";

interface Bounds {
  lower?: number;
  upper?: number;
}

interface Voicing {
  alto: number;
  tenor: number;
  bass: number;
}

/**
 * Chord tone for a lower voice. Candidates are filtered in order: within a
 * leap and near the tessitura, within a leap, near the tessitura, anything
 * in range. The winner is closest to `target`, then closest to `previous`.
 */
export function chooseChordTone(voice: VoiceName, previous: number, target: number, chordTones: readonly number[], bounds: Bounds = {}): number {
  const range = VOICE_RANGES[voice];
  const tessitura = VOICE_TESSITURA[voice];
  let low = Math.max(range.low, bounds.lower ?? range.low);
  let high = Math.min(range.high, bounds.upper ?? range.high);
  if (low > high) {
    low = Math.max(range.low, tessitura.low - 1);
    high = Math.min(range.high, tessitura.high + 1);
  }

  const candidates: number[] = [];
  for (let midi = low; midi <= high; midi++) {
    if (chordTones.includes(pitchClass(midi))) {
      candidates.push(midi);
    }
  }
  if (!candidates.length) {
    return nearestInRange(target, low, high);
  }

  const withinLeap = (midi: number) => Math.abs(midi - previous) <= MAX_MELODIC_LEAP;
  const nearTessitura = (midi: number) => midi >= tessitura.low - 1 && midi <= tessitura.high + 1;
  const pools = [
    candidates.filter((midi) => withinLeap(midi) && nearTessitura(midi)),
    candidates.filter(withinLeap),
    candidates.filter(nearTessitura),
    candidates
  ];
  const pool = pools.find((entries) => entries.length > 0) ?? candidates;
  return pool.reduce((best, midi) => {
    const distance = Math.abs(midi - target);
    const bestDistance = Math.abs(best - target);
    if (distance < bestDistance || (distance === bestDistance && Math.abs(midi - previous) < Math.abs(best - previous))) {
      return midi;
    }
    return best;
  });
}

export function createsParallel(previousSoprano: number, soprano: number, previousVoice: number, voice: number): boolean {
  const before = Math.abs(previousSoprano - previousVoice) % 12;
  const after = Math.abs(soprano - voice) % 12;
  const sameDirection =
    (soprano - previousSoprano > 0 && voice - previousVoice > 0) || (soprano - previousSoprano < 0 && voice - previousVoice < 0);
  return sameDirection && (before === 0 || before === 7) && after === before;
}

function breakParallel(
  soprano: number,
  previousSoprano: number,
  previousVoice: number,
  candidate: number,
  voice: VoiceName,
  scale: Scale
): number {
  if (!createsParallel(previousSoprano, soprano, previousVoice, candidate)) {
    return candidate;
  }
  for (const offset of PARALLEL_OFFSETS) {
    const shifted = constrainMelodicCandidate(candidate + offset, previousVoice, voice, scale);
    if (!createsParallel(previousSoprano, soprano, previousVoice, shifted)) {
      return shifted;
    }
  }
  return candidate;
}

function compressSpacing(soprano: number, voicing: Voicing, previous: Voicing, tones: readonly number[]): Voicing {
  let { alto, tenor, bass } = voicing;
  const bassFloor = VOICE_TESSITURA.bass.low - 1;
  if (soprano - alto > VOICE_SPACING.SOPRANO_ALTO) {
    alto = chooseChordTone("alto", previous.alto, soprano - 12, tones, { lower: soprano - 12, upper: soprano - 1 });
  }
  if (alto - tenor > VOICE_SPACING.ALTO_TENOR) {
    tenor = chooseChordTone("tenor", previous.tenor, alto - 12, tones, { lower: alto - 12, upper: alto - 1 });
  }
  if (tenor - bass > VOICE_SPACING.TENOR_BASS) {
    bass = chooseChordTone("bass", previous.bass, tenor - 12, tones, {
      lower: Math.max(tenor - VOICE_SPACING.TENOR_BASS, bassFloor),
      upper: tenor - 1
    });
  }
  return { alto, tenor, bass };
}

/**
 * Chord tone inside [low, high], preferring the voice range, then closeness
 * to the current pitch, then to the previous pitch
 */
function guardTone(voice: LowerVoice, current: number, previous: number, low: number, high: number, tones: readonly number[]): number {
  if (current >= low && current <= high) {
    return current;
  }
  const range = VOICE_RANGES[voice];
  const window: number[] = [];
  for (let midi = low; midi <= high; midi++) {
    if (tones.includes(pitchClass(midi))) {
      window.push(midi);
    }
  }
  if (!window.length) {
    return Math.max(low, Math.min(current, high));
  }
  const inRange = window.filter((midi) => midi >= range.low && midi <= range.high);
  const pool = inRange.length ? inRange : window;
  return pool.reduce((best, midi) => {
    const distance = Math.abs(midi - current);
    const bestDistance = Math.abs(best - current);
    if (distance < bestDistance || (distance === bestDistance && Math.abs(midi - previous) < Math.abs(best - previous))) {
      return midi;
    }
    return best;
  });
}

export function enforceOrdering(soprano: number, voicing: Voicing, previous: Voicing, tones: readonly number[]): Voicing {
  const alto = guardTone("alto", voicing.alto, previous.alto, soprano - VOICE_SPACING.SOPRANO_ALTO, soprano, tones);
  const tenor = guardTone("tenor", voicing.tenor, previous.tenor, alto - VOICE_SPACING.ALTO_TENOR, alto, tones);
  const bass = guardTone("bass", voicing.bass, previous.bass, tenor - VOICE_SPACING.TENOR_BASS, tenor, tones);
  return { alto, tenor, bass };
}

function isHeldVoicing(soprano: number, voicing: Voicing, tones: readonly number[]): boolean {
  const { alto, tenor, bass } = voicing;
  return (
    [alto, tenor, bass].every((midi) => tones.includes(pitchClass(midi))) &&
    soprano >= alto &&
    alto >= tenor &&
    tenor >= bass &&
    soprano - alto <= VOICE_SPACING.SOPRANO_ALTO &&
    alto - tenor <= VOICE_SPACING.ALTO_TENOR &&
    tenor - bass <= VOICE_SPACING.TENOR_BASS
  );
}

/**
 * Voicing for one sung soprano note
 */
export function voiceChord(soprano: number, previousSoprano: number, previous: Voicing, tones: readonly number[], scale: Scale): Voicing {
  const bassFloor = VOICE_TESSITURA.bass.low - 1;
  let alto = chooseChordTone("alto", previous.alto, Math.min(soprano - ALTO_INTERVAL, previous.alto), tones, { upper: soprano - 1 });
  let tenor = chooseChordTone("tenor", previous.tenor, Math.min(soprano - TENOR_INTERVAL, previous.tenor), tones, { upper: alto - 1 });
  let bass = chooseChordTone("bass", previous.bass, previous.bass, tones, { lower: bassFloor, upper: tenor - 1 });
  ({ alto, tenor, bass } = compressSpacing(soprano, { alto, tenor, bass }, previous, tones));

  alto = breakParallel(soprano, previousSoprano, previous.alto, alto, "alto", scale);
  alto = chooseChordTone("alto", previous.alto, alto, tones, { upper: soprano - 1 });
  tenor = breakParallel(soprano, previousSoprano, previous.tenor, tenor, "tenor", scale);
  tenor = chooseChordTone("tenor", previous.tenor, tenor, tones, { upper: alto - 1 });
  bass = breakParallel(soprano, previousSoprano, previous.bass, bass, "bass", scale);
  bass = chooseChordTone("bass", previous.bass, bass, tones, { lower: bassFloor, upper: tenor - 1 });
  ({ alto, tenor, bass } = compressSpacing(soprano, { alto, tenor, bass }, previous, tones));

  if (tenor < VOICE_TESSITURA.tenor.low - 1) {
    tenor = nearestPitchClass(tenor + 12, tones, VOICE_RANGES.tenor.low, VOICE_RANGES.tenor.high);
  }
  return enforceOrdering(soprano, { alto, tenor, bass }, previous, tones);
}

function lowerVoiceNote(soprano: ScoreNote, midi: number): ScoreNote {
  return { ...soprano, pitch: midiToPitch(midi) };
}

/**
 * Later instances of a music unit whose sung soprano matches the first
 * instance reuse its lower voices
 */
function shareUnitVoicings(score: CanonicalScore, soprano: readonly ScoreNote[], lower: Record<LowerVoice, ScoreNote[]>): void {
  const indicesBySection = new Map<string, number[]>();
  soprano.forEach((note, index) => {
    if (!note.isRest) {
      const indices = indicesBySection.get(note.sectionId) ?? [];
      indices.push(index);
      indicesBySection.set(note.sectionId, indices);
    }
  });
  const signature = (indices: readonly number[]) =>
    indices.map((index) => `${soprano[index].pitch}:${soprano[index].beats}:${soprano[index].lyricMode}`).join(",");

  const canonical = new Map<string, number[]>();
  for (const section of score.sections) {
    const indices = indicesBySection.get(section.id) ?? [];
    const source = canonical.get(section.musicUnitId);
    if (!source) {
      canonical.set(section.musicUnitId, indices);
      continue;
    }
    if (signature(source) !== signature(indices)) {
      continue;
    }
    indices.forEach((target, position) => {
      for (const voice of ["alto", "tenor", "bass"] as const) {
        lower[voice][target] = { ...lower[voice][target], pitch: lower[voice][source[position]].pitch };
      }
    });
  }
}

export function assertHarmonizable(score: CanonicalScore): void {
  if (score.meta.stage !== "melody") {
    throw new StructuralError("Only melody-stage scores can be harmonized; extract the melody from an SATB score first.");
  }
  if (!score.chordProgression.length) {
    throw new StructuralError("Cannot harmonize without a chord progression.");
  }
  const diagnostics = validateScore(score);
  if (hasFatal(diagnostics)) {
    const fatal = diagnostics.filter((entry) => entry.severity === "fatal");
    throw new StructuralError(`Cannot harmonize a melody with fatal diagnostics: ${fatal.map((entry) => entry.message).join("; ")}`);
  }
}

/**
 * Harmonizes a melody-stage score into a satb-stage score. The chord
 * progression, sections and lyric metadata carry over unchanged.
 */
export function harmonizeMelody(score: CanonicalScore): CanonicalScore {
  assertHarmonizable(score);
  const scale = parseKey(score.meta.key, score.meta.mode);
  const capacity = beatsPerMeasure(score.meta.timeSignature);
  const chords = new Map(score.chordProgression.map((chord) => [chord.measureNumber, chord.pitchClasses]));
  const soprano = flattenVoice(score, "soprano");
  const lower: Record<LowerVoice, ScoreNote[]> = { alto: [], tenor: [], bass: [] };

  let previous: Voicing = { ...INITIAL_PITCHES };
  let previousSoprano = INITIAL_SOPRANO;
  let cursor = 0;

  for (const note of soprano) {
    const tones = chords.get(Math.floor(cursor / capacity + BEAT_EPSILON) + 1) ?? [...scale.semitones];
    cursor += note.beats;
    if (note.isRest) {
      for (const voice of ["alto", "tenor", "bass"] as const) {
        lower[voice].push({ ...note });
      }
      continue;
    }

    const sopranoMidi = pitchToMidi(note.pitch);
    const continuation = note.lyricMode === "tie_continue" || note.lyricMode === "melisma_continue";
    const voicing =
      continuation && isHeldVoicing(sopranoMidi, previous, tones)
        ? previous
        : voiceChord(sopranoMidi, previousSoprano, previous, tones, scale);

    lower.alto.push(lowerVoiceNote(note, voicing.alto));
    lower.tenor.push(lowerVoiceNote(note, voicing.tenor));
    lower.bass.push(lowerVoiceNote(note, voicing.bass));
    previous = voicing;
    previousSoprano = sopranoMidi;
  }

  shareUnitVoicings(score, soprano, lower);

  const streams: VoiceNotes = { soprano: soprano.map((note) => ({ ...note })), ...lower };
  return {
    meta: { ...score.meta, stage: "satb", rationale: SATB_RATIONALE },
    sections: score.sections,
    measures: packMeasures(streams, capacity, score.measures.length),
    chordProgression: score.chordProgression
  };
}
