/**
 * Melody generation
 *
 * The soprano line is a seeded walk over diatonic steps. Each head note is
 * constrained to the soprano range and tessitura, snapped to the chord on
 * strong beats and stabilized at phrase ends. Continuation notes hold their
 * pitch or drift by a semitone and never re-target a chord tone.
 */

import type { LyricMode, ScoreChord, ScoreNote, ScoreSyllable, Scale, VoiceName } from "../types.js";
import type { SectionRhythmPlan } from "./rhythm-planning/index.js";
import type { SectionPlacement, Timeline } from "./timeline-finalization.js";
import type { Rng } from "../rng.js";
import { pickWeighted, pickWithRng } from "../rng.js";
import { MAX_MELODIC_LEAP, VOICE_RANGES, VOICE_TESSITURA, BEAT_EPSILON } from "../constants/voice-config.js";
import { isStrongBeat, midiToPitch, nearestInRange, pitchClass, stepDiatonic } from "../musicUtils.js";
import { splitIntoPhrases } from "./lyric-tokenization.js";

const STEP_CHOICES = [-2, -1, 0, 1, 2] as const;
const RISING_STEP_WEIGHTS = [0.5, 1, 1, 1.5, 1] as const;
const FALLING_STEP_WEIGHTS = [1, 1.5, 1, 1, 0.5] as const;
const DRIFT_CHOICES = [-1, 0, 1] as const;

/** Head notes repeating the same pitch this often are pushed away */
const MAX_REPEATED_ONSETS = 3;

/** Stressed heads only climb while this far below the top of the tessitura */
const STRESS_HEADROOM = 2;

const LOW_CENTER_PITCH = 64;
const HIGH_CENTER_PITCH = 67;

export interface CueNote {
  /** Global beat position */
  onset: number;
  beats: number;
  mode: LyricMode;
}

export interface MelodySlot {
  syllable: ScoreSyllable;
  notes: CueNote[];
}

export interface MelodyCue extends CueNote {
  stressed: boolean;
  /** Whether the syllable sits in the first half of its phrase */
  rising: boolean;
  phraseFinal: boolean;
  sectionFinal: boolean;
}

export interface MelodyContext {
  scale: Scale;
  timeSignature: string;
  capacity: number;
  chordsByMeasure: ReadonlyMap<number, ScoreChord>;
}

function isContinuation(mode: LyricMode): boolean {
  return mode === "tie_continue" || mode === "melisma_continue";
}

function inScale(midi: number, scale: Scale): boolean {
  return scale.semitones.includes(pitchClass(midi));
}

/**
 * Clamps a candidate into the voice range, shrinks leaps over the limit,
 * nudges it toward the tessitura and moves it onto the scale.
 */
export function constrainMelodicCandidate(candidate: number, previous: number, voice: VoiceName, scale: Scale): number {
  const { low, high } = VOICE_RANGES[voice];
  const tessitura = VOICE_TESSITURA[voice];
  let value = nearestInRange(candidate, low, high);
  while (Math.abs(value - previous) > MAX_MELODIC_LEAP) {
    value += value > previous ? -1 : 1;
  }
  if (value < tessitura.low) {
    value += 1;
  } else if (value > tessitura.high) {
    value -= 1;
  }
  if (!inScale(value, scale)) {
    let up = value;
    let down = value;
    while (!inScale(up, scale) && up <= high) {
      up++;
    }
    while (!inScale(down, scale) && down >= low) {
      down--;
    }
    if (down >= low && down <= high && Math.abs(down - previous) <= Math.abs(up - previous)) {
      value = down;
    } else if (up >= low && up <= high) {
      value = up;
    }
  }
  return nearestInRange(value, low, high);
}

export function nearestPitchClass(target: number, pitchClasses: readonly number[], low: number, high: number): number {
  let best: number | null = null;
  for (let midi = low; midi <= high; midi++) {
    if (!pitchClasses.includes(pitchClass(midi))) {
      continue;
    }
    if (best === null || Math.abs(midi - target) < Math.abs(best - target)) {
      best = midi;
    }
  }
  return best ?? nearestInRange(target, low, high);
}

/**
 * Nearest pitch of the given classes that stays within a leap of `previous`;
 * ties go to the smaller leap, then the lower pitch
 */
export function nearestPitchClassWithLeap(
  target: number,
  previous: number,
  pitchClasses: readonly number[],
  voice: VoiceName
): number {
  const { low, high } = VOICE_RANGES[voice];
  let best: number | null = null;
  for (let midi = low; midi <= high; midi++) {
    if (!pitchClasses.includes(pitchClass(midi)) || Math.abs(midi - previous) > MAX_MELODIC_LEAP) {
      continue;
    }
    if (
      best === null ||
      Math.abs(midi - target) < Math.abs(best - target) ||
      (Math.abs(midi - target) === Math.abs(best - target) && Math.abs(midi - previous) < Math.abs(best - previous))
    ) {
      best = midi;
    }
  }
  return best ?? nearestPitchClass(target, pitchClasses, low, high);
}

/**
 * Strong-beat snap: reachable chord tone, then the usual constraints, then
 * the chord tone again so the constraints cannot leave it off the chord
 */
export function snapToChord(candidate: number, previous: number, chordTones: readonly number[], scale: Scale): number {
  let value = nearestPitchClassWithLeap(candidate, previous, chordTones, "soprano");
  value = constrainMelodicCandidate(value, previous, "soprano", scale);
  return nearestPitchClassWithLeap(value, previous, chordTones, "soprano");
}

/**
 * Flattens slots into cues, marking phrase halves and phrase ends from the
 * syllables' barline flags
 */
export function buildCues(slots: readonly MelodySlot[]): MelodyCue[] {
  const phrases = splitIntoPhrases(slots.map((slot) => ({ ...slot, mustEndAtBarline: slot.syllable.mustEndAtBarline })));
  const cues: MelodyCue[] = [];
  phrases.forEach((phrase, phraseIndex) => {
    phrase.forEach((slot, index) => {
      for (const note of slot.notes) {
        cues.push({
          ...note,
          stressed: slot.syllable.stressed,
          rising: index < phrase.length / 2,
          phraseFinal: index === phrase.length - 1,
          sectionFinal: phraseIndex === phrases.length - 1
        });
      }
    });
  });
  return cues;
}

export function slotsFromPlan(plan: SectionRhythmPlan, startBeat: number): MelodySlot[] {
  const syllables = new Map(plan.syllables.map((syllable) => [syllable.id, syllable]));
  let cursor = startBeat + plan.startOffset;
  return plan.slots.flatMap((slot) => {
    const syllable = syllables.get(slot.syllableId);
    if (!syllable) {
      return [];
    }
    const notes = slot.notes.map((note) => {
      const cue = { onset: cursor, beats: note.beats, mode: note.mode };
      cursor += note.beats;
      return cue;
    });
    return [{ syllable, notes }];
  });
}

export function startingPitch(label: string): number {
  const normalized = label.trim().toLowerCase();
  return normalized === "verse" || normalized === "bridge" ? LOW_CENTER_PITCH : HIGH_CENTER_PITCH;
}

/**
 * Walks one pitch per cue, starting from `startPitch`
 */
export function walkMelody(cues: readonly MelodyCue[], context: MelodyContext, startPitch: number, rng: Rng): number[] {
  const { scale, capacity, timeSignature, chordsByMeasure } = context;
  const tessitura = VOICE_TESSITURA.soprano;
  const pitches: number[] = [];
  let previous = startPitch;
  let lastHead: number | null = null;
  let repeatedHeads = 0;

  for (const cue of cues) {
    const chord = chordsByMeasure.get(Math.floor(cue.onset / capacity + BEAT_EPSILON) + 1);
    const chordTones = chord ? chord.pitchClasses : [...scale.semitones];
    let pitch: number;

    if (cue.mode === "tie_continue") {
      pitch = previous;
    } else if (cue.mode === "melisma_continue") {
      const drifted = previous + pickWithRng(DRIFT_CHOICES, rng);
      const { low, high } = VOICE_RANGES.soprano;
      pitch = inScale(drifted, scale) && drifted >= low && drifted <= high ? drifted : previous;
    } else {
      let step: number = pickWeighted(STEP_CHOICES, cue.rising ? RISING_STEP_WEIGHTS : FALLING_STEP_WEIGHTS, rng);
      if (cue.stressed && previous < tessitura.high - STRESS_HEADROOM) {
        step = Math.min(2, step + 1);
      }
      if (repeatedHeads >= MAX_REPEATED_ONSETS && step === 0) {
        step = cue.rising ? 1 : -1;
      }
      let candidate = step === 0 ? previous : stepDiatonic(previous, step, scale);
      candidate = constrainMelodicCandidate(candidate, previous, "soprano", scale);
      if (isStrongBeat((cue.onset % capacity + capacity) % capacity, timeSignature)) {
        candidate = snapToChord(candidate, previous, chordTones, scale);
      }
      if (cue.phraseFinal) {
        const stable = cue.sectionFinal && chord?.degree === 1 ? [scale.tonicPitchClass] : chordTones;
        candidate = nearestPitchClassWithLeap(candidate, previous, stable, "soprano");
      }
      pitch = candidate;
      repeatedHeads = pitch === lastHead ? repeatedHeads + 1 : 1;
      lastHead = pitch;
    }

    pitches.push(pitch);
    previous = pitch;
  }
  return pitches;
}

/**
 * Score notes for planned slots. Only the first note of a slot carries the
 * syllable text; every note keeps the syllable id.
 */
export function sungNotes(slots: readonly MelodySlot[], pitches: readonly number[], sectionId: string): ScoreNote[] {
  const notes: ScoreNote[] = [];
  let pitchIndex = 0;
  slots.forEach((slot, lyricIndex) => {
    slot.notes.forEach((note, noteIndex) => {
      const sung: ScoreNote = {
        pitch: midiToPitch(pitches[pitchIndex++]),
        beats: note.beats,
        isRest: false,
        lyricSyllableId: slot.syllable.id,
        lyricIndex,
        lyricMode: note.mode,
        sectionId
      };
      if (noteIndex === 0 && !isContinuation(note.mode)) {
        sung.lyric = slot.syllable.text;
      }
      notes.push(sung);
    });
  });
  return notes;
}

interface TimedPitch {
  onset: number;
  end: number;
  pitch: number;
}

/**
 * Pitches for a projected instance, read from the canonical instance at the
 * same section-local onset
 */
export function copyCanonicalPitches(
  canonical: readonly TimedPitch[],
  slots: readonly MelodySlot[],
  startBeat: number,
  fallbackPitch: number
): number[] {
  const pitches: number[] = [];
  let previous = fallbackPitch;
  for (const slot of slots) {
    for (const note of slot.notes) {
      const local = note.onset - startBeat;
      const source = canonical.find((entry) => local >= entry.onset - BEAT_EPSILON && local < entry.end - BEAT_EPSILON);
      previous = source ? source.pitch : previous;
      pitches.push(previous);
    }
  }
  return pitches;
}

function timedPitches(slots: readonly MelodySlot[], pitches: readonly number[], startBeat: number): TimedPitch[] {
  const timed: TimedPitch[] = [];
  let index = 0;
  for (const slot of slots) {
    for (const note of slot.notes) {
      timed.push({ onset: note.onset - startBeat, end: note.onset - startBeat + note.beats, pitch: pitches[index++] });
    }
  }
  return timed;
}

/**
 * Composes the soprano for every placed section. The first instance of a
 * music unit is walked; later instances copy it.
 */
export function composeMelody(
  timeline: Timeline,
  context: Omit<MelodyContext, "capacity">,
  rng: Rng
): Map<string, ScoreNote[]> {
  const melodyContext: MelodyContext = { ...context, capacity: timeline.capacity };
  const canonicalByUnit = new Map<string, TimedPitch[]>();
  const sung = new Map<string, ScoreNote[]>();
  let lastPitch: number | null = null;

  timeline.placements.forEach((placement: SectionPlacement) => {
    const slots = slotsFromPlan(placement.plan, placement.startBeat);
    const unitId = placement.section.musicUnitId;
    const startPitch = lastPitch ?? startingPitch(placement.section.label);
    const canonical = canonicalByUnit.get(unitId);

    let pitches: number[];
    if (canonical) {
      pitches = copyCanonicalPitches(canonical, slots, placement.startBeat, startPitch);
    } else {
      pitches = walkMelody(buildCues(slots), melodyContext, startPitch, rng);
      canonicalByUnit.set(unitId, timedPitches(slots, pitches, placement.startBeat));
    }

    if (pitches.length) {
      lastPitch = pitches[pitches.length - 1];
    }
    sung.set(placement.section.id, sungNotes(slots, pitches, placement.section.id));
  });
  return sung;
}
