/**
 * Melody refinement
 *
 * Updates a melody-stage score in place of a full recomposition. Only the
 * targeted music units change: "regenerate" rotates their chord cycle and
 * re-walks their melody over the existing rhythm, while "higher" and "lower"
 * instructions shift their syllable heads by a whole step.
 */

import type { CanonicalScore, RefinementRequest, ScoreChord, ScoreMeasure, ScoreSection, ScoreNote } from "../types.js";
import type { Rng } from "../rng.js";
import { randomInt } from "../rng.js";
import { StructuralError } from "../errors.js";
import { beatsPerMeasure, isStrongBeat, midiToPitch, parseKey, pitchToMidi } from "../musicUtils.js";
import { chordFor } from "./normalization.js";
import { progressionCycle, rotateCycle, unitDegrees } from "./chord-progression.js";
import {
  buildCues,
  constrainMelodicCandidate,
  copyCanonicalPitches,
  snapToChord,
  startingPitch,
  walkMelody
} from "./melody-generation.js";
import type { MelodySlot } from "./melody-generation.js";

/** Semitones a "higher" or "lower" instruction moves a syllable head */
const INSTRUCTION_SHIFT = 2;

interface NoteRef {
  measureIndex: number;
  noteIndex: number;
  onset: number;
  note: ScoreNote;
}

function sopranoRefs(score: CanonicalScore): NoteRef[] {
  const capacity = beatsPerMeasure(score.meta.timeSignature);
  const refs: NoteRef[] = [];
  score.measures.forEach((measure, measureIndex) => {
    let onset = measureIndex * capacity;
    measure.voices.soprano.forEach((note, noteIndex) => {
      refs.push({ measureIndex, noteIndex, onset, note });
      onset += note.beats;
    });
  });
  return refs;
}

function sectionSlots(section: ScoreSection, refs: readonly NoteRef[]): { slots: MelodySlot[]; sung: NoteRef[] } {
  const syllables = new Map(section.syllables.map((syllable) => [syllable.id, syllable]));
  const sung = refs.filter((ref) => !ref.note.isRest && ref.note.sectionId === section.id);
  const slots: MelodySlot[] = [];
  for (const ref of sung) {
    const syllable = ref.note.lyricSyllableId === undefined ? undefined : syllables.get(ref.note.lyricSyllableId);
    if (!syllable) {
      continue;
    }
    const cue = { onset: ref.onset, beats: ref.note.beats, mode: ref.note.lyricMode };
    const last = slots[slots.length - 1];
    if (last && last.syllable.id === syllable.id) {
      last.notes.push(cue);
    } else {
      slots.push({ syllable, notes: [cue] });
    }
  }
  return { slots, sung: sung.filter((ref) => ref.note.lyricSyllableId !== undefined && syllables.has(ref.note.lyricSyllableId)) };
}

export function targetMusicUnits(score: CanonicalScore, requested?: readonly string[]): Set<string> {
  const known = new Set(score.sections.map((section) => section.musicUnitId));
  if (!requested || !requested.length) {
    return known;
  }
  const unknown = requested.filter((unitId) => !known.has(unitId));
  if (unknown.length) {
    throw new StructuralError(`Unknown music unit id: ${unknown.join(", ")}`);
  }
  return new Set(requested);
}

function regenerateChords(score: CanonicalScore, targets: ReadonlySet<string>, rng: Rng): ScoreChord[] {
  const scale = parseKey(score.meta.key, score.meta.mode);
  const capacity = beatsPerMeasure(score.meta.timeSignature);
  const forms = new Map(score.meta.verseForms.map((form) => [form.musicUnitId, form]));
  const degreesByUnit = new Map<string, number[]>();
  const chords = new Map(score.chordProgression.map((chord) => [chord.measureNumber, chord]));

  for (const section of score.sections) {
    const form = forms.get(section.musicUnitId);
    if (!targets.has(section.musicUnitId) || !form) {
      continue;
    }
    let degrees = degreesByUnit.get(section.musicUnitId);
    if (!degrees) {
      const cycle = progressionCycle(section.progressionCluster);
      const rotation = cycle.length > 1 ? randomInt(1, cycle.length - 1, rng) : 0;
      degrees = unitDegrees(rotateCycle(cycle, rotation), form, capacity, "melody");
      degreesByUnit.set(section.musicUnitId, degrees);
    }
    for (let measure = section.startMeasure; measure <= section.endMeasure; measure++) {
      chords.set(measure, chordFor(scale, degrees[measure - section.startMeasure] ?? 1, measure, section.id));
    }
  }
  return [...chords.values()].sort((a, b) => a.measureNumber - b.measureNumber);
}

function instructionShift(instruction: string | undefined): number {
  const lowered = (instruction ?? "").toLowerCase();
  if (lowered.includes("higher")) {
    return INSTRUCTION_SHIFT;
  }
  if (lowered.includes("lower")) {
    return -INSTRUCTION_SHIFT;
  }
  return 0;
}

function applyPitches(measures: readonly ScoreMeasure[], updates: ReadonlyMap<NoteRef, number>): ScoreMeasure[] {
  const byMeasure = new Map<number, Map<number, number>>();
  for (const [ref, midi] of updates) {
    const notes = byMeasure.get(ref.measureIndex) ?? new Map<number, number>();
    notes.set(ref.noteIndex, midi);
    byMeasure.set(ref.measureIndex, notes);
  }
  return measures.map((measure, measureIndex) => {
    const notes = byMeasure.get(measureIndex);
    if (!notes) {
      return measure;
    }
    const soprano = measure.voices.soprano.map((note, noteIndex) => {
      const midi = notes.get(noteIndex);
      return midi === undefined ? note : { ...note, pitch: midiToPitch(midi) };
    });
    return { ...measure, voices: { ...measure.voices, soprano } };
  });
}

/**
 * One refinement pass over a melody-stage score
 */
export function refineMelody(score: CanonicalScore, request: RefinementRequest, rng: Rng): CanonicalScore {
  if (score.meta.stage !== "melody") {
    throw new StructuralError("Only melody-stage scores can be refined; use the SATB refinement entry point instead.");
  }
  const targets = targetMusicUnits(score, request.musicUnitIds);
  const scale = parseKey(score.meta.key, score.meta.mode);
  const capacity = beatsPerMeasure(score.meta.timeSignature);
  const chordProgression = request.regenerate ? regenerateChords(score, targets, rng) : score.chordProgression;
  const chordsByMeasure = new Map(chordProgression.map((chord) => [chord.measureNumber, chord]));
  const refs = sopranoRefs(score);
  const updates = new Map<NoteRef, number>();
  const shift = instructionShift(request.instruction);
  const canonicalByUnit = new Map<string, { onset: number; end: number; pitch: number }[]>();

  const previousSung = (section: ScoreSection): number => {
    const sectionStart = (section.startMeasure - 1) * capacity;
    const before = refs.filter((ref) => !ref.note.isRest && ref.onset < sectionStart);
    const last = before[before.length - 1];
    if (!last) {
      return startingPitch(section.label);
    }
    return updates.get(last) ?? pitchToMidi(last.note.pitch);
  };

  for (const section of score.sections) {
    if (!targets.has(section.musicUnitId)) {
      continue;
    }
    const { slots, sung } = sectionSlots(section, refs);
    const sectionStart = (section.startMeasure - 1) * capacity;
    const startPitch = previousSung(section);
    let pitches: number[];

    if (request.regenerate) {
      const canonical = canonicalByUnit.get(section.musicUnitId);
      if (canonical) {
        pitches = copyCanonicalPitches(canonical, slots, sectionStart, startPitch);
      } else {
        pitches = walkMelody(buildCues(slots), { scale, timeSignature: score.meta.timeSignature, capacity, chordsByMeasure }, startPitch, rng);
        canonicalByUnit.set(
          section.musicUnitId,
          sung.map((ref, index) => ({ onset: ref.onset - sectionStart, end: ref.onset - sectionStart + ref.note.beats, pitch: pitches[index] }))
        );
      }
    } else {
      let previous = startPitch;
      pitches = sung.map((ref) => {
        const midi = pitchToMidi(ref.note.pitch);
        const { lyricMode } = ref.note;
        let refined = midi;
        if (lyricMode === "tie_continue") {
          refined = previous;
        } else if (lyricMode !== "melisma_continue") {
          const shifted = lyricMode === "single" || lyricMode === "melisma_start" ? midi + shift : midi;
          refined = constrainMelodicCandidate(shifted, previous, "soprano", scale);
          const chord = chordsByMeasure.get(ref.measureIndex + 1);
          if (chord && isStrongBeat(ref.onset - ref.measureIndex * capacity, score.meta.timeSignature)) {
            refined = snapToChord(refined, previous, chord.pitchClasses, scale);
          }
        }
        previous = refined;
        return refined;
      });
    }

    sung.forEach((ref, index) => {
      updates.set(ref, pitches[index]);
    });
  }

  const instruction = request.instruction?.trim();
  const rationale = request.regenerate
    ? `Regenerated chords and melody for ${[...targets].join(", ")}.`
    : `Refined melody for ${[...targets].join(", ")}${instruction ? `: ${instruction}` : "."}`;
  return {
    ...score,
    meta: { ...score.meta, rationale },
    measures: applyPitches(score.measures, updates),
    chordProgression
  };
}
