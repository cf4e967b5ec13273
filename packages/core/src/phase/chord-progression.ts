/**
 * Chord progression generation
 *
 * Every music unit gets a four-degree cycle chosen by the archetype of its
 * progression cluster, repeated once per measure. At melody stage each phrase
 * end is then biased toward a cadence. Later instances of a unit reuse the
 * first instance's chords measure for measure; measures outside any section
 * (pauses) hold the tonic.
 */

import { z } from "zod";
import progressionsJson from "../../motifs/progressions.json" with { type: "json" };
import type { ScoreChord, ScoreStage, Scale, SectionArchetype, VerseForm } from "../types.js";
import type { Timeline } from "./timeline-finalization.js";
import { sectionArchetype } from "./rhythm-planning/index.js";
import { chordFor, INTERLUDE_SECTION_ID } from "./normalization.js";
import { BEAT_EPSILON } from "../constants/voice-config.js";

const DegreeSchema = z.number().int().min(1).max(7);
const CycleSchema = z.array(DegreeSchema).min(1);

const ProgressionTableSchema = z.object({
  verse: CycleSchema,
  chorus: CycleSchema,
  bridge: CycleSchema,
  "pre-chorus": CycleSchema,
  intro: CycleSchema,
  outro: CycleSchema,
  custom: CycleSchema
});

const PROGRESSION_CYCLES: Record<SectionArchetype, number[]> = ProgressionTableSchema.parse(progressionsJson);

/** Phrases spanning at least this many measures approach the cadence from degree 2 */
const LONG_PHRASE_MEASURES = 3;

export interface PhraseSpan {
  startBeat: number;
  /** Onset of the phrase's final syllable */
  finalOnset: number;
  endBeat: number;
}

export function progressionCycle(cluster: string): number[] {
  return [...PROGRESSION_CYCLES[sectionArchetype(cluster)]];
}

export function rotateCycle(cycle: readonly number[], steps: number): number[] {
  const shift = ((steps % cycle.length) + cycle.length) % cycle.length;
  return [...cycle.slice(shift), ...cycle.slice(0, shift)];
}

/**
 * Section-local phrase spans recorded in a music unit's form
 */
export function phraseSpansFromForm(form: VerseForm): PhraseSpan[] {
  const spans: PhraseSpan[] = [];
  const phraseEnds = new Set(form.phraseEndSlotIndices);
  let cursor = form.leadingRestBeats;
  let phraseStart = cursor;
  form.slotDurations.forEach((durations, index) => {
    const onset = cursor;
    cursor += durations.reduce((sum, beats) => sum + beats, 0);
    if (phraseEnds.has(index)) {
      spans.push({ startBeat: phraseStart, finalOnset: onset, endBeat: cursor });
      phraseStart = cursor;
    }
  });
  return spans;
}

/**
 * Forces each phrase's closing measures onto the tonic and the measure
 * before them onto degree 5, or degree 2 for phrases of three or more measures.
 * Measures outside the phrase are never touched.
 */
export function applyCadentialBias(degrees: readonly number[], spans: readonly PhraseSpan[], capacity: number): number[] {
  const biased = [...degrees];
  for (const span of spans) {
    const firstMeasure = Math.floor(span.startBeat / capacity + BEAT_EPSILON);
    const finalMeasure = Math.floor(span.finalOnset / capacity + BEAT_EPSILON);
    const lastMeasure = Math.ceil(span.endBeat / capacity - BEAT_EPSILON) - 1;
    for (let index = finalMeasure; index <= lastMeasure && index < biased.length; index++) {
      biased[index] = 1;
    }
    const penultimate = finalMeasure - 1;
    if (penultimate >= firstMeasure && penultimate < biased.length) {
      const spanMeasures = lastMeasure - firstMeasure + 1;
      biased[penultimate] = spanMeasures >= LONG_PHRASE_MEASURES ? 2 : 5;
    }
  }
  return biased;
}

/**
 * Degrees for one music unit, one per measure of its form
 */
export function unitDegrees(
  cycle: readonly number[],
  form: VerseForm,
  capacity: number,
  stage: ScoreStage
): number[] {
  const degrees = Array.from({ length: Math.max(1, form.barCount) }, (_, index) => cycle[index % cycle.length]);
  return stage === "melody" ? applyCadentialBias(degrees, phraseSpansFromForm(form), capacity) : degrees;
}

/**
 * Chord progression for a whole timeline. `cycleOverrides` replaces the
 * archetype cycle of the named music units.
 */
export function buildChordProgression(
  timeline: Timeline,
  forms: readonly VerseForm[],
  scale: Scale,
  stage: ScoreStage,
  cycleOverrides: ReadonlyMap<string, number[]> = new Map()
): ScoreChord[] {
  const formByUnit = new Map(forms.map((form) => [form.musicUnitId, form]));
  const degreesByUnit = new Map<string, number[]>();
  const chords = new Map<number, ScoreChord>();

  for (const placement of timeline.placements) {
    const unitId = placement.section.musicUnitId;
    let degrees = degreesByUnit.get(unitId);
    if (!degrees) {
      const form = formByUnit.get(unitId);
      const cycle = cycleOverrides.get(unitId) ?? progressionCycle(placement.section.progressionCluster);
      degrees = form ? unitDegrees(cycle, form, timeline.capacity, stage) : [cycle[0]];
      degreesByUnit.set(unitId, degrees);
    }
    for (let measure = placement.startMeasure; measure <= placement.endMeasure; measure++) {
      const degree = degrees[measure - placement.startMeasure] ?? 1;
      chords.set(measure, chordFor(scale, degree, measure, placement.section.id));
    }
  }

  for (let measure = 1; measure <= timeline.measureCount; measure++) {
    if (!chords.has(measure)) {
      chords.set(measure, chordFor(scale, 1, measure, INTERLUDE_SECTION_ID));
    }
  }
  return repairProgression([...chords.values()], timeline.measureCount, scale);
}

/**
 * Out-of-range degrees become the tonic, every chord is re-keyed to the
 * scale, duplicates keep the first chord and missing measures get the tonic.
 */
export function repairProgression(chords: readonly ScoreChord[], measureCount: number, scale: Scale): ScoreChord[] {
  const repaired = new Map<number, ScoreChord>();
  for (const chord of [...chords].sort((a, b) => a.measureNumber - b.measureNumber)) {
    if (chord.measureNumber < 1 || chord.measureNumber > measureCount || repaired.has(chord.measureNumber)) {
      continue;
    }
    const degree = Number.isInteger(chord.degree) && chord.degree >= 1 && chord.degree <= 7 ? chord.degree : 1;
    repaired.set(chord.measureNumber, chordFor(scale, degree, chord.measureNumber, chord.sectionId));
  }
  const fallbackSectionId = [...repaired.values()][0]?.sectionId ?? INTERLUDE_SECTION_ID;
  for (let measure = 1; measure <= measureCount; measure++) {
    if (!repaired.has(measure)) {
      repaired.set(measure, chordFor(scale, 1, measure, fallbackSectionId));
    }
  }
  return [...repaired.values()].sort((a, b) => a.measureNumber - b.measureNumber);
}
