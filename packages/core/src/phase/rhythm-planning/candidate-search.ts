/**
 * Bounded rhythm search for a single phrase.
 *
 * Every non-final syllable takes one of four shapes; the final syllable absorbs
 * whatever remains of the phrase target. Small phrases are enumerated
 * exhaustively, larger ones are sampled with the section RNG up to
 * CANDIDATE_BUDGET candidates. The scoring function alone decides the
 * winner; among equal scores the first candidate generated is kept.
 */

import type { RhythmNote, RhythmSlot, ScoreSyllable } from "../../types.js";
import type { RhythmPolicy } from "./types.js";
import type { Rng } from "../../rng.js";
import { pickWeighted } from "../../rng.js";
import { isStrongBeat } from "../../musicUtils.js";
import { MIN_SYLLABLE_BEATS } from "./phrase-targets.js";

export type SyllableShape = "single" | "subdivision" | "melisma" | "long";

export const CANDIDATE_BUDGET = 256;

const SHAPES: readonly SyllableShape[] = ["single", "subdivision", "melisma", "long"];

const SHAPE_BEATS: Record<SyllableShape, number> = {
  single: 1,
  subdivision: 0.5,
  melisma: 1,
  long: 2
};

const SHAPE_NOTES: Record<SyllableShape, RhythmNote[]> = {
  single: [{ beats: 1, mode: "single" }],
  subdivision: [{ beats: 0.5, mode: "subdivision" }],
  melisma: [
    { beats: 0.5, mode: "melisma_start" },
    { beats: 0.5, mode: "melisma_continue" }
  ],
  long: [{ beats: 2, mode: "single" }]
};

/**
 * Heuristic weights; positive terms reward, negative terms penalize
 */
const SCORE_WEIGHTS = {
  STRESS_ON_STRONG: 2,
  STRESS_ON_WEAK_BEAT: -0.5,
  STRESS_OFF_BEAT: -1.5,
  COMMA_HELD: 0.5,
  COMMA_RUSHED: -0.5,
  CADENCE_ON_STRONG: 2,
  CADENCE_ON_WEAK: -1,
  HOLD_DISTANCE: -1,
  OVERHOLD: -0.5,
  SHORT_NOTE: -0.3,
  LONG_NOTE: -0.3,
  DURATION_JUMP: -0.25,
  PRESET_DISTANCE: -2
} as const;

export interface PhraseSearchInput {
  syllables: readonly ScoreSyllable[];
  /** Section-local start beat; only its position within the bar matters */
  startBeat: number;
  targetBeats: number;
  timeSignature: string;
  capacity: number;
  policy: RhythmPolicy;
  rng: Rng;
}

interface ScoredCandidate {
  shapes: SyllableShape[];
  fill: number;
  score: number;
}

function maxFinalHold(policy: RhythmPolicy, capacity: number): number {
  return Math.max(policy.phraseEndHoldBeats, 1) + capacity;
}

/**
 * Notes for the final syllable holding `fill` beats
 */
export function finalSyllableNotes(fill: number): RhythmNote[] {
  if (fill < 1) {
    return [{ beats: fill, mode: "subdivision" }];
  }
  if (fill === 1) {
    return [{ beats: 1, mode: "single" }];
  }
  return [
    { beats: 1, mode: "tie_start" },
    { beats: fill - 1, mode: "tie_continue" }
  ];
}

function enumerateAll(length: number): SyllableShape[][] {
  let combos: SyllableShape[][] = [[]];
  for (let i = 0; i < length; i++) {
    const next: SyllableShape[][] = [];
    for (const combo of combos) {
      for (const shape of SHAPES) {
        next.push([...combo, shape]);
      }
    }
    combos = next;
  }
  return combos;
}

/**
 * Shape weights steer sampling toward the preset rates and toward the
 * average note length the target needs
 */
function shapeWeights(input: PhraseSearchInput, nonFinal: number): number[] {
  const { policy, targetBeats } = input;
  const averageBeats = (targetBeats - policy.phraseEndHoldBeats) / nonFinal;
  const long = Math.min(0.9, Math.max(0, averageBeats - 1));
  const subdivision = Math.max(policy.subdivisionRate, Math.min(0.9, (1 - averageBeats) * 2));
  const melisma = policy.melismaRate;
  const single = Math.max(0.05, 1 - long - subdivision - melisma);
  return [single, subdivision, melisma, long];
}

function sampleCandidates(input: PhraseSearchInput, nonFinal: number): SyllableShape[][] {
  const weights = shapeWeights(input, nonFinal);
  const seen = new Set<string>();
  const out: SyllableShape[][] = [];
  for (let i = 0; i < CANDIDATE_BUDGET; i++) {
    const shapes = Array.from({ length: nonFinal }, () => pickWeighted(SHAPES, weights, input.rng));
    const key = shapes.join(",");
    if (!seen.has(key)) {
      seen.add(key);
      out.push(shapes);
    }
  }
  return out;
}

function generateCandidates(input: PhraseSearchInput): SyllableShape[][] {
  const nonFinal = input.syllables.length - 1;
  if (nonFinal === 0) {
    return [[]];
  }
  if (Math.pow(SHAPES.length, nonFinal) <= CANDIDATE_BUDGET) {
    return enumerateAll(nonFinal);
  }
  const baseline: SyllableShape[] = Array.from({ length: nonFinal }, () => "single");
  return [baseline, ...sampleCandidates(input, nonFinal)];
}

export function scoreCandidate(shapes: readonly SyllableShape[], fill: number, input: PhraseSearchInput): number {
  const { syllables, policy, capacity, timeSignature } = input;
  let score = 0;
  let position = input.startBeat;

  shapes.forEach((shape, index) => {
    const syllable = syllables[index];
    const inBar = position % capacity;
    if (syllable.stressed && policy.preferStrongBeatForStress) {
      if (isStrongBeat(inBar, timeSignature)) {
        score += SCORE_WEIGHTS.STRESS_ON_STRONG;
      } else {
        score += inBar % 1 === 0 ? SCORE_WEIGHTS.STRESS_ON_WEAK_BEAT : SCORE_WEIGHTS.STRESS_OFF_BEAT;
      }
    }
    if (syllable.phraseEndAfter) {
      score += SHAPE_BEATS[shape] >= 1 ? SCORE_WEIGHTS.COMMA_HELD : SCORE_WEIGHTS.COMMA_RUSHED;
    }
    if (shape === "subdivision") {
      score += SCORE_WEIGHTS.SHORT_NOTE;
    } else if (shape === "long") {
      score += SCORE_WEIGHTS.LONG_NOTE;
    }
    if (index > 0) {
      score += SCORE_WEIGHTS.DURATION_JUMP * Math.abs(Math.log2(SHAPE_BEATS[shape] / SHAPE_BEATS[shapes[index - 1]]));
    }
    position += SHAPE_BEATS[shape];
  });

  const cadenceInBar = position % capacity;
  score += isStrongBeat(cadenceInBar, timeSignature) ? SCORE_WEIGHTS.CADENCE_ON_STRONG : SCORE_WEIGHTS.CADENCE_ON_WEAK;
  score += SCORE_WEIGHTS.HOLD_DISTANCE * Math.abs(fill - policy.phraseEndHoldBeats);
  score += SCORE_WEIGHTS.OVERHOLD * Math.max(0, fill - policy.phraseEndHoldBeats - 1);

  if (shapes.length > 0) {
    const melismaShare = shapes.filter((shape) => shape === "melisma").length / shapes.length;
    const subdivisionShare = shapes.filter((shape) => shape === "subdivision").length / shapes.length;
    score += SCORE_WEIGHTS.PRESET_DISTANCE * Math.abs(melismaShare - policy.melismaRate);
    score += SCORE_WEIGHTS.PRESET_DISTANCE * Math.abs(subdivisionShare - policy.subdivisionRate);
  }
  return score;
}

/**
 * All singles with the final syllable extended; subdivisions are taken from
 * the end when the target is too short, long notes from the start when the
 * final hold would grow past its limit.
 */
export function fallbackShapes(input: PhraseSearchInput): { shapes: SyllableShape[]; fill: number } {
  const nonFinal = input.syllables.length - 1;
  const shapes: SyllableShape[] = Array.from({ length: nonFinal }, () => "single");
  let fill = input.targetBeats - nonFinal;
  for (let i = nonFinal - 1; i >= 0 && fill < MIN_SYLLABLE_BEATS; i--) {
    shapes[i] = "subdivision";
    fill += 0.5;
  }
  const limit = maxFinalHold(input.policy, input.capacity);
  for (let i = 0; i < nonFinal && fill > limit; i++) {
    if (shapes[i] === "single") {
      shapes[i] = "long";
      fill -= 1;
    }
  }
  return { shapes, fill };
}

function toSlots(syllables: readonly ScoreSyllable[], shapes: readonly SyllableShape[], fill: number): RhythmSlot[] {
  return syllables.map((syllable, index) => ({
    syllableId: syllable.id,
    notes: index < shapes.length ? SHAPE_NOTES[shapes[index]].map((note) => ({ ...note })) : finalSyllableNotes(fill)
  }));
}

/**
 * Plans one phrase so that its slots sum exactly to `targetBeats`
 */
export function planPhraseRhythm(input: PhraseSearchInput): RhythmSlot[] {
  const limit = maxFinalHold(input.policy, input.capacity);
  let best: ScoredCandidate | null = null;

  for (const shapes of generateCandidates(input)) {
    const used = shapes.reduce((sum, shape) => sum + SHAPE_BEATS[shape], 0);
    const fill = input.targetBeats - used;
    if (fill < MIN_SYLLABLE_BEATS || fill > limit) {
      continue;
    }
    const score = scoreCandidate(shapes, fill, input);
    if (!best || score > best.score) {
      best = { shapes, fill, score };
    }
  }

  if (!best) {
    const fallback = fallbackShapes(input);
    return toSlots(input.syllables, fallback.shapes, fallback.fill);
  }
  return toSlots(input.syllables, best.shapes, best.fill);
}
