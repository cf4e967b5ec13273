/**
 * Phrase length targets, pickups and bar distribution
 */

import type { ScoreSyllable } from "../../types.js";
import type { RhythmPolicy } from "./types.js";
import { BEAT_EPSILON } from "../../constants/voice-config.js";
import { ConstraintInfeasibleError, StructuralError } from "../../errors.js";

/** Shortest note a syllable can receive */
export const MIN_SYLLABLE_BEATS = 0.5;

/**
 * Length a phrase would take with the preset's typical note values
 */
export function naturalPhraseBeats(syllableCount: number, policy: RhythmPolicy): number {
  return (syllableCount - 1) * (1 - 0.5 * policy.subdivisionRate) + policy.phraseEndHoldBeats;
}

export function minimumPhraseBeats(syllableCount: number, policy: RhythmPolicy): number {
  return Math.max(MIN_SYLLABLE_BEATS * syllableCount, naturalPhraseBeats(syllableCount, policy));
}

/**
 * Smallest length of at least `minimum` beats that ends on a barline
 * when the phrase starts `startInBar` beats into a measure
 */
export function phraseTargetBeats(startInBar: number, minimum: number, capacity: number): number {
  const bars = Math.ceil((startInBar + minimum) / capacity - BEAT_EPSILON);
  return Math.max(1, bars) * capacity - startInBar;
}

/**
 * Pickup length in beats. "auto" gives one beat per unstressed syllable
 * before the first stress, always leaving a downbeat syllable.
 */
export function resolvePickupBeats(
  pickup: number | "auto",
  firstPhrase: readonly ScoreSyllable[],
  capacity: number
): number {
  if (pickup === "auto") {
    const firstStress = firstPhrase.findIndex((syllable) => syllable.stressed);
    const leading = firstStress === -1 ? firstPhrase.length - 1 : firstStress;
    return Math.max(0, Math.min(leading, Math.floor(capacity - 1)));
  }
  if (pickup < 0 || pickup >= capacity) {
    throw new StructuralError(`A pickup of ${pickup} beats does not fit a ${capacity}-beat measure.`);
  }
  return pickup;
}

/**
 * Per-phrase targets for a section. Phrases after the first start on a
 * barline. With `barsTarget`, surplus bars go one at a time to the densest
 * phrase (most syllables per beat, earliest on ties).
 */
export function distributePhraseTargets(
  syllableCounts: readonly number[],
  policy: RhythmPolicy,
  startOffset: number,
  capacity: number,
  barsTarget?: number
): number[] {
  const targets = syllableCounts.map((count, index) =>
    phraseTargetBeats(index === 0 ? startOffset : 0, minimumPhraseBeats(count, policy), capacity)
  );
  if (barsTarget === undefined) {
    return targets;
  }

  const minimumBars = Math.round((startOffset + targets.reduce((sum, beats) => sum + beats, 0)) / capacity);
  if (barsTarget < minimumBars) {
    throw new ConstraintInfeasibleError(
      `The verse needs at least ${minimumBars} bars for ${syllableCounts.length} phrases but ${barsTarget} were requested.`,
      "Shorten the verse text or raise the bar count."
    );
  }

  for (let extra = barsTarget - minimumBars; extra > 0; extra--) {
    let densest = 0;
    for (let i = 1; i < targets.length; i++) {
      if (syllableCounts[i] / targets[i] > syllableCounts[densest] / targets[densest] + BEAT_EPSILON) {
        densest = i;
      }
    }
    targets[densest] += capacity;
  }
  return targets;
}
