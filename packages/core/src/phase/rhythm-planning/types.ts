/**
 * Internal type definitions for rhythm planning
 */

import type { RhythmSlot, ScoreSyllable } from "../../types.js";

/**
 * Per-section rhythm policy derived from a preset and the section archetype
 */
export interface RhythmPolicy {
  melismaRate: number;
  subdivisionRate: number;
  phraseEndHoldBeats: number;
  preferStrongBeatForStress: boolean;
}

export interface PhrasePlan {
  firstSlot: number;
  slotCount: number;
  /** Section-local beat where the phrase starts; 0 is the section's first barline */
  startBeat: number;
  targetBeats: number;
}

export interface SectionRhythmPlan {
  sectionId: string;
  /** Syllables as planned; phrase flags may be re-derived by projection */
  syllables: ScoreSyllable[];
  slots: RhythmSlot[];
  phrases: PhrasePlan[];
  pickupBeats: number;
  /** Offset of the first sung note from the section's first barline */
  startOffset: number;
  barCount: number;
}

export interface RhythmPlanRequest {
  sectionId: string;
  syllables: ScoreSyllable[];
  timeSignature: string;
  policy: RhythmPolicy;
  seed: string;
  pickupBeats: number | "auto";
  /** Exact bar count for the section, pickup measure included */
  barsTarget?: number;
}
