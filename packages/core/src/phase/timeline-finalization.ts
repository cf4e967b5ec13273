import type { ScoreNote } from "../types.js";
import type { SectionRhythmPlan } from "./rhythm-planning/index.js";
import type { ArrangedSection } from "./arrangement.js";
import { BEAT_EPSILON } from "../constants/voice-config.js";
import { INTERLUDE_SECTION_ID, restNote } from "./normalization.js";

export interface SectionPlacement {
  section: ArrangedSection;
  plan: SectionRhythmPlan;
  /** Global beat of the section's first barline */
  startBeat: number;
  startMeasure: number;
  endMeasure: number;
  /** Rests between the previous section's pause and the first sung note */
  leadingRests: ScoreNote[];
  pauseRests: ScoreNote[];
}

export interface Timeline {
  placements: SectionPlacement[];
  measureCount: number;
  capacity: number;
}

function modulo(value: number, divisor: number): number {
  const result = value % divisor;
  return result < -BEAT_EPSILON ? result + divisor : Math.max(0, result);
}

/**
 * Pause rests in chunks of at most one measure
 */
function pauseRests(beats: number, capacity: number): ScoreNote[] {
  const rests: ScoreNote[] = [];
  let remaining = beats;
  while (remaining > BEAT_EPSILON) {
    const chunk = Math.min(remaining, capacity);
    rests.push(restNote(chunk, INTERLUDE_SECTION_ID));
    remaining -= chunk;
  }
  return rests;
}

/**
 * Lays arranged sections end to end on the global beat grid.
 *
 * A section's sung material starts `startOffset` beats after one of its own
 * barlines, so the rest before it is whatever brings the cursor to that
 * position. When a pause leaves the cursor mid-measure the section's first
 * barline may fall inside the pause; the section then owns that measure.
 */
export function finalizeTimeline(
  sections: readonly ArrangedSection[],
  plans: ReadonlyMap<string, SectionRhythmPlan>,
  capacity: number
): Timeline {
  const placements: SectionPlacement[] = [];
  let cursor = 0;

  for (const section of sections) {
    const plan = plans.get(section.id);
    if (!plan) {
      throw new Error(`No rhythm plan for section ${section.id}`);
    }
    const leading = modulo(plan.startOffset - cursor, capacity);
    const barline = cursor + leading - plan.startOffset;
    const leadingRests: ScoreNote[] = [];
    if (barline > cursor + BEAT_EPSILON) {
      leadingRests.push(restNote(barline - cursor, INTERLUDE_SECTION_ID));
      if (plan.startOffset > BEAT_EPSILON) {
        leadingRests.push(restNote(plan.startOffset, section.id));
      }
    } else if (leading > BEAT_EPSILON) {
      leadingRests.push(restNote(leading, section.id));
    }

    const startMeasure = Math.round(barline / capacity) + 1;
    const sungBeats = plan.slots.reduce(
      (sum, slot) => sum + slot.notes.reduce((inner, note) => inner + note.beats, 0),
      0
    );
    placements.push({
      section,
      plan,
      startBeat: barline,
      startMeasure,
      endMeasure: startMeasure + Math.max(1, plan.barCount) - 1,
      leadingRests,
      pauseRests: pauseRests(section.pauseAfter, capacity)
    });
    cursor += leading + sungBeats + section.pauseAfter;
  }

  return {
    placements,
    measureCount: Math.max(1, Math.ceil(cursor / capacity - BEAT_EPSILON)),
    capacity
  };
}

/**
 * Soprano stream for the whole arrangement: leading rests, sung notes and
 * pauses in order
 */
export function assembleVoiceStream(timeline: Timeline, sung: ReadonlyMap<string, ScoreNote[]>): ScoreNote[] {
  return timeline.placements.flatMap((placement) => [
    ...placement.leadingRests,
    ...(sung.get(placement.section.id) ?? []),
    ...placement.pauseRests
  ]);
}

/**
 * Measure holding a section-local beat
 */
export function measureAt(placement: SectionPlacement, localBeat: number, capacity: number): number {
  return placement.startMeasure + Math.floor(localBeat / capacity + BEAT_EPSILON);
}
