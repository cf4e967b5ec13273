/**
 * Voice Configuration Constants
 *
 * Ranges, comfortable tessitura and motion limits for the four choral voices,
 * expressed in MIDI note numbers and semitones.
 */

import type { PitchRange, VoiceName } from "../types.js";

export const VOICE_NAMES: readonly VoiceName[] = ["soprano", "alto", "tenor", "bass"];

/**
 * Absolute singable range per voice
 */
export const VOICE_RANGES: Record<VoiceName, PitchRange> = {
  soprano: { low: 60, high: 81 }, // C4 - A5
  alto: { low: 55, high: 74 }, // G3 - D5
  tenor: { low: 48, high: 67 }, // C3 - G4
  bass: { low: 40, high: 60 } // E2 - C4
};

/**
 * Comfortable sub-range per voice
 */
export const VOICE_TESSITURA: Record<VoiceName, PitchRange> = {
  soprano: { low: 62, high: 79 },
  alto: { low: 57, high: 72 },
  tenor: { low: 50, high: 65 },
  bass: { low: 43, high: 58 }
};

/** Notes this far outside the tessitura are still tolerated */
export const TESSITURA_TOLERANCE = 1;

export const MAX_MELODIC_LEAP = 7;

/**
 * Maximum distance between adjacent voices
 */
export const VOICE_SPACING = {
  SOPRANO_ALTO: 12,
  ALTO_TENOR: 12,
  /** A tenth */
  TENOR_BASS: 16
} as const;

export const MAX_GENERATION_ATTEMPTS = 5;

/** Beat positions closer than this are treated as equal */
export const BEAT_EPSILON = 1e-9;
