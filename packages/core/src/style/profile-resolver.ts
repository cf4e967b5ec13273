/**
 * Composition Profile Resolution
 *
 * Converts a validated CompositionRequest into the fully resolved context the
 * pipeline runs on. Missing key, time signature and tempo are chosen
 * deterministically from the style and mood strings, so two requests with the
 * same wording always land on the same defaults.
 *
 * The base seed is derived from the resolved musical parameters rather than
 * from the lyrics; identical parameters replay identical attempts.
 */

import type { CompositionRequest, RhythmPresetName, Scale } from "../types.js";
import { beatsPerMeasure, parseKey } from "../musicUtils.js";
import { createRng, pickWithRng, randomInt } from "../rng.js";

export const DEFAULT_KEYS = ["C", "G", "D", "F", "Bb", "A"] as const;
export const DEFAULT_TIME_SIGNATURES = ["4/4", "3/4", "6/8"] as const;
export const DEFAULT_STYLE = "Contemporary Worship";
export const DEFAULT_MOOD = "Uplifting";
export const DEFAULT_RHYTHM_PRESET: RhythmPresetName = "mixed";

const DEFAULT_TEMPO_RANGE = { min: 68, max: 116 } as const;

export interface MusicalDefaults {
  key: string;
  timeSignature: string;
  tempoBpm: number;
}

export interface ResolvedCompositionContext {
  key: string;
  mode?: string;
  scale: Scale;
  timeSignature: string;
  beatsPerMeasure: number;
  tempoBpm: number;
  style: string;
  mood: string;
  rhythmPreset: RhythmPresetName;
  barsPerVerse?: number;
  baseSeed: string;
}

/**
 * Deterministic key, meter and tempo for a style/mood pair
 */
export function chooseDefaults(style: string, mood: string): MusicalDefaults {
  const rng = createRng(`${style}-${mood}`);
  return {
    key: pickWithRng(DEFAULT_KEYS, rng),
    timeSignature: pickWithRng(DEFAULT_TIME_SIGNATURES, rng),
    tempoBpm: randomInt(DEFAULT_TEMPO_RANGE.min, DEFAULT_TEMPO_RANGE.max, rng)
  };
}

export function resolveCompositionContext(request: CompositionRequest): ResolvedCompositionContext {
  const preferences = request.preferences ?? {};
  const style = preferences.style ?? DEFAULT_STYLE;
  const mood = preferences.mood ?? DEFAULT_MOOD;
  const defaults = chooseDefaults(style, mood);

  const key = preferences.key ?? defaults.key;
  const timeSignature = preferences.timeSignature ?? defaults.timeSignature;
  const tempoBpm = preferences.tempoBpm ?? defaults.tempoBpm;

  return {
    key,
    mode: preferences.mode,
    scale: parseKey(key, preferences.mode),
    timeSignature,
    beatsPerMeasure: beatsPerMeasure(timeSignature),
    tempoBpm,
    style,
    mood,
    rhythmPreset: preferences.rhythmPreset ?? DEFAULT_RHYTHM_PRESET,
    barsPerVerse: preferences.barsPerVerse,
    baseSeed: `${key}-${timeSignature}-${tempoBpm}-${style}`
  };
}

/**
 * Seed string for one generation attempt; attempt 0 uses the base seed unchanged
 */
export function attemptSeed(baseSeed: string, attempt: number): string {
  return attempt === 0 ? baseSeed : `${baseSeed}-attempt-${attempt}`;
}
