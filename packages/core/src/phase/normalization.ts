/**
 * Score normalization
 *
 * Re-buckets each voice into uniform measures, splitting notes that cross a
 * barline, and rebuilds chord coverage so every measure has exactly one chord.
 * Normalizing a normalized score returns an equal score.
 */

import type { CanonicalScore, ScoreChord, ScoreMeasure, ScoreNote, Scale, VoiceName, VoiceNotes } from "../types.js";
import { BEAT_EPSILON, VOICE_NAMES } from "../constants/voice-config.js";
import { beatsPerMeasure, chordSymbol, parseKey, REST_PITCH, triad } from "../musicUtils.js";

export const PADDING_SECTION_ID = "padding";
export const INTERLUDE_SECTION_ID = "interlude";

export function restNote(beats: number, sectionId: string = PADDING_SECTION_ID): ScoreNote {
  return { pitch: REST_PITCH, beats, isRest: true, lyricMode: "none", sectionId };
}

export function flattenVoice(score: CanonicalScore, voice: VoiceName): ScoreNote[] {
  return score.measures.flatMap((measure) => measure.voices[voice]);
}

export function chordFor(scale: Scale, degree: number, measureNumber: number, sectionId: string): ScoreChord {
  return {
    measureNumber,
    sectionId,
    degree,
    symbol: chordSymbol(scale, degree),
    pitchClasses: triad(scale, degree)
  };
}

function noteChunk(note: ScoreNote, beats: number, firstChunk: boolean, isSplit: boolean): ScoreNote {
  if (note.isRest) {
    return { ...note, beats };
  }
  if (firstChunk) {
    const headMode = note.lyricMode === "single" || note.lyricMode === "subdivision" ? "tie_start" : note.lyricMode;
    return { ...note, beats, lyricMode: isSplit ? headMode : note.lyricMode };
  }
  const { lyric: _dropped, ...rest } = note;
  return { ...rest, beats, lyricMode: "tie_continue" };
}

/**
 * Splits a continuous note stream into measures of `capacity` beats. The
 * last measure is padded with a rest.
 */
export function bucketVoiceStream(notes: readonly ScoreNote[], capacity: number): ScoreNote[][] {
  const measures: ScoreNote[][] = [];
  let current: ScoreNote[] = [];
  let used = 0;

  for (const note of notes) {
    let remaining = note.beats;
    let firstChunk = true;
    while (remaining > BEAT_EPSILON) {
      const room = capacity - used;
      const chunk = Math.min(remaining, room);
      const isSplit = firstChunk && remaining - chunk > BEAT_EPSILON;
      current.push(noteChunk(note, chunk, firstChunk, isSplit));
      used += chunk;
      remaining -= chunk;
      firstChunk = false;
      if (used >= capacity - BEAT_EPSILON) {
        measures.push(current);
        current = [];
        used = 0;
      }
    }
  }

  if (current.length) {
    current.push(restNote(capacity - used));
    measures.push(current);
  }
  return measures;
}

/**
 * Builds measures from per-voice streams; voices shorter than the longest
 * one are filled with whole-measure rests
 */
export function packMeasures(
  streams: Partial<VoiceNotes>,
  capacity: number,
  minimumMeasures = 0
): ScoreMeasure[] {
  const bucketed = VOICE_NAMES.map((voice) => bucketVoiceStream(streams[voice] ?? [], capacity));
  const count = Math.max(minimumMeasures, ...bucketed.map((measures) => measures.length));

  const measures: ScoreMeasure[] = [];
  for (let index = 0; index < count; index++) {
    const voices: VoiceNotes = { soprano: [], alto: [], tenor: [], bass: [] };
    VOICE_NAMES.forEach((voice, voiceIndex) => {
      voices[voice] = bucketed[voiceIndex][index] ?? [restNote(capacity)];
    });
    measures.push({ number: index + 1, voices });
  }
  return measures;
}

function firstSectionId(measure: ScoreMeasure): string {
  return measure.voices.soprano.find((note) => note.sectionId !== PADDING_SECTION_ID)?.sectionId ?? PADDING_SECTION_ID;
}

/**
 * One chord per measure: the first chord listed for a measure wins, gaps
 * become tonic triads owned by the measure's first section
 */
export function normalizeHarmonyCoverage(
  chords: readonly ScoreChord[],
  measures: readonly ScoreMeasure[],
  scale: Scale
): ScoreChord[] {
  const existing = new Map<number, ScoreChord>();
  for (const chord of [...chords].sort((a, b) => a.measureNumber - b.measureNumber)) {
    if (chord.measureNumber >= 1 && chord.measureNumber <= measures.length && !existing.has(chord.measureNumber)) {
      existing.set(chord.measureNumber, chord);
    }
  }
  return measures.map(
    (measure) => existing.get(measure.number) ?? chordFor(scale, 1, measure.number, firstSectionId(measure))
  );
}

export function normalizeScore(score: CanonicalScore): CanonicalScore {
  const capacity = beatsPerMeasure(score.meta.timeSignature);
  const streams: VoiceNotes = {
    soprano: flattenVoice(score, "soprano"),
    alto: flattenVoice(score, "alto"),
    tenor: flattenVoice(score, "tenor"),
    bass: flattenVoice(score, "bass")
  };
  const measures = packMeasures(streams, capacity);
  const scale = parseKey(score.meta.key, score.meta.mode);
  return {
    ...score,
    measures,
    chordProgression: normalizeHarmonyCoverage(score.chordProgression, measures, scale)
  };
}
