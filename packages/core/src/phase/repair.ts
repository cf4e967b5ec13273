/**
 * Local score repair
 *
 * Fixes near-valid scores without re-running rhythm or melody search:
 * phrase-final notes are stretched to the next barline, measures are re-packed,
 * chords are filled in and re-keyed, and at melody stage off-chord soprano
 * heads are snapped back onto the chord. Repairing a repaired score changes
 * nothing.
 */

import type { CanonicalScore, ScoreNote, VoiceName, VoiceNotes } from "../types.js";
import { VOICE_NAMES } from "../constants/voice-config.js";
import { beatsPerMeasure, beatsToNextBarline, isStrongBeat, midiToPitch, parseKey, parsePitch, pitchClass } from "../musicUtils.js";
import { flattenVoice, normalizeHarmonyCoverage, packMeasures } from "./normalization.js";
import { repairProgression } from "./chord-progression.js";
import { nearestPitchClassWithLeap, snapToChord } from "./melody-generation.js";

function phraseEndSyllableIds(score: CanonicalScore): Set<string> {
  return new Set(
    score.sections.flatMap((section) => section.syllables.filter((syllable) => syllable.mustEndAtBarline).map((syllable) => syllable.id))
  );
}

function streamsAligned(streams: VoiceNotes): boolean {
  const { soprano } = streams;
  return VOICE_NAMES.every(
    (voice) =>
      streams[voice].length === soprano.length &&
      streams[voice].every((note, index) => Math.abs(note.beats - soprano[index].beats) < 1e-9)
  );
}

/**
 * Stretches the last note of every phrase-ending syllable so it reaches a
 * barline. At satb stage all voices are stretched together, and only when
 * they are still aligned note for note.
 */
export function extendPhraseEnds(streams: VoiceNotes, phraseEnds: ReadonlySet<string>, capacity: number, satb: boolean): VoiceNotes {
  const lastIndex = new Map<string, number>();
  streams.soprano.forEach((note, index) => {
    if (!note.isRest && note.lyricSyllableId !== undefined && phraseEnds.has(note.lyricSyllableId)) {
      lastIndex.set(note.lyricSyllableId, index);
    }
  });
  const targets = new Set(lastIndex.values());
  const voices: VoiceName[] = satb ? (streamsAligned(streams) ? [...VOICE_NAMES] : []) : ["soprano"];
  if (!targets.size || !voices.length) {
    return streams;
  }

  const extended: VoiceNotes = { ...streams };
  for (const voice of voices) {
    extended[voice] = [...streams[voice]];
  }
  let cursor = 0;
  extended.soprano.forEach((note, index) => {
    cursor += note.beats;
    if (!targets.has(index)) {
      return;
    }
    const gap = beatsToNextBarline(cursor, capacity);
    if (gap <= 0) {
      return;
    }
    for (const voice of voices) {
      const source = extended[voice][index];
      extended[voice][index] = { ...source, beats: source.beats + gap };
    }
    cursor += gap;
  });
  return extended;
}

function repairSopranoPitches(score: CanonicalScore): CanonicalScore {
  const scale = parseKey(score.meta.key, score.meta.mode);
  const phraseEnds = phraseEndSyllableIds(score);
  const chords = new Map(score.chordProgression.map((chord) => [chord.measureNumber, chord.pitchClasses]));
  let previous: number | null = null;

  const measures = score.measures.map((measure) => {
    let onset = 0;
    const tones = chords.get(measure.number);
    const soprano = measure.voices.soprano.map((note): ScoreNote => {
      const position = onset;
      onset += note.beats;
      const midi = note.isRest ? null : parsePitch(note.pitch);
      if (midi === null) {
        return note;
      }
      const basis = previous ?? midi;
      let repaired = midi;
      if (note.lyricMode === "tie_continue") {
        repaired = basis;
      } else if (note.lyricMode !== "melisma_continue" && tones && !tones.includes(pitchClass(midi))) {
        if (isStrongBeat(position, score.meta.timeSignature)) {
          repaired = snapToChord(midi, basis, tones, scale);
        } else if (note.lyricSyllableId !== undefined && phraseEnds.has(note.lyricSyllableId)) {
          repaired = nearestPitchClassWithLeap(midi, basis, tones, "soprano");
        }
      }
      previous = repaired;
      return repaired === midi ? note : { ...note, pitch: midiToPitch(repaired) };
    });
    return { ...measure, voices: { ...measure.voices, soprano } };
  });
  return { ...score, measures };
}

export function repairScore(score: CanonicalScore): CanonicalScore {
  const capacity = beatsPerMeasure(score.meta.timeSignature);
  const scale = parseKey(score.meta.key, score.meta.mode);
  const streams: VoiceNotes = {
    soprano: flattenVoice(score, "soprano"),
    alto: flattenVoice(score, "alto"),
    tenor: flattenVoice(score, "tenor"),
    bass: flattenVoice(score, "bass")
  };
  const extended = extendPhraseEnds(streams, phraseEndSyllableIds(score), capacity, score.meta.stage === "satb");
  const measures = packMeasures(extended, capacity);
  const covered = normalizeHarmonyCoverage(score.chordProgression, measures, scale);
  const repaired: CanonicalScore = {
    ...score,
    measures,
    chordProgression: repairProgression(covered, measures.length, scale)
  };
  return score.meta.stage === "melody" ? repairSopranoPitches(repaired) : repaired;
}
