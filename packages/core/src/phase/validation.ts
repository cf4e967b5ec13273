/**
 * Score validation
 *
 * A pure battery of rule checks. Fatal diagnostics block acceptance of a
 * score; warnings describe soft voice-leading issues and are reported to the
 * caller alongside an accepted score.
 */

import type { CanonicalScore, Diagnostic, DiagnosticCode, DiagnosticSeverity, ScoreNote, VoiceName } from "../types.js";
import {
  MAX_MELODIC_LEAP,
  TESSITURA_TOLERANCE,
  VOICE_NAMES,
  VOICE_RANGES,
  VOICE_SPACING,
  VOICE_TESSITURA
} from "../constants/voice-config.js";
import { beatsPerMeasure, isDiatonicTriad, isOnBarline, isStrongBeat, parseKey, parsePitch, pitchClass } from "../musicUtils.js";
import { flattenVoice, INTERLUDE_SECTION_ID, PADDING_SECTION_ID } from "./normalization.js";

const SEVERITY: Record<DiagnosticCode, DiagnosticSeverity> = {
  "measure-duration": "fatal",
  "invalid-pitch": "fatal",
  "missing-chord-progression": "fatal",
  "missing-chord": "fatal",
  "extra-chord": "fatal",
  "non-diatonic-chord": "fatal",
  "unknown-section": "fatal",
  "orphan-note": "fatal",
  "unknown-syllable": "fatal",
  "duplicate-syllable": "fatal",
  "continuation-lyric": "fatal",
  "unmapped-syllable": "fatal",
  "satb-alignment": "fatal",
  "strong-beat-conflict": "warning",
  "non-chord-tone": "warning",
  "out-of-range": "warning",
  "extreme-tessitura": "warning",
  "melodic-leap": "warning",
  "voice-crossing": "warning",
  "wide-spacing": "warning",
  "parallel-motion": "warning",
  "phrase-end-off-barline": "warning"
};

function diagnostic(
  code: DiagnosticCode,
  message: string,
  location: Pick<Diagnostic, "measureNumber" | "voice" | "noteIndex"> = {}
): Diagnostic {
  return { code, severity: SEVERITY[code], message, ...location };
}

interface TimedNote {
  note: ScoreNote;
  index: number;
  onset: number;
  measureNumber: number;
}

function timedVoice(score: CanonicalScore, voice: VoiceName): TimedNote[] {
  const timed: TimedNote[] = [];
  let index = 0;
  for (const measure of score.measures) {
    let onset = 0;
    for (const note of measure.voices[voice]) {
      timed.push({ note, index: index++, onset, measureNumber: measure.number });
      onset += note.beats;
    }
  }
  return timed;
}

function isContinuation(note: ScoreNote): boolean {
  return note.lyricMode === "tie_continue" || note.lyricMode === "melisma_continue";
}

function checkMeasureDurations(score: CanonicalScore, capacity: number): Diagnostic[] {
  const out: Diagnostic[] = [];
  for (const measure of score.measures) {
    for (const voice of VOICE_NAMES) {
      const total = measure.voices[voice].reduce((sum, note) => sum + note.beats, 0);
      if (Math.abs(total - capacity) > 1e-6) {
        out.push(
          diagnostic(
            "measure-duration",
            `Measure ${measure.number} voice ${voice} has ${total} beats; expected ${capacity}.`,
            { measureNumber: measure.number, voice }
          )
        );
      }
    }
  }
  return out;
}

function checkPitches(score: CanonicalScore): Diagnostic[] {
  const out: Diagnostic[] = [];
  for (const voice of VOICE_NAMES) {
    for (const { note, index, measureNumber } of timedVoice(score, voice)) {
      if (!note.isRest && parsePitch(note.pitch) === null) {
        out.push(diagnostic("invalid-pitch", `${voice} note ${index} has invalid pitch ${note.pitch}.`, { measureNumber, voice, noteIndex: index }));
      }
    }
  }
  return out;
}

function checkChordProgression(score: CanonicalScore): Diagnostic[] {
  if (!score.chordProgression.length) {
    return [diagnostic("missing-chord-progression", "Score must include an explicit chord progression.")];
  }
  const out: Diagnostic[] = [];
  const scale = parseKey(score.meta.key, score.meta.mode);
  const measureNumbers = new Set(score.measures.map((measure) => measure.number));
  const seen = new Set<number>();

  for (const chord of score.chordProgression) {
    if (!measureNumbers.has(chord.measureNumber) || seen.has(chord.measureNumber)) {
      out.push(
        diagnostic("extra-chord", `Chord ${chord.symbol} at measure ${chord.measureNumber} has no measure of its own.`, {
          measureNumber: chord.measureNumber
        })
      );
    }
    seen.add(chord.measureNumber);
    if (!isDiatonicTriad(scale, chord.pitchClasses)) {
      out.push(
        diagnostic("non-diatonic-chord", `Chord ${chord.symbol} at measure ${chord.measureNumber} is not diatonic in ${score.meta.key}.`, {
          measureNumber: chord.measureNumber
        })
      );
    }
  }
  for (const measure of score.measures) {
    if (!seen.has(measure.number)) {
      out.push(diagnostic("missing-chord", `Missing chord symbol for measure ${measure.number}.`, { measureNumber: measure.number }));
    }
  }
  return out;
}

function checkLyricMapping(score: CanonicalScore): Diagnostic[] {
  const out: Diagnostic[] = [];
  const expected = new Map(score.sections.map((section) => [section.id, new Set(section.syllables.map((syllable) => syllable.id))]));
  const mapped = new Set<string>();
  const texted = new Set<string>();

  for (const { note, index, measureNumber } of timedVoice(score, "soprano")) {
    if (note.isRest) {
      continue;
    }
    const location = { measureNumber, voice: "soprano" as const, noteIndex: index };
    const syllables = expected.get(note.sectionId);
    const isInterlude = note.sectionId === INTERLUDE_SECTION_ID;
    if (!syllables && !isInterlude && note.sectionId !== PADDING_SECTION_ID) {
      out.push(diagnostic("unknown-section", `Lyric note references unknown section ${note.sectionId}.`, location));
      continue;
    }
    if (note.lyricSyllableId === undefined) {
      if (!isInterlude) {
        out.push(diagnostic("orphan-note", `Orphan melodic note at index ${index} without lyric association.`, location));
      }
      continue;
    }
    if (syllables && !syllables.has(note.lyricSyllableId)) {
      out.push(diagnostic("unknown-syllable", `Unknown syllable id ${note.lyricSyllableId} for section ${note.sectionId}.`, location));
    }
    mapped.add(note.lyricSyllableId);
    if (isContinuation(note) && note.lyric !== undefined) {
      out.push(diagnostic("continuation-lyric", `Continuation note ${index} carries lyric text "${note.lyric}".`, location));
    }
    if (note.lyric !== undefined) {
      if (texted.has(note.lyricSyllableId)) {
        out.push(diagnostic("duplicate-syllable", `Syllable ${note.lyricSyllableId} is sung more than once.`, location));
      }
      texted.add(note.lyricSyllableId);
    }
  }

  for (const section of score.sections) {
    const missing = section.syllables.filter((syllable) => !mapped.has(syllable.id)).map((syllable) => syllable.id);
    if (missing.length) {
      out.push(diagnostic("unmapped-syllable", `Section ${section.id} has unmapped syllables: ${missing.join(", ")}.`));
    }
  }
  return out;
}

function checkRangesAndMotion(score: CanonicalScore): Diagnostic[] {
  const out: Diagnostic[] = [];
  for (const voice of VOICE_NAMES) {
    const range = VOICE_RANGES[voice];
    const tessitura = VOICE_TESSITURA[voice];
    let previous: number | null = null;
    for (const { note, index, measureNumber } of timedVoice(score, voice)) {
      const midi = note.isRest ? null : parsePitch(note.pitch);
      if (midi === null) {
        continue;
      }
      const location = { measureNumber, voice, noteIndex: index };
      if (midi < range.low || midi > range.high) {
        out.push(diagnostic("out-of-range", `${voice} note ${index} out of range (${note.pitch}).`, location));
      }
      if (previous !== null && Math.abs(midi - previous) > MAX_MELODIC_LEAP) {
        out.push(diagnostic("melodic-leap", `${voice} note ${index} leaps ${Math.abs(midi - previous)} semitones.`, location));
      }
      if (midi < tessitura.low - TESSITURA_TOLERANCE || midi > tessitura.high + TESSITURA_TOLERANCE) {
        out.push(diagnostic("extreme-tessitura", `${voice} note ${index} in extreme tessitura (${note.pitch}).`, location));
      }
      previous = midi;
    }
  }
  return out;
}

function checkHarmonicIntegrity(score: CanonicalScore): Diagnostic[] {
  const out: Diagnostic[] = [];
  const chords = new Map(score.chordProgression.map((chord) => [chord.measureNumber, chord.pitchClasses]));
  for (const voice of VOICE_NAMES) {
    if (voice !== "soprano" && score.meta.stage !== "satb") {
      continue;
    }
    for (const { note, index, onset, measureNumber } of timedVoice(score, voice)) {
      const midi = note.isRest ? null : parsePitch(note.pitch);
      const tones = chords.get(measureNumber);
      if (midi === null || !tones || tones.includes(pitchClass(midi))) {
        continue;
      }
      const location = { measureNumber, voice, noteIndex: index };
      if (voice === "soprano") {
        if (!isContinuation(note) && isStrongBeat(onset, score.meta.timeSignature)) {
          out.push(
            diagnostic("strong-beat-conflict", `Soprano strong-beat note ${index} (${note.pitch}) conflicts with the chord in measure ${measureNumber}.`, location)
          );
        }
      } else {
        out.push(diagnostic("non-chord-tone", `${voice} note ${index} (${note.pitch}) is outside the chord in measure ${measureNumber}.`, location));
      }
    }
  }
  return out;
}

function checkPhraseEnds(score: CanonicalScore, capacity: number): Diagnostic[] {
  const out: Diagnostic[] = [];
  const phraseEnds = new Set(
    score.sections.flatMap((section) => section.syllables.filter((syllable) => syllable.mustEndAtBarline).map((syllable) => syllable.id))
  );
  const lastEnd = new Map<string, { end: number; measureNumber: number; index: number }>();
  let cursor = 0;
  for (const { note, index, measureNumber } of timedVoice(score, "soprano")) {
    cursor += note.beats;
    if (!note.isRest && note.lyricSyllableId !== undefined && phraseEnds.has(note.lyricSyllableId)) {
      lastEnd.set(note.lyricSyllableId, { end: cursor, measureNumber, index });
    }
  }
  for (const [syllableId, { end, measureNumber, index }] of lastEnd) {
    if (!isOnBarline(end, capacity)) {
      out.push(
        diagnostic("phrase-end-off-barline", `Phrase ending on syllable ${syllableId} does not reach a barline.`, {
          measureNumber,
          voice: "soprano",
          noteIndex: index
        })
      );
    }
  }
  return out;
}

function sungPitches(score: CanonicalScore, voice: VoiceName): (number | null)[] {
  return flattenVoice(score, voice)
    .filter((note) => !note.isRest)
    .map((note) => parsePitch(note.pitch));
}

function hasParallel(previousUpper: number, previousLower: number, upper: number, lower: number): boolean {
  const before = Math.abs(previousUpper - previousLower) % 12;
  const after = Math.abs(upper - lower) % 12;
  const sameDirection =
    (upper - previousUpper > 0 && lower - previousLower > 0) || (upper - previousUpper < 0 && lower - previousLower < 0);
  return sameDirection && (before === 0 || before === 7) && after === before;
}

function checkVoiceSeparation(score: CanonicalScore): Diagnostic[] {
  const voices = VOICE_NAMES.map((voice) => sungPitches(score, voice));
  const [soprano, alto, tenor, bass] = voices;
  if (!voices.every((pitches) => pitches.length === soprano.length)) {
    return [diagnostic("satb-alignment", "SATB voices are not rhythmically aligned by note count.")];
  }

  const out: Diagnostic[] = [];
  for (let index = 0; index < soprano.length; index++) {
    const s = soprano[index];
    const a = alto[index];
    const t = tenor[index];
    const b = bass[index];
    if (s === null || a === null || t === null || b === null) {
      continue;
    }
    if (!(s >= a && a >= t && t >= b)) {
      out.push(diagnostic("voice-crossing", `Voice crossing at note ${index}: S/A/T/B not ordered.`, { noteIndex: index }));
    }
    if (s - a > VOICE_SPACING.SOPRANO_ALTO) {
      out.push(diagnostic("wide-spacing", `Wide spacing at note ${index}: soprano-alto exceeds an octave.`, { noteIndex: index }));
    }
    if (a - t > VOICE_SPACING.ALTO_TENOR) {
      out.push(diagnostic("wide-spacing", `Wide spacing at note ${index}: alto-tenor exceeds an octave.`, { noteIndex: index }));
    }
    if (t - b > VOICE_SPACING.TENOR_BASS) {
      out.push(diagnostic("wide-spacing", `Wide spacing at note ${index}: tenor-bass exceeds a tenth.`, { noteIndex: index }));
    }
  }

  for (let index = 1; index < soprano.length; index++) {
    for (let upper = 0; upper < VOICE_NAMES.length; upper++) {
      for (let lower = upper + 1; lower < VOICE_NAMES.length; lower++) {
        const x0 = voices[upper][index - 1];
        const y0 = voices[lower][index - 1];
        const x1 = voices[upper][index];
        const y1 = voices[lower][index];
        if (x0 === null || y0 === null || x1 === null || y1 === null || !hasParallel(x0, y0, x1, y1)) {
          continue;
        }
        const interval = Math.abs(x0 - y0) % 12 === 0 ? "octave" : "fifth";
        out.push(
          diagnostic("parallel-motion", `Parallel ${interval} between ${VOICE_NAMES[upper]} and ${VOICE_NAMES[lower]} at note ${index}.`, {
            noteIndex: index
          })
        );
      }
    }
  }
  return out;
}

export function validateScore(score: CanonicalScore): Diagnostic[] {
  const capacity = beatsPerMeasure(score.meta.timeSignature);
  const diagnostics = [
    ...checkMeasureDurations(score, capacity),
    ...checkPitches(score),
    ...checkChordProgression(score),
    ...checkLyricMapping(score),
    ...checkRangesAndMotion(score),
    ...checkHarmonicIntegrity(score),
    ...checkPhraseEnds(score, capacity)
  ];
  if (score.meta.stage === "satb") {
    diagnostics.push(...checkVoiceSeparation(score));
  }
  return diagnostics;
}

export function partitionDiagnostics(diagnostics: readonly Diagnostic[]): { fatal: Diagnostic[]; warnings: Diagnostic[] } {
  return {
    fatal: diagnostics.filter((entry) => entry.severity === "fatal"),
    warnings: diagnostics.filter((entry) => entry.severity === "warning")
  };
}

export function hasFatal(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((entry) => entry.severity === "fatal");
}
