import type {
  CanonicalScore,
  CompositionRequest,
  LyricMode,
  ScoreChord,
  ScoreNote,
  ScoreSyllable
} from "../types.js";
import { chordSymbol, parseKey, triad } from "../musicUtils.js";

export function syllable(
  sectionId: string,
  index: number,
  text: string,
  overrides: Partial<ScoreSyllable> = {}
): ScoreSyllable {
  return {
    id: `${sectionId}-syl-${index}`,
    text,
    sectionId,
    wordIndex: index,
    syllableIndexInWord: 0,
    wordText: text,
    hyphenated: false,
    stressed: true,
    phraseEndAfter: false,
    mustEndAtBarline: false,
    breathAfter: false,
    ...overrides
  };
}

export function sung(
  pitch: string,
  beats: number,
  target: ScoreSyllable,
  lyricIndex: number,
  lyricMode: LyricMode = "single"
): ScoreNote {
  const note: ScoreNote = {
    pitch,
    beats,
    isRest: false,
    lyricSyllableId: target.id,
    lyricIndex,
    lyricMode,
    sectionId: target.sectionId
  };
  if (lyricMode !== "tie_continue" && lyricMode !== "melisma_continue") {
    note.lyric = target.text;
  }
  return note;
}

export function rest(beats: number, sectionId = "padding"): ScoreNote {
  return { pitch: "REST", beats, isRest: true, lyricMode: "none", sectionId };
}

export function chord(measureNumber: number, degree: number, sectionId = "sec-1", key = "C"): ScoreChord {
  const scale = parseKey(key);
  return { measureNumber, sectionId, degree, symbol: chordSymbol(scale, degree), pitchClasses: triad(scale, degree) };
}

/**
 * Two 4/4 measures in C: "Glor-y rise" sung G4 F4 E4 over a tonic chord,
 * then a padding rest. Validates without any diagnostic.
 */
export function melodyFixture(): CanonicalScore {
  const glor = syllable("sec-1", 0, "Glor", { wordIndex: 0, wordText: "Glory" });
  const y = syllable("sec-1", 1, "y", { wordIndex: 0, syllableIndexInWord: 1, wordText: "Glory", stressed: false });
  const rise = syllable("sec-1", 2, "rise", {
    wordIndex: 1,
    phraseEndAfter: true,
    mustEndAtBarline: true,
    breathAfter: true
  });
  return {
    meta: {
      key: "C",
      timeSignature: "4/4",
      tempoBpm: 80,
      style: "Hymn",
      mood: "Calm",
      rhythmPreset: "syllabic",
      stage: "melody",
      rationale: "fixture",
      seed: "fixture-seed",
      verseForms: [
        {
          musicUnitId: "verse",
          pickupBeats: 0,
          leadingRestBeats: 0,
          barCount: 1,
          slotDurations: [[1], [1], [2]],
          slotModes: [["single"], ["single"], ["single"]],
          phraseEndSlotIndices: [2],
          phraseBarTargets: [1]
        }
      ],
      arrangementMusicUnits: [{ arrangementIndex: 0, sectionId: "v1", musicUnitId: "verse", verseIndex: 1 }]
    },
    sections: [
      {
        id: "sec-1",
        sourceSectionId: "v1",
        label: "Verse",
        archetype: "verse",
        progressionCluster: "Verse",
        title: "Morning",
        lyrics: "Glory rise",
        syllables: [glor, y, rise],
        isVerse: true,
        verseNumber: 1,
        musicUnitId: "verse",
        pickupBeats: 0,
        pauseBeats: 0,
        startMeasure: 1,
        endMeasure: 1
      }
    ],
    measures: [
      {
        number: 1,
        voices: {
          soprano: [sung("G4", 1, glor, 0), sung("F4", 1, y, 1), sung("E4", 2, rise, 2)],
          alto: [rest(4)],
          tenor: [rest(4)],
          bass: [rest(4)]
        }
      },
      { number: 2, voices: { soprano: [rest(4)], alto: [rest(4)], tenor: [rest(4)], bass: [rest(4)] } }
    ],
    chordProgression: [chord(1, 1), chord(2, 1, "padding")]
  };
}

export function verseRequest(text: string, preferences: CompositionRequest["preferences"] = {}): CompositionRequest {
  return {
    sections: [{ id: "v1", label: "Verse", text, isVerse: true }],
    preferences: { key: "C", timeSignature: "4/4", tempoBpm: 84, ...preferences }
  };
}

export function pitchesOf(notes: readonly ScoreNote[]): string[] {
  return notes.map((note) => note.pitch);
}
