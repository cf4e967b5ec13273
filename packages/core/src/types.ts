import type { CompositionLogger } from "./logging.js";

export type VoiceName = "soprano" | "alto" | "tenor" | "bass";
export type ScoreStage = "melody" | "satb";
export type RhythmPresetName = "syllabic" | "mixed" | "melismatic";
export type SectionArchetype = "verse" | "chorus" | "bridge" | "pre-chorus" | "intro" | "outro" | "custom";

/**
 * Articulation of one sung note relative to its syllable.
 * Only `single`, `subdivision` and the `*_start` modes carry lyric text.
 */
export type RhythmMode =
  | "single"
  | "subdivision"
  | "melisma_start"
  | "melisma_continue"
  | "tie_start"
  | "tie_continue";

export type LyricMode = RhythmMode | "none";

// ---------------------------------------------------------------------------
// Composition request
// ---------------------------------------------------------------------------

export interface PhraseBlock {
  text: string;
  /** Suppresses the phrase end normally implied by the end of this block */
  mergeWithNext?: boolean;
  /** Forces a phrase end and marks a breath after the block */
  breathAfter?: boolean;
}

export interface LyricSectionInput {
  id: string;
  label: string;
  title?: string;
  /** Plain lyric text; every non-empty line becomes one phrase block */
  text?: string;
  phraseBlocks?: PhraseBlock[];
  isVerse?: boolean;
  /** Sections sharing a music unit id are rendered from one rhythmic/harmonic skeleton */
  musicUnitId?: string;
  /** Label whose chord cycle should be used instead of `label` */
  progressionCluster?: string;
  /** Rest inserted after this section when it is not the last arranged section */
  pauseBeats?: number;
  pickupBeats?: number | "auto";
}

export interface ArrangementItem {
  sectionId: string;
  pauseBeats?: number;
}

export interface CompositionPreferences {
  key?: string;
  mode?: string;
  timeSignature?: string;
  tempoBpm?: number;
  style?: string;
  mood?: string;
  rhythmPreset?: RhythmPresetName;
  /** Exact measure count (pickup measure included) for verse sections */
  barsPerVerse?: number;
}

export interface CompositionRequest {
  sections: LyricSectionInput[];
  arrangement?: ArrangementItem[];
  preferences?: CompositionPreferences;
}

// ---------------------------------------------------------------------------
// Scale model
// ---------------------------------------------------------------------------

export interface Scale {
  tonic: string;
  tonicPitchClass: number;
  isMinor: boolean;
  /** Seven ascending pitch classes starting at the tonic */
  semitones: readonly number[];
}

export interface PitchRange {
  low: number;
  high: number;
}

// ---------------------------------------------------------------------------
// Canonical score
// ---------------------------------------------------------------------------

export interface ScoreSyllable {
  id: string;
  text: string;
  sectionId: string;
  wordIndex: number;
  syllableIndexInWord: number;
  wordText: string;
  /** A hyphen follows this syllable inside a compound word */
  hyphenated: boolean;
  stressed: boolean;
  phraseEndAfter: boolean;
  mustEndAtBarline: boolean;
  breathAfter: boolean;
}

export interface RhythmNote {
  beats: number;
  mode: RhythmMode;
}

export interface RhythmSlot {
  syllableId: string;
  notes: RhythmNote[];
}

export interface ScoreChord {
  measureNumber: number;
  sectionId: string;
  degree: number;
  symbol: string;
  pitchClasses: number[];
}

export interface ScoreNote {
  /** Scientific pitch such as `C4` or `F#3`, or `REST` */
  pitch: string;
  beats: number;
  isRest: boolean;
  lyric?: string;
  lyricSyllableId?: string;
  /** Ordinal of the syllable within its section */
  lyricIndex?: number;
  lyricMode: LyricMode;
  sectionId: string;
}

export type VoiceNotes = Record<VoiceName, ScoreNote[]>;

export interface ScoreMeasure {
  number: number;
  voices: VoiceNotes;
}

export interface ScoreSection {
  id: string;
  sourceSectionId: string;
  label: string;
  archetype: SectionArchetype;
  /** Label whose chord cycle the section uses */
  progressionCluster: string;
  title: string;
  lyrics: string;
  syllables: ScoreSyllable[];
  isVerse: boolean;
  verseNumber?: number;
  musicUnitId: string;
  pickupBeats: number;
  pauseBeats: number;
  startMeasure: number;
  endMeasure: number;
}

/**
 * Skeleton shared by every instance of a repeated music unit.
 * Computed from the first instance and projected onto the others.
 */
export interface VerseForm {
  musicUnitId: string;
  pickupBeats: number;
  /** Offset of the first sung note from the section's first barline */
  leadingRestBeats: number;
  barCount: number;
  slotDurations: number[][];
  slotModes: RhythmMode[][];
  phraseEndSlotIndices: number[];
  /** Cumulative bar count reached at the end of each phrase */
  phraseBarTargets: number[];
}

export interface ArrangementMusicUnit {
  arrangementIndex: number;
  sectionId: string;
  musicUnitId: string;
  verseIndex?: number;
}

export interface ScoreMeta {
  key: string;
  mode?: string;
  timeSignature: string;
  tempoBpm: number;
  style: string;
  mood: string;
  rhythmPreset: RhythmPresetName;
  stage: ScoreStage;
  rationale: string;
  seed: string;
  verseForms: VerseForm[];
  arrangementMusicUnits: ArrangementMusicUnit[];
}

export interface CanonicalScore {
  meta: ScoreMeta;
  sections: ScoreSection[];
  measures: ScoreMeasure[];
  chordProgression: ScoreChord[];
}

// ---------------------------------------------------------------------------
// Diagnostics and results
// ---------------------------------------------------------------------------

export type DiagnosticSeverity = "fatal" | "warning";

export type DiagnosticCode =
  | "measure-duration"
  | "invalid-pitch"
  | "missing-chord-progression"
  | "missing-chord"
  | "extra-chord"
  | "non-diatonic-chord"
  | "unknown-section"
  | "orphan-note"
  | "unknown-syllable"
  | "duplicate-syllable"
  | "continuation-lyric"
  | "unmapped-syllable"
  | "satb-alignment"
  | "strong-beat-conflict"
  | "non-chord-tone"
  | "out-of-range"
  | "extreme-tessitura"
  | "melodic-leap"
  | "voice-crossing"
  | "wide-spacing"
  | "parallel-motion"
  | "phrase-end-off-barline";

export interface Diagnostic {
  code: DiagnosticCode;
  severity: DiagnosticSeverity;
  message: string;
  measureNumber?: number;
  voice?: VoiceName;
  noteIndex?: number;
}

export interface AttemptRecord {
  attempt: number;
  diagnostics: Diagnostic[];
}

export interface GenerationOptions {
  logger?: CompositionLogger;
  maxAttempts?: number;
}

export interface MelodyGenerationResult {
  score: CanonicalScore;
  warnings: Diagnostic[];
  /** Number of attempts consumed, starting at 1 */
  attempts: number;
}

export interface HarmonizationResult {
  score: CanonicalScore;
  warnings: Diagnostic[];
}

export interface EndScoreResult {
  melody: CanonicalScore;
  satb: CanonicalScore;
  warnings: Diagnostic[];
}

export interface RefinementRequest {
  /** Free text; "higher" and "lower" shift the targeted melody by a step */
  instruction?: string;
  /** Re-roll chords and melody for the targeted music units */
  regenerate?: boolean;
  /** Music units to touch; all units when omitted */
  musicUnitIds?: string[];
}
