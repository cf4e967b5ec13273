export {
  composeEndScore,
  composeMelodyAttempt,
  extractMelody,
  generateMelodyScore,
  harmonizeScore,
  normalizeScore,
  refineSatbScore,
  refineScore,
  repairScore,
  runGenerationLoop,
  validateScore
} from "./pipeline.js";
export { parseCompositionRequest, validateCompositionRequest, CompositionRequestSchema } from "./request-schema.js";
export type { RequestIssue } from "./request-schema.js";
export { resolveCompositionContext, chooseDefaults } from "./style/profile-resolver.js";
export type { ResolvedCompositionContext } from "./style/profile-resolver.js";
export { tokenizeSection, phraseBlocksFromText, splitWordIntoSyllables } from "./phase/lyric-tokenization.js";
export { expandArrangement } from "./phase/arrangement.js";
export { partitionDiagnostics, hasFatal } from "./phase/validation.js";
export { PADDING_SECTION_ID, INTERLUDE_SECTION_ID } from "./phase/normalization.js";
export {
  beatsPerMeasure,
  chordSymbol,
  isStrongBeat,
  keyToFifths,
  midiToPitch,
  parseKey,
  parsePitch,
  parseTimeSignature,
  pitchToMidi,
  REST_PITCH,
  triad
} from "./musicUtils.js";
export { VOICE_NAMES, VOICE_RANGES, VOICE_TESSITURA, MAX_GENERATION_ATTEMPTS } from "./constants/voice-config.js";
export { createRng, hashSeed } from "./rng.js";
export type { Rng } from "./rng.js";
export { createConsoleLogger, silentLogger } from "./logging.js";
export type { CompositionLogger, ConsoleLoggerOptions, LogFields, LogLevel } from "./logging.js";
export {
  CompositionError,
  ConstraintInfeasibleError,
  GenerationExhaustedError,
  GENERIC_GENERATION_FAILURE,
  isUserFacingError,
  StructuralError
} from "./errors.js";
export type {
  ArrangementItem,
  ArrangementMusicUnit,
  AttemptRecord,
  CanonicalScore,
  CompositionPreferences,
  CompositionRequest,
  Diagnostic,
  DiagnosticCode,
  DiagnosticSeverity,
  EndScoreResult,
  GenerationOptions,
  HarmonizationResult,
  LyricMode,
  LyricSectionInput,
  MelodyGenerationResult,
  PhraseBlock,
  RefinementRequest,
  RhythmMode,
  RhythmPresetName,
  Scale,
  ScoreChord,
  ScoreMeasure,
  ScoreMeta,
  ScoreNote,
  ScoreSection,
  ScoreStage,
  ScoreSyllable,
  SectionArchetype,
  VerseForm,
  VoiceName,
  VoiceNotes
} from "./types.js";
