import type {
  AttemptRecord,
  CanonicalScore,
  CompositionRequest,
  Diagnostic,
  EndScoreResult,
  GenerationOptions,
  HarmonizationResult,
  MelodyGenerationResult,
  RefinementRequest
} from "./types.js";
import type { CompositionLogger } from "./logging.js";
import { silentLogger } from "./logging.js";
import { GenerationExhaustedError } from "./errors.js";
import { MAX_GENERATION_ATTEMPTS } from "./constants/voice-config.js";
import { parseCompositionRequest } from "./request-schema.js";
import { attemptSeed, resolveCompositionContext } from "./style/profile-resolver.js";
import type { ResolvedCompositionContext } from "./style/profile-resolver.js";
import { createRng } from "./rng.js";
import { arrangementMusicUnits, expandArrangement, toScoreSection } from "./phase/arrangement.js";
import type { ArrangedSection } from "./phase/arrangement.js";
import { planArrangementRhythm } from "./phase/rhythm-planning.js";
import { assembleVoiceStream, finalizeTimeline } from "./phase/timeline-finalization.js";
import { buildChordProgression } from "./phase/chord-progression.js";
import { composeMelody } from "./phase/melody-generation.js";
import { normalizeHarmonyCoverage, normalizeScore, packMeasures, restNote } from "./phase/normalization.js";
import { partitionDiagnostics, validateScore } from "./phase/validation.js";
import { repairScore } from "./phase/repair.js";
import { harmonizeMelody } from "./phase/harmonization.js";
import { refineMelody } from "./phase/refinement.js";

export { normalizeScore, validateScore, repairScore };

const MELODY_RATIONALE =
  "Lyric-driven rhythm plan with a section-wise diatonic chord progression as harmonic authority.";

/**
 * States of the generation loop. Each transition returns the next state;
 * only `accept` and `exhausted` end the loop.
 */
type GenerationState =
  | { kind: "compose"; attempt: number }
  | { kind: "validate"; attempt: number; score: CanonicalScore; repaired: boolean }
  | { kind: "repair"; attempt: number; score: CanonicalScore }
  | { kind: "retry"; attempt: number; diagnostics: Diagnostic[] }
  | { kind: "accept"; attempt: number; score: CanonicalScore; warnings: Diagnostic[] }
  | { kind: "exhausted" };

function codesOf(diagnostics: readonly Diagnostic[]): string[] {
  return [...new Set(diagnostics.map((entry) => entry.code))];
}

/**
 * Drives compose → validate → (accept | repair → validate | retry) until a
 * score is accepted or the attempts run out.
 *
 * `compose` receives the zero-based attempt index and must be deterministic
 * in it. Errors it throws (structural problems, infeasible constraints)
 * propagate immediately; reseeding cannot fix them.
 */
export function runGenerationLoop(
  compose: (attempt: number) => CanonicalScore,
  options: GenerationOptions = {}
): MelodyGenerationResult {
  const logger: CompositionLogger = options.logger ?? silentLogger;
  const maxAttempts = Math.max(1, options.maxAttempts ?? MAX_GENERATION_ATTEMPTS);
  const history: AttemptRecord[] = [];
  let state: GenerationState = { kind: "compose", attempt: 0 };

  for (;;) {
    switch (state.kind) {
      case "compose": {
        logger.debug("melody_attempt_started", { attempt: state.attempt + 1 });
        state = { kind: "validate", attempt: state.attempt, score: compose(state.attempt), repaired: false };
        break;
      }
      case "validate": {
        const { fatal, warnings } = partitionDiagnostics(validateScore(state.score));
        if (!fatal.length) {
          if (state.repaired) {
            logger.info("melody_repair_succeeded", { attempt: state.attempt + 1 });
          }
          state = { kind: "accept", attempt: state.attempt, score: state.score, warnings };
        } else {
          logger.warn("melody_validation_failed", {
            attempt: state.attempt + 1,
            afterRepair: state.repaired,
            fatalCount: fatal.length,
            codes: codesOf(fatal)
          });
          state = state.repaired
            ? { kind: "retry", attempt: state.attempt, diagnostics: fatal }
            : { kind: "repair", attempt: state.attempt, score: state.score };
        }
        break;
      }
      case "repair": {
        state = { kind: "validate", attempt: state.attempt, score: repairScore(state.score), repaired: true };
        break;
      }
      case "retry": {
        history.push({ attempt: state.attempt + 1, diagnostics: state.diagnostics });
        state = state.attempt + 1 < maxAttempts ? { kind: "compose", attempt: state.attempt + 1 } : { kind: "exhausted" };
        break;
      }
      case "accept": {
        return { score: state.score, warnings: state.warnings, attempts: state.attempt + 1 };
      }
      case "exhausted": {
        logger.error("melody_generation_exhausted", {
          attempts: history.length,
          codes: codesOf(history.flatMap((record) => record.diagnostics))
        });
        throw new GenerationExhaustedError(history);
      }
    }
  }
}

/**
 * Composes one melody-stage score for a single attempt.
 *
 * Rhythm, chords and melody are planned per arranged section; later
 * instances of a music unit are projected onto the first one. The result is
 * packed into measures but not yet validated.
 */
export function composeMelodyAttempt(
  context: ResolvedCompositionContext,
  sections: readonly ArrangedSection[],
  attempt: number
): CanonicalScore {
  const capacity = context.beatsPerMeasure;
  const { plans, verseForms } = planArrangementRhythm(sections, context, attempt);
  const timeline = finalizeTimeline(sections, plans, capacity);
  const chords = buildChordProgression(timeline, verseForms, context.scale, "melody");
  const seed = attemptSeed(context.baseSeed, attempt);
  const sung = composeMelody(
    timeline,
    {
      scale: context.scale,
      timeSignature: context.timeSignature,
      chordsByMeasure: new Map(chords.map((chord) => [chord.measureNumber, chord]))
    },
    createRng(seed)
  );

  const measures = packMeasures({ soprano: assembleVoiceStream(timeline, sung) }, capacity, timeline.measureCount);
  return {
    meta: {
      key: context.key,
      mode: context.mode,
      timeSignature: context.timeSignature,
      tempoBpm: context.tempoBpm,
      style: context.style,
      mood: context.mood,
      rhythmPreset: context.rhythmPreset,
      stage: "melody",
      rationale: MELODY_RATIONALE,
      seed,
      verseForms,
      arrangementMusicUnits: arrangementMusicUnits(sections)
    },
    sections: timeline.placements.map((placement) =>
      toScoreSection(placement.section, placement.plan.syllables, {
        pickupBeats: placement.plan.pickupBeats,
        startMeasure: placement.startMeasure,
        endMeasure: placement.endMeasure
      })
    ),
    measures,
    chordProgression: normalizeHarmonyCoverage(chords, measures, context.scale)
  };
}

/**
 * Main entry point: lyric request in, validated melody-stage score out.
 *
 * The request is validated first; an arrangement naming an unknown section
 * fails before any attempt is made.
 */
export function generateMelodyScore(request: CompositionRequest, options: GenerationOptions = {}): MelodyGenerationResult {
  const parsed = parseCompositionRequest(request);
  const context = resolveCompositionContext(parsed);
  const sections = expandArrangement(parsed);
  return runGenerationLoop((attempt) => composeMelodyAttempt(context, sections, attempt), options);
}

/**
 * Harmonizes a melody-stage score. A satb result with fatal diagnostics is
 * repaired once; if that does not clear them the harmonization fails.
 */
export function harmonizeScore(score: CanonicalScore, options: GenerationOptions = {}): HarmonizationResult {
  const logger = options.logger ?? silentLogger;
  let satb = harmonizeMelody(score);
  let { fatal, warnings } = partitionDiagnostics(validateScore(satb));
  if (fatal.length) {
    logger.warn("satb_validation_failed", { fatalCount: fatal.length, codes: codesOf(fatal) });
    satb = repairScore(satb);
    ({ fatal, warnings } = partitionDiagnostics(validateScore(satb)));
    if (fatal.length) {
      throw new GenerationExhaustedError([{ attempt: 1, diagnostics: fatal }]);
    }
  }
  logger.info("satb_harmonization_completed", { measureCount: satb.measures.length, warningCount: warnings.length });
  return { score: satb, warnings };
}

/**
 * Melody and its SATB harmonization in one call
 */
export function composeEndScore(request: CompositionRequest, options: GenerationOptions = {}): EndScoreResult {
  const melody = generateMelodyScore(request, options);
  const satb = harmonizeScore(melody.score, options);
  return { melody: melody.score, satb: satb.score, warnings: [...melody.warnings, ...satb.warnings] };
}

/**
 * Melody-stage projection of a score: the soprano is kept and the lower
 * voices fall silent
 */
export function extractMelody(score: CanonicalScore): CanonicalScore {
  if (score.meta.stage === "melody") {
    return score;
  }
  const beats = (measure: CanonicalScore["measures"][number]) =>
    measure.voices.soprano.reduce((sum, note) => sum + note.beats, 0);
  return {
    ...score,
    meta: { ...score.meta, stage: "melody", rationale: MELODY_RATIONALE },
    measures: score.measures.map((measure) => ({
      number: measure.number,
      voices: {
        soprano: measure.voices.soprano.map((note) => ({ ...note })),
        alto: [restNote(beats(measure))],
        tenor: [restNote(beats(measure))],
        bass: [restNote(beats(measure))]
      }
    }))
  };
}

/**
 * Refines the targeted music units of a melody-stage score. Runs through the
 * same validate and repair loop as generation.
 */
export function refineScore(
  score: CanonicalScore,
  refinement: RefinementRequest = {},
  options: GenerationOptions = {}
): MelodyGenerationResult {
  const seedBase = `${score.meta.seed}|refine|${refinement.instruction ?? ""}|${refinement.regenerate ? "regenerate" : "adjust"}`;
  return runGenerationLoop(
    (attempt) => refineMelody(score, refinement, createRng(attemptSeed(seedBase, attempt))),
    options
  );
}

/**
 * Refines an SATB score by refining its melody and harmonizing again
 */
export function refineSatbScore(
  score: CanonicalScore,
  refinement: RefinementRequest = {},
  options: GenerationOptions = {}
): HarmonizationResult {
  const refined = refineScore(extractMelody(score), refinement, options);
  const satb = harmonizeScore(refined.score, options);
  return { score: satb.score, warnings: [...refined.warnings, ...satb.warnings] };
}
