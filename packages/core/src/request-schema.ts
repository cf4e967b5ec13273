// ─── Composition Request Schema ──────────────────────────────────────────────
//
// Runtime validation for inbound composition requests. Transport layers hand
// raw JSON to `parseCompositionRequest`; everything past this point works on
// typed values.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import type { CompositionRequest } from "./types.js";
import { StructuralError } from "./errors.js";

const RHYTHM_PRESETS = ["syllabic", "mixed", "melismatic"] as const;

const halfBeat = z.number().min(0).multipleOf(0.5);

export const PhraseBlockSchema = z.object({
  text: z.string(),
  mergeWithNext: z.boolean().optional(),
  breathAfter: z.boolean().optional()
});

export const LyricSectionSchema = z
  .object({
    id: z.string().min(1).max(64),
    label: z.string().min(1).max(80),
    title: z.string().max(80).optional(),
    text: z.string().optional(),
    phraseBlocks: z.array(PhraseBlockSchema).optional(),
    isVerse: z.boolean().optional(),
    musicUnitId: z.string().min(1).max(64).optional(),
    progressionCluster: z.string().min(1).max(80).optional(),
    pauseBeats: halfBeat.max(64).optional(),
    pickupBeats: z.union([halfBeat.max(8), z.literal("auto")]).optional()
  })
  .refine(
    (section) => /[A-Za-z]/.test(section.text ?? "") || (section.phraseBlocks ?? []).some((block) => /[A-Za-z]/.test(block.text)),
    { message: "section needs lyric text or phrase blocks with words" }
  );

export const ArrangementItemSchema = z.object({
  sectionId: z.string().min(1),
  pauseBeats: halfBeat.max(64).optional()
});

export const CompositionPreferencesSchema = z.object({
  key: z.string().min(1).max(8).optional(),
  mode: z.string().max(20).optional(),
  timeSignature: z
    .string()
    .regex(/^([1-9]|1[0-6])\/(2|4|8)$/, "time signature must look like 4/4, 3/4 or 6/8")
    .optional(),
  tempoBpm: z.number().int().min(40).max(240).optional(),
  style: z.string().min(2).max(120).optional(),
  mood: z.string().min(2).max(120).optional(),
  rhythmPreset: z.enum(RHYTHM_PRESETS).optional(),
  barsPerVerse: z.number().int().min(1).max(256).optional()
});

export const CompositionRequestSchema = z
  .object({
    sections: z.array(LyricSectionSchema).min(1),
    arrangement: z.array(ArrangementItemSchema).optional(),
    preferences: CompositionPreferencesSchema.optional()
  })
  .superRefine((request, ctx) => {
    const seen = new Set<string>();
    request.sections.forEach((section, index) => {
      if (seen.has(section.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["sections", index, "id"],
          message: `duplicate section id ${section.id}`
        });
      }
      seen.add(section.id);
    });
  });

export interface RequestIssue {
  field: string;
  message: string;
}

/**
 * Validate a request without throwing. Returns an empty array if valid.
 */
export function validateCompositionRequest(input: unknown): RequestIssue[] {
  const result = CompositionRequestSchema.safeParse(input);
  if (result.success) return [];

  return result.error.issues.map((issue) => ({
    field: issue.path.join(".") || "root",
    message: issue.message
  }));
}

export function parseCompositionRequest(input: unknown): CompositionRequest {
  const result = CompositionRequestSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
      .join("; ");
    throw new StructuralError(`Invalid composition request. ${details}`);
  }
  return result.data;
}
