/**
 * Rhythm presets and section archetypes
 */

import { z } from "zod";
import presetsJson from "../../../motifs/rhythm-presets.json" with { type: "json" };
import type { RhythmPresetName, SectionArchetype } from "../../types.js";
import type { RhythmPolicy } from "./types.js";

const PolicySchema = z.object({
  melismaRate: z.number().min(0).max(1),
  subdivisionRate: z.number().min(0).max(1),
  phraseEndHoldBeats: z.number().positive(),
  preferStrongBeatForStress: z.boolean()
});

const AdjustmentSchema = z.object({
  melismaDelta: z.number().optional(),
  holdDelta: z.number().optional(),
  maxHoldBeats: z.number().positive().optional()
});

const PresetTableSchema = z.object({
  presets: z.object({
    syllabic: PolicySchema,
    mixed: PolicySchema,
    melismatic: PolicySchema
  }),
  archetypeAdjustments: z.record(z.string(), AdjustmentSchema)
});

const PRESET_TABLE = PresetTableSchema.parse(presetsJson);

const EXACT_ARCHETYPES: readonly SectionArchetype[] = ["verse", "chorus", "bridge", "pre-chorus", "intro", "outro"];
const CONTAINED_ARCHETYPES: readonly SectionArchetype[] = ["chorus", "verse", "bridge", "intro", "outro"];

/**
 * Normalizes a free-form section label ("Verse 2", "Final Chorus") to an archetype
 */
export function sectionArchetype(label: string): SectionArchetype {
  const normalized = label.trim().toLowerCase();
  const exact = EXACT_ARCHETYPES.find((archetype) => archetype === normalized);
  if (exact) {
    return exact;
  }
  if (normalized.includes("pre") && normalized.includes("chorus")) {
    return "pre-chorus";
  }
  return CONTAINED_ARCHETYPES.find((archetype) => normalized.includes(archetype)) ?? "custom";
}

/**
 * Policy for a preset with archetype tweaks: choruses tolerate more melisma
 * and longer cadences, verses and bridges stay closer to the text.
 */
export function policyForPreset(preset: RhythmPresetName, label: string): RhythmPolicy {
  const base = PRESET_TABLE.presets[preset];
  const adjustment = PRESET_TABLE.archetypeAdjustments[sectionArchetype(label)];
  if (!adjustment) {
    return { ...base };
  }
  const hold = base.phraseEndHoldBeats + (adjustment.holdDelta ?? 0);
  return {
    melismaRate: Math.min(1, Math.max(0, base.melismaRate + (adjustment.melismaDelta ?? 0))),
    subdivisionRate: base.subdivisionRate,
    phraseEndHoldBeats: Math.min(adjustment.maxHoldBeats ?? hold, hold),
    preferStrongBeatForStress: base.preferStrongBeatForStress
  };
}
