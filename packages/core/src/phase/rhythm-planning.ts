import type { ScoreSyllable, VerseForm } from "../types.js";
import type { ArrangedSection } from "./arrangement.js";
import type { ResolvedCompositionContext } from "../style/profile-resolver.js";
import {
  distributePhraseTargets,
  planPhraseRhythm,
  policyForPreset,
  projectOntoVerseForm,
  resolvePickupBeats,
  sectionArchetype,
  verseFormFromPlan
} from "./rhythm-planning/index.js";
import type { RhythmPlanRequest, SectionRhythmPlan } from "./rhythm-planning/index.js";
import { splitIntoPhrases } from "./lyric-tokenization.js";
import { beatsPerMeasure } from "../musicUtils.js";
import { createRng } from "../rng.js";

export interface ArrangementRhythm {
  /** Rhythm plan per arranged section id */
  plans: Map<string, SectionRhythmPlan>;
  /** One form per music unit, in order of first appearance */
  verseForms: VerseForm[];
}

/**
 * Seed for one section's rhythm search. Every musical parameter that shapes
 * the plan is part of it, so replaying a request replays the plan.
 */
export function rhythmSeed(context: ResolvedCompositionContext, section: ArrangedSection, attempt: number): string {
  const base = [
    context.key,
    context.timeSignature,
    context.tempoBpm,
    context.style,
    section.label,
    sectionArchetype(section.label),
    section.id,
    context.rhythmPreset
  ].join("|");
  return attempt > 0 ? `${base}|attempt-${attempt}` : base;
}

/**
 * Plans a section phrase by phrase. Every phrase ends on a barline; the
 * first one may start after a pickup.
 */
export function planSectionRhythm(request: RhythmPlanRequest): SectionRhythmPlan {
  const capacity = beatsPerMeasure(request.timeSignature);
  const phrases = splitIntoPhrases(request.syllables);
  if (!phrases.length) {
    return {
      sectionId: request.sectionId,
      syllables: [],
      slots: [],
      phrases: [],
      pickupBeats: 0,
      startOffset: 0,
      barCount: 0
    };
  }

  const pickupBeats = resolvePickupBeats(request.pickupBeats, phrases[0], capacity);
  const startOffset = pickupBeats > 0 ? capacity - pickupBeats : 0;
  const targets = distributePhraseTargets(
    phrases.map((phrase) => phrase.length),
    request.policy,
    startOffset,
    capacity,
    request.barsTarget
  );

  const rng = createRng(request.seed);
  const plan: SectionRhythmPlan = {
    sectionId: request.sectionId,
    syllables: request.syllables,
    slots: [],
    phrases: [],
    pickupBeats,
    startOffset,
    barCount: 0
  };

  let cursor = startOffset;
  phrases.forEach((syllables: ScoreSyllable[], index) => {
    const slots = planPhraseRhythm({
      syllables,
      startBeat: cursor,
      targetBeats: targets[index],
      timeSignature: request.timeSignature,
      capacity,
      policy: request.policy,
      rng
    });
    plan.phrases.push({
      firstSlot: plan.slots.length,
      slotCount: slots.length,
      startBeat: cursor,
      targetBeats: targets[index]
    });
    plan.slots.push(...slots);
    cursor += targets[index];
  });

  plan.barCount = Math.round(cursor / capacity);
  return plan;
}

/**
 * Plans every arranged section. The first instance of a music unit is
 * searched; later instances are projected onto its form.
 */
export function planArrangementRhythm(
  sections: readonly ArrangedSection[],
  context: ResolvedCompositionContext,
  attempt: number
): ArrangementRhythm {
  const plans = new Map<string, SectionRhythmPlan>();
  const forms = new Map<string, VerseForm>();

  for (const section of sections) {
    const form = forms.get(section.musicUnitId);
    if (form) {
      plans.set(
        section.id,
        projectOntoVerseForm(form, section.id, section.syllables, context.timeSignature, context.beatsPerMeasure)
      );
      continue;
    }
    const plan = planSectionRhythm({
      sectionId: section.id,
      syllables: section.syllables,
      timeSignature: context.timeSignature,
      policy: policyForPreset(context.rhythmPreset, section.label),
      seed: rhythmSeed(context, section, attempt),
      pickupBeats: section.pickupBeats,
      barsTarget: section.isVerse ? context.barsPerVerse : undefined
    });
    plans.set(section.id, plan);
    forms.set(section.musicUnitId, verseFormFromPlan(section.musicUnitId, plan, context.beatsPerMeasure));
  }

  return { plans, verseForms: [...forms.values()] };
}
