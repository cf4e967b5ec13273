/**
 * Shared music-unit forms.
 *
 * The first instance of a music unit is planned normally and its skeleton is
 * recorded as a VerseForm. Later instances are projected onto that skeleton:
 * surplus slots are merged into their predecessors, missing slots are made by
 * splitting existing ones. The bar count and phrase placement never change.
 */

import type { RhythmMode, RhythmNote, ScoreSyllable, VerseForm } from "../../types.js";
import type { PhrasePlan, SectionRhythmPlan } from "./types.js";
import { isStrongBeat } from "../../musicUtils.js";
import { ConstraintInfeasibleError } from "../../errors.js";

interface WorkingSlot {
  notes: RhythmNote[];
  phraseEnd: boolean;
}

export function verseFormFromPlan(musicUnitId: string, plan: SectionRhythmPlan, capacity: number): VerseForm {
  let cursor = plan.startOffset;
  const phraseBarTargets = plan.phrases.map((phrase) => {
    cursor += phrase.targetBeats;
    return Math.round(cursor / capacity);
  });
  return {
    musicUnitId,
    pickupBeats: plan.pickupBeats,
    leadingRestBeats: plan.startOffset,
    barCount: plan.barCount,
    slotDurations: plan.slots.map((slot) => slot.notes.map((note) => note.beats)),
    slotModes: plan.slots.map((slot) => slot.notes.map((note) => note.mode)),
    phraseEndSlotIndices: plan.phrases.map((phrase) => phrase.firstSlot + phrase.slotCount - 1),
    phraseBarTargets
  };
}

/**
 * Reassigns articulation after slots are merged or split. A multi-note slot
 * starts with a tie when its second note continues a tie, otherwise with a
 * melisma.
 */
export function relabelSlotNotes(notes: readonly RhythmNote[]): RhythmNote[] {
  if (notes.length === 1) {
    const [only] = notes;
    return [{ beats: only.beats, mode: only.beats < 1 ? "subdivision" : "single" }];
  }
  return notes.map((note, index) => {
    let mode: RhythmMode;
    if (index === 0) {
      mode = notes[1].mode === "tie_continue" ? "tie_start" : "melisma_start";
    } else {
      mode = note.mode === "tie_continue" ? "tie_continue" : "melisma_continue";
    }
    return { beats: note.beats, mode };
  });
}

function slotOnsets(slots: readonly WorkingSlot[], startOffset: number): number[] {
  const onsets: number[] = [];
  let cursor = startOffset;
  for (const slot of slots) {
    onsets.push(cursor);
    cursor += slot.notes.reduce((sum, note) => sum + note.beats, 0);
  }
  return onsets;
}

function isPhraseStart(slots: readonly WorkingSlot[], index: number): boolean {
  return index === 0 || slots[index - 1].phraseEnd;
}

function slotBeats(slot: WorkingSlot): number {
  return slot.notes.reduce((sum, note) => sum + note.beats, 0);
}

function truncate(slots: WorkingSlot[], removeCount: number, form: VerseForm, sectionId: string, timeSignature: string, capacity: number): void {
  const phraseCount = slots.filter((slot) => slot.phraseEnd).length;
  if (slots.length - removeCount < phraseCount) {
    throw new ConstraintInfeasibleError(
      `Section ${sectionId} has ${slots.length - removeCount} syllables but the shared ${form.musicUnitId} form has ${phraseCount} phrases.`,
      "Add lyric text or give the section its own music unit."
    );
  }
  const onsets = slotOnsets(slots, form.leadingRestBeats);
  const mergeable = slots
    .map((_, index) => index)
    .filter((index) => !isPhraseStart(slots, index))
    .sort((a, b) => {
      const strongA = isStrongBeat(onsets[a] % capacity, timeSignature) ? 1 : 0;
      const strongB = isStrongBeat(onsets[b] % capacity, timeSignature) ? 1 : 0;
      return strongA - strongB || b - a;
    })
    .slice(0, removeCount)
    .sort((a, b) => b - a);

  for (const index of mergeable) {
    const previous = slots[index - 1];
    const merged = slots[index];
    slots[index - 1] = {
      notes: relabelSlotNotes([...previous.notes, ...merged.notes]),
      phraseEnd: previous.phraseEnd || merged.phraseEnd
    };
    slots.splice(index, 1);
  }
}

function splitMultiNoteSlot(slots: WorkingSlot[]): boolean {
  let chosen = -1;
  for (let i = 0; i < slots.length; i++) {
    if (slots[i].notes.length < 2) {
      continue;
    }
    if (chosen === -1) {
      chosen = i;
      continue;
    }
    const current = slots[chosen];
    const candidate = slots[i];
    const cadenceOrder = Number(candidate.phraseEnd) - Number(current.phraseEnd);
    if (cadenceOrder < 0 || (cadenceOrder === 0 && slotBeats(candidate) >= slotBeats(current))) {
      chosen = i;
    }
  }
  if (chosen === -1) {
    return false;
  }
  const slot = slots[chosen];
  slots.splice(
    chosen,
    1,
    { notes: relabelSlotNotes(slot.notes.slice(0, 1)), phraseEnd: false },
    { notes: relabelSlotNotes(slot.notes.slice(1)), phraseEnd: slot.phraseEnd }
  );
  return true;
}

function compareRanks(a: readonly number[], b: readonly number[]): number {
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return a[i] - b[i];
    }
  }
  return 0;
}

/**
 * Halves the best single-note slot of at least one beat: weak-beat onsets
 * first, then non-cadence slots, then the longest, then the latest.
 */
function splitSingleNoteSlot(slots: WorkingSlot[], startOffset: number, timeSignature: string, capacity: number): boolean {
  const onsets = slotOnsets(slots, startOffset);
  let chosen = -1;
  let chosenRank: number[] = [];
  slots.forEach((slot, index) => {
    const beats = slotBeats(slot);
    if (slot.notes.length !== 1 || beats < 1) {
      return;
    }
    const rank = [
      isStrongBeat(onsets[index] % capacity, timeSignature) ? 1 : 0,
      slot.phraseEnd ? 1 : 0,
      -beats,
      -index
    ];
    if (chosen === -1 || compareRanks(rank, chosenRank) < 0) {
      chosen = index;
      chosenRank = rank;
    }
  });
  if (chosen === -1) {
    return false;
  }
  const slot = slots[chosen];
  const beats = slotBeats(slot);
  const head = Math.floor(beats) / 2;
  slots.splice(
    chosen,
    1,
    { notes: relabelSlotNotes([{ beats: head, mode: "single" }]), phraseEnd: false },
    { notes: relabelSlotNotes([{ beats: beats - head, mode: "single" }]), phraseEnd: slot.phraseEnd }
  );
  return true;
}

function expand(slots: WorkingSlot[], addCount: number, form: VerseForm, sectionId: string, timeSignature: string, capacity: number): void {
  for (let added = 0; added < addCount; added++) {
    if (splitMultiNoteSlot(slots)) {
      continue;
    }
    if (splitSingleNoteSlot(slots, form.leadingRestBeats, timeSignature, capacity)) {
      continue;
    }
    throw new ConstraintInfeasibleError(
      `Section ${sectionId} has more syllables than the shared ${form.musicUnitId} form can hold.`,
      "Shorten the text or change the bar count."
    );
  }
}

/**
 * Projects a later instance of a music unit onto its canonical form. Phrase
 * flags of the returned syllables are re-derived from the form.
 */
export function projectOntoVerseForm(
  form: VerseForm,
  sectionId: string,
  syllables: readonly ScoreSyllable[],
  timeSignature: string,
  capacity: number
): SectionRhythmPlan {
  const phraseEnds = new Set(form.phraseEndSlotIndices);
  const slots: WorkingSlot[] = form.slotDurations.map((durations, index) => ({
    notes: durations.map((beats, noteIndex) => ({ beats, mode: form.slotModes[index][noteIndex] })),
    phraseEnd: phraseEnds.has(index)
  }));

  if (syllables.length < slots.length) {
    truncate(slots, slots.length - syllables.length, form, sectionId, timeSignature, capacity);
  } else if (syllables.length > slots.length) {
    expand(slots, syllables.length - slots.length, form, sectionId, timeSignature, capacity);
  }

  const projected: ScoreSyllable[] = syllables.map((syllable, index) => {
    const phraseEnd = slots[index].phraseEnd;
    return {
      ...syllable,
      phraseEndAfter: phraseEnd || (syllable.phraseEndAfter && !syllable.mustEndAtBarline),
      mustEndAtBarline: phraseEnd,
      breathAfter: phraseEnd && syllable.breathAfter
    };
  });

  const phrases: PhrasePlan[] = [];
  const onsets = slotOnsets(slots, form.leadingRestBeats);
  let firstSlot = 0;
  slots.forEach((slot, index) => {
    if (!slot.phraseEnd) {
      return;
    }
    const targetBeats = slots.slice(firstSlot, index + 1).reduce((sum, s) => sum + slotBeats(s), 0);
    phrases.push({ firstSlot, slotCount: index - firstSlot + 1, startBeat: onsets[firstSlot], targetBeats });
    firstSlot = index + 1;
  });

  return {
    sectionId,
    syllables: projected,
    slots: slots.map((slot, index) => ({ syllableId: projected[index].id, notes: slot.notes })),
    phrases,
    pickupBeats: form.pickupBeats,
    startOffset: form.leadingRestBeats,
    barCount: form.barCount
  };
}
