import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { projectOntoVerseForm, relabelSlotNotes, verseFormFromPlan } from "../phase/rhythm-planning/index.js";
import type { SectionRhythmPlan } from "../phase/rhythm-planning/index.js";
import type { VerseForm } from "../types.js";
import { ConstraintInfeasibleError } from "../errors.js";
import { syllable } from "./test-utils.js";

/** Two one-bar phrases in 4/4: quarter, quarter, half | quarter, quarter, half */
const FORM: VerseForm = {
  musicUnitId: "verse",
  pickupBeats: 0,
  leadingRestBeats: 0,
  barCount: 2,
  slotDurations: [[1], [1], [2], [1], [1], [2]],
  slotModes: [["single"], ["single"], ["single"], ["single"], ["single"], ["single"]],
  phraseEndSlotIndices: [2, 5],
  phraseBarTargets: [1, 2]
};

function lyric(count: number) {
  return Array.from({ length: count }, (_, index) => syllable("sec-2", index, "la"));
}

describe("Verse form capture", () => {
  it("records the first instance's skeleton", () => {
    const plan: SectionRhythmPlan = {
      sectionId: "sec-1",
      syllables: [],
      slots: [
        { syllableId: "a", notes: [{ beats: 1, mode: "single" }] },
        {
          syllableId: "b",
          notes: [
            { beats: 0.5, mode: "melisma_start" },
            { beats: 0.5, mode: "melisma_continue" }
          ]
        },
        {
          syllableId: "c",
          notes: [
            { beats: 1, mode: "tie_start" },
            { beats: 1, mode: "tie_continue" }
          ]
        },
        { syllableId: "d", notes: [{ beats: 4, mode: "single" }] }
      ],
      phrases: [
        { firstSlot: 0, slotCount: 3, startBeat: 0, targetBeats: 4 },
        { firstSlot: 3, slotCount: 1, startBeat: 4, targetBeats: 4 }
      ],
      pickupBeats: 0,
      startOffset: 0,
      barCount: 2
    };
    assert.deepEqual(verseFormFromPlan("verse", plan, 4), {
      musicUnitId: "verse",
      pickupBeats: 0,
      leadingRestBeats: 0,
      barCount: 2,
      slotDurations: [[1], [0.5, 0.5], [1, 1], [4]],
      slotModes: [["single"], ["melisma_start", "melisma_continue"], ["tie_start", "tie_continue"], ["single"]],
      phraseEndSlotIndices: [2, 3],
      phraseBarTargets: [1, 2]
    });
  });

  it("relabels merged and split slots", () => {
    assert.deepEqual(relabelSlotNotes([{ beats: 0.5, mode: "single" }]), [{ beats: 0.5, mode: "subdivision" }]);
    assert.deepEqual(relabelSlotNotes([{ beats: 2, mode: "tie_start" }]), [{ beats: 2, mode: "single" }]);
    assert.deepEqual(
      relabelSlotNotes([
        { beats: 1, mode: "single" },
        { beats: 1, mode: "single" }
      ]),
      [
        { beats: 1, mode: "melisma_start" },
        { beats: 1, mode: "melisma_continue" }
      ]
    );
    assert.deepEqual(
      relabelSlotNotes([
        { beats: 1, mode: "tie_start" },
        { beats: 2, mode: "tie_continue" }
      ]),
      [
        { beats: 1, mode: "tie_start" },
        { beats: 2, mode: "tie_continue" }
      ]
    );
  });
});

describe("Verse form projection", () => {
  it("reuses the form unchanged for equal syllable counts", () => {
    const plan = projectOntoVerseForm(FORM, "sec-2", lyric(6), "4/4", 4);
    assert.deepEqual(
      plan.slots.map((slot) => slot.notes.map((note) => note.beats)),
      FORM.slotDurations
    );
    assert.equal(plan.barCount, 2);
    assert.equal(plan.slots[5].syllableId, "sec-2-syl-5");
  });

  it("merges the latest weak-beat slot when syllables are missing", () => {
    const plan = projectOntoVerseForm(FORM, "sec-2", lyric(5), "4/4", 4);
    assert.deepEqual(
      plan.slots.map((slot) => slot.notes),
      [
        [{ beats: 1, mode: "single" }],
        [{ beats: 1, mode: "single" }],
        [{ beats: 2, mode: "single" }],
        [
          { beats: 1, mode: "melisma_start" },
          { beats: 1, mode: "melisma_continue" }
        ],
        [{ beats: 2, mode: "single" }]
      ]
    );
    assert.deepEqual(
      plan.syllables.map((s) => s.mustEndAtBarline),
      [false, false, true, false, true]
    );
    assert.deepEqual(plan.phrases, [
      { firstSlot: 0, slotCount: 3, startBeat: 0, targetBeats: 4 },
      { firstSlot: 3, slotCount: 2, startBeat: 4, targetBeats: 4 }
    ]);
  });

  it("splits the latest weak-beat slot when syllables are extra", () => {
    const plan = projectOntoVerseForm(FORM, "sec-2", lyric(7), "4/4", 4);
    assert.deepEqual(
      plan.slots.map((slot) => slot.notes),
      [
        [{ beats: 1, mode: "single" }],
        [{ beats: 1, mode: "single" }],
        [{ beats: 2, mode: "single" }],
        [{ beats: 1, mode: "single" }],
        [{ beats: 0.5, mode: "subdivision" }],
        [{ beats: 0.5, mode: "subdivision" }],
        [{ beats: 2, mode: "single" }]
      ]
    );
    assert.deepEqual(plan.phrases, [
      { firstSlot: 0, slotCount: 3, startBeat: 0, targetBeats: 4 },
      { firstSlot: 3, slotCount: 4, startBeat: 4, targetBeats: 4 }
    ]);
  });

  it("splits melismas before single notes", () => {
    const form: VerseForm = {
      ...FORM,
      slotDurations: [[1], [1], [2], [0.5, 0.5], [1], [2]],
      slotModes: [["single"], ["single"], ["single"], ["melisma_start", "melisma_continue"], ["single"], ["single"]]
    };
    const plan = projectOntoVerseForm(form, "sec-2", lyric(7), "4/4", 4);
    assert.deepEqual(plan.slots[3].notes, [{ beats: 0.5, mode: "subdivision" }]);
    assert.deepEqual(plan.slots[4].notes, [{ beats: 0.5, mode: "subdivision" }]);
  });

  it("refuses fewer syllables than phrases", () => {
    assert.throws(() => projectOntoVerseForm(FORM, "sec-2", lyric(1), "4/4", 4), ConstraintInfeasibleError);
  });

  it("refuses syllables the form cannot hold", () => {
    const tight: VerseForm = {
      ...FORM,
      barCount: 1,
      slotDurations: [[0.5]],
      slotModes: [["subdivision"]],
      phraseEndSlotIndices: [0],
      phraseBarTargets: [1]
    };
    assert.throws(
      () => projectOntoVerseForm(tight, "sec-2", lyric(2), "4/4", 4),
      (error: unknown) =>
        error instanceof ConstraintInfeasibleError &&
        error.hint === "Shorten the text or change the bar count."
    );
  });
});
