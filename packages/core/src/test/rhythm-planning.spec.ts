import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  distributePhraseTargets,
  fallbackShapes,
  finalSyllableNotes,
  naturalPhraseBeats,
  phraseTargetBeats,
  planPhraseRhythm,
  policyForPreset,
  resolvePickupBeats,
  scoreCandidate,
  sectionArchetype
} from "../phase/rhythm-planning/index.js";
import type { RhythmPolicy } from "../phase/rhythm-planning/index.js";
import { planArrangementRhythm, planSectionRhythm } from "../phase/rhythm-planning.js";
import { assembleVoiceStream, finalizeTimeline, measureAt } from "../phase/timeline-finalization.js";
import { expandArrangement } from "../phase/arrangement.js";
import { phraseBlocksFromText, tokenizeSection } from "../phase/lyric-tokenization.js";
import { resolveCompositionContext } from "../style/profile-resolver.js";
import { createRng } from "../rng.js";
import { ConstraintInfeasibleError, StructuralError } from "../errors.js";
import { syllable } from "./test-utils.js";

const VERSE_POLICY: RhythmPolicy = {
  melismaRate: 0.17,
  subdivisionRate: 0.18,
  phraseEndHoldBeats: 1.5,
  preferStrongBeatForStress: true
};

function slotBeats(notes: readonly { beats: number }[]): number {
  return notes.reduce((sum, note) => sum + note.beats, 0);
}

describe("Rhythm presets", () => {
  it("normalizes section labels to archetypes", () => {
    assert.equal(sectionArchetype("Chorus"), "chorus");
    assert.equal(sectionArchetype("Final Chorus"), "chorus");
    assert.equal(sectionArchetype("Pre Chorus"), "pre-chorus");
    assert.equal(sectionArchetype("pre-chorus"), "pre-chorus");
    assert.equal(sectionArchetype("Verse 2"), "verse");
    assert.equal(sectionArchetype("Tag"), "custom");
  });

  it("adjusts presets per archetype", () => {
    const chorus = policyForPreset("mixed", "Chorus");
    assert.ok(Math.abs(chorus.melismaRate - 0.3) < 1e-9);
    assert.equal(chorus.phraseEndHoldBeats, 1.75);
    assert.equal(chorus.subdivisionRate, 0.18);

    const verse = policyForPreset("mixed", "Verse 2");
    assert.ok(Math.abs(verse.melismaRate - 0.17) < 1e-9);
    assert.equal(verse.phraseEndHoldBeats, 1.5);

    assert.deepEqual(policyForPreset("syllabic", "Outro"), policyForPreset("syllabic", "Tag"));
  });
});

describe("Phrase targets", () => {
  it("rounds phrases up to the next barline", () => {
    assert.ok(Math.abs(naturalPhraseBeats(7, VERSE_POLICY) - 6.96) < 1e-9);
    assert.equal(phraseTargetBeats(0, 6.96, 4), 8);
    assert.equal(phraseTargetBeats(1, 7.87, 3), 8);
    assert.equal(phraseTargetBeats(0, 8, 4), 8);
  });

  it("derives automatic pickups from the first stress", () => {
    const phrase = [
      syllable("sec-1", 0, "a", { stressed: false }),
      syllable("sec-1", 1, "ma", { stressed: false }),
      syllable("sec-1", 2, "zing")
    ];
    assert.equal(resolvePickupBeats("auto", phrase, 4), 2);
    assert.equal(resolvePickupBeats("auto", phrase, 2), 1);
    assert.equal(resolvePickupBeats(1.5, phrase, 4), 1.5);
    assert.throws(() => resolvePickupBeats(3, phrase, 3), StructuralError);
  });

  it("gives surplus bars to the densest phrase", () => {
    assert.deepEqual(distributePhraseTargets([4, 4], VERSE_POLICY, 0, 4), [8, 8]);
    assert.deepEqual(distributePhraseTargets([4, 4], VERSE_POLICY, 0, 4, 5), [12, 8]);
    assert.deepEqual(distributePhraseTargets([4, 4], VERSE_POLICY, 0, 4, 6), [12, 12]);
  });

  it("rejects bar counts below the minimum", () => {
    assert.throws(
      () => distributePhraseTargets([4, 4], VERSE_POLICY, 0, 4, 3),
      (error: unknown) =>
        error instanceof ConstraintInfeasibleError &&
        error.message === "The verse needs at least 4 bars for 2 phrases but 3 were requested. Shorten the verse text or raise the bar count."
    );
  });
});

describe("Phrase rhythm search", () => {
  it("holds the final syllable with ties", () => {
    assert.deepEqual(finalSyllableNotes(0.5), [{ beats: 0.5, mode: "subdivision" }]);
    assert.deepEqual(finalSyllableNotes(1), [{ beats: 1, mode: "single" }]);
    assert.deepEqual(finalSyllableNotes(3), [
      { beats: 1, mode: "tie_start" },
      { beats: 2, mode: "tie_continue" }
    ]);
  });

  it("scores a lone cadence by its hold", () => {
    const input = {
      syllables: [syllable("sec-1", 0, "dawn")],
      startBeat: 0,
      targetBeats: 4,
      timeSignature: "4/4",
      capacity: 4,
      policy: VERSE_POLICY,
      rng: createRng("score")
    };
    assert.equal(scoreCandidate([], 4, input), -1.25);
  });

  it("prefers a long stressed note that lands the cadence on a strong beat", () => {
    const slots = planPhraseRhythm({
      syllables: [syllable("sec-1", 0, "Glo"), syllable("sec-1", 1, "ry", { stressed: false })],
      startBeat: 0,
      targetBeats: 4,
      timeSignature: "4/4",
      capacity: 4,
      policy: VERSE_POLICY,
      rng: createRng("two-syllables")
    });
    assert.deepEqual(slots, [
      { syllableId: "sec-1-syl-0", notes: [{ beats: 2, mode: "single" }] },
      {
        syllableId: "sec-1-syl-1",
        notes: [
          { beats: 1, mode: "tie_start" },
          { beats: 1, mode: "tie_continue" }
        ]
      }
    ]);
  });

  it("shortens the tail of crowded phrases", () => {
    const result = fallbackShapes({
      syllables: [syllable("sec-1", 0, "a"), syllable("sec-1", 1, "b"), syllable("sec-1", 2, "c")],
      startBeat: 0,
      targetBeats: 2,
      timeSignature: "4/4",
      capacity: 4,
      policy: VERSE_POLICY,
      rng: createRng("fallback")
    });
    assert.deepEqual(result, { shapes: ["single", "subdivision"], fill: 0.5 });
  });

  it("fills sampled phrases exactly and replays with the same seed", () => {
    const syllables = tokenizeSection("sec-1", [{ text: "Wonderful salvation rises in the morning light" }]);
    const plan = (seed: string) =>
      planPhraseRhythm({
        syllables,
        startBeat: 0,
        targetBeats: 16,
        timeSignature: "4/4",
        capacity: 4,
        policy: VERSE_POLICY,
        rng: createRng(seed)
      });
    const first = plan("phrase-seed");
    assert.equal(first.length, syllables.length);
    assert.equal(
      first.reduce((sum, slot) => sum + slotBeats(slot.notes), 0),
      16
    );
    assert.deepEqual(plan("phrase-seed"), first);
  });
});

describe("Section rhythm plans", () => {
  const syllables = tokenizeSection("sec-1", phraseBlocksFromText("Glory rises in the dawn.\nMercy falls on all the land."));

  it("ends every phrase on a barline", () => {
    const plan = planSectionRhythm({
      sectionId: "sec-1",
      syllables,
      timeSignature: "4/4",
      policy: VERSE_POLICY,
      seed: "section-seed",
      pickupBeats: 0
    });
    assert.equal(plan.barCount, 4);
    assert.equal(plan.slots.length, 14);
    assert.deepEqual(
      plan.phrases.map((phrase) => [phrase.startBeat, phrase.targetBeats]),
      [
        [0, 8],
        [8, 8]
      ]
    );
    for (const phrase of plan.phrases) {
      const beats = plan.slots
        .slice(phrase.firstSlot, phrase.firstSlot + phrase.slotCount)
        .reduce((sum, slot) => sum + slotBeats(slot.notes), 0);
      assert.equal(beats, phrase.targetBeats);
    }
  });

  it("stretches to a requested bar count", () => {
    const plan = planSectionRhythm({
      sectionId: "sec-1",
      syllables,
      timeSignature: "4/4",
      policy: VERSE_POLICY,
      seed: "section-seed",
      pickupBeats: 0,
      barsTarget: 6
    });
    assert.equal(plan.barCount, 6);
    assert.deepEqual(
      plan.phrases.map((phrase) => phrase.targetBeats),
      [12, 12]
    );
  });

  it("shares one form between instances of a music unit", () => {
    const request = {
      sections: [
        { id: "v1", label: "Verse", text: "Glory rises in the dawn.", isVerse: true },
        { id: "v2", label: "Verse", text: "Mercy falls on all the land.", isVerse: true }
      ],
      preferences: { key: "C", timeSignature: "4/4", tempoBpm: 84 }
    };
    const sections = expandArrangement(request);
    const rhythm = planArrangementRhythm(sections, resolveCompositionContext(request), 0);
    assert.equal(rhythm.verseForms.length, 1);
    const first = rhythm.plans.get("sec-1");
    const second = rhythm.plans.get("sec-2");
    assert.ok(first && second);
    assert.equal(second.barCount, first.barCount);
    assert.deepEqual(
      second.slots.map((slot) => slot.notes),
      first.slots.map((slot) => slot.notes)
    );
    assert.equal(second.slots[0].syllableId, "sec-2-syl-0");
  });
});

describe("Timeline", () => {
  function layout(pauseBeats: number) {
    const request = {
      sections: [
        { id: "c", label: "Chorus", text: "Sing now." },
        { id: "v", label: "Verse", text: "Amazing light", pickupBeats: 2 }
      ],
      arrangement: [{ sectionId: "c", pauseBeats }, { sectionId: "v" }],
      preferences: { key: "C", timeSignature: "3/4", tempoBpm: 90 }
    };
    const sections = expandArrangement(request);
    const rhythm = planArrangementRhythm(sections, resolveCompositionContext(request), 0);
    return finalizeTimeline(sections, rhythm.plans, 3);
  }

  it("starts a pickup inside the measure a pause leaves open", () => {
    const timeline = layout(1);
    const [chorus, verse] = timeline.placements;
    assert.equal(chorus.startMeasure, 1);
    assert.deepEqual(chorus.pauseRests, [
      { pitch: "REST", beats: 1, isRest: true, lyricMode: "none", sectionId: "interlude" }
    ]);
    assert.deepEqual(verse.leadingRests, []);
    assert.equal(verse.startBeat, 3);
    assert.equal(verse.startMeasure, 2);
    assert.equal(timeline.measureCount, 3);
  });

  it("pads to the section's own barline when the pause runs past it", () => {
    const timeline = layout(2);
    const verse = timeline.placements[1];
    assert.deepEqual(
      verse.leadingRests.map((note) => [note.beats, note.sectionId]),
      [
        [1, "interlude"],
        [1, "sec-2"]
      ]
    );
    assert.equal(verse.startBeat, 6);
    assert.equal(verse.startMeasure, 3);
    assert.equal(verse.endMeasure, 4);
    assert.equal(timeline.measureCount, 4);
    assert.equal(measureAt(verse, 3, 3), 4);

    const stream = assembleVoiceStream(timeline, new Map());
    assert.deepEqual(
      stream.map((note) => note.beats),
      [2, 1, 1]
    );
  });
});
