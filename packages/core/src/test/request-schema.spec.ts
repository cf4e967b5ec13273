import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { parseCompositionRequest, validateCompositionRequest } from "../request-schema.js";
import { StructuralError } from "../errors.js";

const validRequest = {
  sections: [
    { id: "v1", label: "Verse", text: "Glory rises in the dawn.", isVerse: true, pickupBeats: "auto" },
    { id: "c1", label: "Chorus", phraseBlocks: [{ text: "Sing now", breathAfter: true }] }
  ],
  arrangement: [{ sectionId: "v1" }, { sectionId: "c1", pauseBeats: 2 }],
  preferences: { key: "G", timeSignature: "3/4", tempoBpm: 90, rhythmPreset: "syllabic", barsPerVerse: 8 }
};

describe("Composition request schema", () => {
  it("accepts a well-formed request unchanged", () => {
    assert.deepEqual(validateCompositionRequest(validRequest), []);
    assert.deepEqual(parseCompositionRequest(validRequest), validRequest);
  });

  it("requires at least one section", () => {
    const issues = validateCompositionRequest({ sections: [] });
    assert.deepEqual(
      issues.map((issue) => issue.field),
      ["sections"]
    );
  });

  it("reports duplicate section ids", () => {
    const issues = validateCompositionRequest({
      sections: [
        { id: "v1", label: "Verse", text: "One" },
        { id: "v1", label: "Verse", text: "Two" }
      ]
    });
    assert.deepEqual(issues, [{ field: "sections.1.id", message: "duplicate section id v1" }]);
  });

  it("rejects sections without words", () => {
    const issues = validateCompositionRequest({ sections: [{ id: "v1", label: "Verse", text: "..." }] });
    assert.deepEqual(issues, [{ field: "sections.0", message: "section needs lyric text or phrase blocks with words" }]);
  });

  it("rejects malformed time signatures", () => {
    const issues = validateCompositionRequest({
      sections: [{ id: "v1", label: "Verse", text: "Glory" }],
      preferences: { timeSignature: "5/3" }
    });
    assert.deepEqual(issues, [
      { field: "preferences.timeSignature", message: "time signature must look like 4/4, 3/4 or 6/8" }
    ]);
  });

  it("throws a structural error listing field paths", () => {
    assert.throws(
      () => parseCompositionRequest({ sections: [{ id: "v1", label: "Verse", text: "Glory" }], preferences: { tempoBpm: 10 } }),
      (error: unknown) =>
        error instanceof StructuralError &&
        error.message.startsWith("Invalid composition request. preferences.tempoBpm:")
    );
  });
});
