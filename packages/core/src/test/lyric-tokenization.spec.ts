import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  phraseBlocksFromText,
  splitIntoPhrases,
  splitWordIntoSyllables,
  stressedSyllableIndex,
  tokenizeSection
} from "../phase/lyric-tokenization.js";

describe("Syllabification", () => {
  it("splits words into vowel-cluster chunks", () => {
    assert.deepEqual(splitWordIntoSyllables("Glory"), ["Glor", "y"]);
    assert.deepEqual(splitWordIntoSyllables("wonderful"), ["won", "der", "ful"]);
    assert.deepEqual(splitWordIntoSyllables("salvation"), ["sal", "vat", "ion"]);
  });

  it("keeps short words and trailing consonants together", () => {
    assert.deepEqual(splitWordIntoSyllables("the"), ["the"]);
    assert.deepEqual(splitWordIntoSyllables("dawn"), ["dawn"]);
    assert.deepEqual(splitWordIntoSyllables("rhythm"), ["rhythm"]);
  });

  it("shifts stress before suffixes", () => {
    assert.equal(stressedSyllableIndex("salvation", 3), 1);
    assert.equal(stressedSyllableIndex("wonderful", 3), 0);
    assert.equal(stressedSyllableIndex("dawn", 1), 0);
  });
});

describe("Section tokenization", () => {
  it("tokenizes a sentence into one phrase", () => {
    const syllables = tokenizeSection("sec-1", [{ text: "Glory rises in the dawn." }]);
    assert.deepEqual(
      syllables.map((syllable) => syllable.text),
      ["Glor", "y", "ris", "es", "in", "the", "dawn"]
    );
    assert.deepEqual(
      syllables.map((syllable) => syllable.stressed),
      [true, false, true, false, true, true, true]
    );
    assert.deepEqual(
      syllables.map((syllable) => syllable.wordIndex),
      [0, 0, 1, 1, 2, 3, 4]
    );
    assert.equal(syllables[0].id, "sec-1-syl-0");
    assert.deepEqual(
      syllables.map((syllable) => syllable.mustEndAtBarline),
      [false, false, false, false, false, false, true]
    );
  });

  it("treats a comma as a breath point without a barline", () => {
    const [joy, now] = tokenizeSection("sec-1", [{ text: "Joy, now" }]);
    assert.equal(joy.phraseEndAfter, true);
    assert.equal(joy.mustEndAtBarline, false);
    assert.equal(now.mustEndAtBarline, true);
  });

  it("honours merge and breath flags on phrase blocks", () => {
    const merged = tokenizeSection("sec-1", [{ text: "we go", mergeWithNext: true }, { text: "on" }]);
    assert.deepEqual(
      merged.map((syllable) => syllable.phraseEndAfter),
      [false, false, true]
    );

    const breathed = tokenizeSection("sec-1", [{ text: "we go", breathAfter: true }, { text: "on" }]);
    assert.equal(breathed[1].mustEndAtBarline, true);
    assert.equal(breathed[1].breathAfter, true);
    assert.equal(breathed[2].breathAfter, false);
  });

  it("keeps hyphenated compounds in one word", () => {
    const syllables = tokenizeSection("sec-1", [{ text: "well-known" }]);
    assert.deepEqual(
      syllables.map((syllable) => [syllable.text, syllable.wordIndex, syllable.syllableIndexInWord, syllable.hyphenated]),
      [
        ["well", 0, 0, true],
        ["known", 0, 1, false]
      ]
    );
    assert.equal(syllables[0].wordText, "well-known");
  });

  it("reads plain text one block per line", () => {
    assert.deepEqual(phraseBlocksFromText("a\n\n  b  \r\nc"), [{ text: "a" }, { text: "b" }, { text: "c" }]);
  });

  it("groups syllables into barline-bound phrases", () => {
    const syllables = tokenizeSection("sec-1", phraseBlocksFromText("we go\non and on"));
    assert.deepEqual(
      splitIntoPhrases(syllables).map((phrase) => phrase.map((syllable) => syllable.text)),
      [
        ["we", "go"],
        ["on", "and", "on"]
      ]
    );
  });
});
