/**
 * Lyric tokenization
 *
 * Splits phrase blocks into words and syllables and marks stress and phrase
 * boundaries. Boundaries come from three sources, applied in order:
 * the end of a phrase block (unless merged with the next), trailing
 * punctuation, and an explicit breath. The last syllable of a section always
 * ends a phrase.
 */

import type { PhraseBlock, ScoreSyllable } from "../types.js";

const TOKEN_PATTERN = /[A-Za-z']+(?:-[A-Za-z']+)*|[.,;:?!]/g;
const SYLLABLE_CHUNK_PATTERN = /[^aeiouy]*[aeiouy]+(?:[^aeiouy]|$)/g;

/** Punctuation that only marks a breath point, without forcing a barline */
const SOFT_PUNCTUATION = ",";

/**
 * Word endings that carry stress on the syllable just before them
 */
const STRESS_SHIFT_SUFFIXES = ["tion", "sion", "ic", "ity"] as const;

const SHORT_WORD_LENGTH = 3;

/**
 * One block per non-empty line of plain lyric text
 */
export function phraseBlocksFromText(text: string): PhraseBlock[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => ({ text: line }));
}

/**
 * Vowel-cluster syllabification: leading consonants, a vowel run and one
 * trailing consonant form a chunk. Leftover consonants join the last chunk.
 */
export function splitWordIntoSyllables(word: string): string[] {
  if (word.length <= SHORT_WORD_LENGTH) {
    return [word];
  }
  const chunks = word.toLowerCase().match(SYLLABLE_CHUNK_PATTERN);
  if (!chunks) {
    return [word];
  }
  const rebuilt: string[] = [];
  let cursor = 0;
  for (const chunk of chunks) {
    rebuilt.push(word.slice(cursor, cursor + chunk.length));
    cursor += chunk.length;
  }
  if (cursor < word.length) {
    rebuilt[rebuilt.length - 1] += word.slice(cursor);
  }
  return rebuilt.filter((syllable) => syllable.length > 0);
}

/**
 * Index of the stressed syllable within a word
 */
export function stressedSyllableIndex(word: string, syllableCount: number): number {
  if (syllableCount <= 1) {
    return 0;
  }
  const lower = word.toLowerCase();
  if (STRESS_SHIFT_SUFFIXES.some((suffix) => lower.endsWith(suffix))) {
    return syllableCount - 2;
  }
  return 0;
}

interface SyllableDraft {
  text: string;
  wordIndex: number;
  syllableIndexInWord: number;
  wordText: string;
  hyphenated: boolean;
  stressed: boolean;
  phraseEndAfter: boolean;
  mustEndAtBarline: boolean;
  breathAfter: boolean;
}

function markPhraseEnd(draft: SyllableDraft | undefined, requireBarline: boolean, breath = false): void {
  if (!draft) {
    return;
  }
  draft.phraseEndAfter = true;
  if (requireBarline) {
    draft.mustEndAtBarline = true;
  }
  if (breath) {
    draft.breathAfter = true;
  }
}

/**
 * Tokenizes a section's phrase blocks into syllables with ids `${sectionId}-syl-N`.
 */
export function tokenizeSection(sectionId: string, blocks: readonly PhraseBlock[]): ScoreSyllable[] {
  const drafts: SyllableDraft[] = [];
  let wordIndex = -1;

  for (const block of blocks) {
    const tokens = block.text.match(TOKEN_PATTERN) ?? [];
    const blockStart = drafts.length;

    for (const token of tokens) {
      if (/^[.,;:?!]$/.test(token)) {
        markPhraseEnd(drafts[drafts.length - 1], token !== SOFT_PUNCTUATION);
        continue;
      }

      wordIndex++;
      const parts = token.split("-").filter((part) => part.length > 0);
      let indexInWord = 0;
      parts.forEach((part, partIndex) => {
        const syllables = splitWordIntoSyllables(part);
        const stressIndex = stressedSyllableIndex(part, syllables.length);
        syllables.forEach((text, si) => {
          drafts.push({
            text,
            wordIndex,
            syllableIndexInWord: indexInWord++,
            wordText: token,
            hyphenated: partIndex < parts.length - 1 && si === syllables.length - 1,
            stressed: si === stressIndex,
            phraseEndAfter: false,
            mustEndAtBarline: false,
            breathAfter: false
          });
        });
      });
    }

    if (drafts.length === blockStart) {
      continue;
    }
    const last = drafts[drafts.length - 1];
    if (!block.mergeWithNext) {
      markPhraseEnd(last, true);
    }
    if (block.breathAfter) {
      markPhraseEnd(last, true, true);
    }
  }

  markPhraseEnd(drafts[drafts.length - 1], true);

  return drafts.map((draft, index) => ({
    id: `${sectionId}-syl-${index}`,
    sectionId,
    ...draft
  }));
}

/**
 * Splits syllables into phrases ending at barline-bound phrase ends
 */
export function splitIntoPhrases<T extends Pick<ScoreSyllable, "mustEndAtBarline">>(syllables: readonly T[]): T[][] {
  const phrases: T[][] = [];
  let current: T[] = [];
  for (const syllable of syllables) {
    current.push(syllable);
    if (syllable.mustEndAtBarline) {
      phrases.push(current);
      current = [];
    }
  }
  if (current.length) {
    phrases.push(current);
  }
  return phrases;
}
