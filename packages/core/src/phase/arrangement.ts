/**
 * Expands the requested arrangement into ordered section instances.
 *
 * A lyric section may be arranged several times; every occurrence becomes its
 * own instance with id `sec-N`. Instances of the same music unit later share
 * one rhythmic and harmonic skeleton.
 */

import type {
  ArrangementMusicUnit,
  CompositionRequest,
  LyricSectionInput,
  PhraseBlock,
  ScoreSection,
  ScoreSyllable,
  SectionArchetype
} from "../types.js";
import { StructuralError } from "../errors.js";
import { phraseBlocksFromText, tokenizeSection } from "./lyric-tokenization.js";
import { sectionArchetype } from "./rhythm-planning/index.js";

export const VERSE_MUSIC_UNIT = "verse";

export interface ArrangedSection {
  id: string;
  arrangementIndex: number;
  sourceSectionId: string;
  label: string;
  archetype: SectionArchetype;
  /** Label whose chord cycle the section uses */
  progressionCluster: string;
  title: string;
  lyrics: string;
  blocks: PhraseBlock[];
  syllables: ScoreSyllable[];
  isVerse: boolean;
  verseNumber?: number;
  musicUnitId: string;
  pickupBeats: number | "auto";
  /** Rest after the section; always 0 for the last instance */
  pauseAfter: number;
}

function sectionBlocks(section: LyricSectionInput): PhraseBlock[] {
  if (section.phraseBlocks && section.phraseBlocks.length) {
    return section.phraseBlocks;
  }
  return phraseBlocksFromText(section.text ?? "");
}

export function musicUnitIdFor(section: LyricSectionInput): string {
  if (section.musicUnitId) {
    return section.musicUnitId;
  }
  return section.isVerse ? VERSE_MUSIC_UNIT : `section:${section.id}`;
}

export function expandArrangement(request: CompositionRequest): ArrangedSection[] {
  const byId = new Map(request.sections.map((section) => [section.id, section]));
  const order = request.arrangement?.length
    ? request.arrangement.map((item) => {
        const section = byId.get(item.sectionId);
        if (!section) {
          throw new StructuralError(`Arrangement references unknown section id: ${item.sectionId}`);
        }
        return { section, pauseBeats: item.pauseBeats ?? section.pauseBeats ?? 0 };
      })
    : request.sections.map((section) => ({ section, pauseBeats: section.pauseBeats ?? 0 }));

  let verseCount = 0;
  return order.map(({ section, pauseBeats }, index) => {
    const id = `sec-${index + 1}`;
    const blocks = sectionBlocks(section);
    const isVerse = section.isVerse ?? false;
    return {
      id,
      arrangementIndex: index,
      sourceSectionId: section.id,
      label: section.label,
      archetype: sectionArchetype(section.label),
      progressionCluster: section.progressionCluster ?? section.label,
      title: section.title ?? section.label,
      lyrics: section.text ?? blocks.map((block) => block.text).join("\n"),
      blocks,
      syllables: tokenizeSection(id, blocks),
      isVerse,
      verseNumber: isVerse ? ++verseCount : undefined,
      musicUnitId: musicUnitIdFor(section),
      pickupBeats: section.pickupBeats ?? 0,
      pauseAfter: index < order.length - 1 ? Math.max(0, pauseBeats) : 0
    };
  });
}

export function arrangementMusicUnits(sections: readonly ArrangedSection[]): ArrangementMusicUnit[] {
  return sections.map((section) => ({
    arrangementIndex: section.arrangementIndex,
    sectionId: section.sourceSectionId,
    musicUnitId: section.musicUnitId,
    verseIndex: section.verseNumber
  }));
}

/**
 * Score-facing view of an arranged section once its measures are known
 */
export function toScoreSection(
  section: ArrangedSection,
  syllables: ScoreSyllable[],
  placement: { pickupBeats: number; startMeasure: number; endMeasure: number }
): ScoreSection {
  return {
    id: section.id,
    sourceSectionId: section.sourceSectionId,
    label: section.label,
    archetype: section.archetype,
    progressionCluster: section.progressionCluster,
    title: section.title,
    lyrics: section.lyrics,
    syllables,
    isVerse: section.isVerse,
    verseNumber: section.verseNumber,
    musicUnitId: section.musicUnitId,
    pickupBeats: placement.pickupBeats,
    pauseBeats: section.pauseAfter,
    startMeasure: placement.startMeasure,
    endMeasure: placement.endMeasure
  };
}
