/**
 * MusicXML 3.1 partwise rendering of canonical scores.
 *
 * Melody-stage scores render a single soprano part; satb-stage scores render
 * four parts. Durations use two divisions per quarter, so every note value
 * the composer produces maps onto eighths, quarters, halves and wholes
 * (dotted or tied where needed).
 */

import type { CanonicalScore, CompositionLogger, ScoreChord, ScoreNote, ScoreSection, ScoreSyllable, VoiceName } from "@satb-composer/core";
import { keyToFifths, parseKey, parsePitch, parseTimeSignature, silentLogger } from "@satb-composer/core";

export const DIVISIONS = 2;

export type MusicXmlLayout = "linear" | "stacked-verses";

export interface MusicXmlOptions {
  logger?: CompositionLogger;
  /** Defaults to the title of the first section */
  title?: string;
  /**
   * "stacked-verses" prints repeated instances of a music unit once, with
   * the later instances' lyrics as additional lyric lines
   */
  layout?: MusicXmlLayout;
}

interface PartSpec {
  id: string;
  voice: VoiceName;
  name: string;
  clef: string;
}

const PARTS: readonly PartSpec[] = [
  { id: "P1", voice: "soprano", name: "Soprano", clef: "<clef><sign>G</sign><line>2</line></clef>" },
  { id: "P2", voice: "alto", name: "Alto", clef: "<clef><sign>G</sign><line>2</line></clef>" },
  {
    id: "P3",
    voice: "tenor",
    name: "Tenor",
    clef: "<clef><sign>G</sign><line>2</line><clef-octave-change>-1</clef-octave-change></clef>"
  },
  { id: "P4", voice: "bass", name: "Bass", clef: "<clef><sign>F</sign><line>4</line></clef>" }
];

const SHARP_SPELLING: readonly [string, number][] = [
  ["C", 0], ["C", 1], ["D", 0], ["D", 1], ["E", 0], ["F", 0],
  ["F", 1], ["G", 0], ["G", 1], ["A", 0], ["A", 1], ["B", 0]
];
const FLAT_SPELLING: readonly [string, number][] = [
  ["C", 0], ["D", -1], ["D", 0], ["E", -1], ["E", 0], ["F", 0],
  ["G", -1], ["G", 0], ["A", -1], ["A", 0], ["B", -1], ["B", 0]
];

/** Note values expressible as one notehead, in divisions, longest first */
const NOTE_VALUES: readonly { divisions: number; type: string; dots: number }[] = [
  { divisions: 12, type: "whole", dots: 1 },
  { divisions: 8, type: "whole", dots: 0 },
  { divisions: 6, type: "half", dots: 1 },
  { divisions: 4, type: "half", dots: 0 },
  { divisions: 3, type: "quarter", dots: 1 },
  { divisions: 2, type: "quarter", dots: 0 },
  { divisions: 1, type: "eighth", dots: 0 }
];

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/**
 * Splits a duration in divisions into notatable values
 */
export function noteValues(divisions: number): { divisions: number; type: string; dots: number }[] {
  const out: { divisions: number; type: string; dots: number }[] = [];
  let remaining = divisions;
  while (remaining > 0) {
    const value = NOTE_VALUES.find((entry) => entry.divisions <= remaining) ?? NOTE_VALUES[NOTE_VALUES.length - 1];
    out.push(value);
    remaining -= value.divisions;
  }
  return out;
}

function spell(pitchClass: number, preferFlats: boolean): [string, number] {
  return (preferFlats ? FLAT_SPELLING : SHARP_SPELLING)[((pitchClass % 12) + 12) % 12];
}

function pitchXml(pitch: string, preferFlats: boolean): string {
  const midi = parsePitch(pitch);
  if (midi === null) {
    throw new Error(`Cannot render pitch ${pitch}`);
  }
  const [step, alter] = spell(midi, preferFlats);
  const alterXml = alter !== 0 ? `<alter>${alter}</alter>` : "";
  return `<pitch><step>${step}</step>${alterXml}<octave>${Math.floor(midi / 12) - 1}</octave></pitch>`;
}

function chordKind(chord: ScoreChord): { kind: string; text: string } {
  const [root, third, fifth] = chord.pitchClasses;
  const upper = (((third - root) % 12) + 12) % 12;
  const outer = (((fifth - root) % 12) + 12) % 12;
  if (upper === 3 && outer === 6) {
    return { kind: "diminished", text: "dim" };
  }
  if (upper === 4 && outer === 8) {
    return { kind: "augmented", text: "+" };
  }
  return upper === 3 ? { kind: "minor", text: "m" } : { kind: "major", text: "" };
}

export function harmonyXml(chord: ScoreChord, preferFlats: boolean): string {
  const [step, alter] = spell(chord.pitchClasses[0], preferFlats);
  const { kind, text } = chordKind(chord);
  const alterXml = alter !== 0 ? `<root-alter>${alter}</root-alter>` : "";
  return `<harmony><root><root-step>${step}</root-step>${alterXml}</root><kind text="${text}">${kind}</kind></harmony>`;
}

interface LyricLine {
  number: number;
  syllabic: string;
  text: string;
}

interface RenderContext {
  sections: Map<string, ScoreSection>;
  syllables: Map<string, ScoreSyllable>;
  wordLengths: Map<string, number>;
  preferFlats: boolean;
  /** Additional lyric lines keyed by `${measureNumber}:${voice}:${noteIndex}` */
  stackedLyrics: Map<string, LyricLine[]>;
}

function syllabicFor(syllable: ScoreSyllable, wordLengths: ReadonlyMap<string, number>): string {
  const length = wordLengths.get(`${syllable.sectionId}:${syllable.wordIndex}`) ?? 1;
  if (length <= 1) {
    return "single";
  }
  if (syllable.syllableIndexInWord === 0) {
    return "begin";
  }
  return syllable.syllableIndexInWord === length - 1 ? "end" : "middle";
}

function lyricLine(note: ScoreNote, context: RenderContext, number?: number): LyricLine | null {
  if (note.lyric === undefined || note.lyricSyllableId === undefined) {
    return null;
  }
  const syllable = context.syllables.get(note.lyricSyllableId);
  return {
    number: number ?? context.sections.get(note.sectionId)?.verseNumber ?? 1,
    syllabic: syllable ? syllabicFor(syllable, context.wordLengths) : "single",
    text: note.lyric
  };
}

function lyricXml(line: LyricLine): string {
  return `<lyric number="${line.number}"><syllabic>${line.syllabic}</syllabic><text>${escapeXml(line.text)}</text></lyric>`;
}

interface VoicePosition {
  note: ScoreNote;
  next: ScoreNote | undefined;
}

function noteXml(position: VoicePosition, lyrics: readonly LyricLine[], capacityDivisions: number, context: RenderContext): string {
  const { note, next } = position;
  const total = Math.round(note.beats * DIVISIONS);
  if (note.isRest && total === capacityDivisions) {
    return `<note><rest measure="yes"/><duration>${total}</duration><voice>1</voice></note>`;
  }

  const values = noteValues(total);
  const tiedIn = !note.isRest && note.lyricMode === "tie_continue";
  const tiedOut = !note.isRest && next !== undefined && !next.isRest && next.lyricMode === "tie_continue";
  const syllable = note.lyricSyllableId === undefined ? undefined : context.syllables.get(note.lyricSyllableId);
  const breath = syllable?.breathAfter === true && next?.lyricSyllableId !== note.lyricSyllableId;

  return values
    .map((value, index) => {
      const stop = index > 0 || tiedIn;
      const start = index < values.length - 1 || tiedOut;
      const ties: string[] = [];
      const tied: string[] = [];
      if (!note.isRest && stop) {
        ties.push('<tie type="stop"/>');
        tied.push('<tied type="stop"/>');
      }
      if (!note.isRest && start) {
        ties.push('<tie type="start"/>');
        tied.push('<tied type="start"/>');
      }
      const articulations = breath && index === values.length - 1 ? "<articulations><breath-mark/></articulations>" : "";
      const notations = tied.length || articulations ? `<notations>${tied.join("")}${articulations}</notations>` : "";
      return [
        "<note>",
        note.isRest ? "<rest/>" : pitchXml(note.pitch, context.preferFlats),
        `<duration>${value.divisions}</duration>`,
        ...ties,
        "<voice>1</voice>",
        `<type>${value.type}</type>`,
        "<dot/>".repeat(value.dots),
        notations,
        index === 0 ? lyrics.map(lyricXml).join("") : "",
        "</note>"
      ].join("");
    })
    .join("");
}

function measureSignature(score: CanonicalScore, measureNumber: number): string {
  const measure = score.measures[measureNumber - 1];
  return PARTS.map(({ voice }) =>
    measure.voices[voice].map((note) => `${note.pitch}/${note.beats}/${note.isRest}/${note.lyricMode}`).join(",")
  ).join("|");
}

/**
 * Measures hidden by the stacked layout, with the lyric lines they contribute
 * to the first instance of their music unit
 */
function stackRepeatedUnits(score: CanonicalScore, context: RenderContext): Set<number> {
  const hidden = new Set<number>();
  const canonical = new Map<string, { section: ScoreSection; lines: number }>();

  for (const section of score.sections) {
    const first = canonical.get(section.musicUnitId);
    if (!first) {
      canonical.set(section.musicUnitId, { section, lines: 1 });
      continue;
    }
    const span = section.endMeasure - section.startMeasure;
    if (span !== first.section.endMeasure - first.section.startMeasure || section.endMeasure > score.measures.length) {
      continue;
    }
    const matches = Array.from({ length: span + 1 }, (_, offset) => offset).every(
      (offset) =>
        measureSignature(score, section.startMeasure + offset) === measureSignature(score, first.section.startMeasure + offset)
    );
    if (!matches) {
      continue;
    }

    first.lines += 1;
    const number = section.verseNumber ?? first.lines;
    for (let offset = 0; offset <= span; offset++) {
      const measure = score.measures[section.startMeasure + offset - 1];
      hidden.add(measure.number);
      for (const { voice } of PARTS) {
        measure.voices[voice].forEach((note, noteIndex) => {
          const line = lyricLine(note, context, number);
          if (!line) {
            return;
          }
          const key = `${first.section.startMeasure + offset}:${voice}:${noteIndex}`;
          context.stackedLyrics.set(key, [...(context.stackedLyrics.get(key) ?? []), line]);
        });
      }
    }
  }
  return hidden;
}

function renderContext(score: CanonicalScore, preferFlats: boolean): RenderContext {
  const syllables = new Map<string, ScoreSyllable>();
  const wordLengths = new Map<string, number>();
  for (const section of score.sections) {
    for (const syllable of section.syllables) {
      syllables.set(syllable.id, syllable);
      const key = `${syllable.sectionId}:${syllable.wordIndex}`;
      wordLengths.set(key, (wordLengths.get(key) ?? 0) + 1);
    }
  }
  return {
    sections: new Map(score.sections.map((section) => [section.id, section])),
    syllables,
    wordLengths,
    preferFlats,
    stackedLyrics: new Map()
  };
}

export function exportMusicXml(score: CanonicalScore, options: MusicXmlOptions = {}): string {
  const logger = options.logger ?? silentLogger;
  const layout = options.layout ?? "linear";
  logger.debug("musicxml_render_started", { stage: score.meta.stage, measureCount: score.measures.length, layout });

  const scale = parseKey(score.meta.key, score.meta.mode);
  const fifths = keyToFifths(scale);
  const { top, bottom } = parseTimeSignature(score.meta.timeSignature);
  const capacityDivisions = Math.round(top * (4 / bottom) * DIVISIONS);
  const context = renderContext(score, fifths < 0);
  const hidden = layout === "stacked-verses" ? stackRepeatedUnits(score, context) : new Set<number>();
  const visible = score.measures.filter((measure) => !hidden.has(measure.number));
  const chords = new Map(score.chordProgression.map((chord) => [chord.measureNumber, chord]));
  const sectionStarts = new Map(score.sections.map((section) => [section.startMeasure, section]));
  const parts = score.meta.stage === "satb" ? PARTS : PARTS.slice(0, 1);

  const partXml = parts.map((part) => {
    const stream = score.measures.flatMap((measure) => measure.voices[part.voice]);
    let streamIndex = 0;
    const positionsByMeasure = new Map<number, VoicePosition[]>();
    for (const measure of score.measures) {
      positionsByMeasure.set(
        measure.number,
        measure.voices[part.voice].map((note) => {
          streamIndex += 1;
          return { note, next: stream[streamIndex] };
        })
      );
    }

    const measuresXml = visible.map((measure, index) => {
      const head: string[] = [];
      if (index === 0) {
        head.push(
          "<attributes>",
          `<divisions>${DIVISIONS}</divisions>`,
          `<key><fifths>${fifths}</fifths><mode>${scale.isMinor ? "minor" : "major"}</mode></key>`,
          `<time><beats>${top}</beats><beat-type>${bottom}</beat-type></time>`,
          part.clef,
          "</attributes>"
        );
      }
      if (part.voice === "soprano") {
        if (index === 0) {
          head.push(
            '<direction placement="above"><direction-type><metronome>',
            `<beat-unit>quarter</beat-unit><per-minute>${score.meta.tempoBpm}</per-minute>`,
            `</metronome></direction-type><sound tempo="${score.meta.tempoBpm}"/></direction>`
          );
        }
        const section = sectionStarts.get(measure.number);
        if (section) {
          head.push(
            `<direction placement="above"><direction-type><rehearsal>${escapeXml(section.label)}</rehearsal></direction-type></direction>`
          );
        }
        const chord = chords.get(measure.number);
        if (chord) {
          head.push(harmonyXml(chord, context.preferFlats));
        }
      }
      const notes = (positionsByMeasure.get(measure.number) ?? []).map((position, noteIndex) => {
        const own = lyricLine(position.note, context);
        const stacked = context.stackedLyrics.get(`${measure.number}:${part.voice}:${noteIndex}`) ?? [];
        return noteXml(position, own ? [own, ...stacked] : stacked, capacityDivisions, context);
      });
      return `<measure number="${index + 1}">${head.join("")}${notes.join("")}</measure>`;
    });
    return `<part id="${part.id}">${measuresXml.join("")}</part>`;
  });

  const title = options.title ?? score.sections[0]?.title ?? "Untitled";
  const xml = [
    '<?xml version="1.0" encoding="UTF-8" standalone="no"?>',
    '<!DOCTYPE score-partwise PUBLIC "-//Recordare//DTD MusicXML 3.1 Partwise//EN" "http://www.musicxml.org/dtds/partwise.dtd">',
    '<score-partwise version="3.1">',
    `<work><work-title>${escapeXml(title)}</work-title></work>`,
    "<part-list>",
    ...parts.map((part) => `<score-part id="${part.id}"><part-name>${part.name}</part-name></score-part>`),
    "</part-list>",
    ...partXml,
    "</score-partwise>"
  ].join("");

  logger.info("musicxml_render_completed", { partCount: parts.length, measureCount: visible.length, bytes: xml.length });
  return xml;
}
