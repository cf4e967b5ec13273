export { exportMusicXml, escapeXml, harmonyXml, noteValues, DIVISIONS } from "./export-musicxml.js";
export type { MusicXmlLayout, MusicXmlOptions } from "./export-musicxml.js";
