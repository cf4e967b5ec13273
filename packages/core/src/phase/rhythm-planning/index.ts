/**
 * Rhythm planning module - unified exports
 */

export * from "./types.js";
export * from "./presets.js";
export * from "./phrase-targets.js";
export * from "./candidate-search.js";
export * from "./verse-form.js";
