export type * from "./types.js";
export type * from "./tokenizer.js";
export type * from "./resources.js";
export type * from "./corpusIndex.js";
export type * from "./scorer.js";
export * from "./selection.js";
export * from "./diagnostics.js";
export * from "./languages.js";
export * from "./impl/index.js";
