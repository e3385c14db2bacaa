export * from "./analyticsEngine.js";
export * from "./corpusScorer.js";
export * from "./frequencyCounter.js";
export * from "./keywordDensity.js";
export * from "./memoizedResourceLoader.js";
export * from "./memoryCorpusIndex.js";
export * from "./minHeapTopK.js";
export * from "./readability.js";
export * from "./regexTokenizer.js";
export * from "./segmenterTokenizer.js";
export * from "./semanticSalience.js";
export * from "./stopwordProvider.js";
export * from "./text.js";
export * from "./tokenizerChain.js";
export * from "./whitespaceTokenizer.js";
