export * from './types.js';
export { tokenize, uniqueTerms } from './tokenize.js';
export { splitText, chunkPages, detectContentType } from './chunker.js';
export type { ChunkOptions } from './chunker.js';
export { loadDocuments, splitPages, extractPdfPages, SUPPORTED_EXTENSIONS } from './loader.js';
export type { LoadOptions } from './loader.js';
export { Bm25Index } from './bm25.js';
export type { Bm25Options } from './bm25.js';
export { VectorStore, QueryEmbedder, cosineSimilarity } from './vector-store.js';
export { HybridRetriever, reciprocalRankFusion } from './hybrid-retriever.js';
export type { HybridRetrieverOptions } from './hybrid-retriever.js';
export { RelevanceChecker, termCoverage } from './relevance.js';
export type { RelevanceCheckerOptions } from './relevance.js';
export { KnowledgeBase } from './knowledge-base.js';
export type { KnowledgeBaseOptions, BuildOptions, KnowledgeBaseStats } from './knowledge-base.js';
