/**
 * Knowledge base types
 */

export type ContentType = 'text' | 'table';

/**
 * One page of a source document, as read from disk.
 */
export interface SourcePage {
  /** File name (relative path when loaded recursively) */
  readonly source: string;
  /** 1-based page number */
  readonly page: number;
  readonly text: string;
}

export interface ChunkMetadata {
  readonly source: string;
  readonly page: number;
  readonly type: ContentType;
  /** Position of the chunk within its page (0-based) */
  readonly chunkIndex: number;
}

export interface DocumentChunk {
  readonly id: string;
  readonly content: string;
  readonly metadata: ChunkMetadata;
}

export interface ScoredChunk {
  readonly document: DocumentChunk;
  readonly score: number;
}

/**
 * Candidate retrieval: the best chunks for a query, best first.
 */
export interface Retriever {
  invoke(query: string): Promise<DocumentChunk[]>;
}

/**
 * Reranking: keeps the chunks relevant to the query, with their scores, best first.
 */
export interface RelevanceFilter {
  filterDocuments(query: string, documents: readonly DocumentChunk[]): Promise<ScoredChunk[]>;
}

export interface DocumentSummary {
  readonly name: string;
  readonly totalChunks: number;
  /** Distinct pages that produced at least one chunk */
  readonly pageCount: number;
  readonly contentTypes: readonly ContentType[];
}
