/**
 * Knowledge base: loaded chunks plus the retrieval and reranking built over them.
 */

import type { Result } from '../types/result.js';
import { ok } from '../types/result.js';
import type { ConfigurationError } from '../types/errors.js';
import type { Embedder } from '../agent/provider.js';
import { getLog } from '../services/get-log.js';
import { Bm25Index } from './bm25.js';
import { chunkPages } from './chunker.js';
import type { ChunkOptions } from './chunker.js';
import { HybridRetriever } from './hybrid-retriever.js';
import { loadDocuments } from './loader.js';
import { RelevanceChecker } from './relevance.js';
import { QueryEmbedder, VectorStore } from './vector-store.js';
import type {
  ContentType,
  DocumentChunk,
  DocumentSummary,
  RelevanceFilter,
  Retriever,
  SourcePage,
} from './types.js';

const log = getLog('KnowledgeBase');

export interface KnowledgeBaseOptions {
  /** Embeds chunks and queries; keyword retrieval only when absent */
  embedder?: Embedder;
  relevanceThreshold?: number;
  chunking?: ChunkOptions;
  candidates?: number;
}

export interface BuildOptions extends KnowledgeBaseOptions {
  documentsDir: string;
  recursive?: boolean;
}

export interface KnowledgeBaseStats {
  documents: number;
  chunks: number;
  embeddings: boolean;
}

export class KnowledgeBase {
  constructor(
    readonly documents: readonly DocumentChunk[],
    readonly hybridRetriever: Retriever,
    readonly relevanceChecker: RelevanceFilter,
    private readonly embeddings = false
  ) {}

  /**
   * Load, chunk and index a directory of documents.
   */
  static async build(options: BuildOptions): Promise<Result<KnowledgeBase, ConfigurationError>> {
    const pages = await loadDocuments(options.documentsDir, { recursive: options.recursive });
    if (!pages.ok) return pages;
    return ok(await KnowledgeBase.fromPages(pages.value, options));
  }

  /**
   * Index pages already in memory. Embedding failures fall back to keyword retrieval.
   */
  static async fromPages(pages: readonly SourcePage[], options: KnowledgeBaseOptions = {}): Promise<KnowledgeBase> {
    const chunks = chunkPages(pages, options.chunking);
    const keyword = new Bm25Index(chunks);

    let vector: { store: VectorStore; queries: QueryEmbedder } | undefined;
    if (options.embedder && chunks.length > 0) {
      const store = await VectorStore.build(chunks, options.embedder);
      if (store.ok) {
        vector = { store: store.value, queries: new QueryEmbedder(options.embedder) };
      } else {
        log.warn('Embedding chunks failed, using keyword retrieval only', { error: store.error.message });
      }
    }

    const retriever = new HybridRetriever({ keyword, vector, candidates: options.candidates });
    const checker = new RelevanceChecker({ threshold: options.relevanceThreshold, vector });
    const kb = new KnowledgeBase(chunks, retriever, checker, vector !== undefined);

    const stats = kb.stats();
    log.info(`Indexed ${stats.chunks} chunks from ${stats.documents} documents`, { embeddings: stats.embeddings });
    return kb;
  }

  get isEmpty(): boolean {
    return this.documents.length === 0;
  }

  /**
   * One entry per source file, in first-loaded order.
   */
  listDocuments(): DocumentSummary[] {
    const bySource = new Map<string, { chunks: number; pages: Set<number>; types: Set<ContentType> }>();
    for (const chunk of this.documents) {
      const { source, page, type } = chunk.metadata;
      const entry = bySource.get(source) ?? { chunks: 0, pages: new Set<number>(), types: new Set<ContentType>() };
      entry.chunks++;
      entry.pages.add(page);
      entry.types.add(type);
      bySource.set(source, entry);
    }
    return [...bySource].map(([name, entry]) => ({
      name,
      totalChunks: entry.chunks,
      pageCount: entry.pages.size,
      contentTypes: [...entry.types],
    }));
  }

  stats(): KnowledgeBaseStats {
    return {
      documents: new Set(this.documents.map((chunk) => chunk.metadata.source)).size,
      chunks: this.documents.length,
      embeddings: this.embeddings,
    };
  }
}
