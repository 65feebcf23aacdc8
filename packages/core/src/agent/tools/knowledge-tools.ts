/**
 * Knowledge Tools
 *
 * Function-calling tools over the document knowledge base:
 * retrieve_documents, search_specific_document and get_document_list.
 */

import { z } from 'zod';
import type { ToolDefinition, ToolExecutor, ToolProvider } from '../types.js';
import type { ContentType, DocumentSummary, RelevanceFilter, Retriever } from '../../knowledge/types.js';
import { getLog } from '../../services/get-log.js';
import { getErrorMessage } from '../../services/utils.js';
import {
  RETRIEVE_DEFAULT_TOP_K,
  RETRIEVE_MAX_TOP_K,
  SPECIFIC_DEFAULT_TOP_K,
} from '../../config/defaults.js';

const log = getLog('KnowledgeTools');

// ============================================================================
// Result shapes
// ============================================================================

export interface RetrievedDocument {
  content: string;
  source: string;
  page: number;
  type: ContentType;
  score: number;
}

export interface DocumentListEntry {
  name: string;
  total_chunks: number;
  page_count: number;
  content_types: ContentType[];
}

export interface ToolFailure {
  success: false;
  error: string;
}

export interface RetrievalOutcome {
  success: true;
  message: string;
  documents: RetrievedDocument[];
  count: number;
  /** Set by search_specific_document */
  searched_document?: string;
}

export interface DocumentListOutcome {
  success: true;
  message: string;
  documents: DocumentListEntry[];
  total_documents: number;
}

export type KnowledgeToolResult = ToolFailure | RetrievalOutcome | DocumentListOutcome;

/**
 * What the tools need from a knowledge base.
 */
export interface KnowledgeSource {
  readonly hybridRetriever: Retriever;
  readonly relevanceChecker: RelevanceFilter;
  listDocuments(): DocumentSummary[];
}

// ============================================================================
// Definitions
// ============================================================================

export const retrieveDocumentsTool: ToolDefinition = {
  name: 'retrieve_documents',
  description:
    "Retrieve relevant documents from the wetland conservation knowledge base. Use this tool when you need to find information to answer the user's question. This searches across all available documents.",
  parameters: {
    type: 'object',
    properties: {
      query: {
        type: 'string',
        description: 'The search query to find relevant documents. Should be a clear, specific question or topic.',
      },
      top_k: {
        type: 'integer',
        description: `Number of top documents to retrieve (default: ${RETRIEVE_DEFAULT_TOP_K}, max: ${RETRIEVE_MAX_TOP_K})`,
      },
    },
    required: ['query'],
  },
  category: 'knowledge',
};

export const searchSpecificDocumentTool: ToolDefinition = {
  name: 'search_specific_document',
  description:
    "Search for information within a specific document only. Use this when the user explicitly mentions a document name (e.g., 'National Wetland Policy') or asks to use only a specific source.",
  parameters: {
    type: 'object',
    properties: {
      document_name: {
        type: 'string',
        description: "The name of the specific document to search within (e.g., 'National Wetland Policy.pdf')",
      },
      query: {
        type: 'string',
        description: 'The search query within that specific document',
      },
      top_k: {
        type: 'integer',
        description: `Number of top chunks to retrieve from this document (default: ${SPECIFIC_DEFAULT_TOP_K})`,
      },
    },
    required: ['document_name', 'query'],
  },
  category: 'knowledge',
};

export const getDocumentListTool: ToolDefinition = {
  name: 'get_document_list',
  description:
    'Get a list of all available documents in the knowledge base with their metadata. Use this when the user asks what documents are available or wants to know the sources.',
  parameters: {
    type: 'object',
    properties: {},
    required: [],
  },
  category: 'knowledge',
};

export const KNOWLEDGE_TOOLS: readonly ToolDefinition[] = [
  retrieveDocumentsTool,
  searchSpecificDocumentTool,
  getDocumentListTool,
];

// ============================================================================
// Argument coercion
// ============================================================================

const INTEGER_STRING = /^\s*[+-]?\d+\s*$/;

/**
 * Read an integer argument the way models send them: numbers, numeric
 * strings or booleans. Anything else gives the fallback. Never below 1.
 */
export function toTopK(value: unknown, fallback: number, max = Number.POSITIVE_INFINITY): number {
  let parsed = fallback;
  if (typeof value === 'number' && Number.isFinite(value)) {
    parsed = Math.trunc(value);
  } else if (typeof value === 'string' && INTEGER_STRING.test(value)) {
    parsed = Number.parseInt(value, 10);
  } else if (typeof value === 'boolean') {
    parsed = value ? 1 : 0;
  }
  return Math.min(Math.max(parsed, 1), max);
}

function toText(value: unknown): string {
  if (value === undefined || value === null) return '';
  return typeof value === 'string' ? value : String(value);
}

// ============================================================================
// Executor
// ============================================================================

export class KnowledgeToolExecutor {
  constructor(private readonly knowledge: KnowledgeSource) {}

  /**
   * Run a knowledge tool. Failures come back as `{ success: false, error }`.
   */
  async execute(toolName: string, args: Record<string, unknown>): Promise<KnowledgeToolResult> {
    log.info(`Executing tool: ${toolName}`, { args });
    try {
      switch (toolName) {
        case 'retrieve_documents':
          return await this.retrieveDocuments(args);
        case 'search_specific_document':
          return await this.searchSpecificDocument(args);
        case 'get_document_list':
          return this.getDocumentList();
        default:
          return { success: false, error: `Unknown tool: ${toolName}` };
      }
    } catch (error) {
      log.error(`Tool execution failed for ${toolName}`, { error: getErrorMessage(error) });
      return { success: false, error: getErrorMessage(error) };
    }
  }

  private async retrieveDocuments(args: Record<string, unknown>): Promise<KnowledgeToolResult> {
    const topK = toTopK(args.top_k, RETRIEVE_DEFAULT_TOP_K, RETRIEVE_MAX_TOP_K);
    const query = toText('query' in args ? args.query : args.question).trim();
    if (!query) {
      return { success: false, error: 'Query is required' };
    }

    const retrieved = await this.knowledge.hybridRetriever.invoke(query);
    if (retrieved.length === 0) {
      return { success: true, message: 'No relevant documents found', documents: [], count: 0 };
    }

    const filtered = await this.knowledge.relevanceChecker.filterDocuments(query, retrieved.slice(0, topK));
    const documents = filtered.map(toRetrievedDocument);
    return {
      success: true,
      message: `Retrieved ${documents.length} relevant documents`,
      documents,
      count: documents.length,
    };
  }

  private async searchSpecificDocument(args: Record<string, unknown>): Promise<KnowledgeToolResult> {
    const documentName = toText(args.document_name).trim();
    const query = toText(args.query).trim();
    const topK = toTopK(args.top_k, SPECIFIC_DEFAULT_TOP_K);

    if (!documentName || !query) {
      return { success: false, error: 'Both document_name and query are required' };
    }

    const needle = documentName.toLowerCase();
    const retrieved = await this.knowledge.hybridRetriever.invoke(query);
    const inDocument = retrieved.filter((chunk) => chunk.metadata.source.toLowerCase().includes(needle));

    if (inDocument.length === 0) {
      return {
        success: true,
        message: `No content found in '${documentName}' for this query`,
        documents: [],
        count: 0,
        searched_document: documentName,
      };
    }

    const filtered = await this.knowledge.relevanceChecker.filterDocuments(query, inDocument.slice(0, topK * 2));
    const documents = filtered.slice(0, topK).map(toRetrievedDocument);
    return {
      success: true,
      message: `Retrieved ${documents.length} chunks from '${documentName}'`,
      documents,
      count: documents.length,
      searched_document: documentName,
    };
  }

  private getDocumentList(): KnowledgeToolResult {
    const summaries = this.knowledge.listDocuments();
    if (summaries.length === 0) {
      return { success: false, error: 'No documents loaded in the knowledge base' };
    }

    const documents = summaries.map((summary) => ({
      name: summary.name,
      total_chunks: summary.totalChunks,
      page_count: summary.pageCount,
      content_types: [...summary.contentTypes],
    }));
    return {
      success: true,
      message: `Found ${documents.length} documents in knowledge base`,
      documents,
      total_documents: documents.length,
    };
  }
}

function toRetrievedDocument(hit: {
  document: { content: string; metadata: { source: string; page: number; type: ContentType } };
  score: number;
}): RetrievedDocument {
  return {
    content: hit.document.content,
    source: hit.document.metadata.source,
    page: hit.document.metadata.page,
    type: hit.document.metadata.type,
    score: hit.score,
  };
}

// ============================================================================
// Prompt formatting
// ============================================================================

/**
 * Render a tool result as the text the model reads.
 */
export function formatToolResultForPrompt(toolName: string, result: KnowledgeToolResult): string {
  if (!result.success) {
    return `[Tool Error - ${toolName}]: ${result.error}`;
  }

  if ('count' in result) {
    if (result.documents.length === 0) {
      return `[${toolName}]: No relevant documents found.`;
    }
    let formatted = `[${toolName}]: Retrieved ${result.documents.length} documents:\n\n`;
    result.documents.forEach((doc, i) => {
      formatted += `--- Document ${i + 1} ---\n`;
      formatted += `Source: ${doc.source}, Page: ${doc.page}, Type: ${doc.type}\n`;
      formatted += `Content: ${doc.content}\n\n`;
    });
    return formatted;
  }

  let formatted = `[${toolName}]: Available documents:\n\n`;
  for (const doc of result.documents) {
    formatted += `- ${doc.name}: ${doc.total_chunks} chunks, ${doc.page_count} pages\n`;
  }
  return formatted;
}

// ============================================================================
// Provider
// ============================================================================

const retrievedDocumentSchema = z.object({
  content: z.string(),
  source: z.string(),
  page: z.number(),
  type: z.enum(['text', 'table']),
  score: z.number(),
});

const retrievalMetadataSchema = z.object({
  retrieved: z.array(retrievedDocumentSchema),
});

/**
 * Documents a knowledge tool retrieved, read back from ToolResult metadata.
 */
export function readRetrievedDocuments(metadata: Record<string, unknown> | undefined): RetrievedDocument[] {
  const parsed = retrievalMetadataSchema.safeParse(metadata);
  return parsed.success ? parsed.data.retrieved : [];
}

/**
 * Tool content is the prompt text; the structured result travels in metadata.
 */
export function createKnowledgeToolProvider(knowledge: KnowledgeSource): ToolProvider {
  const executor = new KnowledgeToolExecutor(knowledge);

  const run =
    (toolName: string): ToolExecutor =>
    async (args) => {
      const result = await executor.execute(toolName, args);
      const metadata: Record<string, unknown> = { result };
      if (result.success && 'count' in result) {
        metadata.retrieved = result.documents;
      }
      return {
        content: formatToolResultForPrompt(toolName, result),
        isError: !result.success,
        metadata,
      };
    };

  return {
    name: 'knowledge',
    getTools: () => KNOWLEDGE_TOOLS.map((definition) => ({ definition, executor: run(definition.name) })),
  };
}
