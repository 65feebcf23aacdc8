/**
 * RAG chatbot
 *
 * Wires the Gemini provider, the knowledge tools and the agent loop into a
 * question-answering service that reports citations and tool activity.
 */

import type { Result } from '../types/result.js';
import { ok, err } from '../types/result.js';
import { ValidationError } from '../types/errors.js';
import type { AppError } from '../types/errors.js';
import { Agent } from '../agent/agent.js';
import type { AgentChatOptions } from '../agent/agent.js';
import type { ChatProvider } from '../agent/provider.js';
import { ToolRegistry } from '../agent/tools.js';
import type { Conversation, ModelConfig, TokenUsage } from '../agent/types.js';
import {
  KnowledgeToolExecutor,
  createKnowledgeToolProvider,
  readRetrievedDocuments,
} from '../agent/tools/knowledge-tools.js';
import type { KnowledgeToolResult } from '../agent/tools/knowledge-tools.js';
import type { KnowledgeBase } from '../knowledge/knowledge-base.js';
import type { ContentType } from '../knowledge/types.js';
import { missingApiKeyError } from '../config/settings.js';
import {
  AGENT_MAX_TOOL_CALLS,
  AGENT_MAX_TURNS,
  CONTEXT_WINDOW_TOKENS,
  DEFAULT_MAX_OUTPUT_TOKENS,
  TOOL_TIMEOUT_MS,
} from '../config/defaults.js';
import { getLog } from '../services/get-log.js';
import { buildSystemPrompt, EMPTY_ANSWER_FALLBACK } from './prompts.js';

const log = getLog('RagChatbot');

export interface Citation {
  source: string;
  page: number;
  type: ContentType;
}

export interface ToolCallSummary {
  name: string;
  arguments: Record<string, unknown>;
  isError: boolean;
  durationMs: number;
}

export interface ChatAnswer {
  conversationId: string;
  answer: string;
  citations: Citation[];
  toolCalls: ToolCallSummary[];
  usage: TokenUsage;
  model: string;
}

export type ChatEvent =
  | { type: 'tool_start'; name: string; arguments: Record<string, unknown> }
  | { type: 'tool_end'; name: string; isError: boolean; durationMs: number; documents: number }
  | { type: 'delta'; content: string }
  | { type: 'done'; answer: ChatAnswer }
  | { type: 'error'; error: { code: string; message: string; hint?: string } };

export interface AskOptions {
  conversationId?: string;
  /** Stream model output as delta events */
  stream?: boolean;
  onEvent?: (event: ChatEvent) => void;
}

export interface RagChatbotOptions {
  provider: ChatProvider;
  knowledge: KnowledgeBase;
  /** Model id, temperature and output limit */
  model: ModelConfig;
  contextWindowTokens?: number;
  /** Named in the hint when no API key is configured */
  secretsPath: string;
  maxTurns?: number;
  maxToolCalls?: number;
  toolTimeoutMs?: number;
}

function parseArguments(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw || '{}');
    return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
      ? Object.fromEntries(Object.entries(parsed))
      : {};
  } catch {
    return {};
  }
}

function errorEvent(error: AppError): ChatEvent {
  const hint = 'hint' in error && typeof error.hint === 'string' ? error.hint : undefined;
  return { type: 'error', error: { code: error.code, message: error.message, ...(hint ? { hint } : {}) } };
}

export class RagChatbot {
  readonly knowledge: KnowledgeBase;
  private readonly provider: ChatProvider;
  private readonly agent: Agent;
  private readonly tools: KnowledgeToolExecutor;
  private readonly secretsPath: string;
  readonly model: string;

  constructor(options: RagChatbotOptions) {
    this.provider = options.provider;
    this.knowledge = options.knowledge;
    this.secretsPath = options.secretsPath;
    this.model = options.model.model;
    this.tools = new KnowledgeToolExecutor(options.knowledge);

    const toolTimeoutMs = options.toolTimeoutMs ?? TOOL_TIMEOUT_MS;
    const registry = new ToolRegistry({ timeoutMs: toolTimeoutMs });
    registry.registerProvider(createKnowledgeToolProvider(options.knowledge));

    const contextWindow = options.contextWindowTokens ?? CONTEXT_WINDOW_TOKENS;
    const maxOutput = options.model.maxTokens ?? DEFAULT_MAX_OUTPUT_TOKENS;

    this.agent = new Agent(
      {
        name: 'wetlands-assistant',
        systemPrompt: buildSystemPrompt(options.knowledge.listDocuments()),
        model: options.model,
        maxTurns: options.maxTurns ?? AGENT_MAX_TURNS,
        maxToolCalls: options.maxToolCalls ?? AGENT_MAX_TOOL_CALLS,
        toolTimeoutMs,
        // Leave room in the window for the reply
        memory: { maxTokens: Math.max(contextWindow - maxOutput, 1_024) },
      },
      { provider: options.provider, tools: registry }
    );
  }

  isReady(): boolean {
    return this.provider.isReady();
  }

  /**
   * Answer a question from the knowledge base.
   */
  async ask(question: string, options: AskOptions = {}): Promise<Result<ChatAnswer, AppError>> {
    const emit = options.onEvent ?? (() => undefined);
    const fail = (error: AppError): Result<never, AppError> => {
      emit(errorEvent(error));
      return err(error);
    };

    const trimmed = question.trim();
    if (!trimmed) {
      return fail(new ValidationError('Question must not be empty', { field: 'question' }));
    }
    if (!this.provider.isReady()) {
      return fail(missingApiKeyError(this.secretsPath));
    }

    const citations = new Map<string, Citation>();
    const chatOptions: AgentChatOptions = {
      conversationId: options.conversationId,
      stream: options.stream,
      onChunk: (chunk) => {
        if (chunk.content) emit({ type: 'delta', content: chunk.content });
      },
      onToolStart: (toolCall) => {
        emit({ type: 'tool_start', name: toolCall.name, arguments: parseArguments(toolCall.arguments) });
      },
      onToolEnd: (toolCall, outcome) => {
        const documents = readRetrievedDocuments(outcome.metadata);
        for (const doc of documents) {
          const key = `${doc.source}#${doc.page}`;
          if (!citations.has(key)) citations.set(key, { source: doc.source, page: doc.page, type: doc.type });
        }
        emit({
          type: 'tool_end',
          name: toolCall.name,
          isError: outcome.isError,
          durationMs: outcome.durationMs,
          documents: documents.length,
        });
      },
    };

    const reply = await this.agent.chat(trimmed, chatOptions);
    if (!reply.ok) {
      log.warn('Question failed', { code: reply.error.code, error: reply.error.message });
      return fail(reply.error);
    }

    const { response } = reply.value;
    const answer: ChatAnswer = {
      conversationId: reply.value.conversationId,
      answer: response.content.trim() || EMPTY_ANSWER_FALLBACK,
      citations: [...citations.values()],
      toolCalls: reply.value.toolCalls.map((executed) => ({
        name: executed.toolCall.name,
        arguments: parseArguments(executed.toolCall.arguments),
        isError: executed.result.isError ?? false,
        durationMs: executed.durationMs,
      })),
      usage: reply.value.usage,
      model: response.model || this.model,
    };

    log.info('Answered question', {
      conversationId: answer.conversationId,
      turns: reply.value.turns,
      toolCalls: answer.toolCalls.length,
      citations: answer.citations.length,
    });
    emit({ type: 'done', answer });
    return ok(answer);
  }

  /**
   * Streaming variant of ask(): yields events until `done` or `error`.
   */
  async *stream(question: string, options: Omit<AskOptions, 'onEvent' | 'stream'> = {}): AsyncGenerator<ChatEvent> {
    const queue: ChatEvent[] = [];
    let wake: (() => void) | undefined;
    let finished = false;

    const run = this.ask(question, {
      ...options,
      stream: true,
      onEvent: (event) => {
        queue.push(event);
        wake?.();
      },
    }).finally(() => {
      finished = true;
      wake?.();
    });

    for (;;) {
      const event = queue.shift();
      if (event) {
        yield event;
        continue;
      }
      if (finished) break;
      await new Promise<void>((resolve) => {
        wake = resolve;
      });
      wake = undefined;
    }
    await run;
  }

  /**
   * Run a knowledge tool directly, without the model.
   */
  searchDocuments(query: string, options: { document?: string; topK?: number } = {}): Promise<KnowledgeToolResult> {
    return options.document
      ? this.tools.execute('search_specific_document', {
          document_name: options.document,
          query,
          top_k: options.topK,
        })
      : this.tools.execute('retrieve_documents', { query, top_k: options.topK });
  }

  listDocuments(): Promise<KnowledgeToolResult> {
    return this.tools.execute('get_document_list', {});
  }

  getConversation(conversationId: string): Conversation | undefined {
    return this.agent.getConversation(conversationId);
  }

  resetConversation(conversationId: string): boolean {
    return this.agent.resetConversation(conversationId);
  }

  deleteConversation(conversationId: string): boolean {
    return this.agent.deleteConversation(conversationId);
  }

  /**
   * Forget conversations idle for longer than `maxIdleMs`. Returns how many were dropped.
   */
  pruneConversations(maxIdleMs: number, now = new Date()): number {
    return this.agent.getMemory().prune(new Date(now.getTime() - maxIdleMs));
  }
}
