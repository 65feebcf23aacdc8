/**
 * Agent runtime: the function-calling loop.
 *
 * Each question goes to the model together with the tool declarations.
 * While the model answers with tool calls, they are executed and their
 * results appended; the loop ends when the model answers in text.
 */

import type { Result } from '../types/result.js';
import { ok, err } from '../types/result.js';
import { ConversationBusyError, InternalError, ValidationError } from '../types/errors.js';
import { getLog } from '../services/get-log.js';
import { getErrorMessage } from '../services/utils.js';
import { AGENT_MAX_TOOL_CALLS, AGENT_MAX_TURNS } from '../config/defaults.js';
import type {
  AgentConfig,
  CompletionRequest,
  CompletionResponse,
  Conversation,
  StreamChunk,
  TokenUsage,
  ToolCall,
  ToolChoice,
  ToolDefinition,
  ToolResult,
} from './types.js';
import type { ChatProvider, ProviderError } from './provider.js';
import { ToolRegistry } from './tools.js';
import { ConversationMemory } from './memory.js';

const log = getLog('Agent');

export interface ToolCallOutcome {
  readonly content: string;
  readonly isError: boolean;
  readonly durationMs: number;
  readonly metadata?: Record<string, unknown>;
}

export interface ExecutedToolCall {
  readonly toolCall: ToolCall;
  readonly result: ToolResult;
  readonly durationMs: number;
}

export interface AgentChatOptions {
  /** Continue this conversation; unknown ids start a new one under that id */
  conversationId?: string;
  /** Tool choice for the first model call; later calls use 'auto' */
  toolChoice?: ToolChoice;
  stream?: boolean;
  onChunk?: (chunk: StreamChunk) => void;
  onToolStart?: (toolCall: ToolCall) => void;
  onToolEnd?: (toolCall: ToolCall, outcome: ToolCallOutcome) => void;
}

export interface AgentReply {
  readonly conversationId: string;
  /** The final, tool-free model response */
  readonly response: CompletionResponse;
  readonly toolCalls: readonly ExecutedToolCall[];
  /** Usage summed over every model call of this question */
  readonly usage: TokenUsage;
  readonly turns: number;
}

export type AgentError = ProviderError | InternalError | ConversationBusyError;

export class Agent {
  readonly name: string;
  private readonly config: AgentConfig;
  private readonly provider: ChatProvider;
  private readonly tools: ToolRegistry;
  private readonly memory: ConversationMemory;
  private readonly busy = new Set<string>();

  constructor(
    config: AgentConfig,
    options: {
      provider: ChatProvider;
      tools?: ToolRegistry;
      memory?: ConversationMemory;
    }
  ) {
    this.name = config.name;
    this.config = config;
    this.provider = options.provider;
    this.tools = options.tools ?? new ToolRegistry({ timeoutMs: config.toolTimeoutMs });
    this.memory = options.memory ?? new ConversationMemory(config.memory);
  }

  isReady(): boolean {
    return this.provider.isReady();
  }

  getTools(): readonly ToolDefinition[] {
    return this.tools.getDefinitions();
  }

  getMemory(): ConversationMemory {
    return this.memory;
  }

  getConversation(conversationId: string): Conversation | undefined {
    return this.memory.get(conversationId);
  }

  /**
   * Start a fresh conversation with the agent's system prompt.
   */
  startConversation(conversationId?: string): Conversation {
    return this.memory.create(this.config.systemPrompt, { id: conversationId });
  }

  /**
   * Clear a conversation's messages. Returns false when it does not exist.
   */
  resetConversation(conversationId: string): boolean {
    return this.memory.clearMessages(conversationId);
  }

  deleteConversation(conversationId: string): boolean {
    return this.memory.delete(conversationId);
  }

  async chat(message: string, options: AgentChatOptions = {}): Promise<Result<AgentReply, AgentError>> {
    const conversation =
      (options.conversationId ? this.memory.get(options.conversationId) : undefined) ??
      this.startConversation(options.conversationId);
    const conversationId = conversation.id;

    if (this.busy.has(conversationId)) {
      return err(new ConversationBusyError(conversationId));
    }

    this.busy.add(conversationId);
    try {
      this.memory.addUserMessage(conversationId, message);
      return await this.processConversation(conversationId, options);
    } catch (error) {
      log.error('Agent loop failed', { conversationId, error: getErrorMessage(error) });
      return err(new InternalError(getErrorMessage(error), { cause: error }));
    } finally {
      this.busy.delete(conversationId);
    }
  }

  private async processConversation(
    conversationId: string,
    options: AgentChatOptions
  ): Promise<Result<AgentReply, AgentError>> {
    const maxTurns = this.config.maxTurns ?? AGENT_MAX_TURNS;
    const maxToolCalls = this.config.maxToolCalls ?? AGENT_MAX_TOOL_CALLS;
    const executed: ExecutedToolCall[] = [];
    const usage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };

    for (let turn = 1; turn <= maxTurns; turn++) {
      const request: CompletionRequest = {
        messages: this.memory.getFullContext(conversationId),
        model: this.config.model,
        tools: this.getTools(),
        toolChoice: turn === 1 ? (options.toolChoice ?? 'auto') : 'auto',
      };

      const result =
        options.stream && options.onChunk
          ? await this.streamCompletion(request, options.onChunk)
          : await this.provider.complete(request);
      if (!result.ok) {
        return result;
      }
      const response = result.value;
      if (response.usage) {
        usage.promptTokens += response.usage.promptTokens;
        usage.completionTokens += response.usage.completionTokens;
        usage.totalTokens += response.usage.totalTokens;
      }

      // Gemini can report STOP alongside function calls, so the calls decide.
      const toolCalls = response.toolCalls ?? [];
      if (toolCalls.length === 0) {
        this.memory.addAssistantMessage(conversationId, response.content);
        return ok({ conversationId, response, toolCalls: executed, usage, turns: turn });
      }

      // A recorded function call is always followed by its responses
      if (executed.length + toolCalls.length > maxToolCalls) {
        return err(new ValidationError(`Tool call limit exceeded (max ${maxToolCalls})`));
      }
      this.memory.addAssistantMessage(conversationId, response.content, toolCalls);

      log.debug(`Turn ${turn}: executing ${toolCalls.length} tool call(s)`, {
        conversationId,
        tools: toolCalls.map((tc) => tc.name),
      });

      const results = await this.executeToolCalls(conversationId, toolCalls, options);
      executed.push(...results);
      this.memory.addToolResults(
        conversationId,
        results.map((r) => r.result)
      );
    }

    return err(new ValidationError(`Maximum turns exceeded (${maxTurns})`));
  }

  private async executeToolCalls(
    conversationId: string,
    toolCalls: readonly ToolCall[],
    options: AgentChatOptions
  ): Promise<ExecutedToolCall[]> {
    const settled = await Promise.allSettled(
      toolCalls.map(async (toolCall) => {
        const startTime = Date.now();
        options.onToolStart?.(toolCall);

        const result = await this.tools.executeToolCall(toolCall, conversationId);
        const durationMs = Date.now() - startTime;

        options.onToolEnd?.(toolCall, {
          content: result.content,
          isError: result.isError ?? false,
          durationMs,
          metadata: result.metadata,
        });
        return { toolCall, result, durationMs };
      })
    );

    return settled.map((outcome, i) => {
      if (outcome.status === 'fulfilled') return outcome.value;
      const toolCall = toolCalls[i] ?? { id: 'unknown', name: 'unknown', arguments: '{}' };
      return {
        toolCall,
        durationMs: 0,
        result: {
          toolCallId: toolCall.id,
          content: `Tool execution failed: ${getErrorMessage(outcome.reason)}`,
          isError: true,
        },
      };
    });
  }

  /**
   * Stream a completion, forwarding chunks, and assemble the full response.
   */
  private async streamCompletion(
    request: CompletionRequest,
    onChunk: (chunk: StreamChunk) => void
  ): Promise<Result<CompletionResponse, ProviderError>> {
    let content = '';
    const toolCalls: ToolCall[] = [];
    let finishReason: CompletionResponse['finishReason'] = 'stop';
    let usage: CompletionResponse['usage'];
    let responseId = '';

    for await (const result of this.provider.stream(request)) {
      if (!result.ok) {
        return result;
      }

      const chunk = result.value;
      onChunk(chunk);

      if (chunk.id) responseId = chunk.id;
      if (chunk.content) content += chunk.content;
      if (chunk.finishReason) finishReason = chunk.finishReason;
      if (chunk.usage) usage = chunk.usage;
      if (chunk.toolCalls) toolCalls.push(...chunk.toolCalls);
    }

    return ok({
      id: responseId,
      content,
      toolCalls: toolCalls.length > 0 ? toolCalls : undefined,
      finishReason: toolCalls.length > 0 ? 'tool_calls' : finishReason,
      usage,
      model: request.model.model,
      createdAt: new Date(),
    });
  }
}
