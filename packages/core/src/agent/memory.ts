/**
 * Conversation memory
 *
 * Keeps conversations in process. The context handed to the model is cut to
 * the token budget from the oldest side, and always starts at a user turn so
 * that no function response is sent without the call it answers. The latest
 * user turn is always sent; its tool results are shortened when it alone is
 * over budget.
 */

import type { Conversation, Message, MemoryConfig, ToolCall, ToolResult } from './types.js';
import { generateId } from '../services/utils.js';
import {
  CHARS_PER_TOKEN,
  CONTEXT_WINDOW_TOKENS,
  MEMORY_MAX_MESSAGES,
  MEMORY_TOOL_RESULT_MAX_CHARS,
} from '../config/defaults.js';

const DEFAULT_MEMORY_CONFIG: Required<MemoryConfig> = {
  maxMessages: MEMORY_MAX_MESSAGES,
  maxTokens: CONTEXT_WINDOW_TOKENS,
  toolResultMaxChars: MEMORY_TOOL_RESULT_MAX_CHARS,
};

/** Messages at the end of the context whose tool results are never truncated */
const INTACT_TAIL = 4;

const TRUNCATION_MARKER = '\n[...truncated]';

export class ConversationMemory {
  private readonly conversations = new Map<string, Conversation>();
  private readonly config: Required<MemoryConfig>;

  constructor(config: MemoryConfig = {}) {
    this.config = { ...DEFAULT_MEMORY_CONFIG, ...config };
  }

  /**
   * Create a conversation. A caller-supplied id is kept, so clients can
   * resume a conversation the server forgot after a restart.
   */
  create(systemPrompt?: string, options: { id?: string; metadata?: Record<string, unknown> } = {}): Conversation {
    const now = new Date();
    const conversation: Conversation = {
      id: options.id ?? generateId('conv'),
      systemPrompt,
      messages: [],
      createdAt: now,
      updatedAt: now,
      metadata: options.metadata,
    };

    this.conversations.set(conversation.id, conversation);
    return conversation;
  }

  get(id: string): Conversation | undefined {
    return this.conversations.get(id);
  }

  /**
   * Append a message, dropping the oldest ones past maxMessages.
   */
  addMessage(conversationId: string, message: Message): Conversation | undefined {
    const conversation = this.conversations.get(conversationId);
    if (!conversation) return undefined;

    let messages = [...conversation.messages, message];
    if (messages.length > this.config.maxMessages) {
      messages = messages.slice(messages.length - this.config.maxMessages);
    }

    const updated: Conversation = { ...conversation, messages, updatedAt: new Date() };
    this.conversations.set(conversationId, updated);
    return updated;
  }

  addUserMessage(conversationId: string, content: string): Conversation | undefined {
    return this.addMessage(conversationId, { role: 'user', content });
  }

  addAssistantMessage(
    conversationId: string,
    content: string,
    toolCalls?: readonly ToolCall[],
    metadata?: Record<string, unknown>
  ): Conversation | undefined {
    return this.addMessage(conversationId, { role: 'assistant', content, toolCalls, metadata });
  }

  addToolResults(conversationId: string, results: readonly ToolResult[]): Conversation | undefined {
    return this.addMessage(conversationId, { role: 'tool', content: '', toolResults: results });
  }

  /**
   * Messages that fit the token budget, newest kept first.
   */
  getContextMessages(conversationId: string): readonly Message[] {
    const conversation = this.conversations.get(conversationId);
    if (!conversation) return [];

    const messages = this.truncateOldToolResults(conversation.messages);
    const budget = this.config.maxTokens - this.estimateText(conversation.systemPrompt ?? '');

    const lastUser = messages.findLastIndex((msg) => msg.role === 'user');
    if (lastUser === -1) return [];

    const current = this.fitToBudget(messages.slice(lastUser), budget);
    let tokenCount = current.reduce((sum, msg) => sum + this.estimateTokens(msg), 0);
    let startIndex = lastUser;
    for (let i = lastUser - 1; i >= 0; i--) {
      const msg = messages[i];
      if (!msg) continue;
      const msgTokens = this.estimateTokens(msg);
      if (tokenCount + msgTokens > budget) break;
      tokenCount += msgTokens;
      startIndex = i;
    }

    // Never open the context in the middle of a tool exchange.
    while (startIndex < lastUser && messages[startIndex]?.role !== 'user') {
      startIndex++;
    }

    return [...messages.slice(startIndex, lastUser), ...current];
  }

  /**
   * Context messages with the system prompt in front.
   */
  getFullContext(conversationId: string): readonly Message[] {
    const conversation = this.conversations.get(conversationId);
    if (!conversation) return [];

    const contextMessages = this.getContextMessages(conversationId);
    if (conversation.systemPrompt) {
      return [{ role: 'system', content: conversation.systemPrompt }, ...contextMessages];
    }
    return contextMessages;
  }

  private truncateOldToolResults(messages: readonly Message[]): readonly Message[] {
    if (messages.length <= INTACT_TAIL) return messages;

    const limit = this.config.toolResultMaxChars;
    const cutoff = messages.length - INTACT_TAIL;

    return messages.map((msg, i) => (i >= cutoff ? msg : truncateToolResults(msg, limit)));
  }

  /**
   * Shorten the tool results of one exchange so that it fits the budget,
   * sharing the room left by the other content evenly between results.
   */
  private fitToBudget(exchange: readonly Message[], budget: number): readonly Message[] {
    const total = exchange.reduce((sum, msg) => sum + this.estimateTokens(msg), 0);
    const resultCount = exchange.reduce((sum, msg) => sum + (msg.toolResults?.length ?? 0), 0);
    if (total <= budget || resultCount === 0) return exchange;

    const fixed = exchange.reduce((sum, msg) => sum + this.estimateTokens(truncateToolResults(msg, 0, '')), 0);
    const room = Math.max(0, budget - fixed) * CHARS_PER_TOKEN;
    const share = Math.max(0, Math.floor(room / resultCount) - TRUNCATION_MARKER.length);

    return exchange.map((msg) => truncateToolResults(msg, share));
  }

  private estimateText(text: string): number {
    return Math.ceil(text.length / CHARS_PER_TOKEN);
  }

  /**
   * Rough token estimate; tool calls and results carry ~50 chars of framing each.
   */
  estimateTokens(message: Message): number {
    let chars = message.content.length;
    for (const tc of message.toolCalls ?? []) {
      chars += tc.name.length + tc.arguments.length + 50;
    }
    for (const tr of message.toolResults ?? []) {
      chars += tr.content.length + 50;
    }
    return Math.ceil(chars / CHARS_PER_TOKEN);
  }

  clearMessages(conversationId: string): boolean {
    const conversation = this.conversations.get(conversationId);
    if (!conversation) return false;

    this.conversations.set(conversationId, { ...conversation, messages: [], updatedAt: new Date() });
    return true;
  }

  delete(conversationId: string): boolean {
    return this.conversations.delete(conversationId);
  }

  /**
   * Drop conversations idle since before `cutoff`. Returns how many were removed.
   */
  prune(cutoff: Date): number {
    let removed = 0;
    for (const [id, conversation] of this.conversations) {
      if (conversation.updatedAt < cutoff) {
        this.conversations.delete(id);
        removed++;
      }
    }
    return removed;
  }
}

function truncateToolResults(message: Message, limit: number, marker = TRUNCATION_MARKER): Message {
  if (!message.toolResults || message.toolResults.length === 0) return message;

  const toolResults = message.toolResults.map((tr) =>
    tr.content.length <= limit ? tr : { ...tr, content: tr.content.slice(0, limit) + marker }
  );
  return { ...message, toolResults };
}
