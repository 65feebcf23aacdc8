/**
 * Agent types: messages, tool calling and provider requests
 */

/**
 * Message role in conversation
 */
export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

/**
 * Tool call request from the model
 */
export interface ToolCall {
  /** Unique ID for this tool call */
  readonly id: string;
  readonly name: string;
  /** Tool arguments as JSON string */
  readonly arguments: string;
  /** Provider-specific metadata (Gemini's thoughtSignature travels here) */
  readonly metadata?: Record<string, unknown>;
}

/**
 * Tool call result
 */
export interface ToolResult {
  /** Tool call ID this is responding to */
  readonly toolCallId: string;
  /** Text handed back to the model */
  readonly content: string;
  readonly isError?: boolean;
  /** Structured output kept out of the prompt (retrieved documents, counts) */
  readonly metadata?: Record<string, unknown>;
}

export interface Message {
  readonly role: MessageRole;
  readonly content: string;
  /** Tool calls (for assistant messages) */
  readonly toolCalls?: readonly ToolCall[];
  /** Tool results (for tool messages) */
  readonly toolResults?: readonly ToolResult[];
  readonly metadata?: Record<string, unknown>;
}

export interface Conversation {
  readonly id: string;
  readonly systemPrompt?: string;
  readonly messages: readonly Message[];
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly metadata?: Record<string, unknown>;
}

/**
 * Tool definition for function calling
 */
export interface ToolDefinition {
  /** Tool name (unique identifier) */
  readonly name: string;
  readonly description: string;
  /** JSON Schema for parameters */
  readonly parameters: {
    readonly type: 'object';
    readonly properties: Record<string, JSONSchemaProperty>;
    readonly required?: readonly string[];
  };
  readonly category?: string;
}

/**
 * JSON Schema property definition
 */
export interface JSONSchemaProperty {
  readonly type: 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';
  readonly description?: string;
  readonly enum?: readonly (string | number)[];
  readonly items?: JSONSchemaProperty;
  readonly properties?: Record<string, JSONSchemaProperty>;
  readonly required?: readonly string[];
  readonly default?: unknown;
  readonly minimum?: number;
  readonly maximum?: number;
  readonly additionalProperties?: boolean | JSONSchemaProperty;
}

export type ToolExecutor = (
  args: Record<string, unknown>,
  context: ToolContext
) => Promise<ToolExecutionResult>;

export interface ToolContext {
  readonly callId: string;
  readonly conversationId: string;
}

export interface ToolExecutionResult {
  /** Result content (stringified if not a string) */
  readonly content: unknown;
  readonly isError?: boolean;
  readonly metadata?: Record<string, unknown>;
}

export interface RegisteredTool {
  readonly definition: ToolDefinition;
  readonly executor: ToolExecutor;
  /** Provider name (e.g. 'knowledge') */
  readonly providerName?: string;
}

/**
 * Tool Provider - groups related tools with their executors, registered
 * in one call via ToolRegistry.registerProvider().
 */
export interface ToolProvider {
  readonly name: string;
  getTools(): Array<{ definition: ToolDefinition; executor: ToolExecutor }>;
}

export interface ModelConfig {
  /** Model identifier (e.g. "gemini-1.5-flash") */
  readonly model: string;
  /** Maximum tokens in response */
  readonly maxTokens?: number;
  readonly temperature?: number;
  readonly topP?: number;
  readonly stop?: readonly string[];
}

export type ToolChoice = 'auto' | 'none' | 'required';

export interface CompletionRequest {
  readonly messages: readonly Message[];
  readonly model: ModelConfig;
  readonly tools?: readonly ToolDefinition[];
  readonly toolChoice?: ToolChoice;
}

export interface TokenUsage {
  readonly promptTokens: number;
  readonly completionTokens: number;
  readonly totalTokens: number;
}

export type FinishReason = 'stop' | 'length' | 'tool_calls' | 'content_filter' | 'error';

export interface CompletionResponse {
  readonly id: string;
  readonly content: string;
  readonly toolCalls?: readonly ToolCall[];
  readonly finishReason: FinishReason;
  readonly usage?: TokenUsage;
  readonly model: string;
  readonly createdAt: Date;
}

export interface StreamChunk {
  readonly id: string;
  /** Delta content */
  readonly content?: string;
  /** Complete tool calls (Gemini sends each call whole) */
  readonly toolCalls?: readonly ToolCall[];
  readonly done: boolean;
  /** Only in the final chunk */
  readonly finishReason?: FinishReason;
  readonly usage?: TokenUsage;
}

export interface ModelInfo {
  /** Model id without the "models/" prefix */
  readonly id: string;
  readonly displayName: string;
  readonly description?: string;
  readonly inputTokenLimit?: number;
  readonly outputTokenLimit?: number;
  /** Supported generation methods, e.g. generateContent, embedContent */
  readonly methods: readonly string[];
}

export interface AgentConfig {
  readonly name: string;
  readonly systemPrompt: string;
  readonly model: ModelConfig;
  /** Maximum model round trips per question */
  readonly maxTurns?: number;
  /** Maximum tool calls per question */
  readonly maxToolCalls?: number;
  /** Per tool call timeout (ms) */
  readonly toolTimeoutMs?: number;
  readonly memory?: MemoryConfig;
}

export interface MemoryConfig {
  /** Maximum messages kept per conversation */
  readonly maxMessages?: number;
  /** Token budget of the context sent to the model */
  readonly maxTokens?: number;
  /** Old tool results are truncated to this many chars */
  readonly toolResultMaxChars?: number;
}
