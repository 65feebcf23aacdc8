/**
 * Agent module: Gemini provider, function-calling loop, memory and tools.
 */

export type {
  MessageRole,
  Message,
  Conversation,
  ToolDefinition,
  JSONSchemaProperty,
  ToolCall,
  ToolResult,
  ToolExecutor,
  ToolContext,
  ToolExecutionResult,
  RegisteredTool,
  ToolProvider,
  ModelConfig,
  ToolChoice,
  CompletionRequest,
  CompletionResponse,
  TokenUsage,
  FinishReason,
  StreamChunk,
  ModelInfo,
  AgentConfig,
  MemoryConfig,
} from './types.js';

export type { ChatProvider, Embedder, EmbeddingTask, ProviderError } from './provider.js';

export * from './providers/index.js';

export { ToolRegistry } from './tools.js';
export type { ToolRegistryOptions } from './tools.js';

export { ConversationMemory } from './memory.js';

export { Agent } from './agent.js';
export type { AgentChatOptions, AgentError, AgentReply, ExecutedToolCall, ToolCallOutcome } from './agent.js';

export * from './tools/knowledge-tools.js';
