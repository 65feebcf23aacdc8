export { RagChatbot } from './rag-chatbot.js';
export type {
  AskOptions,
  ChatAnswer,
  ChatEvent,
  Citation,
  RagChatbotOptions,
  ToolCallSummary,
} from './rag-chatbot.js';
export { BASE_SYSTEM_PROMPT, EMPTY_ANSWER_FALLBACK, buildSystemPrompt } from './prompts.js';
export { createGoogleProvider, createKnowledgeBase, createRagChatbot } from './factory.js';
export type { ChatbotDependencies } from './factory.js';
