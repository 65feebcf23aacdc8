/**
 * Build the chatbot and its dependencies from Settings.
 */

import type { Result } from '../types/result.js';
import { ok } from '../types/result.js';
import type { ConfigurationError } from '../types/errors.js';
import type { Settings } from '../config/settings.js';
import { GoogleProvider } from '../agent/providers/google.js';
import type { ChatProvider, Embedder } from '../agent/provider.js';
import { KnowledgeBase } from '../knowledge/knowledge-base.js';
import { RagChatbot } from './rag-chatbot.js';

export function createGoogleProvider(settings: Settings): GoogleProvider {
  return new GoogleProvider({
    apiKey: settings.apiKey,
    baseUrl: settings.gemini.baseUrl,
    defaultModel: settings.gemini.model,
    embeddingModel: settings.gemini.embeddingModel,
    timeoutMs: settings.gemini.timeoutMs,
  });
}

/**
 * Load the documents directory. Chunks are embedded only when embeddings are
 * enabled and an embedder is given.
 */
export function createKnowledgeBase(
  settings: Settings,
  embedder?: Embedder
): Promise<Result<KnowledgeBase, ConfigurationError>> {
  return KnowledgeBase.build({
    documentsDir: settings.knowledge.documentsDir,
    recursive: settings.knowledge.recursive,
    relevanceThreshold: settings.knowledge.relevanceThreshold,
    embedder: settings.knowledge.embeddingsEnabled ? embedder : undefined,
  });
}

export interface ChatbotDependencies {
  provider?: ChatProvider & Embedder;
  knowledge?: KnowledgeBase;
}

/**
 * Provider, knowledge base and chatbot in one step. Without an API key the
 * knowledge base is built for keyword retrieval and the chatbot reports the
 * missing key when asked.
 */
export async function createRagChatbot(
  settings: Settings,
  deps: ChatbotDependencies = {}
): Promise<Result<RagChatbot, ConfigurationError>> {
  const provider = deps.provider ?? createGoogleProvider(settings);

  let knowledge = deps.knowledge;
  if (!knowledge) {
    const built = await createKnowledgeBase(settings, provider.isReady() ? provider : undefined);
    if (!built.ok) return built;
    knowledge = built.value;
  }

  return ok(
    new RagChatbot({
      provider,
      knowledge,
      model: {
        model: settings.gemini.model,
        temperature: settings.gemini.temperature,
        maxTokens: settings.gemini.maxOutputTokens,
      },
      contextWindowTokens: settings.gemini.contextWindow,
      secretsPath: settings.secretsPath,
    })
  );
}
