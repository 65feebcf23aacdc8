/**
 * HTTP server bootstrap
 *
 * Registers the log service, builds the chatbot from Settings, serves the
 * Hono app and prunes idle conversations until shutdown.
 */

import { serve } from '@hono/node-server';
import type { ServerType } from '@hono/node-server';
import {
  createRagChatbot,
  getErrorMessage,
  getServiceRegistry,
  hasServiceRegistry,
  initServiceRegistry,
  Services,
  type RagChatbot,
  type Settings,
} from '@wetlands/core';
import { createApp, defaultGatewayConfig } from './app.js';
import { createLogService } from './services/log-service-impl.js';
import { getLog } from './services/log.js';
import type { GatewayConfig } from './types/index.js';
import {
  CONVERSATION_PRUNE_INTERVAL_MS,
  CONVERSATION_TTL_MS,
  SHUTDOWN_TIMEOUT_MS,
} from './config/defaults.js';

export interface StartServerOptions {
  /** Use this chatbot instead of building one from settings */
  chatbot?: RagChatbot;
  /** Install SIGINT/SIGTERM handlers (default true) */
  handleSignals?: boolean;
}

export interface RunningServer {
  server: ServerType;
  chatbot: RagChatbot;
  config: GatewayConfig;
  close(): Promise<void>;
}

/**
 * Route getLog() through the structured log service.
 */
export function registerLogService(settings: Settings, env: NodeJS.ProcessEnv = process.env): void {
  const registry = hasServiceRegistry() ? getServiceRegistry() : initServiceRegistry();
  registry.register(
    Services.Log,
    createLogService({ level: settings.logLevel, json: env.LOG_FORMAT === 'json' ? true : undefined })
  );
}

export async function startServer(settings: Settings, options: StartServerOptions = {}): Promise<RunningServer> {
  registerLogService(settings);
  const log = getLog('Server');

  let chatbot = options.chatbot;
  if (!chatbot) {
    const built = await createRagChatbot(settings);
    if (!built.ok) throw built.error;
    chatbot = built.value;
  }

  const config: GatewayConfig = {
    ...defaultGatewayConfig(),
    port: settings.server.port,
    host: settings.server.host,
  };
  config.corsOrigins = [
    `http://localhost:${config.port}`,
    `http://127.0.0.1:${config.port}`,
    ...settings.server.corsOrigins,
  ];

  if (!chatbot.isReady()) {
    log.warn(`GOOGLE_API_KEY not found in ${settings.secretsPath} or the environment; questions will fail until it is set.`);
  }
  if (chatbot.knowledge.isEmpty) {
    log.warn(`No documents loaded from ${settings.knowledge.documentsDir}`);
  }
  if (config.host !== '127.0.0.1' && config.host !== 'localhost') {
    log.warn(`Listening on ${config.host}; the API has no authentication.`);
  }

  const stats = chatbot.knowledge.stats();
  log.info('Starting wetlands assistant...', {
    port: config.port,
    host: config.host,
    model: chatbot.model,
    documents: stats.documents,
    chunks: stats.chunks,
    embeddings: stats.embeddings,
  });

  const app = createApp({ chatbot, config });
  const activeChatbot = chatbot;

  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    log.info(`Server running at http://${info.address}:${info.port}`);
    log.info(`Health: http://${info.address}:${info.port}/health`);
  });

  const pruneTimer = setInterval(() => {
    const removed = activeChatbot.pruneConversations(CONVERSATION_TTL_MS);
    if (removed > 0) log.debug(`Pruned ${removed} idle conversations`);
  }, CONVERSATION_PRUNE_INTERVAL_MS);
  pruneTimer.unref();

  let closing: Promise<void> | undefined;
  const close = (): Promise<void> => {
    closing ??= new Promise<void>((resolve, reject) => {
      clearInterval(pruneTimer);
      server.close((error) => (error ? reject(error) : resolve()));
    });
    return closing;
  };

  if (options.handleSignals !== false) {
    const gracefulShutdown = (signal: string): void => {
      log.info(`Received ${signal}, shutting down gracefully...`);
      setTimeout(() => process.exit(0), SHUTDOWN_TIMEOUT_MS).unref();
      close().then(
        () => {
          log.info('Cleanup complete, exiting.');
          process.exit(0);
        },
        (error: unknown) => {
          log.error('Shutdown failed', { error: getErrorMessage(error) });
          process.exit(1);
        }
      );
    };
    process.once('SIGINT', () => gracefulShutdown('SIGINT'));
    process.once('SIGTERM', () => gracefulShutdown('SIGTERM'));
    process.on('unhandledRejection', (reason) => {
      log.error('Unhandled Promise Rejection', { reason: String(reason) });
    });
  }

  return { server, chatbot: activeChatbot, config, close };
}
