/**
 * @wetlands/core
 *
 * Retrieval-augmented question answering over a folder of documents,
 * using Gemini function calling.
 *
 * @packageDocumentation
 */

// Types
export * from './types/index.js';

// Services (ServiceRegistry, logging, utilities)
export * from './services/index.js';

// Configuration
export * from './config/index.js';

// Agent
export * from './agent/index.js';

// Knowledge base
export * from './knowledge/index.js';

// Chatbot
export * from './chatbot/index.js';

export const VERSION = '0.3.0';
