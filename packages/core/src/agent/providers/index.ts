export { GoogleProvider, sanitizeGeminiSchema } from './google.js';
export type { GoogleProviderConfig } from './google.js';
