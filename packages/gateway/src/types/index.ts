/**
 * Gateway types
 */

/**
 * API response wrapper
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiError;
  meta?: ResponseMeta;
}

/**
 * API error structure
 */
export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface ResponseMeta {
  requestId: string;
  timestamp: string;
}

export interface HealthCheck {
  name: string;
  status: 'pass' | 'warn' | 'fail';
  message?: string;
}

export interface HealthResponse {
  status: 'healthy' | 'degraded';
  version: string;
  /** Seconds since the gateway started */
  uptime: number;
  model: string;
  apiKeyConfigured: boolean;
  documents: number;
  chunks: number;
  embeddings: boolean;
  checks: HealthCheck[];
}

/**
 * Serialized conversation for GET /api/v1/chat/conversations/:id
 */
export interface ConversationInfo {
  id: string;
  messages: Array<{
    role: string;
    content: string;
    toolCalls?: Array<{ name: string; arguments: string }>;
  }>;
  createdAt: string;
  updatedAt: string;
}

export interface GatewayConfig {
  port: number;
  host: string;
  corsOrigins: string[];
  /** Maximum request body (bytes) */
  maxBodyBytes?: number;
  /** Serve public/index.html at / (default true) */
  serveChatPage?: boolean;
}
