/**
 * Tool registry: the functions the model may call, and their execution.
 *
 * Executions never throw to the caller. Bad arguments, unknown names,
 * executor exceptions and timeouts all come back as ToolResults with
 * `isError` set, so the model can read the failure and recover.
 */

import type { Result } from '../types/result.js';
import { ok, err } from '../types/result.js';
import { ValidationError, NotFoundError, InternalError, TimeoutError } from '../types/errors.js';
import { getLog } from '../services/get-log.js';
import { generateId, getErrorMessage } from '../services/utils.js';
import { TOOL_TIMEOUT_MS } from '../config/defaults.js';
import type {
  ToolDefinition,
  ToolExecutor,
  RegisteredTool,
  ToolContext,
  ToolExecutionResult,
  ToolCall,
  ToolResult,
  ToolProvider,
} from './types.js';

const log = getLog('ToolRegistry');

const TOOL_NAME_PATTERN = /^[a-zA-Z][a-zA-Z0-9_]*$/;

export interface ToolRegistryOptions {
  /** Per-execution timeout (ms); 0 disables it */
  timeoutMs?: number;
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();
  private readonly timeoutMs: number;

  constructor(options: ToolRegistryOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? TOOL_TIMEOUT_MS;
  }

  register(
    definition: ToolDefinition,
    executor: ToolExecutor,
    providerName?: string
  ): Result<string, ValidationError> {
    if (!definition.name || definition.name.length > 64) {
      return err(new ValidationError('Tool name must be 1-64 characters'));
    }
    if (!TOOL_NAME_PATTERN.test(definition.name)) {
      return err(
        new ValidationError('Tool name must start with a letter and contain only alphanumeric characters and underscores')
      );
    }
    if (this.tools.has(definition.name)) {
      return err(new ValidationError(`Tool already registered: ${definition.name}`));
    }

    this.tools.set(definition.name, { definition, executor, providerName });
    log.debug(`Registered tool ${definition.name}`, providerName ? { provider: providerName } : undefined);
    return ok(definition.name);
  }

  /**
   * Register every tool of a provider. Rejected registrations are logged and skipped.
   */
  registerProvider(provider: ToolProvider): number {
    let registered = 0;
    for (const { definition, executor } of provider.getTools()) {
      const result = this.register(definition, executor, provider.name);
      if (result.ok) {
        registered++;
      } else {
        log.warn(`Skipped tool from provider ${provider.name}: ${result.error.message}`);
      }
    }
    return registered;
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Definitions sent to the model as function declarations.
   */
  getDefinitions(): readonly ToolDefinition[] {
    return Array.from(this.tools.values(), (tool) => tool.definition);
  }

  getNames(): readonly string[] {
    return Array.from(this.tools.keys());
  }

  /**
   * Run a tool by name with parsed arguments.
   */
  async execute(
    name: string,
    args: Record<string, unknown>,
    context: Omit<ToolContext, 'callId'> & { callId?: string }
  ): Promise<Result<ToolExecutionResult, NotFoundError | InternalError | TimeoutError>> {
    const tool = this.tools.get(name);
    if (!tool) {
      return err(new NotFoundError('Tool', name));
    }

    const fullContext: ToolContext = {
      callId: context.callId ?? generateId('call'),
      conversationId: context.conversationId,
    };

    let timer: NodeJS.Timeout | undefined;
    try {
      const execution = tool.executor(args, fullContext);
      if (this.timeoutMs <= 0) {
        return ok(await execution);
      }

      const timeout = new Promise<'timeout'>((resolve) => {
        timer = setTimeout(() => resolve('timeout'), this.timeoutMs);
      });
      const outcome = await Promise.race([execution, timeout]);
      if (outcome === 'timeout') {
        return err(new TimeoutError(`tool ${name}`, this.timeoutMs));
      }
      return ok(outcome);
    } catch (error) {
      return err(new InternalError(`Tool execution failed: ${getErrorMessage(error)}`, { cause: error }));
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Execute a model-issued tool call and shape the outcome as a ToolResult.
   */
  async executeToolCall(toolCall: ToolCall, conversationId: string): Promise<ToolResult> {
    const startTime = Date.now();

    let args: Record<string, unknown>;
    try {
      args = parseArguments(toolCall.arguments);
    } catch (error) {
      log.warn(`Invalid arguments for ${toolCall.name}`, { error: getErrorMessage(error) });
      return {
        toolCallId: toolCall.id,
        content: `Error: Invalid JSON arguments: ${toolCall.arguments}`,
        isError: true,
      };
    }

    if (!this.tools.has(toolCall.name)) {
      const available = this.getNames().join(', ');
      log.warn(`Model called unknown tool ${toolCall.name}`);
      return {
        toolCallId: toolCall.id,
        content: `Error: Unknown tool: ${toolCall.name}. Available tools: ${available || 'none'}`,
        isError: true,
      };
    }

    log.info(`Calling ${toolCall.name}`, { callId: toolCall.id, args });
    const result = await this.execute(toolCall.name, args, { callId: toolCall.id, conversationId });
    const durationMs = Date.now() - startTime;

    if (!result.ok) {
      log.error(`Tool ${toolCall.name} failed`, { durationMs, error: result.error.message });
      return {
        toolCallId: toolCall.id,
        content: `Error: ${result.error.message}`,
        isError: true,
      };
    }

    const rawContent = result.value.content;
    const content =
      rawContent === undefined || rawContent === null
        ? ''
        : typeof rawContent === 'string'
          ? rawContent
          : JSON.stringify(rawContent);

    log.info(`Tool ${toolCall.name} finished`, {
      durationMs,
      success: !result.value.isError,
      resultLength: content.length,
    });

    return {
      toolCallId: toolCall.id,
      content,
      isError: result.value.isError,
      metadata: result.value.metadata,
    };
  }
}

/**
 * Parse a tool call's JSON arguments. Empty input means no arguments.
 */
function parseArguments(raw: string): Record<string, unknown> {
  if (!raw.trim()) return {};
  const parsed: unknown = JSON.parse(raw);
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error('Arguments must be a JSON object');
  }
  return Object.fromEntries(Object.entries(parsed));
}
