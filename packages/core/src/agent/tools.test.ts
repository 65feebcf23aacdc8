import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ToolRegistry } from './tools.js';
import type { ToolDefinition, ToolProvider } from './types.js';

vi.mock('../services/get-log.js', () => ({
  getLog: () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), child: vi.fn() }),
}));

function definition(name: string): ToolDefinition {
  return {
    name,
    description: `Test tool ${name}`,
    parameters: { type: 'object', properties: { query: { type: 'string' } } },
  };
}

describe('ToolRegistry', () => {
  let registry: ToolRegistry;

  beforeEach(() => {
    registry = new ToolRegistry();
  });

  describe('register', () => {
    it('registers a tool and exposes its definition', () => {
      const result = registry.register(definition('echo'), async (args) => ({ content: args }));

      expect(result).toEqual({ ok: true, value: 'echo' });
      expect(registry.has('echo')).toBe(true);
      expect(registry.getDefinitions().map((d) => d.name)).toEqual(['echo']);
    });

    it('rejects invalid names and duplicates', () => {
      const executor = async () => ({ content: '' });

      const invalid = registry.register(definition('1bad-name'), executor);
      expect(invalid.ok).toBe(false);

      registry.register(definition('echo'), executor);
      const duplicate = registry.register(definition('echo'), executor);
      expect(duplicate.ok).toBe(false);
      if (!duplicate.ok) expect(duplicate.error.message).toBe('Tool already registered: echo');
    });

    it('registers every tool of a provider', () => {
      const provider: ToolProvider = {
        name: 'test',
        getTools: () => [
          { definition: definition('one'), executor: async () => ({ content: '1' }) },
          { definition: definition('two'), executor: async () => ({ content: '2' }) },
          { definition: definition('one'), executor: async () => ({ content: 'dup' }) },
        ],
      };

      expect(registry.registerProvider(provider)).toBe(2);
      expect(registry.get('two')?.providerName).toBe('test');
    });
  });

  describe('executeToolCall', () => {
    it('parses arguments and stringifies object content', async () => {
      registry.register(definition('echo'), async (args, context) => ({
        content: { args, conversationId: context.conversationId, callId: context.callId },
        metadata: { count: 1 },
      }));

      const result = await registry.executeToolCall({ id: 'call_1', name: 'echo', arguments: '{"query":"peat"}' }, 'conv_1');

      expect(result).toEqual({
        toolCallId: 'call_1',
        content: '{"args":{"query":"peat"},"conversationId":"conv_1","callId":"call_1"}',
        isError: undefined,
        metadata: { count: 1 },
      });
    });

    it('treats empty arguments as an empty object', async () => {
      const executor = vi.fn(async () => ({ content: 'listed' }));
      registry.register(definition('list'), executor);

      const result = await registry.executeToolCall({ id: 'c', name: 'list', arguments: '' }, 'conv');

      expect(result.content).toBe('listed');
      expect(executor).toHaveBeenCalledWith({}, expect.objectContaining({ conversationId: 'conv' }));
    });

    it('reports invalid JSON arguments', async () => {
      registry.register(definition('echo'), async () => ({ content: 'x' }));

      const result = await registry.executeToolCall({ id: 'c', name: 'echo', arguments: '{oops' }, 'conv');

      expect(result).toEqual({ toolCallId: 'c', content: 'Error: Invalid JSON arguments: {oops', isError: true });
    });

    it('reports unknown tools with the available names', async () => {
      registry.register(definition('echo'), async () => ({ content: 'x' }));

      const result = await registry.executeToolCall({ id: 'c', name: 'missing', arguments: '{}' }, 'conv');

      expect(result.isError).toBe(true);
      expect(result.content).toBe('Error: Unknown tool: missing. Available tools: echo');
    });

    it('turns executor exceptions into error results', async () => {
      registry.register(definition('broken'), async () => {
        throw new Error('index unavailable');
      });

      const result = await registry.executeToolCall({ id: 'c', name: 'broken', arguments: '{}' }, 'conv');

      expect(result).toEqual({
        toolCallId: 'c',
        content: 'Error: Tool execution failed: index unavailable',
        isError: true,
      });
    });

    it('times out slow executors', async () => {
      const slow = new ToolRegistry({ timeoutMs: 10 });
      slow.register(definition('slow'), () => new Promise(() => {}));

      const result = await slow.executeToolCall({ id: 'c', name: 'slow', arguments: '{}' }, 'conv');

      expect(result).toEqual({
        toolCallId: 'c',
        content: 'Error: Operation timed out after 10ms: tool slow',
        isError: true,
      });
    });
  });
});
