import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { ModelRouterConfig, ModelRequest, ModelStreamEvent } from '../model-types.js';
import { ProtocolError, TransientError } from '../errors.js';
import { delay } from '../abort.js';

// ---------------------------------------------------------------------------
// Mock Anthropic SDK
// ---------------------------------------------------------------------------

const { mockMessagesCreate, mockMessagesStream, mockOpenAICreate } = vi.hoisted(() => ({
  mockMessagesCreate: vi.fn(),
  mockMessagesStream: vi.fn(),
  mockOpenAICreate: vi.fn(),
}));

vi.mock('@anthropic-ai/sdk', () => ({
  default: vi.fn().mockImplementation(() => ({
    messages: {
      create: mockMessagesCreate,
      stream: mockMessagesStream,
    },
  })),
}));

// ---------------------------------------------------------------------------
// Mock openai SDK (OpenAI-compatible / Ollama adapter)
// ---------------------------------------------------------------------------

vi.mock('openai', () => ({
  default: vi.fn().mockImplementation(() => ({
    chat: {
      completions: {
        create: mockOpenAICreate,
      },
    },
  })),
}));

// ---------------------------------------------------------------------------
// Import after mocks
// ---------------------------------------------------------------------------

import { ModelRouter, classifyModelError, toAnthropicMessages, toOpenAIMessages } from '../model-router.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeConfig(overrides?: Partial<ModelRouterConfig>): ModelRouterConfig {
  return {
    providers: {
      anthropic: { provider: 'anthropic', apiKey: 'test-key' },
      ollama: { provider: 'ollama', baseURL: 'http://localhost:11434/v1' },
    },
    models: [
      { id: 'sonnet', modelName: 'claude-sonnet-4-20250514', provider: 'anthropic', maxTokens: 4096 },
      { id: 'llama', modelName: 'llama3:8b', provider: 'ollama', maxTokens: 2048 },
    ],
    roles: { agent: 'sonnet', task: 'llama' },
    retry: { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 },
    ...overrides,
  };
}

const anthropicText = {
  content: [{ type: 'text', text: 'Hello from the model' }],
  stop_reason: 'end_turn',
  model: 'claude-sonnet-4-20250514',
  usage: { input_tokens: 10, output_tokens: 20 },
};

function makeRequest(overrides?: Partial<ModelRequest>): ModelRequest {
  return {
    messages: [{ role: 'user', content: 'Hi' }],
    ...overrides,
  };
}

function httpError(message: string, status: number): Error {
  return Object.assign(new Error(message), { status });
}

function anthropicStream(events: unknown[], finalMessage: unknown, failAfter?: Error) {
  return {
    async *[Symbol.asyncIterator]() {
      for (const event of events) yield event;
      if (failAfter) throw failAfter;
    },
    finalMessage: vi.fn().mockResolvedValue(finalMessage),
  };
}

/** Yields one text delta per gap, waiting the gap first; honours the abort signal like the SDK does. */
function slowAnthropicStream(gapsMs: number[], signal: AbortSignal) {
  return {
    async *[Symbol.asyncIterator]() {
      for (const [i, gap] of gapsMs.entries()) {
        await delay(gap, signal);
        yield { type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: `part${i}` } };
      }
    },
    finalMessage: vi.fn().mockResolvedValue(anthropicText),
  };
}

async function collect(stream: AsyncGenerator<ModelStreamEvent>): Promise<ModelStreamEvent[]> {
  const events: ModelStreamEvent[] = [];
  for await (const event of stream) events.push(event);
  return events;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('ModelRouter', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('request()', () => {
    it('resolves the agent role and normalizes a text response', async () => {
      mockMessagesCreate.mockResolvedValue(anthropicText);
      const router = await ModelRouter.create(makeConfig());

      const response = await router.request(makeRequest());

      expect(mockMessagesCreate).toHaveBeenCalledWith(
        expect.objectContaining({ model: 'claude-sonnet-4-20250514', max_tokens: 4096 }),
        expect.objectContaining({ signal: expect.any(AbortSignal) }),
      );
      expect(response).toEqual({
        text: 'Hello from the model',
        toolCalls: [],
        stopReason: 'end_turn',
        model: 'claude-sonnet-4-20250514',
        usage: { inputTokens: 10, outputTokens: 20 },
      });
    });

    it('returns tool_use blocks as tool calls with serialized arguments', async () => {
      mockMessagesCreate.mockResolvedValue({
        ...anthropicText,
        content: [{ type: 'tool_use', id: 'tu_1', name: 'list_files', input: { path: '/tmp' } }],
        stop_reason: 'tool_use',
      });
      const router = await ModelRouter.create(makeConfig());

      const response = await router.request(makeRequest());

      expect(response.text).toBe('');
      expect(response.toolCalls).toEqual([{ id: 'tu_1', name: 'list_files', arguments: '{"path":"/tmp"}' }]);
      expect(response.stopReason).toBe('tool_use');
    });

    it('passes tool definitions in the provider format', async () => {
      mockMessagesCreate.mockResolvedValue(anthropicText);
      const router = await ModelRouter.create(makeConfig());

      await router.request(
        makeRequest({
          tools: [{ name: 'list_files', description: 'List files', inputSchema: { type: 'object', properties: {} } }],
        }),
      );

      expect(mockMessagesCreate.mock.calls[0][0].tools).toEqual([
        { name: 'list_files', description: 'List files', input_schema: { type: 'object', properties: {} } },
      ]);
    });

    it('retries transient failures and then succeeds', async () => {
      mockMessagesCreate.mockRejectedValueOnce(httpError('overloaded', 529)).mockResolvedValueOnce(anthropicText);
      const router = await ModelRouter.create(makeConfig());

      const response = await router.request(makeRequest());

      expect(mockMessagesCreate).toHaveBeenCalledTimes(2);
      expect(response.text).toBe('Hello from the model');
    });

    it('escalates to ProtocolError once retries are exhausted', async () => {
      mockMessagesCreate.mockRejectedValue(httpError('unavailable', 503));
      const router = await ModelRouter.create(makeConfig());

      const error = await router.request(makeRequest()).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ProtocolError);
      expect(error).toMatchObject({
        message: 'model call failed after 3 attempt(s): model service returned 503: unavailable',
      });
      expect(mockMessagesCreate).toHaveBeenCalledTimes(3);
    });

    it('does not retry a rejected request', async () => {
      mockMessagesCreate.mockRejectedValue(httpError('bad request', 400));
      const router = await ModelRouter.create(makeConfig());

      await expect(router.request(makeRequest())).rejects.toBeInstanceOf(ProtocolError);
      expect(mockMessagesCreate).toHaveBeenCalledTimes(1);
    });

    it('throws ProtocolError on an invalid response shape', async () => {
      mockMessagesCreate.mockResolvedValue({ stop_reason: 'end_turn', model: 'claude-sonnet-4-20250514' });
      const router = await ModelRouter.create(makeConfig());

      await expect(router.request(makeRequest())).rejects.toThrow('invalid response shape');
      expect(mockMessagesCreate).toHaveBeenCalledTimes(1);
    });

    it('throws for an unknown model override', async () => {
      const router = await ModelRouter.create(makeConfig());
      await expect(router.request(makeRequest({ modelOverride: 'missing' }))).rejects.toThrow(
        "unknown model id 'missing' for role 'agent'",
      );
    });

    it('lazily creates the OpenAI-compatible adapter and reads tool calls', async () => {
      mockOpenAICreate.mockResolvedValue({
        choices: [
          {
            message: {
              content: null,
              tool_calls: [
                { id: 'call_1', type: 'function', function: { name: 'run_command', arguments: '{"command":"ls"}' } },
              ],
            },
            finish_reason: 'tool_calls',
          },
        ],
        model: 'llama3:8b',
        usage: { prompt_tokens: 5, completion_tokens: 10 },
      });
      const router = await ModelRouter.create(makeConfig());

      const response = await router.request(makeRequest({ role: 'task' }));

      expect(mockOpenAICreate).toHaveBeenCalledWith(
        expect.objectContaining({ model: 'llama3:8b', max_tokens: 2048 }),
        expect.anything(),
      );
      expect(response).toEqual({
        text: '',
        toolCalls: [{ id: 'call_1', name: 'run_command', arguments: '{"command":"ls"}' }],
        stopReason: 'tool_use',
        model: 'llama3:8b',
        usage: { inputTokens: 5, outputTokens: 10 },
      });
    });
  });

  describe('stream()', () => {
    it('yields text deltas and keyed tool-call fragments from Anthropic events', async () => {
      mockMessagesStream.mockReturnValue(
        anthropicStream(
          [
            { type: 'content_block_start', index: 0, content_block: { type: 'text', text: '' } },
            { type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: 'Checking' } },
            { type: 'content_block_stop', index: 0 },
            { type: 'content_block_start', index: 1, content_block: { type: 'tool_use', id: 'tu_1', name: 'list_files', input: {} } },
            { type: 'content_block_delta', index: 1, delta: { type: 'input_json_delta', partial_json: '{"path":' } },
            { type: 'content_block_delta', index: 1, delta: { type: 'input_json_delta', partial_json: '"/tmp"}' } },
            { type: 'content_block_stop', index: 1 },
            { type: 'message_delta', delta: { stop_reason: 'tool_use' }, usage: { output_tokens: 4 } },
          ],
          { ...anthropicText, stop_reason: 'tool_use', usage: { input_tokens: 3, output_tokens: 4 } },
        ),
      );
      const router = await ModelRouter.create(makeConfig());

      const events = await collect(router.stream(makeRequest()));

      expect(events).toEqual([
        { type: 'text_delta', text: 'Checking' },
        { type: 'tool_call_start', id: 'tu_1', name: 'list_files' },
        { type: 'tool_call_delta', id: 'tu_1', fragment: '{"path":' },
        { type: 'tool_call_delta', id: 'tu_1', fragment: '"/tmp"}' },
        { type: 'tool_call_end', id: 'tu_1' },
        {
          type: 'message_done',
          stopReason: 'tool_use',
          model: 'claude-sonnet-4-20250514',
          usage: { inputTokens: 3, outputTokens: 4 },
        },
      ]);
    });

    it('retries a stream that fails before yielding anything', async () => {
      mockMessagesStream
        .mockImplementationOnce(() => {
          throw new Error('Connection error.');
        })
        .mockReturnValueOnce(
          anthropicStream(
            [{ type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: 'Hi' } }],
            anthropicText,
          ),
        );
      const router = await ModelRouter.create(makeConfig());

      const events = await collect(router.stream(makeRequest()));

      expect(mockMessagesStream).toHaveBeenCalledTimes(2);
      expect(events[0]).toEqual({ type: 'text_delta', text: 'Hi' });
    });

    it('does not restart a stream that already yielded events', async () => {
      mockMessagesStream.mockReturnValue(
        anthropicStream(
          [{ type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: 'partial' } }],
          anthropicText,
          httpError('reset', 502),
        ),
      );
      const router = await ModelRouter.create(makeConfig());

      await expect(collect(router.stream(makeRequest()))).rejects.toThrow('model stream interrupted');
      expect(mockMessagesStream).toHaveBeenCalledTimes(1);
    });

    it('bounds the wait for each chunk rather than the whole stream', async () => {
      mockMessagesStream.mockImplementation((_body: unknown, options: { signal: AbortSignal }) =>
        slowAnthropicStream([40, 40, 40, 40], options.signal),
      );
      const router = await ModelRouter.create(makeConfig({ timeoutMs: 100 }));

      const events = await collect(router.stream(makeRequest()));

      expect(events.filter((e) => e.type === 'text_delta')).toHaveLength(4);
      expect(events[events.length - 1].type).toBe('message_done');
    });

    it('does not count the time the caller holds an event', async () => {
      mockMessagesStream.mockImplementation((_body: unknown, options: { signal: AbortSignal }) =>
        slowAnthropicStream([0, 0], options.signal),
      );
      const router = await ModelRouter.create(makeConfig({ timeoutMs: 100 }));

      const texts: string[] = [];
      for await (const event of router.stream(makeRequest())) {
        if (event.type === 'text_delta') texts.push(event.text);
        await delay(250);
      }

      expect(texts).toEqual(['part0', 'part1']);
    });

    it('gives up when the stream goes quiet for longer than the timeout', async () => {
      mockMessagesStream.mockImplementation((_body: unknown, options: { signal: AbortSignal }) =>
        slowAnthropicStream([0, 400], options.signal),
      );
      const router = await ModelRouter.create(makeConfig({ timeoutMs: 100 }));

      await expect(collect(router.stream(makeRequest()))).rejects.toThrow('model stream interrupted');
    });

    it('opens the circuit breaker after repeated transient failures', async () => {
      const router = await ModelRouter.create(makeConfig({ retry: { maxAttempts: 1, baseDelayMs: 0 } }));

      for (let i = 0; i < 5; i++) {
        mockMessagesStream.mockImplementationOnce(() => {
          throw httpError('unavailable', 503);
        });
        await collect(router.stream(makeRequest())).catch(() => undefined);
      }

      mockMessagesStream.mockClear();
      await expect(collect(router.stream(makeRequest()))).rejects.toThrow(/circuit breaker.*open/i);
      expect(mockMessagesStream).not.toHaveBeenCalled();
    });

    it('reassembles OpenAI tool-call fragments addressed by index', async () => {
      mockOpenAICreate.mockResolvedValue({
        async *[Symbol.asyncIterator]() {
          yield { model: 'llama3:8b', choices: [{ delta: { content: 'Sure' }, finish_reason: null }] };
          yield {
            choices: [{ delta: { tool_calls: [{ index: 0, id: 'call_1', function: { name: 'run_command', arguments: '' } }] } }],
          };
          yield { choices: [{ delta: { tool_calls: [{ index: 0, function: { arguments: '{"comm' } }] } }] };
          yield { choices: [{ delta: { tool_calls: [{ index: 0, function: { arguments: 'and":"ls"}' } }] } }] };
          yield { choices: [{ delta: {}, finish_reason: 'tool_calls' }] };
        },
      });
      const router = await ModelRouter.create(makeConfig());

      const events = await collect(router.stream(makeRequest({ role: 'task' })));

      expect(events).toEqual([
        { type: 'text_delta', text: 'Sure' },
        { type: 'tool_call_start', id: 'call_1', name: 'run_command' },
        { type: 'tool_call_delta', id: 'call_1', fragment: '{"comm' },
        { type: 'tool_call_delta', id: 'call_1', fragment: 'and":"ls"}' },
        { type: 'tool_call_end', id: 'call_1' },
        { type: 'message_done', stopReason: 'tool_use', model: 'llama3:8b', usage: undefined },
      ]);
    });
  });
});

describe('message conversion', () => {
  const history = [
    { role: 'system' as const, content: 'Be brief.' },
    { role: 'user' as const, content: 'list /tmp' },
    {
      role: 'assistant' as const,
      content: '',
      toolCalls: [
        { id: 'c1', name: 'list_directory', arguments: '{"path":"/tmp"}' },
        { id: 'c2', name: 'system_info', arguments: '' },
      ],
    },
    { role: 'tool' as const, content: 'a.txt', toolCallId: 'c1' },
    { role: 'tool' as const, content: 'linux', toolCallId: 'c2' },
  ];

  it('groups consecutive tool results into one Anthropic user turn', () => {
    const { system, messages } = toAnthropicMessages(history);

    expect(system).toBe('Be brief.');
    expect(messages).toEqual([
      { role: 'user', content: 'list /tmp' },
      {
        role: 'assistant',
        content: [
          { type: 'tool_use', id: 'c1', name: 'list_directory', input: { path: '/tmp' } },
          { type: 'tool_use', id: 'c2', name: 'system_info', input: {} },
        ],
      },
      {
        role: 'user',
        content: [
          { type: 'tool_result', tool_use_id: 'c1', content: 'a.txt' },
          { type: 'tool_result', tool_use_id: 'c2', content: 'linux' },
        ],
      },
    ]);
  });

  it('maps tool calls and results onto OpenAI chat messages', () => {
    expect(toOpenAIMessages(history)).toEqual([
      { role: 'system', content: 'Be brief.' },
      { role: 'user', content: 'list /tmp' },
      {
        role: 'assistant',
        content: null,
        tool_calls: [
          { id: 'c1', type: 'function', function: { name: 'list_directory', arguments: '{"path":"/tmp"}' } },
          { id: 'c2', type: 'function', function: { name: 'system_info', arguments: '' } },
        ],
      },
      { role: 'tool', tool_call_id: 'c1', content: 'a.txt' },
      { role: 'tool', tool_call_id: 'c2', content: 'linux' },
    ]);
  });
});

describe('classifyModelError()', () => {
  it('treats rate limits and server errors as transient', () => {
    expect(classifyModelError(httpError('slow down', 429))).toBeInstanceOf(TransientError);
    expect(classifyModelError(httpError('boom', 500))).toBeInstanceOf(TransientError);
  });

  it('treats network failures as transient', () => {
    expect(classifyModelError(Object.assign(new Error('read'), { code: 'ECONNRESET' }))).toBeInstanceOf(TransientError);
  });

  it('treats client errors and unknown failures as protocol errors', () => {
    expect(classifyModelError(httpError('unauthorized', 401))).toBeInstanceOf(ProtocolError);
    expect(classifyModelError(new Error('weird'))).toBeInstanceOf(ProtocolError);
  });
});
