/**
 * ModelRouter, the ModelClient used by the cycle engine.
 *
 * Supports:
 *   - Anthropic (direct API key, optional base URL)
 *   - OpenAI-compatible servers and Ollama (openai SDK with custom baseURL)
 *
 * The router resolves role -> model definition -> provider adapter, converts
 * conversations into each provider's wire format (tool calls and tool results
 * included), retries transient failures with exponential backoff and
 * normalises everything into provider-agnostic responses and stream events.
 */

import Anthropic from '@anthropic-ai/sdk';
import type OpenAI from 'openai';
import { logger } from './logger.js';
import { CircuitBreaker } from './circuit-breaker.js';
import { createDeadline, delay, AbortedError } from './abort.js';
import { TesseraError, TransientError, ProtocolError, errorMessage } from './errors.js';
import type {
  ModelRouterConfig,
  ModelDefinition,
  ModelProvider,
  ModelRoles,
  AnthropicProviderConfig,
  OllamaProviderConfig,
  OpenAICompatibleProviderConfig,
  ModelClient,
  ModelRequest,
  ModelResponse,
  ModelStreamEvent,
  ModelUsage,
  Message,
  RetryPolicy,
  StopReason,
  ToolCallRequest,
} from './model-types.js';

const log = logger.child({ module: 'model-router' });

const DEFAULT_RETRY: RetryPolicy = { maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 8_000 };
const DEFAULT_TIMEOUT_MS = 120_000;

// ---------------------------------------------------------------------------
// Error classification
// ---------------------------------------------------------------------------

const RETRYABLE_STATUS = new Set([408, 409, 425, 429]);
const NETWORK_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EAI_AGAIN', 'EPIPE', 'ENOTFOUND']);
const NETWORK_ERROR_NAMES = new Set(['APIConnectionError', 'APIConnectionTimeoutError', 'FetchError']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readProp(value: unknown, key: string): unknown {
  return isRecord(value) ? value[key] : undefined;
}

type ErrorClass = abstract new (...args: never[]) => Error;

/**
 * Map a provider SDK failure onto TransientError (retryable) or ProtocolError.
 * `connectionErrors` are the SDK's own connection error classes, when loaded.
 */
export function classifyModelError(err: unknown, connectionErrors: ReadonlyArray<ErrorClass | undefined> = []): TesseraError {
  if (err instanceof TesseraError) return err;
  const message = errorMessage(err);

  const status = readProp(err, 'status');
  if (typeof status === 'number') {
    if (RETRYABLE_STATUS.has(status) || status >= 500) {
      return new TransientError(`model service returned ${status}: ${message}`, { cause: err, status });
    }
    return new ProtocolError(`model service rejected the request (${status}): ${message}`, { cause: err });
  }

  const isConnectionClass = connectionErrors.some((cls) => typeof cls === 'function' && err instanceof cls);
  const code = readProp(err, 'code');
  const name = err instanceof Error ? err.name : '';
  if (
    isConnectionClass ||
    NETWORK_ERROR_NAMES.has(name) ||
    (typeof code === 'string' && NETWORK_ERROR_CODES.has(code)) ||
    /connection error|fetch failed|socket hang up/i.test(message)
  ) {
    return new TransientError(`model service unreachable: ${message}`, { cause: err });
  }

  return new ProtocolError(`unexpected model client failure: ${message}`, { cause: err });
}

// ---------------------------------------------------------------------------
// Runtime shape guards
// ---------------------------------------------------------------------------

function isValidAnthropicResponse(resp: unknown): resp is {
  content: unknown[];
  stop_reason: string | null;
  model: string;
  usage: { input_tokens: number; output_tokens: number };
} {
  if (typeof resp !== 'object' || resp === null) return false;
  const usage = readProp(resp, 'usage');
  return (
    Array.isArray(readProp(resp, 'content')) &&
    typeof readProp(resp, 'model') === 'string' &&
    typeof readProp(usage, 'input_tokens') === 'number' &&
    typeof readProp(usage, 'output_tokens') === 'number'
  );
}

/** Split Anthropic content blocks into text and tool calls; other block kinds are ignored. */
function readAnthropicContent(content: unknown[]): { text: string; toolCalls: ToolCallRequest[] } {
  const text: string[] = [];
  const toolCalls: ToolCallRequest[] = [];
  for (const block of content) {
    const type = readProp(block, 'type');
    if (type === 'text') {
      const value = readProp(block, 'text');
      if (typeof value !== 'string') throw new ProtocolError('anthropic adapter: text block without text');
      text.push(value);
    } else if (type === 'tool_use') {
      const id = readProp(block, 'id');
      const name = readProp(block, 'name');
      if (typeof id !== 'string' || typeof name !== 'string') {
        throw new ProtocolError('anthropic adapter: tool_use block without id or name');
      }
      toolCalls.push({ id, name, arguments: JSON.stringify(readProp(block, 'input') ?? {}) });
    } else {
      log.debug({ type }, 'ignoring content block');
    }
  }
  return { text: text.join(''), toolCalls };
}

function parseArgumentsForWire(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw || '{}');
    if (isRecord(parsed)) return parsed;
  } catch {
    log.debug({ raw }, 'unparseable tool arguments replayed as empty object');
  }
  return {};
}

// ---------------------------------------------------------------------------
// Provider adapter interface
// ---------------------------------------------------------------------------

interface ProviderAdapter {
  chat(model: ModelDefinition, req: ModelRequest, signal: AbortSignal): Promise<ModelResponse>;
  chatStream(model: ModelDefinition, req: ModelRequest, signal: AbortSignal): AsyncGenerator<ModelStreamEvent>;
  classify(err: unknown): TesseraError;
}

// ---------------------------------------------------------------------------
// Anthropic adapter
// ---------------------------------------------------------------------------

/** Convert the conversation to Anthropic's system string + alternating message list. */
export function toAnthropicMessages(messages: readonly Message[]): {
  system: string | undefined;
  messages: Anthropic.Messages.MessageParam[];
} {
  const system: string[] = [];
  const out: Anthropic.Messages.MessageParam[] = [];

  for (const msg of messages) {
    switch (msg.role) {
      case 'system':
        system.push(msg.content);
        break;
      case 'user':
        out.push({ role: 'user', content: msg.content });
        break;
      case 'assistant': {
        const blocks: Anthropic.Messages.ContentBlockParam[] = [];
        if (msg.content) blocks.push({ type: 'text', text: msg.content });
        for (const call of msg.toolCalls ?? []) {
          blocks.push({ type: 'tool_use', id: call.id, name: call.name, input: parseArgumentsForWire(call.arguments) });
        }
        out.push({ role: 'assistant', content: blocks.length > 0 ? blocks : '' });
        break;
      }
      case 'tool': {
        const result: Anthropic.Messages.ToolResultBlockParam = {
          type: 'tool_result',
          tool_use_id: msg.toolCallId ?? '',
          content: msg.content,
        };
        // Consecutive tool results share one user turn
        const last = out[out.length - 1];
        if (last && last.role === 'user' && Array.isArray(last.content) && last.content.every((b) => b.type === 'tool_result')) {
          last.content.push(result);
        } else {
          out.push({ role: 'user', content: [result] });
        }
        break;
      }
    }
  }

  return { system: system.length > 0 ? system.join('\n\n') : undefined, messages: out };
}

function createAnthropicAdapter(providerCfg: AnthropicProviderConfig): ProviderAdapter {
  const apiKey = providerCfg.apiKey || process.env.ANTHROPIC_API_KEY;
  if (!apiKey) {
    throw new Error('anthropic adapter: no credentials found');
  }
  const client = new Anthropic({ apiKey, baseURL: providerCfg.baseURL, maxRetries: 0 });
  log.info({ baseURL: providerCfg.baseURL ?? 'default' }, 'anthropic adapter: initialized');

  function buildBody(model: ModelDefinition, req: ModelRequest): Anthropic.Messages.MessageCreateParamsNonStreaming {
    const { system, messages } = toAnthropicMessages(req.messages);
    const tools: Anthropic.Messages.Tool[] | undefined = req.tools?.length
      ? req.tools.map((t) => ({ name: t.name, description: t.description, input_schema: t.inputSchema }))
      : undefined;
    return {
      model: model.modelName,
      max_tokens: req.maxTokens ?? model.maxTokens,
      ...(model.temperature !== undefined ? { temperature: model.temperature } : {}),
      ...(system ? { system } : {}),
      ...(tools ? { tools } : {}),
      messages,
    };
  }

  return {
    classify: (err) => classifyModelError(err, [Anthropic.APIConnectionError]),

    async chat(model, req, signal) {
      const response: unknown = await client.messages.create(buildBody(model, req), { signal });
      if (!isValidAnthropicResponse(response)) {
        throw new ProtocolError('anthropic adapter: invalid response shape from API');
      }
      const { text, toolCalls } = readAnthropicContent(response.content);
      return {
        text,
        toolCalls,
        stopReason: response.stop_reason ?? 'end_turn',
        model: response.model,
        usage: { inputTokens: response.usage.input_tokens, outputTokens: response.usage.output_tokens },
      };
    },

    async *chatStream(model, req, signal) {
      const stream = client.messages.stream(buildBody(model, req), { signal });
      // Anthropic addresses blocks by index; tool blocks are re-keyed by their call id
      const toolIdsByIndex = new Map<number, string>();
      let stopReason: StopReason = 'end_turn';

      for await (const event of stream) {
        if (event.type === 'content_block_start' && event.content_block.type === 'tool_use') {
          toolIdsByIndex.set(event.index, event.content_block.id);
          yield { type: 'tool_call_start', id: event.content_block.id, name: event.content_block.name };
        } else if (event.type === 'content_block_delta') {
          if (event.delta.type === 'text_delta') {
            yield { type: 'text_delta', text: event.delta.text };
          } else if (event.delta.type === 'input_json_delta') {
            const id = toolIdsByIndex.get(event.index);
            if (!id) throw new ProtocolError(`anthropic adapter: argument fragment for unknown block ${event.index}`);
            yield { type: 'tool_call_delta', id, fragment: event.delta.partial_json };
          }
        } else if (event.type === 'content_block_stop') {
          const id = toolIdsByIndex.get(event.index);
          if (id) yield { type: 'tool_call_end', id };
        } else if (event.type === 'message_delta' && event.delta.stop_reason) {
          stopReason = event.delta.stop_reason;
        }
      }

      const finalMessage: unknown = await stream.finalMessage();
      if (!isValidAnthropicResponse(finalMessage)) {
        throw new ProtocolError('anthropic adapter: invalid final message shape from stream');
      }
      yield {
        type: 'message_done',
        stopReason: finalMessage.stop_reason ?? stopReason,
        model: finalMessage.model,
        usage: { inputTokens: finalMessage.usage.input_tokens, outputTokens: finalMessage.usage.output_tokens },
      };
    },
  };
}

// ---------------------------------------------------------------------------
// OpenAI-compatible / Ollama adapter
// ---------------------------------------------------------------------------

type OpenAIMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type OpenAITool = OpenAI.Chat.Completions.ChatCompletionTool;

export function toOpenAIMessages(messages: readonly Message[]): OpenAIMessage[] {
  return messages.map((msg): OpenAIMessage => {
    switch (msg.role) {
      case 'system':
        return { role: 'system', content: msg.content };
      case 'user':
        return { role: 'user', content: msg.content };
      case 'assistant':
        return msg.toolCalls?.length
          ? {
              role: 'assistant',
              content: msg.content || null,
              tool_calls: msg.toolCalls.map((call) => ({
                id: call.id,
                type: 'function' as const,
                function: { name: call.name, arguments: call.arguments },
              })),
            }
          : { role: 'assistant', content: msg.content };
      case 'tool':
        return { role: 'tool', tool_call_id: msg.toolCallId ?? '', content: msg.content };
    }
  });
}

function normalizeFinishReason(reason: string | null | undefined): StopReason {
  switch (reason) {
    case 'stop':
    case null:
    case undefined:
      return 'end_turn';
    case 'tool_calls':
    case 'function_call':
      return 'tool_use';
    case 'length':
      return 'max_tokens';
    default:
      return reason;
  }
}

async function createOpenAICompatibleAdapter(
  providerCfg: OllamaProviderConfig | OpenAICompatibleProviderConfig,
): Promise<ProviderAdapter> {
  // Only loaded when this provider is actually used
  const { default: OpenAIClient } = await import('openai');

  const baseURL =
    providerCfg.provider === 'ollama' ? providerCfg.baseURL ?? 'http://localhost:11434/v1' : providerCfg.baseURL;
  const apiKey = providerCfg.provider === 'openai-compatible' ? providerCfg.apiKey ?? 'not-needed' : 'not-needed';

  const client = new OpenAIClient({ baseURL, apiKey, maxRetries: 0 });
  log.info({ baseURL, provider: providerCfg.provider }, 'openai-compatible adapter: initialized');

  function toTools(req: ModelRequest): OpenAITool[] | undefined {
    if (!req.tools?.length) return undefined;
    return req.tools.map((t) => ({
      type: 'function' as const,
      function: { name: t.name, description: t.description, parameters: t.inputSchema },
    }));
  }

  return {
    classify: (err) => classifyModelError(err, [OpenAIClient.APIConnectionError]),

    async chat(model, req, signal) {
      const tools = toTools(req);
      const response = await client.chat.completions.create(
        {
          model: model.modelName,
          max_tokens: req.maxTokens ?? model.maxTokens,
          ...(model.temperature !== undefined ? { temperature: model.temperature } : {}),
          messages: toOpenAIMessages(req.messages),
          ...(tools ? { tools } : {}),
        },
        { signal },
      );

      const choice = response.choices?.[0];
      if (!choice) {
        throw new ProtocolError('openai-compatible adapter: no choices in response');
      }

      const toolCalls: ToolCallRequest[] = (choice.message.tool_calls ?? []).map((call) => ({
        id: call.id,
        name: call.function.name,
        arguments: call.function.arguments,
      }));

      return {
        text: choice.message.content ?? '',
        toolCalls,
        stopReason: toolCalls.length > 0 ? 'tool_use' : normalizeFinishReason(choice.finish_reason),
        model: response.model,
        usage: response.usage
          ? { inputTokens: response.usage.prompt_tokens, outputTokens: response.usage.completion_tokens ?? 0 }
          : undefined,
      };
    },

    async *chatStream(model, req, signal) {
      const tools = toTools(req);
      const stream = await client.chat.completions.create(
        {
          model: model.modelName,
          max_tokens: req.maxTokens ?? model.maxTokens,
          ...(model.temperature !== undefined ? { temperature: model.temperature } : {}),
          messages: toOpenAIMessages(req.messages),
          ...(tools ? { tools } : {}),
          stream: true,
        },
        { signal },
      );

      // OpenAI addresses call fragments by index; only the first carries the id
      const idsByIndex = new Map<number, string>();
      let finishReason: string | null | undefined;
      let modelName = model.modelName;
      let usage: ModelUsage | undefined;

      for await (const chunk of stream) {
        if (chunk.model) modelName = chunk.model;
        if (chunk.usage) {
          usage = { inputTokens: chunk.usage.prompt_tokens, outputTokens: chunk.usage.completion_tokens ?? 0 };
        }
        const choice = chunk.choices?.[0];
        if (!choice) continue;

        if (choice.delta?.content) {
          yield { type: 'text_delta', text: choice.delta.content };
        }
        for (const part of choice.delta?.tool_calls ?? []) {
          let id = idsByIndex.get(part.index);
          if (!id) {
            id = part.id ?? `call_${part.index}`;
            idsByIndex.set(part.index, id);
            yield { type: 'tool_call_start', id, name: part.function?.name ?? '' };
          }
          if (part.function?.arguments) {
            yield { type: 'tool_call_delta', id, fragment: part.function.arguments };
          }
        }
        if (choice.finish_reason) finishReason = choice.finish_reason;
      }

      for (const id of idsByIndex.values()) {
        yield { type: 'tool_call_end', id };
      }
      yield {
        type: 'message_done',
        stopReason: idsByIndex.size > 0 ? 'tool_use' : normalizeFinishReason(finishReason),
        model: modelName,
        usage,
      };
    },
  };
}

// ---------------------------------------------------------------------------
// ModelRouter class
// ---------------------------------------------------------------------------

export class ModelRouter implements ModelClient {
  private adapters = new Map<ModelProvider, ProviderAdapter>();
  private circuitBreakers = new Map<ModelProvider, CircuitBreaker>();
  private readonly config: ModelRouterConfig;
  private readonly retry: RetryPolicy;

  private constructor(config: ModelRouterConfig) {
    this.config = config;
    this.retry = { ...DEFAULT_RETRY, ...config.retry };
  }

  get routerConfig(): ModelRouterConfig {
    return this.config;
  }

  /**
   * Create a router. The Anthropic adapter is created eagerly so missing
   * credentials fail at startup; OpenAI-compatible adapters are lazy.
   */
  static async create(config: ModelRouterConfig): Promise<ModelRouter> {
    const router = new ModelRouter(config);
    const anthropicCfg = config.providers.anthropic;
    if (anthropicCfg && anthropicCfg.provider === 'anthropic') {
      router.adapters.set('anthropic', createAnthropicAdapter(anthropicCfg));
    }
    return router;
  }

  private getOrCreateBreaker(provider: ModelProvider): CircuitBreaker {
    let cb = this.circuitBreakers.get(provider);
    if (!cb) {
      cb = new CircuitBreaker({
        name: `model-router-${provider}`,
        failureThreshold: 5,
        resetTimeoutMs: 30_000,
        isFailure: (err) => err instanceof TransientError,
      });
      this.circuitBreakers.set(provider, cb);
    }
    return cb;
  }

  private resolveModel(req: ModelRequest): ModelDefinition {
    const role: keyof ModelRoles = req.role ?? 'agent';
    const modelId = req.modelOverride ?? this.config.roles[role] ?? this.config.roles.agent;

    const model = this.config.models.find((m) => m.id === modelId);
    if (!model) {
      throw new ProtocolError(`model-router: unknown model id '${modelId}' for role '${role}'`);
    }
    return model;
  }

  private async getAdapter(provider: ModelProvider): Promise<ProviderAdapter> {
    const existing = this.adapters.get(provider);
    if (existing) return existing;

    const providerCfg = this.config.providers[provider];
    if (!providerCfg) {
      throw new ProtocolError(`model-router: no provider config for '${provider}'`);
    }
    if (providerCfg.provider === 'ollama' || providerCfg.provider === 'openai-compatible') {
      const adapter = await createOpenAICompatibleAdapter(providerCfg);
      this.adapters.set(provider, adapter);
      return adapter;
    }
    throw new ProtocolError(`model-router: cannot create adapter for provider '${provider}'`);
  }

  private backoffMs(attempt: number): number {
    return Math.min(this.retry.baseDelayMs * 2 ** (attempt - 1), this.retry.maxDelayMs);
  }

  /**
   * Turn a failed attempt into the error to act on. Caller cancellation is
   * passed through untouched; a missed deadline is transient.
   */
  private toAttemptError(err: unknown, adapter: ProviderAdapter, timedOut: boolean, caller?: AbortSignal): Error {
    if (caller?.aborted) return err instanceof AbortedError ? err : new AbortedError(caller.reason);
    if (timedOut) {
      return new TransientError(`model call exceeded ${this.config.timeoutMs ?? DEFAULT_TIMEOUT_MS}ms`, { cause: err });
    }
    return adapter.classify(err);
  }

  private exhausted(err: TransientError, attempts: number): ProtocolError {
    return new ProtocolError(`model call failed after ${attempts} attempt(s): ${err.message}`, { cause: err });
  }

  async request(req: ModelRequest): Promise<ModelResponse> {
    const model = this.resolveModel(req);
    const adapter = await this.getAdapter(model.provider);
    const cb = this.getOrCreateBreaker(model.provider);

    for (let attempt = 1; ; attempt++) {
      const deadline = createDeadline(req.signal, this.config.timeoutMs ?? DEFAULT_TIMEOUT_MS);
      try {
        log.info({ model: model.modelName, provider: model.provider, attempt }, 'routing chat request');
        return await cb.execute(async () => {
          try {
            return await adapter.chat(model, req, deadline.signal);
          } catch (err) {
            throw this.toAttemptError(err, adapter, deadline.timedOut(), req.signal);
          }
        });
      } catch (err) {
        if (!(err instanceof TransientError)) throw err;
        if (attempt >= this.retry.maxAttempts) throw this.exhausted(err, attempt);
        const wait = this.backoffMs(attempt);
        log.warn({ err, attempt, wait, model: model.modelName }, 'transient model failure, retrying');
        await delay(wait, req.signal);
      } finally {
        deadline.dispose();
      }
    }
  }

  /**
   * Streaming call. A failed attempt is retried only when nothing has been
   * yielded yet; once the caller has seen events the stream cannot restart.
   *
   * `timeoutMs` bounds the wait for each chunk, not the whole response. The
   * clock stops while the caller holds an event.
   */
  async *stream(req: ModelRequest): AsyncGenerator<ModelStreamEvent> {
    const model = this.resolveModel(req);
    const adapter = await this.getAdapter(model.provider);
    const cb = this.getOrCreateBreaker(model.provider);

    for (let attempt = 1; ; attempt++) {
      const deadline = createDeadline(req.signal, this.config.timeoutMs ?? DEFAULT_TIMEOUT_MS);
      let yielded = false;
      try {
        cb.ensureClosed();
        log.info({ model: model.modelName, provider: model.provider, attempt }, 'routing streaming chat request');
        try {
          for await (const event of adapter.chatStream(model, req, deadline.signal)) {
            yielded = true;
            deadline.suspend();
            yield event;
            deadline.restart();
          }
        } catch (err) {
          const attemptErr = this.toAttemptError(err, adapter, deadline.timedOut(), req.signal);
          cb.recordFailure(attemptErr);
          throw attemptErr;
        }
        cb.recordSuccess();
        return;
      } catch (err) {
        if (!(err instanceof TransientError)) throw err;
        if (yielded) throw new ProtocolError(`model stream interrupted: ${err.message}`, { cause: err });
        if (attempt >= this.retry.maxAttempts) throw this.exhausted(err, attempt);
        const wait = this.backoffMs(attempt);
        log.warn({ err, attempt, wait, model: model.modelName }, 'transient stream failure, retrying');
        await delay(wait, req.signal);
      } finally {
        deadline.dispose();
      }
    }
  }
}
