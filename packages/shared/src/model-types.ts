/**
 * Model client types: provider configuration plus the provider-agnostic
 * message, request and stream shapes the cycle engine works with.
 */

// ---------------------------------------------------------------------------
// Provider configuration
// ---------------------------------------------------------------------------

export type ModelProvider = 'anthropic' | 'openai-compatible' | 'ollama';

export interface AnthropicProviderConfig {
  provider: 'anthropic';
  apiKey?: string;
  baseURL?: string;
}

export interface OpenAICompatibleProviderConfig {
  provider: 'openai-compatible';
  apiKey?: string;
  baseURL: string;
}

export interface OllamaProviderConfig {
  provider: 'ollama';
  /** Default: http://localhost:11434/v1 */
  baseURL?: string;
}

export type ProviderConfig =
  | AnthropicProviderConfig
  | OpenAICompatibleProviderConfig
  | OllamaProviderConfig;

export interface ModelDefinition {
  /** Id used by roles (e.g. "default") */
  id: string;
  /** Model string sent to the provider */
  modelName: string;
  provider: ModelProvider;
  maxTokens: number;
  temperature?: number;
}

export interface ModelRoles {
  /** Interactive agent cycles */
  agent: string;
  /** Scheduled tasks; falls back to agent */
  task?: string;
}

export interface RetryPolicy {
  /** Total attempts including the first (default: 3) */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface ModelRouterConfig {
  /** Provider configurations keyed by provider name */
  providers: Partial<Record<ModelProvider, ProviderConfig>>;
  models: ModelDefinition[];
  roles: ModelRoles;
  retry?: Partial<RetryPolicy>;
  /** Per-attempt deadline for one model call, in ms */
  timeoutMs?: number;
}

// ---------------------------------------------------------------------------
// Conversation shapes
// ---------------------------------------------------------------------------

export type Role = 'system' | 'user' | 'assistant' | 'tool';

/** A tool call issued by the model. `arguments` is the raw, unparsed argument text. */
export interface ToolCallRequest {
  id: string;
  name: string;
  arguments: string;
}

export interface Message {
  role: Role;
  content: string;
  name?: string;
  /** On `tool` messages: the call this message answers */
  toolCallId?: string;
  /** On `assistant` messages: the calls issued in this turn */
  toolCalls?: readonly ToolCallRequest[];
}

export interface JsonObjectSchema {
  type: 'object';
  properties?: Record<string, unknown>;
  required?: string[];
  [key: string]: unknown;
}

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: JsonObjectSchema;
}

// ---------------------------------------------------------------------------
// Requests and responses
// ---------------------------------------------------------------------------

export interface ModelRequest {
  messages: readonly Message[];
  tools?: readonly ToolDefinition[];
  /** Which role selects the model (default: 'agent') */
  role?: keyof ModelRoles;
  modelOverride?: string;
  maxTokens?: number;
  signal?: AbortSignal;
}

export type StopReason = 'end_turn' | 'tool_use' | 'max_tokens' | string;

export interface ModelUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface ModelResponse {
  text: string;
  toolCalls: ToolCallRequest[];
  stopReason: StopReason;
  model: string;
  usage?: ModelUsage;
}

/**
 * Streaming events. Argument fragments for one call id arrive in order and
 * are only meaningful once concatenated; `tool_call_end` or `message_done`
 * marks them complete.
 */
export type ModelStreamEvent =
  | { type: 'text_delta'; text: string }
  | { type: 'tool_call_start'; id: string; name: string }
  | { type: 'tool_call_delta'; id: string; fragment: string }
  | { type: 'tool_call_end'; id: string }
  | { type: 'message_done'; stopReason: StopReason; model: string; usage?: ModelUsage };

export interface ModelClient {
  request(req: ModelRequest): Promise<ModelResponse>;
  /** Lazy, finite, non-restartable */
  stream(req: ModelRequest): AsyncGenerator<ModelStreamEvent>;
}
