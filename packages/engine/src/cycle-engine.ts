import {
  logger,
  withSpan,
  createDeadline,
  AbortedError,
  ApprovalError,
  ConversationBusyError,
  ProtocolError,
  ToolNotFoundError,
  ToolExecutionError,
  errorMessage,
} from '@tessera/shared';
import type { Message, ModelClient, ModelRequest, ModelRoles, ToolCallRequest } from '@tessera/shared';
import { ApprovalGate } from './approval-gate.js';
import { mapWithConcurrency } from './concurrency.js';
import type { ConversationStore } from './conversation-store.js';
import { sanitizeToolOutput, summarize } from './sanitize.js';
import { CycleStateMachine } from './state-machine.js';
import { nullSink } from './stream-sink.js';
import { ToolCallAccumulator } from './tool-call-accumulator.js';
import type { ToolRegistry } from './tool-registry.js';
import type {
  ApprovalDecision,
  BusyPolicy,
  CycleResult,
  RunOptions,
  StreamEvent,
  StreamSink,
  TerminationReason,
  ToolContext,
  ToolSpec,
} from './types.js';

const log = logger.child({ module: 'cycle-engine' });

export const DEFAULT_MAX_CYCLES = 50;
export const DEFAULT_TOOL_TIMEOUT_MS = 20_000;
export const DEFAULT_APPROVAL_TIMEOUT_MS = 180_000;
export const DEFAULT_TOOL_CONCURRENCY = 4;

const CANCELLED_RESULT = 'Cancelled: the run was cancelled before this tool call ran.';

export interface CycleEngineOptions {
  model: ModelClient;
  tools: ToolRegistry;
  /** Created with `approvalTimeoutMs` as its default when omitted */
  approvals?: ApprovalGate;
  maxCycles?: number;
  toolTimeoutMs?: number;
  approvalTimeoutMs?: number;
  /** Tool calls of one round allowed to run at once */
  toolConcurrency?: number;
  /** What a second run on a busy conversation does (default: 'queue') */
  busyPolicy?: BusyPolicy;
  /** Stream model output (default: true) */
  streaming?: boolean;
}

interface RunContext {
  store: ConversationStore;
  sink: StreamSink;
  signal?: AbortSignal;
  role: keyof ModelRoles;
  machine: CycleStateMachine;
  cycle: number;
  approvalsInFlight: number;
}

interface ModelReply {
  text: string;
  toolCalls: ToolCallRequest[];
}

function positiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

function isCancellation(err: unknown, signal: AbortSignal | undefined): boolean {
  return err instanceof AbortedError || signal?.aborted === true;
}

/** Run a handler, rejecting as soon as `signal` aborts even if the handler ignores it. */
function runHandler(spec: ToolSpec, args: unknown, ctx: ToolContext): Promise<string> {
  const { signal } = ctx;
  return new Promise<string>((resolve, reject) => {
    const onAbort = () => reject(new AbortedError(signal.reason));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    void Promise.resolve()
      .then(() => spec.handler(args, ctx))
      .then(resolve, reject)
      .finally(() => signal.removeEventListener('abort', onAbort));
  });
}

function denialMessage(decision: ApprovalDecision, timeoutMs: number): string {
  if (decision.outcome === 'timed-out') {
    return `Denied: no approval decision within ${timeoutMs}ms. The tool was not run.`;
  }
  const reason = decision.reason ? `: ${decision.reason}` : '';
  return `Denied by ${decision.decidedBy}${reason}. The tool was not run.`;
}

/**
 * Drives a conversation through model calls and tool rounds until the model
 * answers without tool calls or a bound is hit.
 *
 * Runs on the same conversation id never overlap: a second run is queued
 * behind the first or rejected, depending on `busyPolicy`.
 */
export class CycleEngine {
  readonly approvals: ApprovalGate;
  private readonly model: ModelClient;
  private readonly tools: ToolRegistry;
  private readonly maxCycles: number;
  private readonly toolTimeoutMs: number;
  private readonly approvalTimeoutMs: number;
  private readonly toolConcurrency: number;
  private readonly busyPolicy: BusyPolicy;
  private readonly streaming: boolean;
  private readonly tails = new Map<string, Promise<void>>();

  constructor(options: CycleEngineOptions) {
    this.model = options.model;
    this.tools = options.tools;
    this.maxCycles = positiveInteger('maxCycles', options.maxCycles ?? DEFAULT_MAX_CYCLES);
    this.toolTimeoutMs = options.toolTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
    this.approvalTimeoutMs = options.approvalTimeoutMs ?? DEFAULT_APPROVAL_TIMEOUT_MS;
    this.toolConcurrency = positiveInteger('toolConcurrency', options.toolConcurrency ?? DEFAULT_TOOL_CONCURRENCY);
    this.busyPolicy = options.busyPolicy ?? 'queue';
    this.streaming = options.streaming ?? true;
    this.approvals = options.approvals ?? new ApprovalGate({ defaultTimeoutMs: this.approvalTimeoutMs });
    if (!this.tools.isFrozen) this.tools.freeze();
  }

  /** True while a run on the conversation is active or queued. */
  isBusy(conversationId: string): boolean {
    return this.tails.has(conversationId);
  }

  /**
   * Run cycles on `store`. `userMessage` is appended first; omit it to let
   * the model continue the conversation as it stands.
   */
  run(store: ConversationStore, userMessage?: string, options: RunOptions = {}): Promise<CycleResult> {
    return this.exclusive(store.id, () => this.runCycles(store, userMessage, options));
  }

  private async exclusive<T>(conversationId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(conversationId);
    if (previous && this.busyPolicy === 'reject') {
      throw new ConversationBusyError(conversationId);
    }

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous ? previous.then(() => current) : current;
    this.tails.set(conversationId, tail);

    try {
      if (previous) {
        log.debug({ conversationId }, 'run queued behind active cycle');
        await previous;
      }
      return await fn();
    } finally {
      release();
      if (this.tails.get(conversationId) === tail) this.tails.delete(conversationId);
    }
  }

  private async runCycles(store: ConversationStore, userMessage: string | undefined, options: RunOptions): Promise<CycleResult> {
    const maxCycles = positiveInteger('maxCycles', options.maxCycles ?? this.maxCycles);
    const ctx: RunContext = {
      store,
      sink: options.sink ?? nullSink,
      signal: options.signal,
      role: options.role ?? 'agent',
      machine: new CycleStateMachine(store.id),
      cycle: 0,
      approvalsInFlight: 0,
    };

    if (ctx.signal?.aborted) return this.cancel(ctx, 0);
    if (userMessage !== undefined) store.append({ role: 'user', content: userMessage });
    log.info({ conversationId: store.id, maxCycles, role: ctx.role }, 'run started');

    for (let cycle = 1; ; cycle++) {
      if (ctx.signal?.aborted) return this.cancel(ctx, cycle - 1);
      ctx.cycle = cycle;
      await this.emit(ctx, { ...this.base(ctx), type: 'cycle_started' });

      let reply: ModelReply;
      try {
        reply = await this.callModel(ctx);
      } catch (err) {
        if (isCancellation(err, ctx.signal)) return this.cancel(ctx, cycle);
        const error =
          err instanceof ProtocolError ? err : new ProtocolError(`model call failed: ${errorMessage(err)}`, { cause: err });
        log.error({ err: error, conversationId: store.id, cycle }, 'model call failed');
        return this.finish(ctx, cycle, 'protocol_error', { error });
      }

      const assistant: Message = reply.toolCalls.length
        ? { role: 'assistant', content: reply.text, toolCalls: reply.toolCalls }
        : { role: 'assistant', content: reply.text };
      store.append(assistant);

      if (reply.toolCalls.length === 0) {
        return this.finish(ctx, cycle, 'completed', { finalMessage: assistant });
      }

      ctx.machine.transition('resolving_tools');
      log.info(
        { conversationId: store.id, cycle, tools: reply.toolCalls.map((c) => c.name) },
        'resolving tool calls',
      );

      // Structural check for the whole round before anything runs
      const unknown = reply.toolCalls.find((call) => !this.tools.resolve(call.name));
      if (unknown) {
        const error = new ToolNotFoundError(unknown.name);
        for (const call of reply.toolCalls) {
          store.append({
            role: 'tool',
            toolCallId: call.id,
            name: call.name,
            content: this.tools.resolve(call.name)
              ? `Not run: the round was aborted because tool '${unknown.name}' is not registered.`
              : `Error: ${new ToolNotFoundError(call.name).message}`,
          });
        }
        log.error({ conversationId: store.id, tool: unknown.name }, 'model requested an unregistered tool');
        return this.finish(ctx, cycle, 'tool_not_found', { error });
      }

      const results = await mapWithConcurrency(reply.toolCalls, this.toolConcurrency, (call) =>
        this.resolveCall(ctx, call),
      );
      reply.toolCalls.forEach((call, i) => {
        store.append({ role: 'tool', toolCallId: call.id, name: call.name, content: results[i] });
      });

      if (ctx.signal?.aborted) return this.cancel(ctx, cycle);
      if (cycle >= maxCycles) {
        log.warn({ conversationId: store.id, maxCycles }, 'cycle cap reached');
        return this.finish(ctx, cycle, 'max_cycles_exceeded', {
          error: new Error(`stopped after ${maxCycles} cycle(s) with tool calls still being issued`),
        });
      }

      ctx.machine.transition('awaiting_model');
      await this.emit(ctx, { ...this.base(ctx), type: 'cycle_finished', outcome: 'continue' });
    }
  }

  // ---------------------------------------------------------------------------
  // Model calls
  // ---------------------------------------------------------------------------

  private async callModel(ctx: RunContext): Promise<ModelReply> {
    const definitions = this.tools.definitions();
    const request: ModelRequest = {
      messages: ctx.store.history(),
      ...(definitions.length > 0 ? { tools: definitions } : {}),
      role: ctx.role,
      signal: ctx.signal,
    };

    return withSpan(
      'cycle.model_call',
      { 'conversation.id': ctx.store.id, 'cycle.number': ctx.cycle, streaming: this.streaming },
      async () => {
        let reply: ModelReply;
        if (this.streaming) {
          reply = await this.consumeStream(ctx, request);
        } else {
          const response = await this.model.request(request);
          if (response.text) await this.emit(ctx, { ...this.base(ctx), type: 'text_delta', text: response.text });
          reply = { text: response.text, toolCalls: response.toolCalls };
        }
        const ids = new Set<string>();
        for (const call of reply.toolCalls) {
          if (!call.id || ids.has(call.id)) {
            throw new ProtocolError(`model issued a tool call with a missing or repeated id '${call.id}'`);
          }
          ids.add(call.id);
        }
        return reply;
      },
    );
  }

  /** Text deltas go straight to the sink; argument fragments are only buffered. */
  private async consumeStream(ctx: RunContext, request: ModelRequest): Promise<ModelReply> {
    const calls = new ToolCallAccumulator();
    const text: string[] = [];
    let finished = false;

    for await (const event of this.model.stream(request)) {
      if (finished) throw new ProtocolError(`model stream continued after message_done (${event.type})`);
      switch (event.type) {
        case 'text_delta':
          text.push(event.text);
          await this.emit(ctx, { ...this.base(ctx), type: 'text_delta', text: event.text });
          break;
        case 'tool_call_start':
          calls.start(event.id, event.name);
          break;
        case 'tool_call_delta':
          calls.append(event.id, event.fragment);
          break;
        case 'tool_call_end':
          calls.end(event.id);
          break;
        case 'message_done':
          finished = true;
          log.debug({ conversationId: ctx.store.id, stopReason: event.stopReason, usage: event.usage }, 'model message done');
          break;
      }
    }

    return { text: text.join(''), toolCalls: calls.finish() };
  }

  // ---------------------------------------------------------------------------
  // Tool calls
  // ---------------------------------------------------------------------------

  /** Resolves to the content of the call's tool message; never rejects for tool-level failures. */
  private async resolveCall(ctx: RunContext, call: ToolCallRequest): Promise<string> {
    const spec = this.tools.resolve(call.name);
    if (!spec) throw new ToolNotFoundError(call.name);
    const ids = { toolCallId: call.id, toolName: call.name };

    await this.emit(ctx, { ...this.base(ctx), type: 'tool_requested', ...ids, arguments: call.arguments });
    if (ctx.signal?.aborted) return CANCELLED_RESULT;

    let args: unknown;
    try {
      args = this.tools.parseArguments(spec, call.arguments);
    } catch (err) {
      const error = errorMessage(err);
      log.warn({ conversationId: ctx.store.id, tool: call.name, error }, 'invalid tool arguments');
      await this.emit(ctx, { ...this.base(ctx), type: 'tool_errored', ...ids, error });
      return `Error: ${error}`;
    }

    if (spec.sensitivity === 'approval-required') {
      const decision = await this.awaitApproval(ctx, spec, call, args);
      if (decision.outcome !== 'approved') {
        await this.emit(ctx, {
          ...this.base(ctx),
          type: 'tool_denied',
          ...ids,
          outcome: decision.outcome,
          decidedBy: decision.decidedBy,
          reason: decision.reason,
        });
        return denialMessage(decision, this.approvalTimeoutMs);
      }
      await this.emit(ctx, { ...this.base(ctx), type: 'tool_approved', ...ids, decidedBy: decision.decidedBy });
      if (ctx.signal?.aborted) return CANCELLED_RESULT;
    }

    return this.execute(ctx, spec, call, args);
  }

  private async awaitApproval(ctx: RunContext, spec: ToolSpec, call: ToolCallRequest, args: unknown): Promise<ApprovalDecision> {
    if (ctx.approvalsInFlight++ === 0) ctx.machine.transition('awaiting_approval');
    try {
      // Registered before the event goes out so an immediate decision is not lost
      const decision = this.approvals.requestApproval(
        ctx.store.id,
        call.id,
        { toolName: spec.name, arguments: args, description: spec.description },
        { timeoutMs: this.approvalTimeoutMs, signal: ctx.signal },
      );
      await this.emit(ctx, {
        ...this.base(ctx),
        type: 'approval_requested',
        toolCallId: call.id,
        toolName: spec.name,
        arguments: args,
        timeoutMs: this.approvalTimeoutMs,
      });
      return await decision;
    } catch (err) {
      if (!(err instanceof ApprovalError)) throw err;
      log.warn({ conversationId: ctx.store.id, toolCallId: call.id, err }, 'approval request rejected');
      return {
        toolCallId: call.id,
        outcome: 'denied',
        decidedBy: 'system',
        timestamp: new Date().toISOString(),
        reason: err.message,
      };
    } finally {
      if (--ctx.approvalsInFlight === 0 && ctx.machine.state === 'awaiting_approval') {
        ctx.machine.transition('resolving_tools');
      }
    }
  }

  private async execute(ctx: RunContext, spec: ToolSpec, call: ToolCallRequest, args: unknown): Promise<string> {
    const timeoutMs = spec.timeoutMs ?? this.toolTimeoutMs;
    const deadline = createDeadline(ctx.signal, timeoutMs);
    const startedAt = Date.now();
    const ids = { toolCallId: call.id, toolName: call.name };

    try {
      const output = await withSpan(
        'cycle.tool_call',
        { 'conversation.id': ctx.store.id, 'tool.name': spec.name, 'tool.call_id': call.id },
        () =>
          runHandler(spec, args, {
            conversationId: ctx.store.id,
            toolCallId: call.id,
            signal: deadline.signal,
            logger: log.child({ tool: spec.name, toolCallId: call.id }),
          }),
      );
      const content = sanitizeToolOutput(output);
      const durationMs = Date.now() - startedAt;
      log.info({ conversationId: ctx.store.id, tool: spec.name, durationMs }, 'tool executed');
      await this.emit(ctx, { ...this.base(ctx), type: 'tool_executed', ...ids, summary: summarize(content), durationMs });
      return content;
    } catch (err) {
      const error = deadline.timedOut()
        ? `tool '${spec.name}' timed out after ${timeoutMs}ms`
        : ctx.signal?.aborted
          ? `tool '${spec.name}' was cancelled while running`
          : sanitizeToolOutput(errorMessage(err));
      log.warn(
        { conversationId: ctx.store.id, err: new ToolExecutionError(spec.name, error, { cause: err }) },
        'tool failed',
      );
      await this.emit(ctx, { ...this.base(ctx), type: 'tool_errored', ...ids, error });
      return `Error: ${error}`;
    } finally {
      deadline.dispose();
    }
  }

  // ---------------------------------------------------------------------------
  // Termination and events
  // ---------------------------------------------------------------------------

  private base(ctx: RunContext): { conversationId: string; cycle: number } {
    return { conversationId: ctx.store.id, cycle: ctx.cycle };
  }

  private async cancel(ctx: RunContext, cyclesUsed: number): Promise<CycleResult> {
    this.approvals.releaseConversation(ctx.store.id, 'run cancelled');
    ctx.cycle = cyclesUsed;
    log.info({ conversationId: ctx.store.id, cyclesUsed }, 'run cancelled');
    return this.finish(ctx, cyclesUsed, 'cancelled', { error: new AbortedError(ctx.signal?.reason) });
  }

  private async finish(
    ctx: RunContext,
    cyclesUsed: number,
    terminationReason: TerminationReason,
    extra: { finalMessage?: Message; error?: Error } = {},
  ): Promise<CycleResult> {
    ctx.machine.transition(terminationReason === 'completed' ? 'done' : 'aborted');
    await this.emit(ctx, { ...this.base(ctx), type: 'cycle_finished', outcome: terminationReason });
    log.info({ conversationId: ctx.store.id, cyclesUsed, terminationReason }, 'run finished');
    return { conversationId: ctx.store.id, cyclesUsed, terminationReason, ...extra };
  }

  /** Sink failures are logged and never end a run. */
  private async emit(ctx: RunContext, event: StreamEvent): Promise<void> {
    try {
      await ctx.sink.emit(event);
    } catch (err) {
      log.warn({ err, type: event.type, conversationId: ctx.store.id }, 'stream sink failed');
    }
  }
}
