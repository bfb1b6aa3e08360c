import type { z } from 'zod';
import type { Logger, Message, ModelRoles } from '@tessera/shared';

export type Sensitivity = 'normal' | 'approval-required';

export interface ToolContext {
  conversationId: string;
  toolCallId: string;
  /** Aborts on cancellation of the run or when the tool's timeout elapses */
  signal: AbortSignal;
  logger: Logger;
}

/**
 * A tool the model may call. Handlers return the text fed back to the model
 * and throw to report a failure.
 */
export interface ToolSpec<S extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string;
  description: string;
  schema: S;
  sensitivity: Sensitivity;
  /** Overrides the engine's tool timeout */
  timeoutMs?: number;
  handler(args: z.infer<S>, ctx: ToolContext): Promise<string> | string;
}

/** Keeps the schema and handler argument types tied together at the definition site. */
export function defineTool<S extends z.ZodTypeAny>(spec: ToolSpec<S>): ToolSpec<S> {
  return spec;
}

// ---------------------------------------------------------------------------
// Approvals
// ---------------------------------------------------------------------------

export type ApprovalOutcome = 'approved' | 'denied' | 'timed-out';

export interface ApprovalDecision {
  toolCallId: string;
  outcome: ApprovalOutcome;
  decidedBy: string;
  /** ISO-8601 */
  timestamp: string;
  reason?: string;
}

export interface ApprovalContext {
  toolName: string;
  arguments: unknown;
  description?: string;
}

export interface PendingApproval {
  conversationId: string;
  toolCallId: string;
  context: ApprovalContext;
  requestedAt: string;
  timeoutMs: number;
}

// ---------------------------------------------------------------------------
// Cycle results
// ---------------------------------------------------------------------------

export type TerminationReason =
  | 'completed'
  | 'max_cycles_exceeded'
  | 'protocol_error'
  | 'tool_not_found'
  | 'cancelled';

export interface CycleResult {
  conversationId: string;
  finalMessage?: Message;
  cyclesUsed: number;
  terminationReason: TerminationReason;
  error?: Error;
}

export type BusyPolicy = 'queue' | 'reject';

export interface RunOptions {
  sink?: StreamSink;
  signal?: AbortSignal;
  /** Model role (default: 'agent') */
  role?: keyof ModelRoles;
  /** Overrides the engine's cap for this run */
  maxCycles?: number;
}

// ---------------------------------------------------------------------------
// Stream events
// ---------------------------------------------------------------------------

interface EventBase {
  conversationId: string;
  cycle: number;
}

export type StreamEvent =
  | (EventBase & { type: 'cycle_started' })
  | (EventBase & { type: 'text_delta'; text: string })
  | (EventBase & { type: 'tool_requested'; toolCallId: string; toolName: string; arguments: string })
  | (EventBase & {
      type: 'approval_requested';
      toolCallId: string;
      toolName: string;
      arguments: unknown;
      timeoutMs: number;
    })
  | (EventBase & { type: 'tool_approved'; toolCallId: string; toolName: string; decidedBy: string })
  | (EventBase & {
      type: 'tool_denied';
      toolCallId: string;
      toolName: string;
      outcome: 'denied' | 'timed-out';
      decidedBy: string;
      reason?: string;
    })
  | (EventBase & { type: 'tool_executed'; toolCallId: string; toolName: string; summary: string; durationMs: number })
  | (EventBase & { type: 'tool_errored'; toolCallId: string; toolName: string; error: string })
  | (EventBase & { type: 'cycle_finished'; outcome: 'continue' | TerminationReason });

export type StreamEventType = StreamEvent['type'];

/** Consumer of ordered engine events. The engine awaits each emit. */
export interface StreamSink {
  emit(event: StreamEvent): void | Promise<void>;
}
