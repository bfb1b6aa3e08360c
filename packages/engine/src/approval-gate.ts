import { EventEmitter } from 'node:events';
import { logger, ApprovalError } from '@tessera/shared';
import type { ApprovalContext, ApprovalDecision, ApprovalOutcome, PendingApproval } from './types.js';

const log = logger.child({ module: 'approval-gate' });

const DEFAULT_TIMEOUT_MS = 180_000;

export interface ApprovalGateOptions {
  /** Used when a request does not set its own timeout */
  defaultTimeoutMs?: number;
  now?: () => Date;
}

export interface ApprovalRequestOptions {
  timeoutMs?: number;
  /** Aborting resolves the request as denied by 'system' */
  signal?: AbortSignal;
}

interface PendingEntry extends PendingApproval {
  resolve: (decision: ApprovalDecision) => void;
  cleanup: () => void;
}

function keyOf(conversationId: string, toolCallId: string): string {
  return `${conversationId}\u0000${toolCallId}`;
}

/**
 * One promise per (conversation, tool call), settled exactly once by an
 * external decision, a timeout, cancellation or release of the conversation.
 *
 * Events:
 *   'requested' (PendingApproval)
 *   'decided'   ({ conversationId, decision: ApprovalDecision })
 */
export class ApprovalGate extends EventEmitter {
  private entries = new Map<string, PendingEntry>();
  private readonly defaultTimeoutMs: number;
  private readonly now: () => Date;

  constructor(options: ApprovalGateOptions = {}) {
    super();
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.now = options.now ?? (() => new Date());
  }

  requestApproval(
    conversationId: string,
    toolCallId: string,
    context: ApprovalContext,
    options: ApprovalRequestOptions = {},
  ): Promise<ApprovalDecision> {
    const key = keyOf(conversationId, toolCallId);
    if (this.entries.has(key)) {
      return Promise.reject(
        new ApprovalError(`approval for tool call '${toolCallId}' in conversation '${conversationId}' is already pending`),
      );
    }
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const { signal } = options;

    return new Promise<ApprovalDecision>((resolve) => {
      const timer = setTimeout(() => {
        this.settle(key, 'timed-out', 'system', `no decision within ${timeoutMs}ms`);
      }, timeoutMs);
      const onAbort = () => this.settle(key, 'denied', 'system', 'run cancelled');

      const entry: PendingEntry = {
        conversationId,
        toolCallId,
        context,
        requestedAt: this.now().toISOString(),
        timeoutMs,
        resolve,
        cleanup: () => {
          clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
        },
      };
      this.entries.set(key, entry);
      log.info({ conversationId, toolCallId, tool: context.toolName, timeoutMs }, 'approval requested');
      this.emit('requested', this.view(entry));

      if (signal?.aborted) {
        onAbort();
      } else {
        signal?.addEventListener('abort', onAbort, { once: true });
      }
    });
  }

  /**
   * Deliver a decision from outside. Returns false when nothing is pending
   * for the key (already decided, timed out or never requested).
   */
  decide(
    conversationId: string,
    toolCallId: string,
    outcome: Exclude<ApprovalOutcome, 'timed-out'>,
    decidedBy: string,
    reason?: string,
  ): boolean {
    return this.settle(keyOf(conversationId, toolCallId), outcome, decidedBy, reason);
  }

  /** Deny every outstanding request of a conversation. Returns how many were released. */
  releaseConversation(conversationId: string, reason: string): number {
    let released = 0;
    for (const [key, entry] of [...this.entries]) {
      if (entry.conversationId === conversationId && this.settle(key, 'denied', 'system', reason)) {
        released++;
      }
    }
    if (released > 0) log.info({ conversationId, released, reason }, 'released pending approvals');
    return released;
  }

  pending(conversationId?: string): PendingApproval[] {
    return [...this.entries.values()]
      .filter((entry) => conversationId === undefined || entry.conversationId === conversationId)
      .map((entry) => this.view(entry));
  }

  private view(entry: PendingEntry): PendingApproval {
    return {
      conversationId: entry.conversationId,
      toolCallId: entry.toolCallId,
      context: entry.context,
      requestedAt: entry.requestedAt,
      timeoutMs: entry.timeoutMs,
    };
  }

  private settle(key: string, outcome: ApprovalOutcome, decidedBy: string, reason?: string): boolean {
    const entry = this.entries.get(key);
    if (!entry) return false;
    this.entries.delete(key);
    entry.cleanup();

    const decision: ApprovalDecision = {
      toolCallId: entry.toolCallId,
      outcome,
      decidedBy,
      timestamp: this.now().toISOString(),
      ...(reason !== undefined ? { reason } : {}),
    };
    log.info({ conversationId: entry.conversationId, toolCallId: entry.toolCallId, outcome, decidedBy }, 'approval decided');
    entry.resolve(decision);
    this.emit('decided', { conversationId: entry.conversationId, decision });
    return true;
  }
}
