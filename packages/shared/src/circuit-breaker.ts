/**
 * Circuit breaker for calls to a model provider.
 * closed (normal) -> open (fast-fail) -> half-open (one probe)
 */
import { logger } from './logger.js';
import { TransientError } from './errors.js';

const log = logger.child({ module: 'circuit-breaker' });

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerOptions {
  name: string;
  /** Consecutive counted failures before opening (default: 5) */
  failureThreshold?: number;
  /** Time in ms before a probe is let through (default: 30000) */
  resetTimeoutMs?: number;
  /**
   * Which failures count against the breaker. Caller mistakes such as a
   * malformed request should not open it. Defaults to every failure.
   */
  isFailure?: (err: unknown) => boolean;
  onStateChange?: (from: CircuitState, to: CircuitState) => void;
  /** Injectable clock for tests */
  now?: () => number;
}

export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private failureCount = 0;
  private openedAt = 0;
  private readonly opts: Required<Omit<CircuitBreakerOptions, 'onStateChange'>> &
    Pick<CircuitBreakerOptions, 'onStateChange'>;

  constructor(opts: CircuitBreakerOptions) {
    this.opts = {
      name: opts.name,
      failureThreshold: opts.failureThreshold ?? 5,
      resetTimeoutMs: opts.resetTimeoutMs ?? 30_000,
      isFailure: opts.isFailure ?? (() => true),
      onStateChange: opts.onStateChange,
      now: opts.now ?? Date.now,
    };
  }

  get currentState(): CircuitState {
    return this.state;
  }

  private transition(to: CircuitState): void {
    if (this.state === to) return;
    const from = this.state;
    this.state = to;
    log.info({ name: this.opts.name, from, to }, 'circuit breaker state change');
    this.opts.onStateChange?.(from, to);
  }

  /** Throws a TransientError while open; otherwise lets the caller proceed. */
  ensureClosed(): void {
    if (this.state !== 'open') return;
    if (this.opts.now() - this.openedAt >= this.opts.resetTimeoutMs) {
      this.transition('half-open');
      return;
    }
    throw new TransientError(`Circuit breaker '${this.opts.name}' is open`);
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.ensureClosed();
    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      this.recordFailure(error);
      throw error;
    }
  }

  recordSuccess(): void {
    this.failureCount = 0;
    this.transition('closed');
  }

  recordFailure(error: unknown): void {
    if (!this.opts.isFailure(error)) return;
    this.failureCount++;
    if (this.state === 'half-open' || this.failureCount >= this.opts.failureThreshold) {
      this.openedAt = this.opts.now();
      this.transition('open');
    }
  }

  reset(): void {
    this.failureCount = 0;
    this.transition('closed');
  }
}
