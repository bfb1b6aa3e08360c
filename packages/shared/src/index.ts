export { logger, type Logger } from './logger.js';
export { getTracer, withSpan } from './tracing.js';
export { CircuitBreaker, type CircuitBreakerOptions, type CircuitState } from './circuit-breaker.js';
export { createDeadline, delay, throwIfAborted, AbortedError, type Deadline } from './abort.js';
export * from './errors.js';
export * from './model-types.js';
export { ModelRouter, classifyModelError, toAnthropicMessages, toOpenAIMessages } from './model-router.js';
export { loadModelConfig, createDefaultConfig } from './model-config.js';
