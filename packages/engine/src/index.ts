export * from './types.js';
export {
  ConversationStore,
  InMemoryConversationRepository,
  FileConversationRepository,
  conversationRecordSchema,
  type StoredMessage,
  type ConversationRecord,
  type ConversationRepository,
  type ConversationStoreOptions,
} from './conversation-store.js';
export { ToolRegistry } from './tool-registry.js';
export { ApprovalGate, type ApprovalGateOptions, type ApprovalRequestOptions } from './approval-gate.js';
export { EventChannel, createEventChannel, nullSink, callbackSink } from './stream-sink.js';
export { ToolCallAccumulator } from './tool-call-accumulator.js';
export { CycleStateMachine, type CycleState } from './state-machine.js';
export { mapWithConcurrency } from './concurrency.js';
export { sanitizeToolOutput, summarize } from './sanitize.js';
export {
  CycleEngine,
  DEFAULT_MAX_CYCLES,
  DEFAULT_TOOL_TIMEOUT_MS,
  DEFAULT_APPROVAL_TIMEOUT_MS,
  DEFAULT_TOOL_CONCURRENCY,
  type CycleEngineOptions,
} from './cycle-engine.js';
