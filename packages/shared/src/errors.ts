/**
 * Error taxonomy shared by the model client and the cycle engine.
 *
 * Errors that can be reported back to the model as a tool result
 * (argument and execution failures) are distinguished from the ones that end
 * a run (protocol failures, unknown tools).
 */

export type ErrorCode =
  | 'TRANSIENT'
  | 'PROTOCOL'
  | 'TOOL_NOT_FOUND'
  | 'TOOL_ARGUMENT_INVALID'
  | 'TOOL_EXECUTION'
  | 'DUPLICATE_TOOL'
  | 'ORDER_VIOLATION'
  | 'CONVERSATION_BUSY'
  | 'APPROVAL';

export class TesseraError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Network or server-side failure at the model boundary. Retryable. */
export class TransientError extends TesseraError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super('TRANSIENT', message, options);
    this.status = options?.status;
  }
}

/** A model response that cannot be shaped into the expected form, or retries ran out. */
export class ProtocolError extends TesseraError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PROTOCOL', message, options);
  }
}

export class ToolNotFoundError extends TesseraError {
  readonly toolName: string;

  constructor(toolName: string) {
    super('TOOL_NOT_FOUND', `Tool '${toolName}' is not registered`);
    this.toolName = toolName;
  }
}

export class ToolArgumentInvalidError extends TesseraError {
  readonly toolName: string;

  constructor(toolName: string, detail: string) {
    super('TOOL_ARGUMENT_INVALID', `Invalid arguments for tool '${toolName}': ${detail}`);
    this.toolName = toolName;
  }
}

export class ToolExecutionError extends TesseraError {
  readonly toolName: string;

  constructor(toolName: string, message: string, options?: { cause?: unknown }) {
    super('TOOL_EXECUTION', message, options);
    this.toolName = toolName;
  }
}

export class DuplicateToolError extends TesseraError {
  constructor(toolName: string) {
    super('DUPLICATE_TOOL', `Tool '${toolName}' is already registered`);
  }
}

export class OrderViolationError extends TesseraError {
  constructor(message: string) {
    super('ORDER_VIOLATION', message);
  }
}

export class ConversationBusyError extends TesseraError {
  readonly conversationId: string;

  constructor(conversationId: string) {
    super('CONVERSATION_BUSY', `Conversation '${conversationId}' already has an active cycle`);
    this.conversationId = conversationId;
  }
}

export class ApprovalError extends TesseraError {
  constructor(message: string) {
    super('APPROVAL', message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
