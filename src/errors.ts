/**
 * Error taxonomy for a chat turn.
 *
 * Only ConfigError is fatal (raised at startup or when the chat route is hit
 * without an LLM configured). Transport, auth and malformed-response errors end
 * the current turn as `failed`; tool errors never leave the dispatcher.
 */
export class ChatServiceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ChatServiceError';
  }
}

export class ConfigError extends ChatServiceError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class AuthError extends ChatServiceError {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthError';
    this.status = status;
  }
}

export class TransportError extends ChatServiceError {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
    this.status = status;
  }
}

export class MalformedResponseError extends ChatServiceError {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedResponseError';
  }
}

export class ToolExecutionError extends ChatServiceError {
  readonly toolName: string;

  constructor(toolName: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause);
    super(`Tool ${toolName} failed: ${reason}`, options);
    this.name = 'ToolExecutionError';
    this.toolName = toolName;
  }
}

export class DuplicateToolError extends ChatServiceError {
  constructor(toolName: string) {
    super(`Tool already registered: ${toolName}`);
    this.name = 'DuplicateToolError';
  }
}

/** Errors that end a turn as `failed` rather than crashing the request. */
export function isTurnFailure(error: unknown): error is AuthError | TransportError | MalformedResponseError {
  return (
    error instanceof AuthError ||
    error instanceof TransportError ||
    error instanceof MalformedResponseError
  );
}
