/**
 * Base error class for all agent runtime errors.
 * Extends Error with a machine-readable code and structured context.
 */
export class AgentError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(params: {
    message: string;
    code: string;
    cause?: Error;
    context?: Record<string, unknown>;
    isOperational?: boolean;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'AgentError';
    this.code = params.code;
    this.context = params.context;
    this.isOperational = params.isOperational ?? true;
  }
}

// ─── Provider Failures ──────────────────────────────────────────

/**
 * How a completion request failed.
 * `rate_limit` and `connection` are transient; `protocol` and `aborted` are not.
 */
export type FailureKind = 'rate_limit' | 'connection' | 'protocol' | 'aborted';

const FAILURE_CODES: Record<FailureKind, string> = {
  rate_limit: 'RATE_LIMITED',
  connection: 'CONNECTION_FAILED',
  protocol: 'PROVIDER_ERROR',
  aborted: 'ABORTED',
};

/** Thrown (or returned) when an LLM provider call fails. */
export class ProviderError extends AgentError {
  public readonly provider: string;
  public readonly failureKind: FailureKind;

  constructor(params: {
    provider: string;
    failureKind: FailureKind;
    message: string;
    cause?: Error;
    status?: number;
  }) {
    super({
      message: params.message,
      code: FAILURE_CODES[params.failureKind],
      cause: params.cause,
      context: {
        provider: params.provider,
        failureKind: params.failureKind,
        ...(params.status !== undefined ? { status: params.status } : {}),
      },
    });
    this.name = 'ProviderError';
    this.provider = params.provider;
    this.failureKind = params.failureKind;
  }

  /** Whether another attempt of the same request may succeed. */
  get retryable(): boolean {
    return this.failureKind === 'rate_limit' || this.failureKind === 'connection';
  }
}

// ─── Tool Failures ──────────────────────────────────────────────

/** Thrown when a tool's execute() fails at runtime. */
export class ToolExecutionError extends AgentError {
  constructor(toolName: string, message: string, cause?: Error) {
    super({
      message: `Tool "${toolName}" execution failed: ${message}`,
      code: 'TOOL_EXECUTION_ERROR',
      cause,
      context: { toolName },
    });
    this.name = 'ToolExecutionError';
  }
}

/** Thrown when input validation (Zod) fails. */
export class ValidationError extends AgentError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'VALIDATION_ERROR',
      context,
    });
    this.name = 'ValidationError';
  }
}

// ─── Agent Failures ─────────────────────────────────────────────

/** Thrown when a turn is started while another one is still running. */
export class AgentBusyError extends AgentError {
  constructor() {
    super({
      message: 'A turn is already in progress on this agent',
      code: 'AGENT_BUSY',
      isOperational: false,
    });
    this.name = 'AgentBusyError';
  }
}

// ─── Classification ─────────────────────────────────────────────

/**
 * Normalize anything thrown by a transport into a ProviderError.
 * Transports classify their own SDK errors; whatever else escapes is
 * treated as a fatal protocol failure.
 */
export function classifyFailure(error: unknown, provider = 'unknown'): ProviderError {
  if (error instanceof ProviderError) return error;

  if (error instanceof Error && error.name === 'AbortError') {
    return new ProviderError({
      provider,
      failureKind: 'aborted',
      message: 'Request was aborted',
      cause: error,
    });
  }

  return new ProviderError({
    provider,
    failureKind: 'protocol',
    message: error instanceof Error ? error.message : String(error),
    cause: error instanceof Error ? error : undefined,
  });
}
