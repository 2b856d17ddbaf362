export class AgoraError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public override readonly cause?: Error,
  ) {
    super(message);
    this.name = 'AgoraError';
  }
}

export class VersionConflictError extends AgoraError {
  constructor(
    public readonly key: string,
    public readonly expectedVersion: number,
    public readonly actualVersion: number,
  ) {
    super(
      `Version conflict on ${key}: expected ${String(expectedVersion)}, found ${String(actualVersion)}`,
      'VERSION_CONFLICT',
    );
    this.name = 'VersionConflictError';
  }
}

export class NotFoundError extends AgoraError {
  constructor(message: string) {
    super(message, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class TaskTimeoutError extends AgoraError {
  constructor(
    public readonly taskId: string,
    public readonly timeoutMs: number,
  ) {
    super(`Task ${taskId} timed out after ${String(timeoutMs)}ms`, 'TASK_TIMEOUT');
    this.name = 'TaskTimeoutError';
  }
}

export class AgentInvocationError extends AgoraError {
  constructor(
    message: string,
    public readonly agentType: string,
    public readonly retryable: boolean,
    cause?: Error,
  ) {
    super(message, 'AGENT_INVOCATION_ERROR', cause);
    this.name = 'AgentInvocationError';
  }
}

export class InconclusiveMatchError extends AgoraError {
  constructor(message: string, cause?: Error) {
    super(message, 'INCONCLUSIVE_MATCH', cause);
    this.name = 'InconclusiveMatchError';
  }
}

export class ResourceExhaustedError extends AgoraError {
  constructor(message: string) {
    super(message, 'RESOURCE_EXHAUSTED');
    this.name = 'ResourceExhaustedError';
  }
}

export class GoalInvalidatedError extends AgoraError {
  constructor(message: string) {
    super(message, 'GOAL_INVALIDATED');
    this.name = 'GoalInvalidatedError';
  }
}

export class InvalidTransitionError extends AgoraError {
  constructor(message: string) {
    super(message, 'INVALID_TRANSITION');
    this.name = 'InvalidTransitionError';
  }
}

export class ProvenanceError extends AgoraError {
  constructor(message: string) {
    super(message, 'PROVENANCE_ERROR');
    this.name = 'ProvenanceError';
  }
}

export class PersistenceError extends AgoraError {
  constructor(message: string, cause?: Error) {
    super(message, 'PERSISTENCE_ERROR', cause);
    this.name = 'PersistenceError';
  }
}

export class LlmError extends AgoraError {
  constructor(
    message: string,
    public readonly isTransient: boolean,
    cause?: Error,
  ) {
    super(message, 'LLM_ERROR', cause);
    this.name = 'LlmError';
  }
}

export class AgentError extends AgoraError {
  constructor(message: string, cause?: Error) {
    super(message, 'AGENT_ERROR', cause);
    this.name = 'AgentError';
  }
}

export class SessionError extends AgoraError {
  constructor(message: string) {
    super(message, 'SESSION_ERROR');
    this.name = 'SessionError';
  }
}

export class SchemaValidationError extends AgoraError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class ConfigurationError extends AgoraError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
