import type { ReasonCode, SessionStateName } from './types.js';

const REASON_MESSAGES: Record<ReasonCode, string> = {
  INTENT_PARSE_DEFAULT: 'The question type could not be recognised; a general lookup was assumed.',
  SYNTAX_VALIDATION_ERROR: 'The generated SQL is not syntactically valid.',
  EMPTY_STATEMENT: 'No SQL statement was produced.',
  MULTI_STATEMENT: 'Only a single SQL statement may be executed.',
  FORBIDDEN_KEYWORD: 'The query contains an operation that is not allowed in read-only mode.',
  UNKNOWN_IDENTIFIER: 'The query references a table or column that does not exist.',
  FORBIDDEN_SCHEMA: 'The query references a reserved system schema.',
  JOIN_PATH_NOT_FOUND: 'The tables involved in the question are not connected by foreign keys.',
  EXECUTION_ERROR: 'The database could not run the query.',
  COLLABORATOR_TIMEOUT: 'A backing service did not respond in time.',
  GENERATION_ERROR: 'The SQL could not be generated.',
  MAX_REGENERATIONS_EXCEEDED: 'No valid query could be produced after the maximum number of repair attempts.',
  MAX_CLARIFICATION_ROUNDS_EXCEEDED: 'The maximum number of clarification rounds was reached.',
};

/**
 * Stable, human-readable text for a reason code. Safe to show to end users.
 */
export function describeReason(code: ReasonCode): string {
  return REASON_MESSAGES[code];
}

/**
 * Base class for failures the pipeline knows how to classify.
 */
export class PipelineError extends Error {
  readonly code: ReasonCode;

  constructor(code: ReasonCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class CollaboratorTimeoutError extends PipelineError {
  readonly collaborator: string;
  readonly timeoutMs: number;

  constructor(collaborator: string, timeoutMs: number) {
    super('COLLABORATOR_TIMEOUT', `${collaborator} did not respond within ${timeoutMs}ms`);
    this.collaborator = collaborator;
    this.timeoutMs = timeoutMs;
  }
}

export class ExecutionError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EXECUTION_ERROR', message, options);
  }
}

export class GenerationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('GENERATION_ERROR', message, options);
  }
}

/** Programming error: the driver fed an event the current state does not accept. */
export class InvalidTransitionError extends Error {
  constructor(state: SessionStateName, eventType: string) {
    super(`Event ${eventType} is not valid in state ${state}`);
    this.name = 'InvalidTransitionError';
  }
}

export class CatalogLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CatalogLoadError';
  }
}

export class SessionNotFoundError extends Error {
  constructor(sessionId: string) {
    super(`No session is waiting for a clarification answer: ${sessionId}`);
    this.name = 'SessionNotFoundError';
  }
}

export class SessionBusyError extends Error {
  constructor(sessionId: string) {
    super(`Session ${sessionId} is already processing a question`);
    this.name = 'SessionBusyError';
  }
}

/**
 * Extracts a message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
