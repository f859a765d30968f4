import type { RetryConfig } from './utils/retry.js';

/** Hard bounds on the repair and clarification loops. */
export const MAX_REGENERATIONS = 3;
export const MAX_CLARIFICATION_ROUNDS = 3;

// ============================================================================
// Schema Catalog
// ============================================================================

export interface ColumnInfo {
  name: string;
  type: string;
  nullable: boolean;
  isPrimaryKey: boolean;
}

export interface ForeignKeyInfo {
  column: string;
  refTable: string;
  refColumn: string;
  nullable: boolean;
}

export interface TableInfo {
  name: string;
  columns: readonly ColumnInfo[];
  foreignKeys: readonly ForeignKeyInfo[];
  /** Natural-language names for the table (e.g. 客户 for customer) */
  aliases: readonly string[];
  description?: string;
}

// ============================================================================
// Reason codes and diagnostics
// ============================================================================

export type SandboxReasonCode =
  | 'EMPTY_STATEMENT'
  | 'MULTI_STATEMENT'
  | 'FORBIDDEN_KEYWORD'
  | 'UNKNOWN_IDENTIFIER'
  | 'FORBIDDEN_SCHEMA';

export type ReasonCode =
  | SandboxReasonCode
  | 'INTENT_PARSE_DEFAULT'
  | 'SYNTAX_VALIDATION_ERROR'
  | 'JOIN_PATH_NOT_FOUND'
  | 'EXECUTION_ERROR'
  | 'COLLABORATOR_TIMEOUT'
  | 'GENERATION_ERROR'
  | 'MAX_REGENERATIONS_EXCEEDED'
  | 'MAX_CLARIFICATION_ROUNDS_EXCEEDED';

/**
 * One problem found with a candidate query.
 * `message` is safe to show to the end user; `detail` carries raw collaborator
 * text and only goes to the log and the critique prompt.
 */
export interface Diagnostic {
  code: ReasonCode;
  message: string;
  detail?: string;
  fragment?: string;
  line?: number;
  column?: number;
}

export interface ValidationResult {
  valid: boolean;
  diagnostics: Diagnostic[];
}

// ============================================================================
// Intent
// ============================================================================

export type QuestionType = 'ranking' | 'aggregate' | 'list' | 'lookup';

export interface TimeRange {
  label: string;
  /** Inclusive ISO date (YYYY-MM-DD) */
  start: string;
  /** Inclusive ISO date (YYYY-MM-DD) */
  end: string;
}

export interface Intent {
  questionType: QuestionType;
  rowLimit: number | null;
  timeRange: TimeRange | null;
  /** True when no question-type rule matched and `lookup` was assumed */
  defaulted: boolean;
}

// ============================================================================
// Sandbox and execution
// ============================================================================

export interface ReferencedIdentifiers {
  tables: string[];
  columns: string[];
}

export interface SandboxDecision {
  allowed: boolean;
  reasonCode?: SandboxReasonCode;
  reason?: string;
  normalizedSql: string;
  referencedIdentifiers: ReferencedIdentifiers;
  /** Execution-time budget attached to the statement */
  timeoutMs: number;
}

export type SqlValue = string | number | boolean | null | Date | Record<string, unknown> | unknown[];

export interface SQLResult {
  columns: string[];
  rows: SqlValue[][];
  rowCount: number;
  durationMs: number;
}

// ============================================================================
// Context Memory
// ============================================================================

export type MemoryEntryKind = 'query' | 'clarification' | 'answer' | 'chat';

export interface MemoryEntry {
  turnIndex: number;
  kind: MemoryEntryKind;
  content: string;
  /** ISO timestamp */
  timestamp: string;
  sql?: string;
  rowCount?: number;
}

// ============================================================================
// Clarification
// ============================================================================

export type AmbiguityKind = 'reference' | 'time_range' | 'ordering';

export interface Ambiguity {
  ruleId: string;
  kind: AmbiguityKind;
  reason: string;
}

export interface ClarificationPrompt {
  question: string;
  /** At most five closed-form options */
  options: string[];
}

// ============================================================================
// Session state machine
// ============================================================================

export type SessionStateName =
  | 'START'
  | 'INTENT_PARSED'
  | 'GENERATED'
  | 'CLARIFY_NEEDED'
  | 'AWAITING_USER'
  | 'VALIDATING'
  | 'VALID'
  | 'INVALID'
  | 'CRITIQUING'
  | 'SANDBOX_CHECK'
  | 'EXECUTING'
  | 'ANSWERING'
  | 'DONE'
  | 'FAILED';

export interface SessionFailure {
  code: ReasonCode;
  reason: string;
  lastDiagnostics: Diagnostic[];
  lastSql: string | null;
}

export interface SessionState {
  sessionId: string;
  turnIndex: number;
  state: SessionStateName;
  /** Every state entered, in order */
  trail: SessionStateName[];
  rawQuestion: string;
  workingQuestion: string;
  intent: Intent | null;
  matchedTables: string[];
  candidateSql: string | null;
  validation: ValidationResult | null;
  lastDiagnostics: Diagnostic[];
  critique: string | null;
  regenerationCount: number;
  clarificationRoundCount: number;
  clarificationExhausted: boolean;
  pendingAmbiguity: Ambiguity | null;
  clarificationQuestion: string | null;
  clarificationOptions: string[];
  sandboxDecision: SandboxDecision | null;
  executionResult: SQLResult | null;
  finalAnswer: string | null;
  isChatReply: boolean;
  failure: SessionFailure | null;
}

export interface SessionLimits {
  maxRegenerations: number;
  maxClarificationRounds: number;
}

export type SessionEvent =
  | { type: 'INTENT_PARSED'; intent: Intent; matchedTables: string[] }
  | { type: 'SQL_GENERATED'; sql: string }
  | { type: 'CHAT_REPLY'; text: string }
  | { type: 'GENERATION_FAILED'; diagnostic: Diagnostic }
  | { type: 'AMBIGUITY_CHECKED'; ambiguity: Ambiguity | null }
  | { type: 'CLARIFICATION_PREPARED'; prompt: ClarificationPrompt }
  | { type: 'USER_ANSWERED'; mergedQuestion: string; intent: Intent; matchedTables: string[] }
  | { type: 'VALIDATED'; result: ValidationResult }
  | { type: 'SANDBOX_REQUESTED' }
  | { type: 'SANDBOX_CHECKED'; decision: SandboxDecision }
  | { type: 'ROUTE_INVALID' }
  | { type: 'CRITIQUED'; rationale: string }
  | { type: 'EXECUTED'; result: SQLResult }
  | { type: 'EXECUTION_FAILED'; diagnostic: Diagnostic }
  | { type: 'ANSWERED'; answer: string };

// ============================================================================
// Step timing
// ============================================================================

export interface StepTiming {
  /** State the step ran from */
  state: SessionStateName;
  elapsedMs: number;
}

export interface PerformanceSummary {
  totalMs: number;
  steps: StepTiming[];
  slowest: StepTiming | null;
}

// ============================================================================
// Security events
// ============================================================================

export type SecurityAction = 'blocked' | 'timeout';

export interface SecurityEvent {
  /** ISO timestamp */
  timestamp: string;
  sessionId: string;
  turnIndex: number;
  action: SecurityAction;
  code: ReasonCode;
  reason: string;
  sql: string;
}

// ============================================================================
// Public result and turn log
// ============================================================================

export type RunStatus = 'DONE' | 'FAILED' | 'AWAITING_USER';

export interface RunQueryResult {
  sessionId: string;
  status: RunStatus;
  candidateSql: string | null;
  validationPassed: boolean;
  regenerationCount: number;
  clarificationRoundCount: number;
  executionResult: SQLResult | null;
  answer: string | null;
  isChatReply: boolean;
  needsClarification: boolean;
  clarificationQuestion: string | null;
  clarificationOptions: string[];
  reasonCode?: ReasonCode;
  reason?: string;
  lastDiagnostic?: { code: ReasonCode; message: string };
  /** Steps run so far for this question, resumed rounds included */
  performance: PerformanceSummary;
}

export interface TurnLogRecord {
  sessionId: string;
  turnIndex: number;
  timestamp: string;
  question: string;
  workingQuestion: string;
  intent: Intent | null;
  candidateSql: string | null;
  validationPassed: boolean;
  regenerationCount: number;
  clarificationRoundCount: number;
  sandboxDecision: SandboxDecision | null;
  executionSummary: { rowCount: number; columns: string[]; durationMs: number } | null;
  status: 'DONE' | 'FAILED';
  reasonCode: ReasonCode | null;
  trail: SessionStateName[];
  performance: PerformanceSummary;
}

// ============================================================================
// Configuration
// ============================================================================

export type LlmProvider = 'gemini' | 'anthropic';

export interface Config {
  llmProvider: LlmProvider;
  geminiApiKey?: string;
  geminiModel: string;
  anthropicApiKey?: string;
  anthropicModel: string;
  llmMaxTokens: number;
  /** Wall-clock budget for one completion call, retries included */
  llmTimeoutMs: number;
  databaseUrl: string;
  /** Database for the turn log; JSONL file logging when unset */
  controlDbUrl?: string;
  /** Catalog document path; introspect the database when unset */
  catalogPath?: string;
  maxRows: number;
  statementTimeoutMs: number;
  maxResultRowsForLLM: number;
  memoryMaxEntries: number;
  memoryTtlMs: number;
  turnLogPath: string;
  /** JSONL file for denied and timed-out statements */
  securityLogPath: string;
  sqlDialect: string;
  retry: RetryConfig;
}
