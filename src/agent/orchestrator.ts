import type {
  Diagnostic,
  Intent,
  ReasonCode,
  RunQueryResult,
  RunStatus,
  SecurityAction,
  SessionEvent,
  SessionLimits,
  SessionState,
  StepTiming,
  TurnLogRecord,
} from '../types.js';
import type { TextCompletion } from '../tools/completion.js';
import type { SqlExecutor } from '../tools/db.js';
import type { TurnLogSink } from '../tools/turnLog.js';
import type { SecurityLogSink } from '../tools/securityLog.js';
import type { CatalogSnapshot, CatalogStore, SchemaCatalog } from '../tools/catalog.js';
import type { AmbiguityRule } from './ambiguity.js';
import {
  CollaboratorTimeoutError,
  ExecutionError,
  SessionBusyError,
  SessionNotFoundError,
  describeReason,
  errorMessage,
} from '../errors.js';
import { withTimeout } from '../utils/retry.js';
import { summarizeTimings } from '../utils/timing.js';
import { DEFAULT_LIMITS, createSession, isTerminal, transition } from './stateMachine.js';
import { parseIntent, matchTables } from './intent.js';
import { DEFAULT_AMBIGUITY_RULES, detectAmbiguity } from './ambiguity.js';
import { Clarifier, mergeClarification, resolveAnswer } from './clarifier.js';
import { Critic } from './critic.js';
import { SQLWriter } from './sqlWriter.js';
import { AnswerWriter } from './answerWriter.js';
import { validateSyntax, DEFAULT_DIALECT } from './sqlValidator.js';
import { DEFAULT_FORBIDDEN_KEYWORDS, checkSandbox, truncateSql } from './guard.js';
import { planJoinPath, formatJoinHint } from './joinPlanner.js';
import { ContextMemory } from './memory.js';

export interface OrchestratorOptions {
  maxRows: number;
  statementTimeoutMs: number;
  maxResultRowsForLLM: number;
  sqlDialect: string;
  forbiddenKeywords: readonly string[];
  ambiguityRules: readonly AmbiguityRule[];
  limits: SessionLimits;
  /** Memory entries given to the generator as conversation context */
  historyWindow: number;
  /** Extra time the database call gets beyond its statement timeout */
  executionGraceMs: number;
}

const DEFAULT_OPTIONS: OrchestratorOptions = {
  maxRows: 200,
  statementTimeoutMs: 10000,
  maxResultRowsForLLM: 10,
  sqlDialect: DEFAULT_DIALECT,
  forbiddenKeywords: DEFAULT_FORBIDDEN_KEYWORDS,
  ambiguityRules: DEFAULT_AMBIGUITY_RULES,
  limits: DEFAULT_LIMITS,
  historyWindow: 5,
  executionGraceMs: 1000,
};

export interface OrchestratorDeps {
  catalogStore: CatalogStore;
  completion: TextCompletion;
  executor: SqlExecutor;
  turnLog: TurnLogSink;
  /** Receives sandbox denials and database timeouts */
  securityLog?: SecurityLogSink;
  memory?: ContextMemory;
  options?: Partial<OrchestratorOptions>;
  now?: () => Date;
  /** Millisecond clock for step timings */
  clock?: () => number;
}

/** A session in flight, with the catalog snapshot it started on. */
interface Run {
  session: SessionState;
  snapshot: CatalogSnapshot;
  timings: StepTiming[];
}

function collaboratorDiagnostic(error: unknown, fallback: ReasonCode): Diagnostic {
  const code: ReasonCode = error instanceof CollaboratorTimeoutError ? 'COLLABORATOR_TIMEOUT' : fallback;
  return { code, message: describeReason(code), detail: errorMessage(error) };
}

/**
 * Drives sessions through the state machine, one step at a time.
 *
 * Each step calls at most one collaborator and reports the outcome to the
 * pure `transition` function. A session waiting for a clarification answer is
 * parked with its catalog snapshot until `resume` or a new question arrives.
 *
 * @example
 * ```typescript
 * const orchestrator = new Orchestrator({ catalogStore, completion, executor, turnLog });
 * const result = await orchestrator.runQuery('查询前5个客户的名字和邮箱', 'session-1');
 * if (result.needsClarification) {
 *   await orchestrator.resume('session-1', '1');
 * }
 * ```
 */
export class Orchestrator {
  private readonly catalogStore: CatalogStore;
  private readonly executor: SqlExecutor;
  private readonly turnLog: TurnLogSink;
  private readonly securityLog?: SecurityLogSink;
  private readonly memory: ContextMemory;
  private readonly options: OrchestratorOptions;
  private readonly now: () => Date;
  private readonly clock: () => number;

  private readonly sqlWriter: SQLWriter;
  private readonly critic: Critic;
  private readonly clarifier: Clarifier;
  private readonly answerWriter: AnswerWriter;

  private readonly parked = new Map<string, Run>();
  private readonly inFlight = new Set<string>();
  private readonly turns = new Map<string, number>();

  constructor(deps: OrchestratorDeps) {
    this.catalogStore = deps.catalogStore;
    this.executor = deps.executor;
    this.turnLog = deps.turnLog;
    this.securityLog = deps.securityLog;
    this.options = { ...DEFAULT_OPTIONS, ...deps.options };
    this.memory = deps.memory ?? new ContextMemory({ maxEntries: 10, ttlMs: 30 * 60 * 1000 });
    this.now = deps.now ?? (() => new Date());
    this.clock = deps.clock ?? Date.now;

    const dialectName = this.options.sqlDialect === DEFAULT_DIALECT ? 'PostgreSQL' : this.options.sqlDialect;
    this.sqlWriter = new SQLWriter(deps.completion, dialectName);
    this.critic = new Critic(deps.completion);
    this.clarifier = new Clarifier(deps.completion);
    this.answerWriter = new AnswerWriter(deps.completion, this.options.maxResultRowsForLLM);
  }

  /**
   * Runs a new question for a session. A run parked on a clarification for the
   * same session is abandoned.
   */
  async runQuery(question: string, sessionId: string): Promise<RunQueryResult> {
    const trimmed = question.trim();
    if (!trimmed) {
      throw new Error('Question must not be empty');
    }
    if (this.inFlight.has(sessionId)) {
      throw new SessionBusyError(sessionId);
    }

    this.inFlight.add(sessionId);
    try {
      this.evictIdleSessions();
      if (this.parked.delete(sessionId)) {
        console.log('⚠️  Previous clarification abandoned for a new question');
      }

      const turnIndex = (this.turns.get(sessionId) ?? 0) + 1;
      this.turns.set(sessionId, turnIndex);
      const snapshot = this.catalogStore.current();

      console.log(`\n🤔 Question: ${trimmed}\n`);
      this.memory.append(sessionId, {
        turnIndex,
        kind: 'query',
        content: trimmed,
        timestamp: this.now().toISOString(),
      });

      const intent = this.parseIntent(trimmed);
      const session = this.apply(createSession(sessionId, turnIndex, trimmed), {
        type: 'INTENT_PARSED',
        intent,
        matchedTables: matchTables(trimmed, snapshot.catalog),
      });

      return await this.drive({ session, snapshot, timings: [] });
    } finally {
      this.inFlight.delete(sessionId);
    }
  }

  /**
   * Continues a session parked at AWAITING_USER with the user's answer.
   * A bare number selects that clarification option.
   */
  async resume(sessionId: string, answer: string): Promise<RunQueryResult> {
    const trimmed = answer.trim();
    if (!trimmed) {
      throw new Error('Clarification answer must not be empty');
    }
    if (this.inFlight.has(sessionId)) {
      throw new SessionBusyError(sessionId);
    }
    const run = this.parked.get(sessionId);
    if (!run) {
      throw new SessionNotFoundError(sessionId);
    }

    this.inFlight.add(sessionId);
    try {
      this.parked.delete(sessionId);
      const { session } = run;
      const resolved = resolveAnswer(trimmed, session.clarificationOptions);
      const merged = mergeClarification(session.workingQuestion, trimmed, session.clarificationOptions);

      this.memory.append(sessionId, {
        turnIndex: session.turnIndex,
        kind: 'clarification',
        content: resolved,
        timestamp: this.now().toISOString(),
      });
      console.log(`\n✓ Clarified question: ${merged}\n`);

      run.session = this.apply(session, {
        type: 'USER_ANSWERED',
        mergedQuestion: merged,
        intent: this.parseIntent(merged),
        matchedTables: matchTables(merged, run.snapshot.catalog),
      });
      return await this.drive(run);
    } finally {
      this.inFlight.delete(sessionId);
    }
  }

  /** Drops any parked run and the session's conversation memory. */
  endSession(sessionId: string): void {
    if (this.inFlight.has(sessionId)) {
      throw new SessionBusyError(sessionId);
    }
    this.parked.delete(sessionId);
    this.turns.delete(sessionId);
    this.memory.clear(sessionId);
  }

  isAwaitingUser(sessionId: string): boolean {
    return this.parked.has(sessionId);
  }

  /** Formatted conversation window for a session, empty when there is none. */
  history(sessionId: string): string {
    return this.memory.formatForPrompt(sessionId, this.options.historyWindow);
  }

  /**
   * Swaps in a new catalog snapshot. Sessions already running, parked ones
   * included, finish on the snapshot they started with.
   */
  async reloadCatalog(loader: () => Promise<SchemaCatalog>): Promise<CatalogSnapshot> {
    return this.catalogStore.reload(loader);
  }

  // ============================================================================
  // Driving
  // ============================================================================

  private async drive(run: Run): Promise<RunQueryResult> {
    while (!isTerminal(run.session.state) && run.session.state !== 'AWAITING_USER') {
      const state = run.session.state;
      const started = this.clock();
      run.session = await this.step(run);
      run.timings.push({ state, elapsedMs: this.clock() - started });
    }

    const { session } = run;
    const performance = summarizeTimings(run.timings);
    if (performance.slowest) {
      console.log(`   ⏱️  ${performance.totalMs}ms so far, slowest step ${performance.slowest.state} (${performance.slowest.elapsedMs}ms)`);
    }

    if (session.state === 'AWAITING_USER') {
      this.parked.set(session.sessionId, run);
      console.log(
        `\n🤔 Clarification needed (round ${session.clarificationRoundCount + 1}/${this.options.limits.maxClarificationRounds}):`
      );
      console.log(`   ${session.clarificationQuestion ?? ''}\n`);
    } else {
      await this.archive(run);
    }
    return this.toResult(run);
  }

  private apply(session: SessionState, event: SessionEvent): SessionState {
    return transition(session, event, this.options.limits);
  }

  private async step(run: Run): Promise<SessionState> {
    const { session, snapshot } = run;

    switch (session.state) {
      case 'INTENT_PARSED':
        return this.apply(session, await this.generate(run, false));

      case 'CRITIQUING':
        if (session.critique === null) {
          return this.apply(session, await this.critique(run));
        }
        return this.apply(session, await this.generate(run, true));

      case 'GENERATED': {
        const ambiguity = detectAmbiguity(
          {
            question: session.workingQuestion,
            intent: this.intentOf(session),
            turnIndex: session.turnIndex,
            history: this.memory.recent(session.sessionId),
          },
          this.options.ambiguityRules
        );
        if (ambiguity && session.clarificationRoundCount >= this.options.limits.maxClarificationRounds) {
          console.log(
            `\n⚠️  Maximum clarification rounds (${this.options.limits.maxClarificationRounds}) reached. Proceeding with the current question.\n`
          );
        }
        return this.apply(session, { type: 'AMBIGUITY_CHECKED', ambiguity });
      }

      case 'CLARIFY_NEEDED': {
        const ambiguity = session.pendingAmbiguity;
        if (!ambiguity) {
          throw new Error(`Session ${session.sessionId} needs clarification but has no ambiguity recorded`);
        }
        const prompt = await this.clarifier.prepare({
          question: session.workingQuestion,
          ambiguity,
          catalog: snapshot.catalog,
          matchedTables: session.matchedTables,
          history: this.history(session.sessionId),
        });
        return this.apply(session, { type: 'CLARIFICATION_PREPARED', prompt });
      }

      case 'VALIDATING': {
        const result = validateSyntax(session.candidateSql ?? '', this.options.sqlDialect);
        if (result.valid) {
          console.log('   ✓ Syntax valid');
        } else {
          console.warn(`   ⚠️  Syntax invalid: ${result.diagnostics.map(d => d.detail ?? d.message).join('; ')}`);
        }
        return this.apply(session, { type: 'VALIDATED', result });
      }

      case 'VALID':
        return this.apply(session, { type: 'SANDBOX_REQUESTED' });

      case 'SANDBOX_CHECK': {
        const decision = checkSandbox(session.candidateSql ?? '', snapshot.catalog, {
          maxRows: this.options.maxRows,
          timeoutMs: this.options.statementTimeoutMs,
          forbiddenKeywords: this.options.forbiddenKeywords,
          dialect: this.options.sqlDialect,
        });
        if (decision.allowed) {
          console.log(`   🛡️  Sandbox allowed: ${decision.normalizedSql}`);
        } else {
          console.warn(
            `   🚫 Sandbox denied (${decision.reasonCode ?? 'UNKNOWN'}): ${decision.reason ?? ''} | SQL: ${truncateSql(session.candidateSql ?? '')}`
          );
          await this.recordSecurityEvent(
            session,
            'blocked',
            decision.reasonCode ?? 'FORBIDDEN_KEYWORD',
            decision.reason ?? describeReason(decision.reasonCode ?? 'FORBIDDEN_KEYWORD'),
            session.candidateSql ?? ''
          );
        }
        return this.apply(session, { type: 'SANDBOX_CHECKED', decision });
      }

      case 'INVALID': {
        const next = this.apply(session, { type: 'ROUTE_INVALID' });
        if (next.state === 'CRITIQUING') {
          console.log(`   🔄 Repair attempt ${session.regenerationCount + 1}/${this.options.limits.maxRegenerations}`);
        } else {
          console.error(`   ❌ ${describeReason('MAX_REGENERATIONS_EXCEEDED')}`);
        }
        return next;
      }

      case 'EXECUTING':
        return this.apply(session, await this.execute(session));

      case 'ANSWERING': {
        if (session.isChatReply) {
          return this.apply(session, { type: 'ANSWERED', answer: session.finalAnswer ?? '' });
        }
        const result = session.executionResult;
        const decision = session.sandboxDecision;
        if (!result || !decision) {
          throw new Error(`Session ${session.sessionId} reached ANSWERING without an execution result`);
        }
        console.log('   Interpreting results...');
        const answer = await this.answerWriter.answer({
          question: session.workingQuestion,
          sql: decision.normalizedSql,
          result,
        });
        return this.apply(session, { type: 'ANSWERED', answer });
      }

      case 'START':
      case 'AWAITING_USER':
      case 'DONE':
      case 'FAILED':
        throw new Error(`No step runs in state ${session.state}`);
    }
  }

  private async generate(run: Run, repair: boolean): Promise<SessionEvent> {
    const { session, snapshot } = run;

    let joinHint: string | undefined;
    if (session.matchedTables.length >= 2) {
      const plan = planJoinPath(snapshot.graph, session.matchedTables);
      if (plan.status === 'OK') {
        joinHint = formatJoinHint(plan);
        if (plan.waypoints.length > 0) {
          console.log(`   🔗 Join path via ${plan.waypoints.join(', ')}`);
        }
      } else if (!repair) {
        console.warn(`   ⚠️  No join path for: ${plan.missing.join(', ')}`);
        return {
          type: 'GENERATION_FAILED',
          diagnostic: {
            code: 'JOIN_PATH_NOT_FOUND',
            message: describeReason('JOIN_PATH_NOT_FOUND'),
            detail: `No foreign-key path connects ${plan.missing.join(', ')} to ${plan.anchor ?? 'the other tables'}`,
          },
        };
      }
    }

    console.log(repair ? '   Regenerating SQL...' : '   Generating SQL...');
    try {
      const outcome = await this.sqlWriter.generate({
        question: session.workingQuestion,
        intent: this.intentOf(session),
        catalog: snapshot.catalog,
        matchedTables: session.matchedTables,
        joinHint,
        history: this.history(session.sessionId),
        repair: repair
          ? { previousSql: session.candidateSql, diagnostics: session.lastDiagnostics, critique: session.critique }
          : undefined,
      });

      if (outcome.kind === 'chat') {
        console.log('   💬 Chat reply');
        return { type: 'CHAT_REPLY', text: outcome.text };
      }
      console.log(`   📄 SQL: ${outcome.sql}`);
      return { type: 'SQL_GENERATED', sql: outcome.sql };
    } catch (error) {
      console.error(`   ❌ SQL generation failed: ${errorMessage(error)}`);
      return { type: 'GENERATION_FAILED', diagnostic: collaboratorDiagnostic(error, 'GENERATION_ERROR') };
    }
  }

  private async critique(run: Run): Promise<SessionEvent> {
    const { session, snapshot } = run;
    console.log('   Reviewing the failed query...');
    try {
      const rationale = await this.critic.critique({
        question: session.workingQuestion,
        sql: session.candidateSql,
        diagnostics: session.lastDiagnostics,
        catalog: snapshot.catalog,
        matchedTables: session.matchedTables,
      });
      return { type: 'CRITIQUED', rationale };
    } catch (error) {
      console.error(`   ❌ Critique failed: ${errorMessage(error)}`);
      return { type: 'GENERATION_FAILED', diagnostic: collaboratorDiagnostic(error, 'GENERATION_ERROR') };
    }
  }

  private async execute(session: SessionState): Promise<SessionEvent> {
    const decision = session.sandboxDecision;
    if (!decision || !decision.allowed) {
      throw new Error(`Session ${session.sessionId} reached EXECUTING without an allowed sandbox decision`);
    }

    console.log('   Executing query...');
    try {
      const result = await withTimeout('database', decision.timeoutMs + this.options.executionGraceMs, signal =>
        this.executor.execute(decision.normalizedSql, {
          timeoutMs: decision.timeoutMs,
          maxRows: this.options.maxRows,
          signal,
        })
      );
      console.log(`   ✓ Query executed: ${result.rowCount} rows in ${result.durationMs}ms`);
      return { type: 'EXECUTED', result };
    } catch (error) {
      console.error(`   ❌ ${errorMessage(error)}`);
      const timeoutCode = this.timeoutCode(error);
      if (timeoutCode) {
        await this.recordSecurityEvent(session, 'timeout', timeoutCode, errorMessage(error), decision.normalizedSql);
      }
      return {
        type: 'EXECUTION_FAILED',
        diagnostic: { code: 'EXECUTION_ERROR', message: describeReason('EXECUTION_ERROR'), detail: errorMessage(error) },
      };
    }
  }

  // ============================================================================
  // Results and archiving
  // ============================================================================

  private parseIntent(question: string): Intent {
    const intent = parseIntent(question, this.now());
    if (intent.defaulted) {
      console.log(`   ℹ️  ${describeReason('INTENT_PARSE_DEFAULT')}`);
    }
    return intent;
  }

  private intentOf(session: SessionState): Intent {
    return session.intent ?? parseIntent(session.workingQuestion, this.now());
  }

  private timeoutCode(error: unknown): ReasonCode | null {
    if (error instanceof CollaboratorTimeoutError) return 'COLLABORATOR_TIMEOUT';
    if (error instanceof ExecutionError && /statement timeout/i.test(error.message)) return 'EXECUTION_ERROR';
    return null;
  }

  private async recordSecurityEvent(
    session: SessionState,
    action: SecurityAction,
    code: ReasonCode,
    reason: string,
    sql: string
  ): Promise<void> {
    if (!this.securityLog) return;
    try {
      await this.securityLog.record({
        timestamp: this.now().toISOString(),
        sessionId: session.sessionId,
        turnIndex: session.turnIndex,
        action,
        code,
        reason,
        sql,
      });
    } catch (error) {
      console.error(`   ❌ Failed to write security log: ${errorMessage(error)}`);
    }
  }

  private evictIdleSessions(): void {
    for (const sessionId of this.memory.evictIdle(this.inFlight)) {
      this.parked.delete(sessionId);
      this.turns.delete(sessionId);
    }
  }

  private finalSql(session: SessionState): string | null {
    return session.sandboxDecision?.allowed ? session.sandboxDecision.normalizedSql : session.candidateSql;
  }

  private reasonCode(session: SessionState): ReasonCode | undefined {
    if (session.failure) return session.failure.code;
    if (session.state === 'DONE' && session.clarificationExhausted) return 'MAX_CLARIFICATION_ROUNDS_EXCEEDED';
    return undefined;
  }

  private toResult(run: Run): RunQueryResult {
    const { session } = run;
    const status: RunStatus =
      session.state === 'AWAITING_USER' ? 'AWAITING_USER' : session.state === 'DONE' ? 'DONE' : 'FAILED';
    const code = this.reasonCode(session);
    const last = session.failure?.lastDiagnostics[0];

    return {
      sessionId: session.sessionId,
      status,
      candidateSql: this.finalSql(session),
      validationPassed: session.validation?.valid ?? false,
      regenerationCount: session.regenerationCount,
      clarificationRoundCount: session.clarificationRoundCount,
      executionResult: session.executionResult,
      answer: session.finalAnswer,
      isChatReply: session.isChatReply,
      needsClarification: status === 'AWAITING_USER',
      clarificationQuestion: session.clarificationQuestion,
      clarificationOptions: [...session.clarificationOptions],
      reasonCode: code,
      reason: code ? (session.failure?.reason ?? describeReason(code)) : undefined,
      lastDiagnostic: last ? { code: last.code, message: last.message } : undefined,
      performance: summarizeTimings(run.timings),
    };
  }

  private async archive(run: Run): Promise<void> {
    const { session } = run;
    const timestamp = this.now().toISOString();
    const { sessionId, turnIndex } = session;

    if (session.state === 'DONE' && session.isChatReply) {
      this.memory.append(sessionId, { turnIndex, kind: 'chat', content: session.finalAnswer ?? '', timestamp });
    } else if (session.state === 'DONE') {
      this.memory.append(sessionId, {
        turnIndex,
        kind: 'answer',
        content: session.finalAnswer ?? '',
        timestamp,
        sql: this.finalSql(session) ?? undefined,
        rowCount: session.executionResult?.rowCount,
      });
    } else {
      this.memory.append(sessionId, {
        turnIndex,
        kind: 'answer',
        content: `Failed: ${session.failure?.reason ?? describeReason('MAX_REGENERATIONS_EXCEEDED')}`,
        timestamp,
        sql: session.failure?.lastSql ?? undefined,
      });
    }

    const result = session.executionResult;
    const record: TurnLogRecord = {
      sessionId,
      turnIndex,
      timestamp,
      question: session.rawQuestion,
      workingQuestion: session.workingQuestion,
      intent: session.intent,
      candidateSql: this.finalSql(session),
      validationPassed: session.validation?.valid ?? false,
      regenerationCount: session.regenerationCount,
      clarificationRoundCount: session.clarificationRoundCount,
      sandboxDecision: session.sandboxDecision,
      executionSummary: result ? { rowCount: result.rowCount, columns: result.columns, durationMs: result.durationMs } : null,
      status: session.state === 'DONE' ? 'DONE' : 'FAILED',
      reasonCode: this.reasonCode(session) ?? null,
      trail: session.trail,
      performance: summarizeTimings(run.timings),
    };

    try {
      await this.turnLog.append(record);
    } catch (error) {
      console.error(`   ❌ Failed to write turn log: ${errorMessage(error)}`);
    }
  }
}
