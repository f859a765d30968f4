import { describe, it, expect } from 'vitest';
import { createSession, isTerminal, transition } from '../stateMachine.js';
import { InvalidTransitionError, describeReason } from '../../errors.js';
import type {
  Ambiguity,
  Diagnostic,
  Intent,
  SandboxDecision,
  SessionEvent,
  SessionLimits,
  SessionState,
} from '../../types.js';
import { result } from './fixtures.js';

const intent: Intent = { questionType: 'list', rowLimit: 5, timeRange: null, defaulted: false };
const ambiguity: Ambiguity = { ruleId: 'popularity-without-time', kind: 'time_range', reason: 'No period' };
const unknownColumn: Diagnostic = { code: 'UNKNOWN_IDENTIFIER', message: 'Unknown column' };

function decision(allowed: boolean, extra: Partial<SandboxDecision> = {}): SandboxDecision {
  return {
    allowed,
    normalizedSql: 'SELECT 1 LIMIT 200',
    referencedIdentifiers: { tables: [], columns: [] },
    timeoutMs: 10000,
    ...extra,
  };
}

function run(events: SessionEvent[], limits?: SessionLimits, start = createSession('s1', 1, 'q')): SessionState {
  return events.reduce((session, event) => transition(session, event, limits), start);
}

const parsed: SessionEvent = { type: 'INTENT_PARSED', intent, matchedTables: ['customer'] };
const generated: SessionEvent = { type: 'SQL_GENERATED', sql: 'SELECT 1' };

describe('Session state machine', () => {
  it('should walk the happy path to DONE', () => {
    const session = run([
      parsed,
      generated,
      { type: 'AMBIGUITY_CHECKED', ambiguity: null },
      { type: 'VALIDATED', result: { valid: true, diagnostics: [] } },
      { type: 'SANDBOX_REQUESTED' },
      { type: 'SANDBOX_CHECKED', decision: decision(true) },
      { type: 'EXECUTED', result: result(['n'], [[1]]) },
      { type: 'ANSWERED', answer: 'One row.' },
    ]);

    expect(session.state).toBe('DONE');
    expect(session.trail).toEqual([
      'START',
      'INTENT_PARSED',
      'GENERATED',
      'VALIDATING',
      'VALID',
      'SANDBOX_CHECK',
      'EXECUTING',
      'ANSWERING',
      'DONE',
    ]);
    expect(session.finalAnswer).toBe('One row.');
    expect(session.sandboxDecision?.normalizedSql).toBe('SELECT 1 LIMIT 200');
  });

  it('should not mutate the input session', () => {
    const start = createSession('s1', 1, 'q');
    transition(start, parsed);
    expect(start.state).toBe('START');
    expect(start.trail).toEqual(['START']);
  });

  it('should reject events the state does not accept', () => {
    expect(() => transition(createSession('s1', 1, 'q'), { type: 'ANSWERED', answer: 'x' })).toThrow(
      new InvalidTransitionError('START', 'ANSWERED')
    );
    expect(() => run([parsed, { type: 'ROUTE_INVALID' }])).toThrow('Event ROUTE_INVALID is not valid in state INTENT_PARSED');
  });

  it('should accept nothing once terminal', () => {
    const done = run([parsed, { type: 'CHAT_REPLY', text: 'Hi' }, { type: 'ANSWERED', answer: 'Hi' }]);
    expect(isTerminal(done.state)).toBe(true);
    expect(done.isChatReply).toBe(true);
    expect(() => transition(done, parsed)).toThrow(InvalidTransitionError);
  });

  describe('repair loop', () => {
    it('should route INVALID through CRITIQUING back to GENERATED', () => {
      const session = run([
        parsed,
        { type: 'GENERATION_FAILED', diagnostic: unknownColumn },
        { type: 'ROUTE_INVALID' },
        { type: 'CRITIQUED', rationale: 'Use email' },
        generated,
      ]);

      expect(session.state).toBe('GENERATED');
      expect(session.regenerationCount).toBe(1);
      expect(session.critique).toBe('Use email');
      expect(session.trail).toEqual(['START', 'INTENT_PARSED', 'INVALID', 'CRITIQUING', 'GENERATED']);
    });

    it('should fail once the regeneration budget is spent', () => {
      const second: Diagnostic = { code: 'GENERATION_ERROR', message: 'boom' };
      const session = run(
        [
          parsed,
          { type: 'GENERATION_FAILED', diagnostic: unknownColumn },
          { type: 'ROUTE_INVALID' },
          { type: 'GENERATION_FAILED', diagnostic: second },
          { type: 'ROUTE_INVALID' },
        ],
        { maxRegenerations: 1, maxClarificationRounds: 3 }
      );

      expect(session.state).toBe('FAILED');
      expect(session.regenerationCount).toBe(1);
      expect(session.failure).toEqual({
        code: 'MAX_REGENERATIONS_EXCEEDED',
        reason: describeReason('MAX_REGENERATIONS_EXCEEDED'),
        lastDiagnostics: [second],
        lastSql: null,
      });
    });

    it('should count a chat reply during repair as a failed attempt', () => {
      const session = run([
        parsed,
        { type: 'GENERATION_FAILED', diagnostic: unknownColumn },
        { type: 'ROUTE_INVALID' },
        { type: 'CHAT_REPLY', text: 'Sorry' },
      ]);
      expect(session.state).toBe('INVALID');
      expect(session.regenerationCount).toBe(1);
      expect(session.lastDiagnostics[0].code).toBe('GENERATION_ERROR');
    });

    it('should turn a sandbox denial into a diagnostic', () => {
      const session = run([
        parsed,
        generated,
        { type: 'AMBIGUITY_CHECKED', ambiguity: null },
        { type: 'VALIDATED', result: { valid: true, diagnostics: [] } },
        { type: 'SANDBOX_REQUESTED' },
        { type: 'SANDBOX_CHECKED', decision: decision(false, { reasonCode: 'MULTI_STATEMENT', reason: 'Two statements' }) },
      ]);
      expect(session.state).toBe('INVALID');
      expect(session.lastDiagnostics).toEqual([
        { code: 'MULTI_STATEMENT', message: describeReason('MULTI_STATEMENT'), detail: 'Two statements' },
      ]);
    });

    it('should send execution failures to INVALID', () => {
      const failure: Diagnostic = { code: 'EXECUTION_ERROR', message: 'db down' };
      const session = run([
        parsed,
        generated,
        { type: 'AMBIGUITY_CHECKED', ambiguity: null },
        { type: 'VALIDATED', result: { valid: true, diagnostics: [] } },
        { type: 'SANDBOX_REQUESTED' },
        { type: 'SANDBOX_CHECKED', decision: decision(true) },
        { type: 'EXECUTION_FAILED', diagnostic: failure },
        { type: 'ROUTE_INVALID' },
      ]);
      expect(session.state).toBe('CRITIQUING');
      expect(session.lastDiagnostics).toEqual([failure]);
    });
  });

  describe('clarification', () => {
    const askAndAnswer: SessionEvent[] = [
      parsed,
      generated,
      { type: 'AMBIGUITY_CHECKED', ambiguity },
      { type: 'CLARIFICATION_PREPARED', prompt: { question: 'Which period?', options: ['This year', 'All time'] } },
    ];

    it('should park in AWAITING_USER with the prompt', () => {
      const session = run(askAndAnswer);
      expect(session.state).toBe('AWAITING_USER');
      expect(session.pendingAmbiguity).toEqual(ambiguity);
      expect(session.clarificationQuestion).toBe('Which period?');
      expect(session.clarificationOptions).toEqual(['This year', 'All time']);
    });

    it('should return to INTENT_PARSED with the merged question', () => {
      const session = run([
        ...askAndAnswer,
        { type: 'USER_ANSWERED', mergedQuestion: 'q (This year)', intent, matchedTables: ['genre'] },
      ]);
      expect(session.state).toBe('INTENT_PARSED');
      expect(session.workingQuestion).toBe('q (This year)');
      expect(session.rawQuestion).toBe('q');
      expect(session.clarificationRoundCount).toBe(1);
      expect(session.candidateSql).toBeNull();
      expect(session.matchedTables).toEqual(['genre']);
    });

    it('should proceed to validation once the round budget is spent', () => {
      const session = run(
        [
          ...askAndAnswer,
          { type: 'USER_ANSWERED', mergedQuestion: 'q (This year)', intent, matchedTables: [] },
          generated,
          { type: 'AMBIGUITY_CHECKED', ambiguity },
        ],
        { maxRegenerations: 3, maxClarificationRounds: 1 }
      );
      expect(session.state).toBe('VALIDATING');
      expect(session.clarificationExhausted).toBe(true);
      expect(session.pendingAmbiguity).toBeNull();
    });
  });
});
