/**
 * Pure session state machine.
 *
 * `transition` is the only way a SessionState changes. It never performs I/O;
 * the orchestrator does the work for a state and reports the outcome as an
 * event. Events a state does not accept throw InvalidTransitionError.
 */

import {
  MAX_CLARIFICATION_ROUNDS,
  MAX_REGENERATIONS,
  type Diagnostic,
  type SessionEvent,
  type SessionLimits,
  type SessionState,
  type SessionStateName,
} from '../types.js';
import { InvalidTransitionError, describeReason } from '../errors.js';

export const DEFAULT_LIMITS: SessionLimits = {
  maxRegenerations: MAX_REGENERATIONS,
  maxClarificationRounds: MAX_CLARIFICATION_ROUNDS,
};

export function createSession(sessionId: string, turnIndex: number, question: string): SessionState {
  return {
    sessionId,
    turnIndex,
    state: 'START',
    trail: ['START'],
    rawQuestion: question,
    workingQuestion: question,
    intent: null,
    matchedTables: [],
    candidateSql: null,
    validation: null,
    lastDiagnostics: [],
    critique: null,
    regenerationCount: 0,
    clarificationRoundCount: 0,
    clarificationExhausted: false,
    pendingAmbiguity: null,
    clarificationQuestion: null,
    clarificationOptions: [],
    sandboxDecision: null,
    executionResult: null,
    finalAnswer: null,
    isChatReply: false,
    failure: null,
  };
}

export function isTerminal(state: SessionStateName): boolean {
  return state === 'DONE' || state === 'FAILED';
}

function enter(session: SessionState, next: SessionStateName, patch: Partial<SessionState> = {}): SessionState {
  return { ...session, ...patch, state: next, trail: [...session.trail, next] };
}

function invalid(session: SessionState, diagnostics: Diagnostic[], patch: Partial<SessionState> = {}): SessionState {
  return enter(session, 'INVALID', { ...patch, lastDiagnostics: diagnostics });
}

const CHAT_DURING_REPAIR: Diagnostic = {
  code: 'GENERATION_ERROR',
  message: describeReason('GENERATION_ERROR'),
  detail: 'The generator replied with text instead of SQL while repairing a query',
};

export function transition(
  session: SessionState,
  event: SessionEvent,
  limits: SessionLimits = DEFAULT_LIMITS
): SessionState {
  const reject = (): never => {
    throw new InvalidTransitionError(session.state, event.type);
  };

  switch (session.state) {
    case 'START':
      if (event.type === 'INTENT_PARSED') {
        return enter(session, 'INTENT_PARSED', { intent: event.intent, matchedTables: event.matchedTables });
      }
      return reject();

    case 'INTENT_PARSED':
      switch (event.type) {
        case 'SQL_GENERATED':
          return enter(session, 'GENERATED', { candidateSql: event.sql });
        case 'CHAT_REPLY':
          return enter(session, 'ANSWERING', { isChatReply: true, candidateSql: null, finalAnswer: event.text });
        case 'GENERATION_FAILED':
          return invalid(session, [event.diagnostic], { validation: { valid: false, diagnostics: [event.diagnostic] } });
        default:
          return reject();
      }

    case 'GENERATED':
      if (event.type === 'AMBIGUITY_CHECKED') {
        if (event.ambiguity && session.clarificationRoundCount < limits.maxClarificationRounds) {
          return enter(session, 'CLARIFY_NEEDED', { pendingAmbiguity: event.ambiguity });
        }
        return enter(session, 'VALIDATING', {
          pendingAmbiguity: null,
          clarificationExhausted: session.clarificationExhausted || event.ambiguity !== null,
        });
      }
      return reject();

    case 'CLARIFY_NEEDED':
      if (event.type === 'CLARIFICATION_PREPARED') {
        return enter(session, 'AWAITING_USER', {
          clarificationQuestion: event.prompt.question,
          clarificationOptions: [...event.prompt.options],
        });
      }
      return reject();

    case 'AWAITING_USER':
      if (event.type === 'USER_ANSWERED') {
        return enter(session, 'INTENT_PARSED', {
          workingQuestion: event.mergedQuestion,
          intent: event.intent,
          matchedTables: event.matchedTables,
          clarificationRoundCount: session.clarificationRoundCount + 1,
          candidateSql: null,
          pendingAmbiguity: null,
          clarificationQuestion: null,
          clarificationOptions: [],
        });
      }
      return reject();

    case 'VALIDATING':
      if (event.type === 'VALIDATED') {
        return event.result.valid
          ? enter(session, 'VALID', { validation: event.result })
          : invalid(session, event.result.diagnostics, { validation: event.result });
      }
      return reject();

    case 'VALID':
      if (event.type === 'SANDBOX_REQUESTED') {
        return enter(session, 'SANDBOX_CHECK');
      }
      return reject();

    case 'SANDBOX_CHECK':
      if (event.type === 'SANDBOX_CHECKED') {
        const { decision } = event;
        if (decision.allowed) {
          return enter(session, 'EXECUTING', { sandboxDecision: decision });
        }
        const code = decision.reasonCode ?? 'FORBIDDEN_KEYWORD';
        return invalid(session, [{ code, message: describeReason(code), detail: decision.reason }], {
          sandboxDecision: decision,
        });
      }
      return reject();

    case 'INVALID':
      if (event.type === 'ROUTE_INVALID') {
        if (session.regenerationCount < limits.maxRegenerations) {
          return enter(session, 'CRITIQUING', { critique: null });
        }
        return enter(session, 'FAILED', {
          failure: {
            code: 'MAX_REGENERATIONS_EXCEEDED',
            reason: describeReason('MAX_REGENERATIONS_EXCEEDED'),
            lastDiagnostics: session.lastDiagnostics,
            lastSql: session.candidateSql,
          },
        });
      }
      return reject();

    case 'CRITIQUING':
      switch (event.type) {
        case 'CRITIQUED':
          return { ...session, critique: event.rationale };
        case 'SQL_GENERATED':
          return enter(session, 'GENERATED', {
            candidateSql: event.sql,
            regenerationCount: session.regenerationCount + 1,
            sandboxDecision: null,
            validation: null,
          });
        case 'GENERATION_FAILED':
          return invalid(session, [event.diagnostic], { regenerationCount: session.regenerationCount + 1 });
        case 'CHAT_REPLY':
          return invalid(session, [CHAT_DURING_REPAIR], { regenerationCount: session.regenerationCount + 1 });
        default:
          return reject();
      }

    case 'EXECUTING':
      switch (event.type) {
        case 'EXECUTED':
          return enter(session, 'ANSWERING', { executionResult: event.result });
        case 'EXECUTION_FAILED':
          return invalid(session, [event.diagnostic]);
        default:
          return reject();
      }

    case 'ANSWERING':
      if (event.type === 'ANSWERED') {
        return enter(session, 'DONE', { finalAnswer: event.answer });
      }
      return reject();

    case 'DONE':
    case 'FAILED':
      return reject();
  }
}
