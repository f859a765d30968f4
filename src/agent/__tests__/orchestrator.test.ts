import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Orchestrator, type OrchestratorOptions } from '../orchestrator.js';
import { CatalogStore, SchemaCatalog } from '../../tools/catalog.js';
import { MemoryTurnLog, type TurnLogSink } from '../../tools/turnLog.js';
import { MemorySecurityLog } from '../../tools/securityLog.js';
import { ContextMemory } from '../memory.js';
import type { SqlExecutor } from '../../tools/db.js';
import type { SQLResult } from '../../types.js';
import {
  CollaboratorTimeoutError,
  SessionBusyError,
  SessionNotFoundError,
  describeReason,
} from '../../errors.js';
import { FakeExecutor, ScriptedCompletion, loadTestCatalog, result, type ScriptedReply } from './fixtures.js';
import type { CompletionTask, TextCompletion } from '../../tools/completion.js';

const NOW = new Date('2026-03-18T10:00:00Z');
const CUSTOMERS_SQL = 'SELECT first_name, last_name, email FROM customer LIMIT 5';
const customers = result(
  ['first_name', 'last_name', 'email'],
  [
    ['Ana', 'Silva', 'ana@example.com'],
    ['Ben', 'Moore', 'ben@example.com'],
  ]
);

interface Setup {
  script: Partial<Record<CompletionTask, ScriptedReply[]>>;
  respond?: (sql: string, attempt: number) => SQLResult | Error;
  options?: Partial<OrchestratorOptions>;
  executor?: SqlExecutor;
  turnLog?: TurnLogSink;
}

function setup({ script, respond = () => customers, options, executor, turnLog }: Setup) {
  const completion = new ScriptedCompletion(script);
  const fakeExecutor = new FakeExecutor(respond);
  const records = new MemoryTurnLog();
  const securityLog = new MemorySecurityLog();
  const catalogStore = new CatalogStore(loadTestCatalog());
  let tick = 0;
  const orchestrator = new Orchestrator({
    catalogStore,
    completion,
    executor: executor ?? fakeExecutor,
    turnLog: turnLog ?? records,
    securityLog,
    options,
    now: () => NOW,
    clock: () => (tick += 5),
  });
  return { orchestrator, completion, executor: fakeExecutor, turnLog: records, securityLog, catalogStore };
}

describe('Orchestrator', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('runQuery', () => {
    it('should answer a clear question in one pass', async () => {
      const { orchestrator, completion, executor, turnLog } = setup({
        script: {
          generate: ['```sql\nSELECT first_name, last_name, email FROM customer LIMIT 5;\n```'],
          answer: ['前两位客户是 Ana Silva 和 Ben Moore。'],
        },
      });

      const res = await orchestrator.runQuery('查询前5个客户的名字和邮箱', 's1');

      expect(res.status).toBe('DONE');
      expect(res.candidateSql).toBe(CUSTOMERS_SQL);
      expect(res.validationPassed).toBe(true);
      expect(res.regenerationCount).toBe(0);
      expect(res.answer).toBe('前两位客户是 Ana Silva 和 Ben Moore。');
      expect(res.executionResult?.rowCount).toBe(2);
      expect(res.reasonCode).toBeUndefined();

      expect(executor.calls).toEqual([{ sql: CUSTOMERS_SQL, options: { timeoutMs: 10000, maxRows: 200 } }]);
      expect(completion.callsFor('critique')).toHaveLength(0);

      expect(turnLog.records).toHaveLength(1);
      const [record] = turnLog.records;
      expect(record.status).toBe('DONE');
      expect(record.reasonCode).toBeNull();
      expect(record.timestamp).toBe('2026-03-18T10:00:00.000Z');
      expect(record.executionSummary).toEqual({ rowCount: 2, columns: ['first_name', 'last_name', 'email'], durationMs: 3 });
      expect(record.trail).toEqual([
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
    });

    it('should remember the turn for follow-up questions', async () => {
      const { orchestrator, completion, turnLog } = setup({
        script: { generate: [CUSTOMERS_SQL], answer: ['Two customers.'] },
      });

      await orchestrator.runQuery('查询前5个客户的名字和邮箱', 's1');
      const res = await orchestrator.runQuery('list them again', 's1');

      expect(res.status).toBe('DONE');
      expect(res.needsClarification).toBe(false);
      expect(completion.callsFor('generate')[1].context).toContain('[turn 1] User: 查询前5个客户的名字和邮箱');
      expect(turnLog.records.map(r => r.turnIndex)).toEqual([1, 2]);
      expect(orchestrator.history('s1')).toContain(`  SQL: ${CUSTOMERS_SQL}`);
    });

    it('should reject an empty question', async () => {
      const { orchestrator } = setup({ script: {} });
      await expect(orchestrator.runQuery('   ', 's1')).rejects.toThrow('Question must not be empty');
    });

    it('should reject a second question while one is running', async () => {
      const { orchestrator } = setup({ script: { generate: [CUSTOMERS_SQL], answer: ['ok'] } });

      const first = orchestrator.runQuery('查询前5个客户的名字和邮箱', 's1');
      await expect(orchestrator.runQuery('查询前5个客户的名字和邮箱', 's1')).rejects.toBeInstanceOf(SessionBusyError);
      expect(() => orchestrator.endSession('s1')).toThrow(SessionBusyError);
      expect((await first).status).toBe('DONE');
    });

    it('should return a chat reply without touching the database', async () => {
      const { orchestrator, completion, executor, turnLog } = setup({
        script: { generate: ['Hi! I can answer questions about the music store.'] },
      });

      const res = await orchestrator.runQuery('Hello! What can you do?', 's1');

      expect(res.status).toBe('DONE');
      expect(res.isChatReply).toBe(true);
      expect(res.answer).toBe('Hi! I can answer questions about the music store.');
      expect(res.candidateSql).toBeNull();
      expect(executor.calls).toHaveLength(0);
      expect(completion.callsFor('answer')).toHaveLength(0);
      expect(turnLog.records[0].trail).toEqual(['START', 'INTENT_PARSED', 'ANSWERING', 'DONE']);
    });
  });

  describe('repair loop', () => {
    it('should give up after the maximum number of regenerations', async () => {
      const { orchestrator, completion, executor, turnLog } = setup({
        script: { generate: ['SELECT nickname FROM customer'], critique: ['customer has no nickname column'] },
      });

      const res = await orchestrator.runQuery('list customer nicknames', 's1');

      expect(res.status).toBe('FAILED');
      expect(res.reasonCode).toBe('MAX_REGENERATIONS_EXCEEDED');
      expect(res.reason).toBe(describeReason('MAX_REGENERATIONS_EXCEEDED'));
      expect(res.regenerationCount).toBe(3);
      expect(res.candidateSql).toBe('SELECT nickname FROM customer');
      expect(res.lastDiagnostic).toEqual({
        code: 'UNKNOWN_IDENTIFIER',
        message: describeReason('UNKNOWN_IDENTIFIER'),
      });
      expect(completion.callsFor('generate')).toHaveLength(4);
      expect(completion.callsFor('critique')).toHaveLength(3);
      expect(executor.calls).toHaveLength(0);
      expect(turnLog.records[0].reasonCode).toBe('MAX_REGENERATIONS_EXCEEDED');
    });

    it('should repair a multi-statement candidate', async () => {
      const { orchestrator, completion, executor } = setup({
        script: {
          generate: ['SELECT * FROM customer; DROP TABLE customer;', 'SELECT email FROM customer'],
          critique: ['Return one read-only statement.'],
          answer: ['Here are the emails.'],
        },
      });

      const res = await orchestrator.runQuery('list customer emails', 's1');

      expect(res.status).toBe('DONE');
      expect(res.regenerationCount).toBe(1);
      expect(res.candidateSql).toBe('SELECT email FROM customer LIMIT 200');
      expect(executor.calls.map(c => c.sql)).toEqual(['SELECT email FROM customer LIMIT 200']);
      const repairPrompt = completion.callsFor('generate')[1].userPrompt;
      expect(repairPrompt).toContain('Previous SQL:\nSELECT * FROM customer; DROP TABLE customer');
      expect(repairPrompt).toContain('Reviewer notes:\nReturn one read-only statement.');
    });

    it('should send unconnected tables to the critic before generating', async () => {
      const { orchestrator, completion } = setup({
        script: {
          generate: ['SELECT email FROM customer'],
          critique: ['playlist_audit has no relation to customer; query them separately.'],
          answer: ['Done.'],
        },
      });

      const res = await orchestrator.runQuery('list customer and playlist audit rows', 's1');

      expect(res.status).toBe('DONE');
      expect(res.regenerationCount).toBe(1);
      expect(completion.callsFor('generate')).toHaveLength(1);
      expect(completion.callsFor('critique')[0].userPrompt).toContain('[JOIN_PATH_NOT_FOUND]');
    });

    it('should retry after an execution error', async () => {
      const { orchestrator, completion, executor } = setup({
        script: { generate: [CUSTOMERS_SQL], critique: ['Try again.'], answer: ['ok'] },
        respond: (_sql, attempt) => (attempt === 1 ? new Error('connection reset') : customers),
      });

      const res = await orchestrator.runQuery('查询前5个客户的名字和邮箱', 's1');

      expect(res.status).toBe('DONE');
      expect(res.regenerationCount).toBe(1);
      expect(executor.calls).toHaveLength(2);
      expect(completion.callsFor('critique')[0].userPrompt).toContain(
        `- [EXECUTION_ERROR] ${describeReason('EXECUTION_ERROR')}: connection reset`
      );
    });

    it('should report collaborator timeouts', async () => {
      const { orchestrator } = setup({
        script: {
          generate: [new CollaboratorTimeoutError('gemini (generate)', 30000)],
          critique: ['Try again.'],
        },
      });

      const res = await orchestrator.runQuery('查询前5个客户的名字和邮箱', 's1');

      expect(res.status).toBe('FAILED');
      expect(res.candidateSql).toBeNull();
      expect(res.lastDiagnostic?.code).toBe('COLLABORATOR_TIMEOUT');
    });

    it('should bound a database call that never returns', async () => {
      const hanging: SqlExecutor = { execute: () => new Promise<SQLResult>(() => {}) };
      const { orchestrator } = setup({
        script: { generate: [CUSTOMERS_SQL] },
        executor: hanging,
        options: { statementTimeoutMs: 10, executionGraceMs: 10, limits: { maxRegenerations: 0, maxClarificationRounds: 3 } },
      });

      const res = await orchestrator.runQuery('查询前5个客户的名字和邮箱', 's1');

      expect(res.status).toBe('FAILED');
      expect(res.lastDiagnostic).toEqual({ code: 'EXECUTION_ERROR', message: describeReason('EXECUTION_ERROR') });
    });

    it('should abort the database call it stops waiting for and log the timeout', async () => {
      const aborted: string[] = [];
      const hanging: SqlExecutor = {
        execute: (sql, options) =>
          new Promise<SQLResult>((_, reject) => {
            options.signal?.addEventListener('abort', () => {
              aborted.push(sql);
              reject(new Error('aborted'));
            });
          }),
      };
      const { orchestrator, securityLog } = setup({
        script: { generate: [CUSTOMERS_SQL] },
        executor: hanging,
        options: { statementTimeoutMs: 10, executionGraceMs: 10, limits: { maxRegenerations: 0, maxClarificationRounds: 3 } },
      });

      const res = await orchestrator.runQuery('查询前5个客户的名字和邮箱', 's1');

      expect(res.status).toBe('FAILED');
      expect(aborted).toEqual([CUSTOMERS_SQL]);
      expect(securityLog.events).toEqual([
        {
          timestamp: NOW.toISOString(),
          sessionId: 's1',
          turnIndex: 1,
          action: 'timeout',
          code: 'COLLABORATOR_TIMEOUT',
          reason: new CollaboratorTimeoutError('database', 20).message,
          sql: CUSTOMERS_SQL,
        },
      ]);
    });
  });

  describe('security log', () => {
    it('should record every sandbox denial', async () => {
      const { orchestrator, securityLog } = setup({
        script: { generate: ['SELECT nickname FROM customer'], critique: ['customer has no nickname column'] },
      });

      await orchestrator.runQuery('list customer nicknames', 's1');

      expect(securityLog.events).toHaveLength(4);
      expect(securityLog.events[0]).toEqual({
        timestamp: NOW.toISOString(),
        sessionId: 's1',
        turnIndex: 1,
        action: 'blocked',
        code: 'UNKNOWN_IDENTIFIER',
        reason: 'Unknown identifier(s): nickname',
        sql: 'SELECT nickname FROM customer',
      });
    });

    it('should log nothing for an allowed query', async () => {
      const { orchestrator, securityLog } = setup({
        script: { generate: [CUSTOMERS_SQL], answer: ['Two customers.'] },
      });

      await orchestrator.runQuery('查询前5个客户的名字和邮箱', 's1');

      expect(securityLog.events).toEqual([]);
    });
  });

  describe('step timings', () => {
    it('should time each step and report the slowest', async () => {
      const { orchestrator, turnLog } = setup({
        script: { generate: [CUSTOMERS_SQL], answer: ['Two customers.'] },
      });

      const res = await orchestrator.runQuery('查询前5个客户的名字和邮箱', 's1');

      expect(res.performance.steps.map(step => step.state)).toEqual([
        'INTENT_PARSED',
        'GENERATED',
        'VALIDATING',
        'VALID',
        'SANDBOX_CHECK',
        'EXECUTING',
        'ANSWERING',
      ]);
      expect(res.performance.steps.every(step => step.elapsedMs === 5)).toBe(true);
      expect(res.performance.totalMs).toBe(35);
      expect(res.performance.slowest).toEqual({ state: 'INTENT_PARSED', elapsedMs: 5 });
      expect(turnLog.records[0].performance).toEqual(res.performance);
    });
  });

  describe('idle eviction', () => {
    it('should keep the memory of a session that is still running', async () => {
      let clock = 0;
      const memory = new ContextMemory({ maxEntries: 10, ttlMs: 1000, now: () => clock });
      const scripted = new ScriptedCompletion({ generate: [CUSTOMERS_SQL], answer: ['Two customers.'] });
      let openGate: () => void = () => {};
      const gate = new Promise<void>(resolve => {
        openGate = resolve;
      });
      let held = false;
      const completion: TextCompletion = {
        complete: async request => {
          if (!held && request.task === 'generate') {
            held = true;
            await gate;
          }
          return scripted.complete(request);
        },
      };
      const orchestrator = new Orchestrator({
        catalogStore: new CatalogStore(loadTestCatalog()),
        completion,
        executor: new FakeExecutor(() => customers),
        turnLog: new MemoryTurnLog(),
        memory,
        now: () => NOW,
      });

      const slow = orchestrator.runQuery('查询前5个客户的名字和邮箱', 'slow');
      clock = 5000;
      await orchestrator.runQuery('查询前5个客户的名字和邮箱', 'fast');
      openGate();
      await slow;

      expect(orchestrator.history('slow')).toContain('[turn 1] User: 查询前5个客户的名字和邮箱');
    });
  });

  describe('clarification', () => {
    it('should ask, then finish on the merged question', async () => {
      const { orchestrator, executor, turnLog } = setup({
        script: { generate: ['SELECT name FROM genre LIMIT 1'], answer: ['Rock.'] },
      });

      const asked = await orchestrator.runQuery('most popular genre', 's1');

      expect(asked.status).toBe('AWAITING_USER');
      expect(asked.needsClarification).toBe(true);
      expect(asked.clarificationQuestion).toBe('Which time period should be used?');
      expect(asked.clarificationOptions).toEqual(['This year', 'Last year', 'Last 30 days', 'All time']);
      expect(orchestrator.isAwaitingUser('s1')).toBe(true);
      expect(executor.calls).toHaveLength(0);
      expect(turnLog.records).toHaveLength(0);

      const res = await orchestrator.resume('s1', '1');

      expect(res.status).toBe('DONE');
      expect(res.clarificationRoundCount).toBe(1);
      expect(res.answer).toBe('Rock.');
      expect(orchestrator.isAwaitingUser('s1')).toBe(false);
      expect(executor.calls.map(c => c.sql)).toEqual(['SELECT name FROM genre LIMIT 1']);
      expect(turnLog.records[0].question).toBe('most popular genre');
      expect(turnLog.records[0].workingQuestion).toBe('most popular genre (This year)');
      expect(orchestrator.history('s1')).toContain('[turn 1] Clarified: This year');
    });

    it('should take a free-text answer verbatim', async () => {
      const { orchestrator, turnLog } = setup({
        script: { generate: ['SELECT name FROM genre LIMIT 1'], answer: ['Rock.'] },
      });

      await orchestrator.runQuery('most popular genre', 's1');
      const res = await orchestrator.resume('s1', 'this year');

      expect(res.status).toBe('DONE');
      expect(res.clarificationRoundCount).toBe(1);
      expect(turnLog.records[0].workingQuestion).toBe('most popular genre (this year)');
      expect(turnLog.records[0].intent?.timeRange).toEqual({ label: 'this year', start: '2026-01-01', end: '2026-03-18' });
    });

    it('should proceed when the clarification rounds run out', async () => {
      const { orchestrator } = setup({
        script: { generate: ['SELECT name FROM genre LIMIT 1'], answer: ['Rock.'] },
        options: { limits: { maxRegenerations: 3, maxClarificationRounds: 1 } },
      });

      await orchestrator.runQuery('most popular genre', 's1');
      const res = await orchestrator.resume('s1', 'rock fans');

      expect(res.status).toBe('DONE');
      expect(res.reasonCode).toBe('MAX_CLARIFICATION_ROUNDS_EXCEEDED');
      expect(res.answer).toBe('Rock.');
    });

    it('should reject a resume with nothing parked', async () => {
      const { orchestrator } = setup({ script: {} });
      await expect(orchestrator.resume('nobody', 'this year')).rejects.toBeInstanceOf(SessionNotFoundError);
    });

    it('should abandon a parked question when a new one arrives', async () => {
      const { orchestrator } = setup({
        script: { generate: ['SELECT name FROM genre LIMIT 1'], answer: ['ok'] },
      });

      await orchestrator.runQuery('most popular genre', 's1');
      await orchestrator.runQuery('list genre names', 's1');

      expect(orchestrator.isAwaitingUser('s1')).toBe(false);
      await expect(orchestrator.resume('s1', '1')).rejects.toBeInstanceOf(SessionNotFoundError);
    });

    it('should finish a parked session on the catalog it started with', async () => {
      const { orchestrator, catalogStore } = setup({
        script: { generate: ['SELECT name FROM genre LIMIT 1'], answer: ['Rock.'] },
      });

      await orchestrator.runQuery('most popular genre', 's1');
      await orchestrator.reloadCatalog(
        async () =>
          new SchemaCatalog([
            {
              name: 'customer',
              columns: [{ name: 'customer_id', type: 'integer', nullable: false, isPrimaryKey: true }],
              foreignKeys: [],
              aliases: [],
            },
          ])
      );
      const res = await orchestrator.resume('s1', 'all time');

      expect(catalogStore.current().version).toBe(2);
      expect(res.status).toBe('DONE');
      expect(res.candidateSql).toBe('SELECT name FROM genre LIMIT 1');
    });
  });

  describe('sessions', () => {
    it('should forget a session on endSession', async () => {
      const { orchestrator } = setup({
        script: { generate: ['SELECT name FROM genre LIMIT 1'] },
      });

      await orchestrator.runQuery('most popular genre', 's1');
      orchestrator.endSession('s1');

      expect(orchestrator.isAwaitingUser('s1')).toBe(false);
      expect(orchestrator.history('s1')).toBe('');
    });

    it('should finish the turn when the turn log fails', async () => {
      const failingLog: TurnLogSink = { append: () => Promise.reject(new Error('disk full')) };
      const { orchestrator } = setup({
        script: { generate: [CUSTOMERS_SQL], answer: ['ok'] },
        turnLog: failingLog,
      });

      const res = await orchestrator.runQuery('查询前5个客户的名字和邮箱', 's1');

      expect(res.status).toBe('DONE');
      expect(console.error).toHaveBeenCalledWith('   ❌ Failed to write turn log: disk full');
    });
  });
});
