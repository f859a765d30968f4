import pg from 'pg';
import { appendFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import type { TurnLogRecord } from '../types.js';

/**
 * Append-only sink for completed turns.
 */
export interface TurnLogSink {
  append(record: TurnLogRecord): Promise<void>;
}

/**
 * One JSON object per line.
 */
export class JsonlTurnLog implements TurnLogSink {
  private dirReady = false;

  constructor(private readonly path: string) {}

  async append(record: TurnLogRecord): Promise<void> {
    if (!this.dirReady) {
      await mkdir(dirname(this.path), { recursive: true });
      this.dirReady = true;
    }
    await appendFile(this.path, `${JSON.stringify(record)}\n`, 'utf-8');
  }
}

/**
 * Writes turns to the `turn_logs` table (see sql/turn_logs.sql).
 */
export class PgTurnLog implements TurnLogSink {
  constructor(private readonly pool: pg.Pool) {}

  async append(record: TurnLogRecord): Promise<void> {
    const executionSummary = record.executionSummary;
    await this.pool.query(
      `INSERT INTO turn_logs (
         session_id, turn_index, created_at, question, working_question, intent,
         candidate_sql, validation_passed, regeneration_count, clarification_round_count,
         sandbox_decision, rows_returned, duration_ms, status, reason_code, trail, performance
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17)`,
      [
        record.sessionId,
        record.turnIndex,
        record.timestamp,
        record.question,
        record.workingQuestion,
        record.intent ? JSON.stringify(record.intent) : null,
        record.candidateSql,
        record.validationPassed,
        record.regenerationCount,
        record.clarificationRoundCount,
        record.sandboxDecision ? JSON.stringify(record.sandboxDecision) : null,
        executionSummary ? executionSummary.rowCount : null,
        executionSummary ? executionSummary.durationMs : null,
        record.status,
        record.reasonCode,
        record.trail,
        JSON.stringify(record.performance),
      ]
    );
  }
}

/**
 * In-memory sink.
 */
export class MemoryTurnLog implements TurnLogSink {
  readonly records: TurnLogRecord[] = [];

  async append(record: TurnLogRecord): Promise<void> {
    this.records.push(record);
  }
}
