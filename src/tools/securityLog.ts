import { appendFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import type { SecurityEvent } from '../types.js';
import { truncateSql } from '../agent/guard.js';

/** Longest SQL prefix a security event keeps */
export const SECURITY_SQL_MAX_LENGTH = 100;

/**
 * Append-only sink for statements the sandbox denied or the database timed
 * out. Sinks store at most `SECURITY_SQL_MAX_LENGTH` characters of SQL.
 */
export interface SecurityLogSink {
  record(event: SecurityEvent): Promise<void>;
}

function redact(event: SecurityEvent): SecurityEvent {
  return { ...event, sql: truncateSql(event.sql, SECURITY_SQL_MAX_LENGTH) };
}

/**
 * One JSON object per line, e.g. logs/security_log.jsonl.
 */
export class JsonlSecurityLog implements SecurityLogSink {
  private dirReady = false;

  constructor(private readonly path: string) {}

  async record(event: SecurityEvent): Promise<void> {
    if (!this.dirReady) {
      await mkdir(dirname(this.path), { recursive: true });
      this.dirReady = true;
    }
    await appendFile(this.path, `${JSON.stringify(redact(event))}\n`, 'utf-8');
  }
}

export class MemorySecurityLog implements SecurityLogSink {
  readonly events: SecurityEvent[] = [];

  async record(event: SecurityEvent): Promise<void> {
    this.events.push(redact(event));
  }
}
