import type { MemoryEntry, MemoryEntryKind } from '../types.js';

export interface MemoryOptions {
  /** Entries kept per session; oldest are dropped first */
  maxEntries: number;
  /** Sessions idle longer than this are evicted by `evictIdle`; 0 disables */
  ttlMs: number;
  now?: () => number;
}

interface SessionMemory {
  entries: MemoryEntry[];
  lastTouched: number;
}

const ENTRY_KINDS: readonly MemoryEntryKind[] = ['query', 'clarification', 'answer', 'chat'];

function isMemoryEntry(value: unknown): value is MemoryEntry {
  if (typeof value !== 'object' || value === null) return false;
  const turnIndex: unknown = Reflect.get(value, 'turnIndex');
  const kind: unknown = Reflect.get(value, 'kind');
  const content: unknown = Reflect.get(value, 'content');
  const timestamp: unknown = Reflect.get(value, 'timestamp');
  return (
    typeof turnIndex === 'number' &&
    typeof kind === 'string' &&
    ENTRY_KINDS.some(k => k === kind) &&
    typeof content === 'string' &&
    typeof timestamp === 'string'
  );
}

/**
 * Recent conversation window, one bounded list per session id.
 *
 * Stores raw entries only. Reference resolution is left to the completion
 * service, which receives `formatForPrompt` output as context.
 */
export class ContextMemory {
  private sessions = new Map<string, SessionMemory>();
  private readonly now: () => number;

  constructor(private readonly options: MemoryOptions) {
    if (options.maxEntries < 1) {
      throw new Error(`Memory size must be at least 1 (got ${options.maxEntries})`);
    }
    this.now = options.now ?? Date.now;
  }

  append(sessionId: string, entry: MemoryEntry): void {
    const session = this.sessions.get(sessionId) ?? { entries: [], lastTouched: this.now() };
    session.entries.push({ ...entry });
    session.lastTouched = this.now();
    this.sessions.set(sessionId, session);
    this.trim(sessionId);
  }

  /** Last `n` entries, oldest first. */
  recent(sessionId: string, n: number = this.options.maxEntries): MemoryEntry[] {
    const entries = this.sessions.get(sessionId)?.entries ?? [];
    if (n <= 0) return [];
    return entries.slice(-n).map(e => ({ ...e }));
  }

  /** Drops the oldest entries beyond the size bound. */
  trim(sessionId: string): void {
    const session = this.sessions.get(sessionId);
    if (!session) return;
    const excess = session.entries.length - this.options.maxEntries;
    if (excess > 0) {
      session.entries.splice(0, excess);
    }
  }

  size(sessionId: string): number {
    return this.sessions.get(sessionId)?.entries.length ?? 0;
  }

  clear(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  export(sessionId: string): string {
    return JSON.stringify({ sessionId, entries: this.recent(sessionId) });
  }

  /**
   * Replaces a session's entries with an exported snapshot. Entries that do not
   * have the expected shape are skipped; the result is trimmed to the bound.
   */
  import(sessionId: string, serialized: string): number {
    const parsed: unknown = JSON.parse(serialized);
    const rawEntries: unknown = typeof parsed === 'object' && parsed !== null ? Reflect.get(parsed, 'entries') : undefined;
    if (!Array.isArray(rawEntries)) {
      throw new Error('Memory snapshot has no entries array');
    }

    const entries = rawEntries.filter(isMemoryEntry).map(e => ({ ...e }));
    this.sessions.set(sessionId, { entries, lastTouched: this.now() });
    this.trim(sessionId);
    return this.size(sessionId);
  }

  /**
   * Removes sessions idle longer than the TTL, except those in `keep`.
   * Returns the evicted ids.
   */
  evictIdle(keep: ReadonlySet<string> = new Set()): string[] {
    if (this.options.ttlMs <= 0) return [];
    const cutoff = this.now() - this.options.ttlMs;
    const evicted: string[] = [];
    for (const [sessionId, session] of this.sessions) {
      if (session.lastTouched < cutoff && !keep.has(sessionId)) {
        this.sessions.delete(sessionId);
        evicted.push(sessionId);
      }
    }
    return evicted;
  }

  /**
   * Recent window as prompt context. Clarification exchanges are included so
   * the service sees what the user already chose.
   */
  formatForPrompt(sessionId: string, n = 5): string {
    const entries = this.recent(sessionId, n);
    if (entries.length === 0) return '';

    const lines = ['Recent Conversation History:'];
    for (const entry of entries) {
      switch (entry.kind) {
        case 'query':
          lines.push(`[turn ${entry.turnIndex}] User: ${entry.content}`);
          break;
        case 'clarification':
          lines.push(`[turn ${entry.turnIndex}] Clarified: ${entry.content}`);
          break;
        case 'answer':
          lines.push(`[turn ${entry.turnIndex}] Assistant: ${entry.content}`);
          if (entry.sql) lines.push(`  SQL: ${entry.sql}`);
          if (entry.rowCount !== undefined) lines.push(`  Rows: ${entry.rowCount}`);
          break;
        case 'chat':
          lines.push(`[turn ${entry.turnIndex}] Assistant (chat): ${entry.content}`);
          break;
      }
    }
    return lines.join('\n');
  }
}
