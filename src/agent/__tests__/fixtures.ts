import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { SQLResult } from '../../types.js';
import type { CompletionRequest, CompletionTask, TextCompletion } from '../../tools/completion.js';
import type { ExecuteOptions, SqlExecutor } from '../../tools/db.js';
import { catalogFromDocument, type SchemaCatalog } from '../../tools/catalog.js';

const CATALOG_PATH = fileURLToPath(new URL('../../../data/chinook_catalog.json', import.meta.url));

export function loadTestCatalog(): SchemaCatalog {
  const document: unknown = JSON.parse(readFileSync(CATALOG_PATH, 'utf-8'));
  return catalogFromDocument(document);
}

export type ScriptedReply = string | Error;

/**
 * Completion fake with one reply queue per task. The last reply in a queue is
 * repeated once the others are used up; a task with no queue rejects.
 */
export class ScriptedCompletion implements TextCompletion {
  readonly calls: CompletionRequest[] = [];
  private readonly queues: Map<CompletionTask, ScriptedReply[]>;

  constructor(script: Partial<Record<CompletionTask, ScriptedReply[]>>) {
    this.queues = new Map();
    for (const task of ['generate', 'critique', 'clarify', 'answer'] as const) {
      const replies = script[task];
      if (replies && replies.length > 0) this.queues.set(task, [...replies]);
    }
  }

  async complete(request: CompletionRequest): Promise<string> {
    this.calls.push(request);
    const queue = this.queues.get(request.task);
    if (!queue) {
      throw new Error(`No scripted reply for ${request.task}`);
    }
    const reply = queue.length > 1 ? queue.shift() : queue[0];
    if (reply === undefined) {
      throw new Error(`No scripted reply for ${request.task}`);
    }
    if (reply instanceof Error) throw reply;
    return reply;
  }

  callsFor(task: CompletionTask): CompletionRequest[] {
    return this.calls.filter(call => call.task === task);
  }
}

export class FakeExecutor implements SqlExecutor {
  readonly calls: Array<{ sql: string; options: ExecuteOptions }> = [];

  constructor(private readonly respond: (sql: string, attempt: number) => SQLResult | Error) {}

  async execute(sql: string, options: ExecuteOptions): Promise<SQLResult> {
    this.calls.push({ sql, options });
    const outcome = this.respond(sql, this.calls.length);
    if (outcome instanceof Error) throw outcome;
    return outcome;
  }
}

export function result(columns: string[], rows: SQLResult['rows']): SQLResult {
  return { columns, rows, rowCount: rows.length, durationMs: 3 };
}
