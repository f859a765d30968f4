import type { Diagnostic, Intent } from '../types.js';
import type { TextCompletion } from '../tools/completion.js';
import type { SchemaCatalog } from '../tools/catalog.js';
import { formatCatalogForLLM } from '../tools/catalog.js';
import { formatDiagnostics } from './critic.js';

export type GenerationOutcome =
  | { kind: 'sql'; sql: string }
  | { kind: 'chat'; text: string };

export interface GenerationInput {
  question: string;
  intent: Intent;
  catalog: SchemaCatalog;
  matchedTables: string[];
  /** Join path text from the join planner, when the question spans tables */
  joinHint?: string;
  /** Formatted recent conversation, may be empty */
  history: string;
  /** Present on repair attempts */
  repair?: {
    previousSql: string | null;
    diagnostics: Diagnostic[];
    critique: string | null;
  };
}

const FENCE = /```[a-zA-Z]*\s*\n?([\s\S]*?)```/;
const SQL_START = /^\(*\s*(?:SELECT|WITH|INSERT|UPDATE|DELETE|DROP|CREATE|ALTER|TRUNCATE|GRANT|REVOKE|REPLACE|MERGE|CALL|EXEC|EXECUTE|EXPLAIN|SHOW|DESCRIBE|SET|COPY|VALUES|TABLE)\b/i;

/**
 * Takes the SQL out of a completion: the first code fence if there is one,
 * otherwise the whole text. Trailing semicolons are removed.
 */
export function extractSql(text: string): string {
  const fenced = FENCE.exec(text);
  const body = fenced ? fenced[1] : text;
  return body.trim().replace(/(?:\s*;)+\s*$/, '').trim();
}

/**
 * True when the completion looks like SQL rather than a conversational reply.
 * Write statements count as SQL.
 */
export function isSqlShaped(text: string): boolean {
  const fenced = FENCE.exec(text);
  if (fenced) return SQL_START.test(fenced[1].trim());
  return SQL_START.test(text.trim());
}

function describeIntent(intent: Intent): string {
  const parts = [`type: ${intent.questionType}`];
  if (intent.rowLimit !== null) parts.push(`return at most ${intent.rowLimit} rows (use LIMIT ${intent.rowLimit})`);
  if (intent.timeRange) {
    parts.push(`time range: ${intent.timeRange.label}, from ${intent.timeRange.start} to ${intent.timeRange.end} inclusive`);
  }
  return parts.join('; ');
}

export class SQLWriter {
  constructor(private readonly completion: TextCompletion, private readonly dialectName = 'PostgreSQL') {}

  async generate(input: GenerationInput): Promise<GenerationOutcome> {
    const tableNames = input.catalog.tableNames().join(', ');

    const systemPrompt = `You are a SQL query generation assistant. Generate a ${this.dialectName} SELECT query to answer the user's question.

METADATA AS SOURCE OF TRUTH:
1. ONLY use table names from this list: ${tableNames}
2. ONLY use column names that exist in the schema
3. Only join tables along the foreign keys shown in the schema

OUTPUT RULES:
1. Exactly one statement, SELECT or WITH ... SELECT only
2. If the question asks for a number of rows, use LIMIT with that number
3. Respond with ONLY the SQL query in a \`\`\`sql code block, no explanations
4. If the message is small talk or cannot be answered from this database, reply in plain text without any SQL`;

    const tables = input.matchedTables.length > 0 ? input.matchedTables : undefined;
    const context = [
      `Database Schema:\n${formatCatalogForLLM(input.catalog, tables)}`,
      input.joinHint ? `Join Path (use these joins):\n${input.joinHint}` : '',
      input.history,
    ].filter(part => part.length > 0).join('\n\n');

    let userPrompt = `User Question: ${input.question}
Intent: ${describeIntent(input.intent)}`;

    if (input.repair) {
      userPrompt += `

The previous attempt failed.
Previous SQL:
${input.repair.previousSql ?? '(none)'}

Problems:
${formatDiagnostics(input.repair.diagnostics)}
${input.repair.critique ? `\nReviewer notes:\n${input.repair.critique}\n` : ''}
Write a corrected query.`;
    }

    const response = await this.completion.complete({ task: 'generate', systemPrompt, userPrompt, context });

    if (!isSqlShaped(response)) {
      return { kind: 'chat', text: response.trim() };
    }
    return { kind: 'sql', sql: extractSql(response) };
  }
}
