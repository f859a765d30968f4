import type { Diagnostic } from '../types.js';
import type { TextCompletion } from '../tools/completion.js';
import type { SchemaCatalog } from '../tools/catalog.js';
import { formatCatalogForLLM } from '../tools/catalog.js';

export interface CritiqueInput {
  question: string;
  sql: string | null;
  diagnostics: Diagnostic[];
  catalog: SchemaCatalog;
  matchedTables: string[];
}

/**
 * Renders diagnostics for the critique prompt. Raw detail is included here;
 * this text never reaches the end user.
 */
export function formatDiagnostics(diagnostics: Diagnostic[]): string {
  if (diagnostics.length === 0) return '- (no diagnostics recorded)';
  return diagnostics
    .map(d => {
      const position = d.line !== undefined ? ` at line ${d.line}${d.column !== undefined ? `, column ${d.column}` : ''}` : '';
      const fragment = d.fragment ? ` near "${d.fragment}"` : '';
      const detail = d.detail ? `: ${d.detail}` : '';
      return `- [${d.code}]${position}${fragment} ${d.message}${detail}`;
    })
    .join('\n');
}

/**
 * Asks the completion service why a candidate failed and how to fix it.
 * Errors and timeouts propagate; the orchestrator counts them as a failed attempt.
 */
export class Critic {
  constructor(private readonly completion: TextCompletion) {}

  async critique(input: CritiqueInput): Promise<string> {
    const systemPrompt = `You review PostgreSQL SELECT queries that failed validation, the security sandbox, or execution.
Explain briefly what is wrong and how to fix it. Only refer to tables and columns in the schema.
Do not write the corrected query; give the reasoning the next attempt needs.`;

    const tables = input.matchedTables.length > 0 ? input.matchedTables : undefined;
    const userPrompt = `User Question: ${input.question}

Failed SQL:
${input.sql ?? '(no SQL was produced)'}

Problems:
${formatDiagnostics(input.diagnostics)}`;

    const rationale = await this.completion.complete({
      task: 'critique',
      systemPrompt,
      userPrompt,
      context: `Database Schema:\n${formatCatalogForLLM(input.catalog, tables)}`,
    });

    return rationale.trim();
  }
}
