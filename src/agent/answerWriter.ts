import type { SQLResult, SqlValue } from '../types.js';
import type { TextCompletion } from '../tools/completion.js';
import { errorMessage } from '../errors.js';
import { isCjk } from './clarifier.js';

function formatValue(value: SqlValue): string {
  if (value === null) return 'NULL';
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/** Rows shown when a result is too large to pass in full */
export const SAMPLE_ROWS = 5;

function renderRows(result: SQLResult, rows: SqlValue[][]): string[] {
  return rows.map((row, i) =>
    `${i + 1}. ${result.columns.map((col, j) => `${col}: ${formatValue(row[j] ?? null)}`).join(', ')}`
  );
}

function toNumber(value: SqlValue): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function round(value: number): string {
  return String(Math.round(value * 100) / 100);
}

/**
 * One line per column. A column whose non-null values are all numeric gets
 * min/max/avg/sum; any other column gets its distinct-value count.
 */
export function columnStatistics(result: SQLResult): string[] {
  return result.columns.map((col, j) => {
    const values = result.rows.map(row => row[j] ?? null).filter((v): v is Exclude<SqlValue, null> => v !== null);
    if (values.length === 0) return `- ${col}: all NULL`;

    const numbers = values.map(toNumber);
    if (numbers.every((n): n is number => n !== null)) {
      const sum = numbers.reduce((a, b) => a + b, 0);
      return `- ${col}: min ${round(Math.min(...numbers))}, max ${round(Math.max(...numbers))}, avg ${round(sum / numbers.length)}, sum ${round(sum)} (${numbers.length} values)`;
    }

    const distinct = new Set(values.map(formatValue));
    return `- ${col}: ${distinct.size} distinct of ${values.length} values`;
  });
}

/**
 * Renders result rows as `column: value` records for the answer prompt.
 * Results over `maxRows` are shown as a sample plus per-column statistics
 * computed over every fetched row.
 */
export function formatRowsForLLM(result: SQLResult, maxRows: number): string {
  if (result.rowCount === 0) return '(no rows)';
  if (result.rows.length <= maxRows) return renderRows(result, result.rows).join('\n');

  const sample = result.rows.slice(0, Math.max(1, Math.min(SAMPLE_ROWS, maxRows)));
  return [
    `Showing the first ${sample.length} of ${result.rows.length} rows.`,
    ...renderRows(result, sample),
    `Column statistics over all ${result.rows.length} rows:`,
    ...columnStatistics(result),
  ].join('\n');
}

/**
 * Deterministic answer used when the completion service is unavailable.
 */
export function summarizeResult(question: string, result: SQLResult): string {
  if (isCjk(question)) {
    return result.rowCount === 0
      ? '查询结果为空，没有找到匹配的数据。'
      : `查询成功，返回了 ${result.rowCount} 条记录。`;
  }
  return result.rowCount === 0
    ? 'The query returned no rows.'
    : `The query returned ${result.rowCount} row${result.rowCount === 1 ? '' : 's'}.`;
}

export interface AnswerInput {
  question: string;
  sql: string;
  result: SQLResult;
}

/**
 * Turns an execution result into a natural-language answer.
 */
export class AnswerWriter {
  constructor(private readonly completion: TextCompletion, private readonly maxResultRowsForLLM = 10) {}

  async answer(input: AnswerInput): Promise<string> {
    const { question, sql, result } = input;

    const systemPrompt = `You answer questions about a database from query results.
Answer in the language of the question. Include the actual numbers and values from the results.
LIMIT clauses are a safety feature; a limited result still answers the question.
Do not show SQL and do not use code blocks.`;

    const userPrompt = `User Question: ${question}

SQL Executed: ${sql}

Query Results:
- Columns: ${result.columns.join(', ')}
- Rows returned: ${result.rowCount}

${formatRowsForLLM(result, this.maxResultRowsForLLM)}`;

    try {
      const text = await this.completion.complete({ task: 'answer', systemPrompt, userPrompt });
      const answer = text.replace(/```[a-zA-Z]*\n?|```/g, '').trim();
      if (answer) return answer;
    } catch (error) {
      console.warn(`   ⚠️  Answer generation failed (${errorMessage(error)}), using a summary`);
    }

    return summarizeResult(question, result);
  }
}
