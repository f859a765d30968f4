import type { Ambiguity, AmbiguityKind, ClarificationPrompt } from '../types.js';
import type { TextCompletion } from '../tools/completion.js';
import type { SchemaCatalog } from '../tools/catalog.js';
import { formatCatalogForLLM } from '../tools/catalog.js';
import { errorMessage } from '../errors.js';

export const MAX_CLARIFICATION_OPTIONS = 5;

const CJK = /[\u3400-\u9fff]/;

export function isCjk(text: string): boolean {
  return CJK.test(text);
}

const FALLBACKS: Record<AmbiguityKind, { en: ClarificationPrompt; zh: ClarificationPrompt }> = {
  time_range: {
    en: { question: 'Which time period should be used?', options: ['This year', 'Last year', 'Last 30 days', 'All time'] },
    zh: { question: '请问需要统计哪个时间范围？', options: ['今年', '去年', '最近30天', '全部时间'] },
  },
  ordering: {
    en: { question: 'Which measure should the ranking use?', options: ['Sales revenue', 'Number of purchases', 'Number of tracks', 'Alphabetical order'] },
    zh: { question: '请问按什么指标排序？', options: ['销售额', '购买次数', '曲目数量', '名称排序'] },
  },
  reference: {
    en: { question: 'What are you referring to?', options: ['The previous result', 'Something new (please restate the question)'] },
    zh: { question: '请问您指的是什么？', options: ['上一次的查询结果', '新的问题（请重新描述）'] },
  },
};

/**
 * Deterministic question used when the completion service cannot produce one.
 */
export function fallbackClarification(kind: AmbiguityKind, question: string): ClarificationPrompt {
  const prompt = isCjk(question) ? FALLBACKS[kind].zh : FALLBACKS[kind].en;
  return { question: prompt.question, options: [...prompt.options] };
}

const QUESTION_LINE = /^\s*(?:\*\*)?(?:question|问题)(?:\*\*)?\s*[:：]\s*(.+)$/i;
const OPTION_LINE = /^\s*(?:\d+\s*[.)、．:：]|[-*•])\s*(.+)$/;

/**
 * Reads a `Question:` / `问题:` line and numbered or bulleted options.
 * Returns null unless both a question and at least two options are present.
 */
export function parseClarificationResponse(text: string): ClarificationPrompt | null {
  let question: string | null = null;
  const options: string[] = [];

  for (const line of text.split('\n')) {
    const questionMatch = QUESTION_LINE.exec(line);
    if (questionMatch && question === null) {
      question = questionMatch[1].trim();
      continue;
    }
    const optionMatch = OPTION_LINE.exec(line);
    if (optionMatch && question !== null) {
      const option = optionMatch[1].trim();
      if (option && !options.includes(option)) options.push(option);
    }
  }

  if (!question || options.length < 2) return null;
  return { question, options: options.slice(0, MAX_CLARIFICATION_OPTIONS) };
}

/**
 * Folds the user's answer into the working question. A bare number picks the
 * matching option; anything else is used verbatim.
 *
 * @example
 * ```typescript
 * mergeClarification('most popular genre', 'this year', []); // 'most popular genre (this year)'
 * mergeClarification('最受欢迎的流派', '1', ['今年', '去年']); // '最受欢迎的流派（今年）'
 * ```
 */
export function mergeClarification(question: string, answer: string, options: readonly string[]): string {
  const resolved = resolveAnswer(answer, options);
  return isCjk(question) ? `${question}（${resolved}）` : `${question} (${resolved})`;
}

export function resolveAnswer(answer: string, options: readonly string[]): string {
  const trimmed = answer.trim();
  if (/^\d+$/.test(trimmed)) {
    const index = parseInt(trimmed, 10) - 1;
    if (index >= 0 && index < options.length) return options[index];
  }
  return trimmed;
}

export interface ClarifyInput {
  question: string;
  ambiguity: Ambiguity;
  catalog: SchemaCatalog;
  matchedTables: string[];
  /** Formatted recent conversation, may be empty */
  history: string;
}

/**
 * Produces closed-form clarification questions through the completion service.
 */
export class Clarifier {
  constructor(private readonly completion: TextCompletion) {}

  async prepare(input: ClarifyInput): Promise<ClarificationPrompt> {
    const { question, ambiguity } = input;
    const language = isCjk(question) ? 'Chinese' : 'English';

    const systemPrompt = `You help users of a database question-answering assistant state their question precisely.
Ask ONE short clarification question with 2 to ${MAX_CLARIFICATION_OPTIONS} numbered answer options.
Write in ${language}.

Respond in exactly this format:
Question: <the clarification question>
1. <option>
2. <option>`;

    const tables = input.matchedTables.length > 0 ? input.matchedTables : undefined;
    const context = [
      `Database Schema:\n${formatCatalogForLLM(input.catalog, tables)}`,
      input.history,
    ].filter(part => part.length > 0).join('\n\n');

    const userPrompt = `User Question: ${question}
Why it is unclear (${ambiguity.kind}): ${ambiguity.reason}`;

    try {
      const response = await this.completion.complete({ task: 'clarify', systemPrompt, userPrompt, context });
      const parsed = parseClarificationResponse(response);
      if (parsed) return parsed;
      console.warn('   ⚠️  Clarification response had no usable options, using the default question');
    } catch (error) {
      console.warn(`   ⚠️  Clarification service failed (${errorMessage(error)}), using the default question`);
    }

    return fallbackClarification(ambiguity.kind, question);
  }
}
