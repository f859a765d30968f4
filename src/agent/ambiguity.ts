import type { Ambiguity, AmbiguityKind, Intent, MemoryEntry } from '../types.js';

export interface AmbiguityContext {
  question: string;
  intent: Intent;
  turnIndex: number;
  /** Recent Context Memory entries for the session, oldest first */
  history: MemoryEntry[];
}

/**
 * One ambiguity predicate. `test` returns the reason when the question is
 * ambiguous in this way, null otherwise.
 */
export interface AmbiguityRule {
  id: string;
  kind: AmbiguityKind;
  test(context: AmbiguityContext): string | null;
}

const PRONOUN = /它们|他们|她们|这些|那些|上面|刚才|(?:这|那)个(?!月|星期|季度|年|周)|它|\b(?:them|those|these|it|that one)\b/i;
const POPULARITY = /最受欢迎|最流行|最热门|最畅销|\b(?:most popular|best[- ]selling|trending)\b/i;
const RELATIVE_TIME = /最近|近期|近来|\b(?:recent|recently|lately)\b/i;
const RANKING_WORD = /最好|最差|最重要|主要|\b(?:best|worst|top|important|major)\b/i;
const ORDERING_MEASURE = /按|根据|排序|数量|金额|销售额|销量|收入|次数|总额|\b(?:by|revenue|sales|count|amount|total|number of|quantity|alphabetical)\b/i;

function hasAntecedent(context: AmbiguityContext): boolean {
  return context.history.some(entry =>
    entry.turnIndex < context.turnIndex
      ? entry.kind !== 'clarification'
      : entry.turnIndex === context.turnIndex && entry.kind === 'clarification'
  );
}

/**
 * Default predicates, most specific first.
 */
export const DEFAULT_AMBIGUITY_RULES: readonly AmbiguityRule[] = [
  {
    id: 'unresolved-reference',
    kind: 'reference',
    test: ctx => {
      const match = PRONOUN.exec(ctx.question);
      if (!match || hasAntecedent(ctx)) return null;
      return `"${match[0]}" refers to something not mentioned earlier in the conversation`;
    },
  },
  {
    id: 'popularity-without-time',
    kind: 'time_range',
    test: ctx =>
      POPULARITY.test(ctx.question) && ctx.intent.timeRange === null
        ? 'Popularity depends on the time period, and none was given'
        : null,
  },
  {
    id: 'relative-time-unresolved',
    kind: 'time_range',
    test: ctx =>
      RELATIVE_TIME.test(ctx.question) && ctx.intent.timeRange === null
        ? 'A relative time word was used without a concrete period'
        : null,
  },
  {
    id: 'ranking-without-measure',
    kind: 'ordering',
    test: ctx =>
      RANKING_WORD.test(ctx.question) && !ORDERING_MEASURE.test(ctx.question)
        ? 'The ranking has no measure to order by'
        : null,
  },
];

/**
 * Runs the rules in order and reports the first match.
 */
export function detectAmbiguity(
  context: AmbiguityContext,
  rules: readonly AmbiguityRule[] = DEFAULT_AMBIGUITY_RULES
): Ambiguity | null {
  for (const rule of rules) {
    const reason = rule.test(context);
    if (reason !== null) {
      return { ruleId: rule.id, kind: rule.kind, reason };
    }
  }
  return null;
}
