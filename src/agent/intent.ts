/**
 * Rule-based intent parsing and table matching for Chinese and English questions.
 */

import type { Intent, QuestionType, TimeRange } from '../types.js';
import type { SchemaCatalog } from '../tools/catalog.js';

// ============================================================================
// Question type
// ============================================================================

interface QuestionTypeRule {
  type: QuestionType;
  pattern: RegExp;
}

/** Ordered; the first matching rule decides the question type. */
export const QUESTION_TYPE_RULES: readonly QuestionTypeRule[] = [
  {
    type: 'ranking',
    pattern: /最(?:多|少|高|低|好|差|大|小|受欢迎|流行|热门|畅销|重要)|排名|排行|\b(?:most|least|best|worst|highest|lowest|top(?!\s*\d))\b/i,
  },
  {
    type: 'aggregate',
    pattern: /多少|几个|总数|总和|总计|合计|平均|数量|统计|\b(?:how many|how much|count|total|sum|average|avg)\b/i,
  },
  {
    type: 'list',
    pattern: /列出|显示|查询|查找|哪些|所有|\b(?:list|show|find|which|all)\b/i,
  },
  {
    type: 'lookup',
    pattern: /是什么|是谁|什么|谁|哪个|\b(?:what|who|when|where)\b/i,
  },
];

// ============================================================================
// Numbers
// ============================================================================

const CN_DIGITS: Record<string, number> = {
  零: 0, 一: 1, 二: 2, 两: 2, 三: 3, 四: 4, 五: 5, 六: 6, 七: 7, 八: 8, 九: 9,
};

/**
 * Parses Arabic digits or a Chinese numeral below 100 (五, 十, 十五, 二十三).
 */
export function parseNumber(text: string): number | null {
  if (/^\d+$/.test(text)) return parseInt(text, 10);

  const tenIndex = text.indexOf('十');
  if (tenIndex === -1) {
    return text.length === 1 && text in CN_DIGITS ? CN_DIGITS[text] : null;
  }

  const tensPart = text.slice(0, tenIndex);
  const onesPart = text.slice(tenIndex + 1);
  const tens = tensPart === '' ? 1 : tensPart.length === 1 && tensPart in CN_DIGITS ? CN_DIGITS[tensPart] : null;
  const ones = onesPart === '' ? 0 : onesPart.length === 1 && onesPart in CN_DIGITS ? CN_DIGITS[onesPart] : null;
  if (tens === null || ones === null) return null;
  return tens * 10 + ones;
}

const NUMBER = '(\\d+|[零一二两三四五六七八九十]+)';

const ROW_LIMIT_PATTERNS: readonly RegExp[] = [
  new RegExp(`前\\s*${NUMBER}`),
  /\b(?:top|first|limit)\s+(\d+)\b/i,
];

export function extractRowLimit(question: string): number | null {
  for (const pattern of ROW_LIMIT_PATTERNS) {
    const match = pattern.exec(question);
    if (!match) continue;
    const n = parseNumber(match[1]);
    if (n !== null && n > 0) return n;
  }
  return null;
}

// ============================================================================
// Time range
// ============================================================================

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function utcDate(year: number, month: number, day: number): Date {
  return new Date(Date.UTC(year, month, day));
}

function daysInMonth(year: number, month: number): number {
  return utcDate(year, month + 1, 0).getUTCDate();
}

function addDays(date: Date, days: number): Date {
  return utcDate(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate() + days);
}

/** Same day `months` earlier, clamped to the end of a shorter month. */
function subtractMonths(date: Date, months: number): Date {
  const target = utcDate(date.getUTCFullYear(), date.getUTCMonth() - months, 1);
  const day = Math.min(date.getUTCDate(), daysInMonth(target.getUTCFullYear(), target.getUTCMonth()));
  return utcDate(target.getUTCFullYear(), target.getUTCMonth(), day);
}

function range(label: string, start: Date, end: Date): TimeRange {
  return { label, start: isoDate(start), end: isoDate(end) };
}

type Unit = 'day' | 'week' | 'month' | 'year';

function unitOf(word: string): Unit | null {
  if (/^(?:天|日|days?)$/i.test(word)) return 'day';
  if (/^(?:周|个?星期|weeks?)$/i.test(word)) return 'week';
  if (/^(?:个?月|months?)$/i.test(word)) return 'month';
  if (/^(?:年|years?)$/i.test(word)) return 'year';
  return null;
}

function lastN(n: number, unit: Unit, today: Date): TimeRange {
  const label = `last ${n} ${unit}${n === 1 ? '' : 's'}`;
  switch (unit) {
    case 'day':
      return range(label, addDays(today, -n), today);
    case 'week':
      return range(label, addDays(today, -7 * n), today);
    case 'month':
      return range(label, subtractMonths(today, n), today);
    case 'year':
      return range(label, subtractMonths(today, 12 * n), today);
  }
}

interface TimeRule {
  pattern: RegExp;
  resolve(match: RegExpExecArray, today: Date): TimeRange | null;
}

/** Ordered; relative spans with a count come before the named periods. */
const TIME_RULES: readonly TimeRule[] = [
  {
    pattern: new RegExp(`(?:最近|过去|近)\\s*${NUMBER}\\s*(天|日|周|个?星期|个?月|年)`),
    resolve: (m, today) => {
      const n = parseNumber(m[1]);
      const unit = unitOf(m[2]);
      return n !== null && n > 0 && unit ? lastN(n, unit, today) : null;
    },
  },
  {
    pattern: /\b(?:last|past)\s+(\d+)\s+(days?|weeks?|months?|years?)\b/i,
    resolve: (m, today) => {
      const n = parseInt(m[1], 10);
      const unit = unitOf(m[2]);
      return n > 0 && unit ? lastN(n, unit, today) : null;
    },
  },
  {
    pattern: /全部时间|所有时间|不限时间|\ball[- ]time\b/i,
    resolve: (_m, today) => range('all time', utcDate(1970, 0, 1), today),
  },
  {
    pattern: /今天|\btoday\b/i,
    resolve: (_m, today) => range('today', today, today),
  },
  {
    pattern: /昨天|\byesterday\b/i,
    resolve: (_m, today) => {
      const yesterday = addDays(today, -1);
      return range('yesterday', yesterday, yesterday);
    },
  },
  {
    pattern: /本周|这周|这个星期|\bthis week\b/i,
    resolve: (_m, today) => range('this week', addDays(today, -((today.getUTCDay() + 6) % 7)), today),
  },
  {
    pattern: /上周|上个星期|\blast week\b/i,
    resolve: (_m, today) => {
      const monday = addDays(today, -((today.getUTCDay() + 6) % 7));
      return range('last week', addDays(monday, -7), addDays(monday, -1));
    },
  },
  {
    pattern: /本月|这个月|\bthis month\b/i,
    resolve: (_m, today) => range('this month', utcDate(today.getUTCFullYear(), today.getUTCMonth(), 1), today),
  },
  {
    pattern: /上个月|上月|\blast month\b/i,
    resolve: (_m, today) => {
      const start = utcDate(today.getUTCFullYear(), today.getUTCMonth() - 1, 1);
      const end = utcDate(today.getUTCFullYear(), today.getUTCMonth(), 0);
      return range('last month', start, end);
    },
  },
  {
    pattern: /今年|本年|\bthis year\b/i,
    resolve: (_m, today) => range('this year', utcDate(today.getUTCFullYear(), 0, 1), today),
  },
  {
    pattern: /去年|\blast year\b/i,
    resolve: (_m, today) => {
      const year = today.getUTCFullYear() - 1;
      return range('last year', utcDate(year, 0, 1), utcDate(year, 11, 31));
    },
  },
  {
    pattern: /\b((?:19|20)\d{2})\b/,
    resolve: m => {
      const year = parseInt(m[1], 10);
      return range(String(year), utcDate(year, 0, 1), utcDate(year, 11, 31));
    },
  },
];

/**
 * Resolves the first time expression in the question to concrete UTC dates.
 */
export function resolveTimeRange(question: string, now: Date = new Date()): TimeRange | null {
  const today = utcDate(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  for (const rule of TIME_RULES) {
    const match = rule.pattern.exec(question);
    if (!match) continue;
    const resolved = rule.resolve(match, today);
    if (resolved) return resolved;
  }
  return null;
}

// ============================================================================
// Intent
// ============================================================================

/**
 * @example
 * ```typescript
 * parseIntent('查询前5个客户的名字和邮箱');
 * // { questionType: 'list', rowLimit: 5, timeRange: null, defaulted: false }
 * ```
 */
export function parseIntent(question: string, now: Date = new Date()): Intent {
  const matched = QUESTION_TYPE_RULES.find(rule => rule.pattern.test(question));
  return {
    questionType: matched ? matched.type : 'lookup',
    rowLimit: extractRowLimit(question),
    timeRange: resolveTimeRange(question, now),
    defaulted: matched === undefined,
  };
}

// ============================================================================
// Table matching
// ============================================================================

const ASCII_TERM = /^[A-Za-z0-9_ ]+$/;

function termsFor(name: string, aliases: readonly string[]): string[] {
  const spaced = name.replace(/_/g, ' ');
  const terms = new Set([name, spaced, `${name}s`, `${spaced}s`, ...aliases]);
  return [...terms].filter(term => term.trim().length > 0);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Finds catalog tables mentioned in the question by name, spaced or plural
 * form, or alias. Longer terms win over terms they contain (发票明细 before
 * 发票). Tables are returned in order of first mention.
 */
export function matchTables(question: string, catalog: SchemaCatalog): string[] {
  const candidates: Array<{ term: string; table: string }> = [];
  for (const table of catalog.allTables()) {
    for (const term of termsFor(table.name, table.aliases)) {
      candidates.push({ term, table: table.name });
    }
  }
  candidates.sort((a, b) => b.term.length - a.term.length || a.table.localeCompare(b.table));

  let remaining = question;
  const firstSeen = new Map<string, number>();

  for (const { term, table } of candidates) {
    const pattern = ASCII_TERM.test(term)
      ? new RegExp(`(?<![A-Za-z0-9_])${escapeRegExp(term)}(?![A-Za-z0-9_])`, 'gi')
      : new RegExp(escapeRegExp(term), 'g');

    let match: RegExpExecArray | null;
    while ((match = pattern.exec(remaining)) !== null) {
      const index = match.index;
      const seen = firstSeen.get(table);
      if (seen === undefined || index < seen) firstSeen.set(table, index);
      remaining = remaining.slice(0, index) + '\u0000'.repeat(match[0].length) + remaining.slice(index + match[0].length);
    }
  }

  return [...firstSeen.entries()]
    .sort((a, b) => a[1] - b[1] || a[0].localeCompare(b[0]))
    .map(([table]) => table);
}
