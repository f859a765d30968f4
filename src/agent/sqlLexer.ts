/**
 * Minimal SQL lexer shared by the validator and the sandbox.
 *
 * Recognises single-quoted strings ('' escapes), double-quoted identifiers,
 * `--` line comments and `/* *\/` block comments. Everything else is a word,
 * whitespace, or a single punctuation character. Unterminated literals and
 * comments run to the end of the input.
 */

export type TokenKind = 'word' | 'string' | 'quoted' | 'comment' | 'space' | 'punct';

export interface Token {
  kind: TokenKind;
  text: string;
  /** Offset of the first character in the source text */
  offset: number;
}

const WORD_CHAR = /[A-Za-z0-9_$.\u0080-\uFFFF]/;

function readQuoted(sql: string, start: number, quote: string): number {
  let i = start + 1;
  while (i < sql.length) {
    if (sql[i] === quote) {
      if (sql[i + 1] === quote) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  return sql.length;
}

export function tokenize(sql: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < sql.length) {
    const ch = sql[i];
    const start = i;
    let kind: TokenKind;

    if (ch === '-' && sql[i + 1] === '-') {
      const newline = sql.indexOf('\n', i);
      i = newline === -1 ? sql.length : newline;
      kind = 'comment';
    } else if (ch === '/' && sql[i + 1] === '*') {
      const close = sql.indexOf('*/', i + 2);
      i = close === -1 ? sql.length : close + 2;
      kind = 'comment';
    } else if (ch === "'") {
      i = readQuoted(sql, i, "'");
      kind = 'string';
    } else if (ch === '"') {
      i = readQuoted(sql, i, '"');
      kind = 'quoted';
    } else if (/\s/.test(ch)) {
      while (i < sql.length && /\s/.test(sql[i])) i++;
      kind = 'space';
    } else if (WORD_CHAR.test(ch)) {
      while (i < sql.length && WORD_CHAR.test(sql[i])) i++;
      kind = 'word';
    } else {
      i++;
      kind = 'punct';
    }

    tokens.push({ kind, text: sql.slice(start, i), offset: start });
  }

  return tokens;
}

/**
 * Joins tokens back into text with comments dropped and whitespace runs outside
 * literals collapsed to one space. Leading and trailing whitespace is removed.
 */
export function render(tokens: Token[]): string {
  let out = '';
  let pendingSpace = false;
  for (const token of tokens) {
    if (token.kind === 'space' || token.kind === 'comment') {
      pendingSpace = true;
      continue;
    }
    if (pendingSpace && out.length > 0) out += ' ';
    pendingSpace = false;
    out += token.text;
  }
  return out;
}

/**
 * Text for keyword scanning: comments are kept verbatim, string literal
 * contents are blanked.
 */
export function keywordText(tokens: Token[]): string {
  return tokens.map(t => (t.kind === 'string' ? "''" : t.text)).join('');
}

/**
 * Splits on `;` outside literals and comments. Statements with no code left
 * after comment removal are dropped.
 */
export function splitStatements(tokens: Token[]): Token[][] {
  const statements: Token[][] = [];
  let current: Token[] = [];

  for (const token of tokens) {
    if (token.kind === 'punct' && token.text === ';') {
      statements.push(current);
      current = [];
    } else {
      current.push(token);
    }
  }
  statements.push(current);

  return statements.filter(stmt => stmt.some(t => t.kind !== 'space' && t.kind !== 'comment'));
}

/**
 * Upper-cased words that sit outside any parentheses.
 */
export function topLevelWords(tokens: Token[]): string[] {
  const words: string[] = [];
  let depth = 0;
  for (const token of tokens) {
    if (token.kind === 'punct') {
      if (token.text === '(') depth++;
      else if (token.text === ')') depth = Math.max(0, depth - 1);
    } else if (token.kind === 'word' && depth === 0) {
      words.push(token.text.toUpperCase());
    }
  }
  return words;
}

/**
 * First keyword of a statement, looking through any leading parentheses.
 */
export function leadingKeyword(tokens: Token[]): string | null {
  for (const token of tokens) {
    if (token.kind === 'word') return token.text.toUpperCase();
    if (token.kind === 'punct' && token.text === '(') continue;
    if (token.kind === 'space' || token.kind === 'comment') continue;
    return null;
  }
  return null;
}

/**
 * Lower-cased names written directly before an opening parenthesis, quotes
 * removed. Keywords such as `IN (` and `AS (` are included.
 */
export function calledNames(tokens: Token[]): string[] {
  const names: string[] = [];
  let candidate: string | null = null;

  for (const token of tokens) {
    if (token.kind === 'space' || token.kind === 'comment') continue;
    if (token.kind === 'punct' && token.text === '(' && candidate !== null) {
      names.push(candidate);
    }
    if (token.kind === 'word') {
      candidate = token.text.toLowerCase();
    } else if (token.kind === 'quoted') {
      candidate = token.text.slice(1, -1).replace(/""/g, '"').toLowerCase();
    } else {
      candidate = null;
    }
  }
  return names;
}
