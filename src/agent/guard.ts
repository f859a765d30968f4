import type { SandboxDecision, SandboxReasonCode, ReferencedIdentifiers } from '../types.js';
import type { SchemaCatalog } from '../tools/catalog.js';
import {
  calledNames,
  keywordText,
  leadingKeyword,
  render,
  splitStatements,
  tokenize,
  topLevelWords,
  type Token,
} from './sqlLexer.js';
import { DEFAULT_DIALECT, extractReferences, type ParsedReferences } from './sqlValidator.js';

/**
 * Keywords that may not appear anywhere in a candidate statement, including
 * inside comments. String literal contents are not scanned.
 */
export const DEFAULT_FORBIDDEN_KEYWORDS: readonly string[] = [
  'INSERT', 'UPDATE', 'DELETE', 'DROP', 'ALTER', 'TRUNCATE', 'GRANT', 'REVOKE',
  'CREATE', 'RENAME', 'MERGE', 'CALL', 'EXEC', 'EXECUTE', 'COPY', 'VACUUM',
  'LOCK', 'UNLOCK', 'INTO', 'FLUSH', 'KILL', 'SHUTDOWN', 'PROCEDURE', 'FUNCTION',
  'pg_sleep', 'pg_read_file', 'dblink', 'lo_import', 'sleep', 'benchmark', 'load_file',
];

export const RESERVED_SCHEMAS: readonly string[] = [
  'information_schema', 'pg_catalog', 'pg_toast', 'mysql', 'sys', 'performance_schema',
];

/** Server functions that read files, settings or other connections. */
export const SYSTEM_FUNCTION_PREFIXES: readonly string[] = ['pg_', 'lo_', 'dblink'];
export const SYSTEM_FUNCTIONS: readonly string[] = ['current_setting', 'set_config'];

export interface SandboxOptions {
  /** Row limit injected when the statement has none */
  maxRows: number;
  /** Execution-time budget attached to the decision */
  timeoutMs: number;
  forbiddenKeywords?: readonly string[];
  /** node-sql-parser dialect used to resolve identifiers */
  dialect?: string;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function keywordPattern(keywords: readonly string[]): RegExp {
  return new RegExp(`\\b(${keywords.map(escapeRegExp).join('|')})\\b`, 'i');
}

const EMPTY_REFERENCES: ReferencedIdentifiers = { tables: [], columns: [] };

function deny(
  reasonCode: SandboxReasonCode,
  reason: string,
  normalizedSql: string,
  timeoutMs: number,
  referencedIdentifiers: ReferencedIdentifiers = EMPTY_REFERENCES
): SandboxDecision {
  return { allowed: false, reasonCode, reason, normalizedSql, referencedIdentifiers, timeoutMs };
}

function isReservedTable(schema: string | null, table: string): boolean {
  if (schema && RESERVED_SCHEMAS.includes(schema.toLowerCase())) return true;
  return table.toLowerCase().startsWith('pg_');
}

function isSystemFunction(name: string): boolean {
  return name
    .split('.')
    .some(part => SYSTEM_FUNCTION_PREFIXES.some(prefix => part.startsWith(prefix)) || SYSTEM_FUNCTIONS.includes(part));
}

/** System functions called by the statement, from the parse tree and the raw tokens. */
function systemFunctionCalls(refs: ParsedReferences, tokens: Token[]): string[] {
  const names = new Set([...refs.functions, ...calledNames(tokens)]);
  return [...names].filter(isSystemFunction);
}

function hasRowLimit(words: string[]): boolean {
  if (words.includes('LIMIT')) return true;
  return words.some((word, i) => word === 'FETCH' && (words[i + 1] === 'FIRST' || words[i + 1] === 'NEXT'));
}

function isDerived(refs: ParsedReferences, name: string): boolean {
  return refs.cteNames.has(name) || refs.derivedNames.has(name);
}

function isScoped(refs: ParsedReferences, column: string): boolean {
  if (refs.unscopedColumns.has(column)) return false;
  return refs.scopedColumns.has(column) || refs.outputAliases.has(column);
}

interface IdentifierReport {
  referenced: ReferencedIdentifiers;
  unknown: string[];
  reserved: string[];
}

/**
 * Resolves every table and column reference against the catalog.
 * FROM may name catalog tables or CTEs of the outermost WITH. Qualifiers may
 * also be table aliases or derived-table aliases. An unqualified column that
 * is not in the catalog passes only when every use of it is explained by its
 * SELECT (see `ParsedReferences.scopedColumns`). When a reserved schema is
 * referenced its columns cannot be resolved, so only table references are
 * checked.
 */
function resolveIdentifiers(refs: ParsedReferences, catalog: SchemaCatalog): IdentifierReport {
  const tables = new Set<string>();
  const columns = new Set<string>();
  const unknown = new Set<string>();
  const reserved = new Set<string>();

  for (const { schema, table } of refs.tables) {
    const key = table.toLowerCase();
    if (isReservedTable(schema, table)) {
      reserved.add(schema ? `${schema}.${table}` : table);
      continue;
    }
    if (!schema && refs.cteNames.has(key)) continue;
    const info = catalog.getTable(table);
    if (info) tables.add(info.name);
    else unknown.add(table);
  }

  if (reserved.size === 0) {
    for (const { qualifier, column } of refs.columns) {
      const columnKey = column.toLowerCase();

      if (qualifier === null) {
        if (catalog.hasColumnAnywhere(column)) columns.add(columnKey);
        else if (!isScoped(refs, columnKey)) unknown.add(column);
        continue;
      }

      const qualifierKey = qualifier.toLowerCase();
      const tableName = refs.tableAliases.get(qualifierKey) ?? qualifierKey;
      const info = catalog.getTable(tableName);
      if (info) {
        if (catalog.hasColumn(info.name, column)) columns.add(`${info.name}.${columnKey}`);
        else unknown.add(`${qualifier}.${column}`);
      } else if (!isDerived(refs, qualifierKey) && !isDerived(refs, tableName)) {
        unknown.add(`${qualifier}.${column}`);
      }
    }
  }

  return {
    referenced: { tables: [...tables], columns: [...columns] },
    unknown: [...unknown],
    reserved: [...reserved],
  };
}

/**
 * Static security gate in front of the executor.
 *
 * Checks, in order:
 * - Empty input
 * - Forbidden keywords anywhere outside string literals (comments included)
 * - More than one statement
 * - A statement that is not SELECT or WITH ... SELECT
 * - Tables and columns that do not exist in the catalog
 * - References to reserved system schemas, and system function calls
 *
 * An allowed statement comes back comment-free, whitespace-collapsed, without a
 * trailing semicolon, and with `LIMIT maxRows` appended when it had no
 * top-level row limit. An existing limit is never changed.
 *
 * @example
 * ```typescript
 * const decision = checkSandbox('SELECT email FROM customer', catalog, { maxRows: 200, timeoutMs: 10000 });
 * decision.normalizedSql; // "SELECT email FROM customer LIMIT 200"
 * ```
 */
export function checkSandbox(sql: string, catalog: SchemaCatalog, options: SandboxOptions): SandboxDecision {
  const { maxRows, timeoutMs } = options;
  const tokens = tokenize(sql);
  const statements = splitStatements(tokens);
  const flattened = statements.map(render).join('; ');

  if (statements.length === 0) {
    return deny('EMPTY_STATEMENT', 'Empty SQL statement', '', timeoutMs);
  }

  const keywordMatch = keywordPattern(options.forbiddenKeywords ?? DEFAULT_FORBIDDEN_KEYWORDS).exec(keywordText(tokens));
  if (keywordMatch) {
    return deny('FORBIDDEN_KEYWORD', `Forbidden keyword detected: ${keywordMatch[1].toUpperCase()}`, flattened, timeoutMs);
  }

  if (statements.length > 1) {
    return deny('MULTI_STATEMENT', 'Multiple statements are not allowed', flattened, timeoutMs);
  }

  const statement = statements[0];
  const statementSql = render(statement);
  const leading = leadingKeyword(statement);
  if (leading !== 'SELECT' && leading !== 'WITH') {
    return deny('FORBIDDEN_KEYWORD', 'Only SELECT or WITH ... SELECT statements are allowed', statementSql, timeoutMs);
  }

  let refs: ParsedReferences;
  try {
    refs = extractReferences(statementSql, options.dialect ?? DEFAULT_DIALECT);
  } catch {
    return deny('UNKNOWN_IDENTIFIER', 'Identifiers could not be resolved because the statement does not parse', statementSql, timeoutMs);
  }

  const writeKinds = refs.statementKinds.filter(kind => kind !== 'select');
  if (writeKinds.length > 0) {
    return deny('FORBIDDEN_KEYWORD', `Only read access is allowed (found ${writeKinds.join(', ')})`, statementSql, timeoutMs);
  }

  const report = resolveIdentifiers(refs, catalog);
  if (report.unknown.length > 0) {
    return deny('UNKNOWN_IDENTIFIER', `Unknown identifier(s): ${report.unknown.join(', ')}`, statementSql, timeoutMs, report.referenced);
  }
  if (report.reserved.length > 0) {
    return deny('FORBIDDEN_SCHEMA', `System schema access is not allowed: ${report.reserved.join(', ')}`, statementSql, timeoutMs, report.referenced);
  }
  const systemCalls = systemFunctionCalls(refs, statement);
  if (systemCalls.length > 0) {
    return deny('FORBIDDEN_SCHEMA', `System function call is not allowed: ${systemCalls.join(', ')}`, statementSql, timeoutMs, report.referenced);
  }

  const normalizedSql = hasRowLimit(topLevelWords(statement))
    ? statementSql
    : `${statementSql} LIMIT ${maxRows}`;

  return {
    allowed: true,
    normalizedSql,
    referencedIdentifiers: report.referenced,
    timeoutMs,
  };
}

/**
 * Shortens SQL for log lines.
 */
export function truncateSql(sql: string, max = 100): string {
  return sql.length > max ? `${sql.slice(0, max)}...` : sql;
}
