/**
 * SQL Parser and Validator
 *
 * Syntax checking against a SQL-dialect grammar (node-sql-parser), plus the
 * identifier extraction the sandbox uses to check references against the
 * catalog. No existence checks happen here.
 */

import NodeSqlParser from 'node-sql-parser';
import type { Diagnostic, ValidationResult } from '../types.js';
import { describeReason, errorMessage } from '../errors.js';

const { Parser } = NodeSqlParser;

/** node-sql-parser dialect name used when none is configured */
export const DEFAULT_DIALECT = 'PostgresQL';

const parser = new Parser();

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(value: unknown, ...path: string[]): number | undefined {
  let current = value;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return typeof current === 'number' ? current : undefined;
}

/**
 * Builds the diagnostic for a grammar failure. Position data comes from the
 * parser's error location when it has one.
 */
function syntaxDiagnostic(sql: string, error: unknown): Diagnostic {
  const diagnostic: Diagnostic = {
    code: 'SYNTAX_VALIDATION_ERROR',
    message: describeReason('SYNTAX_VALIDATION_ERROR'),
    detail: errorMessage(error),
  };

  const offset = readNumber(error, 'location', 'start', 'offset');
  const line = readNumber(error, 'location', 'start', 'line');
  const column = readNumber(error, 'location', 'start', 'column');

  if (offset !== undefined) {
    const fragment = sql.slice(offset, offset + 30).split('\n')[0].trim();
    diagnostic.fragment = fragment.length > 0 ? fragment : '<end of input>';
  }
  if (line !== undefined) diagnostic.line = line;
  if (column !== undefined) diagnostic.column = column;

  return diagnostic;
}

/**
 * Checks that `sql` is grammatical in the given dialect.
 *
 * @example
 * ```typescript
 * validateSyntax('SELECT email FROM customer LIMIT 5').valid; // true
 * validateSyntax('SELEC email FROM customer').diagnostics[0].code; // 'SYNTAX_VALIDATION_ERROR'
 * ```
 */
export function validateSyntax(sql: string, dialect: string = DEFAULT_DIALECT): ValidationResult {
  if (!sql.trim()) {
    return {
      valid: false,
      diagnostics: [{ code: 'SYNTAX_VALIDATION_ERROR', message: describeReason('EMPTY_STATEMENT') }],
    };
  }

  try {
    parser.astify(sql, { database: dialect });
    return { valid: true, diagnostics: [] };
  } catch (error) {
    return { valid: false, diagnostics: [syntaxDiagnostic(sql, error)] };
  }
}

// ============================================================================
// Identifier extraction
// ============================================================================

export interface TableReference {
  schema: string | null;
  table: string;
}

export interface ColumnReference {
  /** Table name, alias or CTE name as written; null when unqualified */
  qualifier: string | null;
  column: string;
}

export interface ParsedReferences {
  /** Statement kinds the parser saw, e.g. `select` */
  statementKinds: string[];
  tables: TableReference[];
  columns: ColumnReference[];
  /** Alias (lower-cased) → catalog table it stands for */
  tableAliases: Map<string, string>;
  /** Names of the outermost WITH clause; the only non-catalog names allowed in FROM */
  cteNames: Set<string>;
  /** Derived-table aliases, usable as column qualifiers only */
  derivedNames: Set<string>;
  /** Output column aliases (`AS name`) anywhere in the statement */
  outputAliases: Set<string>;
  /**
   * Unqualified names with a use the enclosing SELECT explains: a column its
   * derived tables or CTEs produce, or one of its own output aliases inside
   * ORDER BY, GROUP BY or HAVING.
   */
  scopedColumns: Set<string>;
  /** Unqualified names with at least one use that must be a catalog column */
  unscopedColumns: Set<string>;
  /** Called function names, lower-cased, schema-qualified as written */
  functions: Set<string>;
}

type AstNode = Record<string, unknown>;

function nameOf(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (isRecord(value) && typeof value.value === 'string') return value.value;
  if (isRecord(value) && typeof value.table === 'string') return value.table;
  return null;
}

function columnNameOf(node: AstNode): string | null {
  const column = node.column;
  if (isRecord(column) && isRecord(column.expr) && typeof column.expr.value === 'string') {
    return column.expr.value;
  }
  return nameOf(column);
}

function functionNameOf(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) {
    const parts = value.map(functionNameOf).filter((part): part is string => part !== null);
    return parts.length > 0 ? parts.join('.') : null;
  }
  if (!isRecord(value)) return null;
  if (typeof value.value === 'string') return value.value;
  const name = functionNameOf(value.name);
  const schema = functionNameOf(value.schema);
  return name && schema ? `${schema}.${name}` : name;
}

function selectOf(value: unknown): AstNode | null {
  if (!isRecord(value)) return null;
  if (value.type === 'select') return value;
  return 'ast' in value ? selectOf(value.ast) : null;
}

function walk(node: unknown, refs: ParsedReferences): void {
  if (Array.isArray(node)) {
    for (const item of node) walk(item, refs);
    return;
  }
  if (!isRecord(node)) return;

  const alias = nameOf(node.as);
  const isColumnRef = node.type === 'column_ref';

  if (alias && !isColumnRef) {
    if (typeof node.table === 'string') {
      refs.tableAliases.set(alias.toLowerCase(), node.table.toLowerCase());
    } else if (selectOf(node.expr)) {
      refs.derivedNames.add(alias.toLowerCase());
    } else {
      refs.outputAliases.add(alias.toLowerCase());
    }
  }

  if (node.type === 'function' || node.type === 'aggr_func') {
    const name = functionNameOf(node.name);
    if (name) refs.functions.add(name.toLowerCase());
  }

  for (const value of Object.values(node)) {
    if (typeof value === 'object' && value !== null) walk(value, refs);
  }
}

// ============================================================================
// Column scopes
// ============================================================================

const ALIAS_CLAUSES = new Set(['orderby', 'groupby', 'having']);

/** Aliases and bare column names of a SELECT list. */
function outputNames(select: AstNode): Set<string> {
  const names = new Set<string>();
  const columns = Array.isArray(select.columns) ? select.columns : [];
  for (const item of columns) {
    if (!isRecord(item)) continue;
    const alias = nameOf(item.as);
    if (alias) {
      names.add(alias.toLowerCase());
    } else if (isRecord(item.expr) && item.expr.type === 'column_ref') {
      const name = columnNameOf(item.expr);
      if (name && name !== '*') names.add(name.toLowerCase());
    }
  }
  return names;
}

function cteOutputs(item: AstNode): Set<string> {
  if (Array.isArray(item.columns) && item.columns.length > 0) {
    const names = item.columns.map(nameOf).filter((name): name is string => name !== null);
    return new Set(names.map(name => name.toLowerCase()));
  }
  const body = selectOf(item.stmt);
  return body ? outputNames(body) : new Set();
}

/** Columns produced by the derived tables and CTEs a SELECT reads from. */
function sourceColumns(select: AstNode, ctes: Map<string, Set<string>>): Set<string> {
  const names = new Set<string>();
  const from = Array.isArray(select.from) ? select.from : [];
  for (const item of from) {
    if (!isRecord(item)) continue;
    const derived = selectOf(item.expr);
    const produced = derived
      ? outputNames(derived)
      : typeof item.table === 'string'
        ? ctes.get(item.table.toLowerCase())
        : undefined;
    for (const name of produced ?? []) names.add(name);
  }
  return names;
}

interface ColumnUse {
  name: string;
  inAliasClause: boolean;
}

/** Unqualified column uses of one SELECT; nested SELECTs are handed back. */
function collectUses(node: unknown, inAliasClause: boolean, uses: ColumnUse[], nested: AstNode[]): void {
  if (Array.isArray(node)) {
    for (const item of node) collectUses(item, inAliasClause, uses, nested);
    return;
  }
  if (!isRecord(node)) return;
  if (node.type === 'select') {
    nested.push(node);
    return;
  }
  if (node.type === 'column_ref') {
    const name = columnNameOf(node);
    if (!nameOf(node.table) && name && name !== '*') {
      uses.push({ name: name.toLowerCase(), inAliasClause });
    }
    return;
  }
  for (const value of Object.values(node)) {
    collectUses(value, inAliasClause, uses, nested);
  }
}

function analyzeSelect(select: AstNode, ctes: Map<string, Set<string>>, refs: ParsedReferences): void {
  const sources = sourceColumns(select, ctes);
  const outputs = outputNames(select);
  const nested: AstNode[] = [];

  for (const [key, value] of Object.entries(select)) {
    if (key === '_next' || key === 'with') continue;
    const uses: ColumnUse[] = [];
    collectUses(value, ALIAS_CLAUSES.has(key), uses, nested);
    for (const { name, inAliasClause } of uses) {
      if (sources.has(name) || (inAliasClause && outputs.has(name))) refs.scopedColumns.add(name);
      else refs.unscopedColumns.add(name);
    }
  }

  if (Array.isArray(select.with)) {
    for (const item of select.with) {
      const body = isRecord(item) ? selectOf(item.stmt) : null;
      if (body) analyzeSelect(body, ctes, refs);
    }
  }
  for (const child of nested) analyzeSelect(child, ctes, refs);

  const next = selectOf(select._next);
  if (next) analyzeSelect(next, ctes, refs);
}

function splitEntry(entry: string): [string, string | null, string] | null {
  const parts = entry.split('::');
  if (parts.length !== 3) return null;
  const [kind, middle, name] = parts;
  return [kind, middle === 'null' ? null : middle, name];
}

/**
 * Parses `sql` and lists every table, column and function it references, with
 * the aliases and scopes needed to resolve them. Throws the parser's error when
 * the statement is not grammatical.
 */
export function extractReferences(sql: string, dialect: string = DEFAULT_DIALECT): ParsedReferences {
  const { tableList, columnList, ast } = parser.parse(sql, { database: dialect });

  const refs: ParsedReferences = {
    statementKinds: [],
    tables: [],
    columns: [],
    tableAliases: new Map(),
    cteNames: new Set(),
    derivedNames: new Set(),
    outputAliases: new Set(),
    scopedColumns: new Set(),
    unscopedColumns: new Set(),
    functions: new Set(),
  };

  for (const entry of tableList) {
    const parsed = splitEntry(entry);
    if (!parsed) continue;
    const [kind, schema, table] = parsed;
    if (!refs.statementKinds.includes(kind)) refs.statementKinds.push(kind);
    refs.tables.push({ schema, table });
  }

  for (const entry of columnList) {
    const parsed = splitEntry(entry);
    if (!parsed) continue;
    const [kind, qualifier, column] = parsed;
    if (!refs.statementKinds.includes(kind)) refs.statementKinds.push(kind);
    if (column === '(.*)' || column === '*') continue;
    refs.columns.push({ qualifier, column });
  }

  walk(ast, refs);

  for (const root of Array.isArray(ast) ? ast : [ast]) {
    const select = selectOf(root);
    if (!select) continue;
    const ctes = new Map<string, Set<string>>();
    for (const item of Array.isArray(select.with) ? select.with : []) {
      const name = isRecord(item) ? nameOf(item.name) : null;
      if (!name || !isRecord(item)) continue;
      refs.cteNames.add(name.toLowerCase());
      ctes.set(name.toLowerCase(), cteOutputs(item));
    }
    analyzeSelect(select, ctes, refs);
  }

  return refs;
}
