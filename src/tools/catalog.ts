import pg from 'pg';
import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { ColumnInfo, ForeignKeyInfo, TableInfo } from '../types.js';
import { CatalogLoadError, errorMessage } from '../errors.js';
import { buildJoinGraph, type JoinGraph } from '../agent/joinPlanner.js';

// ============================================================================
// Catalog document
// ============================================================================

const columnSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1).default('text'),
  nullable: z.boolean().default(true),
  primary_key: z.boolean().default(false),
});

const foreignKeySchema = z.object({
  column: z.string().min(1),
  ref_table: z.string().min(1),
  ref_column: z.string().min(1),
  /** Defaults to the nullability of the referencing column */
  nullable: z.boolean().optional(),
});

const tableSchema = z.object({
  name: z.string().min(1),
  columns: z.array(columnSchema).min(1),
  foreign_keys: z.array(foreignKeySchema).default([]),
  aliases: z.array(z.string().min(1)).default([]),
  description: z.string().optional(),
});

export const catalogDocumentSchema = z.object({
  tables: z.array(tableSchema),
});

export type CatalogDocument = z.input<typeof catalogDocumentSchema>;

// ============================================================================
// SchemaCatalog
// ============================================================================

function freezeTable(table: TableInfo): TableInfo {
  return Object.freeze({
    ...table,
    columns: Object.freeze(table.columns.map(c => Object.freeze({ ...c }))),
    foreignKeys: Object.freeze(table.foreignKeys.map(fk => Object.freeze({ ...fk }))),
    aliases: Object.freeze([...table.aliases]),
  });
}

/**
 * Immutable table/column/foreign-key metadata. All lookups are case-insensitive.
 */
export class SchemaCatalog {
  private readonly tables: ReadonlyMap<string, TableInfo>;

  constructor(tables: TableInfo[]) {
    const map = new Map<string, TableInfo>();
    for (const table of tables) {
      const key = table.name.toLowerCase();
      if (map.has(key)) {
        throw new CatalogLoadError(`Duplicate table in catalog: ${table.name}`);
      }
      map.set(key, freezeTable(table));
    }

    for (const table of map.values()) {
      for (const fk of table.foreignKeys) {
        const target = map.get(fk.refTable.toLowerCase());
        if (!target) {
          throw new CatalogLoadError(`Foreign key ${table.name}.${fk.column} references unknown table ${fk.refTable}`);
        }
        if (!table.columns.some(c => c.name.toLowerCase() === fk.column.toLowerCase())) {
          throw new CatalogLoadError(`Foreign key column ${table.name}.${fk.column} is not a column of ${table.name}`);
        }
        if (!target.columns.some(c => c.name.toLowerCase() === fk.refColumn.toLowerCase())) {
          throw new CatalogLoadError(`Foreign key ${table.name}.${fk.column} references unknown column ${fk.refTable}.${fk.refColumn}`);
        }
      }
    }

    this.tables = map;
    Object.freeze(this);
  }

  /** Table names in lexicographic order */
  tableNames(): string[] {
    return [...this.tables.values()].map(t => t.name).sort();
  }

  allTables(): TableInfo[] {
    return this.tableNames().map(name => this.tables.get(name.toLowerCase())).filter((t): t is TableInfo => t !== undefined);
  }

  getTable(name: string): TableInfo | undefined {
    return this.tables.get(name.toLowerCase());
  }

  hasTable(name: string): boolean {
    return this.tables.has(name.toLowerCase());
  }

  hasColumn(tableName: string, columnName: string): boolean {
    const table = this.getTable(tableName);
    if (!table) return false;
    const wanted = columnName.toLowerCase();
    return table.columns.some(c => c.name.toLowerCase() === wanted);
  }

  /** True when any table has a column with this name */
  hasColumnAnywhere(columnName: string): boolean {
    const wanted = columnName.toLowerCase();
    for (const table of this.tables.values()) {
      if (table.columns.some(c => c.name.toLowerCase() === wanted)) return true;
    }
    return false;
  }

  get size(): number {
    return this.tables.size;
  }
}

/**
 * Builds a catalog from a parsed catalog document (see data/chinook_catalog.json).
 */
export function catalogFromDocument(document: unknown): SchemaCatalog {
  const parsed = catalogDocumentSchema.safeParse(document);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join('.') : 'document';
    throw new CatalogLoadError(`Invalid catalog document at ${where}: ${issue ? issue.message : 'unknown error'}`);
  }

  const tables: TableInfo[] = parsed.data.tables.map(table => {
    const columns: ColumnInfo[] = table.columns.map(c => ({
      name: c.name,
      type: c.type,
      nullable: c.nullable,
      isPrimaryKey: c.primary_key,
    }));

    const foreignKeys: ForeignKeyInfo[] = table.foreign_keys.map(fk => {
      const column = columns.find(c => c.name.toLowerCase() === fk.column.toLowerCase());
      return {
        column: fk.column,
        refTable: fk.ref_table,
        refColumn: fk.ref_column,
        nullable: fk.nullable ?? column?.nullable ?? true,
      };
    });

    return {
      name: table.name,
      columns,
      foreignKeys,
      aliases: table.aliases,
      description: table.description,
    };
  });

  return new SchemaCatalog(tables);
}

/**
 * Reads and validates a JSON catalog document from disk.
 */
export async function loadCatalogFromFile(path: string): Promise<SchemaCatalog> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    throw new CatalogLoadError(`Could not read catalog file ${path}: ${errorMessage(error)}`, { cause: error });
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new CatalogLoadError(`Catalog file ${path} is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }

  return catalogFromDocument(document);
}

interface ColumnRow {
  table_name: string;
  column_name: string;
  data_type: string;
  is_nullable: string;
}

interface KeyRow {
  table_name: string;
  column_name: string;
}

interface ForeignKeyRow {
  table_name: string;
  column_name: string;
  ref_table: string;
  ref_column: string;
}

/**
 * Introspects tables, primary keys and foreign keys of one schema through
 * information_schema.
 */
export async function loadCatalogFromDatabase(
  client: pg.PoolClient,
  schemaName = 'public'
): Promise<SchemaCatalog> {
  const columnsQuery = `
    SELECT c.table_name, c.column_name, c.data_type, c.is_nullable
    FROM information_schema.columns c
    JOIN information_schema.tables t
      ON t.table_name = c.table_name AND t.table_schema = c.table_schema
    WHERE c.table_schema = $1 AND t.table_type = 'BASE TABLE'
    ORDER BY c.table_name, c.ordinal_position;
  `;

  const primaryKeysQuery = `
    SELECT kcu.table_name, kcu.column_name
    FROM information_schema.table_constraints tc
    JOIN information_schema.key_column_usage kcu
      ON tc.constraint_name = kcu.constraint_name AND tc.table_schema = kcu.table_schema
    WHERE tc.table_schema = $1 AND tc.constraint_type = 'PRIMARY KEY';
  `;

  const foreignKeysQuery = `
    SELECT kcu.table_name, kcu.column_name,
           ccu.table_name AS ref_table, ccu.column_name AS ref_column
    FROM information_schema.table_constraints tc
    JOIN information_schema.key_column_usage kcu
      ON tc.constraint_name = kcu.constraint_name AND tc.table_schema = kcu.table_schema
    JOIN information_schema.constraint_column_usage ccu
      ON ccu.constraint_name = tc.constraint_name AND ccu.table_schema = tc.table_schema
    WHERE tc.table_schema = $1 AND tc.constraint_type = 'FOREIGN KEY'
    ORDER BY kcu.table_name, kcu.column_name;
  `;

  const [columnResult, pkResult, fkResult] = await Promise.all([
    client.query<ColumnRow>(columnsQuery, [schemaName]),
    client.query<KeyRow>(primaryKeysQuery, [schemaName]),
    client.query<ForeignKeyRow>(foreignKeysQuery, [schemaName]),
  ]);

  const primaryKeys = new Set(pkResult.rows.map(r => `${r.table_name}.${r.column_name}`));
  const tables = new Map<string, { name: string; columns: ColumnInfo[]; foreignKeys: ForeignKeyInfo[]; aliases: string[] }>();

  for (const row of columnResult.rows) {
    let table = tables.get(row.table_name);
    if (!table) {
      table = { name: row.table_name, columns: [], foreignKeys: [], aliases: [] };
      tables.set(row.table_name, table);
    }
    table.columns.push({
      name: row.column_name,
      type: row.data_type,
      nullable: row.is_nullable === 'YES',
      isPrimaryKey: primaryKeys.has(`${row.table_name}.${row.column_name}`),
    });
  }

  for (const row of fkResult.rows) {
    const table = tables.get(row.table_name);
    if (!table || !tables.has(row.ref_table)) continue;
    const column = table.columns.find(c => c.name === row.column_name);
    table.foreignKeys.push({
      column: row.column_name,
      refTable: row.ref_table,
      refColumn: row.ref_column,
      nullable: column?.nullable ?? true,
    });
  }

  return new SchemaCatalog([...tables.values()]);
}

/**
 * Formats the catalog into a compact text block for prompts.
 *
 * @param tableNames - Optional subset; unknown names are skipped
 *
 * @example
 * ```typescript
 * formatCatalogForLLM(catalog, ['genre']);
 * // Table: genre (流派, 风格)
 * // Columns:
 * //   - genre_id: integer NOT NULL PK
 * //   - name: varchar NULL
 * ```
 */
export function formatCatalogForLLM(catalog: SchemaCatalog, tableNames?: string[]): string {
  const tables = tableNames
    ? tableNames.map(name => catalog.getTable(name)).filter((t): t is TableInfo => t !== undefined)
    : catalog.allTables();

  if (tables.length === 0) {
    return 'No tables found.';
  }

  const parts: string[] = [];
  for (const table of tables) {
    const aliases = table.aliases.length > 0 ? ` (${table.aliases.join(', ')})` : '';
    parts.push(`Table: ${table.name}${aliases}`);
    if (table.description) parts.push(`Description: ${table.description}`);
    parts.push('Columns:');
    for (const col of table.columns) {
      const nullable = col.nullable ? 'NULL' : 'NOT NULL';
      const pk = col.isPrimaryKey ? ' PK' : '';
      parts.push(`  - ${col.name}: ${col.type} ${nullable}${pk}`);
    }
    for (const fk of table.foreignKeys) {
      parts.push(`  FK ${fk.column} -> ${fk.refTable}.${fk.refColumn}`);
    }
    parts.push('');
  }

  return parts.join('\n').trimEnd();
}

// ============================================================================
// Snapshot store
// ============================================================================

export interface CatalogSnapshot {
  readonly catalog: SchemaCatalog;
  readonly graph: JoinGraph;
  /** Increments on every reload */
  readonly version: number;
}

/**
 * Holds the current catalog and its join graph as one immutable snapshot.
 * Reload builds the replacement off to the side and swaps the reference;
 * sessions that already captured the old snapshot keep using it.
 */
export class CatalogStore {
  private snapshot: CatalogSnapshot;

  constructor(catalog: SchemaCatalog) {
    this.snapshot = Object.freeze({ catalog, graph: buildJoinGraph(catalog), version: 1 });
  }

  current(): CatalogSnapshot {
    return this.snapshot;
  }

  async reload(loader: () => Promise<SchemaCatalog>): Promise<CatalogSnapshot> {
    const catalog = await loader();
    const next = Object.freeze({
      catalog,
      graph: buildJoinGraph(catalog),
      version: this.snapshot.version + 1,
    });
    this.snapshot = next;
    console.log(`🔄 Catalog reloaded: ${catalog.size} tables (version ${next.version})`);
    return next;
  }
}
