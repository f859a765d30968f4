/**
 * Foreign-key graph and join path synthesis.
 *
 * The graph is undirected over every table in the catalog, one edge per
 * foreign key. A plan for a set of required tables is the union of the
 * shortest paths from a fixed anchor (the lexicographically first required
 * table) to every other member, found by a single breadth-first search.
 * Tables that are not required may appear as waypoints.
 */

import type { SchemaCatalog } from '../tools/catalog.js';

export type JoinType = 'INNER JOIN' | 'LEFT JOIN';

/** One foreign key: `table.column` references `refTable.refColumn`. */
export interface ForeignKeyEdge {
  table: string;
  column: string;
  refTable: string;
  refColumn: string;
  nullable: boolean;
}

interface Neighbor {
  /** Lower-cased key of the table on the other end */
  key: string;
  edge: ForeignKeyEdge;
}

export interface JoinGraph {
  /** Lower-cased table key → canonical table name */
  readonly names: ReadonlyMap<string, string>;
  /** Neighbours sorted by table name, then by foreign-key column */
  readonly adjacency: ReadonlyMap<string, readonly Neighbor[]>;
}

export interface JoinStep {
  /** Table this step adds to the join */
  table: string;
  joinType: JoinType;
  edge: ForeignKeyEdge;
}

export type JoinPlan =
  | {
      status: 'OK';
      anchor: string;
      /** Anchor first, then tables in the order they are joined */
      tables: string[];
      steps: JoinStep[];
      /** Joined tables that were not in the required set */
      waypoints: string[];
    }
  | {
      status: 'NO_PATH';
      anchor: string | null;
      /** Required tables that are unknown or unreachable from the anchor */
      missing: string[];
    };

function compareNeighbors(a: Neighbor, b: Neighbor): number {
  if (a.key !== b.key) return a.key < b.key ? -1 : 1;
  if (a.edge.column !== b.edge.column) return a.edge.column < b.edge.column ? -1 : 1;
  return 0;
}

export function buildJoinGraph(catalog: SchemaCatalog): JoinGraph {
  const names = new Map<string, string>();
  const adjacency = new Map<string, Neighbor[]>();

  for (const table of catalog.allTables()) {
    const key = table.name.toLowerCase();
    names.set(key, table.name);
    adjacency.set(key, []);
  }

  for (const table of catalog.allTables()) {
    const key = table.name.toLowerCase();
    for (const fk of table.foreignKeys) {
      const refTable = catalog.getTable(fk.refTable);
      if (!refTable) continue;
      const refKey = refTable.name.toLowerCase();
      const edge: ForeignKeyEdge = {
        table: table.name,
        column: fk.column,
        refTable: refTable.name,
        refColumn: fk.refColumn,
        nullable: fk.nullable,
      };
      adjacency.get(key)?.push({ key: refKey, edge });
      if (refKey !== key) {
        adjacency.get(refKey)?.push({ key, edge });
      }
    }
  }

  for (const neighbors of adjacency.values()) {
    neighbors.sort(compareNeighbors);
  }

  return { names, adjacency };
}

/**
 * Plans the joins that connect every table in `required`.
 *
 * @example
 * ```typescript
 * const plan = planJoinPath(graph, ['invoice', 'track', 'album', 'artist']);
 * // plan.tables: ['album', 'artist', 'track', 'invoice_line', 'invoice']
 * // plan.waypoints: ['invoice_line']
 * ```
 */
export function planJoinPath(graph: JoinGraph, required: Iterable<string>): JoinPlan {
  const keys = [...new Set([...required].map(name => name.toLowerCase()))].sort();
  const unknown = keys.filter(key => !graph.names.has(key));
  const known = keys.filter(key => graph.names.has(key));

  if (known.length === 0) {
    return { status: 'NO_PATH', anchor: null, missing: unknown };
  }

  const anchorKey = known[0];
  const anchor = graph.names.get(anchorKey) ?? anchorKey;

  const parent = new Map<string, Neighbor | null>([[anchorKey, null]]);
  const discovery: string[] = [];
  const queue: string[] = [anchorKey];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const neighbor of graph.adjacency.get(current) ?? []) {
      if (parent.has(neighbor.key)) continue;
      parent.set(neighbor.key, { key: current, edge: neighbor.edge });
      discovery.push(neighbor.key);
      queue.push(neighbor.key);
    }
  }

  const unreachable = known.filter(key => !parent.has(key));
  const missing = [...unknown, ...unreachable].sort();
  if (missing.length > 0) {
    return { status: 'NO_PATH', anchor, missing };
  }

  // Walk each member back to the anchor; the union of those paths is the plan.
  const included = new Set<string>([anchorKey]);
  for (const key of known) {
    let cursor: string | undefined = key;
    while (cursor !== undefined && !included.has(cursor)) {
      included.add(cursor);
      cursor = parent.get(cursor)?.key;
    }
  }

  const requiredKeys = new Set(known);
  const steps: JoinStep[] = [];
  for (const key of discovery) {
    if (!included.has(key)) continue;
    const via = parent.get(key);
    if (!via) continue;
    steps.push({
      table: graph.names.get(key) ?? key,
      joinType: via.edge.nullable ? 'LEFT JOIN' : 'INNER JOIN',
      edge: via.edge,
    });
  }

  return {
    status: 'OK',
    anchor,
    tables: [anchor, ...steps.map(step => step.table)],
    steps,
    waypoints: steps.map(step => step.table).filter(table => !requiredKeys.has(table.toLowerCase())),
  };
}

/**
 * Renders the FROM/JOIN clause for a plan, e.g.
 * `FROM album INNER JOIN artist ON album.artist_id = artist.artist_id`.
 */
export function renderJoinClause(plan: Extract<JoinPlan, { status: 'OK' }>): string {
  const lines = [`FROM ${plan.anchor}`];
  for (const step of plan.steps) {
    const { edge } = step;
    lines.push(`${step.joinType} ${step.table} ON ${edge.table}.${edge.column} = ${edge.refTable}.${edge.refColumn}`);
  }
  return lines.join('\n');
}

/** Prompt text telling the generator how the required tables connect. */
export function formatJoinHint(plan: Extract<JoinPlan, { status: 'OK' }>): string {
  const header = `Join path: ${plan.tables.join(' -> ')}`;
  const waypoints = plan.waypoints.length > 0
    ? `\nIntermediate tables that must be joined: ${plan.waypoints.join(', ')}`
    : '';
  return `${header}${waypoints}\n${renderJoinClause(plan)}`;
}
