import * as lancedb from '@lancedb/lancedb';
import fs from 'fs-extra';
import { z } from 'zod';
import { clampScore } from './retrieval/fuser';
import type { RetrievalScope, SearchHit, StructuralFilters, VectorSearchService } from './retrieval/types';

/**
 * Columns the adapter reads. Ingestion is external; any extra columns are
 * passed through as metadata.
 */
const ChunkRowSchema = z
  .object({
    id: z.union([z.string(), z.number()]).transform(String),
    text: z.string(),
    _distance: z.number().optional(),
  })
  .passthrough();

const STRUCTURAL_COLUMNS: Array<keyof StructuralFilters> = ['chapter', 'title', 'article', 'section', 'annex'];
const HIDDEN_COLUMNS = new Set(['id', 'text', 'vector', '_distance']);

function quote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/** SQL predicate for a scope, or undefined when the scope does not restrict anything. */
export function buildWhereClause(scope: RetrievalScope): string | undefined {
  const parts: string[] = [];
  const ids = scope.documentIds ?? [];
  if (ids.length > 0) parts.push(`document_id IN (${ids.map(quote).join(', ')})`);
  if (scope.area) parts.push(`area = ${quote(scope.area)}`);
  for (const column of STRUCTURAL_COLUMNS) {
    const value = scope.filters?.[column];
    if (value) parts.push(`${column} = ${quote(value)}`);
  }
  return parts.length > 0 ? parts.join(' AND ') : undefined;
}

/** Cosine distance (0..2) to similarity clamped to [0, 1]; rows without a distance score 0. */
export function rowToHit(row: unknown): SearchHit {
  const parsed = ChunkRowSchema.parse(row);
  const metadata: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (!HIDDEN_COLUMNS.has(key) && value !== null && value !== undefined) metadata[key] = value;
  }
  const score = parsed._distance === undefined ? 0 : clampScore(1 - parsed._distance);
  return {
    id: parsed.id,
    text: parsed.text,
    score,
    ...(Object.keys(metadata).length > 0 ? { metadata } : {}),
  };
}

export interface LanceSearchOptions {
  dbDir: string;
  table: string;
}

export class LanceVectorSearch implements VectorSearchService {
  private table: Promise<lancedb.Table> | undefined;

  constructor(private readonly options: LanceSearchOptions) {}

  private openTable(): Promise<lancedb.Table> {
    if (!this.table) {
      this.table = (async () => {
        const exists = await fs.pathExists(this.options.dbDir);
        if (!exists) throw new Error(`LanceDB directory not found: ${this.options.dbDir}`);
        const db = await lancedb.connect(this.options.dbDir);
        const tables = await db.tableNames();
        if (!tables.includes(this.options.table)) throw new Error(`LanceDB table not found: ${this.options.table}`);
        return db.openTable(this.options.table);
      })();
      // a failed open is retried on the next search
      void this.table.catch(() => {
        this.table = undefined;
      });
    }
    return this.table;
  }

  async search(embedding: number[], scope: RetrievalScope, topK: number): Promise<SearchHit[]> {
    const table = await this.openTable();
    let query = table.vectorSearch(embedding).distanceType('cosine').limit(topK);
    const where = buildWhereClause(scope);
    if (where) query = query.where(where);
    const rows: unknown[] = await query.toArray();
    return rows.map(rowToHit).sort((a, b) => b.score - a.score);
  }
}
