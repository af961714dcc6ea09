import { vi } from "vitest";
import type {
  DataSourceType,
  DataStore,
  QueryRows,
  StoreResult,
  TableName,
  TableSchema,
  ViewSource,
} from "@/db/store";
import type { Logger } from "@/lib/logger";

export function silentLogger(): Logger {
  return {
    scope: "test",
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

function movieIdOf(row: unknown): string | null {
  if (typeof row !== "object" || row === null || !("movieId" in row)) return null;
  return typeof row.movieId === "string" ? row.movieId : null;
}

/**
 * In-process stand-in for the Postgres store. A table exists once seeded or
 * saved to, and a view over a missing table fails. Understands the
 * `SELECT DISTINCT(movie_id) FROM <view>` queries the enricher issues.
 */
export class MemoryStore implements DataStore {
  readonly tables = new Map<TableName, unknown[]>();
  readonly views = new Map<string, TableName>();
  readonly saves: Array<{ table: TableName; rows: number }> = [];
  failSaves = false;

  constructor(seed: Partial<Record<TableName, unknown[]>> = {}) {
    for (const [table, rows] of Object.entries(seed)) {
      if (table === "movie_list_pop_sorted" || table === "movie_info") {
        this.tables.set(table, [...(rows ?? [])]);
      }
    }
  }

  rows(table: TableName): unknown[] {
    return this.tables.get(table) ?? [];
  }

  async save<Row>(
    schema: TableSchema<Row>,
    rows: readonly Row[],
  ): Promise<StoreResult<{ rows: number }>> {
    if (this.failSaves) return { ok: false, error: "save rejected" };
    this.tables.set(schema.tableName, [...this.rows(schema.tableName), ...rows]);
    this.saves.push({ table: schema.tableName, rows: rows.length });
    return { ok: true, value: { rows: rows.length } };
  }

  async createView(
    name: string,
    source: ViewSource,
    _sourceType: DataSourceType,
  ): Promise<StoreResult<void>> {
    if (!this.tables.has(source.table)) {
      return { ok: false, error: `relation "${source.table}" does not exist` };
    }
    this.views.set(name, source.table);
    return { ok: true, value: undefined };
  }

  async query(text: string): Promise<StoreResult<QueryRows>> {
    const match = /^SELECT DISTINCT\(movie_id\) FROM (\w+)$/i.exec(text);
    if (!match) return { ok: false, error: `unsupported query: ${text}` };
    const table = this.views.get(match[1]);
    if (!table) return { ok: false, error: `unknown view: ${match[1]}` };

    const ids = new Set<string>();
    for (const row of this.rows(table)) {
      const id = movieIdOf(row);
      if (id !== null) ids.add(id);
    }
    return { ok: true, value: { data: [...ids].map((id) => ({ movie_id: id })) } };
  }
}
