import { sql } from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import { errorMessage } from "@/lib/errors";
import type { MovieDetailRecord, MovieListRecord } from "@/lib/types";
import type { DbClient } from "./client";
import { movieInfoDdl, movieListDdl } from "./ddl";
import { movieInfo, movieListPopSorted } from "./schema";

export type StoreResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

export type TableName = "movie_list_pop_sorted" | "movie_info";

/** A table the store can create and append rows of type `Row` to. */
export type TableSchema<Row> = {
  readonly tableName: TableName;
  readonly ddl: readonly SQL[];
  insert: (db: DbClient, rows: Row[]) => Promise<unknown>;
};

export type ViewSource = { table: TableName };
export type DataSourceType = "postgres";
export type QueryRows = { data: Array<Record<string, unknown>> };

export interface DataStore {
  /** Appends rows; a zero-row save only makes sure the table exists. */
  save<Row>(
    schema: TableSchema<Row>,
    rows: readonly Row[],
  ): Promise<StoreResult<{ rows: number }>>;
  createView(
    name: string,
    source: ViewSource,
    sourceType: DataSourceType,
  ): Promise<StoreResult<void>>;
  query(text: string): Promise<StoreResult<QueryRows>>;
}

// ─── Table schemas ────────────────────────────────────────────────────────────

// Key conflicts are ignored: both tables are append-only.
export const MOVIE_SCHEMA: TableSchema<MovieListRecord> = {
  tableName: "movie_list_pop_sorted",
  ddl: movieListDdl,
  insert: (db, rows) =>
    db.insert(movieListPopSorted).values(rows).onConflictDoNothing(),
};

export const INFO_SCHEMA: TableSchema<MovieDetailRecord> = {
  tableName: "movie_info",
  ddl: movieInfoDdl,
  insert: (db, rows) => db.insert(movieInfo).values(rows).onConflictDoNothing(),
};

// ─── Postgres-backed store ────────────────────────────────────────────────────

export class DrizzleStore implements DataStore {
  private readonly ensured = new Set<TableName>();

  constructor(private readonly db: DbClient) {}

  private async ensureTable<Row>(schema: TableSchema<Row>): Promise<void> {
    if (this.ensured.has(schema.tableName)) return;
    for (const statement of schema.ddl) {
      await this.db.execute(statement);
    }
    this.ensured.add(schema.tableName);
  }

  async save<Row>(
    schema: TableSchema<Row>,
    rows: readonly Row[],
  ): Promise<StoreResult<{ rows: number }>> {
    try {
      await this.ensureTable(schema);
      if (rows.length > 0) {
        await schema.insert(this.db, [...rows]);
      }
      return { ok: true, value: { rows: rows.length } };
    } catch (err) {
      return { ok: false, error: errorMessage(err) };
    }
  }

  async createView(
    name: string,
    source: ViewSource,
    sourceType: DataSourceType,
  ): Promise<StoreResult<void>> {
    if (sourceType !== "postgres") {
      return { ok: false, error: `Unsupported source type: ${sourceType}` };
    }
    try {
      await this.db.execute(
        sql`CREATE OR REPLACE VIEW ${sql.identifier(name)} AS SELECT * FROM ${sql.identifier(source.table)}`,
      );
      return { ok: true, value: undefined };
    } catch (err) {
      return { ok: false, error: errorMessage(err) };
    }
  }

  async query(text: string): Promise<StoreResult<QueryRows>> {
    try {
      const result = await this.db.execute(sql.raw(text));
      return { ok: true, value: { data: result.rows } };
    } catch (err) {
      return { ok: false, error: errorMessage(err) };
    }
  }
}
