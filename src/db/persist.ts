import { batches } from "@/lib/batches";
import type { Logger } from "@/lib/logger";
import type { DataStore, TableSchema } from "./store";

/**
 * Saves `rows` in chunks of `batchSize`. A failed chunk is logged and the
 * remaining chunks are still attempted. Returns the number of rows saved.
 */
export async function writeBatches<Row>(
  store: DataStore,
  schema: TableSchema<Row>,
  rows: readonly Row[],
  batchSize: number,
  log: Logger,
): Promise<number> {
  let written = 0;

  for (const chunk of batches(rows, batchSize)) {
    const res = await store.save(schema, chunk);
    if (res.ok) {
      written += res.value.rows;
      log.debug("db_saved", { table: schema.tableName, rows: res.value.rows });
    } else {
      log.error("db_save_failed", {
        table: schema.tableName,
        rows: chunk.length,
        error: res.error,
      });
    }
  }

  return written;
}
