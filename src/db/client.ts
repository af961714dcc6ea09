import { drizzle } from "drizzle-orm/node-postgres";
import type { NodePgDatabase } from "drizzle-orm/node-postgres";
import { Pool } from "pg";
import { errorMessage } from "@/lib/errors";
import { log } from "@/lib/logger";
import * as schema from "./schema";

export type DbClient = NodePgDatabase<typeof schema> & { $client: Pool };

// undefined = not initialized, null = disabled, DbClient = active
let dbClient: DbClient | null | undefined;

export function getDb(): DbClient | null {
  if (dbClient !== undefined) return dbClient;

  const url = process.env.POSTGRES_URL;
  if (!url) {
    log.info("db_disabled", { reason: "Missing POSTGRES_URL env var" });
    dbClient = null;
    return null;
  }

  try {
    dbClient = drizzle({ client: new Pool({ connectionString: url }), schema });
    log.info("db_enabled");
    return dbClient;
  } catch (err) {
    log.warn("db_init_failed", { error: errorMessage(err) });
    dbClient = null;
    return null;
  }
}

/** Ends the connection pool so the process can exit. */
export async function closeDb(): Promise<void> {
  if (dbClient) {
    await dbClient.$client.end();
  }
  dbClient = undefined;
}

/** Reset client for testing — allows re-initialization after env var changes. */
export function _resetDbClient(): void {
  dbClient = undefined;
}
