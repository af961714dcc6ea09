import { describe, it, expect } from "vitest";
import { writeBatches } from "./persist";
import { MOVIE_SCHEMA } from "./store";
import type { MovieListRecord } from "@/lib/types";
import { MemoryStore, silentLogger } from "@/test/helpers";

const makeRows = (count: number): MovieListRecord[] =>
  Array.from({ length: count }, (_, i) => ({
    movieId: String(i + 1),
    ingestDate: "2020-03-05",
    popularity: 20 + i,
    movieTitle: `Movie ${i + 1}`,
    adult: false,
    video: false,
  }));

describe("writeBatches", () => {
  it("saves rows in chunks of batchSize", async () => {
    const store = new MemoryStore();
    const rows = makeRows(5);

    const written = await writeBatches(store, MOVIE_SCHEMA, rows, 2, silentLogger());

    expect(written).toBe(5);
    expect(store.saves.map((s) => s.rows)).toEqual([2, 2, 1]);
    expect(store.rows("movie_list_pop_sorted")).toEqual(rows);
  });

  it("makes no save calls for an empty input", async () => {
    const store = new MemoryStore();

    await expect(writeBatches(store, MOVIE_SCHEMA, [], 10, silentLogger())).resolves.toBe(0);
    expect(store.saves).toEqual([]);
  });

  it("logs failed chunks and counts only saved rows", async () => {
    const store = new MemoryStore();
    store.failSaves = true;
    const log = silentLogger();

    const written = await writeBatches(store, MOVIE_SCHEMA, makeRows(3), 2, log);

    expect(written).toBe(0);
    expect(log.error).toHaveBeenCalledTimes(2);
    expect(log.error).toHaveBeenCalledWith("db_save_failed", {
      table: "movie_list_pop_sorted",
      rows: 1,
      error: "save rejected",
    });
  });
});
