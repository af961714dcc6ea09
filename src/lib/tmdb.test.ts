import { describe, it, expect } from "vitest";
import {
  exportFileUrl,
  movieDetailsUrl,
  parseExportLine,
  parseMovieDetails,
} from "./tmdb";

const FILENAME = "movie_ids_03_05_2020.json.gz";

describe("urls", () => {
  it("builds the export file url", () => {
    expect(exportFileUrl(FILENAME)).toBe(
      "http://files.tmdb.org/p/exports/movie_ids_03_05_2020.json.gz",
    );
  });

  it("builds the movie details url with key and language", () => {
    expect(movieDetailsUrl("603", "test-key")).toBe(
      "https://api.themoviedb.org/3/movie/603?api_key=test-key&language=en-US",
    );
  });
});

describe("parseExportLine", () => {
  it("maps an export line onto a list record", () => {
    const line = JSON.stringify({
      id: 603,
      original_title: "  The Test  ",
      popularity: 41.25,
      adult: false,
      video: true,
    });

    expect(parseExportLine(line, FILENAME)).toEqual({
      ok: true,
      value: {
        movieId: "603",
        ingestDate: "2020-03-05",
        popularity: 41.25,
        movieTitle: "The Test",
        adult: false,
        video: true,
      },
    });
  });

  it("defaults missing flags to null", () => {
    const line = JSON.stringify({ id: "12", original_title: "X", popularity: 1 });
    const parsed = parseExportLine(line, FILENAME);
    expect(parsed.ok && parsed.value).toMatchObject({
      movieId: "12",
      adult: null,
      video: null,
    });
  });

  it("rejects malformed JSON", () => {
    expect(parseExportLine("{not json", FILENAME).ok).toBe(false);
  });

  it("rejects lines without a popularity score", () => {
    const line = JSON.stringify({ id: 1, original_title: "X" });
    expect(parseExportLine(line, FILENAME).ok).toBe(false);
  });
});

describe("parseMovieDetails", () => {
  it("passes fields through and collects genre ids as strings", () => {
    const body = {
      imdb_id: "tt0000603",
      original_title: "The Test",
      release_date: "1999-03-30",
      original_language: "en",
      runtime: 136,
      poster_path: "/poster.jpg",
      adult: false,
      overview: "A test movie",
      genres: [
        { id: 28, name: "Action" },
        { id: 878, name: "Science Fiction" },
        { id: 28, name: "Action" },
      ],
      budget: 1000,
    };

    expect(parseMovieDetails("603", body)).toEqual({
      ok: true,
      value: {
        movieId: "603",
        imdbId: "tt0000603",
        movieTitle: "The Test",
        releaseDate: "1999-03-30",
        language: "en",
        length: 136,
        posterPath: "/poster.jpg",
        adult: false,
        genresId: ["28", "878"],
        description: "A test movie",
      },
    });
  });

  it("uses null for absent fields and empty genre lists", () => {
    expect(parseMovieDetails("9", { genres: [] })).toEqual({
      ok: true,
      value: {
        movieId: "9",
        imdbId: null,
        movieTitle: null,
        releaseDate: null,
        language: null,
        length: null,
        posterPath: null,
        adult: null,
        genresId: null,
        description: null,
      },
    });
  });

  it("keeps empty strings for the normalization pass", () => {
    const parsed = parseMovieDetails("9", { poster_path: "", release_date: "" });
    expect(parsed.ok && parsed.value.posterPath).toBe("");
    expect(parsed.ok && parsed.value.releaseDate).toBe("");
  });

  it("rejects bodies that are not objects", () => {
    expect(parseMovieDetails("9", "not an object").ok).toBe(false);
    expect(parseMovieDetails("9", null).ok).toBe(false);
  });
});
