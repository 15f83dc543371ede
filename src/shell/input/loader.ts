// CHANGE: Load and decode the three JSON input sources
// PURITY: SHELL (file system reads)
// EFFECT: Effect<A, MissingResource | MalformedInput>
// INVARIANT: Either every source decodes or the run fails before any decision is produced
// COMPLEXITY: O(s) where s = total size of the input files

import * as fs from "node:fs";

import { Effect, Schema } from "effect";

import { MalformedInput, MissingResource } from "../../core/errors.js";
import type {
	CountryInfo,
	TravelRecordInput,
	WatchlistEntry,
} from "../../core/models.js";
import { toTravelRecordInput } from "./records.js";
import { CountriesSchema, RecordsSchema, WatchlistSchema } from "./schemas.js";

export type InputSource = MalformedInput["source"];

const errorDetail = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

/**
 * Reads a UTF-8 file.
 *
 * @pure false (file system read)
 * @effect Effect<string, MissingResource>
 */
export function readTextFile(
	path: string,
): Effect.Effect<string, MissingResource> {
	return Effect.tryPromise({
		try: () => fs.promises.readFile(path, "utf-8"),
		catch: (error) => new MissingResource({ path, detail: errorDetail(error) }),
	});
}

/**
 * Reads a file and parses it as JSON.
 *
 * @effect Effect<unknown, MissingResource | MalformedInput>
 */
export function readJsonFile(
	path: string,
	source: InputSource,
): Effect.Effect<unknown, MissingResource | MalformedInput> {
	return readTextFile(path).pipe(
		Effect.flatMap((text) =>
			Effect.try({
				try: (): unknown => JSON.parse(text),
				catch: (error) =>
					new MalformedInput({ source, path, detail: errorDetail(error) }),
			}),
		),
	);
}

/**
 * Reads a JSON file and decodes it with a schema.
 *
 * @effect Effect<A, MissingResource | MalformedInput>
 */
export function decodeJsonFile<A, I>(
	path: string,
	source: InputSource,
	schema: Schema.Schema<A, I>,
): Effect.Effect<A, MissingResource | MalformedInput> {
	return readJsonFile(path, source).pipe(
		Effect.flatMap((json) =>
			Schema.decodeUnknown(schema)(json).pipe(
				Effect.mapError(
					(error) => new MalformedInput({ source, path, detail: error.message }),
				),
			),
		),
	);
}

export function loadRecords(
	path: string,
): Effect.Effect<readonly TravelRecordInput[], MissingResource | MalformedInput> {
	return decodeJsonFile(path, "records", RecordsSchema).pipe(
		Effect.map((records) => records.map(toTravelRecordInput)),
		Effect.tap((records) =>
			Effect.logDebug(`loaded ${records.length} records from ${path}`),
		),
	);
}

export function loadWatchlist(
	path: string,
): Effect.Effect<readonly WatchlistEntry[], MissingResource | MalformedInput> {
	return decodeJsonFile(path, "watchlist", WatchlistSchema).pipe(
		Effect.tap((entries) =>
			Effect.logDebug(`loaded ${entries.length} watchlist entries from ${path}`),
		),
	);
}

export function loadCountries(
	path: string,
): Effect.Effect<readonly CountryInfo[], MissingResource | MalformedInput> {
	return decodeJsonFile(path, "countries", CountriesSchema).pipe(
		Effect.tap((countries) =>
			Effect.logDebug(`loaded ${countries.length} countries from ${path}`),
		),
	);
}

/**
 * Loaded inputs of one run.
 */
export interface DecisionInputs {
	readonly records: readonly TravelRecordInput[];
	readonly watchlist: readonly WatchlistEntry[];
	readonly countries: readonly CountryInfo[];
}

/**
 * Loads all three sources concurrently.
 *
 * @effect Effect<DecisionInputs, MissingResource | MalformedInput>
 */
export function loadInputs(paths: {
	readonly recordsPath: string;
	readonly watchlistPath: string;
	readonly countriesPath: string;
}): Effect.Effect<DecisionInputs, MissingResource | MalformedInput> {
	return Effect.all(
		{
			records: loadRecords(paths.recordsPath),
			watchlist: loadWatchlist(paths.watchlistPath),
			countries: loadCountries(paths.countriesPath),
		},
		{ concurrency: "unbounded" },
	);
}
