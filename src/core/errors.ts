// CHANGE: Typed error ADT for entry decisions using Effect.Data
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Input source could not be located or read.
 *
 * @invariant path.length > 0
 */
export class MissingResource extends Data.TaggedError("MissingResource")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Input source was read but its content does not have the required shape.
 *
 * @invariant detail.length > 0
 */
export class MalformedInput extends Data.TaggedError("MalformedInput")<{
	readonly source: "records" | "watchlist" | "countries" | "config";
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Command line could not be turned into run options.
 *
 * @invariant detail.length > 0
 */
export class InvalidArguments extends Data.TaggedError("InvalidArguments")<{
	readonly detail: string;
}> {}

/**
 * Union type of all application errors for Effect signatures
 */
export type AppError = MissingResource | MalformedInput | InvalidArguments;
