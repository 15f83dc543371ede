// CHANGE: Command line parsing for entry-decider
// PURITY: SHELL (reads process.argv by default)
// INVARIANT: ∀ argv: parseCLIArgs(argv) = Right(options) ∨ Left(InvalidArguments)
// COMPLEXITY: O(n) where n = |argv|

import { Either } from "effect";

import { parseEpochDay } from "../../core/dates.js";
import { InvalidArguments } from "../../core/errors.js";
import type { CLIOptions, OutputFormat } from "../../core/types/index.js";

export const USAGE = [
	"Usage: entry-decider <records.json> --watchlist <file> --countries <file> [options]",
	"",
	"Options:",
	"  --date YYYY-MM-DD   evaluate visas against this day (default: today, UTC)",
	"  --config <file>     policy file (default: entry-decider.config.json if present)",
	"  --format text|json  output format (default: text)",
	"  --explain           print the record index and the rule that decided it",
	"  --summary           append decision counts",
	"  --verbose           debug logs on stderr",
].join("\n");

interface ArgState {
	readonly recordsPath?: string;
	readonly watchlistPath?: string;
	readonly countriesPath?: string;
	readonly configPath?: string;
	readonly date?: string;
	readonly format: string;
	readonly explain: boolean;
	readonly summary: boolean;
	readonly verbose: boolean;
}

type ValueKey =
	| "watchlistPath"
	| "countriesPath"
	| "configPath"
	| "date"
	| "format";
type BooleanKey = "explain" | "summary" | "verbose";

const valueFlags: Readonly<Record<string, ValueKey | undefined>> = {
	"--watchlist": "watchlistPath",
	"--countries": "countriesPath",
	"--config": "configPath",
	"--date": "date",
	"--format": "format",
};

const booleanFlags: Readonly<Record<string, BooleanKey | undefined>> = {
	"--explain": "explain",
	"--summary": "summary",
	"--verbose": "verbose",
};

const invalid = (detail: string): InvalidArguments =>
	new InvalidArguments({ detail });

function isOutputFormat(value: string): value is OutputFormat {
	return value === "text" || value === "json";
}

interface StepResult {
	readonly state: ArgState;
	readonly consumed: number;
}

function processArgument(
	args: readonly string[],
	index: number,
	state: ArgState,
): Either.Either<StepResult, InvalidArguments> {
	const arg = args[index] ?? "";

	const valueKey = valueFlags[arg];
	if (valueKey !== undefined) {
		const value = args[index + 1];
		if (value === undefined || value.startsWith("--")) {
			return Either.left(invalid(`${arg} expects a value`));
		}
		return Either.right({ state: { ...state, [valueKey]: value }, consumed: 2 });
	}

	const booleanKey = booleanFlags[arg];
	if (booleanKey !== undefined) {
		return Either.right({ state: { ...state, [booleanKey]: true }, consumed: 1 });
	}

	if (arg.startsWith("--")) {
		return Either.left(invalid(`unknown option ${arg}`));
	}
	if (state.recordsPath !== undefined) {
		return Either.left(invalid(`unexpected argument ${arg}`));
	}
	return Either.right({ state: { ...state, recordsPath: arg }, consumed: 1 });
}

function requirePath(
	value: string | undefined,
	what: string,
): Either.Either<string, InvalidArguments> {
	return value === undefined
		? Either.left(invalid(`missing ${what}`))
		: Either.right(value);
}

function parseDate(
	value: string | undefined,
): Either.Either<Date | undefined, InvalidArguments> {
	if (value === undefined) return Either.right(undefined);
	const day = parseEpochDay(value);
	return day === null
		? Either.left(invalid(`--date must be a calendar date in YYYY-MM-DD, got ${value}`))
		: Either.right(new Date(day * 86_400_000));
}

function finalize(state: ArgState): Either.Either<CLIOptions, InvalidArguments> {
	return Either.gen(function* () {
		const recordsPath = yield* requirePath(state.recordsPath, "records file");
		const watchlistPath = yield* requirePath(
			state.watchlistPath,
			"--watchlist <file>",
		);
		const countriesPath = yield* requirePath(
			state.countriesPath,
			"--countries <file>",
		);
		const format = state.format;
		if (!isOutputFormat(format)) {
			return yield* Either.left(
				invalid(`--format must be text or json, got ${format}`),
			);
		}
		const evaluationDate = yield* parseDate(state.date);

		const base: CLIOptions = {
			recordsPath,
			watchlistPath,
			countriesPath,
			format,
			explain: state.explain,
			summary: state.summary,
			verbose: state.verbose,
		};
		return {
			...base,
			...(state.configPath === undefined ? {} : { configPath: state.configPath }),
			...(evaluationDate === undefined ? {} : { evaluationDate }),
		};
	});
}

/**
 * Parses command line arguments into run options.
 *
 * @param args - Arguments after the node binary and script (defaults to process.argv)
 * @returns Right(options) or Left(InvalidArguments) describing the first problem
 *
 * @example
 * ```ts
 * parseCLIArgs(["records.json", "--watchlist", "w.json", "--countries", "c.json", "--explain"]);
 * // Right({ recordsPath: "records.json", ..., format: "text", explain: true, ... })
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): Either.Either<CLIOptions, InvalidArguments> {
	let state: ArgState = {
		format: "text",
		explain: false,
		summary: false,
		verbose: false,
	};

	for (let i = 0; i < args.length; ) {
		if ((args[i] ?? "").length === 0) {
			i++;
			continue;
		}
		const step = processArgument(args, i, state);
		if (Either.isLeft(step)) return Either.left(step.left);
		state = step.right.state;
		i += step.right.consumed;
	}

	return finalize(state);
}
