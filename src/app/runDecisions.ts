// CHANGE: Application layer orchestration (APP) between SHELL loaders and the CORE engine
// PURITY: APP (no process.exit; returns ExitCode as value)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Output is written only after every input decoded; any AppError yields exit code 1
// COMPLEXITY: O(s + n·w) where s = input size, n = records, w = watchlist entries

import { Effect, Either, Logger, LogLevel } from "effect";

import { formatEpochDay, toEpochDay } from "../core/dates.js";
import { explain } from "../core/decision.js";
import type { AppError } from "../core/errors.js";
import { formatAppError } from "../core/format/errors.js";
import { renderOutcomes } from "../core/format/output.js";
import type { ExitCode } from "../core/models.js";
import type { CLIOptions } from "../core/types/index.js";
import { loadPolicy, parseCLIArgs, USAGE } from "../shell/config/index.js";
import { loadInputs } from "../shell/input/index.js";

/** Debug logs go to stderr so that stdout carries decisions only. */
const stderrLogger = Logger.replace(
	Logger.defaultLogger,
	Logger.withConsoleError(Logger.logfmtLogger),
);

/**
 * Prints a fatal error and maps it to a failing exit code.
 *
 * @pure false (console output)
 */
function reportFatal(error: AppError): Effect.Effect<ExitCode> {
	return Effect.sync((): ExitCode => {
		console.error(formatAppError(error));
		if (error._tag === "InvalidArguments") console.error(USAGE);
		return 1;
	});
}

/**
 * Loads the inputs, decides every record and prints the result.
 *
 * @param options - Parsed CLI options
 * @param now - Clock read once when no evaluation date is given
 * @returns Effect<ExitCode, never>; 0 when decisions were printed, 1 on a fatal error
 *
 * @pure false (file reads, console output)
 * @invariant The evaluation date is sampled at most once per run
 */
export function runDecisions(
	options: CLIOptions,
	now: () => Date = () => new Date(),
): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		const policy = yield* loadPolicy(options.configPath);
		const inputs = yield* loadInputs(options);
		const evaluationDate = options.evaluationDate ?? now();

		yield* Effect.logInfo(
			`deciding ${inputs.records.length} records as of ${formatEpochDay(toEpochDay(evaluationDate))}`,
		);

		const outcomes = explain(
			inputs.records,
			inputs.watchlist,
			inputs.countries,
			evaluationDate,
			policy,
		);
		yield* Effect.sync(() => console.log(renderOutcomes(outcomes, options)));

		const ok: ExitCode = 0;
		return ok;
	}).pipe(
		Effect.catchAll(reportFatal),
		Logger.withMinimumLogLevel(options.verbose ? LogLevel.Debug : LogLevel.None),
		Effect.provide(stderrLogger),
	);
}

/**
 * Parses arguments and runs the decision pipeline.
 *
 * @param args - Arguments after the node binary and script
 * @pure false (coordinates effects)
 */
export function runCli(
	args: readonly string[] = process.argv.slice(2),
	now: () => Date = () => new Date(),
): Effect.Effect<ExitCode> {
	return Either.match(parseCLIArgs(args), {
		onLeft: reportFatal,
		onRight: (options) => runDecisions(options, now),
	});
}
