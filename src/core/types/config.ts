// CHANGE: Run option types shared by CLI parsing, APP orchestration and output formatting
// PURITY: CORE
// INVARIANT: Options are immutable once parsed

export type OutputFormat = "text" | "json";

/**
 * How decisions are rendered.
 *
 * @property format Plain lines or a JSON document
 * @property explain Include the record index and the rule that fired
 * @property summary Append per-decision counts
 */
export interface OutputOptions {
	readonly format: OutputFormat;
	readonly explain: boolean;
	readonly summary: boolean;
}

/**
 * Command line options for entry-decider.
 *
 * @property recordsPath JSON array of traveler records
 * @property watchlistPath JSON array of watchlist entries
 * @property countriesPath JSON array of country attributes
 * @property configPath Policy file; when absent the default file is used if it exists
 * @property evaluationDate Fixed evaluation day; when absent the current day is used
 * @property verbose Emit debug logs to stderr
 */
export interface CLIOptions extends OutputOptions {
	readonly recordsPath: string;
	readonly watchlistPath: string;
	readonly countriesPath: string;
	readonly configPath?: string;
	readonly evaluationDate?: Date;
	readonly verbose: boolean;
}
