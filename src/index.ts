// CHANGE: Public API entry point for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: CORE exports are pure; APP exports return Effects and never exit the process

// ═══════════════════════════════════════════════════════════════════════════════
// DECISION ENGINE (Functional Core)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Decides a batch of traveler records.
 *
 * @example
 * ```typescript
 * import { decide } from "entry-decider";
 *
 * const decisions = decide(records, watchlist, countries, new Date("2024-06-01"));
 * // ["Accept", "Quarantine", ...]
 * ```
 */
export {
	createDecisionContext,
	type DecisionContext,
	decide,
	explain,
	judgeRecord,
	summarize,
} from "./core/decision.js";
export { formatEpochDay, isValidDate, parseEpochDay, toEpochDay } from "./core/dates.js";
export {
	countryCodeOf,
	hasMedicalAdvisory,
	indexCountries,
	isCompleteRecord,
	isOnWatchlist,
	isTransitVisaRequired,
	isValidPassport,
	isValidVisa,
	isValidVisaCode,
	isVisitorVisaRequired,
	requiredVisa,
	type VisaKind,
} from "./core/rules/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES (Immutable Domain Models)
// ═══════════════════════════════════════════════════════════════════════════════

export {
	type CountryIndex,
	type CountryInfo,
	type Decision,
	DECISION_PRECEDENCE,
	type DecisionOutcome,
	type DecisionPolicy,
	type DecisionReason,
	type DecisionSummary,
	DEFAULT_POLICY,
	ENTRY_REASONS,
	type EntryReason,
	type ExitCode,
	type Location,
	type TravelRecord,
	type TravelRecordInput,
	type WatchlistEntry,
} from "./core/models.js";
export {
	type AppError,
	InvalidArguments,
	MalformedInput,
	MissingResource,
} from "./core/errors.js";
export type { CLIOptions, OutputFormat, OutputOptions } from "./core/types/index.js";
export { renderOutcomes } from "./core/format/output.js";

// ═══════════════════════════════════════════════════════════════════════════════
// APP + SHELL (Effectful orchestration)
// ═══════════════════════════════════════════════════════════════════════════════

export { runCli, runDecisions } from "./app/runDecisions.js";
export { loadPolicy, parseCLIArgs } from "./shell/config/index.js";
export { loadInputs, toTravelRecordInput } from "./shell/input/index.js";
