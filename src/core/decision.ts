// CHANGE: Decision orchestrator composing the rule predicates in priority order
// PURITY: CORE
// FORMAT THEOREM: ∀records: |decide(records)| = |records| ∧ decide(records)[i] = judge(records[i])
// INVARIANT: First matching rule wins: Quarantine → Reject (incomplete) → Reject (visa) → Secondary → Accept
// COMPLEXITY: O(c + n·w) where c = |countries|, n = |records|, w = |watchlist|

import { pipe } from "effect";

import { toEpochDay } from "./dates.js";
import {
	type CountryIndex,
	type CountryInfo,
	type Decision,
	type DecisionOutcome,
	type DecisionPolicy,
	type DecisionReason,
	type DecisionSummary,
	DEFAULT_POLICY,
	type TravelRecord,
	type TravelRecordInput,
	type WatchlistEntry,
} from "./models.js";
import {
	hasMedicalAdvisory,
	indexCountries,
	isCompleteRecord,
	isOnWatchlist,
	isValidVisa,
	requiredVisa,
} from "./rules/index.js";

/**
 * Reference data shared by every record of one run.
 *
 * @invariant today is sampled once per run
 */
export interface DecisionContext {
	readonly countries: CountryIndex;
	readonly watchlist: readonly WatchlistEntry[];
	readonly today: number;
	readonly policy: DecisionPolicy;
}

type Verdict = Pick<DecisionOutcome, "decision" | "reason">;

const verdict = (decision: Decision, reason: DecisionReason): Verdict => ({
	decision,
	reason,
});

function isReturningCitizen(
	record: TravelRecord,
	policy: DecisionPolicy,
): boolean {
	return (
		record.entryReason === "returning" &&
		record.home.country === policy.homeCountry
	);
}

/**
 * Judges a record that already passed the medical and completeness checks.
 *
 * @pure true
 */
function judgeCompleteRecord(
	record: TravelRecord,
	context: DecisionContext,
): Verdict {
	const visa = requiredVisa(record, context.countries);
	if (
		visa !== null &&
		!isValidVisa(record.visa, context.today, context.policy)
	) {
		return verdict("Reject", visa);
	}
	if (isOnWatchlist(record, context.watchlist)) {
		return verdict("Secondary", "watchlist");
	}
	return isReturningCitizen(record, context.policy)
		? verdict("Accept", "returning-citizen")
		: verdict("Accept", "cleared");
}

/**
 * Applies the rules to one record in strict priority order.
 *
 * @pure true
 * @invariant hasMedicalAdvisory(record) → decision = "Quarantine"
 * @complexity O(w) where w = |watchlist|
 */
export function judgeRecord(
	record: TravelRecordInput,
	context: DecisionContext,
): Verdict {
	if (hasMedicalAdvisory(record, context.countries)) {
		return verdict("Quarantine", "medical-advisory");
	}
	if (!isCompleteRecord(record)) {
		return verdict("Reject", "incomplete-record");
	}
	return judgeCompleteRecord(record, context);
}

/**
 * Builds the per-run context: indexes the country table and fixes the evaluation day.
 *
 * @pure true
 */
export function createDecisionContext(
	watchlist: readonly WatchlistEntry[],
	countries: readonly CountryInfo[],
	evaluationDate: Date,
	policy: DecisionPolicy = DEFAULT_POLICY,
): DecisionContext {
	return {
		countries: indexCountries(countries),
		watchlist,
		today: toEpochDay(evaluationDate),
		policy,
	};
}

/**
 * Decides every record and reports the rule that fired for each.
 *
 * @returns One outcome per record, in input order
 *
 * @pure true
 * @invariant result.length = records.length ∧ result[i].index = i
 */
export function explain(
	records: readonly TravelRecordInput[],
	watchlist: readonly WatchlistEntry[],
	countries: readonly CountryInfo[],
	evaluationDate: Date,
	policy: DecisionPolicy = DEFAULT_POLICY,
): readonly DecisionOutcome[] {
	const context = createDecisionContext(
		watchlist,
		countries,
		evaluationDate,
		policy,
	);
	return records.map((record, index) => ({
		index,
		...judgeRecord(record, context),
	}));
}

/**
 * Decides every record of the batch.
 *
 * @returns Decisions in input order; [] for an empty batch
 *
 * @pure true
 * @invariant result.length = records.length
 *
 * @example
 * ```ts
 * decide([], [], [], new Date()); // []
 * ```
 */
export function decide(
	records: readonly TravelRecordInput[],
	watchlist: readonly WatchlistEntry[],
	countries: readonly CountryInfo[],
	evaluationDate: Date,
	policy: DecisionPolicy = DEFAULT_POLICY,
): readonly Decision[] {
	return pipe(
		explain(records, watchlist, countries, evaluationDate, policy),
		(outcomes) => outcomes.map((outcome) => outcome.decision),
	);
}

/**
 * Counts decisions per disposition.
 *
 * @pure true
 * @invariant Σ summary = decisions.length
 */
export function summarize(decisions: readonly Decision[]): DecisionSummary {
	const count = (decision: Decision): number =>
		decisions.filter((d) => d === decision).length;
	return {
		Quarantine: count("Quarantine"),
		Reject: count("Reject"),
		Secondary: count("Secondary"),
		Accept: count("Accept"),
	};
}
