// CHANGE: Functional Core domain models for entry decisions (pure, immutable)
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the CLI process.
 *
 * @remarks
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Disposition assigned to one traveler record.
 *
 * @remarks
 * - @invariant precedence Quarantine > Reject > Secondary > Accept
 */
export type Decision = "Accept" | "Reject" | "Secondary" | "Quarantine";

/** Decisions ordered from highest to lowest precedence. */
export const DECISION_PRECEDENCE: readonly Decision[] = [
	"Quarantine",
	"Reject",
	"Secondary",
	"Accept",
];

export type EntryReason = "visit" | "transit" | "returning";

export const ENTRY_REASONS: readonly EntryReason[] = [
	"visit",
	"transit",
	"returning",
];

export interface Location {
	readonly city?: string;
	readonly region?: string;
	readonly country: string;
}

/**
 * Record as handed over by the shell: field names are normalized, values are not.
 *
 * @remarks
 * Any field may be missing or carry a value of the wrong type; the record
 * validator decides whether it is a {@link TravelRecord}.
 */
export interface TravelRecordInput {
	readonly firstName?: unknown;
	readonly lastName?: unknown;
	readonly birthDate?: unknown;
	readonly passport?: unknown;
	readonly home?: unknown;
	readonly from?: unknown;
	readonly entryReason?: unknown;
	readonly visa?: unknown;
}

/**
 * Complete traveler record.
 *
 * @remarks
 * - @invariant firstName.length > 0 ∧ lastName.length > 0
 * - @invariant birthDate is a real calendar date in YYYY-MM-DD
 * - @invariant passport matches five hyphen-separated groups of five alphanumerics
 * - `visa` stays unchecked until the visa evaluator needs it
 */
export interface TravelRecord extends TravelRecordInput {
	readonly firstName: string;
	readonly lastName: string;
	readonly birthDate: string;
	readonly passport: string;
	readonly home: Location;
	readonly from: Location;
	readonly entryReason: EntryReason;
	readonly visa?: unknown;
}

export interface WatchlistEntry {
	readonly firstName: string;
	readonly lastName: string;
	readonly passport: string;
}

export interface CountryInfo {
	readonly code: string;
	readonly name?: string;
	readonly medicalAdvisory: string;
	readonly visitorVisaRequired: boolean;
	readonly transitVisaRequired: boolean;
}

/**
 * Lookup sets derived from the country table.
 *
 * @remarks
 * - @invariant each set is a pure projection of the CountryInfo sequence
 */
export interface CountryIndex {
	readonly medicalAdvisory: ReadonlySet<string>;
	readonly visitorVisa: ReadonlySet<string>;
	readonly transitVisa: ReadonlySet<string>;
}

/**
 * Tunables read by the decision engine.
 *
 * @property homeCountry Country code whose returning residents are annotated as returning citizens
 * @property visaValidityDays Inclusive upper bound, in days, of a visa's validity window
 * @property requireVisaCode When true a required visa also needs a well-formed code
 */
export interface DecisionPolicy {
	readonly homeCountry: string;
	readonly visaValidityDays: number;
	readonly requireVisaCode: boolean;
}

export const DEFAULT_POLICY: DecisionPolicy = {
	homeCountry: "KAN",
	visaValidityDays: 730,
	requireVisaCode: false,
};

export type DecisionReason =
	| "medical-advisory"
	| "incomplete-record"
	| "visitor-visa"
	| "transit-visa"
	| "watchlist"
	| "returning-citizen"
	| "cleared";

/**
 * Decision for one record together with the rule that produced it.
 *
 * @remarks
 * - @invariant index is the position of the record in the input batch
 */
export interface DecisionOutcome {
	readonly index: number;
	readonly decision: Decision;
	readonly reason: DecisionReason;
}

export type DecisionSummary = Readonly<Record<Decision, number>>;
