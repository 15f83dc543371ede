// CHANGE: Visa requirement lookup and validity window
// PURITY: CORE
// INVARIANT: valid(visa, today) ↔ 0 < today - issued ≤ visaValidityDays (flat day count)
// COMPLEXITY: O(1) per record (set lookups)

import { parseEpochDay } from "../dates.js";
import type { CountryIndex, DecisionPolicy, TravelRecord } from "../models.js";

const VISA_CODE_PATTERN = /^[A-Za-z0-9]{5}-[A-Za-z0-9]{5}$/u;

export type VisaKind = "visitor-visa" | "transit-visa";

/**
 * Visitor visas depend on the HOME country.
 *
 * @pure true
 */
export function isVisitorVisaRequired(
	record: TravelRecord,
	countries: CountryIndex,
): boolean {
	return (
		record.entryReason === "visit" &&
		countries.visitorVisa.has(record.home.country)
	);
}

/**
 * Transit visas depend on the ORIGIN country.
 *
 * @pure true
 */
export function isTransitVisaRequired(
	record: TravelRecord,
	countries: CountryIndex,
): boolean {
	return (
		record.entryReason === "transit" &&
		countries.transitVisa.has(record.from.country)
	);
}

/**
 * Which visa, if any, the record has to present.
 *
 * @pure true
 * @invariant visit and transit are exclusive entry reasons, so at most one kind applies
 */
export function requiredVisa(
	record: TravelRecord,
	countries: CountryIndex,
): VisaKind | null {
	if (isVisitorVisaRequired(record, countries)) return "visitor-visa";
	if (isTransitVisaRequired(record, countries)) return "transit-visa";
	return null;
}

/** @pure true */
export function isValidVisaCode(value: unknown): value is string {
	return typeof value === "string" && VISA_CODE_PATTERN.test(value);
}

/**
 * Checks a visa against the validity window ending on `today`.
 *
 * @param visa - Raw `{ code, date }` value from the record; anything without a date is invalid
 * @param today - Evaluation day number (see {@link toEpochDay})
 *
 * @pure true
 * @postcondition issued = today → false; issued = today - 730 → true; issued = today - 731 → false
 *
 * @example
 * ```ts
 * isValidVisa({ code: "CFR6X-XSMVA", date: "2024-01-01" }, parseEpochDay("2024-06-01") ?? 0, DEFAULT_POLICY); // true
 * ```
 */
export function isValidVisa(
	visa: unknown,
	today: number,
	policy: DecisionPolicy,
): boolean {
	if (visa === null || typeof visa !== "object" || !("date" in visa)) {
		return false;
	}
	const issued = parseEpochDay(visa.date);
	if (issued === null) return false;

	const age = today - issued;
	// Negated so that a NaN day (invalid evaluation date) fails the window
	if (!(age > 0 && age <= policy.visaValidityDays)) return false;

	if (!policy.requireVisaCode) return true;
	return "code" in visa && isValidVisaCode(visa.code);
}
