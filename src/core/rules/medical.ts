// CHANGE: Medical-advisory matcher over unvalidated records
// PURITY: CORE
// INVARIANT: Runs before completeness validation, so it reads locations defensively
// COMPLEXITY: O(1) per record

import type { CountryIndex, TravelRecordInput } from "../models.js";

/**
 * Country code of a raw location, if it has one.
 *
 * @pure true
 */
export function countryCodeOf(location: unknown): string | null {
	if (location === null || typeof location !== "object") return null;
	if (!("country" in location)) return null;
	return typeof location.country === "string" ? location.country : null;
}

/**
 * True when the home or the origin country is under a medical advisory.
 *
 * @pure true
 */
export function hasMedicalAdvisory(
	record: TravelRecordInput,
	countries: CountryIndex,
): boolean {
	return [countryCodeOf(record.home), countryCodeOf(record.from)].some(
		(code) => code !== null && countries.medicalAdvisory.has(code),
	);
}
