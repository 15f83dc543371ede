// CHANGE: Country-attribute indexer
// PURITY: CORE
// INVARIANT: Sets are built locally per call and never mutated after return
// COMPLEXITY: O(n) where n = |countries|

import type { CountryIndex, CountryInfo } from "../models.js";

/**
 * Splits the country table into medical-advisory, visitor-visa and
 * transit-visa lookup sets.
 *
 * @pure true
 * @invariant code ∈ medicalAdvisory ↔ ∃c: c.code = code ∧ c.medicalAdvisory ≠ ""
 *
 * @example
 * ```ts
 * const index = indexCountries([
 *   { code: "LUG", medicalAdvisory: "EBOLA", visitorVisaRequired: true, transitVisaRequired: false },
 * ]);
 * index.medicalAdvisory.has("LUG"); // true
 * ```
 */
export function indexCountries(
	countries: readonly CountryInfo[],
): CountryIndex {
	const medicalAdvisory = new Set<string>();
	const visitorVisa = new Set<string>();
	const transitVisa = new Set<string>();

	for (const country of countries) {
		if (country.medicalAdvisory.length > 0) medicalAdvisory.add(country.code);
		if (country.visitorVisaRequired) visitorVisa.add(country.code);
		if (country.transitVisaRequired) transitVisa.add(country.code);
	}

	return { medicalAdvisory, visitorVisa, transitVisa };
}
