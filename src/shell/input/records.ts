// CHANGE: Map raw record JSON onto the engine's input shape
// PURITY: CORE-compatible (pure mapping, lives next to the loader that feeds it)
// INVARIANT: Values are copied as-is; validation is left to the record validator
// COMPLEXITY: O(1) per record

import type { TravelRecordInput } from "../../core/models.js";

/**
 * Renames wire keys (`first_name`, `entry_reason`, ...) without checking values.
 * Anything that is not a JSON object becomes an empty input and is later rejected.
 *
 * @pure true
 */
export function toTravelRecordInput(raw: unknown): TravelRecordInput {
	if (raw === null || typeof raw !== "object" || Array.isArray(raw)) return {};
	const wire: { readonly [key: string]: unknown } = { ...raw };
	return {
		firstName: wire["first_name"],
		lastName: wire["last_name"],
		birthDate: wire["birth_date"],
		passport: wire["passport"],
		home: wire["home"],
		from: wire["from"],
		entryReason: wire["entry_reason"],
		visa: wire["visa"],
	};
}
