// CHANGE: Record completeness validator
// PURITY: CORE
// INVARIANT: Never throws; every input maps to a boolean
// COMPLEXITY: O(1) per record

import { isValidDate } from "../dates.js";
import {
	ENTRY_REASONS,
	type EntryReason,
	type Location,
	type TravelRecord,
	type TravelRecordInput,
} from "../models.js";

const PASSPORT_PATTERN = /^[A-Za-z0-9]{5}(?:-[A-Za-z0-9]{5}){4}$/u;

/**
 * Checks passport format: five groups of five ASCII alphanumerics joined by hyphens.
 *
 * @pure true
 * @example
 * ```ts
 * isValidPassport("3Z416-ZM6NW-ZO5WV-EVHYS-VPGAZ"); // true
 * isValidPassport("3Z416-ZM6NW-ZO5WV-EVHYS");       // false
 * ```
 */
export function isValidPassport(value: unknown): value is string {
	return typeof value === "string" && PASSPORT_PATTERN.test(value);
}

function isNonEmptyString(value: unknown): value is string {
	return typeof value === "string" && value.length > 0;
}

function isOptionalString(value: unknown): boolean {
	return value === undefined || typeof value === "string";
}

/**
 * A location needs a string country code; city and region are optional strings.
 *
 * @pure true
 */
export function isLocation(value: unknown): value is Location {
	if (value === null || typeof value !== "object" || Array.isArray(value)) {
		return false;
	}
	return (
		"country" in value &&
		typeof value.country === "string" &&
		(!("city" in value) || isOptionalString(value.city)) &&
		(!("region" in value) || isOptionalString(value.region))
	);
}

export function isEntryReason(value: unknown): value is EntryReason {
	return ENTRY_REASONS.some((reason) => reason === value);
}

/**
 * Determines whether a record carries every field a decision needs.
 *
 * @returns true iff names are non-empty, birth date and passport are well formed,
 * both locations are present and the entry reason is known
 *
 * @pure true
 * @invariant visa is not inspected here
 */
export function isCompleteRecord(
	record: TravelRecordInput,
): record is TravelRecord {
	return (
		isNonEmptyString(record.firstName) &&
		isNonEmptyString(record.lastName) &&
		isValidDate(record.birthDate) &&
		isValidPassport(record.passport) &&
		isLocation(record.home) &&
		isLocation(record.from) &&
		isEntryReason(record.entryReason)
	);
}
