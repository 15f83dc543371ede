// CHANGE: Strict calendar date parsing and flat day arithmetic
// PURITY: CORE
// INVARIANT: Day numbers count whole UTC days since 1970-01-01
// COMPLEXITY: O(1)

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/u;
const MS_PER_DAY = 86_400_000;

/**
 * Parses a strict `YYYY-MM-DD` string into a UTC day number.
 *
 * @returns Day number, or null when the value is not a string, not in the
 * pattern, or not a real calendar date (2021-02-30, 2021-13-01)
 *
 * @pure true
 * @invariant result !== null → formatEpochDay(result) === value
 *
 * @example
 * ```ts
 * parseEpochDay("1970-01-02"); // 1
 * parseEpochDay("2021-02-30"); // null
 * ```
 */
export function parseEpochDay(value: unknown): number | null {
	if (typeof value !== "string") return null;
	const match = DATE_PATTERN.exec(value);
	if (match === null) return null;

	const year = Number(match[1]);
	const month = Number(match[2]);
	const day = Number(match[3]);
	if (month < 1 || month > 12 || day < 1) return null;

	// setUTCFullYear, unlike Date.UTC, keeps years 0..99 as written
	const check = new Date(0);
	check.setUTCFullYear(year, month - 1, day);
	if (check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
		return null;
	}
	return Math.round(check.getTime() / MS_PER_DAY);
}

/** @pure true */
export function isValidDate(value: unknown): value is string {
	return parseEpochDay(value) !== null;
}

/**
 * UTC calendar day of an instant.
 *
 * @pure true
 * @complexity O(1)
 */
export function toEpochDay(date: Date): number {
	return Math.floor(date.getTime() / MS_PER_DAY);
}

/**
 * Renders a day number as `YYYY-MM-DD`.
 *
 * @pure true
 */
export function formatEpochDay(day: number): string {
	return new Date(day * MS_PER_DAY).toISOString().slice(0, 10);
}
