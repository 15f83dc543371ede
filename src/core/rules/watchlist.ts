// CHANGE: Watchlist identity matcher
// PURITY: CORE
// INVARIANT: onWatchlist(r, W) ↔ ∃w ∈ W: (w.firstName = r.firstName ∧ w.lastName = r.lastName) ∨ w.passport = r.passport
// COMPLEXITY: O(|W|) per record

import type { TravelRecord, WatchlistEntry } from "../models.js";

type Identity = Pick<TravelRecord, "firstName" | "lastName" | "passport">;

/**
 * Matches one watchlist entry by full name pair or by passport number.
 * Comparisons are exact and case-sensitive.
 *
 * @pure true
 */
export function matchesEntry(identity: Identity, entry: WatchlistEntry): boolean {
	const sameName =
		entry.firstName === identity.firstName &&
		entry.lastName === identity.lastName;
	return sameName || entry.passport === identity.passport;
}

/**
 * Scans the whole watchlist; a non-matching entry never ends the scan.
 *
 * @pure true
 *
 * @example
 * ```ts
 * isOnWatchlist(record, [
 *   { firstName: "A", lastName: "B", passport: "00000-00000-00000-00000-00000" },
 *   { firstName: "X", lastName: "Y", passport: record.passport },
 * ]); // true
 * ```
 */
export function isOnWatchlist(
	identity: Identity,
	watchlist: readonly WatchlistEntry[],
): boolean {
	return watchlist.some((entry) => matchesEntry(identity, entry));
}
