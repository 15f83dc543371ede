// CHANGE: Human-readable messages for fatal application errors
// PURITY: CORE
// COMPLEXITY: O(1)

import { match } from "ts-pattern";

import type { AppError } from "../errors.js";

/**
 * @pure true
 * @invariant result.length > 0
 */
export function formatAppError(error: AppError): string {
	return match(error)
		.with(
			{ _tag: "MissingResource" },
			(e) => `Cannot read ${e.path}: ${e.detail}`,
		)
		.with(
			{ _tag: "MalformedInput" },
			(e) => `Malformed ${e.source} in ${e.path}: ${e.detail}`,
		)
		.with({ _tag: "InvalidArguments" }, (e) => `Invalid arguments: ${e.detail}`)
		.exhaustive();
}
