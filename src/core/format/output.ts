// CHANGE: Pure rendering of decision outcomes
// PURITY: CORE
// INVARIANT: Text output has one line per record, in input order
// COMPLEXITY: O(n) where n = |outcomes|

import { match } from "ts-pattern";

import { summarize } from "../decision.js";
import {
	DECISION_PRECEDENCE,
	type DecisionOutcome,
	type DecisionSummary,
} from "../models.js";
import type { OutputOptions } from "../types/index.js";

/**
 * `#<index> <Decision> (<reason>)`
 *
 * @pure true
 */
export function formatOutcomeLine(outcome: DecisionOutcome): string {
	return `#${outcome.index} ${outcome.decision} (${outcome.reason})`;
}

/**
 * Counts in precedence order: `Quarantine=1 Reject=0 Secondary=0 Accept=2`.
 *
 * @pure true
 */
export function formatSummaryLine(summary: DecisionSummary): string {
	return DECISION_PRECEDENCE.map(
		(decision) => `${decision}=${summary[decision]}`,
	).join(" ");
}

function renderText(
	outcomes: readonly DecisionOutcome[],
	options: OutputOptions,
): string {
	const lines = outcomes.map((outcome) =>
		options.explain ? formatOutcomeLine(outcome) : outcome.decision,
	);
	const summary = options.summary
		? [formatSummaryLine(summarize(outcomes.map((o) => o.decision)))]
		: [];
	return [...lines, ...summary].join("\n");
}

function renderJson(
	outcomes: readonly DecisionOutcome[],
	options: OutputOptions,
): string {
	const decisions = outcomes.map((outcome) =>
		options.explain
			? {
					index: outcome.index,
					decision: outcome.decision,
					reason: outcome.reason,
				}
			: outcome.decision,
	);
	const document = options.summary
		? {
				decisions,
				summary: summarize(outcomes.map((o) => o.decision)),
			}
		: decisions;
	return JSON.stringify(document, null, 2);
}

/**
 * Renders outcomes according to the output options.
 *
 * @pure true
 *
 * @example
 * ```ts
 * renderOutcomes(outcomes, { format: "text", explain: false, summary: false });
 * // "Accept\nQuarantine"
 * ```
 */
export function renderOutcomes(
	outcomes: readonly DecisionOutcome[],
	options: OutputOptions,
): string {
	return match(options.format)
		.with("text", () => renderText(outcomes, options))
		.with("json", () => renderJson(outcomes, options))
		.exhaustive();
}
