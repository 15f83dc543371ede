import { describe, expect, it } from "vitest";

import {
	formatOutcomeLine,
	formatSummaryLine,
	renderOutcomes,
} from "../../../src/core/format/output.js";
import type { DecisionOutcome } from "../../../src/core/models.js";

const outcomes: readonly DecisionOutcome[] = [
	{ index: 0, decision: "Accept", reason: "returning-citizen" },
	{ index: 1, decision: "Quarantine", reason: "medical-advisory" },
];

const plain = { explain: false, summary: false } as const;

describe("formatOutcomeLine / formatSummaryLine", () => {
	it("renders index, decision and reason", () => {
		expect(formatOutcomeLine({ index: 3, decision: "Reject", reason: "visitor-visa" })).toBe(
			"#3 Reject (visitor-visa)",
		);
	});

	it("renders counts in precedence order", () => {
		expect(
			formatSummaryLine({ Accept: 4, Reject: 2, Secondary: 1, Quarantine: 0 }),
		).toBe("Quarantine=0 Reject=2 Secondary=1 Accept=4");
	});
});

describe("renderOutcomes: text", () => {
	it("prints one decision per line", () => {
		expect(renderOutcomes(outcomes, { format: "text", ...plain })).toBe(
			"Accept\nQuarantine",
		);
	});

	it("prints explanations", () => {
		expect(
			renderOutcomes(outcomes, { format: "text", explain: true, summary: false }),
		).toBe("#0 Accept (returning-citizen)\n#1 Quarantine (medical-advisory)");
	});

	it("appends the summary line", () => {
		expect(
			renderOutcomes(outcomes, { format: "text", explain: false, summary: true }),
		).toBe("Accept\nQuarantine\nQuarantine=1 Reject=0 Secondary=0 Accept=1");
	});

	it("prints nothing for an empty batch", () => {
		expect(renderOutcomes([], { format: "text", ...plain })).toBe("");
	});
});

describe("renderOutcomes: json", () => {
	it("prints an array of decision strings", () => {
		const out = renderOutcomes(outcomes, { format: "json", ...plain });
		expect(JSON.parse(out)).toEqual(["Accept", "Quarantine"]);
	});

	it("prints outcome objects and the summary", () => {
		const out = renderOutcomes(outcomes, {
			format: "json",
			explain: true,
			summary: true,
		});
		expect(JSON.parse(out)).toEqual({
			decisions: [
				{ index: 0, decision: "Accept", reason: "returning-citizen" },
				{ index: 1, decision: "Quarantine", reason: "medical-advisory" },
			],
			summary: { Quarantine: 1, Reject: 0, Secondary: 0, Accept: 1 },
		});
	});

	it("prints an empty array for an empty batch", () => {
		expect(renderOutcomes([], { format: "json", ...plain })).toBe("[]");
	});
});
