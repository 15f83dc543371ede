import { describe, expect, it } from "vitest";

import {
	InvalidArguments,
	MalformedInput,
	MissingResource,
} from "../../../src/core/errors.js";
import { formatAppError } from "../../../src/core/format/errors.js";

describe("formatAppError", () => {
	it("names the unreadable path", () => {
		const error = new MissingResource({ path: "/data/records.json", detail: "ENOENT" });
		expect(formatAppError(error)).toBe("Cannot read /data/records.json: ENOENT");
	});

	it("names the malformed source", () => {
		const error = new MalformedInput({
			source: "watchlist",
			path: "w.json",
			detail: "expected an array",
		});
		expect(formatAppError(error)).toBe(
			"Malformed watchlist in w.json: expected an array",
		);
	});

	it("describes invalid arguments", () => {
		const error = new InvalidArguments({ detail: "missing records file" });
		expect(formatAppError(error)).toBe("Invalid arguments: missing records file");
	});
});
