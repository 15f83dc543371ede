import { describe, expect, it } from "vitest";

import {
	formatEpochDay,
	isValidDate,
	parseEpochDay,
	toEpochDay,
} from "../../src/core/dates.js";

describe("parseEpochDay", () => {
	it("counts days from 1970-01-01", () => {
		expect(parseEpochDay("1970-01-01")).toBe(0);
		expect(parseEpochDay("1970-01-02")).toBe(1);
		expect(parseEpochDay("1969-12-31")).toBe(-1);
	});

	it("accepts leap days only in leap years", () => {
		expect(parseEpochDay("2020-02-29")).not.toBeNull();
		expect(parseEpochDay("2021-02-29")).toBeNull();
		expect(parseEpochDay("1900-02-29")).toBeNull();
		expect(parseEpochDay("2000-02-29")).not.toBeNull();
	});

	it("rejects impossible calendar dates", () => {
		expect(parseEpochDay("2021-02-30")).toBeNull();
		expect(parseEpochDay("2021-04-31")).toBeNull();
		expect(parseEpochDay("2021-13-01")).toBeNull();
		expect(parseEpochDay("2021-00-10")).toBeNull();
		expect(parseEpochDay("2021-01-00")).toBeNull();
	});

	it("requires the exact YYYY-MM-DD layout", () => {
		expect(parseEpochDay("2021-1-05")).toBeNull();
		expect(parseEpochDay(" 2021-01-05")).toBeNull();
		expect(parseEpochDay("2021-01-05T00:00:00Z")).toBeNull();
		expect(parseEpochDay("2021/01/05")).toBeNull();
		expect(parseEpochDay("!!!!-PP-<>")).toBeNull();
	});

	it("returns null for non-string values", () => {
		expect(parseEpochDay(20210105)).toBeNull();
		expect(parseEpochDay(true)).toBeNull();
		expect(parseEpochDay(null)).toBeNull();
		expect(parseEpochDay(undefined)).toBeNull();
	});

	it("keeps two-digit years as written", () => {
		expect(isValidDate("0004-02-29")).toBeTruthy();
		expect(formatEpochDay(parseEpochDay("0004-02-29") ?? 0)).toBe(
			"0004-02-29",
		);
	});
});

describe("toEpochDay / formatEpochDay", () => {
	it("truncates an instant to its UTC day", () => {
		expect(toEpochDay(new Date("1970-01-02T23:59:59Z"))).toBe(1);
		expect(toEpochDay(new Date("1970-01-02T00:00:00Z"))).toBe(1);
	});

	it("agrees with parseEpochDay", () => {
		const instant = new Date("2024-06-01T12:00:00Z");
		expect(toEpochDay(instant)).toBe(parseEpochDay("2024-06-01"));
		expect(formatEpochDay(toEpochDay(instant))).toBe("2024-06-01");
	});

	it("formats day zero", () => {
		expect(formatEpochDay(0)).toBe("1970-01-01");
	});
});
