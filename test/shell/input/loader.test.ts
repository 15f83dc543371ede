import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
	loadCountries,
	loadInputs,
	loadRecords,
	loadWatchlist,
	readJsonFile,
} from "../../../src/shell/input/index.js";
import { createTempProject, type TempProject } from "../../utils/tempProject.js";

let t: TempProject;

beforeEach(() => {
	t = createTempProject();
});

afterEach(() => {
	t.cleanup();
});

describe("readJsonFile", () => {
	it("fails with MissingResource for an absent file", async () => {
		const error = await Effect.runPromise(
			Effect.flip(readJsonFile(t.file("absent.json"), "records")),
		);
		expect(error._tag).toBe("MissingResource");
		expect(error.path).toBe(t.file("absent.json"));
	});

	it("fails with MalformedInput for invalid JSON", async () => {
		const path = t.writeText("broken.json", "[{");
		const error = await Effect.runPromise(
			Effect.flip(readJsonFile(path, "countries")),
		);
		expect(error._tag).toBe("MalformedInput");
		if (error._tag === "MalformedInput") expect(error.source).toBe("countries");
	});
});

describe("loadRecords", () => {
	it("maps every element, including malformed ones", async () => {
		const path = t.writeJson("records.json", [
			{ first_name: "Ada", entry_reason: "returning" },
			null,
		]);
		const records = await Effect.runPromise(loadRecords(path));
		expect(records).toEqual([{ firstName: "Ada", entryReason: "returning" }, {}]);
	});

	it("requires a JSON array", async () => {
		const path = t.writeJson("records.json", { first_name: "Ada" });
		const error = await Effect.runPromise(Effect.flip(loadRecords(path)));
		expect(error._tag).toBe("MalformedInput");
	});
});

describe("loadWatchlist", () => {
	it("decodes snake_case entries", async () => {
		const path = t.writeJson("watchlist.json", [
			{
				first_name: "Pat",
				last_name: "Oglesby",
				passport: "QEMSB-PS4OG-3CV7S-8XKLZ-Y4XM2",
			},
		]);
		const entries = await Effect.runPromise(loadWatchlist(path));
		expect(entries).toEqual([
			{
				firstName: "Pat",
				lastName: "Oglesby",
				passport: "QEMSB-PS4OG-3CV7S-8XKLZ-Y4XM2",
			},
		]);
	});

	it("fails on an entry without a passport", async () => {
		const path = t.writeJson("watchlist.json", [
			{ first_name: "Pat", last_name: "Oglesby" },
		]);
		const error = await Effect.runPromise(Effect.flip(loadWatchlist(path)));
		expect(error._tag).toBe("MalformedInput");
		if (error._tag === "MalformedInput") expect(error.source).toBe("watchlist");
	});
});

describe("loadCountries", () => {
	it("decodes flags written as strings, numbers or booleans", async () => {
		const path = t.writeJson("countries.json", [
			{
				code: "GOR",
				name: "Gorgania",
				medical_advisory: "",
				visitor_visa_required: "1",
				transit_visa_required: "0",
			},
			{
				code: "BRD",
				medical_advisory: "",
				visitor_visa_required: 0,
				transit_visa_required: 1,
			},
			{
				code: "LUG",
				medical_advisory: "EBOLA",
				visitor_visa_required: false,
				transit_visa_required: true,
			},
		]);
		const countries = await Effect.runPromise(loadCountries(path));
		expect(countries).toEqual([
			{
				code: "GOR",
				name: "Gorgania",
				medicalAdvisory: "",
				visitorVisaRequired: true,
				transitVisaRequired: false,
			},
			{
				code: "BRD",
				medicalAdvisory: "",
				visitorVisaRequired: false,
				transitVisaRequired: true,
			},
			{
				code: "LUG",
				medicalAdvisory: "EBOLA",
				visitorVisaRequired: false,
				transitVisaRequired: true,
			},
		]);
	});

	it("treats a missing advisory as no advisory", async () => {
		const path = t.writeJson("countries.json", [
			{ code: "KAN", visitor_visa_required: 0, transit_visa_required: 0 },
		]);
		const [kan] = await Effect.runPromise(loadCountries(path));
		expect(kan?.medicalAdvisory).toBe("");
	});

	it("fails on an unknown flag value", async () => {
		const path = t.writeJson("countries.json", [
			{ code: "KAN", visitor_visa_required: "yes", transit_visa_required: 0 },
		]);
		const error = await Effect.runPromise(Effect.flip(loadCountries(path)));
		expect(error._tag).toBe("MalformedInput");
	});
});

describe("loadInputs", () => {
	it("loads the three sources together", async () => {
		const inputs = await Effect.runPromise(
			loadInputs({
				recordsPath: t.writeJson("records.json", [{ first_name: "Ada" }]),
				watchlistPath: t.writeJson("watchlist.json", []),
				countriesPath: t.writeJson("countries.json", []),
			}),
		);
		expect(inputs.records).toHaveLength(1);
		expect(inputs.watchlist).toEqual([]);
		expect(inputs.countries).toEqual([]);
	});

	it("fails when any source is missing", async () => {
		const error = await Effect.runPromise(
			Effect.flip(
				loadInputs({
					recordsPath: t.writeJson("records.json", []),
					watchlistPath: t.file("absent.json"),
					countriesPath: t.writeJson("countries.json", []),
				}),
			),
		);
		expect(error._tag).toBe("MissingResource");
	});
});
