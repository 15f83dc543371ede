// CHANGE: Wire schemas for reference data and policy files
// PURITY: CORE-compatible (schemas are values; decoding happens in the loader)
// INVARIANT: Decoded values carry camelCase field names; wire files use snake_case
// SOURCE: https://effect.website/docs/schema/introduction

import { Schema } from "effect";

import { DEFAULT_POLICY } from "../../core/models.js";

/** Visa-required flags appear as booleans, 0/1, or "0"/"1". */
export const VisaFlag = Schema.transform(
	Schema.Union(Schema.Boolean, Schema.Literal(0, 1, "0", "1")),
	Schema.Boolean,
	{
		strict: true,
		decode: (flag) => flag === true || flag === 1 || flag === "1",
		encode: (flag) => flag,
	},
);

export const WatchlistEntrySchema = Schema.Struct({
	firstName: Schema.propertySignature(Schema.String).pipe(
		Schema.fromKey("first_name"),
	),
	lastName: Schema.propertySignature(Schema.String).pipe(
		Schema.fromKey("last_name"),
	),
	passport: Schema.String,
});

export const WatchlistSchema = Schema.Array(WatchlistEntrySchema);

export const CountryInfoSchema = Schema.Struct({
	code: Schema.String,
	name: Schema.optionalWith(Schema.String, { exact: true }),
	medicalAdvisory: Schema.optionalWith(Schema.String, {
		default: () => "",
	}).pipe(Schema.fromKey("medical_advisory")),
	visitorVisaRequired: Schema.propertySignature(VisaFlag).pipe(
		Schema.fromKey("visitor_visa_required"),
	),
	transitVisaRequired: Schema.propertySignature(VisaFlag).pipe(
		Schema.fromKey("transit_visa_required"),
	),
});

export const CountriesSchema = Schema.Array(CountryInfoSchema);

/** Records stay undecoded per element: a malformed record is a Reject, not a load failure. */
export const RecordsSchema = Schema.Array(Schema.Unknown);

export const PolicySchema = Schema.Struct({
	homeCountry: Schema.optionalWith(Schema.String.pipe(Schema.minLength(1)), {
		default: () => DEFAULT_POLICY.homeCountry,
	}),
	visaValidityDays: Schema.optionalWith(
		Schema.Number.pipe(Schema.int(), Schema.positive()),
		{ default: () => DEFAULT_POLICY.visaValidityDays },
	),
	requireVisaCode: Schema.optionalWith(Schema.Boolean, {
		default: () => DEFAULT_POLICY.requireVisaCode,
	}),
});
