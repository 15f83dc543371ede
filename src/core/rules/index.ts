export { indexCountries } from "./countries.js";
export { countryCodeOf, hasMedicalAdvisory } from "./medical.js";
export {
	isCompleteRecord,
	isEntryReason,
	isLocation,
	isValidPassport,
} from "./record.js";
export {
	isTransitVisaRequired,
	isValidVisa,
	isValidVisaCode,
	isVisitorVisaRequired,
	requiredVisa,
	type VisaKind,
} from "./visa.js";
export { isOnWatchlist, matchesEntry } from "./watchlist.js";
