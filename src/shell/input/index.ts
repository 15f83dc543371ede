export {
	type DecisionInputs,
	decodeJsonFile,
	type InputSource,
	loadCountries,
	loadInputs,
	loadRecords,
	loadWatchlist,
	readJsonFile,
	readTextFile,
} from "./loader.js";
export { toTravelRecordInput } from "./records.js";
