export { parseCLIArgs, USAGE } from "./cli.js";
export { DEFAULT_CONFIG_FILE, loadPolicy } from "./policy.js";
