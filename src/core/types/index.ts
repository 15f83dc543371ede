export type { CLIOptions, OutputFormat, OutputOptions } from "./config.js";
