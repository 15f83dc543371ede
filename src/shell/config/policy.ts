// CHANGE: Load the decision policy from entry-decider.config.json
// PURITY: SHELL (file system access)
// EFFECT: Effect<DecisionPolicy, MissingResource | MalformedInput>
// INVARIANT: Absent keys fall back to DEFAULT_POLICY values

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect } from "effect";

import type { MalformedInput, MissingResource } from "../../core/errors.js";
import { DEFAULT_POLICY, type DecisionPolicy } from "../../core/models.js";
import { decodeJsonFile } from "../input/loader.js";
import { PolicySchema } from "../input/schemas.js";

export const DEFAULT_CONFIG_FILE = "entry-decider.config.json";

/**
 * Resolves the decision policy.
 *
 * @param configPath - Explicit policy file; a missing explicit file is fatal
 * @param cwd - Directory searched for {@link DEFAULT_CONFIG_FILE} when no path is given
 *
 * @pure false (reads the file system)
 */
export function loadPolicy(
	configPath: string | undefined,
	cwd: string = process.cwd(),
): Effect.Effect<DecisionPolicy, MissingResource | MalformedInput> {
	if (configPath !== undefined) {
		return decodeJsonFile(configPath, "config", PolicySchema);
	}

	const fallback = path.join(cwd, DEFAULT_CONFIG_FILE);
	if (!fs.existsSync(fallback)) {
		return Effect.logDebug("no policy file, using defaults").pipe(
			Effect.as(DEFAULT_POLICY),
		);
	}
	return decodeJsonFile(fallback, "config", PolicySchema);
}
