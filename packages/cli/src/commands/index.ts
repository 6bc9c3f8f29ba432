/**
 * Command-line program: global options and subcommands.
 */

import { Command } from "commander";
import { conformanceCommand } from "./conformance.js";
import { fixturesCommand } from "./fixtures.js";
import { rulesCommand } from "./rules.js";
import { validateCommand } from "./validate.js";

export const program = new Command()
	.name("geoparquet-lint")
	.description("Validate GeoParquet \"geo\" file metadata against a declarative rule set")
	.version("0.1.0")
	.option("--log-level <level>", "error, warn, info or debug (default: warn)")
	.addCommand(validateCommand)
	.addCommand(rulesCommand)
	.addCommand(fixturesCommand)
	.addCommand(conformanceCommand);

export { runValidate, validateFile, expandInputs, exitCodeFor, formatReport, type FileReport } from "./validate.js";
export { runRules, listRules, summarizeConstraint, type RuleEntry } from "./rules.js";
export { runFixtures } from "./fixtures.js";
export { runConformanceCommand } from "./conformance.js";
export { EXIT_OK, EXIT_VIOLATIONS, EXIT_ERROR, type Writer } from "./shared.js";
