/**
 * Diagnostics module exports.
 */

export {
	type Diagnostic,
	violationMessage,
	renderViolation,
	renderViolations,
	formatDiagnostic,
	formatDiagnostics,
} from "./render.js";
