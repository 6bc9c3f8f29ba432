/**
 * @geoparquet-lint/conformance - Fixture catalog and conformance runner for
 * GeoParquet metadata rule sets.
 *
 * This library provides functionality for:
 * - A catalog of named valid/invalid metadata fragments
 * - Running a rule set against the catalog
 * - Writing the catalog out as standalone JSON files
 */

export {
	type FixtureExpectation,
	type FixtureCase,
	type JsonObject,
	metadataTemplate,
	allCases,
	validCases,
	invalidCases,
	getCase,
} from "./catalog.js";

export { type ConformanceOutcome, type ConformanceReport, runConformance } from "./runner.js";

export { fixtureFileName, stringifySorted, serializeFixture, materializeFixtures } from "./materialize.js";
