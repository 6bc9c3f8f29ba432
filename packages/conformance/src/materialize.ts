/**
 * @title Fixture Materialization
 * @description Write catalog fixtures as standalone JSON files for inspection
 * and regression tooling.
 *
 * @module materialize
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { GEO_METADATA_KEY, type JsonValue } from "@geoparquet-lint/core";
import { allCases, type FixtureCase } from "./catalog.js";

/**
 * File name of a fixture: `<valid|invalid>_<name>.json`.
 */
export function fixtureFileName(fixture: FixtureCase): string {
	return `${fixture.expectation}_${fixture.name}.json`;
}

function sortKeys(_key: string, value: unknown): unknown {
	if (value === null || typeof value !== "object" || Array.isArray(value)) {
		return value;
	}
	return Object.fromEntries(Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

/**
 * Serialize a value as JSON indented by two spaces, with object keys sorted
 * at every depth.
 */
export function stringifySorted(value: JsonValue): string {
	return JSON.stringify(value, sortKeys, 2);
}

/**
 * File content of a fixture: `{"geo": <fragment>}`, sorted and indented.
 */
export function serializeFixture(fixture: FixtureCase): string {
	return `${stringifySorted({ [GEO_METADATA_KEY]: fixture.metadata })}\n`;
}

/**
 * Write one file per fixture into a directory, creating it if needed.
 *
 * @param outputDir - Target directory
 * @param cases - Fixtures to write (default: whole catalog)
 * @returns Paths of the written files, in catalog order
 */
export async function materializeFixtures(
	outputDir: string,
	cases: readonly FixtureCase[] = allCases(),
): Promise<string[]> {
	await fs.promises.mkdir(outputDir, { recursive: true });

	const written: string[] = [];
	for (const fixture of cases) {
		const filePath = path.join(outputDir, fixtureFileName(fixture));
		await fs.promises.writeFile(filePath, serializeFixture(fixture), "utf-8");
		written.push(filePath);
	}
	return written;
}
