/**
 * @title Conformance Runner
 * @description Check a rule set against the fixture catalog.
 *
 * @module runner
 */

import { defaultRuleSet, validateValue, type RuleSet, type Violation } from "@geoparquet-lint/core";
import { allCases, type FixtureCase } from "./catalog.js";

/**
 * Outcome of one fixture.
 */
export interface ConformanceOutcome {
	fixture: FixtureCase;
	violations: Violation[];
	/** Valid fixtures pass with no violations, invalid ones with at least one. */
	passed: boolean;
}

/**
 * Outcome of a whole catalog run.
 */
export interface ConformanceReport {
	ruleSetId: string;
	ruleSetVersion: string;
	outcomes: ConformanceOutcome[];
	failures: ConformanceOutcome[];
	passed: boolean;
}

/**
 * Validate every fixture and compare with its expectation.
 *
 * @param ruleSet - Rule set under test (default: bundled rule set)
 * @param cases - Fixtures to run (default: whole catalog)
 */
export function runConformance(
	ruleSet: RuleSet = defaultRuleSet(),
	cases: readonly FixtureCase[] = allCases(),
): ConformanceReport {
	const outcomes = cases.map((fixture): ConformanceOutcome => {
		const violations = validateValue(fixture.metadata, ruleSet);
		const passed = fixture.expectation === "valid" ? violations.length === 0 : violations.length > 0;
		return { fixture, violations, passed };
	});
	const failures = outcomes.filter((outcome) => !outcome.passed);

	return {
		ruleSetId: ruleSet.id,
		ruleSetVersion: ruleSet.version,
		outcomes,
		failures,
		passed: failures.length === 0,
	};
}
