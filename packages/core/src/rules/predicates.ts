/**
 * @title Built-in Predicates
 * @description Named cross-field checks that rule files can reference from
 * `custom` constraints.
 *
 * None of these is enabled by the bundled rule set; stricter rule sets opt in.
 *
 * @module rules
 */

import { asArray, asNumber, asObject, asString, childPath, getMember } from "../document/index.js";
import type { Predicate, PredicateFinding } from "./types.js";

/**
 * `primary_column` must name an entry of `columns`. Evaluated on the
 * document root; stays silent when either field is missing or mistyped,
 * since other constraints report those.
 */
export const primaryColumnExists: Predicate = (node, context) => {
	const primary = asString(getMember(node, "primary_column"));
	const columns = asObject(getMember(node, "columns"));
	if (primary === undefined || columns === undefined || columns.entries.has(primary)) {
		return [];
	}
	return [
		{
			message: `primary column '${primary}' is not an entry of columns`,
			path: childPath(context.path, "primary_column"),
		},
	];
};

/**
 * Every axis of a bbox must have min <= max, except x, which may wrap
 * across the antimeridian. Evaluated on a bbox array; stays silent unless the
 * array has 4 or 6 numeric items.
 */
export const bboxOrdered: Predicate = (node) => {
	const items = asArray(node)?.items ?? [];
	const values = items.map((item) => asNumber(item));
	if ((values.length !== 4 && values.length !== 6) || values.some((value) => value === undefined)) {
		return [];
	}

	const dimensions = values.length / 2;
	const axes = ["x", "y", "z"];
	const findings: PredicateFinding[] = [];
	for (let axis = 1; axis < dimensions; axis++) {
		const min = values[axis];
		const max = values[axis + dimensions];
		if (min !== undefined && max !== undefined && min > max) {
			findings.push({
				message: `${axes[axis]}min (${min}) is greater than ${axes[axis]}max (${max})`,
			});
		}
	}
	return findings;
};

/** Predicates available to every rule set, by name. */
export const BUILTIN_PREDICATES: ReadonlyMap<string, Predicate> = new Map<string, Predicate>([
	["primary-column-exists", primaryColumnExists],
	["bbox-ordered", bboxOrdered],
]);
