/**
 * @title Rules Module
 * @description Barrel export for rule set types, compilation and loading.
 *
 * @module rules
 */

export type {
	ViolationCategory,
	ValueType,
	PatternSegment,
	PathPattern,
	RequiredConstraint,
	TypeConstraint,
	EnumConstraint,
	UniqueItemsConstraint,
	ArrayLengthInConstraint,
	MinLengthConstraint,
	MinPropertiesConstraint,
	KeyMinLengthConstraint,
	CustomConstraint,
	Constraint,
	ConstraintKind,
	RuleScope,
	RuleSet,
	PredicateContext,
	PredicateFinding,
	Predicate,
} from "./types.js";

export { DEFAULT_CATEGORIES } from "./types.js";

export { type PatternMatch, parsePathPattern, formatPathPattern, resolvePattern } from "./pattern.js";

export { BUILTIN_PREDICATES, primaryColumnExists, bboxOrdered } from "./predicates.js";

export { type RawConstraint, type RawScope, type RawRuleSet, type CompileOptions, compileRuleSet } from "./compile.js";

export { DEFAULT_RULE_SET_PATH, parseRuleSet, loadRuleSet, defaultRuleSet } from "./load.js";

export { isVersionCompatible } from "./version.js";
