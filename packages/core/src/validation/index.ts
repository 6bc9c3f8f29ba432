/**
 * @title Validation Module
 * @description Barrel export for the validation engine.
 *
 * @module validation
 */

export { validate, validateValue, isValid, nodesEqual } from "./engine.js";

export { MetadataValidator } from "./validator.js";

export type {
	RootTypeViolation,
	RequiredViolation,
	TypeViolation,
	EnumViolation,
	UniqueItemsViolation,
	ArrayLengthViolation,
	MinLengthViolation,
	MinPropertiesViolation,
	KeyMinLengthViolation,
	CustomViolation,
	Violation,
	ViolationKind,
} from "./types.js";
