/**
 * @title Version Compatibility
 * @description Compare a document's declared version with a rule set's.
 *
 * A mismatch is never a violation: `version` is only a required string. Callers
 * use this to warn that a document may target another schema revision.
 *
 * @module rules
 */

import * as semver from "semver";

/**
 * Whether a document version targets the same major.minor schema revision as
 * a rule set. Pre-release tags are ignored; unparsable versions are
 * incompatible.
 *
 * @param documentVersion - The document's `version` value
 * @param ruleSetVersion - The rule set's version
 */
export function isVersionCompatible(documentVersion: string, ruleSetVersion: string): boolean {
	const document = semver.parse(documentVersion) ?? semver.coerce(documentVersion);
	const ruleSet = semver.parse(ruleSetVersion);
	if (!document || !ruleSet) {
		return false;
	}
	return document.major === ruleSet.major && document.minor === ruleSet.minor;
}
