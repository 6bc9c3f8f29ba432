/**
 * Document module exports.
 */

export {
	type ObjectNode,
	type ArrayNode,
	type StringNode,
	type NumberNode,
	type BooleanNode,
	type NullNode,
	type DocumentNode,
	type NodeKind,
	type JsonValue,
	type JsonScalar,
	fromJson,
	toJson,
	asObject,
	asArray,
	asString,
	asNumber,
	getMember,
	getItem,
	scalarValue,
	quoteScalar,
	describeNode,
} from "./node.js";

export { type PathSegment, type DocumentPath, ROOT_PATH_LABEL, formatPath, childPath } from "./path.js";

export {
	type DocumentFormat,
	type FooterMetadata,
	GEO_METADATA_KEY,
	detectFormat,
	parseText,
	parseDocument,
	readGeoMetadata,
} from "./parse.js";
