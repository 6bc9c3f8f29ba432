/**
 * @title Fixture Catalog
 * @description Named metadata fragments tagged valid or invalid.
 *
 * Every fragment is a variation of the minimal document. The catalog pins the
 * behaviour of the bundled rule set: a rule change must come with a catalog
 * change.
 *
 * @module catalog
 */

import type { JsonValue } from "@geoparquet-lint/core";

/** Whether a fixture must pass or fail validation. */
export type FixtureExpectation = "valid" | "invalid";

/** Mutable JSON object used while building fragments. */
export type JsonObject = { [key: string]: JsonValue };

/**
 * A named metadata fragment and its expected outcome.
 */
export interface FixtureCase {
	readonly name: string;
	readonly expectation: FixtureExpectation;
	/** The `geo` metadata document (deep-frozen). */
	readonly metadata: JsonValue;
}

/**
 * Fresh copy of the minimal valid document, with handles on the nested
 * objects so variations can edit them in place.
 */
export function metadataTemplate(): { metadata: JsonObject; columns: JsonObject; geometry: JsonObject } {
	const geometry: JsonObject = { encoding: "WKB", geometry_types: [] };
	const columns: JsonObject = { geometry };
	const metadata: JsonObject = { version: "0.5.0-dev", primary_column: "geometry", columns };
	return { metadata, columns, geometry };
}

/** Returns the document after letting `edit` change the column handle. */
function withGeometry(edit: (geometry: JsonObject) => void): JsonObject {
	const { metadata, geometry } = metadataTemplate();
	edit(geometry);
	return metadata;
}

const cases: FixtureCase[] = [];

function define(expectation: FixtureExpectation, name: string, build: () => JsonValue): void {
	cases.push(deepFreeze({ name, expectation, metadata: build() }));
}

// Minimum required metadata.

define("valid", "minimal", () => metadataTemplate().metadata);

define("invalid", "missing_version", () => {
	const { metadata } = metadataTemplate();
	delete metadata["version"];
	return metadata;
});

define("invalid", "missing_primary_column", () => {
	const { metadata } = metadataTemplate();
	delete metadata["primary_column"];
	return metadata;
});

define("invalid", "missing_columns", () => {
	const { metadata } = metadataTemplate();
	delete metadata["columns"];
	return metadata;
});

define("invalid", "missing_columns_entry", () => {
	const { metadata } = metadataTemplate();
	metadata["columns"] = {};
	return metadata;
});

define("invalid", "missing_geometry_encoding", () => withGeometry((geometry) => delete geometry["encoding"]));

define("invalid", "missing_geometry_type", () => withGeometry((geometry) => delete geometry["geometry_types"]));

define("valid", "custom_key", () => {
	const { metadata } = metadataTemplate();
	metadata["custom_key"] = "value";
	return metadata;
});

define("valid", "custom_key_column", () =>
	withGeometry((geometry) => {
		geometry["custom_key"] = "value";
	}),
);

define("invalid", "root_not_object", () => [metadataTemplate().metadata]);

// Geometry columns.

define("valid", "geometry_columns_multiple", () => {
	const { metadata, columns } = metadataTemplate();
	columns["other_geom"] = metadataTemplate().geometry;
	return metadata;
});

define("invalid", "geometry_columns_invalid_object", () => {
	const { metadata, columns } = metadataTemplate();
	columns["invalid_column_object"] = "foo";
	return metadata;
});

// Geometry column name.

define("valid", "geometry_column_name", () => {
	const { metadata, geometry } = metadataTemplate();
	metadata["primary_column"] = "geom";
	metadata["columns"] = { geom: geometry };
	return metadata;
});

define("invalid", "geometry_column_name_primary_empty", () => {
	const { metadata } = metadataTemplate();
	metadata["primary_column"] = "";
	return metadata;
});

define("invalid", "geometry_column_name_empty", () => {
	const { metadata, columns, geometry } = metadataTemplate();
	columns[""] = geometry;
	return metadata;
});

// Membership of the primary column in `columns` is not enforced.
define("valid", "primary_column_unlisted", () => {
	const { metadata } = metadataTemplate();
	metadata["primary_column"] = "other_geom";
	return metadata;
});

// Encoding.

define("invalid", "encoding", () =>
	withGeometry((geometry) => {
		geometry["encoding"] = "WKT";
	}),
);

// Geometry types.

define("valid", "geometry_type_list", () =>
	withGeometry((geometry) => {
		geometry["geometry_types"] = ["Point"];
	}),
);

define("valid", "geometry_type_3d", () =>
	withGeometry((geometry) => {
		geometry["geometry_types"] = ["Point Z", "MultiPolygon Z"];
	}),
);

define("invalid", "geometry_type_string", () =>
	withGeometry((geometry) => {
		geometry["geometry_types"] = "Point";
	}),
);

define("invalid", "geometry_type_nonexistent", () =>
	withGeometry((geometry) => {
		geometry["geometry_types"] = ["Curve"];
	}),
);

define("invalid", "geometry_type_uniqueness", () =>
	withGeometry((geometry) => {
		geometry["geometry_types"] = ["Point", "Point"];
	}),
);

define("invalid", "geometry_type_z_missing_space", () =>
	withGeometry((geometry) => {
		geometry["geometry_types"] = ["PointZ"];
	}),
);

define("invalid", "geometry_type_lowercase", () =>
	withGeometry((geometry) => {
		geometry["geometry_types"] = ["point"];
	}),
);

// CRS.

define("valid", "crs_null", () =>
	withGeometry((geometry) => {
		geometry["crs"] = null;
	}),
);

define("valid", "crs_object", () =>
	withGeometry((geometry) => {
		geometry["crs"] = { id: { authority: "OGC", code: "CRS84" } };
	}),
);

define("invalid", "crs_string", () =>
	withGeometry((geometry) => {
		geometry["crs"] = "EPSG:4326";
	}),
);

// Bbox.

define("valid", "bbox_4_element", () =>
	withGeometry((geometry) => {
		geometry["bbox"] = [0, 0, 0, 0];
	}),
);

define("valid", "bbox_6_element", () =>
	withGeometry((geometry) => {
		geometry["bbox"] = [0.5, 0.5, 0.5, 0.5, 0.5, 0.5];
	}),
);

for (const length of [3, 5, 7]) {
	define("invalid", `bbox_${length}_element`, () =>
		withGeometry((geometry) => {
			geometry["bbox"] = new Array<JsonValue>(length).fill(0);
		}),
	);
}

define("invalid", "bbox_invalid_type", () =>
	withGeometry((geometry) => {
		geometry["bbox"] = ["0", "0", "0", "0"];
	}),
);

// Orientation.

define("valid", "orientation", () =>
	withGeometry((geometry) => {
		geometry["orientation"] = "counterclockwise";
	}),
);

define("invalid", "orientation", () =>
	withGeometry((geometry) => {
		geometry["orientation"] = "clockwise";
	}),
);

// Edges.

define("valid", "edges_planar", () =>
	withGeometry((geometry) => {
		geometry["edges"] = "planar";
	}),
);

define("valid", "edges_spherical", () =>
	withGeometry((geometry) => {
		geometry["edges"] = "spherical";
	}),
);

define("invalid", "edges", () =>
	withGeometry((geometry) => {
		geometry["edges"] = "ellipsoid";
	}),
);

// Epoch.

define("valid", "epoch", () =>
	withGeometry((geometry) => {
		geometry["epoch"] = 2015.1;
	}),
);

define("invalid", "epoch_string", () =>
	withGeometry((geometry) => {
		geometry["epoch"] = "2015.1";
	}),
);

const catalog: readonly FixtureCase[] = Object.freeze(cases);

/**
 * Every fixture, in definition order.
 */
export function allCases(): readonly FixtureCase[] {
	return catalog;
}

/**
 * Fixtures that must produce no violations.
 */
export function validCases(): FixtureCase[] {
	return catalog.filter((fixture) => fixture.expectation === "valid");
}

/**
 * Fixtures that must produce at least one violation.
 */
export function invalidCases(): FixtureCase[] {
	return catalog.filter((fixture) => fixture.expectation === "invalid");
}

/**
 * Look up a fixture. Names are unique per expectation only
 * (e.g. `orientation` exists as both).
 */
export function getCase(expectation: FixtureExpectation, name: string): FixtureCase | undefined {
	return catalog.find((fixture) => fixture.expectation === expectation && fixture.name === name);
}

function deepFreeze<T>(value: T): T {
	if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
		Object.freeze(value);
		for (const member of Object.values(value)) {
			deepFreeze(member);
		}
	}
	return value;
}
