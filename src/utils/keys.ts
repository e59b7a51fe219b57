/**
 * Hash keys for scalar values and rows.
 *
 * Values of different JS types never collide: `1`, `1n`, `"1"` and `true`
 * all produce distinct keys. String keys carry their length, so a string
 * holding the separator cannot shift a field boundary in a row key.
 */

type KeyScalar = number | bigint | boolean | string;

/** Field separator for composite row keys */
const SEPARATOR = "\u001f";

export function scalarKey(value: KeyScalar | null): string {
	if (value === null) return "z";
	switch (typeof value) {
		case "number":
			return `n${value}`;
		case "bigint":
			return `b${value}`;
		case "boolean":
			return value ? "t" : "f";
		default:
			return `s${value.length}:${value}`;
	}
}

/** Key for a tuple of values, e.g. a composite join key */
export function rowKey(values: readonly (KeyScalar | null)[]): string {
	return values.map(scalarKey).join(SEPARATOR);
}
