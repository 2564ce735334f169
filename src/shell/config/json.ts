// CHANGE: JSON value model and type guards shared by the config and corpus loaders
// WHY: Parsed JSON is narrowed field by field instead of cast to the target type
// PURITY: CORE (helpers used by SHELL)
// INVARIANT: Guards never throw
// COMPLEXITY: O(1) per guard

/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| readonly JSONValue[]
	| { readonly [key: string]: JSONValue };

export type JSONObject = { readonly [key: string]: JSONValue };

/**
 * Type guard to check if value is a JSON object.
 *
 * @param value Value to check
 * @returns True if value is a non-null object
 */
export function isJSONObject(value: JSONValue): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isString(value: JSONValue): value is string {
	return typeof value === "string";
}

export function isNumber(value: JSONValue): value is number {
	return typeof value === "number";
}

export function isBoolean(value: JSONValue): value is boolean {
	return typeof value === "boolean";
}

export function isArray(value: JSONValue): value is readonly JSONValue[] {
	return Array.isArray(value);
}

/**
 * Parse text as JSON.
 *
 * @throws SyntaxError on malformed input
 */
export function parseJSON(text: string): JSONValue {
	// JSON.parse is typed as any; JSONValue is exactly what it can return
	const parsed: JSONValue = JSON.parse(text);
	return parsed;
}
