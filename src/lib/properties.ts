export interface PropertySource {
	getProperty(key: string): string | undefined;
}

export function flattenProperties(
	value: unknown,
	prefix = "",
	out: Record<string, string> = {},
): Record<string, string> {
	if (value === null || value === undefined) return out;
	if (typeof value === "object" && !Array.isArray(value)) {
		for (const [k, v] of Object.entries(value)) {
			flattenProperties(v, prefix ? `${prefix}.${k}` : k, out);
		}
		return out;
	}
	if (prefix) out[prefix] = Array.isArray(value) ? value.join(",") : String(value);
	return out;
}

/** A fixed source over a (possibly nested) record, keyed by dotted paths. */
export function createPropertySource(
	values: Record<string, unknown>,
	prefix = "",
): PropertySource {
	const flat = flattenProperties(values, prefix);
	return {
		getProperty(key) {
			return Object.hasOwn(flat, key) ? flat[key] : undefined;
		},
	};
}
