export const DEFAULT_VALUE_KEYWORDS: readonly string[] = [
	"close",
	"price",
	"settle",
	"value",
];

export const normalizeColumnName = (name: string): string =>
	name.trim().toLowerCase();

/**
 * Ordered keyword list deciding which column becomes the canonical value.
 * The preferred column goes first unless it is blank.
 */
export const createValueColumnPolicy = (
	preferred?: string
): readonly string[] => {
	const keywords = [...DEFAULT_VALUE_KEYWORDS];
	const normalized = preferred ? normalizeColumnName(preferred) : "";
	if (normalized) {
		const existing = keywords.indexOf(normalized);
		if (existing !== -1) {
			keywords.splice(existing, 1);
		}
		keywords.unshift(normalized);
	}
	return Object.freeze(keywords);
};

/**
 * First keyword that is both a schema column and a parsed value.
 */
export const selectValueColumn = (
	policy: readonly string[],
	schema: readonly string[],
	values: ReadonlyMap<string, number>
): string | null => {
	for (const keyword of policy) {
		if (schema.includes(keyword) && values.has(keyword)) {
			return keyword;
		}
	}
	return null;
};
