export const escapeCsvValue = (value: unknown): string => {
	if (value === null || value === undefined) return "";
	const raw = typeof value === "object" ? JSON.stringify(value) : String(value);
	if (raw.includes(",") || raw.includes("\n") || raw.includes('"')) {
		return `"${raw.replace(/"/g, '""')}"`;
	}
	return raw;
};

export const formatCsv = (rows: ReadonlyArray<readonly unknown[]>): string =>
	rows.map((row) => row.map((cell) => escapeCsvValue(cell)).join(",")).join("\n");

/**
 * camelCase field name to snake_case column name (`batFours` → `bat_fours`)
 */
export const toColumnName = (field: string): string =>
	field.replace(/([a-z])([A-Z0-9])/g, "$1_$2").toLowerCase();
