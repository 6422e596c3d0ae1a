import { mkdir, writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import { formatCsv, toColumnName } from "../../utils/csv";

export type TableName = "player_innings" | "innings_summary" | "features";

/**
 * Receiver of finished rows
 */
export interface TableSink {
	writeRows<TRow extends object>(table: TableName, rows: readonly TRow[]): Promise<void>;
}

/**
 * Columns of a table, taken from the first row's fields
 */
export function tableColumns(rows: readonly object[]): string[] {
	const [first] = rows;
	return first ? Object.keys(first) : [];
}

export function toCsvTable(rows: readonly object[]): string {
	const fields = tableColumns(rows);
	const body = rows.map((row) => {
		const values = new Map<string, unknown>(Object.entries(row));
		return fields.map((field) => values.get(field));
	});
	return formatCsv([fields.map(toColumnName), ...body]);
}

/**
 * Writes `<table>.csv` and `<table>.jsonl` into one directory
 */
export class CsvTableSink implements TableSink {
	constructor(private readonly outputDir: string) {}

	async writeRows<TRow extends object>(table: TableName, rows: readonly TRow[]): Promise<void> {
		await mkdir(this.outputDir, { recursive: true });
		await writeFile(resolve(this.outputDir, `${table}.csv`), toCsvTable(rows), "utf-8");
		await writeFile(
			resolve(this.outputDir, `${table}.jsonl`),
			rows.map((row) => JSON.stringify(row)).join("\n"),
			"utf-8",
		);
	}

	pathFor(table: TableName, extension: "csv" | "jsonl" = "csv"): string {
		return resolve(this.outputDir, `${table}.${extension}`);
	}
}
