import type { HttpResponse } from "./endpoint";

export type CsvValue = string | number | boolean | null | undefined | Date;

export interface CsvColumn<T> {
	header: string;
	accessor: (row: T) => CsvValue;
}

export interface CsvOptions {
	/** Leading UTF-8 byte order mark, default true (spreadsheet apps need it to detect UTF-8) */
	bom?: boolean;
	newline?: "\n" | "\r\n";
	delimiter?: string;
}

type CsvFormat = Required<CsvOptions>;

const BOM = "\uFEFF";

function resolveFormat(opts: CsvOptions = {}): CsvFormat {
	return { bom: true, newline: "\n", delimiter: ",", ...opts };
}

function cellText(v: CsvValue): string {
	switch (typeof v) {
		case "string":
			return v;
		case "number":
			return Number.isFinite(v) ? String(v) : "";
		case "boolean":
			return String(v);
		default:
			return v instanceof Date ? v.toISOString() : "";
	}
}

const NEEDS_QUOTING = /["\r\n]/;

function quote(text: string, delimiter: string): string {
	if (!NEEDS_QUOTING.test(text) && !text.includes(delimiter)) return text;
	return `"${text.replaceAll("\"", "\"\"")}"`;
}

function tableLines<T>(rows: readonly T[], columns: readonly CsvColumn<T>[], delimiter: string): string[] {
	const line = (cells: string[]) => cells.map(c => quote(c, delimiter)).join(delimiter);
	return [line(columns.map(c => c.header)), ...rows.map(row => line(columns.map(c => cellText(c.accessor(row)))))];
}

function finish(lines: readonly string[], format: CsvFormat): string {
	const text = lines.join(format.newline) + format.newline;
	return format.bom ? BOM + text : text;
}

/**
 * Render rows as CSV with a header line.
 */
export function toCsv<T>(rows: readonly T[], columns: readonly CsvColumn<T>[], opts?: CsvOptions): string {
	const format = resolveFormat(opts);
	return finish(tableLines(rows, columns, format.delimiter), format);
}

/**
 * Same as toCsv, preceded by one "# key: value" comment per meta entry and a blank line.
 */
export function toCsvWithMeta<T>(
	meta: Record<string, CsvValue>,
	rows: readonly T[],
	columns: readonly CsvColumn<T>[],
	opts?: CsvOptions
): string {
	const format = resolveFormat(opts);
	const comments = Object.entries(meta).map(([key, v]) => `# ${key}: ${cellText(v)}`);
	return finish([...comments, "", ...tableLines(rows, columns, format.delimiter)], format);
}

/**
 * Join the non-empty parts with "_" into a file name safe for Content-Disposition,
 * e.g. ["values", "type-1", "100"] -> "values_type-1_100.csv".
 */
export function makeCsvFilename(parts: readonly string[], ext = "csv"): string {
	const stem = parts
		.map(p => p.trim().replace(/\s+/g, "_").replace(/[^\w.-]/g, "-").slice(0, 128))
		.filter(p => p.length > 0)
		.join("_");
	return `${stem || "data"}.${ext}`;
}

export function csvResponse(body: string, filename = "data.csv"): HttpResponse {
	return {
		status: 200,
		headers: {
			"content-type": "text/csv; charset=utf-8",
			"content-disposition": `attachment; filename="${filename}"`
		},
		body
	};
}
