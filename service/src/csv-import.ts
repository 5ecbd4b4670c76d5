import type { Readable } from "node:stream";
import csvParser from "csv-parser";
import type winston from "winston";
import { z } from "zod";

import type { MeasurementStore } from "@measurement-hub/store";

export interface CsvImportOptions {
	/** Column holding the timestamp: ISO 8601 or integer unix seconds */
	timeColumn: string;
	/** CSV column name -> value type id */
	columns: ReadonlyMap<string, number>;
}

export interface CsvImportResult {
	rows: number;
	inserted: number;
	skipped: number;
}

const RowSchema = z.record(z.string(), z.string());

/** Parse "NAME=TYPE_ID" as given on the command line. */
export function parseColumnMapping(mapping: string): [string, number] {
	const idx = mapping.lastIndexOf("=");
	const name = idx > 0 ? mapping.slice(0, idx).trim() : "";
	const rawId = idx > 0 ? mapping.slice(idx + 1).trim() : "";
	if (!name || !/^-?\d+$/.test(rawId)) {
		throw new Error(`Invalid column mapping '${mapping}' (expected NAME=TYPE_ID)`);
	}
	return [name, Number.parseInt(rawId, 10)];
}

/** Unix seconds from an integer string or an ISO 8601 timestamp. */
export function parseTime(raw: string): number | undefined {
	const s = raw.trim();
	if (/^-?\d+$/.test(s)) return Number.parseInt(s, 10);

	const ms = Date.parse(s);
	if (Number.isNaN(ms)) return undefined;
	return Math.floor(ms / 1000);
}

function parseNumber(raw: string | undefined): number | undefined {
	if (raw === undefined) return undefined;
	const s = raw.trim();
	if (s === "") return undefined;
	const n = Number(s);
	return Number.isFinite(n) ? n : undefined;
}

/**
 * Append every mapped cell of a CSV stream as a measurement.
 * Cells that are empty or not numeric, and rows with an unreadable timestamp, are skipped and counted.
 */
export async function importCsv(
	store: MeasurementStore,
	input: Readable,
	opts: CsvImportOptions,
	logger: winston.Logger
): Promise<CsvImportResult> {
	const result: CsvImportResult = { rows: 0, inserted: 0, skipped: 0 };
	const parser = input.pipe(csvParser({ mapHeaders: ({ header }) => header.trim() }));

	for await (const raw of parser) {
		const row = RowSchema.parse(raw);
		result.rows += 1;

		const rawTime = row[opts.timeColumn];
		const time = rawTime === undefined ? undefined : parseTime(rawTime);
		if (time === undefined) {
			logger.warn("CSV row %d: unreadable %s '%s', skipping", result.rows, opts.timeColumn, rawTime ?? "");
			result.skipped += opts.columns.size;
			continue;
		}

		for (const [column, valueTypeId] of opts.columns) {
			const value = parseNumber(row[column]);
			if (value === undefined) {
				result.skipped += 1;
				continue;
			}
			store.insertValue(time, valueTypeId, value);
			result.inserted += 1;
		}
	}

	logger.info("CSV import: rows=%d inserted=%d skipped=%d", result.rows, result.inserted, result.skipped);
	return result;
}
