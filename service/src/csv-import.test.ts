import { Readable } from "node:stream";
import winston from "winston";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { MeasurementStore, openDb, type DbHandle } from "@measurement-hub/store";

import { importCsv, parseColumnMapping, parseTime } from "./csv-import";

const logger = winston.createLogger({ silent: true });

function csv(text: string): Readable {
	return Readable.from([Buffer.from(text)]);
}

describe("importCsv", () => {
	let handle: DbHandle;
	let store: MeasurementStore;

	beforeEach(() => {
		handle = openDb(":memory:");
		store = new MeasurementStore({ db: handle.db, logger });
	});

	afterEach(() => {
		handle.close();
	});

	it("inserts one value per mapped column and skips unreadable cells", async () => {
		const input = csv(
			"time,station,FFX,LT2\n" +
				"2023-11-06T00:00+00:00,16400,97.0,0.4\n" +
				"1699232400,16400,,0.5\n" +
				"yesterday,16400,1,1\n"
		);

		const result = await importCsv(
			store,
			input,
			{ timeColumn: "time", columns: new Map([["FFX", 1], ["LT2", 2]]) },
			logger
		);

		expect(result).toEqual({ rows: 3, inserted: 3, skipped: 3 });
		expect(store.listValues().map(v => [v.time, v.valueTypeId, v.value])).toEqual([
			[1699228800, 1, 97],
			[1699228800, 2, 0.4],
			[1699232400, 2, 0.5]
		]);
		expect(store.getValueType(2)).toEqual({ id: 2, name: "TYPE_2", unit: "UNIT_2" });
	});

	it("trims header names", async () => {
		const result = await importCsv(
			store,
			csv(" ts , temp \n10,21.5\n"),
			{ timeColumn: "ts", columns: new Map([["temp", 4]]) },
			logger
		);

		expect(result).toEqual({ rows: 1, inserted: 1, skipped: 0 });
		expect(store.listValues({ valueTypeId: 4 })).toEqual([{ id: 1, time: 10, value: 21.5, valueTypeId: 4 }]);
	});
});

describe("parseColumnMapping", () => {
	it("splits NAME=TYPE_ID", () => {
		expect(parseColumnMapping("FFX=1")).toEqual(["FFX", 1]);
		expect(parseColumnMapping("a=b=12")).toEqual(["a=b", 12]);
	});

	it("rejects malformed mappings", () => {
		expect(() => parseColumnMapping("=3")).toThrowError("Invalid column mapping '=3'");
		expect(() => parseColumnMapping("FFX=one")).toThrowError("expected NAME=TYPE_ID");
	});
});

describe("parseTime", () => {
	it("accepts unix seconds and ISO 8601", () => {
		expect(parseTime("1700000000")).toBe(1700000000);
		expect(parseTime("2023-11-06T00:00:30Z")).toBe(1699228830);
		expect(parseTime("not a time")).toBeUndefined();
	});
});
