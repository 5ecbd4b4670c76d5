import { describe, expect, it } from "vitest";

import { csvResponse, makeCsvFilename, toCsv, type CsvColumn } from "./csv";

type Row = { label: string; reading: number | null };

const columns: CsvColumn<Row>[] = [
	{ header: "label", accessor: r => r.label },
	{ header: "reading", accessor: r => r.reading }
];

describe("toCsv", () => {
	it("quotes cells that contain delimiters or quotes", () => {
		const csv = toCsv([{ label: 'say "hi", then', reading: 1.5 }], columns, { bom: false });
		expect(csv).toBe('label,reading\n"say ""hi"", then",1.5\n');
	});

	it("writes blanks for null and non-finite numbers", () => {
		const csv = toCsv(
			[
				{ label: "a", reading: null },
				{ label: "b", reading: Number.NaN }
			],
			columns,
			{ bom: false, newline: "\r\n" }
		);
		expect(csv).toBe("label,reading\r\na,\r\nb,\r\n");
	});

	it("prefixes a BOM by default", () => {
		expect(toCsv([], columns).startsWith("\uFEFFlabel,reading")).toBe(true);
	});
});

describe("makeCsvFilename", () => {
	it("drops empty parts and sanitizes the rest", () => {
		expect(makeCsvFilename(["values", "type 1", "", "a/b"])).toBe("values_type_1_a-b.csv");
		expect(makeCsvFilename([])).toBe("data.csv");
	});
});

describe("csvResponse", () => {
	it("sets download headers", () => {
		expect(csvResponse("x\n", "v.csv").headers).toEqual({
			"content-type": "text/csv; charset=utf-8",
			"content-disposition": 'attachment; filename="v.csv"'
		});
	});
});
