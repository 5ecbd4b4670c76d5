import { ValueBodySchema, type Value } from "@measurement-hub/common";
import type { MeasurementStore } from "@measurement-hub/store";

import { csvResponse, makeCsvFilename, toCsvWithMeta, type CsvColumn } from "./csv";
import { json, type EndpointHandler } from "./endpoint";
import { getInt, parseBody } from "./query";

type ValueDto = {
	id: number;
	time: number;
	value: number;
	value_type_id: number;
};

function toDto(v: Value): ValueDto {
	return {
		id: v.id,
		time: v.time,
		value: v.value,
		value_type_id: v.valueTypeId
	};
}

const CSV_COLUMNS: readonly CsvColumn<ValueDto>[] = [
	{ header: "id", accessor: r => r.id },
	{ header: "time", accessor: r => r.time },
	{ header: "value", accessor: r => r.value },
	{ header: "value_type_id", accessor: r => r.value_type_id }
];

// GET /value?type_id&start&end[&format=csv]
//
// All filters are optional; start/end are inclusive unix timestamps.
// An inverted range simply matches nothing.
export function getValues(store: MeasurementStore): EndpointHandler {
	return ({ req, log, asCsv }) => {
		const valueTypeId = getInt(req, "type_id");
		const start = getInt(req, "start");
		const end = getInt(req, "end");

		const items = store.listValues({ valueTypeId, start, end }).map(toDto);
		log.debug("value.get: type_id=%s start=%s end=%s -> %d rows", valueTypeId, start, end, items.length);

		if (asCsv) {
			const meta = { type_id: valueTypeId, start, end, count: items.length };
			const filename = makeCsvFilename([
				"values",
				valueTypeId !== undefined ? `type-${valueTypeId}` : "",
				start !== undefined ? String(start) : "",
				end !== undefined ? String(end) : ""
			]);
			return csvResponse(toCsvWithMeta(meta, items, CSV_COLUMNS), filename);
		}

		return json(200, items);
	};
}

// POST /value  body: { time, value_type_id, value }
//
// An unknown value_type_id is created with default name/unit.
export function postValue(store: MeasurementStore): EndpointHandler {
	return ({ req }) => {
		const body = parseBody(req, ValueBodySchema);
		store.insertValue(body.time, body.value_type_id, body.value);
		return json(201, { status: "created" });
	};
}
