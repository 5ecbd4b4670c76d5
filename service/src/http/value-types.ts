import { ValueTypeBodySchema } from "@measurement-hub/common";
import type { MeasurementStore } from "@measurement-hub/store";

import { json, type EndpointHandler } from "./endpoint";
import { parseBody, requirePathInt } from "./query";

// GET /type
export function listValueTypes(store: MeasurementStore): EndpointHandler {
	return () => json(200, store.listValueTypes());
}

// GET /type/{id}
export function getValueType(store: MeasurementStore): EndpointHandler {
	return ({ req }) => json(200, store.getValueType(requirePathInt(req, "id")));
}

// PUT /type/{id}  body: { name?, unit? }
//
// Creates the type when it does not exist; omitted or empty fields keep their stored value.
export function putValueType(store: MeasurementStore): EndpointHandler {
	return ({ req, log }) => {
		const id = requirePathInt(req, "id");
		const body = parseBody(req, ValueTypeBodySchema);

		const stored = store.upsertValueType(id, body.name, body.unit);
		log.info("type.put: id=%d name=%s unit=%s", stored.id, stored.name, stored.unit);
		return json(200, stored);
	};
}
