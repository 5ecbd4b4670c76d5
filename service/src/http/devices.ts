import { DeviceTypeBodySchema } from "@measurement-hub/common";
import type { MeasurementStore } from "@measurement-hub/store";

import { json, type EndpointHandler } from "./endpoint";
import { parseBody, requirePathInt } from "./query";

// GET /device
export function listDevices(store: MeasurementStore): EndpointHandler {
	return () => json(200, store.listDeviceTypes());
}

// GET /device/{id}
export function getDevice(store: MeasurementStore): EndpointHandler {
	return ({ req }) => json(200, store.getDeviceType(requirePathInt(req, "id")));
}

// PUT /device/{id}  body: { name?, location? }
export function putDevice(store: MeasurementStore): EndpointHandler {
	return ({ req, log }) => {
		const id = requirePathInt(req, "id");
		const body = parseBody(req, DeviceTypeBodySchema);

		const stored = store.upsertDeviceType(id, body.name, body.location);
		log.info("device.put: id=%d name=%s location=%s", stored.id, stored.name, stored.location);
		return json(200, stored);
	};
}
