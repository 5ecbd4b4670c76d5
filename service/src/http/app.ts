import express, { type ErrorRequestHandler, type Express } from "express";
import type winston from "winston";

import { badRequest, type MeasurementStore } from "@measurement-hub/store";

import { errorResponse, httpEndpoint, json, send } from "./endpoint";
import { getDevice, listDevices, putDevice } from "./devices";
import { getValues, postValue } from "./values";
import { getValueType, listValueTypes, putValueType } from "./value-types";

export interface AppDeps {
	store: MeasurementStore;
	logger: winston.Logger;
}

export const API_DESCRIPTION = {
	name: "measurement-hub",
	version: "1",
	endpoints: [
		"GET /type",
		"GET /type/{id}",
		"PUT /type/{id}",
		"GET /device",
		"GET /device/{id}",
		"PUT /device/{id}",
		"GET /value?type_id&start&end&format",
		"POST /value"
	]
} as const;

/**
 * Build the HTTP route layer on top of an already constructed store.
 * Routes accept an optional trailing slash.
 */
export function createApp({ store, logger }: AppDeps): Express {
	const app = express();
	app.disable("x-powered-by");
	app.use(express.json());

	app.get("/", httpEndpoint("root.get", logger, () => json(200, API_DESCRIPTION)));

	app.get("/type", httpEndpoint("type.list", logger, listValueTypes(store)));
	app.get("/type/:id", httpEndpoint("type.get", logger, getValueType(store)));
	app.put("/type/:id", httpEndpoint("type.put", logger, putValueType(store)));

	app.get("/device", httpEndpoint("device.list", logger, listDevices(store)));
	app.get("/device/:id", httpEndpoint("device.get", logger, getDevice(store)));
	app.put("/device/:id", httpEndpoint("device.put", logger, putDevice(store)));

	app.get("/value", httpEndpoint("value.get", logger, getValues(store)));
	app.post("/value", httpEndpoint("value.post", logger, postValue(store)));

	app.use((req, res) => {
		send(res, json(404, { error: { code: "NOT_FOUND", message: `No route for ${req.method} ${req.path}` } }));
	});

	// Reached for body parser failures (malformed JSON, oversized payloads)
	const onError: ErrorRequestHandler = (err, _req, res, _next) => {
		const status = typeof err?.status === "number" ? err.status : 500;
		const mapped = status < 500 ? badRequest(err instanceof Error ? err.message : "Invalid request") : err;
		send(res, errorResponse("http", logger, mapped));
	};
	app.use(onError);

	return app;
}
