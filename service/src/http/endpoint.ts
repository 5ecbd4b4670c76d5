// Shared helpers for the Express endpoints.
//
// Goals:
// - Remove repetitive boilerplate from endpoints (logger + consistent errors)
// - Keep endpoint handlers focused on: parse params -> call the store -> shape response (json/csv)

import type { Request, RequestHandler, Response } from "express";
import type winston from "winston";

import { AppError, toSafeErrorResponse } from "@measurement-hub/store";

import { wantsCsv } from "./query";

export type HttpResponse = {
	status: number;
	headers?: Record<string, string>;
	jsonBody?: unknown;
	body?: string;
};

export type EndpointArgs = {
	req: Request;
	log: winston.Logger;
	asCsv: boolean;
};

export type EndpointHandler = (args: EndpointArgs) => HttpResponse;

export function json(status: number, body: unknown): HttpResponse {
	return {
		status,
		jsonBody: body
	};
}

function describeError(err: unknown): { name: string; message: string; stack?: string; code?: unknown } {
	const e = err instanceof Error ? err : new Error(String(err));
	return {
		name: e.name,
		message: e.message,
		stack: e.stack,
		code: "code" in e ? e.code : undefined
	};
}

export function send(res: Response, out: HttpResponse): void {
	res.status(out.status);
	for (const [k, v] of Object.entries(out.headers ?? {})) {
		res.setHeader(k, v);
	}
	if (out.jsonBody !== undefined) {
		res.json(out.jsonBody);
		return;
	}
	res.send(out.body ?? "");
}

/**
 * Map any thrown value to a response.
 * AppErrors keep their status and code; anything else becomes an opaque 500.
 */
export function errorResponse(name: string, log: winston.Logger, err: unknown): HttpResponse {
	if (err instanceof AppError) {
		const safe = toSafeErrorResponse(err);
		if (safe.status >= 500) {
			log.error("%s: %s %s", name, err.code, err.message);
		} else {
			log.info("%s: %s %s", name, err.code, err.message);
		}
		return json(safe.status, safe.body);
	}

	log.error("%s: unhandled error %j", name, describeError(err));
	return json(500, { error: { code: "INTERNAL_ERROR", message: "Request failed" } });
}

/**
 * Wrap a handler with the logger and consistent error -> response mapping.
 */
export function httpEndpoint(name: string, log: winston.Logger, handler: EndpointHandler): RequestHandler {
	return (req, res) => {
		let out: HttpResponse;
		try {
			out = handler({ req, log, asCsv: wantsCsv(req) });
		} catch (err) {
			out = errorResponse(name, log, err);
		}
		send(res, out);
	};
}
