//
// Small utilities for parsing path and query parameters of Express requests.
//
// Goals:
// - Centralize parsing/validation of the integer params the API takes (id, type_id, start, end)
// - Provide a consistent way to support `format=csv` (and Accept: text/csv)
// - Turn malformed input into BAD_REQUEST errors before it reaches the store

import type { Request } from "express";
import type { ZodType, ZodTypeDef } from "zod";

import { badRequest } from "@measurement-hub/store";

/** Read a single query param; repeated params (`?a=1&a=2`) are rejected. */
export function getQueryParam(req: Request, key: string): string | undefined {
	const v = req.query[key];
	if (v === undefined) return undefined;
	if (typeof v !== "string") throw badRequest(`Query parameter '${key}' must be given once`);
	return v;
}

export function getString(req: Request, key: string): string | undefined {
	const v = getQueryParam(req, key);
	if (v === undefined) return undefined;
	const trimmed = v.trim();
	return trimmed.length ? trimmed : undefined;
}

function parseInteger(raw: string, key: string): number {
	if (!/^-?\d+$/.test(raw)) throw badRequest(`Invalid integer for '${key}'`);
	const n = Number.parseInt(raw, 10);
	if (!Number.isSafeInteger(n)) throw badRequest(`Invalid integer for '${key}'`);
	return n;
}

export function getInt(req: Request, key: string): number | undefined {
	const v = getString(req, key);
	if (v === undefined) return undefined;
	return parseInteger(v, key);
}

export function requirePathInt(req: Request, key: string): number {
	const v = req.params[key];
	if (v === undefined || v.trim() === "") throw badRequest(`Missing route parameter: ${key}`);
	return parseInteger(v.trim(), key);
}

/**
 * Validate a JSON body against a zod schema.
 */
export function parseBody<T>(req: Request, schema: ZodType<T, ZodTypeDef, unknown>): T {
	const res = schema.safeParse(req.body ?? {});
	if (!res.success) {
		const issues = res.error.issues
			.slice(0, 5)
			.map(i => `${i.path.map(String).join(".") || "<root>"}: ${i.message}`)
			.join("; ");
		throw badRequest(`Invalid request body: ${issues}`);
	}
	return res.data;
}

/**
 * Should the response be CSV?
 * - `?format=csv` OR
 * - `Accept: text/csv`
 */
export function wantsCsv(req: Request): boolean {
	const format = getString(req, "format")?.toLowerCase();
	if (format === "csv") return true;

	const accept = (req.get("accept") ?? "").toLowerCase();
	return accept.includes("text/csv");
}
