import { describe, expect, it } from "vitest";

import {
	AppError,
	ConflictError,
	NotFoundError,
	asAppError,
	isConstraintViolation,
	toSafeErrorResponse,
	writeError
} from "./errors";

class FakeSqliteError extends Error {
	constructor(message: string, public readonly code: string) {
		super(message);
	}
}

describe("errors", () => {
	it("wraps unknown throwables as INTERNAL_ERROR", () => {
		const e = asAppError(new Error("boom"));
		expect(e.code).toBe("INTERNAL_ERROR");
		expect(e.status).toBe(500);
		expect(e.message).toBe("boom");

		expect(asAppError("nope")).toMatchObject({ code: "INTERNAL_ERROR", message: "Unknown error", details: "nope" });
	});

	it("passes AppErrors through", () => {
		const nf = new NotFoundError("ValueType", 1);
		expect(asAppError(nf)).toBe(nf);
	});

	it("recognizes sqlite constraint codes", () => {
		expect(isConstraintViolation(new FakeSqliteError("x", "SQLITE_CONSTRAINT_PRIMARYKEY"))).toBe(true);
		expect(isConstraintViolation(new FakeSqliteError("x", "SQLITE_BUSY"))).toBe(false);
		expect(isConstraintViolation(new Error("x"))).toBe(false);
	});

	it("maps write failures by driver code", () => {
		const conflict = writeError("insertValue failed", { time: 1 }, new FakeSqliteError("UNIQUE", "SQLITE_CONSTRAINT_UNIQUE"));
		expect(conflict).toBeInstanceOf(ConflictError);
		expect(conflict.details).toEqual({ time: 1, sqliteCode: "SQLITE_CONSTRAINT_UNIQUE" });

		const busy = writeError("insertValue failed", { time: 1 }, new FakeSqliteError("locked", "SQLITE_BUSY"));
		expect(busy.code).toBe("DB_ERROR");
		expect(busy.cause).toBeInstanceOf(FakeSqliteError);
	});

	it("renders a safe response without details", () => {
		const res = toSafeErrorResponse(new NotFoundError("DeviceType", 12));
		expect(res).toEqual({
			status: 404,
			body: { error: { code: "NOT_FOUND", message: "DeviceType with id 12 not found" } }
		});

		expect(toSafeErrorResponse(new AppError({ code: "CONFLICT", status: 409, message: "taken" })).status).toBe(409);
	});
});
