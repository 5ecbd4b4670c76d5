export type ErrorCode =
	| "CONFIG_ERROR"
	| "DB_ERROR"
	| "BAD_REQUEST"
	| "NOT_FOUND"
	| "MULTIPLE_RESULTS"
	| "CONFLICT"
	| "INTERNAL_ERROR";

export class AppError extends Error {
	public readonly code: ErrorCode;
	public readonly status: number;
	public readonly details?: unknown;

	constructor(params: { code: ErrorCode; message: string; status: number; details?: unknown; cause?: unknown }) {
		super(params.message, params.cause !== undefined ? { cause: params.cause } : undefined);
		this.name = "AppError";
		this.code = params.code;
		this.status = params.status;
		this.details = params.details;
	}
}

/** A lookup by key matched no row. */
export class NotFoundError extends AppError {
	constructor(entity: string, id: number) {
		super({
			code: "NOT_FOUND",
			status: 404,
			message: `${entity} with id ${id} not found`,
			details: { entity, id }
		});
		this.name = "NotFoundError";
	}
}

/**
 * A lookup by a key that is supposed to be unique matched more than one row.
 * The primary key constraint should make this impossible, so it is reported as a server fault.
 */
export class MultipleResultsError extends AppError {
	constructor(entity: string, id: number, count: number) {
		super({
			code: "MULTIPLE_RESULTS",
			status: 500,
			message: `${entity} with id ${id} matched ${count} rows`,
			details: { entity, id, count }
		});
		this.name = "MultipleResultsError";
	}
}

/** A write violated a uniqueness or integrity constraint and was rolled back. */
export class ConflictError extends AppError {
	constructor(message: string, details?: unknown, cause?: unknown) {
		super({
			code: "CONFLICT",
			status: 409,
			message,
			details,
			cause
		});
		this.name = "ConflictError";
	}
}

export function asAppError(err: unknown): AppError {
	if (err instanceof AppError) {
		return err;
	}

	if (err instanceof Error) {
		return new AppError({
			code: "INTERNAL_ERROR",
			status: 500,
			message: err.message,
			cause: err
		});
	}

	return new AppError({
		code: "INTERNAL_ERROR",
		status: 500,
		message: "Unknown error",
		details: err
	});
}

export function configError(message: string, details?: unknown): AppError {
	return new AppError({
		code: "CONFIG_ERROR",
		status: 500,
		message,
		details
	});
}

export function dbError(message: string, details?: unknown, cause?: unknown): AppError {
	return new AppError({
		code: "DB_ERROR",
		status: 500,
		message,
		details,
		cause
	});
}

export function badRequest(message: string, details?: unknown): AppError {
	return new AppError({
		code: "BAD_REQUEST",
		status: 400,
		message,
		details
	});
}

function sqliteCode(err: unknown): string | undefined {
	if (err instanceof Error && "code" in err && typeof err.code === "string") {
		return err.code;
	}
	return undefined;
}

export function isConstraintViolation(err: unknown): boolean {
	return sqliteCode(err)?.startsWith("SQLITE_CONSTRAINT") ?? false;
}

/**
 * Translate a failure thrown from inside a write transaction.
 * Constraint violations become ConflictError, other driver errors DB_ERROR; AppErrors pass through.
 */
export function writeError(message: string, details: unknown, err: unknown): AppError {
	if (err instanceof AppError) {
		return err;
	}
	if (isConstraintViolation(err)) {
		return new ConflictError(message, { ...toRecord(details), sqliteCode: sqliteCode(err) }, err);
	}
	return dbError(message, details, err);
}

function toRecord(details: unknown): Record<string, unknown> {
	return details !== null && typeof details === "object" ? { ...details } : { details };
}

export function toSafeErrorResponse(err: unknown): { status: number; body: { error: { code: ErrorCode; message: string } } } {
	const e = asAppError(err);

	// Internal details (SQL, driver codes) stay in the logs
	return {
		status: e.status,
		body: {
			error: {
				code: e.code,
				message: e.message
			}
		}
	};
}
