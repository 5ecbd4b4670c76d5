export { MeasurementStore } from "./measurement-store";
export type { MeasurementStoreOptions } from "./measurement-store";

export { openDb, initDb } from "./sqlite";
export type { DbHandle } from "./sqlite";

export {
	AppError,
	NotFoundError,
	MultipleResultsError,
	ConflictError,
	asAppError,
	badRequest,
	configError,
	dbError,
	isConstraintViolation,
	toSafeErrorResponse
} from "./errors";
export type { ErrorCode } from "./errors";
