import type Database from "better-sqlite3";
import type winston from "winston";

import type { DeviceType, Value, ValueFilter, ValueType } from "@measurement-hub/common";

import { ConflictError, MultipleResultsError, NotFoundError, badRequest, writeError } from "./errors";
import { Sql } from "./sql";
import { initDb } from "./sqlite";

export interface MeasurementStoreOptions {
	db: Database.Database;
	logger: winston.Logger;
}

interface Statements {
	selectValueType: Database.Statement<[number], ValueType>;
	selectValueTypes: Database.Statement<[], ValueType>;
	insertValueType: Database.Statement<[ValueType], void>;
	updateValueType: Database.Statement<[ValueType], void>;
	selectDeviceType: Database.Statement<[number], DeviceType>;
	selectDeviceTypes: Database.Statement<[], DeviceType>;
	insertDeviceType: Database.Statement<[DeviceType], void>;
	updateDeviceType: Database.Statement<[DeviceType], void>;
	insertValue: Database.Statement<[Omit<Value, "id">], void>;
}

/**
 * Supplied non-empty value wins, then whatever is stored, then the synthesized default.
 * An empty string counts as "not supplied".
 */
function pick(supplied: string | undefined, stored: string | undefined, fallback: string): string {
	if (supplied) return supplied;
	if (stored) return stored;
	return fallback;
}

function requireInteger(name: string, n: number): void {
	if (!Number.isSafeInteger(n)) {
		throw badRequest(`${name} must be an integer`, { [name]: n });
	}
}

function expectOne<T>(rows: readonly T[], entity: string, id: number): T {
	if (rows.length === 0) {
		throw new NotFoundError(entity, id);
	}
	if (rows.length > 1) {
		throw new MultipleResultsError(entity, id, rows.length);
	}
	return rows[0];
}

/**
 * Persistence core: dimension upserts, measurement appends and filtered reads.
 *
 * Every public method runs in its own transaction. Writes use BEGIN IMMEDIATE so that
 * concurrent writers on the same file serialize instead of racing between read and insert.
 */
export class MeasurementStore {
	private readonly db: Database.Database;
	private readonly logger: winston.Logger;
	private readonly stmt: Statements;

	constructor(opts: MeasurementStoreOptions) {
		this.db = opts.db;
		this.logger = opts.logger;

		initDb(this.db);

		this.stmt = {
			selectValueType: this.db.prepare<[number], ValueType>(Sql.selectValueTypeById),
			selectValueTypes: this.db.prepare<[], ValueType>(Sql.selectAllValueTypes),
			insertValueType: this.db.prepare<[ValueType], void>(Sql.insertValueType),
			updateValueType: this.db.prepare<[ValueType], void>(Sql.updateValueType),
			selectDeviceType: this.db.prepare<[number], DeviceType>(Sql.selectDeviceTypeById),
			selectDeviceTypes: this.db.prepare<[], DeviceType>(Sql.selectAllDeviceTypes),
			insertDeviceType: this.db.prepare<[DeviceType], void>(Sql.insertDeviceType),
			updateDeviceType: this.db.prepare<[DeviceType], void>(Sql.updateDeviceType),
			insertValue: this.db.prepare<[Omit<Value, "id">], void>(Sql.insertValue)
		};
	}

	/* ---------- dimensions ---------- */

	upsertValueType(id: number, name?: string, unit?: string): ValueType {
		requireInteger("id", id);
		return this.write("upsertValueType", { id }, () => this.resolveValueType(id, name, unit));
	}

	upsertDeviceType(id: number, name?: string, location?: string): DeviceType {
		requireInteger("id", id);
		return this.write("upsertDeviceType", { id }, () => {
			const existing = this.stmt.selectDeviceType.all(id)[0];
			const next: DeviceType = {
				id,
				name: pick(name, existing?.name, `DEVICE_TYPE_${id}`),
				location: pick(location, existing?.location, `DEVICE_LOCATION_${id}`)
			};

			if (!existing) {
				this.stmt.insertDeviceType.run(next);
				this.logger.debug("Created device type id=%d name=%s location=%s", id, next.name, next.location);
			} else if (existing.name !== next.name || existing.location !== next.location) {
				this.stmt.updateDeviceType.run(next);
				this.logger.debug("Updated device type id=%d name=%s location=%s", id, next.name, next.location);
			}
			return next;
		});
	}

	/* ---------- facts ---------- */

	insertValue(time: number, valueTypeId: number, value: number): void {
		requireInteger("time", time);
		requireInteger("valueTypeId", valueTypeId);
		if (!Number.isFinite(value)) {
			throw badRequest("value must be a finite number", { value: String(value) });
		}

		this.write("insertValue", { time, valueTypeId }, () => {
			// Unknown types are created with synthesized defaults in the same transaction
			this.resolveValueType(valueTypeId);
			this.stmt.insertValue.run({ time, value, valueTypeId });
		});

		this.logger.debug("Inserted value: time=%d valueTypeId=%d value=%s", time, valueTypeId, String(value));
	}

	/* ---------- reads ---------- */

	listValues(filter: ValueFilter = {}): Value[] {
		const where: string[] = [];
		const params: number[] = [];

		if (filter.valueTypeId !== undefined) {
			where.push("vt.id = ?");
			params.push(filter.valueTypeId);
		}
		if (filter.start !== undefined) {
			where.push("v.time >= ?");
			params.push(filter.start);
		}
		if (filter.end !== undefined) {
			where.push("v.time <= ?");
			params.push(filter.end);
		}

		const sql = Sql.buildSelectValues(where, filter.valueTypeId !== undefined);
		this.logger.debug("listValues: filter=%j", filter);

		return this.db.prepare<number[], Value>(sql).all(...params);
	}

	getValueType(id: number): ValueType {
		return expectOne(this.stmt.selectValueType.all(id), "ValueType", id);
	}

	getDeviceType(id: number): DeviceType {
		return expectOne(this.stmt.selectDeviceType.all(id), "DeviceType", id);
	}

	listValueTypes(): ValueType[] {
		return this.stmt.selectValueTypes.all();
	}

	listDeviceTypes(): DeviceType[] {
		return this.stmt.selectDeviceTypes.all();
	}

	/* ---------- internals ---------- */

	// Must run inside a transaction opened by write()
	private resolveValueType(id: number, name?: string, unit?: string): ValueType {
		const existing = this.stmt.selectValueType.all(id)[0];
		const next: ValueType = {
			id,
			name: pick(name, existing?.name, `TYPE_${id}`),
			unit: pick(unit, existing?.unit, `UNIT_${id}`)
		};

		if (!existing) {
			this.stmt.insertValueType.run(next);
			this.logger.debug("Created value type id=%d name=%s unit=%s", id, next.name, next.unit);
		} else if (existing.name !== next.name || existing.unit !== next.unit) {
			this.stmt.updateValueType.run(next);
			this.logger.debug("Updated value type id=%d name=%s unit=%s", id, next.name, next.unit);
		}
		return next;
	}

	private write<T>(op: string, details: Record<string, unknown>, fn: () => T): T {
		try {
			return this.db.transaction(fn).immediate();
		} catch (err) {
			const e = writeError(`${op} failed`, details, err);
			if (e instanceof ConflictError) {
				this.logger.error("%s: integrity violation, rolled back (%s)", op, err instanceof Error ? err.message : String(err));
			}
			throw e;
		}
	}
}
