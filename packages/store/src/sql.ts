/**
 * SQL statements used by the measurement store.
 */

export const Sql = {
	selectValueTypeById: "SELECT id, name, unit FROM value_type WHERE id = ?",

	selectAllValueTypes: "SELECT id, name, unit FROM value_type ORDER BY id ASC",

	insertValueType: "INSERT INTO value_type (id, name, unit) VALUES (@id, @name, @unit)",

	updateValueType: "UPDATE value_type SET name = @name, unit = @unit WHERE id = @id",

	selectDeviceTypeById: "SELECT id, name, location FROM device_type WHERE id = ?",

	selectAllDeviceTypes: "SELECT id, name, location FROM device_type ORDER BY id ASC",

	insertDeviceType: "INSERT INTO device_type (id, name, location) VALUES (@id, @name, @location)",

	updateDeviceType: "UPDATE device_type SET name = @name, location = @location WHERE id = @id",

	/**
	 * Appends a measurement. There is deliberately no uniqueness constraint on
	 * (time, value_type_id, value): identical samples are stored twice.
	 */
	insertValue: "INSERT INTO value (time, value, value_type_id) VALUES (@time, @value, @valueTypeId)",

	/**
	 * Build the filtered value query.
	 *
	 * @param where  Conditions joined with AND; empty for an unfiltered read.
	 * @param joinType  Join value_type so the type filter goes through the dimension table.
	 */
	buildSelectValues(where: readonly string[], joinType: boolean): string {
		const join = joinType ? "JOIN value_type vt ON vt.id = v.value_type_id" : "";
		const clause = where.length ? `WHERE ${where.join(" AND ")}` : "";
		return `SELECT
			v.id,
			v.time,
			v.value,
			v.value_type_id AS valueTypeId
		FROM value v
		${join}
		${clause}
		ORDER BY v.time ASC, v.id ASC`;
	}
} as const;
