import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";

export interface DbHandle {
	db: Database.Database;
	close: () => void;
}

const MEMORY = ":memory:";

function ensureDir(p: string): void {
	fs.mkdirSync(p, { recursive: true });
}

export function openDb(sqlitePath: string): DbHandle {
	if (sqlitePath !== MEMORY) {
		ensureDir(path.dirname(sqlitePath));
	}

	const db = new Database(sqlitePath);

	// The HTTP process and the CSV importer may hold the same file open
	db.pragma("journal_mode = WAL");
	db.pragma("synchronous = NORMAL");
	db.pragma("foreign_keys = ON");
	db.pragma("busy_timeout = 5000");

	return {
		db,
		close: () => db.close()
	};
}

export function initDb(db: Database.Database): void {
	const tx = db.transaction(() => {
		const ver = Number(db.pragma("user_version", { simple: true }) ?? 0);

		if (ver === 0) {
			db.exec(`
				CREATE TABLE IF NOT EXISTS value_type (
					id    INTEGER PRIMARY KEY,
					name  TEXT    NOT NULL,
					unit  TEXT    NOT NULL
				);

				CREATE TABLE IF NOT EXISTS device_type (
					id        INTEGER PRIMARY KEY,
					name      TEXT    NOT NULL,
					location  TEXT    NOT NULL
				);

				CREATE TABLE IF NOT EXISTS value (
					id             INTEGER PRIMARY KEY AUTOINCREMENT,
					time           INTEGER NOT NULL,
					value          REAL    NOT NULL,
					value_type_id  INTEGER NOT NULL REFERENCES value_type (id)
				);

				CREATE INDEX IF NOT EXISTS idx_value_type_time
				ON value (value_type_id, time);

				CREATE INDEX IF NOT EXISTS idx_value_time
				ON value (time);
			`);

			db.pragma("user_version = 1");
		}
	});

	tx();
}
