import fs from "node:fs";
import path from "node:path";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";

import type { LogLevel } from "./config";

/** "rotate": one file per day, "single": one growing file, "none": console only */
export type LogFileMode = "rotate" | "single" | "none";

export interface LoggerOptions {
	/** Prefix of every line and base name of the log files */
	name: string;
	dir: string;
	level: LogLevel;
	files?: LogFileMode;
	console?: boolean;
}

function lineFormat(name: string): winston.Logform.Format {
	return winston.format.combine(
		winston.format.timestamp(),
		winston.format.errors({ stack: true }),
		winston.format.splat(),
		winston.format.printf(({ timestamp, level, message, stack }) => {
			const trace = stack === undefined ? "" : `\n${String(stack)}`;
			return `${String(timestamp)} [${name}] ${level}: ${String(message)}${trace}`;
		})
	);
}

// Every mode writes all levels to one file and errors to a second one
function fileTransports(opts: LoggerOptions, mode: LogFileMode): winston.transport[] {
	if (mode === "none") return [];

	fs.mkdirSync(opts.dir, { recursive: true });

	const targets = [
		{ suffix: "", level: opts.level, keep: "14d" },
		{ suffix: ".error", level: "error", keep: "30d" }
	];

	return targets.map(({ suffix, level, keep }) =>
		mode === "rotate"
			? new DailyRotateFile({
					level,
					dirname: opts.dir,
					filename: `${opts.name}${suffix}.%DATE%.log`,
					datePattern: "YYYY-MM-DD",
					maxFiles: keep
				})
			: new winston.transports.File({ level, filename: path.join(opts.dir, `${opts.name}${suffix}.log`) })
	);
}

export function createLogger(opts: LoggerOptions): winston.Logger {
	const transports = fileTransports(opts, opts.files ?? "rotate");
	if (opts.console ?? true) {
		transports.push(new winston.transports.Console());
	}

	return winston.createLogger({
		level: opts.level,
		format: lineFormat(opts.name),
		transports
	});
}
