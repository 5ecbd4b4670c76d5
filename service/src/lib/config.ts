import "dotenv/config";
import fs from "node:fs";
import { Command } from "commander";
import { z } from "zod";

import { configError } from "@measurement-hub/store";

export type LogLevel = "error" | "warn" | "info" | "http" | "verbose" | "debug" | "silly";

export interface SensorConfig {
	sensorId: string;
	type: string;
	valueTypeId: number;
	intervalMs: number;

	// Written to the value type on reader start; the sensor module may fill in a unit
	name?: string;
	unit?: string;

	// Device file for sensors read from the filesystem (pi_cpu_temp)
	path?: string;
}

export interface AppConfig {
	paths: {
		sqlite: string;
		logDir: string;
	};

	http: {
		port: number;
	};

	logLevel: LogLevel;

	reader: {
		enabled: boolean;
	};

	sensors: SensorConfig[];
}

/* ---------- defaults ---------- */

const DEFAULT_SQLITE = "./data/measurements.sqlite";
const DEFAULT_LOG_DIR = "./logs";
const DEFAULT_LOG_LEVEL: LogLevel = "info";
const DEFAULT_HTTP_PORT = 8080;

const LOG_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"] as const;

const SensorSchema = z.object({
	sensorId: z.string().min(1),
	type: z.string().min(1),
	valueTypeId: z.number().int().safe(),
	intervalMs: z.number().int().positive(),
	name: z.string().optional(),
	unit: z.string().optional(),
	path: z.string().min(1).optional()
});

const ConfigFileSchema = z.object({
	paths: z
		.object({
			sqlite: z.string().min(1).optional(),
			logDir: z.string().min(1).optional()
		})
		.optional(),
	http: z.object({ port: z.number().int().positive().optional() }).optional(),
	logLevel: z.enum(LOG_LEVELS).optional(),
	reader: z.object({ enabled: z.boolean().optional() }).optional(),
	sensors: z.array(SensorSchema).optional()
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

type Env = Record<string, string | undefined>;

export function parseCommandLine(argv: readonly string[]): { configPath?: string } {
	const program = new Command();

	program
		.option("-c, --config <path>", "Path to configuration file")
		.allowUnknownOption(true)
		.allowExcessArguments(true);

	program.parse(Array.from(argv));

	const opts = program.opts<{ config?: string }>();
	return { configPath: opts.config };
}

function readConfigFile(configPath: string): ConfigFile {
	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(configPath, "utf8"));
	} catch (err) {
		throw configError(`Cannot read config file ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
	}

	const res = ConfigFileSchema.safeParse(parsed);
	if (!res.success) {
		const issues = res.error.issues
			.slice(0, 5)
			.map(i => `${i.path.map(String).join(".") || "<root>"}: ${i.message}`)
			.join("; ");
		throw configError(`Invalid config file ${configPath}: ${issues}`);
	}
	return res.data;
}

function optionalString(env: Env, name: string): string | undefined {
	const value = env[name];
	if (value === undefined || value.trim() === "") return undefined;
	return value.trim();
}

function optionalPositiveInt(env: Env, name: string): number | undefined {
	const raw = optionalString(env, name);
	if (raw === undefined) return undefined;
	const n = Number(raw);
	if (!Number.isInteger(n) || n <= 0) {
		throw configError(`Environment variable ${name} must be a positive integer`);
	}
	return n;
}

function optionalBoolean(env: Env, name: string): boolean | undefined {
	const raw = optionalString(env, name);
	if (raw === undefined) return undefined;
	const lower = raw.toLowerCase();
	if (lower === "true") return true;
	if (lower === "false") return false;
	throw configError(`Environment variable ${name} must be "true" or "false"`);
}

function optionalLogLevel(env: Env, name: string): LogLevel | undefined {
	const raw = optionalString(env, name)?.toLowerCase();
	if (raw === undefined) return undefined;
	const level = LOG_LEVELS.find(l => l === raw);
	if (!level) {
		throw configError(`Environment variable ${name} must be one of: ${LOG_LEVELS.join(", ")}`);
	}
	return level;
}

/* ---------- validation ---------- */

function validateConfig(cfg: AppConfig): void {
	const seen = new Set<string>();
	for (const s of cfg.sensors) {
		if (seen.has(s.sensorId)) {
			throw configError(`sensor ${s.sensorId}: duplicate sensorId`);
		}
		seen.add(s.sensorId);
	}
}

/* ---------- public API ---------- */

/**
 * Build the configuration from an optional JSON file (`--config`) and the environment.
 * Environment variables win over the file.
 */
export function loadConfig(argv: readonly string[] = process.argv, env: Env = process.env): AppConfig {
	const { configPath } = parseCommandLine(argv);
	const file: ConfigFile = configPath ? readConfigFile(configPath) : {};

	const cfg: AppConfig = {
		paths: {
			sqlite: optionalString(env, "DB_PATH") ?? file.paths?.sqlite ?? DEFAULT_SQLITE,
			logDir: optionalString(env, "LOG_DIR") ?? file.paths?.logDir ?? DEFAULT_LOG_DIR
		},
		http: {
			port: optionalPositiveInt(env, "HTTP_PORT") ?? file.http?.port ?? DEFAULT_HTTP_PORT
		},
		logLevel: optionalLogLevel(env, "LOG_LEVEL") ?? file.logLevel ?? DEFAULT_LOG_LEVEL,
		reader: {
			enabled: optionalBoolean(env, "READER_ENABLED") ?? file.reader?.enabled ?? true
		},
		sensors: file.sensors ?? []
	};

	validateConfig(cfg);

	return cfg;
}
