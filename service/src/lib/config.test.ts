import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { loadConfig } from "./config";

const ARGV = ["node", "server.ts"];

describe("loadConfig", () => {
	let dir: string;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "config-"));
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	function writeConfig(content: unknown): string {
		const file = path.join(dir, "config.json");
		fs.writeFileSync(file, JSON.stringify(content));
		return file;
	}

	it("falls back to defaults", () => {
		expect(loadConfig(ARGV, {})).toEqual({
			paths: { sqlite: "./data/measurements.sqlite", logDir: "./logs" },
			http: { port: 8080 },
			logLevel: "info",
			reader: { enabled: true },
			sensors: []
		});
	});

	it("reads the config file and lets the environment win", () => {
		const file = writeConfig({
			paths: { sqlite: "/srv/m.sqlite" },
			http: { port: 3000 },
			logLevel: "debug",
			sensors: [{ sensorId: "cpu", type: "pi_cpu_temp", valueTypeId: 1, intervalMs: 60000 }]
		});

		const cfg = loadConfig([...ARGV, "--config", file], { HTTP_PORT: "9090", READER_ENABLED: "false" });

		expect(cfg.paths).toEqual({ sqlite: "/srv/m.sqlite", logDir: "./logs" });
		expect(cfg.http.port).toBe(9090);
		expect(cfg.logLevel).toBe("debug");
		expect(cfg.reader.enabled).toBe(false);
		expect(cfg.sensors).toEqual([{ sensorId: "cpu", type: "pi_cpu_temp", valueTypeId: 1, intervalMs: 60000 }]);
	});

	it("reports schema violations with their path", () => {
		const file = writeConfig({ sensors: [{ sensorId: "x", type: "random_temp", valueTypeId: 1, intervalMs: 0 }] });
		expect(() => loadConfig([...ARGV, "-c", file], {})).toThrowError(/sensors\.0\.intervalMs/);
	});

	it("rejects duplicate sensor ids", () => {
		const s = { sensorId: "x", type: "random_temp", valueTypeId: 1, intervalMs: 1000 };
		const file = writeConfig({ sensors: [s, s] });
		expect(() => loadConfig([...ARGV, "-c", file], {})).toThrowError("sensor x: duplicate sensorId");
	});

	it("rejects a missing file", () => {
		expect(() => loadConfig([...ARGV, "-c", path.join(dir, "missing.json")], {})).toThrowError(/Cannot read config file/);
	});

	it("validates environment values", () => {
		expect(() => loadConfig(ARGV, { HTTP_PORT: "http" })).toThrowError("Environment variable HTTP_PORT must be a positive integer");
		expect(() => loadConfig(ARGV, { LOG_LEVEL: "loud" })).toThrowError(/LOG_LEVEL must be one of/);
		expect(() => loadConfig(ARGV, { READER_ENABLED: "yes" })).toThrowError('Environment variable READER_ENABLED must be "true" or "false"');
	});
});
