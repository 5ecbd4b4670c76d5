import type winston from "winston";

import type { MeasurementStore } from "@measurement-hub/store";

import type { SensorConfig } from "./lib/config";
import { getSensorModule, type SensorModule } from "./sensors";

export interface SensorReaderOptions {
	store: MeasurementStore;
	logger: winston.Logger;
	sensors: readonly SensorConfig[];
	/** Sensor module lookup; defaults to the built-in registry */
	resolveModule?: (type: string) => SensorModule;
	/** Clock in milliseconds; defaults to Date.now */
	now?: () => number;
}

interface ActiveSensor {
	config: SensorConfig;
	module: SensorModule;
}

/**
 * Samples the configured sensors on their own intervals and appends each reading
 * to the store. A failing read is logged and the schedule keeps running.
 */
export class SensorReader {
	private readonly store: MeasurementStore;
	private readonly logger: winston.Logger;
	private readonly now: () => number;
	private readonly sensors = new Map<string, ActiveSensor>();
	private readonly timers = new Map<string, NodeJS.Timeout>();
	private readonly inFlight = new Set<string>();

	constructor(opts: SensorReaderOptions) {
		this.store = opts.store;
		this.logger = opts.logger;
		this.now = opts.now ?? Date.now;

		const resolve = opts.resolveModule ?? getSensorModule;
		for (const s of opts.sensors) {
			const config: SensorConfig = { ...s };
			const module = resolve(config.type);

			// Apply sensor defaults + validate early so a bad config fails at startup
			module.defaults?.(config);
			module.validate(config);

			this.sensors.set(config.sensorId, { config, module });
		}
	}

	get running(): boolean {
		return this.timers.size > 0;
	}

	start(): void {
		if (this.running) return;

		for (const { config } of this.sensors.values()) {
			const vt = this.store.upsertValueType(config.valueTypeId, config.name, config.unit);
			this.logger.info(
				"Sensor reader: sensorId=%s type=%s valueTypeId=%d (%s, %s) intervalMs=%d",
				config.sensorId,
				config.type,
				vt.id,
				vt.name,
				vt.unit,
				config.intervalMs
			);

			const timer = setInterval(() => this.tick(config.sensorId), config.intervalMs);
			this.timers.set(config.sensorId, timer);
		}

		this.logger.info("Sensor reader started (%d sensors)", this.sensors.size);
	}

	stop(): void {
		if (!this.running) return;

		for (const timer of this.timers.values()) {
			clearInterval(timer);
		}
		this.timers.clear();
		this.logger.info("Sensor reader stopped");
	}

	/**
	 * Read one sensor and append the sample. Rejects if the read or the write fails.
	 */
	async readOnce(sensorId: string): Promise<number> {
		const active = this.sensors.get(sensorId);
		if (!active) {
			throw new Error(`Unknown sensorId '${sensorId}'`);
		}

		const { value } = await active.module.read(active.config);
		const time = Math.floor(this.now() / 1000);

		this.store.insertValue(time, active.config.valueTypeId, value);
		this.logger.debug(
			"Inserted measurement: sensorId=%s time=%d valueTypeId=%d value=%s",
			sensorId,
			time,
			active.config.valueTypeId,
			String(value)
		);
		return value;
	}

	private tick(sensorId: string): void {
		// A slow sensor must not stack reads on top of each other
		if (this.inFlight.has(sensorId)) {
			this.logger.warn("Sensor %s: previous read still running, skipping", sensorId);
			return;
		}

		this.inFlight.add(sensorId);
		void this.readOnce(sensorId)
			.catch(err => {
				this.logger.error("Sensor %s: read failed: %s", sensorId, err instanceof Error ? err.message : String(err));
			})
			.finally(() => {
				this.inFlight.delete(sensorId);
			});
	}
}
