import type { SensorConfig } from "../lib/config";
import type { SensorModule } from "./types";

const DAY_MS = 86_400_000;

const BASE_C = 21;
const SWING_C = 3;
const NOISE_C = 0.1;

/**
 * Indoor temperature following a daily sine curve: coldest at 00:00 UTC, warmest at 12:00 UTC,
 * plus noise scaled from `random` in [0, 1). Rounded to two decimals.
 */
export function simulatedTemperature(atMs: number, random: () => number = Math.random): number {
	const dayFraction = (atMs % DAY_MS) / DAY_MS;
	const curve = -Math.cos(2 * Math.PI * dayFraction);
	const noise = (random() * 2 - 1) * NOISE_C;
	return Math.round((BASE_C + SWING_C * curve + noise) * 100) / 100;
}

const RandomTempSensor: SensorModule = {
	type: "random_temp",

	defaults(config: SensorConfig): void {
		if (!config.unit) {
			config.unit = "C";
		}
	},

	validate(config: SensorConfig): void {
		if (config.intervalMs < 100) {
			throw new Error(`random_temp sensor ${config.sensorId}: intervalMs must be >= 100`);
		}
	},

	async read() {
		return { value: simulatedTemperature(Date.now()) };
	}
};

export default RandomTempSensor;
