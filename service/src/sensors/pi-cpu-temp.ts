import fs from "node:fs/promises";

import type { SensorConfig } from "../lib/config";
import type { SensorModule } from "./types";

// Linux sysfs path for the SoC temperature, an integer in millidegrees Celsius, e.g. "45321\n".
export const SYSFS_TEMP_PATH = "/sys/class/thermal/thermal_zone0/temp";

export async function readCpuTempC(sysfsPath: string): Promise<number> {
	const raw = (await fs.readFile(sysfsPath, "utf8")).trim();
	const milli = Number(raw);
	if (raw === "" || !Number.isFinite(milli)) {
		throw new Error(`Invalid CPU temperature value '${raw}' from ${sysfsPath}`);
	}
	return milli / 1000;
}

const PiCpuTempSensor: SensorModule = {
	type: "pi_cpu_temp",

	defaults(config: SensorConfig): void {
		if (!config.unit) {
			config.unit = "C";
		}
		if (!config.name) {
			config.name = "CPU temperature";
		}
		if (!config.path) {
			config.path = SYSFS_TEMP_PATH;
		}
	},

	validate(config: SensorConfig): void {
		if (config.unit !== "C") {
			throw new Error(`pi_cpu_temp sensor ${config.sensorId}: unit must be 'C'`);
		}
	},

	async read(config: SensorConfig): Promise<{ value: number }> {
		const tempC = await readCpuTempC(config.path ?? SYSFS_TEMP_PATH);
		return { value: Math.round(tempC * 100) / 100 };
	}
};

export default PiCpuTempSensor;
