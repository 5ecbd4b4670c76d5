import type { SensorModule } from "./types";
import PiCpuTempSensor from "./pi-cpu-temp";
import RandomTempSensor from "./random-temp";

const modules: ReadonlyMap<string, SensorModule> = new Map(
	[RandomTempSensor, PiCpuTempSensor].map((m): [string, SensorModule] => [m.type, m])
);

export function getSensorModule(type: string): SensorModule {
	const found = modules.get(type);
	if (found === undefined) {
		throw new Error(`Unsupported sensor type '${type}' (known: ${[...modules.keys()].join(", ")})`);
	}
	return found;
}

export type { SensorModule, SensorReading } from "./types";
