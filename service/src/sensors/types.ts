import type { SensorConfig } from "../lib/config";

export interface SensorReading {
	value: number;
}

/**
 * A sensor kind the reader can sample, selected by `type` in the sensors config.
 */
export interface SensorModule {
	readonly type: string;

	/** Fill in missing name or unit before the config is validated */
	defaults?(config: SensorConfig): void;

	/** Throw on configuration this sensor kind cannot work with */
	validate(config: SensorConfig): void;

	/** Take one sample */
	read(config: SensorConfig): Promise<SensorReading>;
}
