import { describe, expect, it } from "vitest";

import { simulatedTemperature } from "./random-temp";

const HOUR_MS = 3_600_000;
const noNoise = () => 0.5;

describe("simulatedTemperature", () => {
	it("follows the daily curve", () => {
		expect(simulatedTemperature(0, noNoise)).toBe(18);
		expect(simulatedTemperature(6 * HOUR_MS, noNoise)).toBe(21);
		expect(simulatedTemperature(12 * HOUR_MS, noNoise)).toBe(24);
		expect(simulatedTemperature(24 * HOUR_MS, noNoise)).toBe(18);
	});

	it("adds bounded noise", () => {
		expect(simulatedTemperature(0, () => 0)).toBe(17.9);
		expect(simulatedTemperature(12 * HOUR_MS, () => 0.99)).toBe(24.1);
	});
});
