import { describe, expect, it } from "vitest";

import { DeviceTypeBodySchema, ValueBodySchema, ValueTypeBodySchema } from "./schema";

describe("ValueBodySchema", () => {
    it("accepts a measurement", () => {
        expect(ValueBodySchema.parse({ time: 100, value_type_id: 1, value: 97.5 })).toEqual({
            time: 100,
            value_type_id: 1,
            value: 97.5
        });
    });

    it("rejects fractional timestamps and type ids", () => {
        expect(ValueBodySchema.safeParse({ time: 1.5, value_type_id: 1, value: 1 }).success).toBe(false);
        expect(ValueBodySchema.safeParse({ time: 1, value_type_id: 1.5, value: 1 }).success).toBe(false);
    });

    it("rejects integers beyond 2^53", () => {
        expect(ValueBodySchema.safeParse({ time: 1e20, value_type_id: 1, value: 1 }).success).toBe(false);
        expect(ValueBodySchema.safeParse({ time: 1, value_type_id: 9007199254740993, value: 1 }).success).toBe(false);
    });

    it("rejects a missing value", () => {
        expect(ValueBodySchema.safeParse({ time: 1, value_type_id: 1 }).success).toBe(false);
    });
});

describe("dimension bodies", () => {
    it("allow every field to be omitted", () => {
        expect(ValueTypeBodySchema.parse({})).toEqual({});
        expect(DeviceTypeBodySchema.parse({ location: "Roof" })).toEqual({ location: "Roof" });
    });

    it("reject non-string fields", () => {
        expect(ValueTypeBodySchema.safeParse({ name: 5 }).success).toBe(false);
    });
});
