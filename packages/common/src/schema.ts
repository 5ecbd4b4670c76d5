import { z } from "zod";

// Empty strings are accepted and behave like an omitted field on upsert.
export const ValueTypeBodySchema = z.object({
    name: z.string().optional(),
    unit: z.string().optional()
});

export const DeviceTypeBodySchema = z.object({
    name: z.string().optional(),
    location: z.string().optional()
});

export const ValueBodySchema = z.object({
    time: z.number().int().safe(),
    value_type_id: z.number().int().safe(),
    value: z.number().finite()
});

export type ValueTypeBody = z.infer<typeof ValueTypeBodySchema>;
export type DeviceTypeBody = z.infer<typeof DeviceTypeBodySchema>;
export type ValueBody = z.infer<typeof ValueBodySchema>;
