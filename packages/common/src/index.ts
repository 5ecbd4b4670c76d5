// Entity shapes (used by the store and the service)
export type { ValueType, DeviceType, Value, ValueFilter } from "./model";

// Validation schemas (used mainly by the HTTP layer)
export {
    ValueTypeBodySchema,
    DeviceTypeBodySchema,
    ValueBodySchema
} from "./schema";
export type { ValueTypeBody, DeviceTypeBody, ValueBody } from "./schema";
