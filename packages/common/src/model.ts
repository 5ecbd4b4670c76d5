export interface ValueType {
    id: number;
    name: string;
    unit: string;
}

export interface DeviceType {
    id: number;
    name: string;
    location: string;
}

export interface Value {
    id: number;        // insertion sequence, also the tie-break for equal timestamps
    time: number;      // unix seconds
    value: number;
    valueTypeId: number;
}

export interface ValueFilter {
    valueTypeId?: number;
    start?: number;    // inclusive
    end?: number;      // inclusive
}
