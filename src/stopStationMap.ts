export type StopStationKey = {
    readonly stopId: string;
    readonly stationId: string;
};

// stop and station ids never contain a newline
function encode(key: StopStationKey): string {
    return `${key.stopId}\n${key.stationId}`;
}

/**
 * Map keyed by a (stop, station) pair. Iterates in insertion order.
 */
export class StopStationMap<V> {
    private readonly byKey = new Map<string, { key: StopStationKey; value: V }>();

    get size(): number {
        return this.byKey.size;
    }

    get(key: StopStationKey): V | undefined {
        return this.byKey.get(encode(key))?.value;
    }

    has(key: StopStationKey): boolean {
        return this.byKey.has(encode(key));
    }

    set(key: StopStationKey, value: V): this {
        const k = encode(key);
        const existing = this.byKey.get(k);
        if (existing) existing.value = value;
        else this.byKey.set(k, { key: { stopId: key.stopId, stationId: key.stationId }, value });
        return this;
    }

    getOrCreate(key: StopStationKey, create: (key: StopStationKey) => V): V {
        const existing = this.byKey.get(encode(key));
        if (existing) return existing.value;
        const value = create(key);
        this.set(key, value);
        return value;
    }

    *entries(): IterableIterator<[StopStationKey, V]> {
        for (const { key, value } of this.byKey.values()) yield [key, value];
    }

    *values(): IterableIterator<V> {
        for (const { value } of this.byKey.values()) yield value;
    }

    [Symbol.iterator](): IterableIterator<[StopStationKey, V]> {
        return this.entries();
    }
}
