import { describe, it, expect } from "vitest";
import type { Candle } from "@wickguard/shared";
import { MemoryStore } from "../test/memoryStore.js";
import { ingestCandles, isWellFormedCandle } from "./ingest.js";

function candle(minute: number, overrides: Partial<Candle> = {}): Candle {
    return {
        symbol: "BTCUSDT",
        timestamp: new Date(Date.UTC(2025, 2, 1, 0, minute)),
        open: 100,
        high: 105,
        low: 95,
        close: 102,
        volume: 7,
        ...overrides,
    };
}

describe("isWellFormedCandle", () => {
    it("should accept a normal candle and a zero-range candle", () => {
        expect(isWellFormedCandle(candle(0))).toBe(true);
        expect(isWellFormedCandle(candle(0, { open: 100, high: 100, low: 100, close: 100 }))).toBe(true);
    });

    it("should reject prices outside the high-low range", () => {
        expect(isWellFormedCandle(candle(0, { close: 106 }))).toBe(false);
        expect(isWellFormedCandle(candle(0, { open: 94 }))).toBe(false);
    });

    it("should reject non-finite values and invalid timestamps", () => {
        expect(isWellFormedCandle(candle(0, { high: Number.NaN }))).toBe(false);
        expect(isWellFormedCandle(candle(0, { timestamp: new Date(Number.NaN) }))).toBe(false);
    });

    it("should reject non-positive prices and negative volume", () => {
        expect(isWellFormedCandle(candle(0, { low: 0 }))).toBe(false);
        expect(isWellFormedCandle(candle(0, { volume: -1 }))).toBe(false);
    });
});

describe("ingestCandles", () => {
    it("should count inserted, duplicate and invalid candles", async () => {
        const store = new MemoryStore();
        await store.insertCandle(candle(1));

        const result = await ingestCandles([candle(0), candle(1), candle(2, { high: 90 }), candle(3)], store);

        expect(result).toEqual({ inserted: 2, duplicates: 1, invalid: 1 });
        expect(store.candles.map((c) => c.timestamp.getUTCMinutes())).toEqual([1, 0, 3]);
    });

    it("should consume async sources", async () => {
        const store = new MemoryStore();
        async function* source(): AsyncGenerator<Candle> {
            yield candle(0);
            yield candle(1);
        }

        expect(await ingestCandles(source(), store)).toEqual({ inserted: 2, duplicates: 0, invalid: 0 });
    });

    it("should propagate store failures", async () => {
        const store = new MemoryStore();
        store.failWith = new Error("connection refused");

        await expect(ingestCandles([candle(0)], store)).rejects.toThrow("connection refused");
    });
});
