import { describe, it, expect, vi, beforeEach } from "vitest";
import { DEFAULT_WICK_THRESHOLDS, type Candle, type WickEvent } from "@wickguard/shared";
import { MemoryStore } from "../test/memoryStore.js";
import { WickDetector } from "./detector.js";

const SYMBOL = "BTCUSDT";
/** Clock for cursor seeding on an empty store, before every test candle */
const SEEDED_AT = new Date(Date.UTC(2025, 1, 28));

function at(minute: number): Date {
    return new Date(Date.UTC(2025, 2, 1, 0, minute));
}

function wick(minute: number): Candle {
    return { symbol: SYMBOL, timestamp: at(minute), open: 44_000, high: 48_000, low: 39_500, close: 43_900, volume: 3 };
}

function flat(minute: number): Candle {
    return { symbol: SYMBOL, timestamp: at(minute), open: 100, high: 101, low: 99, close: 100.5, volume: 3 };
}

describe("WickDetector", () => {
    let store: MemoryStore;
    let detector: WickDetector;

    beforeEach(() => {
        store = new MemoryStore();
        detector = new WickDetector(store, DEFAULT_WICK_THRESHOLDS, () => SEEDED_AT);
    });

    describe("evaluate", () => {
        it("should create exactly one event per candle across repeated evaluations", async () => {
            const { row } = await store.insertCandle(wick(0));

            const first = await detector.evaluate(row);
            const second = await detector.evaluate(row);

            expect(first?.isNew).toBe(true);
            expect(second?.isNew).toBe(false);
            expect(second?.event.id).toBe(first?.event.id);
            expect(store.wickEvents).toHaveLength(1);
            expect(store.wickEvents[0]?.candleId).toBe(row.id);
            expect(store.wickEvents[0]?.timestamp).toEqual(at(0));
        });

        it("should not record anything for a non-wick candle", async () => {
            const { row } = await store.insertCandle(flat(0));

            expect(await detector.evaluate(row)).toBeNull();
            expect(store.wickEvents).toHaveLength(0);
        });
    });

    describe("processNewCandles", () => {
        it("should seed the cursor at the latest candle on first run without evaluating history", async () => {
            await store.insertCandle(wick(0));
            await store.insertCandle(flat(1));
            const onEvent = vi.fn(async (_event: WickEvent) => {});

            const result = await detector.processNewCandles(SYMBOL, 100, onEvent);

            expect(result).toEqual({ evaluated: 0, detected: 0, historical: 0, cursor: 2 });
            expect(await store.getDetectorCursor(SYMBOL)).toEqual({ candleId: 2, streamedThrough: at(1) });
            expect(onEvent).not.toHaveBeenCalled();
            expect(store.wickEvents).toHaveLength(0);
        });

        it("should evaluate candles past the cursor and hand new events to the handler", async () => {
            const onEvent = vi.fn(async (_event: WickEvent) => {});
            await detector.processNewCandles(SYMBOL, 100, onEvent);

            await store.insertCandle(flat(0));
            await store.insertCandle(wick(1));
            const result = await detector.processNewCandles(SYMBOL, 100, onEvent);

            expect(result).toEqual({ evaluated: 2, detected: 1, historical: 0, cursor: 2 });
            expect(onEvent).toHaveBeenCalledTimes(1);
            expect(onEvent.mock.calls[0]?.[0].candleId).toBe(2);

            const again = await detector.processNewCandles(SYMBOL, 100, onEvent);
            expect(again).toEqual({ evaluated: 0, detected: 0, historical: 0, cursor: 2 });
            expect(onEvent).toHaveBeenCalledTimes(1);
        });

        it("should respect the batch size", async () => {
            const onEvent = vi.fn(async (_event: WickEvent) => {});
            await detector.processNewCandles(SYMBOL, 2, onEvent);
            for (let m = 0; m < 5; m++) {
                await store.insertCandle(wick(m));
            }

            const first = await detector.processNewCandles(SYMBOL, 2, onEvent);
            const second = await detector.processNewCandles(SYMBOL, 2, onEvent);

            expect(first).toEqual({ evaluated: 2, detected: 2, historical: 0, cursor: 2 });
            expect(second).toEqual({ evaluated: 2, detected: 2, historical: 0, cursor: 4 });
        });

        it("should advance past a candle whose handler fails", async () => {
            await detector.processNewCandles(SYMBOL, 100, async () => {});
            await store.insertCandle(wick(0));
            await store.insertCandle(wick(1));
            const onEvent = vi.fn(async (_event: WickEvent) => {
                throw new Error("settlement unavailable");
            });

            const result = await detector.processNewCandles(SYMBOL, 100, onEvent);

            expect(result).toEqual({ evaluated: 2, detected: 2, historical: 0, cursor: 2 });
            expect(onEvent).toHaveBeenCalledTimes(2);
            expect((await store.getDetectorCursor(SYMBOL))?.candleId).toBe(2);
        });

        it("should stop the tick and keep the cursor when the store fails", async () => {
            await detector.processNewCandles(SYMBOL, 100, async () => {});
            await store.insertCandle(wick(0));
            store.failWith = new Error("connection refused");

            await expect(detector.processNewCandles(SYMBOL, 100, async () => {})).rejects.toThrow(
                "connection refused"
            );

            store.failWith = null;
            expect((await store.getDetectorCursor(SYMBOL))?.candleId).toBe(0);
        });

        it("should record but not settle candles older than the ones already streamed", async () => {
            const onEvent = vi.fn(async (_event: WickEvent) => {});
            await store.insertCandle(flat(10));
            await detector.processNewCandles(SYMBOL, 100, onEvent);
            await store.insertCandle(wick(5));
            await store.insertCandle(wick(11));

            const result = await detector.processNewCandles(SYMBOL, 100, onEvent);

            expect(result).toEqual({ evaluated: 2, detected: 1, historical: 1, cursor: 3 });
            expect(onEvent).toHaveBeenCalledTimes(1);
            expect(onEvent.mock.calls[0]?.[0].candleId).toBe(3);
            expect(store.wickEvents.map((e) => e.candleId)).toEqual([2, 3]);
            expect(await store.getDetectorCursor(SYMBOL)).toEqual({ candleId: 3, streamedThrough: at(11) });
        });

        it("should not settle candles opened before an empty store was seeded", async () => {
            const seededLater = new WickDetector(store, DEFAULT_WICK_THRESHOLDS, () => at(30));
            const onEvent = vi.fn(async (_event: WickEvent) => {});
            await seededLater.processNewCandles(SYMBOL, 100, onEvent);
            await store.insertCandle(wick(20));
            await store.insertCandle(wick(31));

            const result = await seededLater.processNewCandles(SYMBOL, 100, onEvent);

            expect(result).toEqual({ evaluated: 2, detected: 1, historical: 1, cursor: 2 });
            expect(onEvent.mock.calls.map(([e]) => e.candleId)).toEqual([2]);
        });

        it("should stop between candles once the signal is aborted", async () => {
            await detector.processNewCandles(SYMBOL, 100, async () => {});
            await store.insertCandle(wick(0));
            await store.insertCandle(wick(1));
            await store.insertCandle(wick(2));
            const controller = new AbortController();
            const onEvent = vi.fn(async (_event: WickEvent) => {
                controller.abort();
            });

            const result = await detector.processNewCandles(SYMBOL, 100, onEvent, controller.signal);

            expect(result).toEqual({ evaluated: 1, detected: 1, historical: 0, cursor: 1 });
            expect((await store.getDetectorCursor(SYMBOL))?.candleId).toBe(1);

            const resumed = await detector.processNewCandles(SYMBOL, 100, onEvent);
            expect(resumed).toEqual({ evaluated: 2, detected: 2, historical: 0, cursor: 3 });
        });

        it("should keep cursors per symbol", async () => {
            await store.insertCandle(wick(0));
            await detector.processNewCandles(SYMBOL, 100, async () => {});

            expect((await store.getDetectorCursor(SYMBOL))?.candleId).toBe(1);
            expect(await store.getDetectorCursor("ETHUSDT")).toBeNull();
        });
    });

    describe("detectRange", () => {
        it("should return every wick in the range, flagging ones recorded earlier", async () => {
            await store.insertCandle(wick(0));
            await store.insertCandle(flat(1));
            const { row } = await store.insertCandle(wick(2));
            await store.insertCandle(wick(3));
            await detector.evaluate(row);

            const results = await detector.detectRange(SYMBOL, at(0), at(2));

            expect(results.map((r) => r.event.candleId)).toEqual([1, 3]);
            expect(results.map((r) => r.isNew)).toEqual([true, false]);
            expect(store.wickEvents).toHaveLength(2);
        });

        it("should be idempotent across replays", async () => {
            await store.insertCandle(wick(0));
            await store.insertCandle(wick(1));

            await detector.detectRange(SYMBOL, at(0), at(1));
            const replay = await detector.detectRange(SYMBOL, at(0), at(1));

            expect(replay.every((r) => !r.isNew)).toBe(true);
            expect(store.wickEvents).toHaveLength(2);
        });
    });
});
