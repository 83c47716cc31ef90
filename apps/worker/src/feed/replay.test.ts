import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import type { Candle } from "@wickguard/shared";
import { CsvReplaySource, parseCandleCsv, parseTimestamp } from "./replay.js";

const CSV_WITH_HEADER = [
    "timestamp,open,high,low,close,volume",
    "2025-03-01T00:00:00Z,100,101,99,100.5,12",
    "2025-03-01T00:01:00Z,100.5,110,96,100.2,40",
    "",
    "2025-03-01T00:02:00Z,100.2,100.4,100,100.1,3",
].join("\n");

describe("parseTimestamp", () => {
    it("should read epoch milliseconds", () => {
        expect(parseTimestamp("1740787200000")).toEqual(new Date("2025-03-01T00:00:00Z"));
    });

    it("should read ISO 8601", () => {
        expect(parseTimestamp("2025-03-01T00:01:00Z")).toEqual(new Date("2025-03-01T00:01:00Z"));
    });

    it("should return null for anything else", () => {
        expect(parseTimestamp("timestamp")).toBeNull();
    });
});

describe("parseCandleCsv", () => {
    it("should skip the header and blank lines", () => {
        const { candles, skipped } = parseCandleCsv(CSV_WITH_HEADER, "BTCUSDT");

        expect(skipped).toBe(0);
        expect(candles).toHaveLength(3);
        expect(candles[1]).toEqual({
            symbol: "BTCUSDT",
            timestamp: new Date("2025-03-01T00:01:00Z"),
            open: 100.5,
            high: 110,
            low: 96,
            close: 100.2,
            volume: 40,
        });
    });

    it("should parse a file without a header", () => {
        const { candles } = parseCandleCsv("1740787200000,1,2,0.5,1.5,10\n1740787260000,1.5,2,1,1.8,11", "ETHUSDT");

        expect(candles.map((c) => c.timestamp.toISOString())).toEqual([
            "2025-03-01T00:00:00.000Z",
            "2025-03-01T00:01:00.000Z",
        ]);
        expect(candles[0]?.symbol).toBe("ETHUSDT");
    });

    it("should count rows with missing columns or bad timestamps", () => {
        const text = ["1740787200000,1,2,0.5,1.5,10", "1740787260000,1,2", "not-a-time,1,2,0.5,1.5,10"].join("\n");

        const { candles, skipped } = parseCandleCsv(text, "BTCUSDT");

        expect(candles).toHaveLength(1);
        expect(skipped).toBe(2);
    });

    it("should pass unreadable prices through as NaN", () => {
        const { candles } = parseCandleCsv("1740787200000,1,,0.5,abc,10", "BTCUSDT");

        expect(candles[0]?.high).toBeNaN();
        expect(candles[0]?.close).toBeNaN();
        expect(candles[0]?.open).toBe(1);
    });
});

describe("CsvReplaySource", () => {
    let dir: string;
    let path: string;

    beforeAll(async () => {
        dir = await mkdtemp(join(tmpdir(), "wickguard-replay-"));
        path = join(dir, "candles.csv");
        await writeFile(path, CSV_WITH_HEADER, "utf8");
    });

    afterAll(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    async function collect(source: AsyncIterable<Candle>): Promise<Candle[]> {
        const out: Candle[] = [];
        for await (const candle of source) out.push(candle);
        return out;
    }

    it("should yield every row in file order", async () => {
        const candles = await collect(new CsvReplaySource(path, { symbol: "BTCUSDT" }));

        expect(candles.map((c) => c.close)).toEqual([100.5, 100.2, 100.1]);
    });

    it("should start at the offset", async () => {
        const candles = await collect(new CsvReplaySource(path, { symbol: "BTCUSDT", offset: 2 }));

        expect(candles.map((c) => c.close)).toEqual([100.1]);
    });

    it("should replay from the start on each iteration", async () => {
        const source = new CsvReplaySource(path, { symbol: "BTCUSDT" });

        await collect(source);
        const second = await collect(source);

        expect(second).toHaveLength(3);
        expect(source.name).toBe(`csv:${path}`);
    });
});
