import { describe, it, expect } from "vitest";
import { ConfigError } from "../errors.js";
import { BACKTEST_USAGE, parseBacktestArgs } from "./args.js";

describe("parseBacktestArgs", () => {
    it("should take the csv path and fall back to the default symbol", () => {
        expect(parseBacktestArgs(["data/btc.csv"], "BTCUSDT")).toEqual({
            csvPath: "data/btc.csv",
            symbol: "BTCUSDT",
            from: undefined,
            to: undefined,
            offset: 0,
        });
    });

    it("should read every option", () => {
        const args = parseBacktestArgs(
            [
                "candles.csv",
                "--symbol",
                "ETHUSDT",
                "--from",
                "2025-03-01T00:00:00Z",
                "--to",
                "1741046400000",
                "--offset",
                "10",
            ],
            "BTCUSDT"
        );

        expect(args).toEqual({
            csvPath: "candles.csv",
            symbol: "ETHUSDT",
            from: new Date("2025-03-01T00:00:00Z"),
            to: new Date("2025-03-04T00:00:00Z"),
            offset: 10,
        });
    });

    it("should require exactly one csv path", () => {
        expect(() => parseBacktestArgs([], "BTCUSDT")).toThrow(BACKTEST_USAGE);
        expect(() => parseBacktestArgs(["a.csv", "b.csv"], "BTCUSDT")).toThrow(BACKTEST_USAGE);
    });

    it("should reject unknown flags", () => {
        expect(() => parseBacktestArgs(["a.csv", "--speed", "2"], "BTCUSDT")).toThrow(ConfigError);
    });

    it("should reject bad bounds and offsets", () => {
        expect(() => parseBacktestArgs(["a.csv", "--from", "yesterday"], "BTCUSDT")).toThrow(
            "--from is not a timestamp: yesterday"
        );
        expect(() =>
            parseBacktestArgs(["a.csv", "--from", "2025-03-02T00:00:00Z", "--to", "2025-03-01T00:00:00Z"], "BTCUSDT")
        ).toThrow(ConfigError);
        expect(() => parseBacktestArgs(["a.csv", "--offset", "-1"], "BTCUSDT")).toThrow(ConfigError);
    });
});
