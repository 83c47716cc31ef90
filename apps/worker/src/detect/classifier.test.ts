import { describe, it, expect } from "vitest";
import { DEFAULT_WICK_THRESHOLDS, type Candle } from "@wickguard/shared";
import { classifyCandle, computeWickMetrics } from "./classifier.js";

function candle(open: number, high: number, low: number, close: number): Candle {
    return {
        symbol: "BTCUSDT",
        timestamp: new Date("2025-03-01T00:00:00Z"),
        open,
        high,
        low,
        close,
        volume: 12.5,
    };
}

describe("computeWickMetrics", () => {
    it("should compute body, range and both ratios", () => {
        const metrics = computeWickMetrics(candle(97, 107, 97, 100));

        expect(metrics).toEqual({ body: 3, range: 10, bodyRatio: 0.3, rangeRatio: 0.1 });
    });

    it("should return null for a zero-range candle", () => {
        expect(computeWickMetrics(candle(100, 100, 100, 100))).toBeNull();
    });

    it("should return null for non-finite prices", () => {
        expect(computeWickMetrics(candle(100, Number.NaN, 90, 95))).toBeNull();
        expect(computeWickMetrics(candle(100, Number.POSITIVE_INFINITY, 90, 95))).toBeNull();
    });

    it("should return null for a non-positive close", () => {
        expect(computeWickMetrics(candle(1, 2, -1, 0))).toBeNull();
    });
});

describe("classifyCandle", () => {
    it("should reject a trending move whose body dominates the range", () => {
        // body 4500, range 4800 -> bodyRatio 0.9375, despite a 10% drop
        const c = candle(45_000, 45_200, 40_400, 40_500);

        expect(computeWickMetrics(c)?.bodyRatio).toBe(0.9375);
        expect(classifyCandle(c, DEFAULT_WICK_THRESHOLDS)).toBeNull();
    });

    it("should accept a long-wick candle with a small body", () => {
        // body 100, range 8500 -> bodyRatio ~0.0118, rangeRatio ~0.194
        const metrics = classifyCandle(candle(44_000, 48_000, 39_500, 43_900), DEFAULT_WICK_THRESHOLDS);

        expect(metrics).not.toBeNull();
        expect(metrics?.body).toBe(100);
        expect(metrics?.range).toBe(8500);
        expect(metrics?.bodyRatio).toBeCloseTo(0.0118, 4);
        expect(metrics?.rangeRatio).toBeCloseTo(0.1936, 4);
    });

    it("should accept a candle exactly on both thresholds", () => {
        expect(classifyCandle(candle(97, 107, 97, 100), DEFAULT_WICK_THRESHOLDS)).not.toBeNull();
    });

    it("should ignore close direction", () => {
        // Same shape as the boundary candle, closing down
        expect(classifyCandle(candle(103, 107, 97, 100), DEFAULT_WICK_THRESHOLDS)).not.toBeNull();
    });

    it("should reject a body ratio just over the maximum", () => {
        // body 4, range 10 -> 0.4
        expect(classifyCandle(candle(96, 106, 96, 100), DEFAULT_WICK_THRESHOLDS)).toBeNull();
    });

    it("should reject a range under the threshold", () => {
        // body 1, range 9 -> bodyRatio 0.11, rangeRatio 0.09
        expect(classifyCandle(candle(99, 105, 96, 100), DEFAULT_WICK_THRESHOLDS)).toBeNull();
    });

    it("should apply custom thresholds", () => {
        const c = candle(99, 105, 96, 100);

        expect(classifyCandle(c, { bodyRatioMax: 0.3, rangeThreshold: 0.05 })).not.toBeNull();
        expect(classifyCandle(c, { bodyRatioMax: 0.1, rangeThreshold: 0.05 })).toBeNull();
    });
});
