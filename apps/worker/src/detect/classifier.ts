/**
 * Wick classification.
 *
 * A wick is a candle with a large high-low range and a small open-close body:
 *   body  = |close - open|
 *   range = high - low
 *   wick  <=> range > 0 AND body/range <= bodyRatioMax AND range/close >= rangeThreshold
 *
 * Close direction does not matter. Both bounds are inclusive.
 */

import type { Candle, WickThresholds } from "@wickguard/shared";

export interface WickMetrics {
    body: number;
    range: number;
    bodyRatio: number;
    rangeRatio: number;
}

/**
 * Compute body/range metrics, or null for a malformed candle
 * (non-finite prices, non-positive range or close).
 */
export function computeWickMetrics(candle: Candle): WickMetrics | null {
    const { open, high, low, close } = candle;
    if (![open, high, low, close].every(Number.isFinite)) {
        return null;
    }

    const range = high - low;
    if (range <= 0 || close <= 0) {
        return null;
    }

    const body = Math.abs(close - open);
    return {
        body,
        range,
        bodyRatio: body / range,
        rangeRatio: range / close,
    };
}

/**
 * Classify a candle. Returns its metrics when it qualifies as a wick,
 * null otherwise. Malformed candles never qualify.
 */
export function classifyCandle(candle: Candle, thresholds: WickThresholds): WickMetrics | null {
    const metrics = computeWickMetrics(candle);
    if (!metrics) {
        return null;
    }

    if (metrics.bodyRatio > thresholds.bodyRatioMax) {
        return null;
    }
    if (metrics.rangeRatio < thresholds.rangeThreshold) {
        return null;
    }
    return metrics;
}
