import { z } from "zod";

/**
 * A ratio in (0, 1]. Used for the wick gates.
 */
const UnitRatio = z.number().gt(0).lte(1);

/**
 * Wick classification thresholds.
 * A candle is a wick when body/range <= bodyRatioMax AND range/close >= rangeThreshold.
 * Both bounds are inclusive.
 */
export const WickThresholdsSchema = z.object({
    /** Max body-to-range ratio (default: 0.30) */
    bodyRatioMax: UnitRatio.default(0.3),
    /** Min range-to-close ratio (default: 0.10 = 10%) */
    rangeThreshold: UnitRatio.default(0.1),
});

export type WickThresholds = z.infer<typeof WickThresholdsSchema>;

export const DEFAULT_WICK_THRESHOLDS: WickThresholds = WickThresholdsSchema.parse({});

/**
 * Settlement executor configuration.
 */
export const SettlementSettingsSchema = z.object({
    /** Max wait for a settlement to be confirmed (default: 5 minutes) */
    confirmationTimeoutMs: z.number().int().positive().default(300_000),
    /** Confirmations required before a receipt counts as final (default: 1) */
    confirmations: z.number().int().min(1).default(1),
});

export type SettlementSettings = z.infer<typeof SettlementSettingsSchema>;

/**
 * Ledger reconciler configuration.
 */
export const ReconcileSettingsSchema = z.object({
    /** Poll interval in ms (default: 15s) */
    intervalMs: z.number().int().positive().default(15_000),
    /** How far back the first run starts, in blocks (default: 1000) */
    lookbackBlocks: z.number().int().min(0).default(1000),
    /** Max blocks per log query (default: 1000) */
    chunkSize: z.number().int().positive().default(1000),
});

export type ReconcileSettings = z.infer<typeof ReconcileSettingsSchema>;

/**
 * Streaming detector configuration.
 */
export const DetectorSettingsSchema = z.object({
    symbol: z.string().min(1).default("BTCUSDT"),
    /** Poll interval for new candles in ms (default: 5s) */
    pollIntervalMs: z.number().int().positive().default(5_000),
    /** Max candles evaluated per tick (default: 500) */
    batchSize: z.number().int().positive().default(500),
    thresholds: WickThresholdsSchema.default({}),
});

export type DetectorSettings = z.infer<typeof DetectorSettingsSchema>;
