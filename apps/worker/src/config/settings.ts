import {
    DetectorSettingsSchema,
    ReconcileSettingsSchema,
    SettlementSettingsSchema,
    type DetectorSettings,
    type ReconcileSettings,
    type SettlementSettings,
} from "@wickguard/shared";
import type { z } from "zod";
import { ConfigError } from "../errors.js";
import type { Env } from "./env.js";

export interface PipelineSettings {
    detector: DetectorSettings;
    settlement: SettlementSettings;
    reconcile: ReconcileSettings;
}

function parseSection<T extends z.ZodTypeAny>(name: string, schema: T, input: unknown): z.output<T> {
    const result = schema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues.map((i) => `${[name, ...i.path].join(".")}: ${i.message}`);
        throw new ConfigError(`Invalid ${name} settings: ${issues.join("; ")}`);
    }
    return result.data;
}

/**
 * Pipeline tunables from the environment, validated against the shared
 * schemas (ratio bounds, positive intervals).
 */
export function loadPipelineSettings(env: Env): PipelineSettings {
    return {
        detector: parseSection("detector", DetectorSettingsSchema, {
            symbol: env.SYMBOL,
            pollIntervalMs: env.DETECTOR_POLL_INTERVAL_MS,
            batchSize: env.DETECTOR_BATCH_SIZE,
            thresholds: {
                bodyRatioMax: env.WICK_BODY_RATIO_MAX,
                rangeThreshold: env.WICK_RANGE_THRESHOLD,
            },
        }),
        settlement: parseSection("settlement", SettlementSettingsSchema, {
            confirmationTimeoutMs: env.CONFIRMATION_TIMEOUT_MS,
            confirmations: env.CONFIRMATIONS,
        }),
        reconcile: parseSection("reconcile", ReconcileSettingsSchema, {
            intervalMs: env.RECONCILE_INTERVAL_MS,
            lookbackBlocks: env.RECONCILE_LOOKBACK_BLOCKS,
            chunkSize: env.RECONCILE_CHUNK_SIZE,
        }),
    };
}
