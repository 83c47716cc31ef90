import type { Candle } from "@wickguard/shared";
import type { Store } from "../db/store.js";
import { createChildLogger } from "../log/logger.js";

const logger = createChildLogger({ module: "candle-ingest" });

export interface IngestResult {
    inserted: number;
    duplicates: number;
    invalid: number;
}

/**
 * Finite prices, low <= open/close <= high, valid timestamp, volume >= 0.
 * A zero-range candle is well formed; it just never classifies as a wick.
 */
export function isWellFormedCandle(candle: Candle): boolean {
    const { open, high, low, close, volume } = candle;
    if (![open, high, low, close, volume].every(Number.isFinite)) return false;
    if (Number.isNaN(candle.timestamp.getTime())) return false;
    if (low <= 0 || volume < 0) return false;
    return low <= Math.min(open, close) && Math.max(open, close) <= high;
}

/**
 * Write every candle from `source` with insert-or-ignore on (symbol, timestamp).
 * Malformed candles are counted and skipped. Store errors propagate.
 */
export async function ingestCandles(
    source: AsyncIterable<Candle> | Iterable<Candle>,
    store: Store
): Promise<IngestResult> {
    const result: IngestResult = { inserted: 0, duplicates: 0, invalid: 0 };

    for await (const candle of source) {
        if (!isWellFormedCandle(candle)) {
            result.invalid++;
            logger.debug(
                { symbol: candle.symbol, timestamp: candle.timestamp.getTime() },
                "Skipping malformed candle"
            );
            continue;
        }

        const { isNew } = await store.insertCandle(candle);
        if (isNew) result.inserted++;
        else result.duplicates++;
    }

    if (result.inserted > 0 || result.invalid > 0) {
        logger.info(result, "Ingested candles");
    }
    return result;
}
