import type { Candle } from "@wickguard/shared";
import type { Store } from "../db/store.js";
import type { DetectionResult, WickDetector } from "../detect/detector.js";
import { ingestCandles, type IngestResult } from "../feed/ingest.js";
import { createChildLogger } from "../log/logger.js";

const logger = createChildLogger({ module: "backtest" });

export interface BacktestOptions {
    symbol: string;
    from?: Date;
    to?: Date;
}

export interface BacktestReport {
    symbol: string;
    ingest: IngestResult;
    /** Null when no candle was read and no bound was given */
    from: Date | null;
    to: Date | null;
    events: DetectionResult[];
}

/**
 * Ingest a candle source, then replay detection over [from, to]. Missing
 * bounds default to the first and last candle timestamps read.
 */
export async function runBacktest(
    source: AsyncIterable<Candle>,
    store: Store,
    detector: WickDetector,
    options: BacktestOptions
): Promise<BacktestReport> {
    const seen: { first: Date | null; last: Date | null } = { first: null, last: null };

    async function* observed(): AsyncGenerator<Candle> {
        for await (const candle of source) {
            const t = candle.timestamp.getTime();
            if (Number.isFinite(t)) {
                if (!seen.first || t < seen.first.getTime()) seen.first = candle.timestamp;
                if (!seen.last || t > seen.last.getTime()) seen.last = candle.timestamp;
            }
            yield candle;
        }
    }

    const ingestResult = await ingestCandles(observed(), store);

    const from = options.from ?? seen.first;
    const to = options.to ?? seen.last;
    if (!from || !to) {
        logger.warn({ symbol: options.symbol }, "No candles to replay");
        return { symbol: options.symbol, ingest: ingestResult, from, to, events: [] };
    }

    const events = await detector.detectRange(options.symbol, from, to);
    for (const { event, metrics } of events) {
        logger.info(
            {
                eventId: event.id,
                timestamp: event.timestamp.toISOString(),
                bodyRatio: Number(metrics.bodyRatio.toFixed(4)),
                rangeRatio: Number(metrics.rangeRatio.toFixed(4)),
            },
            "Wick"
        );
    }

    logger.info(
        {
            symbol: options.symbol,
            from: from.toISOString(),
            to: to.toISOString(),
            ...ingestResult,
            events: events.length,
            newEvents: events.filter((e) => e.isNew).length,
        },
        "Backtest complete"
    );

    return { symbol: options.symbol, ingest: ingestResult, from, to, events };
}
