/**
 * Wick detector.
 *
 * One evaluation path, two ways in:
 * - streaming: processNewCandles() walks candles past the persisted cursor,
 *   called from the detection loop
 * - replay: detectRange() walks a historical time range for backtests
 *
 * Streaming only settles candles newer than any it has already streamed.
 * History loaded later (a backtest CSV) still gets ids past the cursor, so
 * its events are recorded but never handed to settlement.
 *
 * Persisting the WickEvent is what makes a candle "detected". The insert is
 * keyed on the candle id, so re-evaluating a candle never creates a second
 * event; only the first evaluation reports isNew.
 */

import type { StoredCandle, WickEvent, WickThresholds } from "@wickguard/shared";
import type { DetectorCursor, Store } from "../db/store.js";
import { createChildLogger } from "../log/logger.js";
import { classifyCandle, type WickMetrics } from "./classifier.js";

const logger = createChildLogger({ module: "wick-detector" });

export interface DetectionResult {
    event: WickEvent;
    metrics: WickMetrics;
    /** False when the candle was already linked to an event */
    isNew: boolean;
}

export type WickEventHandler = (event: WickEvent) => Promise<void>;

export interface DetectionTickResult {
    evaluated: number;
    /** New events handed to the handler */
    detected: number;
    /** New events on candles older than the streamed timestamp, not handed on */
    historical: number;
    cursor: number;
}

export class WickDetector {
    constructor(
        private readonly store: Store,
        private readonly thresholds: WickThresholds,
        private readonly now: () => Date = () => new Date()
    ) {}

    /**
     * Evaluate one stored candle, persisting an event if it is a wick.
     */
    async evaluate(candle: StoredCandle): Promise<DetectionResult | null> {
        const metrics = classifyCandle(candle, this.thresholds);
        if (!metrics) {
            return null;
        }

        const { row, isNew } = await this.store.insertWickEvent({
            symbol: candle.symbol,
            timestamp: candle.timestamp,
            candleId: candle.id,
            bodyRatio: metrics.bodyRatio,
            rangeRatio: metrics.rangeRatio,
        });

        if (isNew) {
            logger.info(
                {
                    eventId: row.id,
                    candleId: candle.id,
                    symbol: candle.symbol,
                    timestamp: candle.timestamp.toISOString(),
                    bodyRatio: metrics.bodyRatio,
                    rangeRatio: metrics.rangeRatio,
                },
                "Wick detected"
            );
        } else {
            logger.debug({ eventId: row.id, candleId: candle.id }, "Candle already has a wick event");
        }

        return { event: row, metrics, isNew };
    }

    /**
     * Replay mode: evaluate every stored candle in [from, to], oldest first.
     * Returns every qualifying event, including ones recorded by earlier runs.
     */
    async detectRange(symbol: string, from: Date, to: Date): Promise<DetectionResult[]> {
        const candles = await this.store.getCandlesBetween(symbol, from, to);
        logger.info(
            { symbol, from: from.toISOString(), to: to.toISOString(), candles: candles.length },
            "Replaying candle range"
        );

        const results: DetectionResult[] = [];
        for (const candle of candles) {
            const result = await this.evaluate(candle);
            if (result) {
                results.push(result);
            }
        }

        logger.info(
            { symbol, events: results.length, newEvents: results.filter((r) => r.isNew).length },
            "Replay complete"
        );
        return results;
    }

    /**
     * Streaming mode: evaluate up to `batchSize` candles past the cursor and
     * hand each newly detected event to `onEvent`.
     *
     * First run (no cursor) starts at the latest stored candle; history is
     * left to detectRange(). The cursor advances after each candle, so a
     * failed store call stops the tick and the next tick resumes there.
     * A failing handler is logged and does not hold the cursor back.
     * An aborted `signal` ends the tick before the next candle.
     */
    async processNewCandles(
        symbol: string,
        batchSize: number,
        onEvent: WickEventHandler,
        signal?: AbortSignal
    ): Promise<DetectionTickResult> {
        let cursor = await this.store.getDetectorCursor(symbol);
        if (cursor === null) {
            cursor = await this.seedCursor(symbol);
            return { evaluated: 0, detected: 0, historical: 0, cursor: cursor.candleId };
        }

        const candles = await this.store.getCandlesAfter(symbol, cursor.candleId, batchSize);
        let evaluated = 0;
        let detected = 0;
        let historical = 0;

        for (const candle of candles) {
            if (signal?.aborted) {
                logger.info(
                    { symbol, cursor: cursor.candleId, remaining: candles.length - evaluated },
                    "Detection tick interrupted"
                );
                break;
            }

            const fresh: boolean = candle.timestamp > cursor.streamedThrough;
            const result = await this.evaluate(candle);
            evaluated++;

            if (result?.isNew && fresh) {
                detected++;
                try {
                    await onEvent(result.event);
                } catch (err) {
                    logger.error({ err, eventId: result.event.id }, "Wick event handler failed");
                }
            } else if (result?.isNew) {
                historical++;
                logger.warn(
                    {
                        eventId: result.event.id,
                        timestamp: candle.timestamp.toISOString(),
                        streamedThrough: cursor.streamedThrough.toISOString(),
                    },
                    "Wick predates streamed candles, not settled"
                );
            }

            cursor = {
                candleId: candle.id,
                streamedThrough: fresh ? candle.timestamp : cursor.streamedThrough,
            };
            await this.store.setDetectorCursor(symbol, cursor);
        }

        if (evaluated > 0) {
            logger.debug(
                { symbol, evaluated, detected, historical, cursor: cursor.candleId },
                "Detection tick complete"
            );
        }
        return { evaluated, detected, historical, cursor: cursor.candleId };
    }

    /**
     * Start after the latest stored candle. With no candles yet, only candles
     * opened after this moment are settled.
     */
    private async seedCursor(symbol: string): Promise<DetectorCursor> {
        const latest = await this.store.getLatestCandle(symbol);
        const [newest] = await this.store.getRecentCandles(symbol, 1);
        const cursor: DetectorCursor = {
            candleId: latest?.id ?? 0,
            streamedThrough: newest?.timestamp ?? this.now(),
        };
        await this.store.setDetectorCursor(symbol, cursor);
        logger.info(
            { symbol, cursor: cursor.candleId, streamedThrough: cursor.streamedThrough.toISOString() },
            "Seeded detector cursor"
        );
        return cursor;
    }
}
