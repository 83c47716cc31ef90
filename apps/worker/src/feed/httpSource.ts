/**
 * Live klines feed over HTTP.
 *
 * Polls an exchange klines endpoint that returns Binance-style array rows:
 *   [openTime, open, high, low, close, volume, closeTime, ...]
 * Only closed candles newer than the last one yielded are emitted. A failed
 * poll is logged and retried after the poll interval.
 */

import type Bottleneck from "bottleneck";
import { request } from "undici";
import { z } from "zod";
import type { Candle } from "@wickguard/shared";
import { candleFeedLimiter } from "../http/limiters.js";
import { createChildLogger } from "../log/logger.js";
import type { CandleSource } from "./types.js";

const logger = createChildLogger({ module: "klines-feed" });

const numeric = z.union([z.string(), z.number()]).transform(Number);

export const KlineRowSchema = z
    .tuple([z.number(), numeric, numeric, numeric, numeric, numeric, z.number()])
    .rest(z.unknown());

export const KlinesResponseSchema = z.array(KlineRowSchema);

export type KlineRow = z.infer<typeof KlineRowSchema>;

/**
 * Closed rows opened after `afterOpenTime`, as candles in open-time order.
 */
export function selectClosedCandles(rows: KlineRow[], symbol: string, afterOpenTime: number, now: number): Candle[] {
    return rows
        .filter(([openTime, , , , , , closeTime]) => openTime > afterOpenTime && closeTime < now)
        .sort((a, b) => a[0] - b[0])
        .map(([openTime, open, high, low, close, volume]) => ({
            symbol,
            timestamp: new Date(openTime),
            open,
            high,
            low,
            close,
            volume,
        }));
}

export type KlinesFetcher = (url: string) => Promise<unknown>;

async function fetchKlinesJson(url: string): Promise<unknown> {
    const response = await request(url, {
        method: "GET",
        headers: { Accept: "application/json" },
    });

    if (response.statusCode !== 200) {
        const body = await response.body.text();
        throw new Error(`Klines API error ${response.statusCode}: ${body}`);
    }

    return response.body.json();
}

export interface KlinesHttpSourceOptions {
    /** Full klines endpoint, e.g. https://api.binance.com/api/v3/klines */
    endpoint: string;
    symbol: string;
    interval: string;
    pollIntervalMs: number;
    limit?: number;
    fetcher?: KlinesFetcher;
    /** Defaults to the shared candle feed limiter */
    limiter?: Bottleneck;
    now?: () => number;
}

export class KlinesHttpSource implements CandleSource {
    readonly name: string;

    private readonly fetcher: KlinesFetcher;
    private readonly limiter: Bottleneck;
    private readonly now: () => number;
    private lastOpenTime = Number.NEGATIVE_INFINITY;
    private stopped = false;
    private wake: (() => void) | null = null;

    constructor(private readonly options: KlinesHttpSourceOptions) {
        this.name = `klines:${options.symbol}:${options.interval}`;
        this.fetcher = options.fetcher ?? fetchKlinesJson;
        this.limiter = options.limiter ?? candleFeedLimiter;
        this.now = options.now ?? Date.now;
    }

    /**
     * One request: the closed candles not yet returned by an earlier poll.
     */
    async poll(): Promise<Candle[]> {
        const url = new URL(this.options.endpoint);
        url.searchParams.set("symbol", this.options.symbol);
        url.searchParams.set("interval", this.options.interval);
        url.searchParams.set("limit", String(this.options.limit ?? 100));

        const rows = await this.limiter.schedule(async () => {
            logger.debug({ url: url.toString() }, "Klines request");
            return KlinesResponseSchema.parse(await this.fetcher(url.toString()));
        });

        const candles = selectClosedCandles(rows, this.options.symbol, this.lastOpenTime, this.now());
        const newest = candles.at(-1);
        if (newest) {
            this.lastOpenTime = newest.timestamp.getTime();
        }
        return candles;
    }

    async *[Symbol.asyncIterator](): AsyncGenerator<Candle> {
        this.stopped = false;
        while (!this.stopped) {
            try {
                yield* await this.poll();
            } catch (err) {
                logger.warn({ err, source: this.name }, "Klines poll failed");
            }
            if (!this.stopped) {
                await this.sleep(this.options.pollIntervalMs);
            }
        }
    }

    /** Ends iteration after the current poll. */
    stop(): void {
        this.stopped = true;
        this.wake?.();
    }

    private sleep(ms: number): Promise<void> {
        return new Promise((resolve) => {
            const timer = setTimeout(() => {
                this.wake = null;
                resolve();
            }, ms);
            this.wake = () => {
                clearTimeout(timer);
                this.wake = null;
                resolve();
            };
        });
    }
}
