import type { Candle } from "@wickguard/shared";

/**
 * A stream of candles, oldest first. Finite for file replays, unbounded for
 * live feeds.
 */
export interface CandleSource extends AsyncIterable<Candle> {
    readonly name: string;
}
