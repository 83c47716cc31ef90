import Bottleneck from "bottleneck";
import { logger } from "../log/logger.js";

/**
 * Rate limiters and queues for outbound calls.
 *
 * - RPC reads (block height, logs, receipts, block timestamps): 5 rps, burst 10
 * - Candle feed polling: 2 rps, burst 5
 * - Signer queue: one write at a time per signer, so nonces are assigned in order
 */

/**
 * Ledger RPC read limiter.
 */
export const rpcLimiter = new Bottleneck({
    minTime: 200, // 5 rps max
    reservoir: 10,
    reservoirRefreshAmount: 5,
    reservoirRefreshInterval: 1000,
});

/**
 * Candle feed limiter.
 * Exchange kline endpoints are cheap but share an IP-wide weight budget.
 */
export const candleFeedLimiter = new Bottleneck({
    minTime: 500, // 2 rps max
    reservoir: 5,
    reservoirRefreshAmount: 2,
    reservoirRefreshInterval: 1000,
});

/**
 * Create a single-concurrency queue for ledger writes from one signer.
 * Every settlement submission from that signer must go through the same queue.
 */
export function createSignerQueue(): Bottleneck {
    const queue = new Bottleneck({ maxConcurrent: 1 });
    queue.on("failed", (error, jobInfo) => {
        logger.warn(
            { error: error instanceof Error ? error.message : String(error), jobId: jobInfo.options.id },
            "Signer queue job failed"
        );
    });
    return queue;
}

rpcLimiter.on("failed", (error, jobInfo) => {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.warn(
        { error: errorMessage, jobId: jobInfo.options.id },
        "Ledger RPC request failed"
    );
});

candleFeedLimiter.on("failed", (error, jobInfo) => {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.warn(
        { error: errorMessage, jobId: jobInfo.options.id },
        "Candle feed request failed"
    );
});
