import type { Server } from "http";
import { env } from "./config/env.js";
import { loadPipelineSettings } from "./config/settings.js";
import { applySchema } from "./db/migrate.js";
import { PgStore } from "./db/pgStore.js";
import { pool } from "./db/pool.js";
import { WickDetector } from "./detect/detector.js";
import { KlinesHttpSource } from "./feed/httpSource.js";
import { ingestCandles } from "./feed/ingest.js";
import { startHealthServer } from "./health/server.js";
import { createSignerQueue } from "./http/limiters.js";
import { EthersLedgerClient } from "./ledger/client.js";
import { logger } from "./log/logger.js";
import { createPollingLoop, type PollingLoop } from "./loop/pollingLoop.js";
import { sweepExpiredPolicies } from "./policy/expirySweep.js";
import { LedgerReconciler } from "./reconcile/index.js";
import { SettlementExecutor } from "./settle/executor.js";

async function main() {
    logger.info("Worker starting...");

    const settings = loadPipelineSettings(env);
    const store = new PgStore(pool);

    // Verify database connection and schema
    try {
        await store.ping();
        await applySchema(pool);
        logger.info("Database connected");
    } catch (err) {
        logger.fatal({ err }, "Failed to prepare database");
        process.exit(1);
    }

    const ledger = new EthersLedgerClient({
        rpcUrl: env.RPC_URL,
        chainId: env.CHAIN_ID,
        contractAddress: env.LEDGER_CONTRACT_ADDRESS,
        signerPrivateKey: env.SIGNER_PRIVATE_KEY,
        maxBlockRange: env.LEDGER_MAX_BLOCK_RANGE,
        confirmations: settings.settlement.confirmations,
    });

    const detector = new WickDetector(store, settings.detector.thresholds);
    const executor = new SettlementExecutor({
        store,
        ledger,
        signerQueue: createSignerQueue(),
        settings: settings.settlement,
    });
    const reconciler = new LedgerReconciler({ store, ledger, settings: settings.reconcile });

    const { symbol, batchSize } = settings.detector;
    const loops: Record<string, PollingLoop> = {
        detector: createPollingLoop({
            name: "detector",
            intervalMs: settings.detector.pollIntervalMs,
            tick: async (signal) => {
                await detector.processNewCandles(
                    symbol,
                    batchSize,
                    async (event) => {
                        await executor.execute(event);
                    },
                    signal
                );
            },
        }),
        reconciler: createPollingLoop({
            name: "reconciler",
            intervalMs: settings.reconcile.intervalMs,
            tick: async () => {
                await reconciler.poll();
            },
        }),
    };

    // Live candle feed (optional; candles may also be written by another process)
    if (env.CANDLE_FEED_URL) {
        const feed = new KlinesHttpSource({
            endpoint: env.CANDLE_FEED_URL,
            symbol,
            interval: env.CANDLE_FEED_INTERVAL,
            pollIntervalMs: env.CANDLE_FEED_POLL_MS,
        });
        loops.candleFeed = createPollingLoop({
            name: "candle-feed",
            intervalMs: env.CANDLE_FEED_POLL_MS,
            tick: async () => {
                await ingestCandles(await feed.poll(), store);
            },
        });
    } else {
        logger.info("Live candle feed disabled (CANDLE_FEED_URL not set)");
    }

    if (env.EXPIRY_SWEEP_ENABLED) {
        loops.expirySweep = createPollingLoop({
            name: "expiry-sweep",
            intervalMs: env.EXPIRY_SWEEP_INTERVAL_MS,
            tick: async () => {
                await sweepExpiredPolicies(store);
            },
        });
    }

    let healthServer: Server | null = null;
    if (env.HEALTH_SERVER_ENABLED) {
        healthServer = startHealthServer(
            { store, reconciler, ledgerContractId: ledger.contractId, symbol, loops },
            env.WORKER_PORT
        );
    }

    for (const loop of Object.values(loops)) {
        loop.start();
    }

    logger.info({ symbol, contract: ledger.contractId, loops: Object.keys(loops) }, "Worker started successfully");

    // Graceful shutdown
    let shuttingDown = false;
    const shutdown = async () => {
        if (shuttingDown) return;
        shuttingDown = true;
        logger.info("Shutting down...");
        // Ticks stop between candles; in-flight settlements finish or hit the confirmation timeout
        await Promise.all(Object.values(loops).map((loop) => loop.stop()));
        healthServer?.close();
        ledger.destroy();
        await pool.end();
        process.exit(0);
    };

    const onSignal = () => {
        shutdown().catch((err: unknown) => {
            logger.fatal({ err }, "Shutdown failed");
            process.exit(1);
        });
    };
    process.on("SIGTERM", onSignal);
    process.on("SIGINT", onSignal);
}

main().catch((err) => {
    logger.fatal({ err }, "Worker crashed");
    process.exit(1);
});
