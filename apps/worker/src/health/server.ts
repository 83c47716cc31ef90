import { createServer, type IncomingMessage, type Server, type ServerResponse } from "http";
import type { SystemStats } from "@wickguard/shared";
import type { Store } from "../db/store.js";
import { logger } from "../log/logger.js";
import type { PollingLoop } from "../loop/pollingLoop.js";
import type { LedgerReconciler, ReconcileTickStatus } from "../reconcile/index.js";

export interface HealthContext {
    store: Store;
    reconciler: LedgerReconciler;
    ledgerContractId: string;
    symbol: string;
    loops: Record<string, PollingLoop>;
    now?: () => Date;
}

interface LoopHealth {
    running: boolean;
    lastTickAt: string | null;
}

interface ReconcileHealth {
    checkpoint: number | null;
    lastTickStatus: ReconcileTickStatus | null;
    lastTickFailures: number;
}

interface DetectorHealth {
    symbol: string;
    cursor: number | null;
    streamedThrough: string | null;
}

export interface HealthStatus {
    status: "ok" | "degraded" | "unhealthy";
    timestamp: string;
    dbConnected: boolean;
    reconcile: ReconcileHealth;
    detector: DetectorHealth;
    loops: Record<string, LoopHealth>;
    stats: SystemStats | null;
}

/**
 * Unhealthy when the database is unreachable; degraded when the last
 * reconcile tick failed or a loop has stopped.
 */
export async function getHealthStatus(ctx: HealthContext): Promise<HealthStatus> {
    const now = ctx.now?.() ?? new Date();

    const loops: Record<string, LoopHealth> = {};
    for (const [name, loop] of Object.entries(ctx.loops)) {
        loops[name] = { running: loop.isRunning(), lastTickAt: loop.lastTickAt()?.toISOString() ?? null };
    }

    const lastTick = ctx.reconciler.getLastResult();
    const reconcile: ReconcileHealth = {
        checkpoint: null,
        lastTickStatus: lastTick?.status ?? null,
        lastTickFailures: lastTick?.failures ?? 0,
    };
    const detector: DetectorHealth = { symbol: ctx.symbol, cursor: null, streamedThrough: null };

    let dbConnected = false;
    let stats: SystemStats | null = null;
    try {
        await ctx.store.ping();
        dbConnected = true;
        const checkpoint = await ctx.store.getCheckpoint(ctx.ledgerContractId);
        reconcile.checkpoint = checkpoint?.lastSyncedHeight ?? null;
        const cursor = await ctx.store.getDetectorCursor(ctx.symbol);
        detector.cursor = cursor?.candleId ?? null;
        detector.streamedThrough = cursor?.streamedThrough.toISOString() ?? null;
        stats = await ctx.store.getStats(now);
    } catch (err) {
        logger.warn({ err, dbConnected }, "Health check query failed");
    }

    let status: HealthStatus["status"] = "ok";
    if (!dbConnected) {
        status = "unhealthy";
    } else if (lastTick?.status === "failed" || Object.values(loops).some((l) => !l.running)) {
        status = "degraded";
    }

    return {
        status,
        timestamp: now.toISOString(),
        dbConnected,
        reconcile,
        detector,
        loops,
        stats,
    };
}

function handleRequest(ctx: HealthContext, req: IncomingMessage, res: ServerResponse) {
    if (req.url === "/health" && req.method === "GET") {
        getHealthStatus(ctx)
            .then((status) => {
                const statusCode = status.status === "unhealthy" ? 503 : 200;
                res.writeHead(statusCode, { "Content-Type": "application/json" });
                res.end(JSON.stringify(status));
            })
            .catch((err) => {
                logger.error({ err }, "Health check failed");
                res.writeHead(500, { "Content-Type": "application/json" });
                res.end(JSON.stringify({ status: "error", error: String(err) }));
            });
    } else {
        res.writeHead(404);
        res.end("Not Found");
    }
}

export function startHealthServer(ctx: HealthContext, port: number): Server {
    const server = createServer((req, res) => handleRequest(ctx, req, res));
    server.listen(port, () => {
        logger.info({ port }, "Health server started");
    });
    return server;
}
