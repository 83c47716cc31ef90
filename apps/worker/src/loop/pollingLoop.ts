/**
 * Fixed-interval polling loop with an in-flight guard and cooperative shutdown.
 *
 * - A tick never overlaps itself; an interval that fires mid-tick is skipped.
 * - A failing tick is logged and the loop keeps going.
 * - stop() clears the timer, aborts the tick's signal and resolves once the
 *   in-flight tick (if any) finishes.
 */

import { createChildLogger } from "../log/logger.js";

export interface PollingLoopOptions {
    name: string;
    intervalMs: number;
    /** `signal` is aborted by stop(); long ticks should end early on it */
    tick: (signal: AbortSignal) => Promise<void>;
    /** Run a tick as soon as start() is called (default: true) */
    runImmediately?: boolean;
}

export interface PollingLoop {
    start(): void;
    stop(): Promise<void>;
    isRunning(): boolean;
    lastTickAt(): Date | null;
}

export function createPollingLoop(options: PollingLoopOptions): PollingLoop {
    const logger = createChildLogger({ module: "polling-loop", loop: options.name });

    let timer: ReturnType<typeof setInterval> | null = null;
    let inFlight: Promise<void> | null = null;
    let lastTick: Date | null = null;
    let controller = new AbortController();

    const runTick = (): void => {
        if (inFlight) {
            logger.debug("Tick already in flight, skipping");
            return;
        }

        inFlight = options
            .tick(controller.signal)
            .then(() => {
                lastTick = new Date();
            })
            .catch((err: unknown) => {
                logger.error({ err }, "Tick failed");
            })
            .finally(() => {
                inFlight = null;
            });
    };

    return {
        start() {
            if (timer) {
                logger.warn("Loop already running");
                return;
            }

            logger.info({ intervalMs: options.intervalMs }, "Starting loop");
            controller = new AbortController();
            timer = setInterval(runTick, options.intervalMs);
            if (options.runImmediately ?? true) {
                runTick();
            }
        },

        async stop() {
            if (timer) {
                clearInterval(timer);
                timer = null;
            }
            controller.abort();
            if (inFlight) {
                logger.info("Waiting for in-flight tick to finish");
                await inFlight;
            }
            logger.info("Loop stopped");
        },

        isRunning() {
            return timer !== null;
        },

        lastTickAt() {
            return lastTick;
        },
    };
}
