/**
 * backtest <csv> [--symbol S] [--from ISO] [--to ISO] [--offset N]
 *
 * Loads a candle CSV into the store and replays wick detection over it.
 * Events found are persisted like live detections but never settled.
 */

import { env } from "../config/env.js";
import { loadPipelineSettings } from "../config/settings.js";
import { applySchema } from "../db/migrate.js";
import { PgStore } from "../db/pgStore.js";
import { pool } from "../db/pool.js";
import { WickDetector } from "../detect/detector.js";
import { ConfigError } from "../errors.js";
import { CsvReplaySource } from "../feed/replay.js";
import { logger } from "../log/logger.js";
import { parseBacktestArgs } from "./args.js";
import { runBacktest } from "./run.js";

async function main() {
    const args = parseBacktestArgs(process.argv.slice(2), env.SYMBOL);
    const settings = loadPipelineSettings(env);

    const store = new PgStore(pool);
    await applySchema(pool);

    const source = new CsvReplaySource(args.csvPath, { symbol: args.symbol, offset: args.offset });
    const detector = new WickDetector(store, settings.detector.thresholds);

    try {
        await runBacktest(source, store, detector, { symbol: args.symbol, from: args.from, to: args.to });
    } finally {
        await pool.end();
    }
}

main().catch((err) => {
    if (err instanceof ConfigError) {
        logger.error(err.message);
        process.exit(2);
    }
    logger.fatal({ err }, "Backtest failed");
    process.exit(1);
});
