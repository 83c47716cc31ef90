import pg from "pg";
import { env } from "../config/env.js";
import { logger } from "../log/logger.js";

export const pool = new pg.Pool({
    connectionString: env.DATABASE_URL,
    max: 10,
});

pool.on("error", (err) => {
    logger.error({ err }, "Postgres pool error");
});
