import { readFile } from "fs/promises";
import { fileURLToPath } from "url";
import type { Pool } from "pg";
import { createChildLogger } from "../log/logger.js";

const logger = createChildLogger({ module: "migrate" });

const SCHEMA_PATH = fileURLToPath(new URL("./schema.sql", import.meta.url));

/**
 * Apply schema.sql. Every statement is IF NOT EXISTS, so this runs on each start.
 */
export async function applySchema(pool: Pool): Promise<void> {
    const sql = await readFile(SCHEMA_PATH, "utf8");
    await pool.query(sql);
    logger.info({ path: SCHEMA_PATH }, "Schema applied");
}
