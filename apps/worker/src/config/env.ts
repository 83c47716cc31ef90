import { config } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

// Load .env from project root (two levels up from apps/worker/src/config)
const __dirname = dirname(fileURLToPath(import.meta.url));
config({ path: resolve(__dirname, "../../../../.env") });

const booleanFlag = (fallback: "true" | "false") =>
    z
        .string()
        .transform((v) => v.toLowerCase() !== "false" && v !== "0")
        .default(fallback);

const envSchema = z.object({
    DATABASE_URL: z.string().url(),
    RPC_URL: z.string().url(),
    CHAIN_ID: z.coerce.number().int().positive().optional(),
    LEDGER_CONTRACT_ADDRESS: z.string().regex(/^0x[0-9a-fA-F]{40}$/, "must be a 20-byte hex address"),
    SIGNER_PRIVATE_KEY: z.string().min(1),

    SYMBOL: z.string().min(1).default("BTCUSDT"),
    WICK_BODY_RATIO_MAX: z.coerce.number().default(0.3),
    WICK_RANGE_THRESHOLD: z.coerce.number().default(0.1),
    DETECTOR_POLL_INTERVAL_MS: z.coerce.number().int().default(5_000),
    DETECTOR_BATCH_SIZE: z.coerce.number().int().default(500),

    RECONCILE_INTERVAL_MS: z.coerce.number().int().default(15_000),
    RECONCILE_LOOKBACK_BLOCKS: z.coerce.number().int().default(1000),
    RECONCILE_CHUNK_SIZE: z.coerce.number().int().default(1000),
    LEDGER_MAX_BLOCK_RANGE: z.coerce.number().int().positive().default(2000),

    CONFIRMATION_TIMEOUT_MS: z.coerce.number().int().default(300_000),
    CONFIRMATIONS: z.coerce.number().int().default(1),

    EXPIRY_SWEEP_ENABLED: booleanFlag("false"),
    EXPIRY_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),

    CANDLE_FEED_URL: z.string().url().optional(),
    CANDLE_FEED_INTERVAL: z.string().default("1m"),
    CANDLE_FEED_POLL_MS: z.coerce.number().int().positive().default(60_000),

    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
    WORKER_PORT: z.coerce.number().default(8081),
    HEALTH_SERVER_ENABLED: booleanFlag("true"),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
        console.error("❌ Invalid environment variables:");
        console.error(result.error.format());
        process.exit(1);
    }
    return result.data;
}

export const env = loadEnv();
