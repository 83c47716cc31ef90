import pino, { type Logger } from "pino";
import { env } from "../config/env.js";

export const logger = pino({
    level: env.LOG_LEVEL,
    transport:
        env.NODE_ENV === "development"
            ? {
                target: "pino-pretty",
                options: {
                    colorize: true,
                    translateTime: "SYS:standard",
                    ignore: "pid,hostname",
                },
            }
            : undefined,
    base: {
        service: "wickguard-worker",
    },
});

export type { Logger };

export function createChildLogger(bindings: Record<string, unknown>): Logger {
    return logger.child(bindings);
}
