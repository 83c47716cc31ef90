import { parseArgs } from "util";
import { ConfigError, errorMessage } from "../errors.js";
import { parseTimestamp } from "../feed/replay.js";

export interface BacktestArgs {
    csvPath: string;
    symbol: string;
    from?: Date;
    to?: Date;
    offset: number;
}

export const BACKTEST_USAGE = "usage: backtest <csv> [--symbol S] [--from ISO] [--to ISO] [--offset N]";

function parseBound(name: string, raw: string | undefined): Date | undefined {
    if (raw === undefined) return undefined;
    const date = parseTimestamp(raw);
    if (!date) {
        throw new ConfigError(`--${name} is not a timestamp: ${raw}`);
    }
    return date;
}

function parseRawArgs(argv: string[]) {
    try {
        return parseArgs({
            args: argv,
            allowPositionals: true,
            options: {
                symbol: { type: "string" },
                from: { type: "string" },
                to: { type: "string" },
                offset: { type: "string" },
            },
        });
    } catch (err) {
        throw new ConfigError(`${errorMessage(err)}\n${BACKTEST_USAGE}`);
    }
}

export function parseBacktestArgs(argv: string[], defaultSymbol: string): BacktestArgs {
    const { values, positionals } = parseRawArgs(argv);
    const csvPath = positionals[0];
    if (!csvPath || positionals.length > 1) {
        throw new ConfigError(BACKTEST_USAGE);
    }

    const offset = values.offset === undefined ? 0 : Number(values.offset);
    if (!Number.isInteger(offset) || offset < 0) {
        throw new ConfigError(`--offset must be a non-negative integer: ${values.offset}`);
    }

    const from = parseBound("from", values.from);
    const to = parseBound("to", values.to);
    if (from && to && from > to) {
        throw new ConfigError(`--from (${from.toISOString()}) is after --to (${to.toISOString()})`);
    }

    return { csvPath, symbol: values.symbol ?? defaultSymbol, from, to, offset };
}
