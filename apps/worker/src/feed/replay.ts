/**
 * CSV candle replay.
 *
 * Columns: timestamp, open, high, low, close, volume. The header row is
 * optional. Timestamps are epoch milliseconds or anything Date.parse takes
 * (ISO 8601). Each iteration re-reads the file, so a source can be replayed.
 */

import { readFile } from "fs/promises";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import type { Candle } from "@wickguard/shared";
import { createChildLogger } from "../log/logger.js";
import type { CandleSource } from "./types.js";

const logger = createChildLogger({ module: "csv-replay" });

const CsvRecordsSchema = z.array(z.array(z.string()));

const CSV_COLUMNS = 6;

export interface ParsedCandleCsv {
    candles: Candle[];
    /** Rows dropped for a missing column or an unreadable timestamp */
    skipped: number;
}

export function parseTimestamp(raw: string): Date | null {
    const ms = /^\d+$/.test(raw) ? Number(raw) : Date.parse(raw);
    return Number.isFinite(ms) ? new Date(ms) : null;
}

function parsePrice(raw: string): number {
    return raw === "" ? Number.NaN : Number(raw);
}

/**
 * Parse CSV text into candles in file order. Price fields that are not
 * numbers come through as NaN; ingestion rejects those.
 */
export function parseCandleCsv(text: string, symbol: string): ParsedCandleCsv {
    const records = CsvRecordsSchema.parse(
        parse(text, { skip_empty_lines: true, trim: true, relax_column_count: true })
    );

    const candles: Candle[] = [];
    let skipped = 0;

    records.forEach((record, index) => {
        const timestamp = record.length >= CSV_COLUMNS ? parseTimestamp(record[0]) : null;
        if (!timestamp) {
            // A first row that does not parse is the header
            if (index > 0 || record.length < CSV_COLUMNS) {
                skipped++;
            }
            return;
        }

        const [, open, high, low, close, volume] = record;
        candles.push({
            symbol,
            timestamp,
            open: parsePrice(open),
            high: parsePrice(high),
            low: parsePrice(low),
            close: parsePrice(close),
            volume: parsePrice(volume),
        });
    });

    return { candles, skipped };
}

export interface CsvReplayOptions {
    symbol: string;
    /** Data rows to skip from the start of the file */
    offset?: number;
}

export class CsvReplaySource implements CandleSource {
    readonly name: string;

    constructor(
        private readonly path: string,
        private readonly options: CsvReplayOptions
    ) {
        this.name = `csv:${path}`;
    }

    async *[Symbol.asyncIterator](): AsyncGenerator<Candle> {
        const text = await readFile(this.path, "utf8");
        const { candles, skipped } = parseCandleCsv(text, this.options.symbol);
        const offset = this.options.offset ?? 0;

        logger.info(
            { path: this.path, symbol: this.options.symbol, rows: candles.length, skipped, offset },
            "Replaying candles from CSV"
        );
        if (skipped > 0) {
            logger.warn({ path: this.path, skipped }, "Skipped unreadable CSV rows");
        }

        yield* candles.slice(offset);
    }
}
