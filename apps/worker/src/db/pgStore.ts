/**
 * PostgreSQL implementation of the local state store.
 *
 * Idempotency lives in SQL: ON CONFLICT DO NOTHING against the unique keys
 * (candles.(symbol, ts), wick_events.candle_id, policies.policy_ref,
 * payouts.settlement_ref) and status-guarded UPDATEs for policy transitions.
 */

import type { Pool, QueryResultRow } from "pg";
import {
    PolicyStatus,
    type Candle,
    type Payout,
    type Policy,
    type PolicyStatusType,
    type ReconciliationCheckpoint,
    type StoredCandle,
    type SystemStats,
    type WickEvent,
} from "@wickguard/shared";
import {
    normalizeAddress,
    type DetectorCursor,
    type InsertResult,
    type NewPayout,
    type NewPolicy,
    type NewWickEvent,
    type Store,
} from "./store.js";

// pg returns NUMERIC and BIGINT as strings; type aliases so rows satisfy QueryResultRow
type CandleRow = {
    id: number;
    symbol: string;
    ts: Date;
    open: string;
    high: string;
    low: string;
    close: string;
    volume: string;
};

type WickEventRow = {
    id: number;
    symbol: string;
    ts: Date;
    candle_id: number;
    body_ratio: number;
    range_ratio: number;
    detected_at: Date;
};

type PolicyRow = {
    id: number;
    policy_ref: string;
    holder_address: string;
    premium_micros: string;
    coverage_micros: string;
    purchase_time: Date;
    expiry_time: Date;
    status: string;
    settlement_ref: string | null;
    purchase_tx_ref: string | null;
};

type PayoutRow = {
    id: number;
    policy_id: number | null;
    holder_address: string;
    amount_micros: string;
    wick_event_id: number | null;
    settlement_ref: string;
    block_height: string | null;
    executed_at: Date;
};

type CheckpointRow = {
    ledger_contract_id: string;
    last_synced_height: string;
};

type StatsRow = {
    total_candles: string;
    total_wick_events: string;
    total_policies: string;
    active_policies: string;
    total_payouts: string;
    unlinked_payouts: string;
};

const CANDLE_COLUMNS = "id, symbol, ts, open, high, low, close, volume";
const WICK_EVENT_COLUMNS = "id, symbol, ts, candle_id, body_ratio, range_ratio, detected_at";
const POLICY_COLUMNS =
    "id, policy_ref, holder_address, premium_micros, coverage_micros, purchase_time, expiry_time, status, settlement_ref, purchase_tx_ref";
const PAYOUT_COLUMNS =
    "id, policy_id, holder_address, amount_micros, wick_event_id, settlement_ref, block_height, executed_at";

function toCandle(row: CandleRow): StoredCandle {
    return {
        id: row.id,
        symbol: row.symbol,
        timestamp: row.ts,
        open: Number(row.open),
        high: Number(row.high),
        low: Number(row.low),
        close: Number(row.close),
        volume: Number(row.volume),
    };
}

function toWickEvent(row: WickEventRow): WickEvent {
    return {
        id: row.id,
        symbol: row.symbol,
        timestamp: row.ts,
        candleId: row.candle_id,
        bodyRatio: row.body_ratio,
        rangeRatio: row.range_ratio,
        detectedAt: row.detected_at,
    };
}

function toPolicyStatus(value: string): PolicyStatusType {
    switch (value) {
        case PolicyStatus.ACTIVE:
        case PolicyStatus.EXPIRED:
        case PolicyStatus.CLAIMED:
            return value;
        default:
            throw new Error(`Unknown policy status in database: ${value}`);
    }
}

function toPolicy(row: PolicyRow): Policy {
    return {
        id: row.id,
        policyRef: row.policy_ref,
        holderAddress: row.holder_address,
        premiumMicros: BigInt(row.premium_micros),
        coverageMicros: BigInt(row.coverage_micros),
        purchaseTime: row.purchase_time,
        expiryTime: row.expiry_time,
        status: toPolicyStatus(row.status),
        settlementRef: row.settlement_ref,
        purchaseTxRef: row.purchase_tx_ref,
    };
}

function toPayout(row: PayoutRow): Payout {
    return {
        id: row.id,
        policyId: row.policy_id,
        holderAddress: row.holder_address,
        amountMicros: BigInt(row.amount_micros),
        eventId: row.wick_event_id,
        settlementRef: row.settlement_ref,
        blockHeight: row.block_height === null ? null : Number(row.block_height),
        executedAt: row.executed_at,
    };
}

function toCheckpoint(row: CheckpointRow): ReconciliationCheckpoint {
    return {
        ledgerContractId: row.ledger_contract_id,
        lastSyncedHeight: Number(row.last_synced_height),
    };
}

export class PgStore implements Store {
    constructor(private readonly pool: Pool) {}

    /**
     * INSERT ... ON CONFLICT DO NOTHING RETURNING, falling back to a lookup
     * of the row that won. The lookup runs as its own statement so it sees
     * rows committed by a concurrent writer.
     */
    private async insertOrIgnore<R extends QueryResultRow, T>(
        insertSql: string,
        insertParams: unknown[],
        selectSql: string,
        selectParams: unknown[],
        map: (row: R) => T
    ): Promise<InsertResult<T>> {
        const inserted = await this.pool.query<R>(insertSql, insertParams);
        const insertedRow = inserted.rows[0];
        if (insertedRow) {
            return { row: map(insertedRow), isNew: true };
        }
        const existing = await this.pool.query<R>(selectSql, selectParams);
        const existingRow = existing.rows[0];
        if (!existingRow) {
            throw new Error("Insert was ignored but no conflicting row was found");
        }
        return { row: map(existingRow), isNew: false };
    }

    // ─── Candles ───────────────────────────────────────────────────────────

    async insertCandle(candle: Candle): Promise<InsertResult<StoredCandle>> {
        return this.insertOrIgnore<CandleRow, StoredCandle>(
            `INSERT INTO candles (symbol, ts, open, high, low, close, volume)
             VALUES ($1, $2, $3, $4, $5, $6, $7)
             ON CONFLICT (symbol, ts) DO NOTHING
             RETURNING ${CANDLE_COLUMNS}`,
            [
                candle.symbol,
                candle.timestamp,
                candle.open,
                candle.high,
                candle.low,
                candle.close,
                candle.volume,
            ],
            `SELECT ${CANDLE_COLUMNS} FROM candles WHERE symbol = $1 AND ts = $2`,
            [candle.symbol, candle.timestamp],
            toCandle
        );
    }

    async getLatestCandle(symbol: string): Promise<StoredCandle | null> {
        const result = await this.pool.query<CandleRow>(
            `SELECT ${CANDLE_COLUMNS} FROM candles WHERE symbol = $1 ORDER BY id DESC LIMIT 1`,
            [symbol]
        );
        const row = result.rows[0];
        return row ? toCandle(row) : null;
    }

    async getCandlesAfter(symbol: string, afterId: number, limit: number): Promise<StoredCandle[]> {
        const result = await this.pool.query<CandleRow>(
            `SELECT ${CANDLE_COLUMNS} FROM candles
             WHERE symbol = $1 AND id > $2
             ORDER BY id ASC LIMIT $3`,
            [symbol, afterId, limit]
        );
        return result.rows.map(toCandle);
    }

    async getCandlesBetween(symbol: string, from: Date, to: Date): Promise<StoredCandle[]> {
        const result = await this.pool.query<CandleRow>(
            `SELECT ${CANDLE_COLUMNS} FROM candles
             WHERE symbol = $1 AND ts >= $2 AND ts <= $3
             ORDER BY ts ASC`,
            [symbol, from, to]
        );
        return result.rows.map(toCandle);
    }

    async getRecentCandles(symbol: string, limit: number): Promise<StoredCandle[]> {
        const result = await this.pool.query<CandleRow>(
            `SELECT ${CANDLE_COLUMNS} FROM candles WHERE symbol = $1 ORDER BY ts DESC LIMIT $2`,
            [symbol, limit]
        );
        return result.rows.map(toCandle);
    }

    // ─── Wick events ───────────────────────────────────────────────────────

    async insertWickEvent(event: NewWickEvent): Promise<InsertResult<WickEvent>> {
        return this.insertOrIgnore<WickEventRow, WickEvent>(
            `INSERT INTO wick_events (symbol, ts, candle_id, body_ratio, range_ratio)
             VALUES ($1, $2, $3, $4, $5)
             ON CONFLICT (candle_id) DO NOTHING
             RETURNING ${WICK_EVENT_COLUMNS}`,
            [event.symbol, event.timestamp, event.candleId, event.bodyRatio, event.rangeRatio],
            `SELECT ${WICK_EVENT_COLUMNS} FROM wick_events WHERE candle_id = $1`,
            [event.candleId],
            toWickEvent
        );
    }

    async getRecentWickEvents(limit: number): Promise<WickEvent[]> {
        const result = await this.pool.query<WickEventRow>(
            `SELECT ${WICK_EVENT_COLUMNS} FROM wick_events ORDER BY detected_at DESC, id DESC LIMIT $1`,
            [limit]
        );
        return result.rows.map(toWickEvent);
    }

    // ─── Policies ──────────────────────────────────────────────────────────

    async insertPolicyIfAbsent(policy: NewPolicy): Promise<InsertResult<Policy>> {
        return this.insertOrIgnore<PolicyRow, Policy>(
            `INSERT INTO policies
                (policy_ref, holder_address, premium_micros, coverage_micros,
                 purchase_time, expiry_time, status, purchase_tx_ref)
             VALUES ($1, $2, $3, $4, $5, $6, 'active', $7)
             ON CONFLICT (policy_ref) DO NOTHING
             RETURNING ${POLICY_COLUMNS}`,
            [
                policy.policyRef,
                normalizeAddress(policy.holderAddress),
                policy.premiumMicros.toString(),
                policy.coverageMicros.toString(),
                policy.purchaseTime,
                policy.expiryTime,
                policy.purchaseTxRef,
            ],
            `SELECT ${POLICY_COLUMNS} FROM policies WHERE policy_ref = $1`,
            [policy.policyRef],
            toPolicy
        );
    }

    async getPolicyByRef(policyRef: string): Promise<Policy | null> {
        const result = await this.pool.query<PolicyRow>(
            `SELECT ${POLICY_COLUMNS} FROM policies WHERE policy_ref = $1`,
            [policyRef]
        );
        const row = result.rows[0];
        return row ? toPolicy(row) : null;
    }

    async getEligiblePolicies(now: Date): Promise<Policy[]> {
        const result = await this.pool.query<PolicyRow>(
            `SELECT ${POLICY_COLUMNS} FROM policies
             WHERE status = 'active' AND expiry_time > $1
             ORDER BY id ASC`,
            [now]
        );
        return result.rows.map(toPolicy);
    }

    async findLatestActivePolicyForHolder(holderAddress: string): Promise<Policy | null> {
        const result = await this.pool.query<PolicyRow>(
            `SELECT ${POLICY_COLUMNS} FROM policies
             WHERE holder_address = $1 AND status = 'active'
             ORDER BY id DESC LIMIT 1`,
            [normalizeAddress(holderAddress)]
        );
        const row = result.rows[0];
        return row ? toPolicy(row) : null;
    }

    async claimPolicy(policyId: number, settlementRef: string): Promise<boolean> {
        const result = await this.pool.query(
            `UPDATE policies SET status = 'claimed', settlement_ref = $2
             WHERE id = $1 AND status = 'active'`,
            [policyId, settlementRef]
        );
        return (result.rowCount ?? 0) > 0;
    }

    async backfillSettlementRef(policyId: number, settlementRef: string): Promise<boolean> {
        const result = await this.pool.query(
            `UPDATE policies SET settlement_ref = $2
             WHERE id = $1 AND status = 'claimed' AND settlement_ref IS NULL`,
            [policyId, settlementRef]
        );
        return (result.rowCount ?? 0) > 0;
    }

    async expireLapsedPolicies(now: Date): Promise<number> {
        const result = await this.pool.query(
            `UPDATE policies SET status = 'expired'
             WHERE status = 'active' AND expiry_time <= $1`,
            [now]
        );
        return result.rowCount ?? 0;
    }

    // ─── Payouts ───────────────────────────────────────────────────────────

    async insertPayoutIfAbsent(payout: NewPayout): Promise<InsertResult<Payout>> {
        return this.insertOrIgnore<PayoutRow, Payout>(
            `INSERT INTO payouts
                (policy_id, holder_address, amount_micros, wick_event_id, settlement_ref, block_height)
             VALUES ($1, $2, $3, $4, $5, $6)
             ON CONFLICT (settlement_ref) DO NOTHING
             RETURNING ${PAYOUT_COLUMNS}`,
            [
                payout.policyId,
                normalizeAddress(payout.holderAddress),
                payout.amountMicros.toString(),
                payout.eventId,
                payout.settlementRef,
                payout.blockHeight,
            ],
            `SELECT ${PAYOUT_COLUMNS} FROM payouts WHERE settlement_ref = $1`,
            [payout.settlementRef],
            toPayout
        );
    }

    async linkPayout(settlementRef: string, policyId: number | null, eventId: number | null): Promise<void> {
        await this.pool.query(
            `UPDATE payouts
             SET policy_id = COALESCE(policy_id, $2),
                 wick_event_id = COALESCE(wick_event_id, $3)
             WHERE settlement_ref = $1`,
            [settlementRef, policyId, eventId]
        );
    }

    async getRecentPayouts(limit: number): Promise<Payout[]> {
        const result = await this.pool.query<PayoutRow>(
            `SELECT ${PAYOUT_COLUMNS} FROM payouts ORDER BY executed_at DESC, id DESC LIMIT $1`,
            [limit]
        );
        return result.rows.map(toPayout);
    }

    async getUnlinkedPayouts(limit: number): Promise<Payout[]> {
        const result = await this.pool.query<PayoutRow>(
            `SELECT ${PAYOUT_COLUMNS} FROM payouts
             WHERE policy_id IS NULL
             ORDER BY executed_at DESC, id DESC LIMIT $1`,
            [limit]
        );
        return result.rows.map(toPayout);
    }

    // ─── Checkpoints ───────────────────────────────────────────────────────

    async getCheckpoint(ledgerContractId: string): Promise<ReconciliationCheckpoint | null> {
        const result = await this.pool.query<CheckpointRow>(
            `SELECT ledger_contract_id, last_synced_height FROM sync_state WHERE ledger_contract_id = $1`,
            [normalizeAddress(ledgerContractId)]
        );
        const row = result.rows[0];
        return row ? toCheckpoint(row) : null;
    }

    async advanceCheckpoint(ledgerContractId: string, height: number): Promise<ReconciliationCheckpoint> {
        const result = await this.pool.query<CheckpointRow>(
            `INSERT INTO sync_state (ledger_contract_id, last_synced_height, updated_at)
             VALUES ($1, $2, NOW())
             ON CONFLICT (ledger_contract_id) DO UPDATE
             SET last_synced_height = GREATEST(sync_state.last_synced_height, EXCLUDED.last_synced_height),
                 updated_at = NOW()
             RETURNING ledger_contract_id, last_synced_height`,
            [normalizeAddress(ledgerContractId), height]
        );
        const row = result.rows[0];
        if (!row) {
            throw new Error(`Checkpoint upsert returned no row for ${ledgerContractId}`);
        }
        return toCheckpoint(row);
    }

    async getDetectorCursor(symbol: string): Promise<DetectorCursor | null> {
        const result = await this.pool.query<{ last_candle_id: number; streamed_through: Date }>(
            `SELECT last_candle_id, streamed_through FROM detector_cursors WHERE symbol = $1`,
            [symbol]
        );
        const row = result.rows[0];
        return row ? { candleId: row.last_candle_id, streamedThrough: row.streamed_through } : null;
    }

    async setDetectorCursor(symbol: string, cursor: DetectorCursor): Promise<void> {
        await this.pool.query(
            `INSERT INTO detector_cursors (symbol, last_candle_id, streamed_through, updated_at)
             VALUES ($1, $2, $3, NOW())
             ON CONFLICT (symbol) DO UPDATE
             SET last_candle_id = GREATEST(detector_cursors.last_candle_id, EXCLUDED.last_candle_id),
                 streamed_through = GREATEST(detector_cursors.streamed_through, EXCLUDED.streamed_through),
                 updated_at = NOW()`,
            [symbol, cursor.candleId, cursor.streamedThrough]
        );
    }

    // ─── Reporting ─────────────────────────────────────────────────────────

    async getStats(now: Date): Promise<SystemStats> {
        const result = await this.pool.query<StatsRow>(
            `SELECT
                (SELECT COUNT(*) FROM candles) AS total_candles,
                (SELECT COUNT(*) FROM wick_events) AS total_wick_events,
                (SELECT COUNT(*) FROM policies) AS total_policies,
                (SELECT COUNT(*) FROM policies WHERE status = 'active' AND expiry_time > $1) AS active_policies,
                (SELECT COUNT(*) FROM payouts) AS total_payouts,
                (SELECT COUNT(*) FROM payouts WHERE policy_id IS NULL) AS unlinked_payouts`,
            [now]
        );
        const row = result.rows[0];
        if (!row) {
            throw new Error("Stats query returned no row");
        }
        return {
            totalCandles: Number(row.total_candles),
            totalWickEvents: Number(row.total_wick_events),
            totalPolicies: Number(row.total_policies),
            activePolicies: Number(row.active_policies),
            totalPayouts: Number(row.total_payouts),
            unlinkedPayouts: Number(row.unlinked_payouts),
        };
    }

    async ping(): Promise<void> {
        await this.pool.query("SELECT 1");
    }
}
