/**
 * Local state store contract.
 *
 * Both the settlement executor and the ledger reconciler write policies and
 * payouts, so every write either of them can attempt is idempotent here:
 * unique-constraint-backed insert-or-ignore, or a conditional update that
 * only fires from the expected prior state. Callers never pre-check
 * existence before inserting.
 */

import type {
    Candle,
    Payout,
    Policy,
    ReconciliationCheckpoint,
    StoredCandle,
    SystemStats,
    WickEvent,
} from "@wickguard/shared";

/**
 * Outcome of an insert-or-ignore. `row` is the stored row either way.
 */
export interface InsertResult<T> {
    row: T;
    isNew: boolean;
}

export interface NewWickEvent {
    symbol: string;
    timestamp: Date;
    candleId: number;
    bodyRatio: number;
    rangeRatio: number;
}

export interface NewPolicy {
    policyRef: string;
    holderAddress: string;
    premiumMicros: bigint;
    coverageMicros: bigint;
    purchaseTime: Date;
    expiryTime: Date;
    purchaseTxRef: string | null;
}

export interface NewPayout {
    policyId: number | null;
    holderAddress: string;
    amountMicros: bigint;
    eventId: number | null;
    settlementRef: string;
    blockHeight: number | null;
}

/**
 * Where streaming detection stands for one symbol.
 */
export interface DetectorCursor {
    /** Last candle id evaluated */
    candleId: number;
    /** Newest candle timestamp streaming has seen; older candles are never settled */
    streamedThrough: Date;
}

export interface Store {
    // Candles
    insertCandle(candle: Candle): Promise<InsertResult<StoredCandle>>;
    getLatestCandle(symbol: string): Promise<StoredCandle | null>;
    getCandlesAfter(symbol: string, afterId: number, limit: number): Promise<StoredCandle[]>;
    getCandlesBetween(symbol: string, from: Date, to: Date): Promise<StoredCandle[]>;
    getRecentCandles(symbol: string, limit: number): Promise<StoredCandle[]>;

    // Wick events
    insertWickEvent(event: NewWickEvent): Promise<InsertResult<WickEvent>>;
    getRecentWickEvents(limit: number): Promise<WickEvent[]>;

    // Policies
    insertPolicyIfAbsent(policy: NewPolicy): Promise<InsertResult<Policy>>;
    getPolicyByRef(policyRef: string): Promise<Policy | null>;
    /** Active policies whose coverage window is still open at `now`. */
    getEligiblePolicies(now: Date): Promise<Policy[]>;
    findLatestActivePolicyForHolder(holderAddress: string): Promise<Policy | null>;
    /** active -> claimed. Returns false when the policy was not active. */
    claimPolicy(policyId: number, settlementRef: string): Promise<boolean>;
    /** Sets settlementRef on a claimed policy that has none. */
    backfillSettlementRef(policyId: number, settlementRef: string): Promise<boolean>;
    /** active -> expired for every policy past expiry. Returns the count. */
    expireLapsedPolicies(now: Date): Promise<number>;

    // Payouts
    insertPayoutIfAbsent(payout: NewPayout): Promise<InsertResult<Payout>>;
    /** Fills a payout's null policy/event links; never overwrites a set link. */
    linkPayout(settlementRef: string, policyId: number | null, eventId: number | null): Promise<void>;
    getRecentPayouts(limit: number): Promise<Payout[]>;
    getUnlinkedPayouts(limit: number): Promise<Payout[]>;

    // Checkpoints
    getCheckpoint(ledgerContractId: string): Promise<ReconciliationCheckpoint | null>;
    /** Monotonic: a lower height than the stored one is ignored. */
    advanceCheckpoint(ledgerContractId: string, height: number): Promise<ReconciliationCheckpoint>;
    getDetectorCursor(symbol: string): Promise<DetectorCursor | null>;
    /** Monotonic per field: a lower candle id or an older timestamp is ignored. */
    setDetectorCursor(symbol: string, cursor: DetectorCursor): Promise<void>;

    // Reporting
    getStats(now: Date): Promise<SystemStats>;
    ping(): Promise<void>;
}

export function normalizeAddress(address: string): string {
    return address.toLowerCase();
}
