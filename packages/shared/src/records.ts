/**
 * Read-model records shared with API/UI collaborators.
 *
 * Amounts are integer micros (1e-6 token units), matching the ledger's
 * base-unit accounting.
 */

export const PolicyStatus = {
    ACTIVE: "active",
    EXPIRED: "expired",
    CLAIMED: "claimed",
} as const;

export type PolicyStatusType = (typeof PolicyStatus)[keyof typeof PolicyStatus];

export interface Candle {
    symbol: string;
    timestamp: Date;
    open: number;
    high: number;
    low: number;
    close: number;
    volume: number;
}

export interface StoredCandle extends Candle {
    id: number;
}

export interface WickEvent {
    id: number;
    symbol: string;
    timestamp: Date;
    /** Local id of the candle that produced the event */
    candleId: number;
    bodyRatio: number;
    rangeRatio: number;
    detectedAt: Date;
}

export interface Policy {
    id: number;
    /** Ledger-side policy id from the purchase event */
    policyRef: string;
    holderAddress: string;
    premiumMicros: bigint;
    coverageMicros: bigint;
    purchaseTime: Date;
    expiryTime: Date;
    status: PolicyStatusType;
    settlementRef: string | null;
    purchaseTxRef: string | null;
}

export interface Payout {
    id: number;
    /** Null when the settlement could not be linked to a local policy */
    policyId: number | null;
    holderAddress: string;
    amountMicros: bigint;
    eventId: number | null;
    settlementRef: string;
    blockHeight: number | null;
    executedAt: Date;
}

export interface ReconciliationCheckpoint {
    ledgerContractId: string;
    lastSyncedHeight: number;
}

export interface SystemStats {
    totalCandles: number;
    totalWickEvents: number;
    totalPolicies: number;
    activePolicies: number;
    totalPayouts: number;
    unlinkedPayouts: number;
}
