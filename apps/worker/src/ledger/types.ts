/**
 * Ledger collaborator types and the insurance-pool contract ABI.
 *
 * The ledger is an EVM contract that holds the pool, emits a log per policy
 * purchase and per payout, and exposes executePayout() to the pool operator.
 */

/**
 * Human-readable ABI fragments for the insurance-pool contract.
 */
export const INSURANCE_POOL_ABI = [
    "event PolicyPurchased(address indexed user, uint256 policyId, uint256 premium, uint256 coverage, uint256 expiryTime)",
    "event PayoutExecuted(address indexed user, uint256 policyId, uint256 amount)",
    "function executePayout(address user, uint256 policyId, string detectionRef)",
] as const;

export const POLICY_PURCHASED_EVENT = "PolicyPurchased";
export const PAYOUT_EXECUTED_EVENT = "PayoutExecuted";

/**
 * Token decimals of the pool's settlement asset. Amounts on the wire and in
 * the local store are integer base units at this scale ("micros").
 */
export const SETTLEMENT_TOKEN_DECIMALS = 6;

/**
 * Raw log as returned by eth_getLogs, trimmed to what the decoder reads.
 */
export interface RawLedgerLog {
    address: string;
    topics: readonly string[];
    data: string;
    blockNumber: number;
    transactionHash: string;
    index: number;
    removed: boolean;
}

interface LedgerEventBase {
    holder: string;
    /** Ledger policy id, null when the log carries none */
    policyRef: string | null;
    amountMicros: bigint;
    txRef: string;
    blockHeight: number;
    logIndex: number;
}

export interface PurchaseEvent extends LedgerEventBase {
    kind: "purchase";
    policyRef: string;
    premiumMicros: bigint;
    expiryTime: Date;
    /** Block timestamp, when the client could fetch it */
    blockTime: Date | null;
}

export interface SettlementEvent extends LedgerEventBase {
    kind: "settlement";
}

export type LedgerEvent = PurchaseEvent | SettlementEvent;

export interface SettlementRequest {
    holder: string;
    policyRef: string;
    /** Detection memo recorded on-ledger with the payout */
    eventRef: string;
}

export interface ConfirmationResult {
    status: "success" | "failure";
    finalizedHeight: number;
}

/**
 * Everything the pipeline needs from the ledger.
 */
export interface LedgerClient {
    /** Max blocks a single fetchEvents call may span. */
    readonly maxBlockRange: number;
    /** Identifier of the contract, used as the checkpoint key. */
    readonly contractId: string;

    submitSettlement(request: SettlementRequest): Promise<string>;
    /** Throws LedgerTimeoutError when the deadline passes first. */
    waitForConfirmation(settlementRef: string, timeoutMs: number): Promise<ConfirmationResult>;
    /** Events in [fromHeight, toHeight], ordered by (blockHeight, logIndex). */
    fetchEvents(fromHeight: number, toHeight: number): Promise<LedgerEvent[]>;
    currentHeight(): Promise<number>;
}
