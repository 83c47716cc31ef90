/**
 * Locked outcome codes for a single policy settlement attempt.
 */
export const SettlementOutcomes = {
    /** Ledger confirmed the settlement and it is recorded locally */
    SETTLED: "SETTLED",
    /** Ledger included the transaction but it reverted */
    REJECTED: "REJECTED",
    /** Signing or submission failed before the ledger accepted it */
    SUBMIT_FAILED: "SUBMIT_FAILED",
    /** Confirmation wait failed or timed out */
    CONFIRMATION_FAILED: "CONFIRMATION_FAILED",
    /** Ledger confirmed but the local write failed (reconciler heals it) */
    RECORD_FAILED: "RECORD_FAILED",
} as const;

export type SettlementOutcome = (typeof SettlementOutcomes)[keyof typeof SettlementOutcomes];

/**
 * Outcomes that leave nothing on the ledger worth waiting for.
 */
export const TERMINAL_FAILURES: ReadonlySet<SettlementOutcome> = new Set([
    SettlementOutcomes.REJECTED,
    SettlementOutcomes.SUBMIT_FAILED,
]);
