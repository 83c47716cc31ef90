/**
 * Settlement executor.
 *
 * For a newly detected wick event:
 * 1. Load the eligible set (active, coverage window still open)
 * 2. Per policy, independently:
 *    a. Submit executePayout through the signer queue
 *    b. Wait for confirmation (bounded)
 *    c. On success: insert-or-ignore the Payout by settlementRef, fill any
 *       links missing on an existing row, CAS the policy active -> claimed
 * 3. Failures are logged per policy and never abort the batch. There is no
 *    retry for the same event.
 *
 * The reconciler may record the same settlement from the ledger log at any
 * time, before or after step 2c. Both paths use the store's idempotent
 * primitives, so whichever runs second is a no-op.
 */

import type Bottleneck from "bottleneck";
import {
    SettlementOutcomes,
    TERMINAL_FAILURES,
    type Policy,
    type SettlementOutcome,
    type SettlementSettings,
    type WickEvent,
} from "@wickguard/shared";
import type { Store } from "../db/store.js";
import { errorMessage } from "../errors.js";
import type { LedgerClient, SettlementRequest } from "../ledger/types.js";
import { createChildLogger } from "../log/logger.js";

const logger = createChildLogger({ module: "settlement-executor" });

export interface PolicySettlementOutcome {
    policyId: number;
    policyRef: string;
    holderAddress: string;
    outcome: SettlementOutcome;
    settlementRef: string | null;
    /** True when this call created the payout row */
    payoutCreated: boolean;
    /** True when this call moved the policy to claimed */
    claimed: boolean;
    finalizedHeight: number | null;
    error: string | null;
}

export interface SettlementExecutorDeps {
    store: Store;
    ledger: LedgerClient;
    /** Single-concurrency queue shared by every write from this signer */
    signerQueue: Bottleneck;
    settings: SettlementSettings;
    now?: () => Date;
}

/**
 * Detection memo recorded on-ledger with the payout.
 */
export function buildEventRef(event: WickEvent): string {
    return `wick:${event.id}:${event.timestamp.toISOString()}`;
}

export class SettlementExecutor {
    private readonly now: () => Date;

    constructor(private readonly deps: SettlementExecutorDeps) {
        this.now = deps.now ?? (() => new Date());
    }

    async execute(event: WickEvent): Promise<PolicySettlementOutcome[]> {
        const log = logger.child({ eventId: event.id, symbol: event.symbol });

        const policies = await this.deps.store.getEligiblePolicies(this.now());
        if (policies.length === 0) {
            log.info("No eligible policies, nothing to settle");
            return [];
        }

        log.info({ policies: policies.length }, "Settling eligible policies");

        const outcomes = await Promise.all(policies.map((policy) => this.settlePolicy(event, policy)));

        const counts = new Map<SettlementOutcome, number>();
        for (const result of outcomes) {
            counts.set(result.outcome, (counts.get(result.outcome) ?? 0) + 1);
        }
        log.info(
            {
                policies: policies.length,
                settled: counts.get(SettlementOutcomes.SETTLED) ?? 0,
                terminalFailures: outcomes.filter((o) => TERMINAL_FAILURES.has(o.outcome)).length,
                outcomes: Object.fromEntries(counts),
            },
            "Settlement batch complete"
        );

        return outcomes;
    }

    /**
     * Settle one policy. Never throws; every failure becomes an outcome.
     */
    private async settlePolicy(event: WickEvent, policy: Policy): Promise<PolicySettlementOutcome> {
        const log = logger.child({ eventId: event.id, policyId: policy.id, holder: policy.holderAddress });
        const result: PolicySettlementOutcome = {
            policyId: policy.id,
            policyRef: policy.policyRef,
            holderAddress: policy.holderAddress,
            outcome: SettlementOutcomes.SUBMIT_FAILED,
            settlementRef: null,
            payoutCreated: false,
            claimed: false,
            finalizedHeight: null,
            error: null,
        };

        const request: SettlementRequest = {
            holder: policy.holderAddress,
            policyRef: policy.policyRef,
            eventRef: buildEventRef(event),
        };

        // 1. Submit (serialized per signer)
        let settlementRef: string;
        try {
            settlementRef = await this.deps.signerQueue.schedule(() => this.deps.ledger.submitSettlement(request));
        } catch (err) {
            log.error({ err }, "Settlement submission failed");
            return { ...result, error: errorMessage(err) };
        }
        result.settlementRef = settlementRef;

        // 2. Confirm (bounded wait)
        try {
            const confirmation = await this.deps.ledger.waitForConfirmation(
                settlementRef,
                this.deps.settings.confirmationTimeoutMs
            );
            result.finalizedHeight = confirmation.finalizedHeight;
            if (confirmation.status !== "success") {
                log.warn(
                    { settlementRef, finalizedHeight: confirmation.finalizedHeight },
                    "Settlement rejected by ledger"
                );
                return { ...result, outcome: SettlementOutcomes.REJECTED, error: "ledger rejected settlement" };
            }
        } catch (err) {
            log.error({ err, settlementRef }, "Settlement confirmation failed");
            return { ...result, outcome: SettlementOutcomes.CONFIRMATION_FAILED, error: errorMessage(err) };
        }

        // 3. Record
        try {
            const payout = await this.deps.store.insertPayoutIfAbsent({
                policyId: policy.id,
                holderAddress: policy.holderAddress,
                amountMicros: policy.coverageMicros,
                eventId: event.id,
                settlementRef,
                blockHeight: result.finalizedHeight,
            });
            if (!payout.isNew) {
                // Reconciler got there first; add the links only we know
                await this.deps.store.linkPayout(settlementRef, policy.id, event.id);
            }
            result.payoutCreated = payout.isNew;
            result.claimed = await this.deps.store.claimPolicy(policy.id, settlementRef);
        } catch (err) {
            log.error({ err, settlementRef }, "Settlement confirmed but local record failed");
            return { ...result, outcome: SettlementOutcomes.RECORD_FAILED, error: errorMessage(err) };
        }

        log.info(
            {
                settlementRef,
                amountMicros: policy.coverageMicros.toString(),
                payoutCreated: result.payoutCreated,
                claimed: result.claimed,
            },
            "Settlement confirmed"
        );
        return { ...result, outcome: SettlementOutcomes.SETTLED };
    }
}
