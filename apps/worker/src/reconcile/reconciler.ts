/**
 * Ledger reconciler.
 *
 * Catches the local store up with the ledger's event log, one tick at a time:
 * 1. Read the checkpoint (seed it to currentHeight - lookback on first run)
 * 2. Fetch (checkpoint, currentHeight] in chunks no larger than the
 *    provider allows, oldest first
 * 3. Merge each entry:
 *    - purchase   -> insert-or-ignore the policy by policyRef
 *    - settlement -> resolve the policy, insert-or-ignore the payout by
 *                    txRef, CAS the policy active -> claimed
 * 4. Advance the checkpoint to currentHeight only if nothing failed
 *
 * A failed tick leaves the checkpoint where it was and the next tick
 * re-fetches the same range. Every merge is idempotent, so the replay only
 * fills in what the failed tick missed.
 *
 * The ledger is the tie-breaker: a settlement seen here is recorded even if
 * the executor never saw it confirm.
 */

import type { Policy, ReconcileSettings } from "@wickguard/shared";
import type { Store } from "../db/store.js";
import type { LedgerClient, LedgerEvent, PurchaseEvent, SettlementEvent } from "../ledger/types.js";
import { createChildLogger } from "../log/logger.js";
import { planChunks } from "./ranges.js";

const logger = createChildLogger({ module: "ledger-reconciler" });

export type ReconcileTickStatus = "noop" | "synced" | "failed";

export interface ReconcileTickResult {
    status: ReconcileTickStatus;
    /** Exclusive lower bound of the scanned range */
    fromHeight: number;
    /** Inclusive upper bound of the scanned range */
    toHeight: number;
    chunks: number;
    purchases: number;
    settlements: number;
    duplicates: number;
    unlinked: number;
    failures: number;
    /** Checkpoint after the tick */
    checkpoint: number;
}

export interface LedgerReconcilerDeps {
    store: Store;
    ledger: LedgerClient;
    settings: ReconcileSettings;
    now?: () => Date;
}

type PolicyResolution = "policyRef" | "holderHeuristic";

interface MergeOutcome {
    duplicate: boolean;
    unlinked: boolean;
}

export class LedgerReconciler {
    private readonly now: () => Date;
    private lastResult: ReconcileTickResult | null = null;

    constructor(private readonly deps: LedgerReconcilerDeps) {
        this.now = deps.now ?? (() => new Date());
    }

    getLastResult(): ReconcileTickResult | null {
        return this.lastResult;
    }

    async poll(): Promise<ReconcileTickResult> {
        const result = await this.runTick();
        this.lastResult = result;
        return result;
    }

    private async runTick(): Promise<ReconcileTickResult> {
        const { store, ledger, settings } = this.deps;
        const contractId = ledger.contractId;
        const log = logger.child({ contractId });

        const checkpoint = await store.getCheckpoint(contractId);
        const currentHeight = await ledger.currentHeight();

        let lastSynced: number;
        if (checkpoint) {
            lastSynced = checkpoint.lastSyncedHeight;
        } else {
            const seed = Math.max(0, currentHeight - settings.lookbackBlocks);
            lastSynced = (await store.advanceCheckpoint(contractId, seed)).lastSyncedHeight;
            log.info({ seed: lastSynced, currentHeight }, "Seeded reconciliation checkpoint");
        }

        const result: ReconcileTickResult = {
            status: "noop",
            fromHeight: lastSynced,
            toHeight: currentHeight,
            chunks: 0,
            purchases: 0,
            settlements: 0,
            duplicates: 0,
            unlinked: 0,
            failures: 0,
            checkpoint: lastSynced,
        };

        if (currentHeight <= lastSynced) {
            log.debug({ lastSynced, currentHeight }, "No new blocks");
            return result;
        }

        const chunkSize = Math.min(settings.chunkSize, ledger.maxBlockRange);
        const chunks = planChunks(lastSynced + 1, currentHeight, chunkSize);
        log.info({ fromHeight: lastSynced + 1, toHeight: currentHeight, chunks: chunks.length }, "Syncing ledger events");

        for (const chunk of chunks) {
            let events: LedgerEvent[];
            try {
                events = await ledger.fetchEvents(chunk.fromHeight, chunk.toHeight);
            } catch (err) {
                // No later chunk may run: the checkpoint cannot skip a gap
                result.failures++;
                log.error({ err, ...chunk }, "Failed to fetch ledger events");
                break;
            }
            result.chunks++;

            for (const event of events) {
                try {
                    const outcome = await this.mergeEvent(event);
                    if (event.kind === "purchase") result.purchases++;
                    else result.settlements++;
                    if (outcome.duplicate) result.duplicates++;
                    if (outcome.unlinked) result.unlinked++;
                } catch (err) {
                    result.failures++;
                    log.error(
                        { err, kind: event.kind, txRef: event.txRef, logIndex: event.logIndex },
                        "Failed to merge ledger event"
                    );
                }
            }

            if (events.length > 0) {
                log.info({ ...chunk, events: events.length }, "Processed ledger events");
            }
        }

        if (result.failures > 0) {
            log.warn(
                { failures: result.failures, checkpoint: lastSynced },
                "Reconcile tick had failures, checkpoint not advanced"
            );
            return { ...result, status: "failed" };
        }

        const saved = await store.advanceCheckpoint(contractId, currentHeight);
        log.info(
            {
                checkpoint: saved.lastSyncedHeight,
                purchases: result.purchases,
                settlements: result.settlements,
                duplicates: result.duplicates,
                unlinked: result.unlinked,
            },
            "Reconcile tick complete"
        );
        return { ...result, status: "synced", checkpoint: saved.lastSyncedHeight };
    }

    private async mergeEvent(event: LedgerEvent): Promise<MergeOutcome> {
        switch (event.kind) {
            case "purchase":
                return this.mergePurchase(event);
            case "settlement":
                return this.mergeSettlement(event);
        }
    }

    private async mergePurchase(event: PurchaseEvent): Promise<MergeOutcome> {
        const { row, isNew } = await this.deps.store.insertPolicyIfAbsent({
            policyRef: event.policyRef,
            holderAddress: event.holder,
            premiumMicros: event.premiumMicros,
            coverageMicros: event.amountMicros,
            purchaseTime: event.blockTime ?? this.now(),
            expiryTime: event.expiryTime,
            purchaseTxRef: event.txRef,
        });

        if (isNew) {
            logger.info(
                {
                    policyId: row.id,
                    policyRef: row.policyRef,
                    holder: row.holderAddress,
                    coverageMicros: row.coverageMicros.toString(),
                    expiryTime: row.expiryTime.toISOString(),
                },
                "Mirrored policy purchase"
            );
        }
        return { duplicate: !isNew, unlinked: false };
    }

    private async mergeSettlement(event: SettlementEvent): Promise<MergeOutcome> {
        const { store } = this.deps;
        const log = logger.child({ txRef: event.txRef, holder: event.holder });

        const { policy, resolution } = await this.resolvePolicy(event);

        const payout = await store.insertPayoutIfAbsent({
            policyId: policy?.id ?? null,
            holderAddress: event.holder,
            amountMicros: event.amountMicros,
            eventId: null,
            settlementRef: event.txRef,
            blockHeight: event.blockHeight,
        });

        if (!payout.isNew) {
            // Already recorded (by the executor or an earlier tick). A linked row
            // names the policy it paid, and that writer may have stopped before
            // claiming it, so the claim is redone against the row's own link.
            if (payout.row.policyId !== null) {
                await this.markClaimed(payout.row.policyId, event.txRef);
                log.debug({ payoutId: payout.row.id, policyId: payout.row.policyId }, "Settlement already recorded");
                return { duplicate: true, unlinked: false };
            }
            // Only a direct policyRef match may fill a missing link; the holder
            // heuristic could pick a different policy than the one this paid.
            if (policy && resolution === "policyRef") {
                await store.linkPayout(event.txRef, policy.id, null);
                await this.markClaimed(policy.id, event.txRef);
                log.info({ policyId: policy.id }, "Linked previously unlinked payout");
                return { duplicate: true, unlinked: false };
            }
            log.debug({ payoutId: payout.row.id }, "Settlement already recorded, still unlinked");
            return { duplicate: true, unlinked: true };
        }

        if (!policy) {
            log.warn(
                { policyRef: event.policyRef, payoutId: payout.row.id },
                "Settlement has no matching local policy, recorded unlinked payout"
            );
            return { duplicate: false, unlinked: true };
        }

        await this.markClaimed(policy.id, event.txRef);
        log.info(
            {
                payoutId: payout.row.id,
                policyId: policy.id,
                resolution,
                amountMicros: event.amountMicros.toString(),
            },
            "Recorded settlement from ledger"
        );
        return { duplicate: false, unlinked: false };
    }

    /**
     * Claim the policy for this settlement. When it is already claimed, only a
     * missing settlementRef is filled in.
     */
    private async markClaimed(policyId: number, settlementRef: string): Promise<void> {
        const claimed = await this.deps.store.claimPolicy(policyId, settlementRef);
        if (!claimed) {
            await this.deps.store.backfillSettlementRef(policyId, settlementRef);
        }
    }

    /**
     * Resolve the local policy a settlement paid.
     *
     * With a policyRef on the event, that is the only lookup. Without one,
     * fall back to the holder's most recent active policy. The heuristic can
     * pick the wrong policy when a holder has overlapping policies.
     */
    private async resolvePolicy(
        event: SettlementEvent
    ): Promise<{ policy: Policy | null; resolution: PolicyResolution }> {
        if (event.policyRef !== null) {
            const policy = await this.deps.store.getPolicyByRef(event.policyRef);
            return { policy, resolution: "policyRef" };
        }

        const policy = await this.deps.store.findLatestActivePolicyForHolder(event.holder);
        if (policy) {
            logger.warn(
                { txRef: event.txRef, holder: event.holder, policyId: policy.id },
                "Settlement carries no policy reference, linked to holder's most recent active policy"
            );
        }
        return { policy, resolution: "holderHeuristic" };
    }
}
