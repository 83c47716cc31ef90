/**
 * Ledger reconciliation: mirrors purchases and settlements from the ledger's
 * event log into the local store, behind a persisted height checkpoint.
 */

export {
    LedgerReconciler,
    type LedgerReconcilerDeps,
    type ReconcileTickResult,
    type ReconcileTickStatus,
} from "./reconciler.js";

export { planChunks, type BlockRange } from "./ranges.js";
