/**
 * Insurance-pool log decoder.
 *
 * Turns raw contract logs into LedgerEvents:
 * - PolicyPurchased -> purchase (holder, policyRef, premium, coverage, expiry)
 * - PayoutExecuted  -> settlement (holder, policyRef, amount)
 *
 * Logs of other events return null. Removed (reorged) logs return null.
 * Amounts stay in integer base units.
 */

import { Interface, getAddress, toBigInt, type Result } from "ethers";
import { EventDecodeError, errorMessage } from "../errors.js";
import {
    INSURANCE_POOL_ABI,
    PAYOUT_EXECUTED_EVENT,
    POLICY_PURCHASED_EVENT,
    type LedgerEvent,
    type RawLedgerLog,
} from "./types.js";

export const insurancePoolInterface = new Interface(INSURANCE_POOL_ABI);

/**
 * Topic0 hashes of the events the reconciler cares about.
 */
export const LEDGER_EVENT_TOPICS: string[] = [POLICY_PURCHASED_EVENT, PAYOUT_EXECUTED_EVENT].map(
    (name) => {
        const fragment = insurancePoolInterface.getEvent(name);
        if (!fragment) {
            throw new Error(`Event ${name} missing from insurance pool ABI`);
        }
        return fragment.topicHash;
    }
);

function readBigInt(args: Result, name: string): bigint {
    return toBigInt(args.getValue(name));
}

function readAddress(args: Result, name: string): string {
    return getAddress(String(args.getValue(name)));
}

/**
 * Decode one raw log.
 *
 * @param blockTime - timestamp of the log's block, if known
 * @throws EventDecodeError when a known event's payload is malformed
 */
export function decodeLedgerLog(log: RawLedgerLog, blockTime: Date | null = null): LedgerEvent | null {
    if (log.removed) {
        return null;
    }

    const topic0 = log.topics[0];
    const fragment = topic0 ? insurancePoolInterface.getEvent(topic0) : null;
    if (!fragment) {
        return null;
    }

    let args: Result;
    try {
        args = insurancePoolInterface.decodeEventLog(fragment, log.data, log.topics);
    } catch (err) {
        throw new EventDecodeError(
            `Failed to decode ${fragment.name} log: ${errorMessage(err)}`,
            log.transactionHash,
            log.index
        );
    }

    const base = {
        txRef: log.transactionHash,
        blockHeight: log.blockNumber,
        logIndex: log.index,
    };

    try {
        switch (fragment.name) {
            case POLICY_PURCHASED_EVENT: {
                const expirySeconds = readBigInt(args, "expiryTime");
                return {
                    ...base,
                    kind: "purchase",
                    holder: readAddress(args, "user"),
                    policyRef: readBigInt(args, "policyId").toString(),
                    premiumMicros: readBigInt(args, "premium"),
                    amountMicros: readBigInt(args, "coverage"),
                    expiryTime: new Date(Number(expirySeconds) * 1000),
                    blockTime,
                };
            }
            case PAYOUT_EXECUTED_EVENT:
                return {
                    ...base,
                    kind: "settlement",
                    holder: readAddress(args, "user"),
                    policyRef: readBigInt(args, "policyId").toString(),
                    amountMicros: readBigInt(args, "amount"),
                };
            default:
                return null;
        }
    } catch (err) {
        throw new EventDecodeError(
            `Malformed ${fragment.name} log: ${errorMessage(err)}`,
            log.transactionHash,
            log.index
        );
    }
}

/**
 * Order events the way the ledger applied them.
 */
export function compareLedgerEvents(a: LedgerEvent, b: LedgerEvent): number {
    return a.blockHeight - b.blockHeight || a.logIndex - b.logIndex;
}
