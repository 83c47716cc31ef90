/**
 * JSON-RPC ledger client for the insurance-pool contract (ethers v6).
 *
 * - Reads (block height, logs, block timestamps) go through the RPC limiter.
 * - Writes are signed by one operator key behind a NonceManager; callers
 *   serialize submissions through a signer queue.
 * - Confirmation waits are bounded and surface timeouts as LedgerTimeoutError.
 */

import { Contract, JsonRpcProvider, NonceManager, Wallet, getAddress, isError, type Log, type TransactionReceipt } from "ethers";
import { LedgerRequestError, LedgerTimeoutError, errorMessage } from "../errors.js";
import { rpcLimiter } from "../http/limiters.js";
import { createChildLogger } from "../log/logger.js";
import { LEDGER_EVENT_TOPICS, compareLedgerEvents, decodeLedgerLog } from "./decoder.js";
import {
    INSURANCE_POOL_ABI,
    type ConfirmationResult,
    type LedgerClient,
    type LedgerEvent,
    type SettlementRequest,
} from "./types.js";

const logger = createChildLogger({ module: "ledger-client" });

// Bounded FIFO cache: blockNumber -> block timestamp
const BLOCK_TIME_CACHE_MAX_SIZE = 1000;

export interface EthersLedgerClientOptions {
    rpcUrl: string;
    chainId?: number;
    contractAddress: string;
    signerPrivateKey: string;
    maxBlockRange: number;
    confirmations: number;
}

export class EthersLedgerClient implements LedgerClient {
    readonly contractId: string;
    readonly maxBlockRange: number;

    private readonly provider: JsonRpcProvider;
    private readonly contract: Contract;
    private readonly confirmations: number;
    private readonly blockTimes = new Map<number, Date>();

    constructor(options: EthersLedgerClientOptions) {
        this.contractId = getAddress(options.contractAddress);
        this.maxBlockRange = options.maxBlockRange;
        this.confirmations = options.confirmations;

        this.provider = new JsonRpcProvider(
            options.rpcUrl,
            options.chainId,
            options.chainId ? { staticNetwork: true } : undefined
        );
        const signer = new NonceManager(new Wallet(options.signerPrivateKey, this.provider));
        this.contract = new Contract(this.contractId, INSURANCE_POOL_ABI, signer);
    }

    async submitSettlement(request: SettlementRequest): Promise<string> {
        try {
            const tx = await this.contract
                .getFunction("executePayout")
                .send(request.holder, request.policyRef, request.eventRef);
            logger.info(
                { txHash: tx.hash, holder: request.holder, policyRef: request.policyRef, nonce: tx.nonce },
                "Settlement submitted"
            );
            return tx.hash;
        } catch (err) {
            throw new LedgerRequestError(`Settlement submission failed: ${errorMessage(err)}`, "submitSettlement", {
                cause: err,
            });
        }
    }

    async waitForConfirmation(settlementRef: string, timeoutMs: number): Promise<ConfirmationResult> {
        let receipt: TransactionReceipt | null;
        try {
            receipt = await this.provider.waitForTransaction(settlementRef, this.confirmations, timeoutMs);
        } catch (err) {
            if (isError(err, "TIMEOUT")) {
                throw new LedgerTimeoutError(settlementRef, timeoutMs);
            }
            throw new LedgerRequestError(`Confirmation wait failed: ${errorMessage(err)}`, "waitForConfirmation", {
                cause: err,
            });
        }

        if (!receipt) {
            throw new LedgerRequestError(`No receipt for ${settlementRef}`, "waitForConfirmation");
        }

        return {
            status: receipt.status === 1 ? "success" : "failure",
            finalizedHeight: receipt.blockNumber,
        };
    }

    async fetchEvents(fromHeight: number, toHeight: number): Promise<LedgerEvent[]> {
        const span = toHeight - fromHeight + 1;
        if (span > this.maxBlockRange) {
            throw new LedgerRequestError(
                `Range [${fromHeight}, ${toHeight}] spans ${span} blocks, max is ${this.maxBlockRange}`,
                "fetchEvents"
            );
        }

        let logs: Log[];
        try {
            logs = await rpcLimiter.schedule(() =>
                this.provider.getLogs({
                    address: this.contractId,
                    fromBlock: fromHeight,
                    toBlock: toHeight,
                    topics: [LEDGER_EVENT_TOPICS],
                })
            );
        } catch (err) {
            throw new LedgerRequestError(`getLogs failed: ${errorMessage(err)}`, "fetchEvents", { cause: err });
        }

        const events: LedgerEvent[] = [];
        for (const log of logs) {
            const decoded = decodeLedgerLog({
                address: log.address,
                topics: log.topics,
                data: log.data,
                blockNumber: log.blockNumber,
                transactionHash: log.transactionHash,
                index: log.index,
                removed: log.removed,
            });
            if (!decoded) continue;

            if (decoded.kind === "purchase") {
                events.push({ ...decoded, blockTime: await this.getBlockTime(decoded.blockHeight) });
            } else {
                events.push(decoded);
            }
        }

        return events.sort(compareLedgerEvents);
    }

    async currentHeight(): Promise<number> {
        try {
            return await rpcLimiter.schedule(() => this.provider.getBlockNumber());
        } catch (err) {
            throw new LedgerRequestError(`getBlockNumber failed: ${errorMessage(err)}`, "currentHeight", {
                cause: err,
            });
        }
    }

    /**
     * Block timestamp with caching; null when the block cannot be fetched.
     */
    private async getBlockTime(blockNumber: number): Promise<Date | null> {
        const cached = this.blockTimes.get(blockNumber);
        if (cached) {
            return cached;
        }

        try {
            const block = await rpcLimiter.schedule(() => this.provider.getBlock(blockNumber));
            if (!block) {
                logger.warn({ blockNumber }, "Block not found");
                return null;
            }

            // block.timestamp is in seconds (Unix epoch)
            const timestamp = new Date(block.timestamp * 1000);
            this.blockTimes.set(blockNumber, timestamp);
            this.pruneBlockTimes();
            return timestamp;
        } catch (err) {
            logger.warn({ err, blockNumber }, "Failed to fetch block timestamp");
            return null;
        }
    }

    private pruneBlockTimes(): void {
        if (this.blockTimes.size <= BLOCK_TIME_CACHE_MAX_SIZE) return;

        const toDelete = this.blockTimes.size - BLOCK_TIME_CACHE_MAX_SIZE;
        const keys = this.blockTimes.keys();
        for (let i = 0; i < toDelete; i++) {
            const key = keys.next().value;
            if (key !== undefined) {
                this.blockTimes.delete(key);
            }
        }
    }

    destroy(): void {
        this.provider.destroy();
    }
}
