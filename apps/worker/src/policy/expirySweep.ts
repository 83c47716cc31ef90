/**
 * Expiry sweep: flips active policies past their expiry to expired.
 *
 * Advisory only. Eligibility always filters on expiryTime, so a policy the
 * sweep has not reached yet is still never settled after it lapses.
 */

import type { Store } from "../db/store.js";
import { createChildLogger } from "../log/logger.js";

const logger = createChildLogger({ module: "expiry-sweep" });

export async function sweepExpiredPolicies(store: Store, now: Date = new Date()): Promise<number> {
    const expired = await store.expireLapsedPolicies(now);
    if (expired > 0) {
        logger.info({ expired, asOf: now.toISOString() }, "Expired lapsed policies");
    }
    return expired;
}
