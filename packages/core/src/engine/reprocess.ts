/**
 * @fileoverview Stored-response reprocessing
 *
 * Re-runs normalization over raw responses already in the audit store, using
 * the versions each response was produced with. Used by audits and
 * evaluation, outside the request path.
 *
 * @module @injection-detector/core/engine/reprocess
 */

import type { AuditStore } from "../contracts/AuditStore.js";
import type { ReprocessedVerdict } from "../contracts/ClassificationVerdict.js";
import type { LLMProvider } from "../contracts/LLMProvider.js";

/**
 * Reprocessed verdict paired with the record it came from.
 */
export interface ReprocessedRecord {
    readonly requestId: string;
    readonly createdAt: string;
    readonly verdict: ReprocessedVerdict;
}

/**
 * Reprocess every stored response for a request id.
 *
 * @param store - Audit store to read from
 * @param provider - Provider whose normalize() rules apply
 * @param requestId - Request to reprocess
 * @returns One entry per stored record; empty when the id is unknown
 */
export async function reprocessStoredResponses(
    store: AuditStore,
    provider: LLMProvider,
    requestId: string
): Promise<ReprocessedRecord[]> {
    const records = await store.findByRequestId(requestId);

    return records.map(record => ({
        requestId: record.requestId,
        createdAt: record.createdAt,
        verdict  : provider.normalize(record.rawResponse, record.promptVersion, record.modelVersion),
    }));
}
