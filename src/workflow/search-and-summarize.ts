import type { SourceRecord } from '../types/index.js';
import { describeError, NetworkError, ValidationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/** Upper bound on summaries produced by one workflow call */
export const MAX_SUMMARIZED_ITEMS = 5;

export type SummarizedItem<S> =
    | { record: SourceRecord; summary: S }
    | { record: SourceRecord; error: { kind: string; reason: string } };

export interface SearchAndSummarizeOptions<S> {
    search: (signal?: AbortSignal) => Promise<SourceRecord[]>;
    summarize: (record: SourceRecord, signal?: AbortSignal) => Promise<S>;
    maxItems: number;
    signal?: AbortSignal;
}

/**
 * Run one search, then summarize the first `maxItems` records concurrently.
 * Results keep search order; a failed summary occupies its own slot and
 * does not affect the others. Aborting discards everything.
 */
export async function searchAndSummarize<S>(options: SearchAndSummarizeOptions<S>): Promise<SummarizedItem<S>[]> {
    const { search, summarize, maxItems, signal } = options;
    if (!Number.isInteger(maxItems) || maxItems < 1 || maxItems > MAX_SUMMARIZED_ITEMS) {
        throw new ValidationError('max_items', `must be an integer between 1 and ${MAX_SUMMARIZED_ITEMS}`);
    }

    const logger = getLogger();
    const records = (await search(signal)).slice(0, maxItems);
    throwIfAborted(signal);

    logger.info({ count: records.length }, 'Summarizing search results');
    const settled = await Promise.allSettled(records.map((record) => summarize(record, signal)));
    throwIfAborted(signal);

    return records.map((record, index): SummarizedItem<S> => {
        const outcome = settled[index];
        if (outcome?.status === 'fulfilled') {
            return { record, summary: outcome.value };
        }
        const error = describeError(outcome?.reason);
        logger.warn({ id: record.id, ...error }, 'Summary failed');
        return { record, error };
    });
}

function throwIfAborted(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
        throw new NetworkError('Request was cancelled', 0);
    }
}
