import type { SourceTag } from './record.js';

/**
 * Common surface of the external source clients.
 * Each client normalizes its payloads into SourceRecord objects.
 */
export interface SourceClient {
    /** Source tag stamped on every record */
    readonly sourceId: SourceTag;
}

/**
 * Per-call options shared by every client method.
 */
export interface CallOptions {
    /** Abort signal of the tool invocation; aborting cancels in-flight requests */
    signal?: AbortSignal;
}

