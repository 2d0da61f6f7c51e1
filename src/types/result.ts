import type { PaperMetadata } from './paper.js';

/**
 * Pipeline states for one identifier or search hit.
 *
 *   NEW → TRIAGED → METADATA_EXTRACTED → OA_VERIFIED → COMPLETED
 *
 * FAILED is reachable from any non-terminal state. COMPLETED and FAILED are terminal.
 */
export enum ProcessingState {
    NEW = 'new',
    TRIAGED = 'triaged',
    METADATA_EXTRACTED = 'metadata_extracted',
    OA_VERIFIED = 'oa_verified',
    COMPLETED = 'completed',
    FAILED = 'failed',
}

/**
 * Outcome of processing one query hit or list entry.
 */
export interface ProcessingResult {
    /** URL or DOI the result was produced for (empty for some ad-hoc hits) */
    readonly identifier: string;

    readonly state: ProcessingState;

    /** Present iff the state is past TRIAGED and not FAILED */
    readonly metadata?: PaperMetadata;

    /** Present iff the state is FAILED */
    readonly error_message?: string;

    /** Wall-clock processing time in milliseconds */
    readonly elapsed_ms: number;

    /** Gateway retries spent while producing this result */
    readonly retry_count: number;
}
