import { ProcessingState, type PaperMetadata, type ProcessingResult } from '../types/index.js';

/**
 * Thrown on a backward or post-terminal state move.
 */
export class StateTransitionError extends Error {
    constructor(
        public readonly from: ProcessingState,
        public readonly to: ProcessingState
    ) {
        super(`Illegal state transition: ${from} -> ${to}`);
        this.name = 'StateTransitionError';
    }
}

/** Forward order of the non-failure states */
const STATE_RANK: Record<ProcessingState, number> = {
    [ProcessingState.NEW]: 0,
    [ProcessingState.TRIAGED]: 1,
    [ProcessingState.METADATA_EXTRACTED]: 2,
    [ProcessingState.OA_VERIFIED]: 3,
    [ProcessingState.COMPLETED]: 4,
    [ProcessingState.FAILED]: 5,
};

export function isTerminal(state: ProcessingState): boolean {
    return state === ProcessingState.COMPLETED || state === ProcessingState.FAILED;
}

/**
 * Whether `from → to` is a legal move. FAILED is reachable from every
 * non-terminal state; every other move must go strictly forward.
 */
export function canTransition(from: ProcessingState, to: ProcessingState): boolean {
    if (isTerminal(from)) return false;
    if (to === ProcessingState.FAILED) return true;
    return STATE_RANK[to] > STATE_RANK[from];
}

/**
 * Mutable progress of one identifier through the pipeline.
 * The only way to build a ProcessingResult: every state change goes through
 * `advance`, and `toResult` checks the metadata/error invariants.
 */
export class ResultTracker {
    private state: ProcessingState = ProcessingState.NEW;
    private metadata: PaperMetadata | undefined;
    private errorMessage: string | undefined;
    private readonly startedAt: number;

    constructor(
        public readonly identifier: string,
        private readonly clock: () => number = Date.now
    ) {
        this.startedAt = clock();
    }

    get current(): ProcessingState {
        return this.state;
    }

    triaged(): this {
        return this.advance(ProcessingState.TRIAGED);
    }

    /**
     * Attach normalized metadata and move to METADATA_EXTRACTED.
     */
    extracted(metadata: PaperMetadata): this {
        this.advance(ProcessingState.METADATA_EXTRACTED);
        this.metadata = metadata;
        return this;
    }

    /**
     * Replace the record with its OA-resolved version and, when a location
     * was found, finish as COMPLETED. Without a location the result stays at
     * METADATA_EXTRACTED.
     */
    resolved(metadata: PaperMetadata): this {
        if (this.state !== ProcessingState.METADATA_EXTRACTED) {
            throw new StateTransitionError(this.state, ProcessingState.OA_VERIFIED);
        }
        this.metadata = metadata;
        if (metadata.oa_url) {
            this.advance(ProcessingState.OA_VERIFIED);
            this.advance(ProcessingState.COMPLETED);
        }
        return this;
    }

    fail(message: string): this {
        this.advance(ProcessingState.FAILED);
        this.errorMessage = message;
        this.metadata = undefined;
        return this;
    }

    /**
     * Freeze the current progress into a ProcessingResult.
     */
    toResult(retryCount = 0): ProcessingResult {
        const base = {
            identifier: this.identifier,
            state: this.state,
            elapsed_ms: Math.max(0, this.clock() - this.startedAt),
            retry_count: retryCount,
        };

        if (this.state === ProcessingState.FAILED) {
            return Object.freeze({ ...base, error_message: this.errorMessage ?? 'Unknown error' });
        }
        if (STATE_RANK[this.state] > STATE_RANK[ProcessingState.TRIAGED]) {
            if (!this.metadata) {
                throw new Error(`State ${this.state} requires metadata`);
            }
            return Object.freeze({ ...base, metadata: this.metadata });
        }
        return Object.freeze(base);
    }

    private advance(to: ProcessingState): this {
        if (!canTransition(this.state, to)) {
            throw new StateTransitionError(this.state, to);
        }
        this.state = to;
        return this;
    }
}

/**
 * Wrap an already-normalized search hit as a finished result.
 */
export function resultForRecord(identifier: string, metadata: PaperMetadata): ProcessingResult {
    return new ResultTracker(identifier).triaged().extracted(metadata).resolved(metadata).toResult();
}
