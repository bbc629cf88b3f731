import type { AdapterSnapshot } from '../types';

export interface InconclusiveOutcome {
    consecutiveFailures: number;
    /** The count crossed the threshold: this call goes over the fallback channel. */
    exhausted: boolean;
}

/**
 * Degradation state of one compact session.
 *
 * Every transition is a single synchronous method, so concurrent requests
 * interleave only between transitions and never inside one: two calls
 * cannot both claim the first message, and counter updates are never lost.
 * Abandonment is one-way.
 */
export class SessionState {
    private firstMessagePending = true;
    private consecutiveFailures = 0;
    private abandoned = false;

    constructor(
        private token: string | undefined,
        private readonly maxInconclusiveResponses: number
    ) { }

    get accessToken(): string | undefined {
        return this.token;
    }

    /** A new token must be announced again on the next compact message. */
    setAccessToken(token: string | undefined): void {
        this.token = token;
        this.firstMessagePending = true;
    }

    get isAbandoned(): boolean {
        return this.abandoned;
    }

    /**
     * Claims the session announcement. Returns true for exactly one caller
     * per session (or per token change).
     */
    claimFirstMessage(): boolean {
        if (!this.firstMessagePending) return false;
        this.firstMessagePending = false;
        return true;
    }

    recordInconclusive(): InconclusiveOutcome {
        this.consecutiveFailures++;
        return {
            consecutiveFailures: this.consecutiveFailures,
            exhausted: this.consecutiveFailures > this.maxInconclusiveResponses,
        };
    }

    recordConclusive(): void {
        this.consecutiveFailures = 0;
    }

    /** @returns true when this call moved the session into the abandoned state */
    abandon(): boolean {
        if (this.abandoned) return false;
        this.abandoned = true;
        return true;
    }

    snapshot(): AdapterSnapshot {
        return {
            mode: this.abandoned ? 'abandoned' : 'compact',
            consecutiveFailures: this.consecutiveFailures,
            firstMessagePending: this.firstMessagePending,
        };
    }
}
