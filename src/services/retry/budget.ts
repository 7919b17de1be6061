/**
 * Caps how many retries may happen within a rolling window, so a degraded
 * backend is not hammered by every pipeline retrying at once.
 */
export class RetryBudget {
    private retryTimestamps: number[] = [];

    constructor(
        private readonly maxRetries: number = 10,
        private readonly windowMs: number = 60000,
        private readonly now: () => number = Date.now
    ) { }

    /**
     * Check if one more retry fits in the current window
     */
    public canRetry(): boolean {
        this.cleanup();
        return this.retryTimestamps.length < this.maxRetries;
    }

    /**
     * Record a retry attempt
     */
    public recordRetry(): void {
        this.cleanup();
        this.retryTimestamps.push(this.now());
    }

    public remainingRetries(): number {
        this.cleanup();
        return Math.max(0, this.maxRetries - this.retryTimestamps.length);
    }

    public reset(): void {
        this.retryTimestamps = [];
    }

    private cleanup(): void {
        const cutoff = this.now() - this.windowMs;
        this.retryTimestamps = this.retryTimestamps.filter(ts => ts > cutoff);
    }
}
