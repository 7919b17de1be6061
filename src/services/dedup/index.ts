import { createLogger } from '../../utils/logger.js';

const logger = createLogger('RequestDeduplicator');

export interface DeduplicationStats {
    totalRequests: number;
    /** Requests that joined one already in flight instead of running */
    deduplicatedRequests: number;
    activeRequests: number;
    /** deduplicatedRequests / totalRequests, 0 before the first request */
    deduplicationRate: number;
}

interface Pending<T> {
    promise: Promise<T>;
    startedAt: number;
}

/**
 * Build a key from an operation type and an optional id, e.g. "profile-123"
 */
export function dedupeKey(type: string, id?: string): string {
    return id === undefined ? type : `${type}-${id}`;
}

/**
 * Request Deduplicator
 *
 * Coalesces identical in-flight requests: while a request for a key is
 * pending, later callers with the same key get the same promise instead of
 * starting another request.
 *
 * Features:
 * - Entries leave the map as soon as their request settles
 * - Entries older than maxPendingAgeMs count as stale and are replaced
 * - Cancelled keys start a fresh request on the next call
 * - Statistics on how many requests were saved
 */
export class RequestDeduplicator<T> {
    private pending: Map<string, Pending<T>> = new Map();
    private totalRequests = 0;
    private deduplicatedRequests = 0;

    constructor(
        private readonly maxPendingAgeMs: number = 60000,
        private readonly now: () => number = Date.now
    ) {}

    /**
     * Run the operation, or join the one already running for this key
     */
    public run(key: string, operation: () => Promise<T>): Promise<T> {
        this.totalRequests++;
        this.pruneStale();

        const existing = this.pending.get(key);
        if (existing) {
            this.deduplicatedRequests++;
            logger.debug(`Request already in flight, joining: ${key}`);
            return existing.promise;
        }

        const promise = Promise.resolve().then(operation);
        const entry: Pending<T> = { promise, startedAt: this.now() };
        this.pending.set(key, entry);
        logger.debug(`Starting request: ${key}`);

        const release = () => {
            // A stale or cancelled entry may have been replaced meanwhile
            if (this.pending.get(key) === entry) {
                this.pending.delete(key);
            }
        };
        void promise.then(release, release);

        return promise;
    }

    public isInFlight(key: string): boolean {
        return this.pending.has(key);
    }

    /**
     * Stop tracking a key so the next call starts a new request. Callers
     * already waiting keep their promise.
     */
    public cancel(key: string): boolean {
        const removed = this.pending.delete(key);
        if (removed) {
            logger.debug(`Cancelled tracking for ${key}`);
        }
        return removed;
    }

    public cancelAll(): void {
        this.pending.clear();
    }

    public getStatistics(): DeduplicationStats {
        return {
            totalRequests: this.totalRequests,
            deduplicatedRequests: this.deduplicatedRequests,
            activeRequests: this.pending.size,
            deduplicationRate: this.totalRequests === 0 ? 0 : this.deduplicatedRequests / this.totalRequests,
        };
    }

    public resetStatistics(): void {
        this.totalRequests = 0;
        this.deduplicatedRequests = 0;
    }

    private pruneStale(): void {
        const cutoff = this.now() - this.maxPendingAgeMs;
        for (const [key, entry] of this.pending) {
            if (entry.startedAt < cutoff) {
                this.pending.delete(key);
                logger.warn(`Dropped stale in-flight request: ${key}`);
            }
        }
    }
}
