import { createLogger } from '../../utils/logger.js';

const logger = createLogger('RateLimiter');

export interface RateLimiterStatus {
    key: string;
    maxRequests: number;
    windowMs: number;
    currentRequests: number;
    remaining: number;
    /** 0 when a request would be admitted now */
    waitTimeMs: number;
}

interface Window {
    maxRequests: number;
    windowMs: number;
    timestamps: number[];
}

/**
 * Sliding-window request log per key (RPC function name, or a global key)
 *
 * A request is admitted while fewer than maxRequests timestamps fall inside
 * the last windowMs. The limits passed on each call replace the stored ones,
 * so a config change applies from the next request.
 */
export class RateLimiterRegistry {
    private windows: Map<string, Window> = new Map();

    constructor(private readonly now: () => number = Date.now) {}

    /**
     * Admit and record a request, or refuse it without recording
     */
    public tryAcquire(key: string, maxRequests: number, windowMs: number): boolean {
        const window = this.getWindow(key, maxRequests, windowMs);
        const now = this.now();
        this.prune(window, now);

        if (window.timestamps.length >= window.maxRequests) {
            logger.debug(`Rate limit reached for ${key} (${window.maxRequests}/${window.windowMs}ms)`);
            return false;
        }

        window.timestamps.push(now);
        return true;
    }

    /**
     * Whether tryAcquire would admit a request now. Records nothing, but
     * picks up the given limits like tryAcquire does.
     */
    public hasCapacity(key: string, maxRequests: number, windowMs: number): boolean {
        const window = this.getWindow(key, maxRequests, windowMs);
        this.prune(window, this.now());
        return window.timestamps.length < window.maxRequests;
    }

    /**
     * Time until enough requests expire to free a slot; 0 for unknown keys
     * or when there is room
     */
    public getWaitTimeMs(key: string): number {
        const window = this.windows.get(key);
        if (!window) return 0;

        const now = this.now();
        this.prune(window, now);

        const excess = window.timestamps.length - window.maxRequests;
        if (excess < 0) return 0;
        // A lowered limit can leave more entries than slots
        return Math.max(0, window.timestamps[excess] + window.windowMs - now);
    }

    public getStatus(key: string): RateLimiterStatus | null {
        const window = this.windows.get(key);
        if (!window) return null;

        this.prune(window, this.now());
        return {
            key,
            maxRequests: window.maxRequests,
            windowMs: window.windowMs,
            currentRequests: window.timestamps.length,
            remaining: Math.max(0, window.maxRequests - window.timestamps.length),
            waitTimeMs: this.getWaitTimeMs(key),
        };
    }

    public getAllStatus(): Record<string, RateLimiterStatus> {
        const status: Record<string, RateLimiterStatus> = {};
        for (const key of this.windows.keys()) {
            const entry = this.getStatus(key);
            if (entry) status[key] = entry;
        }
        return status;
    }

    public reset(key: string): boolean {
        const window = this.windows.get(key);
        if (!window) return false;

        window.timestamps = [];
        return true;
    }

    public resetAll(): void {
        for (const window of this.windows.values()) {
            window.timestamps = [];
        }
        logger.debug('All rate limiters reset');
    }

    private getWindow(key: string, maxRequests: number, windowMs: number): Window {
        let window = this.windows.get(key);
        if (!window) {
            window = { maxRequests, windowMs, timestamps: [] };
            this.windows.set(key, window);
            return window;
        }

        window.maxRequests = maxRequests;
        window.windowMs = windowMs;
        return window;
    }

    private prune(window: Window, now: number): void {
        const cutoff = now - window.windowMs;
        let expired = 0;
        while (expired < window.timestamps.length && window.timestamps[expired] <= cutoff) {
            expired++;
        }
        if (expired > 0) {
            window.timestamps.splice(0, expired);
        }
    }
}
