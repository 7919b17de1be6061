import { EventEmitter } from 'events';
import { evaluateConnectionHealth, DEFAULT_HEALTH_THRESHOLDS, parseConnectionType } from './evaluator.js';
import {
    ConnectionHealthResult,
    ConnectionStatus,
    ConnectionType,
    HealthSample,
    HealthThresholds,
} from './types.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('ConnectionMonitor');

export interface ConnectionMonitorOptions {
    /** Samples kept at most (default: 50) */
    maxSamples?: number;
    /** Samples older than this are dropped (default: 5 minutes) */
    maxSampleAgeMs?: number;
    thresholds?: HealthThresholds;
    connectionType?: string;
    now?: () => number;
}

interface StoredSample {
    latencyMs: number | null;
    success: boolean;
    at: number;
}

/**
 * Rolling view of recent request outcomes for the current connection
 *
 * Features:
 * - Window bounded by sample count and sample age
 * - Error rate and average latency derived from the window
 * - 'health:changed' emitted when the evaluated status moves
 */
export class ConnectionMonitor extends EventEmitter {
    private samples: StoredSample[] = [];
    private connectionType: ConnectionType;
    private lastStatus: ConnectionStatus | null = null;
    private readonly maxSamples: number;
    private readonly maxSampleAgeMs: number;
    private readonly thresholds: HealthThresholds;
    private readonly now: () => number;

    constructor(options: ConnectionMonitorOptions = {}) {
        super();
        this.maxSamples = Math.max(1, options.maxSamples ?? 50);
        this.maxSampleAgeMs = options.maxSampleAgeMs ?? 5 * 60 * 1000;
        this.thresholds = options.thresholds ?? DEFAULT_HEALTH_THRESHOLDS;
        this.connectionType = parseConnectionType(options.connectionType ?? ConnectionType.UNKNOWN);
        this.now = options.now ?? Date.now;
    }

    public recordSample(sample: HealthSample): ConnectionHealthResult {
        this.samples.push({
            latencyMs: sample.latencyMs,
            success: sample.success,
            at: sample.at ?? this.now(),
        });
        if (this.samples.length > this.maxSamples) {
            this.samples.splice(0, this.samples.length - this.maxSamples);
        }
        return this.evaluate();
    }

    public setConnectionType(type: string | null): ConnectionHealthResult {
        const next = parseConnectionType(type);
        if (next !== this.connectionType) {
            logger.info(`Connection type changed: ${this.connectionType} -> ${next}`);
            this.connectionType = next;
        }
        return this.evaluate();
    }

    public getConnectionType(): ConnectionType {
        return this.connectionType;
    }

    /**
     * Evaluate health over the current window. With no samples the error
     * rate is 0 and latency unknown.
     */
    public evaluate(): ConnectionHealthResult {
        this.prune();

        const total = this.samples.length;
        const failures = this.samples.filter(s => !s.success).length;
        const latencies = this.samples
            .map(s => s.latencyMs)
            .filter((ms): ms is number => ms !== null && Number.isFinite(ms));

        const errorRate = total > 0 ? failures / total : 0;
        const averageLatency = latencies.length > 0
            ? latencies.reduce((a, b) => a + b, 0) / latencies.length
            : null;

        const result = evaluateConnectionHealth(errorRate, averageLatency, this.connectionType, this.thresholds);

        if (this.lastStatus !== null && result.status !== this.lastStatus) {
            logger.warn(`Connection status changed: ${this.lastStatus} -> ${result.status}`);
            this.emit('health:changed', { from: this.lastStatus, to: result.status, result });
        }
        this.lastStatus = result.status;

        return result;
    }

    /**
     * Background work (prefetch, sync) should wait while the connection is
     * unstable or gone
     */
    public shouldDeferBackgroundTraffic(): boolean {
        return this.evaluate().shouldUseOfflineMode;
    }

    public getSampleCount(): number {
        this.prune();
        return this.samples.length;
    }

    public reset(): void {
        this.samples = [];
        this.lastStatus = null;
        logger.debug('Connection samples cleared');
    }

    private prune(): void {
        const cutoff = this.now() - this.maxSampleAgeMs;
        this.samples = this.samples.filter(s => s.at > cutoff);
    }
}
