import {
    ConnectionHealthResult,
    ConnectionQuality,
    ConnectionStatus,
    ConnectionType,
    HealthThresholds,
} from './types.js';

export const DEFAULT_HEALTH_THRESHOLDS: Readonly<HealthThresholds> = Object.freeze({
    maxErrorPenalty: 70,
    latencyTiers: [
        { minLatencyMs: 3000, penalty: 45 },
        { minLatencyMs: 1000, penalty: 25 },
        { minLatencyMs: 300, penalty: 10 },
    ],
    quality: { excellent: 90, good: 70, fair: 40, poor: 15 },
    status: { healthy: 70, degraded: 40, unstable: 15 },
});

const RECOMMENDATIONS: Record<ConnectionStatus, string> = {
    [ConnectionStatus.HEALTHY]: 'Connection is healthy',
    [ConnectionStatus.DEGRADED]: 'Consider deferring non-critical requests',
    [ConnectionStatus.UNSTABLE]: 'Connection is unstable; defer background sync and prefer cached data',
    [ConnectionStatus.DISCONNECTED]: 'Switch to offline mode',
};

const TYPE_BY_NAME: ReadonlyMap<string, ConnectionType> = new Map(
    Object.values(ConnectionType).map(type => [type, type])
);

/**
 * Resolve a connection type name. Absent means no connection; unrecognised
 * names are 'unknown'.
 */
export function parseConnectionType(name: string | null | undefined): ConnectionType {
    if (!name || !name.trim()) return ConnectionType.NONE;
    return TYPE_BY_NAME.get(name.trim().toLowerCase()) ?? ConnectionType.UNKNOWN;
}

/**
 * Score a connection from its recent error rate and latency.
 *
 * Starts from 100, loses up to maxErrorPenalty for errors and a tiered
 * latency penalty, then maps the score to a quality tier and a status.
 * A missing connection is always disconnected.
 */
export function evaluateConnectionHealth(
    errorRate: number,
    averageLatencyMs: number | null,
    connectionType: string | null | undefined,
    thresholds: HealthThresholds = DEFAULT_HEALTH_THRESHOLDS
): ConnectionHealthResult {
    const rate = Number.isFinite(errorRate) ? Math.min(1, Math.max(0, errorRate)) : 0;
    const latency = averageLatencyMs !== null && Number.isFinite(averageLatencyMs) ? averageLatencyMs : null;
    const type = parseConnectionType(connectionType);

    if (type === ConnectionType.NONE) {
        return buildResult(ConnectionStatus.DISCONNECTED, ConnectionQuality.NONE, 0, latency, rate, type);
    }

    const raw = 100 - rate * thresholds.maxErrorPenalty - latencyPenalty(latency, thresholds);
    const score = Math.min(100, Math.max(0, Math.round(raw)));

    return buildResult(statusFor(score, thresholds), qualityFor(score, thresholds), score, latency, rate, type);
}

function latencyPenalty(latency: number | null, thresholds: HealthThresholds): number {
    if (latency === null) return 0;

    const tiers = [...thresholds.latencyTiers].sort((a, b) => b.minLatencyMs - a.minLatencyMs);
    return tiers.find(tier => latency >= tier.minLatencyMs)?.penalty ?? 0;
}

function qualityFor(score: number, { quality }: HealthThresholds): ConnectionQuality {
    if (score >= quality.excellent) return ConnectionQuality.EXCELLENT;
    if (score >= quality.good) return ConnectionQuality.GOOD;
    if (score >= quality.fair) return ConnectionQuality.FAIR;
    if (score >= quality.poor) return ConnectionQuality.POOR;
    return ConnectionQuality.NONE;
}

function statusFor(score: number, { status }: HealthThresholds): ConnectionStatus {
    if (score >= status.healthy) return ConnectionStatus.HEALTHY;
    if (score >= status.degraded) return ConnectionStatus.DEGRADED;
    if (score >= status.unstable) return ConnectionStatus.UNSTABLE;
    return ConnectionStatus.DISCONNECTED;
}

function buildResult(
    status: ConnectionStatus,
    quality: ConnectionQuality,
    healthScore: number,
    averageLatencyMs: number | null,
    errorRate: number,
    connectionType: ConnectionType
): ConnectionHealthResult {
    return {
        status,
        quality,
        healthScore,
        averageLatencyMs,
        errorRate,
        connectionType,
        recommendation: RECOMMENDATIONS[status],
        shouldProceed: status !== ConnectionStatus.DISCONNECTED,
        shouldUseOfflineMode: status === ConnectionStatus.DISCONNECTED || status === ConnectionStatus.UNSTABLE,
    };
}
