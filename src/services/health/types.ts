export enum ConnectionStatus {
    HEALTHY = 'healthy',
    DEGRADED = 'degraded',
    UNSTABLE = 'unstable',
    DISCONNECTED = 'disconnected',
}

export enum ConnectionQuality {
    EXCELLENT = 'excellent',
    GOOD = 'good',
    FAIR = 'fair',
    POOR = 'poor',
    NONE = 'none',
}

export enum ConnectionType {
    WIFI = 'wifi',
    CELLULAR = 'cellular',
    ETHERNET = 'ethernet',
    UNKNOWN = 'unknown',
    NONE = 'none',
}

/**
 * Scoring breakpoints. Latency tiers are checked from the highest bound
 * down; a latency under every bound costs nothing.
 */
export interface HealthThresholds {
    /** Score lost at an error rate of 1.0 (linear below that) */
    maxErrorPenalty: number;
    latencyTiers: Array<{ minLatencyMs: number; penalty: number }>;
    quality: { excellent: number; good: number; fair: number; poor: number };
    status: { healthy: number; degraded: number; unstable: number };
}

export interface ConnectionHealthResult {
    status: ConnectionStatus;
    quality: ConnectionQuality;
    /** 0-100 */
    healthScore: number;
    averageLatencyMs: number | null;
    errorRate: number;
    connectionType: ConnectionType;
    recommendation: string;
    shouldProceed: boolean;
    shouldUseOfflineMode: boolean;
}

export interface HealthSample {
    latencyMs: number | null;
    success: boolean;
    /** Epoch ms (default: now) */
    at?: number;
}
