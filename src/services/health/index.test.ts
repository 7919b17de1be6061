import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
    evaluateConnectionHealth,
    parseConnectionType,
    ConnectionMonitor,
    ConnectionQuality,
    ConnectionStatus,
    ConnectionType,
    DEFAULT_HEALTH_THRESHOLDS,
} from './index.js';

vi.mock('../../utils/logger.js', () => ({
    logger: {
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
    },
    createLogger: () => ({
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
    }),
}));

describe('evaluateConnectionHealth', () => {
    it('should rate a fast clean wifi link as healthy', () => {
        expect(evaluateConnectionHealth(0, 50, 'wifi')).toEqual({
            status: ConnectionStatus.HEALTHY,
            quality: ConnectionQuality.EXCELLENT,
            healthScore: 100,
            averageLatencyMs: 50,
            errorRate: 0,
            connectionType: ConnectionType.WIFI,
            recommendation: 'Connection is healthy',
            shouldProceed: true,
            shouldUseOfflineMode: false,
        });
    });

    it('should rate a failing slow link as disconnected', () => {
        const result = evaluateConnectionHealth(0.9, 5000, 'cellular');
        expect(result.status).toBe(ConnectionStatus.DISCONNECTED);
        expect(result.quality).toBe(ConnectionQuality.NONE);
        expect(result.healthScore).toBe(0);
        expect(result.shouldProceed).toBe(false);
        expect(result.shouldUseOfflineMode).toBe(true);
        expect(result.recommendation).toBe('Switch to offline mode');
    });

    it('should map scores onto quality and status tiers', () => {
        const good = evaluateConnectionHealth(0.1, 500, 'wifi');
        expect(good.healthScore).toBe(83);
        expect(good.quality).toBe(ConnectionQuality.GOOD);
        expect(good.status).toBe(ConnectionStatus.HEALTHY);

        const degraded = evaluateConnectionHealth(0.3, 1500, 'ethernet');
        expect(degraded.healthScore).toBe(54);
        expect(degraded.quality).toBe(ConnectionQuality.FAIR);
        expect(degraded.status).toBe(ConnectionStatus.DEGRADED);
        expect(degraded.shouldProceed).toBe(true);
        expect(degraded.shouldUseOfflineMode).toBe(false);
        expect(degraded.recommendation).toBe('Consider deferring non-critical requests');

        const unstable = evaluateConnectionHealth(0.5, 3000, 'cellular');
        expect(unstable.healthScore).toBe(20);
        expect(unstable.quality).toBe(ConnectionQuality.POOR);
        expect(unstable.status).toBe(ConnectionStatus.UNSTABLE);
        expect(unstable.shouldProceed).toBe(true);
        expect(unstable.shouldUseOfflineMode).toBe(true);
    });

    it('should treat the degraded boundary as inclusive', () => {
        const result = evaluateConnectionHealth(0.5, 1500, 'wifi');
        expect(result.healthScore).toBe(40);
        expect(result.status).toBe(ConnectionStatus.DEGRADED);
    });

    it('should always report no connection as disconnected', () => {
        for (const type of ['none', null, undefined, '']) {
            const result = evaluateConnectionHealth(0, 50, type);
            expect(result.status).toBe(ConnectionStatus.DISCONNECTED);
            expect(result.healthScore).toBe(0);
            expect(result.quality).toBe(ConnectionQuality.NONE);
            expect(result.connectionType).toBe(ConnectionType.NONE);
        }
    });

    it('should clamp out-of-range error rates', () => {
        const high = evaluateConnectionHealth(2, null, 'wifi');
        expect(high.errorRate).toBe(1);
        expect(high.healthScore).toBe(30);
        expect(high.status).toBe(ConnectionStatus.UNSTABLE);

        expect(evaluateConnectionHealth(Number.NaN, null, 'wifi').errorRate).toBe(0);
        expect(evaluateConnectionHealth(-1, null, 'wifi').healthScore).toBe(100);
    });

    it('should accept overridden thresholds', () => {
        const harsh = { ...DEFAULT_HEALTH_THRESHOLDS, maxErrorPenalty: 100 };
        expect(evaluateConnectionHealth(0.5, null, 'wifi', harsh).healthScore).toBe(50);
    });
});

describe('parseConnectionType', () => {
    it('should resolve known names case-insensitively', () => {
        expect(parseConnectionType('WiFi')).toBe(ConnectionType.WIFI);
        expect(parseConnectionType(' ethernet ')).toBe(ConnectionType.ETHERNET);
    });

    it('should map unrecognised names to unknown', () => {
        expect(parseConnectionType('satellite')).toBe(ConnectionType.UNKNOWN);
    });
});

describe('ConnectionMonitor', () => {
    let now: number;

    beforeEach(() => {
        now = 0;
    });

    it('should report healthy with no samples', () => {
        const monitor = new ConnectionMonitor({ connectionType: 'wifi', now: () => now });
        const result = monitor.evaluate();
        expect(result.status).toBe(ConnectionStatus.HEALTHY);
        expect(result.averageLatencyMs).toBeNull();
    });

    it('should derive error rate and latency from samples', () => {
        const monitor = new ConnectionMonitor({ connectionType: 'wifi', now: () => now });
        monitor.recordSample({ latencyMs: 100, success: true });
        const result = monitor.recordSample({ latencyMs: null, success: false });

        expect(result.errorRate).toBe(0.5);
        expect(result.averageLatencyMs).toBe(100);
        expect(result.healthScore).toBe(65);
    });

    it('should emit health:changed when the status moves', () => {
        const monitor = new ConnectionMonitor({ connectionType: 'wifi', now: () => now });
        const changed = vi.fn();
        monitor.on('health:changed', changed);

        monitor.recordSample({ latencyMs: 100, success: true });
        expect(changed).not.toHaveBeenCalled();

        monitor.recordSample({ latencyMs: null, success: false });
        expect(changed).toHaveBeenCalledTimes(1);
        expect(changed).toHaveBeenCalledWith(expect.objectContaining({
            from: ConnectionStatus.HEALTHY,
            to: ConnectionStatus.DEGRADED,
        }));
    });

    it('should keep only the newest samples', () => {
        const monitor = new ConnectionMonitor({ connectionType: 'wifi', maxSamples: 2, now: () => now });
        monitor.recordSample({ latencyMs: 100, success: false });
        monitor.recordSample({ latencyMs: 100, success: false });
        monitor.recordSample({ latencyMs: 100, success: true });
        const result = monitor.recordSample({ latencyMs: 100, success: true });

        expect(monitor.getSampleCount()).toBe(2);
        expect(result.errorRate).toBe(0);
    });

    it('should drop samples older than the window', () => {
        const monitor = new ConnectionMonitor({ connectionType: 'wifi', maxSampleAgeMs: 1000, now: () => now });
        monitor.recordSample({ latencyMs: 100, success: false });

        now = 999;
        expect(monitor.getSampleCount()).toBe(1);

        now = 1000;
        expect(monitor.getSampleCount()).toBe(0);
        expect(monitor.evaluate().errorRate).toBe(0);
    });

    it('should defer background traffic only when the link is unstable or gone', () => {
        const monitor = new ConnectionMonitor({ connectionType: 'wifi', now: () => now });
        expect(monitor.shouldDeferBackgroundTraffic()).toBe(false);

        monitor.setConnectionType(null);
        expect(monitor.getConnectionType()).toBe(ConnectionType.NONE);
        expect(monitor.shouldDeferBackgroundTraffic()).toBe(true);

        monitor.setConnectionType('cellular');
        expect(monitor.shouldDeferBackgroundTraffic()).toBe(false);
    });
});
