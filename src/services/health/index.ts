export {
    evaluateConnectionHealth,
    parseConnectionType,
    DEFAULT_HEALTH_THRESHOLDS,
} from './evaluator.js';
export { ConnectionMonitor } from './monitor.js';
export type { ConnectionMonitorOptions } from './monitor.js';
export * from './types.js';
