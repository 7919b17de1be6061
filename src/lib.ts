export * from './services/backoff/index.js';
export * from './services/retry/index.js';
export * from './services/circuit/index.js';
export * from './services/health/index.js';
export * from './services/registry/index.js';
export * from './services/rate-limiter/index.js';
export * from './services/dedup/index.js';
export * from './services/rpc-client/index.js';
export * from './config/index.js';
export * from './stack.js';
export * from './utils/errors.js';
export { LifelineServer } from './mcp/server.js';
