export { loadApiEnv } from './env.js';
export type { ApiEnv } from './env.js';
