export { loadWorkerEnv } from './env.js';
export type { WorkerEnv } from './env.js';
