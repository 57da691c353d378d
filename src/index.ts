export * from './utils/logging/index.js';
export { getEnv, resetEnvCache, type Env, type LogFormat } from './utils/env.js';
