export { Environment, EnvironmentManager } from './environment.js';
export type { EnvironmentSettings, SearchPathSnapshot } from './environment.js';
