/**
 * @stakewatch/shared — Barrel Export
 *
 * Single entry point for config loading, chain queries, types and constants.
 */

export * from './constants.js';
export * from './types/application.js';
export * from './config/config-loader.js';
export * from './query/command-runner.js';
export * from './query/application-client.js';
export * from './utils/format.js';
