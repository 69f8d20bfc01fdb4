/**
 * Pricewise — Margin-aware SKU price recommendations
 *
 * Library entry point. The CLI lives in ./cli.
 */

export * from './pricing';
export * from './import';
export * from './report';
export { loadConfig, ruleSetFromConfig, resolveConfigPath, resolveStateDir } from './utils/config';
export type { PricewiseConfig } from './utils/config';
export { createLogger } from './utils/logger';
