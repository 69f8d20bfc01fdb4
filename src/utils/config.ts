/**
 * Configuration loading for Pricewise
 *
 * Loads ~/.pricewise/.env, then ~/.pricewise/pricewise.json (or
 * PRICEWISE_CONFIG_PATH), then PRICEWISE_* environment overrides.
 */

import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { InvalidConfigurationError } from '../pricing/errors';
import { resolveRuleSet } from '../pricing/rulesets';
import type { RuleSet } from '../pricing/types';
import { createLogger } from './logger';

const logger = createLogger('config');

// Load .env file from ~/.pricewise/.env first, then CWD fallback
dotenvConfig({ path: join(homedir(), '.pricewise', '.env') });
dotenvConfig(); // CWD fallback (won't override existing vars)

type Env = Record<string, string | undefined>;

function resolveUserPath(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith('~')) {
    return resolve(trimmed.replace(/^~(?=$|[\\/])/, homedir()));
  }
  return resolve(trimmed);
}

export function resolveStateDir(env: Env = process.env): string {
  const override = env.PRICEWISE_STATE_DIR?.trim();
  if (override) return resolveUserPath(override);
  return join(homedir(), '.pricewise');
}

export function resolveConfigPath(env: Env = process.env): string {
  const override = env.PRICEWISE_CONFIG_PATH?.trim();
  if (override) return resolveUserPath(override);
  return join(resolveStateDir(env), 'pricewise.json');
}

// =============================================================================
// SCHEMA
// =============================================================================

const optionalNumber = z.coerce.number().finite().optional();

const pricingSchema = z.object({
  ladder: z.enum(['simple', 'platinum']).default('platinum'),
  returnThreshold: optionalNumber,
  refundTaxThreshold: optionalNumber,
  liquidationDays: optionalNumber,
  liquidationMarkup: optionalNumber,
  liquidationUndercut: optionalNumber,
  offenseAcosFactor: optionalNumber,
  offenseMaxInventoryDays: optionalNumber,
  offenseStepPct: optionalNumber,
  catchUpGapFactor: optionalNumber,
  catchUpPriceFactor: optionalNumber,
  marketCatchUpMinGap: optionalNumber,
  marketCatchUpUndercut: optionalNumber,
});

const configSchema = z.object({
  pricing: pricingSchema.default({}),
  data: z.object({
    /** Metric tables read by `analyze` when no files are given */
    files: z.array(z.string()).default([]),
    /** Scale of percentage columns in those tables */
    percentScale: z.enum(['auto', 'fraction', 'percent']).default('auto'),
  }).default({}),
  report: z.object({
    color: z.boolean().default(true),
  }).default({}),
});

export type PricewiseConfig = z.infer<typeof configSchema>;

// =============================================================================
// LOADING
// =============================================================================

/**
 * Substitute environment variables in config values.
 * Supports ${VAR_NAME} syntax.
 */
function substituteEnvVars(obj: unknown, env: Env): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => env[varName] ?? '');
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => substituteEnvVars(item, env));
  }
  if (obj && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVars(value, env);
    }
    return result;
  }
  return obj;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function section(value: Record<string, unknown>, key: string): Record<string, unknown> {
  const inner = value[key];
  return isRecord(inner) ? { ...inner } : {};
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/** Environment overrides win over the config file. */
function applyEnvOverrides(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
  const pricing = section(raw, 'pricing');
  const data = section(raw, 'data');

  const ladder = nonEmpty(env.PRICEWISE_LADDER);
  if (ladder) pricing.ladder = ladder;
  const returnThreshold = nonEmpty(env.PRICEWISE_RETURN_THRESHOLD);
  if (returnThreshold) pricing.returnThreshold = returnThreshold;
  const liquidationDays = nonEmpty(env.PRICEWISE_LIQUIDATION_DAYS);
  if (liquidationDays) pricing.liquidationDays = liquidationDays;
  const files = nonEmpty(env.PRICEWISE_DATA_FILES);
  if (files) data.files = files.split(',').map((f) => f.trim()).filter(Boolean);
  const percentScale = nonEmpty(env.PRICEWISE_PERCENT_SCALE);
  if (percentScale) data.percentScale = percentScale;

  return { ...raw, pricing, data };
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    logger.error({ configPath, error: err }, 'Failed to parse config file');
    throw new InvalidConfigurationError(`Config file ${configPath} is not valid JSON`);
  }
  if (!isRecord(parsed)) {
    throw new InvalidConfigurationError(`Config file ${configPath} must hold a JSON object`);
  }
  return parsed;
}

/**
 * Load configuration from file and environment
 */
export async function loadConfig(customPath?: string, env: Env = process.env): Promise<PricewiseConfig> {
  const configPath = customPath ?? resolveConfigPath(env);
  const fileConfig = substituteEnvVars(readConfigFile(configPath), env);
  const raw = applyEnvOverrides(isRecord(fileConfig) ? fileConfig : {}, env);

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.');
    throw new InvalidConfigurationError(`Invalid configuration at ${field}: ${issue.message}`, field);
  }

  logger.debug({ configPath, ladder: result.data.pricing.ladder }, 'Config loaded');
  return result.data;
}

/** Validated rule set for the configured ladder and thresholds. */
export function ruleSetFromConfig(config: PricewiseConfig): RuleSet {
  return resolveRuleSet(config.pricing);
}
