#!/usr/bin/env node
/**
 * Pricewise CLI
 *
 * Commands:
 * - pricewise simulate    — Price one SKU from command-line inputs
 * - pricewise analyze     — Price SKUs from metric CSV files
 * - pricewise rulesets    — Show ladder presets and the active rule set
 */

import { Command, InvalidArgumentError } from 'commander';
import { loadSkuDataset } from '../import/loader';
import type { PercentScale } from '../import/types';
import { checkMarginTargets, recommendPrice } from '../pricing/engine';
import { PricingError } from '../pricing/errors';
import { RULE_SET_PRESETS, resolveRuleSet } from '../pricing/rulesets';
import type { LadderKind, RuleSet, RuleSetOptions, SkuMetrics } from '../pricing/types';
import { renderReport, summarizeReport } from '../report/render';
import type { ReportInput } from '../report/render';
import { loadConfig } from '../utils/config';
import type { PricewiseConfig } from '../utils/config';
import { logger } from '../utils/logger';

const program = new Command();

// ============================================================================
// Shared options
// ============================================================================

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parseLadder(value: string): LadderKind {
  if (value === 'simple' || value === 'platinum') return value;
  throw new InvalidArgumentError('Expected "simple" or "platinum".');
}

function parsePercentScale(value: string): PercentScale {
  if (value === 'auto' || value === 'fraction' || value === 'percent') return value;
  throw new InvalidArgumentError('Expected "auto", "fraction" or "percent".');
}

interface RuleOptions {
  ladder?: LadderKind;
  returnThreshold?: number;
  liquidationDays?: number;
}

interface OutputOptions {
  json?: boolean;
  color: boolean;
}

function withRuleOptions(command: Command): Command {
  return command
    .option('--ladder <ladder>', 'Rule ladder: simple | platinum', parseLadder)
    .option('--return-threshold <pct>', 'Block price hikes above this return rate (%)', parseNumber)
    .option('--liquidation-days <days>', 'Liquidate above this many days of supply', parseNumber)
    .option('--json', 'Print JSON instead of a text report')
    .option('--no-color', 'Disable ANSI colours');
}

function buildRules(config: PricewiseConfig, options: RuleOptions): RuleSet {
  const ladderChanged = options.ladder !== undefined && options.ladder !== config.pricing.ladder;
  // thresholds in the config belong to its ladder; a different ladder starts from its own preset
  const base: RuleSetOptions = ladderChanged ? { ladder: options.ladder } : config.pricing;
  return resolveRuleSet({
    ...base,
    returnThreshold: options.returnThreshold ?? base.returnThreshold,
    liquidationDays: options.liquidationDays ?? base.liquidationDays,
  });
}

function warnOnMarginTargets(sku: string, metrics: SkuMetrics): void {
  for (const issue of checkMarginTargets(metrics)) {
    logger.warn({ sku, field: issue.field }, issue.message);
  }
}

function print(reports: ReportInput[], options: OutputOptions, config: PricewiseConfig): void {
  if (options.json) {
    const summaries = reports.map(summarizeReport);
    console.log(JSON.stringify(summaries.length === 1 ? summaries[0] : summaries, null, 2));
    return;
  }
  const color = options.color && config.report.color && process.stdout.isTTY === true;
  for (const report of reports) {
    console.log('');
    for (const line of renderReport(report, { color })) console.log(line);
  }
  console.log('');
}

program
  .name('pricewise')
  .description('Margin-aware SKU price recommendations')
  .version('0.1.0');

// ============================================================================
// simulate — Price one SKU from inputs
// ============================================================================

interface SimulateOptions extends RuleOptions, OutputOptions {
  sku: string;
  cost: number;
  price: number;
  competitor: number;
  minMargin: number;
  targetMargin: number;
  inventoryDays: number;
  returns: number;
  adSpend: number;
  adSales: number;
  unitsSold: number;
}

withRuleOptions(
  program
    .command('simulate')
    .description('Recommend a price for one SKU from the given parameters')
    .option('--sku <name>', 'SKU name', 'Bio-Plate-Standard')
    .option('--cost <usd>', 'True unit cost', parseNumber, 15)
    .option('--price <usd>', 'Current selling price', parseNumber, 22)
    .option('--competitor <usd>', 'Average competitor price', parseNumber, 25)
    .option('--min-margin <pct>', 'Minimum acceptable margin (%)', parseNumber, 20)
    .option('--target-margin <pct>', 'Target gross margin (%)', parseNumber, 40)
    .option('--inventory-days <days>', 'Days of supply', parseNumber, 45)
    .option('--returns <pct>', 'Return rate (%)', parseNumber, 2.5)
    .option('--ad-spend <usd>', 'Advertising spend', parseNumber, 0)
    .option('--ad-sales <usd>', 'Advertising-attributed sales', parseNumber, 0)
    .option('--units-sold <units>', 'Units sold over the window', parseNumber, 0),
).action(async (options: SimulateOptions) => {
  const config = await loadConfig();
  const rules = buildRules(config, options);
  const metrics: SkuMetrics = {
    unitCost: options.cost,
    currentPrice: options.price,
    competitorPrice: options.competitor,
    minMarginPct: options.minMargin,
    targetMarginPct: options.targetMargin,
    returnRatePct: options.returns,
    inventoryDays: options.inventoryDays,
    adSpend: options.adSpend,
    adSales: options.adSales,
    unitsSold: options.unitsSold,
  };

  warnOnMarginTargets(options.sku, metrics);
  const recommendation = recommendPrice(metrics, rules);
  print([{ sku: options.sku, metrics, recommendation, rules }], options, config);
});

// ============================================================================
// analyze — Price SKUs from metric files
// ============================================================================

interface AnalyzeOptions extends RuleOptions, OutputOptions {
  sku?: string[];
  percentScale?: PercentScale;
}

withRuleOptions(
  program
    .command('analyze')
    .description('Recommend prices for SKUs merged from metric CSV files')
    .argument('[files...]', 'Metric tables (pricing, inventory, returns, ads); defaults to data.files')
    .option('--sku <sku...>', 'Only these SKUs')
    .option(
      '--percent-scale <scale>',
      'Percentage columns hold fractions (0-1), percents (0-100), or auto to guess',
      parsePercentScale,
    ),
).action(async (files: string[], options: AnalyzeOptions) => {
  const config = await loadConfig();
  const rules = buildRules(config, options);
  const paths = files.length > 0 ? files : config.data.files;

  const dataset = loadSkuDataset(paths, {
    percentScale: options.percentScale ?? config.data.percentScale,
  });
  for (const error of dataset.errors) {
    logger.warn({ row: error.row, column: error.column, value: error.value }, error.message);
  }

  const wanted = options.sku ?? [...dataset.records.keys()];
  const reports: ReportInput[] = [];
  for (const sku of wanted) {
    const record = dataset.records.get(sku);
    if (!record) {
      logger.warn({ sku }, 'SKU not found in metric files');
      continue;
    }
    warnOnMarginTargets(sku, record.metrics);
    reports.push({
      sku,
      name: record.name,
      metrics: record.metrics,
      recommendation: recommendPrice(record.metrics, rules),
      rules,
    });
  }

  if (reports.length === 0) {
    throw new PricingError('No SKUs to analyze');
  }
  print(reports, options, config);
});

// ============================================================================
// rulesets — Show presets
// ============================================================================

program
  .command('rulesets')
  .description('Show ladder presets and the active rule set')
  .option('--json', 'Print JSON')
  .action(async (options: { json?: boolean }) => {
    const config = await loadConfig();
    const active = buildRules(config, {});

    if (options.json) {
      console.log(JSON.stringify({ active, presets: RULE_SET_PRESETS }, null, 2));
      return;
    }

    console.log('\n\x1b[1mPricewise Rule Sets\x1b[0m\n');
    for (const preset of Object.values(RULE_SET_PRESETS)) {
      const marker = preset.ladder === active.ladder ? '\x1b[32m●\x1b[0m' : '\x1b[90m○\x1b[0m';
      console.log(`  ${marker} ${preset.ladder}`);
      console.log(`      returns block above ${preset.returnThreshold}%, liquidate above ${preset.liquidationDays} days`);
    }
    console.log('\n  Active:');
    console.log(`    ladder ${active.ladder}, returns ${active.returnThreshold}%, refund tax ${active.refundTaxThreshold}%, liquidation ${active.liquidationDays} days\n`);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof PricingError) {
    logger.error({ error: err.name }, err.message);
  } else {
    logger.error({ err }, 'Command failed');
  }
  process.exitCode = 1;
});
