/**
 * Report Module - Display attributes, price position and text rendering
 */

export { STRATEGY_DISPLAY, SEVERITY_COLOR, strategyBanner, paint, bold } from './display';
export type { StrategyDisplay, DisplayColor } from './display';
export { buildPricePosition, buildDecisionChecklist, estimateElasticity } from './analysis';
export type { PriceBand, PricePosition, ChecklistItem } from './analysis';
export {
  renderReport,
  summarizeReport,
  formatMoney,
  formatSignedMoney,
  formatFraction,
} from './render';
export type { ReportInput, ReportSummary, RenderOptions } from './render';
