/**
 * Labor Calculation - production rates by line category
 * Formula: (Σ quantity / production_rate + Σ fittings × hours_per_fitting) × overhead_factor
 */

import { EngineConfig, LaborSummary, MaterialLineItem } from '../../types';
import { DEFAULT_ENGINE_CONFIG } from '../../constants';
import { ConfigurationError } from '../../errors';

function assertPositiveRates(config: EngineConfig): void {
  for (const [name, rate] of Object.entries(config.production_rates)) {
    if (!Number.isFinite(rate) || rate <= 0) {
      throw new ConfigurationError(`production_rates.${name}`, `must be a positive number, got ${rate}`);
    }
  }
}

/**
 * Productive hours for one line item (fittings excluded)
 */
export function lineItemHours(item: MaterialLineItem, config: EngineConfig = DEFAULT_ENGINE_CONFIG): number {
  const rates = config.production_rates;

  switch (item.category) {
    case 'insulation':
      return item.quantity / (item.system_type === 'pipe' ? rates.pipe_insulation : rates.duct_insulation);
    case 'jacket':
      return item.quantity / rates.jacketing;
    case 'mastic':
      return item.quantity / rates.mastic;
    default:
      return 0;
  }
}

/**
 * Fitting hours are charged once per measurement, on its insulation line
 */
export function lineItemFittingHours(item: MaterialLineItem, config: EngineConfig = DEFAULT_ENGINE_CONFIG): number {
  if (item.category !== 'insulation' || !item.fitting_count) return 0;
  const perFitting = item.system_type === 'pipe' ? config.fitting_hours.pipe : config.fitting_hours.duct;
  return item.fitting_count * perFitting;
}

export function calculateLabor(
  lineItems: readonly MaterialLineItem[],
  laborRatePerHour: number,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): LaborSummary {
  assertPositiveRates(config);
  if (!Number.isFinite(laborRatePerHour) || laborRatePerHour < 0) {
    throw new ConfigurationError('labor_rate_per_hour', `must be a non-negative number, got ${laborRatePerHour}`);
  }

  let productiveHours = 0;
  let fittingHours = 0;

  for (const item of lineItems) {
    productiveHours += lineItemHours(item, config);
    fittingHours += lineItemFittingHours(item, config);
  }

  const totalHours = (productiveHours + fittingHours) * config.labor_overhead_factor;

  return {
    productive_hours: productiveHours,
    fitting_hours: fittingHours,
    overhead_factor: config.labor_overhead_factor,
    total_hours: totalHours,
    labor_rate_per_hour: laborRatePerHour,
    cost: totalHours * laborRatePerHour
  };
}
