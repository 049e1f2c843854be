/**
 * Engine configuration merging and warning collection
 */

import { EngineConfig, EngineConfigOverrides, EstimateWarning } from '../../types';
import { DEFAULT_ENGINE_CONFIG } from '../../constants';

/**
 * Merge partial overrides onto the defaults, one level deep
 */
export function resolveEngineConfig(overrides?: EngineConfigOverrides | null): EngineConfig {
  const base = DEFAULT_ENGINE_CONFIG;
  if (!overrides) return base;

  return {
    takeoff: {
      ...base.takeoff,
      ...overrides.takeoff,
      pipe_fitting_equivalent_lf: {
        ...base.takeoff.pipe_fitting_equivalent_lf,
        ...overrides.takeoff?.pipe_fitting_equivalent_lf
      }
    },
    production_rates: { ...base.production_rates, ...overrides.production_rates },
    fitting_hours: { ...base.fitting_hours, ...overrides.fitting_hours },
    labor_overhead_factor: overrides.labor_overhead_factor ?? base.labor_overhead_factor,
    coverage: { ...base.coverage, ...overrides.coverage },
    fallback_unit_prices: { ...base.fallback_unit_prices, ...overrides.fallback_unit_prices },
    band_spacing_ft: overrides.band_spacing_ft ?? base.band_spacing_ft,
    thickness_range_in: { ...base.thickness_range_in, ...overrides.thickness_range_in }
  };
}

/**
 * Append a warning unless an identical one is already recorded
 */
export function addWarning(warnings: EstimateWarning[], warning: EstimateWarning): void {
  const exists = warnings.some(w =>
    w.code === warning.code && w.message === warning.message && w.field === warning.field
  );
  if (!exists) warnings.push(warning);
}

export function mergeWarnings(...groups: EstimateWarning[][]): EstimateWarning[] {
  const merged: EstimateWarning[] = [];
  for (const group of groups) {
    for (const warning of group) addWarning(merged, warning);
  }
  return merged;
}
