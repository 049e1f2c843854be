/**
 * Insulation Estimate Orchestrator
 * measurements + specs → materials → labor → BOM → quote
 *
 * Pure and synchronous: the same input always yields the same QuoteResult.
 */

import {
  EngineConfigOverrides,
  EstimateWarning,
  InsulationSpec,
  MeasurementItem,
  PriceBook,
  PricingSettings,
  QuoteResult
} from '../../types';
import { ConfigurationError } from '../../errors';
import { mergeWarnings, resolveEngineConfig } from './config';
import { resolveSpecifications, firstSystemTypeMatcher, SpecMatcher } from './specs';
import {
  filterMeasurementsToScope,
  filterSpecsToScope,
  getScopeExclusionSummary,
  measurementExclusionKeyword,
  specExclusionKeyword
} from './scope';
import { calculateMaterials } from './materials';
import { calculateLabor } from './labor';
import { buildBillOfMaterials } from './bom';
import { assembleQuote, assertPricingSettings } from './quote';

export interface EstimateOptions {
  /** Drop duct liner, plumbing, sprinkler and similar items before pricing */
  apply_scope_filter?: boolean;
}

export interface EstimateInput {
  measurements: readonly MeasurementItem[];
  specifications?: readonly InsulationSpec[] | null;
  price_book: PriceBook | null | undefined;
  settings: PricingSettings | null | undefined;
  config?: EngineConfigOverrides | null;
  matcher?: SpecMatcher;
  options?: EstimateOptions;
}

export interface ScopedInput {
  measurements: readonly MeasurementItem[];
  specs: InsulationSpec[];
  warnings: EstimateWarning[];
}

/**
 * Drop out-of-scope measurements and specs, with one warning per item dropped
 */
export function applyScopeFilter(
  measurements: readonly MeasurementItem[],
  specs: InsulationSpec[]
): ScopedInput {
  const scopedSpecs = filterSpecsToScope(specs);
  const scopedMeasurements = filterMeasurementsToScope(measurements);
  const warnings: EstimateWarning[] = [];

  for (const m of measurements) {
    if (scopedMeasurements.includes(m)) continue;
    const keyword = measurementExclusionKeyword(m);
    warnings.push({
      code: 'OUT_OF_SCOPE',
      message: keyword
        ? `${m.id}: excluded from scope ('${keyword}')`
        : `${m.id}: system type '${m.system_type}' is out of scope`,
      field: `measurements.${m.id}`
    });
  }

  specs.forEach((spec, index) => {
    if (scopedSpecs.includes(spec)) return;
    warnings.push({
      code: 'OUT_OF_SCOPE',
      message: `${spec.system_type} spec '${spec.material}' excluded from scope ('${specExclusionKeyword(spec) ?? spec.system_type}')`,
      field: `specifications.${index}`
    });
  });

  if (warnings.length > 0) {
    warnings.push({
      code: 'SCOPE_FILTER_APPLIED',
      message: getScopeExclusionSummary(
        specs.length, scopedSpecs.length, measurements.length, scopedMeasurements.length
      )
    });
  }

  return { measurements: scopedMeasurements, specs: scopedSpecs, warnings };
}

export function estimateInsulation(input: EstimateInput): QuoteResult {
  const { price_book: priceBook, settings } = input;

  if (!priceBook) {
    throw new ConfigurationError('price_book', 'a price book is required');
  }
  assertPricingSettings(settings);

  const config = resolveEngineConfig(input.config);
  const matcher = input.matcher ?? firstSystemTypeMatcher;

  // =========================================================================
  // 1. SPECIFICATIONS & SCOPE
  // =========================================================================

  const resolved = resolveSpecifications(input.specifications);
  let measurements = input.measurements;
  let specs = resolved.specs;
  let scopeWarnings: EstimateWarning[] = [];

  if (input.options?.apply_scope_filter) {
    const scoped = applyScopeFilter(measurements, specs);
    measurements = scoped.measurements;
    specs = scoped.specs;
    scopeWarnings = scoped.warnings;
  }

  // =========================================================================
  // 2. MATERIALS, LABOR, BOM
  // =========================================================================

  const materials = calculateMaterials(measurements, specs, priceBook, config, matcher);
  const labor = calculateLabor(materials.line_items, settings.labor_rate_per_hour, config);
  const billOfMaterials = buildBillOfMaterials(materials.takeoff, materials.line_items, config);

  // =========================================================================
  // 3. QUOTE
  // =========================================================================

  return assembleQuote({
    materials,
    labor,
    bill_of_materials: billOfMaterials,
    settings,
    specs,
    measurements,
    warnings: mergeWarnings(resolved.warnings, scopeWarnings, materials.warnings)
  });
}
