/**
 * Alternative Options
 * Material-only cost of PVC-jacketed pipe and mineral wool duct against the specified systems
 */

import {
  AlternativeOption,
  AlternativeOptions,
  EngineConfig,
  InsulationSpec,
  MeasurementItem,
  PriceBook
} from '../../types';
import { DEFAULT_ENGINE_CONFIG, PRICE_KEYS } from '../../constants';
import { calculateMaterials } from './materials';
import { roundTo } from './geometry';
import { firstSystemTypeMatcher, SpecMatcher } from './specs';

export const PREMIUM_DUCT_MATERIAL = 'mineral_wool';

function compare(baseCost: number, upgradeCost: number): AlternativeOption {
  return {
    base_cost: roundTo(baseCost),
    upgrade_cost: roundTo(upgradeCost),
    difference: roundTo(upgradeCost - baseCost)
  };
}

export function calculateAlternativeOptions(
  measurements: readonly MeasurementItem[],
  specs: readonly InsulationSpec[],
  priceBook: PriceBook,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG,
  matcher: SpecMatcher = firstSystemTypeMatcher
): AlternativeOptions {
  const alternatives: AlternativeOptions = {};
  const materialCost = (items: readonly MeasurementItem[], variant: readonly InsulationSpec[]) =>
    calculateMaterials(items, variant, priceBook, config, matcher).total_material_cost;

  // =========================================================================
  // PVC JACKETING (pipe)
  // =========================================================================

  const pipe = measurements.filter(m => m.system_type === 'pipe');
  if (pipe.length > 0) {
    const pvcSpecs = specs.map(spec => spec.system_type === 'pipe'
      ? { ...spec, facing: 'PVC', special_requirements: [PRICE_KEYS.pvc_jacket_20mil] }
      : spec);
    alternatives.pvc_option = compare(materialCost(pipe, specs), materialCost(pipe, pvcSpecs));
  }

  // =========================================================================
  // PREMIUM INSULATION (duct)
  // =========================================================================

  const duct = measurements.filter(m => m.system_type === 'duct');
  if (duct.length > 0) {
    const premiumSpecs = specs.map(spec => spec.system_type === 'duct'
      ? { ...spec, material: PREMIUM_DUCT_MATERIAL }
      : spec);
    alternatives.premium_insulation = compare(materialCost(duct, specs), materialCost(duct, premiumSpecs));
  }

  return alternatives;
}
