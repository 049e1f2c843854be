/**
 * Insulation Material Calculations
 * Measurements + specs + price book → priced material line items
 */

import {
  EngineConfig,
  EstimateWarning,
  InsulationSpec,
  MaterialLineItem,
  MaterialsResult,
  MeasurementItem,
  PriceBook,
  PriceSource,
  SpecSystemType,
  TakeoffQuantity
} from '../../types';
import { DEFAULT_ENGINE_CONFIG, DEFAULT_PRICES, PRICE_KEYS, UNFACED_VALUES } from '../../constants';
import { ConfigurationError } from '../../errors';
import {
  ductSurfaceArea,
  fittingEquivalentLength,
  formatThickness,
  normalizeFittingKind,
  parseDuctDimensions,
  parseSizeToDiameterInches,
  pipeSurfaceArea,
  priceKeyFor,
  roundTo,
  titleCase
} from './geometry';
import { firstSystemTypeMatcher, hasRequirement, SpecMatcher } from './specs';
import { addWarning } from './config';

interface ResolvedPrice {
  unit_price: number;
  pricing_source: PriceSource | 'fallback';
}

interface JacketSelection {
  price_key: string;
  fallback_price: number;
  label: string;
}

// ============================================================================
// PRICE LOOKUP
// ============================================================================

/**
 * Unit price for a key. Never fails: a missing key resolves to the
 * fallback price and records a warning, as does a built-in default price.
 */
export function resolveUnitPrice(
  priceBook: PriceBook,
  key: string,
  fallbackPrice: number,
  warnings: EstimateWarning[]
): ResolvedPrice {
  const hasKey = Object.prototype.hasOwnProperty.call(priceBook.prices, key);
  const price = hasKey ? priceBook.prices[key] : undefined;

  if (price !== undefined && Number.isFinite(price) && price >= 0) {
    const source = priceBook.sources[key] ?? 'explicit';
    if (source === 'default') {
      addWarning(warnings, {
        code: 'DEFAULT_PRICE_USED',
        message: `Price for '${key}' comes from the built-in defaults ($${price.toFixed(2)}), not the supplied price book`,
        field: `price_book.${key}`
      });
    }
    return { unit_price: price, pricing_source: source };
  }

  addWarning(warnings, {
    code: 'PRICE_KEY_MISSING',
    message: `No price for '${key}' in price book '${priceBook.name}'; using fallback $${fallbackPrice.toFixed(2)}`,
    field: `price_book.${key}`
  });
  return { unit_price: fallbackPrice, pricing_source: 'fallback' };
}

// ============================================================================
// ROW SANITATION
// ============================================================================

function sanitizeLength(measurement: MeasurementItem, warnings: EstimateWarning[]): number {
  const length = measurement.length;
  if (!Number.isFinite(length)) {
    addWarning(warnings, {
      code: 'INVALID_LENGTH',
      message: `${measurement.id}: length is not a number; counted as 0 LF`,
      field: `measurements.${measurement.id}.length`
    });
    return 0;
  }
  if (length < 0) {
    addWarning(warnings, {
      code: 'NEGATIVE_LENGTH',
      message: `${measurement.id}: negative length ${length} LF clamped to 0`,
      field: `measurements.${measurement.id}.length`
    });
    return 0;
  }
  return length;
}

/**
 * Fitting counts with negatives and non-numbers clamped to 0
 */
function sanitizeFittings(
  measurement: MeasurementItem,
  warnings: EstimateWarning[]
): Record<string, number> {
  const fittings: Record<string, number> = {};
  for (const [kind, count] of Object.entries(measurement.fittings || {})) {
    if (!Number.isFinite(count) || count < 0) {
      addWarning(warnings, {
        code: 'INVALID_FITTING_COUNT',
        message: `${measurement.id}: ${kind} count ${count} clamped to 0`,
        field: `measurements.${measurement.id}.fittings.${kind}`
      });
      fittings[kind] = 0;
      continue;
    }
    fittings[kind] = count;
  }
  return fittings;
}

function totalFittings(fittings: Record<string, number>): number {
  return Object.values(fittings).reduce((sum, count) => sum + count, 0);
}

// ============================================================================
// LINE ITEM BUILDERS
// ============================================================================

/**
 * Formula: duct/equipment length × duct_straight_waste;
 * pipe length + Σ(fitting count × equivalent LF)
 */
export function adjustedLengthFor(
  systemType: SpecSystemType,
  length: number,
  fittings: Record<string, number>,
  config: EngineConfig
): number {
  if (systemType === 'pipe') {
    return length + fittingEquivalentLength(fittings, config.takeoff.pipe_fitting_equivalent_lf);
  }
  return length * config.takeoff.duct_straight_waste;
}

function selectJacket(spec: InsulationSpec): JacketSelection | null {
  const facing = (spec.facing || '').trim();
  const facingKey = facing.toLowerCase();

  if (hasRequirement(spec, PRICE_KEYS.aluminum_jacket) || facingKey === 'aluminum') {
    return {
      price_key: PRICE_KEYS.aluminum_jacket,
      fallback_price: DEFAULT_PRICES[PRICE_KEYS.aluminum_jacket],
      label: 'Aluminum Jacketing'
    };
  }
  if (hasRequirement(spec, PRICE_KEYS.pvc_jacket_30mil)) {
    return {
      price_key: PRICE_KEYS.pvc_jacket_30mil,
      fallback_price: DEFAULT_PRICES[PRICE_KEYS.pvc_jacket_30mil],
      label: 'PVC Jacketing 30 mil'
    };
  }
  if (hasRequirement(spec, PRICE_KEYS.pvc_jacket_20mil) || facingKey === 'pvc') {
    return {
      price_key: PRICE_KEYS.pvc_jacket_20mil,
      fallback_price: DEFAULT_PRICES[PRICE_KEYS.pvc_jacket_20mil],
      label: 'PVC Jacketing 20 mil'
    };
  }

  const unfaced: readonly string[] = UNFACED_VALUES;
  if (unfaced.includes(facingKey)) return null;

  const key = `${facingKey.replace(/[\s-]+/g, '_')}_facing`;
  return {
    price_key: key,
    fallback_price: DEFAULT_PRICES[key] ?? DEFAULT_PRICES[PRICE_KEYS.fsk_facing],
    label: `${facing} Facing`
  };
}

function surfaceLineItem(
  measurement: MeasurementItem,
  kind: 'jacket' | 'mastic',
  description: string,
  priceKey: string,
  price: ResolvedPrice,
  surfaceArea: number,
  fittingCount: number,
  systemType: SpecSystemType
): MaterialLineItem {
  const quantity = roundTo(surfaceArea);
  return {
    id: `${measurement.id}:${kind}`,
    description,
    unit: 'SF',
    quantity,
    unit_price: price.unit_price,
    total_price: roundTo(surfaceArea * price.unit_price),
    category: kind,
    measurement_id: measurement.id,
    system_type: systemType,
    size: measurement.size,
    fitting_count: fittingCount,
    price_key: priceKey,
    pricing_source: price.pricing_source,
    calculation: {
      formula: 'surface_area_sf × unit_price',
      inputs: { surface_area_sf: quantity, unit_price: price.unit_price },
      result: roundTo(surfaceArea * price.unit_price)
    }
  };
}

// ============================================================================
// MAIN CALCULATION
// ============================================================================

/**
 * Price every measurement against its applicable spec.
 * Row-level problems skip or zero the row and add a warning; only a
 * missing price book throws.
 */
export function calculateMaterials(
  measurements: readonly MeasurementItem[],
  specs: readonly InsulationSpec[],
  priceBook: PriceBook | null | undefined,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG,
  matcher: SpecMatcher = firstSystemTypeMatcher
): MaterialsResult {
  if (!priceBook || !priceBook.prices) {
    throw new ConfigurationError('price_book', 'a price book is required to price materials');
  }

  const warnings: EstimateWarning[] = [];
  const lineItems: MaterialLineItem[] = [];
  const takeoff: TakeoffQuantity[] = [];

  for (const measurement of measurements) {
    const spec = matcher.findApplicableSpec(measurement, specs);
    if (!spec) {
      addWarning(warnings, {
        code: 'NO_MATCHING_SPEC',
        message: `${measurement.id}: no ${measurement.system_type} specification applies; item skipped`,
        field: `measurements.${measurement.id}.system_type`
      });
      continue;
    }

    if (!Number.isFinite(spec.thickness) || spec.thickness <= 0) {
      addWarning(warnings, {
        code: 'INVALID_THICKNESS',
        message: `${measurement.id}: ${spec.material} spec has thickness ${spec.thickness}"; item skipped`,
        field: `specifications.${spec.system_type}.thickness`
      });
      continue;
    }

    const { min, max } = config.thickness_range_in;
    if (spec.thickness < min || spec.thickness > max) {
      addWarning(warnings, {
        code: 'THICKNESS_OUT_OF_RANGE',
        message: `${spec.material} ${spec.system_type} spec thickness ${spec.thickness}" is outside ${min}-${max}"`,
        field: `specifications.${spec.system_type}.thickness`
      });
    }

    const systemType = spec.system_type;
    const length = sanitizeLength(measurement, warnings);
    const fittings = sanitizeFittings(measurement, warnings);
    const fittingCount = totalFittings(fittings);

    if (systemType === 'pipe') {
      for (const kind of Object.keys(fittings)) {
        if (config.takeoff.pipe_fitting_equivalent_lf[normalizeFittingKind(kind)] === undefined) {
          addWarning(warnings, {
            code: 'UNKNOWN_FITTING_KIND',
            message: `${measurement.id}: fitting kind '${kind}' has no equivalent length; adds 0 LF`,
            field: `measurements.${measurement.id}.fittings.${kind}`
          });
        }
      }
    }

    // ------------------------------------------------------------------
    // Insulation (LF)
    // ------------------------------------------------------------------

    const adjustedLength = adjustedLengthFor(systemType, length, fittings, config);
    const priceKey = priceKeyFor(spec.material, spec.thickness);
    const fallbackPrice = systemType === 'pipe'
      ? config.fallback_unit_prices.pipe
      : config.fallback_unit_prices.duct;
    const insulationPrice = resolveUnitPrice(priceBook, priceKey, fallbackPrice, warnings);
    const materialCost = adjustedLength * insulationPrice.unit_price;

    lineItems.push({
      id: `${measurement.id}:insulation`,
      description: `${titleCase(spec.material)} Insulation ${formatThickness(spec.thickness)}" - ${measurement.size}`,
      unit: 'LF',
      quantity: roundTo(adjustedLength),
      unit_price: insulationPrice.unit_price,
      total_price: roundTo(materialCost),
      category: 'insulation',
      measurement_id: measurement.id,
      system_type: systemType,
      size: measurement.size,
      fitting_count: fittingCount,
      price_key: priceKey,
      pricing_source: insulationPrice.pricing_source,
      calculation: systemType === 'pipe'
        ? {
            formula: '(length + Σ fitting_count × equivalent_lf) × unit_price',
            inputs: { length, fitting_equivalent_lf: adjustedLength - length, unit_price: insulationPrice.unit_price },
            result: roundTo(materialCost)
          }
        : {
            formula: 'length × duct_straight_waste × unit_price',
            inputs: { length, duct_straight_waste: config.takeoff.duct_straight_waste, unit_price: insulationPrice.unit_price },
            result: roundTo(materialCost)
          }
    });

    // ------------------------------------------------------------------
    // Surface area (duct always, for the BOM; pipe only when needed)
    // ------------------------------------------------------------------

    const jacket = selectJacket(spec);
    const needsMastic = hasRequirement(spec, 'mastic_coating');
    let surfaceArea = 0;

    if (systemType === 'pipe') {
      if (jacket || needsMastic) {
        const diameter = parseSizeToDiameterInches(measurement.size);
        if (diameter === null) {
          addWarning(warnings, {
            code: 'UNPARSABLE_PIPE_SIZE',
            message: `${measurement.id}: pipe size '${measurement.size}' has no diameter; jacketing and mastic skipped`,
            field: `measurements.${measurement.id}.size`
          });
        } else {
          surfaceArea = pipeSurfaceArea(diameter, length);
        }
      }
    } else if (parseDuctDimensions(measurement.size) === null) {
      addWarning(warnings, {
        code: 'UNPARSABLE_DUCT_SIZE',
        message: `${measurement.id}: ${systemType} size '${measurement.size}' is not WxH; surface area counted as 0 SF`,
        field: `measurements.${measurement.id}.size`
      });
    } else {
      surfaceArea = ductSurfaceArea(measurement.size, length);
    }

    // ------------------------------------------------------------------
    // Facing / jacketing (SF)
    // ------------------------------------------------------------------

    if (jacket && surfaceArea > 0) {
      const price = resolveUnitPrice(priceBook, jacket.price_key, jacket.fallback_price, warnings);
      lineItems.push(surfaceLineItem(
        measurement, 'jacket', `${jacket.label} - ${measurement.size}`,
        jacket.price_key, price, surfaceArea, fittingCount, systemType
      ));
    }

    // ------------------------------------------------------------------
    // Mastic (SF)
    // ------------------------------------------------------------------

    if (needsMastic && surfaceArea > 0) {
      const price = resolveUnitPrice(priceBook, PRICE_KEYS.mastic, DEFAULT_PRICES[PRICE_KEYS.mastic], warnings);
      lineItems.push(surfaceLineItem(
        measurement, 'mastic', `Mastic Vapor Seal Coating - ${measurement.size}`,
        PRICE_KEYS.mastic, price, surfaceArea, fittingCount, systemType
      ));
    }

    // ------------------------------------------------------------------
    // Stainless bands (EA), one per band spacing plus one
    // ------------------------------------------------------------------

    if (hasRequirement(spec, PRICE_KEYS.stainless_bands) && length > 0) {
      const bandCount = Math.floor(length / config.band_spacing_ft) + 1;
      const price = resolveUnitPrice(
        priceBook, PRICE_KEYS.stainless_bands, DEFAULT_PRICES[PRICE_KEYS.stainless_bands], warnings
      );
      lineItems.push({
        id: `${measurement.id}:bands`,
        description: `Stainless Steel Bands - ${measurement.size}`,
        unit: 'EA',
        quantity: bandCount,
        unit_price: price.unit_price,
        total_price: roundTo(bandCount * price.unit_price),
        category: 'accessory',
        measurement_id: measurement.id,
        system_type: systemType,
        size: measurement.size,
        fitting_count: fittingCount,
        price_key: PRICE_KEYS.stainless_bands,
        pricing_source: price.pricing_source,
        calculation: {
          formula: 'floor(length / band_spacing_ft) + 1',
          inputs: { length, band_spacing_ft: config.band_spacing_ft },
          result: bandCount
        }
      });
    }

    takeoff.push({
      measurement_id: measurement.id,
      system_type: systemType,
      size: measurement.size,
      length_lf: length,
      adjusted_length_lf: adjustedLength,
      surface_area_sf: surfaceArea,
      jacket_surface_area_sf: jacket && surfaceArea > 0 ? surfaceArea : 0,
      jacket_label: jacket && surfaceArea > 0 ? jacket.label : null,
      fitting_count: fittingCount,
      material: spec.material,
      thickness: spec.thickness
    });
  }

  const totalMaterialCost = roundTo(lineItems.reduce((sum, item) => sum + item.total_price, 0));

  return {
    line_items: lineItems,
    total_material_cost: totalMaterialCost,
    takeoff,
    warnings
  };
}
