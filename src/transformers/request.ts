/**
 * Transform validated request bodies into engine inputs
 */

import { v4 as uuidv4 } from 'uuid';
import {
  InsulationSpec,
  MeasurementItem,
  PriceBook,
  PricingSettings,
  SystemType
} from '../types';
import { SPEC_MATCHERS, firstSystemTypeMatcher, EstimateInput } from '../calculations/insulation';
import { EstimateRequestBody, MeasurementInput, SpecificationInput } from '../middleware/validation';

const SYSTEM_TYPE_ALIASES: Record<string, SystemType> = {
  duct: 'duct',
  ductwork: 'duct',
  pipe: 'pipe',
  piping: 'pipe',
  equipment: 'equipment'
};

export function normalizeSystemType(value: string): SystemType {
  return SYSTEM_TYPE_ALIASES[value.trim().toLowerCase()] ?? 'unknown';
}

/**
 * `id` or `item_id`, whichever is present; rows without either get a uuid
 */
export function toMeasurementItem(input: MeasurementInput): MeasurementItem {
  const id = input.id ?? input.item_id;
  return {
    id: id !== undefined && String(id).trim() !== '' ? String(id) : uuidv4(),
    system_type: normalizeSystemType(input.system_type),
    size: input.size,
    length: input.length,
    fittings: { ...input.fittings },
    location: input.location,
    elevation_changes: input.elevation_changes,
    notes: input.notes
  };
}

export function toInsulationSpec(input: SpecificationInput): InsulationSpec {
  return {
    system_type: input.system_type,
    size_range: input.size_range,
    thickness: input.thickness,
    material: input.material,
    facing: input.facing,
    special_requirements: [...input.special_requirements],
    location: input.location
  };
}

/**
 * Request settings override the service defaults key by key
 */
export function mergePricingSettings(
  defaults: PricingSettings,
  overrides?: Partial<PricingSettings>
): PricingSettings {
  return { ...defaults, ...overrides };
}

export function toEstimateInput(
  body: EstimateRequestBody,
  priceBook: PriceBook,
  defaultSettings: PricingSettings
): EstimateInput {
  const matcherName = body.options?.spec_matcher;

  return {
    measurements: body.measurements.map(toMeasurementItem),
    specifications: body.specifications ? body.specifications.map(toInsulationSpec) : null,
    price_book: priceBook,
    settings: mergePricingSettings(defaultSettings, body.settings),
    config: body.config,
    matcher: matcherName ? SPEC_MATCHERS[matcherName] : firstSystemTypeMatcher,
    options: { apply_scope_filter: body.options?.apply_scope_filter ?? false }
  };
}
