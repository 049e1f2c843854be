/**
 * Insulation Calculation Constants
 * Athens, GA market pricing (October 2025) and field production rates
 */

import { EngineConfig, InsulationSpec, PricingSettings } from '../types';

// ============================================================================
// ENGINE DEFAULTS
// ============================================================================

// Rules of thumb, not vendor data. Override per estimate through EngineConfig.
export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  takeoff: {
    duct_straight_waste: 1.10,
    pipe_fitting_equivalent_lf: {
      elbow: 1.5,
      tee: 2.0
    }
  },
  production_rates: {
    duct_insulation: 22.5,
    pipe_insulation: 17.5,
    jacketing: 45,
    mastic: 70
  },
  fitting_hours: {
    duct: 1,
    pipe: 0.6
  },
  labor_overhead_factor: 1.2,
  coverage: {
    duct_wrap_roll_sf: 300,
    adhesive_gallon_lf: 125,
    mastic_gallon_sf: 175,
    fsk_tape_roll_lf: 200
  },
  fallback_unit_prices: {
    duct: 5.00,
    pipe: 4.50
  },
  band_spacing_ft: 1,
  thickness_range_in: {
    min: 0.5,
    max: 6.0
  }
};

// ============================================================================
// PRICE BOOK
// ============================================================================

export const PRICE_KEYS = {
  aluminum_jacket: 'aluminum_jacket',
  pvc_jacket_20mil: 'pvc_jacket_20mil',
  pvc_jacket_30mil: 'pvc_jacket_30mil',
  fsk_facing: 'fsk_facing',
  mastic: 'mastic',
  stainless_bands: 'stainless_bands'
} as const;

/**
 * Built-in unit prices.
 * Insulation $/LF, facings and jacketing $/SF, mastic $/SF, bands $/EA.
 */
export const DEFAULT_PRICES: Readonly<Record<string, number>> = {
  'fiberglass_1.5': 5.00,
  'fiberglass_2.0': 6.13,
  'elastomeric_0.5': 3.25,
  'elastomeric_1.0': 4.50,
  'cellular_glass_1.0': 6.75,
  'mineral_wool_1.5': 5.25,

  fsk_facing: 1.25,
  asj_facing: 1.75,
  aluminum_jacket: 8.50,
  pvc_jacket_20mil: 3.75,
  pvc_jacket_30mil: 4.50,
  stainless_jacket: 12.50,

  mastic: 0.75,
  stainless_bands: 2.50
};

// ============================================================================
// DEFAULT SPECIFICATIONS
// ============================================================================

export const DEFAULT_SPECS: readonly InsulationSpec[] = [
  {
    system_type: 'duct',
    size_range: 'all',
    thickness: 1.5,
    material: 'fiberglass',
    facing: 'FSK',
    special_requirements: [],
    location: 'indoor'
  },
  {
    system_type: 'pipe',
    size_range: 'all',
    thickness: 1.0,
    material: 'elastomeric',
    facing: null,
    special_requirements: [],
    location: 'indoor'
  }
];

// Facings that mean "no facing line"
export const UNFACED_VALUES = ['', 'none', 'unfaced', 'n/a'] as const;

// ============================================================================
// PRICING SETTINGS
// ============================================================================

export const DEFAULT_PRICING_SETTINGS: PricingSettings = {
  material_markup_pct: 15,
  labor_markup_pct: 10,
  overhead_profit_pct: 10,
  contingency_pct: 5,
  labor_adjustment_factor: 1.0,
  labor_rate_per_hour: 70
};

// ============================================================================
// QUOTE NOTES
// ============================================================================

export const STANDARD_QUOTE_NOTES = [
  'Pricing valid for 30 days',
  'Subject to final site verification',
  'Assumes clear access to work areas',
  'All work per project specifications and applicable codes'
] as const;

export const VERTICAL_WORK_NOTE_THRESHOLD = 10;
