/**
 * Insulation Estimate Types
 * Takeoff inputs, engine configuration, and quote outputs
 */

// ============================================================================
// INPUT TYPES
// ============================================================================

export type SystemType = 'duct' | 'pipe' | 'equipment' | 'unknown';

export type SpecSystemType = Exclude<SystemType, 'unknown'>;

export interface MeasurementItem {
  id: string;
  system_type: SystemType;

  /** Duct: "WxH" in inches. Pipe: diameter with optional service label, e.g. 2" CHW */
  size: string;

  /** Linear feet */
  length: number;

  /** Fitting kind (elbow, tee, reducer, valve...) to count */
  fittings: Record<string, number>;

  location?: string;
  elevation_changes?: number;
  notes?: string[];
}

export interface InsulationSpec {
  system_type: SpecSystemType;
  size_range: string;

  /** Inches, expected 0.5 - 6.0 */
  thickness: number;

  material: string;
  facing?: string | null;
  special_requirements: string[];
  location?: string;
}

export type PriceSource = 'explicit' | 'default';

export interface PriceBook {
  name: string;
  prices: Readonly<Record<string, number>>;
  sources: Readonly<Record<string, PriceSource>>;
}

export interface PricingSettings {
  material_markup_pct: number;
  labor_markup_pct: number;
  overhead_profit_pct: number;
  contingency_pct: number;
  labor_adjustment_factor: number;
  labor_rate_per_hour: number;
}

// ============================================================================
// ENGINE CONFIGURATION
// ============================================================================

export interface EngineConfig {
  takeoff: {
    duct_straight_waste: number;
    /** Equivalent LF added per pipe fitting, by fitting kind */
    pipe_fitting_equivalent_lf: Record<string, number>;
  };
  /** LF/hour for insulation, SF/hour for jacketing and mastic */
  production_rates: {
    duct_insulation: number;
    pipe_insulation: number;
    jacketing: number;
    mastic: number;
  };
  /** Hours per fitting */
  fitting_hours: {
    duct: number;
    pipe: number;
  };
  labor_overhead_factor: number;
  coverage: {
    duct_wrap_roll_sf: number;
    adhesive_gallon_lf: number;
    mastic_gallon_sf: number;
    fsk_tape_roll_lf: number;
  };
  /** Unit price used when a spec's material key is missing from the price book */
  fallback_unit_prices: {
    duct: number;
    pipe: number;
  };
  band_spacing_ft: number;
  thickness_range_in: {
    min: number;
    max: number;
  };
}

export type EngineConfigOverrides = {
  [K in keyof EngineConfig]?: EngineConfig[K] extends Record<string, unknown>
    ? Partial<EngineConfig[K]>
    : EngineConfig[K];
};

// ============================================================================
// OUTPUT TYPES
// ============================================================================

export interface EstimateWarning {
  code: string;
  message: string;
  field?: string;
}

export interface CalculationStep {
  formula: string;
  inputs: Record<string, number>;
  result: number;
}

export type LineItemUnit = 'LF' | 'SF' | 'GAL' | 'EA' | 'HR' | 'LS';

export type LineItemCategory =
  | 'insulation'
  | 'jacket'
  | 'mastic'
  | 'accessory'
  | 'labor'
  | 'summary';

export interface MaterialLineItem {
  id: string;
  description: string;
  unit: LineItemUnit;
  quantity: number;
  unit_price: number;
  total_price: number;
  category: LineItemCategory;
  measurement_id?: string;
  system_type?: SystemType;
  size?: string;
  fitting_count?: number;
  price_key?: string;
  pricing_source?: PriceSource | 'fallback';
  calculation?: CalculationStep;
}

/** Derived quantities for one priced measurement, consumed by the BOM */
export interface TakeoffQuantity {
  measurement_id: string;
  system_type: SpecSystemType;
  size: string;
  length_lf: number;
  adjusted_length_lf: number;
  surface_area_sf: number;
  /** Unrounded SF behind the jacket or facing line, 0 when there is none */
  jacket_surface_area_sf: number;
  jacket_label: string | null;
  fitting_count: number;
  material: string;
  thickness: number;
}

export interface MaterialsResult {
  line_items: MaterialLineItem[];
  total_material_cost: number;
  takeoff: TakeoffQuantity[];
  warnings: EstimateWarning[];
}

export interface LaborSummary {
  productive_hours: number;
  fitting_hours: number;
  overhead_factor: number;
  total_hours: number;
  labor_rate_per_hour: number;
  cost: number;
}

export interface BillOfMaterialsItem {
  category: string;
  item: string;
  quantity: number;
  unit: string;
  size?: string;
  basis: string;
}

export interface MarkupBreakdown {
  base_material_cost: number;
  material_with_markup: number;
  total_labor_hours: number;
  adjusted_labor_hours: number;
  labor_cost_base: number;
  labor_with_markup: number;
  subtotal: number;
  overhead_profit_amount: number;
  total_before_contingency: number;
  contingency_amount: number;
  grand_total: number;
}

export interface QuoteResult {
  line_items: MaterialLineItem[];
  bill_of_materials: BillOfMaterialsItem[];
  /** Material cost after material markup */
  material_total: number;
  /** Labor hours after the labor adjustment factor */
  labor_hours: number;
  /** Labor cost after labor markup */
  labor_total: number;
  subtotal: number;
  overhead_profit_amount: number;
  contingency_amount: number;
  grand_total: number;
  breakdown: MarkupBreakdown;
  notes: string[];
  warnings: EstimateWarning[];
}

export interface AlternativeOption {
  base_cost: number;
  upgrade_cost: number;
  difference: number;
}

export interface AlternativeOptions {
  pvc_option?: AlternativeOption;
  premium_insulation?: AlternativeOption;
}
