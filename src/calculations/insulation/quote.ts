/**
 * Quote Assembly
 * Markup → labor adjustment → O&P → contingency, in that fixed order
 */

import {
  BillOfMaterialsItem,
  EstimateWarning,
  InsulationSpec,
  LaborSummary,
  MarkupBreakdown,
  MaterialLineItem,
  MaterialsResult,
  MeasurementItem,
  PricingSettings,
  QuoteResult
} from '../../types';
import { STANDARD_QUOTE_NOTES, VERTICAL_WORK_NOTE_THRESHOLD } from '../../constants';
import { ConfigurationError } from '../../errors';
import { roundTo } from './geometry';
import { hasRequirement } from './specs';

const SETTING_KEYS: Array<keyof PricingSettings> = [
  'material_markup_pct',
  'labor_markup_pct',
  'overhead_profit_pct',
  'contingency_pct',
  'labor_adjustment_factor',
  'labor_rate_per_hour'
];

/**
 * Settings must be present and every knob a non-negative number.
 * There is no safe default for a missing pricing configuration.
 */
export function assertPricingSettings(
  settings: PricingSettings | null | undefined
): asserts settings is PricingSettings {
  if (!settings) {
    throw new ConfigurationError('settings', 'pricing settings are required');
  }
  for (const key of SETTING_KEYS) {
    const value = settings[key];
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      throw new ConfigurationError(key, `must be a non-negative number, got ${String(value)}`);
    }
  }
}

/**
 * The nine pricing steps, unrounded. Contingency is taken on the
 * post-O&P amount, never on the raw subtotal.
 */
export function applyMarkupPipeline(
  baseMaterialCost: number,
  totalLaborHours: number,
  settings: PricingSettings
): MarkupBreakdown {
  assertPricingSettings(settings);

  const material_with_markup = baseMaterialCost * (1 + settings.material_markup_pct / 100);
  const adjusted_labor_hours = totalLaborHours * settings.labor_adjustment_factor;
  const labor_cost_base = adjusted_labor_hours * settings.labor_rate_per_hour;
  const labor_with_markup = labor_cost_base * (1 + settings.labor_markup_pct / 100);
  const subtotal = material_with_markup + labor_with_markup;
  const overhead_profit_amount = subtotal * (settings.overhead_profit_pct / 100);
  const total_before_contingency = subtotal + overhead_profit_amount;
  const contingency_amount = total_before_contingency * (settings.contingency_pct / 100);
  const grand_total = total_before_contingency + contingency_amount;

  return {
    base_material_cost: baseMaterialCost,
    material_with_markup,
    total_labor_hours: totalLaborHours,
    adjusted_labor_hours,
    labor_cost_base,
    labor_with_markup,
    subtotal,
    overhead_profit_amount,
    total_before_contingency,
    contingency_amount,
    grand_total
  };
}

export function roundBreakdown(breakdown: MarkupBreakdown): MarkupBreakdown {
  return {
    base_material_cost: roundTo(breakdown.base_material_cost),
    material_with_markup: roundTo(breakdown.material_with_markup),
    total_labor_hours: roundTo(breakdown.total_labor_hours),
    adjusted_labor_hours: roundTo(breakdown.adjusted_labor_hours),
    labor_cost_base: roundTo(breakdown.labor_cost_base),
    labor_with_markup: roundTo(breakdown.labor_with_markup),
    subtotal: roundTo(breakdown.subtotal),
    overhead_profit_amount: roundTo(breakdown.overhead_profit_amount),
    total_before_contingency: roundTo(breakdown.total_before_contingency),
    contingency_amount: roundTo(breakdown.contingency_amount),
    grand_total: roundTo(breakdown.grand_total)
  };
}

function summaryLine(id: string, description: string, amount: number): MaterialLineItem {
  const total = roundTo(amount);
  return {
    id: `summary:${id}`,
    description,
    unit: 'LS',
    quantity: 1,
    unit_price: total,
    total_price: total,
    category: 'summary'
  };
}

/**
 * Labor line plus one summary line per markup step
 */
export function buildSummaryLines(
  breakdown: MarkupBreakdown,
  settings: PricingSettings
): MaterialLineItem[] {
  const hours = roundTo(breakdown.adjusted_labor_hours);

  return [
    {
      id: 'labor:installation',
      description: `Installation Labor (${hours} hrs @ $${settings.labor_rate_per_hour.toFixed(2)}/hr)`,
      unit: 'HR',
      quantity: hours,
      unit_price: settings.labor_rate_per_hour,
      total_price: roundTo(breakdown.labor_cost_base),
      category: 'labor',
      calculation: {
        formula: 'total_labor_hours × labor_adjustment_factor × labor_rate_per_hour',
        inputs: {
          total_labor_hours: roundTo(breakdown.total_labor_hours),
          labor_adjustment_factor: settings.labor_adjustment_factor,
          labor_rate_per_hour: settings.labor_rate_per_hour
        },
        result: roundTo(breakdown.labor_cost_base)
      }
    },
    summaryLine('material-markup', `Material Markup (${settings.material_markup_pct}%)`,
      breakdown.material_with_markup - breakdown.base_material_cost),
    summaryLine('labor-markup', `Labor Markup (${settings.labor_markup_pct}%)`,
      breakdown.labor_with_markup - breakdown.labor_cost_base),
    summaryLine('overhead-profit', `Overhead & Profit (${settings.overhead_profit_pct}%)`,
      breakdown.overhead_profit_amount),
    summaryLine('contingency', `Contingency (${settings.contingency_pct}%)`,
      breakdown.contingency_amount)
  ];
}

export function generateQuoteNotes(
  specs: readonly InsulationSpec[],
  measurements: readonly MeasurementItem[]
): string[] {
  const notes: string[] = [];

  if (specs.some(s => (s.location || '').toLowerCase().includes('outdoor'))) {
    notes.push('Weather protection jacketing included for outdoor applications');
  }

  if (specs.some(s => hasRequirement(s, 'mastic_coating'))) {
    notes.push('Vapor seal mastic coating per specifications');
  }

  const verticalWork = measurements.reduce((total, m) => total + (m.elevation_changes || 0), 0);
  if (verticalWork > VERTICAL_WORK_NOTE_THRESHOLD) {
    notes.push(`Significant vertical work: ${verticalWork} elevation changes`);
  }

  notes.push(...STANDARD_QUOTE_NOTES);
  return notes;
}

export interface QuoteInputs {
  materials: MaterialsResult;
  labor: LaborSummary;
  bill_of_materials: BillOfMaterialsItem[];
  settings: PricingSettings;
  specs: readonly InsulationSpec[];
  measurements: readonly MeasurementItem[];
  warnings: EstimateWarning[];
}

export function assembleQuote(inputs: QuoteInputs): QuoteResult {
  const { materials, labor, settings } = inputs;
  const breakdown = roundBreakdown(
    applyMarkupPipeline(materials.total_material_cost, labor.total_hours, settings)
  );

  return {
    line_items: [...materials.line_items, ...buildSummaryLines(breakdown, settings)],
    bill_of_materials: inputs.bill_of_materials,
    material_total: breakdown.material_with_markup,
    labor_hours: breakdown.adjusted_labor_hours,
    labor_total: breakdown.labor_with_markup,
    subtotal: breakdown.subtotal,
    overhead_profit_amount: breakdown.overhead_profit_amount,
    contingency_amount: breakdown.contingency_amount,
    grand_total: breakdown.grand_total,
    breakdown,
    notes: generateQuoteNotes(inputs.specs, inputs.measurements),
    warnings: inputs.warnings
  };
}
