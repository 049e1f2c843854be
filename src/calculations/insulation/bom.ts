/**
 * Bill of Materials
 * Continuous takeoff quantities → purchasable units, always rounded up.
 * Equipment is wrapped with duct wrap, so its SF and LF count toward the
 * duct wrap, adhesive, tape and mastic totals.
 */

import {
  BillOfMaterialsItem,
  EngineConfig,
  MaterialLineItem,
  TakeoffQuantity
} from '../../types';
import { DEFAULT_ENGINE_CONFIG, PRICE_KEYS } from '../../constants';
import { formatThickness, roundTo, titleCase } from './geometry';

/**
 * Formula: ceil(quantity / coverage)
 * A ratio within 1e-9 (relative) of a whole number counts as that number,
 * so float noise on an exact multiple never orders an extra unit.
 */
export function purchaseUnits(quantity: number, coverage: number): number {
  if (!(quantity > 0) || !(coverage > 0)) return 0;
  const ratio = quantity / coverage;
  const whole = Math.round(ratio);
  if (whole > 0 && Math.abs(ratio - whole) <= whole * 1e-9) return whole;
  return Math.ceil(ratio);
}

export function insulationLabel(material: string, thickness: number): string {
  return `${formatThickness(thickness)}" ${titleCase(material)}`;
}

function sum(values: number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

export interface BillOfMaterialsTotals {
  duct_surface_area_sf: number;
  /** Measured LF, before the straight-run waste factor */
  duct_length_lf: number;
}

export function summarizeDuctTakeoff(takeoff: readonly TakeoffQuantity[]): BillOfMaterialsTotals {
  const duct = takeoff.filter(t => t.system_type !== 'pipe');
  return {
    duct_surface_area_sf: sum(duct.map(t => t.surface_area_sf)),
    duct_length_lf: sum(duct.map(t => t.length_lf))
  };
}

export function buildBillOfMaterials(
  takeoff: readonly TakeoffQuantity[],
  lineItems: readonly MaterialLineItem[],
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): BillOfMaterialsItem[] {
  const bom: BillOfMaterialsItem[] = [];
  const coverage = config.coverage;
  const totals = summarizeDuctTakeoff(takeoff);

  // =========================================================================
  // 1. DUCT WRAP
  // =========================================================================

  const ductLabels = [...new Set(
    takeoff.filter(t => t.system_type !== 'pipe').map(t => insulationLabel(t.material, t.thickness))
  )];
  const wrapRolls = purchaseUnits(totals.duct_surface_area_sf, coverage.duct_wrap_roll_sf);
  if (wrapRolls > 0) {
    bom.push({
      category: 'Duct Insulation',
      item: ductLabels.length === 1
        ? `${ductLabels[0]} Duct Wrap`
        : `Duct Wrap (${ductLabels.join(', ')})`,
      quantity: wrapRolls,
      unit: 'rolls',
      basis: `${roundTo(totals.duct_surface_area_sf)} SF ÷ ${coverage.duct_wrap_roll_sf} SF/roll`
    });
  }

  // =========================================================================
  // 2. PIPE INSULATION - by material + wall thickness, then size
  // =========================================================================

  const pipeGroups = new Map<string, Map<string, number>>();
  for (const t of takeoff) {
    if (t.system_type !== 'pipe') continue;
    const label = `${insulationLabel(t.material, t.thickness)} Pipe Insulation`;
    const sizes = pipeGroups.get(label) ?? new Map<string, number>();
    sizes.set(t.size, (sizes.get(t.size) ?? 0) + t.adjusted_length_lf);
    pipeGroups.set(label, sizes);
  }

  for (const [label, sizes] of pipeGroups) {
    for (const [size, lf] of sizes) {
      const quantity = purchaseUnits(lf, 1);
      if (quantity === 0) continue;
      bom.push({
        category: 'Pipe Insulation',
        item: label,
        size,
        quantity,
        unit: 'LF',
        basis: `${roundTo(lf)} LF incl. fitting equivalents`
      });
    }
  }

  // =========================================================================
  // 3. JACKETING & FACING
  // =========================================================================

  const jackets = new Map<string, number>();
  for (const t of takeoff) {
    if (!t.jacket_label || !(t.jacket_surface_area_sf > 0)) continue;
    jackets.set(t.jacket_label, (jackets.get(t.jacket_label) ?? 0) + t.jacket_surface_area_sf);
  }
  for (const [label, sf] of jackets) {
    bom.push({
      category: 'Jacketing',
      item: label,
      quantity: purchaseUnits(sf, 1),
      unit: 'SF',
      basis: `${roundTo(sf)} SF`
    });
  }

  // =========================================================================
  // 4. ACCESSORIES
  // =========================================================================

  const adhesiveGallons = purchaseUnits(totals.duct_length_lf, coverage.adhesive_gallon_lf);
  if (adhesiveGallons > 0) {
    bom.push({
      category: 'Accessories',
      item: 'Duct Insulation Adhesive',
      quantity: adhesiveGallons,
      unit: 'gallons',
      basis: `${roundTo(totals.duct_length_lf)} LF ÷ ${coverage.adhesive_gallon_lf} LF/gal`
    });
  }

  const tapeRolls = purchaseUnits(totals.duct_length_lf, coverage.fsk_tape_roll_lf);
  if (tapeRolls > 0) {
    bom.push({
      category: 'Accessories',
      item: 'FSK Tape',
      quantity: tapeRolls,
      unit: 'rolls',
      basis: `${roundTo(totals.duct_length_lf)} LF ÷ ${coverage.fsk_tape_roll_lf} LF/roll`
    });
  }

  const masticGallons = purchaseUnits(totals.duct_surface_area_sf, coverage.mastic_gallon_sf);
  if (masticGallons > 0) {
    bom.push({
      category: 'Accessories',
      item: 'Vapor Barrier Mastic',
      quantity: masticGallons,
      unit: 'gallons',
      basis: `${roundTo(totals.duct_surface_area_sf)} SF ÷ ${coverage.mastic_gallon_sf} SF/gal`
    });
  }

  const bands = sum(lineItems.filter(i => i.category === 'accessory' && i.price_key === PRICE_KEYS.stainless_bands).map(i => i.quantity));
  if (bands > 0) {
    bom.push({
      category: 'Accessories',
      item: 'Stainless Steel Bands',
      quantity: bands,
      unit: 'EA',
      basis: `one per ${config.band_spacing_ft} ft plus one per run`
    });
  }

  return bom;
}
