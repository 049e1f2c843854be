/**
 * Transform engine results into API responses and plain-text documents
 */

import {
  AlternativeOptions,
  BillOfMaterialsItem,
  EstimateResponse,
  EstimateWarning,
  ErrorResponse,
  MaterialLineItem,
  MaterialsResponse,
  MaterialsResult,
  PriceBook,
  PriceBookOrigin,
  QuoteResult,
  ResponseProvenance
} from '../types';
import { isEstimationError } from '../errors';

export const API_VERSION = '1.0.0';

const RULE_WIDTH = 80;
const HEAVY_RULE = '='.repeat(RULE_WIDTH);
const LIGHT_RULE = '-'.repeat(RULE_WIDTH);

// ============================================================================
// JSON RESPONSES
// ============================================================================

export function buildProvenance(
  priceBook: PriceBook,
  source: PriceBookOrigin,
  now: Date = new Date()
): ResponseProvenance {
  return {
    version: API_VERSION,
    timestamp: now.toISOString(),
    price_book: priceBook.name,
    price_book_source: source
  };
}

export function buildEstimateResponse(
  quote: QuoteResult,
  context: {
    estimate_id: string;
    project?: EstimateResponse['project'];
    alternatives?: AlternativeOptions;
    provenance: ResponseProvenance;
  }
): EstimateResponse {
  return {
    success: true,
    trade: 'insulation',
    estimate_id: context.estimate_id,
    project: context.project,
    quote,
    alternatives: context.alternatives,
    provenance: context.provenance
  };
}

export function buildMaterialsResponse(
  materials: MaterialsResult,
  billOfMaterials: BillOfMaterialsItem[],
  warnings: EstimateWarning[],
  provenance: ResponseProvenance
): MaterialsResponse {
  return {
    success: true,
    trade: 'insulation',
    line_items: materials.line_items,
    total_material_cost: materials.total_material_cost,
    bill_of_materials: billOfMaterials,
    warnings,
    provenance
  };
}

/**
 * EstimationError keeps its status code and suggestion; anything else is a 500
 */
export function buildErrorResponse(
  error: unknown,
  now: Date = new Date()
): { status: number; body: ErrorResponse } {
  if (isEstimationError(error)) {
    return {
      status: error.statusCode,
      body: {
        success: false,
        error: error.message,
        error_code: error.name,
        suggestion: error.suggestion,
        timestamp: now.toISOString()
      }
    };
  }

  return {
    status: 500,
    body: {
      success: false,
      error: error instanceof Error ? error.message : 'Unknown error occurred',
      timestamp: now.toISOString()
    }
  };
}

// ============================================================================
// TEXT DOCUMENTS
// ============================================================================

function money(amount: number): string {
  return amount.toFixed(2);
}

function totalLine(label: string, amount: number): string {
  return `${label.padStart(68)} $${money(amount).padStart(11)}`;
}

function materialRow(item: MaterialLineItem): string {
  return `${item.description.padEnd(50)} ${item.quantity.toFixed(2).padStart(10)} ${item.unit.padEnd(6)} $${money(item.total_price).padStart(11)}`;
}

function systemSection(title: string, subtotalLabel: string, items: MaterialLineItem[]): string[] {
  if (items.length === 0) return [];
  const subtotal = items.reduce((sum, item) => sum + item.total_price, 0);
  return [
    '',
    title,
    ...items.map(item => `  ${item.description.padEnd(46)} $${money(item.total_price).padStart(11)}`),
    `${subtotalLabel.padStart(50)} $${money(subtotal).padStart(11)}`
  ];
}

export interface DocumentHeader {
  project_name: string;
  quote_number: string;
  /** YYYY-MM-DD */
  date: string;
}

export function renderQuoteText(
  quote: QuoteResult,
  header: DocumentHeader,
  alternatives?: AlternativeOptions
): string {
  const materials = quote.line_items.filter(i => i.category !== 'labor' && i.category !== 'summary');
  const b = quote.breakdown;
  const laborRate = quote.line_items.find(i => i.category === 'labor')?.unit_price ?? 0;
  const lines: string[] = [
    HEAVY_RULE,
    'HVAC INSULATION QUOTE',
    HEAVY_RULE,
    '',
    `Project: ${header.project_name}`,
    `Quote Number: ${header.quote_number}`,
    `Date: ${header.date}`,
    '',
    LIGHT_RULE,
    'MATERIALS',
    LIGHT_RULE,
    `${'Description'.padEnd(50)} ${'Qty'.padStart(10)} ${'Unit'.padEnd(6)} ${'Price'.padStart(12)}`,
    LIGHT_RULE,
    ...materials.map(materialRow),
    '',
    'SYSTEM BREAKDOWN',
    LIGHT_RULE,
    ...systemSection('DUCTWORK SYSTEM', 'Ductwork Subtotal', materials.filter(i => i.system_type !== 'pipe')),
    ...systemSection('PIPING SYSTEM', 'Piping Subtotal', materials.filter(i => i.system_type === 'pipe'))
  ];

  if (alternatives && (alternatives.pvc_option || alternatives.premium_insulation)) {
    lines.push('', 'ALTERNATIVE OPTIONS AND UPGRADES', LIGHT_RULE);
    if (alternatives.pvc_option) {
      const pvc = alternatives.pvc_option;
      lines.push(
        '',
        'PVC JACKETING UPGRADE (PIPING)',
        `  Standard Installation Cost:  $${money(pvc.base_cost)}`,
        `  With PVC Jacketing Cost:     $${money(pvc.upgrade_cost)}`,
        `  Upgrade Difference:          $${money(pvc.difference)}`
      );
    }
    if (alternatives.premium_insulation) {
      const premium = alternatives.premium_insulation;
      lines.push(
        '',
        'PREMIUM INSULATION UPGRADE (DUCTWORK)',
        `  Standard Installation Cost:  $${money(premium.base_cost)}`,
        `  Premium Installation Cost:   $${money(premium.upgrade_cost)}`,
        `  Upgrade Difference:          $${money(premium.difference)}`
      );
    }
  }

  lines.push(
    '',
    HEAVY_RULE,
    'QUOTE SUMMARY',
    LIGHT_RULE,
    totalLine('Material Subtotal', b.base_material_cost),
    totalLine('Material Markup', b.material_with_markup - b.base_material_cost),
    totalLine(`Labor (${b.adjusted_labor_hours} hours @ $${money(laborRate)}/hr)`, b.labor_cost_base),
    totalLine('Labor Markup', b.labor_with_markup - b.labor_cost_base),
    totalLine('Subtotal', b.subtotal),
    totalLine('Overhead & Profit', b.overhead_profit_amount),
    totalLine('Contingency', b.contingency_amount),
    HEAVY_RULE,
    totalLine('TOTAL', b.grand_total),
    HEAVY_RULE,
    '',
    'NOTES:',
    ...quote.notes.map((note, index) => `${index + 1}. ${note}`)
  );

  if (quote.warnings.length > 0) {
    lines.push('', 'WARNINGS:', ...quote.warnings.map(w => `- [${w.code}] ${w.message}`));
  }

  return lines.join('\n') + '\n';
}

/**
 * Distributor order list, grouped by BOM category in first-seen order
 */
export function renderMaterialList(
  billOfMaterials: readonly BillOfMaterialsItem[],
  header: DocumentHeader
): string {
  const lines: string[] = [
    'MATERIAL ORDER LIST',
    HEAVY_RULE,
    '',
    `Project: ${header.project_name}`,
    `Quote: ${header.quote_number}`,
    `Date: ${header.date}`
  ];

  let currentCategory: string | null = null;
  for (const item of billOfMaterials) {
    if (item.category !== currentCategory) {
      currentCategory = item.category;
      lines.push('', currentCategory.toUpperCase(), LIGHT_RULE);
    }
    const description = item.size ? `${item.item} (${item.size})` : item.item;
    lines.push(`${description.padEnd(50)} ${String(item.quantity).padStart(10)} ${item.unit}`);
  }

  return lines.join('\n') + '\n';
}
