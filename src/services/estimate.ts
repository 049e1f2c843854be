/**
 * Estimate Service
 * Request body → price book → engine → response, shared by the HTTP routes
 */

import { v4 as uuidv4 } from 'uuid';
import {
  AlternativeOptions,
  EstimateResponse,
  MaterialsResponse,
  PricingSettings,
  QuoteResult,
  ResponseProvenance
} from '../types';
import {
  applyScopeFilter,
  buildBillOfMaterials,
  calculateAlternativeOptions,
  calculateMaterials,
  estimateInsulation,
  EstimateInput,
  mergeWarnings,
  resolveEngineConfig,
  resolveSpecifications
} from '../calculations/insulation';
import { EstimateRequestBody } from '../middleware/validation';
import { toEstimateInput } from '../transformers/request';
import { buildEstimateResponse, buildMaterialsResponse, buildProvenance, DocumentHeader } from '../transformers/quote';
import { getConfig } from '../config';
import { resolvePriceBook, ResolvedPriceBook } from './pricebook';

interface PreparedEstimate {
  input: EstimateInput;
  price_book: ResolvedPriceBook;
  provenance: ResponseProvenance;
}

async function prepare(
  body: EstimateRequestBody,
  defaults: PricingSettings,
  now: Date
): Promise<PreparedEstimate> {
  const priceBook = await resolvePriceBook(body.price_book?.prices, body.price_book?.name);
  return {
    input: toEstimateInput(body, priceBook.price_book, defaults),
    price_book: priceBook,
    provenance: buildProvenance(priceBook.price_book, priceBook.source, now)
  };
}

function alternativesFor(input: EstimateInput): AlternativeOptions {
  const priceBook = input.price_book;
  if (!priceBook) return {};
  let { specs } = resolveSpecifications(input.specifications);
  let measurements = input.measurements;
  if (input.options?.apply_scope_filter) {
    const scoped = applyScopeFilter(measurements, specs);
    measurements = scoped.measurements;
    specs = scoped.specs;
  }
  return calculateAlternativeOptions(
    measurements, specs, priceBook, resolveEngineConfig(input.config), input.matcher
  );
}

export interface EstimateRun {
  response: EstimateResponse;
  quote: QuoteResult;
  header: DocumentHeader;
}

export async function runEstimate(
  body: EstimateRequestBody,
  defaults: PricingSettings = getConfig().pricing_defaults,
  now: Date = new Date()
): Promise<EstimateRun> {
  const prepared = await prepare(body, defaults, now);
  const result = estimateInsulation(prepared.input);
  const quote: QuoteResult = {
    ...result,
    warnings: mergeWarnings(prepared.price_book.warnings, result.warnings)
  };

  const alternatives = body.options?.include_alternatives ? alternativesFor(prepared.input) : undefined;
  const estimateId = uuidv4();

  console.log(`✅ Estimate ${estimateId}: ${quote.line_items.length} line items, grand total $${quote.grand_total.toFixed(2)}`);
  if (quote.warnings.length > 0) {
    console.warn(`⚠️ Estimate ${estimateId}: ${quote.warnings.length} warning(s)`);
  }

  return {
    response: buildEstimateResponse(quote, {
      estimate_id: estimateId,
      project: body.project,
      alternatives,
      provenance: prepared.provenance
    }),
    quote,
    header: {
      project_name: body.project?.name || 'Untitled Project',
      quote_number: estimateId,
      date: now.toISOString().slice(0, 10)
    }
  };
}

export async function runMaterials(
  body: EstimateRequestBody,
  defaults: PricingSettings = getConfig().pricing_defaults,
  now: Date = new Date()
): Promise<MaterialsResponse> {
  const { input, price_book, provenance } = await prepare(body, defaults, now);
  const config = resolveEngineConfig(input.config);
  const resolved = resolveSpecifications(input.specifications);
  const materials = calculateMaterials(input.measurements, resolved.specs, input.price_book, config, input.matcher);
  const billOfMaterials = buildBillOfMaterials(materials.takeoff, materials.line_items, config);

  return buildMaterialsResponse(
    materials,
    billOfMaterials,
    mergeWarnings(price_book.warnings, resolved.warnings, materials.warnings),
    provenance
  );
}

export async function runAlternatives(
  body: EstimateRequestBody,
  defaults: PricingSettings = getConfig().pricing_defaults,
  now: Date = new Date()
): Promise<{ success: true; alternatives: AlternativeOptions; provenance: ResponseProvenance }> {
  const { input, provenance } = await prepare(body, defaults, now);
  return { success: true, alternatives: alternativesFor(input), provenance };
}
