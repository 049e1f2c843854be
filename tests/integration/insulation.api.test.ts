/**
 * Integration tests for the estimate service behind the API routes
 */

import { runAlternatives, runEstimate, runMaterials } from '../../src/services/estimate';
import { estimateRequestSchema, EstimateRequestBody } from '../../src/middleware/validation';
import { clearPriceBookCache } from '../../src/services/pricebook';
import { DEFAULT_PRICING_SETTINGS } from '../../src/constants';

const mockIsConfigured = jest.fn<boolean, []>();

jest.mock('../../src/services/database', () => ({
  PRICE_BOOK_TABLE: 'insulation_price_book',
  isDatabaseConfigured: () => mockIsConfigured(),
  getSupabaseClient: () => {
    throw new Error('no database in tests');
  }
}));

jest.mock('../../src/config', () => ({
  getConfig: () => ({ supabase: {}, price_book_path: undefined })
}));

const NOW = new Date('2026-03-02T09:30:00.000Z');

function request(overrides: Record<string, unknown> = {}): EstimateRequestBody {
  return estimateRequestSchema.parse({
    project: { name: 'Clinic Renovation' },
    measurements: [
      { id: 'd1', system_type: 'ductwork', size: '24x20', length: 180 },
      { id: 'p1', system_type: 'piping', size: '2"', length: 100 }
    ],
    specifications: [
      { system_type: 'duct', thickness: 1.5, material: 'fiberglass', facing: 'none' },
      { system_type: 'pipe', thickness: 1.0, material: 'elastomeric' }
    ],
    price_book: {
      name: 'Distributor Q3',
      prices: {
        'fiberglass_1.5': 2.52,
        'elastomeric_1.0': 4.5,
        'mineral_wool_1.5': 5.25,
        pvc_jacket_20mil: 3.75
      }
    },
    ...overrides
  });
}

beforeEach(() => {
  clearPriceBookCache();
  mockIsConfigured.mockReset();
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('Insulation API Integration', () => {

  describe('runEstimate', () => {
    it('prices duct and pipe with the request price book', async () => {
      const { response, header } = await runEstimate(request(), DEFAULT_PRICING_SETTINGS, NOW);

      expect(response.success).toBe(true);
      expect(response.trade).toBe('insulation');
      expect(response.provenance).toEqual({
        version: '1.0.0',
        timestamp: '2026-03-02T09:30:00.000Z',
        price_book: 'Distributor Q3',
        price_book_source: 'request'
      });
      expect(response.quote.line_items.map(i => i.id)).toEqual([
        'd1:insulation',
        'p1:insulation',
        'labor:installation',
        'summary:material-markup',
        'summary:labor-markup',
        'summary:overhead-profit',
        'summary:contingency'
      ]);
      // 498.96 + 100 LF × $4.50
      expect(response.quote.breakdown.base_material_cost).toBe(948.96);
      expect(response.quote.warnings).toEqual([]);
      expect(header).toEqual({
        project_name: 'Clinic Renovation',
        quote_number: response.estimate_id,
        date: '2026-03-02'
      });
    });

    it('adds alternatives only when asked', async () => {
      const plain = await runEstimate(request(), DEFAULT_PRICING_SETTINGS, NOW);
      const withOptions = await runEstimate(
        request({ options: { include_alternatives: true } }),
        DEFAULT_PRICING_SETTINGS,
        NOW
      );

      expect(plain.response.alternatives).toBeUndefined();
      expect(withOptions.response.alternatives?.pvc_option?.difference).toBe(196.35);
      expect(withOptions.response.alternatives?.premium_insulation?.difference).toBe(540.54);
    });

    it('falls back to the default price book without request prices', async () => {
      mockIsConfigured.mockReturnValue(false);

      const { response } = await runEstimate(request({ price_book: undefined }), DEFAULT_PRICING_SETTINGS, NOW);

      expect(response.provenance.price_book_source).toBe('defaults');
      // fiberglass_1.5 at the built-in $5.00
      expect(response.quote.line_items[0].total_price).toBe(990);
      expect(response.quote.warnings.map(w => w.code)).toEqual(['DEFAULT_PRICE_USED', 'DEFAULT_PRICE_USED']);
    });

    it('applies request settings over the defaults', async () => {
      const { quote } = await runEstimate(
        request({
          measurements: [{ id: 'd1', system_type: 'duct', size: '24x20', length: 180 }],
          settings: { material_markup_pct: 0, labor_markup_pct: 0, overhead_profit_pct: 0, contingency_pct: 0 }
        }),
        DEFAULT_PRICING_SETTINGS,
        NOW
      );

      // 498.96 + 10.56 h × $70
      expect(quote.grand_total).toBe(1238.16);
    });
  });

  describe('runMaterials', () => {
    it('returns line items and the bill of materials without labor', async () => {
      const response = await runMaterials(request(), DEFAULT_PRICING_SETTINGS, NOW);

      expect(response.total_material_cost).toBe(948.96);
      expect(response.line_items.some(i => i.category === 'labor')).toBe(false);
      expect(response.bill_of_materials.map(i => i.item)).toEqual([
        '1.5" Fiberglass Duct Wrap',
        '1.0" Elastomeric Pipe Insulation',
        'Duct Insulation Adhesive',
        'FSK Tape',
        'Vapor Barrier Mastic'
      ]);
    });
  });

  describe('runAlternatives', () => {
    it('compares PVC jacketing and mineral wool', async () => {
      const response = await runAlternatives(request(), DEFAULT_PRICING_SETTINGS, NOW);

      expect(response.alternatives).toEqual({
        pvc_option: { base_cost: 450, upgrade_cost: 646.35, difference: 196.35 },
        premium_insulation: { base_cost: 498.96, upgrade_cost: 1039.5, difference: 540.54 }
      });
    });

    it('leaves out piping the scope filter excludes', async () => {
      const response = await runAlternatives(
        request({
          measurements: [
            { id: 'd1', system_type: 'duct', size: '24x20', length: 180 },
            { id: 'p9', system_type: 'pipe', size: '4" waste', length: 50 }
          ],
          options: { apply_scope_filter: true }
        }),
        DEFAULT_PRICING_SETTINGS,
        NOW
      );

      expect(response.alternatives).toEqual({
        premium_insulation: { base_cost: 498.96, upgrade_cost: 1039.5, difference: 540.54 }
      });
    });
  });
});
