/**
 * Material Calculation Tests
 * Takeoff adjustment, price lookup, jacketing, mastic and bands
 */

import { calculateMaterials, resolveUnitPrice, adjustedLengthFor } from '../../src/calculations/insulation/materials';
import { sizeRangeMatcher } from '../../src/calculations/insulation/specs';
import { DEFAULT_ENGINE_CONFIG } from '../../src/constants';
import { ConfigurationError } from '../../src/errors';
import { EstimateWarning, InsulationSpec, MeasurementItem, PriceBook, PriceSource } from '../../src/types';

function priceBook(prices: Record<string, number>, defaults: Record<string, number> = {}): PriceBook {
  const sources: Record<string, PriceSource> = {};
  for (const key of Object.keys(defaults)) sources[key] = 'default';
  for (const key of Object.keys(prices)) sources[key] = 'explicit';
  return { name: 'test', prices: { ...defaults, ...prices }, sources };
}

const ductSpec: InsulationSpec = {
  system_type: 'duct',
  size_range: 'all',
  thickness: 1.5,
  material: 'fiberglass',
  facing: 'none',
  special_requirements: []
};

const pipeSpec: InsulationSpec = {
  system_type: 'pipe',
  size_range: 'all',
  thickness: 1.0,
  material: 'elastomeric',
  facing: null,
  special_requirements: ['aluminum_jacket', 'mastic_coating', 'stainless_bands']
};

const duct24x20: MeasurementItem = {
  id: 'd1',
  system_type: 'duct',
  size: '24x20',
  length: 180,
  fittings: {}
};

const pipe2in: MeasurementItem = {
  id: 'p1',
  system_type: 'pipe',
  size: '2" CHW',
  length: 100,
  fittings: { elbow: 4, tee: 2, valve: 1 }
};

describe('Material Calculations', () => {
  describe('duct insulation', () => {
    it('should apply 10% straight waste and price per LF', () => {
      const result = calculateMaterials([duct24x20], [ductSpec], priceBook({ 'fiberglass_1.5': 2.52 }));

      expect(result.line_items).toHaveLength(1);
      const line = result.line_items[0];
      expect(line.id).toBe('d1:insulation');
      expect(line.description).toBe('Fiberglass Insulation 1.5" - 24x20');
      expect(line.unit).toBe('LF');
      expect(line.quantity).toBe(198);       // 180 × 1.10
      expect(line.unit_price).toBe(2.52);
      expect(line.total_price).toBe(498.96); // 198 × 2.52
      expect(line.price_key).toBe('fiberglass_1.5');
      expect(line.pricing_source).toBe('explicit');
      expect(result.total_material_cost).toBe(498.96);
      expect(result.warnings).toEqual([]);
    });

    it('should record duct surface area for the BOM even without facing', () => {
      const result = calculateMaterials([duct24x20], [ductSpec], priceBook({ 'fiberglass_1.5': 2.52 }));

      expect(result.takeoff[0].surface_area_sf).toBeCloseTo(1320, 6);
      expect(result.takeoff[0].adjusted_length_lf).toBeCloseTo(198, 6);
    });

    it('should add an FSK facing line by surface area', () => {
      const fsk = { ...ductSpec, facing: 'FSK' };
      const result = calculateMaterials(
        [duct24x20], [fsk], priceBook({ 'fiberglass_1.5': 2.52, fsk_facing: 1.25 })
      );

      const facing = result.line_items.find(i => i.category === 'jacket');
      expect(facing?.id).toBe('d1:jacket');
      expect(facing?.description).toBe('FSK Facing - 24x20');
      expect(facing?.unit).toBe('SF');
      expect(facing?.quantity).toBe(1320);
      expect(facing?.total_price).toBe(1650); // 1320 × 1.25
      expect(result.total_material_cost).toBe(2148.96);
    });

    it('should treat equipment like duct', () => {
      const equipment: MeasurementItem = { id: 'e1', system_type: 'equipment', size: '48x48', length: 10, fittings: {} };
      const spec: InsulationSpec = { ...ductSpec, system_type: 'equipment' };
      const result = calculateMaterials([equipment], [spec], priceBook({ 'fiberglass_1.5': 5 }));

      expect(result.line_items[0].quantity).toBe(11);
      expect(result.line_items[0].total_price).toBe(55);
    });
  });

  describe('pipe insulation', () => {
    const book = priceBook({
      'elastomeric_1.0': 4.5,
      aluminum_jacket: 8.5,
      mastic: 0.75,
      stainless_bands: 2.5
    });

    it('should add fitting equivalent length', () => {
      const result = calculateMaterials([pipe2in], [pipeSpec], book);
      const insulation = result.line_items.find(i => i.category === 'insulation');

      // 100 + 4 × 1.5 + 2 × 2.0
      expect(insulation?.quantity).toBe(110);
      expect(insulation?.total_price).toBe(495);
      expect(insulation?.fitting_count).toBe(7);
    });

    it('should price aluminum jacketing, mastic and bands', () => {
      const result = calculateMaterials([pipe2in], [pipeSpec], book);
      const byId = Object.fromEntries(result.line_items.map(i => [i.id, i]));

      expect(Object.keys(byId)).toEqual(['p1:insulation', 'p1:jacket', 'p1:mastic', 'p1:bands']);

      // 2 / 12 × π × 100 = 52.36 SF
      expect(byId['p1:jacket'].description).toBe('Aluminum Jacketing - 2" CHW');
      expect(byId['p1:jacket'].quantity).toBe(52.36);
      expect(byId['p1:jacket'].total_price).toBe(445.06);
      expect(byId['p1:mastic'].total_price).toBe(39.27);

      // floor(100 / 1) + 1
      expect(byId['p1:bands'].quantity).toBe(101);
      expect(byId['p1:bands'].unit).toBe('EA');
      expect(byId['p1:bands'].total_price).toBe(252.5);

      expect(result.total_material_cost).toBe(1231.83);
    });

    it('should keep the unrounded jacket area on the takeoff', () => {
      const result = calculateMaterials([pipe2in], [pipeSpec], book);

      expect(result.takeoff[0].jacket_label).toBe('Aluminum Jacketing');
      expect(result.takeoff[0].jacket_surface_area_sf).toBe(2 / 12 * Math.PI * 100);
    });

    it('should warn once about an unknown fitting kind', () => {
      const result = calculateMaterials([pipe2in], [pipeSpec], book);

      expect(result.warnings).toHaveLength(1);
      expect(result.warnings[0].code).toBe('UNKNOWN_FITTING_KIND');
      expect(result.warnings[0].field).toBe('measurements.p1.fittings.valve');
    });

    it('should use the 30 mil PVC jacket key when required', () => {
      const spec: InsulationSpec = { ...pipeSpec, special_requirements: ['pvc_jacket_30mil'] };
      const result = calculateMaterials([pipe2in], [spec], priceBook({ 'elastomeric_1.0': 4.5, pvc_jacket_30mil: 4.5 }));
      const jacket = result.line_items.find(i => i.category === 'jacket');

      expect(jacket?.price_key).toBe('pvc_jacket_30mil');
      expect(jacket?.description).toBe('PVC Jacketing 30 mil - 2" CHW');
    });

    it('should skip jacketing and warn when the pipe size has no diameter', () => {
      const noSize: MeasurementItem = { ...pipe2in, id: 'p2', size: 'CHW', fittings: {} };
      const result = calculateMaterials([noSize], [pipeSpec], book);

      expect(result.line_items.map(i => i.id)).toEqual(['p2:insulation', 'p2:bands']);
      expect(result.warnings.map(w => w.code)).toEqual(['UNPARSABLE_PIPE_SIZE']);
    });
  });

  describe('price lookup', () => {
    it('should fall back to the system-type price when the key is missing', () => {
      const spec: InsulationSpec = { ...ductSpec, material: 'cellular_glass', thickness: 3 };
      const result = calculateMaterials(
        [{ ...duct24x20, length: 10 }], [spec], priceBook({ 'fiberglass_1.5': 2.52 })
      );
      const line = result.line_items[0];

      expect(line.price_key).toBe('cellular_glass_3.0');
      expect(line.unit_price).toBe(5);
      expect(line.total_price).toBe(55); // 11 LF × $5.00
      expect(line.pricing_source).toBe('fallback');
      expect(result.warnings.map(w => w.code)).toEqual(['PRICE_KEY_MISSING']);
    });

    it('should warn once per key when a built-in default price is used', () => {
      const second: MeasurementItem = { ...duct24x20, id: 'd2' };
      const result = calculateMaterials(
        [duct24x20, second], [ductSpec], priceBook({}, { 'fiberglass_1.5': 5 })
      );

      expect(result.line_items.every(i => i.pricing_source === 'default')).toBe(true);
      expect(result.warnings.map(w => w.code)).toEqual(['DEFAULT_PRICE_USED']);
    });

    it('should resolve explicit prices without warnings', () => {
      const warnings: EstimateWarning[] = [];
      const price = resolveUnitPrice(priceBook({ mastic: 0.8 }), 'mastic', 0.75, warnings);

      expect(price).toEqual({ unit_price: 0.8, pricing_source: 'explicit' });
      expect(warnings).toEqual([]);
    });
  });

  describe('graceful degradation', () => {
    const book = priceBook({ 'fiberglass_1.5': 2.52, fsk_facing: 1.25 });

    it('should price an unparsable duct size with zero surface area', () => {
      const bad: MeasurementItem = { ...duct24x20, size: 'not-a-size' };
      const result = calculateMaterials([bad], [{ ...ductSpec, facing: 'FSK' }], book);

      expect(result.line_items.map(i => i.id)).toEqual(['d1:insulation']);
      expect(result.takeoff[0].surface_area_sf).toBe(0);
      expect(result.warnings.map(w => w.code)).toEqual(['UNPARSABLE_DUCT_SIZE']);
    });

    it('should clamp a negative length to zero', () => {
      const result = calculateMaterials([{ ...duct24x20, length: -50 }], [ductSpec], book);

      expect(result.line_items[0].quantity).toBe(0);
      expect(result.line_items[0].total_price).toBe(0);
      expect(result.warnings.map(w => w.code)).toEqual(['NEGATIVE_LENGTH']);
    });

    it('should clamp negative fitting counts', () => {
      const pipe: MeasurementItem = { ...pipe2in, fittings: { elbow: -2, tee: 1 } };
      const spec: InsulationSpec = { ...pipeSpec, special_requirements: [] };
      const result = calculateMaterials([pipe], [spec], priceBook({ 'elastomeric_1.0': 4.5 }));

      expect(result.line_items[0].quantity).toBe(102);
      expect(result.warnings.map(w => w.code)).toEqual(['INVALID_FITTING_COUNT']);
    });

    it('should skip measurements without a matching spec', () => {
      const pipe: MeasurementItem = { ...pipe2in, fittings: {} };
      const result = calculateMaterials([duct24x20, pipe], [ductSpec], book);

      expect(result.line_items.map(i => i.id)).toEqual(['d1:insulation']);
      expect(result.warnings.map(w => w.code)).toEqual(['NO_MATCHING_SPEC']);
    });

    it('should skip a spec with zero thickness', () => {
      const result = calculateMaterials([duct24x20], [{ ...ductSpec, thickness: 0 }], book);

      expect(result.line_items).toEqual([]);
      expect(result.total_material_cost).toBe(0);
      expect(result.warnings.map(w => w.code)).toEqual(['INVALID_THICKNESS']);
    });

    it('should price but warn about thickness outside 0.5-6.0 inches', () => {
      const result = calculateMaterials([duct24x20], [{ ...ductSpec, thickness: 8 }], book);

      expect(result.line_items).toHaveLength(1);
      expect(result.warnings.map(w => w.code)).toEqual(['THICKNESS_OUT_OF_RANGE', 'PRICE_KEY_MISSING']);
    });

    it('should throw a ConfigurationError without a price book', () => {
      expect(() => calculateMaterials([duct24x20], [ductSpec], null)).toThrow(ConfigurationError);
    });

    it('should not mutate its inputs', () => {
      const measurements = [duct24x20, pipe2in];
      const specs = [ductSpec, pipeSpec];
      const before = JSON.stringify({ measurements, specs });

      calculateMaterials(measurements, specs, book);

      expect(JSON.stringify({ measurements, specs })).toBe(before);
    });
  });

  describe('matcher strategy', () => {
    it('should honour a size-range matcher', () => {
      const small: InsulationSpec = { ...pipeSpec, size_range: '1-2 inch', special_requirements: [] };
      const large: InsulationSpec = { ...pipeSpec, size_range: '3-6 inch', material: 'fiberglass', thickness: 1.5, special_requirements: [] };
      const pipe4: MeasurementItem = { ...pipe2in, size: '4"', fittings: {} };

      const result = calculateMaterials(
        [pipe4], [small, large], priceBook({ 'elastomeric_1.0': 4.5, 'fiberglass_1.5': 3 }),
        DEFAULT_ENGINE_CONFIG, sizeRangeMatcher
      );

      expect(result.line_items[0].price_key).toBe('fiberglass_1.5');
      expect(result.line_items[0].total_price).toBe(300);
    });
  });

  describe('adjustedLengthFor', () => {
    it('should follow the engine configuration', () => {
      const config = { ...DEFAULT_ENGINE_CONFIG, takeoff: { ...DEFAULT_ENGINE_CONFIG.takeoff, duct_straight_waste: 1.25 } };
      expect(adjustedLengthFor('duct', 100, {}, config)).toBe(125);
    });
  });
});
