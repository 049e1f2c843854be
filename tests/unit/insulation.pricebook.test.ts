/**
 * Price Book Service Tests
 * Request → file → Supabase → defaults
 */

import path from 'path';
import * as XLSX from 'xlsx';
import {
  clearPriceBookCache,
  createPriceBook,
  defaultPriceBook,
  fetchPriceBookFromDatabase,
  loadPriceBookFromFile,
  parsePriceBookCsv,
  parsePriceBookJson,
  parsePriceBookWorkbook,
  resolvePriceBook
} from '../../src/services/pricebook';
import { ConfigurationError } from '../../src/errors';

interface SelectResult {
  data: unknown[] | null;
  error: { message: string } | null;
}

const mockIsConfigured = jest.fn<boolean, []>();
const mockSelect = jest.fn<Promise<SelectResult>, [string]>();
const mockConfig: { price_book_path?: string } = {};

jest.mock('../../src/services/database', () => ({
  PRICE_BOOK_TABLE: 'insulation_price_book',
  isDatabaseConfigured: () => mockIsConfigured(),
  getSupabaseClient: () => ({
    from: () => ({ select: (columns: string) => mockSelect(columns) })
  })
}));

jest.mock('../../src/config', () => ({
  getConfig: () => mockConfig
}));

const FIXTURES = path.join(__dirname, '..', 'fixtures');

beforeEach(() => {
  clearPriceBookCache();
  mockIsConfigured.mockReset();
  mockSelect.mockReset();
  delete mockConfig.price_book_path;
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('Price Book Service', () => {
  describe('createPriceBook', () => {
    it('should overlay explicit prices on the defaults', () => {
      const book = createPriceBook({ 'fiberglass_1.5': 2.52 });

      expect(book.name).toBe('custom');
      expect(book.prices['fiberglass_1.5']).toBe(2.52);
      expect(book.sources['fiberglass_1.5']).toBe('explicit');
      expect(book.prices.mastic).toBe(0.75);
      expect(book.sources.mastic).toBe('default');
    });

    it('should leave defaults out when asked', () => {
      const book = createPriceBook({ mastic: 0.9 }, { name: 'bare', includeDefaults: false });

      expect(book).toEqual({ name: 'bare', prices: { mastic: 0.9 }, sources: { mastic: 'explicit' } });
    });

    it('should name the default book', () => {
      expect(defaultPriceBook().name).toBe('built-in defaults');
      expect(defaultPriceBook().prices.aluminum_jacket).toBe(8.5);
    });
  });

  describe('parsePriceBookCsv', () => {
    it('should skip the header row and strip dollar signs', () => {
      const { price_book, warnings } = parsePriceBookCsv('price_key,unit_price\nfiberglass_1.5,$2.60\n');

      expect(price_book.prices['fiberglass_1.5']).toBe(2.6);
      expect(warnings).toEqual([]);
    });

    it('should warn on a bad row and keep the rest', () => {
      const { price_book, warnings } = parsePriceBookCsv('price_key,unit_price\nfiberglass_1.5,abc\nmastic,0.95');

      expect(price_book.sources['fiberglass_1.5']).toBe('default');
      expect(price_book.prices.mastic).toBe(0.95);
      expect(warnings).toEqual([{
        code: 'INVALID_PRICE_ROW',
        message: "CSV price book row 2: 'abc' is not a valid price for 'fiberglass_1.5'; row skipped",
        field: 'price_book.fiberglass_1.5'
      }]);
    });

    it('should detect tab and semicolon delimiters', () => {
      expect(parsePriceBookCsv('mastic\t0.9').price_book.prices.mastic).toBe(0.9);
      expect(parsePriceBookCsv('mastic;0.85').price_book.prices.mastic).toBe(0.85);
    });

    it('should reject negative prices', () => {
      const { warnings } = parsePriceBookCsv('key,price\nmastic,-1');

      expect(warnings).toHaveLength(1);
    });
  });

  describe('parsePriceBookJson', () => {
    it('should read a flat object', () => {
      const { price_book } = parsePriceBookJson('{"mastic": 0.9, "stainless_bands": "2.75"}');

      expect(price_book.prices.mastic).toBe(0.9);
      expect(price_book.prices.stainless_bands).toBe(2.75);
    });

    it('should reject malformed JSON', () => {
      expect(() => parsePriceBookJson('{not json')).toThrow(ConfigurationError);
    });

    it('should reject a non-object document', () => {
      expect(() => parsePriceBookJson('[1, 2]')).toThrow("Configuration error for 'price_book'");
    });
  });

  describe('parsePriceBookWorkbook', () => {
    it('should read the first sheet', () => {
      const workbook = XLSX.utils.book_new();
      const sheet = XLSX.utils.aoa_to_sheet([
        ['price_key', 'unit_price'],
        ['fiberglass_1.5', 2.6],
        ['mastic', 'n/a']
      ]);
      XLSX.utils.book_append_sheet(workbook, sheet, 'Prices');
      const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });

      const { price_book, warnings } = parsePriceBookWorkbook(buffer);

      expect(price_book.prices['fiberglass_1.5']).toBe(2.6);
      expect(price_book.sources.mastic).toBe('default');
      expect(warnings[0].message).toBe("Sheet 'Prices' row 3: 'n/a' is not a valid price for 'mastic'; row skipped");
    });
  });

  describe('loadPriceBookFromFile', () => {
    it('should load a CSV price book named after the file', () => {
      const { price_book, warnings } = loadPriceBookFromFile(path.join(FIXTURES, 'pricebook.csv'));

      expect(price_book.name).toBe('pricebook');
      expect(price_book.prices['elastomeric_1.0']).toBe(4.75);
      expect(price_book.prices.aluminum_jacket).toBe(9.1);
      expect(price_book.prices.mastic).toBe(0.8);
      expect(price_book.sources.fsk_facing).toBe('default');
      expect(warnings).toEqual([]);
    });

    it('should keep the name embedded in a JSON price book', () => {
      const { price_book } = loadPriceBookFromFile(path.join(FIXTURES, 'pricebook.json'));

      expect(price_book.name).toBe('Distributor Q3');
      expect(price_book.prices['fiberglass_2.0']).toBe(3.1);
    });

    it('should fail for a missing file', () => {
      expect(() => loadPriceBookFromFile(path.join(FIXTURES, 'missing.csv'))).toThrow(ConfigurationError);
    });

    it('should fail for an unsupported format', () => {
      expect(() => loadPriceBookFromFile(__filename))
        .toThrow("Configuration error for 'price_book_path': unsupported price book format '.ts'");
    });
  });

  describe('fetchPriceBookFromDatabase', () => {
    it('should use defaults when the database is not configured', async () => {
      mockIsConfigured.mockReturnValue(false);

      const result = await fetchPriceBookFromDatabase();

      expect(result.source).toBe('defaults');
      expect(result.price_book.name).toBe('built-in defaults');
      expect(mockSelect).not.toHaveBeenCalled();
    });

    it('should load rows and skip invalid ones', async () => {
      mockIsConfigured.mockReturnValue(true);
      mockSelect.mockResolvedValue({
        data: [
          { price_key: 'fiberglass_1.5', unit_price: '2.80' },
          { price_key: '', unit_price: 1 }
        ],
        error: null
      });

      const result = await fetchPriceBookFromDatabase();

      expect(result.source).toBe('database');
      expect(result.price_book.name).toBe('insulation_price_book');
      expect(result.price_book.prices['fiberglass_1.5']).toBe(2.8);
      expect(result.warnings).toHaveLength(1);
      expect(result.warnings[0].code).toBe('INVALID_PRICE_ROW');
      expect(mockSelect).toHaveBeenCalledWith('price_key, unit_price');
    });

    it('should serve repeat requests from the cache', async () => {
      mockIsConfigured.mockReturnValue(true);
      mockSelect.mockResolvedValue({ data: [{ price_key: 'mastic', unit_price: 0.9 }], error: null });

      await fetchPriceBookFromDatabase();
      const second = await fetchPriceBookFromDatabase();

      expect(second.price_book.prices.mastic).toBe(0.9);
      expect(mockSelect).toHaveBeenCalledTimes(1);
    });

    it('should fall back to defaults on a query error', async () => {
      mockIsConfigured.mockReturnValue(true);
      mockSelect.mockResolvedValue({ data: null, error: { message: 'relation does not exist' } });

      const result = await fetchPriceBookFromDatabase();

      expect(result.source).toBe('defaults');
      expect(result.price_book.prices.mastic).toBe(0.75);
    });
  });

  describe('resolvePriceBook', () => {
    it('should prefer prices sent with the request', async () => {
      const result = await resolvePriceBook({ mastic: 1.1 });

      expect(result.source).toBe('request');
      expect(result.price_book.name).toBe('request');
      expect(result.price_book.prices.mastic).toBe(1.1);
    });

    it('should read PRICE_BOOK_PATH before the database', async () => {
      mockConfig.price_book_path = path.join(FIXTURES, 'pricebook.json');

      const result = await resolvePriceBook({});

      expect(result.source).toBe('file');
      expect(result.price_book.name).toBe('Distributor Q3');
      expect(mockIsConfigured).not.toHaveBeenCalled();
    });

    it('should fall through to the database', async () => {
      mockIsConfigured.mockReturnValue(false);

      const result = await resolvePriceBook();

      expect(result.source).toBe('defaults');
    });
  });
});
