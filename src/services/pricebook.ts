/**
 * Price Book Service
 * Builds the key → unit price map from request data, a local file, or the
 * Supabase insulation_price_book table, falling back to built-in defaults.
 */

import fs from 'fs';
import path from 'path';
import * as XLSX from 'xlsx';
import { z } from 'zod';
import { EstimateWarning, PriceBook, PriceBookOrigin, PriceSource } from '../types';
import { DEFAULT_PRICES } from '../constants';
import { ConfigurationError } from '../errors';
import { getConfig } from '../config';
import { getSupabaseClient, isDatabaseConfigured, PRICE_BOOK_TABLE } from './database';

export interface PriceBookLoadResult {
  price_book: PriceBook;
  warnings: EstimateWarning[];
}

export interface ResolvedPriceBook extends PriceBookLoadResult {
  source: PriceBookOrigin;
}

export interface PriceBookOptions {
  name?: string;
  /** Fill keys the explicit prices lack from DEFAULT_PRICES (default true) */
  includeDefaults?: boolean;
}

export const DEFAULT_PRICE_BOOK_NAME = 'built-in defaults';

// ============================================================================
// CONSTRUCTION
// ============================================================================

export function createPriceBook(
  explicit: Readonly<Record<string, number>> = {},
  options: PriceBookOptions = {}
): PriceBook {
  const includeDefaults = options.includeDefaults ?? true;
  const prices: Record<string, number> = {};
  const sources: Record<string, PriceSource> = {};

  if (includeDefaults) {
    for (const [key, price] of Object.entries(DEFAULT_PRICES)) {
      prices[key] = price;
      sources[key] = 'default';
    }
  }

  for (const [key, price] of Object.entries(explicit)) {
    prices[key] = price;
    sources[key] = 'explicit';
  }

  return {
    name: options.name ?? (Object.keys(explicit).length > 0 ? 'custom' : DEFAULT_PRICE_BOOK_NAME),
    prices,
    sources
  };
}

export function defaultPriceBook(): PriceBook {
  return createPriceBook({}, { name: DEFAULT_PRICE_BOOK_NAME });
}

// ============================================================================
// ROW PARSING (shared by CSV and spreadsheet)
// ============================================================================

function parsePriceValue(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : null;
  }
  if (typeof value !== 'string') return null;

  const cleaned = value.trim().replace(/^\$/, '').trim();
  if (cleaned === '' || !/^-?\d*\.?\d+$/.test(cleaned)) return null;

  const price = parseFloat(cleaned);
  return price >= 0 ? price : null;
}

/**
 * Two-column rows → prices. A non-numeric price in the first row is a header;
 * anywhere else the row is skipped with a warning.
 */
function collectPriceRows(
  rows: readonly unknown[][],
  sourceLabel: string,
  warnings: EstimateWarning[]
): Record<string, number> {
  const prices: Record<string, number> = {};

  rows.forEach((row, index) => {
    const key = String(row[0] ?? '').trim();
    const price = parsePriceValue(row[1]);

    if (price === null) {
      if (index === 0) return;
      warnings.push({
        code: 'INVALID_PRICE_ROW',
        message: `${sourceLabel} row ${index + 1}: '${String(row[1] ?? '')}' is not a valid price for '${key}'; row skipped`,
        field: key ? `price_book.${key}` : undefined
      });
      return;
    }

    if (!key) {
      warnings.push({
        code: 'INVALID_PRICE_ROW',
        message: `${sourceLabel} row ${index + 1}: missing price key; row skipped`
      });
      return;
    }

    prices[key] = price;
  });

  return prices;
}

function detectDelimiter(line: string): string {
  if (line.includes('\t')) return '\t';
  if (line.includes(';')) return ';';
  return ',';
}

// ============================================================================
// PARSERS
// ============================================================================

/**
 * Accepts `{ "name": "...", "prices": { key: price } }` or a flat `{ key: price }` object.
 * An embedded name wins over options.name.
 */
export function parsePriceBookJson(text: string, options: PriceBookOptions = {}): PriceBookLoadResult {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError('price_book', `invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  const wrapped = z.object({ name: z.string().optional(), prices: z.record(z.unknown()) }).safeParse(data);
  const flat = z.record(z.unknown()).safeParse(data);

  let entries: Record<string, unknown>;
  let name = options.name;
  if (wrapped.success) {
    entries = wrapped.data.prices;
    name = wrapped.data.name ?? name;
  } else if (flat.success) {
    entries = flat.data;
  } else {
    throw new ConfigurationError('price_book', 'JSON price book must be an object of price_key → unit price');
  }

  const warnings: EstimateWarning[] = [];
  const prices: Record<string, number> = {};
  for (const [key, value] of Object.entries(entries)) {
    const price = parsePriceValue(value);
    if (price === null) {
      warnings.push({
        code: 'INVALID_PRICE_ROW',
        message: `JSON price book: '${String(value)}' is not a valid price for '${key}'; entry skipped`,
        field: `price_book.${key}`
      });
      continue;
    }
    prices[key.trim()] = price;
  }

  return { price_book: createPriceBook(prices, { ...options, name }), warnings };
}

/**
 * Two columns (price_key, unit_price); comma, semicolon or tab separated.
 * Blank lines and lines starting with # are ignored.
 */
export function parsePriceBookCsv(text: string, options: PriceBookOptions = {}): PriceBookLoadResult {
  const lines = text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line !== '' && !line.startsWith('#'));

  const delimiter = lines.length > 0 ? detectDelimiter(lines[0]) : ',';
  const rows = lines.map(line => line.split(delimiter).map(cell => cell.trim().replace(/^"(.*)"$/, '$1')));

  const warnings: EstimateWarning[] = [];
  const prices = collectPriceRows(rows, 'CSV price book', warnings);
  return { price_book: createPriceBook(prices, options), warnings };
}

/**
 * First sheet, first two columns
 */
export function parsePriceBookWorkbook(buffer: Buffer, options: PriceBookOptions = {}): PriceBookLoadResult {
  const workbook = XLSX.read(buffer, { type: 'buffer' });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    throw new ConfigurationError('price_book', 'spreadsheet has no sheets');
  }

  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: '', blankrows: false });
  const warnings: EstimateWarning[] = [];
  const prices = collectPriceRows(rows, `Sheet '${sheetName}'`, warnings);
  return { price_book: createPriceBook(prices, options), warnings };
}

export function loadPriceBookFromFile(filePath: string, options: PriceBookOptions = {}): PriceBookLoadResult {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError('price_book_path', `file not found: ${filePath}`, 500);
  }

  const extension = path.extname(filePath).toLowerCase();
  const named = { ...options, name: options.name ?? path.basename(filePath, extension) };

  switch (extension) {
    case '.json':
      return parsePriceBookJson(fs.readFileSync(filePath, 'utf-8'), named);
    case '.csv':
    case '.tsv':
    case '.txt':
      return parsePriceBookCsv(fs.readFileSync(filePath, 'utf-8'), named);
    case '.xlsx':
    case '.xls':
      return parsePriceBookWorkbook(fs.readFileSync(filePath), named);
    default:
      throw new ConfigurationError('price_book_path', `unsupported price book format '${extension || filePath}'`, 500);
  }
}

// ============================================================================
// SUPABASE
// ============================================================================

const priceRowSchema = z.object({
  price_key: z.string().min(1),
  unit_price: z.coerce.number().finite().nonnegative()
});

let priceBookCache: PriceBookLoadResult | null = null;
let cacheTimestamp: number = 0;
const CACHE_TTL_MS = 5 * 60 * 1000;

export async function fetchPriceBookFromDatabase(): Promise<ResolvedPriceBook> {
  if (priceBookCache && (Date.now() - cacheTimestamp) < CACHE_TTL_MS) {
    return { ...priceBookCache, source: 'database' };
  }

  if (!isDatabaseConfigured()) {
    console.warn('⚠️ Database not configured - using default price book');
    return { price_book: defaultPriceBook(), warnings: [], source: 'defaults' };
  }

  try {
    const client = getSupabaseClient();
    const { data, error } = await client
      .from(PRICE_BOOK_TABLE)
      .select('price_key, unit_price');

    if (error) {
      console.error('❌ Error fetching price book:', error.message);
      return priceBookCache
        ? { ...priceBookCache, source: 'database' }
        : { price_book: defaultPriceBook(), warnings: [], source: 'defaults' };
    }

    const warnings: EstimateWarning[] = [];
    const prices: Record<string, number> = {};
    for (const row of data || []) {
      const parsed = priceRowSchema.safeParse(row);
      if (!parsed.success) {
        warnings.push({
          code: 'INVALID_PRICE_ROW',
          message: `${PRICE_BOOK_TABLE}: row skipped (${parsed.error.issues[0].message})`
        });
        continue;
      }
      prices[parsed.data.price_key.trim()] = parsed.data.unit_price;
    }

    priceBookCache = { price_book: createPriceBook(prices, { name: PRICE_BOOK_TABLE }), warnings };
    cacheTimestamp = Date.now();
    console.log(`✅ Loaded ${Object.keys(prices).length} prices from ${PRICE_BOOK_TABLE}`);
    return { ...priceBookCache, source: 'database' };
  } catch (err) {
    console.error('❌ Database connection error:', err);
    return priceBookCache
      ? { ...priceBookCache, source: 'database' }
      : { price_book: defaultPriceBook(), warnings: [], source: 'defaults' };
  }
}

export function clearPriceBookCache(): void {
  priceBookCache = null;
  cacheTimestamp = 0;
}

// ============================================================================
// RESOLUTION
// ============================================================================

/**
 * Request prices → PRICE_BOOK_PATH file → Supabase → built-in defaults
 */
export async function resolvePriceBook(
  requestPrices?: Readonly<Record<string, number>> | null,
  name?: string
): Promise<ResolvedPriceBook> {
  if (requestPrices && Object.keys(requestPrices).length > 0) {
    return { price_book: createPriceBook(requestPrices, { name: name ?? 'request' }), warnings: [], source: 'request' };
  }

  const filePath = getConfig().price_book_path;
  if (filePath) {
    const loaded = loadPriceBookFromFile(filePath);
    console.log(`📥 Loaded price book '${loaded.price_book.name}' from ${filePath}`);
    return { ...loaded, source: 'file' };
  }

  return fetchPriceBookFromDatabase();
}
