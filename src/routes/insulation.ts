/**
 * Insulation Estimation Routes
 */

import { Router, Request, Response } from 'express';
import { EstimateRequestBody, estimateRequestSchema, validate } from '../middleware/validation';
import { runAlternatives, runEstimate, runMaterials } from '../services/estimate';
import { resolvePriceBook } from '../services/pricebook';
import { isDatabaseConfigured, testConnection, PRICE_BOOK_TABLE } from '../services/database';
import { buildErrorResponse, renderMaterialList, renderQuoteText } from '../transformers/quote';
import { getConfig } from '../config';

const router = Router();

function sendError(res: Response, label: string, error: unknown): void {
  console.error(`❌ ${label}:`, error);
  const { status, body } = buildErrorResponse(error);
  res.status(status).json(body);
}

/**
 * POST /api/v1/insulation/estimate
 * Full quote; ?format=text returns the quote and material order list as plain text
 */
router.post('/estimate', validate(estimateRequestSchema), async (req: Request, res: Response) => {
  try {
    const body: EstimateRequestBody = req.body;
    console.log(`📥 Estimate request: ${body.measurements.length} measurement(s)`);

    const run = await runEstimate(body);

    if (req.query.format === 'text') {
      res.type('text/plain').send(
        renderQuoteText(run.quote, run.header, run.response.alternatives) +
        '\n' +
        renderMaterialList(run.quote.bill_of_materials, run.header)
      );
      return;
    }

    res.json(run.response);

  } catch (error) {
    sendError(res, 'Estimate error', error);
  }
});

/**
 * POST /api/v1/insulation/materials
 * Priced material line items and bill of materials, no labor or markup
 */
router.post('/materials', validate(estimateRequestSchema), async (req: Request, res: Response) => {
  try {
    const body: EstimateRequestBody = req.body;
    res.json(await runMaterials(body));
  } catch (error) {
    sendError(res, 'Materials error', error);
  }
});

/**
 * POST /api/v1/insulation/alternatives
 * PVC jacketing and premium insulation upgrade costs
 */
router.post('/alternatives', validate(estimateRequestSchema), async (req: Request, res: Response) => {
  try {
    const body: EstimateRequestBody = req.body;
    res.json(await runAlternatives(body));
  } catch (error) {
    sendError(res, 'Alternatives error', error);
  }
});

/**
 * GET /api/v1/insulation/price-book
 * The price book an estimate without request prices would use
 */
router.get('/price-book', async (req: Request, res: Response) => {
  try {
    const resolved = await resolvePriceBook();
    res.json({
      success: true,
      source: resolved.source,
      price_book: resolved.price_book,
      warnings: resolved.warnings
    });
  } catch (error) {
    sendError(res, 'Price book error', error);
  }
});

/**
 * GET /api/v1/insulation/db-status
 */
router.get('/db-status', async (req: Request, res: Response) => {
  try {
    const configured = isDatabaseConfigured();
    const connected = configured ? await testConnection() : false;

    res.json({
      configured,
      connected,
      table: PRICE_BOOK_TABLE,
      price_book_path: getConfig().price_book_path ?? null,
      message: !configured
        ? 'Database not configured - using file or built-in price book'
        : connected
          ? 'Connected to Supabase'
          : 'Database configured but connection failed'
    });
  } catch (error) {
    sendError(res, 'DB status error', error);
  }
});

/**
 * GET /api/v1/insulation/test
 */
router.get('/test', (req: Request, res: Response) => {
  res.json({
    success: true,
    message: 'Insulation estimation API is running',
    defaults: getConfig().pricing_defaults,
    timestamp: new Date().toISOString()
  });
});

export default router;
