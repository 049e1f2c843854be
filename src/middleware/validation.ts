/**
 * Request validation (zod)
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { z, ZodTypeAny } from 'zod';
import { ErrorResponse } from '../types';

// Row-level defects (negative length, odd sizes) are left to the engine,
// which turns them into warnings; only the shape is enforced here.

const fittingsSchema = z.record(z.coerce.number()).default({});

export const measurementSchema = z.object({
  id: z.union([z.string(), z.number()]).optional(),
  item_id: z.union([z.string(), z.number()]).optional(),
  system_type: z.string().trim().toLowerCase().default('unknown'),
  size: z.string().default(''),
  length: z.coerce.number(),
  fittings: fittingsSchema,
  location: z.string().optional(),
  elevation_changes: z.coerce.number().nonnegative().optional(),
  notes: z.array(z.string()).optional()
});

export const specificationSchema = z.object({
  system_type: z.enum(['duct', 'pipe', 'equipment']),
  size_range: z.string().default('all'),
  thickness: z.coerce.number(),
  material: z.string().trim().min(1),
  facing: z.string().nullable().optional(),
  special_requirements: z.array(z.string()).default([]),
  location: z.string().optional()
});

export const pricingSettingsSchema = z.object({
  material_markup_pct: z.number().nonnegative(),
  labor_markup_pct: z.number().nonnegative(),
  overhead_profit_pct: z.number().nonnegative(),
  contingency_pct: z.number().nonnegative(),
  labor_adjustment_factor: z.number().nonnegative(),
  labor_rate_per_hour: z.number().nonnegative()
}).partial();

export const priceBookSchema = z.object({
  name: z.string().optional(),
  prices: z.record(z.number().nonnegative())
});

export const engineConfigSchema = z.object({
  takeoff: z.object({
    duct_straight_waste: z.number().nonnegative(),
    pipe_fitting_equivalent_lf: z.record(z.number().nonnegative())
  }).partial(),
  production_rates: z.object({
    duct_insulation: z.number().positive(),
    pipe_insulation: z.number().positive(),
    jacketing: z.number().positive(),
    mastic: z.number().positive()
  }).partial(),
  fitting_hours: z.object({
    duct: z.number().nonnegative(),
    pipe: z.number().nonnegative()
  }).partial(),
  labor_overhead_factor: z.number().nonnegative(),
  coverage: z.object({
    duct_wrap_roll_sf: z.number().positive(),
    adhesive_gallon_lf: z.number().positive(),
    mastic_gallon_sf: z.number().positive(),
    fsk_tape_roll_lf: z.number().positive()
  }).partial(),
  fallback_unit_prices: z.object({
    duct: z.number().nonnegative(),
    pipe: z.number().nonnegative()
  }).partial(),
  band_spacing_ft: z.number().positive(),
  thickness_range_in: z.object({
    min: z.number().nonnegative(),
    max: z.number().positive()
  }).partial()
}).partial();

export const estimateRequestSchema = z.object({
  project: z.object({
    name: z.string().optional(),
    location: z.string().optional(),
    customer: z.string().optional()
  }).optional(),
  measurements: z.array(measurementSchema),
  specifications: z.array(specificationSchema).optional(),
  price_book: priceBookSchema.optional(),
  settings: pricingSettingsSchema.optional(),
  config: engineConfigSchema.optional(),
  options: z.object({
    apply_scope_filter: z.boolean().optional(),
    spec_matcher: z.enum(['first-system-type', 'size-range']).optional(),
    include_alternatives: z.boolean().optional()
  }).optional()
});

export type MeasurementInput = z.infer<typeof measurementSchema>;
export type SpecificationInput = z.infer<typeof specificationSchema>;
export type EstimateRequestBody = z.infer<typeof estimateRequestSchema>;

/**
 * Replace req.body with the parsed value, or answer 400 with the issue list
 */
export function validate(schema: ZodTypeAny): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      const body: ErrorResponse = {
        success: false,
        error: 'Request validation failed',
        error_code: 'VALIDATION_ERROR',
        details: result.error.issues.map(issue => ({
          path: issue.path.join('.'),
          message: issue.message
        })),
        timestamp: new Date().toISOString()
      };
      res.status(400).json(body);
      return;
    }
    req.body = result.data;
    next();
  };
}
