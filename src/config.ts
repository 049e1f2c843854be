/**
 * Service Configuration
 * Environment → typed settings, validated once on first use
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { PricingSettings } from './types';
import { DEFAULT_PRICING_SETTINGS } from './constants';
import { ConfigurationError } from './errors';

dotenv.config();

function envNumber(fallback: number) {
  return z.preprocess(
    value => (value === undefined || value === '' ? fallback : value),
    z.coerce.number().finite().nonnegative()
  );
}

function envString() {
  return z.preprocess(
    value => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.string().trim().optional()
  );
}

const envSchema = z.object({
  PORT: envNumber(3000),
  SUPABASE_URL: envString(),
  SUPABASE_ANON_KEY: envString(),
  PRICE_BOOK_PATH: envString(),
  DEFAULT_LABOR_RATE: envNumber(DEFAULT_PRICING_SETTINGS.labor_rate_per_hour),
  DEFAULT_MATERIAL_MARKUP_PCT: envNumber(DEFAULT_PRICING_SETTINGS.material_markup_pct),
  DEFAULT_LABOR_MARKUP_PCT: envNumber(DEFAULT_PRICING_SETTINGS.labor_markup_pct),
  DEFAULT_OVERHEAD_PROFIT_PCT: envNumber(DEFAULT_PRICING_SETTINGS.overhead_profit_pct),
  DEFAULT_CONTINGENCY_PCT: envNumber(DEFAULT_PRICING_SETTINGS.contingency_pct),
  DEFAULT_LABOR_ADJUSTMENT: envNumber(DEFAULT_PRICING_SETTINGS.labor_adjustment_factor)
});

export interface AppConfig {
  port: number;
  supabase: {
    url?: string;
    anon_key?: string;
  };
  price_book_path?: string;
  pricing_defaults: PricingSettings;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(issue.path.join('.') || 'environment', issue.message, 500);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    supabase: {
      url: vars.SUPABASE_URL,
      anon_key: vars.SUPABASE_ANON_KEY
    },
    price_book_path: vars.PRICE_BOOK_PATH,
    pricing_defaults: {
      material_markup_pct: vars.DEFAULT_MATERIAL_MARKUP_PCT,
      labor_markup_pct: vars.DEFAULT_LABOR_MARKUP_PCT,
      overhead_profit_pct: vars.DEFAULT_OVERHEAD_PROFIT_PCT,
      contingency_pct: vars.DEFAULT_CONTINGENCY_PCT,
      labor_adjustment_factor: vars.DEFAULT_LABOR_ADJUSTMENT,
      labor_rate_per_hour: vars.DEFAULT_LABOR_RATE
    }
  };
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}
