/**
 * Supabase Database Client
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { getConfig } from '../config';

export const PRICE_BOOK_TABLE = 'insulation_price_book';

let supabaseClient: SupabaseClient | null = null;

export function getSupabaseClient(): SupabaseClient {
  if (!supabaseClient) {
    const { url, anon_key } = getConfig().supabase;
    if (!url || !anon_key) {
      throw new Error('Missing Supabase credentials in environment variables');
    }
    supabaseClient = createClient(url, anon_key, {
      auth: { persistSession: false }
    });
  }
  return supabaseClient;
}

export function isDatabaseConfigured(): boolean {
  const { url, anon_key } = getConfig().supabase;
  return !!(url && anon_key &&
            url !== 'your_supabase_url_here' &&
            anon_key !== 'your_supabase_anon_key_here');
}

export async function testConnection(): Promise<boolean> {
  if (!isDatabaseConfigured()) return false;
  try {
    const client = getSupabaseClient();
    const { error } = await client.from(PRICE_BOOK_TABLE).select('price_key').limit(1);
    if (error) {
      console.error('❌ Price book table check failed:', error.message);
    }
    return !error;
  } catch (err) {
    console.error('❌ Database connection error:', err);
    return false;
  }
}
