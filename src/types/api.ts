/**
 * HTTP response shapes for the insulation routes
 */

import {
  AlternativeOptions,
  BillOfMaterialsItem,
  EstimateWarning,
  MaterialLineItem,
  QuoteResult
} from './estimate';

export type PriceBookOrigin = 'request' | 'file' | 'database' | 'defaults';

export interface ResponseProvenance {
  version: string;
  timestamp: string;
  price_book: string;
  price_book_source: PriceBookOrigin;
}

export interface EstimateResponse {
  success: true;
  trade: 'insulation';
  estimate_id: string;
  project?: {
    name?: string;
    location?: string;
    customer?: string;
  };
  quote: QuoteResult;
  alternatives?: AlternativeOptions;
  provenance: ResponseProvenance;
}

export interface MaterialsResponse {
  success: true;
  trade: 'insulation';
  line_items: MaterialLineItem[];
  total_material_cost: number;
  bill_of_materials: BillOfMaterialsItem[];
  warnings: EstimateWarning[];
  provenance: ResponseProvenance;
}

export interface ErrorResponse {
  success: false;
  error: string;
  error_code?: string;
  suggestion?: string;
  details?: Array<{ path: string; message: string }>;
  timestamp: string;
}
