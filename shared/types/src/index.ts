// Attribute vocabulary shared by the search API and its consumers
export type ConstraintName =
  | 'destination'
  | 'category'
  | 'price_range'
  | 'price_max'
  | 'travel_month'
  | 'season'
  | 'duration_days'
  | 'family_friendly'
  | 'transport_type'
  | 'amenities'
  | 'subcategory';

export type AttributeValue = string | number | boolean | string[] | null;

// Stored attributes are not validated on the way in; absent means unknown
export type FragmentAttributes = Partial<Record<ConstraintName, AttributeValue>> & {
  source?: string;
  page_number?: number | null;
  [extra: string]: AttributeValue | undefined;
};

export interface HardFilter {
  field: 'destination' | 'travel_month' | 'season' | 'category' | 'price_range' | 'subcategory';
  value: string;
}

// Search API request/response types
export interface SearchRequestBody {
  query: string;
  constraints?: Partial<Record<ConstraintName, unknown>>;
  limit?: number;
  threshold?: number;
}

export interface SearchResultItem {
  id: string;
  body: string;
  attributes: FragmentAttributes;
  score: number;
}

export interface SearchResponse {
  query: string;
  hard_filter: HardFilter | null;
  results: SearchResultItem[];
  total_results: number;
  /** Seconds */
  processing_time: number;
}

export interface StoreStats {
  total_fragments: number;
  categories: string[];
  destinations: string[];
  sources: string[];
}

export interface SourceSummary {
  source: string;
  fragments: number;
}

export interface SourceListResponse {
  documents: SourceSummary[];
  total: number;
}

export interface ApiError {
  error: string;
  message: string;
  statusCode: number;
  timestamp: string;
  details?: Record<string, unknown>;
}
