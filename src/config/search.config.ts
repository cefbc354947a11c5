import { ConfigType, registerAs } from '@nestjs/config';

const intFromEnv = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const floatFromEnv = (value: string | undefined, fallback: number): number => {
  const parsed = parseFloat(value ?? '');
  return Number.isNaN(parsed) ? fallback : parsed;
};

const listFromEnv = (value: string | undefined, fallback: string[]): string[] => {
  if (!value) {
    return fallback;
  }
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
};

const searchConfig = registerAs('search', () => ({
  typesense: {
    protocol: process.env.TYPESENSE_PROTOCOL || 'http',
    host: process.env.TYPESENSE_HOST || 'localhost',
    port: intFromEnv(process.env.TYPESENSE_PORT, 8108),
    apiKey: process.env.TYPESENSE_API_KEY || '',
    timeoutMs: intFromEnv(process.env.TYPESENSE_TIMEOUT_MS, 60000),
  },

  embedding: {
    // Empty key leaves hybrid search running text-only
    apiKey: process.env.GEMINI_API_KEY || '',
    model: process.env.GEMINI_EMBEDDING_MODEL || 'gemini-embedding-001',
    baseUrl:
      process.env.GEMINI_BASE_URL || 'https://generativelanguage.googleapis.com/v1beta',
    dimensions: intFromEnv(process.env.EMBEDDING_DIMENSIONS, 768),
    maxTextLength: intFromEnv(process.env.MAX_EMBEDDING_TEXT_LENGTH, 10000),
    timeoutMs: intFromEnv(process.env.EMBEDDING_TIMEOUT_MS, 15000),
  },

  collections: {
    published: process.env.PUBLISHED_COLLECTION || 'prefrio_services_base',
    versions: process.env.VERSIONS_COLLECTION || 'service_versions',
    overlay: process.env.OVERLAY_COLLECTION || 'tombamentos_overlay',
    hub: process.env.HUB_COLLECTION || 'hub_search',
    legacy: listFromEnv(process.env.LEGACY_COLLECTIONS, [
      '1746_v2_llm',
      'carioca-digital_v2_llm',
    ]),
  },

  // Weight of the text score against the vector score in hybrid queries
  hybridAlpha: floatFromEnv(process.env.SEARCH_HYBRID_ALPHA, 0.3),
  // Typesense refuses per_page above 250
  browsePageSize: intFromEnv(process.env.BROWSE_PAGE_SIZE, 250),
  requestTimeoutMs: intFromEnv(process.env.SEARCH_REQUEST_TIMEOUT_MS, 30000),
  relevanceDataPath: process.env.RELEVANCE_DATA_PATH || '',
}));

export type SearchConfig = ConfigType<typeof searchConfig>;

export default searchConfig;
