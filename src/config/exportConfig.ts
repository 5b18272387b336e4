/**
 * Export Configuration
 *
 * Runtime parameters for fetching, pagination, pool sizing and output
 */

import dotenv from 'dotenv';

dotenv.config();

export interface ExportConfig {
  // HTTP surface
  port: number;
  host: string;
  corsAllowedOrigins: string[];

  // Output
  outputDir: string; // Root of all artifacts (default: ./exports)

  // External service
  webBaseUrl: string;
  apiBaseUrl: string;
  detailedTourApi: boolean; // Capability flag for the detailed tour strategy

  // Fetch client
  httpTimeoutMs: number; // Per request timeout (default: 30s)
  httpMaxRetries: number; // Attempts per request (default: 3)
  httpRetryBaseDelayMs: number; // Backoff base, doubled per attempt (default: 1s)

  // Collection pagination
  collectionPageLimit: number; // Safety limit for page=N (default: 20)
  collectionPageSizes: number[]; // size=N hints (default: 50,100,200,300,500)

  // Pool caps
  tourPoolMax: number; // default: 8
  collectionPoolMax: number; // default: 5
}

export const DEFAULT_EXPORT_CONFIG: ExportConfig = {
  port: 5000,
  host: '127.0.0.1',
  corsAllowedOrigins: ['http://localhost:5000', 'http://127.0.0.1:5000'],
  outputDir: './exports',
  webBaseUrl: 'https://www.komoot.com',
  apiBaseUrl: 'https://api.komoot.de',
  detailedTourApi: true,
  httpTimeoutMs: 30000,
  httpMaxRetries: 3,
  httpRetryBaseDelayMs: 1000,
  collectionPageLimit: 20,
  collectionPageSizes: [50, 100, 200, 300, 500],
  tourPoolMax: 8,
  collectionPoolMax: 5,
};

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) return fallback;
  const items = value.split(',').map(item => item.trim()).filter(item => item.length > 0);
  return items.length > 0 ? items : fallback;
}

function parseIntOr(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return !['0', 'false', 'no', 'off'].includes(value.trim().toLowerCase());
}

/**
 * Get export configuration from environment variables or defaults
 */
export function getExportConfig(env: NodeJS.ProcessEnv = process.env): ExportConfig {
  const pageSizes = parseList(env.COLLECTION_PAGE_SIZES, [])
    .map(size => parseInt(size, 10))
    .filter(size => Number.isFinite(size) && size > 0);

  return {
    port: parseIntOr(env.PORT, DEFAULT_EXPORT_CONFIG.port),
    host: env.HOST || DEFAULT_EXPORT_CONFIG.host,
    corsAllowedOrigins: parseList(env.CORS_ALLOWED_ORIGINS, DEFAULT_EXPORT_CONFIG.corsAllowedOrigins),
    outputDir: env.EXPORT_OUTPUT_DIR || DEFAULT_EXPORT_CONFIG.outputDir,
    webBaseUrl: (env.KOMOOT_WEB_BASE_URL || DEFAULT_EXPORT_CONFIG.webBaseUrl).replace(/\/+$/, ''),
    apiBaseUrl: (env.KOMOOT_API_BASE_URL || DEFAULT_EXPORT_CONFIG.apiBaseUrl).replace(/\/+$/, ''),
    detailedTourApi: parseBool(env.DETAILED_TOUR_API, DEFAULT_EXPORT_CONFIG.detailedTourApi),
    httpTimeoutMs: parseIntOr(env.HTTP_TIMEOUT_MS, DEFAULT_EXPORT_CONFIG.httpTimeoutMs),
    httpMaxRetries: Math.max(1, parseIntOr(env.HTTP_MAX_RETRIES, DEFAULT_EXPORT_CONFIG.httpMaxRetries)),
    httpRetryBaseDelayMs: parseIntOr(env.HTTP_RETRY_BASE_DELAY_MS, DEFAULT_EXPORT_CONFIG.httpRetryBaseDelayMs),
    collectionPageLimit: parseIntOr(env.COLLECTION_PAGE_LIMIT, DEFAULT_EXPORT_CONFIG.collectionPageLimit),
    collectionPageSizes: pageSizes.length > 0 ? pageSizes : DEFAULT_EXPORT_CONFIG.collectionPageSizes,
    tourPoolMax: Math.max(1, parseIntOr(env.TOUR_POOL_MAX, DEFAULT_EXPORT_CONFIG.tourPoolMax)),
    collectionPoolMax: Math.max(1, parseIntOr(env.COLLECTION_POOL_MAX, DEFAULT_EXPORT_CONFIG.collectionPoolMax)),
  };
}
