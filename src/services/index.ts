import path from 'path';
import type { ExportConfig } from '../config/exportConfig.js';
import { KomootApi } from '../crawler/komoot/komootApi.js';
import { KomootCrawler } from '../crawler/komoot/komootCrawler.js';
import { KomootParser } from '../crawler/komoot/komootParser.js';
import { HttpClient } from '../crawler/komoot/utils/httpClient.js';
import { JobStatusStore } from '../jobs/jobStatus.js';
import type { Collection } from '../types/index.js';
import type { TourResultRow } from '../types/jobs.js';
import { CollectionManager } from './collectionManager.js';
import { TourResolver } from './tourResolver.js';
import { createDefaultStrategies } from './tourStrategies.js';

/**
 * Everything the HTTP layer and the CLI need, built once from configuration
 */
export interface ExportServices {
  config: ExportConfig;
  http: HttpClient;
  parser: KomootParser;
  api: KomootApi;
  crawler: KomootCrawler;
  resolver: TourResolver;
  manager: CollectionManager;
  tourJobs: JobStatusStore<TourResultRow>;
  collectionJobs: JobStatusStore<Collection>;
}

export function createServices(config: ExportConfig): ExportServices {
  const http = new HttpClient({
    timeout: config.httpTimeoutMs,
    retries: config.httpMaxRetries,
    retryDelay: config.httpRetryBaseDelayMs,
  });
  const parser = new KomootParser();
  const api = new KomootApi(http, { apiBaseUrl: config.apiBaseUrl, webBaseUrl: config.webBaseUrl });
  const crawler = new KomootCrawler(http, {
    webBaseUrl: config.webBaseUrl,
    maxPages: config.collectionPageLimit,
    pageSizes: config.collectionPageSizes,
    poolMax: config.tourPoolMax,
  }, parser);
  const resolver = new TourResolver(createDefaultStrategies({
    api,
    http,
    parser,
    webBaseUrl: config.webBaseUrl,
    detailedTourApi: config.detailedTourApi,
  }));

  return {
    config,
    http,
    parser,
    api,
    crawler,
    resolver,
    manager: new CollectionManager(path.resolve(config.outputDir)),
    tourJobs: new JobStatusStore<TourResultRow>('tours'),
    collectionJobs: new JobStatusStore<Collection>('collections'),
  };
}
