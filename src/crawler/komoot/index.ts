/**
 * Entry point for the komoot collection crawler
 * Can be used as CLI tool or imported as module
 */

import { getExportConfig } from '../../config/exportConfig.js';
import { KomootCrawler } from './komootCrawler.js';
import { HttpClient } from './utils/httpClient.js';
import { Logger } from './utils/logger.js';

const logger = new Logger('KomootCrawlerCLI');

/**
 * CLI usage: tsx src/crawler/komoot/index.ts <collectionUrl> [maxPages]
 */
async function main() {
  const [collectionUrl, maxPagesStr] = process.argv.slice(2);

  if (!collectionUrl) {
    console.log('Usage: tsx src/crawler/komoot/index.ts <collectionUrl> [maxPages]');
    console.log('Example: tsx src/crawler/komoot/index.ts https://www.komoot.com/collection/123456/alpine-loops 5');
    process.exit(1);
  }

  const maxPages = maxPagesStr ? parseInt(maxPagesStr, 10) : undefined;
  if (maxPagesStr && (maxPages === undefined || Number.isNaN(maxPages))) {
    logger.error(`Invalid maxPages: ${maxPagesStr}`);
    process.exit(1);
  }

  const config = getExportConfig();
  const crawler = new KomootCrawler(
    new HttpClient({ timeout: config.httpTimeoutMs, retries: config.httpMaxRetries, retryDelay: config.httpRetryBaseDelayMs }),
    {
      webBaseUrl: config.webBaseUrl,
      maxPages: maxPages ?? config.collectionPageLimit,
      pageSizes: config.collectionPageSizes,
      delayBetweenWaves: [500, 2000],
    }
  );

  const collection = await crawler.fetchCollection(collectionUrl);

  console.log('\n=== COLLECTION ===');
  console.log(JSON.stringify(collection, null, 2));
  console.log(`\nTotal: ${collection.tours.length} tours (${collection.is_enhanced ? 'enhanced' : 'basic'})`);
}

// Run CLI if executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    logger.error('Fatal error:', error);
    process.exit(1);
  });
}

export { KomootCrawler } from './komootCrawler.js';
export { KomootParser, TOUR_CARD_SELECTORS, type CollectionPageMeta, type CollectionLink } from './komootParser.js';
export { KomootApi } from './komootApi.js';
export { HttpClient } from './utils/httpClient.js';
export { Logger } from './utils/logger.js';
export { randomDelay, sleep } from './utils/delay.js';
