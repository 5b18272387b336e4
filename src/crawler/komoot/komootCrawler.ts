/**
 * Collection fetcher for komoot
 * Paginates a collection across page and size variants and merges the tours
 */

import pLimit from 'p-limit';
import type { HttpClient } from './utils/httpClient.js';
import { KomootParser, type CollectionLink } from './komootParser.js';
import { randomDelay } from './utils/delay.js';
import { Logger } from './utils/logger.js';
import type { Collection, Tour } from '../../types/index.js';
import { mergeInto } from '../../utils/deduplication.js';
import { isCollectionEnhanced } from '../../utils/classification.js';
import { collectionSlug } from '../../utils/slug.js';
import { pagePoolSize } from '../../utils/concurrency.js';
import { errorMessage } from '../../utils/errors.js';

export type PageFetcher = Pick<HttpClient, 'fetch'>;

export interface KomootCrawlerConfig {
  webBaseUrl?: string;
  maxPages?: number;
  pageSizes?: number[];
  poolMax?: number;
  /** Random pause between page waves, [min, max] ms */
  delayBetweenWaves?: [number, number] | null;
}

export interface FetchCollectionOptions {
  signal?: AbortSignal;
  /** Fallback owner when the page names none */
  ownerId?: string;
  type?: Collection['type'];
}

export type UserCollectionKind = 'personal' | 'saved';

// Stop after this many consecutive pages that add no new tour ids
const MAX_CONSECUTIVE_EMPTY = 2;

export function collectionIdFromUrl(url: string): string | undefined {
  return url.match(/\/collection\/(\d+)/)?.[1];
}

export function userIdFromUrl(url: string): string | undefined {
  return url.match(/\/user\/([^/?#]+)/)?.[1];
}

export class KomootCrawler {
  private httpClient: PageFetcher;
  private parser: KomootParser;
  private logger: Logger;
  private config: Required<KomootCrawlerConfig>;

  constructor(httpClient: PageFetcher, config: KomootCrawlerConfig = {}, parser: KomootParser = new KomootParser()) {
    this.httpClient = httpClient;
    this.parser = parser;
    this.logger = new Logger('KomootCrawler');
    this.config = {
      webBaseUrl: config.webBaseUrl || 'https://www.komoot.com',
      maxPages: config.maxPages || 20,
      pageSizes: config.pageSizes || [50, 100, 200, 300, 500],
      poolMax: config.poolMax || 8,
      delayBetweenWaves: config.delayBetweenWaves ?? null,
    };
  }

  private variantUrl(baseUrl: string, param: 'page' | 'size', value: number): string {
    const url = new URL(baseUrl);
    url.searchParams.set(param, String(value));
    return url.toString();
  }

  /**
   * Fetches and parses one candidate page. A failed page yields no tours.
   */
  private async fetchPage(url: string, signal?: AbortSignal): Promise<Tour[]> {
    try {
      const html = await this.httpClient.fetch(url, { signal, referer: this.config.webBaseUrl });
      return this.parser.parseTourCards(html, this.config.webBaseUrl);
    } catch (error) {
      this.logger.warn(`Failed to fetch ${url}:`, errorMessage(error));
      return [];
    }
  }

  /**
   * Merges a page into the running set, returns how many ids were new
   */
  private absorb(records: Map<string, Tour>, tours: Tour[]): number {
    let added = 0;
    for (const tour of tours) {
      if (mergeInto(records, tour)) added++;
    }
    return added;
  }

  /**
   * Fetches a collection with as many tours as the pagination variants give up.
   * The base page is required; every other page is best effort.
   */
  async fetchCollection(collectionUrl: string, options: FetchCollectionOptions = {}): Promise<Collection> {
    const baseUrl = collectionUrl.split(/[?#]/)[0].replace(/\/+$/, '');
    const collectionId = collectionIdFromUrl(baseUrl);
    this.logger.info(`Fetching collection ${collectionId ?? baseUrl}`);

    const html = await this.httpClient.fetch(baseUrl, { signal: options.signal, referer: this.config.webBaseUrl });
    const meta = this.parser.parseCollectionMeta(html);
    const records = new Map<string, Tour>();
    this.absorb(records, this.parser.parseTourCards(html, this.config.webBaseUrl));

    const expected = meta.expectedTourCount;
    const reachedExpected = () => expected !== undefined && records.size >= expected;
    const poolSize = pagePoolSize(expected, this.config.poolMax);
    const limit = pLimit(poolSize);

    if (reachedExpected()) {
      this.logger.info(`Base page holds all ${expected} tours, skipping pagination`);
    } else {
      // Size hints: one wave, all variants
      const sizePages = await Promise.all(
        this.config.pageSizes.map(size => limit(() => this.fetchPage(this.variantUrl(baseUrl, 'size', size), options.signal)))
      );
      for (const tours of sizePages) {
        this.absorb(records, tours);
      }

      if (!reachedExpected()) {
        await this.paginate(baseUrl, records, poolSize, reachedExpected, options.signal);
      }
    }

    const tours = Array.from(records.values());
    const creator = meta.creator ?? (options.ownerId ? { id: options.ownerId } : undefined);
    const collection: Collection = {
      ...(collectionId ? { id: collectionId } : {}),
      name: meta.name || (collectionId ? `Collection ${collectionId}` : 'Collection'),
      url: baseUrl,
      tours,
      is_enhanced: isCollectionEnhanced(tours),
    };
    collection.slug = collectionSlug(collection);
    if (meta.description) collection.description = meta.description;
    if (meta.coverImage) collection.cover_image = meta.coverImage;
    if (creator) collection.creator = creator;
    if (options.type) collection.type = options.type;
    if (expected !== undefined) collection.expected_tour_count = expected;

    this.logger.success(`Collection "${collection.name}": ${tours.length} tours${expected !== undefined ? ` of ${expected}` : ''}`);
    return collection;
  }

  /**
   * page=2..maxPages in waves of the pool size. Results are evaluated in page
   * order after each wave.
   */
  private async paginate(
    baseUrl: string,
    records: Map<string, Tour>,
    poolSize: number,
    reachedExpected: () => boolean,
    signal?: AbortSignal
  ): Promise<void> {
    const limit = pLimit(poolSize);
    let consecutiveEmpty = 0;
    let nextPage = 2;

    while (nextPage <= this.config.maxPages) {
      if (signal?.aborted) return;

      const wave: number[] = [];
      for (let page = nextPage; page <= this.config.maxPages && wave.length < poolSize; page++) {
        wave.push(page);
      }
      nextPage += wave.length;

      const pages = await Promise.all(
        wave.map(page => limit(() => this.fetchPage(this.variantUrl(baseUrl, 'page', page), signal)))
      );

      let stop = false;
      pages.forEach((tours, index) => {
        const added = this.absorb(records, tours);
        if (stop) return;
        if (added === 0) {
          consecutiveEmpty++;
          if (consecutiveEmpty >= MAX_CONSECUTIVE_EMPTY) {
            this.logger.info(`Stopping at page ${wave[index]}: ${MAX_CONSECUTIVE_EMPTY} pages without new tours`);
            stop = true;
          }
        } else {
          consecutiveEmpty = 0;
        }
      });

      if (stop || reachedExpected()) return;

      if (this.config.delayBetweenWaves) {
        await randomDelay(...this.config.delayBetweenWaves);
      }
    }
  }

  /**
   * Collection links from /user/{id}/collections/{personal|saved}
   */
  async fetchUserCollectionLinks(userId: string, kind: UserCollectionKind, signal?: AbortSignal): Promise<CollectionLink[]> {
    const url = `${this.config.webBaseUrl}/user/${encodeURIComponent(userId)}/collections/${kind}`;
    const html = await this.httpClient.fetch(url, { signal, referer: this.config.webBaseUrl });
    const links = this.parser.parseCollectionLinks(html, this.config.webBaseUrl);
    this.logger.info(`Found ${links.length} ${kind} collections for user ${userId}`);
    return links;
  }

  /**
   * Expands a user collections page into its links; a collection URL stays as is
   */
  async expandPublicUrl(url: string, signal?: AbortSignal): Promise<CollectionLink[]> {
    const collectionId = collectionIdFromUrl(url);
    if (collectionId) {
      return [{ id: collectionId, url: url.split(/[?#]/)[0].replace(/\/+$/, '') }];
    }

    const html = await this.httpClient.fetch(url, { signal, referer: this.config.webBaseUrl });
    return this.parser.parseCollectionLinks(html, this.config.webBaseUrl);
  }
}
