// Retrieval strategies for the tour resolver, richest first

import type { KomootApi } from '../crawler/komoot/komootApi.js';
import type { KomootParser } from '../crawler/komoot/komootParser.js';
import type { PageFetcher } from '../crawler/komoot/komootCrawler.js';
import type { Tour } from '../types/index.js';
import { hasPlaceholderName } from '../utils/classification.js';
import { parseGpx } from '../utils/gpx.js';
import type { ResolveContext, TourStrategy } from './tourResolver.js';

/**
 * Detailed tour API: metadata, track, highlights, tips and images
 */
export class DetailedApiStrategy implements TourStrategy {
  readonly name = 'detailed-api';

  constructor(private api: KomootApi) {}

  resolve(tourId: string, context: ResolveContext): Promise<Tour> {
    return this.api.fetchTourDetails(tourId, context.anonymous ? undefined : context.auth, context.signal);
  }
}

/**
 * Anonymous GPX export: geometry, waypoints and the track name
 */
export class GpxExportStrategy implements TourStrategy {
  readonly name = 'gpx-export';

  constructor(private api: KomootApi) {}

  async resolve(tourId: string, context: ResolveContext): Promise<Tour> {
    const parsed = parseGpx(await this.api.fetchGpx(tourId, context.signal));
    const tour: Tour = { id: tourId, track_points: parsed.track_points };
    if (parsed.name !== undefined && !hasPlaceholderName({ id: tourId, name: parsed.name })) {
      tour.name = parsed.name;
    }
    if (parsed.description !== undefined) tour.description = parsed.description;
    if (parsed.pois.length > 0) tour.pois = parsed.pois;
    return tour;
  }
}

/**
 * Tour page scrape through the HTML extractor
 */
export class PageScrapeStrategy implements TourStrategy {
  readonly name = 'page-scrape';

  constructor(
    private http: PageFetcher,
    private parser: KomootParser,
    private webBaseUrl: string
  ) {}

  async resolve(tourId: string, context: ResolveContext): Promise<Tour> {
    const url = `${this.webBaseUrl}/tour/${tourId}`;
    const html = await this.http.fetch(url, { signal: context.signal, referer: this.webBaseUrl });
    const tour = this.parser.parseTourPage(html, tourId, this.webBaseUrl);
    if (tour.name !== undefined && hasPlaceholderName(tour)) {
      delete tour.name;
    }
    return tour;
  }
}

/**
 * Last resort: the id alone, so a GPX shell can always be written
 */
export class GpxShellStrategy implements TourStrategy {
  readonly name = 'gpx-shell';

  async resolve(tourId: string): Promise<Tour> {
    return { id: tourId };
  }
}

export interface StrategyDeps {
  api: KomootApi;
  http: PageFetcher;
  parser: KomootParser;
  webBaseUrl: string;
  /** Capability flag, resolved once at startup */
  detailedTourApi: boolean;
}

export function createDefaultStrategies(deps: StrategyDeps): TourStrategy[] {
  return [
    ...(deps.detailedTourApi ? [new DetailedApiStrategy(deps.api)] : []),
    new GpxExportStrategy(deps.api),
    new PageScrapeStrategy(deps.http, deps.parser, deps.webBaseUrl),
    new GpxShellStrategy(),
  ];
}
