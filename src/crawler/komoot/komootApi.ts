/**
 * Client for the komoot account and tour JSON API
 */

import type { HttpClient } from './utils/httpClient.js';
import { Logger } from './utils/logger.js';
import {
  loginResponseSchema,
  tourDetailSchema,
  toursPageSchema,
  type TimelineReference,
  type TourDetailPayload,
  type TourSummaryPayload,
} from './komootSchemas.js';
import type { AuthContext, Highlight, PointOfInterest, Tour, TourFilter, TrackPoint } from '../../types/index.js';

export type ApiFetcher = Pick<HttpClient, 'getJson' | 'fetch'>;

export interface KomootApiConfig {
  apiBaseUrl: string;
  webBaseUrl: string;
}

const DETAIL_QUERY =
  '_embedded=coordinates,way_types,surfaces,directions,participants,timeline' +
  '&directions=v2&fields=timeline&format=coordinate_array&timeline_highlights_fields=tips,recommenders';

const PAVED_SURFACES = new Set(['sf#asphalt', 'sf#paved', 'sf#concrete', 'sf#paving_stones', 'sf#cobbles', 'sf#cobblestone']);

// Maximum pages read from the tour listing, 100 tours each
const MAX_TOUR_PAGES = 200;

function basicAuth(auth: AuthContext): { username: string; password: string } {
  return { username: auth.userId, password: auth.token };
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Image URLs come templated ("...?width={width}&crop={crop}"); drop the template
 */
export function cleanImageUrl(src: string): string {
  return src.includes('{') ? src.split('?')[0] : src;
}

export function mapTourType(type: string | undefined): Tour['type'] {
  if (type === 'tour_recorded') return 'recorded';
  if (type === 'tour_planned') return 'planned';
  return undefined;
}

export class KomootApi {
  private http: ApiFetcher;
  private config: KomootApiConfig;
  private logger: Logger;

  constructor(http: ApiFetcher, config: KomootApiConfig) {
    this.http = http;
    this.config = config;
    this.logger = new Logger('KomootApi');
  }

  tourUrl(tourId: string): string {
    return `${this.config.webBaseUrl}/tour/${tourId}`;
  }

  /**
   * Signs in with e-mail and password. The returned user id and session
   * token authenticate every later request.
   */
  async login(email: string, password: string, signal?: AbortSignal): Promise<AuthContext> {
    const url = `${this.config.apiBaseUrl}/v006/account/email/${encodeURIComponent(email)}/`;
    const payload = loginResponseSchema.parse(
      await this.http.getJson(url, { auth: { username: email, password }, maxRetries: 1, signal })
    );

    const auth: AuthContext = {
      userId: payload.username,
      token: payload.password,
      displayName: payload.user?.displayname ?? payload.username,
    };
    this.logger.info(`Logged in as ${auth.displayName} (${auth.userId})`);
    return auth;
  }

  summaryToTour(summary: TourSummaryPayload): Tour {
    const tour: Tour = { id: summary.id, url: this.tourUrl(summary.id) };
    if (summary.name) tour.name = summary.name;
    if (summary.sport) tour.sport = summary.sport;
    if (summary.date) tour.date = summary.date;
    const type = mapTourType(summary.type);
    if (type) tour.type = type;
    if (summary.distance !== undefined) tour.distance_km = round(summary.distance / 1000, 2);
    if (summary.duration !== undefined) tour.duration = Math.round(summary.duration / 60);
    if (summary.elevation_up !== undefined) tour.elevation_up = Math.round(summary.elevation_up);
    if (summary.elevation_down !== undefined) tour.elevation_down = Math.round(summary.elevation_down);
    return tour;
  }

  /**
   * Lists the account's tours, following the page links to the end
   */
  async fetchTours(auth: AuthContext, filter: TourFilter = 'all', signal?: AbortSignal): Promise<Tour[]> {
    const tours: Tour[] = [];
    const params: Record<string, string | number> = { limit: 100 };
    if (filter === 'recorded') params.type = 'tour_recorded';
    if (filter === 'planned') params.type = 'tour_planned';

    let page = 0;
    let totalPages = 1;
    while (page < totalPages && page < MAX_TOUR_PAGES) {
      const url = `${this.config.apiBaseUrl}/v007/users/${encodeURIComponent(auth.userId)}/tours/`;
      const payload = toursPageSchema.parse(
        await this.http.getJson(url, { auth: basicAuth(auth), params: { ...params, page }, signal })
      );

      const items = payload._embedded?.tours ?? [];
      for (const item of items) {
        const tour = this.summaryToTour(item);
        if (filter === 'all' || tour.type === filter) {
          tours.push(tour);
        }
      }

      totalPages = payload.page?.totalPages ?? 0;
      page++;
      if (items.length === 0) break;
    }

    this.logger.info(`Found ${tours.length} ${filter} tours`);
    return tours;
  }

  /**
   * Full tour record: track, highlights with tips and images, POIs, surfaces
   */
  async fetchTourDetails(tourId: string, auth?: AuthContext, signal?: AbortSignal): Promise<Tour> {
    const url = `${this.config.apiBaseUrl}/v007/tours/${encodeURIComponent(tourId)}?${DETAIL_QUERY}`;
    const payload = tourDetailSchema.parse(
      await this.http.getJson(url, { auth: auth ? basicAuth(auth) : undefined, signal })
    );
    return this.detailToTour(payload);
  }

  detailToTour(payload: TourDetailPayload): Tour {
    const tour = this.summaryToTour(payload);
    const embedded = payload._embedded;
    const start = payload.date ? Date.parse(payload.date) : NaN;

    const points: TrackPoint[] = (embedded?.coordinates?.items ?? []).map(item => {
      const point: TrackPoint = { lat: item.lat, lon: item.lng };
      if (item.alt !== undefined) point.elevation = item.alt;
      if (item.t !== undefined && Number.isFinite(start)) point.timestamp = new Date(start + item.t).toISOString();
      return point;
    });
    if (points.length > 0) {
      tour.track_points = points;
      const elevations = points.map(p => p.elevation).filter((e): e is number => e !== undefined);
      if (elevations.length > 0) tour.high_point = Math.round(Math.max(...elevations));
    }

    const highlights: Highlight[] = [];
    const pois: PointOfInterest[] = [];
    for (const item of embedded?.timeline?._embedded?.items ?? []) {
      const reference = item._embedded?.reference;
      if (!reference) continue;
      if (item.type === 'highlight') {
        highlights.push(toHighlight(reference));
      } else if (item.type === 'poi') {
        const poi = toPoi(reference);
        if (poi) pois.push(poi);
      }
    }
    if (highlights.length > 0) tour.highlights = highlights;
    if (pois.length > 0) tour.pois = pois;

    const images = highlights.flatMap(h => h.images);
    if (images.length > 0) tour.images = images;
    if (payload.map_image) tour.image_url = cleanImageUrl(payload.map_image.src);

    const surfaces = embedded?.surfaces?.items ?? [];
    if (surfaces.length > 0) {
      const paved = surfaces.filter(s => PAVED_SURFACES.has(s.type)).reduce((sum, s) => sum + s.amount, 0);
      tour.unpaved_percentage = round(Math.max(0, 1 - paved) * 100, 1);
    }
    const wayTypes = embedded?.way_types?.items ?? [];
    if (wayTypes.length > 0) {
      const singletrack = wayTypes.filter(w => /trail|singletrack|hike_d/.test(w.type)).reduce((sum, w) => sum + w.amount, 0);
      tour.singletrack_percentage = round(singletrack * 100, 1);
    }

    const creator = embedded?.creator?.display_name;
    if (creator) tour.creator = creator;

    return tour;
  }

  /**
   * Anonymous GPX export; track geometry only
   */
  async fetchGpx(tourId: string, signal?: AbortSignal): Promise<string> {
    const url = `${this.config.webBaseUrl}/api/v007/tours/${encodeURIComponent(tourId)}/gpx`;
    return this.http.fetch(url, { referer: this.tourUrl(tourId), signal });
  }
}

function toHighlight(reference: TimelineReference): Highlight {
  const location = reference.mid_point ?? reference.location;
  const tips = (reference._embedded?.tips?._embedded?.items ?? [])
    .map(tip => tip.text?.trim() ?? '')
    .filter(text => text.length > 0);
  const front = reference.front_image ?? reference._embedded?.front_image;
  const images = [
    ...(front ? [front.src] : []),
    ...(reference._embedded?.images?._embedded?.items ?? []).map(image => image.src),
  ].map(cleanImageUrl);

  return {
    id: reference.id ?? '',
    name: reference.name ?? 'Highlight',
    ...(location ? { lat: location.lat, lon: location.lng } : {}),
    tips,
    images: Array.from(new Set(images)),
  };
}

function toPoi(reference: TimelineReference): PointOfInterest | null {
  const location = reference.location ?? reference.mid_point;
  if (!location) return null;
  return {
    ...(reference.id ? { id: reference.id } : {}),
    name: reference.name ?? 'Point of interest',
    lat: location.lat,
    lon: location.lng,
    ...(reference.category ? { category: reference.category } : {}),
  };
}
