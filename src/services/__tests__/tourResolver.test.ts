import { describe, it, expect, vi } from 'vitest';
import { TourResolver, type TourStrategy } from '../tourResolver.js';
import { createDefaultStrategies, GpxExportStrategy, PageScrapeStrategy } from '../tourStrategies.js';
import { KomootApi, type ApiFetcher } from '../../crawler/komoot/komootApi.js';
import { KomootParser } from '../../crawler/komoot/komootParser.js';
import type { PageFetcher } from '../../crawler/komoot/komootCrawler.js';
import { ResolutionError } from '../../utils/errors.js';
import type { Tour } from '../../types/index.js';

function strategy(name: string, result: Partial<Tour> | Error) {
  const resolve = vi.fn(async (tourId: string): Promise<Tour> => {
    if (result instanceof Error) throw result;
    return { ...result, id: tourId };
  });
  const fake: TourStrategy = { name, resolve };
  return { fake, resolve };
}

describe('TourResolver', () => {
  it('moves past failing strategies and stops once the record is enhanced', async () => {
    const a = strategy('a', new Error('boom'));
    const b = strategy('b', { name: 'Ridge', distance_km: 3 });
    const c = strategy('c', { name: 'Never' });
    const resolver = new TourResolver([a.fake, b.fake, c.fake]);

    const resolved = await resolver.resolve('5', { anonymous: true });

    expect(resolved).toEqual({
      tour: { id: '5', name: 'Ridge', distance_km: 3 },
      source: 'b',
      failures: [{ strategy: 'a', message: 'boom' }],
    });
    expect(c.resolve).not.toHaveBeenCalled();
  });

  it('keeps going until a track is found when one is required', async () => {
    const a = strategy('a', { name: 'Ridge' });
    const b = strategy('b', { track_points: [{ lat: 1, lon: 2 }] });
    const resolver = new TourResolver([a.fake, b.fake]);

    const resolved = await resolver.resolve('5', { anonymous: true, requireTrack: true });

    expect(resolved.tour).toEqual({ id: '5', name: 'Ridge', track_points: [{ lat: 1, lon: 2 }] });
    expect(resolved.source).toBe('b');
    expect(b.resolve).toHaveBeenCalledTimes(1);
  });

  it('returns an enhanced seed without calling any strategy', async () => {
    const a = strategy('a', { name: 'Other' });
    const resolver = new TourResolver([a.fake]);

    const resolved = await resolver.resolve('5', { anonymous: true, seed: { id: '5', name: 'Known', distance_km: 4 } });

    expect(resolved).toEqual({ tour: { id: '5', name: 'Known', distance_km: 4 }, source: 'seed', failures: [] });
    expect(a.resolve).not.toHaveBeenCalled();
  });

  it('raises ResolutionError only when every strategy failed', async () => {
    const resolver = new TourResolver([strategy('a', new Error('down')).fake, strategy('b', new Error('gone')).fake]);

    const error = await resolver.resolve('5', { anonymous: true }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ResolutionError);
    if (error instanceof ResolutionError) {
      expect(error.tourId).toBe('5');
      expect(error.failures.map(f => f.strategy)).toEqual(['a', 'b']);
      expect(error.message).toBe('Could not resolve tour 5 (a: down; b: gone)');
    }
  });

  it('keeps the best partial record when no strategy is sufficient', async () => {
    const resolver = new TourResolver([strategy('a', { date: '2024-01-01' }).fake, strategy('b', new Error('nope')).fake]);

    const resolved = await resolver.resolve('5', { anonymous: true });

    expect(resolved.tour).toEqual({ id: '5', date: '2024-01-01' });
    expect(resolved.source).toBe('a');
    expect(resolved.failures).toEqual([{ strategy: 'b', message: 'nope' }]);
  });

  it('stops before the first strategy when the job is cancelled', async () => {
    const a = strategy('a', { name: 'Ridge' });
    const controller = new AbortController();
    controller.abort();

    const resolved = await new TourResolver([a.fake]).resolve('5', { anonymous: true, signal: controller.signal });

    expect(resolved).toEqual({ tour: { id: '5' }, source: 'none', failures: [] });
    expect(a.resolve).not.toHaveBeenCalled();
  });
});

describe('tour strategies', () => {
  const CONFIG = { apiBaseUrl: 'https://api.komoot.de', webBaseUrl: 'https://www.komoot.com' };

  function api(gpx: string): KomootApi {
    const http: ApiFetcher = {
      getJson: async () => ({}),
      fetch: async () => gpx,
    };
    return new KomootApi(http, CONFIG);
  }

  it('reads the track from the GPX export', async () => {
    const gpx = '<gpx><trk><trkseg><trkpt lat="1" lon="2"><ele>5</ele></trkpt></trkseg></trk></gpx>';

    await expect(new GpxExportStrategy(api(gpx)).resolve('5', { anonymous: true })).resolves.toEqual({
      id: '5',
      track_points: [{ lat: 1, lon: 2, elevation: 5 }],
    });
  });

  it('keeps the GPX track name and description, which lifts the tour out of basic', async () => {
    const gpx =
      '<gpx><metadata><name>Morning Ridge Ride</name><desc>Early climb</desc></metadata>' +
      '<trk><name>Morning Ridge Ride</name><trkseg><trkpt lat="1" lon="2"></trkpt></trkseg></trk></gpx>';
    const later = strategy('later', { name: 'Other' });
    const resolver = new TourResolver([new GpxExportStrategy(api(gpx)), later.fake]);

    const resolved = await resolver.resolve('55', { anonymous: true });

    expect(resolved.source).toBe('gpx-export');
    expect(resolved.tour).toEqual({
      id: '55',
      name: 'Morning Ridge Ride',
      description: 'Early climb',
      track_points: [{ lat: 1, lon: 2 }],
    });
    expect(later.resolve).not.toHaveBeenCalled();
  });

  it('ignores a placeholder GPX track name', async () => {
    const gpx = '<gpx><trk><name>Tour 55</name><trkseg><trkpt lat="1" lon="2"></trkpt></trkseg></trk></gpx>';

    const tour = await new GpxExportStrategy(api(gpx)).resolve('55', { anonymous: true });

    expect(tour).toEqual({ id: '55', track_points: [{ lat: 1, lon: 2 }] });
  });

  it('drops a placeholder title scraped from the tour page', async () => {
    const http: PageFetcher = {
      fetch: async () => '<html><head><meta property="og:title" content="Tour 5 | komoot"></head><body></body></html>',
    };
    const scrape = new PageScrapeStrategy(http, new KomootParser(), CONFIG.webBaseUrl);

    const tour = await scrape.resolve('5', { anonymous: true });

    expect(tour.name).toBeUndefined();
    expect(tour.url).toBe('https://www.komoot.com/tour/5');
  });

  it('orders the default strategies richest first', () => {
    const deps = {
      api: api(''),
      http: { fetch: async () => '' },
      parser: new KomootParser(),
      webBaseUrl: CONFIG.webBaseUrl,
    };

    expect(createDefaultStrategies({ ...deps, detailedTourApi: true }).map(s => s.name))
      .toEqual(['detailed-api', 'gpx-export', 'page-scrape', 'gpx-shell']);
    expect(createDefaultStrategies({ ...deps, detailedTourApi: false }).map(s => s.name))
      .toEqual(['gpx-export', 'page-scrape', 'gpx-shell']);
  });
});
