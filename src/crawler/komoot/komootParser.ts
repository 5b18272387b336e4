/**
 * Parser for komoot collection, user and tour pages
 * Recovers partial tour records from listing markup that changes without notice
 */

import * as cheerio from 'cheerio';
import type { AnyNode, Element } from 'domhandler';
import { Logger } from './utils/logger.js';
import type { CreatorRef, Tour } from '../../types/index.js';
import { placeholderName } from '../../utils/classification.js';

/**
 * Alternative markers for "a tour card", most specific first.
 * Page structure varies between deployments, so all of them are tried.
 */
export const TOUR_CARD_SELECTORS = [
  '[data-testid^="tour_item_"]',
  'div.tour-card',
  '.collection-tour-card',
  'a[href*="/tour/"]',
  '.tw-mb-8',
  'div[role="listitem"]',
  'li.tw-flex',
] as const;

export interface CollectionPageMeta {
  name?: string;
  description?: string;
  creator?: CreatorRef;
  coverImage?: string;
  expectedTourCount?: number;
}

export interface CollectionLink {
  id: string;
  url: string;
  name?: string;
}

const TOUR_ID_PATTERN = /\/tour\/(\d+)/;
const MI_TO_KM = 1.609344;

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

// Sport words seen in card text, mapped to one label per sport
const SPORT_WORDS: Array<[RegExp, string]> = [
  [/\b(mountain bik\w*|mtb)\b/i, 'mtb'],
  [/\b(gravel)\b/i, 'gravel'],
  [/\b(road (bike|cycling|ride))\b/i, 'racebike'],
  [/\b(bike ride|cycling|bike touring)\b/i, 'touringbicycle'],
  [/\b(running|run|jogging)\b/i, 'jogging'],
  [/\b(mountaineering|climb\w*)\b/i, 'mountaineering'],
  [/\b(hik\w*|walk\w*)\b/i, 'hike'],
];

function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Parses "12.5", "1,234.5" and "12,5" style numbers
 */
export function parseLocaleNumber(raw: string): number | undefined {
  let value = raw.trim();
  if (value.includes(',') && value.includes('.')) {
    value = value.replace(/,/g, '');
  } else if (/^\d{1,3}(,\d{3})+$/.test(value)) {
    value = value.replace(/,/g, '');
  } else {
    value = value.replace(',', '.');
  }
  const parsed = parseFloat(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function parseDistanceKm(text: string): number | undefined {
  const match = text.match(/([\d.,]+)\s*(km|mi)\b/i);
  if (!match) return undefined;
  const value = parseLocaleNumber(match[1]);
  if (value === undefined) return undefined;
  const km = match[2].toLowerCase() === 'mi' ? value * MI_TO_KM : value;
  return Math.round(km * 100) / 100;
}

/**
 * Total minutes from "2h 30min", "45min", "3h" or "02:30 h".
 * Hours and minutes are matched independently; neither found means undefined.
 */
export function parseDurationMinutes(text: string): number | undefined {
  const clock = text.match(/\b(\d{1,2}):(\d{2})\s*h\b/i);
  if (clock) {
    return parseInt(clock[1], 10) * 60 + parseInt(clock[2], 10);
  }

  const hours = text.match(/(\d+)\s*h\b/i);
  const minutes = text.match(/(\d+)\s*min\b/i);
  if (!hours && !minutes) return undefined;
  return (hours ? parseInt(hours[1], 10) * 60 : 0) + (minutes ? parseInt(minutes[1], 10) : 0);
}

function parseElevation(text: string, arrow: '↑' | '↓', word: 'up' | 'down'): number | undefined {
  const arrowMatch = text.match(new RegExp(`${arrow}\\s*([\\d.,]+)\\s*m\\b`));
  const wordMatch = arrowMatch ? null : text.match(new RegExp(`([\\d.,]+)\\s*m\\s*${word}\\b`, 'i'));
  const raw = arrowMatch?.[1] ?? wordMatch?.[1];
  if (raw === undefined) return undefined;
  const value = parseLocaleNumber(raw);
  return value === undefined ? undefined : Math.round(value);
}

/**
 * Date as YYYY-MM-DD from ISO, dd.mm.yyyy or "May 1, 2024" text
 */
export function parseDate(text: string): string | undefined {
  const iso = text.match(/\b(\d{4})-(\d{2})-(\d{2})(?!\d)/);
  if (iso) return `${iso[1]}-${iso[2]}-${iso[3]}`;

  const dotted = text.match(/\b(\d{1,2})\.(\d{1,2})\.(\d{4})\b/);
  if (dotted) {
    return `${dotted[3]}-${dotted[2].padStart(2, '0')}-${dotted[1].padStart(2, '0')}`;
  }

  const named = text.match(/\b(Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)[a-z]*\.?\s+(\d{1,2}),?\s+(\d{4})\b/i);
  if (named) {
    const month = MONTHS[named[1].toLowerCase()];
    return `${named[3]}-${String(month).padStart(2, '0')}-${named[2].padStart(2, '0')}`;
  }

  return undefined;
}

function parsePercentage(text: string, label: string): number | undefined {
  const match = text.match(new RegExp(`(\\d+(?:[.,]\\d+)?)\\s*%\\s*${label}`, 'i'));
  return match ? parseLocaleNumber(match[1]) : undefined;
}

function parseSport(text: string): string | undefined {
  for (const [pattern, sport] of SPORT_WORDS) {
    if (pattern.test(text)) return sport;
  }
  return undefined;
}

function absoluteUrl(href: string, baseUrl: string): string {
  if (href.startsWith('http://') || href.startsWith('https://')) return href;
  if (href.startsWith('//')) return `https:${href}`;
  return `${baseUrl}${href.startsWith('/') ? '' : '/'}${href}`;
}

export class KomootParser {
  private logger: Logger;

  constructor() {
    this.logger = new Logger('KomootParser');
  }

  /**
   * Distinct tour ids a fragment refers to, own href first
   */
  private tourIdsIn($: cheerio.CheerioAPI, element: Element): string[] {
    const ids = new Set<string>();
    const $el = $(element);
    const testId = $el.attr('data-testid')?.match(/^tour_item_(\d+)/);
    if (testId) ids.add(testId[1]);

    const hrefs = [$el.attr('href'), ...$el.find('a[href*="/tour/"]').map((_, a) => $(a).attr('href')).get()];
    for (const href of hrefs) {
      const match = href?.match(TOUR_ID_PATTERN);
      if (match) ids.add(match[1]);
    }
    return Array.from(ids);
  }

  private cardName($: cheerio.CheerioAPI, element: Element): string | undefined {
    const $card = $(element);
    const candidates = [
      $card.find('[data-testid="tour_name"], [data-testid="tour-name"]').first().text(),
      $card.find('h2, h3, h4').first().text(),
      $card.find('.tour-name, [class*="title"]').first().text(),
      $card.attr('title'),
      $card.find('a[href*="/tour/"]').first().attr('title'),
      $card.is('a') ? $card.text() : $card.find('a[href*="/tour/"]').first().text(),
    ];

    for (const candidate of candidates) {
      const name = candidate ? normalizeWhitespace(candidate) : '';
      // Link text that is only stats is not a name
      if (name && parseDistanceKm(name) === undefined && parseDurationMinutes(name) === undefined) {
        return name;
      }
    }
    return undefined;
  }

  private cardImage($: cheerio.CheerioAPI, element: Element, baseUrl: string): string | undefined {
    const $img = $(element).find('img').first();
    const src = $img.attr('src') || $img.attr('data-src') || $img.attr('srcset')?.split(',')[0]?.trim().split(/\s+/)[0];
    if (!src || src.startsWith('data:')) return undefined;
    return absoluteUrl(src, baseUrl);
  }

  /**
   * Extracts one partial record from a card fragment.
   * The id is mandatory; every other field is optional and parsed on its own.
   */
  private parseCard($: cheerio.CheerioAPI, element: Element, tourId: string, baseUrl: string): Tour | null {
    try {
      const $card = $(element);
      const text = normalizeWhitespace($card.text());
      const name = this.cardName($, element);

      const tour: Tour = {
        id: tourId,
        name: name ?? placeholderName(tourId),
        url: `${baseUrl}/tour/${tourId}`,
      };

      const fields: Partial<Tour> = {
        distance_km: parseDistanceKm(text),
        duration: parseDurationMinutes(text),
        elevation_up: parseElevation(text, '↑', 'up'),
        elevation_down: parseElevation(text, '↓', 'down'),
        date: parseDate($card.find('time').first().attr('datetime') ?? '') ?? parseDate(text),
        sport: parseSport(text),
        unpaved_percentage: parsePercentage(text, 'unpaved'),
        singletrack_percentage: parsePercentage(text, 'singletrack'),
        rideable_percentage: parsePercentage(text, 'rideable'),
        image_url: this.cardImage($, element, baseUrl),
        creator: normalizeWhitespace($card.find('a[href*="/user/"]').first().text()) || undefined,
        region: normalizeWhitespace($card.find('[data-testid="tour_region"], .tour-region').first().text()) || undefined,
      };

      for (const [key, value] of Object.entries(fields)) {
        if (value === undefined) {
          this.logger.debug(`Tour ${tourId}: no ${key} in card`);
        }
      }

      return { ...tour, ...stripUndefined(fields) };
    } catch (error) {
      this.logger.error(`Error parsing tour card ${tourId}:`, error);
      return null;
    }
  }

  /**
   * Parses every tour card on a page.
   *
   * All selectors run. The first selector to match a tour id owns that tour's
   * fields; later selectors only fill fields it left absent. Records come back
   * in document order of their first matching fragment. Fragments that refer
   * to several tours (list wrappers) are skipped.
   */
  parseTourCards(html: string, baseUrl: string = 'https://www.komoot.com'): Tour[] {
    try {
      const $ = cheerio.load(html);
      const position = new Map<AnyNode, number>();
      $('*').each((index, element) => {
        position.set(element, index);
      });

      const records = new Map<string, { tour: Tour; order: number }>();

      for (const selector of TOUR_CARD_SELECTORS) {
        let matched = 0;
        $(selector).each((_, element) => {
          const ids = this.tourIdsIn($, element);
          if (ids.length !== 1) return;

          const parsed = this.parseCard($, element, ids[0], baseUrl);
          if (!parsed) return;
          matched++;

          const existing = records.get(parsed.id);
          if (!existing) {
            records.set(parsed.id, { tour: parsed, order: position.get(element) ?? 0 });
            return;
          }
          existing.tour = fillAbsent(existing.tour, parsed);
        });

        if (matched > 0) {
          this.logger.debug(`Selector ${selector}: ${matched} card(s)`);
        }
      }

      const tours = Array.from(records.values())
        .sort((a, b) => a.order - b.order)
        .map(entry => entry.tour);
      this.logger.debug(`Parsed ${tours.length} tours from page`);
      return tours;
    } catch (error) {
      this.logger.error('Error parsing HTML:', error);
      return [];
    }
  }

  /**
   * Collection title, description, owner, cover image and advertised size
   */
  parseCollectionMeta(html: string): CollectionPageMeta {
    const $ = cheerio.load(html);
    const meta: CollectionPageMeta = {};

    const ogTitle = $('meta[property="og:title"]').attr('content');
    const name = normalizeWhitespace($('h1').first().text()) || cleanTitle(ogTitle) || cleanTitle($('title').text());
    if (name) meta.name = name;

    const metaDescription = $('meta[name="description"]').attr('content') || $('meta[property="og:description"]').attr('content');
    const description =
      normalizeWhitespace($('[data-testid="collection-description"], .collection-description').first().text()) ||
      normalizeWhitespace(metaDescription ?? '');
    if (description) meta.description = description;

    const $creator = $('a[href*="/user/"]').first();
    const creatorId = $creator.attr('href')?.match(/\/user\/([^/?#]+)/)?.[1];
    const creatorName = normalizeWhitespace($creator.text());
    if (creatorId || creatorName) {
      meta.creator = {
        ...(creatorId ? { id: creatorId } : {}),
        ...(creatorName ? { name: creatorName } : {}),
      };
    }

    const cover =
      $('meta[property="og:image"]').attr('content') ||
      $('[data-testid="collection-cover"] img, .collection-cover img').first().attr('src');
    if (cover) meta.coverImage = cover;

    const countSources = [
      $('[data-testid="collection-stats"], .collection-stats').text(),
      metaDescription ?? '',
      $('body').text(),
    ];
    for (const source of countSources) {
      const match = source.match(/(\d[\d,.]*)\s+(?:routes|tours|touren)\b/i);
      if (match) {
        const count = parseInt(match[1].replace(/[,.]/g, ''), 10);
        if (Number.isFinite(count)) {
          meta.expectedTourCount = count;
          break;
        }
      }
    }

    return meta;
  }

  /**
   * /collection/{id} links on a user's collections page, first occurrence wins
   */
  parseCollectionLinks(html: string, baseUrl: string = 'https://www.komoot.com'): CollectionLink[] {
    const $ = cheerio.load(html);
    const links = new Map<string, CollectionLink>();

    $('a[href*="/collection/"]').each((_, element) => {
      const href = $(element).attr('href') ?? '';
      const match = href.match(/\/collection\/(\d+)(\/[^?#]*)?/);
      if (!match || links.has(match[1])) return;

      const name = normalizeWhitespace($(element).text());
      links.set(match[1], {
        id: match[1],
        url: absoluteUrl(`/collection/${match[1]}${match[2] ?? ''}`, baseUrl).replace(/\/+$/, ''),
        ...(name ? { name } : {}),
      });
    });

    return Array.from(links.values());
  }

  /**
   * Best-effort record from a tour's own page
   */
  parseTourPage(html: string, tourId: string, baseUrl: string = 'https://www.komoot.com'): Tour {
    const $ = cheerio.load(html);
    const tour: Tour = { id: tourId, url: `${baseUrl}/tour/${tourId}` };

    const name = cleanTitle($('meta[property="og:title"]').attr('content')) || normalizeWhitespace($('h1').first().text());
    if (name) tour.name = name;

    const image = $('meta[property="og:image"]').attr('content');
    if (image) tour.image_url = image;

    const description = normalizeWhitespace(
      $('meta[name="description"]').attr('content') || $('meta[property="og:description"]').attr('content') || ''
    );
    if (description) tour.description = description;

    const statsText = normalizeWhitespace(
      $('[data-testid="tour-stats"], [data-test-id="tour-stats"], .tour-stats').text() || $('main').text() || description
    );

    return {
      ...tour,
      ...stripUndefined({
        distance_km: parseDistanceKm(statsText),
        duration: parseDurationMinutes(statsText),
        elevation_up: parseElevation(statsText, '↑', 'up'),
        elevation_down: parseElevation(statsText, '↓', 'down'),
        date: parseDate($('time').first().attr('datetime') ?? '') ?? parseDate(statsText),
        sport: parseSport(`${name} ${description}`),
      }),
    };
  }
}

function cleanTitle(title: string | undefined): string {
  if (!title) return '';
  return normalizeWhitespace(title.split(' | ')[0]);
}

function stripUndefined<T extends object>(fields: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key in fields) {
    if (fields[key] !== undefined) result[key] = fields[key];
  }
  return result;
}

/**
 * Copies fields of `extra` that `base` lacks; `base` keeps what it has
 */
function fillAbsent(base: Tour, extra: Tour): Tour {
  const filled: Tour = { ...extra, ...stripUndefined(base), id: base.id };
  if (base.name === placeholderName(base.id) && extra.name && extra.name !== placeholderName(base.id)) {
    filled.name = extra.name;
  }
  return filled;
}
