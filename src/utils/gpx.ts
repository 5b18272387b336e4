/**
 * GPX 1.1 writing and reading
 */

import * as cheerio from 'cheerio';
import type { PointOfInterest, Tour, TrackPoint } from '../types/index.js';
import { placeholderName } from './classification.js';

export interface GpxBuildOptions {
  includePoi?: boolean;
  /** -1 unlimited */
  maxDescLength?: number;
  webBaseUrl?: string;
}

export interface ParsedGpx {
  name?: string;
  description?: string;
  track_points: TrackPoint[];
  pois: PointOfInterest[];
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function truncateText(text: string, maxLength: number): string {
  if (maxLength < 0 || text.length <= maxLength) return text;
  return text.slice(0, maxLength);
}

function pointAttrs(lat: number, lon: number): string {
  return `lat="${lat}" lon="${lon}"`;
}

function buildTrackPoint(point: TrackPoint): string {
  const children: string[] = [];
  if (point.elevation !== undefined) children.push(`<ele>${point.elevation}</ele>`);
  if (point.timestamp) children.push(`<time>${escapeXml(point.timestamp)}</time>`);
  if (children.length === 0) return `      <trkpt ${pointAttrs(point.lat, point.lon)}/>`;
  return `      <trkpt ${pointAttrs(point.lat, point.lon)}>${children.join('')}</trkpt>`;
}

function buildWaypoint(poi: PointOfInterest): string {
  const lines = [`  <wpt ${pointAttrs(poi.lat, poi.lon)}>`, `    <name>${escapeXml(poi.name)}</name>`];
  if (poi.description) lines.push(`    <desc>${escapeXml(poi.description)}</desc>`);
  if (poi.category) lines.push(`    <type>${escapeXml(poi.category)}</type>`);
  lines.push('  </wpt>');
  return lines.join('\n');
}

/**
 * Builds a GPX document for a tour. A tour without track points still
 * yields a valid file with an empty track segment.
 */
export function buildGpx(tour: Tour, options: GpxBuildOptions = {}): string {
  const name = tour.name ?? placeholderName(tour.id);
  const webBaseUrl = options.webBaseUrl ?? 'https://www.komoot.com';
  const url = tour.url ?? `${webBaseUrl}/tour/${tour.id}`;
  const lines: string[] = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<gpx version="1.1" creator="tour-export-backend" xmlns="http://www.topografix.com/GPX/1/1">',
    '  <metadata>',
    `    <name>${escapeXml(name)}</name>`,
  ];

  if (tour.description) {
    const desc = truncateText(tour.description, options.maxDescLength ?? -1);
    if (desc.length > 0) lines.push(`    <desc>${escapeXml(desc)}</desc>`);
  }
  lines.push(`    <link href="${escapeXml(url)}"><text>${escapeXml(name)}</text></link>`);
  if (tour.date) lines.push(`    <time>${escapeXml(tour.date)}</time>`);
  lines.push('  </metadata>');

  if (options.includePoi !== false) {
    for (const poi of tour.pois ?? []) {
      lines.push(buildWaypoint(poi));
    }
    for (const highlight of tour.highlights ?? []) {
      if (highlight.lat === undefined || highlight.lon === undefined) continue;
      lines.push(buildWaypoint({
        name: highlight.name,
        lat: highlight.lat,
        lon: highlight.lon,
        category: 'highlight',
        description: highlight.tips.length > 0 ? highlight.tips.join('\n') : undefined,
      }));
    }
  }

  lines.push('  <trk>');
  lines.push(`    <name>${escapeXml(name)}</name>`);
  if (tour.sport) lines.push(`    <type>${escapeXml(tour.sport)}</type>`);
  lines.push('    <trkseg>');
  for (const point of tour.track_points ?? []) {
    lines.push(buildTrackPoint(point));
  }
  lines.push('    </trkseg>');
  lines.push('  </trk>');
  lines.push('</gpx>');

  return lines.join('\n') + '\n';
}

function parseCoordinate(value: string | undefined): number | null {
  if (value === undefined) return null;
  const parsed = parseFloat(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Reads track points, waypoints and the track name from a GPX document
 */
export function parseGpx(xml: string): ParsedGpx {
  const $ = cheerio.load(xml, { xml: true });
  const trackPoints: TrackPoint[] = [];
  const pois: PointOfInterest[] = [];

  $('trkpt, rtept').each((_, element) => {
    const $point = $(element);
    const lat = parseCoordinate($point.attr('lat'));
    const lon = parseCoordinate($point.attr('lon'));
    if (lat === null || lon === null) return;

    const point: TrackPoint = { lat, lon };
    const elevation = parseCoordinate($point.children('ele').first().text() || undefined);
    if (elevation !== null) point.elevation = elevation;
    const time = $point.children('time').first().text().trim();
    if (time) point.timestamp = time;
    trackPoints.push(point);
  });

  $('wpt').each((_, element) => {
    const $point = $(element);
    const lat = parseCoordinate($point.attr('lat'));
    const lon = parseCoordinate($point.attr('lon'));
    if (lat === null || lon === null) return;

    const poi: PointOfInterest = { name: $point.children('name').first().text().trim() || 'Waypoint', lat, lon };
    const desc = $point.children('desc').first().text().trim();
    if (desc) poi.description = desc;
    const type = $point.children('type').first().text().trim();
    if (type) poi.category = type;
    pois.push(poi);
  });

  const name = $('trk > name').first().text().trim() || $('metadata > name').first().text().trim();
  const description = $('metadata > desc').first().text().trim();

  return {
    ...(name ? { name } : {}),
    ...(description ? { description } : {}),
    track_points: trackPoints,
    pois,
  };
}
