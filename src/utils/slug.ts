/**
 * Collection slug utilities
 *
 * Slugs name the per-collection output directories:
 * - lowercase, accents removed (NFD + combining marks stripped)
 * - every run of non [a-z0-9] characters becomes one hyphen
 * - no leading/trailing hyphens, at most 50 characters
 */

export const MAX_SLUG_LENGTH = 50;

export function slugify(text: string, maxLength: number = MAX_SLUG_LENGTH): string {
  return text
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '') // Remove combining marks (accents)
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, maxLength)
    .replace(/-+$/g, '');
}

/**
 * Path segment following /collection/{id}/ in a collection URL, if any
 */
export function slugSegmentFromUrl(url: string): string | null {
  const match = url.match(/\/collection\/\d+\/([^/?#]+)/);
  if (!match) return null;
  try {
    return decodeURIComponent(match[1]);
  } catch {
    return match[1];
  }
}

/**
 * Slug for a collection: URL segment when present, else the name,
 * else `collection-{id}`
 */
export function collectionSlug(collection: { id?: string; name?: string; url?: string }): string {
  const fromUrl = collection.url ? slugSegmentFromUrl(collection.url) : null;
  const candidates = [fromUrl, collection.name];

  for (const candidate of candidates) {
    if (candidate) {
      const slug = slugify(candidate);
      if (slug.length > 0) return slug;
    }
  }

  return `collection-${collection.id || 'unknown'}`;
}
