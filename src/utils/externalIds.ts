/**
 * Embedded External ID Utilities
 *
 * Media servers expose external identifiers as scheme-prefixed strings,
 * e.g. "tmdb://603", "imdb://tt0133093" or "tvdb://81189?lang=en".
 */

/**
 * Parse a scheme-prefixed identifier
 *
 * @example
 * parseExternalGuid('tmdb://603?lang=en') // { scheme: 'tmdb', id: '603' }
 * parseExternalGuid('plex://movie/5d776') // { scheme: 'plex', id: 'movie/5d776' }
 * parseExternalGuid('603') // null
 */
export function parseExternalGuid(guid: string): { scheme: string; id: string } | null {
  const separator = guid.indexOf('://');
  if (separator <= 0) {
    return null;
  }

  const scheme = guid.slice(0, separator).toLowerCase();
  const id = guid.slice(separator + 3).split('?')[0]?.trim() ?? '';
  if (!id) {
    return null;
  }

  return { scheme, id };
}

/**
 * First identifier in the list that uses the given scheme
 */
export function findExternalId(guids: readonly string[], scheme: string): string | null {
  const wanted = scheme.toLowerCase();
  for (const guid of guids) {
    const parsed = parseExternalGuid(guid);
    if (parsed && parsed.scheme === wanted) {
      return parsed.id;
    }
  }
  return null;
}
