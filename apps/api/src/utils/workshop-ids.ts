const FILEDETAILS_URL = 'https://steamcommunity.com/sharedfiles/filedetails/?id=';

/**
 * Extract the numeric Workshop ID from a pasted URL (`?id=...`).
 * A bare numeric ID is accepted as well.
 */
export function parseWorkshopId(input: string): string | null {
  const trimmed = input.trim();
  if (/^\d+$/.test(trimmed)) {
    return trimmed;
  }

  try {
    const candidate = new URL(trimmed).searchParams.get('id');
    if (candidate && /^\d+$/.test(candidate)) {
      return candidate;
    }
  } catch {
    // Not an absolute URL; fall through to the loose match
  }

  const match = trimmed.match(/[?&]id=(\d+)/);
  return match ? match[1] : null;
}

export function workshopItemUrl(id: string): string {
  return `${FILEDETAILS_URL}${id}`;
}

/**
 * Collections are keyed by URL. Different pastes of the same collection
 * (extra query parameters, http vs https) map to the same key.
 */
export function collectionKey(urlOrId: string): string {
  const id = parseWorkshopId(urlOrId);
  return id ? workshopItemUrl(id) : urlOrId.trim();
}

/**
 * Order-preserving dedupe. Comparison is case-insensitive unless told otherwise.
 */
export function uniqueIds(ids: Iterable<string>, caseInsensitive = true): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of ids) {
    const id = raw.trim();
    if (!id) continue;
    const key = caseInsensitive ? id.toLowerCase() : id;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(id);
  }
  return out;
}
