import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { WorkshopItemDetails, WorkshopPage } from '@pzws/shared-types';
import { canonicalTag } from './tags';
import { PageParseError } from '../utils/errors';
import { logger } from '../utils/logger';
import { parseWorkshopId, uniqueIds, workshopItemUrl } from '../utils/workshop-ids';
import { compareVersionParts } from '../utils/version';

const UNKNOWN = '(unknown)';

const REQUIRED_MARKER = /Required\s+(?:items|mods?)/i;
const REQUIRED_MARKERS = /Required\s+(?:items|mods?)/gi;
const COLLECTION_HINTS = [
  /workshopCollection|collectionChildren|collectionItems|workshopItemCollection|collectionHeader/i,
  /Subscribe\s+to\s+all|Unsubscribe\s+from\s+all|Save\s+to\s+Collection/i,
  /ITEMS\s*\(\d+\)/i,
  /section=collections/i,
];
const FILEDETAILS_LINK = /sharedfiles\/fil[e]?details\/\?id=(\d+)/gi;
const PUBLISHED_FILE_ATTR = /data-publishedfileid="(\d+)"/gi;
const PUBLISHED_FILE_JSON = /publishedfileid"?\s*[:=]\s*"?(\d+)"?/gi;

const MOD_ID_LINE = /\bMod\s*IDs?\s*[:-]\s*([^\r\n]+)/gi;
const MOD_ID_STOP_WORDS = /\b(?:Workshop\s*ID|Required|Map|IDs?)\b/i;
const MOD_ID_TOKEN = /^[A-Za-z0-9_-]+$/;
const MAP_FOLDER_LINE = /Map\s*Folder\s*:\s*([^\r\n]+)/gi;

// A window this wide after the "Required items" marker is searched for links
const REQUIRED_WINDOW_BEFORE = 200;
const REQUIRED_WINDOW_SIZE = 4000;

function normalizeSpace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function captures(text: string, pattern: RegExp): string[] {
  return [...text.matchAll(pattern)].map((match) => match[1]);
}

function blockText($: CheerioAPI, selector: string): string | null {
  const $node = $(selector).first();
  if ($node.length === 0) {
    return null;
  }
  const markup = ($node.html() ?? '')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(?:p|div|li|h[1-6])>/gi, '\n$&');
  return cheerio.load(markup).root().text();
}

/**
 * Description text with line breaks kept, so "Mod ID:" lines stay separate.
 * Falls back to the whole page body.
 */
export function descriptionText($: CheerioAPI): string {
  return blockText($, '.workshopItemDescription') ?? blockText($, 'body') ?? '';
}

export function parseTitle($: CheerioAPI): string | null {
  const heading = normalizeSpace($('.workshopItemTitle').first().text());
  if (heading) {
    return heading;
  }
  const title = normalizeSpace($('title').first().text())
    .replace(/\s*::\s*Steam Community\s*$/i, '')
    .replace(/^Steam Workshop\s*::\s*/i, '');
  return title || null;
}

export function parseModIds(description: string): string[] {
  const found: string[] = [];
  for (const line of captures(description, MOD_ID_LINE)) {
    const [beforeStopWord] = line.split(MOD_ID_STOP_WORDS);
    for (const part of beforeStopWord.split(/[,;|/\s]+/)) {
      if (MOD_ID_TOKEN.test(part)) {
        found.push(part);
      }
    }
  }
  return uniqueIds(found);
}

export function parseTags(html: string, $: CheerioAPI): string[] {
  const candidates: string[] = [];
  const $container = $('.workshopTags');
  if ($container.length > 0) {
    $container.find('a').each((_, element) => {
      candidates.push($(element).text());
    });
  } else {
    for (const text of captures(html, />\s*([^<>\n\r]+?)\s*</g)) {
      if (text.length <= 40) {
        candidates.push(text);
      }
    }
  }

  const tags: string[] = [];
  for (const candidate of candidates) {
    const tag = canonicalTag(candidate);
    if (tag && !tags.includes(tag)) {
      tags.push(tag);
    }
  }
  return tags;
}

/** Highest "Build N" tag, e.g. ["Build 41", "Build 42"] -> "42". */
export function parseBuildFromTags(tags: string[]): string | null {
  let best: { parts: number[]; value: string } | null = null;
  for (const tag of tags) {
    const match = tag.match(/Build\s*(\d+(?:\.\d+)*)/i);
    if (!match) continue;
    const parts = match[1].split('.').map(Number);
    if (!best || compareVersionParts(parts, best.parts) > 0) {
      best = { parts, value: match[1] };
    }
  }
  return best ? best.value : null;
}

export function parseBuildFromDescription(description: string): string | null {
  const flat = normalizeSpace(description);
  const patterns = [
    /Build\s*(4[12](?:\.\d+){0,2})/i,
    /\b(4[12](?:\.\d+){1,2})\b/,
    /Build\s*(\d+(?:\.\d+)*)/i,
  ];
  for (const pattern of patterns) {
    const match = flat.match(pattern);
    if (match) {
      return match[1];
    }
  }
  return null;
}

export function parseMapFolders(description: string): string[] {
  const folders: string[] = [];
  for (const line of captures(description, MAP_FOLDER_LINE)) {
    folders.push(...line.split(','));
  }
  return uniqueIds(folders);
}

export function parseRequiredIds(html: string, $: CheerioAPI, selfId: string): string[] {
  const ids: string[] = [];
  $('#RequiredItems a[href], .requiredItemsContainer a[href]').each((_, element) => {
    ids.push(...captures($(element).attr('href') ?? '', FILEDETAILS_LINK));
  });

  if (ids.length === 0) {
    for (const marker of html.matchAll(REQUIRED_MARKERS)) {
      const start = Math.max(0, (marker.index ?? 0) - REQUIRED_WINDOW_BEFORE);
      ids.push(...captures(html.slice(start, start + REQUIRED_WINDOW_SIZE), FILEDETAILS_LINK));
    }
  }

  return uniqueIds(ids, false).filter((id) => id !== selfId);
}

export function hasRequiredMarker(text: string): boolean {
  return REQUIRED_MARKER.test(text);
}

export function hasCollectionHints(html: string): boolean {
  return COLLECTION_HINTS.some((hint) => hint.test(html));
}

export function parseCollectionChildren(html: string, parentId: string): string[] {
  const ids = [
    ...captures(html, FILEDETAILS_LINK),
    ...captures(html, PUBLISHED_FILE_ATTR),
    ...captures(html, PUBLISHED_FILE_JSON),
  ];
  return uniqueIds(ids, false).filter((id) => id !== parentId);
}

export function parseItemDetails(id: string, html: string, $: CheerioAPI = cheerio.load(html)): WorkshopItemDetails {
  const description = descriptionText($);
  const tags = parseTags(html, $);
  const mapFolders = parseMapFolders(description);

  return {
    id,
    name: parseTitle($) ?? UNKNOWN,
    buildTag: parseBuildFromTags(tags) ?? parseBuildFromDescription(description) ?? UNKNOWN,
    tags,
    isMap: mapFolders.length > 0 || tags.includes('Map'),
    mapFolders,
    requires: parseRequiredIds(html, $, id),
    link: workshopItemUrl(id),
    modIdOptions: parseModIds(description),
  };
}

/**
 * Turns a fetched page into one of the three page kinds.
 *
 * A "Required items" section always means a standalone item, even when the
 * page also carries collection markup.
 */
export function classifyWorkshopPage(url: string, html: string): WorkshopPage {
  const id = parseWorkshopId(url);
  if (!id) {
    throw new PageParseError('No Workshop ID found in the URL', url);
  }
  if (!html.trim()) {
    throw new PageParseError('The Workshop page was empty', url);
  }

  const $ = cheerio.load(html);
  const childIds = hasCollectionHints(html) ? parseCollectionChildren(html, id) : [];

  if (hasRequiredMarker($.root().text())) {
    if (childIds.length > 0) {
      logger.warn(`[Scraper] ${id} looks like both a collection and an item with requirements; treating it as an item`);
    }
    return { kind: 'standalone', id, details: parseItemDetails(id, html, $) };
  }

  if (childIds.length > 0) {
    return {
      kind: 'collection',
      id,
      url: workshopItemUrl(id),
      title: parseTitle($) ?? `Collection ${id}`,
      childIds,
    };
  }

  return { kind: 'item', id, details: parseItemDetails(id, html, $) };
}
