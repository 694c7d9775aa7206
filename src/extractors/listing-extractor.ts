import * as cheerio from 'cheerio';
import { isTag, type Element } from 'domhandler';
import type { SiteConfig } from '../config/environment';
import { UNKNOWN_DATE_TEXT, type Entry } from '../types/entry';
import { logger } from '../utils/logger';
import { findInAncestors, type TreeNode } from './ancestor-walk';
import { LONG_DATE_PATTERN, resolveDate } from './date-resolver';

export const MIN_TITLE_LENGTH = 10;

// Captions of pagination and "more" links, matched as case-insensitive substrings
export const NAVIGATION_WORDS = ['next', 'previous', 'older', 'newer', 'page', '»', '«'];

export interface ExtractOptions {
  now?: () => Date;
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function toAbsoluteUrl(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
}

function isChannelName(title: string, channelName: string): boolean {
  const candidate = title.toLowerCase();
  const name = channelName.toLowerCase();
  return (
    candidate === name ||
    candidate === name.replace(/&amp;/g, '&') ||
    candidate === name.replace(/&(?!amp;)/g, '&amp;')
  );
}

function isNavigationTitle(title: string): boolean {
  const lower = title.toLowerCase();
  return NAVIGATION_WORDS.some(word => lower.includes(word));
}

function toTreeNode($: cheerio.CheerioAPI, element: Element): TreeNode {
  return {
    get parent() {
      const parent = element.parent;
      return parent && isTag(parent) ? toTreeNode($, parent) : null;
    },
    textContent: () => $(element).text()
  };
}

/** Newest first; Array.prototype.sort is stable, so equal dates keep discovery order. */
export function sortEntriesByDate<T extends Pick<Entry, 'published_at'>>(entries: readonly T[]): T[] {
  return [...entries].sort((a, b) => b.published_at.getTime() - a.published_at.getTime());
}

/**
 * Extract article entries from the listing page markup.
 * Every listing-path link with a substantial, non-navigational caption counts as an
 * article; its date is read from the nearest ancestor text that contains one.
 */
export function extractEntries(
  html: string,
  site: SiteConfig,
  options: ExtractOptions = {}
): Entry[] {
  const $ = cheerio.load(html);
  const extractedAt = (options.now ?? (() => new Date()))();
  const listingUrl = stripTrailingSlash(site.listingUrl);
  const seenUrls = new Set<string>();
  const entries: Entry[] = [];

  for (const link of $('a[href]').toArray()) {
    const href = ($(link).attr('href') ?? '').trim();
    if (!href || !href.includes(site.listingPath)) {
      continue;
    }

    const url = toAbsoluteUrl(href, site.baseUrl);
    if (!url || stripTrailingSlash(url) === listingUrl) {
      continue;
    }

    if (href.includes(site.paginationMarker)) {
      continue;
    }

    const title = normalizeWhitespace($(link).text());
    if (title.length < MIN_TITLE_LENGTH || isChannelName(title, site.channelName)) {
      continue;
    }

    if (isNavigationTitle(title)) {
      continue;
    }

    if (seenUrls.has(url)) {
      logger.debug(`Skipping duplicate link: ${url}`);
      continue;
    }
    seenUrls.add(url);

    const dateText = findInAncestors(toTreeNode($, link), LONG_DATE_PATTERN);
    const { date, resolved } = resolveDate(dateText, () => extractedAt);

    const entry: Entry = {
      title,
      url,
      published_at: date,
      raw_date_text: dateText ?? UNKNOWN_DATE_TEXT,
      date_resolved: resolved
    };
    entries.push(entry);
    logger.info(`Found: ${title.slice(0, 60)}... (${entry.raw_date_text})`);
  }

  return sortEntriesByDate(entries);
}
