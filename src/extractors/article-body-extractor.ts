/**
 * Article body extraction
 * Finds the content region of an article page through a priority list of matchers,
 * strips page chrome and keeps the substantial text blocks.
 */

import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import { isTag, type Element } from 'domhandler';
import type { HttpConfig } from '../config/environment';
import { fetchPage, type FetchLike } from '../utils/http';
import { logger } from '../utils/logger';

export const CONTENT_SELECTORS = [
  'article',
  '.entry-content',
  '.post-content',
  '.article-content',
  '.article-body',
  '[role="main"]',
  '.body-content',
  '.page-content',
  '.wp-block-post-content'
];

const CHROME_SELECTOR = 'script, style, nav, header, footer, aside, noscript';
const BLOCK_SELECTOR = 'p, div, section, blockquote, li, h1, h2, h3, h4, h5, h6, pre, td';
const LOOSE_CONTENT_CLASS = /content|entry|post/i;

export const MIN_FRAGMENT_LENGTH = 20;
export const FRAGMENT_SEPARATOR = '\n\n';

export interface ArticleBody {
  content: string;
  strategy: string;           // Matcher name, 'document-body' or 'none'
}

export interface BodyFetchResult {
  success: boolean;
  content: string;
  strategy?: string;
  error?: string;
}

interface RegionMatcher {
  name: string;
  find($: CheerioAPI): Cheerio<Element> | null;
}

function selectorMatcher(selector: string): RegionMatcher {
  return {
    name: selector,
    find: $ => {
      const matches = $(selector).filter((_, node): node is Element => isTag(node));
      return matches.length > 0 ? matches.first() : null;
    }
  };
}

const largestContentContainer: RegionMatcher = {
  name: 'largest content container',
  find: $ => {
    let best: Cheerio<Element> | null = null;
    let bestLength = 0;

    for (const element of $('div[class], section[class]').toArray()) {
      const container = $(element);
      if (!LOOSE_CONTENT_CLASS.test(container.attr('class') ?? '')) continue;

      const length = container.text().trim().length;
      if (length > bestLength) {
        best = container;
        bestLength = length;
      }
    }

    return best;
  }
};

// Evaluated in order until one finds a region; `article` already leads CONTENT_SELECTORS
const REGION_MATCHERS: readonly RegionMatcher[] = [
  ...CONTENT_SELECTORS.map(selectorMatcher),
  selectorMatcher('main'),
  largestContentContainer
];

function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function isSubstantial(fragment: string): boolean {
  return fragment.length > MIN_FRAGMENT_LENGTH;
}

function findContentRegion($: CheerioAPI): { element: Cheerio<Element>; matcher: string } | null {
  for (const matcher of REGION_MATCHERS) {
    const element = matcher.find($);
    if (element) {
      return { element, matcher: matcher.name };
    }
  }
  return null;
}

/**
 * Text of the blocks under root, chrome removed, short fragments dropped.
 * A block's own text forms one fragment per run between its child blocks;
 * text outside every block is ignored.
 */
function collectFragments($: CheerioAPI, root: Cheerio<Element>): string[] {
  root.find(CHROME_SELECTOR).remove();

  const fragments: string[] = [];
  const flush = (run: string[]) => {
    const fragment = normalizeWhitespace(run.join(''));
    if (isSubstantial(fragment)) {
      fragments.push(fragment);
    }
  };
  const containsBlock = (element: Element) =>
    $(element).is(BLOCK_SELECTOR) || $(element).find(BLOCK_SELECTOR).length > 0;

  const walk = (element: Element) => {
    const keepsText = $(element).is(BLOCK_SELECTOR);
    let run: string[] = [];

    for (const child of element.children) {
      if (isTag(child) && containsBlock(child)) {
        if (keepsText) flush(run);
        run = [];
        walk(child);
      } else {
        run.push($(child).text());
      }
    }
    if (keepsText) flush(run);
  };

  for (const element of root.toArray()) {
    walk(element);
  }
  return fragments;
}

/**
 * Best-effort plain-text body of an article page.
 * Falls back from the matched content region to the whole body, then gives up with ''.
 */
export function extractArticleBody(html: string): ArticleBody {
  const $ = cheerio.load(html);

  const region = findContentRegion($);
  if (region) {
    const fragments = collectFragments($, region.element);
    if (fragments.length > 0) {
      return { content: fragments.join(FRAGMENT_SEPARATOR), strategy: region.matcher };
    }
    logger.debug(`Content region "${region.matcher}" yielded no text, retrying with the document body`);
  }

  const bodyFragments = collectFragments($, $('body'));
  if (bodyFragments.length > 0) {
    return { content: bodyFragments.join(FRAGMENT_SEPARATOR), strategy: 'document-body' };
  }

  return { content: '', strategy: 'none' };
}

/**
 * Fetch an article and extract its body. Never throws: network, HTTP and parse
 * failures are logged and reported as an empty, unsuccessful result.
 */
export async function fetchArticleBody(
  url: string,
  http: HttpConfig,
  fetchImpl?: FetchLike
): Promise<BodyFetchResult> {
  try {
    const html = await fetchPage(url, http, fetchImpl);
    const { content, strategy } = extractArticleBody(html);

    if (!content) {
      logger.warn(`No body text found for ${url}`);
    } else {
      logger.debug(`Extracted ${content.length} chars from ${url} using ${strategy}`);
    }

    return { success: true, content, strategy };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`Failed to extract body from ${url}: ${message}`);
    return { success: false, content: '', error: message };
  }
}
