/**
 * Feed generation pipeline
 *
 * 1. Fetches the listing page (a failure here aborts the run)
 * 2. Extracts, deduplicates and date-sorts candidate entries
 * 3. Enriches each entry with its article body, failures isolated per entry
 * 4. Assembles the RSS document and writes it only once every entry is resolved
 */

import pLimit from 'p-limit';
import type { EnvironmentConfig } from '../config/environment';
import { fetchArticleBody } from '../extractors/article-body-extractor';
import { extractEntries, sortEntriesByDate } from '../extractors/listing-extractor';
import { buildFeed, writeFeedFile } from '../feed/feed-assembler';
import type { Entry } from '../types/entry';
import { fetchPageWithRetry, type FetchLike } from '../utils/http';
import { logger } from '../utils/logger';

export interface PipelineOptions {
  fetchImpl?: FetchLike;
  now?: () => Date;
}

export interface PipelineStats {
  discovered: number;
  bodiesExtracted: number;
  bodyFailures: number;
  unresolvedDates: number;
}

export interface PipelineResult {
  entries: Entry[];
  written: boolean;
  outputPath: string | null;
  stats: PipelineStats;
  duration: number;
}

/**
 * Fetch every entry's body through a p-limit queue. Results are matched back by
 * index, so output order never depends on which request finishes first.
 */
async function enrichWithBodies(
  entries: Entry[],
  config: EnvironmentConfig,
  stats: PipelineStats,
  fetchImpl?: FetchLike
): Promise<Entry[]> {
  const limit = pLimit(config.pipeline.bodyConcurrency);

  const results = await Promise.all(
    entries.map(entry => limit(() => fetchArticleBody(entry.url, config.http, fetchImpl)))
  );

  return entries.map((entry, index) => {
    const result = results[index];
    if (!result.success) {
      stats.bodyFailures++;
    } else if (result.content) {
      stats.bodiesExtracted++;
    }
    return { ...entry, body: result.content };
  });
}

/**
 * Run one full listing → feed pass.
 * @throws when the listing page cannot be fetched; nothing is written in that case
 */
export async function runPipeline(
  config: EnvironmentConfig,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const startTime = Date.now();
  const now = options.now ?? (() => new Date());

  const stats: PipelineStats = {
    discovered: 0,
    bodiesExtracted: 0,
    bodyFailures: 0,
    unresolvedDates: 0
  };

  logger.info(`Fetching ${config.site.listingUrl}`);
  const html = await fetchPageWithRetry(config.site.listingUrl, config.http, options.fetchImpl);
  logger.info(`Fetched ${html.length} bytes`);

  const discovered = extractEntries(html, config.site, { now });
  stats.discovered = discovered.length;
  stats.unresolvedDates = discovered.filter(entry => !entry.date_resolved).length;
  logger.info(`Found ${discovered.length} entries`);

  if (discovered.length === 0) {
    logger.warn('No entries found. The page structure may have changed.');
    return {
      entries: [],
      written: false,
      outputPath: null,
      stats,
      duration: Date.now() - startTime
    };
  }

  const enriched = config.pipeline.fetchArticleBodies
    ? await enrichWithBodies(discovered, config, stats, options.fetchImpl)
    : discovered;
  const entries = sortEntriesByDate(enriched);

  const xml = buildFeed(entries, config.feed, now);
  const outputPath = await writeFeedFile(xml, config.feed.outputFile);

  return {
    entries,
    written: true,
    outputPath,
    stats,
    duration: Date.now() - startTime
  };
}
