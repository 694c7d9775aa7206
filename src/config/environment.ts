/**
 * Environment configuration for the feed generator
 * Loads and validates environment variables into an explicit config value
 * that is threaded into every component
 */

import { z } from 'zod';
import type { LogLevel } from '../utils/logger';

export const DEFAULT_LISTING_URL = 'https://www.whitehouse.gov/briefings-statements/';
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export interface SiteConfig {
  listingUrl: string;        // The single listing page that is crawled
  baseUrl: string;           // Origin used to absolutize relative hrefs
  listingPath: string;       // Path segment every article href must contain
  paginationMarker: string;  // Hrefs containing this segment are pagination links
  channelName: string;       // Display name of the listing (its breadcrumb caption)
}

export interface HttpConfig {
  userAgent: string;
  timeoutMs: number;
  listingRetries: number;
  retryMinTimeoutMs: number;
}

export interface FeedConfig {
  title: string;
  description: string;
  language: string;
  link: string;
  selfUrl: string;
  imageUrl?: string;
  itemDescriptionPrefix: string;
  maxBodyLength: number;
  outputFile: string;
}

export interface PipelineConfig {
  fetchArticleBodies: boolean;
  bodyConcurrency: number;
}

export interface EnvironmentConfig {
  site: SiteConfig;
  http: HttpConfig;
  feed: FeedConfig;
  pipeline: PipelineConfig;
  logging: {
    level: LogLevel;
  };
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

const text = z.string().trim().min(1);

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined) return fallback;
      const normalized = value.trim().toLowerCase();
      if (['true', '1', 'yes'].includes(normalized)) return true;
      if (['false', '0', 'no'].includes(normalized)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean, got "${value}"` });
      return z.NEVER;
    });

const envSchema = z.object({
  LISTING_URL: z.string().url().default(DEFAULT_LISTING_URL),
  BASE_URL: z.string().url().optional(),
  LISTING_PATH: text.startsWith('/').optional(),
  PAGINATION_MARKER: text.default('/page/'),
  CHANNEL_NAME: text.default('Briefings & Statements'),
  OUTPUT_FILE: text.default('whitehouse_briefings.xml'),
  FEED_TITLE: text.default('White House Briefings & Statements'),
  FEED_DESCRIPTION: text.default('Official Briefings and Statements from the White House'),
  FEED_LANGUAGE: text.default('en'),
  FEED_SELF_URL: text.optional(),
  FEED_IMAGE_URL: z.string().url().optional(),
  ITEM_DESCRIPTION_PREFIX: text.default('White House Briefing/Statement'),
  USER_AGENT: text.default(DEFAULT_USER_AGENT),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  LISTING_FETCH_RETRIES: z.coerce.number().int().min(0).default(2),
  RETRY_MIN_TIMEOUT_MS: z.coerce.number().int().min(0).default(1000),
  FETCH_ARTICLE_BODIES: booleanFlag(true),
  BODY_CONCURRENCY: z.coerce.number().int().min(1).default(1),
  MAX_BODY_LENGTH: z.coerce.number().int().positive().default(5000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info')
});

const ENV_KEYS = envSchema.keyof().options;

type EnvKey = (typeof ENV_KEYS)[number];

/**
 * Load and validate environment configuration.
 * Blank variables count as unset so `.env` templates with empty values fall back to defaults.
 * @throws ConfigError listing every invalid variable
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const raw: Partial<Record<EnvKey, string>> = {};
  for (const key of ENV_KEYS) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      raw[key] = value;
    }
  }

  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  const listing = new URL(vars.LISTING_URL);

  return {
    site: {
      listingUrl: listing.toString(),
      baseUrl: vars.BASE_URL ? new URL(vars.BASE_URL).origin : listing.origin,
      listingPath: vars.LISTING_PATH ?? listing.pathname,
      paginationMarker: vars.PAGINATION_MARKER,
      channelName: vars.CHANNEL_NAME
    },
    http: {
      userAgent: vars.USER_AGENT,
      timeoutMs: vars.REQUEST_TIMEOUT_MS,
      listingRetries: vars.LISTING_FETCH_RETRIES,
      retryMinTimeoutMs: vars.RETRY_MIN_TIMEOUT_MS
    },
    feed: {
      title: vars.FEED_TITLE,
      description: vars.FEED_DESCRIPTION,
      language: vars.FEED_LANGUAGE,
      link: listing.toString(),
      selfUrl: vars.FEED_SELF_URL ?? vars.OUTPUT_FILE,
      imageUrl: vars.FEED_IMAGE_URL,
      itemDescriptionPrefix: vars.ITEM_DESCRIPTION_PREFIX,
      maxBodyLength: vars.MAX_BODY_LENGTH,
      outputFile: vars.OUTPUT_FILE
    },
    pipeline: {
      fetchArticleBodies: vars.FETCH_ARTICLE_BODIES,
      bodyConcurrency: vars.BODY_CONCURRENCY
    },
    logging: {
      level: vars.LOG_LEVEL
    }
  };
}
