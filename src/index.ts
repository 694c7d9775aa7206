export { loadEnvironmentConfig, ConfigError } from './config/environment';
export type { EnvironmentConfig, SiteConfig, HttpConfig, FeedConfig, PipelineConfig } from './config/environment';
export { extractEntries, sortEntriesByDate } from './extractors/listing-extractor';
export { resolveDate } from './extractors/date-resolver';
export type { ResolvedDate } from './extractors/date-resolver';
export { findInAncestors } from './extractors/ancestor-walk';
export type { TreeNode } from './extractors/ancestor-walk';
export { extractArticleBody, fetchArticleBody } from './extractors/article-body-extractor';
export { buildFeed, stripInvalidXmlChars, truncateBody, writeFeedFile } from './feed/feed-assembler';
export { runPipeline } from './pipeline/run-pipeline';
export type { PipelineOptions, PipelineResult, PipelineStats } from './pipeline/run-pipeline';
export { HttpStatusError } from './utils/http';
export type { Entry } from './types/entry';
export { logger } from './utils/logger';
