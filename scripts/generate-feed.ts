#!/usr/bin/env tsx

/**
 * Runner for the feed generation pipeline
 * Loads environment variables and writes the RSS file
 */

// Load environment variables from .env.local or .env
import dotenv from 'dotenv';
import path from 'path';

// Find project root (one level up from the scripts directory)
const projectRoot = path.resolve(__dirname, '..');

// Try to load .env.local first, then .env from project root
dotenv.config({ path: path.join(projectRoot, '.env.local') });
dotenv.config({ path: path.join(projectRoot, '.env') });

import { loadEnvironmentConfig } from '../src/config/environment';
import { runPipeline } from '../src/pipeline/run-pipeline';
import { logger } from '../src/utils/logger';

async function main() {
  try {
    const config = loadEnvironmentConfig();
    logger.setLevel(config.logging.level);

    const result = await runPipeline(config);

    // runPipeline has already warned about the empty listing
    if (!result.written) {
      process.exit(0);
    }

    console.log('═'.repeat(80));
    console.log('📊 Feed generated:');
    console.log(`   • Output: ${result.outputPath}`);
    console.log(`   • Entries: ${result.stats.discovered}`);
    console.log(`   • Bodies extracted: ${result.stats.bodiesExtracted}`);
    console.log(`   • Body fetch failures: ${result.stats.bodyFailures}`);
    console.log(`   • Unresolved dates: ${result.stats.unresolvedDates}`);
    console.log(`   • Duration: ${result.duration}ms`);
    console.log('═'.repeat(80));

    process.exit(0);
  } catch (error) {
    logger.error('Feed generation failed', error);
    process.exit(1);
  }
}

void main();
