#!/usr/bin/env node
/**
 * #️⃣ Hashtag Signal
 *
 * Trending-aware hashtag generator:
 * 1. Classifies an image with a vision model (Gemini, Mistral fallback)
 * 2. Collects real trending hashtags from scraped rankings, Google Trends, X and a curated table
 * 3. Merges them with AI suggestions under each platform's hashtag limits
 */

import { CLI } from './ui/cli';
import { validateConfig } from './config';
import { log } from './utils/logger';
import { errorMessage } from './utils/errors';

async function main() {
    console.log(`
  ╔═══════════════════════════════════════════════════════════╗
  ║                                                           ║
  ║   #️⃣  Hashtag Signal                                      ║
  ║                                                           ║
  ║   Classify • Collect trends • Suggest                     ║
  ║                                                           ║
  ╚═══════════════════════════════════════════════════════════╝
  `);

    const configStatus = validateConfig();

    if (!configStatus.valid) {
        log.error('Configuration incomplete', { missing: configStatus.missing });
        console.log('\n❌ Missing required configuration:');
        configStatus.missing.forEach(key => {
            console.log(`   - ${key}`);
        });
        console.log('\n📝 Please copy .env.example to .env and fill in your API keys.\n');
        process.exit(1);
    }

    log.info('Hashtag Signal starting...');

    const cli = new CLI();
    await cli.start();
}

process.on('SIGINT', () => {
    console.log('\n\n👋 Shutting down...\n');
    process.exit(0);
});

process.on('uncaughtException', (error) => {
    log.error('Uncaught exception', { error: error.message });
    console.error('\n❌ Unexpected error:', error.message);
    process.exit(1);
});

main().catch((error: unknown) => {
    log.error('Fatal error', { error: errorMessage(error) });
    console.error('\n❌ Fatal error:', errorMessage(error));
    process.exit(1);
});
