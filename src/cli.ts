#!/usr/bin/env node
/**
 * captiondl CLI - interactive YouTube transcript downloader
 */

import { program } from 'commander';
import { config as loadDotenv } from 'dotenv';
import { version } from '../package.json';
import { loadConfig } from './config';
import { createYouTubeLookup } from './lib/channel';
import { errorMessage, log } from './lib/logger';
import { createPrompter, runMenu } from './menu';

program
  .name('captiondl')
  .description(
    'Download YouTube transcripts for a video, a file of URLs, or a whole channel.\n' +
      'Set YOUTUBE_API_KEY (environment or .env) for channel downloads.'
  )
  .version(version)
  .action(async () => {
    loadDotenv();
    const config = loadConfig();

    if (!config.youtubeApiKey) {
      log.warn('YOUTUBE_API_KEY is not set; channel downloads will fail');
    }

    const prompter = createPrompter();
    try {
      await runMenu({
        prompter,
        lookup: createYouTubeLookup(config.youtubeApiKey),
        config,
      });
    } catch (error) {
      log.error(`Fatal: ${errorMessage(error)}`);
      process.exit(1);
    } finally {
      prompter.close();
    }

    process.exit(0);
  });

program.parseAsync().catch((error: unknown) => {
  log.error(`Failed: ${errorMessage(error)}`);
  process.exit(1);
});
