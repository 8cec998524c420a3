/**
 * Runtime configuration, read once at startup
 */

import type { AppConfig } from './types';

export const DEFAULT_OUTPUT_ROOT = 'transcripts';

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const youtubeApiKey = env.YOUTUBE_API_KEY?.trim() || undefined;
  const language = env.TRANSCRIPT_LANG?.trim() || undefined;
  const outputRoot = env.TRANSCRIPTS_DIR?.trim() || DEFAULT_OUTPUT_ROOT;

  return Object.freeze({ youtubeApiKey, language, outputRoot });
}
