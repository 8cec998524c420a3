/**
 * captiondl - YouTube transcript downloads for videos, URL lists and channels
 *
 * @example
 * ```typescript
 * import { fetchTranscript, exportTranscript, listChannelVideos, resolveChannelId, createYouTubeLookup } from 'captiondl';
 *
 * const segments = await fetchTranscript('abc123def45');
 * await exportTranscript(segments, './transcripts/abc123def45', 'srt');
 *
 * const lookup = createYouTubeLookup(process.env.YOUTUBE_API_KEY);
 * const channelId = await resolveChannelId('https://www.youtube.com/@somechannel', lookup);
 * const videoIds = channelId ? await listChannelVideos(channelId, lookup) : [];
 * ```
 */

// Identifiers
export { extractVideoId, extractChannelIdentifier, matchChannelUrl, isChannelId } from './lib/url';

// Transcripts
export { fetchTranscript, NoTranscriptError, youtubeTranscriptSource } from './lib/fetcher';

// Channels
export { createYouTubeLookup, resolveChannelId, listChannelVideos } from './lib/channel';

// Batch processing
export { processVideo, processVideos, streamVideos } from './lib/processor';

// Loaders
export { loadUrlList, fromVideoUrls } from './loaders';

// Output formatters
export {
  EXPORTERS,
  exportTranscript,
  transcriptPath,
  formatJson,
  formatSrt,
  formatText,
} from './outputs';
export type { TranscriptExporter } from './outputs';

// Config
export { loadConfig } from './config';

// Types
export type {
  AppConfig,
  BatchOptions,
  BatchResult,
  ChannelLookup,
  FetchOptions,
  OutputFormat,
  RunSummary,
  TranscriptSegment,
  TranscriptSource,
  VideoResult,
} from './types';
