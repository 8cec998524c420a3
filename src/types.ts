/**
 * Shared types for captiondl
 */

/** A single timed caption unit. Times are in seconds. */
export interface TranscriptSegment {
  text: string;
  start: number;
  duration: number;
}

export type OutputFormat = 'json' | 'txt' | 'srt';

/** Raw item as returned by a transcript source */
export interface RawTranscriptItem {
  text: string;
  offset: number;
  duration?: number;
}

export interface TranscriptSourceOptions {
  lang?: string;
}

/**
 * Anything that can return the caption items of a video.
 * Defaults to the youtube-transcript package.
 */
export type TranscriptSource = (
  videoId: string,
  options?: TranscriptSourceOptions
) => Promise<RawTranscriptItem[]>;

export interface FetchOptions {
  /** Preferred caption language code */
  lang?: string;
  source?: TranscriptSource;
}

export type ChannelUrlKind = 'channel' | 'custom' | 'handle' | 'user';

export interface ChannelUrlMatch {
  kind: ChannelUrlKind;
  value: string;
}

/** Minimal shape of a search result item from the YouTube Data API */
export interface SearchItem {
  id?: {
    videoId?: string | null;
    channelId?: string | null;
  } | null;
  snippet?: {
    channelId?: string | null;
  } | null;
}

export interface VideoPage {
  items: SearchItem[];
  nextPageToken?: string | null;
}

/**
 * Channel metadata lookups. The real implementation wraps the
 * YouTube Data API; tests pass an in-memory fake.
 */
export interface ChannelLookup {
  /** Keyword search restricted to channel results */
  searchChannels(query: string): Promise<SearchItem[]>;
  /** Legacy username to channel lookup, returns matching channel IDs */
  findChannelsByUsername(username: string): Promise<string[]>;
  /** One page of a channel's videos */
  listVideoPage(channelId: string, pageToken?: string): Promise<VideoPage>;
}

export type VideoStatus = 'ok' | 'no_captions' | 'failed';

export interface VideoResult {
  videoId: string;
  status: VideoStatus;
  /** Written file, when status is ok */
  path?: string;
  error?: string;
}

export interface RunSummary {
  successful: number;
  failed: number;
  noCaptions: number;
  total: number;
}

export interface BatchOptions extends FetchOptions {
  outputDir: string;
  format: OutputFormat;
  onProgress?: (completed: number, total: number, result: VideoResult) => void;
}

export interface BatchResult {
  results: VideoResult[];
  summary: RunSummary;
}

export interface AppConfig {
  youtubeApiKey?: string;
  language?: string;
  outputRoot: string;
}
