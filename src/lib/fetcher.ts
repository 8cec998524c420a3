/**
 * Transcript fetching on top of the youtube-transcript package
 */

import { YoutubeTranscript } from 'youtube-transcript';
import type { FetchOptions, RawTranscriptItem, TranscriptSegment, TranscriptSource } from '../types';
import { errorMessage } from './logger';

// Messages that mean the video simply has no caption track
const NO_TRANSCRIPT_MESSAGES = [
  'No transcripts are available',
  'No transcripts were found',
  'No transcript found',
];

// srv3 caption bodies time each <p> in milliseconds; the classic format uses seconds
const SRV3_CUE = /<p\s+t="\d+"\s+d="\d+"/;

/**
 * Raised when a video has no transcript at all. Callers tally these
 * separately from real failures.
 */
export class NoTranscriptError extends Error {
  constructor(
    readonly videoId: string,
    message = `No transcript available for ${videoId}`
  ) {
    super(message);
    this.name = 'NoTranscriptError';
  }
}

export function isNoTranscriptMessage(message: string): boolean {
  return NO_TRANSCRIPT_MESSAGES.some((m) => message.includes(m));
}

function requestUrl(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  return input instanceof URL ? input.href : input.url;
}

/**
 * Default source. Timings always come back in seconds.
 */
export const youtubeTranscriptSource: TranscriptSource = async (videoId, options) => {
  let milliseconds = false;

  const fetchCaptions: typeof globalThis.fetch = async (input, init) => {
    const res = await globalThis.fetch(input, init);
    if (requestUrl(input).includes('/api/timedtext')) {
      milliseconds = SRV3_CUE.test(await res.clone().text());
    }
    return res;
  };

  const items = await YoutubeTranscript.fetchTranscript(videoId, {
    lang: options?.lang,
    fetch: fetchCaptions,
  });
  if (!milliseconds) return items;

  return items.map((item) => ({
    ...item,
    offset: item.offset / 1000,
    duration: item.duration / 1000,
  }));
};

/**
 * Fetch the ordered caption segments of a video.
 *
 * @throws NoTranscriptError when the video has no transcript
 */
export async function fetchTranscript(
  videoId: string,
  options: FetchOptions = {}
): Promise<TranscriptSegment[]> {
  const { lang, source = youtubeTranscriptSource } = options;

  let items: RawTranscriptItem[];
  try {
    items = await source(videoId, { lang });
  } catch (error) {
    const message = errorMessage(error);
    if (isNoTranscriptMessage(message)) {
      throw new NoTranscriptError(videoId, message);
    }
    throw error;
  }

  if (!items.length) {
    throw new NoTranscriptError(videoId);
  }

  return items.map(toSegment);
}

// Entities are already decoded by the package; only line breaks are flattened
function toSegment(item: RawTranscriptItem): TranscriptSegment {
  return {
    text: item.text.replace(/\n/g, ' '),
    start: item.offset,
    duration: item.duration ?? 0,
  };
}
