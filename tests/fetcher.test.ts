/**
 * Tests for transcript fetching and failure classification
 */

import { afterEach, describe, test, expect, vi } from 'vitest';
import {
  NoTranscriptError,
  fetchTranscript,
  isNoTranscriptMessage,
  youtubeTranscriptSource,
} from '../src/lib/fetcher';
import { formatSrt } from '../src/outputs/srt';
import type { TranscriptSource } from '../src/types';
import { NO_TRANSCRIPT_MESSAGE, createMockSource } from './mocks';

describe('fetchTranscript', () => {
  test('maps source items to segments in order', async () => {
    const source = createMockSource({
      vid00000001: [
        { text: 'first', offset: 0, duration: 1.5 },
        { text: 'second', offset: 1.5, duration: 2 },
      ],
    });

    const segments = await fetchTranscript('vid00000001', { source });

    expect(segments).toEqual([
      { text: 'first', start: 0, duration: 1.5 },
      { text: 'second', start: 1.5, duration: 2 },
    ]);
  });

  test('defaults a missing duration to 0', async () => {
    const source = createMockSource({ vid00000001: [{ text: 'only', offset: 3 }] });

    expect(await fetchTranscript('vid00000001', { source })).toEqual([
      { text: 'only', start: 3, duration: 0 },
    ]);
  });

  test('keeps already-decoded text as is and flattens newlines', async () => {
    const source = createMockSource({
      vid00000001: [{ text: 'a literal &lt;tag&gt;\nnext line', offset: 0, duration: 1 }],
    });

    const [segment] = await fetchTranscript('vid00000001', { source });

    expect(segment.text).toBe('a literal &lt;tag&gt; next line');
  });

  test('passes the preferred language to the source', async () => {
    const seen: Array<string | undefined> = [];
    const source: TranscriptSource = async (_videoId, options) => {
      seen.push(options?.lang);
      return [{ text: 'hallo', offset: 0, duration: 1 }];
    };

    await fetchTranscript('vid00000001', { source, lang: 'de' });

    expect(seen).toEqual(['de']);
  });

  test('turns a "no transcripts" error into NoTranscriptError', async () => {
    const source = createMockSource({
      vid00000001: new Error(NO_TRANSCRIPT_MESSAGE('vid00000001')),
    });

    const error = await fetchTranscript('vid00000001', { source }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NoTranscriptError);
    expect(error).toMatchObject({ videoId: 'vid00000001' });
  });

  test('treats an empty transcript as no transcript', async () => {
    const source = createMockSource({ vid00000001: [] });

    await expect(fetchTranscript('vid00000001', { source })).rejects.toBeInstanceOf(
      NoTranscriptError
    );
  });

  test('rethrows other errors unchanged', async () => {
    const disabled = new Error('[YoutubeTranscript] 🚨 Transcript is disabled on this video (vid00000001)');
    const source = createMockSource({ vid00000001: disabled });

    const error = await fetchTranscript('vid00000001', { source }).catch((e: unknown) => e);

    expect(error).toBe(disabled);
    expect(error).not.toBeInstanceOf(NoTranscriptError);
  });

  test('classifies non-Error rejections by their message', async () => {
    const source: TranscriptSource = () => Promise.reject('No transcripts were found for any language');

    await expect(fetchTranscript('vid00000001', { source })).rejects.toBeInstanceOf(
      NoTranscriptError
    );
  });
});

describe('isNoTranscriptMessage', () => {
  test('recognises the no-transcript messages', () => {
    expect(isNoTranscriptMessage(NO_TRANSCRIPT_MESSAGE('abc'))).toBe(true);
    expect(isNoTranscriptMessage('No transcript found')).toBe(true);
  });

  test('ignores other failures', () => {
    expect(isNoTranscriptMessage('Video unavailable (abc)')).toBe(false);
    expect(isNoTranscriptMessage('Transcript is disabled on this video (abc)')).toBe(false);
  });
});

describe('youtubeTranscriptSource', () => {
  const TIMEDTEXT_URL = 'https://www.youtube.com/api/timedtext?v=vid00000001&lang=en';

  function serveCaptions(body: string) {
    const requested: string[] = [];
    vi.stubGlobal('fetch', async (input: string | URL | Request) => {
      const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
      requested.push(url);
      if (url.includes('/youtubei/v1/player')) {
        const player = {
          captions: {
            playerCaptionsTracklistRenderer: {
              captionTracks: [{ baseUrl: TIMEDTEXT_URL, languageCode: 'en' }],
            },
          },
        };
        return new Response(JSON.stringify(player), {
          headers: { 'Content-Type': 'application/json' },
        });
      }
      if (url.startsWith(TIMEDTEXT_URL)) {
        return new Response(body, { headers: { 'Content-Type': 'text/xml' } });
      }
      return new Response('not found', { status: 404 });
    });
    return requested;
  }

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  test('converts srv3 millisecond timings to seconds', async () => {
    const requested = serveCaptions(
      '<timedtext format="3"><body><p t="61500" d="2250">hello</p></body></timedtext>'
    );

    const segments = await fetchTranscript('vid00000001', { source: youtubeTranscriptSource });

    expect(requested).toEqual([
      'https://www.youtube.com/youtubei/v1/player?prettyPrint=false',
      TIMEDTEXT_URL,
    ]);
    expect(segments).toEqual([{ text: 'hello', start: 61.5, duration: 2.25 }]);
    expect(formatSrt(segments)).toBe('1\n00:01:01,500 --> 00:01:03,750\nhello\n');
  });

  test('leaves classic second timings unchanged', async () => {
    serveCaptions('<transcript><text start="61.5" dur="2.25">hello</text></transcript>');

    const segments = await fetchTranscript('vid00000001', { source: youtubeTranscriptSource });

    expect(segments).toEqual([{ text: 'hello', start: 61.5, duration: 2.25 }]);
  });
});
