/**
 * Sequential batch processor: fetch, export and tally one video at a time
 */

import { join } from 'node:path';
import { exportTranscript, transcriptPath } from '../outputs';
import type { BatchOptions, BatchResult, RunSummary, VideoResult } from '../types';
import { NoTranscriptError, fetchTranscript } from './fetcher';
import { errorMessage } from './logger';

export function emptySummary(): RunSummary {
  return { successful: 0, failed: 0, noCaptions: 0, total: 0 };
}

export function tally(summary: RunSummary, result: VideoResult): RunSummary {
  return {
    successful: summary.successful + (result.status === 'ok' ? 1 : 0),
    failed: summary.failed + (result.status === 'failed' ? 1 : 0),
    noCaptions: summary.noCaptions + (result.status === 'no_captions' ? 1 : 0),
    total: summary.total + 1,
  };
}

/**
 * Fetch and write one video. Never throws: every error becomes a result.
 */
export async function processVideo(
  videoId: string,
  options: Omit<BatchOptions, 'onProgress'>
): Promise<VideoResult> {
  const { outputDir, format, ...fetchOptions } = options;
  const pathStem = join(outputDir, videoId);

  try {
    const segments = await fetchTranscript(videoId, fetchOptions);
    await exportTranscript(segments, pathStem, format);
    return { videoId, status: 'ok', path: transcriptPath(pathStem, format) };
  } catch (error) {
    const status = error instanceof NoTranscriptError ? 'no_captions' : 'failed';
    return { videoId, status, error: errorMessage(error) };
  }
}

/**
 * Yield results in input order, one video at a time
 */
export async function* streamVideos(
  videoIds: string[],
  options: Omit<BatchOptions, 'onProgress'>
): AsyncGenerator<VideoResult> {
  for (const videoId of videoIds) {
    yield await processVideo(videoId, options);
  }
}

/**
 * Process every video and return the results with a run summary
 */
export async function processVideos(
  videoIds: string[],
  options: BatchOptions
): Promise<BatchResult> {
  const { onProgress, ...rest } = options;
  const results: VideoResult[] = [];
  let summary = emptySummary();

  for await (const result of streamVideos(videoIds, rest)) {
    results.push(result);
    summary = tally(summary, result);
    onProgress?.(results.length, videoIds.length, result);
  }

  return { results, summary };
}
