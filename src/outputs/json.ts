import type { TranscriptSegment } from '../types';

/**
 * Pretty-printed segment list. Only text, start and duration are kept so the
 * output parses back to exactly what the fetcher produced.
 */
export function formatJson(segments: TranscriptSegment[]): string {
  const plain = segments.map(({ text, start, duration }) => ({ text, start, duration }));
  return JSON.stringify(plain, null, 2);
}
