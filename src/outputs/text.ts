import type { TranscriptSegment } from '../types';

/** One caption per line */
export function formatText(segments: TranscriptSegment[]): string {
  return segments.map((segment) => `${segment.text}\n`).join('');
}
