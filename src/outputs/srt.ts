/**
 * SubRip (.srt) subtitle formatting
 */

import type { TranscriptSegment } from '../types';

/**
 * Seconds to `HH:MM:SS,mmm`
 */
export function formatSrtTimestamp(seconds: number): string {
  const totalMs = Math.max(0, Math.round(seconds * 1000));
  const hours = Math.floor(totalMs / 3_600_000);
  const minutes = Math.floor((totalMs % 3_600_000) / 60_000);
  const secs = Math.floor((totalMs % 60_000) / 1000);
  const ms = totalMs % 1000;

  const pad = (n: number, width = 2) => String(n).padStart(width, '0');
  return `${pad(hours)}:${pad(minutes)}:${pad(secs)},${pad(ms, 3)}`;
}

export function formatSrt(segments: TranscriptSegment[]): string {
  return segments
    .map((segment, i) => {
      const duration = Number.isFinite(segment.duration) ? segment.duration : 0;
      const start = formatSrtTimestamp(segment.start);
      const end = formatSrtTimestamp(segment.start + duration);
      return `${i + 1}\n${start} --> ${end}\n${segment.text}\n`;
    })
    .join('\n');
}
