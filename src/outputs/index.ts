/**
 * Transcript exporters, one per output format
 */

import { writeTextFile } from '../lib/fs';
import type { OutputFormat, TranscriptSegment } from '../types';
import { formatJson } from './json';
import { formatSrt } from './srt';
import { formatText } from './text';

export { formatJson } from './json';
export { formatSrt, formatSrtTimestamp } from './srt';
export { formatText } from './text';

export interface TranscriptExporter {
  readonly extension: string;
  format(segments: TranscriptSegment[]): string;
}

export const EXPORTERS: Record<OutputFormat, TranscriptExporter> = {
  json: { extension: 'json', format: formatJson },
  txt: { extension: 'txt', format: formatText },
  srt: { extension: 'srt', format: formatSrt },
};

/**
 * Output path for a path stem (no extension) in the given format
 */
export function transcriptPath(pathStem: string, format: OutputFormat): string {
  return `${pathStem}.${EXPORTERS[format].extension}`;
}

/**
 * Write segments to `<pathStem>.<ext>`, overwriting any existing file.
 * Write errors propagate to the caller.
 */
export async function exportTranscript(
  segments: TranscriptSegment[],
  pathStem: string,
  format: OutputFormat
): Promise<void> {
  await writeTextFile(transcriptPath(pathStem, format), EXPORTERS[format].format(segments));
}
