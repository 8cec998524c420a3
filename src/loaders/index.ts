/**
 * Input loaders for batch downloads
 */

import { readLines } from '../lib/fs';
import { extractVideoId } from '../lib/url';

/**
 * Non-blank, trimmed lines of a URL list file in file order
 */
export async function loadUrlList(filePath: string): Promise<string[]> {
  const lines = await readLines(filePath);
  return lines.map((l) => l.trim()).filter((l) => l.length > 0);
}

/**
 * Map video URLs or IDs to video IDs, keeping order and duplicates
 */
export function fromVideoUrls(inputs: string[]): string[] {
  return inputs.map((input) => extractVideoId(input.trim()));
}
