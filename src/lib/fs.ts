/**
 * File utilities for transcript input and output
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';

/**
 * Read a text file and split it into lines (CRLF or LF), untrimmed
 */
export async function readLines(path: string): Promise<string[]> {
  const content = await readFile(path, 'utf-8');
  return content.split(/\r?\n/);
}

/**
 * Write UTF-8 content to file, replacing anything already there
 */
export async function writeTextFile(path: string, content: string): Promise<void> {
  await writeFile(path, content, 'utf-8');
}

/**
 * Create a directory and its parents; no-op when it already exists
 */
export async function ensureDir(path: string): Promise<void> {
  await mkdir(path, { recursive: true });
}
