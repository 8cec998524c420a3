/**
 * Interactive menu and the three download workflows
 */

import { join } from 'node:path';
import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { listChannelVideos, resolveChannelId } from './lib/channel';
import { ensureDir } from './lib/fs';
import { dim, errorMessage, green, log, red, yellow } from './lib/logger';
import { processVideos } from './lib/processor';
import { extractVideoId } from './lib/url';
import { fromVideoUrls, loadUrlList } from './loaders';
import type {
  AppConfig,
  ChannelLookup,
  OutputFormat,
  RunSummary,
  TranscriptSource,
  VideoResult,
} from './types';

export const SINGLE_VIDEOS_DIR = 'single_videos';
export const MULTIPLE_VIDEOS_DIR = 'multiple_videos';

export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

export class InputClosedError extends Error {
  constructor() {
    super('Input stream closed');
    this.name = 'InputClosedError';
  }
}

/**
 * Line prompter over stdin/stdout (or any pair of streams).
 * Lines that arrive before a question is asked are queued, so piped
 * answers are not lost.
 */
export function createPrompter(
  input: Readable = process.stdin,
  output: Writable = process.stdout
): Prompter {
  const rl = createInterface({ input, terminal: false });
  const lines: string[] = [];
  const waiters: Array<{ resolve: (line: string) => void; reject: (error: Error) => void }> = [];
  let closed = false;

  rl.on('line', (line) => {
    const waiter = waiters.shift();
    if (waiter) waiter.resolve(line);
    else lines.push(line);
  });
  rl.on('close', () => {
    closed = true;
    for (const waiter of waiters.splice(0)) waiter.reject(new InputClosedError());
  });

  return {
    ask(question) {
      output.write(question);
      const line = lines.shift();
      if (line !== undefined) return Promise.resolve(line);
      if (closed) return Promise.reject(new InputClosedError());
      return new Promise((resolve, reject) => {
        waiters.push({ resolve, reject });
      });
    },
    close() {
      rl.close();
    },
  };
}

export interface WorkflowDeps {
  prompter: Prompter;
  lookup: ChannelLookup;
  config: AppConfig;
  /** Overrides the transcript source, mainly for tests */
  source?: TranscriptSource;
}

const FORMAT_CHOICES: OutputFormat[] = ['json', 'txt', 'srt'];

/**
 * Ask until the answer is a whole number in [min, max]
 */
export async function promptNumber(
  prompter: Prompter,
  question: string,
  min: number,
  max: number
): Promise<number> {
  for (;;) {
    const answer = (await prompter.ask(question)).trim();
    if (!/^\d+$/.test(answer)) {
      console.log('Please enter a valid number.');
      continue;
    }
    const value = Number(answer);
    if (value >= min && value <= max) return value;
    console.log(`Please enter a number between ${min} and ${max}.`);
  }
}

export async function promptFormat(prompter: Prompter): Promise<OutputFormat> {
  console.log('\nSelect output format:');
  console.log('1. JSON');
  console.log('2. TXT');
  console.log('3. SRT');
  const choice = await promptNumber(prompter, 'Enter format (1-3): ', 1, FORMAT_CHOICES.length);
  return FORMAT_CHOICES[choice - 1];
}

function displayMenu(): void {
  console.log('\n=== YouTube Transcript Downloader ===');
  console.log('1. Download ALL transcripts from a YouTube channel');
  console.log('2. Download transcript from a specific video');
  console.log('3. Download transcripts from multiple videos (using a file)');
  console.log('4. Exit');
  console.log('=====================================');
}

function describeResult(result: VideoResult): string {
  switch (result.status) {
    case 'ok':
      return `[${result.videoId}] ${green('OK')} ${dim(result.path ?? '')}`;
    case 'no_captions':
      return `[${result.videoId}] ${yellow('NO CAPTIONS')}`;
    default:
      return `[${result.videoId}] ${red('FAIL')} ${dim(result.error ?? '')}`;
  }
}

function printSummary(summary: RunSummary): void {
  console.log(
    `\n${green('Done!')} ${summary.successful} succeeded, ${summary.failed} failed, ` +
      `${summary.noCaptions} without captions (${summary.total} total)`
  );
}

async function downloadAll(
  videoIds: string[],
  outputDir: string,
  format: OutputFormat,
  deps: WorkflowDeps
): Promise<RunSummary> {
  await ensureDir(outputDir);
  log.info(`Processing ${videoIds.length} video(s) into ${outputDir}...\n`);

  const { summary } = await processVideos(videoIds, {
    outputDir,
    format,
    lang: deps.config.language,
    source: deps.source,
    onProgress: (done, total, result) => {
      console.log(`${dim(`(${done}/${total})`)} ${describeResult(result)}`);
    },
  });

  printSummary(summary);
  return summary;
}

/**
 * Workflow 1: every video on a channel into `<root>/<channelId>/`.
 * Returns null when the channel cannot be resolved or lists no videos.
 */
export async function downloadChannelTranscripts(
  channelUrl: string,
  deps: WorkflowDeps
): Promise<RunSummary | null> {
  const format = await promptFormat(deps.prompter);

  log.info(`Resolving channel ${channelUrl}...`);
  const channelId = await resolveChannelId(channelUrl.trim(), deps.lookup);
  if (!channelId) {
    log.error(`Could not resolve a channel ID for ${channelUrl}`);
    return null;
  }
  log.success(`Channel ID: ${channelId}`);

  const outputDir = join(deps.config.outputRoot, channelId);
  await ensureDir(outputDir);

  const videoIds = await listChannelVideos(channelId, deps.lookup);
  if (!videoIds.length) {
    log.warn('No videos found for this channel (or the channel is not accessible)');
    return null;
  }
  log.success(`Found ${videoIds.length} videos`);

  return downloadAll(videoIds, outputDir, format, deps);
}

/**
 * Workflow 2: one video into `<root>/single_videos/`
 */
export async function downloadSingleVideoTranscript(
  videoUrl: string,
  deps: WorkflowDeps
): Promise<RunSummary> {
  const format = await promptFormat(deps.prompter);
  const videoId = extractVideoId(videoUrl.trim());
  return downloadAll([videoId], join(deps.config.outputRoot, SINGLE_VIDEOS_DIR), format, deps);
}

/**
 * Workflow 3: every non-blank line of a file into `<root>/multiple_videos/`.
 * Returns null when the file cannot be read.
 */
export async function downloadMultipleVideoTranscripts(
  filePath: string,
  deps: WorkflowDeps
): Promise<RunSummary | null> {
  const format = await promptFormat(deps.prompter);

  let urls: string[];
  try {
    urls = await loadUrlList(filePath.trim());
  } catch (error) {
    log.error(`Failed to read ${filePath}: ${errorMessage(error)}`);
    return null;
  }

  if (!urls.length) {
    log.warn(`No video URLs found in ${filePath}`);
    return null;
  }

  return downloadAll(
    fromVideoUrls(urls),
    join(deps.config.outputRoot, MULTIPLE_VIDEOS_DIR),
    format,
    deps
  );
}

/**
 * Show the menu until the user picks Exit (or input ends)
 */
export async function runMenu(deps: WorkflowDeps): Promise<void> {
  const { prompter } = deps;

  try {
    for (;;) {
      displayMenu();
      const choice = await promptNumber(prompter, '\nEnter your choice (1-4): ', 1, 4);

      if (choice === 1) {
        const url = await prompter.ask('Enter the YouTube channel URL: ');
        await downloadChannelTranscripts(url, deps);
      } else if (choice === 2) {
        const url = await prompter.ask('Enter the YouTube video URL: ');
        await downloadSingleVideoTranscript(url, deps);
      } else if (choice === 3) {
        const filePath = await prompter.ask('Enter the path to the file containing video URLs: ');
        await downloadMultipleVideoTranscripts(filePath, deps);
      } else {
        console.log('\nThank you for using YouTube Transcript Downloader!');
        return;
      }
    }
  } catch (error) {
    if (error instanceof InputClosedError) return;
    throw error;
  }
}
