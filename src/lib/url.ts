/**
 * Identifier extraction from YouTube video and channel URLs.
 *
 * Patterns are tried in order and the first match wins. Input that matches
 * nothing is passed through unchanged so bare IDs work as well as URLs.
 */

import type { ChannelUrlKind, ChannelUrlMatch } from '../types';

const VIDEO_PATTERNS: RegExp[] = [
  /[?&]v=([\w-]+)/, // youtube.com/watch?v=ID
  /youtu\.be\/([\w-]+)/,
  /youtube\.com\/v\/([\w-]+)/,
  /youtube\.com\/embed\/([\w-]+)/,
  /youtube\.com\/shorts\/([\w-]+)/,
];

const CHANNEL_PATTERNS: Array<{ kind: ChannelUrlKind; pattern: RegExp }> = [
  { kind: 'channel', pattern: /youtube\.com\/channel\/([\w-]+)/ },
  { kind: 'custom', pattern: /youtube\.com\/c\/([^/?#&\s]+)/ },
  { kind: 'handle', pattern: /youtube\.com\/@([^/?#&\s]+)/ },
  { kind: 'user', pattern: /youtube\.com\/user\/([^/?#&\s]+)/ },
];

const BARE_HANDLE = /^@([^/?#&\s]+)$/;

/** Canonical channel ID form: UC followed by 22 URL-safe base64 chars */
export const CHANNEL_ID_PATTERN = /^UC[\w-]{22}$/;

/**
 * Extract a video ID from a URL, or return the input as-is
 */
export function extractVideoId(input: string): string {
  for (const pattern of VIDEO_PATTERNS) {
    const match = input.match(pattern);
    if (match) return match[1];
  }
  return input;
}

/**
 * Classify a channel URL and pull out its identifier fragment
 */
export function matchChannelUrl(input: string): ChannelUrlMatch | null {
  for (const { kind, pattern } of CHANNEL_PATTERNS) {
    const match = input.match(pattern);
    if (match) return { kind, value: safeDecode(match[1]) };
  }

  const handle = input.trim().match(BARE_HANDLE);
  if (handle) return { kind: 'handle', value: handle[1] };

  return null;
}

/**
 * Extract the channel identifier fragment from a URL, or return the input as-is
 */
export function extractChannelIdentifier(input: string): string {
  return matchChannelUrl(input)?.value ?? input;
}

export function isChannelId(value: string): boolean {
  return CHANNEL_ID_PATTERN.test(value);
}

// Custom URLs and handles may be percent-encoded (non-Latin names)
function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
