/**
 * Channel resolution and video enumeration over the YouTube Data API
 */

import { google } from 'googleapis';
import type { ChannelLookup, ChannelUrlMatch, SearchItem } from '../types';
import { errorMessage, log } from './logger';
import { isChannelId, matchChannelUrl } from './url';

/** Largest page size the search endpoint accepts */
export const MAX_RESULTS_PER_PAGE = 50;

/**
 * Build a ChannelLookup backed by the YouTube Data API v3.
 * Without a key every call fails at request time with an authorization error.
 */
export function createYouTubeLookup(apiKey?: string): ChannelLookup {
  const youtube = google.youtube({ version: 'v3', auth: apiKey });

  return {
    async searchChannels(query) {
      const res = await youtube.search.list({
        part: ['snippet'],
        q: query,
        type: ['channel'],
        maxResults: 1,
      });
      return res.data.items ?? [];
    },

    async findChannelsByUsername(username) {
      const res = await youtube.channels.list({
        part: ['id'],
        forUsername: username,
      });
      return (res.data.items ?? []).flatMap((item) => (item.id ? [item.id] : []));
    },

    async listVideoPage(channelId, pageToken) {
      const res = await youtube.search.list({
        part: ['id'],
        channelId,
        type: ['video'],
        maxResults: MAX_RESULTS_PER_PAGE,
        pageToken,
      });
      return { items: res.data.items ?? [], nextPageToken: res.data.nextPageToken };
    },
  };
}

interface ResolveStrategy {
  name: string;
  applies: (match: ChannelUrlMatch | null, input: string) => boolean;
  resolve: (
    match: ChannelUrlMatch | null,
    input: string,
    lookup: ChannelLookup
  ) => Promise<string | null>;
}

function firstChannelId(items: SearchItem[]): string | null {
  const [first] = items;
  return first?.id?.channelId ?? first?.snippet?.channelId ?? null;
}

const searchFor = async (query: string, lookup: ChannelLookup) =>
  firstChannelId(await lookup.searchChannels(query));

/**
 * Tried in order; the first strategy to produce an ID wins
 */
const STRATEGIES: ResolveStrategy[] = [
  {
    name: 'direct channel ID',
    applies: (match, input) =>
      match ? match.kind === 'channel' && isChannelId(match.value) : isChannelId(input.trim()),
    resolve: async (match, input) => match?.value ?? input.trim(),
  },
  {
    name: 'channel search',
    applies: (match) => match?.kind === 'custom' || match?.kind === 'handle',
    resolve: async (match, _input, lookup) => {
      if (!match) return null;
      return searchFor(match.kind === 'handle' ? `@${match.value}` : match.value, lookup);
    },
  },
  {
    name: 'username lookup',
    applies: (match) => match?.kind === 'user',
    resolve: async (match, _input, lookup) => {
      if (!match) return null;
      const [id] = await lookup.findChannelsByUsername(match.value);
      return id ?? null;
    },
  },
  {
    name: 'free-text search',
    applies: () => true,
    resolve: (_match, input, lookup) => searchFor(input, lookup),
  },
];

/**
 * Resolve any channel URL, handle or ID to a canonical channel ID.
 * Returns null when nothing resolves; lookup errors never escape.
 */
export async function resolveChannelId(
  input: string,
  lookup: ChannelLookup
): Promise<string | null> {
  const match = matchChannelUrl(input);

  for (const strategy of STRATEGIES) {
    if (!strategy.applies(match, input)) continue;

    try {
      const channelId = await strategy.resolve(match, input, lookup);
      if (channelId) return channelId;
    } catch (error) {
      log.warn(`Channel ${strategy.name} failed: ${errorMessage(error)}`);
    }
  }

  return null;
}

/**
 * List every video ID on a channel, following page tokens.
 * A failing page ends enumeration with whatever was collected so far.
 */
export async function listChannelVideos(
  channelId: string,
  lookup: ChannelLookup
): Promise<string[]> {
  const videoIds: string[] = [];
  let pageToken: string | undefined;

  do {
    try {
      const page = await lookup.listVideoPage(channelId, pageToken);
      for (const item of page.items) {
        const videoId = item.id?.videoId;
        if (videoId) videoIds.push(videoId);
      }
      pageToken = page.nextPageToken ?? undefined;
    } catch (error) {
      log.warn(`Stopped listing videos after ${videoIds.length}: ${errorMessage(error)}`);
      break;
    }
  } while (pageToken);

  return videoIds;
}
