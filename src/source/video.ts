import { z } from 'zod';
import {
  toFetchWarning,
  type CandidateItem,
  type FetchContext,
  type Fetcher,
  type FetchWarning,
  type Source,
} from './adapter.js';
import { getJsonWithRetry, type HttpOptions } from './http.js';
import { ParseError, SourceError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { sleep, toIsoTimestamp } from '../shared/utils.js';

export interface VideoApiOptions {
  apiBase: string;
  apiKey: string;
}

const PAGE_SIZE = 50;

// Every field is optional upstream; missing ones are handled, not rejected.
const ChannelsSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.string().optional(),
        contentDetails: z
          .object({ relatedPlaylists: z.object({ uploads: z.string().optional() }).partial().optional() })
          .partial()
          .optional(),
      }),
    )
    .default([]),
});

const SearchSchema = z.object({
  items: z.array(z.object({ id: z.object({ channelId: z.string().optional() }).optional() })).default([]),
});

const PlaylistItemsSchema = z.object({
  items: z
    .array(z.object({ contentDetails: z.object({ videoId: z.string().optional() }).optional() }))
    .default([]),
  nextPageToken: z.string().optional(),
});

const PlaylistsSchema = z.object({
  items: z.array(z.object({ id: z.string().optional() })).default([]),
  nextPageToken: z.string().optional(),
});

const VideosSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.string().optional(),
        snippet: z.object({ title: z.string().optional(), publishedAt: z.string().optional() }).optional(),
      }),
    )
    .default([]),
});

interface VideoMeta {
  title?: string;
  publishedAt: string | null;
}

const CHANNEL_URL = /\/channel\/(UC[0-9A-Za-z_-]{10,})/;
const HANDLE_URL = /youtube\.com\/@([^/?#]+)/;
const USER_URL = /youtube\.com\/user\/([^/?#]+)/;

export type ChannelHint =
  | { type: 'channel'; value: string }
  | { type: 'handle'; value: string }
  | { type: 'username'; value: string };

/**
 * What a channel URL says about its channel: the id itself, a handle, or a legacy username.
 */
export function channelHint(url: string): ChannelHint | null {
  const channel = CHANNEL_URL.exec(url);
  if (channel) return { type: 'channel', value: channel[1] };
  const handle = HANDLE_URL.exec(url);
  if (handle) return { type: 'handle', value: handle[1] };
  const user = USER_URL.exec(url);
  if (user) return { type: 'username', value: user[1] };
  return null;
}

export function isPlaylistNotFound(err: unknown): boolean {
  if (!(err instanceof SourceError)) return false;
  const details = err.details ?? {};
  const body = details['body'];
  return (typeof body === 'string' && body.includes('playlistNotFound')) || details['status'] === 404;
}

/**
 * Mutable state of one channel crawl.
 */
interface CrawlState {
  ctx: FetchContext;
  requests: number;
  seen: Set<string>;
  /** Candidates still allowed; negative means unlimited. */
  remaining: number;
}

export class VideoFetcher implements Fetcher {
  readonly kind = 'Video' as const;

  constructor(
    private readonly api: VideoApiOptions,
    private readonly http: HttpOptions = {},
  ) {}

  private async call<S extends z.ZodTypeAny>(
    endpoint: string,
    params: Record<string, string | number | undefined>,
    schema: S,
    state: CrawlState,
  ): Promise<z.infer<S>> {
    if (!this.api.apiKey) {
      throw new SourceError('YouTube API key is not configured', { endpoint });
    }
    if (state.requests > 0) await sleep(state.ctx.policy.interRequestMs);
    state.requests++;

    const query = new URLSearchParams();
    for (const [k, v] of Object.entries(params)) {
      if (v !== undefined && v !== '') query.set(k, String(v));
    }
    query.set('key', this.api.apiKey);

    const url = `${this.api.apiBase.replace(/\/+$/, '')}/${endpoint}?${query.toString()}`;
    const json = await getJsonWithRetry(url, state.ctx.policy, this.http);
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new SourceError(`Unexpected ${endpoint} response shape`, { endpoint });
    }
    return parsed.data;
  }

  private async lookupChannel(
    params: { forHandle: string } | { forUsername: string },
    state: CrawlState,
  ): Promise<string | null> {
    const res = await this.call('channels', { part: 'id', ...params, maxResults: 1 }, ChannelsSchema, state);
    return res.items[0]?.id ?? null;
  }

  private async searchChannel(term: string, state: CrawlState): Promise<string | null> {
    const res = await this.call('search', { part: 'id', type: 'channel', maxResults: 1, q: term }, SearchSchema, state);
    return res.items[0]?.id?.channelId ?? null;
  }

  /**
   * Stored id first, then the URL: a `/channel/` id directly, a handle or username through
   * the channel lookup, and a channel search by handle, username or source name as a last
   * resort. A newly resolved id is handed to `ctx.rememberChannelId`.
   */
  private async resolveChannelId(source: Source, state: CrawlState): Promise<string> {
    if (source.channel_id) return source.channel_id;

    const hint = channelHint(source.url);
    let channelId: string | null = null;
    if (hint?.type === 'channel') {
      channelId = hint.value;
    } else if (hint?.type === 'handle') {
      channelId =
        (await this.lookupChannel({ forHandle: hint.value }, state)) ??
        (await this.lookupChannel({ forHandle: `@${hint.value}` }, state));
    } else if (hint?.type === 'username') {
      channelId = await this.lookupChannel({ forUsername: hint.value }, state);
    }

    if (!channelId) {
      const terms = [...new Set([hint?.value, source.name].filter((t): t is string => Boolean(t)))];
      for (const term of terms) {
        channelId = await this.searchChannel(term, state);
        if (channelId) break;
      }
    }
    if (!channelId) {
      throw new SourceError(`Could not resolve channel id for source #${source.id}`, {
        sourceId: source.id,
        url: source.url,
      });
    }

    logger.info({ sourceId: source.id, channelId }, 'Resolved channel id');
    state.ctx.rememberChannelId?.(channelId);
    return channelId;
  }

  private async uploadsPlaylistId(channelId: string, state: CrawlState): Promise<string | null> {
    const res = await this.call('channels', { part: 'contentDetails', id: channelId, maxResults: 1 }, ChannelsSchema, state);
    return res.items[0]?.contentDetails?.relatedPlaylists?.uploads ?? null;
  }

  private async *channelPlaylists(channelId: string, state: CrawlState): AsyncGenerator<string> {
    const limit = state.ctx.playlistsLimit ?? 0;
    let pageToken: string | undefined;
    let seen = 0;
    do {
      const res = await this.call(
        'playlists',
        { part: 'id', channelId, maxResults: PAGE_SIZE, pageToken },
        PlaylistsSchema,
        state,
      );
      for (const it of res.items) {
        if (!it.id) continue;
        yield it.id;
        seen++;
        if (limit > 0 && seen >= limit) return;
      }
      pageToken = res.nextPageToken;
    } while (pageToken);
  }

  private async videoMeta(ids: string[], state: CrawlState): Promise<Map<string, VideoMeta>> {
    const meta = new Map<string, VideoMeta>();
    for (let i = 0; i < ids.length; i += PAGE_SIZE) {
      const batch = ids.slice(i, i + PAGE_SIZE);
      const res = await this.call(
        'videos',
        { part: 'snippet', id: batch.join(','), maxResults: PAGE_SIZE },
        VideosSchema,
        state,
      );
      for (const it of res.items) {
        if (!it.id) continue;
        meta.set(it.id, {
          title: it.snippet?.title?.trim() || undefined,
          publishedAt: toIsoTimestamp(it.snippet?.publishedAt),
        });
      }
    }
    return meta;
  }

  /**
   * Page through one playlist, yielding unseen videos. Stops on the last page, or on a
   * page whose videos are all already stored.
   */
  private async *playlistVideos(
    playlistId: string,
    state: CrawlState,
  ): AsyncGenerator<CandidateItem | FetchWarning> {
    const { ctx } = state;
    let pageToken: string | undefined;
    do {
      const res = await this.call(
        'playlistItems',
        { part: 'contentDetails', playlistId, maxResults: PAGE_SIZE, pageToken },
        PlaylistItemsSchema,
        state,
      );

      const pageIds: string[] = [];
      for (const it of res.items) {
        const vid = it.contentDetails?.videoId;
        if (!vid) {
          yield toFetchWarning(new ParseError('Playlist entry without videoId', { playlistId }));
          continue;
        }
        if (state.seen.has(vid)) continue;
        state.seen.add(vid);
        pageIds.push(vid);
      }

      const unknown = pageIds.filter((vid) => !ctx.isKnown(vid));
      if (pageIds.length > 0 && unknown.length === 0) {
        logger.debug({ playlistId }, 'Page fully known, stopping listing');
        return;
      }

      const meta = await this.videoMeta(unknown, state);
      for (const vid of unknown) {
        const m = meta.get(vid);
        if (!m) {
          logger.debug({ playlistId, videoId: vid }, 'Video unavailable, skipping');
          continue;
        }
        if (!m.title) {
          yield toFetchWarning(new ParseError('Video metadata missing title', { playlistId, videoId: vid }));
          continue;
        }
        if (ctx.since && m.publishedAt && m.publishedAt < ctx.since) continue;

        yield {
          externalId: vid,
          title: m.title,
          url: `https://www.youtube.com/watch?v=${vid}`,
          publishedAt: m.publishedAt ?? undefined,
        };
        if (state.remaining > 0 && --state.remaining === 0) return;
      }

      // Videos without usable metadata (private, deleted) are never stored, so they count as known here.
      const storable = unknown.filter((vid) => meta.get(vid)?.title);
      if (storable.length === 0 && unknown.length < pageIds.length) {
        logger.debug({ playlistId }, 'Page known apart from unavailable videos, stopping listing');
        return;
      }

      pageToken = res.nextPageToken;
    } while (pageToken);
  }

  async *fetchCandidates(source: Source, ctx: FetchContext): AsyncGenerator<CandidateItem | FetchWarning> {
    const state: CrawlState = {
      ctx,
      requests: 0,
      seen: new Set<string>(),
      remaining: ctx.maxItems && ctx.maxItems > 0 ? ctx.maxItems : -1,
    };
    const channelId = await this.resolveChannelId(source, state);

    const uploads = await this.uploadsPlaylistId(channelId, state);
    if (uploads) {
      try {
        yield* this.playlistVideos(uploads, state);
      } catch (err) {
        if (!isPlaylistNotFound(err)) throw err;
        logger.warn({ sourceId: source.id, playlistId: uploads }, 'Uploads playlist not found');
      }
    } else {
      logger.warn({ sourceId: source.id, channelId }, 'No uploads playlist found');
    }
    if (state.remaining === 0 || ctx.uploadsOnly) return;

    let scanned = 0;
    for await (const playlistId of this.channelPlaylists(channelId, state)) {
      scanned++;
      try {
        yield* this.playlistVideos(playlistId, state);
      } catch (err) {
        if (!isPlaylistNotFound(err)) throw err;
        logger.warn({ sourceId: source.id, playlistId }, 'Playlist not found, skipping');
      }
      if (state.remaining === 0) break;
    }
    logger.debug({ sourceId: source.id, playlists: scanned }, 'Playlists scanned');
  }
}
