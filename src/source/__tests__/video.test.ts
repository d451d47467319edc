import { describe, it, expect, afterEach } from 'vitest';
import type { CandidateItem, FetchContext, FetchWarning, Source } from '../adapter.js';
import { VideoFetcher, channelHint, isPlaylistNotFound } from '../video.js';
import { SourceError } from '../../shared/errors.js';
import { ZERO_DELAY_POLICY } from '../../shared/retry.js';
import { installFakeWeb, json, type FakeWeb } from '../../testing/fakeWeb.js';

const API_BASE = 'https://api.example.test/v3';
const CHANNEL = 'UCabcdefghij12';

const SOURCE: Source = {
  id: 7,
  kind: 'Video',
  name: 'Example Channel',
  url: `https://www.youtube.com/channel/${CHANNEL}`,
  channel_id: null,
  is_enabled: 1,
  last_checked_at: null,
  last_success_at: null,
  status: null,
  last_error: null,
  created_at: '2024-01-01 00:00:00',
};

interface FakeChannel {
  uploads: string[][];
  playlists?: Record<string, string[]>;
  titles?: Record<string, string | undefined>;
  missingPlaylists?: string[];
  /** Ids the videos endpoint leaves out, as it does for private or deleted videos. */
  unavailable?: string[];
  handles?: Record<string, string>;
  usernames?: Record<string, string>;
  search?: Record<string, string>;
}

/**
 * In-process stand-in for the video data API: channels, search, playlists, playlistItems, videos.
 */
function fakeApi(channel: FakeChannel) {
  return (url: URL): Response => {
    const endpoint = url.pathname.split('/').pop();
    const q = url.searchParams;
    if (q.get('key') !== 'test-key') return json({ error: 'bad key' }, 403);

    switch (endpoint) {
      case 'channels': {
        const handle = q.get('forHandle');
        const username = q.get('forUsername');
        if (handle !== null || username !== null) {
          const id = handle !== null ? channel.handles?.[handle] : channel.usernames?.[username ?? ''];
          return json({ items: id ? [{ id }] : [] });
        }
        return json({ items: [{ id: q.get('id'), contentDetails: { relatedPlaylists: { uploads: 'UU-uploads' } } }] });
      }
      case 'search': {
        const id = channel.search?.[q.get('q') ?? ''];
        return json({ items: id ? [{ id: { kind: 'youtube#channel', channelId: id } }] : [] });
      }
      case 'playlists':
        return json({ items: Object.keys(channel.playlists ?? {}).map((id) => ({ id })) });
      case 'playlistItems': {
        const playlistId = q.get('playlistId') ?? '';
        if (channel.missingPlaylists?.includes(playlistId)) {
          return json({ error: { errors: [{ reason: 'playlistNotFound' }] } }, 404);
        }
        const pages = playlistId === 'UU-uploads' ? channel.uploads : [channel.playlists?.[playlistId] ?? []];
        const page = Number(q.get('pageToken') ?? '0');
        return json({
          items: pages[page].map((videoId) => ({ contentDetails: videoId ? { videoId } : {} })),
          nextPageToken: page + 1 < pages.length ? String(page + 1) : undefined,
        });
      }
      case 'videos': {
        const ids = (q.get('id') ?? '').split(',').filter((id) => !channel.unavailable?.includes(id));
        return json({
          items: ids.map((id) => ({
            id,
            snippet: {
              title: channel.titles && id in channel.titles ? channel.titles[id] : `Video ${id}`,
              publishedAt: `2024-03-${id.slice(1).padStart(2, '0')}T12:00:00Z`,
            },
          })),
        });
      }
      default:
        return json({}, 404);
    }
  };
}

function context(known: Iterable<string> = [], extra: Partial<FetchContext> = {}): FetchContext {
  const ids = new Set(known);
  return { policy: ZERO_DELAY_POLICY, isKnown: (id) => ids.has(id), uploadsOnly: true, ...extra };
}

async function collect(it: AsyncIterable<CandidateItem | FetchWarning>): Promise<Array<CandidateItem | FetchWarning>> {
  const out: Array<CandidateItem | FetchWarning> = [];
  for await (const entry of it) out.push(entry);
  return out;
}

function ids(entries: Array<CandidateItem | FetchWarning>): string[] {
  return entries.map((e) => ('externalId' in e ? e.externalId : `warning:${e.warning}`));
}

const fetcher = new VideoFetcher({ apiBase: API_BASE, apiKey: 'test-key' });
let web: FakeWeb | undefined;

afterEach(() => {
  web?.restore();
  web = undefined;
});

describe('channelHint', () => {
  it('reads channel ids, handles and usernames from channel urls', () => {
    expect(channelHint(SOURCE.url)).toEqual({ type: 'channel', value: CHANNEL });
    expect(channelHint('https://www.youtube.com/@examplechannel/videos')).toEqual({
      type: 'handle',
      value: 'examplechannel',
    });
    expect(channelHint('https://youtube.com/user/legacyname?view=0')).toEqual({ type: 'username', value: 'legacyname' });
    expect(channelHint('https://video.example.com/somebody')).toBeNull();
  });
});

describe('VideoFetcher channel resolution', () => {
  function endpoints(requested: string[]): string[] {
    return requested.map((u) => {
      const url = new URL(u);
      const lookup = url.searchParams.get('forHandle') ?? url.searchParams.get('forUsername') ?? url.searchParams.get('q');
      return lookup === null ? (url.pathname.split('/').pop() ?? '') : `${url.pathname.split('/').pop()}:${lookup}`;
    });
  }

  it('uses the stored id without a lookup', async () => {
    web = installFakeWeb(fakeApi({ uploads: [['v1']] }));
    const remembered: string[] = [];
    const stored = { ...SOURCE, channel_id: 'UCstoredchannel' };
    await collect(fetcher.fetchCandidates(stored, context([], { rememberChannelId: (id) => remembered.push(id) })));

    expect(new URL(web.requested[0]).searchParams.get('id')).toBe('UCstoredchannel');
    expect(remembered).toEqual([]);
  });

  it('remembers an id taken from a /channel/ url', async () => {
    web = installFakeWeb(fakeApi({ uploads: [['v1']] }));
    const remembered: string[] = [];
    await collect(fetcher.fetchCandidates(SOURCE, context([], { rememberChannelId: (id) => remembered.push(id) })));

    expect(remembered).toEqual([CHANNEL]);
    expect(endpoints(web.requested)[0]).toBe('channels');
  });

  it('resolves a handle url through the channel lookup', async () => {
    web = installFakeWeb(fakeApi({ uploads: [['v1']], handles: { '@examplechannel': CHANNEL } }));
    const remembered: string[] = [];
    const source = { ...SOURCE, url: 'https://www.youtube.com/@examplechannel' };
    const out = await collect(fetcher.fetchCandidates(source, context([], { rememberChannelId: (id) => remembered.push(id) })));

    expect(ids(out)).toEqual(['v1']);
    expect(remembered).toEqual([CHANNEL]);
    expect(endpoints(web.requested).slice(0, 3)).toEqual([
      'channels:examplechannel',
      'channels:@examplechannel',
      'channels',
    ]);
    expect(new URL(web.requested[2]).searchParams.get('id')).toBe(CHANNEL);
  });

  it('resolves a legacy username url', async () => {
    web = installFakeWeb(fakeApi({ uploads: [['v1']], usernames: { legacyname: CHANNEL } }));
    const source = { ...SOURCE, url: 'https://www.youtube.com/user/legacyname' };
    const out = await collect(fetcher.fetchCandidates(source, context()));

    expect(ids(out)).toEqual(['v1']);
    expect(endpoints(web.requested)[0]).toBe('channels:legacyname');
  });

  it('falls back to a channel search by handle, then by source name', async () => {
    web = installFakeWeb(fakeApi({ uploads: [['v1']], search: { 'Example Channel': CHANNEL } }));
    const source = { ...SOURCE, url: 'https://www.youtube.com/@renamed' };
    const out = await collect(fetcher.fetchCandidates(source, context()));

    expect(ids(out)).toEqual(['v1']);
    expect(endpoints(web.requested).slice(0, 4)).toEqual([
      'channels:renamed',
      'channels:@renamed',
      'search:renamed',
      'search:Example Channel',
    ]);
  });

  it('fails the crawl when nothing resolves', async () => {
    web = installFakeWeb(fakeApi({ uploads: [['v1']] }));
    const source = { ...SOURCE, url: 'https://www.youtube.com/@nobody' };
    const crawl = collect(fetcher.fetchCandidates(source, context()));

    await expect(crawl).rejects.toThrow(SourceError);
    await expect(crawl).rejects.toThrow('Could not resolve channel id for source #7');
  });
});

describe('isPlaylistNotFound', () => {
  it('matches 404s and playlistNotFound bodies only', () => {
    expect(isPlaylistNotFound(new SourceError('x', { status: 404 }))).toBe(true);
    expect(isPlaylistNotFound(new SourceError('x', { status: 403, body: '{"reason":"playlistNotFound"}' }))).toBe(true);
    expect(isPlaylistNotFound(new SourceError('x', { status: 403 }))).toBe(false);
    expect(isPlaylistNotFound(new Error('404'))).toBe(false);
  });
});

describe('VideoFetcher', () => {
  it('pages the uploads playlist newest first with candidate urls and dates', async () => {
    web = installFakeWeb(fakeApi({ uploads: [['v5', 'v4'], ['v3']] }));
    const out = await collect(fetcher.fetchCandidates(SOURCE, context()));

    expect(ids(out)).toEqual(['v5', 'v4', 'v3']);
    expect(out[0]).toEqual({
      externalId: 'v5',
      title: 'Video v5',
      url: 'https://www.youtube.com/watch?v=v5',
      publishedAt: '2024-03-05T12:00:00.000Z',
    });
  });

  it('stops listing at the first fully known page', async () => {
    web = installFakeWeb(fakeApi({ uploads: [['v5', 'v4', 'v3'], ['v2', 'v1'], ['v0']] }));
    const out = await collect(fetcher.fetchCandidates(SOURCE, context(['v2', 'v1'])));

    expect(ids(out)).toEqual(['v5', 'v4', 'v3']);
    const paths = web.requested.map((u) => new URL(u).pathname.split('/').pop());
    expect(paths).toEqual(['channels', 'playlistItems', 'videos', 'playlistItems']);
  });

  it('only asks for metadata of unknown videos on a mixed page', async () => {
    web = installFakeWeb(fakeApi({ uploads: [['v3', 'v2', 'v1']] }));
    const out = await collect(fetcher.fetchCandidates(SOURCE, context(['v2', 'v1'])));

    expect(ids(out)).toEqual(['v3']);
    const videosCall = web.requested.find((u) => u.includes('/videos?'));
    expect(new URL(videosCall ?? '').searchParams.get('id')).toBe('v3');
  });

  it('reports entries without ids or titles as warnings', async () => {
    web = installFakeWeb(fakeApi({ uploads: [['v2', '', 'v1']], titles: { v1: undefined } }));
    const out = await collect(fetcher.fetchCandidates(SOURCE, context()));

    expect(ids(out)).toEqual([
      'warning:Playlist entry without videoId',
      'v2',
      'warning:Video metadata missing title',
    ]);
  });

  it('treats unavailable videos as known when deciding to stop', async () => {
    web = installFakeWeb(fakeApi({ uploads: [['v4', 'v3'], ['v2', 'vgone', 'v1'], ['v0']], unavailable: ['vgone'] }));
    const out = await collect(fetcher.fetchCandidates(SOURCE, context(['v2', 'v1'])));

    expect(ids(out)).toEqual(['v4', 'v3']);
    const paths = web.requested.map((u) => new URL(u).pathname.split('/').pop());
    expect(paths).toEqual(['channels', 'playlistItems', 'videos', 'playlistItems', 'videos']);
  });

  it('scans channel playlists unless uploads-only, de-duplicating across them', async () => {
    web = installFakeWeb(
      fakeApi({ uploads: [['v3']], playlists: { PL1: ['v3', 'v2'], PL2: ['v1'] } }),
    );
    const out = await collect(fetcher.fetchCandidates(SOURCE, context([], { uploadsOnly: false })));
    expect(ids(out)).toEqual(['v3', 'v2', 'v1']);
  });

  it('skips missing playlists', async () => {
    web = installFakeWeb(
      fakeApi({ uploads: [['v3']], playlists: { PL1: ['v2'], PL2: ['v1'] }, missingPlaylists: ['PL1'] }),
    );
    const out = await collect(fetcher.fetchCandidates(SOURCE, context([], { uploadsOnly: false })));
    expect(ids(out)).toEqual(['v3', 'v1']);
  });

  it('honours maxItems across playlists', async () => {
    web = installFakeWeb(fakeApi({ uploads: [['v5', 'v4', 'v3']], playlists: { PL1: ['v2'] } }));
    const out = await collect(fetcher.fetchCandidates(SOURCE, context([], { uploadsOnly: false, maxItems: 2 })));
    expect(ids(out)).toEqual(['v5', 'v4']);
    expect(web.requested.some((u) => u.includes('/playlists?'))).toBe(false);
  });

  it('drops videos published before since', async () => {
    web = installFakeWeb(fakeApi({ uploads: [['v5', 'v4', 'v3']] }));
    const out = await collect(fetcher.fetchCandidates(SOURCE, context([], { since: '2024-03-04T00:00:00.000Z' })));
    expect(ids(out)).toEqual(['v5', 'v4']);
  });

  it('fails without an api key', async () => {
    const keyless = new VideoFetcher({ apiBase: API_BASE, apiKey: '' });
    await expect(collect(keyless.fetchCandidates(SOURCE, context()))).rejects.toThrow(
      'YouTube API key is not configured',
    );
  });
});
