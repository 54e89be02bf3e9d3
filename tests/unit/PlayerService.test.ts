// tests/unit/PlayerService.test.ts

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import nock from 'nock';
import type { PlayerContext } from '../../src/player/PlayerService';
import {
  ACCOUNTS,
  GITHUB_API,
  GIST_PATH,
  NOW,
  SPOTIFY_API,
  createCore,
  credentials,
  gistBody,
  locator,
  type Core,
} from '../helpers/core';

const ctx: PlayerContext = { credentials, locator };

const playing = {
  is_playing: true,
  progress_ms: 30000,
  item: {
    id: 'track-1',
    name: 'Night Drive',
    duration_ms: 120000,
    artists: [{ name: 'Artist One' }],
    album: { name: 'Late Hours', images: [{ url: 'https://img.example/640.jpg' }] },
  },
  device: { name: 'Desk', volume_percent: 55 },
  shuffle_state: false,
  repeat_state: 'off',
  context: { uri: 'spotify:playlist:p1' },
};

describe('PlayerService', () => {
  let core: Core;
  let api: nock.Scope;

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(NOW * 1000);
    core = createCore();
    nock(GITHUB_API)
      .persist()
      .get(GIST_PATH)
      .reply(200, gistBody({ access_token: 'A1', refresh_token: 'R1', expires_at: NOW + 3000 }));
    api = nock(SPOTIFY_API).matchHeader('authorization', 'Bearer A1');
  });

  afterEach(() => {
    nock.cleanAll();
    vi.useRealTimers();
  });

  describe('current', () => {
    it('should map playback and add the liked flag', async () => {
      api.get('/v1/me/player').reply(200, playing);
      api.get('/v1/me/tracks/contains').query({ ids: 'track-1' }).reply(200, [true]);

      const view = await core.player.current(ctx);

      expect(view).toMatchObject({
        isPlaying: true,
        track: 'Night Drive',
        progress: '00:30 / 02:00',
        progressPercent: 25,
        thumbnail: 'https://img.example/640.jpg',
        trackId: 'track-1',
        isLiked: true,
      });
    });

    it('should check the liked flag with a token renewed by the first call', async () => {
      api.get('/v1/me/player').reply(401, {});
      nock(ACCOUNTS).post('/api/token').once().reply(200, { access_token: 'A2', expires_in: 3600 });
      nock(GITHUB_API).patch(GIST_PATH).reply(200, {});
      const renewed = nock(SPOTIFY_API).matchHeader('authorization', 'Bearer A2');
      renewed.get('/v1/me/player').reply(200, playing);
      renewed.get('/v1/me/tracks/contains').query({ ids: 'track-1' }).reply(200, [false]);

      const view = await core.player.current(ctx);

      expect(view).toMatchObject({ trackId: 'track-1', isLiked: false });
      expect(renewed.isDone()).toBe(true);
    });

    it('should set isLiked to null when the check fails', async () => {
      api.get('/v1/me/player').reply(200, playing);
      api.get('/v1/me/tracks/contains').query({ ids: 'track-1' }).reply(500, {});

      const view = await core.player.current(ctx);

      expect(view).toMatchObject({ trackId: 'track-1', isLiked: null });
    });

    it('should report nothing playing on 204', async () => {
      api.get('/v1/me/player').reply(204);

      expect(await core.player.current(ctx)).toEqual({
        isPlaying: false,
        message: 'Nothing playing',
      });
    });

    it('should throw an UpstreamError carrying the upstream status', async () => {
      api.get('/v1/me/player').reply(429, { error: { message: 'rate limited' } });

      await expect(core.player.current(ctx)).rejects.toMatchObject({
        code: 'UPSTREAM_ERROR',
        statusCode: 429,
      });
    });
  });

  describe('transport commands', () => {
    it('should play, pause and skip', async () => {
      api.put('/v1/me/player/play').reply(204);
      api.put('/v1/me/player/pause').reply(204);
      api.post('/v1/me/player/next').reply(204);
      api.post('/v1/me/player/previous').reply(200, {});

      expect(await core.player.play(ctx)).toEqual({ success: true, action: 'play' });
      expect(await core.player.pause(ctx)).toEqual({ success: true, action: 'pause' });
      expect(await core.player.next(ctx)).toEqual({ success: true, action: 'next' });
      expect(await core.player.previous(ctx)).toEqual({ success: true, action: 'previous' });
    });

    it('should set shuffle, volume and position through query parameters', async () => {
      api.put('/v1/me/player/shuffle').query({ state: 'true' }).reply(204);
      api.put('/v1/me/player/volume').query({ volume_percent: '35' }).reply(204);
      api.put('/v1/me/player/seek').query({ position_ms: '90000' }).reply(204);

      expect(await core.player.shuffle(ctx, true)).toEqual({ success: true, shuffleState: true });
      expect(await core.player.volume(ctx, 35)).toEqual({ success: true, volumePercent: 35 });
      expect(await core.player.seek(ctx, 90000)).toEqual({ success: true, positionMs: 90000 });
    });

    it('should reject a volume outside 0..100 before calling upstream', async () => {
      await expect(core.player.volume(ctx, 101)).rejects.toMatchObject({
        code: 'VALIDATION_ERROR',
        message: 'Volume must be between 0 and 100',
      });
    });

    it('should reject a negative seek position', async () => {
      await expect(core.player.seek(ctx, -1)).rejects.toMatchObject({ code: 'VALIDATION_ERROR' });
    });
  });

  describe('library', () => {
    it('should save the current track', async () => {
      api.get('/v1/me/player').reply(200, playing);
      api.put('/v1/me/tracks').query({ ids: 'track-1' }).reply(200, {});

      expect(await core.player.like(ctx)).toEqual({
        success: true,
        action: 'liked',
        trackId: 'track-1',
      });
    });

    it('should remove the current track', async () => {
      api.get('/v1/me/player').reply(200, playing);
      api.delete('/v1/me/tracks').query({ ids: 'track-1' }).reply(200, {});

      expect(await core.player.dislike(ctx)).toEqual({
        success: true,
        action: 'disliked',
        trackId: 'track-1',
      });
    });

    it('should fail with NO_TRACK_PLAYING when nothing plays', async () => {
      api.get('/v1/me/player').reply(204);

      await expect(core.player.like(ctx)).rejects.toMatchObject({
        code: 'NO_TRACK_PLAYING',
        statusCode: 400,
      });
    });
  });

  describe('queue', () => {
    const queue = {
      currently_playing: playing.item,
      queue: [
        { id: 'q1', name: 'First', artists: [{ name: 'A' }], album: { name: 'X' } },
        { id: 'q2', name: 'Second', artists: [{ name: 'B' }, { name: 'C' }], album: { name: 'Y' } },
      ],
    };

    it('should list the current track and what comes next', async () => {
      api.get('/v1/me/player/queue').reply(200, queue);

      const view = await core.player.queue(ctx);

      expect(view.currentlyPlaying?.id).toBe('track-1');
      expect(view.upNext.map((item) => [item.index, item.id])).toEqual([
        [1, 'q1'],
        [2, 'q2'],
      ]);
      expect(view.total).toBe(2);
    });

    it('should play a queued track within the current context', async () => {
      api.get('/v1/me/player').reply(200, playing);
      api.get('/v1/me/player/queue').reply(200, queue);
      api
        .put('/v1/me/player/play', {
          context_uri: 'spotify:playlist:p1',
          offset: { uri: 'spotify:track:q2' },
        })
        .reply(204);

      const result = await core.player.playFromQueue(ctx, 2);

      expect(result).toEqual({
        success: true,
        message: 'Now playing Second by B, C',
        trackId: 'q2',
        usedContext: true,
      });
    });

    it('should play by uri without a context', async () => {
      api.get('/v1/me/player').reply(200, { ...playing, context: null });
      api.get('/v1/me/player/queue').reply(200, queue);
      api.put('/v1/me/player/play', { uris: ['spotify:track:track-1'] }).reply(204);

      const result = await core.player.playFromQueue(ctx, 0);

      expect(result.usedContext).toBe(false);
      expect(result.trackId).toBe('track-1');
    });

    it('should carry a renewed token through the rest of the command', async () => {
      api.get('/v1/me/player').reply(401, { error: { status: 401 } });
      const tokenScope = nock(ACCOUNTS)
        .post('/api/token', { grant_type: 'refresh_token', refresh_token: 'R1' })
        .once()
        .reply(200, { access_token: 'A2', expires_in: 3600 });
      nock(GITHUB_API).patch(GIST_PATH).reply(200, {});
      const renewed = nock(SPOTIFY_API).matchHeader('authorization', 'Bearer A2');
      renewed.get('/v1/me/player').reply(200, playing);
      renewed.get('/v1/me/player/queue').reply(200, queue);
      renewed
        .put('/v1/me/player/play', {
          context_uri: 'spotify:playlist:p1',
          offset: { uri: 'spotify:track:q1' },
        })
        .reply(204);

      const result = await core.player.playFromQueue(ctx, 1);

      expect(result.trackId).toBe('q1');
      expect(tokenScope.isDone()).toBe(true);
      expect(renewed.isDone()).toBe(true);
    });

    it('should reject an index past the end', async () => {
      api.get('/v1/me/player').reply(200, playing);
      api.get('/v1/me/player/queue').reply(200, queue);

      await expect(core.player.playFromQueue(ctx, 3)).rejects.toMatchObject({
        code: 'VALIDATION_ERROR',
        message: 'Index 3 out of range',
      });
    });
  });
});
