// src/player/PlayerService.ts

import { z } from 'zod';
import type { TokenAccessor } from '../core/token/TokenAccessor';
import type { UpstreamDispatcher } from '../core/http/UpstreamDispatcher';
import type { DispatchResponse, HttpMethod } from '../core/http/types';
import type { ClientCredentials, StorageLocator } from '../core/token/types';
import type { Logger } from '../observability/Logger';
import { NoTrackPlayingError, UpstreamError, ValidationError } from '../utils/errors';
import { joinArtists, mapPlaybackState, mapQueue } from './PlaybackMapper';
import { PlaybackStateSchema, QueueSchema } from './types';
import type {
  LibraryAction,
  PlaybackState,
  PlaybackView,
  PlayerAction,
  QueuePlayResult,
  QueueView,
  Track,
} from './types';

export interface PlayerContext {
  credentials: ClientCredentials;
  locator: StorageLocator;
}

interface CallOptions {
  body?: unknown;
  query?: Record<string, string | number | boolean>;
}

const LikedSchema = z.array(z.boolean());

/**
 * Playback commands against the upstream player API. Each command fetches a
 * valid token once and goes through the dispatcher's 401 retry; follow-up
 * calls use the token the previous response reports.
 */
export class PlayerService {
  constructor(
    private accessor: TokenAccessor,
    private dispatcher: UpstreamDispatcher,
    private logger: Logger
  ) {}

  async current(ctx: PlayerContext): Promise<PlaybackView> {
    const token = await this.token(ctx);
    const response = await this.send(ctx, token, 'GET', '/me/player');

    if (response.status === 204) {
      return { isPlaying: false, message: 'Nothing playing' };
    }
    this.dispatcher.expectSuccess(response, 'current playback');

    const view = mapPlaybackState(this.parse(PlaybackStateSchema, response.data, 'current playback'));
    if ('trackId' in view && view.trackId) {
      view.isLiked = await this.isLiked(ctx, response.accessToken, view.trackId);
    }
    return view;
  }

  async play(ctx: PlayerContext): Promise<PlayerAction> {
    await this.command(ctx, 'PUT', '/me/player/play', 'play');
    return { success: true, action: 'play' };
  }

  async pause(ctx: PlayerContext): Promise<PlayerAction> {
    await this.command(ctx, 'PUT', '/me/player/pause', 'pause');
    return { success: true, action: 'pause' };
  }

  async next(ctx: PlayerContext): Promise<PlayerAction> {
    await this.command(ctx, 'POST', '/me/player/next', 'next');
    return { success: true, action: 'next' };
  }

  async previous(ctx: PlayerContext): Promise<PlayerAction> {
    await this.command(ctx, 'POST', '/me/player/previous', 'previous');
    return { success: true, action: 'previous' };
  }

  async like(ctx: PlayerContext): Promise<LibraryAction> {
    return this.changeLibrary(ctx, 'PUT', 'liked');
  }

  async dislike(ctx: PlayerContext): Promise<LibraryAction> {
    return this.changeLibrary(ctx, 'DELETE', 'disliked');
  }

  async queue(ctx: PlayerContext): Promise<QueueView> {
    const token = await this.token(ctx);
    const response = this.dispatcher.expectSuccess(
      await this.send(ctx, token, 'GET', '/me/player/queue'),
      'queue'
    );
    return mapQueue(this.parse(QueueSchema, response.data, 'queue'));
  }

  /**
   * Play item `index` of [current, ...queue], inside the active context
   * (playlist, album) when there is one so the rest of the queue survives.
   */
  async playFromQueue(ctx: PlayerContext, index: number): Promise<QueuePlayResult> {
    if (!Number.isInteger(index) || index < 0) {
      throw new ValidationError(`Index ${index} out of range`);
    }

    const token = await this.token(ctx);
    const player = await this.send(ctx, token, 'GET', '/me/player');
    this.dispatcher.expectSuccess(player, 'player info');
    const state: PlaybackState | null =
      player.status === 204 ? null : this.parse(PlaybackStateSchema, player.data, 'player info');
    const contextUri = state?.context?.uri;

    const queueResponse = this.dispatcher.expectSuccess(
      await this.send(ctx, player.accessToken, 'GET', '/me/player/queue'),
      'queue'
    );
    const queue = this.parse(QueueSchema, queueResponse.data, 'queue');
    const fullList: Track[] = [queue.currently_playing ?? {}, ...(queue.queue ?? [])];

    if (index >= fullList.length) {
      throw new ValidationError(`Index ${index} out of range`);
    }
    const target = fullList[index];
    const trackId = target.id;
    if (!trackId) {
      throw new ValidationError(`Index ${index} has no playable track`);
    }

    const trackUri = `spotify:track:${trackId}`;
    const body = contextUri
      ? { context_uri: contextUri, offset: { uri: trackUri } }
      : { uris: [trackUri] };
    await this.command(
      ctx,
      'PUT',
      '/me/player/play',
      'play from queue',
      { body },
      queueResponse.accessToken
    );

    return {
      success: true,
      message: `Now playing ${target.name ?? ''} by ${joinArtists(target)}`,
      trackId,
      usedContext: Boolean(contextUri),
    };
  }

  async shuffle(ctx: PlayerContext, state: boolean): Promise<{ success: true; shuffleState: boolean }> {
    await this.command(ctx, 'PUT', '/me/player/shuffle', 'shuffle', { query: { state } });
    return { success: true, shuffleState: state };
  }

  async volume(ctx: PlayerContext, level: number): Promise<{ success: true; volumePercent: number }> {
    if (!Number.isInteger(level) || level < 0 || level > 100) {
      throw new ValidationError('Volume must be between 0 and 100');
    }
    await this.command(ctx, 'PUT', '/me/player/volume', 'volume', {
      query: { volume_percent: level },
    });
    return { success: true, volumePercent: level };
  }

  async seek(ctx: PlayerContext, positionMs: number): Promise<{ success: true; positionMs: number }> {
    if (!Number.isInteger(positionMs) || positionMs < 0) {
      throw new ValidationError('Position must be a non-negative integer of milliseconds');
    }
    await this.command(ctx, 'PUT', '/me/player/seek', 'seek', {
      query: { position_ms: positionMs },
    });
    return { success: true, positionMs };
  }

  private async changeLibrary(
    ctx: PlayerContext,
    method: 'PUT' | 'DELETE',
    action: 'liked' | 'disliked'
  ): Promise<LibraryAction> {
    const token = await this.token(ctx);
    const player = await this.send(ctx, token, 'GET', '/me/player');

    let trackId: string | null | undefined;
    if (player.status === 200) {
      const state = PlaybackStateSchema.safeParse(player.data);
      trackId = state.success ? state.data.item?.id : undefined;
    }
    if (!trackId) {
      throw new NoTrackPlayingError();
    }

    await this.command(
      ctx,
      method,
      '/me/tracks',
      action,
      { query: { ids: trackId } },
      player.accessToken
    );
    return { success: true, action, trackId };
  }

  private async isLiked(ctx: PlayerContext, token: string, trackId: string): Promise<boolean | null> {
    const response = await this.send(ctx, token, 'GET', '/me/tracks/contains', {
      query: { ids: trackId },
    });
    if (response.status !== 200) {
      this.logger.warn('Liked check failed', { trackId, status: response.status });
      return null;
    }
    const parsed = LikedSchema.safeParse(response.data);
    return parsed.success && parsed.data.length > 0 ? parsed.data[0] : null;
  }

  private async command(
    ctx: PlayerContext,
    method: HttpMethod,
    path: string,
    action: string,
    options: CallOptions = {},
    token?: string
  ): Promise<DispatchResponse<unknown>> {
    const accessToken = token ?? (await this.token(ctx));
    const response = await this.send(ctx, accessToken, method, path, options);
    return this.dispatcher.expectSuccess(response, action);
  }

  private async token(ctx: PlayerContext): Promise<string> {
    return this.accessor.getValidToken(ctx.credentials, ctx.locator);
  }

  private async send(
    ctx: PlayerContext,
    accessToken: string,
    method: HttpMethod,
    path: string,
    options: CallOptions = {}
  ): Promise<DispatchResponse<unknown>> {
    return this.dispatcher.dispatch<unknown>({
      method,
      path,
      accessToken,
      credentials: ctx.credentials,
      locator: ctx.locator,
      body: options.body,
      query: options.query,
    });
  }

  private parse<S extends z.ZodTypeAny>(schema: S, data: unknown, action: string): z.infer<S> {
    const result = schema.safeParse(data);
    if (!result.success) {
      this.logger.error('Unexpected playback API response', {
        action,
        issues: result.error.issues.map((issue) => issue.path.join('.')),
      });
      throw new UpstreamError(`Playback API request failed: ${action}`, 502, { action });
    }
    return result.data;
  }
}
