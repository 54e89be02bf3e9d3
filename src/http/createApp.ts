// src/http/createApp.ts

import express, { Application, Request, Response } from 'express';
import * as path from 'path';
import { z } from 'zod';
import type { PlaybackRelay } from '../relay';
import type { ResolvedUserConfig, UserConfig } from '../core/config/types';
import { previewSecret } from '../observability/Logger';
import { StoreUnavailableError, ValidationError, isRelayError } from '../utils/errors';
import { asyncHandler, errorHandler, notFoundHandler, withCaller, withUser } from './middleware';

const VIEWS_DIR = path.join(__dirname, '..', '..', 'views');

const ENDPOINTS: Record<string, string> = {
  '/current': 'Get detailed playback state',
  '/play': 'Resume playback',
  '/pause': 'Pause playback',
  '/next': 'Skip to next track',
  '/prev': 'Skip to previous track',
  '/like': 'Save current track to library',
  '/dislike': 'Remove current track from library',
  '/queue': 'List the current track and up to 20 queued tracks',
  '/queue/:index': 'Play an item of the queue',
  '/shuffle/:state': 'Turn shuffle on or off',
  '/volume/:level': 'Set volume (0-100)',
  '/seek/:positionMs': 'Seek within the current track',
  '/force-renew': 'Force token renewal',
  '/debug': 'Debug token status',
  '/init': 'Initialize Gist (POST with tokens)',
  '/login': 'Authorize with Spotify',
};

const InitBodySchema = z.object({
  access_token: z.string().default(''),
  refresh_token: z.string().default(''),
});

const ConfigPatchSchema = z
  .object({
    clientId: z.string(),
    clientSecret: z.string(),
    gistId: z.string(),
    githubToken: z.string(),
    gistFilename: z.string().min(1),
    redirectUri: z.string(),
    apiKey: z.string().min(16, 'API key must be at least 16 characters'),
  })
  .partial()
  .strict();

export function gistPreview(gistId: string): string | null {
  return gistId ? `${gistId.substring(0, 10)}...` : null;
}

function maskConfig(config: UserConfig): Record<string, unknown> {
  return {
    userId: config.userId,
    clientId: config.clientId,
    clientSecret: previewSecret(config.clientSecret, 4),
    gistId: config.gistId,
    githubToken: previewSecret(config.githubToken, 4),
    gistFilename: config.gistFilename,
    redirectUri: config.redirectUri,
    apiKey: previewSecret(config.apiKey, 4),
    validated: config.validated,
    updatedAt: config.updatedAt,
  };
}

function integerParam(value: string, message: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ValidationError(message);
  }
  return Number(value);
}

function queryString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/**
 * Express application exposing the relay. Everything except /health,
 * /metrics and the OAuth callback requires an API key.
 */
export function createApp(relay: PlaybackRelay): Application {
  const app = express();
  const { resolver, player, logger } = relay;

  app.set('views', VIEWS_DIR);
  app.set('view engine', 'ejs');
  app.use(express.json());

  app.get('/health', (_req: Request, res: Response): void => {
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  app.get(
    '/metrics',
    asyncHandler(async (_req, res) => {
      res.set('Content-Type', relay.metrics.contentType);
      res.send(await relay.getMetrics());
    })
  );

  app.get(
    '/',
    withCaller(resolver, async (_req, res, caller) => {
      const status = await relay.describeTokens(caller.locator);
      const hasTokens = status.accessTokenPreview !== null && status.hasRefreshToken;

      res.json({
        status: hasTokens ? 'ready' : 'not_initialized',
        storage: 'GitHub Gist',
        gistId: gistPreview(caller.locator.documentId),
        endpoints: ENDPOINTS,
        setupRequired: !hasTokens,
      });
    })
  );

  // Playback
  app.get(
    '/current',
    withCaller(resolver, async (_req, res, caller) => {
      res.json(await player.current(caller));
    })
  );

  app.get(
    '/play',
    withCaller(resolver, async (_req, res, caller) => {
      res.json(await player.play(caller));
    })
  );

  app.get(
    '/pause',
    withCaller(resolver, async (_req, res, caller) => {
      res.json(await player.pause(caller));
    })
  );

  app.get(
    '/next',
    withCaller(resolver, async (_req, res, caller) => {
      res.json(await player.next(caller));
    })
  );

  app.get(
    '/prev',
    withCaller(resolver, async (_req, res, caller) => {
      res.json(await player.previous(caller));
    })
  );

  app.get(
    '/like',
    withCaller(resolver, async (_req, res, caller) => {
      res.json(await player.like(caller));
    })
  );

  app.get(
    '/dislike',
    withCaller(resolver, async (_req, res, caller) => {
      res.json(await player.dislike(caller));
    })
  );

  app.get(
    '/queue',
    withCaller(resolver, async (_req, res, caller) => {
      res.json({ success: true, ...(await player.queue(caller)) });
    })
  );

  app.get(
    '/queue/:index',
    withCaller(resolver, async (req, res, caller) => {
      const index = integerParam(req.params.index, `Index ${req.params.index} out of range`);
      res.json(await player.playFromQueue(caller, index));
    })
  );

  app.get(
    '/shuffle/:state',
    withCaller(resolver, async (req, res, caller) => {
      const state = req.params.state.toLowerCase();
      if (state !== 'true' && state !== 'false') {
        throw new ValidationError("State must be 'true' or 'false'");
      }
      res.json(await player.shuffle(caller, state === 'true'));
    })
  );

  app.get(
    '/volume/:level',
    withCaller(resolver, async (req, res, caller) => {
      const level = integerParam(req.params.level, 'Volume must be between 0 and 100');
      res.json(await player.volume(caller, level));
    })
  );

  app.get(
    '/seek/:positionMs',
    withCaller(resolver, async (req, res, caller) => {
      const positionMs = integerParam(
        req.params.positionMs,
        'Position must be a non-negative integer of milliseconds'
      );
      res.json(await player.seek(caller, positionMs));
    })
  );

  // Token lifecycle
  app.get(
    '/force-renew',
    withCaller(resolver, async (_req, res, caller) => {
      const result = await relay.forceRenew(caller.credentials, caller.locator);
      res.json({
        success: true,
        message: 'Token renewed',
        expiresIn: result.expires_in ?? relay.defaultExpiresIn,
      });
    })
  );

  app.get(
    '/debug',
    withCaller(resolver, async (_req, res, caller) => {
      const status = await relay.describeTokens(caller.locator);
      res.json({ gistId: gistPreview(caller.locator.documentId), ...status });
    })
  );

  app.post(
    '/init',
    withCaller(resolver, async (req, res, caller) => {
      const body = InitBodySchema.safeParse(req.body ?? {});
      if (!body.success) {
        throw new ValidationError('Both access_token and refresh_token required');
      }

      const saved = await relay.init(caller.locator, body.data.access_token, body.data.refresh_token);
      if (!saved) {
        throw new StoreUnavailableError('Failed to save to Gist');
      }
      res.json({ success: true, message: 'Tokens saved to Gist', expiresIn: relay.defaultExpiresIn });
    })
  );

  // OAuth consent
  app.get(
    '/login',
    withCaller(resolver, async (_req, res, caller: ResolvedUserConfig) => {
      res.redirect(await relay.beginLogin(caller));
    })
  );

  app.get(
    '/callback',
    asyncHandler(async (req, res) => {
      const denied = queryString(req.query.error);
      if (denied) {
        res.status(400).render('callback', { success: false, message: `Authorization denied: ${denied}` });
        return;
      }

      const code = queryString(req.query.code);
      if (!code) {
        res.status(400).render('callback', { success: false, message: 'Missing authorization code' });
        return;
      }

      try {
        const { result } = await relay.completeLogin(queryString(req.query.state), code);
        if (!result) {
          res.status(502).render('callback', { success: false, message: 'Token exchange failed' });
          return;
        }
        res.render('callback', { success: true, message: 'Tokens saved to Gist' });
      } catch (error: unknown) {
        if (!isRelayError(error)) throw error;
        res.status(error.statusCode).render('callback', { success: false, message: error.message });
      }
    })
  );

  // Per-user configuration, only with a per-user store
  const configStore = relay.configStore;
  if (configStore) {
    app.get(
      '/config',
      withUser(resolver, async (_req, res, userId) => {
        const config = await configStore.get(userId);
        if (!config) {
          throw new ValidationError('No configuration stored for user');
        }
        res.json(maskConfig(config));
      })
    );

    app.put(
      '/config',
      withUser(resolver, async (req, res, userId) => {
        const patch = ConfigPatchSchema.safeParse(req.body ?? {});
        if (!patch.success) {
          throw new ValidationError(
            patch.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`).join('; ')
          );
        }
        res.json(maskConfig(await configStore.update(userId, patch.data)));
      })
    );
  }

  app.use(notFoundHandler);
  app.use(errorHandler(logger));

  return app;
}
