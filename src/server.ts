// src/server.ts

import dotenv from 'dotenv';
import { loadConfigFromEnv } from './config/env';
import { PlaybackRelay } from './relay';
import { createApp } from './http/createApp';

// Load environment variables
dotenv.config();

async function start(): Promise<void> {
  let relay: PlaybackRelay;
  let port: number;
  try {
    const config = loadConfigFromEnv(process.env);
    port = config.port;
    relay = await PlaybackRelay.init(config.relay);
  } catch (error: unknown) {
    console.error('Failed to start server:', error instanceof Error ? error.message : error);
    process.exit(1);
  }

  const server = createApp(relay).listen(port, () => {
    relay.logger.info(`Playback relay listening on http://localhost:${port}`);
  });

  const shutdown = (signal: string): void => {
    relay.logger.info('Shutting down', { signal });
    server.close(() => {
      relay
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          relay.logger.error('Shutdown failed', {
            error: error instanceof Error ? error.message : String(error),
          });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

void start();
