// src/index.ts

export { PlaybackRelay } from './relay';
export type { RelayOptions, LoginCompletion } from './relay';
export { createApp } from './http/createApp';
export { validateConfig, validateConfigSafe } from './config/ConfigValidator';
export type { RelayConfig, RelayConfigInput } from './config/ConfigValidator';
export { loadConfigFromEnv } from './config/env';

export { GistTokenStore } from './core/token/GistTokenStore';
export { TokenAccessor, needsRenewal, GRACE_SECONDS } from './core/token/TokenAccessor';
export { RenewalLock } from './core/token/RenewalLock';
export { TokenRenewer } from './core/auth/TokenRenewer';
export { UpstreamDispatcher } from './core/http/UpstreamDispatcher';
export { UserConfigStore } from './core/config/UserConfigStore';
export { StaticConfigResolver } from './core/config/StaticConfigResolver';
export { PlayerService } from './player/PlayerService';
export { formatDuration, mapPlaybackState, mapQueue } from './player/PlaybackMapper';

export type {
  TokenRecord,
  ClientCredentials,
  StorageLocator,
  TokenExchangeResult,
  TokenStatus,
  LoadResult,
} from './core/token/types';
export type { DispatchRequest, DispatchResponse, HttpResponse } from './core/http/types';
export type { ConfigurationResolver, ResolvedUserConfig, UserConfig } from './core/config/types';
export type { PlaybackView, QueueView } from './player/types';

// Error classes for error handling
export {
  RelayError,
  StoreUnavailableError,
  TokenError,
  MissingAccessTokenError,
  MissingRefreshTokenError,
  RenewalFailedError,
  UpstreamError,
  NetworkError,
  NetworkTimeoutError,
  ValidationError,
  NoTrackPlayingError,
  AuthenticationError,
  ConfigurationError,
  isRelayError,
} from './utils/errors';
