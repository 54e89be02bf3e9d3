// src/core/auth/types.ts

export interface AuthServerConfig {
  issuer: string;
  authorizeEndpoint: string;
  tokenEndpoint: string;
  scopes: string[];
  timeoutMs: number;
  defaultExpiresIn: number; // seconds, used when the server omits expires_in
}

export const DEFAULT_SCOPES = [
  'user-read-playback-state',
  'user-modify-playback-state',
  'user-read-currently-playing',
  'user-library-read',
  'user-library-modify',
];
