// src/player/types.ts

import { z } from 'zod';

// Upstream payloads, only the fields the relay reads

export const ImageSchema = z.object({ url: z.string() }).passthrough();

export const TrackSchema = z
  .object({
    id: z.string().nullable().optional(),
    name: z.string().optional(),
    duration_ms: z.number().optional(),
    artists: z.array(z.object({ name: z.string() }).passthrough()).optional(),
    album: z
      .object({
        name: z.string().optional(),
        images: z.array(ImageSchema).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const PlaybackStateSchema = z
  .object({
    is_playing: z.boolean().optional(),
    progress_ms: z.number().nullable().optional(),
    shuffle_state: z.boolean().optional(),
    repeat_state: z.string().optional(),
    item: TrackSchema.nullable().optional(),
    device: z
      .object({
        name: z.string().optional(),
        volume_percent: z.number().nullable().optional(),
      })
      .passthrough()
      .optional(),
    context: z.object({ uri: z.string().optional() }).passthrough().nullable().optional(),
  })
  .passthrough();

export const QueueSchema = z
  .object({
    currently_playing: TrackSchema.nullable().optional(),
    queue: z.array(TrackSchema).optional(),
  })
  .passthrough();

export type Track = z.infer<typeof TrackSchema>;
export type PlaybackState = z.infer<typeof PlaybackStateSchema>;
export type QueueState = z.infer<typeof QueueSchema>;

// Relay responses

export interface IdlePlayback {
  isPlaying: false;
  message: string;
}

export interface ActivePlayback {
  isPlaying: boolean;
  track: string;
  artist: string;
  album: string;
  thumbnail: string;
  durationMs: number;
  progressMs: number;
  progressPercent: number;
  progress: string;
  device: string;
  volumePercent: number | null;
  shuffleState: boolean;
  repeatState: string;
  trackId: string | null;
  isLiked?: boolean | null;
}

export type PlaybackView = IdlePlayback | ActivePlayback;

export interface TrackSummary {
  track: string;
  artist: string;
  album: string;
  thumbnail: string;
  id: string;
}

export interface QueueEntry extends TrackSummary {
  index: number;
}

export interface QueueView {
  currentlyPlaying: TrackSummary | null;
  upNext: QueueEntry[];
  total: number;
}

export interface PlayerAction {
  success: true;
  action: string;
}

export interface LibraryAction extends PlayerAction {
  trackId: string;
}

export interface QueuePlayResult {
  success: true;
  message: string;
  trackId: string;
  usedContext: boolean;
}
