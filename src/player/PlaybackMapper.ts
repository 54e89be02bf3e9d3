// src/player/PlaybackMapper.ts

import type {
  PlaybackState,
  PlaybackView,
  QueueState,
  QueueView,
  Track,
  TrackSummary,
} from './types';

export const DEFAULT_QUEUE_LIMIT = 20;

/**
 * ms -> mm:ss, minutes are not capped at 59
 */
export function formatDuration(ms: number): string {
  const minutes = Math.trunc(ms / 60000);
  const seconds = Math.trunc((ms % 60000) / 1000);
  return `${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}

export function pickThumbnail(images: Array<{ url: string }> | undefined): string {
  if (!images || images.length === 0) return '';
  return images.length > 1 ? images[1].url : images[0].url;
}

export function joinArtists(track: Track): string {
  return (track.artists ?? []).map((artist) => artist.name).join(', ');
}

export function summarizeTrack(track: Track): TrackSummary {
  return {
    track: track.name ?? '',
    artist: joinArtists(track),
    album: track.album?.name ?? '',
    thumbnail: pickThumbnail(track.album?.images),
    id: track.id ?? '',
  };
}

export function mapPlaybackState(data: PlaybackState | null | undefined): PlaybackView {
  const item = data?.item;
  if (!data || !item) {
    return { isPlaying: false, message: 'No active playback' };
  }

  const progressMs = data.progress_ms ?? 0;
  const durationMs = item.duration_ms ?? 0;
  const progressPercent = durationMs ? (progressMs / durationMs) * 100 : 0;

  return {
    isPlaying: data.is_playing ?? false,
    track: item.name ?? '',
    artist: joinArtists(item),
    album: item.album?.name ?? '',
    thumbnail: pickThumbnail(item.album?.images),
    durationMs,
    progressMs,
    progressPercent: Math.round(progressPercent * 100) / 100,
    progress: `${formatDuration(progressMs)} / ${formatDuration(durationMs)}`,
    device: data.device?.name ?? '',
    volumePercent: data.device?.volume_percent ?? null,
    shuffleState: data.shuffle_state ?? false,
    repeatState: data.repeat_state ?? 'off',
    trackId: item.id ?? null,
  };
}

export function mapQueue(data: QueueState, limit = DEFAULT_QUEUE_LIMIT): QueueView {
  const upNext = (data.queue ?? []).slice(0, limit).map((track, i) => ({
    index: i + 1,
    ...summarizeTrack(track),
  }));

  return {
    currentlyPlaying: data.currently_playing ? summarizeTrack(data.currently_playing) : null,
    upNext,
    total: upNext.length,
  };
}
