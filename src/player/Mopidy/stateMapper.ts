import { PlaybackState, PlayerEvent, Track } from '../playerTypes';
import type { MopidyEventMessage } from './types';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/** Maps the Mopidy playback state string onto {@link PlaybackState}. */
export function mapPlaybackState(raw: unknown): PlaybackState | undefined {
  switch (raw) {
    case 'playing':
      return PlaybackState.Playing;
    case 'paused':
      return PlaybackState.Paused;
    case 'stopped':
      return PlaybackState.Stopped;
    default:
      return undefined;
  }
}

/** Produces the artist names of a Mopidy track, skipping unnamed entries. */
function mapArtists(raw: unknown): string[] {
  if (!Array.isArray(raw)) return [];
  return raw
    .map((artist: unknown) => (isRecord(artist) ? optionalString(artist.name) : undefined))
    .filter((name): name is string => name !== undefined);
}

/** Maps a serialised Mopidy `Track` onto the player-neutral {@link Track}. */
export function mapTrack(raw: unknown): Track | undefined {
  if (!isRecord(raw) || typeof raw.uri !== 'string') return undefined;

  return {
    uri: raw.uri,
    name: optionalString(raw.name),
    artists: mapArtists(raw.artists),
    album: isRecord(raw.album) ? optionalString(raw.album.name) : undefined,
    lengthMs: typeof raw.length === 'number' ? raw.length : undefined,
  };
}

/** Unwraps the track of a serialised Mopidy `TlTrack`. */
export function mapTlTrack(raw: unknown): Track | undefined {
  return isRecord(raw) ? mapTrack(raw.track) : undefined;
}

/**
 * Translates a Mopidy core event into a {@link PlayerEvent}.
 * Returns undefined for events the bridge does not republish or payloads it cannot read.
 */
export function mapEvent(evt: MopidyEventMessage): PlayerEvent | undefined {
  switch (evt.event) {
    case 'playback_state_changed': {
      const oldState = mapPlaybackState(evt.old_state);
      const newState = mapPlaybackState(evt.new_state);
      if (!oldState || !newState) return undefined;
      return { type: 'playback_state_changed', oldState, newState };
    }

    case 'track_playback_started': {
      const track = mapTlTrack(evt.tl_track);
      return track ? { type: 'track_playback_started', track } : undefined;
    }

    case 'track_playback_ended': {
      const track = mapTlTrack(evt.tl_track);
      if (!track) return undefined;
      const timePositionMs = typeof evt.time_position === 'number' ? evt.time_position : 0;
      return { type: 'track_playback_ended', track, timePositionMs };
    }

    case 'volume_changed':
      return typeof evt.volume === 'number' ? { type: 'volume_changed', volume: evt.volume } : undefined;

    case 'stream_title_changed':
      return typeof evt.title === 'string' ? { type: 'stream_title_changed', title: evt.title } : undefined;

    default:
      return undefined;
  }
}
