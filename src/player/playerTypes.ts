/**
 * Player-neutral contract consumed by the bridge. Adapters (Mopidy, null) translate their own
 * wire models into these types.
 */

/** Playback state as reported by the player. Values are published verbatim. */
export enum PlaybackState {
  Stopped = 'stopped',
  Playing = 'playing',
  Paused = 'paused',
}

export interface Track {
  uri: string;
  name?: string;
  artists: string[];
  album?: string;
  lengthMs?: number;
}

export interface PlaybackStateChangedEvent {
  type: 'playback_state_changed';
  oldState: PlaybackState;
  newState: PlaybackState;
}

export interface TrackPlaybackStartedEvent {
  type: 'track_playback_started';
  track: Track;
}

export interface TrackPlaybackEndedEvent {
  type: 'track_playback_ended';
  track: Track;
  timePositionMs: number;
}

export interface VolumeChangedEvent {
  type: 'volume_changed';
  volume: number;
}

export interface StreamTitleChangedEvent {
  type: 'stream_title_changed';
  title: string;
}

/** Lifecycle notifications delivered by a player to its listeners. */
export type PlayerEvent =
  | PlaybackStateChangedEvent
  | TrackPlaybackStartedEvent
  | TrackPlaybackEndedEvent
  | VolumeChangedEvent
  | StreamTitleChangedEvent;

export type PlayerEventListener = (event: PlayerEvent) => void;

/**
 * Raised by player adapters when a remote call fails or times out.
 */
export class PlayerRequestError extends Error {
  constructor(
    readonly method: string,
    message: string,
  ) {
    super(`${method}: ${message}`);
    this.name = 'PlayerRequestError';
  }
}

/**
 * Remote control surface of a media player. Every call may block on the network and reject
 * with {@link PlayerRequestError}; timeouts are configured on the adapter.
 */
export interface PlayerFacade {
  connect(): Promise<void>;
  disconnect(): Promise<void>;

  play(): Promise<void>;
  stop(): Promise<void>;
  pause(): Promise<void>;
  resume(): Promise<void>;
  previous(): Promise<void>;
  next(): Promise<void>;

  getState(): Promise<PlaybackState>;
  getVolume(): Promise<number>;
  setVolume(volume: number): Promise<void>;

  addToQueue(uri: string): Promise<void>;
  clearQueue(): Promise<void>;

  /** Subscribe to lifecycle events. Returns an unsubscribe function. */
  onEvent(listener: PlayerEventListener): () => void;
}
