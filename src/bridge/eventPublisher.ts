import logger from '../utils/bridgelogger';
import { defaultTrackFormatter, TrackFormatter } from '../format/describe';
import type { PlaybackState, PlayerEvent, Track } from '../player/playerTypes';
import type { OutboundMessage, StateReporter } from './commandTypes';

export type OutboundSink = (message: OutboundMessage) => Promise<void>;

/**
 * Encodes player lifecycle events as state messages. Every event yields exactly one message,
 * handed to the sink immediately.
 */
export default class EventPublisher implements StateReporter {
  constructor(
    private readonly sink: OutboundSink,
    private readonly formatter: TrackFormatter = defaultTrackFormatter,
  ) {}

  encode(event: PlayerEvent): OutboundMessage {
    switch (event.type) {
      case 'playback_state_changed':
        return { topicSuffix: 'sta', payload: event.newState };
      case 'track_playback_started':
        return { topicSuffix: 'trk', payload: this.formatter.describeTrack(event.track) };
      case 'track_playback_ended':
        // Empty payload clears "now playing" displays.
        return { topicSuffix: 'trk', payload: '' };
      case 'volume_changed':
        return { topicSuffix: 'vol', payload: String(event.volume) };
      case 'stream_title_changed':
        return { topicSuffix: 'trk', payload: this.formatter.describeStream(event.title) };
    }
  }

  async handlePlayerEvent(event: PlayerEvent): Promise<void> {
    const message = this.encode(event);
    logger.debug(`[Publisher] ${event.type} => ${message.topicSuffix} "${message.payload}"`);
    await this.sink(message);
  }

  playbackStateChanged(oldState: PlaybackState, newState: PlaybackState): Promise<void> {
    return this.handlePlayerEvent({ type: 'playback_state_changed', oldState, newState });
  }

  trackPlaybackStarted(track: Track): Promise<void> {
    return this.handlePlayerEvent({ type: 'track_playback_started', track });
  }

  trackPlaybackEnded(track: Track, timePositionMs: number): Promise<void> {
    return this.handlePlayerEvent({ type: 'track_playback_ended', track, timePositionMs });
  }

  volumeChanged(volume: number): Promise<void> {
    return this.handlePlayerEvent({ type: 'volume_changed', volume });
  }

  streamTitleChanged(title: string): Promise<void> {
    return this.handlePlayerEvent({ type: 'stream_title_changed', title });
  }

  async reportState(state: PlaybackState): Promise<void> {
    await this.sink({ topicSuffix: 'sta', payload: state });
  }

  async reportVolume(volume: number): Promise<void> {
    await this.sink({ topicSuffix: 'vol', payload: String(volume) });
  }
}
