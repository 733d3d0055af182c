/**
 * MopidyPlayer
 * ------------
 * Player facade for a Mopidy server reached through its JSON-RPC websocket.
 *
 * - Sends core API calls (playback, mixer, tracklist) through {@link MopidyClient}.
 * - Receives core events (playback_state_changed, track_playback_started, ...) and forwards
 *   them to listeners as player-neutral {@link PlayerEvent}s.
 */

import logger from '../../utils/bridgelogger';
import {
  PlaybackState,
  PlayerEvent,
  PlayerEventListener,
  PlayerFacade,
  PlayerRequestError,
} from '../playerTypes';
import MopidyClient, { MopidyClientOptions } from './client';
import { mapEvent, mapPlaybackState } from './stateMapper';
import type { MopidyEventMessage } from './types';

export default class MopidyPlayer implements PlayerFacade {
  private client: MopidyClient;
  private listeners = new Set<PlayerEventListener>();
  private removeEventListener?: () => void;

  constructor(options: MopidyClientOptions) {
    this.client = new MopidyClient(options);
  }

  async connect(): Promise<void> {
    logger.info(`[Mopidy] Connecting to ${this.client.url}`);
    await this.client.connect();
    this.removeEventListener?.();
    this.removeEventListener = this.client.onEvent((evt) => this.handleEvent(evt));
  }

  async disconnect(): Promise<void> {
    logger.info('[Mopidy] Disconnecting');
    this.removeEventListener?.();
    this.removeEventListener = undefined;
    this.client.cleanup();
  }

  // ---------------------------------------------------------------------
  // Playback
  // ---------------------------------------------------------------------

  async play(): Promise<void> {
    await this.client.rpc('core.playback.play');
  }

  async stop(): Promise<void> {
    await this.client.rpc('core.playback.stop');
  }

  async pause(): Promise<void> {
    await this.client.rpc('core.playback.pause');
  }

  async resume(): Promise<void> {
    await this.client.rpc('core.playback.resume');
  }

  async previous(): Promise<void> {
    await this.client.rpc('core.playback.previous');
  }

  async next(): Promise<void> {
    await this.client.rpc('core.playback.next');
  }

  async getState(): Promise<PlaybackState> {
    const method = 'core.playback.get_state';
    const raw = await this.client.rpc(method);
    const state = mapPlaybackState(raw);
    if (!state) {
      throw new PlayerRequestError(method, `Unexpected playback state ${JSON.stringify(raw)}`);
    }
    return state;
  }

  // ---------------------------------------------------------------------
  // Mixer
  // ---------------------------------------------------------------------

  async getVolume(): Promise<number> {
    const method = 'core.mixer.get_volume';
    const raw = await this.client.rpc(method);
    // Mopidy answers null when no mixer is configured.
    if (typeof raw !== 'number') {
      throw new PlayerRequestError(method, 'Mixer volume unavailable');
    }
    return raw;
  }

  async setVolume(volume: number): Promise<void> {
    await this.client.rpc('core.mixer.set_volume', { volume });
  }

  // ---------------------------------------------------------------------
  // Tracklist
  // ---------------------------------------------------------------------

  async addToQueue(uri: string): Promise<void> {
    await this.client.rpc('core.tracklist.add', { uris: [uri] });
  }

  async clearQueue(): Promise<void> {
    await this.client.rpc('core.tracklist.clear');
  }

  onEvent(listener: PlayerEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private handleEvent(evt: MopidyEventMessage): void {
    const event = mapEvent(evt);
    if (!event) {
      logger.debug(`[Mopidy] Ignoring core event "${evt.event}"`);
      return;
    }
    this.emit(event);
  }

  private emit(event: PlayerEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        logger.error(`[Mopidy] Listener error for ${event.type}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }
}
