import logger from '../utils/bridgelogger';
import { PlaybackState, PlayerEventListener, PlayerFacade } from './playerTypes';

/**
 * NullPlayer – fallback player used when no concrete integration is configured.
 * Accepts every call, logs it and reports a stopped, muted player.
 */
export default class NullPlayer implements PlayerFacade {
  async connect(): Promise<void> {
    logger.info('[NullPlayer] No player configured, commands will be logged only');
  }

  async disconnect(): Promise<void> {
    // Nothing to release.
  }

  async play(): Promise<void> {
    this.ignore('play');
  }

  async stop(): Promise<void> {
    this.ignore('stop');
  }

  async pause(): Promise<void> {
    this.ignore('pause');
  }

  async resume(): Promise<void> {
    this.ignore('resume');
  }

  async previous(): Promise<void> {
    this.ignore('previous');
  }

  async next(): Promise<void> {
    this.ignore('next');
  }

  async getState(): Promise<PlaybackState> {
    return PlaybackState.Stopped;
  }

  async getVolume(): Promise<number> {
    return 0;
  }

  async setVolume(volume: number): Promise<void> {
    this.ignore('setVolume', String(volume));
  }

  async addToQueue(uri: string): Promise<void> {
    this.ignore('addToQueue', uri);
  }

  async clearQueue(): Promise<void> {
    this.ignore('clearQueue');
  }

  onEvent(_listener: PlayerEventListener): () => void {
    return () => undefined;
  }

  private ignore(command: string, payload = ''): void {
    logger.info(`[NullPlayer] Ignoring command "${command}"${payload ? ` payload=${payload}` : ''}`);
  }
}
