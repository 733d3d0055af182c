import type { PlayerConfig, PlayerType } from '../config/configStore';
import MopidyPlayer from './Mopidy/player';
import NullPlayer from './nullPlayer';
import type { PlayerFacade } from './playerTypes';

type PlayerFactoryEntry = (config: PlayerConfig) => PlayerFacade;

const playerMap: Record<PlayerType, PlayerFactoryEntry> = {
  mopidy: (config) =>
    new MopidyPlayer({
      host: config.host,
      port: config.port,
      requestTimeoutMs: config.requestTimeoutMs,
      reconnectDelayMs: config.reconnectDelayMs,
    }),
  null: () => new NullPlayer(),
};

/** Returns the list of available player identifiers. */
export function listPlayers(): PlayerType[] {
  return Object.keys(playerMap).filter(isPlayerType);
}

export function isPlayerType(value: string): value is PlayerType {
  return Object.prototype.hasOwnProperty.call(playerMap, value);
}

/**
 * Creates the player facade selected by `config.type`.
 */
export function createPlayer(config: PlayerConfig): PlayerFacade {
  return playerMap[config.type](config);
}
