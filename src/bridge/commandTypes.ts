import type { PlaybackState, PlayerRequestError } from '../player/playerTypes';

/** Three-letter action codes accepted on the command topics. */
export const ACTION_CODES = ['plb', 'vol', 'add', 'clr', 'loa', 'src', 'inf'] as const;
export type ActionCode = (typeof ACTION_CODES)[number];

export const VOLUME_OPERATORS = ['=', '-', '+'] as const;
export type VolumeOperator = (typeof VOLUME_OPERATORS)[number];

/** Three-letter codes of the state topics. */
export type StateCode = 'sta' | 'trk' | 'vol';

/** One decoded inbound message. */
export interface Command {
  readonly name: ActionCode;
  readonly value: string;
}

export interface OutboundMessage {
  readonly topicSuffix: StateCode;
  readonly payload: string;
}

/**
 * What an action handler reports back; failures are thrown instead.
 * `cancelled` means the bridge left `running` between two player calls of one command.
 */
export type HandlerOutcome =
  | { status: 'handled' }
  | { status: 'ignored'; reason: string }
  | { status: 'not_implemented'; reason: string }
  | { status: 'cancelled'; reason: string };

/**
 * Result of routing one inbound message. `action` is the topic suffix as received.
 * `fatal` marks a failure the dispatcher could not attribute to the player.
 */
export type DispatchResult =
  | (HandlerOutcome & { action: string })
  | { status: 'player_error'; action: string; error: PlayerRequestError }
  | { status: 'fatal'; action: string; error: unknown };

export type ActionHandler = (value: string) => Promise<HandlerOutcome>;

/** Port used by information requests to answer on the state topics. */
export interface StateReporter {
  reportState(state: PlaybackState): Promise<void>;
  reportVolume(volume: number): Promise<void>;
}
