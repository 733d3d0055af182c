import logger from '../utils/bridgelogger';
import { PlaybackState, PlayerFacade, PlayerRequestError } from '../player/playerTypes';
import type { ActionCode, ActionHandler, DispatchResult, HandlerOutcome, StateReporter } from './commandTypes';
import { applyVolumeOperator, decodeCommand, parseVolumeCommand } from './commandUtils';

const HANDLED: HandlerOutcome = { status: 'handled' };

/**
 * Routes decoded inbound commands to player calls.
 *
 * The handler table is built once per instance and keyed by action code. `dispatch` never
 * rejects: malformed input resolves to `ignored`, player failures to `player_error`, and
 * anything else to `fatal` for the caller to act on.
 */
export default class ActionDispatcher {
  private readonly handlers: ReadonlyMap<ActionCode, ActionHandler>;

  /**
   * @param isActive - checked between the player calls of one command; once it returns false
   *   the command stops short and resolves to `cancelled`.
   */
  constructor(
    private readonly player: PlayerFacade,
    private readonly reporter: StateReporter,
    private readonly isActive: () => boolean = () => true,
  ) {
    this.handlers = new Map<ActionCode, ActionHandler>([
      ['plb', (value) => this.onPlayback(value)],
      ['vol', (value) => this.onVolume(value)],
      ['add', (value) => this.onAdd(value)],
      ['clr', () => this.onClear()],
      ['loa', (value) => this.onLoad(value)],
      ['src', (value) => this.onSearch(value)],
      ['inf', (value) => this.onInfo(value)],
    ]);
  }

  get actions(): ActionCode[] {
    return Array.from(this.handlers.keys());
  }

  async dispatch(topicSuffix: string, payload: Buffer | string): Promise<DispatchResult> {
    const command = decodeCommand(topicSuffix, payload);
    const handler = command ? this.handlers.get(command.name) : undefined;
    if (!command || !handler) {
      const reason = `Unknown action "${topicSuffix}"`;
      logger.warn(`[Dispatcher] ${reason}, ignoring`);
      return { status: 'ignored', action: topicSuffix, reason };
    }

    logger.debug(`[Dispatcher] ${command.name} <= "${command.value}"`);
    try {
      const outcome = await handler(command.value);
      return { ...outcome, action: command.name };
    } catch (error) {
      if (error instanceof PlayerRequestError) {
        logger.error(`[Dispatcher] Player call failed during "${command.name}": ${error.message}`);
        return { status: 'player_error', action: command.name, error };
      }
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`[Dispatcher] Unexpected failure during "${command.name}": ${message}`);
      return { status: 'fatal', action: command.name, error };
    }
  }

  // ---------------------------------------------------------------------
  // Handlers
  // ---------------------------------------------------------------------

  /** Playback control. */
  private async onPlayback(value: string): Promise<HandlerOutcome> {
    switch (value) {
      case 'play':
        await this.player.play();
        return HANDLED;
      case 'stop':
        await this.player.stop();
        return HANDLED;
      case 'pause':
        await this.player.pause();
        return HANDLED;
      case 'resume':
        await this.player.resume();
        return HANDLED;
      case 'toggle':
        return this.togglePlayback();
      case 'prev':
        await this.player.previous();
        return HANDLED;
      case 'next':
        await this.player.next();
        return HANDLED;
      default:
        return this.ignore(`Unknown playback control action: "${value}"`);
    }
  }

  private async togglePlayback(): Promise<HandlerOutcome> {
    const state = await this.player.getState();
    if (!this.isActive()) return this.cancel('plb');
    switch (state) {
      case PlaybackState.Playing:
        await this.player.pause();
        break;
      case PlaybackState.Paused:
        await this.player.resume();
        break;
      case PlaybackState.Stopped:
        await this.player.play();
        break;
    }
    return HANDLED;
  }

  /** Volume control: `=N` absolute, `+N` / `-N` relative. */
  private async onVolume(value: string): Promise<HandlerOutcome> {
    const parsed = parseVolumeCommand(value);
    if (!parsed.ok) return this.ignore(parsed.reason);

    const current = parsed.operator === '=' ? 0 : await this.player.getVolume();
    if (!this.isActive()) return this.cancel('vol');
    await this.player.setVolume(applyVolumeOperator(parsed.operator, current, parsed.amount));
    return HANDLED;
  }

  /** Append URI to the queue. */
  private async onAdd(value: string): Promise<HandlerOutcome> {
    if (!value) return this.ignore('Cannot add empty track to queue');
    await this.player.addToQueue(value);
    return HANDLED;
  }

  /** Clear the queue. */
  private async onClear(): Promise<HandlerOutcome> {
    await this.player.clearQueue();
    return HANDLED;
  }

  // No playlist contract exists yet, so loading is reported rather than attempted.
  private async onLoad(value: string): Promise<HandlerOutcome> {
    if (!value) return this.ignore('Cannot load unnamed playlist');
    return this.notImplemented(`Loading playlist "${value}" is not implemented`);
  }

  private async onSearch(value: string): Promise<HandlerOutcome> {
    if (!value) return this.ignore('Cannot search without a query');
    return this.notImplemented(`Library search for "${value}" is not implemented`);
  }

  /** Information requests answered on the state topics. */
  private async onInfo(value: string): Promise<HandlerOutcome> {
    switch (value) {
      case 'state': {
        const state = await this.player.getState();
        if (!this.isActive()) return this.cancel('inf');
        await this.reporter.reportState(state);
        return HANDLED;
      }
      case 'volume': {
        const volume = await this.player.getVolume();
        if (!this.isActive()) return this.cancel('inf');
        await this.reporter.reportVolume(volume);
        return HANDLED;
      }
      case 'queue':
        return this.notImplemented('Queue information requests are not implemented');
      default:
        return this.ignore(`Unknown information request: "${value}"`);
    }
  }

  private ignore(reason: string): HandlerOutcome {
    logger.warn(`[Dispatcher] ${reason}`);
    return { status: 'ignored', reason };
  }

  private notImplemented(reason: string): HandlerOutcome {
    logger.warn(`[Dispatcher] ${reason}`);
    return { status: 'not_implemented', reason };
  }

  private cancel(action: ActionCode): HandlerOutcome {
    const reason = `Bridge stopped before "${action}" completed`;
    logger.info(`[Dispatcher] ${reason}`);
    return { status: 'cancelled', reason };
  }
}
