import logger from '../utils/bridgelogger';
import type { MessageBus } from '../bus/messageBus';
import type { TrackFormatter } from '../format/describe';
import type { PlayerEvent, PlayerFacade } from '../player/playerTypes';
import ActionDispatcher from './actionDispatcher';
import type { OutboundMessage } from './commandTypes';
import { joinTopic, topicSuffix } from './commandUtils';
import EventPublisher from './eventPublisher';

export enum BridgeState {
  Stopped = 'stopped',
  Starting = 'starting',
  Running = 'running',
  Stopping = 'stopping',
}

export interface BridgeControllerOptions {
  /** Base topic shared by commands and state. */
  topic: string;
  commandSegment: string;
  stateSegment: string;
  /** Publish state messages as retained. */
  retain: boolean;
  formatter?: TrackFormatter;
  /** Supervisor hook, called after an unrecoverable failure has stopped the bridge. */
  onFailure?: (error: unknown) => void;
}

type Task = () => Promise<void>;

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Composition root of the bridge: owns the bus connection and the player reference, wires
 * inbound commands to the dispatcher and player events to the publisher.
 *
 * All work runs one task at a time on a promise queue, and a task only runs while the
 * bridge is `running`. `stop()` waits for the task in flight, which stops short of its next
 * player call or publish, so nothing reaches the player or the bus once `stop()` has begun.
 */
export default class BridgeController {
  readonly commandTopic: string;
  readonly stateTopic: string;

  private currentState = BridgeState.Stopped;
  private readonly dispatcher: ActionDispatcher;
  private readonly publisher: EventPublisher;
  private queue: Promise<void> = Promise.resolve();
  private removePlayerListener?: () => void;

  constructor(
    private readonly bus: MessageBus,
    private readonly player: PlayerFacade,
    private readonly options: BridgeControllerOptions,
  ) {
    this.commandTopic = joinTopic(options.topic, options.commandSegment);
    this.stateTopic = joinTopic(options.topic, options.stateSegment);
    this.publisher = new EventPublisher((message) => this.publish(message), options.formatter);
    this.dispatcher = new ActionDispatcher(player, this.publisher, () => this.currentState === BridgeState.Running);
  }

  get state(): BridgeState {
    return this.currentState;
  }

  get commandPattern(): string {
    return joinTopic(this.commandTopic, '+');
  }

  async start(): Promise<void> {
    if (this.currentState !== BridgeState.Stopped) {
      logger.warn(`[Bridge] Start ignored, bridge is ${this.currentState}`);
      return;
    }

    this.currentState = BridgeState.Starting;
    logger.info(`[Bridge] Starting (commands: ${this.commandPattern}, state: ${joinTopic(this.stateTopic, '<code>')})`);
    try {
      await this.bus.connect();
      if (this.state !== BridgeState.Starting) {
        await this.abandonStart();
        return;
      }
      await this.bus.subscribe(this.commandPattern, (topic, payload) => this.onBusMessage(topic, payload));
    } catch (error) {
      if (this.state !== BridgeState.Starting) {
        logger.warn(`[Bridge] Start interrupted by stop: ${describeError(error)}`);
        return;
      }
      logger.error(`[Bridge] Failed to start: ${describeError(error)}`);
      await this.stop();
      throw error;
    }

    if (this.state !== BridgeState.Starting) {
      await this.abandonStart();
      return;
    }
    this.removePlayerListener = this.player.onEvent((event) => this.onPlayerEvent(event));
    this.currentState = BridgeState.Running;
    logger.info(`[Bridge] Running with actions: ${this.dispatcher.actions.join(', ')}`);
  }

  /** Waits for the task in flight, then releases the bus. */
  stop(): Promise<void> {
    return this.shutdown(true);
  }

  /** Resolves once every queued message and event has been processed. */
  whenIdle(): Promise<void> {
    return this.queue;
  }

  /**
   * `drain` is false when called from inside a queued task, which would otherwise wait on itself.
   */
  private async shutdown(drain: boolean): Promise<void> {
    if (this.currentState === BridgeState.Stopped || this.currentState === BridgeState.Stopping) {
      return;
    }

    this.currentState = BridgeState.Stopping;
    logger.info('[Bridge] Stopping');
    this.removePlayerListener?.();
    this.removePlayerListener = undefined;

    if (drain) {
      await this.queue;
    }

    try {
      await this.bus.unsubscribe(this.commandPattern);
    } catch (error) {
      logger.warn(`[Bridge] Failed to unsubscribe from ${this.commandPattern}: ${describeError(error)}`);
    }

    try {
      await this.bus.disconnect();
    } catch (error) {
      logger.error(`[Bridge] Failed to close bus connection: ${describeError(error)}`);
    }

    this.currentState = BridgeState.Stopped;
    logger.info('[Bridge] Stopped');
  }

  /** The bus connected after `stop()` had already run; close it again. */
  private async abandonStart(): Promise<void> {
    logger.warn('[Bridge] Stopped while starting, closing bus connection');
    try {
      await this.bus.disconnect();
    } catch (error) {
      logger.error(`[Bridge] Failed to close bus connection: ${describeError(error)}`);
    }
  }

  private onBusMessage(topic: string, payload: Buffer): void {
    if (this.currentState !== BridgeState.Running) {
      logger.debug(`[Bridge] Dropping ${topic}, bridge is ${this.currentState}`);
      return;
    }

    const suffix = topicSuffix(this.commandTopic, topic);
    if (suffix === undefined) {
      logger.warn(`[Bridge] Ignoring message on unexpected topic ${topic}`);
      return;
    }

    this.enqueue(async () => {
      const result = await this.dispatcher.dispatch(suffix, payload);
      if (result.status === 'fatal') {
        await this.fail(result.error);
      }
    });
  }

  private onPlayerEvent(event: PlayerEvent): void {
    if (this.currentState !== BridgeState.Running) return;
    this.enqueue(() => this.publisher.handlePlayerEvent(event));
  }

  private enqueue(task: Task): void {
    this.queue = this.queue
      .then(async () => {
        if (this.currentState !== BridgeState.Running) return;
        await task();
      })
      .catch((error: unknown) => this.fail(error));
  }

  private async publish(message: OutboundMessage): Promise<void> {
    if (this.currentState !== BridgeState.Running) {
      logger.debug(`[Bridge] Dropping ${message.topicSuffix} update, bridge is ${this.currentState}`);
      return;
    }
    await this.bus.publish(joinTopic(this.stateTopic, message.topicSuffix), message.payload, this.options.retain);
  }

  private async fail(error: unknown): Promise<void> {
    if (this.currentState !== BridgeState.Running) {
      logger.error(`[Bridge] Failure while ${this.currentState}: ${describeError(error)}`);
      return;
    }
    logger.error(`[Bridge] Unrecoverable failure: ${describeError(error)}`);
    await this.shutdown(false);
    try {
      this.options.onFailure?.(error);
    } catch (hookError) {
      logger.error(`[Bridge] Failure hook threw: ${describeError(hookError)}`);
    }
  }
}
