import { connect, IClientOptions } from 'mqtt';
import logger from '../utils/bridgelogger';
import type { MqttConfig } from '../config/configStore';
import { BusMessageHandler, MessageBus, matchesTopic } from './messageBus';

export type MqttBusOptions = Pick<
  MqttConfig,
  'host' | 'port' | 'username' | 'password' | 'clientId' | 'keepalive' | 'reconnectPeriodMs'
>;

/** The part of an MQTT.js client the bus drives. */
export interface MqttBusClient {
  on(event: 'message', listener: (topic: string, payload: Buffer) => void): unknown;
  on(event: 'reconnect' | 'offline', listener: () => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  once(event: 'connect', listener: () => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
  off(event: 'connect', listener: () => void): unknown;
  off(event: 'error', listener: (error: Error) => void): unknown;
  end(force: boolean): unknown;
  endAsync(): Promise<void>;
  subscribeAsync(topic: string): Promise<unknown>;
  unsubscribeAsync(topic: string): Promise<unknown>;
  publishAsync(topic: string, payload: string, options: { retain: boolean }): Promise<unknown>;
}

export type MqttConnector = (brokerUrl: string, options: IClientOptions) => MqttBusClient;

/**
 * {@link MessageBus} backed by an MQTT.js client.
 * Every `connect()` creates a fresh client so a stopped bridge can be started again.
 */
export default class MqttBus implements MessageBus {
  private client?: MqttBusClient;
  private subscriptions = new Map<string, BusMessageHandler>();

  constructor(
    private readonly options: MqttBusOptions,
    private readonly connectClient: MqttConnector = connect,
  ) {}

  get url(): string {
    return `mqtt://${this.options.host}:${this.options.port}`;
  }

  async connect(): Promise<void> {
    if (this.client) return;

    const clientOptions: IClientOptions = {
      clientId: this.options.clientId,
      keepalive: this.options.keepalive,
      reconnectPeriod: this.options.reconnectPeriodMs,
      clean: true,
    };
    if (this.options.username) {
      clientOptions.username = this.options.username;
      clientOptions.password = this.options.password;
    }

    logger.info(`[MQTT] Connecting to ${this.url} as ${this.options.clientId}`);
    const client = this.connectClient(this.url, clientOptions);

    await new Promise<void>((resolve, reject) => {
      const onConnect = () => {
        client.off('error', onError);
        resolve();
      };
      const onError = (err: Error) => {
        client.off('connect', onConnect);
        client.end(true);
        reject(err);
      };
      client.once('connect', onConnect);
      client.once('error', onError);
    });

    client.on('message', (topic, payload) => this.route(topic, payload));
    client.on('reconnect', () => logger.warn(`[MQTT] Reconnecting to ${this.url}`));
    client.on('offline', () => logger.warn('[MQTT] Broker connection lost'));
    client.on('error', (err) => logger.error(`[MQTT] Client error: ${err.message}`));

    this.client = client;
    logger.info(`[MQTT] Connected to ${this.url}`);
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    this.client = undefined;
    this.subscriptions.clear();
    if (!client) return;

    await client.endAsync();
    logger.info('[MQTT] Disconnected');
  }

  async subscribe(topicPattern: string, onMessage: BusMessageHandler): Promise<void> {
    const client = this.requireClient();
    this.subscriptions.set(topicPattern, onMessage);
    await client.subscribeAsync(topicPattern);
    logger.info(`[MQTT] Subscribed to ${topicPattern}`);
  }

  async unsubscribe(topicPattern: string): Promise<void> {
    this.subscriptions.delete(topicPattern);
    if (!this.client) return;
    await this.client.unsubscribeAsync(topicPattern);
  }

  async publish(topic: string, payload: string, retain: boolean): Promise<void> {
    const client = this.requireClient();
    await client.publishAsync(topic, payload, { retain });
    logger.debug(`[MQTT] Published ${topic} => "${payload}"${retain ? ' (retained)' : ''}`);
  }

  private requireClient(): MqttBusClient {
    if (!this.client) {
      throw new Error('MQTT client is not connected');
    }
    return this.client;
  }

  private route(topic: string, payload: Buffer): void {
    for (const [pattern, handler] of this.subscriptions) {
      if (!matchesTopic(pattern, topic)) continue;
      try {
        handler(topic, payload);
      } catch (error) {
        logger.error(`[MQTT] Handler for ${pattern} failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }
}
