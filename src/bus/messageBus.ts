/**
 * Narrow publish/subscribe contract the bridge needs from a message bus.
 * Transport concerns (reconnects, QoS, TLS) stay behind the implementation.
 */

export type BusMessageHandler = (topic: string, payload: Buffer) => void;

export interface MessageBus {
  connect(): Promise<void>;
  disconnect(): Promise<void>;

  /** Register a handler for every message whose topic matches the (wildcard) pattern. */
  subscribe(topicPattern: string, onMessage: BusMessageHandler): Promise<void>;
  unsubscribe(topicPattern: string): Promise<void>;

  publish(topic: string, payload: string, retain: boolean): Promise<void>;
}

/**
 * MQTT topic filter matching: `+` matches one level, a trailing `#` matches any remainder
 * (including the parent level itself).
 */
export function matchesTopic(pattern: string, topic: string): boolean {
  const filterLevels = pattern.split('/');
  const topicLevels = topic.split('/');

  for (let i = 0; i < filterLevels.length; i += 1) {
    const level = filterLevels[i];
    if (level === '#') return i === filterLevels.length - 1;
    if (i >= topicLevels.length) return false;
    if (level !== '+' && level !== topicLevels[i]) return false;
  }
  return filterLevels.length === topicLevels.length;
}
