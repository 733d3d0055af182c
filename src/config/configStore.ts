import fs from 'fs';
import path from 'path';
import { isPlayerType } from '../player/playerFactory';
import logger, { BridgeLogLevel, isLogLevel } from '../utils/bridgelogger';

/**
 * Responsible for persisting the bridge configuration to disk and translating raw JSON into
 * runtime-safe structures.
 */

export type PlayerType = 'mopidy' | 'null';

export interface MqttConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  clientId: string;
  /** Base topic; commands live under `<topic>/<commandSegment>`, state under `<topic>/<stateSegment>`. */
  topic: string;
  commandSegment: string;
  stateSegment: string;
  retain: boolean;
  keepalive: number;
  reconnectPeriodMs: number;
}

export interface PlayerConfig {
  type: PlayerType;
  host: string;
  port: number;
  requestTimeoutMs: number;
  reconnectDelayMs: number;
}

export interface LoggingConfig {
  consoleLevel: BridgeLogLevel;
  fileLevel: BridgeLogLevel | 'none';
}

export interface BridgeConfig {
  mqtt: MqttConfig;
  player: PlayerConfig;
  logging: LoggingConfig;
}

export type RawConfigSection = Record<string, unknown>;

/** Shape accepted from config.json: every section and field may be missing. */
export interface RawBridgeConfig {
  mqtt?: RawConfigSection;
  player?: RawConfigSection;
  logging?: RawConfigSection;
}

export const CONFIG_DIR = process.env.CONFIG_DIR || path.resolve(process.cwd(), 'data');
export const CONFIG_FILE = process.env.CONFIG_FILE || path.join(CONFIG_DIR, 'config.json');

/**
 * Produces a fully populated config with sensible defaults.
 */
export function defaultBridgeConfig(): BridgeConfig {
  return {
    mqtt: {
      host: 'localhost',
      port: 1883,
      username: '',
      password: '',
      clientId: 'mqtt-player-bridge',
      topic: 'mopidy',
      commandSegment: 'c',
      stateSegment: 'i',
      retain: true,
      keepalive: 60,
      reconnectPeriodMs: 5000,
    },
    player: {
      type: 'mopidy',
      host: 'localhost',
      port: 6680,
      requestTimeoutMs: 5000,
      reconnectDelayMs: 3000,
    },
    logging: { consoleLevel: 'info', fileLevel: 'none' },
  };
}

/**
 * Reads the on-disk config as raw JSON, writing defaults when it is missing and recreating it
 * when it cannot be parsed.
 */
export function loadRawConfig(file = CONFIG_FILE): RawBridgeConfig {
  ensureConfigDir(path.dirname(file));
  if (!fs.existsSync(file)) {
    logger.info(`[configStore] ${file} not found, writing defaults`);
    saveBridgeConfig(defaultBridgeConfig(), file);
    return {};
  }

  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
    if (!isRawConfig(parsed)) {
      throw new Error('expected a JSON object');
    }
    return parsed;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`[configStore] Failed to read ${file}: ${message}. Recreating with defaults.`);
    saveBridgeConfig(defaultBridgeConfig(), file);
    return {};
  }
}

/**
 * Persists a config to disk.
 */
export function saveBridgeConfig(config: BridgeConfig, file = CONFIG_FILE): void {
  ensureConfigDir(path.dirname(file));
  fs.writeFileSync(file, `${JSON.stringify(config, null, 2)}\n`, 'utf8');
}

/**
 * Ensures the config directory exists before read/write operations.
 */
function ensureConfigDir(dir: string) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

export function isRawConfig(value: unknown): value is RawBridgeConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function coerceString(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value.trim() : fallback;
}

function coerceNonEmptyString(value: unknown, fallback: string): string {
  const result = coerceString(value, fallback);
  return result ? result : fallback;
}

function coerceInteger(value: unknown, fallback: number, min = 0): number {
  const num = typeof value === 'string' && value.trim() === '' ? Number.NaN : Number(value);
  return Number.isInteger(num) && num >= min ? num : fallback;
}

function coerceBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return fallback;
}

/**
 * Merges partial config payloads with defaults and strips unusable values.
 * Topic segments are trimmed of surrounding slashes so they join cleanly.
 */
export function normalizeBridgeConfig(raw: RawBridgeConfig): BridgeConfig {
  const defaults = defaultBridgeConfig();
  const stripSlashes = (value: string) => value.replace(/^\/+|\/+$/g, '');

  const password = raw.mqtt?.password;
  const mqtt: MqttConfig = {
    host: coerceNonEmptyString(raw.mqtt?.host, defaults.mqtt.host),
    port: coerceInteger(raw.mqtt?.port, defaults.mqtt.port, 1),
    username: coerceString(raw.mqtt?.username, defaults.mqtt.username),
    password: typeof password === 'string' ? password : defaults.mqtt.password,
    clientId: coerceNonEmptyString(raw.mqtt?.clientId, defaults.mqtt.clientId),
    topic: stripSlashes(coerceNonEmptyString(raw.mqtt?.topic, defaults.mqtt.topic)),
    commandSegment: stripSlashes(coerceString(raw.mqtt?.commandSegment, defaults.mqtt.commandSegment)),
    stateSegment: stripSlashes(coerceString(raw.mqtt?.stateSegment, defaults.mqtt.stateSegment)),
    retain: coerceBoolean(raw.mqtt?.retain, defaults.mqtt.retain),
    keepalive: coerceInteger(raw.mqtt?.keepalive, defaults.mqtt.keepalive),
    reconnectPeriodMs: coerceInteger(raw.mqtt?.reconnectPeriodMs, defaults.mqtt.reconnectPeriodMs),
  };

  const playerType = coerceString(raw.player?.type, defaults.player.type).toLowerCase();
  const player: PlayerConfig = {
    type: isPlayerType(playerType) ? playerType : defaults.player.type,
    host: coerceNonEmptyString(raw.player?.host, defaults.player.host),
    port: coerceInteger(raw.player?.port, defaults.player.port, 1),
    requestTimeoutMs: coerceInteger(raw.player?.requestTimeoutMs, defaults.player.requestTimeoutMs, 1),
    reconnectDelayMs: coerceInteger(raw.player?.reconnectDelayMs, defaults.player.reconnectDelayMs),
  };

  const consoleLevel = coerceString(raw.logging?.consoleLevel, '').toLowerCase();
  const fileLevel = coerceString(raw.logging?.fileLevel, '').toLowerCase();
  const logging: LoggingConfig = {
    consoleLevel: isLogLevel(consoleLevel) ? consoleLevel : defaults.logging.consoleLevel,
    fileLevel: isLogLevel(fileLevel) ? fileLevel : defaults.logging.fileLevel,
  };

  return { mqtt, player, logging };
}
