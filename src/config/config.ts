import { setConsoleLogLevel, setFileLogLevel } from '../utils/bridgelogger';
import { isPlayerType, listPlayers } from '../player/playerFactory';
import {
  BridgeConfig,
  CONFIG_FILE,
  RawBridgeConfig,
  loadRawConfig,
  normalizeBridgeConfig,
} from './configStore';

/**
 * Central configuration orchestrator. Reads config.json, layers environment overrides on top,
 * validates the result and mirrors the logging section into the logger.
 */

type EnvBinding = [variable: string, section: keyof RawBridgeConfig, key: string];

const ENV_BINDINGS: EnvBinding[] = [
  ['MQTT_HOST', 'mqtt', 'host'],
  ['MQTT_PORT', 'mqtt', 'port'],
  ['MQTT_USERNAME', 'mqtt', 'username'],
  ['MQTT_PASSWORD', 'mqtt', 'password'],
  ['MQTT_CLIENT_ID', 'mqtt', 'clientId'],
  ['MQTT_TOPIC', 'mqtt', 'topic'],
  ['PLAYER_TYPE', 'player', 'type'],
  ['PLAYER_HOST', 'player', 'host'],
  ['PLAYER_PORT', 'player', 'port'],
  ['LOG_LEVEL', 'logging', 'consoleLevel'],
];

/**
 * Returns a copy of the raw config with every set environment variable applied on top.
 */
export function applyEnvOverrides(raw: RawBridgeConfig, env: NodeJS.ProcessEnv = process.env): RawBridgeConfig {
  const merged: RawBridgeConfig = {
    mqtt: { ...raw.mqtt },
    player: { ...raw.player },
    logging: { ...raw.logging },
  };

  for (const [variable, section, key] of ENV_BINDINGS) {
    const value = env[variable];
    if (value === undefined) continue;
    merged[section] = { ...merged[section], [key]: value };
  }
  return merged;
}

function isValidPort(value: unknown): boolean {
  if (value === undefined) return true;
  const port = Number(value);
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

function isBlank(value: unknown): boolean {
  return value !== undefined && (typeof value !== 'string' || value.trim() === '');
}

/**
 * Checks the merged raw config for values that must not silently fall back to defaults.
 * @throws Error listing every problem found.
 */
export function validateBridgeConfig(raw: RawBridgeConfig): void {
  const problems: string[] = [];

  if (isBlank(raw.mqtt?.host)) problems.push('MQTT broker host must not be empty');
  if (!isValidPort(raw.mqtt?.port)) problems.push('MQTT port must be an integer between 1 and 65535');
  if (isBlank(raw.mqtt?.topic)) problems.push('MQTT topic must not be empty');

  const playerType = raw.player?.type;
  if (playerType !== undefined && !(typeof playerType === 'string' && isPlayerType(playerType.trim().toLowerCase()))) {
    problems.push(`Unknown player type "${String(playerType)}" (expected one of: ${listPlayers().join(', ')})`);
  }
  if (isBlank(raw.player?.host)) problems.push('Player host must not be empty');
  if (!isValidPort(raw.player?.port)) problems.push('Player port must be an integer between 1 and 65535');

  if (problems.length > 0) {
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }
}

/**
 * Merges, validates and normalizes a raw config against the given environment.
 */
export function resolveBridgeConfig(raw: RawBridgeConfig, env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const merged = applyEnvOverrides(raw, env);
  validateBridgeConfig(merged);
  return normalizeBridgeConfig(merged);
}

/**
 * Loads the configuration from disk and the environment, then applies the logging levels.
 * @throws Error when the merged values are invalid.
 */
export function initializeConfig(file = CONFIG_FILE, env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const config = resolveBridgeConfig(loadRawConfig(file), env);
  setConsoleLogLevel(config.logging.consoleLevel);
  setFileLogLevel(config.logging.fileLevel);
  return config;
}
