#!/usr/bin/env node
import logger from './utils/bridgelogger';
import { initializeConfig } from './config/config';
import type { BridgeConfig } from './config/configStore';
import BridgeController from './bridge/bridgeController';
import MqttBus from './bus/mqttBus';
import { createPlayer } from './player/playerFactory';
import type { PlayerFacade } from './player/playerTypes';

let bridge: BridgeController | null = null;
let player: PlayerFacade | null = null;
let shuttingDown = false;

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Load configuration and log the effective connection settings.
 * @throws Will throw an error if the configuration is invalid.
 */
function initializeBridge(): BridgeConfig {
  const config = initializeConfig();
  logger.info('[Main] Starting MQTT player bridge');
  logger.info(`[Main] Broker: ${config.mqtt.host}:${config.mqtt.port} (topic "${config.mqtt.topic}")`);
  logger.info(`[Main] Player: ${config.player.type} at ${config.player.host}:${config.player.port}`);
  return config;
}

/**
 * Release the bridge and the player. Errors are logged so every step runs.
 */
async function teardown(): Promise<void> {
  if (bridge) {
    try {
      await bridge.stop();
    } catch (error) {
      logger.error(`[Main] Error stopping bridge: ${describeError(error)}`);
    }
  }
  if (player) {
    try {
      await player.disconnect();
    } catch (error) {
      logger.error(`[Main] Error disconnecting player: ${describeError(error)}`);
    }
  }
}

/**
 * Handle graceful shutdown of the application.
 * @param signal - The signal received for shutdown (e.g., SIGINT, SIGTERM).
 */
async function handleShutdown(signal: NodeJS.Signals) {
  if (shuttingDown) {
    logger.warn(`[Main] Shutdown already in progress (signal: ${signal}).`);
    return;
  }
  shuttingDown = true;

  logger.info(`[Main] Received shutdown signal: ${signal}. Shutting down gracefully.`);
  await teardown();
  process.exit(0);
}

/**
 * Restarting is left to the process supervisor (systemd, docker, ...): exit non-zero.
 */
async function handleFailure(error: unknown) {
  if (shuttingDown) return;
  shuttingDown = true;

  logger.error(`[Main] Bridge failed: ${describeError(error)}. Exiting for supervisor restart.`);
  await teardown();
  process.exit(1);
}

/**
 * Main function to start the application.
 * Connects the player first so the bridge never dispatches against an unconnected player.
 */
async function startApplication() {
  try {
    const config = initializeBridge();

    player = createPlayer(config.player);
    await player.connect();

    const bus = new MqttBus(config.mqtt);
    bridge = new BridgeController(bus, player, {
      topic: config.mqtt.topic,
      commandSegment: config.mqtt.commandSegment,
      stateSegment: config.mqtt.stateSegment,
      retain: config.mqtt.retain,
      onFailure: (error) => {
        void handleFailure(error);
      },
    });
    await bridge.start();
  } catch (error: unknown) {
    logger.error(`[Main] Error during initialization or setup: ${describeError(error)}`);
    await handleFailure(error);
  }
}

const shutdownSignals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
shutdownSignals.forEach((signal) => {
  process.on(signal, () => {
    void handleShutdown(signal);
  });
});

void startApplication();
