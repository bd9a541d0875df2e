#!/usr/bin/env node
import { BLEManager } from './ble-manager';
import { GatewayConfig, loadConfigFromEnvironment } from './config';
import { errorMessage } from './errors';
import { Gateway } from './gateway';
import { applyLogLevel } from './logging';
import { MQTTBridge } from './mqtt-bridge';

async function main() {
  console.log('[Main] Starting Govee BLE MQTT gateway...');

  let config: GatewayConfig;
  try {
    config = loadConfigFromEnvironment();
  } catch (error) {
    console.error(`[Config] ${errorMessage(error)}`);
    process.exit(1);
  }
  applyLogLevel(config.logLevel);

  if (config.devices.length > 0) {
    console.log(`[Main] Managing only: ${config.devices.join(', ')}`);
  }

  const mqttBridge = new MQTTBridge(config.mqtt.brokerUrl, {
    username: config.mqtt.username,
    password: config.mqtt.password,
    clientId: config.mqtt.clientId,
    rootTopic: config.mqtt.rootTopic,
    gatewayId: config.gatewayId,
    reconnectSeconds: config.mqtt.reconnectSeconds,
  });
  const bleManager = new BLEManager();
  const gateway = new Gateway(bleManager, mqttBridge, {
    rootTopic: config.mqtt.rootTopic,
    gatewayId: config.gatewayId,
    homeAssistantDiscovery: config.homeAssistantDiscovery,
    allowList: config.devices,
    queue: { settleDelayMs: config.commandSettleMs },
  });

  mqttBridge.onCommand((externalId, commandKind, payload) => {
    gateway.handleCommand(externalId, commandKind, payload);
  });

  await mqttBridge.connect();
  console.log('[Main] MQTT bridge connected');

  try {
    await bleManager.initialize();
  } catch (error) {
    console.error(`[Main] Bluetooth unavailable: ${errorMessage(error)}`);
    await mqttBridge.disconnect();
    process.exit(1);
  }
  console.log('[Main] BLE manager initialized');

  if (await gateway.start()) {
    console.log('[Main] Gateway running');
  }

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.log('[Main] Shutting down...');
    try {
      await gateway.stop();
      await mqttBridge.disconnect();
    } catch (error) {
      console.error(`[Main] Error during shutdown: ${errorMessage(error)}`);
    }
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

main().catch((error) => {
  console.error('[Main] Fatal error:', error);
  process.exit(1);
});
