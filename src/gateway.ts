import { CommandQueue, CommandQueueOptions } from './command-queue';
import { DeviceRegistry } from './device-registry';
import { DiscoveryCoordinator } from './discovery';
import { errorMessage } from './errors';
import { sceneNames } from './scenes';
import { DeviceInfo, DeviceRecord, DeviceStatus, MessageBus, RadioTransport } from './types';

export interface GatewayOptions {
  rootTopic: string;
  gatewayId: string;
  homeAssistantDiscovery?: string;
  allowList?: readonly string[];
  queue?: CommandQueueOptions;
}

export const MIN_MIREDS = 153;
export const MAX_MIREDS = 555;

/**
 * Owns the device registry, the command queue and discovery, and connects
 * them to the message bus.
 */
export class Gateway {
  readonly registry = new DeviceRegistry();
  readonly discovery: DiscoveryCoordinator;
  readonly queue: CommandQueue;

  constructor(
    radio: RadioTransport,
    private bus: MessageBus,
    private options: GatewayOptions
  ) {
    this.discovery = new DiscoveryCoordinator(radio, this.registry, options.allowList ?? []);
    this.queue = new CommandQueue(this.registry, radio, this.discovery, options.queue);
    this.discovery.setListener({
      onNewDevice: (record) => this.onNewDevice(record),
      onStateUpdate: (record, status) => this.onStateUpdate(record, status),
    });
  }

  topic(externalId: string, suffix: string): string {
    return `${this.options.rootTopic}/${externalId}/${suffix}`;
  }

  /** Entry point for `{root}/{id}/command/{kind}` messages. */
  handleCommand(externalId: string, commandKind: string, payload: string): void {
    console.log(`[Gateway] New command for ${externalId} (${commandKind}): ${payload}`);
    if (!this.registry.get(externalId)) {
      console.warn(`[Gateway] Unknown device ID: ${externalId}`);
      return;
    }
    this.queue.enqueue(externalId, commandKind, payload);
  }

  async onNewDevice(record: DeviceRecord): Promise<void> {
    const info: DeviceInfo = {
      address: record.address,
      name: record.displayName,
      model: record.model,
    };

    try {
      const prefix = this.options.homeAssistantDiscovery;
      if (prefix) {
        await this.bus.publishJson(
          `${prefix}/light/${record.externalId}/config`,
          this.homeAssistantConfig(record),
          true
        );
      }
      await this.bus.publishJson(this.topic(record.externalId, 'info'), info);
    } catch (error) {
      console.error(`[Gateway] Error while publishing device data for ${record.address}: ${errorMessage(error)}`);
    }
  }

  async onStateUpdate(record: DeviceRecord, status: DeviceStatus): Promise<void> {
    try {
      await this.bus.publishJson(this.topic(record.externalId, 'status'), status, true);
    } catch (error) {
      console.error(`[Gateway] Error while publishing status for ${record.address}: ${errorMessage(error)}`);
    }
  }

  /** Home Assistant MQTT discovery document for a JSON schema light. */
  homeAssistantConfig(record: DeviceRecord): Record<string, unknown> {
    const id = record.externalId;
    return {
      availability: [
        {
          topic: this.topic(this.options.gatewayId, 'status'),
          value_template: '{{ value_json.status }}',
        },
      ],
      availability_mode: 'all',
      optimistic: true,
      brightness: true,
      brightness_scale: 100,
      command_topic: this.topic(id, 'command/json'),
      device: {
        identifiers: [`govee_ble_${id}`],
        manufacturer: 'Govee',
        model: record.model,
        name: record.displayName,
      },
      effect: true,
      effect_list: sceneNames(record.model),
      min_mireds: MIN_MIREDS,
      max_mireds: MAX_MIREDS,
      name: record.displayName,
      schema: 'json',
      state_topic: this.topic(id, 'status'),
      supported_color_modes: ['color_temp', 'rgb'],
      unique_id: `${id}_govee_ble`,
    };
  }

  /** Starts discovery; false when it is already running or the radio refused. */
  async start(): Promise<boolean> {
    try {
      const busy = await this.discovery.start();
      if (busy) {
        console.warn(`[Gateway] ${busy.message}`);
        return false;
      }
      return true;
    } catch (error) {
      console.error(`[Gateway] Could not start discovery: ${errorMessage(error)}`);
      return false;
    }
  }

  async stop(): Promise<void> {
    await this.queue.flush();
    await this.discovery.stop();
  }
}
