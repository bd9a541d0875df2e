import mqtt, { IClientOptions, MqttClient } from 'mqtt';
import { TransportError, errorMessage } from './errors';
import { MessageBus } from './types';

export interface MQTTBridgeOptions {
  username?: string;
  password?: string;
  clientId?: string;
  rootTopic?: string;
  gatewayId?: string;
  reconnectSeconds?: number;
}

export type CommandHandler = (externalId: string, commandKind: string, payload: string) => void;

export const ONLINE = { status: 'online' };
export const OFFLINE = { status: 'offline' };

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class MQTTBridge implements MessageBus {
  private client: MqttClient | null = null;
  private commandHandler: CommandHandler = () => undefined;
  readonly rootTopic: string;
  readonly gatewayId: string;
  private commandPattern: RegExp;

  constructor(
    private brokerUrl: string,
    private brokerOptions: MQTTBridgeOptions = {}
  ) {
    this.rootTopic = brokerOptions.rootTopic ?? 'govee_ble';
    this.gatewayId = brokerOptions.gatewayId ?? 'default';
    this.commandPattern = new RegExp(`^${escapeRegExp(this.rootTopic)}/([^/]+)/command/([^/]+)$`);
  }

  /** `{root}/{id}/{suffix}` */
  buildTopic(externalId: string, suffix: string): string {
    return `${this.rootTopic}/${externalId}/${suffix}`;
  }

  get availabilityTopic(): string {
    return this.buildTopic(this.gatewayId, 'status');
  }

  get commandSubscription(): string {
    return `${this.rootTopic}/+/command/+`;
  }

  onCommand(handler: CommandHandler): void {
    this.commandHandler = handler;
  }

  isConnected(): boolean {
    return this.client?.connected ?? false;
  }

  /**
   * Resolves on the first successful connection. Errors before that are logged
   * while mqtt.js keeps retrying every `reconnectSeconds`.
   */
  connect(): Promise<void> {
    return new Promise((resolve) => {
      const options: IClientOptions = {
        clientId: this.brokerOptions.clientId || `govee-ble-gateway-${Date.now()}`,
        reconnectPeriod: (this.brokerOptions.reconnectSeconds ?? 10) * 1000,
        connectTimeout: 10000,
        will: {
          topic: this.availabilityTopic,
          payload: Buffer.from(JSON.stringify(OFFLINE)),
          qos: 1,
          retain: true,
        },
      };

      if (this.brokerOptions.username) {
        options.username = this.brokerOptions.username;
      }
      if (this.brokerOptions.password) {
        options.password = this.brokerOptions.password;
      }

      this.client = mqtt.connect(this.brokerUrl, options);

      this.client.on('connect', () => {
        console.log(`[MQTT] Connected to broker at ${this.brokerUrl}`);
        this.announceOnline();
        this.subscribeToCommands();
        resolve();
      });

      this.client.on('error', (error) => {
        console.error(`[MQTT] Error: ${error.message}`);
      });

      this.client.on('message', (topic, payload) => {
        this.handleMessage(topic, payload.toString());
      });

      this.client.on('reconnect', () => {
        console.log('[MQTT] Reconnecting...');
      });

      this.client.on('close', () => {
        console.log('[MQTT] Connection closed');
      });
    });
  }

  private announceOnline(): void {
    this.publishJson(this.availabilityTopic, ONLINE, true).catch((error) => {
      console.error(`[MQTT] Failed to announce availability: ${errorMessage(error)}`);
    });
  }

  private subscribeToCommands(): void {
    const commandTopic = this.commandSubscription;
    this.client?.subscribe(commandTopic, (err) => {
      if (err) {
        console.error(`[MQTT] Failed to subscribe to ${commandTopic}: ${err.message}`);
      } else {
        console.log(`[MQTT] Subscribed to ${commandTopic}`);
      }
    });
  }

  private handleMessage(topic: string, payload: string): void {
    // Topic format: {root}/{externalId}/command/{kind}
    const match = this.commandPattern.exec(topic);
    if (!match) {
      return;
    }

    const [, externalId, commandKind] = match;
    console.debug(`[MQTT] New message on ${topic}: ${payload}`);
    try {
      this.commandHandler(externalId, commandKind, payload);
    } catch (error) {
      console.error(`[MQTT] Failed to handle command for ${externalId}: ${errorMessage(error)}`);
    }
  }

  publishJson(topic: string, body: object, retain: boolean = false): Promise<void> {
    const client = this.client;
    if (!client) {
      console.warn(`[MQTT] Cannot publish to ${topic}: MQTT client not initialized`);
      return Promise.resolve();
    }

    if (!client.connected) {
      console.warn(`[MQTT] Cannot publish to ${topic}: MQTT client not connected`);
      return Promise.resolve();
    }

    const payload = JSON.stringify(body);
    console.debug(`[MQTT] Publishing to ${topic}: ${payload}`);

    return new Promise((resolve, reject) => {
      client.publish(topic, payload, { retain, qos: 1 }, (err) => {
        if (err) {
          reject(new TransportError(`Failed to publish to ${topic}: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  /** Marks the gateway offline (the broker only sends the will on a lost connection) and closes. */
  async disconnect(): Promise<void> {
    if (!this.client) {
      return;
    }

    try {
      await this.publishJson(this.availabilityTopic, OFFLINE, true);
    } catch (error) {
      console.warn(`[MQTT] Failed to announce offline: ${errorMessage(error)}`);
    }

    const client = this.client;
    this.client = null;
    if (!client) {
      return;
    }
    return new Promise((resolve) => {
      client.end(false, {}, () => resolve());
    });
  }
}
