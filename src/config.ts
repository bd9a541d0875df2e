import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors';
import { LOG_LEVELS, LogLevel } from './logging';

export interface GatewayConfig {
  mqtt: {
    brokerUrl: string;
    username?: string;
    password?: string;
    clientId?: string;
    reconnectSeconds: number;
    rootTopic: string;
  };
  gatewayId: string;
  homeAssistantDiscovery?: string;
  devices: string[];
  commandSettleMs: number;
  logLevel: LogLevel;
}

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const envSchema = z.object({
  MQTT_BROKER_URL: z.string().url().default('mqtt://localhost:1883'),
  MQTT_USERNAME: optionalText,
  MQTT_PASSWORD: optionalText,
  MQTT_CLIENT_ID: optionalText,
  MQTT_RECONNECT_SECONDS: z.coerce.number().int().positive().default(10),
  MQTT_ROOT_TOPIC: z.string().min(1).default('govee_ble'),
  GATEWAY_ID: z.string().min(1).default('default'),
  HOMEASSISTANT_DISCOVERY: optionalText,
  DEVICES: z.string().default(''),
  COMMAND_SETTLE_MS: z.coerce.number().int().nonnegative().default(500),
  LOG_LEVEL: z
    .string()
    .default('info')
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(LOG_LEVELS)),
});

export function parseDeviceList(value: string): string[] {
  return value
    .split(/[,\s]+/)
    .map((s) => s.trim().toUpperCase())
    .filter(Boolean);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const vars = result.data;
  return {
    mqtt: {
      brokerUrl: vars.MQTT_BROKER_URL,
      username: vars.MQTT_USERNAME,
      password: vars.MQTT_PASSWORD,
      clientId: vars.MQTT_CLIENT_ID,
      reconnectSeconds: vars.MQTT_RECONNECT_SECONDS,
      rootTopic: vars.MQTT_ROOT_TOPIC,
    },
    gatewayId: vars.GATEWAY_ID,
    homeAssistantDiscovery: vars.HOMEASSISTANT_DISCOVERY,
    devices: parseDeviceList(vars.DEVICES),
    commandSettleMs: vars.COMMAND_SETTLE_MS,
    logLevel: vars.LOG_LEVEL,
  };
}

/** Reads .env into process.env (existing variables win) and loads the config. */
export function loadConfigFromEnvironment(): GatewayConfig {
  dotenv.config();
  return loadConfig(process.env);
}
