import { Peripheral, Characteristic } from '@abandonware/noble';
import { TransportError, errorMessage } from './errors';

// noble reports 128-bit UUIDs lower case without dashes
export const GOVEE_WRITE_CHAR = '000102030405060708090a0b0c0d2b11';
export const GOVEE_NOTIFY_CHAR = '000102030405060708090a0b0c0d2b10';

export interface DeviceTimeouts {
  connectMs: number;
  discoveryMs: number;
}

export const DEFAULT_TIMEOUTS: DeviceTimeouts = {
  connectMs: 20000,
  discoveryMs: 10000,
};

function normalizeUuid(uuid: string): string {
  return uuid.toLowerCase().replace(/-/g, '');
}

export async function withTimeout<T>(promise: Promise<T>, ms: number, message: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TransportError(message)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * One GATT connection to a Govee light: connect, write frames, disconnect.
 */
export class GoveeDevice {
  private writeCharacteristic: Characteristic | null = null;
  private notifyCharacteristic: Characteristic | null = null;

  constructor(
    private peripheral: Peripheral,
    private name: string,
    private timeouts: DeviceTimeouts = DEFAULT_TIMEOUTS
  ) {}

  async connect(): Promise<void> {
    const peripheral = this.peripheral;

    try {
      if (peripheral.state !== 'connected') {
        console.log(`[Device] Connecting to ${this.name} (current state: ${peripheral.state})...`);
        await withTimeout(
          peripheral.connectAsync(),
          this.timeouts.connectMs,
          `Connection timeout after ${this.timeouts.connectMs / 1000} seconds`
        );
      }

      const { characteristics } = await withTimeout(
        peripheral.discoverAllServicesAndCharacteristicsAsync(),
        this.timeouts.discoveryMs,
        `Service discovery timeout after ${this.timeouts.discoveryMs / 1000} seconds`
      );

      this.writeCharacteristic = characteristics.find((c) => normalizeUuid(c.uuid) === GOVEE_WRITE_CHAR) ?? null;
      this.notifyCharacteristic = characteristics.find((c) => normalizeUuid(c.uuid) === GOVEE_NOTIFY_CHAR) ?? null;

      if (!this.writeCharacteristic) {
        throw new TransportError(
          `Write characteristic not found. Available: ${characteristics.map((c) => c.uuid).join(', ') || 'none'}`
        );
      }

      if (this.notifyCharacteristic) {
        this.notifyCharacteristic.on('data', (data: Buffer) => {
          console.debug(`[Device] Notification from ${this.name}: ${data.toString('hex')}`);
        });
        await this.notifyCharacteristic.subscribeAsync();
      } else {
        console.warn(`[Device] Notify characteristic not available for ${this.name}`);
      }

      console.log(`[Device] Connected to ${this.name}`);
    } catch (error) {
      await this.disconnect();
      if (error instanceof TransportError) {
        throw error;
      }
      throw new TransportError(`Failed to connect to ${this.name}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async writeFrames(frames: readonly Buffer[]): Promise<void> {
    const characteristic = this.writeCharacteristic;
    if (!characteristic) {
      throw new TransportError(`${this.name} not connected`);
    }

    const withoutResponse = characteristic.properties.includes('writeWithoutResponse');
    console.log(`[Device] Sending ${frames.length} frame(s) to ${this.name}`);

    for (const frame of frames) {
      try {
        await characteristic.writeAsync(frame, withoutResponse);
      } catch (error) {
        throw new TransportError(`Failed to write to ${this.name}: ${errorMessage(error)}`, { cause: error });
      }
      console.debug(`[Device] Wrote ${frame.toString('hex')}`);
    }
  }

  async disconnect(): Promise<void> {
    this.writeCharacteristic = null;
    this.notifyCharacteristic = null;

    if (this.peripheral.state === 'disconnected') {
      return;
    }
    try {
      await this.peripheral.disconnectAsync();
    } catch (error) {
      console.error(`[Device] Error disconnecting ${this.name}: ${errorMessage(error)}`);
    }
  }

  isConnected(): boolean {
    return this.writeCharacteristic !== null && this.peripheral.state === 'connected';
  }
}
