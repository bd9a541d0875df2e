import noble, { Peripheral } from '@abandonware/noble';
import { canonicalAddress } from './device-registry';
import { DEFAULT_TIMEOUTS, DeviceTimeouts, GoveeDevice } from './device';
import { TransportError, errorMessage } from './errors';
import { Advertisement, RadioTransport, ScanSession } from './types';

/**
 * Splits noble's manufacturer data (company id little endian, then payload)
 * into company id → payload.
 */
export function parseManufacturerData(data?: Buffer): Map<number, Buffer> {
  const result = new Map<number, Buffer>();
  if (data && data.length >= 2) {
    result.set(data.readUInt16LE(0), data.subarray(2));
  }
  return result;
}

export function toAdvertisement(peripheral: Peripheral): Advertisement | null {
  // macOS hides the address; the id is the only stable key there
  const rawAddress = peripheral.address && peripheral.address !== 'N/A' ? peripheral.address : peripheral.id;
  if (!rawAddress) {
    return null;
  }
  return {
    address: canonicalAddress(rawAddress),
    name: peripheral.advertisement?.localName ?? '',
    manufacturerData: parseManufacturerData(peripheral.advertisement?.manufacturerData),
  };
}

/**
 * noble backed radio: passive scan sessions plus one GATT transaction at a time.
 */
export class BLEManager implements RadioTransport {
  private peripherals = new Map<string, Peripheral>();
  private onAdvertisement: ((advertisement: Advertisement) => void) | null = null;
  private isScanning = false;
  private transaction: Promise<unknown> = Promise.resolve();
  private listening = false;

  constructor(private timeouts: DeviceTimeouts = DEFAULT_TIMEOUTS) {}

  async initialize(): Promise<void> {
    if (!this.listening) {
      noble.on('discover', (peripheral: Peripheral) => this.handleDiscover(peripheral));
      this.listening = true;
    }

    return new Promise((resolve, reject) => {
      let settled = false;

      noble.on('stateChange', (state: string) => {
        if (state === 'poweredOn') {
          console.log('[BLE] Adapter powered on');
          if (!settled) {
            settled = true;
            resolve();
          }
          return;
        }

        console.warn(`[BLE] Adapter state: ${state}`);
        if (!settled && state === 'unauthorized') {
          settled = true;
          reject(new TransportError('Bluetooth adapter unauthorized'));
        } else if (!settled && state === 'unsupported') {
          settled = true;
          reject(new TransportError('Bluetooth not supported'));
        }
      });

      if (noble.state === 'poweredOn') {
        settled = true;
        resolve();
      }
    });
  }

  async startScan(onAdvertisement: (advertisement: Advertisement) => void): Promise<ScanSession> {
    if (this.isScanning) {
      throw new TransportError('A scan session is already running');
    }

    this.onAdvertisement = onAdvertisement;
    try {
      await noble.startScanningAsync([], true);
    } catch (error) {
      this.onAdvertisement = null;
      throw new TransportError(`Failed to start scanning: ${errorMessage(error)}`, { cause: error });
    }
    this.isScanning = true;
    console.log('[BLE] Scanning started');

    let stopped = false;
    return {
      stop: async () => {
        if (stopped) {
          return;
        }
        stopped = true;
        this.onAdvertisement = null;
        try {
          await noble.stopScanningAsync();
        } finally {
          this.isScanning = false;
        }
        console.log('[BLE] Scanning stopped');
      },
    };
  }

  /**
   * Connects to the device, writes the frames in order and disconnects.
   * Transactions are serialized; the adapter handles one connection at a time.
   */
  sendFrames(address: string, frames: readonly Buffer[]): Promise<void> {
    const run = this.transaction.then(() => this.runTransaction(canonicalAddress(address), frames));
    this.transaction = run.catch(() => undefined);
    return run;
  }

  getPeripheral(address: string): Peripheral | undefined {
    return this.peripherals.get(canonicalAddress(address));
  }

  private async runTransaction(address: string, frames: readonly Buffer[]): Promise<void> {
    const peripheral = this.peripherals.get(address);
    if (!peripheral) {
      throw new TransportError(`Device ${address} has not been seen while scanning`);
    }

    if (this.isScanning) {
      console.warn(`[BLE] Scan still running before connecting to ${address}, stopping it`);
      try {
        await noble.stopScanningAsync();
      } finally {
        this.isScanning = false;
      }
    }

    const device = new GoveeDevice(peripheral, address, this.timeouts);
    await device.connect();
    try {
      await device.writeFrames(frames);
      console.log(`[BLE] Sent ${frames.length} frame(s) to ${address}`);
    } finally {
      await device.disconnect();
    }
  }

  private handleDiscover(peripheral: Peripheral): void {
    const advertisement = toAdvertisement(peripheral);
    if (!advertisement) {
      return;
    }

    // Keep the reference so a later transaction can connect without rescanning
    this.peripherals.set(advertisement.address, peripheral);
    this.onAdvertisement?.(advertisement);
  }
}
