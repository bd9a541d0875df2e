import { DeviceRegistry, canonicalAddress } from './device-registry';
import { DiscoveryBusyError, TransportError, errorMessage } from './errors';
import { Advertisement, DeviceRecord, DeviceStatus, RadioTransport, ScanControl, ScanSession } from './types';

export const GOVEE_MANUFACTURER_ID = 0x8802;

export type DiscoveryState = 'idle' | 'scanning' | 'paused';

/**
 * Notification hooks. Both are optional; an unset hook does nothing.
 * onNewDevice is always awaited before the first onStateUpdate of that device.
 */
export interface DiscoveryListener {
  onNewDevice?(record: DeviceRecord): void | Promise<void>;
  onStateUpdate?(record: DeviceRecord, status: DeviceStatus): void | Promise<void>;
}

const NO_LISTENER: DiscoveryListener = {};

export function deviceStatus(manufacturerData: Buffer): DeviceStatus {
  return { state: manufacturerData[4] === 0x01 ? 'ON' : 'OFF' };
}

/**
 * Owns the scan session. Transitions are serialized so that at most one
 * session is open and a paused scan is never resumed twice.
 *
 *   idle --start--> scanning --pause--> paused --resume--> scanning
 *   any  --stop---> idle
 */
export class DiscoveryCoordinator implements ScanControl {
  private state: DiscoveryState = 'idle';
  private session: ScanSession | null = null;
  private transitions: Promise<unknown> = Promise.resolve();
  private listener: DiscoveryListener = NO_LISTENER;
  private allowList: Set<string>;
  // Per-address notification chains; a device's advertisements apply in arrival order
  private pending = new Map<string, Promise<void>>();

  constructor(
    private transport: RadioTransport,
    private registry: DeviceRegistry,
    allowList: readonly string[] = []
  ) {
    this.allowList = new Set(allowList.map(canonicalAddress));
  }

  setListener(listener: DiscoveryListener | null): void {
    this.listener = listener ?? NO_LISTENER;
  }

  getState(): DiscoveryState {
    return this.state;
  }

  /**
   * Starts scanning. A second start while a session exists is answered with a
   * DiscoveryBusyError instead of opening another one.
   */
  start(): Promise<DiscoveryBusyError | null> {
    if (this.state !== 'idle') {
      console.warn(`[Discovery] Start ignored, discovery is ${this.state}`);
      return Promise.resolve(new DiscoveryBusyError(this.state));
    }

    this.state = 'scanning';
    return this.serialize(async () => {
      await this.openSession('idle');
      console.log('[Discovery] Discovery has started');
      return null;
    });
  }

  pause(): Promise<void> {
    return this.serialize(async () => {
      if (this.state !== 'scanning') {
        return;
      }
      this.state = 'paused';
      await this.closeSession();
      console.log('[Discovery] Discovery paused');
    });
  }

  /** A failed resume stays paused, so the next resume tries again. */
  resume(): Promise<void> {
    return this.serialize(async () => {
      if (this.state !== 'paused') {
        return;
      }
      this.state = 'scanning';
      await this.openSession('paused');
      console.log('[Discovery] Discovery resumed');
    });
  }

  stop(): Promise<void> {
    return this.serialize(async () => {
      if (this.state === 'idle') {
        return;
      }
      this.state = 'idle';
      await this.closeSession();
      console.log('[Discovery] Discovery stopped');
    });
  }

  /**
   * Applies one advertisement to the registry and raises notifications.
   * Advertisements of one address are handled one after another.
   */
  handleAdvertisement(advertisement: Advertisement): Promise<void> {
    const address = canonicalAddress(advertisement.address);
    const previous = this.pending.get(address) ?? Promise.resolve();
    const run: Promise<void> = previous
      .catch(() => undefined)
      .then(() => this.applyAdvertisement(address, advertisement))
      .finally(() => {
        if (this.pending.get(address) === run) {
          this.pending.delete(address);
        }
      });
    this.pending.set(address, run);
    return run;
  }

  private async applyAdvertisement(address: string, advertisement: Advertisement): Promise<void> {
    if (this.state !== 'scanning') {
      return;
    }

    if (this.allowList.size > 0 && !this.allowList.has(address)) {
      return;
    }

    const manufacturerData = advertisement.manufacturerData.get(GOVEE_MANUFACTURER_ID);
    if (!manufacturerData) {
      return;
    }

    const { record, isNew, changed } = this.registry.upsert(address, advertisement.name, manufacturerData);
    if (!isNew && !changed) {
      return;
    }

    const listener = this.listener;
    try {
      if (isNew) {
        console.log(`[Discovery] New Govee device: ${record.displayName} (${record.address})`);
        await listener.onNewDevice?.(record);
      } else {
        console.debug(`[Discovery] Manufacturer data changed for ${record.address}: ${manufacturerData.toString('hex')}`);
      }
      await listener.onStateUpdate?.(record, deviceStatus(record.lastManufacturerData ?? manufacturerData));
    } catch (error) {
      console.error(`[Discovery] Listener failed for ${record.address}: ${errorMessage(error)}`);
    }
  }

  private async openSession(stateOnFailure: DiscoveryState): Promise<void> {
    try {
      this.session = await this.transport.startScan((advertisement) => {
        this.handleAdvertisement(advertisement).catch((error) => {
          console.error(`[Discovery] Failed to handle advertisement: ${errorMessage(error)}`);
        });
      });
    } catch (error) {
      this.state = stateOnFailure;
      this.session = null;
      throw new TransportError(`Failed to start scanning: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async closeSession(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (!session) {
      return;
    }
    try {
      await session.stop();
    } catch (error) {
      console.error(`[Discovery] Failed to stop scanning: ${errorMessage(error)}`);
    }
  }

  private serialize<T>(step: () => Promise<T>): Promise<T> {
    const run = this.transitions.then(step);
    this.transitions = run.catch(() => undefined);
    return run;
  }
}
