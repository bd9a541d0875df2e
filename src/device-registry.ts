import { DeviceRecord } from './types';

export const EXTERNAL_ID_PREFIX = '0x';

export function canonicalAddress(address: string): string {
  return address.trim().toUpperCase().replace(/-/g, ':');
}

/** AA:BB:CC:DD:EE:FF → 0xAABBCCDDEEFF */
export function addressToExternalId(address: string): string {
  return `${EXTERNAL_ID_PREFIX}${canonicalAddress(address).replace(/:/g, '')}`;
}

/** Govee_H7060_3D1E → H7060; anything else is its own model. */
export function parseModel(displayName: string): string {
  const parts = displayName.split('_');
  return parts.length === 3 ? parts[1] : displayName;
}

export interface UpsertResult {
  record: DeviceRecord;
  isNew: boolean;
  changed: boolean;
}

/**
 * Devices seen since startup, keyed by external id. Records are never removed.
 */
export class DeviceRegistry {
  private devices = new Map<string, DeviceRecord>();

  upsert(address: string, displayName: string, manufacturerData?: Buffer): UpsertResult {
    const canonical = canonicalAddress(address);
    const externalId = addressToExternalId(canonical);
    const existing = this.devices.get(externalId);

    if (!existing) {
      const record: DeviceRecord = {
        externalId,
        address: canonical,
        displayName,
        model: parseModel(displayName),
        lastManufacturerData: manufacturerData ? Buffer.from(manufacturerData) : undefined,
      };
      this.devices.set(externalId, record);
      return { record, isNew: true, changed: false };
    }

    if (sameBytes(existing.lastManufacturerData, manufacturerData)) {
      return { record: existing, isNew: false, changed: false };
    }

    existing.lastManufacturerData = manufacturerData ? Buffer.from(manufacturerData) : undefined;
    return { record: existing, isNew: false, changed: true };
  }

  get(externalId: string): DeviceRecord | undefined {
    return this.devices.get(externalId);
  }

  getByAddress(address: string): DeviceRecord | undefined {
    return this.devices.get(addressToExternalId(address));
  }

  list(): DeviceRecord[] {
    return Array.from(this.devices.values());
  }

  get size(): number {
    return this.devices.size;
  }
}

function sameBytes(a?: Buffer, b?: Buffer): boolean {
  if (!a || !b) {
    return a === b;
  }
  return a.equals(b);
}
