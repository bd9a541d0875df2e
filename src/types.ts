export interface Rgb {
  r: number;
  g: number;
  b: number;
}

export type PowerState = 'ON' | 'OFF';

export interface DeviceRecord {
  externalId: string;
  address: string; // canonical, e.g. AA:BB:CC:DD:EE:FF
  displayName: string;
  model: string;
  lastManufacturerData?: Buffer;
}

export interface DeviceStatus {
  state: PowerState;
}

export interface DeviceInfo {
  address: string;
  name: string;
  model: string;
}

export type CommandKind = 'json';

export interface PendingCommand {
  externalId: string;
  commandKind: string;
  rawPayload: string;
}

export type Effect =
  | { kind: 'scene'; scene: string }
  | { kind: 'music'; music: string; calm: boolean; sensitivity: number }
  | {
      kind: 'video';
      video: string;
      game: boolean;
      sound: boolean;
      sensitivity: number;
      tvBrightness: number[];
    }
  | { kind: 'plain'; mask?: string };

export interface SemanticCommand {
  state?: PowerState;
  brightness?: number; // 0-100, passed through unchanged
  color?: Rgb;
  colorTemp?: number; // Mireds
  effect?: Effect;
}

/** One advertisement as seen by the radio. Company id → payload without the id. */
export interface Advertisement {
  address: string;
  name: string;
  manufacturerData: ReadonlyMap<number, Buffer>;
}

export interface ScanSession {
  stop(): Promise<void>;
}

export interface RadioTransport {
  startScan(onAdvertisement: (advertisement: Advertisement) => void): Promise<ScanSession>;
  sendFrames(address: string, frames: readonly Buffer[]): Promise<void>;
}

export interface MessageBus {
  publishJson(topic: string, body: object, retain?: boolean): Promise<void>;
}

/** Pause/resume contract the command queue needs from discovery. */
export interface ScanControl {
  pause(): Promise<void>;
  resume(): Promise<void>;
}
