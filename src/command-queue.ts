import { DeviceRegistry } from './device-registry';
import { encodeCommand } from './encoding';
import { errorMessage } from './errors';
import { PendingCommand, RadioTransport, ScanControl } from './types';

export interface CommandQueueOptions {
  /** Delay between the first command of a burst and the drain. */
  settleDelayMs?: number;
  encode?: typeof encodeCommand;
}

export interface DrainReport {
  sent: string[];
  failed: string[];
  skipped: string[];
}

/**
 * Coalesces bursts of commands into one transaction per device.
 *
 * The first enqueue after the buffer was empty schedules a drain; later
 * commands ride along with it. Drains run one after another, never overlapping.
 */
export class CommandQueue {
  private buffer: PendingCommand[] = [];
  private draining: Promise<unknown> = Promise.resolve();
  private readonly settleDelayMs: number;
  private readonly encode: typeof encodeCommand;

  constructor(
    private registry: DeviceRegistry,
    private transport: Pick<RadioTransport, 'sendFrames'>,
    private scanControl: ScanControl,
    options: CommandQueueOptions = {}
  ) {
    this.settleDelayMs = options.settleDelayMs ?? 500;
    this.encode = options.encode ?? encodeCommand;
  }

  get size(): number {
    return this.buffer.length;
  }

  enqueue(externalId: string, commandKind: string, rawPayload: string): void {
    const wasEmpty = this.buffer.length === 0;
    this.buffer.push({ externalId, commandKind, rawPayload });

    if (wasEmpty) {
      this.scheduleDrain();
    }
  }

  /** Resolves once every drain scheduled so far has finished. */
  async flush(): Promise<void> {
    let current: Promise<unknown>;
    do {
      current = this.draining;
      await current;
    } while (current !== this.draining);
  }

  /**
   * Sends everything buffered right now. Never rejects: encoding and transport
   * failures are logged per command or per device.
   */
  async drain(): Promise<DrainReport> {
    const pending = this.buffer;
    this.buffer = [];

    const report: DrainReport = { sent: [], failed: [], skipped: [] };
    if (pending.length === 0) {
      return report;
    }

    const byDevice = new Map<string, PendingCommand[]>();
    for (const command of pending) {
      const list = byDevice.get(command.externalId) ?? [];
      list.push(command);
      byDevice.set(command.externalId, list);
    }

    console.log(`[Queue] Draining ${pending.length} command(s) for ${byDevice.size} device(s)`);

    await this.pauseDiscovery();
    try {
      for (const [externalId, commands] of byDevice) {
        const device = this.registry.get(externalId);
        if (!device) {
          console.warn(`[Queue] Unknown device ${externalId}, dropping ${commands.length} command(s)`);
          report.skipped.push(externalId);
          continue;
        }

        const frames: Buffer[] = [];
        for (const command of commands) {
          try {
            frames.push(...this.encode(command.commandKind, command.rawPayload, device.model));
          } catch (error) {
            console.error(`[Queue] Dropping command for ${externalId}: ${errorMessage(error)}`);
          }
        }

        if (frames.length === 0) {
          console.warn(`[Queue] No frames to send to ${externalId}`);
          report.skipped.push(externalId);
          continue;
        }

        try {
          console.log(`[Queue] Sending ${frames.length} frame(s) to ${device.address}`);
          await this.transport.sendFrames(device.address, frames);
          report.sent.push(externalId);
        } catch (error) {
          console.error(`[Queue] Failed to send commands to ${device.address}: ${errorMessage(error)}`);
          report.failed.push(externalId);
        }
      }
    } finally {
      await this.resumeDiscovery();
    }

    return report;
  }

  private scheduleDrain(): void {
    this.draining = this.draining.then(async () => {
      await new Promise((resolve) => setTimeout(resolve, this.settleDelayMs));
      await this.drain();
    });
  }

  private async pauseDiscovery(): Promise<void> {
    try {
      await this.scanControl.pause();
    } catch (error) {
      console.error(`[Queue] Failed to pause discovery: ${errorMessage(error)}`);
    }
  }

  private async resumeDiscovery(): Promise<void> {
    try {
      await this.scanControl.resume();
    } catch (error) {
      console.error(`[Queue] Failed to resume discovery: ${errorMessage(error)}`);
    }
  }
}
