import { vi } from 'vitest';
import { CommandQueue } from './command-queue';
import { DeviceRegistry } from './device-registry';
import { TransportError } from './errors';
import { ScanControl } from './types';

const ADDRESS = 'A4:C1:38:0D:1E:3F';
const EXTERNAL_ID = '0xA4C1380D1E3F';
const OTHER_ADDRESS = 'AA:BB:CC:DD:EE:FF';
const OTHER_ID = '0xAABBCCDDEEFF';

const ON = '3301010000000000000000000000000000000033';
const OFF = '3301000000000000000000000000000000000032';
const BRIGHTNESS_80 = '3304500000000000000000000000000000000067';

describe('CommandQueue', () => {
  let registry: DeviceRegistry;
  let transport: { sendFrames: ReturnType<typeof vi.fn> };
  let scanControl: ScanControl & { pause: ReturnType<typeof vi.fn>; resume: ReturnType<typeof vi.fn> };
  let queue: CommandQueue;
  let events: string[];

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);

    events = [];
    registry = new DeviceRegistry();
    registry.upsert(ADDRESS, 'Govee_H7060_3D1E', Buffer.from([0x01]));
    registry.upsert(OTHER_ADDRESS, 'Govee_H6199_0001', Buffer.from([0x01]));

    transport = {
      sendFrames: vi.fn(async (address: string, frames: readonly Buffer[]) => {
        events.push(`send ${address} ${frames.map((f) => f.toString('hex')).join(',')}`);
      }),
    };
    scanControl = {
      pause: vi.fn(async () => {
        events.push('pause');
      }),
      resume: vi.fn(async () => {
        events.push('resume');
      }),
    };
    queue = new CommandQueue(registry, transport, scanControl, { settleDelayMs: 0 });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  it('should send one transaction with frames in order', async () => {
    queue.enqueue(EXTERNAL_ID, 'json', '{"state":"ON","brightness":80}');
    await queue.flush();

    expect(events).toEqual(['pause', `send ${ADDRESS} ${ON},${BRIGHTNESS_80}`, 'resume']);
  });

  it('should coalesce a burst into a single transaction per device', async () => {
    queue.enqueue(EXTERNAL_ID, 'json', '{"state":"ON"}');
    queue.enqueue(EXTERNAL_ID, 'json', '{"state":"OFF"}');
    await queue.flush();

    expect(transport.sendFrames).toHaveBeenCalledTimes(1);
    expect(events).toEqual(['pause', `send ${ADDRESS} ${ON},${OFF}`, 'resume']);
  });

  it('should pause once around several devices', async () => {
    queue.enqueue(EXTERNAL_ID, 'json', '{"state":"ON"}');
    queue.enqueue(OTHER_ID, 'json', '{"state":"OFF"}');
    queue.enqueue(EXTERNAL_ID, 'json', '{"brightness":80}');
    await queue.flush();

    expect(events).toEqual([
      'pause',
      `send ${ADDRESS} ${ON},${BRIGHTNESS_80}`,
      `send ${OTHER_ADDRESS} ${OFF}`,
      'resume',
    ]);
  });

  it('should wait for the settle delay before draining', async () => {
    vi.useFakeTimers();
    queue = new CommandQueue(registry, transport, scanControl, { settleDelayMs: 500 });

    queue.enqueue(EXTERNAL_ID, 'json', '{"state":"ON"}');
    await vi.advanceTimersByTimeAsync(499);
    expect(transport.sendFrames).not.toHaveBeenCalled();
    expect(queue.size).toBe(1);

    queue.enqueue(EXTERNAL_ID, 'json', '{"state":"OFF"}');
    await vi.advanceTimersByTimeAsync(1);
    await queue.flush();

    expect(transport.sendFrames).toHaveBeenCalledTimes(1);
    expect(queue.size).toBe(0);
  });

  it('should drop invalid commands and keep the rest', async () => {
    queue.enqueue(EXTERNAL_ID, 'json', 'not json');
    queue.enqueue(EXTERNAL_ID, 'json', '{"state":"ON"}');
    await queue.flush();

    expect(events).toEqual(['pause', `send ${ADDRESS} ${ON}`, 'resume']);
    expect(console.error).toHaveBeenCalledWith(
      expect.stringMatching(/^\[Queue\] Dropping command for 0xA4C1380D1E3F: Command is not valid JSON/)
    );
  });

  it('should report sent, failed and skipped devices', async () => {
    transport.sendFrames.mockImplementation(async (address: string) => {
      if (address === OTHER_ADDRESS) {
        throw new TransportError('connection refused');
      }
    });

    queue.enqueue(EXTERNAL_ID, 'json', '{"state":"ON"}');
    queue.enqueue(OTHER_ID, 'json', '{"state":"ON"}');
    queue.enqueue('0x000000000000', 'json', '{"state":"ON"}');
    queue.enqueue('0xA4C1380D1E40', 'raw', 'x');

    const report = await queue.drain();

    expect(report).toEqual({
      sent: [EXTERNAL_ID],
      failed: [OTHER_ID],
      skipped: ['0x000000000000', '0xA4C1380D1E40'],
    });
    expect(scanControl.resume).toHaveBeenCalledTimes(1);
  });

  it('should skip devices whose commands produce no frames', async () => {
    queue.enqueue(EXTERNAL_ID, 'raw', 'ON');
    const report = await queue.drain();

    expect(report.skipped).toEqual([EXTERNAL_ID]);
    expect(transport.sendFrames).not.toHaveBeenCalled();
    expect(events).toEqual(['pause', 'resume']);
  });

  it('should do nothing when drained empty', async () => {
    const report = await queue.drain();

    expect(report).toEqual({ sent: [], failed: [], skipped: [] });
    expect(scanControl.pause).not.toHaveBeenCalled();
    expect(scanControl.resume).not.toHaveBeenCalled();
  });

  it('should resume even if the transport throws synchronously', async () => {
    transport.sendFrames.mockImplementation(() => {
      throw new Error('boom');
    });
    queue.enqueue(EXTERNAL_ID, 'json', '{"state":"ON"}');

    const report = await queue.drain();

    expect(report.failed).toEqual([EXTERNAL_ID]);
    expect(events).toEqual(['pause', 'resume']);
  });

  it('should keep going when pausing discovery fails', async () => {
    scanControl.pause.mockRejectedValue(new Error('radio busy'));
    queue.enqueue(EXTERNAL_ID, 'json', '{"state":"ON"}');
    await queue.flush();

    expect(events).toEqual([`send ${ADDRESS} ${ON}`, 'resume']);
    expect(console.error).toHaveBeenCalledWith('[Queue] Failed to pause discovery: radio busy');
  });

  it('should run drains one after another', async () => {
    let release: () => void = () => undefined;
    transport.sendFrames.mockImplementationOnce(
      (address: string) =>
        new Promise<void>((resolve) => {
          events.push(`start ${address}`);
          release = () => {
            events.push(`end ${address}`);
            resolve();
          };
        })
    );

    queue.enqueue(EXTERNAL_ID, 'json', '{"state":"ON"}');
    await new Promise((resolve) => setTimeout(resolve, 5));
    queue.enqueue(OTHER_ID, 'json', '{"state":"OFF"}');
    await new Promise((resolve) => setTimeout(resolve, 5));

    expect(events).toEqual(['pause', `start ${ADDRESS}`]);

    release();
    await queue.flush();

    expect(events).toEqual([
      'pause',
      `start ${ADDRESS}`,
      `end ${ADDRESS}`,
      'resume',
      'pause',
      `send ${OTHER_ADDRESS} ${OFF}`,
      'resume',
    ]);
  });
});
