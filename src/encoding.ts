/**
 * Govee BLE protocol encoding
 * Frame format: 33 [opcode] [payload, zero padded to 17 bytes] [checksum]
 * The checksum is the XOR of the 19 preceding bytes.
 */

import { kelvinToRgb, miredToKelvin } from './color';
import { parseCommand } from './command';
import { EncodingError, UnknownCommandKindError, UnknownSceneError } from './errors';
import { sceneCode } from './scenes';
import { CommandKind, Effect, Rgb, SemanticCommand } from './types';

export const FRAME_HEADER = 0x33;
export const FRAME_LENGTH = 20;
export const MAX_PAYLOAD_LENGTH = 17;

export const Opcode = {
  Power: 0x01,
  Brightness: 0x04,
  Mode: 0x05,
} as const;

const JSON_COMMAND: CommandKind = 'json';

const SCENE_MODE = 0x04;
const MUSIC_MODE = 0x13;
const COLOR_MODE = [0x15, 0x01];
const VIDEO_MODE = 0x00;

export const MUSIC_MODES: Readonly<Record<string, number>> = {
  rhytm: 0x03,
  energetic: 0x05,
  spectrum: 0x04,
  rolling: 0x06,
};

const MASK_ON = new Set(['1', 'x', 'X', '+', '#']);
const FULL_MASK = [0xff, 0xff, 0xff];

export function frameChecksum(bytes: Uint8Array): number {
  let checksum = 0;
  for (const b of bytes) checksum ^= b;
  return checksum & 0xff;
}

export function buildFrame(opcode: number, payload: readonly number[]): Buffer {
  if (payload.length > MAX_PAYLOAD_LENGTH) {
    throw new EncodingError(`Payload too long: ${payload.length} bytes (max ${MAX_PAYLOAD_LENGTH})`);
  }
  for (const value of payload) {
    if (!Number.isInteger(value) || value < 0 || value > 0xff) {
      throw new EncodingError(`Payload value ${value} does not fit in a byte`);
    }
  }

  const frame = Buffer.alloc(FRAME_LENGTH);
  frame[0] = FRAME_HEADER;
  frame[1] = opcode & 0xff;
  frame.set(payload, 2);
  frame[FRAME_LENGTH - 1] = frameChecksum(frame.subarray(0, FRAME_LENGTH - 1));
  return frame;
}

/** Folds a zone mask such as "11x0" into 3 little-endian bytes, first character most significant. */
export function maskBytes(mask?: string): number[] {
  if (!mask) {
    return [...FULL_MASK];
  }

  let value = 0;
  for (const ch of mask) {
    value = (value << 1) | (MASK_ON.has(ch) ? 1 : 0);
  }
  return [value & 0xff, (value >> 8) & 0xff, (value >> 16) & 0xff];
}

export function rgbPayload(color: Rgb, mask?: string): number[] {
  return [
    ...COLOR_MODE,
    Math.trunc(color.r),
    Math.trunc(color.g),
    Math.trunc(color.b),
    0x00, 0x00, 0x00, 0x00, 0x00,
    ...maskBytes(mask),
  ];
}

export function colorTempPayload(mired: number, mask?: string): number[] {
  const kelvin = miredToKelvin(mired);
  const rgb = kelvinToRgb(kelvin);
  return [
    ...COLOR_MODE,
    0x00, 0x00, 0x00,
    kelvin & 0xff,
    (kelvin >> 8) & 0xff,
    rgb.r,
    rgb.g,
    rgb.b,
    ...maskBytes(mask),
  ];
}

function effectPayload(effect: Effect, command: SemanticCommand, model: string): number[] | null {
  switch (effect.kind) {
    case 'scene': {
      const code = sceneCode(model, effect.scene);
      if (code === undefined) {
        console.warn(`[Encoder] ${new UnknownSceneError(effect.scene, model).message}`);
        return null;
      }
      console.debug(`[Encoder] Applying scene ${effect.scene} (${code})`);
      return [SCENE_MODE, code & 0xff, (code >> 8) & 0xff];
    }

    case 'music': {
      const mode = MUSIC_MODES[effect.music];
      if (mode === undefined) {
        console.warn(`[Encoder] Unknown music mode "${effect.music}"`);
        return null;
      }
      const payload = [MUSIC_MODE, mode, effect.sensitivity, effect.calm ? 0x01 : 0x00];
      if (command.color) {
        const { r, g, b } = command.color;
        payload.push(0x01, Math.trunc(r), Math.trunc(g), Math.trunc(b));
      }
      return payload;
    }

    case 'video':
      return [
        VIDEO_MODE,
        effect.video === 'all' ? 0x01 : 0x00,
        effect.game ? 0x01 : 0x00,
        0x00,
        effect.sound ? 0x01 : 0x00,
        effect.sensitivity,
        0x00,
        ...effect.tvBrightness,
      ];

    case 'plain':
      return null;
  }
}

/**
 * Picks the single mode frame payload: scene, music or video effect, otherwise
 * colour or colour temperature. Null when nothing applies.
 */
function modePayload(command: SemanticCommand, model: string): number[] | null {
  const effect = command.effect;

  if (effect && effect.kind !== 'plain') {
    return effectPayload(effect, command, model);
  }

  const mask = effect?.kind === 'plain' ? effect.mask : undefined;
  if (command.colorTemp !== undefined) {
    return colorTempPayload(command.colorTemp, mask);
  }
  if (command.color) {
    return rgbPayload(command.color, mask);
  }
  return null;
}

export function encodeSemanticCommand(command: SemanticCommand, model: string): Buffer[] {
  const frames: Buffer[] = [];

  const mode = modePayload(command, model);
  if (mode) {
    frames.push(buildFrame(Opcode.Mode, mode));
  }

  if (command.state !== undefined) {
    frames.push(buildFrame(Opcode.Power, [command.state === 'ON' ? 0x01 : 0x00]));
  }

  if (command.brightness !== undefined) {
    frames.push(buildFrame(Opcode.Brightness, [command.brightness]));
  }

  return frames;
}

/**
 * Turns one inbound command into the frames to write, in order.
 * Throws InvalidCommandError or EncodingError; nothing is returned partially.
 */
export function encodeCommand(commandKind: string, rawPayload: string, model: string): Buffer[] {
  if (commandKind !== JSON_COMMAND) {
    console.warn(`[Encoder] ${new UnknownCommandKindError(commandKind).message}`);
    return [];
  }

  return encodeSemanticCommand(parseCommand(rawPayload), model);
}
