import { z } from 'zod';
import { InvalidCommandError, errorMessage } from './errors';
import { Effect, SemanticCommand } from './types';

const rgbSchema = z.object({
  r: z.number(),
  g: z.number(),
  b: z.number(),
});

const effectSchema = z.object({
  scene: z.string().optional(),
  music: z.string().optional(),
  video: z.string().optional(),
  mode: z.string().optional(),
  sensitivity: z.number().int().optional(),
  sensivity: z.number().int().optional(), // spelling used by older clients
  sound_effect: z.boolean().optional(),
  tv_brightness: z.array(z.number().int()).optional(),
  mask: z.string().optional(),
});

type RawEffect = z.infer<typeof effectSchema>;

// Home Assistant's JSON light schema; keys it sends that we don't use are stripped.
export const commandSchema = z.object({
  state: z.enum(['ON', 'OFF']).optional(),
  brightness: z.number().int().optional(),
  color: rgbSchema.optional(),
  color_temp: z.number().positive().optional(),
  colorTemp: z.number().positive().optional(),
  effect: z.unknown().optional(),
});

const DEFAULT_SENSITIVITY = 100;
const DEFAULT_TV_BRIGHTNESS = [100, 100, 100, 100];

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * The effect field is either an object or text. Text holding a JSON object is
 * decoded; any other text names a scene.
 */
function effectObject(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    return { scene: value };
  }

  if (typeof parsed === 'string') {
    return { scene: parsed };
  }
  if (typeof parsed === 'object' && parsed !== null) {
    return parsed;
  }
  return { scene: value };
}

function toEffect(raw: RawEffect): Effect {
  if (raw.scene) {
    return { kind: 'scene', scene: raw.scene };
  }

  const sensitivity = raw.sensitivity ?? raw.sensivity ?? DEFAULT_SENSITIVITY;

  if (raw.music) {
    return {
      kind: 'music',
      music: raw.music,
      calm: (raw.mode ?? 'calm') === 'calm',
      sensitivity,
    };
  }

  if (raw.video) {
    return {
      kind: 'video',
      video: raw.video,
      game: raw.mode === 'game',
      sound: raw.sound_effect === true,
      sensitivity,
      tvBrightness: raw.tv_brightness?.length === 4 ? raw.tv_brightness : [...DEFAULT_TV_BRIGHTNESS],
    };
  }

  return raw.mask ? { kind: 'plain', mask: raw.mask } : { kind: 'plain' };
}

export function parseEffect(value: unknown): Effect {
  const result = effectSchema.safeParse(effectObject(value));
  if (!result.success) {
    throw new InvalidCommandError(`Invalid effect: ${describeIssues(result.error)}`);
  }
  return toEffect(result.data);
}

/** Decodes and validates a JSON command payload. */
export function parseCommand(rawPayload: string): SemanticCommand {
  let data: unknown;
  try {
    data = JSON.parse(rawPayload);
  } catch (error) {
    throw new InvalidCommandError(`Command is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }

  const result = commandSchema.safeParse(data);
  if (!result.success) {
    throw new InvalidCommandError(`Invalid command: ${describeIssues(result.error)}`);
  }

  const { state, brightness, color, effect } = result.data;
  const colorTemp = result.data.color_temp ?? result.data.colorTemp;
  const command: SemanticCommand = {};

  if (state !== undefined) command.state = state;
  if (brightness !== undefined) command.brightness = brightness;
  if (color !== undefined) command.color = color;
  if (colorTemp !== undefined) command.colorTemp = colorTemp;
  if (effect !== undefined) {
    // A bad effect only costs the mode frame; state and brightness still apply
    try {
      command.effect = parseEffect(effect);
    } catch (error) {
      console.warn(`[Command] Ignoring effect: ${errorMessage(error)}`);
    }
  }

  return command;
}
