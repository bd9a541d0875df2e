/**
 * Error taxonomy of the gateway. None of these is fatal to the process:
 * callers log them and carry on with the next command, device or message.
 */

export class GatewayError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A frame could not be assembled (payload too long, byte out of range). */
export class EncodingError extends GatewayError {}

/** The command payload is not JSON or does not have a known shape. */
export class InvalidCommandError extends GatewayError {}

export class UnknownCommandKindError extends GatewayError {
  constructor(readonly commandKind: string) {
    super(`Unsupported command kind: ${commandKind}`);
  }
}

export class UnknownSceneError extends GatewayError {
  constructor(readonly scene: string, readonly model: string) {
    super(`Unknown scene "${scene}" for model ${model}`);
  }
}

/** Radio or message bus failure. */
export class TransportError extends GatewayError {}

export class DiscoveryBusyError extends GatewayError {
  constructor(readonly state: string) {
    super(`Discovery is already ${state}`);
  }
}

export class ConfigError extends GatewayError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
