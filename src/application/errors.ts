import type { MessageFields } from '../domain/message.js';

/** Tag stamped into `DecodeErrorType` on diagnostic records. */
export type DecodeErrorTag = 'uri' | 'json' | 'schema' | 'inject';

/**
 * A per-message failure. Recovered where it is detected: the decoder
 * emits a diagnostic record and moves on to the next message.
 */
export abstract class DecodeError extends Error {
  abstract readonly tag: DecodeErrorTag;

  constructor(
    message: string,
    /** Fields gathered before the failure, appended to the diagnostic record. */
    readonly extraFields?: Readonly<MessageFields>,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class UriError extends DecodeError {
  readonly tag = 'uri';
}

export class JsonParseError extends DecodeError {
  readonly tag = 'json';
}

export class SchemaValidationError extends DecodeError {
  readonly tag = 'schema';
}

export class EmitError extends DecodeError {
  readonly tag = 'inject';
}

/** Startup failure: bad schema files, bad configuration, unreadable database. */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
