export class GelfError extends Error {
  override readonly name: string = 'GelfError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Unusable configuration; aborts initialisation. */
export class ConfigError extends GelfError {
  override readonly name = 'ConfigError';
}

/** The JSON encoder could not render a document. Fatal for that event only. */
export class EncodingError extends GelfError {
  override readonly name = 'EncodingError';
}

export class OversizedMessageError extends GelfError {
  override readonly name = 'OversizedMessageError';
  readonly size: number;
  readonly limit: number;

  constructor(size: number, limit: number) {
    super(`GELF payload of ${size} bytes exceeds the ${limit} byte limit`);
    this.size = size;
    this.limit = limit;
  }
}

/** Socket open/send failure. Fatal for the worker that owns the socket. */
export class TransportError extends GelfError {
  override readonly name = 'TransportError';
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
