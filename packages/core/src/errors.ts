/**
 * Connection failure or non-success HTTP status from the collector.
 * Always retried; never fatal to the host process.
 */
export class TransportError extends Error {
  readonly status: number | undefined;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "TransportError";
    this.status = options?.status;
  }
}

/** The collector answered, but its status line could not be parsed. */
export class ProtocolError extends Error {
  readonly body: string;

  constructor(message: string, body: string) {
    super(message);
    this.name = "ProtocolError";
    this.body = body;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(`Invalid BeaconKit configuration: ${message}`);
    this.name = "ConfigurationError";
  }
}

/** Transport and protocol failures are handled by retrying the exchange. */
export function isRetryableError(err: unknown): err is TransportError | ProtocolError {
  return err instanceof TransportError || err instanceof ProtocolError;
}
