export class LogError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LogError';
    this.code = code;
  }
}

/** The record could not be turned into JSON (cycles, BigInt, throwing toJSON). */
export class SerializationError extends LogError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'SERIALIZATION', options);
    this.name = 'SerializationError';
  }
}

/** The sink refused the line. */
export class SinkWriteError extends LogError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'SINK_WRITE', options);
    this.name = 'SinkWriteError';
  }
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return 'Unknown error';
  return String(value);
}
