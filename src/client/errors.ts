export class TrackingTransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TrackingTransportError";
  }
}

export class TrackingSerializationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TrackingSerializationError";
  }
}

export class TrackingDecodeError extends Error {
  constructor(
    readonly endpoint: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${endpoint}: ${message}`, options);
    this.name = "TrackingDecodeError";
  }
}
