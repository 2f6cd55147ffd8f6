export class RelayUnavailableError extends Error {
  readonly code = 'RELAY_UNAVAILABLE';

  constructor(message = 'No relay transport configured') {
    super(message);
    this.name = 'RelayUnavailableError';
  }
}

export class RelayTransportError extends Error {
  readonly code = 'RELAY_TRANSPORT_ERROR';

  constructor(
    readonly transport: string,
    message: string,
    readonly cause?: Error,
  ) {
    super(`${transport}: ${message}`);
    this.name = 'RelayTransportError';
  }
}
