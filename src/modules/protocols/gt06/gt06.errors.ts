export class InvalidImeiError extends Error {
  readonly code = 'INVALID_IMEI';

  constructor(readonly imei: string) {
    super(`IMEI must be exactly 15 digits, got "${imei}"`);
    this.name = 'InvalidImeiError';
  }
}

export class InvalidConfigError extends Error {
  readonly code = 'INVALID_CONFIG';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidConfigError';
  }
}

export class ConnectionError extends Error {
  readonly code = 'CONNECTION_ERROR';

  constructor(
    message: string,
    readonly cause?: Error,
  ) {
    super(message);
    this.name = 'ConnectionError';
  }
}

export class FrameTooLargeError extends Error {
  readonly code = 'FRAME_TOO_LARGE';

  constructor(
    readonly protocolNumber: number,
    readonly contentLength: number,
  ) {
    super(
      `GT06 frame 0x${protocolNumber.toString(16).padStart(2, '0')} content of ${contentLength} bytes does not fit the 1-byte length field`,
    );
    this.name = 'FrameTooLargeError';
  }
}
