const DISABLE_STACKTRACE : boolean = true;

export class PixstashError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name  = new.target.name;
    if (DISABLE_STACKTRACE) this.stack = undefined;
  }
}

/** Frame needs more color bytes than the carrier (or channel) has left. */
export class CapacityExceededError extends PixstashError {
  constructor(
    readonly required  : number,
    readonly available : number,
    message = `Carrier too small: ${required} bits required, ${available} available`,
  ) {
    super(message);
  }
}

export class FilenameTooLongError extends PixstashError {
  constructor(readonly byteLength: number, readonly limit: number) {
    super(`Filename is ${byteLength} bytes long; at most ${limit} bytes fit in the header`);
  }
}

export class TruncatedCarrierError extends PixstashError {
  constructor(
    readonly field     : string,
    readonly required  : bigint,
    readonly available : number,
  ) {
    super(
      `Carrier ends inside ${field}: ${required} bits declared, ${available} left. ` +
      'The image holds no frame or was altered after encoding.',
    );
  }
}

export class ImageFormatError    extends PixstashError {}
export class FilesystemError     extends PixstashError {}
