const DISABLE_STACKTRACE : boolean = true;

export class PgFrameError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name  = new.target.name;
    if (DISABLE_STACKTRACE) this.stack = undefined;
  }
}

/** Base of every failure raised while laying out a frontend frame. */
export class EncodeError          extends PgFrameError {}

/** A text field carries a 0x00 byte, which would end the wire string early. */
export class EmbeddedNullError    extends EncodeError {
  constructor(readonly field: string) {
    super(`${field} contains an embedded null byte`);
  }
}

/** A count or length does not fit the integer width it is sent in. */
export class ValueTooLargeError   extends EncodeError {
  constructor(
    readonly field: string,
    readonly value: number,
    readonly max  : number,
  ) {
    super(`${field} is too large to transmit: ${value} > ${max}`);
  }
}

/** A fixed-width scalar (format code, OID, row limit …) lies outside its width. */
export class FieldRangeError      extends EncodeError {
  constructor(
    readonly field: string,
    readonly value: number,
  ) {
    super(`${field} is out of range: ${value}`);
  }
}

export class MessageFormatError   extends PgFrameError {}
