/**
 * Errors raised while decoding a single HL7v2 message.
 *
 * All of them are fatal to the message they were raised for and never to a
 * batch: the driver catches HL7Error per message and moves on.
 */

export class HL7Error extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HL7Error";
  }
}

/** Malformed wire format: empty input, no MSH, MSH too short */
export class HL7ParseError extends HL7Error {
  constructor(message: string) {
    super(message);
    this.name = "HL7ParseError";
  }
}

export class UnsupportedMessageTypeError extends HL7Error {
  constructor(
    message: string,
    public readonly messageType: string,
  ) {
    super(message);
    this.name = "UnsupportedMessageTypeError";
  }
}

export class MissingSegmentError extends HL7Error {
  constructor(
    message: string,
    public readonly segment: string,
  ) {
    super(message);
    this.name = "MissingSegmentError";
  }
}
