/**
 * Raised by the wire codec when an inbound message cannot be decoded.
 * Transport code catches it and drops the offending message.
 */
export class ProtocolError extends Error {
  constructor(
    message: string,
    readonly input: string,
  ) {
    super(message)
    this.name = 'ProtocolError'
  }
}
