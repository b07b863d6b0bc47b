/**
 * Base class for all errors raised by this library
 */
export class CoapError extends Error {
	constructor(message: string) {
		super(message);
		this.name = new.target.name;
		Object.setPrototypeOf(this, new.target.prototype);
	}
}

/** The datagram could not be framed as a CoAP message */
export class MalformedMessageError extends CoapError {}

/**
 * Base class for errors concerning a single option. Inbound requests that fail
 * with one of these are answered with 4.02 Bad Option.
 */
export class OptionError extends CoapError {
	constructor(
		public readonly optionNumber: number,
		message: string,
	) {
		super(message);
	}
}

/** An option value violates the format or length bounds of its definition */
export class OptionFormatError extends OptionError {}

/** A non-repeatable option was present more than once */
export class DuplicateOptionError extends OptionError {
	constructor(optionNumber: number, name: string) {
		super(optionNumber, `option ${name} (${optionNumber}) must not be repeated`);
	}
}

/** An odd-numbered (critical) option is not known to this implementation */
export class UnrecognizedCriticalOptionError extends OptionError {
	constructor(optionNumber: number) {
		super(optionNumber, `unrecognized critical option ${optionNumber}`);
	}
}

export class LinkFormatError extends CoapError {
	constructor(
		message: string,
		/** Offset in the link-format text where parsing failed */
		public readonly position: number,
	) {
		super(`${message} at position ${position}`);
	}
}

/** A confirmable message was not acknowledged after all retransmissions */
export class ExchangeTimeoutError extends CoapError {
	constructor(
		public readonly messageId: number,
		public readonly transmissions: number,
	) {
		super(`message 0x${messageId.toString(16)} was not acknowledged after ${transmissions} transmissions`);
	}
}

/** The peer answered with a Reset message */
export class PeerResetError extends CoapError {
	constructor(public readonly messageId: number) {
		super(`peer rejected message 0x${messageId.toString(16)}`);
	}
}

/** A blockwise response continued with a block other than the one that was requested */
export class BlockwiseTransferError extends CoapError {
	constructor(
		public readonly expectedBlock: number,
		public readonly receivedBlock: number,
	) {
		super(`received block #${receivedBlock} while expecting #${expectedBlock}`);
	}
}

export class ExchangeCancelledError extends CoapError {
	constructor() {
		super("the exchange was cancelled");
	}
}

export class EndpointClosedError extends CoapError {
	constructor() {
		super("the endpoint was closed");
	}
}
