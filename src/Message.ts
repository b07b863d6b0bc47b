import { MalformedMessageError } from "./Errors";
import {
	assertNoDuplicates, decodeBlock, decodeOptions, findOption, getOptionValue, getOptionValues,
	Option, OptionName, OptionValueTypes, RawOption, sortOptions,
} from "./Option";

export enum MessageType {
	CON = 0, // Confirmable
	NON = 1, // Non-Confirmable
	ACK = 2, // Acknowledgement
	RST = 3, // Reset
}

export class MessageCode {
	constructor(
		public readonly major: number,
		public readonly minor: number,
	) { }

	public static fromValue(value: number): MessageCode {
		return new MessageCode(
			(value >>> 5) & 0b111,
			value & 0b11111,
		);
	}

	public get value(): number {
		return ((this.major & 0b111) << 5) + (this.minor & 0b11111);
	}

	public isEmpty(): boolean { return this.value === MessageCodes.empty.value; }
	public isRequest(): boolean { return (!this.isEmpty()) && (this.major === MessageCodes.request.__major); }
	public isResponse(): boolean {
		return (this.major === MessageCodes.success.__major) ||
			(this.major === MessageCodes.clientError.__major) ||
			(this.major === MessageCodes.serverError.__major)
			;
	}

	public equals(other: MessageCode): boolean { return this.value === other.value; }

	public toString(): string { return `${this.major}.${this.minor < 10 ? "0" : ""}${this.minor}`; }
}

/**
 * all defined message codes
 */
// tslint:disable-next-line:variable-name
export const MessageCodes = Object.freeze({
	empty: new MessageCode(0, 0),

	request: {
		__major: 0,
		get: new MessageCode(0, 1),
		post: new MessageCode(0, 2),
		put: new MessageCode(0, 3),
		delete: new MessageCode(0, 4),
	},

	success: {
		__major: 2,
		created: new MessageCode(2, 1),
		deleted: new MessageCode(2, 2),
		valid: new MessageCode(2, 3),
		changed: new MessageCode(2, 4),
		content: new MessageCode(2, 5),
		continue: new MessageCode(2, 31),
	},

	clientError: {
		__major: 4,
		badRequest: new MessageCode(4, 0),
		unauthorized: new MessageCode(4, 1),
		badOption: new MessageCode(4, 2),
		forbidden: new MessageCode(4, 3),
		notFound: new MessageCode(4, 4),
		methodNotAllowed: new MessageCode(4, 5),
		notAcceptable: new MessageCode(4, 6),
		requestEntityIncomplete: new MessageCode(4, 8),
		preconditionFailed: new MessageCode(4, 12),
		requestEntityTooLarge: new MessageCode(4, 13),
		unsupportedContentFormat: new MessageCode(4, 15),
	},

	serverError: {
		__major: 5,
		internalServerError: new MessageCode(5, 0),
		notImplemented: new MessageCode(5, 1),
		badGateway: new MessageCode(5, 2),
		serviceUnavailable: new MessageCode(5, 3),
		gatewayTimeout: new MessageCode(5, 4),
		proxyingNotSupported: new MessageCode(5, 5),
	},

});

export const COAP_VERSION = 1;
export const MAX_TOKEN_LENGTH = 8;
const PAYLOAD_MARKER = 0xff;

/**
 * The fixed header and token of a message
 */
export interface MessageHeader {
	version: number;
	type: MessageType;
	code: MessageCode;
	messageId: number;
	token: Buffer;
}

export interface MessageInit {
	type: MessageType;
	code: MessageCode;
	messageId: number;
	token?: Buffer;
	options?: readonly Option[];
	payload?: Buffer;
}

/**
 * represents a CoAP message
 */
export class Message {

	constructor(
		public readonly version: number,
		public readonly type: MessageType,
		public readonly code: MessageCode,
		public readonly messageId: number,
		public readonly token: Buffer,
		public readonly options: readonly Option[],
		public readonly payload: Buffer,
	) {

	}

	/**
	 * Creates a validated message
	 * @throws RangeError if the message id or token are out of bounds
	 * @throws DuplicateOptionError if a non-repeatable option is present more than once
	 */
	public static create(init: MessageInit): Message {
		const token = init.token != undefined ? init.token : Buffer.alloc(0);
		if (token.length > MAX_TOKEN_LENGTH) {
			throw new RangeError(`the token must not be longer than ${MAX_TOKEN_LENGTH} bytes`);
		}
		if (!Number.isInteger(init.messageId) || init.messageId < 0 || init.messageId > 0xffff) {
			throw new RangeError(`${init.messageId} is not a valid message id`);
		}
		const options = init.options != undefined ? init.options : [];
		assertNoDuplicates(options);
		return new Message(
			COAP_VERSION,
			init.type, init.code, init.messageId, token,
			sortOptions(options),
			init.payload != undefined ? init.payload : Buffer.alloc(0),
		);
	}

	/**
	 * Creates an empty message (used for ACKs, RSTs and pings)
	 */
	public static empty(type: MessageType, messageId: number): Message {
		return Message.create({ type, code: MessageCodes.empty, messageId });
	}

	/**
	 * parses the header and token of a CoAP message
	 * @throws MalformedMessageError
	 */
	public static parseHeader(buf: Buffer): MessageHeader {
		if (buf.length < 4) {
			throw new MalformedMessageError(`a message needs at least 4 bytes, got ${buf.length}`);
		}
		const version = (buf[0] >>> 6) & 0b11;
		if (version !== COAP_VERSION) {
			throw new MalformedMessageError(`unsupported version ${version}`);
		}
		const type: MessageType = (buf[0] >>> 4) & 0b11;
		const tokenLength = buf[0] & 0b1111;
		if (tokenLength > MAX_TOKEN_LENGTH) {
			throw new MalformedMessageError(`invalid token length ${tokenLength}`);
		}
		if (buf.length < 4 + tokenLength) {
			throw new MalformedMessageError("the message is truncated inside the token");
		}

		const code = MessageCode.fromValue(buf[1]);
		const messageId = buf.readUInt16BE(2);
		const token = Buffer.from(buf.subarray(4, 4 + tokenLength));

		return { version, type, code, messageId, token };
	}

	/**
	 * parses a CoAP message from the given buffer.
	 * The whole message is framed before any option value is interpreted.
	 * @param buf - the buffer to read from
	 * @throws MalformedMessageError if the message cannot be framed
	 * @throws OptionError if an option value is rejected
	 */
	public static parse(buf: Buffer): Message {
		const header = Message.parseHeader(buf);

		if (header.code.isEmpty() && buf.length > 4 + header.token.length) {
			throw new MalformedMessageError("an empty message must not contain anything after the header");
		}
		if (header.code.isEmpty() && header.token.length > 0) {
			throw new MalformedMessageError("an empty message must not contain a token");
		}

		// frame options
		let offset = 4 + header.token.length;
		const rawOptions: RawOption[] = [];
		let prevNumber = 0; // number of the previously read option
		while (offset < buf.length && buf[offset] !== PAYLOAD_MARKER) {
			const { result, readBytes } = Option.parse(buf, offset, prevNumber);
			rawOptions.push(result);
			prevNumber = result.number;
			offset += readBytes;
		}

		let payload: Buffer;
		if (offset < buf.length) {
			// here comes the payload
			if (offset + 1 === buf.length) {
				throw new MalformedMessageError("payload marker without a payload");
			}
			// copy the remainder of the packet
			payload = Buffer.from(buf.subarray(offset + 1));
		} else {
			payload = Buffer.alloc(0);
		}

		return new Message(
			header.version, header.type, header.code, header.messageId, header.token,
			decodeOptions(rawOptions),
			payload,
		);
	}

	/**
	 * serializes this message into a buffer
	 * @param keepDefaults Whether options carrying their default value are written too. They are left out by default.
	 */
	public serialize(keepDefaults: boolean = false): Buffer {
		if (this.token.length > MAX_TOKEN_LENGTH) {
			throw new MalformedMessageError(`the token must not be longer than ${MAX_TOKEN_LENGTH} bytes`);
		}
		const tokenLength = this.token.length;

		// serialize the options first, so we know how many bytes to reserve
		const options = sortOptions(keepDefaults ? this.options : this.options.filter(o => !o.isDefault));
		const optionsBuffer = Buffer.concat(
			options.map((o, i, opts) => o.serialize(i > 0 ? opts[i - 1].number : 0)),
		);

		// allocate the buffer to be filled
		const payloadLength = this.payload.length > 0 ? this.payload.length : -1; // -1 to offset the payload byte for empty payloads
		const ret = Buffer.allocUnsafe(4 + tokenLength + optionsBuffer.length + 1 + payloadLength);

		// write fixed values
		ret[0] = ((this.version & 0b11) << 6)
			+ ((this.type & 0b11) << 4)
			+ (tokenLength & 0b1111)
			;
		ret[1] = this.code.value;
		ret.writeUInt16BE(this.messageId & 0xffff, 2);

		// write the token if neccessary
		if (tokenLength > 0) {
			this.token.copy(ret, 4);
		}

		// write the options where they belong (if any)
		let offset = 4 + tokenLength;
		if (optionsBuffer.length > 0) {
			optionsBuffer.copy(ret, offset);
			offset += optionsBuffer.length;
		}

		// write the payload where it belongs
		if (payloadLength > 0) {
			ret[offset] = PAYLOAD_MARKER;
			this.payload.copy(ret, offset + 1);
		}

		return ret;
	}

	/** Returns the first option with the given name */
	public getOption(name: OptionName): Option | undefined {
		return findOption(this.options, name);
	}

	/** Returns the value of the given option, or its default if it is absent */
	public getOptionValue<N extends OptionName>(name: N): OptionValueTypes[N] | undefined {
		return getOptionValue(this.options, name);
	}

	/** Returns the values of a repeatable option in order */
	public getOptionValues<N extends OptionName>(name: N): OptionValueTypes[N][] {
		return getOptionValues(this.options, name);
	}

	/** The Uri-Path segments of this message */
	public get pathSegments(): string[] {
		return this.getOptionValues("Uri-Path");
	}

	/** Returns a copy of this message with some fields replaced */
	public with(changes: Partial<MessageInit>): Message {
		return Message.create({
			type: changes.type != undefined ? changes.type : this.type,
			code: changes.code != undefined ? changes.code : this.code,
			messageId: changes.messageId != undefined ? changes.messageId : this.messageId,
			token: changes.token != undefined ? changes.token : this.token,
			options: changes.options != undefined ? changes.options : this.options,
			payload: changes.payload != undefined ? changes.payload : this.payload,
		});
	}

	/**
	 * Checks if this message is part of a blockwise transfer
	 */
	public isPartialMessage(): boolean {
		// start with the response option, since that's more likely
		const block2 = this.getOptionValue("Block2");
		if (this.code.isResponse() && block2 != undefined) {
			const { num, more } = decodeBlock(block2);
			return more || num > 0;
		}
		const block1 = this.getOptionValue("Block1");
		if (this.code.isRequest() && block1 != undefined) return true;
		return false;
	}

}

/*
	0                   1                   2                   3
	0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
   +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
   |Ver| T |  TKL  |      Code     |          Message ID           |
   +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
   |   Token (if any, TKL bytes) ...
   +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
   |   Options (if any) ...
   +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
   |1 1 1 1 1 1 1 1|    Payload (if any) ...
   +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
*/
