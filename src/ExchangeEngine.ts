import * as crypto from "crypto";
import debugPackage from "debug";
import {
	BlockwiseTransferError, EndpointClosedError, ExchangeCancelledError, ExchangeTimeoutError, MalformedMessageError,
	OptionError, PeerResetError,
} from "./Errors";
import { ClientExchange, NotificationCallback, ServerExchange } from "./Exchange";
import { DeduplicationCache, DeduplicationEntry } from "./lib/DeduplicationCache";
import { logMessage } from "./lib/LogMessage";
import { Peer } from "./lib/Peer";
import { Message, MessageCode, MessageCodes, MessageType } from "./Message";
import { decodeBlock, encodeBlock, Option } from "./Option";
import {
	getRetransmissionInterval, resolveTransmissionParameters, TransmissionParameters,
} from "./TransmissionParameters";

const debug = debugPackage("coap-exchange");

/**
 * The answer to an inbound request, before it is packed into a message
 */
export interface ResponseContent {
	code: MessageCode;
	options?: readonly Option[];
	payload?: Buffer;
}

/**
 * What the exchange engine needs from the endpoint that owns it
 */
export interface ExchangeEngineHost {
	/** The single send path of the endpoint */
	send(data: Buffer, peer: Peer): void;
	/** Produces the response to an inbound request */
	handleRequest(request: Message, peer: Peer): Promise<ResponseContent>;
	/** Reports errors that cannot be attributed to an exchange */
	onError(err: Error): void;
}

export interface ExchangeEngineOptions {
	transmission?: Partial<TransmissionParameters>;
	/** How long (ms) a request handler may take before the response is sent separately */
	piggybackTimeout?: number;
	/** Length of the generated tokens in bytes (1..8) */
	tokenLength?: number;
	/** Source of randomness for the retransmission timeout, returns a number in [0, 1) */
	random?: () => number;
	/** How many received message ids are remembered for duplicate detection. Default: 10000 */
	deduplicationCacheSize?: number;
}

export interface OutgoingRequest {
	type: MessageType.CON | MessageType.NON;
	code: MessageCode;
	options?: readonly Option[];
	payload?: Buffer;
	/** Whether a lost confirmable request is retransmitted. Default: true */
	retransmit?: boolean;
	/** Turns the exchange into an observation */
	observer?: NotificationCallback;
}

interface TransmissionHandlers {
	onAcknowledged(ack: Message, transmissions: number): void;
	onReset(rst: Message): void;
	onTimeout(err: ExchangeTimeoutError): void;
}

/** A confirmable message waiting for its acknowledgement */
interface Transmission extends TransmissionHandlers {
	peer: Peer;
	message: Message;
	data: Buffer;
	timeout: number;
	counter: number;
	maxRetransmit: number;
	timer: NodeJS.Timeout | undefined;
}

function messageKey(peer: Peer, messageId: number): string {
	return `${peer}#${messageId}`;
}

function tokenKey(peer: Peer, token: Buffer): string {
	return `${peer}#${token.toString("hex")}`;
}

function incrementToken(token: Buffer): Buffer {
	const ret = Buffer.from(token);
	for (let i = ret.length - 1; i >= 0; i--) {
		if (ret[i] < 0xff) {
			ret[i]++;
			break;
		} else {
			ret[i] = 0;
			// continue with the next digit
		}
	}
	return ret;
}

function toError(e: unknown): Error {
	return e instanceof Error ? e : new Error(String(e));
}

/**
 * Tracks the exchanges of one endpoint: retransmits confirmable messages, filters duplicates
 * and matches responses to their requests.
 */
export class ExchangeEngine {

	public readonly params: Readonly<TransmissionParameters>;
	private readonly piggybackTimeout: number;
	private readonly tokenLength: number;
	private readonly random: () => number;

	/** Unacknowledged confirmable messages, by peer and message id */
	private transmissions = new Map<string, Transmission>();
	/** Requests waiting for their response, by peer and token */
	private exchangesByToken = new Map<string, ClientExchange>();
	/** All client exchanges that have not been forgotten, including pings */
	private clientExchanges = new Set<ClientExchange>();
	/** Requests waiting for a free slot, by peer */
	private queues = new Map<string, ClientExchange[]>();
	/** Inbound requests whose handler has not answered yet */
	private serverExchanges = new Set<ServerExchange>();
	private readonly dedup: DeduplicationCache;

	private lastMessageId: number;
	private lastToken: Buffer;
	private closed: boolean = false;

	constructor(
		private readonly host: ExchangeEngineHost,
		options: ExchangeEngineOptions = {},
	) {
		this.params = resolveTransmissionParameters(options.transmission);
		this.piggybackTimeout = options.piggybackTimeout != undefined ? options.piggybackTimeout : 50;
		if (!(this.piggybackTimeout >= 0)) throw new RangeError("piggybackTimeout must not be negative");
		this.tokenLength = options.tokenLength != undefined ? options.tokenLength : 4;
		if (!Number.isInteger(this.tokenLength) || this.tokenLength < 1 || this.tokenLength > 8) {
			throw new RangeError("tokenLength must be an integer between 1 and 8");
		}
		this.random = options.random != undefined ? options.random : Math.random;
		if (options.deduplicationCacheSize != undefined
			&& !(Number.isInteger(options.deduplicationCacheSize) && options.deduplicationCacheSize > 0)
		) {
			throw new RangeError("deduplicationCacheSize must be a positive integer");
		}
		this.dedup = new DeduplicationCache({
			lifetime: this.params.exchangeLifetime,
			max: options.deduplicationCacheSize,
		});

		this.lastMessageId = crypto.randomBytes(2).readUInt16BE(0);
		this.lastToken = crypto.randomBytes(this.tokenLength);
	}

	/** The number of client exchanges that are not finished or forgotten yet */
	public get pendingExchanges(): number {
		return this.clientExchanges.size;
	}

	private nextMessageId(): number {
		this.lastMessageId = (this.lastMessageId + 1) & 0xffff;
		return this.lastMessageId;
	}

	private nextToken(): Buffer {
		this.lastToken = incrementToken(this.lastToken);
		return this.lastToken;
	}

	private assertOpen(): void {
		if (this.closed) throw new EndpointClosedError();
	}

	/**
	 * Serializes and sends a message. All outbound datagrams pass through here
	 * @returns the sent bytes
	 */
	private sendMessage(message: Message, peer: Peer, data: Buffer = message.serialize()): Buffer {
		logMessage(message, "sent", peer);
		this.host.send(data, peer);
		return data;
	}

	// ======================================================
	// client side

	/**
	 * Starts a request. Throws synchronously if the message cannot be built
	 */
	public request(peer: Peer, request: OutgoingRequest): ClientExchange {
		this.assertOpen();
		const message = Message.create({
			type: request.type,
			code: request.code,
			messageId: this.nextMessageId(),
			token: this.nextToken(),
			options: request.options,
			payload: request.payload,
		});
		const exchange = new ClientExchange(peer, message, request.retransmit !== false, request.observer);
		this.exchangesByToken.set(tokenKey(peer, message.token), exchange);
		this.clientExchanges.add(exchange);
		debug(`remembering request: msgID=0x${message.messageId.toString(16)}, token=${message.token.toString("hex")}, peer=${peer}`);

		if (message.type === MessageType.CON && this.countOutstanding(peer) >= this.params.nstart) {
			const queue = this.queues.get(peer.toString()) || [];
			queue.push(exchange);
			this.queues.set(peer.toString(), queue);
			debug(`added request 0x${message.messageId.toString(16)} to the queue for ${peer}, new length = ${queue.length}`);
		} else {
			this.dispatch(exchange);
		}
		return exchange;
	}

	/**
	 * Sends an empty confirmable message, which the peer answers with a reset
	 * @param timeout - how long to wait for the answer (ms)
	 */
	public ping(peer: Peer, timeout: number): ClientExchange {
		this.assertOpen();
		const message = Message.empty(MessageType.CON, this.nextMessageId());
		const exchange = new ClientExchange(peer, message, false);
		this.clientExchanges.add(exchange);
		exchange.state = "SENT_CON";
		this.transmitConfirmable(peer, message, 0, timeout, {
			onAcknowledged: () => this.finish(exchange, message),
			onReset: (rst) => {
				debug(`received response to ping with ID 0x${rst.messageId.toString(16)}`);
				this.finish(exchange, rst);
			},
			onTimeout: (err) => this.failExchange(exchange, "TIMED_OUT", err),
		});
		return exchange;
	}

	/** Number of unacknowledged confirmable exchanges with a peer */
	private countOutstanding(peer: Peer): number {
		let ret = 0;
		for (const exchange of this.clientExchanges) {
			if (exchange.state === "SENT_CON" && exchange.peer.equals(peer)) ret++;
		}
		return ret;
	}

	/** Sends the requests that have been waiting for a free slot to the given peer */
	private workOffQueue(peer: Peer): void {
		const queue = this.queues.get(peer.toString());
		if (queue == undefined) return;
		while (queue.length > 0 && this.countOutstanding(peer) < this.params.nstart) {
			const next = queue.shift();
			if (next != undefined) this.dispatch(next);
		}
		if (queue.length === 0) this.queues.delete(peer.toString());
	}

	private removeFromQueue(exchange: ClientExchange): void {
		const queue = this.queues.get(exchange.peer.toString());
		if (queue == undefined) return;
		const index = queue.indexOf(exchange);
		if (index > -1) queue.splice(index, 1);
		if (queue.length === 0) this.queues.delete(exchange.peer.toString());
	}

	/** Puts the current message of an exchange on the wire */
	private dispatch(exchange: ClientExchange): void {
		const { message, peer } = exchange;
		if (message.type === MessageType.CON) {
			exchange.state = "SENT_CON";
			this.transmitConfirmable(
				peer, message,
				exchange.retransmit ? this.params.maxRetransmit : 0,
				getRetransmissionInterval(this.params, this.random()),
				{
					onAcknowledged: (ack, transmissions) => this.onRequestAcknowledged(exchange, ack, transmissions),
					onReset: () => this.failExchange(exchange, "RST_RECEIVED", new PeerResetError(message.messageId)),
					onTimeout: (err) => this.failExchange(exchange, "TIMED_OUT", err),
				},
			);
		} else {
			exchange.state = "SENT_NON";
			this.sendMessage(message, peer);
			if (exchange.observer == undefined) {
				// nothing tells us that a non-confirmable request got lost
				this.setExpiry(exchange, this.params.exchangeLifetime, () => {
					this.failExchange(exchange, "TIMED_OUT", new ExchangeTimeoutError(message.messageId, 1));
				});
			}
		}
	}

	private setExpiry(exchange: ClientExchange, timeout: number, action: () => void): void {
		this.clearExpiry(exchange);
		exchange.expiryTimer = setTimeout(action, timeout);
		exchange.expiryTimer.unref();
	}

	private clearExpiry(exchange: ClientExchange): void {
		if (exchange.expiryTimer != undefined) {
			clearTimeout(exchange.expiryTimer);
			exchange.expiryTimer = undefined;
		}
	}

	private onRequestAcknowledged(exchange: ClientExchange, ack: Message, transmissions: number): void {
		if (exchange.state === "SENT_CON") exchange.state = "ACK_RECEIVED";
		if (ack.code.isResponse()) {
			this.handleClientResponse(exchange, ack);
		} else {
			debug(`received ACK for message 0x${ack.messageId.toString(16)}, waiting for the separate response...`);
			if (exchange.observer == undefined) {
				// the separate response must arrive while the request could still be answered
				this.setExpiry(exchange, this.params.exchangeLifetime, () => {
					this.failExchange(exchange, "TIMED_OUT", new ExchangeTimeoutError(ack.messageId, transmissions));
				});
			}
		}
		this.workOffQueue(exchange.peer);
	}

	/** Completes an exchange successfully and forgets about it */
	private finish(exchange: ClientExchange, response: Message): void {
		this.forgetExchange(exchange);
		exchange.complete(response);
		this.workOffQueue(exchange.peer);
	}

	private failExchange(exchange: ClientExchange, state: "RST_RECEIVED" | "TIMED_OUT" | "COMPLETED", reason: Error): void {
		debug(`request 0x${exchange.messageId.toString(16)} to ${exchange.peer} failed: ${reason.message}`);
		this.forgetExchange(exchange);
		exchange.fail(state, reason);
		this.workOffQueue(exchange.peer);
	}

	/**
	 * Forgets all references to a client exchange and stops its timers
	 */
	private forgetExchange(exchange: ClientExchange): void {
		debug(`forgetting request: token=${exchange.token.toString("hex")}; msgID=0x${exchange.messageId.toString(16)}`);
		this.stopTransmission(messageKey(exchange.peer, exchange.messageId));
		const key = tokenKey(exchange.peer, exchange.token);
		if (this.exchangesByToken.get(key) === exchange) this.exchangesByToken.delete(key);
		this.removeFromQueue(exchange);
		this.clientExchanges.delete(exchange);
		this.clearExpiry(exchange);
	}

	/**
	 * Cancels a pending exchange. A response that arrives later is acknowledged but otherwise ignored
	 */
	public cancel(exchange: ClientExchange): void {
		if (exchange.isFinished) return;
		const wasQueued = exchange.state === "QUEUED";
		this.stopTransmission(messageKey(exchange.peer, exchange.messageId));
		this.removeFromQueue(exchange);
		this.clientExchanges.delete(exchange);
		exchange.fail("CANCELLED", new ExchangeCancelledError());
		debug(`cancelled request 0x${exchange.messageId.toString(16)}`);

		if (wasQueued || exchange.isPing) {
			this.forgetExchange(exchange);
		} else {
			// keep the token known until a late response could no longer arrive
			this.setExpiry(exchange, this.params.exchangeLifetime, () => this.forgetExchange(exchange));
		}
		this.workOffQueue(exchange.peer);
	}

	/**
	 * Ends an observation. Further notifications are answered with a reset
	 */
	public stopObserving(exchange: ClientExchange): void {
		this.forgetExchange(exchange);
		if (!exchange.isFinished) {
			exchange.state = "COMPLETED";
			exchange.response.reject(new ExchangeCancelledError());
		}
		this.workOffQueue(exchange.peer);
	}

	/**
	 * Handles a response (piggybacked or separate) to one of our requests
	 */
	private handleClientResponse(exchange: ClientExchange, response: Message): void {
		if (exchange.state === "CANCELLED") {
			debug(`received late response for cancelled request 0x${exchange.messageId.toString(16)}, ignoring it`);
			this.forgetExchange(exchange);
			return;
		}
		const block2 = response.getOptionValue("Block2");
		const block = block2 != undefined && response.code.major === MessageCodes.success.__major
			? decodeBlock(block2)
			: undefined;
		if (block != undefined && block.num !== exchange.blocks.length) {
			// the server does not follow our Block2 requests, so the transfer cannot complete
			this.failExchange(exchange, "COMPLETED", new BlockwiseTransferError(exchange.blocks.length, block.num));
			return;
		}

		// a separate response also tells us that the request arrived
		this.stopTransmission(messageKey(exchange.peer, exchange.messageId));
		this.clearExpiry(exchange);
		if (exchange.state === "SENT_CON") exchange.state = "ACK_RECEIVED";

		// assemble the response of a blockwise transfer
		if (block != undefined) {
			const { num, more, szx } = block;
			exchange.blocks.push(response.payload);
			if (more) {
				this.requestNextBlock(exchange, num + 1, szx);
				return;
			}
			response = response.with({ payload: Buffer.concat(exchange.blocks) });
			exchange.blocks = [];
		}

		if (exchange.observer != undefined) {
			// the first notification confirms the registration
			exchange.response.resolve(response);
			try {
				exchange.observer(response);
			} catch (e) {
				this.host.onError(toError(e));
			}
			if (response.getOption("Observe") == undefined || response.code.major !== MessageCodes.success.__major) {
				debug(`observation with token ${exchange.token.toString("hex")} was ended by the server`);
				this.forgetExchange(exchange);
				exchange.state = "COMPLETED";
			}
			this.workOffQueue(exchange.peer);
			return;
		}

		this.finish(exchange, response);
	}

	/**
	 * When the server responds with block-wise responses, this requests the next block.
	 */
	private requestNextBlock(exchange: ClientExchange, num: number, szx: number): void {
		// requests for the next block are a new message with a new message id
		const oldKey = messageKey(exchange.peer, exchange.messageId);
		this.stopTransmission(oldKey);

		// even if the original request was an observe, the partial requests are not
		const options = exchange.message.options.filter(o => o.name !== "Observe" && o.name !== "Block2");
		options.push(Option.create("Block2", encodeBlock({ num, more: false, szx })));
		exchange.message = exchange.message.with({ messageId: this.nextMessageId(), options });
		debug(`requesting block #${num} with message 0x${exchange.messageId.toString(16)}`);
		this.dispatch(exchange);
	}

	// ======================================================
	// confirmable transmissions

	/**
	 * Sends a confirmable message and retransmits it with exponential back-off until it is acknowledged
	 */
	private transmitConfirmable(
		peer: Peer, message: Message, maxRetransmit: number, initialTimeout: number, handlers: TransmissionHandlers,
	): void {
		const key = messageKey(peer, message.messageId);
		const transmission: Transmission = {
			peer, message,
			data: message.serialize(),
			timeout: initialTimeout,
			counter: 0,
			maxRetransmit,
			timer: undefined,
			...handlers,
		};
		// remember the transmission before sending, the answer may come quickly
		this.transmissions.set(key, transmission);
		this.sendMessage(message, peer, transmission.data);
		transmission.timer = setTimeout(() => this.retransmit(key), transmission.timeout);
	}

	/**
	 * Re-Sends a message in case it got lost
	 */
	private retransmit(key: string): void {
		const transmission = this.transmissions.get(key);
		if (transmission == undefined) return;
		transmission.timer = undefined;
		const msgID = transmission.message.messageId;

		// are we over the limit?
		if (transmission.counter >= transmission.maxRetransmit) {
			this.transmissions.delete(key);
			debug(`message 0x${msgID.toString(16)} was not acknowledged, giving up`);
			transmission.onTimeout(new ExchangeTimeoutError(msgID, transmission.counter + 1));
			return;
		}

		debug(`retransmitting message 0x${msgID.toString(16)}, try #${transmission.counter + 1}`);

		// resend the message and increase the params
		this.sendMessage(transmission.message, transmission.peer, transmission.data);
		transmission.counter++;
		transmission.timeout *= 2;
		transmission.timer = setTimeout(() => this.retransmit(key), transmission.timeout);
	}

	private stopTransmission(key: string): void {
		const transmission = this.transmissions.get(key);
		if (transmission == undefined) return;
		if (transmission.timer != undefined) clearTimeout(transmission.timer);
		this.transmissions.delete(key);
	}

	// ======================================================
	// inbound

	/**
	 * Processes a datagram received from a peer
	 */
	public handleDatagram(data: Buffer, peer: Peer): void {
		if (this.closed) return;

		let message: Message;
		try {
			message = Message.parse(data);
		} catch (e) {
			if (e instanceof MalformedMessageError) {
				// the sender and token may not even be reliable, so don't answer
				debug(`dropping malformed message from ${peer}: ${e.message}`);
				return;
			} else if (e instanceof OptionError) {
				this.handleRejectedOptions(data, peer, e);
				return;
			}
			throw e;
		}
		logMessage(message, "received", peer);

		if (message.type === MessageType.ACK || message.type === MessageType.RST) {
			this.handleAckOrReset(message, peer);
			return;
		}

		if (message.code.isEmpty()) {
			// an empty CON message is a ping, which we answer with RST
			if (message.type === MessageType.CON) {
				this.sendMessage(Message.empty(MessageType.RST, message.messageId), peer);
			}
			return;
		}

		// filter duplicates
		const duplicate = this.dedup.lookup(peer, message.messageId);
		if (duplicate != undefined) {
			this.handleDuplicate(message, peer, duplicate);
			return;
		}
		const entry = this.dedup.add(
			peer, message.messageId,
			message.type === MessageType.CON ? this.params.exchangeLifetime : this.params.nonLifetime,
		);

		if (message.code.isRequest()) {
			this.handleRequest(message, peer, entry);
		} else if (message.code.isResponse()) {
			this.handleSeparateResponse(message, peer, entry);
		} else if (message.type === MessageType.CON) {
			// we don't know what to do with this code
			debug(`rejecting message with unknown code ${message.code}`);
			entry.reply = this.sendMessage(Message.empty(MessageType.RST, message.messageId), peer);
		}
	}

	private handleDuplicate(message: Message, peer: Peer, entry: DeduplicationEntry): void {
		if (message.type === MessageType.CON && entry.reply != undefined) {
			debug(`received duplicate of message 0x${message.messageId.toString(16)} from ${peer}, repeating the reply`);
			this.host.send(entry.reply, peer);
		} else {
			debug(`received duplicate of message 0x${message.messageId.toString(16)} from ${peer}, ignoring it`);
		}
	}

	/**
	 * Answers a message whose options could not be accepted
	 */
	private handleRejectedOptions(data: Buffer, peer: Peer, err: OptionError): void {
		const header = Message.parseHeader(data);
		const isMessage = header.type === MessageType.CON || header.type === MessageType.NON;

		if (isMessage && header.code.isRequest()) {
			const duplicate = this.dedup.lookup(peer, header.messageId);
			if (duplicate != undefined) {
				this.handleDuplicate(Message.empty(header.type, header.messageId), peer, duplicate);
				return;
			}
			const entry = this.dedup.add(
				peer, header.messageId,
				header.type === MessageType.CON ? this.params.exchangeLifetime : this.params.nonLifetime,
			);
			debug(`rejecting request 0x${header.messageId.toString(16)} from ${peer}: ${err.message}`);
			const reply = Message.create({
				type: header.type === MessageType.CON ? MessageType.ACK : MessageType.NON,
				code: MessageCodes.clientError.badOption,
				messageId: header.type === MessageType.CON ? header.messageId : this.nextMessageId(),
				token: header.token,
				payload: Buffer.from(err.message, "utf8"),
			});
			entry.reply = this.sendMessage(reply, peer);
			return;
		}

		if (header.code.isResponse()) {
			debug(`rejecting response 0x${header.messageId.toString(16)} from ${peer}: ${err.message}`);
			if (header.type === MessageType.CON) {
				this.sendMessage(Message.empty(MessageType.RST, header.messageId), peer);
			}
			const exchange = this.exchangesByToken.get(tokenKey(peer, header.token));
			if (exchange != undefined && !exchange.isFinished) {
				this.failExchange(exchange, "COMPLETED", err);
			}
			return;
		}

		debug(`dropping message 0x${header.messageId.toString(16)} from ${peer}: ${err.message}`);
	}

	private handleAckOrReset(message: Message, peer: Peer): void {
		const kind = MessageType[message.type];
		const key = messageKey(peer, message.messageId);
		const transmission = this.transmissions.get(key);
		if (transmission == undefined) {
			const rejected = message.type === MessageType.RST
				? this.findNonConfirmableExchange(peer, message.messageId)
				: undefined;
			if (rejected != undefined) {
				debug(`${peer} rejected non-confirmable request 0x${message.messageId.toString(16)}`);
				this.failExchange(rejected, "RST_RECEIVED", new PeerResetError(message.messageId));
			} else {
				debug(`received ${kind} for unknown message 0x${message.messageId.toString(16)} from ${peer}, ignoring it`);
			}
			return;
		}
		if (message.type === MessageType.ACK) {
			if (message.code.isRequest()) {
				debug(`received ACK carrying a request from ${peer}, ignoring it`);
				return;
			}
			if (message.code.isResponse() && !message.token.equals(transmission.message.token)) {
				debug(`received piggybacked response with token ${message.token.toString("hex")} for a request with token ${transmission.message.token.toString("hex")}, discarding it`);
				return;
			}
		}

		debug(`received ${kind} for message 0x${message.messageId.toString(16)}, stopping retransmission...`);
		this.stopTransmission(key);
		if (message.type === MessageType.RST) {
			transmission.onReset(message);
		} else {
			transmission.onAcknowledged(message, transmission.counter + 1);
		}
	}

	/** Finds the non-confirmable request a reset answers */
	private findNonConfirmableExchange(peer: Peer, messageId: number): ClientExchange | undefined {
		for (const exchange of this.clientExchanges) {
			if (exchange.state === "SENT_NON" && exchange.messageId === messageId && exchange.peer.equals(peer)) {
				return exchange;
			}
		}
		return undefined;
	}

	/**
	 * Handles a response that did not come with an acknowledgement
	 */
	private handleSeparateResponse(message: Message, peer: Peer, entry: DeduplicationEntry): void {
		const exchange = this.exchangesByToken.get(tokenKey(peer, message.token));
		if (message.type === MessageType.CON) {
			// acknowledge the response, or tell the server to stop sending if we don't know it
			const type = exchange != undefined ? MessageType.ACK : MessageType.RST;
			entry.reply = this.sendMessage(Message.empty(type, message.messageId), peer);
		}
		if (exchange == undefined) {
			debug(`no request found for token ${message.token.toString("hex")} from ${peer}, discarding the response`);
			return;
		}
		this.handleClientResponse(exchange, message);
	}

	// ======================================================
	// server side

	private handleRequest(request: Message, peer: Peer, entry: DeduplicationEntry): void {
		const exchange = new ServerExchange(peer, request);
		this.serverExchanges.add(exchange);

		if (request.type === MessageType.CON) {
			exchange.piggybackTimer = setTimeout(() => {
				exchange.piggybackTimer = undefined;
				if (exchange.state !== "RECEIVED_CON" || this.closed) return;
				debug(`request 0x${request.messageId.toString(16)} takes longer, sending an empty ACK`);
				exchange.state = "ACK_SENT_SEPARATE";
				entry.reply = this.sendMessage(Message.empty(MessageType.ACK, request.messageId), peer);
			}, this.piggybackTimeout);
		}

		this.processRequest(exchange, entry).catch((e: unknown) => this.host.onError(toError(e)));
	}

	private async processRequest(exchange: ServerExchange, entry: DeduplicationEntry): Promise<void> {
		let content: ResponseContent;
		try {
			content = await this.host.handleRequest(exchange.request, exchange.peer);
		} catch (e) {
			debug(`handling request 0x${exchange.request.messageId.toString(16)} failed: ${e}`);
			content = { code: MessageCodes.serverError.internalServerError };
		}
		this.respond(exchange, entry, content);
	}

	private buildResponse(exchange: ServerExchange, type: MessageType, messageId: number, content: ResponseContent): Message {
		const init = { type, messageId, token: exchange.request.token };
		try {
			return Message.create({ ...init, ...content });
		} catch (e) {
			debug(`the response to 0x${exchange.request.messageId.toString(16)} is invalid: ${e}`);
			return Message.create({ ...init, code: MessageCodes.serverError.internalServerError });
		}
	}

	private respond(exchange: ServerExchange, entry: DeduplicationEntry, content: ResponseContent): void {
		if (exchange.piggybackTimer != undefined) {
			clearTimeout(exchange.piggybackTimer);
			exchange.piggybackTimer = undefined;
		}
		this.serverExchanges.delete(exchange);
		if (this.closed) return;

		const { peer, request } = exchange;
		switch (exchange.state) {
			case "RECEIVED_CON": {
				// the response fits into the acknowledgement
				const response = this.buildResponse(exchange, MessageType.ACK, request.messageId, content);
				exchange.state = "RESPONSE_SENT_PIGGYBACK";
				entry.reply = this.sendMessage(response, peer);
				break;
			}
			case "ACK_SENT_SEPARATE": {
				const response = this.buildResponse(exchange, MessageType.CON, this.nextMessageId(), content);
				exchange.state = "RESPONSE_SENT_LATER";
				this.transmitConfirmable(
					peer, response, this.params.maxRetransmit, getRetransmissionInterval(this.params, this.random()),
					{
						onAcknowledged: () => debug(`separate response 0x${response.messageId.toString(16)} was acknowledged`),
						onReset: () => debug(`${peer} rejected the separate response 0x${response.messageId.toString(16)}`),
						onTimeout: (err) => debug(`separate response to ${peer} was lost: ${err.message}`),
					},
				);
				break;
			}
			case "RECEIVED_NON": {
				const response = this.buildResponse(exchange, MessageType.NON, this.nextMessageId(), content);
				exchange.state = "RESPONSE_SENT_NON";
				this.sendMessage(response, peer);
				break;
			}
			default:
				debug(`request 0x${request.messageId.toString(16)} was already answered`);
		}
	}

	// ======================================================

	/**
	 * Stops all timers and fails all pending exchanges
	 */
	public close(): void {
		if (this.closed) return;
		this.closed = true;

		for (const transmission of this.transmissions.values()) {
			if (transmission.timer != undefined) clearTimeout(transmission.timer);
		}
		this.transmissions.clear();

		for (const exchange of this.serverExchanges) {
			if (exchange.piggybackTimer != undefined) clearTimeout(exchange.piggybackTimer);
		}
		this.serverExchanges.clear();

		const pending = new Set([...this.clientExchanges, ...this.exchangesByToken.values()]);
		for (const exchange of pending) {
			if (exchange.expiryTimer != undefined) clearTimeout(exchange.expiryTimer);
			exchange.expiryTimer = undefined;
			if (!exchange.isFinished) exchange.fail("CANCELLED", new EndpointClosedError());
		}
		this.clientExchanges.clear();
		this.exchangesByToken.clear();
		this.queues.clear();
		this.dedup.clear();
	}
}
