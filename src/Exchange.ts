import { createDeferredPromise, DeferredPromise } from "./lib/DeferredPromise";
import { Peer } from "./lib/Peer";
import { Message, MessageType } from "./Message";

/**
 * States of an exchange we started by sending a request (or ping)
 */
export type ClientExchangeState =
	/** waiting for a free slot to the peer (NSTART) */
	| "QUEUED"
	/** confirmable request sent, not yet acknowledged */
	| "SENT_CON"
	| "SENT_NON"
	/** the request was acknowledged, the response will follow separately */
	| "ACK_RECEIVED"
	| "COMPLETED"
	| "RST_RECEIVED"
	| "TIMED_OUT"
	| "CANCELLED"
	;

/**
 * States of an exchange started by a peer's request
 */
export type ServerExchangeState =
	| "RECEIVED_CON"
	| "RECEIVED_NON"
	/** the response was sent in the acknowledgement */
	| "RESPONSE_SENT_PIGGYBACK"
	/** the handler took too long, an empty acknowledgement was sent */
	| "ACK_SENT_SEPARATE"
	/** the response followed the empty acknowledgement as a confirmable message */
	| "RESPONSE_SENT_LATER"
	| "RESPONSE_SENT_NON"
	;

const finalClientStates: readonly ClientExchangeState[] = ["COMPLETED", "RST_RECEIVED", "TIMED_OUT", "CANCELLED"];

/** Invoked for every notification of an observed resource */
export type NotificationCallback = (notification: Message) => void;

/**
 * A request we sent and the bookkeeping needed to match its response
 */
export class ClientExchange {

	public state: ClientExchangeState = "QUEUED";
	/** Resolves with the (reassembled) response */
	public readonly response: DeferredPromise<Message> = createDeferredPromise<Message>();
	/** Payloads of the blocks received so far in a blockwise transfer */
	public blocks: Buffer[] = [];
	/** Expires a non-confirmable request, or removes a cancelled one after the exchange lifetime */
	public expiryTimer: NodeJS.Timeout | undefined;

	constructor(
		public readonly peer: Peer,
		/** The message currently in flight. Requests for further blocks replace it */
		public message: Message,
		public readonly retransmit: boolean,
		public readonly observer?: NotificationCallback,
	) {}

	public get messageId(): number {
		return this.message.messageId;
	}
	public get token(): Buffer {
		return this.message.token;
	}
	public get isPing(): boolean {
		return this.message.code.isEmpty();
	}
	public get isFinished(): boolean {
		return finalClientStates.includes(this.state);
	}

	public complete(response: Message): void {
		this.state = "COMPLETED";
		this.response.resolve(response);
	}

	public fail(state: ClientExchangeState, reason: Error): void {
		this.state = state;
		this.response.reject(reason);
	}
}

/**
 * A request we received and are answering
 */
export class ServerExchange {

	public state: ServerExchangeState;
	/** Sends the empty acknowledgement when the handler does not answer in time */
	public piggybackTimer: NodeJS.Timeout | undefined;

	constructor(
		public readonly peer: Peer,
		public readonly request: Message,
	) {
		this.state = request.type === MessageType.CON ? "RECEIVED_CON" : "RECEIVED_NON";
	}
}
