import debugPackage from "debug";
import { EventEmitter } from "events";
import * as net from "net";
import { ContentFormats } from "./ContentFormats";
import { EndpointClosedError } from "./Errors";
import { ClientExchange } from "./Exchange";
import { ExchangeEngine, ExchangeEngineOptions, ResponseContent } from "./ExchangeEngine";
import { DatagramTransport } from "./lib/DatagramTransport";
import { Peer } from "./lib/Peer";
import { Message, MessageCode, MessageCodes, MessageType } from "./Message";
import { blockSizeToExponent, Option, Options } from "./Option";
import { ResourceRouter } from "./ResourceRouter";

const debug = debugPackage("coap-exchange");

export type RequestMethod = "get" | "post" | "put" | "delete";

const requestMethods: readonly RequestMethod[] = ["get", "post", "put", "delete"];

/** Options to control CoAP requests */
export interface RequestOptions {
	/** Whether we expect a confirmation of the request */
	confirmable?: boolean;
	/** Whether this message will be retransmitted on loss */
	retransmit?: boolean;
	/** The preferred block size of partial responses */
	preferredBlockSize?: number;
	/** The format of the request payload */
	contentFormat?: ContentFormats;
	/** The preferred format of the response payload */
	accept?: ContentFormats;
	/** Further options to send with the request */
	options?: readonly Option[];
}

type DefaultRequestOptions = Required<Pick<RequestOptions, "confirmable" | "retransmit">> & Pick<RequestOptions, "preferredBlockSize">;

export interface CoapResponse {
	code: MessageCode;
	format: ContentFormats | undefined;
	payload: Buffer;
	options: readonly Option[];
}

/** A request in flight */
export interface RequestHandle {
	readonly messageId: number;
	readonly token: Buffer;
	/** Resolves with the complete response */
	readonly response: Promise<CoapResponse>;
	/** Cancels the request. The response promise rejects with an ExchangeCancelledError */
	cancel(): void;
}

/** An inbound request as seen by a resource handler */
export interface CoapRequest {
	method: RequestMethod;
	/** The Uri-Path segments */
	path: string[];
	/** Values of the `:name` segments of the matched pattern */
	params: Record<string, string>;
	/** The Uri-Query values */
	query: string[];
	format: ContentFormats | undefined;
	options: readonly Option[];
	payload: Buffer;
	peer: Peer;
	message: Message;
}

export interface ResourceResponse {
	/** Default: 2.05 Content */
	code?: MessageCode;
	payload?: Buffer | string;
	format?: ContentFormats;
	options?: readonly Option[];
}

export type ResourceHandler = (request: CoapRequest) => ResourceResponse | Promise<ResourceResponse>;
/** Either one handler for all methods or one handler per method */
export type ResourceHandlers = ResourceHandler | Partial<Record<RequestMethod, ResourceHandler>>;

export interface EndpointOptions extends ExchangeEngineOptions {
	/** The default options for outgoing requests */
	requestDefaults?: RequestOptions;
}

function validateBlockSize(size: number): void {
	if (blockSizeToExponent(size) == undefined) {
		throw new Error(`${size} is not a valid block size. The value must be a power of 2 between 16 and 1024`);
	}
}

function toUrl(target: string | URL): URL {
	return typeof target === "string" ? new URL(target) : target;
}

/** Identifies an observation by the peer and the resource */
function observationKey(peer: Peer, url: URL): string {
	return `${peer}${url.pathname}${url.search}`;
}

function toResponse(message: Message): CoapResponse {
	return {
		code: message.code,
		format: message.getOptionValue("Content-Format"),
		payload: message.payload,
		options: message.options,
	};
}

function toError(e: unknown): Error {
	return e instanceof Error ? e : new Error(String(e));
}

/**
 * A CoAP endpoint on top of a datagram transport. It acts as a client and, once resources
 * are registered, as a server.
 *
 * Emits "error" when the transport fails or an observer callback throws.
 * Without an "error" listener, such errors are only logged.
 */
export class CoapEndpoint extends EventEmitter {

	private readonly engine: ExchangeEngine;
	private readonly router = new ResourceRouter<ResourceHandlers>();
	private readonly observations = new Map<string, ClientExchange>();
	private defaultRequestOptions: DefaultRequestOptions = {
		confirmable: true,
		retransmit: true,
	};
	private closed: boolean = false;

	constructor(
		private readonly transport: DatagramTransport,
		options: EndpointOptions = {},
	) {
		super();
		this.engine = new ExchangeEngine({
			send: (data, peer) => this.transport.send(data, peer),
			handleRequest: (request, peer) => this.handleRequest(request, peer),
			onError: (err) => this.reportError(err),
		}, options);
		if (options.requestDefaults != undefined) this.setDefaultRequestOptions(options.requestDefaults);

		transport.on("message", (data, peer) => this.engine.handleDatagram(data, peer));
		transport.on("error", (err) => this.reportError(err));
		transport.on("close", () => this.close());
	}

	/** The number of requests, pings and observations in progress */
	public get pendingExchanges(): number {
		return this.engine.pendingExchanges;
	}

	/** An "error" event without a listener would throw from inside the transport's callback */
	private reportError(err: Error): void {
		if (this.listenerCount("error") > 0) {
			this.emit("error", err);
		} else {
			debug(`unhandled error: ${err.message}`);
		}
	}

	/**
	 * Sets the default options for requests
	 * @param defaults The default options to use for requests when no options are given
	 */
	public setDefaultRequestOptions(defaults: RequestOptions): void {
		if (defaults.confirmable != undefined) this.defaultRequestOptions.confirmable = defaults.confirmable;
		if (defaults.retransmit != undefined) this.defaultRequestOptions.retransmit = defaults.retransmit;
		if (defaults.preferredBlockSize != undefined) {
			validateBlockSize(defaults.preferredBlockSize);
			this.defaultRequestOptions.preferredBlockSize = defaults.preferredBlockSize;
		}
	}

	private getRequestOptions(options: RequestOptions = {}): RequestOptions & DefaultRequestOptions {
		if (options.preferredBlockSize != undefined) validateBlockSize(options.preferredBlockSize);
		const ret = { ...this.defaultRequestOptions, ...options };
		if (options.confirmable == undefined) ret.confirmable = this.defaultRequestOptions.confirmable;
		if (options.retransmit == undefined) ret.retransmit = this.defaultRequestOptions.retransmit;
		if (options.preferredBlockSize == undefined) ret.preferredBlockSize = this.defaultRequestOptions.preferredBlockSize;
		return ret;
	}

	/**
	 * Translates the URL and request options into message options
	 */
	private createRequestOptions(url: URL, options: RequestOptions): Option[] {
		const ret: Option[] = [];
		// [3] the destination address already identifies IP hosts
		const hostname = url.hostname.replace(/^\[|\]$/g, "");
		if (hostname !== "" && net.isIP(hostname) === 0) {
			ret.push(Options.UriHost(hostname));
		}
		// [11] path of the request, "/" and "" address the root resource
		if (url.pathname !== "" && url.pathname !== "/") {
			ret.push(...url.pathname.slice(1).split("/").map(part => Options.UriPath(decodeURIComponent(part))));
		}
		// [12] content format
		if (options.contentFormat != undefined) ret.push(Options.ContentFormat(options.contentFormat));
		// [15] query
		if (url.search.length > 1) {
			ret.push(...url.search.slice(1).split("&").map(part => Options.UriQuery(decodeURIComponent(part))));
		}
		// [17] accept
		if (options.accept != undefined) ret.push(Options.Accept(options.accept));
		// [23] Block2 (preferred response block size)
		if (options.preferredBlockSize != undefined) {
			ret.push(Options.Block2(0, false, options.preferredBlockSize));
		}
		if (options.options != undefined) ret.push(...options.options);
		return ret;
	}

	private assertOpen(): void {
		if (this.closed) throw new EndpointClosedError();
	}

	/**
	 * Requests a CoAP resource.
	 * Hostnames are passed to the transport as they are. Resolve them with `Peer.resolve()`
	 * first when responses must be matched by address.
	 * @param url - The URL to be requested. Must start with coap://
	 * @param method - The request method to be used
	 * @param payload - The optional payload to be attached to the request
	 * @param options - Various options to control the request.
	 */
	public request(
		url: string | URL,
		method: RequestMethod,
		payload?: Buffer,
		options?: RequestOptions,
	): RequestHandle {
		this.assertOpen();
		url = toUrl(url);
		const opts = this.getRequestOptions(options);
		const peer = Peer.fromUrl(url);

		const exchange = this.engine.request(peer, {
			type: opts.confirmable ? MessageType.CON : MessageType.NON,
			code: MessageCodes.request[method],
			options: this.createRequestOptions(url, opts),
			payload,
			retransmit: opts.retransmit,
		});
		debug(`sending ${method.toUpperCase()} request to ${url.href}`);

		return {
			messageId: exchange.messageId,
			token: exchange.token,
			response: exchange.response.then(toResponse),
			cancel: () => this.engine.cancel(exchange),
		};
	}

	/**
	 * Pings a CoAP endpoint to check if it is alive
	 * @param target - The target to be pinged. Must contain the host and port.
	 * @param timeout - (optional) Timeout in ms, after which the ping is deemed unanswered. Default: 5000ms
	 */
	public async ping(target: string | URL | Peer, timeout: number = 5000): Promise<boolean> {
		this.assertOpen();
		const peer = target instanceof Peer ? target : Peer.fromUrl(toUrl(target));
		const exchange = this.engine.ping(peer, timeout);
		try {
			// now wait for success or failure
			await exchange.response;
			return true;
		} catch (e) {
			debug(`ping to ${peer} failed: ${toError(e).message}`);
			return false;
		}
	}

	/**
	 * Observes a CoAP resource
	 * @param url - The URL to be requested. Must start with coap://
	 * @param method - The request method to be used
	 * @param callback - Invoked for every notification, including the first response
	 * @param payload - The optional payload to be attached to the request
	 * @param options - Various options to control the request.
	 * @returns the first response, which confirms (or refuses) the registration
	 */
	public async observe(
		url: string | URL,
		method: RequestMethod,
		callback: (resp: CoapResponse) => void,
		payload?: Buffer,
		options?: RequestOptions,
	): Promise<CoapResponse> {
		this.assertOpen();
		url = toUrl(url);
		const opts = this.getRequestOptions(options);
		const peer = Peer.fromUrl(url);
		const key = observationKey(peer, url);

		// only one observation per resource
		const existing = this.observations.get(key);
		if (existing != undefined) this.engine.stopObserving(existing);

		const exchange = this.engine.request(peer, {
			type: opts.confirmable ? MessageType.CON : MessageType.NON,
			code: MessageCodes.request[method],
			options: [Options.Observe(true), ...this.createRequestOptions(url, opts)],
			payload,
			retransmit: opts.retransmit,
			observer: (notification) => {
				// the server ends the observation with a notification without Observe or with an error
				const ended = notification.getOption("Observe") == undefined
					|| notification.code.major !== MessageCodes.success.__major;
				if (ended && this.observations.get(key) === exchange) this.observations.delete(key);
				callback(toResponse(notification));
			},
		});
		this.observations.set(key, exchange);

		try {
			return toResponse(await exchange.response);
		} catch (e) {
			if (this.observations.get(key) === exchange) this.observations.delete(key);
			throw e;
		}
	}

	/**
	 * Stops observation of the given url
	 */
	public stopObserving(url: string | URL): void {
		url = toUrl(url);
		const key = observationKey(Peer.fromUrl(url), url);
		const exchange = this.observations.get(key);
		if (exchange == undefined) return;
		this.observations.delete(key);
		this.engine.stopObserving(exchange);
	}

	/**
	 * Serves requests for the resources matching the given pattern
	 * @param pattern - Path of the resource, e.g. `/sensors/:id` or `/files/*`
	 */
	public registerResource(pattern: string, handlers: ResourceHandlers): void {
		this.router.add(pattern, handlers);
	}

	/** @returns whether a resource was registered for the pattern */
	public unregisterResource(pattern: string): boolean {
		return this.router.remove(pattern);
	}

	private async handleRequest(request: Message, peer: Peer): Promise<ResponseContent> {
		const method = requestMethods.find(m => MessageCodes.request[m].equals(request.code));
		const path = request.pathSegments;
		const match = this.router.match(path);
		if (match == undefined) {
			debug(`no resource found for /${path.join("/")}`);
			return { code: MessageCodes.clientError.notFound };
		}
		const handler = method == undefined ? undefined
			: typeof match.value === "function" ? match.value
			: match.value[method];
		if (method == undefined || handler == undefined) {
			return { code: MessageCodes.clientError.methodNotAllowed };
		}

		let response: ResourceResponse;
		try {
			response = await handler({
				method, path,
				params: match.params,
				query: request.getOptionValues("Uri-Query"),
				format: request.getOptionValue("Content-Format"),
				options: request.options,
				payload: request.payload,
				peer,
				message: request,
			});
		} catch (e) {
			const err = toError(e);
			debug(`handler for ${match.pattern} failed: ${err.message}`);
			return { code: MessageCodes.serverError.internalServerError, payload: Buffer.from(err.message, "utf8") };
		}

		const options: Option[] = [];
		if (response.format != undefined) options.push(Options.ContentFormat(response.format));
		if (response.options != undefined) options.push(...response.options);
		return {
			code: response.code != undefined ? response.code : MessageCodes.success.content,
			options,
			payload: typeof response.payload === "string" ? Buffer.from(response.payload, "utf8") : response.payload,
		};
	}

	/**
	 * Fails all pending exchanges with an EndpointClosedError and closes the transport
	 */
	public close(): void {
		if (this.closed) return;
		this.closed = true;
		this.observations.clear();
		this.engine.close();
		this.transport.close();
	}
}
