// tslint:disable:no-unused-expression
import { expect } from "chai";
import sinon from "sinon";

import {
	BlockwiseTransferError, EndpointClosedError, ExchangeCancelledError, ExchangeTimeoutError, PeerResetError,
	UnrecognizedCriticalOptionError,
} from "./Errors";
import { ClientExchange } from "./Exchange";
import { ExchangeEngine, ExchangeEngineOptions, ResponseContent } from "./ExchangeEngine";
import { Peer } from "./lib/Peer";
import { Message, MessageCodes, MessageInit, MessageType } from "./Message";
import { Option, Options } from "./Option";

/** Settles with the rejection reason, or undefined if the promise was fulfilled */
function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
	return promise.then(() => undefined, (e: unknown) => e);
}

describe("ExchangeEngine Tests =>", () => {

	const peer = new Peer("192.0.2.1", 5683);
	const otherPeer = new Peer("192.0.2.2", 5683);
	const contentCode = MessageCodes.success.content;

	let clock: sinon.SinonFakeTimers;
	let sent: { data: Buffer, peer: Peer }[];
	let errors: Error[];
	let handled: Message[];
	let handler: (request: Message) => Promise<ResponseContent>;
	let engine: ExchangeEngine;

	function createEngine(options: ExchangeEngineOptions = {}): ExchangeEngine {
		return new ExchangeEngine({
			send: (data, to) => sent.push({ data, peer: to }),
			handleRequest: (request) => {
				handled.push(request);
				return handler(request);
			},
			onError: (err) => errors.push(err),
		}, { random: () => 0, ...options });
	}

	function sentMessage(index: number): Message {
		return Message.parse(sent[index].data);
	}

	function receive(init: MessageInit, from: Peer = peer): void {
		engine.handleDatagram(Message.create(init).serialize(), from);
	}

	/** Starts a confirmable GET. Rejections are asserted by the tests that expect them */
	function get(options: Option[] = [], to: Peer = peer): ClientExchange {
		const exchange = engine.request(to, { type: MessageType.CON, code: MessageCodes.request.get, options });
		exchange.response.catch(() => undefined);
		return exchange;
	}

	// GET /ping from a client
	const token = Buffer.from([1, 2]);
	function requestBytes(type: MessageType = MessageType.CON): Buffer {
		return Message.create({
			type, code: MessageCodes.request.get, messageId: 0x0101, token, options: [Options.UriPath("ping")],
		}).serialize();
	}

	beforeEach(() => {
		clock = sinon.useFakeTimers();
		sent = [];
		errors = [];
		handled = [];
		handler = () => Promise.resolve({ code: contentCode, payload: Buffer.from("pong") });
		engine = createEngine();
	});

	afterEach(() => {
		engine.close();
		clock.restore();
	});

	describe("construction =>", () => {

		it("should validate the deduplication cache size", () => {
			expect(() => createEngine({ deduplicationCacheSize: 0 })).to.throw("deduplicationCacheSize must be a positive integer");
		});

		it("should validate the token length", () => {
			expect(() => createEngine({ tokenLength: 0 })).to.throw(RangeError);
			expect(() => createEngine({ tokenLength: 9 })).to.throw(RangeError);
			expect(() => createEngine({ tokenLength: 2.5 })).to.throw(RangeError);
		});

		it("should validate the piggyback timeout", () => {
			expect(() => createEngine({ piggybackTimeout: -1 })).to.throw(RangeError);
		});

		it("should validate the transmission parameters", () => {
			expect(() => createEngine({ transmission: { maxRetransmit: -1 } })).to.throw(RangeError);
		});
	});

	describe("client =>", () => {

		it("should send confirmable requests with a fresh token", () => {
			get([Options.UriPath("temp")]);
			expect(sent).to.have.length(1);
			expect(sent[0].peer.equals(peer)).to.be.true;

			const request = sentMessage(0);
			expect(request.type).to.equal(MessageType.CON);
			expect(request.code.equals(MessageCodes.request.get)).to.be.true;
			expect(request.token).to.have.length(4);
			expect(request.pathSegments).to.deep.equal(["temp"]);
		});

		it("should use consecutive message ids and distinct tokens", () => {
			const first = get([], peer);
			const second = get([], otherPeer);
			expect((second.messageId - first.messageId + 0x10000) & 0xffff).to.equal(1);
			expect(second.token.equals(first.token)).to.be.false;
		});

		it("should generate tokens of the configured length", () => {
			engine.close();
			engine = createEngine({ tokenLength: 8 });
			get();
			expect(sentMessage(0).token).to.have.length(8);
		});

		it("should resolve with a piggybacked response", async () => {
			const exchange = get();
			const request = sentMessage(0);
			expect(exchange.state).to.equal("SENT_CON");

			receive({
				type: MessageType.ACK, code: contentCode, messageId: request.messageId, token: request.token,
				payload: Buffer.from("21.5"),
			});

			const response = await exchange.response;
			expect(response.payload.toString()).to.equal("21.5");
			expect(exchange.state).to.equal("COMPLETED");
			expect(engine.pendingExchanges).to.equal(0);
		});

		it("should retransmit with exponential back-off and time out once", async () => {
			const exchange = get();
			const result = rejectionOf(exchange.response);

			await clock.tickAsync(1999);
			expect(sent).to.have.length(1);
			await clock.tickAsync(1);
			expect(sent).to.have.length(2);
			await clock.tickAsync(4000);
			expect(sent).to.have.length(3);
			await clock.tickAsync(8000);
			expect(sent).to.have.length(4);
			await clock.tickAsync(16000);
			expect(sent).to.have.length(5);
			await clock.tickAsync(32000);

			const err = await result;
			expect(err).to.be.an.instanceOf(ExchangeTimeoutError);
			expect(err).to.have.property("transmissions", 5);
			expect(exchange.state).to.equal("TIMED_OUT");
			// every transmission carries the same bytes
			expect(new Set(sent.map(s => s.data.toString("hex"))).size).to.equal(1);

			await clock.tickAsync(100000);
			expect(sent).to.have.length(5);
		});

		it("should randomize the first timeout", async () => {
			engine.close();
			engine = createEngine({ random: () => 0.5 });
			get();
			await clock.tickAsync(2499);
			expect(sent).to.have.length(1);
			await clock.tickAsync(1);
			expect(sent).to.have.length(2);
		});

		it("should not retransmit when retransmission is disabled", async () => {
			const exchange = engine.request(peer, { type: MessageType.CON, code: MessageCodes.request.get, retransmit: false });
			const result = rejectionOf(exchange.response);
			await clock.tickAsync(2000);
			expect(await result).to.be.an.instanceOf(ExchangeTimeoutError);
			expect(sent).to.have.length(1);
		});

		it("should wait for a separate response after an empty ACK", async () => {
			const exchange = get();
			const request = sentMessage(0);
			receive({ type: MessageType.ACK, code: MessageCodes.empty, messageId: request.messageId });
			expect(exchange.state).to.equal("ACK_RECEIVED");

			await clock.tickAsync(100000);
			expect(sent).to.have.length(1);

			const separate = Message.create({
				type: MessageType.CON, code: contentCode, messageId: 0x7000, token: request.token,
				payload: Buffer.from("later"),
			});
			engine.handleDatagram(separate.serialize(), peer);

			expect(sent).to.have.length(2);
			const ack = sentMessage(1);
			expect(ack.type).to.equal(MessageType.ACK);
			expect(ack.code.isEmpty()).to.be.true;
			expect(ack.messageId).to.equal(0x7000);
			expect((await exchange.response).payload.toString()).to.equal("later");

			// a retransmitted response is acknowledged again
			engine.handleDatagram(separate.serialize(), peer);
			expect(sent).to.have.length(3);
			expect(sent[2].data).to.deep.equal(sent[1].data);
		});

		it("should give up waiting for a separate response after the exchange lifetime", async () => {
			const exchange = get();
			const result = rejectionOf(exchange.response);
			receive({ type: MessageType.ACK, code: MessageCodes.empty, messageId: sentMessage(0).messageId });

			await clock.tickAsync(246999);
			expect(exchange.state).to.equal("ACK_RECEIVED");
			await clock.tickAsync(1);
			expect(await result).to.be.an.instanceOf(ExchangeTimeoutError).and.include({ transmissions: 1 });
			expect(exchange.state).to.equal("TIMED_OUT");
			expect(engine.pendingExchanges).to.equal(0);
			expect(sent).to.have.length(1);
		});

		it("should fail with PeerResetError when the peer resets the request", async () => {
			const exchange = get();
			const result = rejectionOf(exchange.response);
			receive({ type: MessageType.RST, code: MessageCodes.empty, messageId: sentMessage(0).messageId });

			expect(await result).to.be.an.instanceOf(PeerResetError);
			expect(exchange.state).to.equal("RST_RECEIVED");
		});

		it("should discard piggybacked responses with a different token", async () => {
			const exchange = get();
			const request = sentMessage(0);
			receive({
				type: MessageType.ACK, code: contentCode, messageId: request.messageId,
				token: Buffer.from([...request.token].map(b => b ^ 0xff)),
			});
			expect(exchange.state).to.equal("SENT_CON");

			// still waiting, so the request is retransmitted
			await clock.tickAsync(2000);
			expect(sent).to.have.length(2);
		});

		it("should fail when the response carries an unrecognized critical option", async () => {
			const exchange = get();
			const result = rejectionOf(exchange.response);
			const request = sentMessage(0);
			const header = Buffer.from([0x64, 0x45, 0, 0]);
			header.writeUInt16BE(request.messageId, 2);
			engine.handleDatagram(Buffer.concat([header, request.token, Buffer.from([0x91, 0x00])]), peer);

			expect(await result).to.be.an.instanceOf(UnrecognizedCriticalOptionError);
			await clock.tickAsync(100000);
			expect(sent).to.have.length(1);
		});

		it("should match non-confirmable responses by token", async () => {
			const exchange = engine.request(peer, { type: MessageType.NON, code: MessageCodes.request.get });
			const request = sentMessage(0);
			expect(request.type).to.equal(MessageType.NON);
			expect(exchange.state).to.equal("SENT_NON");

			receive({
				type: MessageType.NON, code: contentCode, messageId: 0x2000, token: request.token,
				payload: Buffer.from("x"),
			});
			expect((await exchange.response).payload.toString()).to.equal("x");
			// non-confirmable responses are not acknowledged
			expect(sent).to.have.length(1);
		});

		it("should fail non-confirmable requests the peer resets", async () => {
			const exchange = engine.request(peer, { type: MessageType.NON, code: MessageCodes.request.get });
			const result = rejectionOf(exchange.response);
			const { messageId } = sentMessage(0);

			// a reset from somebody else does not concern this request
			receive({ type: MessageType.RST, code: MessageCodes.empty, messageId }, otherPeer);
			expect(exchange.state).to.equal("SENT_NON");

			receive({ type: MessageType.RST, code: MessageCodes.empty, messageId });
			expect(await result).to.be.an.instanceOf(PeerResetError);
			expect(exchange.state).to.equal("RST_RECEIVED");
			expect(engine.pendingExchanges).to.equal(0);
		});

		it("should give up on non-confirmable requests after the exchange lifetime", async () => {
			const exchange = engine.request(peer, { type: MessageType.NON, code: MessageCodes.request.get });
			const result = rejectionOf(exchange.response);
			await clock.tickAsync(247000);

			expect(await result).to.be.an.instanceOf(ExchangeTimeoutError);
			expect(sent).to.have.length(1);
		});

		it("should reset confirmable responses nobody asked for", () => {
			receive({ type: MessageType.CON, code: contentCode, messageId: 0x3000, token: Buffer.from([9, 9]) });
			expect(sent).to.have.length(1);
			const rst = sentMessage(0);
			expect(rst.type).to.equal(MessageType.RST);
			expect(rst.messageId).to.equal(0x3000);

			receive({ type: MessageType.NON, code: contentCode, messageId: 0x3001, token: Buffer.from([9, 9]) });
			receive({ type: MessageType.ACK, code: MessageCodes.empty, messageId: 0x3002 });
			expect(sent).to.have.length(1);
		});

		it("should allow only one outstanding confirmable request per peer", async () => {
			const first = get();
			const second = get();
			expect(sent).to.have.length(1);
			expect(second.state).to.equal("QUEUED");

			// other peers are not affected
			get([], otherPeer);
			expect(sent).to.have.length(2);
			expect(sent[1].peer.equals(otherPeer)).to.be.true;

			const request = sentMessage(0);
			receive({ type: MessageType.ACK, code: contentCode, messageId: request.messageId, token: request.token });
			await first.response;

			expect(sent).to.have.length(3);
			expect(sentMessage(2).messageId).to.equal(second.messageId);
			expect(second.state).to.equal("SENT_CON");
		});

		it("should send the next queued request once the previous one is acknowledged", () => {
			get();
			const second = get();
			receive({ type: MessageType.ACK, code: MessageCodes.empty, messageId: sentMessage(0).messageId });
			expect(sent).to.have.length(2);
			expect(sentMessage(1).messageId).to.equal(second.messageId);
		});

		describe("cancel() =>", () => {

			it("should reject the response and stop retransmitting", async () => {
				const exchange = get();
				const result = rejectionOf(exchange.response);
				engine.cancel(exchange);

				expect(await result).to.be.an.instanceOf(ExchangeCancelledError);
				expect(exchange.state).to.equal("CANCELLED");
				expect(engine.pendingExchanges).to.equal(0);
				await clock.tickAsync(10000);
				expect(sent).to.have.length(1);
			});

			it("should acknowledge and ignore a late response", async () => {
				const exchange = get();
				const request = sentMessage(0);
				engine.cancel(exchange);
				await clock.tickAsync(10000);

				receive({ type: MessageType.CON, code: contentCode, messageId: 0x4000, token: request.token });
				expect(sent).to.have.length(2);
				expect(sentMessage(1).type).to.equal(MessageType.ACK);
				expect(exchange.state).to.equal("CANCELLED");
			});

			it("should forget the token after the exchange lifetime", async () => {
				const exchange = get();
				const request = sentMessage(0);
				engine.cancel(exchange);
				await clock.tickAsync(247000);

				receive({ type: MessageType.CON, code: contentCode, messageId: 0x4001, token: request.token });
				expect(sentMessage(1).type).to.equal(MessageType.RST);
			});

			it("should remove queued requests from the queue", async () => {
				const first = get();
				const second = get();
				engine.cancel(second);
				expect(await rejectionOf(second.response)).to.be.an.instanceOf(ExchangeCancelledError);

				const request = sentMessage(0);
				receive({ type: MessageType.ACK, code: contentCode, messageId: request.messageId, token: request.token });
				await first.response;
				expect(sent).to.have.length(1);
				expect(engine.pendingExchanges).to.equal(0);
			});
		});

		it("should reassemble blockwise responses", async () => {
			const exchange = get();
			const request = sentMessage(0);
			receive({
				type: MessageType.ACK, code: contentCode, messageId: request.messageId, token: request.token,
				options: [Options.Block2(0, true, 16)],
				payload: Buffer.from("0123456789abcdef"),
			});

			expect(sent).to.have.length(2);
			const next = sentMessage(1);
			expect(next.messageId).to.not.equal(request.messageId);
			expect(next.token).to.deep.equal(request.token);
			expect(next.getOptionValue("Block2")).to.equal(16);

			receive({
				type: MessageType.ACK, code: contentCode, messageId: next.messageId, token: request.token,
				options: [Options.Block2(1, false, 16)],
				payload: Buffer.from("tail"),
			});
			const response = await exchange.response;
			expect(response.payload.toString()).to.equal("0123456789abcdeftail");
		});

		it("should fail blockwise transfers when the server repeats a block", async () => {
			const exchange = get();
			const result = rejectionOf(exchange.response);
			const request = sentMessage(0);
			receive({
				type: MessageType.ACK, code: contentCode, messageId: request.messageId, token: request.token,
				options: [Options.Block2(0, true, 16)],
				payload: Buffer.from("0123456789abcdef"),
			});
			const next = sentMessage(1);
			receive({
				type: MessageType.ACK, code: contentCode, messageId: next.messageId, token: request.token,
				options: [Options.Block2(0, true, 16)],
				payload: Buffer.from("0123456789abcdef"),
			});

			expect(await result).to.be.an.instanceOf(BlockwiseTransferError)
				.and.include({ expectedBlock: 1, receivedBlock: 0 });
			expect(exchange.state).to.equal("COMPLETED");
			expect(engine.pendingExchanges).to.equal(0);
			await clock.tickAsync(600000);
			expect(sent).to.have.length(2);
		});

		describe("observe =>", () => {

			let notifications: string[];
			let exchange: ClientExchange;
			let request: Message;

			beforeEach(() => {
				notifications = [];
				exchange = engine.request(peer, {
					type: MessageType.CON,
					code: MessageCodes.request.get,
					options: [Options.Observe(true)],
					observer: (n) => notifications.push(n.payload.toString()),
				});
				exchange.response.catch(() => undefined);
				request = sentMessage(0);
			});

			function notify(type: MessageType, messageId: number, payload: string, observe?: number): void {
				receive({
					type, code: contentCode, messageId, token: request.token, payload: Buffer.from(payload),
					options: observe != undefined ? [Option.create("Observe", observe)] : [],
				});
			}

			it("should deliver every notification", async () => {
				notify(MessageType.ACK, request.messageId, "a", 1);
				expect((await exchange.response).payload.toString()).to.equal("a");

				notify(MessageType.CON, 0x5000, "b", 2);
				const ack = sentMessage(1);
				expect(ack.type).to.equal(MessageType.ACK);
				expect(ack.messageId).to.equal(0x5000);

				expect(notifications).to.deep.equal(["a", "b"]);
				expect(engine.pendingExchanges).to.equal(1);
			});

			it("should end when a notification comes without Observe", () => {
				notify(MessageType.ACK, request.messageId, "a", 1);
				notify(MessageType.NON, 0x5001, "c");
				expect(notifications).to.deep.equal(["a", "c"]);
				expect(engine.pendingExchanges).to.equal(0);

				notify(MessageType.CON, 0x5002, "d", 3);
				expect(sentMessage(sent.length - 1).type).to.equal(MessageType.RST);
				expect(notifications).to.deep.equal(["a", "c"]);
			});

			it("should reset notifications after stopObserving()", () => {
				notify(MessageType.ACK, request.messageId, "a", 1);
				engine.stopObserving(exchange);
				notify(MessageType.CON, 0x5003, "b", 2);
				expect(sentMessage(sent.length - 1).type).to.equal(MessageType.RST);
				expect(notifications).to.deep.equal(["a"]);
			});
		});

		it("should report errors thrown by observers", () => {
			const exchange = engine.request(peer, {
				type: MessageType.CON,
				code: MessageCodes.request.get,
				options: [Options.Observe(true)],
				observer: () => { throw new Error("observer failed"); },
			});
			const request = sentMessage(0);
			receive({
				type: MessageType.ACK, code: contentCode, messageId: request.messageId, token: request.token,
				options: [Option.create("Observe", 1)],
			});
			expect(errors.map(e => e.message)).to.deep.equal(["observer failed"]);
			expect(exchange.response.isSettled()).to.be.true;
		});

		describe("ping() =>", () => {

			it("should send an empty confirmable message and resolve on reset", async () => {
				const exchange = engine.ping(peer, 5000);
				const ping = sentMessage(0);
				expect(ping.type).to.equal(MessageType.CON);
				expect(ping.code.isEmpty()).to.be.true;
				expect(ping.token).to.have.length(0);

				receive({ type: MessageType.RST, code: MessageCodes.empty, messageId: ping.messageId });
				await exchange.response;
				expect(exchange.state).to.equal("COMPLETED");
			});

			it("should time out without retransmitting", async () => {
				const result = rejectionOf(engine.ping(peer, 5000).response);
				await clock.tickAsync(5000);
				expect(await result).to.be.an.instanceOf(ExchangeTimeoutError);
				expect(sent).to.have.length(1);
			});
		});
	});

	describe("server =>", () => {

		it("should piggyback fast responses on the ACK", async () => {
			engine.handleDatagram(requestBytes(), peer);
			await clock.tickAsync(0);

			expect(handled).to.have.length(1);
			expect(handled[0].pathSegments).to.deep.equal(["ping"]);
			expect(sent).to.have.length(1);
			const response = sentMessage(0);
			expect(response.type).to.equal(MessageType.ACK);
			expect(response.messageId).to.equal(0x0101);
			expect(response.token).to.deep.equal(token);
			expect(response.code.toString()).to.equal("2.05");
			expect(response.payload.toString()).to.equal("pong");
		});

		it("should send slow responses separately and retransmit them", async () => {
			handler = () => new Promise(resolve => {
				setTimeout(() => resolve({ code: contentCode, payload: Buffer.from("slow") }), 1000);
			});
			engine.handleDatagram(requestBytes(), peer);

			await clock.tickAsync(50);
			expect(sent).to.have.length(1);
			const ack = sentMessage(0);
			expect(ack.type).to.equal(MessageType.ACK);
			expect(ack.code.isEmpty()).to.be.true;
			expect(ack.messageId).to.equal(0x0101);

			await clock.tickAsync(950);
			expect(sent).to.have.length(2);
			const response = sentMessage(1);
			expect(response.type).to.equal(MessageType.CON);
			expect(response.token).to.deep.equal(token);
			expect(response.payload.toString()).to.equal("slow");

			await clock.tickAsync(2000);
			expect(sent).to.have.length(3);

			receive({ type: MessageType.ACK, code: MessageCodes.empty, messageId: response.messageId });
			await clock.tickAsync(100000);
			expect(sent).to.have.length(3);
		});

		it("should answer duplicates with the same reply without handling them again", async () => {
			engine.handleDatagram(requestBytes(), peer);
			await clock.tickAsync(0);
			engine.handleDatagram(requestBytes(), peer);
			await clock.tickAsync(0);

			expect(handled).to.have.length(1);
			expect(sent).to.have.length(2);
			expect(sent[1].data).to.deep.equal(sent[0].data);
		});

		it("should treat the same message id from another peer as a new request", async () => {
			engine.handleDatagram(requestBytes(), peer);
			engine.handleDatagram(requestBytes(), otherPeer);
			await clock.tickAsync(0);
			expect(handled).to.have.length(2);
		});

		it("should repeat the empty ACK for duplicates of a slow request", async () => {
			handler = () => new Promise(resolve => {
				setTimeout(() => resolve({ code: contentCode }), 1000);
			});
			engine.handleDatagram(requestBytes(), peer);
			// nothing has been sent yet, so the duplicate is dropped
			engine.handleDatagram(requestBytes(), peer);
			expect(sent).to.have.length(0);

			await clock.tickAsync(50);
			engine.handleDatagram(requestBytes(), peer);
			expect(sent).to.have.length(2);
			expect(sent[1].data).to.deep.equal(sent[0].data);
			expect(handled).to.have.length(1);
		});

		it("should answer non-confirmable requests with non-confirmable responses", async () => {
			engine.handleDatagram(requestBytes(MessageType.NON), peer);
			await clock.tickAsync(0);

			const response = sentMessage(0);
			expect(response.type).to.equal(MessageType.NON);
			expect(response.token).to.deep.equal(token);
			expect(response.payload.toString()).to.equal("pong");

			// duplicates are dropped
			engine.handleDatagram(requestBytes(MessageType.NON), peer);
			await clock.tickAsync(0);
			expect(handled).to.have.length(1);
			expect(sent).to.have.length(1);
		});

		it("should answer requests with unrecognized critical options with 4.02", async () => {
			const raw = Buffer.from([0x42, 0x01, 0x01, 0x01, 0x01, 0x02, 0x91, 0x00]);
			engine.handleDatagram(raw, peer);
			await clock.tickAsync(0);

			expect(handled).to.be.empty;
			const reply = sentMessage(0);
			expect(reply.type).to.equal(MessageType.ACK);
			expect(reply.code.toString()).to.equal("4.02");
			expect(reply.messageId).to.equal(0x0101);
			expect(reply.token).to.deep.equal(token);

			engine.handleDatagram(raw, peer);
			expect(sent).to.have.length(2);
			expect(sent[1].data).to.deep.equal(sent[0].data);
		});

		it("should answer non-confirmable requests with bad options with a non-confirmable 4.02", () => {
			engine.handleDatagram(Buffer.from([0x52, 0x01, 0x01, 0x02, 0x01, 0x02, 0x91, 0x00]), peer);
			const reply = sentMessage(0);
			expect(reply.type).to.equal(MessageType.NON);
			expect(reply.code.toString()).to.equal("4.02");
			expect(reply.token).to.deep.equal(token);
		});

		it("should drop malformed messages silently", async () => {
			engine.handleDatagram(Buffer.from([0x40, 0x01]), peer);
			engine.handleDatagram(Buffer.from([0x40, 0x01, 0x00, 0x01, 0xff]), peer);
			await clock.tickAsync(0);
			expect(sent).to.be.empty;
			expect(handled).to.be.empty;
		});

		it("should answer an empty confirmable message with a reset", () => {
			engine.handleDatagram(Buffer.from([0x40, 0x00, 0x12, 0x34]), peer);
			expect(sent).to.have.length(1);
			expect(sent[0].data).to.deep.equal(Buffer.from([0x70, 0x00, 0x12, 0x34]));

			engine.handleDatagram(Buffer.from([0x50, 0x00, 0x12, 0x35]), peer);
			expect(sent).to.have.length(1);
		});

		it("should respond with 5.00 when the handler fails", async () => {
			handler = () => Promise.reject(new Error("boom"));
			engine.handleDatagram(requestBytes(), peer);
			await clock.tickAsync(0);
			expect(sentMessage(0).code.toString()).to.equal("5.00");
		});

		it("should respond with 5.00 when the response cannot be built", async () => {
			handler = () => Promise.resolve({
				code: contentCode,
				options: [Options.ContentFormat(0), Options.ContentFormat(50)],
			});
			engine.handleDatagram(requestBytes(), peer);
			await clock.tickAsync(0);
			expect(sentMessage(0).code.toString()).to.equal("5.00");
		});
	});

	describe("close() =>", () => {

		it("should reject pending exchanges and stop all timers", async () => {
			const exchange = get();
			const result = rejectionOf(exchange.response);
			engine.close();

			expect(await result).to.be.an.instanceOf(EndpointClosedError);
			await clock.tickAsync(100000);
			expect(sent).to.have.length(1);
		});

		it("should refuse new requests and ignore datagrams", () => {
			engine.close();
			expect(() => get()).to.throw(EndpointClosedError);
			engine.handleDatagram(Buffer.from([0x40, 0x00, 0x12, 0x34]), peer);
			expect(sent).to.be.empty;
		});

		it("should not respond to requests that were still being handled", async () => {
			handler = () => new Promise(resolve => {
				setTimeout(() => resolve({ code: contentCode }), 10);
			});
			engine.handleDatagram(requestBytes(), peer);
			engine.close();
			await clock.tickAsync(100);
			expect(sent).to.be.empty;
		});
	});
});
