import debugPackage from "debug";
import { EventEmitter } from "events";
import { DatagramTransport } from "./DatagramTransport";
import { Peer } from "./Peer";
const debug = debugPackage("coap-exchange:transport");

/**
 * In-process datagram transport. Two transports created as a pair deliver to each other
 * on the next turn of the event loop, like a lossless link between two sockets.
 */
export class MemoryTransport extends EventEmitter implements DatagramTransport {

	private remote: MemoryTransport | undefined;
	private isClosed: boolean = false;
	/** Datagrams for which this returns true are dropped instead of delivered */
	public shouldDrop: (data: Buffer, to: Peer) => boolean = () => false;

	constructor(public readonly local: Peer) {
		super();
	}

	/**
	 * Creates two transports that are linked to each other
	 */
	public static createPair(a: Peer, b: Peer): [MemoryTransport, MemoryTransport] {
		const first = new MemoryTransport(a);
		const second = new MemoryTransport(b);
		first.remote = second;
		second.remote = first;
		return [first, second];
	}

	public send(data: Buffer, peer: Peer): void {
		if (this.isClosed) return;
		const remote = this.remote;
		if (remote == undefined || !remote.local.equals(peer)) {
			debug(`no route from ${this.local} to ${peer}, dropping datagram`);
			return;
		}
		if (this.shouldDrop(data, peer)) {
			debug(`dropping datagram from ${this.local} to ${peer}`);
			return;
		}
		const copy = Buffer.from(data);
		setImmediate(() => remote.receive(copy, this.local));
	}

	private receive(data: Buffer, from: Peer): void {
		if (this.isClosed) return;
		this.emit("message", data, from);
	}

	public close(): void {
		if (this.isClosed) return;
		this.isClosed = true;
		this.emit("close");
	}
}
