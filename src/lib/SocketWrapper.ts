import debugPackage from "debug";
import * as dgram from "dgram";
import { EventEmitter } from "events";
import { DatagramTransport } from "./DatagramTransport";
import { Peer } from "./Peer";
const debug = debugPackage("coap-exchange:transport");

/**
 * The subset of a UDP socket this wrapper relies on
 */
export interface UdpSocket {
	on(event: "message", listener: (msg: Buffer, rinfo: dgram.RemoteInfo) => void): unknown;
	on(event: "error", listener: (err: Error) => void): unknown;
	on(event: "close", listener: () => void): unknown;
	send(msg: Buffer, port: number, address: string, callback: (error: Error | null) => void): void;
	close(): void;
}

/**
 * Datagram transport on top of a UDP socket
 */
export class SocketWrapper extends EventEmitter implements DatagramTransport {

	private isClosed: boolean = false;

	constructor(public readonly socket: UdpSocket) {
		super();
		socket.on("message", (message: Buffer, rinfo: dgram.RemoteInfo) => {
			this.emit("message", message, new Peer(rinfo.address, rinfo.port));
		});
		socket.on("error", (err: Error) => {
			this.emit("error", err);
		});
		socket.on("close", () => {
			this.isClosed = true;
			this.emit("close");
		});
	}

	/**
	 * Creates a UDP socket and binds it to the given port
	 */
	public static bind(port: number = 0, address?: string, type: dgram.SocketType = "udp4"): Promise<SocketWrapper> {
		return new Promise<SocketWrapper>((resolve, reject) => {
			const socket = dgram.createSocket(type);
			const onError = (err: Error) => reject(err);
			socket.once("error", onError);
			socket.bind(port, address, () => {
				socket.removeListener("error", onError);
				debug(`bound to ${socket.address().address}:${socket.address().port}`);
				resolve(new SocketWrapper(socket));
			});
		});
	}

	public send(msg: Buffer, peer: Peer): void {
		if (this.isClosed) return;
		this.socket.send(msg, peer.port, peer.address, (err) => {
			if (err) {
				debug(`sending to ${peer} failed: ${err}`);
				this.emit("error", err);
			}
		});
	}

	public close(): void {
		if (this.isClosed) return;
		this.isClosed = true;
		this.socket.close();
	}
}
