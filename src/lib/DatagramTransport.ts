import { Peer } from "./Peer";

/**
 * The network I/O layer an endpoint sends and receives datagrams through.
 *
 * Implementations emit
 * - `"message"` with the datagram and the peer it came from
 * - `"error"` when the underlying socket fails
 * - `"close"` once the transport is closed
 */
export interface DatagramTransport {
	send(data: Buffer, peer: Peer): void;
	close(): void;

	on(event: "message", listener: (data: Buffer, peer: Peer) => void): this;
	on(event: "error", listener: (err: Error) => void): this;
	on(event: "close", listener: () => void): this;
}
