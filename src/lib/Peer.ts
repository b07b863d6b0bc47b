import { getSocketAddressFromURLSafeHostname, getURLSafeHostname, stripIPv6Brackets } from "./Hostname";

export const COAP_PORT = 5683;

/**
 * Identifies the other endpoint of a datagram (address and port)
 */
export class Peer {
	constructor(
		public readonly address: string,
		public readonly port: number,
	) {}

	public toString(): string {
		return `${getURLSafeHostname(this.address)}:${this.port}`;
	}

	public equals(other: Peer): boolean {
		return this.address === other.address && this.port === other.port;
	}

	/** Takes the peer from an URL without resolving its hostname */
	public static fromUrl(url: URL): Peer {
		return new Peer(stripIPv6Brackets(url.hostname), url.port !== "" ? +url.port : COAP_PORT);
	}

	/**
	 * Takes the peer from an URL and resolves its hostname to an address
	 * @param lookup Resolves hostnames. Defaults to the system resolver
	 */
	public static async resolve(url: URL, lookup?: (hostname: string) => Promise<string>): Promise<Peer> {
		const address = await getSocketAddressFromURLSafeHostname(url.hostname, lookup);
		return new Peer(address, url.port !== "" ? +url.port : COAP_PORT);
	}

	/** Parses the string representation `host:port` */
	public static parse(peer: string): Peer {
		return Peer.fromUrl(new URL(`coap://${peer}`));
	}
}
