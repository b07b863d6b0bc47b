import debugPackage from "debug";
import * as dns from "dns";
import { isIPv4, isIPv6 } from "net";
const debug = debugPackage("coap-exchange:hostname");

/** Converts the given hostname to be used in an URL. Wraps IPv6 addresses in square brackets */
export function getURLSafeHostname(hostname: string): string {
	if (isIPv6(hostname)) return `[${hostname}]`;
	return hostname;
}

/** Removes the square brackets around an IPv6 address taken from an URL */
export function stripIPv6Brackets(hostname: string): string {
	if (/^\[.+\]$/.test(hostname)) {
		const potentialIPv6 = hostname.slice(1, -1);
		if (isIPv6(potentialIPv6)) return potentialIPv6;
	}
	return hostname;
}

/** Takes an URL-safe hostname and converts it to an address to be used in UDP sockets */
export async function getSocketAddressFromURLSafeHostname(
	hostname: string,
	lookup: (hostname: string) => Promise<string> = lookupAsync,
): Promise<string> {
	// IPv4 addresses are fine
	if (isIPv4(hostname)) return hostname;
	// IPv6 addresses are wrapped in [], which need to be removed
	const unwrapped = stripIPv6Brackets(hostname);
	if (isIPv6(unwrapped)) return unwrapped;
	// This is a hostname, look it up
	try {
		return await lookup(hostname);
	} catch (e) {
		// Lookup failed, continue working with the hostname
		debug(`lookup of ${hostname} failed: ${e}`);
	}
	return hostname;
}

/** Tries to look up a hostname and returns the first IP address found */
function lookupAsync(hostname: string): Promise<string> {
	return new Promise<string>((resolve, reject) => {
		dns.lookup(hostname, {all: true}, (err, addresses) => {
			if (err) return reject(err);
			if (addresses.length === 0) return reject(new Error(`no addresses found for ${hostname}`));
			resolve(addresses[0].address);
		});
	});
}
