/**
 * Timing and congestion control parameters for message transmission.
 * All durations are in milliseconds.
 */
export interface TransmissionParameters {
	/** Initial time to wait for the acknowledgement of a confirmable message */
	ackTimeout: number;
	/** The initial timeout is randomized between ackTimeout and ackTimeout * ackRandomFactor */
	ackRandomFactor: number;
	/** How often a confirmable message is retransmitted before giving up */
	maxRetransmit: number;
	/** How many unacknowledged confirmable requests may be outstanding per peer */
	nstart: number;
	/** How long a confirmable message id is remembered for deduplication */
	exchangeLifetime: number;
	/** How long a non-confirmable message id is remembered for deduplication */
	nonLifetime: number;
}

// tslint:disable-next-line:variable-name
export const DefaultTransmissionParameters: Readonly<TransmissionParameters> = Object.freeze({
	ackTimeout: 2000,
	ackRandomFactor: 1.5,
	maxRetransmit: 4,
	nstart: 1,
	exchangeLifetime: 247000,
	nonLifetime: 145000,
});

/**
 * Merges the given parameters over the defaults
 * @throws RangeError if a parameter is out of range
 */
export function resolveTransmissionParameters(overrides: Partial<TransmissionParameters> = {}): Readonly<TransmissionParameters> {
	const ret: TransmissionParameters = { ...DefaultTransmissionParameters };
	for (const [key, value] of Object.entries(overrides)) {
		if (value == undefined) continue;
		if (!isParameterName(key)) throw new RangeError(`unknown transmission parameter ${key}`);
		ret[key] = value;
	}

	if (!(ret.ackTimeout > 0)) throw new RangeError("ackTimeout must be positive");
	if (!(ret.ackRandomFactor >= 1)) throw new RangeError("ackRandomFactor must be at least 1");
	if (!Number.isInteger(ret.maxRetransmit) || ret.maxRetransmit < 0) {
		throw new RangeError("maxRetransmit must be a non-negative integer");
	}
	if (!Number.isInteger(ret.nstart) || ret.nstart < 1) throw new RangeError("nstart must be a positive integer");
	if (!(ret.exchangeLifetime > 0) || !(ret.nonLifetime > 0)) throw new RangeError("lifetimes must be positive");
	return Object.freeze(ret);
}

function isParameterName(key: string): key is keyof TransmissionParameters {
	return Object.prototype.hasOwnProperty.call(DefaultTransmissionParameters, key);
}

/**
 * Picks the initial retransmission timeout of a confirmable message
 * @param random - a number in [0, 1)
 */
export function getRetransmissionInterval(params: Readonly<TransmissionParameters>, random: number): number {
	return Math.round(params.ackTimeout * (1 + random * (params.ackRandomFactor - 1)));
}
