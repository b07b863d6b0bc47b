import { LRUCache } from "lru-cache";
import { Peer } from "./Peer";

export interface DeduplicationEntry {
	/** The serialized reply, resent verbatim when a duplicate arrives */
	reply?: Buffer;
}

export interface DeduplicationCacheOptions {
	/** How long (ms) a message id is remembered unless `add()` says otherwise */
	lifetime: number;
	/** How many message ids are remembered at most. The least recently seen ones are forgotten first */
	max?: number;
}

/** The default for `max` */
export const DEFAULT_DEDUPLICATION_CACHE_SIZE = 10000;

/**
 * Remembers recently received message ids per peer, together with the reply that was sent for them
 */
export class DeduplicationCache {

	private readonly entries: LRUCache<string, DeduplicationEntry>;

	constructor(options: DeduplicationCacheOptions) {
		this.entries = new LRUCache<string, DeduplicationEntry>({
			max: options.max != undefined ? options.max : DEFAULT_DEDUPLICATION_CACHE_SIZE,
			ttl: options.lifetime,
			// check the age on every lookup instead of caching the clock
			ttlResolution: 0,
		});
	}

	private static key(peer: Peer, messageId: number): string {
		return `${peer}#${messageId}`;
	}

	public get size(): number {
		return this.entries.size;
	}

	/** Returns the entry for a message id if it was seen within its lifetime */
	public lookup(peer: Peer, messageId: number): DeduplicationEntry | undefined {
		return this.entries.get(DeduplicationCache.key(peer, messageId));
	}

	/** Remembers a message id for the given lifetime in milliseconds */
	public add(peer: Peer, messageId: number, lifetime: number): DeduplicationEntry {
		const entry: DeduplicationEntry = {};
		this.entries.set(DeduplicationCache.key(peer, messageId), entry, { ttl: lifetime });
		return entry;
	}

	public clear(): void {
		this.entries.clear();
	}
}
