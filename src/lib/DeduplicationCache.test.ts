// tslint:disable:no-unused-expression
import { expect } from "chai";

import { DeduplicationCache } from "./DeduplicationCache";
import { Peer } from "./Peer";

function wait(ms: number): Promise<void> {
	return new Promise<void>(resolve => setTimeout(resolve, ms));
}

describe("lib/DeduplicationCache =>", () => {

	const peer = new Peer("192.0.2.1", 5683);
	const otherPeer = new Peer("192.0.2.2", 5683);
	let cache: DeduplicationCache;

	beforeEach(() => {
		cache = new DeduplicationCache({ lifetime: 60000 });
	});

	it("should remember message ids per peer", () => {
		cache.add(peer, 0x1234, 60000);
		expect(cache.lookup(peer, 0x1234)).to.not.be.undefined;
		expect(cache.lookup(otherPeer, 0x1234)).to.be.undefined;
		expect(cache.lookup(peer, 0x1235)).to.be.undefined;
	});

	it("should keep the reply stored with an entry", () => {
		const entry = cache.add(peer, 1, 60000);
		entry.reply = Buffer.from([0x60, 0x00, 0x00, 0x01]);
		const found = cache.lookup(peer, 1);
		expect(found).to.not.be.undefined;
		if (found != undefined) expect(found.reply).to.deep.equal(Buffer.from([0x60, 0x00, 0x00, 0x01]));
	});

	it("should forget entries after their own lifetime", async () => {
		cache.add(peer, 1, 20);
		cache.add(peer, 2, 60000);
		await wait(60);
		expect(cache.lookup(peer, 1)).to.be.undefined;
		expect(cache.lookup(peer, 2)).to.not.be.undefined;
	});

	it("should forget the least recently seen message ids when it is full", () => {
		cache = new DeduplicationCache({ lifetime: 60000, max: 2 });
		cache.add(peer, 1, 60000);
		cache.add(peer, 2, 60000);
		cache.add(peer, 3, 60000);
		expect(cache.size).to.equal(2);
		expect(cache.lookup(peer, 1)).to.be.undefined;
		expect(cache.lookup(peer, 3)).to.not.be.undefined;
	});

	it("clear() should remove everything", () => {
		cache.add(peer, 1, 60000);
		cache.clear();
		expect(cache.size).to.equal(0);
	});
});
