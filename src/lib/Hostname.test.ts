import { expect, use } from "chai";
import chaiAsPromised from "chai-as-promised";

before(() => {
	use(chaiAsPromised);
});

import { getSocketAddressFromURLSafeHostname, getURLSafeHostname, stripIPv6Brackets } from "./Hostname";

describe("lib/Hostname =>", () => {

	const lookupFails = () => Promise.reject(new Error("ENOTFOUND"));

	it("getURLSafeHostname() should wrap IPv6 addresses", () => {
		expect(getURLSafeHostname("::1")).to.equal("[::1]");
		expect(getURLSafeHostname("192.0.2.1")).to.equal("192.0.2.1");
		expect(getURLSafeHostname("sensor.local")).to.equal("sensor.local");
	});

	it("stripIPv6Brackets() should only unwrap IPv6 addresses", () => {
		expect(stripIPv6Brackets("[fe80::1]")).to.equal("fe80::1");
		expect(stripIPv6Brackets("[not-an-ip]")).to.equal("[not-an-ip]");
	});

	describe("getSocketAddressFromURLSafeHostname() =>", () => {

		it("should return IPv4 addresses as they are", () => {
			return expect(getSocketAddressFromURLSafeHostname("192.0.2.1", lookupFails)).to.become("192.0.2.1");
		});

		it("should unwrap IPv6 addresses", () => {
			return expect(getSocketAddressFromURLSafeHostname("[::1]", lookupFails)).to.become("::1");
		});

		it("should look up hostnames", () => {
			const lookup = (hostname: string) => Promise.resolve(hostname === "sensor.local" ? "192.0.2.7" : "0.0.0.0");
			return expect(getSocketAddressFromURLSafeHostname("sensor.local", lookup)).to.become("192.0.2.7");
		});

		it("should fall back to the hostname when the lookup fails", () => {
			return expect(getSocketAddressFromURLSafeHostname("sensor.local", lookupFails)).to.become("sensor.local");
		});
	});
});
