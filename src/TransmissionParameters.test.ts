// tslint:disable:no-unused-expression
import { expect } from "chai";

import {
	DefaultTransmissionParameters, getRetransmissionInterval, resolveTransmissionParameters,
} from "./TransmissionParameters";

describe("TransmissionParameters Tests =>", () => {

	it("should use the default parameters", () => {
		const params = resolveTransmissionParameters();
		expect(params).to.deep.equal(DefaultTransmissionParameters);
		expect(params.ackTimeout).to.equal(2000);
		expect(params.maxRetransmit).to.equal(4);
		expect(params.exchangeLifetime).to.equal(247000);
		expect(params.nonLifetime).to.equal(145000);
	});

	it("should merge overrides over the defaults", () => {
		const params = resolveTransmissionParameters({ ackTimeout: 100, nstart: 2 });
		expect(params.ackTimeout).to.equal(100);
		expect(params.nstart).to.equal(2);
		expect(params.ackRandomFactor).to.equal(1.5);
		expect(Object.isFrozen(params)).to.be.true;
	});

	it("should reject invalid parameters", () => {
		expect(() => resolveTransmissionParameters({ ackTimeout: 0 })).to.throw(RangeError);
		expect(() => resolveTransmissionParameters({ ackRandomFactor: 0.5 })).to.throw(RangeError);
		expect(() => resolveTransmissionParameters({ maxRetransmit: -1 })).to.throw(RangeError);
		expect(() => resolveTransmissionParameters({ nstart: 0 })).to.throw(RangeError);
		expect(() => resolveTransmissionParameters({ exchangeLifetime: -5 })).to.throw(RangeError);
	});

	it("should randomize the initial timeout between ackTimeout and ackTimeout * ackRandomFactor", () => {
		expect(getRetransmissionInterval(DefaultTransmissionParameters, 0)).to.equal(2000);
		expect(getRetransmissionInterval(DefaultTransmissionParameters, 0.5)).to.equal(2500);
		expect(getRetransmissionInterval(DefaultTransmissionParameters, 0.999)).to.equal(2999);
	});
});
