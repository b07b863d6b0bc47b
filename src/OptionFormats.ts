/**
 * Value formats of CoAP options. Each format is a strategy record that knows how to
 * turn an option value into its packed representation and back, and how to check
 * a value against the length bounds of an option definition.
 */
export interface OptionFormat<T> {
	readonly name: "empty" | "opaque" | "uint" | "string" | "uri";
	/** Converts the packed value. Throws a plain Error if the bytes are not a valid value */
	decode(raw: Buffer): T;
	encode(value: T): Buffer;
	/** Returns a description of the problem, or undefined if the value is acceptable */
	validate(value: T): string | undefined;
}

export interface LengthBounds {
	readonly minLength: number;
	readonly maxLength: number;
}

/** Checks the length of a packed value against the bounds of an option */
export function checkLength(raw: Buffer, bounds: LengthBounds): string | undefined {
	if (raw.length < bounds.minLength || raw.length > bounds.maxLength) {
		return `length ${raw.length} is outside of ${bounds.minLength}..${bounds.maxLength}`;
	}
}

/** Number of bytes needed for the shortest big-endian representation */
export function uintLength(value: number): number {
	let ret = 0;
	while (value > 0) {
		ret++;
		value = Math.floor(value / 256);
	}
	return ret;
}

function numberToBuffer(value: number): Buffer {
	const ret: number[] = [];
	while (value > 0) {
		ret.unshift(value & 0xff);
		value = Math.floor(value / 256);
	}
	return Buffer.from(ret);
}

export const EmptyFormat: OptionFormat<Buffer> = Object.freeze({
	name: "empty" as const,
	decode(raw: Buffer) {
		if (raw.length > 0) throw new Error("the option must be empty");
		return Buffer.alloc(0);
	},
	encode: () => Buffer.alloc(0),
	validate: (value: Buffer) => value.length > 0 ? "the option must be empty" : undefined,
});

export const OpaqueFormat: OptionFormat<Buffer> = Object.freeze({
	name: "opaque" as const,
	decode: (raw: Buffer) => Buffer.from(raw),
	encode: (value: Buffer) => Buffer.from(value),
	validate: () => undefined,
});

/**
 * Non-negative integers in network byte order. Leading zero bytes are never produced,
 * but tolerated when reading.
 */
export const UintFormat: OptionFormat<number> = Object.freeze({
	name: "uint" as const,
	decode(raw: Buffer) {
		if (raw.length > 4) throw new Error("integer options are limited to 4 bytes");
		return raw.reduce((acc, cur) => acc * 256 + cur, 0);
	},
	encode: numberToBuffer,
	validate(value: number) {
		if (!Number.isSafeInteger(value) || value < 0 || value > 0xffffffff) {
			return `${value} is not an unsigned 32-bit integer`;
		}
	},
});

export const StringFormat: OptionFormat<string> = Object.freeze({
	name: "string" as const,
	decode(raw: Buffer) {
		const ret = raw.toString("utf8");
		// invalid sequences are replaced while decoding and no longer round-trip
		if (!Buffer.from(ret, "utf8").equals(raw)) throw new Error("the value is not valid UTF-8");
		return ret;
	},
	encode: (value: string) => Buffer.from(value, "utf8"),
	validate: () => undefined,
});

/** Strings that represent a single segment of an absolute URI path */
export const UriSegmentFormat: OptionFormat<string> = Object.freeze({
	name: "uri" as const,
	decode(raw: Buffer) {
		const ret = StringFormat.decode(raw);
		if (ret.startsWith("/")) throw new Error("path segments must not start with a slash");
		return ret;
	},
	encode: StringFormat.encode,
	validate: (value: string) => value.startsWith("/") ? "path segments must not start with a slash" : undefined,
});
