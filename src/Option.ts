import { DuplicateOptionError, MalformedMessageError, OptionFormatError, UnrecognizedCriticalOptionError } from "./Errors";
import {
	checkLength, EmptyFormat, LengthBounds, OpaqueFormat, OptionFormat, StringFormat, UintFormat, UriSegmentFormat,
} from "./OptionFormats";

/**
 * The value type of each known option
 */
export interface OptionValueTypes {
	"If-Match": Buffer;
	"Uri-Host": string;
	"ETag": Buffer;
	"If-None-Match": Buffer;
	"Observe": number;
	"Uri-Port": number;
	"Location-Path": string;
	"Uri-Path": string;
	"Content-Format": number;
	"Max-Age": number;
	"Uri-Query": string;
	"Accept": number;
	"Location-Query": string;
	"Block2": number;
	"Block1": number;
	"Size2": number;
	"Proxy-Uri": string;
	"Proxy-Scheme": string;
	"Size1": number;
}
/**
 * All defined option names
 */
export type OptionName = keyof OptionValueTypes;
export type OptionValue = OptionValueTypes[OptionName];

export interface OptionDefinition<T extends OptionValue = OptionValue> extends LengthBounds {
	readonly number: number;
	readonly name: string;
	readonly format: OptionFormat<T>;
	readonly repeatable: boolean;
	/** Substituted when the option is absent and its value is read */
	readonly defaultValue?: T;
}

function defineOption<N extends OptionName>(
	number: number, name: N, format: OptionFormat<OptionValueTypes[N]>, repeatable: boolean,
	minLength: number, maxLength: number, defaultValue?: OptionValueTypes[N],
): OptionDefinition<OptionValueTypes[N]> {
	return Object.freeze({ number, name, format, repeatable, minLength, maxLength, defaultValue });
}

/**
 * all defined options, by name
 */
// tslint:disable-next-line:variable-name
export const OptionDefinitions: { readonly [N in OptionName]: OptionDefinition<OptionValueTypes[N]> } = Object.freeze({
	"If-Match": defineOption(1, "If-Match", OpaqueFormat, true, 0, 8),
	"Uri-Host": defineOption(3, "Uri-Host", StringFormat, false, 1, 255),
	"ETag": defineOption(4, "ETag", OpaqueFormat, true, 1, 8),
	"If-None-Match": defineOption(5, "If-None-Match", EmptyFormat, false, 0, 0),
	"Observe": defineOption(6, "Observe", UintFormat, false, 0, 3),
	"Uri-Port": defineOption(7, "Uri-Port", UintFormat, false, 0, 2),
	"Location-Path": defineOption(8, "Location-Path", UriSegmentFormat, true, 0, 255),
	"Uri-Path": defineOption(11, "Uri-Path", UriSegmentFormat, true, 0, 255),
	"Content-Format": defineOption(12, "Content-Format", UintFormat, false, 0, 2),
	"Max-Age": defineOption(14, "Max-Age", UintFormat, false, 0, 4, 60),
	"Uri-Query": defineOption(15, "Uri-Query", StringFormat, true, 0, 255),
	"Accept": defineOption(17, "Accept", UintFormat, false, 0, 2),
	"Location-Query": defineOption(20, "Location-Query", StringFormat, true, 0, 255),
	"Block2": defineOption(23, "Block2", UintFormat, false, 0, 3),
	"Block1": defineOption(27, "Block1", UintFormat, false, 0, 3),
	"Size2": defineOption(28, "Size2", UintFormat, false, 0, 4),
	"Proxy-Uri": defineOption(35, "Proxy-Uri", StringFormat, false, 1, 1034),
	"Proxy-Scheme": defineOption(39, "Proxy-Scheme", StringFormat, false, 1, 255),
	"Size1": defineOption(60, "Size1", UintFormat, false, 0, 4),
});

const definitionsByNumber: ReadonlyMap<number, OptionDefinition> = new Map(
	Object.values(OptionDefinitions).map((d): [number, OptionDefinition] => [d.number, d]),
);

/** Largest option number and option length that can be expressed on the wire */
const MAX_OPTION_NUMBER = 0xffff;
const MAX_OPTION_LENGTH = 0xffff + 269;

/** Looks up the definition of a known option */
export function findOptionDefinition(number: number): OptionDefinition | undefined {
	return definitionsByNumber.get(number);
}

/** Options we don't know are kept as repeatable opaque values */
function unknownOptionDefinition(number: number): OptionDefinition {
	return {
		number,
		name: `Unknown-${number}`,
		format: OpaqueFormat,
		repeatable: true,
		minLength: 0,
		maxLength: MAX_OPTION_LENGTH,
	};
}

export function isCriticalOption(number: number): boolean {
	return (number & 0b1) === 0b1;
}

/**
 * An option as it was read from the wire, before its value was interpreted
 */
export interface RawOption {
	readonly number: number;
	readonly rawValue: Buffer;
}

/**
 * An immutable message option. Its behaviour is driven by the definition it was created from.
 */
export class Option {

	private constructor(
		public readonly definition: OptionDefinition,
		public readonly rawValue: Buffer,
	) {

	}

	public get number(): number {
		return this.definition.number;
	}
	public get name(): string {
		return this.definition.name;
	}
	public get repeatable(): boolean {
		return this.definition.repeatable;
	}
	/** The interpreted option value */
	public get value(): OptionValue {
		return this.definition.format.decode(this.rawValue);
	}

/*
	  0   1   2   3   4   5   6   7
	+---+---+---+---+---+---+---+---+
	|           | NoCacheKey| U | C |
	+---+---+---+---+---+---+---+---+
*/
	public get noCacheKey(): boolean {
		return (this.number & 0b11100) === 0b11100;
	}
	public get unsafe(): boolean {
		return (this.number & 0b10) === 0b10;
	}
	public get critical(): boolean {
		return isCriticalOption(this.number);
	}
	/** Whether the option only repeats the value that is assumed when it is absent */
	public get isDefault(): boolean {
		const { defaultValue, format } = this.definition;
		return defaultValue != undefined && format.encode(this.value).equals(format.encode(defaultValue));
	}

	/**
	 * Creates a known option from its value
	 * @throws OptionFormatError if the value does not satisfy the option's format
	 */
	public static create<N extends OptionName>(name: N, value: OptionValueTypes[N]): Option {
		const definition = OptionDefinitions[name];
		const problem = definition.format.validate(value);
		if (problem != undefined) {
			throw new OptionFormatError(definition.number, `${name}: ${problem}`);
		}
		const rawValue = definition.format.encode(value);
		const lengthProblem = checkLength(rawValue, definition);
		if (lengthProblem != undefined) {
			throw new OptionFormatError(definition.number, `${name}: ${lengthProblem}`);
		}
		return new Option(definition, rawValue);
	}

	/**
	 * Interprets a packed option value.
	 * Unknown elective options are preserved as opaque values.
	 * @throws UnrecognizedCriticalOptionError if the option is unknown and critical
	 * @throws OptionFormatError if the value does not satisfy the option's format
	 */
	public static decode(number: number, rawValue: Buffer): Option {
		const definition = definitionsByNumber.get(number);
		if (definition == undefined) {
			if (isCriticalOption(number)) throw new UnrecognizedCriticalOptionError(number);
			return new Option(unknownOptionDefinition(number), Buffer.from(rawValue));
		}

		const lengthProblem = checkLength(rawValue, definition);
		if (lengthProblem != undefined) {
			throw new OptionFormatError(number, `${definition.name}: ${lengthProblem}`);
		}
		try {
			definition.format.decode(rawValue);
		} catch (e) {
			const reason = e instanceof Error ? e.message : String(e);
			throw new OptionFormatError(number, `${definition.name}: ${reason}`);
		}
		return new Option(definition, Buffer.from(rawValue));
	}

/*

	 0   1   2   3   4   5   6   7
   +---------------+---------------+
   |  Option Delta | Option Length |   1 byte
   +---------------+---------------+
   /         Option Delta          /   0-2 bytes
   \          (extended)           \
   +-------------------------------+
   /         Option Length         /   0-2 bytes
   \          (extended)           \
   +-------------------------------+
   \                               \
   /         Option Value          /   0 or more bytes
   \                               \
   +-------------------------------+
*/

	/**
	 * reads the framing of a single option. The option must start at the given offset
	 * @param buf - the buffer to read from
	 * @param offset - where the option starts
	 * @param prevNumber - The option number of the previous option
	 * @throws MalformedMessageError if the option is truncated or uses a reserved value
	 */
	public static parse(buf: Buffer, offset: number, prevNumber: number = 0): {result: RawOption, readBytes: number} {
		let dataStart = offset + 1;
		const readExtended = (nibble: number, what: string): number => {
			switch (nibble) {
				case 13:
					if (dataStart + 1 > buf.length) throw new MalformedMessageError(`truncated option ${what}`);
					dataStart += 1;
					return buf[dataStart - 1] + 13;
				case 14:
					if (dataStart + 2 > buf.length) throw new MalformedMessageError(`truncated option ${what}`);
					dataStart += 2;
					return buf.readUInt16BE(dataStart - 2) + 269;
				case 15:
					throw new MalformedMessageError(`reserved option ${what} 15`);
				default:
					return nibble;
			}
		};
		// the extended delta comes before the extended length
		const delta = readExtended((buf[offset] >>> 4) & 0b1111, "delta");
		const length = readExtended(buf[offset] & 0b1111, "length");

		if (dataStart + length > buf.length) {
			throw new MalformedMessageError(`option value of length ${length} exceeds the message`);
		}
		const number = prevNumber + delta;
		if (number > MAX_OPTION_NUMBER) {
			throw new MalformedMessageError(`option number ${number} is out of range`);
		}

		return {
			result: {
				number,
				rawValue: Buffer.from(buf.subarray(dataStart, dataStart + length)),
			},
			readBytes: dataStart + length - offset,
		};
	}

	/**
	 * serializes this option into a buffer
	 * @param prevNumber - The option number of the previous option
	 */
	public serialize(prevNumber: number): Buffer {
		let delta = this.number - prevNumber;
		let length = this.rawValue.length;
		if (delta < 0) throw new RangeError("options must be serialized in ascending order");
		const totalLength =
			1
			+ (delta >= 13 ? 1 : 0)
			+ (delta >= 269 ? 1 : 0)
			+ (length >= 13 ? 1 : 0)
			+ (length >= 269 ? 1 : 0)
			+ length
		;
		const ret = Buffer.allocUnsafe(totalLength);

		let dataStart = 1;
		// check if we need to split the delta in 2 parts
		if (delta < 13) { /* all good */
		} else if (delta < 269) {
			ret[dataStart] = delta - 13;
			delta = 13;
			dataStart += 1;
		} else {
			ret.writeUInt16BE(delta - 269, dataStart);
			delta = 14;
			dataStart += 2;
		}

		// check if we need to split the length in 2 parts
		if (length < 13) { /* all good */
		} else if (length < 269) {
			ret[dataStart] = length - 13;
			length = 13;
			dataStart += 1;
		} else {
			ret.writeUInt16BE(length - 269, dataStart);
			length = 14;
			dataStart += 2;
		}

		// write the delta and length
		ret[0] = (delta << 4) + length;

		// copy the data
		this.rawValue.copy(ret, dataStart, 0);

		return ret;
	}

	public toString(): string {
		const value = this.value;
		return `${this.name}: ${Buffer.isBuffer(value) ? `0x${value.toString("hex")}` : value}`;
	}

}

/**
 * Interprets the raw options of a message in order
 * @throws DuplicateOptionError if a non-repeatable option is present more than once
 */
export function decodeOptions(raw: readonly RawOption[]): Option[] {
	const ret = raw.map(o => Option.decode(o.number, o.rawValue));
	assertNoDuplicates(ret);
	return ret;
}

/** @throws DuplicateOptionError if a non-repeatable option is present more than once */
export function assertNoDuplicates(options: readonly Option[]): void {
	const seen = new Set<number>();
	for (const opt of options) {
		if (opt.repeatable) continue;
		if (seen.has(opt.number)) throw new DuplicateOptionError(opt.number, opt.name);
		seen.add(opt.number);
	}
}

/** Returns a copy of the options in wire order. Options with the same number keep their order */
export function sortOptions(options: readonly Option[]): Option[] {
	return [...options].sort((a, b) => a.number - b.number);
}

export function findOption(opts: readonly Option[], name: OptionName): Option | undefined {
	const number = OptionDefinitions[name].number;
	return opts.find(o => o.number === number);
}

export function findOptions(opts: readonly Option[], name: OptionName): Option[] {
	const number = OptionDefinitions[name].number;
	return opts.filter(o => o.number === number);
}

/**
 * Reads the value of an option. Returns the option's default value if it is absent
 */
export function getOptionValue<N extends OptionName>(opts: readonly Option[], name: N): OptionValueTypes[N] | undefined {
	const definition = OptionDefinitions[name];
	const opt = opts.find(o => o.number === definition.number);
	if (opt == undefined) return definition.defaultValue;
	return definition.format.decode(opt.rawValue);
}

/**
 * Reads all values of a (repeatable) option in order of appearance
 */
export function getOptionValues<N extends OptionName>(opts: readonly Option[], name: N): OptionValueTypes[N][] {
	const definition = OptionDefinitions[name];
	return opts
		.filter(o => o.number === definition.number)
		.map(o => definition.format.decode(o.rawValue))
		;
}

/**
 * The contents of a Block1 or Block2 option
 */
export interface BlockValue {
	/** The sequence number of the block */
	num: number;
	/** Whether there are more blocks following this one */
	more: boolean;
	/**
	 * The size exponent of this block in the range 0..6
	 * The actual block size is calculated by 2**(4 + szx)
	 */
	szx: number;
}

export function decodeBlock(value: number): BlockValue {
	return {
		num: Math.floor(value / 16),
		more: (value & 0b1000) === 0b1000,
		szx: value & 0b111,
	};
}

export function encodeBlock(block: BlockValue): number {
	if (block.szx < 0 || block.szx > 6 || !Number.isInteger(block.szx)) {
		throw new RangeError("the size exponent must be in the range of 0..6");
	}
	if (block.num < 0 || block.num > 0xfffff || !Number.isInteger(block.num)) {
		throw new RangeError("the block number must be in the range of 0..2^20-1");
	}
	return block.num * 16 + (block.more ? 0b1000 : 0) + block.szx;
}

/** The size of a block in bytes */
export function blockSize(szx: number): number {
	return 1 << (szx + 4);
}

/**
 * Converts a block size to its exponent.
 * Returns undefined if the size is not a power of 2 between 16 and 1024
 */
export function blockSizeToExponent(size: number): number | undefined {
	// block size is represented as 2**(4 + X) where X is an integer from 0..6
	const exp = Math.log2(size) - 4;
	// is the exponent an integer?
	if (exp % 1 !== 0) return undefined;
	// is the exponent in the range of 0..6?
	if (exp < 0 || exp > 6) return undefined;
	return exp;
}

// tslint:disable-next-line:variable-name
export const Options = Object.freeze({
	UriHost: (hostname: string) => Option.create("Uri-Host", hostname),
	UriPort: (port: number) => Option.create("Uri-Port", port),
	UriPath: (segment: string) => Option.create("Uri-Path", segment),
	UriQuery: (query: string) => Option.create("Uri-Query", query),

	LocationPath: (segment: string) => Option.create("Location-Path", segment),
	LocationQuery: (query: string) => Option.create("Location-Query", query),

	ContentFormat: (format: number) => Option.create("Content-Format", format),
	Accept: (format: number) => Option.create("Accept", format),
	MaxAge: (seconds: number) => Option.create("Max-Age", seconds),
	ETag: (tag: Buffer) => Option.create("ETag", tag),
	IfMatch: (tag: Buffer) => Option.create("If-Match", tag),
	IfNoneMatch: () => Option.create("If-None-Match", Buffer.alloc(0)),

	/** 0 registers an observation, 1 deregisters it */
	Observe: (register: boolean) => Option.create("Observe", register ? 0 : 1),

	Block2: (num: number, more: boolean, size: number) => Option.create("Block2", encodeBlock({ num, more, szx: toExponent(size) })),
	Block1: (num: number, more: boolean, size: number) => Option.create("Block1", encodeBlock({ num, more, szx: toExponent(size) })),
});

function toExponent(size: number): number {
	const ret = blockSizeToExponent(size);
	if (ret == undefined) {
		throw new RangeError(`${size} is not a valid block size. The value must be a power of 2 between 16 and 1024`);
	}
	return ret;
}
